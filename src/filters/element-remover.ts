import { Attribute, Augs, Locator } from '../document-handler';
import { isVoidElement } from '../elements';
import { DefaultFilter } from './default-filter';

/**
 * Keeps or drops elements by name.
 *
 * - An accepted element passes through, limited to the attributes listed for it, if any were listed.
 * - A removed element is dropped along with everything inside it.
 * - Any other element loses its tags but keeps its content, once at least one element has been accepted.
 *   Until then, it passes through.
 *
 * Removal wins when an element is both accepted and removed.
 */
export class ElementRemover extends DefaultFilter {
  private acceptedElements = new Map<string, Set<string> | null>();
  private elementDepth = 0;
  private removalDepth: number | null = null;
  private removedElements = new Set<string>();

  acceptElement(name: string, attributes?: readonly string[]): this {
    this.acceptedElements.set(name.toLowerCase(), attributes ? new Set(attributes.map(a => a.toLowerCase())) : null);

    return this;
  }

  removeElement(name: string): this {
    this.removedElements.add(name.toLowerCase());

    return this;
  }

  startDocument(encoding: string, locator: Locator, augs: Augs): void {
    this.elementDepth = 0;
    this.removalDepth = null;
    super.startDocument(encoding, locator, augs);
  }

  startElement(name: string, attributes: Attribute[], augs: Augs): void {
    const nameLc = name.toLowerCase();
    const isVoid = isVoidElement(nameLc);

    if (this.removalDepth === null) {
      if (this.removedElements.has(nameLc)) {
        if (!isVoid)
          this.removalDepth = this.elementDepth;
      }
      else if (this.passes(nameLc))
        super.startElement(name, this.keptAttributes(nameLc, attributes), augs);
    }

    // End events for void elements are optional, so voids never count toward the depth.
    if (!isVoid)
      ++this.elementDepth;
  }

  endElement(name: string, augs: Augs): void {
    const nameLc = name.toLowerCase();

    if (!isVoidElement(nameLc))
      --this.elementDepth;

    if (this.removalDepth === null) {
      if (!this.removedElements.has(nameLc) && this.passes(nameLc))
        super.endElement(name, augs);
    }
    else if (this.elementDepth <= this.removalDepth)
      this.removalDepth = null;
  }

  characters(text: string, augs: Augs): void {
    if (this.removalDepth === null)
      super.characters(text, augs);
  }

  comment(text: string, augs: Augs): void {
    if (this.removalDepth === null)
      super.comment(text, augs);
  }

  startCDATA(augs: Augs): void {
    if (this.removalDepth === null)
      super.startCDATA(augs);
  }

  endCDATA(augs: Augs): void {
    if (this.removalDepth === null)
      super.endCDATA(augs);
  }

  processingInstruction(target: string, data: string, augs: Augs): void {
    if (this.removalDepth === null)
      super.processingInstruction(target, data, augs);
  }

  private passes(nameLc: string): boolean {
    return this.acceptedElements.size === 0 || this.acceptedElements.has(nameLc);
  }

  private keptAttributes(nameLc: string, attributes: Attribute[]): Attribute[] {
    const kept = this.acceptedElements.get(nameLc);

    if (!kept)
      return attributes;

    return attributes.filter(attrib => kept.has(attrib.name.toLowerCase()));
  }
}
