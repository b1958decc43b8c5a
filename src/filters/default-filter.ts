import { Attribute, Augs, DocumentHandler, Locator } from '../document-handler';

/** A stage of the pipeline: receives events and hands them, possibly changed, to `next`. */
export interface DocumentFilter extends DocumentHandler {
  next: DocumentHandler;
}

/** Passes every event to `next` unchanged. Subclasses override the events they care about. */
export class DefaultFilter implements DocumentFilter {
  next: DocumentHandler = {};

  setNext(next: DocumentHandler): this {
    this.next = next;

    return this;
  }

  startDocument(encoding: string, locator: Locator, augs: Augs): void {
    if (this.next.startDocument)
      this.next.startDocument(encoding, locator, augs);
  }

  xmlDecl(version: string, encoding: string | null, standalone: string | null, augs: Augs): void {
    if (this.next.xmlDecl)
      this.next.xmlDecl(version, encoding, standalone, augs);
  }

  doctypeDecl(rootElement: string, publicId: string | null, systemId: string | null, augs: Augs): void {
    if (this.next.doctypeDecl)
      this.next.doctypeDecl(rootElement, publicId, systemId, augs);
  }

  startElement(name: string, attributes: Attribute[], augs: Augs): void {
    if (this.next.startElement)
      this.next.startElement(name, attributes, augs);
  }

  endElement(name: string, augs: Augs): void {
    if (this.next.endElement)
      this.next.endElement(name, augs);
  }

  characters(text: string, augs: Augs): void {
    if (this.next.characters)
      this.next.characters(text, augs);
  }

  comment(text: string, augs: Augs): void {
    if (this.next.comment)
      this.next.comment(text, augs);
  }

  startCDATA(augs: Augs): void {
    if (this.next.startCDATA)
      this.next.startCDATA(augs);
  }

  endCDATA(augs: Augs): void {
    if (this.next.endCDATA)
      this.next.endCDATA(augs);
  }

  processingInstruction(target: string, data: string, augs: Augs): void {
    if (this.next.processingInstruction)
      this.next.processingInstruction(target, data, augs);
  }

  endDocument(augs: Augs): void {
    if (this.next.endDocument)
      this.next.endDocument(augs);
  }

  ignoredStartElement(name: string, attributes: Attribute[], augs: Augs): void {
    if (this.next.ignoredStartElement)
      this.next.ignoredStartElement(name, attributes, augs);
  }

  ignoredEndElement(name: string, augs: Augs): void {
    if (this.next.ignoredEndElement)
      this.next.ignoredEndElement(name, augs);
  }
}
