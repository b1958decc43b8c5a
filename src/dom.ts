import { escapeAttributeValue, minimalEscape } from './characters';
import { Attribute, Augs, copyAttributes, DocumentHandler } from './document-handler';
import { isVoidElement, PLAINTEXT_ELEMENT, RAW_TEXT_ELEMENTS } from './elements';

export const DOCUMENT_NODE = '#document';

interface Selector {
  element: string;
  id: string;
  qlass: string;
}

function stringToSelector(s: string): Selector {
  const selector: Selector = { element: '', id: '', qlass: '' };
  const $ = /(.*)\.(.+)/.exec(s);

  if ($) {
    s = $[1];
    selector.qlass = $[2];
  }

  if (s.startsWith('#'))
    selector.id = s.substr(1);
  else if (s !== '*')
    selector.element = s.toLowerCase();

  return selector;
}

export function doctypeToString(rootElement: string, publicId: string | null, systemId: string | null): string {
  const parts = ['<!DOCTYPE ', rootElement];

  if (publicId !== null) {
    parts.push(' PUBLIC "', publicId, '"');

    if (systemId !== null)
      parts.push(' "', systemId, '"');
  }
  else if (systemId !== null)
    parts.push(' SYSTEM "', systemId, '"');

  parts.push('>');

  return parts.join('');
}

export function isRawTextParent(tag: string): boolean {
  const tagLc = tag.toLowerCase();

  return RAW_TEXT_ELEMENTS.has(tagLc) || tagLc === PLAINTEXT_ELEMENT;
}

export abstract class DomElement {
  parent: DomNode | null = null;

  protected constructor(
    public content: string,
    public readonly line: number,
    public readonly column: number
  ) {}

  get depth(): number {
    let depth = -1;
    let node = this.parent;

    while (node) {
      ++depth;
      node = node.parent;
    }

    return depth;
  }

  abstract toString(): string;

  // noinspection JSUnusedGlobalSymbols
  toJSON(): unknown {
    return this.toString() + ' (' + this.depth +
      (this.line ? `; ${this.line}, ${this.column}` : '') +
      (this.parent ? '; ' + this.parent.tag : '') + ')';
  }
}

export class CData extends DomElement {
  constructor(content: string, line = 0, column = 0) {
    super(content, line, column);
  }

  toString(): string {
    return '<![CDATA[' + this.content + ']]>';
  }
}

export class CommentElement extends DomElement {
  constructor(content: string, line = 0, column = 0) {
    super(content, line, column);
  }

  toString(): string {
    return '<!--' + this.content + '-->';
  }
}

const VARIETIES = ['frameset', 'strict', 'transitional'] as const;

export type DocTypeVariety = typeof VARIETIES[number];

export class DocType extends DomElement {
  readonly type: 'html' | 'xhtml';
  readonly variety: DocTypeVariety | null;
  readonly version: string | null;

  constructor(
    public readonly rootElement: string,
    public readonly publicId: string | null,
    public readonly systemId: string | null,
    line = 0,
    column = 0
  ) {
    super(doctypeToString(rootElement, publicId, systemId), line, column);

    const ids = [publicId, systemId].filter(id => id !== null).join(' ');
    const variety = /\b(frameset|strict|transitional)\b/i.exec(ids);
    const version = /\bx?html[ \n\r\t\f]*([.\d]+)\b/i.exec(ids);

    this.type = /\bxhtml\b/i.test(ids) ? 'xhtml' : 'html';
    this.variety = variety ? VARIETIES.find(v => v === variety[1].toLowerCase()) ?? null : null;
    this.version = version ? version[1] : null;

    if (!this.version && !ids && rootElement.toLowerCase() === 'html')
      this.version = '5';
  }

  toString(): string {
    return this.content;
  }
}

export class ProcessingElement extends DomElement {
  constructor(
    public readonly target: string,
    public readonly data: string,
    line = 0,
    column = 0
  ) {
    super(data ? target + ' ' + data : target, line, column);
  }

  toString(): string {
    return '<?' + this.content + '?>';
  }
}

export class TextElement extends DomElement {
  constructor(
    content: string,
    line = 0,
    column = 0,
    public raw = false
  ) {
    super(content, line, column);
  }

  toString(): string {
    return this.raw ? this.content : minimalEscape(this.content);
  }
}

export interface DomNodeJson {
  tag: string;
  line?: number;
  column?: number;
  synthetic?: boolean;
  depth: number;
  values?: Record<string, string>;
  parentTag?: string;
  children?: DomElement[];
}

export class DomNode extends DomElement {
  attributes: Attribute[] = [];
  children: DomElement[] = [];
  readonly tagLc: string;

  constructor(
    public tag: string,
    line = 0,
    column = 0,
    public synthetic = false
  ) {
    super('', line, column);
    this.tagLc = tag.toLowerCase();
  }

  static createNode(tag: string, values: Record<string, string> = {}): DomNode {
    const node = new DomNode(tag);

    Object.keys(values).forEach(name => node.setAttribute(name, values[name]));

    return node;
  }

  get isDocument(): boolean {
    return this.tag === DOCUMENT_NODE;
  }

  get values(): Record<string, string> {
    return this.attributes.reduce((values: Record<string, string>, attrib) => {
      values[attrib.name] = attrib.value;
      return values;
    }, {});
  }

  getAttribute(name: string): string | null {
    const index = this.indexOfAttribute(name);

    return index < 0 ? null : this.attributes[index].value;
  }

  hasAttribute(name: string): boolean {
    return this.indexOfAttribute(name) >= 0;
  }

  setAttribute(name: string, value: string): void {
    const index = this.indexOfAttribute(name);

    if (index < 0)
      this.attributes.push({ name, value, specified: true });
    else
      this.attributes[index].value = value;
  }

  removeAttribute(name: string): boolean {
    const index = this.indexOfAttribute(name);

    if (index < 0)
      return false;

    this.attributes.splice(index, 1);

    return true;
  }

  private indexOfAttribute(name: string): number {
    const nameLc = name.toLowerCase();

    return this.attributes.findIndex(attrib => attrib.name.toLowerCase() === nameLc);
  }

  addChild(child: DomElement): void {
    child.parent = this;
    this.children.push(child);
  }

  querySelector(selector: string): DomNode | null {
    const results: DomNode[] = [];

    this.querySelectorImpl(stringToSelector(selector), results, 1);

    return results.length === 0 ? null : results[0];
  }

  querySelectorAll(selector: string): DomNode[] {
    const results: DomNode[] = [];

    this.querySelectorImpl(stringToSelector(selector), results);

    return results;
  }

  private querySelectorImpl(selector: Selector, results: DomNode[], limit = Number.MAX_SAFE_INTEGER): void {
    if (!this.isDocument &&
        (!selector.element || this.tagLc === selector.element) &&
        (!selector.qlass || (this.getAttribute('class') || '').split(/\s+/).indexOf(selector.qlass) >= 0) &&
        (!selector.id || this.getAttribute('id') === selector.id))
      results.push(this);

    for (let i = 0; i < this.children.length && results.length < limit; ++i) {
      const child = this.children[i];

      if (child instanceof DomNode)
        child.querySelectorImpl(selector, results, limit);
    }
  }

  get textContent(): string {
    const text: string[] = [];

    for (const child of this.children) {
      if (child instanceof CData || child instanceof TextElement)
        text.push(child.content);
      else if (child instanceof DomNode)
        text.push(child.textContent);
    }

    return text.join('');
  }

  get innerHTML(): string {
    return this.toString(false);
  }

  toJSON(): DomNodeJson {
    const json: DomNodeJson = { tag: this.tag, depth: this.depth };

    if (this.line)
      json.line = this.line;

    if (this.column)
      json.column = this.column;

    if (this.synthetic)
      json.synthetic = true;

    if (this.attributes.length > 0)
      json.values = this.values;

    if (this.parent)
      json.parentTag = this.parent.tag;

    if (this.children.length > 0)
      json.children = this.children;

    return json;
  }

  toString(includeSelf = true): string {
    const parts: string[] = [];

    includeSelf = includeSelf && !this.isDocument;

    if (includeSelf) {
      parts.push('<', this.tag);
      this.attributes.forEach(attrib => parts.push(' ', attrib.name, '="', escapeAttributeValue(attrib.value), '"'));
      parts.push('>');
    }

    this.children.forEach(child => parts.push(child.toString()));

    if (includeSelf && !isVoidElement(this.tagLc))
      parts.push('</', this.tag, '>');

    return parts.join('');
  }
}

function position(augs: Augs): [number, number] {
  const location = augs && augs.location;

  return location ? [location.beginLine, location.beginColumn] : [0, 0];
}

/**
 * Builds a tree from the balanced event stream. Node positions come from the event augmentations, and
 * are 0 when augmentations are off.
 */
export class DomBuilder implements DocumentHandler {
  readonly root = new DomNode(DOCUMENT_NODE);

  private cdata: CData | null = null;
  private currentNode = this.root;

  startDocument(): void {
    this.root.children = [];
    this.cdata = null;
    this.currentNode = this.root;
  }

  xmlDecl(version: string, encoding: string | null, standalone: string | null, augs: Augs): void {
    const data = [`version="${version}"`];

    if (encoding !== null)
      data.push(`encoding="${encoding}"`);

    if (standalone !== null)
      data.push(`standalone="${standalone}"`);

    this.currentNode.addChild(new ProcessingElement('xml', data.join(' '), ...position(augs)));
  }

  doctypeDecl(rootElement: string, publicId: string | null, systemId: string | null, augs: Augs): void {
    this.currentNode.addChild(new DocType(rootElement, publicId, systemId, ...position(augs)));
  }

  startElement(name: string, attributes: Attribute[], augs: Augs): void {
    const node = new DomNode(name, ...position(augs), !!augs && augs.synthesized);

    node.attributes = copyAttributes(attributes);
    this.currentNode.addChild(node);

    // Void elements never get children, whether or not their end events are sent.
    if (!isVoidElement(node.tagLc))
      this.currentNode = node;
  }

  endElement(name: string): void {
    if (!isVoidElement(name) && this.currentNode.parent)
      this.currentNode = this.currentNode.parent;
  }

  characters(text: string, augs: Augs): void {
    if (this.cdata)
      this.cdata.content += text;
    else
      this.currentNode.addChild(new TextElement(text, ...position(augs), isRawTextParent(this.currentNode.tag)));
  }

  comment(text: string, augs: Augs): void {
    this.currentNode.addChild(new CommentElement(text, ...position(augs)));
  }

  startCDATA(augs: Augs): void {
    this.cdata = new CData('', ...position(augs));
    this.currentNode.addChild(this.cdata);
  }

  endCDATA(): void {
    this.cdata = null;
  }

  processingInstruction(target: string, data: string, augs: Augs): void {
    this.currentNode.addChild(new ProcessingElement(target, data, ...position(augs)));
  }
}
