import { EntityStyle, escapeAttributeValue, escapeToEntities } from '../characters';
import { Attribute, Augs, Locator } from '../document-handler';
import { doctypeToString, isRawTextParent } from '../dom';
import { isVoidElement } from '../elements';
import { DefaultFilter } from './default-filter';

export interface HtmlWriterOptions {
  /** Written into `<meta>` charset declarations. Declarations are left alone when null. */
  encoding?: string | null;
  entities?: EntityStyle;
  /** Receives the output piece by piece. Without one, output collects in the writer, see `toString()`. */
  sink?: (text: string) => void;
}

const RE_CHARSET = /(charset[ \t\n\f\r]*=[ \t\n\f\r]*)[^ \t\n\f\r;]*/i;

/** Serializes the events passing through it as HTML, then forwards them unchanged. */
export class HtmlWriter extends DefaultFilter {
  private buffer: string[] = [];
  readonly encoding: string | null;
  readonly entities: EntityStyle;
  private inCData = false;
  private rawText = false;
  private sink: (text: string) => void;

  constructor(options: HtmlWriterOptions = {}) {
    super();
    this.encoding = options.encoding ?? null;
    this.entities = options.entities ?? 'minimal';
    this.sink = options.sink ?? (text => this.buffer.push(text));
  }

  toString(): string {
    return this.buffer.join('');
  }

  startDocument(encoding: string, locator: Locator, augs: Augs): void {
    this.buffer = [];
    this.inCData = false;
    this.rawText = false;
    super.startDocument(encoding, locator, augs);
  }

  xmlDecl(version: string, encoding: string | null, standalone: string | null, augs: Augs): void {
    const parts = [`<?xml version="${version}"`];

    if (encoding !== null)
      parts.push(` encoding="${this.encoding ?? encoding}"`);

    if (standalone !== null)
      parts.push(` standalone="${standalone}"`);

    parts.push('?>');
    this.sink(parts.join(''));
    super.xmlDecl(version, encoding, standalone, augs);
  }

  doctypeDecl(rootElement: string, publicId: string | null, systemId: string | null, augs: Augs): void {
    this.sink(doctypeToString(rootElement, publicId, systemId));
    super.doctypeDecl(rootElement, publicId, systemId, augs);
  }

  startElement(name: string, attributes: Attribute[], augs: Augs): void {
    const parts = ['<', name];

    this.rewriteCharset(name, attributes).forEach(attrib =>
      parts.push(' ', attrib.name, '="', escapeAttributeValue(attrib.value), '"'));
    parts.push('>');
    this.sink(parts.join(''));
    this.rawText = isRawTextParent(name);
    super.startElement(name, attributes, augs);
  }

  endElement(name: string, augs: Augs): void {
    this.rawText = false;

    if (!isVoidElement(name))
      this.sink('</' + name + '>');

    super.endElement(name, augs);
  }

  characters(text: string, augs: Augs): void {
    this.sink(this.rawText || this.inCData ? text : escapeToEntities(text, this.entities));
    super.characters(text, augs);
  }

  comment(text: string, augs: Augs): void {
    this.sink('<!--' + text + '-->');
    super.comment(text, augs);
  }

  startCDATA(augs: Augs): void {
    this.inCData = true;
    this.sink('<![CDATA[');
    super.startCDATA(augs);
  }

  endCDATA(augs: Augs): void {
    this.inCData = false;
    this.sink(']]>');
    super.endCDATA(augs);
  }

  processingInstruction(target: string, data: string, augs: Augs): void {
    this.sink('<?' + target + (data ? ' ' + data : '') + '?>');
    super.processingInstruction(target, data, augs);
  }

  private rewriteCharset(name: string, attributes: Attribute[]): Attribute[] {
    const encoding = this.encoding;

    if (encoding === null || name.toLowerCase() !== 'meta')
      return attributes;

    const httpEquiv = attributes.find(attrib => attrib.name.toLowerCase() === 'http-equiv');
    const isContentType = !!httpEquiv && httpEquiv.value.trim().toLowerCase() === 'content-type';

    return attributes.map(attrib => {
      const nameLc = attrib.name.toLowerCase();

      if (nameLc === 'charset')
        return { ...attrib, value: encoding };
      else if (nameLc === 'content' && isContentType) {
        const value = RE_CHARSET.test(attrib.value) ?
          attrib.value.replace(RE_CHARSET, (match, prefix: string) => prefix + encoding) :
          attrib.value + '; charset=' + encoding;

        return { ...attrib, value };
      }

      return attrib;
    });
  }
}
