import { locationBetween, SourceLocation, SourcePosition } from './augmentations';
import { applyCase, collapseWhitespace, isAsciiAlpha, isNameTerminator, isWhitespace } from './characters';
import { Attribute } from './document-handler';
import { isRawTextElement, PLAINTEXT_ELEMENT, RCDATA_ELEMENTS } from './elements';
import { charsetFromMetaAttributes, isSupportedEncoding, normalizeEncodingName, sameEncoding } from './encoding';
import { decodeCharacterReferences } from './entity-resolver';
import { createDiagnostic, DiagnosticListener } from './errors';

export type NameCase = 'lower' | 'upper' | 'no-change';

export interface ScannerOptions {
  allowSelfClosingIframe: boolean;
  allowSelfClosingTags: boolean;
  attributeNameCase: NameCase;
  cdataSections: boolean;
  elementNameCase: NameCase;
  normalizeAttributes: boolean;
  parseNoscriptContent: boolean;
  scriptStripCdataDelims: boolean;
  scriptStripCommentDelims: boolean;
  styleStripCdataDelims: boolean;
  styleStripCommentDelims: boolean;
}

export const DEFAULT_SCANNER_OPTIONS: Readonly<ScannerOptions> = Object.freeze({
  allowSelfClosingIframe: false,
  allowSelfClosingTags: false,
  attributeNameCase: 'lower',
  cdataSections: false,
  elementNameCase: 'lower',
  normalizeAttributes: false,
  parseNoscriptContent: true,
  scriptStripCdataDelims: false,
  scriptStripCommentDelims: false,
  styleStripCdataDelims: false,
  styleStripCommentDelims: false
});

interface TokenBase {
  location: SourceLocation;
}

export interface StartTagToken extends TokenBase {
  type: 'start-tag';
  name: string;
  attributes: Attribute[];
  selfClosing: boolean;
}

export interface EndTagToken extends TokenBase {
  type: 'end-tag';
  name: string;
}

export interface TextToken extends TokenBase {
  type: 'text';
  content: string;
}

export interface CommentToken extends TokenBase {
  type: 'comment';
  content: string;
}

export interface CDataToken extends TokenBase {
  type: 'cdata';
  content: string;
}

export interface ProcessingInstructionToken extends TokenBase {
  type: 'processing-instruction';
  target: string;
  data: string;
}

export interface DoctypeToken extends TokenBase {
  type: 'doctype';
  rootElement: string;
  publicId: string | null;
  systemId: string | null;
}

export interface XmlDeclarationToken extends TokenBase {
  type: 'xml-declaration';
  version: string;
  encoding: string | null;
  standalone: string | null;
}

export type Token = StartTagToken | EndTagToken | TextToken | CommentToken | CDataToken | ProcessingInstructionToken |
                    DoctypeToken | XmlDeclarationToken;

export enum State {
  CONTENT,
  RAW_TEXT,
  DONE
}

const RE_COMMENT_END = /--!?>/g;
const RE_DOCTYPE = /^\s*([^\s>]*)\s*(?:(PUBLIC|SYSTEM)\b\s*(?:(["'])([\s\S]*?)\3)?\s*(?:(["'])([\s\S]*?)\5)?)?/i;
const RE_PI = /^([^\s?]*)\s*([\s\S]*)$/;

function pseudoAttribute(text: string, name: string): string | null {
  const $ = new RegExp('\\b' + name + '\\s*=\\s*(["\'])(.*?)\\1').exec(text);

  return $ ? $[2] : null;
}

function stripDelimiters(text: string, open: string, close: string): string {
  let result = text;
  const trimmedStart = result.replace(/^\s+/, '');

  if (trimmedStart.startsWith(open))
    result = trimmedStart.substr(open.length);

  const trimmedEnd = result.replace(/\s+$/, '');

  if (trimmedEnd.endsWith(close))
    result = trimmedEnd.substr(0, trimmedEnd.length - close.length);

  return result;
}

/**
 * Maps indices in a run of normalized text back to positions in the source the run was read from.
 * Indices must be asked for in increasing order.
 */
class RunCursor {
  private column: number;
  private index = 0;
  private line: number;
  private offset: number;

  constructor(private readonly source: string, begin: SourcePosition) {
    this.column = begin.column;
    this.line = begin.line;
    this.offset = begin.offset;
  }

  positionOf(index: number): SourcePosition {
    while (this.index < index && this.offset < this.source.length) {
      const ch = this.source.charAt(this.offset);

      if (ch === '\r' && this.source.charAt(this.offset + 1) === '\n')
        ++this.offset;

      if (ch === '\n' || ch === '\r') {
        ++this.line;
        this.column = 1;
      }
      else
        ++this.column;

      ++this.offset;
      ++this.index;
    }

    return { line: this.line, column: this.column, offset: this.offset };
  }
}

/**
 * Splits decoded HTML source into tokens. Line breaks are normalized to `\n` in everything reported;
 * lines, columns and offsets refer to the original source.
 */
export class Scanner implements Iterable<Token> {
  private column = 1;
  private line = 1;
  readonly options: ScannerOptions;
  private pos = 0;
  private rawElement = '';
  private state = State.CONTENT;

  constructor(
    private readonly source: string,
    options: Partial<ScannerOptions> = {},
    private readonly onDiagnostic?: DiagnosticListener,
    private readonly committedEncoding: string | null = null
  ) {
    this.options = { ...DEFAULT_SCANNER_OPTIONS, ...options };
  }

  get position(): SourcePosition {
    return { line: this.line, column: this.column, offset: this.pos };
  }

  get atEOF(): boolean {
    return this.pos >= this.source.length;
  }

  *[Symbol.iterator](): Iterator<Token> {
    let token: Token | null;

    while ((token = this.nextToken()))
      yield token;
  }

  nextToken(): Token | null {
    if (this.state === State.RAW_TEXT) {
      this.state = State.CONTENT;

      const body = this.scanRawText();

      if (body)
        return body;
    }

    while (!this.atEOF) {
      if (this.source.charAt(this.pos) !== '<' || !this.isMarkupStart(this.pos))
        return this.scanText();

      const token = this.scanMarkup();

      if (token)
        return token;
    }

    this.state = State.DONE;

    return null;
  }

  private report(code: string, args: readonly string[], position: SourcePosition): void {
    if (this.onDiagnostic)
      this.onDiagnostic(createDiagnostic(code, args, position));
  }

  private peek(ahead = 0): string {
    return this.source.charAt(this.pos + ahead);
  }

  // Consumes source up to `index`, keeping line and column current, and returns it with line breaks normalized.
  private advanceTo(index: number): string {
    const end = Math.min(index, this.source.length);
    const raw = this.source.substring(this.pos, end);

    for (let i = this.pos; i < end; ++i) {
      const ch = this.source.charAt(i);

      if (ch === '\n' || (ch === '\r' && this.source.charAt(i + 1) !== '\n')) {
        ++this.line;
        this.column = 1;
      }
      else if (ch !== '\r')
        ++this.column;
    }

    this.pos = end;

    return raw.replace(/\r\n?/g, '\n');
  }

  private getChar(): string {
    if (this.atEOF)
      return '';
    else if (this.peek() === '\r' && this.peek(1) === '\n')
      return this.advanceTo(this.pos + 2);
    else
      return this.advanceTo(this.pos + 1);
  }

  private skipWhitespace(): void {
    let end = this.pos;

    while (end < this.source.length && isWhitespace(this.source.charAt(end)))
      ++end;

    this.advanceTo(end);
  }

  private readName(): string {
    let end = this.pos;

    while (end < this.source.length && !isNameTerminator(this.source.charAt(end)))
      ++end;

    return this.advanceTo(end);
  }

  private isMarkupStart(index: number): boolean {
    const next = this.source.charAt(index + 1);

    return isAsciiAlpha(next) || ((next === '/' || next === '!' || next === '?') && index + 2 < this.source.length);
  }

  private decode(text: string, begin: SourcePosition, inAttribute: boolean): string {
    if (!text.includes('&'))
      return text;

    const cursor = new RunCursor(this.source, begin);

    return decodeCharacterReferences(text, inAttribute,
      (code, reference, index) => this.report(code, [reference], cursor.positionOf(index)));
  }

  private startsRawText(name: string): boolean {
    return isRawTextElement(name) || (name === 'noscript' && !this.options.parseNoscriptContent);
  }

  private scanText(): TextToken {
    const begin = this.position;
    const parts: string[] = [];

    for (;;) {
      const index = this.source.indexOf('<', this.pos);

      if (index < 0) {
        parts.push(this.advanceTo(this.source.length));
        break;
      }

      parts.push(this.advanceTo(index));

      if (this.isMarkupStart(index))
        break;

      this.report('HTML1009', [], this.position);
      parts.push(this.getChar());
    }

    const text = parts.join('');

    return { type: 'text', content: this.decode(text, begin, false), location: locationBetween(begin, this.position) };
  }

  private scanRawText(): TextToken | null {
    const name = this.rawElement;
    const begin = this.position;
    let body: string;

    this.rawElement = '';

    if (name === PLAINTEXT_ELEMENT)
      body = this.advanceTo(this.source.length);
    else {
      const close = new RegExp('</' + name + '(?=[ \\t\\n\\f\\r/>])', 'ig');

      close.lastIndex = this.pos;

      const $ = close.exec(this.source);

      if ($)
        body = this.advanceTo($.index);
      else {
        body = this.advanceTo(this.source.length);
        this.report('HTML1007', [`<${name}>`], this.position);
      }
    }

    if (name === 'script' || name === 'style') {
      if (this.options[name === 'script' ? 'scriptStripCommentDelims' : 'styleStripCommentDelims'])
        body = stripDelimiters(body, '<!--', '-->');

      if (this.options[name === 'script' ? 'scriptStripCdataDelims' : 'styleStripCdataDelims'])
        body = stripDelimiters(body, '<![CDATA[', ']]>');
    }
    else if (RCDATA_ELEMENTS.has(name))
      body = this.decode(body, begin, false);

    if (!body)
      return null;

    return { type: 'text', content: body, location: locationBetween(begin, this.position) };
  }

  private scanMarkup(): Token | null {
    const begin = this.position;
    const next = this.peek(1);

    if (next === '/')
      return this.scanEndTag(begin);
    else if (next === '!')
      return this.scanDeclaration(begin);
    else if (next === '?')
      return this.scanProcessingInstruction(begin);
    else
      return this.scanStartTag(begin);
  }

  private scanStartTag(begin: SourcePosition): StartTagToken {
    this.getChar();

    const rawName = this.readName();
    const attributes: Attribute[] = [];
    let selfClosing = false;
    let terminated = false;

    while (!this.atEOF) {
      this.skipWhitespace();

      const ch = this.peek();

      if (ch === '>') {
        this.getChar();
        terminated = true;
        break;
      }
      else if (ch === '/') {
        this.getChar();

        if (this.peek() === '>') {
          this.getChar();
          selfClosing = terminated = true;
          break;
        }
      }
      else if (ch)
        this.scanAttribute(attributes);
    }

    if (!terminated)
      this.report('HTML1007', [`<${rawName}>`], this.position);

    const lower = rawName.toLowerCase();

    if (lower === 'meta')
      this.checkMetaCharset(attributes, begin);

    if (terminated && this.startsRawText(lower) && !(selfClosing && this.closesSelf(lower))) {
      this.rawElement = lower;
      this.state = State.RAW_TEXT;
    }

    return {
      type: 'start-tag',
      name: applyCase(rawName, this.options.elementNameCase),
      attributes,
      selfClosing,
      location: locationBetween(begin, this.position)
    };
  }

  private closesSelf(name: string): boolean {
    return this.options.allowSelfClosingTags || (name === 'iframe' && this.options.allowSelfClosingIframe);
  }

  private scanAttribute(attributes: Attribute[]): void {
    const begin = this.position;
    let end = this.pos + 1; // A leading '=' belongs to the name.

    while (end < this.source.length && !isNameTerminator(this.source.charAt(end)) && this.source.charAt(end) !== '=')
      ++end;

    const rawName = this.advanceTo(end);
    let value = '';

    this.skipWhitespace();

    if (this.peek() === '=') {
      this.getChar();
      this.skipWhitespace();

      const quote = this.peek();
      let valueBegin = this.position;

      if (quote === '"' || quote === "'") {
        this.getChar();
        valueBegin = this.position;

        const close = this.source.indexOf(quote, this.pos);

        if (close < 0) {
          value = this.advanceTo(this.source.length);
          this.report('HTML1007', ['attribute value'], this.position);
        }
        else {
          value = this.advanceTo(close);
          this.getChar();
        }
      }
      else {
        let valueEnd = this.pos;

        while (valueEnd < this.source.length && !isWhitespace(this.source.charAt(valueEnd)) &&
               this.source.charAt(valueEnd) !== '>')
          ++valueEnd;

        value = this.advanceTo(valueEnd);
      }

      value = this.decode(value, valueBegin, true);
    }

    if (this.options.normalizeAttributes)
      value = collapseWhitespace(value);

    const name = applyCase(rawName, this.options.attributeNameCase);
    const lower = name.toLowerCase();

    if (attributes.some(attribute => attribute.name.toLowerCase() === lower))
      this.report('HTML1013', [name], begin);
    else
      attributes.push({ name, value, specified: true });
  }

  private checkMetaCharset(attributes: Attribute[], begin: SourcePosition): void {
    if (!this.committedEncoding)
      return;

    const declared = charsetFromMetaAttributes(attributes);

    if (!declared)
      return;

    const effective = /^utf-?16/.test(normalizeEncodingName(declared)) ? 'utf-8' : declared;

    if (!isSupportedEncoding(effective))
      this.report('HTML1001', [declared], begin);
    else if (!sameEncoding(effective, this.committedEncoding))
      this.report('HTML1015', [declared, this.committedEncoding], begin);
  }

  private scanEndTag(begin: SourcePosition): EndTagToken | CommentToken | null {
    this.advanceTo(this.pos + 2);

    const next = this.peek();

    if (next === '>') {
      this.getChar();
      this.report('HTML1012', [], begin);

      return null;
    }
    else if (!isAsciiAlpha(next))
      return this.scanBogusComment(begin);

    const rawName = this.readName();
    const close = this.source.indexOf('>', this.pos);

    if (close < 0) {
      this.advanceTo(this.source.length);
      this.report('HTML1007', [`</${rawName}>`], this.position);
    }
    else
      this.advanceTo(close + 1);

    return {
      type: 'end-tag',
      name: applyCase(rawName, this.options.elementNameCase),
      location: locationBetween(begin, this.position)
    };
  }

  private scanBogusComment(begin: SourcePosition, prefix = ''): CommentToken {
    const close = this.source.indexOf('>', this.pos);
    const content = prefix + this.advanceTo(close < 0 ? this.source.length : close);

    this.report('HTML1014', [], begin);

    if (close < 0)
      this.report('HTML1007', ['comment'], this.position);
    else
      this.getChar();

    return { type: 'comment', content, location: locationBetween(begin, this.position) };
  }

  private scanDeclaration(begin: SourcePosition): Token {
    this.advanceTo(this.pos + 2);

    if (this.source.startsWith('--', this.pos))
      return this.scanComment(begin);
    else if (this.source.startsWith('[CDATA[', this.pos))
      return this.scanCData(begin);
    else if (this.source.substr(this.pos, 7).toUpperCase() === 'DOCTYPE')
      return this.scanDoctype(begin);
    else
      return this.scanBogusComment(begin);
  }

  private scanComment(begin: SourcePosition): CommentToken {
    let content = '';

    this.advanceTo(this.pos + 2);

    if (this.peek() === '>')
      this.getChar();
    else if (this.source.startsWith('->', this.pos))
      this.advanceTo(this.pos + 2);
    else {
      RE_COMMENT_END.lastIndex = this.pos;

      const $ = RE_COMMENT_END.exec(this.source);

      if ($) {
        content = this.advanceTo($.index);
        this.advanceTo($.index + $[0].length);
      }
      else {
        // Unterminated: the comment ends at the first '>' instead.
        const close = this.source.indexOf('>', this.pos);

        content = this.advanceTo(close < 0 ? this.source.length : close);
        this.getChar();
        this.report('HTML1007', ['comment'], this.position);
      }
    }

    return { type: 'comment', content, location: locationBetween(begin, this.position) };
  }

  private scanCData(begin: SourcePosition): CDataToken | CommentToken {
    this.advanceTo(this.pos + 7);

    const close = this.source.indexOf(']]>', this.pos);
    const content = this.advanceTo(close < 0 ? this.source.length : close);

    if (close < 0)
      this.report('HTML1007', ['CDATA section'], this.position);
    else
      this.advanceTo(close + 3);

    const location = locationBetween(begin, this.position);

    if (this.options.cdataSections)
      return { type: 'cdata', content, location };
    else
      return { type: 'comment', content: `[CDATA[${content}]]`, location };
  }

  private scanDoctype(begin: SourcePosition): DoctypeToken {
    this.advanceTo(this.pos + 7);

    const close = this.source.indexOf('>', this.pos);
    const inner = this.advanceTo(close < 0 ? this.source.length : close);

    if (close < 0)
      this.report('HTML1007', ['doctype'], this.position);
    else
      this.getChar();

    const $ = RE_DOCTYPE.exec(inner);
    let publicId: string | null = null;
    let systemId: string | null = null;

    if ($ && $[2]) {
      if ($[2].toUpperCase() === 'PUBLIC') {
        publicId = $[4] ?? null;
        systemId = $[6] ?? null;
      }
      else
        systemId = $[4] ?? null;
    }

    return {
      type: 'doctype',
      rootElement: $ ? $[1] : '',
      publicId,
      systemId,
      location: locationBetween(begin, this.position)
    };
  }

  private scanProcessingInstruction(begin: SourcePosition): Token {
    this.advanceTo(this.pos + 2);

    const close = this.source.indexOf('>', this.pos);

    if (close < 0) {
      const content = '?' + this.advanceTo(this.source.length);

      this.report('HTML1007', ['processing instruction'], this.position);

      return { type: 'comment', content, location: locationBetween(begin, this.position) };
    }

    const inner = this.advanceTo(close);

    this.getChar();

    const location = locationBetween(begin, this.position);

    if (!inner.endsWith('?'))
      return { type: 'comment', content: '?' + inner, location };

    const $ = RE_PI.exec(inner.slice(0, -1));
    const target = $ ? $[1] : '';
    const data = $ ? $[2] : '';

    if (target.toLowerCase() === 'xml')
      return {
        type: 'xml-declaration',
        version: pseudoAttribute(data, 'version') ?? '1.0',
        encoding: pseudoAttribute(data, 'encoding'),
        standalone: pseudoAttribute(data, 'standalone'),
        location
      };

    return { type: 'processing-instruction', target, data, location };
  }
}
