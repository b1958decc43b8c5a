import fs from 'fs';
import { applyOption, HtmlParserOptions, resolveOptions } from './config';
import { Attribute, Augs, DocumentHandler, Locator } from './document-handler';
import { DocType, DomBuilder, DomNode } from './dom';
import { isVoidElement } from './elements';
import { decodeBytes, determineEncoding, EncodingSource } from './encoding';
import { Diagnostic, HtmlIoError } from './errors';
import { DefaultFilter, DocumentFilter } from './filters/default-filter';
import { Scanner } from './scanner';
import { TagBalancer } from './tag-balancer';
import { processMillis } from './util';

export type { HtmlParserOptions } from './config';

/** Reported for string input, which arrives already decoded. */
export const STRING_ENCODING = 'UTF-16';

export class ParseResults {
  characters = 0;
  diagnostics: Diagnostic[] = [];
  encoding = STRING_ENCODING;
  encodingSource: EncodingSource | null = null;
  errors = 0;
  implicitlyClosedTags = 0;
  lines = 0;
  stopped = false;
  totalTime = 0;
  unclosedTags = 0;
  warnings = 0;

  constructor(readonly domRoot: DomNode) {}

  toString(): string {
    return this.domRoot.toString();
  }
}

type AugsCallback = (depth: number, augs: Augs) => void;
type CompletionCallback = (results: ParseResults) => void;
type DocTypeCallback = (docType: DocType, augs: Augs) => void;
type DocumentStartCallback = (encoding: string, source: EncodingSource | null) => void;
type ElementStartCallback = (depth: number, name: string, attributes: Attribute[], augs: Augs) => void;
type ElementEndCallback = (depth: number, name: string, augs: Augs) => void;
type ErrorCallback = (diagnostic: Diagnostic) => void;
type IgnoredEndCallback = (name: string, augs: Augs) => void;
type IgnoredStartCallback = (name: string, attributes: Attribute[], augs: Augs) => void;
type ProcessingCallback = (depth: number, target: string, data: string, augs: Augs) => void;
type TextCallback = (depth: number, text: string, augs: Augs) => void;
type XmlDeclarationCallback = (version: string, encoding: string | null, standalone: string | null, augs: Augs) => void;

export interface ParserEvents {
  'cdata-end': AugsCallback;
  'cdata-start': AugsCallback;
  'comment': TextCallback;
  'doctype': DocTypeCallback;
  'document-end': CompletionCallback;
  'document-start': DocumentStartCallback;
  'element-end': ElementEndCallback;
  'element-start': ElementStartCallback;
  'error': ErrorCallback;
  'ignored-element-end': IgnoredEndCallback;
  'ignored-element-start': IgnoredStartCallback;
  'processing': ProcessingCallback;
  'text': TextCallback;
  'xml-declaration': XmlDeclarationCallback;
}

export type EventType = keyof ParserEvents;

const IMPLICIT_CLOSE_CODES = new Set(['HTML2005', 'HTML2007']);
const UNCLOSED_CODE = 'HTML2001';

class ScannerLocator implements Locator {
  constructor(private scanner: Scanner, readonly encoding: string) {}

  get line(): number {
    return this.scanner.position.line;
  }

  get column(): number {
    return this.scanner.position.column;
  }

  get offset(): number {
    return this.scanner.position.offset;
  }
}

// Last stage before the DOM builder: hands each event to its callback, if any, then passes it on.
class EventDispatcher extends DefaultFilter {
  private depth = 0;

  constructor(private callbacks: Partial<ParserEvents>, private encodingSource: EncodingSource | null) {
    super();
  }

  startDocument(encoding: string, locator: Locator, augs: Augs): void {
    const cb = this.callbacks['document-start'];

    this.depth = 0;

    if (cb)
      cb(encoding, this.encodingSource);

    super.startDocument(encoding, locator, augs);
  }

  xmlDecl(version: string, encoding: string | null, standalone: string | null, augs: Augs): void {
    const cb = this.callbacks['xml-declaration'];

    if (cb)
      cb(version, encoding, standalone, augs);

    super.xmlDecl(version, encoding, standalone, augs);
  }

  doctypeDecl(rootElement: string, publicId: string | null, systemId: string | null, augs: Augs): void {
    const cb = this.callbacks.doctype;

    if (cb) {
      const location = augs && augs.location;

      cb(new DocType(rootElement, publicId, systemId, location ? location.beginLine : 0,
        location ? location.beginColumn : 0), augs);
    }

    super.doctypeDecl(rootElement, publicId, systemId, augs);
  }

  startElement(name: string, attributes: Attribute[], augs: Augs): void {
    const cb = this.callbacks['element-start'];

    if (cb)
      cb(this.depth, name, attributes, augs);

    if (!isVoidElement(name))
      ++this.depth;

    super.startElement(name, attributes, augs);
  }

  endElement(name: string, augs: Augs): void {
    const cb = this.callbacks['element-end'];

    if (!isVoidElement(name))
      --this.depth;

    if (cb)
      cb(this.depth, name, augs);

    super.endElement(name, augs);
  }

  characters(text: string, augs: Augs): void {
    const cb = this.callbacks.text;

    if (cb)
      cb(this.depth, text, augs);

    super.characters(text, augs);
  }

  comment(text: string, augs: Augs): void {
    const cb = this.callbacks.comment;

    if (cb)
      cb(this.depth, text, augs);

    super.comment(text, augs);
  }

  startCDATA(augs: Augs): void {
    const cb = this.callbacks['cdata-start'];

    if (cb)
      cb(this.depth, augs);

    super.startCDATA(augs);
  }

  endCDATA(augs: Augs): void {
    const cb = this.callbacks['cdata-end'];

    if (cb)
      cb(this.depth, augs);

    super.endCDATA(augs);
  }

  processingInstruction(target: string, data: string, augs: Augs): void {
    const cb = this.callbacks.processing;

    if (cb)
      cb(this.depth, target, data, augs);

    super.processingInstruction(target, data, augs);
  }

  ignoredStartElement(name: string, attributes: Attribute[], augs: Augs): void {
    const cb = this.callbacks['ignored-element-start'];

    if (cb)
      cb(name, attributes, augs);

    super.ignoredStartElement(name, attributes, augs);
  }

  ignoredEndElement(name: string, augs: Augs): void {
    const cb = this.callbacks['ignored-element-end'];

    if (cb)
      cb(name, augs);

    super.ignoredEndElement(name, augs);
  }
}

export class HtmlParser {
  private callbacks: Partial<ParserEvents> = {};
  private filters: DocumentFilter[] = [];
  private readonly options: HtmlParserOptions;
  private stopped = false;

  constructor(options: Partial<HtmlParserOptions> = {}) {
    this.options = resolveOptions(options);
  }

  getOption<K extends keyof HtmlParserOptions>(name: K): HtmlParserOptions[K] {
    return this.options[name];
  }

  setOption(name: string, value: unknown): this {
    applyOption(this.options, name, value);

    return this;
  }

  /** Filters see the events in the order they were added, all before the callbacks and the DOM. */
  addFilter(filter: DocumentFilter): this {
    this.filters.push(filter);

    return this;
  }

  on<E extends EventType>(event: E, callback: ParserEvents[E]): this {
    this.callbacks[event] = callback;

    return this;
  }

  off(event: EventType): this {
    delete this.callbacks[event];

    return this;
  }

  /** Ends the current parse after the token being handled. Elements still open are closed as usual. */
  stop(): void {
    this.stopped = true;
  }

  parse(input: string | Uint8Array): ParseResults {
    const startTime = processMillis();
    const builder = new DomBuilder();
    const results = new ParseResults(builder.root);
    let source: string;
    let committedEncoding: string | null = null;

    if (typeof input === 'string')
      source = input.replace(/^\uFEFF/, '');
    else {
      const info = determineEncoding(input, this.options.defaultEncoding, this.options.ignoreSpecifiedCharset);

      source = decodeBytes(input, info);
      committedEncoding = results.encoding = info.encoding;
      results.encodingSource = info.source;
    }

    const dispatcher = new EventDispatcher(this.callbacks, results.encodingSource).setNext(builder);
    const report = (diagnostic: Diagnostic): void => this.report(results, diagnostic);
    const scanner = new Scanner(source, this.options, report, committedEncoding);
    const balancer = new TagBalancer(this.chainFilters(dispatcher), this.options, report);

    this.stopped = false;
    balancer.startDocument(results.encoding, new ScannerLocator(scanner, results.encoding));

    for (let token = scanner.nextToken(); token && !this.stopped; token = scanner.nextToken())
      balancer.process(token);

    balancer.endDocument(scanner.position);
    results.characters = source.length;
    results.lines = scanner.position.line;
    results.stopped = this.stopped;
    results.totalTime = processMillis() - startTime;

    const cb = this.callbacks['document-end'];

    if (cb)
      cb(results);

    return results;
  }

  parseFile(path: string): ParseResults {
    let bytes: Buffer;

    try {
      bytes = fs.readFileSync(path);
    }
    catch (err) {
      throw new HtmlIoError(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`, path, err);
    }

    return this.parse(bytes);
  }

  private chainFilters(last: DocumentHandler): DocumentHandler {
    let head = last;

    for (let i = this.filters.length - 1; i >= 0; --i) {
      this.filters[i].next = head;
      head = this.filters[i];
    }

    return head;
  }

  private report(results: ParseResults, diagnostic: Diagnostic): void {
    const cb = this.callbacks.error;

    results.diagnostics.push(diagnostic);

    if (diagnostic.severity === 'error')
      ++results.errors;
    else
      ++results.warnings;

    if (IMPLICIT_CLOSE_CODES.has(diagnostic.code))
      ++results.implicitlyClosedTags;
    else if (diagnostic.code === UNCLOSED_CODE)
      ++results.unclosedTags;

    if (cb)
      cb(diagnostic);
  }
}
