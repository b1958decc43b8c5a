import { Augmentations, locationBetween, SourceLocation, SourcePosition } from './augmentations';
import { applyCase, isAllWhitespace } from './characters';
import { Attribute, Augs, copyAttributes, DocumentHandler, Locator } from './document-handler';
import { getElement, HtmlElement } from './elements';
import { createDiagnostic, DiagnosticListener, NestingDepthError } from './errors';
import { NameCase, Token } from './scanner';

export const HTML_4_01_TRANSITIONAL_PUBLIC_ID = '-//W3C//DTD HTML 4.01 Transitional//EN';
export const HTML_4_01_TRANSITIONAL_SYSTEM_ID = 'http://www.w3.org/TR/html4/loose.dtd';

export interface BalancerOptions {
  allowSelfClosingIframe: boolean;
  allowSelfClosingTags: boolean;
  augmentations: boolean;
  doctypePublicId: string;
  doctypeSystemId: string;
  documentFragment: boolean;
  elementNameCase: NameCase;
  ignoreOutsideContent: boolean;
  insertDoctype: boolean;
  maxDepth: number;
  overrideDoctype: boolean;
  trimFragmentWhitespace: boolean;
  voidEndEvents: boolean;
}

export const DEFAULT_BALANCER_OPTIONS: Readonly<BalancerOptions> = Object.freeze({
  allowSelfClosingIframe: false,
  allowSelfClosingTags: false,
  augmentations: false,
  doctypePublicId: HTML_4_01_TRANSITIONAL_PUBLIC_ID,
  doctypeSystemId: HTML_4_01_TRANSITIONAL_SYSTEM_ID,
  documentFragment: false,
  elementNameCase: 'lower',
  ignoreOutsideContent: false,
  insertDoctype: false,
  maxDepth: 512,
  overrideDoctype: false,
  trimFragmentWhitespace: false,
  voidEndEvents: true
});

export interface StackEntry {
  readonly element: HtmlElement;
  readonly name: string;
  readonly attributes: Attribute[];
  readonly augmentations: Augs;
}

interface BufferedText {
  text: string;
  augs: Augs;
}

interface BufferedEnd {
  name: string;
  augs: Augs;
}

const FRAMESET_CONTENT = new Set(['frame', 'frameset', 'noframes']);
const SELECT_CONTENT = new Set(['option', 'optgroup', 'script', 'hr']);
const SELECT_END_TAGS = new Set(['option', 'optgroup', 'script']);
const TABLE_CELLS = new Set(['td', 'th', 'caption']);
const TABLE_SECTIONS = new Set(['tr', 'thead', 'tbody', 'tfoot', 'table']);

/**
 * Turns the scanner's token stream into a well-nested stream of document events. Missing start and end
 * tags are supplied, misplaced ones are dropped, and every element opened is closed by the end of the
 * document.
 */
export class TagBalancer {
  private discardedStartElements: string[] = [];
  private endElementsBuffer: BufferedEnd[] = [];
  private flushing = false;
  private location: SourceLocation | null = null;
  private lostText: BufferedText[] = [];
  private openedForm = false;
  private openedSelect = false;
  private openedSvg = false;
  readonly options: BalancerOptions;
  private pendingWhitespace: BufferedText[] = [];
  private position: SourcePosition = { line: 1, column: 1, offset: 0 };
  private seenAnything = false;
  private seenBody = false;
  private seenBodyEnd = false;
  private seenCharacters = false;
  private seenDoctype = false;
  private seenFrameset = false;
  private seenHead = false;
  private seenRootElement = false;
  private seenRootElementEnd = false;
  private stack: StackEntry[] = [];
  private templateFragment = false;

  constructor(
    private readonly handler: DocumentHandler,
    options: Partial<BalancerOptions> = {},
    private readonly onDiagnostic?: DiagnosticListener
  ) {
    this.options = { ...DEFAULT_BALANCER_OPTIONS, ...options };
  }

  get depth(): number {
    return this.stack.length;
  }

  get openElements(): string[] {
    return this.stack.map(entry => entry.name);
  }

  startDocument(encoding: string, locator: Locator): void {
    this.location = locationBetween(locator, locator);

    if (this.handler.startDocument)
      this.handler.startDocument(encoding, locator, this.augs());
  }

  process(token: Token): void {
    this.location = token.location;
    this.position = { line: token.location.beginLine, column: token.location.beginColumn,
                      offset: token.location.beginOffset };

    if (token.type !== 'doctype' && token.type !== 'xml-declaration' &&
        !(token.type === 'text' && isAllWhitespace(token.content)))
      this.insertDoctypeIfNeeded();

    switch (token.type) {
      case 'start-tag':
        if (token.selfClosing)
          this.emptyElement(token.name, token.attributes, this.augs());
        else
          this.startElement(token.name, token.attributes, this.augs());
        break;

      case 'end-tag':
        this.endElement(token.name, this.augs());
        break;

      case 'text':
        this.characters(token.content, this.augs());
        break;

      case 'comment':
        this.comment(token.content, this.augs());
        break;

      case 'cdata':
        this.cdata(token.content);
        break;

      case 'processing-instruction':
        this.processingInstruction(token.target, token.data, this.augs());
        break;

      case 'doctype':
        this.doctypeDecl(token.rootElement, token.publicId, token.systemId, this.augs());
        break;

      case 'xml-declaration':
        if (!this.seenAnything && this.handler.xmlDecl)
          this.handler.xmlDecl(token.version, token.encoding, token.standalone, this.augs());
        break;
    }
  }

  endDocument(position: SourcePosition): void {
    this.position = position;
    this.location = locationBetween(position, position);
    this.insertDoctypeIfNeeded();
    // Buffered </body> and </html> are applied now, and no longer held back.
    this.flushing = true;
    this.consumeBufferedEndElements();
    this.consumeEarlyText();
    this.pendingWhitespace = [];

    if (!this.seenRootElement && !this.options.documentFragment) {
      this.warn('HTML2000');
      this.forceStartBody();

      while (this.stack.length > 0)
        this.popElement();
    }
    else {
      for (let entry = this.stack.pop(); entry; entry = this.stack.pop()) {
        this.warn('HTML2001', entry.name);
        this.addBodyIfNeeded(entry.element);
        this.callEndElement(entry.name, this.closingAugs(entry));
      }
    }

    if (this.handler.endDocument)
      this.handler.endDocument(this.augs());
  }

  private augs(synthesized = false): Augs {
    return this.options.augmentations ? new Augmentations(this.location, synthesized) : null;
  }

  private synthesizedAugs(): Augs {
    return this.augs(true);
  }

  // A synthesized close carries the location of the tag that opened the element.
  private closingAugs(entry: StackEntry): Augs {
    if (!this.options.augmentations)
      return null;

    return new Augmentations(entry.augmentations ? entry.augmentations.location : this.location, true);
  }

  private warn(code: string, ...args: string[]): void {
    if (this.onDiagnostic)
      this.onDiagnostic(createDiagnostic(code, args, this.position));
  }

  private name(name: string): string {
    return applyCase(name, this.options.elementNameCase);
  }

  private peek(): StackEntry | null {
    return this.stack.length > 0 ? this.stack[this.stack.length - 1] : null;
  }

  private callStartElement(name: string, attributes: Attribute[], augs: Augs): void {
    if (this.handler.startElement)
      this.handler.startElement(name, attributes, augs);
  }

  private callEndElement(name: string, augs: Augs): void {
    if (this.handler.endElement)
      this.handler.endElement(name, augs);
  }

  private popElement(): void {
    const entry = this.stack.pop();

    if (entry)
      this.callEndElement(entry.name, this.closingAugs(entry));
  }

  private discardStartElement(name: string, attributes: Attribute[], augs: Augs, code = 'HTML2013'): void {
    this.warn(code, name);
    this.discardedStartElements.push(name);

    if (this.handler.ignoredStartElement)
      this.handler.ignoredStartElement(name, copyAttributes(attributes), augs);
  }

  private discardEndElement(name: string, augs: Augs): void {
    if (this.handler.ignoredEndElement)
      this.handler.ignoredEndElement(name, augs);
  }

  private insertDoctypeIfNeeded(): void {
    if (!this.options.insertDoctype || this.seenDoctype || this.options.documentFragment)
      return;

    this.seenDoctype = true;
    this.seenAnything = true;

    if (this.handler.doctypeDecl)
      this.handler.doctypeDecl(this.name('html'), this.options.doctypePublicId, this.options.doctypeSystemId,
        this.synthesizedAugs());
  }

  private doctypeDecl(rootElement: string, publicId: string | null, systemId: string | null, augs: Augs): void {
    this.seenAnything = true;

    if (this.seenRootElement)
      this.warn('HTML2010');
    else if (this.seenDoctype)
      this.warn('HTML2011');
    else {
      this.seenDoctype = true;

      if (this.options.overrideDoctype) {
        publicId = this.options.doctypePublicId;
        systemId = this.options.doctypeSystemId;
      }

      if (this.handler.doctypeDecl)
        this.handler.doctypeDecl(rootElement, publicId, systemId, augs);
    }
  }

  private emptyElement(name: string, attributes: Attribute[], augs: Augs): void {
    const element = getElement(name);

    this.startElement(name, attributes, augs);

    if (element.contentModel !== 'void' && (this.options.allowSelfClosingTags || !element.known ||
        (element.is('iframe') && this.options.allowSelfClosingIframe)))
      this.endElement(name, this.synthesizedAugs());
  }

  private forceStartElement(name: string, attributes: Attribute[] = []): boolean {
    this.startElement(name, attributes, this.synthesizedAugs(), true);

    const top = this.peek();

    return top !== null && top.name === name;
  }

  private forceStartBody(): void {
    const body = this.name('body');

    this.warn('HTML2006', body);
    this.forceStartElement(body);
  }

  private forceHead(): void {
    if (this.seenHead)
      return;

    const head = this.name('head');

    this.forceStartElement(head);
    this.endElement(head, this.synthesizedAugs());
  }

  private insideTableSection(): boolean {
    for (let i = this.stack.length - 1; i >= 0; --i) {
      const element = this.stack[i].element;

      if (element.contentModel !== 'table-structure')
        continue;
      else if (TABLE_CELLS.has(element.name))
        return false;
      else if (TABLE_SECTIONS.has(element.name))
        return true;
    }

    return false;
  }

  private startElement(name: string, attributes: Attribute[], augs: Augs, forced = false): void {
    this.seenAnything = true;

    if (this.seenRootElementEnd) {
      this.discardStartElement(name, attributes, augs, 'HTML2014');
      return;
    }

    this.flushPendingWhitespace();

    const element = getElement(name);

    if (element.is('template'))
      this.templateFragment = true;

    // These are never implied by their content.
    if (forced && (element.is('table') || element.is('select')))
      return;

    if (element.is('html') && this.seenRootElement && !this.openedSvg) {
      this.discardStartElement(name, attributes, augs);
      return;
    }

    if (this.seenFrameset && !FRAMESET_CONTENT.has(element.name)) {
      this.discardStartElement(name, attributes, augs);
      return;
    }

    if (!this.templateFragment && this.openedSelect) {
      if (element.is('select')) {
        this.endElement(this.name('select'), this.synthesizedAugs());
        this.discardStartElement(name, attributes, augs);
        return;
      }
      else if (!SELECT_CONTENT.has(element.name)) {
        this.discardStartElement(name, attributes, augs);
        return;
      }
    }

    if (element.is('head')) {
      if (this.seenHead) {
        this.discardStartElement(name, attributes, augs);
        return;
      }

      this.seenHead = true;
    }
    else if (element.is('frameset') && !this.openedSvg) {
      if (this.seenBody && this.seenCharacters) {
        this.discardStartElement(name, attributes, augs);
        return;
      }

      this.forceHead();
      this.consumeBufferedEndElements();
      this.consumeEarlyText();

      if (this.seenBody) {
        this.discardStartElement(name, attributes, augs);
        return;
      }

      this.seenFrameset = true;
    }
    else if (element.is('body')) {
      this.forceHead();
      this.consumeBufferedEndElements();

      if (this.seenBody) {
        this.discardStartElement(name, attributes, augs);
        return;
      }

      this.seenBody = true;
    }
    else if (element.is('form')) {
      if (this.openedForm) {
        this.discardStartElement(name, attributes, augs);
        return;
      }

      // Outside of a cell, a form in a table is left empty.
      if (this.insideTableSection()) {
        this.callStartElement(name, attributes, augs);
        this.callEndElement(name, this.synthesizedAugs());
        return;
      }

      this.openedForm = true;
    }
    else if (element.is('frame') && this.seenHead && !this.seenFrameset && !this.openedSvg) {
      this.discardStartElement(name, attributes, augs);
      return;
    }
    else if (!element.known)
      this.consumeBufferedEndElements();
    else if (element.is('table')) {
      for (let top = this.peek(); top && top.element.contentModel === 'formatting'; top = this.peek()) {
        this.warn('HTML2005', name, top.name);
        this.popElement();
      }

      if (this.insideTableSection())
        this.endElement(this.name('table'), this.synthesizedAugs());
    }

    if (!this.ensureParent(element, name, attributes, augs, forced))
      return;

    if (element.is('svg'))
      this.openedSvg = true;
    else if (element.is('select') && !this.templateFragment)
      this.openedSelect = true;

    const reopen: StackEntry[] = [];

    // html, head and table sections step outside of the inline elements enclosing them.
    if (element.hasNoFlags) {
      for (let top = this.peek(); top && top.element.isInline; top = this.peek()) {
        reopen.push(top);
        this.popElement();
      }
    }

    const top = this.peek();

    // Scripts hold no elements, and neither does anything in head.
    if (top && ((this.stack.length > 1 && top.element.is('script')) ||
        (this.stack.length > 2 && this.stack[this.stack.length - 2].element.is('head'))))
      this.popElement();

    this.closeImpliedElements(element, name);
    this.seenRootElement = true;

    if (element.contentModel === 'void') {
      this.callStartElement(name, attributes, augs);

      if (this.options.voidEndEvents)
        this.callEndElement(name, this.synthesizedAugs());
    }
    else {
      if (this.stack.length >= this.options.maxDepth) {
        while (this.stack.length > 0)
          this.popElement();

        throw new NestingDepthError(this.options.maxDepth, name);
      }

      this.stack.push({ element, name, attributes: copyAttributes(attributes), augmentations: augs && augs.clone() });
      this.callStartElement(name, attributes, augs);
    }

    for (let i = reopen.length - 1; i >= 0; --i)
      this.forceStartElement(reopen[i].name, copyAttributes(reopen[i].attributes));

    if (element.is('body'))
      this.refeedLostText();
  }

  // False when the element needed a parent that could not be opened.
  private ensureParent(element: HtmlElement, name: string, attributes: Attribute[], augs: Augs,
                       forced: boolean): boolean {
    const parent = element.preferredParent;

    if (parent === null || this.openedSvg)
      return true;
    else if (this.options.documentFragment && (parent === 'head' || parent === 'body'))
      return true;

    const top = this.peek();

    if (this.templateFragment && top && top.element.is('template'))
      return true;

    let code: string;

    if (!this.seenRootElement && !this.options.documentFragment)
      code = 'HTML2002';
    else if ((parent !== 'head' || (!this.seenBody && !this.options.documentFragment)) &&
             this.getParentDepth(element) < 0)
      code = 'HTML2004';
    else
      return true;

    const parentName = this.name(parent);

    this.warn(code, name, parentName);

    if (this.forceStartElement(parentName))
      return true;

    if (!forced)
      this.discardStartElement(name, attributes, augs);

    return false;
  }

  private closeImpliedElements(element: HtmlElement, name: string): void {
    for (let i = this.stack.length - 1; i >= 0; --i) {
      const entry = this.stack[i];

      // An svg title belongs to the drawing.
      if (this.openedSvg && entry.element.is('title'))
        break;

      if (element.closes(entry.element)) {
        this.warn('HTML2005', name, entry.name);

        while (this.stack.length > i)
          this.popElement();

        continue;
      }

      if (entry.element.is('template') || entry.element.isBlock || element.isParent(entry.element))
        break;
    }
  }

  private endElement(name: string, augs: Augs, forced = false): void {
    if (this.seenRootElementEnd) {
      this.discardEndElement(name, augs);
      return;
    }

    const element = getElement(name);
    const ignoreOutside = this.options.ignoreOutsideContent || this.flushing;

    if (!this.templateFragment && this.openedSelect) {
      if (element.is('select'))
        this.openedSelect = false;
      else if (!SELECT_END_TAGS.has(element.name)) {
        this.discardEndElement(name, augs);
        return;
      }
    }

    if (element.is('template'))
      this.templateFragment = false;

    if (!ignoreOutside && !this.options.documentFragment && (element.is('body') || element.is('html'))) {
      const discarded = this.discardedStartElements.indexOf(name);

      if (discarded >= 0)
        this.discardedStartElements.splice(discarded, 1);
      else
        this.endElementsBuffer.push({ name, augs });

      return;
    }

    if (this.seenFrameset && !element.is('frame') && !element.is('frameset')) {
      this.warn('HTML2012', name);
      this.discardEndElement(name, augs);
      return;
    }

    if (element.is('html'))
      this.seenRootElementEnd = true;
    else if (ignoreOutside && element.is('body'))
      this.seenBodyEnd = true;
    else if (ignoreOutside && this.seenBodyEnd) {
      this.warn('HTML2014');
      this.discardEndElement(name, augs);
      return;
    }

    if (element.is('form'))
      this.openedForm = false;
    else if (element.is('svg'))
      this.openedSvg = false;
    else if (element.is('head') && !forced) {
      // Held until body opens, so that anything between </head> and <body> still lands in head.
      this.endElementsBuffer.push({ name, augs });
      return;
    }

    const depth = this.getElementDepth(element);

    if (depth < 0) {
      if (element.is('p')) {
        if (this.forceStartElement(name))
          this.endElement(name, augs);
      }
      else if (element.is('br'))
        this.forceStartElement(name);
      else if (element.contentModel !== 'void') {
        this.warn('HTML2012', name);
        this.discardEndElement(name, augs);
      }

      return;
    }

    const reopen: StackEntry[] = [];

    if (depth > 1 && element.isInline) {
      for (let i = 0; i < depth - 1; ++i) {
        const entry = this.stack[this.stack.length - 1 - i];

        if (entry.element.isInline || entry.element.is('font'))
          reopen.push(entry);
      }
    }

    for (let i = 0; i < depth; ++i) {
      const entry = this.stack.pop();

      if (!entry)
        break;

      const implied = i < depth - 1;

      if (implied)
        this.warn('HTML2007', name, entry.name);

      this.addBodyIfNeeded(entry.element);
      this.callEndElement(entry.name, implied ? this.closingAugs(entry) : augs);
    }

    for (let i = reopen.length - 1; i >= 0; --i) {
      this.warn('HTML2008', reopen[i].name);
      this.forceStartElement(reopen[i].name, copyAttributes(reopen[i].attributes));
    }
  }

  // Distance from the top of the stack to the open element, or -1 when nothing may be closed.
  private getElementDepth(element: HtmlElement): number {
    const tableBodyOrHtml = element.is('table') || element.is('body') || element.is('html');

    for (let i = this.stack.length - 1; i >= 0; --i) {
      const open = this.stack[i].element;

      if (open.is(element))
        return this.stack.length - i;
      else if (!element.isContainer && open.isBlock)
        break;
      else if (open.is('table') && !tableBodyOrHtml)
        return -1;
      else if (element.isParent(open))
        break;
    }

    return -1;
  }

  private getParentDepth(element: HtmlElement): number {
    for (let i = this.stack.length - 1; i >= 0; --i) {
      const open = this.stack[i].element;

      if (element.bounds !== null && open.is(element.bounds))
        break;
      else if (element.isParent(open))
        return this.stack.length - i;
    }

    return -1;
  }

  private addBodyIfNeeded(element: HtmlElement): void {
    if (this.options.documentFragment || this.seenFrameset || !element.is('html'))
      return;

    if (!this.seenHead) {
      const head = this.name('head');

      this.seenHead = true;
      this.callStartElement(head, [], this.synthesizedAugs());
      this.callEndElement(head, this.synthesizedAugs());
    }

    if (!this.seenBody) {
      const body = this.name('body');

      this.seenBody = true;
      this.callStartElement(body, [], this.synthesizedAugs());
      this.callEndElement(body, this.synthesizedAugs());
    }
  }

  private consumeBufferedEndElements(): void {
    const entries = this.endElementsBuffer;

    this.endElementsBuffer = [];

    for (const entry of entries)
      this.endElement(entry.name, entry.augs, true);
  }

  private characters(text: string, augs: Augs): void {
    const whitespace = isAllWhitespace(text);

    if (this.seenRootElementEnd || this.seenBodyEnd) {
      if (!whitespace)
        this.warn('HTML2014');

      return;
    }

    if (this.options.documentFragment) {
      if (this.options.trimFragmentWhitespace && whitespace && this.stack.length === 0) {
        // Kept only if more content follows.
        if (this.seenRootElement)
          this.pendingWhitespace.push({ text, augs });

        return;
      }
    }
    else {
      const top = this.peek();

      if (!top) {
        // Text before the first tag waits for body.
        if (this.lostText.length > 0 || !whitespace)
          this.lostText.push({ text, augs });

        return;
      }
      else if (whitespace && (this.stack.length < 2 || this.endElementsBuffer.length > 0))
        return;
      else if (!whitespace && (top.element.is('head') || top.element.is('html'))) {
        this.warn('HTML2009', top.name, this.name('body'));
        this.forceStartBody();
      }
    }

    this.flushPendingWhitespace();
    this.seenCharacters = this.seenCharacters || !whitespace;

    if (this.handler.characters)
      this.handler.characters(text, augs);
  }

  private flushPendingWhitespace(): void {
    const pending = this.pendingWhitespace;

    this.pendingWhitespace = [];

    for (const entry of pending) {
      if (this.handler.characters)
        this.handler.characters(entry.text, entry.augs);
    }
  }

  private refeedLostText(): void {
    const entries = this.lostText;

    this.lostText = [];

    for (const entry of entries)
      this.characters(entry.text, entry.augs);
  }

  private consumeEarlyText(): void {
    if (this.lostText.length > 0) {
      if (!this.seenBody)
        this.forceStartBody();

      this.refeedLostText();
    }
  }

  private comment(text: string, augs: Augs): void {
    this.seenAnything = true;
    this.consumeEarlyText();
    this.flushPendingWhitespace();

    if (this.handler.comment)
      this.handler.comment(text, augs);
  }

  private processingInstruction(target: string, data: string, augs: Augs): void {
    this.seenAnything = true;
    this.consumeEarlyText();
    this.flushPendingWhitespace();

    if (this.handler.processingInstruction)
      this.handler.processingInstruction(target, data, augs);
  }

  private cdata(content: string): void {
    this.seenAnything = true;
    this.consumeEarlyText();

    if (this.seenRootElementEnd)
      return;

    const top = this.peek();

    // Open body first, so that it does not start inside the section.
    if (!this.options.documentFragment && (!top || top.element.is('head') || top.element.is('html')))
      this.forceStartBody();

    this.flushPendingWhitespace();

    if (this.handler.startCDATA)
      this.handler.startCDATA(this.augs());

    this.characters(content, this.augs());

    if (this.handler.endCDATA)
      this.handler.endCDATA(this.augs());
  }
}
