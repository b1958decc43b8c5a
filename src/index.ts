export { HtmlParser, ParseResults, STRING_ENCODING } from './html-parser';
export type { EventType, HtmlParserOptions, ParserEvents } from './html-parser';
export { DEFAULT_OPTIONS, applyOption, resolveOptions } from './config';
export { Augmentations, locationBetween } from './augmentations';
export type { SourceLocation, SourcePosition } from './augmentations';
export { copyAttributes } from './document-handler';
export type { Attribute, Augs, DocumentHandler, Locator } from './document-handler';
export { CData, CommentElement, DocType, DomBuilder, DomElement, DomNode, ProcessingElement, TextElement } from './dom';
export { ConfigurationError, HtmlIoError, NestingDepthError } from './errors';
export type { Diagnostic, DiagnosticListener, Severity } from './errors';
export { DefaultFilter } from './filters/default-filter';
export type { DocumentFilter } from './filters/default-filter';
export { ElementRemover } from './filters/element-remover';
export { HtmlWriter } from './filters/html-writer';
export type { HtmlWriterOptions } from './filters/html-writer';
export { Scanner } from './scanner';
export type { NameCase, ScannerOptions, Token } from './scanner';
export { TagBalancer } from './tag-balancer';
export type { BalancerOptions } from './tag-balancer';
export { determineEncoding, decodeBytes } from './encoding';
export type { EncodingInfo, EncodingSource } from './encoding';
export { getElement, isKnownElement, isRawTextElement, isVoidElement } from './elements';
export type { ContentModel, HtmlElement } from './elements';
export { escapeToEntities, minimalEscape } from './characters';
export type { EntityStyle } from './characters';
export { beginEntityScan, currentMatch, decodeCharacterReferences, endsWithSemicolon, entityNameForCodePoint,
  entityNameForValue, finishEntityScan, isKnownEntityName, lookupEntity, rewindCount, stepEntityScan } from './entity-resolver';
export type { EntityScan, MatchState } from './entity-resolver';
