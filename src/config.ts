import { DEFAULT_ENCODING, isSupportedEncoding, normalizeEncodingName } from './encoding';
import { ConfigurationError } from './errors';
import { NameCase, ScannerOptions } from './scanner';
import { BalancerOptions, HTML_4_01_TRANSITIONAL_PUBLIC_ID, HTML_4_01_TRANSITIONAL_SYSTEM_ID } from './tag-balancer';

export interface HtmlParserOptions extends ScannerOptions, BalancerOptions {
  /** Used when the input has neither a byte order mark nor a usable charset declaration. */
  defaultEncoding: string;
  /** Decode with `defaultEncoding` even when the document declares a charset. */
  ignoreSpecifiedCharset: boolean;
}

export const DEFAULT_OPTIONS: Readonly<HtmlParserOptions> = Object.freeze({
  allowSelfClosingIframe: false,
  allowSelfClosingTags: false,
  attributeNameCase: 'lower',
  augmentations: false,
  cdataSections: false,
  defaultEncoding: DEFAULT_ENCODING,
  doctypePublicId: HTML_4_01_TRANSITIONAL_PUBLIC_ID,
  doctypeSystemId: HTML_4_01_TRANSITIONAL_SYSTEM_ID,
  documentFragment: false,
  elementNameCase: 'lower',
  ignoreOutsideContent: false,
  ignoreSpecifiedCharset: false,
  insertDoctype: false,
  maxDepth: 512,
  normalizeAttributes: false,
  overrideDoctype: false,
  parseNoscriptContent: true,
  scriptStripCdataDelims: false,
  scriptStripCommentDelims: false,
  styleStripCdataDelims: false,
  styleStripCommentDelims: false,
  trimFragmentWhitespace: false,
  voidEndEvents: true
});

const NAME_CASES: readonly NameCase[] = ['lower', 'upper', 'no-change'];

export function isOptionName(name: string): name is keyof HtmlParserOptions {
  return Object.prototype.hasOwnProperty.call(DEFAULT_OPTIONS, name);
}

export function parseNameCase(option: string, value: unknown): NameCase {
  const match = NAME_CASES.find(c => c === value);

  if (match === undefined)
    throw new ConfigurationError('not-supported', option, value);

  return match;
}

function parseFlag(option: string, value: unknown): boolean {
  if (typeof value !== 'boolean')
    throw new ConfigurationError('not-supported', option, value);

  return value;
}

function parseDepth(option: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1)
    throw new ConfigurationError('not-supported', option, value);

  return value;
}

function parseEncoding(option: string, value: unknown): string {
  if (typeof value !== 'string' || !isSupportedEncoding(value))
    throw new ConfigurationError('not-supported', option, value);

  return normalizeEncodingName(value);
}

function parseText(option: string, value: unknown): string {
  if (typeof value !== 'string')
    throw new ConfigurationError('not-supported', option, value);

  return value;
}

/** Checks one option and stores it in `options`. Throws `ConfigurationError` and leaves `options` as it was. */
export function applyOption(options: HtmlParserOptions, name: string, value: unknown): void {
  switch (name) {
    case 'attributeNameCase':
    case 'elementNameCase':
      options[name] = parseNameCase(name, value);
      break;

    case 'defaultEncoding':
      options[name] = parseEncoding(name, value);
      break;

    case 'doctypePublicId':
    case 'doctypeSystemId':
      options[name] = parseText(name, value);
      break;

    case 'maxDepth':
      options[name] = parseDepth(name, value);
      break;

    case 'allowSelfClosingIframe':
    case 'allowSelfClosingTags':
    case 'augmentations':
    case 'cdataSections':
    case 'documentFragment':
    case 'ignoreOutsideContent':
    case 'ignoreSpecifiedCharset':
    case 'insertDoctype':
    case 'normalizeAttributes':
    case 'overrideDoctype':
    case 'parseNoscriptContent':
    case 'scriptStripCdataDelims':
    case 'scriptStripCommentDelims':
    case 'styleStripCdataDelims':
    case 'styleStripCommentDelims':
    case 'trimFragmentWhitespace':
    case 'voidEndEvents':
      options[name] = parseFlag(name, value);
      break;

    default:
      throw new ConfigurationError('not-recognized', name, value);
  }
}

/** Defaults overlaid with `options`, every value checked. Options given as `undefined` keep their defaults. */
export function resolveOptions(options: Partial<HtmlParserOptions> = {}): HtmlParserOptions {
  const resolved = { ...DEFAULT_OPTIONS };

  for (const [name, value] of Object.entries(options)) {
    if (value !== undefined)
      applyOption(resolved, name, value);
  }

  return resolved;
}
