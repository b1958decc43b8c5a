import iconv from 'iconv-lite';

export const DEFAULT_ENCODING = 'windows-1252';

export type EncodingSource = 'bom' | 'xml-declaration' | 'meta' | 'default';

export interface EncodingInfo {
  encoding: string;
  source: EncodingSource;
  bomLength: number;
}

const SNIFF_LENGTH = 1024;

// Keys are lowercase with punctuation removed. Labels browsers treat as windows-1252 are folded into it.
const ALIASES: Record<string, string> = {
  ascii: 'windows-1252',
  cp1252: 'windows-1252',
  iso88591: 'windows-1252',
  latin1: 'windows-1252',
  l1: 'windows-1252',
  usascii: 'windows-1252',
  unicode: 'utf-16le',
  utf16: 'utf-16le',
  utf8: 'utf-8'
};

function encodingKey(name: string): string {
  return name.toLowerCase().replace(/[^0-9a-z]/g, '');
}

export function normalizeEncodingName(name: string): string {
  const trimmed = name.trim().replace(/^["']|["']$/g, '').toLowerCase();

  return ALIASES[encodingKey(trimmed)] ?? trimmed;
}

export function isSupportedEncoding(name: string): boolean {
  return !!name && iconv.encodingExists(normalizeEncodingName(name));
}

export function sameEncoding(a: string, b: string): boolean {
  return encodingKey(normalizeEncodingName(a)) === encodingKey(normalizeEncodingName(b));
}

export function detectBom(bytes: Uint8Array): { encoding: string, length: number } | null {
  if (bytes.length >= 3 && bytes[0] === 0xEF && bytes[1] === 0xBB && bytes[2] === 0xBF)
    return { encoding: 'utf-8', length: 3 };
  else if (bytes.length >= 2 && bytes[0] === 0xFF && bytes[1] === 0xFE)
    return { encoding: 'utf-16le', length: 2 };
  else if (bytes.length >= 2 && bytes[0] === 0xFE && bytes[1] === 0xFF)
    return { encoding: 'utf-16be', length: 2 };
  else
    return null;
}

/** Pulls the `charset=` parameter out of a content-type value such as `text/html; charset=utf-8`. */
export function charsetFromContentType(content: string): string | null {
  const $ = /\bcharset\s*=\s*["']?([^"'\s;]+)/i.exec(content);

  return $ ? $[1] : null;
}

/** Encoding named by a `<meta>` element's attributes, or null if it names none. */
export function charsetFromMetaAttributes(attributes: ReadonlyArray<{ name: string, value: string }>): string | null {
  let httpEquiv = '';
  let content = '';

  for (const attribute of attributes) {
    const name = attribute.name.toLowerCase();

    if (name === 'charset' && attribute.value.trim())
      return attribute.value.trim();
    else if (name === 'http-equiv')
      httpEquiv = attribute.value.trim().toLowerCase();
    else if (name === 'content')
      content = attribute.value;
  }

  return httpEquiv === 'content-type' ? charsetFromContentType(content) : null;
}

const RE_XML_ENCODING = /^<\?xml[^>]*?\bencoding\s*=\s*["']([^"']+)["']/i;
const RE_META = /<meta\b([^>]*)>/gi;
const RE_ATTRIBUTE = /([^\s=\/>]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+)))?/g;

/**
 * Looks for a declared encoding in the first bytes of a document, read as Latin-1: an XML declaration
 * first, then the first `<meta>` that names a charset.
 */
export function sniffDeclaredEncoding(bytes: Uint8Array): { encoding: string, source: 'xml-declaration' | 'meta' } | null {
  const head = Buffer.from(bytes.subarray(0, SNIFF_LENGTH)).toString('latin1');
  let $ = RE_XML_ENCODING.exec(head);

  if ($)
    return { encoding: normalizeEncodingName($[1]), source: 'xml-declaration' };

  RE_META.lastIndex = 0;

  while (($ = RE_META.exec(head))) {
    const attributes: { name: string, value: string }[] = [];
    let attr: RegExpExecArray | null;

    RE_ATTRIBUTE.lastIndex = 0;

    while ((attr = RE_ATTRIBUTE.exec($[1])))
      attributes.push({ name: attr[1], value: attr[2] ?? attr[3] ?? attr[4] ?? '' });

    const charset = charsetFromMetaAttributes(attributes);

    if (charset) {
      let encoding = normalizeEncodingName(charset);

      // The bytes read this far were ASCII-compatible, so a UTF-16 label can't be right.
      if (/^utf-?16/.test(encoding))
        encoding = 'utf-8';

      return { encoding, source: 'meta' };
    }
  }

  return null;
}

export function determineEncoding(bytes: Uint8Array, defaultEncoding = DEFAULT_ENCODING,
                                  ignoreSpecified = false): EncodingInfo {
  const bom = detectBom(bytes);

  if (bom)
    return { encoding: bom.encoding, source: 'bom', bomLength: bom.length };

  if (!ignoreSpecified) {
    const declared = sniffDeclaredEncoding(bytes);

    if (declared && isSupportedEncoding(declared.encoding))
      return { encoding: declared.encoding, source: declared.source, bomLength: 0 };
  }

  return { encoding: normalizeEncodingName(defaultEncoding), source: 'default', bomLength: 0 };
}

export function decodeBytes(bytes: Uint8Array, info: EncodingInfo): string {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  return iconv.decode(buffer.subarray(info.bomLength), info.encoding, { stripBOM: false });
}
