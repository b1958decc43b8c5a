import { entityNameForCodePoint, entityNameForValue } from './entity-resolver';

export type EntityStyle = 'minimal' | 'named';

export function isWhitespace(ch: string): boolean {
  return ch === '\t' || ch === '\n' || ch === '\f' || ch === '\r' || ch === ' ';
}

export function isAllWhitespace(s: string): boolean {
  return /^[ \t\n\f\r]*$/.test(s);
}

export function isAsciiAlpha(ch: string): boolean {
  return /^[a-z]$/i.test(ch);
}

// Characters that end a tag or attribute name. Everything else, non-ASCII included, is part of the name.
export function isNameTerminator(ch: string): boolean {
  return ch === '' || ch === '/' || ch === '>' || isWhitespace(ch);
}

export function collapseWhitespace(s: string): string {
  return s.replace(/[ \t\n\f\r]+/g, ' ').trim();
}

export function applyCase(name: string, nameCase: 'lower' | 'upper' | 'no-change'): string {
  if (nameCase === 'lower')
    return name.toLowerCase();
  else if (nameCase === 'upper')
    return name.toUpperCase();
  else
    return name;
}

const basicEntities: Record<string, string> = { '<': '&lt;', '>': '&gt;', '&': '&amp;', '"': '&quot;' };

export function minimalEscape(s: string): string {
  return s.replace(/[<>&]/g, match => basicEntities[match]);
}

export function escapeAttributeValue(s: string): string {
  return s.replace(/[&"]/g, match => basicEntities[match]);
}

/**
 * Escapes markup characters, plus every non-ASCII character that has a named reference. Two-character
 * values such as `&NotEqualTilde;` are preferred over their first character alone.
 */
export function escapeToEntities(s: string, style: EntityStyle = 'named'): string {
  if (style === 'minimal')
    return minimalEscape(s);

  const sb: string[] = [];

  for (let i = 0; i < s.length; ++i) {
    const cp = s.codePointAt(i) ?? 0;
    const width = cp > 0xFFFF ? 2 : 1;
    const ch = s.substr(i, width);

    if (basicEntities[ch] && ch !== '"') {
      sb.push(basicEntities[ch]);
      continue;
    }
    else if (cp < 0x80) {
      sb.push(ch);
      continue;
    }

    const pair = s.substr(i, width + 1);
    const pairName = pair.length > width ? entityNameForValue(pair) : undefined;

    if (pairName) {
      sb.push('&' + pairName);
      i += width;
      continue;
    }

    const name = entityNameForCodePoint(cp);

    sb.push(name ? '&' + name : ch);
    i += width - 1;
  }

  return sb.join('');
}
