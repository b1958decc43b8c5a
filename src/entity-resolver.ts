import entityTable from './entities.json';

const ENTITIES: Readonly<Record<string, string>> = entityTable;

/** The outcome of matching the characters that follow an `&`. */
export interface MatchState {
  readonly isMatch: boolean;
  /** No longer name can match past this point. */
  readonly endNode: boolean;
  readonly endsWithSemicolon: boolean;
  readonly resolvedValue: string | null;
  /** The matched entity name, or the longest dead-end prefix when nothing matched. */
  readonly entityOrFragment: string;
  readonly length: number;
}

class TrieNode {
  constructor(
    readonly fragment: string,
    readonly value: string | null,
    readonly chars: readonly string[],
    readonly next: readonly TrieNode[]
  ) {
    Object.freeze(this);
  }

  get isMatch(): boolean {
    return this.value !== null;
  }

  get endNode(): boolean {
    return this.fragment.endsWith(';');
  }

  transition(ch: string): TrieNode | null {
    const chars = this.chars;

    if (chars.length === 0 || ch < chars[0] || ch > chars[chars.length - 1])
      return null;

    let low = 0;
    let high = chars.length - 1;

    while (low <= high) {
      const mid = (low + high) >> 1;
      const c = chars[mid];

      if (c === ch)
        return this.next[mid];
      else if (c < ch)
        low = mid + 1;
      else
        high = mid - 1;
    }

    return null;
  }
}

interface BuildNode {
  children: Map<string, BuildNode>;
  value: string | null;
}

let trieRoot: TrieNode | null = null;

function getTrie(): TrieNode {
  if (!trieRoot) {
    const root: BuildNode = { children: new Map(), value: null };

    for (const name of Object.keys(ENTITIES)) {
      let node = root;

      for (const ch of name) {
        let child = node.children.get(ch);

        if (!child) {
          child = { children: new Map(), value: null };
          node.children.set(ch, child);
        }

        node = child;
      }

      node.value = ENTITIES[name];
    }

    trieRoot = freezeNode(root, '');
  }

  return trieRoot;
}

function freezeNode(node: BuildNode, fragment: string): TrieNode {
  const chars = Array.from(node.children.keys()).sort();
  const next: TrieNode[] = [];

  for (const ch of chars) {
    const child = node.children.get(ch);

    if (child)
      next.push(freezeNode(child, fragment + ch));
  }

  return new TrieNode(fragment, node.value, Object.freeze(chars), Object.freeze(next));
}

// Remapping of C1 control code points to what browsers display for them.
const C1_REPLACEMENTS: Record<number, number> = {
  0x80: 0x20AC, 0x82: 0x201A, 0x83: 0x0192, 0x84: 0x201E, 0x85: 0x2026, 0x86: 0x2020, 0x87: 0x2021,
  0x88: 0x02C6, 0x89: 0x2030, 0x8A: 0x0160, 0x8B: 0x2039, 0x8C: 0x0152, 0x8E: 0x017D, 0x91: 0x2018,
  0x92: 0x2019, 0x93: 0x201C, 0x94: 0x201D, 0x95: 0x2022, 0x96: 0x2013, 0x97: 0x2014, 0x98: 0x02DC,
  0x99: 0x2122, 0x9A: 0x0161, 0x9B: 0x203A, 0x9C: 0x0153, 0x9E: 0x017E, 0x9F: 0x0178
};

const CODE_LIMIT = 0x110000;

type NumericPhase = 'start' | 'hex-start' | 'hex' | 'decimal' | 'complete' | 'failed';

interface NamedScan {
  readonly kind: 'named';
  readonly node: TrieNode;
  readonly best: TrieNode | null;
  readonly consumed: number;
  readonly done: boolean;
}

interface NumericScan {
  readonly kind: 'numeric';
  readonly phase: NumericPhase;
  readonly code: number;
  // Accepted characters. A failed scan leaves out the character that stopped it.
  readonly text: string;
  readonly matchLength: number;
  readonly consumed: number;
  readonly done: boolean;
}

/**
 * Progress of an incremental character reference match. Each step returns a new value; nothing is
 * mutated, so a scan can be abandoned or replayed freely.
 */
export type EntityScan = NamedScan | NumericScan;

export function beginEntityScan(): EntityScan {
  return { kind: 'named', node: getTrie(), best: null, consumed: 0, done: false };
}

export function stepEntityScan(scan: EntityScan, ch: string): EntityScan {
  if (scan.done)
    return scan;
  else if (scan.kind === 'numeric')
    return stepNumeric(scan, ch);
  else if (scan.consumed === 0 && ch === '#')
    return { kind: 'numeric', phase: 'start', code: 0, text: '#', matchLength: 0, consumed: 1, done: false };

  const next = scan.node.transition(ch);

  if (!next)
    return { ...scan, consumed: scan.consumed + 1, done: true };

  return {
    kind: 'named',
    node: next,
    best: next.isMatch ? next : scan.best,
    consumed: scan.consumed + 1,
    done: next.endNode || next.chars.length === 0
  };
}

/** Marks the end of input. A numeric reference with digits but no `;` still matches. */
export function finishEntityScan(scan: EntityScan): EntityScan {
  if (scan.done)
    return scan;
  else if (scan.kind === 'named')
    return { ...scan, done: true };
  else if (scan.phase === 'hex' || scan.phase === 'decimal')
    return { ...scan, phase: 'complete', matchLength: scan.consumed, done: true };
  else
    return { ...scan, phase: 'failed', matchLength: 0, done: true };
}

function stepNumeric(scan: NumericScan, ch: string): NumericScan {
  const consumed = scan.consumed + 1;
  const text = scan.text + ch;
  const hex = (scan.phase === 'hex-start' || scan.phase === 'hex');
  const digit = hexDigitValue(ch);

  switch (scan.phase) {
    case 'start':
      if (ch === 'x' || ch === 'X')
        return { ...scan, phase: 'hex-start', text, consumed };
      else if (digit >= 0 && digit < 10)
        return { ...scan, phase: 'decimal', code: digit, text, consumed };
    break;

    case 'hex-start':
    case 'hex':
    case 'decimal':
      if (digit >= 0 && (hex || digit < 10)) {
        const code = Math.min(scan.code * (hex ? 16 : 10) + digit, CODE_LIMIT);

        return { ...scan, phase: hex ? 'hex' : 'decimal', code, text, consumed };
      }
      else if (scan.phase === 'hex-start')
        break;
      else if (ch === ';')
        return { ...scan, phase: 'complete', text, consumed, matchLength: consumed, done: true };
      else
        return { ...scan, phase: 'complete', text, consumed, matchLength: consumed - 1, done: true };
  }

  return { ...scan, phase: 'failed', consumed, matchLength: 0, done: true };
}

function hexDigitValue(ch: string): number {
  if (ch >= '0' && ch <= '9')
    return ch.charCodeAt(0) - 0x30;
  else if (ch >= 'A' && ch <= 'F')
    return ch.charCodeAt(0) - 0x37;
  else if (ch >= 'a' && ch <= 'f')
    return ch.charCodeAt(0) - 0x57;
  else
    return -1;
}

export function isValidReferenceCode(code: number): boolean {
  return code > 0 && code < CODE_LIMIT && (code < 0xD800 || code > 0xDFFF);
}

export function codePointToReferenceValue(code: number): string {
  if (!isValidReferenceCode(code))
    return '�';

  return String.fromCodePoint(C1_REPLACEMENTS[code] ?? code);
}

export function currentMatch(scan: EntityScan): MatchState {
  if (scan.kind === 'numeric') {
    const isMatch = scan.phase === 'complete';
    const semicolon = isMatch && scan.text.charAt(scan.matchLength - 1) === ';';
    const fragment = isMatch ? scan.text.substr(0, scan.matchLength) : scan.text;

    return {
      isMatch,
      endNode: semicolon,
      endsWithSemicolon: semicolon,
      resolvedValue: isMatch ? codePointToReferenceValue(scan.code) : null,
      entityOrFragment: fragment,
      length: fragment.length
    };
  }

  const best = scan.best;

  if (best)
    return {
      isMatch: true,
      endNode: best.endNode,
      endsWithSemicolon: best.endNode,
      resolvedValue: best.value,
      entityOrFragment: best.fragment,
      length: best.fragment.length
    };

  return {
    isMatch: false,
    endNode: false,
    endsWithSemicolon: false,
    resolvedValue: null,
    entityOrFragment: scan.node.fragment,
    length: scan.node.fragment.length
  };
}

/** Characters read past the last accepting point, which the reader must push back into the input. */
export function rewindCount(scan: EntityScan): number {
  if (scan.kind === 'numeric')
    return scan.consumed - scan.matchLength;

  return scan.consumed - (scan.best ? scan.best.fragment.length : 0);
}

export function endsWithSemicolon(scan: EntityScan): boolean {
  return currentMatch(scan).endsWithSemicolon;
}

/** Matches the longest character reference at the start of `text`, the characters following `&`. */
export function lookupEntity(text: string): MatchState {
  let scan = beginEntityScan();

  for (let i = 0; i < text.length && !scan.done; ++i)
    scan = stepEntityScan(scan, text.charAt(i));

  return currentMatch(finishEntityScan(scan));
}

export type ReferenceProblem = (code: 'HTML1004' | 'HTML1005', reference: string, index: number) => void;

/**
 * Resolves every character reference in a run of text. Inside attribute values, a legacy name without
 * its `;` stays literal when followed by `=` or an ASCII letter or digit.
 */
export function decodeCharacterReferences(text: string, inAttribute = false, onProblem?: ReferenceProblem): string {
  const sb: string[] = [];
  let index = 0;

  while (index < text.length) {
    const amp = text.indexOf('&', index);

    if (amp < 0) {
      sb.push(text.substring(index));
      break;
    }

    sb.push(text.substring(index, amp));

    let scan = beginEntityScan();
    let pos = amp + 1;

    while (!scan.done && pos < text.length)
      scan = stepEntityScan(scan, text.charAt(pos++));

    scan = finishEntityScan(scan);

    const match = currentMatch(scan);
    const end = pos - rewindCount(scan);

    if (!match.isMatch || (inAttribute && !match.endsWithSemicolon && scan.kind === 'named' &&
        /^[=0-9a-z]/i.test(text.charAt(end)))) {
      if (scan.kind === 'numeric' && onProblem)
        onProblem('HTML1005', match.entityOrFragment, amp);

      sb.push('&');
      index = amp + 1;
      continue;
    }

    if (onProblem) {
      if (scan.kind === 'numeric' && !isValidReferenceCode(scan.code))
        onProblem('HTML1005', match.entityOrFragment, amp);
      else if (!match.endsWithSemicolon)
        onProblem('HTML1004', match.entityOrFragment, amp);
    }

    sb.push(match.resolvedValue ?? '');
    index = end;
  }

  return sb.join('');
}

let valueToName: Map<string, string> | null = null;

function preferredName(a: string, b: string): string {
  if (a.length !== b.length)
    return a.length < b.length ? a : b;

  const aLower = a.charAt(0) >= 'a';
  const bLower = b.charAt(0) >= 'a';

  if (aLower !== bLower)
    return aLower ? a : b;

  return a < b ? a : b;
}

function getReverseIndex(): Map<string, string> {
  if (!valueToName) {
    valueToName = new Map();

    for (const name of Object.keys(ENTITIES)) {
      if (!name.endsWith(';'))
        continue;

      const value = ENTITIES[name];
      const current = valueToName.get(value);

      valueToName.set(value, current ? preferredName(current, name) : name);
    }
  }

  return valueToName;
}

/** Canonical semicolon-terminated entity name for a value, e.g. `lt;` for `<`. */
export function entityNameForValue(value: string): string | undefined {
  return getReverseIndex().get(value);
}

export function entityNameForCodePoint(cp: number): string | undefined {
  return cp >= 0 && cp < CODE_LIMIT ? entityNameForValue(String.fromCodePoint(cp)) : undefined;
}

export function isKnownEntityName(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(ENTITIES, name);
}
