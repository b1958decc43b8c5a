export interface SourcePosition {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** Lines and columns start at 1, offsets at 0. The end position is just past the last character. */
export interface SourceLocation {
  readonly beginLine: number;
  readonly beginColumn: number;
  readonly beginOffset: number;
  readonly endLine: number;
  readonly endColumn: number;
  readonly endOffset: number;
}

export function locationBetween(begin: SourcePosition, end: SourcePosition): SourceLocation {
  return Object.freeze({
    beginLine: begin.line,
    beginColumn: begin.column,
    beginOffset: begin.offset,
    endLine: end.line,
    endColumn: end.column,
    endOffset: end.offset
  });
}

const LOCATION = 'location';
const SYNTHESIZED = 'synthesized';

/**
 * Auxiliary data carried alongside a single event. Every event gets its own instance; hold on to one past
 * the callback that received it only through `clone()`.
 */
export class Augmentations {
  private items = new Map<string, unknown>();
  private _location: SourceLocation | null;
  private _synthesized: boolean;

  constructor(location: SourceLocation | null = null, synthesized = false) {
    this._location = location;
    this._synthesized = synthesized;
  }

  get location(): SourceLocation | null {
    return this._location;
  }

  get synthesized(): boolean {
    return this._synthesized;
  }

  get(key: string): unknown {
    if (key === LOCATION)
      return this._location;
    else if (key === SYNTHESIZED)
      return this._synthesized;
    else
      return this.items.get(key);
  }

  set(key: string, value: unknown): this {
    if (key === LOCATION)
      throw new TypeError('Use setLocation() to change the location');
    else if (key === SYNTHESIZED)
      this._synthesized = !!value;
    else
      this.items.set(key, value);

    return this;
  }

  setLocation(location: SourceLocation | null): this {
    this._location = location && Object.freeze({ ...location });

    return this;
  }

  has(key: string): boolean {
    return key === LOCATION || key === SYNTHESIZED || this.items.has(key);
  }

  keys(): string[] {
    return [LOCATION, SYNTHESIZED, ...Array.from(this.items.keys())];
  }

  clone(): Augmentations {
    const copy = new Augmentations(this._location, this._synthesized);

    this.items.forEach((value, key) => copy.items.set(key, value));

    return copy;
  }
}
