import elementTable from './html-elements.json';

export type ElementFlag = 'inline' | 'block' | 'empty' | 'container' | 'special';

export type ContentModel = 'void' | 'raw-text' | 'formatting' | 'table-structure' | 'ordinary';

const ELEMENT_FLAGS: readonly ElementFlag[] = ['inline', 'block', 'empty', 'container', 'special'];

export const FORMATTING_ELEMENTS = new Set(['a', 'b', 'big', 'code', 'em', 'font', 'i', 'nobr', 's', 'small',
                                            'strike', 'strong', 'tt', 'u']);

export const TABLE_STRUCTURE_ELEMENTS = new Set(['table', 'caption', 'colgroup', 'col', 'tbody', 'thead', 'tfoot',
                                                 'tr', 'td', 'th']);

// Content runs to the matching end tag with no markup recognized.
export const RAW_TEXT_ELEMENTS = new Set(['script', 'style', 'xmp', 'iframe', 'noembed', 'noframes']);

// Same as raw text, except that character references are resolved.
export const RCDATA_ELEMENTS = new Set(['textarea', 'title']);

export const PLAINTEXT_ELEMENT = 'plaintext';

function isElementFlag(flag: string): flag is ElementFlag {
  return ELEMENT_FLAGS.some(f => f === flag);
}

export class HtmlElement {
  readonly contentModel: ContentModel;
  readonly flags: ReadonlySet<ElementFlag>;

  constructor(
    readonly name: string,
    flags: readonly ElementFlag[],
    readonly parents: readonly string[],
    readonly bounds: string | null,
    private readonly closesSet: ReadonlySet<string>,
    readonly known = true
  ) {
    this.flags = new Set(flags);

    if (this.flags.has('empty'))
      this.contentModel = 'void';
    else if (RAW_TEXT_ELEMENTS.has(name) || RCDATA_ELEMENTS.has(name) || name === PLAINTEXT_ELEMENT)
      this.contentModel = 'raw-text';
    else if (FORMATTING_ELEMENTS.has(name))
      this.contentModel = 'formatting';
    else if (TABLE_STRUCTURE_ELEMENTS.has(name))
      this.contentModel = 'table-structure';
    else
      this.contentModel = 'ordinary';
  }

  get isInline(): boolean { return this.flags.has('inline'); }
  get isBlock(): boolean { return this.flags.has('block'); }
  get isContainer(): boolean { return this.flags.has('container'); }
  get hasNoFlags(): boolean { return this.flags.size === 0; }

  get preferredParent(): string | null {
    return this.parents.length > 0 ? this.parents[0] : null;
  }

  /** True if opening this element implicitly closes an open `other`. */
  closes(other: HtmlElement | string): boolean {
    return this.closesSet.has(typeof other === 'string' ? other.toLowerCase() : other.name);
  }

  isParent(other: HtmlElement | string): boolean {
    const name = typeof other === 'string' ? other.toLowerCase() : other.name;

    return this.parents.includes(name);
  }

  // Unknown elements share one definition, so they compare by name.
  is(other: HtmlElement | string): boolean {
    return this.name === (typeof other === 'string' ? other.toLowerCase() : other.name);
  }
}

const elements = new Map<string, HtmlElement>();

for (const entry of elementTable) {
  const bounds = 'bounds' in entry && typeof entry.bounds === 'string' ? entry.bounds : null;
  const flags: readonly string[] = entry.flags;
  const parents: readonly string[] = entry.parents;
  const closes: readonly string[] = entry.closes;

  elements.set(entry.name, new HtmlElement(entry.name, flags.filter(isElementFlag), parents, bounds, new Set(closes)));
}

export function getElement(name: string): HtmlElement {
  const lower = name.toLowerCase();

  return elements.get(lower) ?? new HtmlElement(lower, ['container'], ['body'], null, new Set(), false);
}

export function isKnownElement(name: string): boolean {
  return elements.has(name.toLowerCase());
}

export function isVoidElement(name: string): boolean {
  return getElement(name).contentModel === 'void';
}

export function isRawTextElement(name: string): boolean {
  return getElement(name).contentModel === 'raw-text';
}
