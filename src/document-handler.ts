import { Augmentations } from './augmentations';

export interface Attribute {
  name: string;
  value: string;
  /** False for attributes the parser added rather than read from the source. */
  specified: boolean;
}

export interface Locator {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
  readonly encoding: string;
}

export type Augs = Augmentations | null;

/** Receiver of the balanced event stream. Every method is optional. */
export interface DocumentHandler {
  startDocument?(encoding: string, locator: Locator, augs: Augs): void;
  xmlDecl?(version: string, encoding: string | null, standalone: string | null, augs: Augs): void;
  doctypeDecl?(rootElement: string, publicId: string | null, systemId: string | null, augs: Augs): void;
  startElement?(name: string, attributes: Attribute[], augs: Augs): void;
  endElement?(name: string, augs: Augs): void;
  characters?(text: string, augs: Augs): void;
  comment?(text: string, augs: Augs): void;
  startCDATA?(augs: Augs): void;
  endCDATA?(augs: Augs): void;
  processingInstruction?(target: string, data: string, augs: Augs): void;
  endDocument?(augs: Augs): void;
  /** A start tag the balancer dropped. */
  ignoredStartElement?(name: string, attributes: Attribute[], augs: Augs): void;
  /** An end tag the balancer dropped. */
  ignoredEndElement?(name: string, augs: Augs): void;
}

export function copyAttributes(attributes: readonly Attribute[]): Attribute[] {
  return attributes.map(attribute => ({ ...attribute }));
}
