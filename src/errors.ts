export type Severity = 'warning' | 'error';

export interface Diagnostic {
  code: string;
  severity: Severity;
  message: string;
  line: number;
  column: number;
  offset: number;
}

export type DiagnosticListener = (diagnostic: Diagnostic) => void;

// {0}, {1}... are replaced by the arguments given to formatMessage().
const MESSAGES: Record<string, string> = {
  HTML1001: 'Unsupported encoding "{0}"; declaration ignored',
  HTML1004: 'Character reference "&{0}" is missing its terminating semicolon',
  HTML1005: 'Invalid numeric character reference "&{0}"',
  HTML1007: 'Unexpected end of input in {0}',
  HTML1009: '"<" does not begin markup; treated as text',
  HTML1012: 'Empty end tag "</>" ignored',
  HTML1013: 'Duplicate attribute "{0}" ignored',
  HTML1014: 'Malformed markup declaration treated as a comment',
  HTML1015: 'Declared encoding "{0}" conflicts with document encoding "{1}"; declaration ignored',
  HTML2000: 'Document is empty',
  HTML2001: 'End of document closes <{0}>',
  HTML2002: '<{0}> before the root element; <{1}> inserted',
  HTML2004: '<{0}> requires parent <{1}>; parent inserted',
  HTML2005: '<{0}> implicitly closes <{1}>',
  HTML2006: 'Content outside <{0}>; <{0}> inserted',
  HTML2007: '</{0}> implicitly closes <{1}>',
  HTML2008: 'Reopening formatting element <{0}>',
  HTML2009: 'Character content in <{0}> opens <{1}>',
  HTML2010: 'Doctype after root element ignored',
  HTML2011: 'Duplicate doctype ignored',
  HTML2012: 'Unmatched end tag </{0}> ignored',
  HTML2013: 'Start tag <{0}> not allowed here; ignored',
  HTML2014: 'Content after end of document ignored',
};

const ERROR_CODES = new Set(['HTML1005', 'HTML1007', 'HTML1009', 'HTML1012', 'HTML1014']);

export function severityOf(code: string): Severity {
  return ERROR_CODES.has(code) ? 'error' : 'warning';
}

export function createDiagnostic(code: string, args: readonly string[],
                                 position: { line: number, column: number, offset: number }): Diagnostic {
  return {
    code,
    severity: severityOf(code),
    message: formatMessage(code, args),
    line: position.line,
    column: position.column,
    offset: position.offset
  };
}

export function formatMessage(code: string, args: readonly string[] = []): string {
  const template = MESSAGES[code];

  if (template === undefined)
    return code;

  return template.replace(/\{(\d+)\}/g, (match, index: string) => args[Number(index)] ?? match);
}

export type ConfigurationErrorKind = 'not-recognized' | 'not-supported';

/**
 * Thrown while options are being applied, before any parsing starts. `kind` tells an unknown option
 * name apart from a known option given a value it cannot take.
 */
export class ConfigurationError extends Error {
  constructor(
    readonly kind: ConfigurationErrorKind,
    readonly option: string,
    readonly value?: unknown
  ) {
    super(kind === 'not-recognized' ?
      `Option "${option}" is not recognized` :
      `Option "${option}" does not support the value ${describeValue(value)}`);
    this.name = 'ConfigurationError';
  }
}

export class HtmlIoError extends Error {
  constructor(message: string, readonly path?: string, readonly reason?: unknown) {
    super(message);
    this.name = 'HtmlIoError';
  }
}

export class NestingDepthError extends Error {
  constructor(readonly maxDepth: number, readonly element: string) {
    super(`Opening <${element}> would exceed the maximum nesting depth of ${maxDepth}`);
    this.name = 'NestingDepthError';
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string')
    return `"${value}"`;

  return String(value);
}
