#!/usr/bin/env node
import { Command } from 'commander';
import fg from 'fast-glob';
import fs from 'fs';

import { applyOption, parseNameCase, resolveOptions } from './config';
import { Attribute } from './document-handler';
import { ConfigurationError, Diagnostic, HtmlIoError } from './errors';
import { ElementRemover } from './filters/element-remover';
import { HtmlWriter } from './filters/html-writer';
import { HtmlParser } from './html-parser';
import { plural } from './util';

export interface CliOptions {
  encoding?: string;
  events?: boolean;
  exclude?: string;
  fragment?: boolean;
  keep?: string;
  names?: string;
  quiet?: boolean;
  remove?: string;
}

let logWarningFlag = true;

export function logErrors(...args: unknown[]): void {
  console.error(...args);
}

export function logWarnings(...args: unknown[]): void {
  if (logWarningFlag)
    console.warn(...args);
}

function list(value: string | undefined): string[] {
  return (value || '').split(',').map(item => item.trim()).filter(item => !!item);
}

function describeAttributes(attributes: Attribute[]): string {
  return attributes.map(attrib => ` ${attrib.name}="${attrib.value}"`).join('');
}

function logDiagnostic(file: string, diagnostic: Diagnostic): void {
  const log = diagnostic.severity === 'error' ? logErrors : logWarnings;

  log('%s:%d:%d: %s %s: %s', file, diagnostic.line, diagnostic.column, diagnostic.severity, diagnostic.code,
    diagnostic.message);
}

/** Throws `ConfigurationError` for an option value the parser would refuse. */
export function checkOptions(options: CliOptions): void {
  if (options.names)
    parseNameCase('names', options.names);

  if (options.encoding)
    applyOption(resolveOptions(), 'defaultEncoding', options.encoding);
}

/** Builds a parser for one file. `print` receives the balanced HTML, or the event trace with `--events`. */
export function createParser(file: string, options: CliOptions, print: (text: string) => void): HtmlParser {
  const parser = new HtmlParser({ documentFragment: !!options.fragment });
  const keep = list(options.keep);
  const remove = list(options.remove);

  if (options.encoding)
    parser.setOption('defaultEncoding', options.encoding);

  if (options.names) {
    const nameCase = parseNameCase('names', options.names);

    parser.setOption('elementNameCase', nameCase).setOption('attributeNameCase', nameCase);
  }

  if (keep.length > 0 || remove.length > 0) {
    const remover = new ElementRemover();

    // name:attr1:attr2 keeps only the listed attributes.
    keep.forEach(item => {
      const [name, ...attributes] = item.split(':');

      remover.acceptElement(name, attributes.length > 0 ? attributes : undefined);
    });
    remove.forEach(name => remover.removeElement(name));
    parser.addFilter(remover);
  }

  parser.on('error', diagnostic => logDiagnostic(file, diagnostic));

  if (options.events) {
    const indent = (depth: number): string => '  '.repeat(Math.max(depth, 0));

    parser
      .on('document-start', (encoding, source) => print(`document-start ${encoding}${source ? ` (${source})` : ''}`))
      .on('xml-declaration', version => print(`xml-declaration ${version}`))
      .on('doctype', docType => print(`doctype ${docType}`))
      .on('element-start', (depth, name, attributes) => print(`${indent(depth)}<${name}${describeAttributes(attributes)}>`))
      .on('element-end', (depth, name) => print(`${indent(depth)}</${name}>`))
      .on('text', (depth, text) => print(`${indent(depth)}${JSON.stringify(text)}`))
      .on('comment', (depth, text) => print(`${indent(depth)}<!--${text}-->`))
      .on('cdata-start', depth => print(`${indent(depth)}<![CDATA[`))
      .on('cdata-end', depth => print(`${indent(depth)}]]>`))
      .on('processing', (depth, target, data) => print(`${indent(depth)}<?${target} ${data}?>`))
      .on('document-end', results => print(`document-end ${plural(results.errors, 'error')}, ${plural(results.warnings, 'warning')}`));
  }
  else
    parser.addFilter(new HtmlWriter({ encoding: 'utf-8', sink: print }));

  return parser;
}

/** Returns false when the file could not be read. */
export function processFile(file: string, options: CliOptions, print: (text: string) => void): boolean {
  try {
    createParser(file, options, print).parseFile(file);
  }
  catch (err) {
    if (err instanceof HtmlIoError) {
      logErrors('Error reading file "%s": %s', file, err.message);
      return false;
    }

    throw err;
  }

  return true;
}

export function createProgram(print: (text: string) => void = text => process.stdout.write(text)): Command {
  const program = new Command();

  program
    .name('forgiving-html')
    .description('Balance the tags of HTML files and print the result')
    .option('-x, --exclude <exclude>', 'pattern for files/directories to exclude')
    .option('-e, --encoding <default>', 'encoding to assume when a file declares none')
    .option('-n, --names <case>', 'element and attribute name case: lower, upper or no-change')
    .option('-f, --fragment', 'parse each file as a document fragment')
    .option('-r, --remove <list>', 'comma-separated elements to remove along with their content')
    .option('-k, --keep <list>', 'comma-separated elements to keep, as name or name:attribute:attribute')
    .option('--events', 'print the event stream instead of HTML')
    .option('-q, --quiet', 'do not log warnings')
    .arguments('<globs...>')
    .action((globs: string[], options: CliOptions) => {
      const files = fg.sync(globs, { ignore: options.exclude ? [options.exclude] : [] });
      // A plain path that matches nothing still gets its read attempted, so that the failure is reported.
      const missing = globs.filter(glob => !fg.isDynamicPattern(glob) && !fs.existsSync(glob));
      const lines = options.events ? (text: string) => print(text + '\n') : print;

      logWarningFlag = !options.quiet;

      try {
        checkOptions(options);
      }
      catch (err) {
        if (err instanceof ConfigurationError) {
          logErrors('Invalid option: %s', err.message);
          process.exitCode = 1;
          return;
        }

        throw err;
      }

      for (const file of files.concat(missing)) {
        if (!processFile(file, options, lines))
          process.exitCode = 1;
      }
    });

  return program;
}

if (require.main === module)
  createProgram().parse(process.argv);
