import { expect } from 'chai';
import fs from 'fs';
import iconv from 'iconv-lite';
import { HtmlParser, ParseResults, STRING_ENCODING } from './html-parser';
import { DocType } from './dom';
import { ConfigurationError, HtmlIoError, NestingDepthError } from './errors';
import { ElementRemover } from './filters/element-remover';

const SAMPLE_PATH = './test/sample.html';

describe('html-parser', () => {
  it('should parse a file and report what it found', () => {
    const content = fs.readFileSync(SAMPLE_PATH, 'utf-8');
    const results = new HtmlParser().parseFile(SAMPLE_PATH);

    expect(results.encoding).equals('windows-1252');
    expect(results.encodingSource).equals('default');
    expect(results.characters).equals(content.length);
    expect(results.lines).equals(9);
    expect(results.diagnostics.map(d => d.code)).to.deep.equal(['HTML2005', 'HTML2007']);
    expect([results.errors, results.warnings]).to.deep.equal([0, 2]);
    expect([results.implicitlyClosedTags, results.unclosedTags]).to.deep.equal([2, 0]);
    expect(results.stopped).to.be.false;
    expect(results.totalTime).to.be.at.least(0);
    expect(results.toString()).equals(results.domRoot.toString());
  });

  it('should deliver events to callbacks with their depths', () => {
    const starts: string[] = [];
    const ends: string[] = [];
    const texts: string[] = [];
    const comments: string[] = [];
    let docType: DocType | undefined;
    let documentStart = '';
    let completed: ParseResults | undefined;
    let errors = 0;
    const parser = new HtmlParser()
      .on('document-start', (encoding, source) => documentStart = `${encoding} ${source}`)
      .on('doctype', dt => docType = dt)
      .on('element-start', (depth, name) => starts.push(`${depth}:${name}`))
      .on('element-end', (depth, name) => ends.push(`${depth}:${name}`))
      .on('text', (depth, text) => texts.push(text))
      .on('comment', (depth, text) => comments.push(text))
      .on('error', () => ++errors)
      .on('document-end', results => completed = results);
    const results = parser.parse(fs.readFileSync(SAMPLE_PATH, 'utf-8'));

    expect(documentStart).equals(`${STRING_ENCODING} null`);
    expect(docType && docType.version).equals('5');
    expect(starts).to.deep.equal(['0:html', '1:head', '2:title', '1:body', '2:p', '3:b', '2:img', '2:ul', '3:li', '3:li']);
    expect(ends).to.deep.equal(['2:title', '1:head', '3:b', '2:p', '2:img', '3:li', '3:li', '2:ul', '1:body', '0:html']);
    expect(texts).to.deep.equal(['Sample', 'Hi ', 'there', '\n', '\n', 'One', 'Two', '\n']);
    expect(comments).to.deep.equal([' note ']);
    expect(errors).equals(results.diagnostics.length);
    expect(completed).equals(results);
  });

  it('should stop calling a callback once it is turned off', () => {
    const starts: string[] = [];
    const parser = new HtmlParser({ documentFragment: true }).on('element-start', (depth, name) => starts.push(name));

    parser.parse('<p>a</p>');
    parser.off('element-start').parse('<div>b</div>');
    expect(starts).to.deep.equal(['p']);
  });

  it('should decode bytes in the declared encoding', () => {
    const bytes = iconv.encode('<meta charset="koi8-r"><p>привет</p>', 'koi8-r');
    const results = new HtmlParser({ documentFragment: true }).parse(bytes);
    const p = results.domRoot.querySelector('p');

    expect(results.encoding).equals('koi8-r');
    expect(results.encodingSource).equals('meta');
    expect(p && p.textContent).equals('привет');
    expect(results.diagnostics).to.be.empty;
  });

  it('should check options when they are set', () => {
    const parser = new HtmlParser();

    expect(() => parser.setOption('bogus', true)).to.throw(ConfigurationError).with.property('kind', 'not-recognized');
    expect(() => parser.setOption('elementNameCase', 'sideways')).to.throw(ConfigurationError)
      .with.property('kind', 'not-supported');
    expect(() => new HtmlParser({ maxDepth: 0 })).to.throw(ConfigurationError);
    expect(parser.setOption('elementNameCase', 'upper').getOption('elementNameCase')).equals('upper');
    expect(parser.parse('<p>x').toString()).equals('<HTML><HEAD></HEAD><BODY><P>x</P></BODY></HTML>');
  });

  it('should pass events through filters before the DOM', () => {
    const parser = new HtmlParser({ documentFragment: true }).addFilter(new ElementRemover().removeElement('b'));

    expect(parser.parse('<p>Hi <b>there</b>!</p>').toString()).equals('<p>Hi !</p>');
  });

  it('should report the tags the balancer drops', () => {
    const ignored: string[] = [];
    const parser = new HtmlParser({ documentFragment: true })
      .on('ignored-element-start', (name, attributes) => ignored.push(`<${name} ${attributes.length}>`))
      .on('ignored-element-end', name => ignored.push(`</${name}>`));

    expect(parser.parse('<form><form class="x">a</div></form>').toString()).equals('<form>a</form>');
    expect(ignored).to.deep.equal(['<form 1>', '</div>']);
  });

  it('should stop early on request', () => {
    const parser = new HtmlParser({ documentFragment: true });

    parser.on('element-start', (depth, name) => {
      if (name === 'b')
        parser.stop();
    });

    const results = parser.parse('<p>a<b>b</b>c</p><p>d</p>');

    expect(results.stopped).to.be.true;
    expect(results.unclosedTags).equals(2);
    expect(results.toString()).equals('<p>a<b></b></p>');
  });

  it('should let fatal errors propagate', () => {
    expect(() => new HtmlParser({ documentFragment: true, maxDepth: 2 }).parse('<div><div><div>'))
      .to.throw(NestingDepthError);
    expect(() => new HtmlParser().parseFile('./test/no-such-file.html'))
      .to.throw(HtmlIoError).with.property('path', './test/no-such-file.html');
  });
});
