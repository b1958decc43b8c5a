import { expect } from 'chai';
import { Diagnostic } from './errors';
import { Scanner, ScannerOptions, Token } from './scanner';

function scan(source: string, options: Partial<ScannerOptions> = {}, diagnostics: Diagnostic[] = [],
              encoding: string | null = null): Token[] {
  return Array.from(new Scanner(source, options, d => diagnostics.push(d), encoding));
}

// Token content without locations, for compact comparisons.
function describeTokens(tokens: Token[]): string[] {
  return tokens.map(token => {
    switch (token.type) {
      case 'start-tag':
        return `<${token.name}${token.attributes.map(a => ` ${a.name}="${a.value}"`).join('')}${token.selfClosing ? '/' : ''}>`;
      case 'end-tag': return `</${token.name}>`;
      case 'text': return `text(${token.content})`;
      case 'comment': return `comment(${token.content})`;
      case 'cdata': return `cdata(${token.content})`;
      case 'processing-instruction': return `pi(${token.target}|${token.data})`;
      case 'doctype': return `doctype(${token.rootElement}|${token.publicId}|${token.systemId})`;
      case 'xml-declaration': return `xml(${token.version}|${token.encoding}|${token.standalone})`;
    }
  });
}

describe('scanner', () => {
  it('should scan tags, attributes and text', () => {
    expect(describeTokens(scan(`<p class=a id="b" data-x='c' hidden>text</p>`)))
      .to.deep.equal(['<p class="a" id="b" data-x="c" hidden="">', 'text(text)', '</p>']);
    expect(describeTokens(scan('<br/><img src=x.png />')))
      .to.deep.equal(['<br/>', '<img src="x.png"/>']);
  });

  it('should apply name case policies', () => {
    expect(describeTokens(scan('<DIV CLASS="X"></DIV>'))).to.deep.equal(['<div class="X">', '</div>']);
    expect(describeTokens(scan('<Div Class="X"></dIV>', { elementNameCase: 'upper', attributeNameCase: 'no-change' })))
      .to.deep.equal(['<DIV Class="X">', '</DIV>']);
  });

  it('should keep the first of duplicate attributes', () => {
    const diagnostics: Diagnostic[] = [];

    expect(describeTokens(scan('<a href="1" HREF="2">', {}, diagnostics))).to.deep.equal(['<a href="1">']);
    expect(diagnostics.map(d => [d.code, d.severity, d.line, d.column])).to.deep.equal([['HTML1013', 'warning', 1, 13]]);
  });

  it('should normalize line endings and track positions', () => {
    const [token] = scan('a\r\nb\rc');

    expect(token.type === 'text' && token.content).equals('a\nb\nc');
    expect(token.location).to.deep.equal({ beginLine: 1, beginColumn: 1, beginOffset: 0, endLine: 3, endColumn: 2, endOffset: 6 });

    const [, , bold] = scan('<p>\n<b>');

    expect(bold.location).to.deep.equal({ beginLine: 2, beginColumn: 1, beginOffset: 4, endLine: 2, endColumn: 4, endOffset: 7 });
  });

  it('should resolve character references in text and attribute values', () => {
    const diagnostics: Diagnostic[] = [];

    expect(describeTokens(scan('x &lt; y &amp z', {}, diagnostics))).to.deep.equal(['text(x < y & z)']);
    expect(diagnostics.map(d => [d.code, d.column])).to.deep.equal([['HTML1004', 10]]);
    expect(describeTokens(scan('<a href="?x=1&copy=2&amp;y">'))).to.deep.equal(['<a href="?x=1&copy=2&y">']);
  });

  it('should report reference problems at their source positions', () => {
    const diagnostics: Diagnostic[] = [];

    scan('a\r\n\r\nb &#q', {}, diagnostics);
    expect(diagnostics.map(d => [d.code, d.line, d.column, d.offset])).to.deep.equal([['HTML1005', 3, 3, 7]]);

    diagnostics.length = 0;
    scan('<a title="x\r\ny &amp z">', {}, diagnostics);
    expect(diagnostics.map(d => [d.code, d.line, d.column, d.offset])).to.deep.equal([['HTML1004', 2, 3, 15]]);
  });

  it('should scan a long run of bad references in linear time', function () {
    this.timeout(10000);

    const diagnostics: Diagnostic[] = [];
    const start = Date.now();
    const tokens = scan('&#q'.repeat(100000), {}, diagnostics);

    expect(Date.now() - start).to.be.below(5000);
    expect(tokens.length).equals(1);
    expect(diagnostics.length).equals(100000);
    expect(diagnostics[99999].offset).equals(299997);
  });

  it('should treat a stray < as text', () => {
    const diagnostics: Diagnostic[] = [];

    expect(describeTokens(scan('a < b <3', {}, diagnostics))).to.deep.equal(['text(a < b <3)']);
    expect(diagnostics.map(d => [d.code, d.severity, d.column])).to.deep.equal([['HTML1009', 'error', 3], ['HTML1009', 'error', 7]]);
  });

  it('should scan comments', () => {
    expect(describeTokens(scan('<!--x--><!--><!---><!--a--!>')))
      .to.deep.equal(['comment(x)', 'comment()', 'comment()', 'comment(a)']);

    const diagnostics: Diagnostic[] = [];

    expect(describeTokens(scan('<!-- open > rest', {}, diagnostics))).to.deep.equal(['comment( open )', 'text( rest)']);
    expect(diagnostics.map(d => d.code)).to.deep.equal(['HTML1007']);
  });

  it('should scan CDATA sections as comments unless enabled', () => {
    expect(describeTokens(scan('<![CDATA[a<b]]>'))).to.deep.equal(['comment([CDATA[a<b]])']);
    expect(describeTokens(scan('<![CDATA[a<b]]>', { cdataSections: true }))).to.deep.equal(['cdata(a<b)']);
  });

  it('should scan doctypes', () => {
    expect(describeTokens(scan('<!DOCTYPE html PUBLIC "-//W3C//DTD HTML 4.01//EN" "http://www.w3.org/TR/html4/strict.dtd">')))
      .to.deep.equal(['doctype(html|-//W3C//DTD HTML 4.01//EN|http://www.w3.org/TR/html4/strict.dtd)']);
    expect(describeTokens(scan('<!doctype html>'))).to.deep.equal(['doctype(html|null|null)']);
    expect(describeTokens(scan("<!DOCTYPE svg SYSTEM 'shapes.dtd'>"))).to.deep.equal(['doctype(svg|null|shapes.dtd)']);
  });

  it('should turn malformed declarations into comments', () => {
    const diagnostics: Diagnostic[] = [];

    expect(describeTokens(scan('<!x></ x>a</>b', {}, diagnostics)))
      .to.deep.equal(['comment(x)', 'comment( x)', 'text(a)', 'text(b)']);
    expect(diagnostics.map(d => d.code)).to.deep.equal(['HTML1014', 'HTML1014', 'HTML1012']);
  });

  it('should scan processing instructions and XML declarations', () => {
    expect(describeTokens(scan('<?xml version="1.0" encoding="utf-8"?><?php echo 1 ?><?bogus>')))
      .to.deep.equal(['xml(1.0|utf-8|null)', 'pi(php|echo 1 )', 'comment(?bogus)']);
  });

  it('should read raw text elements as a single text token', () => {
    expect(describeTokens(scan('<script>if (a<b && c>d) {}</script>')))
      .to.deep.equal(['<script>', 'text(if (a<b && c>d) {})', '</script>']);
    expect(describeTokens(scan('<script>a</scriptx>b</SCRIPT >')))
      .to.deep.equal(['<script>', 'text(a</scriptx>b)', '</script>']);
    expect(describeTokens(scan('<style></style>'))).to.deep.equal(['<style>', '</style>']);
  });

  it('should resolve references in RCDATA elements only', () => {
    expect(describeTokens(scan('<title>A &amp; B</title><textarea><b></textarea>')))
      .to.deep.equal(['<title>', 'text(A & B)', '</title>', '<textarea>', 'text(<b>)', '</textarea>']);
    expect(describeTokens(scan('<xmp>&amp;</xmp>'))).to.deep.equal(['<xmp>', 'text(&amp;)', '</xmp>']);
  });

  it('should report unterminated raw text', () => {
    const diagnostics: Diagnostic[] = [];

    expect(describeTokens(scan('<style>a{}', {}, diagnostics))).to.deep.equal(['<style>', 'text(a{})']);
    expect(diagnostics.map(d => d.message)).to.deep.equal(['Unexpected end of input in <style>']);
  });

  it('should read the rest of the input after plaintext', () => {
    expect(describeTokens(scan('<plaintext><b>x</b>'))).to.deep.equal(['<plaintext>', 'text(<b>x</b>)']);
  });

  it('should enter raw text mode for self-closed raw text elements', () => {
    expect(describeTokens(scan('<script/>alert(1)</script>')))
      .to.deep.equal(['<script/>', 'text(alert(1))', '</script>']);
    expect(describeTokens(scan('<script/><b>', { allowSelfClosingTags: true })))
      .to.deep.equal(['<script/>', '<b>']);
    expect(describeTokens(scan('<iframe/><b>', { allowSelfClosingIframe: true })))
      .to.deep.equal(['<iframe/>', '<b>']);
  });

  it('should treat noscript as raw text only when its content is not parsed', () => {
    expect(describeTokens(scan('<noscript><p>x</noscript>')))
      .to.deep.equal(['<noscript>', '<p>', 'text(x)', '</noscript>']);
    expect(describeTokens(scan('<noscript><p>x</noscript>', { parseNoscriptContent: false })))
      .to.deep.equal(['<noscript>', 'text(<p>x)', '</noscript>']);
  });

  it('should strip comment and CDATA delimiters from scripts and styles', () => {
    expect(describeTokens(scan('<script><!-- x() --></script>', { scriptStripCommentDelims: true })))
      .to.deep.equal(['<script>', 'text( x() )', '</script>']);
    expect(describeTokens(scan('<style><![CDATA[p{}]]></style>', { styleStripCdataDelims: true })))
      .to.deep.equal(['<style>', 'text(p{})', '</style>']);
    expect(describeTokens(scan('<style><!--p{}--></style>', { scriptStripCommentDelims: true })))
      .to.deep.equal(['<style>', 'text(<!--p{}-->)', '</style>']);
  });

  it('should emit a best-effort tag at end of input', () => {
    const diagnostics: Diagnostic[] = [];

    expect(describeTokens(scan('<div class="a"', {}, diagnostics))).to.deep.equal(['<div class="a">']);
    expect(diagnostics.map(d => d.code)).to.deep.equal(['HTML1007']);
  });

  it('should normalize attribute whitespace on request', () => {
    expect(describeTokens(scan('<a title="  a \n b ">', { normalizeAttributes: true }))).to.deep.equal(['<a title="a b">']);
  });

  it('should check meta charsets against the committed encoding', () => {
    const diagnostics: Diagnostic[] = [];

    scan('<meta charset="koi8-r"><meta charset="no-such-thing"><meta charset="UTF8">', {}, diagnostics, 'utf-8');
    expect(diagnostics.map(d => [d.code, d.column])).to.deep.equal([['HTML1015', 1], ['HTML1001', 24]]);

    diagnostics.length = 0;
    scan('<meta charset="koi8-r">', {}, diagnostics);
    expect(diagnostics).to.be.empty;
  });
});
