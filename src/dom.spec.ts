import { expect } from 'chai';
import fs from 'fs';
import { HtmlParser } from './html-parser';
import { CData, DocType, DomNode, ProcessingElement, TextElement } from './dom';

describe('dom', () => {
  let results: DomNode;

  before(() => {
    results = new HtmlParser().parse(fs.readFileSync('./test/sample.html', 'utf-8')).domRoot;
  });

  it('should produce searchable DOM tree', () => {
    const list = results.querySelector('#list');
    const items = results.querySelectorAll('li');

    expect(list && list.tagLc).equals('ul');
    expect(items.length).equals(2);
    expect(items[1].depth).equals(3);
    expect(results.querySelector('p.intro')).equals(results.querySelector('.intro'));
    expect(results.querySelector('div')).to.be.null;
    expect(results.querySelectorAll('*').map(node => node.tag))
      .to.deep.equal(['html', 'head', 'title', 'body', 'p', 'b', 'img', 'ul', 'li', 'li']);
  });

  it('should be able to retrieve textContent and innerHTML', () => {
    const body = results.querySelector('body');
    const intro = results.querySelector('p');

    expect(body && body.textContent).equals('Hi there\n\nOneTwo\n');
    expect(intro && intro.innerHTML).equals('Hi <b>there</b>');
    expect(results.toString()).equals('<!DOCTYPE html><html><head><title>Sample</title></head>' +
      '<body><p class="intro">Hi <b>there</b></p><img src="x.png">\n<!-- note -->\n' +
      '<ul id="list"><li>One</li><li>Two</li></ul>\n</body></html>');
  });

  it('should describe the doctype', () => {
    const docType = results.children[0];

    expect(docType).to.be.instanceOf(DocType);

    if (docType instanceof DocType) {
      expect(docType.type).equals('html');
      expect(docType.version).equals('5');
      expect(docType.variety).to.be.null;
    }

    const strict = new DocType('html', '-//W3C//DTD XHTML 1.0 Strict//EN',
      'http://www.w3.org/TR/xhtml1/DTD/xhtml1-strict.dtd');

    expect(strict.type).equals('xhtml');
    expect(strict.version).equals('1.0');
    expect(strict.variety).equals('strict');
    expect(strict.toString())
      .equals('<!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.0 Strict//EN" "http://www.w3.org/TR/xhtml1/DTD/xhtml1-strict.dtd">');
    expect(new DocType('svg', null, 'shapes.dtd').toString()).equals('<!DOCTYPE svg SYSTEM "shapes.dtd">');
  });

  it('should convert DOM to JSON useful for debugging', () => {
    const json = JSON.stringify(results);

    expect(json).contains('{"tag":"ul","depth":2,"values":{"id":"list"},"parentTag":"body","children":[');
    expect(json).contains('"One (4; li)"');
    expect(json).contains('"<!DOCTYPE html> (0; #document)"');
    expect(JSON.stringify(new CData('yeti'))).equals('"<![CDATA[yeti]]> (-1)"');
  });

  it('should record positions and synthesized elements when augmentations are on', () => {
    const root = new HtmlParser({ augmentations: true }).parse('<p>x').domRoot;
    const html = root.querySelector('html');
    const p = root.querySelector('p');

    expect(html && html.synthetic).to.be.true;
    expect(p && [p.synthetic, p.line, p.column]).to.deep.equal([false, 1, 1]);
    expect(root.toString()).equals('<html><head></head><body><p>x</p></body></html>');

    const plain = new HtmlParser().parse('<p>x').domRoot.querySelector('p');

    expect(plain && [plain.line, plain.column]).to.deep.equal([0, 0]);
  });

  it('should keep raw text unescaped and other text escaped', () => {
    const root = new HtmlParser({ documentFragment: true }).parse('<script>if (a < b) {}</script><p>a &lt; b</p>').domRoot;
    const script = root.children[0];
    const text = script instanceof DomNode ? script.children[0] : null;

    expect(root.toString()).equals('<script>if (a < b) {}</script><p>a &lt; b</p>');
    expect(text instanceof TextElement && text.raw).to.be.true;
  });

  it('should build CDATA sections and processing instructions', () => {
    const root = new HtmlParser({ documentFragment: true, cdataSections: true })
      .parse('<p><![CDATA[x<y]]></p><?php echo 1 ?>').domRoot;
    const p = root.querySelector('p');

    expect(p && p.textContent).equals('x<y');
    expect(root.children[1]).to.be.instanceOf(ProcessingElement);
    expect(root.toString()).equals('<p><![CDATA[x<y]]></p><?php echo 1 ?>');
  });

  it('should properly manipulate element attributes', () => {
    const node = DomNode.createNode('a');

    expect(node.toString()).equals('<a></a>');
    node.setAttribute('href', '#foo');
    expect(node.toString()).equals('<a href="#foo"></a>');
    node.setAttribute('title', 'x & "y"');
    expect(node.toString()).equals('<a href="#foo" title="x &amp; &quot;y&quot;"></a>');
    expect(node.hasAttribute('HREF')).to.be.true;
    expect(node.getAttribute('missing')).to.be.null;
    node.setAttribute('href', '#bar');
    expect(node.values).to.deep.equal({ href: '#bar', title: 'x & "y"' });
    expect(node.removeAttribute('href')).to.be.true;
    expect(node.removeAttribute('href')).to.be.false;
    expect(node.toString()).equals('<a title="x &amp; &quot;y&quot;"></a>');
    expect(DomNode.createNode('br', { class: 'x' }).toString()).equals('<br class="x">');
  });
});
