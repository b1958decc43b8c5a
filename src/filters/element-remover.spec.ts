import { expect } from 'chai';
import { HtmlParser, ParseResults } from '../html-parser';
import { ElementRemover } from './element-remover';

function filter(source: string, remover: ElementRemover, voidEndEvents = true): ParseResults {
  return new HtmlParser({ documentFragment: true, voidEndEvents }).addFilter(remover).parse(source);
}

describe('element-remover', () => {
  it('should keep accepted elements and the content of all others', () => {
    const remover = new ElementRemover().acceptElement('p').acceptElement('a', ['HREF']);
    const source = '<div><p class="x">One <a href="/a" onclick="go()">two</a> <i>three</i></p></div>';

    expect(filter(source, remover).toString()).equals('<p class="x">One <a href="/a">two</a> three</p>');
  });

  it('should pass everything through when nothing is accepted', () => {
    expect(filter('<div><i>x</i></div>', new ElementRemover()).toString()).equals('<div><i>x</i></div>');
  });

  it('should drop removed elements with their content', () => {
    expect(filter('<p>a<script>x()</script>b</p>', new ElementRemover().removeElement('script')).toString())
      .equals('<p>ab</p>');
    expect(filter('<div><div>x</div>y</div>z', new ElementRemover().removeElement('DIV')).toString()).equals('z');
  });

  it('should let removal win over acceptance', () => {
    const remover = new ElementRemover().acceptElement('p').acceptElement('b').removeElement('b');

    expect(filter('<p>a<b>b</b>c</p>', remover).toString()).equals('<p>ac</p>');
  });

  it('should handle void elements with and without end events', () => {
    expect(filter('<p>a<img src="x">b</p>', new ElementRemover().removeElement('img')).toString()).equals('<p>ab</p>');
    expect(filter('<p><br></p><span>x</span>y', new ElementRemover().removeElement('span'), false).toString())
      .equals('<p><br></p>y');
  });
});
