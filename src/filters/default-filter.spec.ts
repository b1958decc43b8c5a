import { expect } from 'chai';
import { Augs } from '../document-handler';
import { HtmlParser } from '../html-parser';
import { DefaultFilter } from './default-filter';

class UpperCaseText extends DefaultFilter {
  characters(text: string, augs: Augs): void {
    super.characters(text.toUpperCase(), augs);
  }
}

describe('default-filter', () => {
  it('should forward every event unchanged', () => {
    const parser = new HtmlParser({ documentFragment: true, cdataSections: true }).addFilter(new DefaultFilter());
    const source = '<!DOCTYPE html><!--c--><p class="x">a<br><![CDATA[b]]></p><?pi data?>';

    expect(parser.parse(source).toString()).equals(source);
  });

  it('should let subclasses change the events they override', () => {
    const parser = new HtmlParser({ documentFragment: true }).addFilter(new UpperCaseText());

    expect(parser.parse('<p>a<!--c--></p>').toString()).equals('<p>A<!--c--></p>');
  });

  it('should do nothing when there is no next stage', () => {
    const filter = new DefaultFilter();

    expect(() => filter.startElement('p', [], null)).to.not.throw();
    expect(filter.setNext({})).equals(filter);
  });
});
