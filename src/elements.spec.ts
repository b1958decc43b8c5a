import { expect } from 'chai';
import { getElement, isKnownElement, isVoidElement } from './elements';

describe('elements', () => {
  it('should look up elements case-insensitively', () => {
    const td = getElement('TD');

    expect(td.name).equals('td');
    expect(td.preferredParent).equals('tr');
    expect(td.bounds).equals('table');
    expect(td.closes('th')).to.be.true;
    expect(td.isParent('TR')).to.be.true;
  });

  it('should classify content models', () => {
    expect(getElement('br').contentModel).equals('void');
    expect(getElement('script').contentModel).equals('raw-text');
    expect(getElement('title').contentModel).equals('raw-text');
    expect(getElement('b').contentModel).equals('formatting');
    expect(getElement('u').contentModel).equals('formatting');
    expect(getElement('tr').contentModel).equals('table-structure');
    expect(getElement('div').contentModel).equals('ordinary');
  });

  it('should expose flags', () => {
    expect(getElement('b').isInline).to.be.true;
    expect(getElement('dd').isBlock).to.be.true;
    expect(getElement('p').isContainer).to.be.true;
    expect(getElement('tbody').hasNoFlags).to.be.true;
    expect(isVoidElement('IMG')).to.be.true;
    expect(isVoidElement('span')).to.be.false;
  });

  it('should give unknown elements a container definition under body', () => {
    const custom = getElement('my-widget');

    expect(isKnownElement('my-widget')).to.be.false;
    expect(custom.known).to.be.false;
    expect(custom.isContainer).to.be.true;
    expect(custom.preferredParent).equals('body');
    expect(custom.is('MY-WIDGET')).to.be.true;
    expect(custom.is(getElement('other-widget'))).to.be.false;
  });
});
