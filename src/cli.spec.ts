import { expect } from 'chai';
import { createProgram, processFile } from './cli';

const SAMPLE_PATH = './test/sample.html';

function run(...args: string[]): string {
  const output: string[] = [];

  createProgram(text => output.push(text)).exitOverride().parse(args, { from: 'user' });

  return output.join('');
}

describe('cli', () => {
  it('should print balanced HTML', () => {
    expect(run('--quiet', SAMPLE_PATH)).equals('<!DOCTYPE html><html><head><title>Sample</title></head>' +
      '<body><p class="intro">Hi <b>there</b></p><img src="x.png">\n<!-- note -->\n' +
      '<ul id="list"><li>One</li><li>Two</li></ul>\n</body></html>');
  });

  it('should remove elements on request', () => {
    expect(run('-q', '--remove', 'ul,b', SAMPLE_PATH)).equals('<!DOCTYPE html><html><head><title>Sample</title></head>' +
      '<body><p class="intro">Hi </p><img src="x.png">\n<!-- note -->\n\n</body></html>');
  });

  it('should print an event trace', () => {
    const lines = run('-q', '--events', SAMPLE_PATH).split('\n');

    expect(lines.slice(0, 7)).to.deep.equal([
      'document-start windows-1252 (default)',
      'doctype <!DOCTYPE html>',
      '<html>',
      '  <head>',
      '    <title>',
      '      "Sample"',
      '    </title>'
    ]);
    expect(lines).to.include('    <img src="x.png">');
    expect(lines.slice(-2)).to.deep.equal(['document-end 0 errors, 2 warnings', '']);
  });

  it('should report files it cannot read', () => {
    const logged: unknown[][] = [];
    const consoleError = console.error;

    console.error = (...args: unknown[]): void => { logged.push(args); };

    try {
      expect(processFile('./test/no-such-file.html', {}, () => {})).to.be.false;
    }
    finally {
      console.error = consoleError;
    }

    expect(logged.length).equals(1);
    expect(logged[0][1]).equals('./test/no-such-file.html');
  });
  it('should report bad option values without processing files', () => {
    const logged: unknown[][] = [];
    const consoleError = console.error;
    let output = '';
    let exitCode: typeof process.exitCode = 0;

    console.error = (...args: unknown[]): void => { logged.push(args); };

    try {
      output = run('--names', 'sideways', SAMPLE_PATH);
      exitCode = process.exitCode;
    }
    finally {
      console.error = consoleError;
      process.exitCode = 0;
    }

    expect(output).equals('');
    expect(exitCode).equals(1);
    expect(logged).to.deep.equal([['Invalid option: %s', 'Option "names" does not support the value "sideways"']]);
  });
});
