import { describe, it, expect } from 'vitest';
import { renderShellScript } from './shell-script.js';

describe('renderShellScript', () => {
  it('puts one argument per continued line after the first two words', () => {
    expect(renderShellScript(['docker', 'build', '--file', 'Dockerfile', '.'])).toBe(
      '#!/bin/sh\n' +
        'set -ex\n' +
        '\n' +
        'docker build \\\n' +
        '    --file \\\n' +
        '    Dockerfile \\\n' +
        '    .\n',
    );
  });

  it('adds an export block', () => {
    expect(renderShellScript(['docker', 'build', '.'], { A: '1', B: '2' })).toBe(
      '#!/bin/sh\nset -ex\n\nexport A=1\nexport B=2\n\ndocker build \\\n    .\n',
    );
  });

  it('renders short commands on one line', () => {
    expect(renderShellScript(['docker', 'info'])).toBe('#!/bin/sh\nset -ex\n\ndocker info\n');
    expect(renderShellScript(['true'])).toBe('#!/bin/sh\nset -ex\n\ntrue\n');
  });
});
