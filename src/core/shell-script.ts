/**
 * Render a command as a `/bin/sh` script, one argument per line:
 *
 * ```sh
 * #!/bin/sh
 * set -ex
 *
 * export BUILDKIT_PROGRESS=plain
 *
 * docker build \
 *     --file \
 *     Dockerfile \
 *     .
 * ```
 *
 * The first two words share a line. `exports` adds an `export K=V` block.
 */
export function renderShellScript(
  command: readonly string[],
  exports?: Readonly<Record<string, string>>,
): string {
  const lines = ['#!/bin/sh', 'set -ex', ''];
  if (exports !== undefined) {
    for (const [key, value] of Object.entries(exports)) {
      lines.push(`export ${key}=${value}`);
    }
    lines.push('');
  }

  const [first = '', second, ...rest] = command;
  if (second === undefined) {
    lines.push(first);
  } else if (rest.length === 0) {
    lines.push(`${first} ${second}`);
  } else {
    lines.push(`${first} ${second} \\`);
    rest.forEach((arg, i) => {
      lines.push(i === rest.length - 1 ? `    ${arg}` : `    ${arg} \\`);
    });
  }
  return lines.join('\n') + '\n';
}
