import { describe, it, expect } from 'vitest';
import { parseContextManifest, loadContextManifest } from './context-manifest.js';
import { BuildContext } from './build-context.js';
import { AmbiguousMappingError, InvalidPathError } from './errors.js';

describe('parseContextManifest', () => {
  it('accepts a manifest with a root and entries', () => {
    const manifest = {
      contextRoot: '/project',
      entries: [{ contextPath: 'src/main.ts', hostPath: '/project/src/main.ts' }],
    };
    expect(parseContextManifest(manifest)).toEqual(manifest);
  });

  it('requires the entries list', () => {
    expect(() => parseContextManifest({})).toThrow(
      "Invalid context manifest: / must have required property 'entries'",
    );
  });

  it('rejects unknown top-level fields', () => {
    expect(() => parseContextManifest({ entries: [], extra: 1 })).toThrow(
      'Invalid context manifest: / must NOT have additional properties',
    );
  });

  it('reports every violation', () => {
    const raw = { contextRoot: 3, entries: [{ contextPath: '' }] };
    expect(() => parseContextManifest(raw)).toThrow(InvalidPathError);
    expect(() => parseContextManifest(raw)).toThrow(
      'Invalid context manifest: /contextRoot must be string; ' +
        "/entries/0 must have required property 'hostPath'; " +
        '/entries/0/contextPath must NOT have fewer than 1 characters',
    );
  });
});

describe('loadContextManifest', () => {
  it('round-trips a BuildContext through JSON', () => {
    const original = new BuildContext({ contextRoot: '/project' });
    original.addContextEntry('/project/src/main.ts');
    original.addContextEntry('/project/README.md');

    const restored = loadContextManifest(JSON.stringify(original));
    expect(restored.toJSON()).toEqual(original.toJSON());
    expect(restored.contextRoot).toBe('/project');
  });

  it('rejects malformed JSON', () => {
    expect(() => loadContextManifest('{not json')).toThrow(/^Context manifest is not valid JSON: /);
  });

  it('rejects one context path mapped to two host paths', () => {
    const text = JSON.stringify({
      entries: [
        { contextPath: 'a.txt', hostPath: '/one/a.txt' },
        { contextPath: 'a.txt', hostPath: '/two/a.txt' },
      ],
    });
    expect(() => loadContextManifest(text)).toThrow(AmbiguousMappingError);
  });

  it('treats two spellings of one destination as the same context path', () => {
    const text = JSON.stringify({
      entries: [
        { contextPath: 'app.txt', hostPath: '/one/app.txt' },
        { contextPath: './app.txt', hostPath: '/two/app.txt' },
      ],
    });
    expect(() => loadContextManifest(text)).toThrow(
      'Duplicate context entry: "app.txt" already maps to "/one/app.txt", ' +
        'cannot also map it to "/two/app.txt"',
    );
  });

  it('stores context paths in normalized form', () => {
    const text = JSON.stringify({
      entries: [
        { contextPath: 'conf//nested/./a.toml', hostPath: '/src/a.toml' },
        { contextPath: 'lib/', hostPath: '/src/lib' },
        { contextPath: 'conf/nested/a.toml', hostPath: '/src/a.toml' },
      ],
    });
    expect(loadContextManifest(text).entries()).toEqual([
      { contextPath: 'conf/nested/a.toml', hostPath: '/src/a.toml' },
      { contextPath: 'lib', hostPath: '/src/lib' },
    ]);
  });
});
