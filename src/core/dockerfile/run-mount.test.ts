import { describe, it, expect } from 'vitest';
import { RunMount } from './run-mount.js';

describe('RunMount', () => {
  it('renders options in insertion order', () => {
    const mount = new RunMount('bind', [
      ['target', '/src'],
      ['source', 'app'],
    ]);
    expect(mount.toFlag()).toBe('--mount=type=bind,target=/src,source=app');
  });

  it('renders true as a bare key and drops false', () => {
    const mount = new RunMount('cache', [
      ['target', '/cache'],
      ['ro', true],
      ['readonly', false],
    ]);
    expect(mount.toFlag()).toBe('--mount=type=cache,target=/cache,ro');
  });

  describe('cache', () => {
    it('puts target first and the remaining options in a fixed order', () => {
      const mount = RunMount.cache('/root/.cache/go-build', {
        gid: 1000,
        sharing: 'locked',
        id: 'go',
        uid: 1000,
      });
      expect(mount.toFlag()).toBe(
        '--mount=type=cache,target=/root/.cache/go-build,id=go,sharing=locked,uid=1000,gid=1000',
      );
    });

    it('renders mode in octal', () => {
      expect(RunMount.cache('/c', { mode: 0o755 }).toFlag()).toBe(
        '--mount=type=cache,target=/c,mode=0755',
      );
    });
  });

  it('bind', () => {
    expect(RunMount.bind('/work', { source: 'src', rw: true }).toFlag()).toBe(
      '--mount=type=bind,target=/work,source=src,rw',
    );
  });

  it('tmpfs', () => {
    expect(RunMount.tmpfs('/tmp', { size: '64m' }).toFlag()).toBe(
      '--mount=type=tmpfs,target=/tmp,size=64m',
    );
  });

  it('secret', () => {
    const mount = RunMount.secret({ id: 'npmrc', target: '/root/.npmrc', required: true });
    expect(mount.toFlag()).toBe('--mount=type=secret,id=npmrc,target=/root/.npmrc,required');
    expect(mount.type).toBe('secret');
  });

  it('ssh with no options', () => {
    const mount = RunMount.ssh();
    expect(mount.toFlag()).toBe('--mount=type=ssh');
    expect(mount.type).toBe('ssh');
  });

  it('ssh with mode and ids', () => {
    expect(RunMount.ssh({ mode: 0o600, uid: '${UID}' }).toFlag()).toBe(
      '--mount=type=ssh,mode=0600,uid=${UID}',
    );
  });
});
