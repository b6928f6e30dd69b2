import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { TempWorkspace } from './workspace.js';

describe('TempWorkspace', () => {
  let root: string;

  beforeEach(() => {
    root = join(mkdtempSync(join(tmpdir(), 'dockwright-ws-test-')), 'workspaces');
  });

  afterEach(() => {
    rmSync(dirname(root), { recursive: true, force: true });
  });

  it('creates the root on demand and leases a fresh directory under it', () => {
    const lease = new TempWorkspace({ root }).acquire();

    expect(dirname(lease.path)).toBe(root);
    expect(basename(lease.path)).toMatch(/^build-.{6}$/);
    expect(statSync(lease.path).isDirectory()).toBe(true);
  });

  it('never hands out the same directory twice', () => {
    const workspace = new TempWorkspace({ root });
    const a = workspace.acquire('ctx');
    const b = workspace.acquire('ctx');

    expect(a.path).not.toBe(b.path);
  });

  it('release removes the directory and its contents', () => {
    const lease = new TempWorkspace({ root }).acquire();
    writeFileSync(join(lease.path, 'Dockerfile'), 'FROM scratch\n');

    lease.release();
    expect(existsSync(lease.path)).toBe(false);
  });

  it('release is idempotent', () => {
    const lease = new TempWorkspace({ root }).acquire();
    lease.release();
    expect(() => lease.release()).not.toThrow();
  });

  it('rejects labels outside the safe alphabet', () => {
    const workspace = new TempWorkspace({ root });
    expect(() => workspace.acquire('../escape')).toThrow('Invalid workspace label: "../escape"');
    expect(() => workspace.acquire('')).toThrow('Invalid workspace label: ""');
  });

  it('defaults the root to a directory under the OS temp dir', () => {
    expect(new TempWorkspace().root).toBe(join(tmpdir(), 'dockwright'));
  });
});
