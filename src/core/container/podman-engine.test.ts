import { describe, it, expect, vi } from 'vitest';
import { PodmanEngine } from './podman-engine.js';
import type { ExecResult } from './engine.js';
import { EngineError } from '../errors.js';

function createExec() {
  return vi
    .fn<(file: string, args: readonly string[]) => Promise<ExecResult>>()
    .mockResolvedValue({ stdout: '', stderr: '' });
}

describe('PodmanEngine', () => {
  it('is named podman and invokes the podman binary', () => {
    const engine = new PodmanEngine({ exec: createExec() });
    expect(engine.name).toBe('podman');
    expect(engine.binary).toBe('podman');
  });

  it('probes availability with podman version', async () => {
    const exec = createExec();
    const engine = new PodmanEngine({ exec });

    expect(await engine.isAvailable()).toBe(true);
    expect(exec).toHaveBeenCalledWith('podman', ['version']);
  });

  it('is unavailable when the probe fails', async () => {
    const exec = createExec().mockRejectedValueOnce(new EngineError('Failed to start podman'));
    expect(await new PodmanEngine({ exec }).isAvailable()).toBe(false);
  });

  it('reports the client version', async () => {
    const exec = createExec().mockResolvedValueOnce({ stdout: '5.2.3\n', stderr: '' });
    expect(await new PodmanEngine({ exec }).version()).toBe('Podman 5.2.3');
    expect(exec).toHaveBeenCalledWith('podman', ['version', '--format', '{{.Client.Version}}']);
  });

  it('builds with the same argument vector as docker', async () => {
    const exec = createExec();
    await new PodmanEngine({ exec, binary: 'podman-remote' }).build({
      contextDir: '/ctx',
      dockerfile: '/ctx/Dockerfile',
      tag: 'app',
    });
    expect(exec).toHaveBeenCalledWith(
      'podman-remote',
      ['build', '--file', '/ctx/Dockerfile', '--tag=app', '/ctx'],
      { cwd: '/ctx', env: undefined, inherit: true },
    );
  });
});
