import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  ProcessLocator,
  extractAdvertisedPort,
  extractToken,
  matchesLanguageServer,
  resolveProcessName,
  type PortProbe,
} from '../process-locator.js';
import type { OsProcess, PortLookup, ProcessSource } from '../process-source.js';

class FakeSource implements ProcessSource {
  readonly lookups: number[] = [];

  constructor(
    private readonly processes: OsProcess[] | Error,
    private readonly ports: Record<number, PortLookup> = {},
  ) {}

  async listProcesses(): Promise<OsProcess[]> {
    if (this.processes instanceof Error) throw this.processes;
    return this.processes;
  }

  async listListeningPorts(pid: number): Promise<PortLookup> {
    this.lookups.push(pid);
    return this.ports[pid] ?? { ok: true, ports: [] };
  }
}

class FakeProbe implements PortProbe {
  readonly calls: Array<[number, string]> = [];

  constructor(private readonly healthy: Set<number>) {}

  async probe(port: number, token: string): Promise<boolean> {
    this.calls.push([port, token]);
    return this.healthy.has(port);
  }
}

function lsProcess(pid: number, args: string): OsProcess {
  return {
    pid,
    name: 'language_server_linux_x64',
    commandLine: `/opt/ls/language_server_linux_x64 ${args}`,
  };
}

describe('extractToken', () => {
  it('accepts space and equals separators', () => {
    expect(extractToken('ls --csrf_token abc-123 --x')).toBe('abc-123');
    expect(extractToken('ls --csrf_token=abc-123')).toBe('abc-123');
  });

  it('takes the first occurrence', () => {
    expect(extractToken('--csrf_token first --csrf_token second')).toBe('first');
  });

  it('returns null without the flag', () => {
    expect(extractToken('ls --extension_server_port 4000')).toBeNull();
  });
});

describe('extractAdvertisedPort', () => {
  it('reads the flag value', () => {
    expect(extractAdvertisedPort('ls --extension_server_port=42100')).toBe(42100);
    expect(extractAdvertisedPort('ls --extension_server_port 9')).toBe(9);
  });

  it('is 0 when absent', () => {
    expect(extractAdvertisedPort('ls --csrf_token t')).toBe(0);
  });
});

describe('resolveProcessName', () => {
  it('maps platforms to binary names', () => {
    expect(resolveProcessName('linux')).toBe('language_server_linux');
    expect(resolveProcessName('darwin')).toBe('language_server_macos');
    expect(resolveProcessName('win32')).toBe('language_server_windows');
    expect(resolveProcessName('freebsd')).toBe('language_server');
  });

  it('prefers an explicit override', () => {
    expect(resolveProcessName('linux', 'custom_ls')).toBe('custom_ls');
  });
});

describe('matchesLanguageServer', () => {
  it('requires both the name fragment and the port flag', () => {
    expect(matchesLanguageServer(lsProcess(1, '--extension_server_port 1'), 'language_server_linux')).toBe(true);
    expect(matchesLanguageServer(lsProcess(1, '--csrf_token t'), 'language_server_linux')).toBe(false);
    expect(matchesLanguageServer(
      { pid: 2, name: 'bash', commandLine: 'bash --extension_server_port 1' },
      'language_server_linux',
    )).toBe(false);
  });
});

describe('ProcessLocator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('probes listening ports in ascending order and returns the first that answers', async () => {
    const source = new FakeSource(
      [
        { pid: 10, name: 'bash', commandLine: 'bash' },
        lsProcess(20, '--csrf_token tok-1 --extension_server_port 43000'),
      ],
      { 20: { ok: true, ports: [43002, 43000, 43001, 43000] } },
    );
    const probe = new FakeProbe(new Set([43001, 43002]));
    const locator = new ProcessLocator({ probe, source, platform: 'linux' });

    const located = await locator.locate();

    expect(located).toEqual({
      port: 43001,
      candidate: {
        pid: 20,
        commandLine: '/opt/ls/language_server_linux_x64 --csrf_token tok-1 --extension_server_port 43000',
        token: 'tok-1',
        advertisedPort: 43000,
        listeningPorts: [43000, 43001, 43002],
      },
    });
    expect(probe.calls).toEqual([[43000, 'tok-1'], [43001, 'tok-1']]);
    expect(source.lookups).toEqual([20]);
  });

  it('skips processes without a token before looking up their ports', async () => {
    const source = new FakeSource(
      [
        lsProcess(1, '--extension_server_port 4000'),
        lsProcess(2, '--csrf_token good --extension_server_port 4000'),
      ],
      { 2: { ok: true, ports: [5000] } },
    );
    const locator = new ProcessLocator({ probe: new FakeProbe(new Set([5000])), source, platform: 'linux' });

    const located = await locator.locate();

    expect(located?.candidate.pid).toBe(2);
    expect(source.lookups).toEqual([2]);
  });

  it('skips a candidate whose port lookup is denied and still probes the next', async () => {
    const source = new FakeSource(
      [
        lsProcess(1, '--csrf_token a --extension_server_port 1'),
        lsProcess(2, '--csrf_token b --extension_server_port 2'),
      ],
      {
        1: { ok: false, reason: 'access_denied', message: 'Permission denied' },
        2: { ok: true, ports: [6000] },
      },
    );
    const probe = new FakeProbe(new Set([6000]));
    const locator = new ProcessLocator({ probe, source, platform: 'linux' });

    const located = await locator.locate();

    expect(located?.port).toBe(6000);
    expect(located?.candidate.token).toBe('b');
    expect(probe.calls).toEqual([[6000, 'b']]);
  });

  it('moves on to the next candidate when no port answers', async () => {
    const source = new FakeSource(
      [
        lsProcess(1, '--csrf_token a --extension_server_port 1'),
        lsProcess(2, '--csrf_token b --extension_server_port 2'),
      ],
      {
        1: { ok: true, ports: [7000] },
        2: { ok: true, ports: [7001] },
      },
    );
    const locator = new ProcessLocator({ probe: new FakeProbe(new Set([7001])), source, platform: 'linux' });

    expect((await locator.locate())?.candidate.pid).toBe(2);
  });

  it('returns null when the process table cannot be read', async () => {
    const probe = new FakeProbe(new Set());
    const locator = new ProcessLocator({ probe, source: new FakeSource(new Error('ps: not found')), platform: 'linux' });

    expect(await locator.locate()).toBeNull();
    expect(probe.calls).toEqual([]);
  });

  it('returns null when nothing matches', async () => {
    const locator = new ProcessLocator({
      probe: new FakeProbe(new Set([1])),
      source: new FakeSource([{ pid: 1, name: 'node', commandLine: 'node server.js' }]),
      platform: 'linux',
    });

    expect(await locator.locate()).toBeNull();
  });

  it('uses the process name override instead of the platform name', async () => {
    const source = new FakeSource(
      [
        lsProcess(1, '--csrf_token a --extension_server_port 1'),
        { pid: 2, name: 'my_ls', commandLine: '/bin/my_ls --csrf_token c --extension_server_port 3' },
      ],
      { 2: { ok: true, ports: [8000] } },
    );
    const locator = new ProcessLocator({
      probe: new FakeProbe(new Set([8000])),
      source,
      platform: 'linux',
      processName: 'my_ls',
    });

    expect((await locator.locate())?.candidate.pid).toBe(2);
    expect(source.lookups).toEqual([2]);
  });
});
