import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';

const execFileAsync = promisify(execFile);

const LIST_TIMEOUT_MS = 15_000;
const PORT_LOOKUP_TIMEOUT_MS = 5_000;
const MAX_BUFFER = 64 * 1024 * 1024;

export interface OsProcess {
  pid: number;
  name: string;
  commandLine: string;
}

export type PortLookupFailure = 'access_denied' | 'no_such_process' | 'unavailable';

export type PortLookup =
  | { ok: true; ports: number[] }
  | { ok: false; reason: PortLookupFailure; message: string };

/** OS introspection used by ProcessLocator. */
export interface ProcessSource {
  /** Rejects when the process table cannot be read at all. */
  listProcesses(): Promise<OsProcess[]>;
  listListeningPorts(pid: number): Promise<PortLookup>;
}

// ──────────────────────────────────────────────
// Output parsers
// ──────────────────────────────────────────────

export function uniqueSorted(ports: Iterable<number>): number[] {
  return [...new Set(ports)].sort((a, b) => a - b);
}

function toPort(text: string): number | null {
  if (!/^\d+$/.test(text)) return null;
  const port = Number.parseInt(text, 10);
  return port > 0 && port <= 65535 ? port : null;
}

function portFromAddress(address: string): number | null {
  const colon = address.lastIndexOf(':');
  return colon === -1 ? null : toPort(address.slice(colon + 1));
}

function basename(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] ?? path;
}

/** `ps -A -ww -o pid= -o args=` */
export function parsePsOutput(stdout: string): OsProcess[] {
  const processes: OsProcess[] = [];
  for (const line of stdout.split('\n')) {
    const match = line.match(/^\s*(\d+)\s+(.+?)\s*$/);
    if (!match) continue;
    const commandLine = match[2];
    const executable = commandLine.split(/\s+/)[0] ?? '';
    processes.push({
      pid: Number.parseInt(match[1], 10),
      name: basename(executable),
      commandLine,
    });
  }
  return processes;
}

const windowsProcessSchema = z.object({
  ProcessId: z.number().int(),
  Name: z.string().nullish(),
  CommandLine: z.string().nullish(),
});

/** `Get-CimInstance Win32_Process | ConvertTo-Json`: one object, or an array of them. */
export function parseWindowsProcessJson(stdout: string): OsProcess[] {
  const trimmed = stdout.trim();
  if (!trimmed) return [];

  const parsed: unknown = JSON.parse(trimmed);
  const entries = Array.isArray(parsed) ? parsed : [parsed];
  const processes: OsProcess[] = [];
  for (const entry of entries) {
    const result = windowsProcessSchema.safeParse(entry);
    if (!result.success) continue;
    processes.push({
      pid: result.data.ProcessId,
      name: result.data.Name ?? '',
      commandLine: result.data.CommandLine ?? '',
    });
  }
  return processes;
}

/** `lsof -F n` field output: name lines look like `n127.0.0.1:42100` or `n*:42100`. */
export function parseLsofPorts(stdout: string): number[] {
  const ports: number[] = [];
  for (const line of stdout.split('\n')) {
    if (!line.startsWith('n')) continue;
    const port = portFromAddress(line.slice(1).trim());
    if (port !== null) ports.push(port);
  }
  return uniqueSorted(ports);
}

/** `ss -Hltnp`: keeps rows owned by `pid`, reads the local address column. */
export function parseSsPorts(stdout: string, pid: number): number[] {
  const ports: number[] = [];
  for (const line of stdout.split('\n')) {
    if (!line.includes(`pid=${pid},`)) continue;
    const columns = line.trim().split(/\s+/);
    const port = columns[3] ? portFromAddress(columns[3]) : null;
    if (port !== null) ports.push(port);
  }
  return uniqueSorted(ports);
}

/** `Get-NetTCPConnection ... | Select-Object -ExpandProperty LocalPort`: one port per line. */
export function parsePortLines(stdout: string): number[] {
  const ports: number[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const port = toPort(line.trim());
    if (port !== null) ports.push(port);
  }
  return uniqueSorted(ports);
}

// ──────────────────────────────────────────────
// Failure classification
// ──────────────────────────────────────────────

interface ExecFailure {
  code: string | number | undefined;
  stdout: string;
  stderr: string;
  message: string;
}

function describeExecFailure(err: unknown): ExecFailure {
  if (!(err instanceof Error)) {
    return { code: undefined, stdout: '', stderr: '', message: String(err) };
  }
  const code = 'code' in err && (typeof err.code === 'string' || typeof err.code === 'number') ? err.code : undefined;
  const stdout = 'stdout' in err && typeof err.stdout === 'string' ? err.stdout : '';
  const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : '';
  return { code, stdout, stderr, message: err.message };
}

export function classifyLookupFailure(text: string): PortLookupFailure {
  const lower = text.toLowerCase();
  if (lower.includes('permission denied') || lower.includes('operation not permitted') || lower.includes('access is denied')) {
    return 'access_denied';
  }
  if (lower.includes('no such process') || lower.includes('cannot find a process')) {
    return 'no_such_process';
  }
  return 'unavailable';
}

function lookupFailed(failure: ExecFailure): PortLookup {
  const text = failure.stderr.trim() || failure.message;
  return { ok: false, reason: classifyLookupFailure(text), message: text.slice(0, 300) };
}

function processExists(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: alive but owned by another user
    return describeExecFailure(err).code === 'EPERM';
  }
}

// ──────────────────────────────────────────────
// SystemProcessSource
// ──────────────────────────────────────────────

/**
 * Process and socket introspection through the platform's own tools:
 * ps + lsof (ss on Linux without lsof), PowerShell CIM cmdlets on Windows.
 */
export class SystemProcessSource implements ProcessSource {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  async listProcesses(): Promise<OsProcess[]> {
    if (this.platform === 'win32') {
      const { stdout } = await this.powershell(
        'Get-CimInstance Win32_Process | Select-Object ProcessId, Name, CommandLine | ConvertTo-Json -Compress',
        LIST_TIMEOUT_MS,
      );
      return parseWindowsProcessJson(stdout);
    }

    const { stdout } = await execFileAsync('ps', ['-A', '-ww', '-o', 'pid=', '-o', 'args='], {
      timeout: LIST_TIMEOUT_MS,
      maxBuffer: MAX_BUFFER,
    });
    return parsePsOutput(stdout);
  }

  async listListeningPorts(pid: number): Promise<PortLookup> {
    if (this.platform === 'win32') {
      try {
        const { stdout } = await this.powershell(
          `Get-NetTCPConnection -OwningProcess ${pid} -State Listen -ErrorAction SilentlyContinue | Select-Object -ExpandProperty LocalPort`,
          PORT_LOOKUP_TIMEOUT_MS,
        );
        return { ok: true, ports: parsePortLines(stdout) };
      } catch (err) {
        return lookupFailed(describeExecFailure(err));
      }
    }

    try {
      const { stdout } = await execFileAsync(
        'lsof',
        ['-nP', '-a', '-p', String(pid), '-iTCP', '-sTCP:LISTEN', '-Fn'],
        { timeout: PORT_LOOKUP_TIMEOUT_MS, maxBuffer: MAX_BUFFER },
      );
      return { ok: true, ports: parseLsofPorts(stdout) };
    } catch (err) {
      const failure = describeExecFailure(err);

      // lsof exits 1 without a message when nothing matched
      if (failure.code === 1 && !failure.stderr.trim()) {
        return processExists(pid)
          ? { ok: true, ports: parseLsofPorts(failure.stdout) }
          : { ok: false, reason: 'no_such_process', message: `Process ${pid} exited` };
      }
      if (failure.code === 'ENOENT' && this.platform === 'linux') {
        return this.listWithSs(pid);
      }
      return lookupFailed(failure);
    }
  }

  private async listWithSs(pid: number): Promise<PortLookup> {
    try {
      const { stdout } = await execFileAsync('ss', ['-Hltnp'], {
        timeout: PORT_LOOKUP_TIMEOUT_MS,
        maxBuffer: MAX_BUFFER,
      });
      const ports = parseSsPorts(stdout, pid);
      if (ports.length === 0 && !processExists(pid)) {
        return { ok: false, reason: 'no_such_process', message: `Process ${pid} exited` };
      }
      return { ok: true, ports };
    } catch (err) {
      return lookupFailed(describeExecFailure(err));
    }
  }

  private powershell(command: string, timeoutMs: number): Promise<{ stdout: string; stderr: string }> {
    return execFileAsync('powershell', ['-NoProfile', '-Command', command], {
      timeout: timeoutMs,
      maxBuffer: MAX_BUFFER,
      windowsHide: true,
    });
  }
}
