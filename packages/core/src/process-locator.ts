import {
  LS_FALLBACK_PROCESS_NAME,
  LS_PORT_FLAG,
  LS_PROCESS_NAMES,
  LS_TOKEN_FLAG,
  type ProcessCandidate,
} from '@quotascope/protocol';
import { errorMessage } from './errors.js';
import { SystemProcessSource, uniqueSorted, type OsProcess, type ProcessSource } from './process-source.js';

const TOKEN_PATTERN = new RegExp(`${LS_TOKEN_FLAG}[=\\s]+([a-zA-Z0-9\\-]+)`);
const PORT_PATTERN = new RegExp(`${LS_PORT_FLAG}[=\\s]+(\\d+)`);

export interface PortProbe {
  probe(port: number, token: string): Promise<boolean>;
}

export interface LocatedServer {
  candidate: ProcessCandidate;
  /** First listening port that answered the probe */
  port: number;
}

export interface Locator {
  locate(): Promise<LocatedServer | null>;
}

export interface ProcessLocatorOptions {
  probe: PortProbe;
  source?: ProcessSource;
  platform?: NodeJS.Platform;
  /** Overrides the platform's binary name fragment */
  processName?: string;
}

export function resolveProcessName(platform: NodeJS.Platform, override?: string): string {
  return override || LS_PROCESS_NAMES[platform] || LS_FALLBACK_PROCESS_NAME;
}

/** First `--csrf_token` value; null disqualifies the process. */
export function extractToken(commandLine: string): string | null {
  return commandLine.match(TOKEN_PATTERN)?.[1] ?? null;
}

/** Advertised `--extension_server_port`, 0 when absent. */
export function extractAdvertisedPort(commandLine: string): number {
  const match = commandLine.match(PORT_PATTERN);
  return match ? Number.parseInt(match[1], 10) : 0;
}

export function matchesLanguageServer(proc: OsProcess, processName: string): boolean {
  const searchable = `${proc.name} ${proc.commandLine}`;
  return searchable.includes(processName) && searchable.includes(LS_PORT_FLAG);
}

/**
 * Finds the language server among all OS processes and the port that serves
 * its control API. The advertised port is informational: every listening
 * port is probed in ascending order instead.
 */
export class ProcessLocator implements Locator {
  private readonly probe: PortProbe;
  private readonly source: ProcessSource;
  private readonly processName: string;

  constructor(options: ProcessLocatorOptions) {
    const platform = options.platform ?? process.platform;
    this.probe = options.probe;
    this.source = options.source ?? new SystemProcessSource(platform);
    this.processName = resolveProcessName(platform, options.processName);
  }

  async locate(): Promise<LocatedServer | null> {
    console.log(`[ProcessLocator] Scanning for language server process: ${this.processName}`);

    let processes: OsProcess[];
    try {
      processes = await this.source.listProcesses();
    } catch (err) {
      console.error(`[ProcessLocator] Process listing failed: ${errorMessage(err)}`);
      return null;
    }

    for (const proc of processes) {
      if (!matchesLanguageServer(proc, this.processName)) continue;

      const token = extractToken(proc.commandLine);
      if (!token) {
        console.warn(`[ProcessLocator] pid=${proc.pid} has no ${LS_TOKEN_FLAG}, skipping`);
        continue;
      }

      const lookup = await this.source.listListeningPorts(proc.pid);
      if (!lookup.ok) {
        console.warn(`[ProcessLocator] pid=${proc.pid} skipped (${lookup.reason}): ${lookup.message}`);
        continue;
      }

      const candidate: ProcessCandidate = {
        pid: proc.pid,
        commandLine: proc.commandLine,
        token,
        advertisedPort: extractAdvertisedPort(proc.commandLine),
        listeningPorts: uniqueSorted(lookup.ports),
      };
      console.log(`[ProcessLocator] Found language server pid=${candidate.pid}, testing ports: ${candidate.listeningPorts.join(', ') || '(none)'}`);

      for (const port of candidate.listeningPorts) {
        if (await this.probe.probe(port, token)) {
          return { candidate, port };
        }
      }
    }

    console.warn('[ProcessLocator] Language server not found');
    return null;
  }
}
