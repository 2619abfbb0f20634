import { readFile, writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import {
  DEFAULT_GATEWAY_HOST,
  DEFAULT_GATEWAY_PORT,
  DEFAULT_POLL_INTERVAL_MS,
  LS_REQUEST_TIMEOUT_MS,
} from '@quotascope/protocol';
import { errorMessage } from './errors.js';

export const DEFAULT_CONFIG_DIR = join(homedir(), '.quotascope');
const CONFIG_FILE = 'config.json';

export interface QuotaScopeConfig {
  configDir: string;
  gatewayHost: string;
  gatewayPort: number;
  requestTimeoutMs: number;
  /** 0 disables background polling */
  pollIntervalMs: number;
  /** Overrides the platform's language server binary name */
  processName?: string;
}

export const DEFAULT_CONFIG: QuotaScopeConfig = {
  configDir: DEFAULT_CONFIG_DIR,
  gatewayHost: DEFAULT_GATEWAY_HOST,
  gatewayPort: DEFAULT_GATEWAY_PORT,
  requestTimeoutMs: LS_REQUEST_TIMEOUT_MS,
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
};

const port = z.number().int().min(0).max(65535);

const fileConfigSchema = z.object({
  gatewayHost: z.string().min(1).optional(),
  gatewayPort: port.optional(),
  requestTimeoutMs: z.number().int().positive().optional(),
  pollIntervalMs: z.number().int().nonnegative().optional(),
  processName: z.string().min(1).optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

export const CONFIG_KEYS = ['gatewayHost', 'gatewayPort', 'requestTimeoutMs', 'pollIntervalMs', 'processName'] as const;
const TEXT_KEYS: ReadonlySet<string> = new Set(['gatewayHost', 'processName']);

const envInt = z.string().trim().regex(/^\d+$/).transform((value) => Number.parseInt(value, 10));

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function getConfigPath(configDir: string = DEFAULT_CONFIG_DIR): string {
  return join(configDir, CONFIG_FILE);
}

export async function ensureConfigDir(configDir: string = DEFAULT_CONFIG_DIR): Promise<void> {
  await mkdir(configDir, { recursive: true });
}

async function readFileConfig(configDir: string): Promise<FileConfig> {
  const configPath = getConfigPath(configDir);
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (!isMissingFile(err)) {
      console.warn(`[Config] Cannot read ${configPath}: ${errorMessage(err)}`);
    }
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    const result = fileConfigSchema.safeParse(parsed);
    if (!result.success) {
      console.warn(`[Config] Ignoring invalid ${configPath}: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
      return {};
    }
    return result.data;
  } catch (err) {
    console.warn(`[Config] Ignoring unparsable ${configPath}: ${errorMessage(err)}`);
    return {};
  }
}

/** One `key value` pair from the command line, validated like the file. */
export function parseConfigEntry(key: string, value: string): FileConfig {
  if (!CONFIG_KEYS.some((known) => known === key)) {
    throw new Error(`Unknown config key: ${key} (expected one of ${CONFIG_KEYS.join(', ')})`);
  }
  const result = fileConfigSchema.safeParse({ [key]: TEXT_KEYS.has(key) ? value : Number(value) });
  if (!result.success) {
    throw new Error(`Invalid value for ${key}: ${result.error.issues[0]?.message ?? value}`);
  }
  return result.data;
}

/** QUOTASCOPE_* variables; malformed values are ignored. */
export function readEnvOverrides(env: NodeJS.ProcessEnv): FileConfig {
  const overrides: FileConfig = {};

  const gatewayPort = envInt.pipe(port).safeParse(env.QUOTASCOPE_PORT);
  if (gatewayPort.success) overrides.gatewayPort = gatewayPort.data;

  const timeout = envInt.pipe(z.number().positive()).safeParse(env.QUOTASCOPE_TIMEOUT_MS);
  if (timeout.success) overrides.requestTimeoutMs = timeout.data;

  const poll = envInt.safeParse(env.QUOTASCOPE_POLL_MS);
  if (poll.success) overrides.pollIntervalMs = poll.data;

  if (env.QUOTASCOPE_HOST) overrides.gatewayHost = env.QUOTASCOPE_HOST;
  if (env.QUOTASCOPE_PROCESS_NAME) overrides.processName = env.QUOTASCOPE_PROCESS_NAME;

  return overrides;
}

export async function loadConfig(
  configDir: string = DEFAULT_CONFIG_DIR,
  env: NodeJS.ProcessEnv = process.env,
): Promise<QuotaScopeConfig> {
  const fileConfig = await readFileConfig(configDir);
  return {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    ...readEnvOverrides(env),
    configDir,
  };
}

/** Merges `config` into the stored file. Env overrides are never persisted. */
export async function saveConfig(config: FileConfig, configDir: string = DEFAULT_CONFIG_DIR): Promise<void> {
  await ensureConfigDir(configDir);
  const existing = await readFileConfig(configDir);
  const merged = fileConfigSchema.parse({ ...existing, ...config });
  await writeFile(getConfigPath(configDir), JSON.stringify(merged, null, 2), 'utf-8');
}
