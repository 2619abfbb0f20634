import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_CONFIG, getConfigPath, loadConfig, parseConfigEntry, readEnvOverrides, saveConfig } from '../config.js';

describe('config', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'quotascope-config-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
  });

  it('falls back to defaults without a config file', async () => {
    expect(await loadConfig(configDir, {})).toEqual({ ...DEFAULT_CONFIG, configDir });
    expect(DEFAULT_CONFIG.gatewayPort).toBe(5050);
    expect(DEFAULT_CONFIG.gatewayHost).toBe('127.0.0.1');
    expect(DEFAULT_CONFIG.requestTimeoutMs).toBe(30_000);
    expect(DEFAULT_CONFIG.pollIntervalMs).toBe(60_000);
  });

  it('merges the file over defaults', async () => {
    writeFileSync(getConfigPath(configDir), JSON.stringify({ gatewayPort: 6060, pollIntervalMs: 0 }));

    const config = await loadConfig(configDir, {});

    expect(config.gatewayPort).toBe(6060);
    expect(config.pollIntervalMs).toBe(0);
    expect(config.gatewayHost).toBe('127.0.0.1');
  });

  it('ignores an invalid file', async () => {
    writeFileSync(getConfigPath(configDir), JSON.stringify({ gatewayPort: 'high' }));
    expect((await loadConfig(configDir, {})).gatewayPort).toBe(5050);

    writeFileSync(getConfigPath(configDir), '{ not json');
    expect((await loadConfig(configDir, {})).gatewayPort).toBe(5050);
  });

  it('applies env overrides over the file', async () => {
    writeFileSync(getConfigPath(configDir), JSON.stringify({ gatewayPort: 6060 }));

    const config = await loadConfig(configDir, {
      QUOTASCOPE_PORT: '7070',
      QUOTASCOPE_HOST: '0.0.0.0',
      QUOTASCOPE_TIMEOUT_MS: '5000',
      QUOTASCOPE_POLL_MS: '0',
      QUOTASCOPE_PROCESS_NAME: 'custom_ls',
    });

    expect(config).toEqual({
      configDir,
      gatewayHost: '0.0.0.0',
      gatewayPort: 7070,
      requestTimeoutMs: 5000,
      pollIntervalMs: 0,
      processName: 'custom_ls',
    });
  });

  it('ignores malformed env values', () => {
    expect(readEnvOverrides({ QUOTASCOPE_PORT: 'abc', QUOTASCOPE_TIMEOUT_MS: '0', QUOTASCOPE_POLL_MS: '-1' })).toEqual({});
    expect(readEnvOverrides({ QUOTASCOPE_PORT: '70000' })).toEqual({});
  });

  it('saveConfig merges into the stored file', async () => {
    await saveConfig({ gatewayPort: 6060 }, configDir);
    await saveConfig({ processName: 'custom_ls' }, configDir);

    expect(JSON.parse(readFileSync(getConfigPath(configDir), 'utf-8'))).toEqual({
      gatewayPort: 6060,
      processName: 'custom_ls',
    });
  });

  it('parses command-line entries', () => {
    expect(parseConfigEntry('gatewayPort', '6060')).toEqual({ gatewayPort: 6060 });
    expect(parseConfigEntry('processName', '123')).toEqual({ processName: '123' });
    expect(() => parseConfigEntry('gatewayPort', 'abc')).toThrow('Invalid value for gatewayPort');
    expect(() => parseConfigEntry('apiKey', 'x')).toThrow('Unknown config key: apiKey');
  });
});
