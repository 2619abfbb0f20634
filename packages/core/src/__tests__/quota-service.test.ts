import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { QuotaServiceState } from '@quotascope/protocol';
import { ConnectionCache, type ConnectionLease } from '../connection-cache.js';
import { LanguageServerError } from '../errors.js';
import { QuotaService, NOT_FOUND_MESSAGE } from '../quota-service.js';
import type { LocatedServer } from '../process-locator.js';
import { FakeHttpClient, FakeLocator, SERVER, locatedServer } from './fakes.js';

const NOW = new Date('2026-01-01T00:00:00.000Z');

const STATUS = {
  userStatus: {
    name: 'Test User',
    planStatus: { planInfo: { planName: 'Pro' } },
    cascadeModelConfigData: {
      clientModelConfigs: [
        { label: 'Claude Sonnet 4', quotaInfo: { remainingFraction: 0.5, resetTime: '2026-01-01T01:00:00Z' } },
      ],
    },
  },
};

function setup(results: Array<LocatedServer | null>) {
  const locator = new FakeLocator(results);
  const clients: FakeHttpClient[] = [];
  const cache = new ConnectionCache({
    createClient: () => {
      const client = new FakeHttpClient();
      clients.push(client);
      return client;
    },
    createLocator: () => locator,
  });
  const fetch = vi.fn<(lease: ConnectionLease) => Promise<unknown>>();
  const service = new QuotaService({ cache, fetch, now: () => NOW });
  return { service, cache, locator, clients, fetch };
}

describe('QuotaService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('reports not_found when no language server is detected', async () => {
    const { service, fetch } = setup([null]);

    expect(await service.getQuotaReport()).toEqual({
      success: false,
      error: { type: 'not_found', message: NOT_FOUND_MESSAGE },
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  it('fetches, normalizes and emits the report', async () => {
    const { service, fetch } = setup([SERVER]);
    fetch.mockResolvedValue(STATUS);
    const states: QuotaServiceState[] = [];
    const reports: string[] = [];
    service.on('state', (state) => states.push(state));
    service.on('report', (report) => reports.push(report.planName));

    const result = await service.getQuotaReport();

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.report.timestamp).toBe('2026-01-01T00:00:00.000Z');
    expect(result.report.userName).toBe('Test User');
    expect(result.report.models[0].timeUntilResetMs).toBe(3_600_000);
    expect(states).toEqual(['idle', 'has_connection', 'fetching', 'succeeded']);
    expect(reports).toEqual(['Pro']);
    expect(fetch.mock.calls[0][0].connection.port).toBe(42100);
  });

  it('resets, re-detects and succeeds after one failure', async () => {
    const { service, locator, clients, fetch } = setup([SERVER, locatedServer(42200, 900)]);
    fetch
      .mockRejectedValueOnce(new LanguageServerError('transport', 'stream reset'))
      .mockResolvedValueOnce(STATUS);

    const result = await service.getQuotaReport();

    expect(result.success).toBe(true);
    expect(locator.calls).toBe(2);
    expect(clients[0].destroyed).toBe(true);
    expect(await service.peekConnection()).toEqual({
      port: 42200, token: 'test-token', pid: 900, advertisedPort: 42199,
    });
  });

  it('gives up with remote_error after a second failure and leaves the cache empty', async () => {
    const { service, locator, fetch } = setup([SERVER]);
    fetch
      .mockRejectedValueOnce(new LanguageServerError('timeout', 'first boom'))
      .mockRejectedValueOnce(new LanguageServerError('http_status', 'second boom', { status: 500 }));

    expect(await service.getQuotaReport()).toEqual({
      success: false,
      error: { type: 'remote_error', message: 'Quota fetch failed: second boom' },
    });
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(await service.peekConnection()).toBeNull();

    fetch.mockResolvedValueOnce(STATUS);
    await service.getQuotaReport();
    expect(locator.calls).toBe(3);
  });

  it('reports the first cause when re-detection finds nothing', async () => {
    const { service, fetch } = setup([SERVER, null]);
    fetch.mockRejectedValueOnce(new LanguageServerError('malformed', 'not an object'));

    expect(await service.getQuotaReport()).toEqual({
      success: false,
      error: { type: 'remote_error', message: 'Quota fetch failed: not an object' },
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('invalidateConnection closes the client and drops the connection', async () => {
    const { service, clients, fetch } = setup([SERVER]);
    fetch.mockResolvedValue(STATUS);
    await service.getQuotaReport();

    await service.invalidateConnection();

    expect(clients[0].closed).toBe(true);
    expect(await service.peekConnection()).toBeNull();
  });

  it('close destroys the client', async () => {
    const { service, clients, fetch } = setup([SERVER]);
    fetch.mockResolvedValue(STATUS);
    await service.getQuotaReport();

    await service.close();

    expect(clients[0].destroyed).toBe(true);
  });
});
