import {
  LS_PROBE_BODY,
  LS_PROBE_METHOD,
  buildLsHeaders,
  buildServiceUrl,
} from '@quotascope/protocol';
import { errorMessage } from './errors.js';
import type { LsHttpClient } from './http2-client.js';
import type { PortProbe } from './process-locator.js';

function debug(message: string): void {
  if (process.env.QUOTASCOPE_DEBUG) {
    console.debug(`[PortProbe] ${message}`);
  }
}

/**
 * Speculative GetUnleashData call. A port passes only on HTTP 200 with a
 * JSON body; every other outcome resolves false.
 */
export class LanguageServerProbe implements PortProbe {
  constructor(private readonly getClient: () => LsHttpClient) {}

  async probe(port: number, token: string): Promise<boolean> {
    try {
      const response = await this.getClient().postJson(
        buildServiceUrl(port, LS_PROBE_METHOD),
        LS_PROBE_BODY,
        buildLsHeaders(token),
      );
      if (response.status !== 200) {
        debug(`port ${port} answered HTTP ${response.status}`);
        return false;
      }
      JSON.parse(response.body);
      return true;
    } catch (err) {
      debug(`port ${port} failed: ${errorMessage(err)}`);
      return false;
    }
  }
}
