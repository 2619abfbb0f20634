import { WebSocketServer, WebSocket } from 'ws';
import { createServer, type Server } from 'node:http';
import { randomUUID } from 'node:crypto';
import {
  DEFAULT_GATEWAY_PORT,
  DEFAULT_GATEWAY_HOST,
  DEFAULT_POLL_INTERVAL_MS,
  GATEWAY_PATH,
  HEARTBEAT_INTERVAL_MS,
  PROTOCOL_VERSION,
  createMessage,
  isClientMessageType,
  parseMessage,
  type QuotaResult,
  type ServerMessage,
} from '@quotascope/protocol';
import { errorMessage } from '@quotascope/core';
import { createApiHandler } from './api.js';
import { gatewayOrigins } from './cors.js';
import { QuotaMonitor } from './quota-monitor.js';
import type { QuotaSource } from './quota-source.js';

export interface GatewayOptions {
  service: QuotaSource;
  port?: number;
  host?: string;
  /** Browser origins allowed besides the gateway's own */
  allowedOrigins?: string[];
  /** Background poll period; 0 disables */
  pollIntervalMs?: number;
  heartbeatIntervalMs?: number;
}

interface ClientInfo {
  ws: WebSocket;
  connectedAt: number;
  alive: boolean;
}

function resultMessage(result: QuotaResult): ServerMessage {
  return result.success
    ? createMessage('quota:update', { report: result.report })
    : createMessage('quota:error', { error: result.error });
}

/**
 * HTTP API plus a WebSocket feed of quota results at GATEWAY_PATH.
 */
export class QuotaGateway {
  private wss: WebSocketServer | null = null;
  private httpServer: Server | null = null;
  private clients = new Map<string, ClientInfo>();
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private readonly service: QuotaSource;
  private readonly monitor: QuotaMonitor;
  private readonly heartbeatIntervalMs: number;
  private readonly extraOrigins: string[];
  private origins: string[] = [];
  private port: number;
  private host: string;

  constructor(options: GatewayOptions) {
    this.service = options.service;
    this.port = options.port ?? DEFAULT_GATEWAY_PORT;
    this.host = options.host ?? DEFAULT_GATEWAY_HOST;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS;
    this.extraOrigins = options.allowedOrigins ?? [];
    this.monitor = new QuotaMonitor(this.service, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
    this.monitor.on('update', (result) => this.broadcast(resultMessage(result)));
  }

  /** Resolves with the bound address; port 0 picks a free one. */
  async start(): Promise<{ port: number; host: string }> {
    const apiHandler = createApiHandler({
      service: this.service,
      allowedOrigins: () => this.origins,
      onQuotaResult: (result) => this.monitor.record(result),
      onInvalidated: () => this.broadcast(createMessage('invalidated', { ok: true })),
    });

    const httpServer = createServer((req, res) => {
      // handleApi answers its own failures
      void apiHandler(req, res);
    });
    this.httpServer = httpServer;

    this.wss = new WebSocketServer({
      server: httpServer,
      path: GATEWAY_PATH,
    });
    this.wss.on('connection', (ws) => this.handleConnection(ws));

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(this.port, this.host, () => {
        httpServer.off('error', reject);
        resolve();
      });
    });

    const address = httpServer.address();
    if (address && typeof address !== 'string') {
      this.port = address.port;
    }
    this.origins = [...gatewayOrigins(this.host, this.port), ...this.extraOrigins];

    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.heartbeatIntervalMs);
    this.monitor.start();

    console.log(`[Gateway] Listening on http://${this.host}:${this.port} (ws ${GATEWAY_PATH})`);
    return { port: this.port, host: this.host };
  }

  async stop(): Promise<void> {
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = null;
    this.monitor.stop();

    // Notify clients before closing
    for (const [id, client] of this.clients) {
      try {
        client.ws.close(1001, 'Gateway shutting down');
      } catch (err) {
        console.warn(`[Gateway] Closing client ${id} failed: ${errorMessage(err)}`);
      }
    }
    this.clients.clear();

    await this.service.close();

    const wss = this.wss;
    const httpServer = this.httpServer;
    this.wss = null;
    this.httpServer = null;

    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }
    if (httpServer) {
      httpServer.closeAllConnections();
      await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    }
  }

  get clientCount(): number {
    return this.clients.size;
  }

  get address(): { port: number; host: string } {
    return { port: this.port, host: this.host };
  }

  getMonitor(): QuotaMonitor {
    return this.monitor;
  }

  private handleConnection(ws: WebSocket): void {
    const clientId = randomUUID();
    const client: ClientInfo = { ws, connectedAt: Date.now(), alive: true };
    this.clients.set(clientId, client);

    ws.on('pong', () => {
      client.alive = true;
    });
    ws.on('close', () => {
      this.clients.delete(clientId);
    });
    ws.on('error', (err) => {
      console.warn(`[Gateway] Client ${clientId} error: ${err.message}`);
    });

    ws.on('message', (data) => {
      const msg = parseMessage(String(data));
      if (!msg) return;
      const { type } = msg;
      if (!isClientMessageType(type)) {
        console.warn(`[Gateway] Unknown message type from ${clientId}: ${type}`);
        return;
      }

      switch (type) {
        case 'refresh':
          this.monitor.refresh().catch((err: unknown) => {
            console.error(`[Gateway] Refresh failed: ${errorMessage(err)}`);
          });
          break;

        case 'invalidate':
          this.service.invalidateConnection().then(
            () => this.broadcast(createMessage('invalidated', { ok: true })),
            (err: unknown) => console.error(`[Gateway] Invalidate failed: ${errorMessage(err)}`),
          );
          break;

        case 'ping':
          this.send(ws, createMessage('pong', {}));
          break;
      }
    });

    this.send(ws, createMessage('connected', {
      protocolVersion: PROTOCOL_VERSION,
      sessionId: clientId,
    }));

    const last = this.monitor.getLast();
    if (last) {
      this.send(ws, resultMessage(last));
    }
  }

  private broadcast(message: ServerMessage): void {
    const raw = JSON.stringify(message);

    for (const [clientId, client] of this.clients) {
      if (client.ws.readyState === WebSocket.OPEN) {
        try {
          client.ws.send(raw);
        } catch (err) {
          console.warn(`[Gateway] Broadcast to ${clientId} failed: ${errorMessage(err)}`);
        }
      }
    }
  }

  private send(ws: WebSocket, msg: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(msg));
    }
  }

  private heartbeat(): void {
    for (const [id, client] of this.clients) {
      if (!client.alive) {
        client.ws.terminate();
        this.clients.delete(id);
        continue;
      }
      client.alive = false;
      client.ws.ping();
    }
  }
}
