import { describe, it, expect } from 'vitest';
import {
  buildLsHeaders,
  buildServiceUrl,
  createMessage,
  isClientMessageType,
  parseMessage,
  summarizeConnection,
} from '../helpers.js';

describe('createMessage', () => {
  it('wraps a payload in an envelope', () => {
    const msg = createMessage('quota:update', { ok: true });

    expect(msg.type).toBe('quota:update');
    expect(msg.payload).toEqual({ ok: true });
    expect(msg.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(typeof msg.timestamp).toBe('number');
  });
});

describe('parseMessage', () => {
  it('reads a full envelope', () => {
    expect(parseMessage('{"type":"refresh","id":"a","timestamp":5,"payload":{"x":1}}')).toEqual({
      type: 'refresh', id: 'a', timestamp: 5, payload: { x: 1 },
    });
  });

  it('fills in missing envelope fields', () => {
    expect(parseMessage('{"type":"ping"}')).toEqual({ type: 'ping', id: '', timestamp: 0, payload: undefined });
  });

  it('rejects anything without a string type', () => {
    expect(parseMessage('not json')).toBeNull();
    expect(parseMessage('null')).toBeNull();
    expect(parseMessage('{"type":3}')).toBeNull();
    expect(parseMessage('[]')).toBeNull();
  });
});

describe('isClientMessageType', () => {
  it('accepts only the messages a client may send', () => {
    expect(['refresh', 'invalidate', 'ping'].every(isClientMessageType)).toBe(true);
    expect(isClientMessageType('pong')).toBe(false);
    expect(isClientMessageType('quota:update')).toBe(false);
  });
});

describe('summarizeConnection', () => {
  it('drops the token', () => {
    expect(summarizeConnection({ port: 42100, token: 'test-token', pid: 7, advertisedPort: 42099 })).toEqual({
      port: 42100, pid: 7, advertisedPort: 42099,
    });
  });
});

describe('language server request helpers', () => {
  it('builds the service URL on loopback', () => {
    expect(buildServiceUrl(42100, 'GetUserStatus')).toBe(
      'https://127.0.0.1:42100/exa.language_server_pb.LanguageServerService/GetUserStatus',
    );
  });

  it('builds the auth headers', () => {
    expect(buildLsHeaders('test-token')).toEqual({
      'content-type': 'application/json',
      'connect-protocol-version': '1',
      'x-codeium-csrf-token': 'test-token',
    });
  });
});
