import { describe, it, expect } from 'vitest';
import { gatewayOrigins } from '../cors.js';

describe('gatewayOrigins', () => {
  it('answers on both loopback names for a loopback bind', () => {
    expect(gatewayOrigins('127.0.0.1', 5050)).toEqual(['http://localhost:5050', 'http://127.0.0.1:5050']);
    expect(gatewayOrigins('0.0.0.0', 5050)).toEqual(['http://localhost:5050', 'http://127.0.0.1:5050']);
  });

  it('uses the bound host otherwise', () => {
    expect(gatewayOrigins('192.168.1.20', 8080)).toEqual(['http://192.168.1.20:8080']);
  });
});
