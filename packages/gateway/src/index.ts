export { QuotaGateway, type GatewayOptions } from './server.js';
export { createApiHandler, type ApiHandlerOptions } from './api.js';
export { QuotaMonitor, type QuotaMonitorEvents } from './quota-monitor.js';
export { gatewayOrigins, setCorsHeaders, handleCorsPreflight } from './cors.js';
export type { QuotaSource } from './quota-source.js';
