/**
 * Connection Module
 *
 * Socket ownership, reconnection, TLS session resumption and the liveness probe.
 */

export { Connection } from './Connection.js';
export { ConnectionManager } from './ConnectionManager.js';
export { openSocket, type OpenSocketOptions } from './socket.js';
export { buildTlsOptions } from './tls.js';
