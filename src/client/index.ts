/**
 * Client Module
 */

export { RpcClient } from './RpcClient.js';
export { RpcResponse, type ResultDecoder } from './response.js';
export { generateRequestId } from './requestId.js';
