/**
 * API Module
 *
 * Exports server and service components for the REST API.
 */

export { createServer, statusFor } from './server.js';
export type { PublicTableDescriptor, ServerConfig } from './server.js';
export { TableAccessService } from './service.js';
export type { Row, SelectOptions, TableAccessServiceConfig } from './service.js';
