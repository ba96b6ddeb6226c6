export { MCPClientAdapter, type MCPClientAdapterOptions } from './MCPClientAdapter.js';
