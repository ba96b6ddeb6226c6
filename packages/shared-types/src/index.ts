// =============================================================================
// @taskweave/shared-types
// =============================================================================

export * from './domain/agent.js';
export * from './domain/mcp.js';
export * from './domain/session.js';
export * from './api/events.js';
export * from './api/requests.js';
export * from './errors/index.js';
