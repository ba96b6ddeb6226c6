// =============================================================================
// Port Interfaces - Barrel Export
// =============================================================================
// Ports define the contracts between the agent core and external adapters.

export * from './ManagedResource.js';

// Model that proposes actions (OpenAI, Anthropic via AI SDK)
export * from './ModelSessionPort.js';

// Sandbox that runs model-written code
export * from './ExecutionSessionPort.js';

// External JSON tools (MCP servers)
export * from './ToolBackendPort.js';

// Conversation persistence
export * from './SessionStorePort.js';
