export * from './ApprovalRequest.js';
export * from './events.js';
export * from './AgentTools.js';
