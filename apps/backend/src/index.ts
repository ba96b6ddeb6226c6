// =============================================================================
// taskweave Backend - Entry Point
// =============================================================================

// Load environment variables from .env file
import 'dotenv/config';

// IMPORTANT: Initialize OpenTelemetry tracing BEFORE any other imports
// This ensures all modules are properly instrumented
import './infrastructure/observability/tracing.js';

import { createServer } from 'http';
import { getRequestListener } from '@hono/node-server';
import { createApp } from './api/http/router.js';
import { createServices } from './services/index.js';
import { config } from './infrastructure/config/index.js';
import { shutdownTracing } from './infrastructure/observability/tracing.js';
import { logger } from './infrastructure/logging/logger.js';

// =============================================================================
// Configuration
// =============================================================================

const port = config.PORT;
const isDev = config.NODE_ENV !== 'production';

// =============================================================================
// Services and HTTP Server
// =============================================================================

const services = await createServices(config);
const app = createApp({ sessions: services.sessions, approvals: services.approvals });

// Create a Node.js HTTP server from the Hono app
const httpServer = createServer(getRequestListener(app.fetch));

// =============================================================================
// Start Server
// =============================================================================

httpServer.listen(port, () => {
  console.log('');
  console.log('  taskweave Backend');
  console.log('  ─────────────────────────────────────');
  console.log(`  Server:    http://localhost:${port}`);
  console.log(`  Health:    http://localhost:${port}/health`);
  console.log(`  Sessions:  http://localhost:${port}/api/v1/sessions`);
  console.log(`  Model:     ${services.agentConfig.modelId}`);
  console.log(`  Workdir:   ${services.agentConfig.workingDir}`);
  console.log('  ─────────────────────────────────────');
  console.log(`  Mode:      ${isDev ? 'development' : 'production'}`);
  console.log('');
});

// =============================================================================
// Graceful Shutdown
// =============================================================================

const shutdown = async () => {
  console.log('\n  Shutting down gracefully...');

  // Cancel running exchanges and release agent resources
  await services.sessions.closeAll();

  // Shutdown OpenTelemetry (flush pending spans)
  await shutdownTracing();

  // Close HTTP server
  httpServer.close(() => {
    console.log('  Server closed');
    process.exit(0);
  });

  // Force exit after timeout
  setTimeout(() => {
    console.error('  Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

const onSignal = () => {
  shutdown().catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
};

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

// =============================================================================
// Export for testing
// =============================================================================

export { httpServer };
