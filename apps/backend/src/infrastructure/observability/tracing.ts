// =============================================================================
// OpenTelemetry Tracing - SDK Initialization
// =============================================================================
// Must be imported before any other application code so that outgoing HTTP
// calls (model providers, MCP servers) are instrumented.
//
// Usage: import at the very top of src/index.ts
//   import './infrastructure/observability/tracing.js';

import { NodeSDK } from '@opentelemetry/sdk-node';
import { ConsoleSpanExporter, SimpleSpanProcessor, BatchSpanProcessor } from '@opentelemetry/sdk-trace-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import {
  SEMRESATTRS_SERVICE_NAME,
  SEMRESATTRS_SERVICE_VERSION,
  SEMRESATTRS_DEPLOYMENT_ENVIRONMENT,
} from '@opentelemetry/semantic-conventions';
import { HttpInstrumentation } from '@opentelemetry/instrumentation-http';
import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import { config } from '../config/index.js';

let sdk: NodeSDK | null = null;

/**
 * Start the OpenTelemetry SDK when `OTEL_ENABLED=true`.
 *
 * Spans go to `OTEL_EXPORTER_OTLP_ENDPOINT` when set, to the console otherwise.
 */
function initTracing(): void {
  if (config.OTEL_ENABLED !== 'true') {
    return;
  }

  if (config.OTEL_DEBUG === 'true') {
    diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.DEBUG);
  }

  const resource = new Resource({
    [SEMRESATTRS_SERVICE_NAME]: config.OTEL_SERVICE_NAME,
    [SEMRESATTRS_SERVICE_VERSION]: config.OTEL_SERVICE_VERSION,
    [SEMRESATTRS_DEPLOYMENT_ENVIRONMENT]: config.NODE_ENV,
  });

  const exporter = config.OTEL_EXPORTER_OTLP_ENDPOINT
    ? new OTLPTraceExporter({
        url: `${config.OTEL_EXPORTER_OTLP_ENDPOINT}/v1/traces`,
      })
    : new ConsoleSpanExporter();

  // Batch in production, export immediately during development
  const spanProcessor = config.NODE_ENV === 'production'
    ? new BatchSpanProcessor(exporter, {
        maxQueueSize: 2048,
        maxExportBatchSize: 512,
        scheduledDelayMillis: 5000,
      })
    : new SimpleSpanProcessor(exporter);

  sdk = new NodeSDK({
    resource,
    spanProcessor,
    instrumentations: [
      new HttpInstrumentation({
        ignoreIncomingRequestHook: (request) => request.url === '/health',
      }),
    ],
  });

  sdk.start();

  const exporterType = config.OTEL_EXPORTER_OTLP_ENDPOINT ? 'OTLP' : 'Console';
  console.log(`[Tracing] OpenTelemetry initialized (${exporterType} exporter, ${config.NODE_ENV} mode)`);
}

/**
 * Flush pending spans and stop the SDK.
 */
async function shutdownTracing(): Promise<void> {
  if (!sdk) {
    return;
  }
  try {
    await sdk.shutdown();
  } catch (error) {
    console.error('[Tracing] Error shutting down OpenTelemetry SDK:', error);
  } finally {
    sdk = null;
  }
}

initTracing();

export { shutdownTracing };
