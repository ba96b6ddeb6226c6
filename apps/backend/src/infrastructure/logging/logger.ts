import { randomUUID } from 'crypto';
import { trace } from '@opentelemetry/api';
import { createMiddleware } from 'hono/factory';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * `LOG_LEVEL` when set, otherwise `info` in production and `debug` elsewhere
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const configured = env.LOG_LEVEL;
    if (configured === 'debug' || configured === 'info' || configured === 'warn' || configured === 'error') {
        return configured;
    }
    return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

interface LogContext {
    correlationId?: string;
    sessionId?: string;
    agentId?: string;
    [key: string]: unknown;
}

export class Logger {
    private context: LogContext = {};

    constructor(readonly minLevel: LogLevel = resolveLogLevel()) {}

    child(context: LogContext): Logger {
        const child = new Logger(this.minLevel);
        child.context = { ...this.context, ...context };
        return child;
    }

    private log(level: LogLevel, message: string, data?: Record<string, unknown>) {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
            return;
        }

        // Get trace context from OpenTelemetry
        const span = trace.getActiveSpan();
        const spanContext = span?.spanContext();

        const entry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            // Include trace context for log correlation
            trace_id: spanContext?.traceId,
            span_id: spanContext?.spanId,
            ...this.context,
            ...data,
        };

        // Structured JSON to stdout
        console.log(JSON.stringify(entry));
    }

    debug(message: string, data?: Record<string, unknown>) {
        this.log('debug', message, data);
    }

    info(message: string, data?: Record<string, unknown>) {
        this.log('info', message, data);
    }

    warn(message: string, data?: Record<string, unknown>) {
        this.log('warn', message, data);
    }

    error(message: string, error?: unknown, data?: Record<string, unknown>) {
        let errorData: Record<string, unknown> | undefined;
        
        if (error instanceof Error) {
            errorData = { message: error.message, stack: error.stack, name: error.name };
        } else if (error !== undefined) {
            errorData = { message: String(error) };
        }
        
        this.log('error', message, {
            ...data,
            error: errorData,
        });
    }
}

export const logger = new Logger();

export type LoggerVariables = {
    correlationId: string;
    logger: Logger;
};

// Middleware to add correlation ID
export const correlationMiddleware = createMiddleware<{ Variables: LoggerVariables }>(async (c, next) => {
    const correlationId = c.req.header('x-correlation-id') || randomUUID();
    c.set('correlationId', correlationId);
    c.set('logger', logger.child({ correlationId }));
    c.header('x-correlation-id', correlationId);
    await next();
});
