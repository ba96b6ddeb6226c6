import { z } from 'zod';

export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().default(3000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

    // Model
    AGENT_MODEL: z.string().regex(/^(openai|anthropic):.+/, 'Must be "<provider>:<model>"').default('openai:gpt-4o-mini'),
    AGENT_SYSTEM_PROMPT: z.string().optional(),
    AGENT_WORKING_DIR: z.string().default(process.cwd()),

    // Execution session
    EXECUTION_COMMAND: z.string().default('python3'),
    EXECUTION_FILE_EXTENSION: z.string().regex(/^[A-Za-z0-9]+$/).default('py'),
    EXECUTION_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),
    APPROVAL_TIMEOUT_MS: z.coerce.number().int().positive().optional(),

    // Subagents
    ENABLE_SUBAGENTS: z.enum(['true', 'false']).default('true'),
    MAX_SUBAGENTS: z.coerce.number().int().positive().default(5),

    // Session persistence
    ENABLE_PERSISTENCE: z.enum(['true', 'false']).default('true'),
    SESSIONS_DIR: z.string().default('.taskweave/sessions'),
    SESSION_FLUSH: z.enum(['true', 'false']).default('false'),

    // Tool result overflow
    TOOL_RESULT_INLINE_MAX_BYTES: z.coerce.number().int().positive().default(32768),
    TOOL_RESULT_PREVIEW_LINES: z.coerce.number().int().positive().default(10),

    // Tool back-ends
    MCP_SERVERS_FILE: z.string().optional(),

    // LLM providers (read by the AI SDK providers)
    OPENAI_API_KEY: z.string().optional(),
    ANTHROPIC_API_KEY: z.string().optional(),

    // OpenTelemetry (optional)
    OTEL_ENABLED: z.enum(['true', 'false']).default('false'),
    OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
    OTEL_SERVICE_NAME: z.string().default('taskweave-backend'),
    OTEL_SERVICE_VERSION: z.string().default('0.1.0'),
    OTEL_DEBUG: z.enum(['true', 'false']).default('false'),
});

export type Env = z.infer<typeof envSchema>;

function loadConfig(): Env {
    const result = envSchema.safeParse(process.env);

    if (!result.success) {
        console.error('Invalid environment variables:');
        console.error(result.error.format());
        process.exit(1);
    }

    return result.data;
}

export const config = loadConfig();
