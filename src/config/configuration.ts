import { z } from 'zod';

const booleanFlag = z
    .union([z.boolean(), z.string()])
    .transform((value) => value === true || value === 'true' || value === '1');

export const DEFAULT_CORS_ORIGINS = 'http://localhost:3000,http://localhost:5173';

export const environmentSchema = z.object({
    PORT: z.coerce.number().int().positive().default(8787),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    CORS_ORIGINS: z.string().default(DEFAULT_CORS_ORIGINS),

    DB_HOST: z.string().default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(3306),
    DB_USERNAME: z.string().default('root'),
    DB_PASSWORD: z.string().default(''),
    DB_DATABASE: z.string().default('equity_chat'),
    DB_SYNCHRONIZE: booleanFlag.default(false),

    GEMINI_API_KEY: z.string().default(''),
    GEMINI_CHAT_MODEL: z.string().default('gemini-2.5-flash'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(4096),
    MAX_ITERATIONS: z.coerce.number().int().positive().default(5),

    TOOL_SERVER_URL: z.string().default('http://localhost:9000'),
    TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

    RATE_LIMIT_BURST: z.coerce.number().int().nonnegative().default(10),
    RATE_LIMIT_PER_CHAT: z.coerce.number().int().nonnegative().default(50),
    RATE_LIMIT_PER_HOUR: z.coerce.number().int().nonnegative().default(150),
    RATE_LIMIT_PER_DAY: z.coerce.number().int().nonnegative().default(1000),

    HISTORY_TURNS: z.coerce.number().int().nonnegative().default(10),
    WS_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
    JWT_SECRET: z.string().min(1).default('change-me'),
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * Passed to `ConfigModule.forRoot({ validate })`. Fails the bootstrap with every
 * offending variable listed instead of the first one.
 */
export function validateEnvironment(raw: Record<string, unknown>): Environment {
    const parsed = environmentSchema.safeParse(raw);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${problems}`);
    }
    return parsed.data;
}

export function parseOrigins(value: string): string[] {
    return value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0);
}
