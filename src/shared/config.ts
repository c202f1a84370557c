// ============================================================
// Configuration — environment → validated HubConfig
// ============================================================

import { z } from 'zod';
import { ConfigError } from './errors.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface HubConfig {
    port: number;
    host: string;
    jwtSecret: string;
    agentUserId: string;
    systemSenderId: string;
    historyLimit: number;
    historyBufferLimit: number;
    heartbeatIntervalMs: number;
    stateFile?: string;
    logLevel: LogLevel;
    logPretty: boolean;
}

const boolFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(v => v === 'true' || v === '1');

const envSchema = z.object({
    NODE_ENV: z.string().optional(),
    PORT: z.coerce.number().int().min(0).max(65535).default(3001),
    HOST: z.string().min(1).default('0.0.0.0'),
    JWT_SECRET: z.string({ required_error: 'JWT_SECRET is required' }).min(8, 'JWT_SECRET must be at least 8 characters'),
    AGENT_USER_ID: z.string().min(1).default('workhub-agent'),
    SYSTEM_SENDER_ID: z.string().min(1).default('system'),
    HISTORY_LIMIT: z.coerce.number().int().positive().default(200),
    HISTORY_BUFFER_LIMIT: z.coerce.number().int().positive().default(500),
    HEARTBEAT_INTERVAL_MS: z.coerce.number().int().min(0).default(30000),
    STATE_FILE: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    LOG_PRETTY: boolFlag.optional(),
});

/**
 * Build the hub configuration from environment variables.
 * Throws ConfigError listing every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HubConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
    }

    const e = parsed.data;
    return {
        port: e.PORT,
        host: e.HOST,
        jwtSecret: e.JWT_SECRET,
        agentUserId: e.AGENT_USER_ID,
        systemSenderId: e.SYSTEM_SENDER_ID,
        historyLimit: e.HISTORY_LIMIT,
        historyBufferLimit: e.HISTORY_BUFFER_LIMIT,
        heartbeatIntervalMs: e.HEARTBEAT_INTERVAL_MS,
        stateFile: e.STATE_FILE,
        logLevel: e.LOG_LEVEL,
        logPretty: e.LOG_PRETTY ?? e.NODE_ENV !== 'production',
    };
}
