// ============================================================
// Hub error taxonomy
// ============================================================

const HUB_ERROR_CODES = [
    'CHANNEL_CLOSED',
    'INVALID_RECIPIENT',
    'CROSS_TEAM',
    'FORBIDDEN',
    'PERSISTENCE_FAILED',
    'HISTORY_UNAVAILABLE',
    'UNAUTHORIZED',
    'INVALID_FRAME',
    'CONFIG_INVALID',
    'INTERNAL_ERROR',
] as const;

export type HubErrorCode = typeof HUB_ERROR_CODES[number];

const knownCodes: ReadonlySet<string> = new Set(HUB_ERROR_CODES);

export function isHubErrorCode(code: string): code is HubErrorCode {
    return knownCodes.has(code);
}

/**
 * Base class for every error the hub raises on purpose.
 * `code` is what ends up in `message:error` / `hub:error` frames.
 */
export class HubError extends Error {
    constructor(
        message: string,
        public readonly code: HubErrorCode = 'INTERNAL_ERROR',
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'HubError';
    }
}

export class ChannelClosedError extends HubError {
    constructor(channelId: string) {
        super(`Channel ${channelId} is not open`, 'CHANNEL_CLOSED');
        this.name = 'ChannelClosedError';
    }
}

export class RoutingError extends HubError {
    constructor(message: string, code: 'INVALID_RECIPIENT' | 'CROSS_TEAM' | 'FORBIDDEN' = 'INVALID_RECIPIENT') {
        super(message, code);
        this.name = 'RoutingError';
    }
}

/**
 * Raised after live delivery already happened; `delivered` lists who got it.
 */
export class PersistenceError extends HubError {
    constructor(
        public readonly messageId: string,
        public readonly delivered: string[],
        cause: unknown,
    ) {
        super(`Message ${messageId} could not be stored: ${toErrorMessage(cause)}`, 'PERSISTENCE_FAILED', { cause });
        this.name = 'PersistenceError';
    }
}

export class AuthenticationError extends HubError {
    constructor(message: string, cause?: unknown) {
        super(message, 'UNAUTHORIZED', { cause });
        this.name = 'AuthenticationError';
    }
}

export class ConfigError extends HubError {
    constructor(message: string) {
        super(message, 'CONFIG_INVALID');
        this.name = 'ConfigError';
    }
}

export function toErrorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}

export function errorCodeOf(err: unknown): HubErrorCode {
    return err instanceof HubError ? err.code : 'INTERNAL_ERROR';
}
