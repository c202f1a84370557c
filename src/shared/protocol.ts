// ============================================================
// WS Message Protocol Constants
// ============================================================

export const MessageTypes = {
    // Session lifecycle
    SESSION_READY: 'session:ready',
    HISTORY_SYNC: 'history:sync',

    // Messaging
    CHAT_SEND: 'chat:send',
    AGENT_ASK: 'agent:ask',
    AGENT_RESPOND: 'agent:respond',
    INCIDENT_REPORT: 'incident:report',
    MESSAGE_DELIVER: 'message:deliver',
    MESSAGE_ACK: 'message:ack',
    MESSAGE_ERROR: 'message:error',

    // Presence
    PRESENCE_QUERY: 'presence:query',
    PRESENCE_STATE: 'presence:state',
    PRESENCE_UPDATE: 'presence:update',

    // Misc
    HUB_ERROR: 'hub:error',
    PING: 'ping',
    PONG: 'pong',
} as const;

/**
 * Close codes sent by the hub. 4xxx are application codes.
 */
export const CloseCodes = {
    NORMAL: 1000,
    SERVER_SHUTDOWN: 1001,
    SUPERSEDED: 4000,
    UNAUTHORIZED: 4401,
} as const;

export const CloseReasons = {
    SUPERSEDED: 'SUPERSEDED',
    SERVER_SHUTDOWN: 'SERVER_SHUTDOWN',
    HEARTBEAT_TIMEOUT: 'HEARTBEAT_TIMEOUT',
    NOT_AUTHORIZED: 'NOT_AUTHORIZED',
} as const;

export type CloseReason = typeof CloseReasons[keyof typeof CloseReasons];
