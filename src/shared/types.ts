// ============================================================
// Shared Types for the WorkHub realtime hub
// ============================================================

// --- Identity ---

/**
 * `agent` is the distinguished pseudo-user of the external AI agent service.
 */
export type Role = 'manager' | 'worker' | 'agent';

export interface UserIdentity {
    userId: string;
    role: Role;
    teamId: string;
    displayName?: string;
}

// --- Messages ---

export type MessageKind = 'chat' | 'incident_alert' | 'task_notice' | 'agent_response' | 'system';

export type RecipientSelector =
    | { type: 'user'; userId: string }
    | { type: 'users'; userIds: readonly string[] }
    | { type: 'role'; role: Role; teamId: string }
    | { type: 'agent' };

/**
 * A message on its way through the router. Frozen at construction.
 */
export interface RoutedMessage {
    readonly messageId: string;
    readonly kind: MessageKind;
    readonly senderId: string;
    /** Team of the sender (for agent responses: team of the worker being answered). */
    readonly teamId: string;
    readonly recipient: RecipientSelector;
    readonly content: string;
    /** ISO-8601 origin timestamp */
    readonly timestamp: string;
    /** agent_response only: also push to the managers of `teamId` */
    readonly notifyManagers?: boolean;
    readonly metadata?: Readonly<Record<string, string>>;
}

/**
 * What the persistence collaborator hands back. `messageId` may be missing
 * for records written by something other than the hub.
 */
export interface PersistedRecord {
    id: number;
    messageId?: string;
    kind: MessageKind;
    senderId: string;
    teamId: string;
    recipient: RecipientSelector;
    content: string;
    timestamp: string;
}

/**
 * Message as a client sees it, live or from history.
 */
export interface MessageView {
    messageId?: string;
    recordId?: number;
    kind: MessageKind;
    senderId: string;
    teamId: string;
    recipient: RecipientSelector;
    content: string;
    timestamp: string;
}

// --- Presence ---

export type PresenceStatus = 'online' | 'offline';

export interface PresenceState {
    userId: string;
    status: PresenceStatus;
    /** ISO-8601; undefined when the user has not connected since the hub started */
    lastTransitionAt?: string;
}

// --- WS Messages: Hub → Client ---

export interface SessionReadyMessage {
    type: 'session:ready';
    userId: string;
    role: Role;
    teamId: string;
    superseded: boolean;
}

export interface HistorySyncMessage {
    type: 'history:sync';
    messages: MessageView[];
    historyAvailable: boolean;
}

export interface MessageDeliverMessage {
    type: 'message:deliver';
    message: MessageView;
}

export interface MessageAckMessage {
    type: 'message:ack';
    clientMessageId?: string;
    messageId: string;
    recordIds: number[];
    delivered: string[];
}

export interface MessageErrorMessage {
    type: 'message:error';
    clientMessageId?: string;
    messageId?: string;
    code: string;
    error: string;
}

export interface PresenceUpdateMessage {
    type: 'presence:update';
    presence: PresenceState;
}

export interface PresenceStateMessage {
    type: 'presence:state';
    presence: PresenceState[];
}

export interface HubErrorMessage {
    type: 'hub:error';
    code: string;
    error: string;
}

export interface PongMessage {
    type: 'pong';
}

export type ServerFrame =
    | SessionReadyMessage
    | HistorySyncMessage
    | MessageDeliverMessage
    | MessageAckMessage
    | MessageErrorMessage
    | PresenceUpdateMessage
    | PresenceStateMessage
    | HubErrorMessage
    | PongMessage;

// --- WS Messages: Client → Hub ---

export interface ChatSendMessage {
    type: 'chat:send';
    to: string;
    content: string;
    clientMessageId?: string;
}

export interface AgentAskMessage {
    type: 'agent:ask';
    content: string;
    clientMessageId?: string;
}

export interface IncidentReportMessage {
    type: 'incident:report';
    content: string;
    clientMessageId?: string;
}

export interface AgentRespondMessage {
    type: 'agent:respond';
    workerId: string;
    teamId: string;
    content: string;
    notifyManagers?: boolean;
    clientMessageId?: string;
}

export interface PresenceQueryMessage {
    type: 'presence:query';
    userIds: string[];
}

export interface PingMessage {
    type: 'ping';
}

export type ClientFrame =
    | ChatSendMessage
    | AgentAskMessage
    | IncidentReportMessage
    | AgentRespondMessage
    | PresenceQueryMessage
    | PingMessage;
