// ============================================================
// workhub-realtime — Public API
// ============================================================

// Hub Server
export { startHub, extractToken } from './hub/server.js';
export type { HubOptions, HubServer } from './hub/server.js';
export { Hub } from './hub/hub.js';
export type {
    HubCoreOptions,
    ConnectResult,
    IncidentEvent,
    TaskAssignedEvent,
    PermissionUpdateEvent,
    SystemNoticeEvent,
} from './hub/hub.js';
export { ConnectionRegistry } from './hub/registry.js';
export { TeamDirectory } from './hub/directory.js';
export { PresenceTracker } from './hub/presence.js';
export { HistoryReconciler, mergeHistory } from './hub/reconciler.js';
export type { ReconcileOutcome } from './hub/reconciler.js';
export { MessageRouter } from './hub/router.js';
export type { RouteResult } from './hub/router.js';
export { createRoutedMessage } from './hub/messages.js';
export { WsChannel } from './hub/channel.js';
export type { Channel, ConnectionEntry, MessageStore, Authenticator, NewRecord, UserDirectory } from './hub/types.js';

// Collaborators
export { InMemoryMessageStore, isVisibleTo } from './store/memory-store.js';
export { JwtAuthenticator, issueToken } from './auth/jwt-authenticator.js';

// MCP Agent
export { startAgent } from './mcp/server.js';
export { HubClient } from './mcp/hub-client.js';

// Ambient
export { loadConfig } from './shared/config.js';
export type { HubConfig } from './shared/config.js';
export { createLogger, createNullLogger } from './shared/logger.js';
export type { Logger } from './shared/logger.js';
export {
    HubError,
    ChannelClosedError,
    RoutingError,
    PersistenceError,
    AuthenticationError,
    ConfigError,
    isHubErrorCode,
} from './shared/errors.js';
export type { HubErrorCode } from './shared/errors.js';

// Shared Types
export type {
    Role,
    UserIdentity,
    MessageKind,
    RecipientSelector,
    RoutedMessage,
    PersistedRecord,
    MessageView,
    PresenceState,
    ServerFrame,
    ClientFrame,
} from './shared/types.js';

export { MessageTypes, CloseCodes } from './shared/protocol.js';
