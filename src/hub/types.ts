// ============================================================
// Hub-specific Types
// ============================================================

import type { PersistedRecord, ServerFrame, UserIdentity } from '../shared/types.js';

export type NewRecord = Omit<PersistedRecord, 'id'>;

/**
 * An open duplex transport handle for one connection.
 * `send` is synchronous and throws ChannelClosedError once the transport is gone.
 */
export interface Channel {
    readonly id: string;
    isOpen(): boolean;
    send(frame: ServerFrame): void;
    close(code?: number, reason?: string): void;
}

/**
 * A registered user with the channel the registry owns for them.
 */
export interface ConnectionEntry extends UserIdentity {
    readonly channel: Channel;
    readonly connectedAt: string;
}

export interface RegistrationResult {
    entry: ConnectionEntry;
    superseded: boolean;
    previous?: ConnectionEntry;
}

export type RegistryMutation =
    | { type: 'registered'; entry: ConnectionEntry; superseded: boolean }
    | { type: 'unregistered'; entry: ConnectionEntry };

// --- Collaborators ---

/**
 * Durable message storage. Implemented outside the hub; InMemoryMessageStore
 * is the stand-alone default.
 */
export interface MessageStore {
    /** Store one record and return it with its sequence id. */
    persist(record: NewRecord): Promise<PersistedRecord>;
    /** Records visible to `user`, oldest first. */
    fetchHistory(user: UserIdentity): Promise<PersistedRecord[]>;
}

/**
 * Team membership for users who may be offline. Lookups are synchronous so the
 * router can check recipients before its first await.
 */
export interface UserDirectory {
    teamOf(userId: string): string | undefined;
}

export interface Authenticator {
    authenticate(token: string): Promise<UserIdentity>;
}
