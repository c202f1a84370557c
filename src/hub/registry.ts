// ============================================================
// Connection Registry — user → live channel, at most one each
// ============================================================

import { ChannelClosedError, toErrorMessage } from '../shared/errors.js';
import { CloseCodes, CloseReasons } from '../shared/protocol.js';
import type { Logger } from '../shared/logger.js';
import type { Role, UserIdentity } from '../shared/types.js';
import type { Channel, ConnectionEntry, RegistrationResult, RegistryMutation } from './types.js';

type MutationListener = (mutation: RegistryMutation) => void;

/**
 * Single source of truth for "is this user reachable right now".
 *
 * Every method is synchronous, so the event loop is the lock: two
 * registrations for the same user can never interleave.
 */
export class ConnectionRegistry {
    private connections: Map<string, ConnectionEntry> = new Map();
    private listeners: MutationListener[] = [];
    private logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger.child({ component: 'registry' });
    }

    /**
     * Install `channel` as the live connection of `identity.userId`.
     * A previous channel for the same user is closed first.
     */
    register(identity: UserIdentity, channel: Channel): RegistrationResult {
        if (!channel.isOpen()) {
            throw new ChannelClosedError(channel.id);
        }

        const previous = this.connections.get(identity.userId);
        if (previous) {
            // Remove before closing so a synchronous close callback cannot unregister anything
            this.connections.delete(identity.userId);
            this.closeQuietly(previous.channel, CloseCodes.SUPERSEDED, CloseReasons.SUPERSEDED);
        }

        const entry: ConnectionEntry = Object.freeze({
            userId: identity.userId,
            role: identity.role,
            teamId: identity.teamId,
            displayName: identity.displayName,
            channel,
            connectedAt: new Date().toISOString(),
        });
        this.connections.set(identity.userId, entry);

        this.logger.info({
            userId: entry.userId,
            role: entry.role,
            teamId: entry.teamId,
            channelId: channel.id,
            superseded: previous?.channel.id,
        }, previous ? 'Connection superseded' : 'Connection registered');

        this.emit({ type: 'registered', entry, superseded: previous !== undefined });
        return { entry, superseded: previous !== undefined, previous };
    }

    /**
     * Remove the entry for `userId`, but only if it still holds `channel`.
     * Late close callbacks from superseded channels are ignored.
     */
    unregister(userId: string, channel: Channel): boolean {
        const entry = this.connections.get(userId);
        if (!entry || entry.channel !== channel) {
            this.logger.debug({ userId, channelId: channel.id }, 'Ignoring unregister for stale channel');
            return false;
        }

        this.connections.delete(userId);
        this.logger.info({ userId, channelId: channel.id }, 'Connection unregistered');
        this.emit({ type: 'unregistered', entry });
        return true;
    }

    lookup(userId: string): Channel | undefined {
        return this.connections.get(userId)?.channel;
    }

    get(userId: string): ConnectionEntry | undefined {
        return this.connections.get(userId);
    }

    /**
     * Snapshot of everyone connected with `role` in `teamId`.
     */
    allInRoleAndTeam(role: Role, teamId: string): ConnectionEntry[] {
        return Array.from(this.connections.values())
            .filter(e => e.role === role && e.teamId === teamId);
    }

    entries(): ConnectionEntry[] {
        return Array.from(this.connections.values());
    }

    get size(): number {
        return this.connections.size;
    }

    /**
     * Listen for register/unregister. Returns an unsubscribe function.
     */
    onMutation(listener: MutationListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    /**
     * Close every channel and forget all entries (server shutdown).
     */
    closeAll(code: number, reason: string): void {
        for (const entry of this.entries()) {
            this.connections.delete(entry.userId);
            this.closeQuietly(entry.channel, code, reason);
            this.emit({ type: 'unregistered', entry });
        }
    }

    private emit(mutation: RegistryMutation): void {
        for (const listener of this.listeners) {
            try {
                listener(mutation);
            } catch (err) {
                this.logger.error({ err, mutation: mutation.type, userId: mutation.entry.userId }, 'Registry listener failed');
            }
        }
    }

    private closeQuietly(channel: Channel, code: number, reason: string): void {
        try {
            channel.close(code, reason);
        } catch (err) {
            this.logger.warn({ channelId: channel.id, error: toErrorMessage(err) }, 'Channel did not close cleanly');
        }
    }
}
