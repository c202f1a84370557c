// ============================================================
// History Reconciler — fetched history + live messages that
// arrived while the fetch was running, as one ordered view
// ============================================================

import { toErrorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import type { MessageView, PersistedRecord, UserIdentity } from '../shared/types.js';
import { identityOf, viewOfRecord } from './messages.js';
import type { ConnectionRegistry } from './registry.js';
import type { Channel, MessageStore } from './types.js';

export interface ReconcilerOptions {
    /** Max messages buffered per connection while history loads */
    bufferLimit?: number;
}

export type ReconcileOutcome =
    | { status: 'synced'; messages: MessageView[]; historyAvailable: boolean }
    | { status: 'abandoned' };

interface PendingSession {
    channel: Channel;
    buffer: MessageView[];
}

/**
 * Merge fetched history with live messages buffered during the fetch.
 * History comes first, ordered by (timestamp, record id). Buffered messages
 * follow in arrival order; a buffered message already present in history
 * is dropped in favour of the stored copy.
 */
export function mergeHistory(history: PersistedRecord[], buffered: MessageView[]): MessageView[] {
    const ordered = [...history].sort((a, b) => {
        if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
        return a.id - b.id;
    });

    const seen = new Set<string>();
    const merged: MessageView[] = [];

    for (const record of ordered) {
        const view = viewOfRecord(record);
        const key = identityOf(view);
        if (seen.has(key)) continue;
        seen.add(key);
        merged.push(view);
    }

    for (const message of buffered) {
        const key = identityOf(message);
        if (seen.has(key)) continue;
        seen.add(key);
        merged.push(message);
    }

    return merged;
}

export class HistoryReconciler {
    private sessions: Map<string, PendingSession> = new Map();
    private store: MessageStore;
    private registry: ConnectionRegistry;
    private bufferLimit: number;
    private logger: Logger;

    constructor(store: MessageStore, registry: ConnectionRegistry, logger: Logger, options: ReconcilerOptions = {}) {
        this.store = store;
        this.registry = registry;
        this.bufferLimit = options.bufferLimit ?? 500;
        this.logger = logger.child({ component: 'reconciler' });
    }

    /**
     * Open the buffer for `channel` and fetch history in the background.
     * The buffer is open by the time this returns; the returned promise
     * settles once the merged view was sent (or discarded). It never rejects.
     */
    start(identity: UserIdentity, channel: Channel): Promise<ReconcileOutcome> {
        const session: PendingSession = { channel, buffer: [] };
        this.sessions.set(identity.userId, session);

        let fetching: Promise<PersistedRecord[]>;
        try {
            fetching = this.store.fetchHistory(identity);
        } catch (err) {
            fetching = Promise.reject(err);
        }

        return fetching.then(
            (history) => this.complete(identity.userId, session, history),
            (err: unknown) => {
                this.logger.warn({ userId: identity.userId, error: toErrorMessage(err) }, 'History fetch failed, serving live messages only');
                return this.complete(identity.userId, session, null);
            },
        );
    }

    /**
     * Buffer `message` if `channel` is still waiting for its history.
     * Returns false when the caller should push it directly.
     */
    intercept(userId: string, channel: Channel, message: MessageView): boolean {
        const session = this.sessions.get(userId);
        if (!session || session.channel !== channel) return false;

        if (session.buffer.length >= this.bufferLimit) {
            const dropped = session.buffer.shift();
            this.logger.warn({ userId, droppedMessageId: dropped?.messageId, limit: this.bufferLimit }, 'History buffer full, dropping oldest live message');
        }
        session.buffer.push(message);
        return true;
    }

    /**
     * Forget the session of a closed channel. A fetch still in flight is discarded.
     */
    cancel(userId: string, channel: Channel): void {
        const session = this.sessions.get(userId);
        if (session && session.channel === channel) {
            this.sessions.delete(userId);
        }
    }

    isPending(userId: string): boolean {
        return this.sessions.has(userId);
    }

    private complete(userId: string, session: PendingSession, history: PersistedRecord[] | null): ReconcileOutcome {
        const current = this.sessions.get(userId) === session
            && this.registry.lookup(userId) === session.channel;
        if (this.sessions.get(userId) === session) {
            this.sessions.delete(userId);
        }
        if (!current) {
            this.logger.debug({ userId, channelId: session.channel.id }, 'Discarding history for a closed connection');
            return { status: 'abandoned' };
        }

        const historyAvailable = history !== null;
        const messages = mergeHistory(history ?? [], session.buffer);

        try {
            session.channel.send({ type: 'history:sync', messages, historyAvailable });
        } catch (err) {
            this.logger.warn({ userId, error: toErrorMessage(err) }, 'Could not send history, dropping connection');
            this.registry.unregister(userId, session.channel);
            return { status: 'abandoned' };
        }

        this.logger.debug({
            userId,
            historyCount: history?.length ?? 0,
            bufferedCount: session.buffer.length,
            merged: messages.length,
            historyAvailable,
        }, 'History reconciled');
        return { status: 'synced', messages, historyAvailable };
    }
}
