// ============================================================
// Presence Tracker — read-through Online/Offline view
// ============================================================

import type { Logger } from '../shared/logger.js';
import type { PresenceState } from '../shared/types.js';
import type { ConnectionEntry, RegistryMutation } from './types.js';
import type { ConnectionRegistry } from './registry.js';

export type PresenceListener = (presence: PresenceState, entry: ConnectionEntry) => void;

/**
 * Status always comes from the registry. The tracker only remembers when
 * each user last flipped, and tells listeners about real transitions.
 */
export class PresenceTracker {
    private registry: ConnectionRegistry;
    private transitions: Map<string, string> = new Map();
    private listeners: PresenceListener[] = [];
    private logger: Logger;
    private detach: () => void;

    constructor(registry: ConnectionRegistry, logger: Logger) {
        this.registry = registry;
        this.logger = logger.child({ component: 'presence' });
        this.detach = registry.onMutation(m => this.handleMutation(m));
    }

    isOnline(userId: string): boolean {
        return this.registry.lookup(userId) !== undefined;
    }

    getPresence(userId: string): PresenceState {
        return {
            userId,
            status: this.isOnline(userId) ? 'online' : 'offline',
            lastTransitionAt: this.transitions.get(userId),
        };
    }

    /**
     * Called synchronously on every Online↔Offline change.
     */
    onPresenceChange(listener: PresenceListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    dispose(): void {
        this.detach();
        this.listeners = [];
    }

    private handleMutation(mutation: RegistryMutation): void {
        // Supersession keeps the user online
        if (mutation.type === 'registered' && mutation.superseded) return;

        const { entry } = mutation;
        this.transitions.set(entry.userId, new Date().toISOString());
        const presence = this.getPresence(entry.userId);
        this.logger.debug({ userId: entry.userId, status: presence.status }, 'Presence changed');

        for (const listener of this.listeners) {
            try {
                listener(presence, entry);
            } catch (err) {
                this.logger.error({ err, userId: entry.userId }, 'Presence listener failed');
            }
        }
    }
}
