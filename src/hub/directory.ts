// ============================================================
// Team Directory — who belongs to which team, online or not
// ============================================================

import type { UserIdentity } from '../shared/types.js';
import type { ConnectionRegistry } from './registry.js';
import type { UserDirectory } from './types.js';

/**
 * Remembers the team of every identity that ever registered, on top of
 * seeded identities. Anything it has not seen is asked of `fallback`.
 */
export class TeamDirectory implements UserDirectory {
    private teams: Map<string, string> = new Map();
    private fallback?: UserDirectory;

    constructor(seed: readonly UserIdentity[] = [], fallback?: UserDirectory) {
        for (const identity of seed) this.remember(identity);
        this.fallback = fallback;
    }

    remember(identity: Pick<UserIdentity, 'userId' | 'teamId'>): void {
        this.teams.set(identity.userId, identity.teamId);
    }

    teamOf(userId: string): string | undefined {
        return this.teams.get(userId) ?? this.fallback?.teamOf(userId);
    }

    /**
     * Learn teams from registrations. Returns the unsubscribe function.
     */
    follow(registry: ConnectionRegistry): () => void {
        return registry.onMutation((mutation) => {
            if (mutation.type === 'registered') this.remember(mutation.entry);
        });
    }
}
