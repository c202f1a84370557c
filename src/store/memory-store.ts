// ============================================================
// In-memory MessageStore with optional JSON snapshot file
// ============================================================

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { toErrorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import type { PersistedRecord, RecipientSelector, UserIdentity } from '../shared/types.js';
import type { MessageStore, NewRecord, UserDirectory } from '../hub/types.js';

export interface InMemoryStoreOptions {
    /** Records returned per history fetch (most recent N, oldest first) */
    historyLimit?: number;
    /** Snapshot file; loaded at construction, rewritten after every persist */
    stateFile?: string;
    logger?: Logger;
}

const roleSchema = z.enum(['manager', 'worker', 'agent']);

const recipientSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('user'), userId: z.string() }),
    z.object({ type: z.literal('users'), userIds: z.array(z.string()) }),
    z.object({ type: z.literal('role'), role: roleSchema, teamId: z.string() }),
    z.object({ type: z.literal('agent') }),
]);

const snapshotSchema = z.object({
    nextId: z.number().int().positive(),
    records: z.array(z.object({
        id: z.number().int(),
        messageId: z.string().optional(),
        kind: z.enum(['chat', 'incident_alert', 'task_notice', 'agent_response', 'system']),
        senderId: z.string(),
        teamId: z.string(),
        recipient: recipientSchema,
        content: z.string(),
        timestamp: z.string(),
    })),
});

interface Snapshot {
    nextId: number;
    records: PersistedRecord[];
}

export function isVisibleTo(record: PersistedRecord, user: UserIdentity): boolean {
    if (record.senderId === user.userId) return true;
    return isAddressedTo(record.recipient, user);
}

function isAddressedTo(recipient: RecipientSelector, user: UserIdentity): boolean {
    switch (recipient.type) {
        case 'user':
            return recipient.userId === user.userId;
        case 'users':
            return recipient.userIds.includes(user.userId);
        case 'role':
            return recipient.role === user.role && recipient.teamId === user.teamId;
        case 'agent':
            return user.role === 'agent';
    }
}

export class InMemoryMessageStore implements MessageStore, UserDirectory {
    private records: PersistedRecord[] = [];
    private nextId = 1;
    private historyLimit: number;
    private stateFile?: string;
    private logger?: Logger;

    constructor(options: InMemoryStoreOptions = {}) {
        this.historyLimit = options.historyLimit ?? 200;
        this.stateFile = options.stateFile;
        this.logger = options.logger?.child({ component: 'store' });
        this.loadState();
    }

    async persist(record: NewRecord): Promise<PersistedRecord> {
        const stored: PersistedRecord = { ...record, id: this.nextId++ };
        this.records.push(stored);
        try {
            this.saveState();
        } catch (err) {
            this.records.pop();
            this.nextId--;
            throw err;
        }
        return stored;
    }

    async fetchHistory(user: UserIdentity): Promise<PersistedRecord[]> {
        const visible = this.records.filter(r => isVisibleTo(r, user));
        return visible.slice(-this.historyLimit);
    }

    /** Team a user last sent from */
    teamOf(userId: string): string | undefined {
        for (let i = this.records.length - 1; i >= 0; i--) {
            if (this.records[i].senderId === userId) return this.records[i].teamId;
        }
        return undefined;
    }

    get size(): number {
        return this.records.length;
    }

    private loadState(): void {
        if (!this.stateFile || !existsSync(this.stateFile)) return;
        try {
            const raw: unknown = JSON.parse(readFileSync(this.stateFile, 'utf-8'));
            const snapshot = snapshotSchema.parse(raw);
            this.records = snapshot.records;
            this.nextId = snapshot.nextId;
            this.logger?.info({ records: this.records.length, file: this.stateFile }, 'Loaded message snapshot');
        } catch (err) {
            this.logger?.warn({ file: this.stateFile, error: toErrorMessage(err) }, 'Could not load message snapshot, starting empty');
        }
    }

    private saveState(): void {
        if (!this.stateFile) return;
        const dir = dirname(this.stateFile);
        if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
        const snapshot: Snapshot = { nextId: this.nextId, records: this.records };
        writeFileSync(this.stateFile, JSON.stringify(snapshot, null, 2), 'utf-8');
    }
}
