// ============================================================
// Test doubles: in-process channel and message store
// ============================================================

import { ChannelClosedError } from '../../src/shared/errors.js';
import type { PersistedRecord, ServerFrame, UserIdentity } from '../../src/shared/types.js';
import type { Channel, MessageStore, NewRecord } from '../../src/hub/types.js';
import { TeamDirectory } from '../../src/hub/directory.js';

export interface Deferred<T> {
    promise: Promise<T>;
    resolve(value: T): void;
    reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => {};
    let reject: (error: unknown) => void = () => {};
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

export type FrameOf<T extends ServerFrame['type']> = Extract<ServerFrame, { type: T }>;

export class FakeChannel implements Channel {
    readonly id: string;
    frames: ServerFrame[] = [];
    closedWith: { code?: number; reason?: string } | undefined;
    /** Throw on the next sends, like a socket whose write failed */
    failSends = false;
    /** Throw from close, after the channel has gone */
    failClose = false;
    private open = true;

    constructor(id: string) {
        this.id = id;
    }

    isOpen(): boolean {
        return this.open;
    }

    send(frame: ServerFrame): void {
        if (!this.open) throw new ChannelClosedError(this.id);
        if (this.failSends) throw new Error('write EPIPE');
        this.frames.push(frame);
    }

    close(code?: number, reason?: string): void {
        this.open = false;
        this.closedWith = { code, reason };
        if (this.failClose) throw new Error('socket already destroyed');
    }

    ofType<T extends ServerFrame['type']>(type: T): FrameOf<T>[] {
        return this.frames.filter((f): f is FrameOf<T> => f.type === type);
    }

    /** Contents of every message:deliver frame, in order */
    delivered(): string[] {
        return this.ofType('message:deliver').map(f => f.message.content);
    }
}

export class FakeStore implements MessageStore {
    records: PersistedRecord[] = [];
    /** What fetchHistory resolves with when no fetch is deferred */
    history: PersistedRecord[] = [];
    failPersist: Error | null = null;
    failFetch: Error | null = null;
    fetchedFor: UserIdentity[] = [];
    private nextId = 1;
    private deferredFetches: Deferred<PersistedRecord[]>[] = [];

    /** The next fetchHistory call waits on the returned handle */
    deferFetch(): Deferred<PersistedRecord[]> {
        const d = deferred<PersistedRecord[]>();
        this.deferredFetches.push(d);
        return d;
    }

    async persist(record: NewRecord): Promise<PersistedRecord> {
        if (this.failPersist) throw this.failPersist;
        const stored: PersistedRecord = { ...record, id: this.nextId++ };
        this.records.push(stored);
        return stored;
    }

    fetchHistory(user: UserIdentity): Promise<PersistedRecord[]> {
        this.fetchedFor.push(user);
        const pending = this.deferredFetches.shift();
        if (pending) return pending.promise;
        if (this.failFetch) return Promise.reject(this.failFetch);
        return Promise.resolve(this.history);
    }
}

export function record(id: number, overrides: Partial<PersistedRecord> = {}): PersistedRecord {
    return {
        id,
        messageId: `m-${id}`,
        kind: 'chat',
        senderId: 'w1',
        teamId: 't1',
        recipient: { type: 'user', userId: 'w2' },
        content: `message ${id}`,
        timestamp: `2024-05-01T10:00:0${id}.000Z`,
        ...overrides,
    };
}

/** Let queued promise callbacks run */
export function flush(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve));
}

export const worker1: UserIdentity = { userId: 'w1', role: 'worker', teamId: 't1' };
export const worker2: UserIdentity = { userId: 'w2', role: 'worker', teamId: 't1' };
export const manager1: UserIdentity = { userId: 'm1', role: 'manager', teamId: 't1' };
export const manager2: UserIdentity = { userId: 'm2', role: 'manager', teamId: 't1' };
export const outsider: UserIdentity = { userId: 'x1', role: 'worker', teamId: 't2' };
export const otherManager: UserIdentity = { userId: 'm9', role: 'manager', teamId: 't2' };
export const agent: UserIdentity = { userId: 'workhub-agent', role: 'agent', teamId: 'global' };

/** Directory that knows every identity above, connected or not */
export function roster(): TeamDirectory {
    return new TeamDirectory([worker1, worker2, manager1, manager2, outsider, otherManager, agent]);
}
