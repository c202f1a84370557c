// ============================================================
// Hub Client — WS client for the agent bridge (and tests)
// ============================================================

import WebSocket from 'ws';
import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import { HubError, isHubErrorCode } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { createNullLogger } from '../shared/logger.js';
import type {
    ClientFrame,
    HistorySyncMessage,
    MessageAckMessage,
    MessageView,
    PresenceState,
    ServerFrame,
    SessionReadyMessage,
} from '../shared/types.js';

const SERVER_FRAME_TYPES: ReadonlySet<string> = new Set([
    'session:ready',
    'history:sync',
    'message:deliver',
    'message:ack',
    'message:error',
    'presence:update',
    'presence:state',
    'hub:error',
    'pong',
]);

export function isServerFrame(value: unknown): value is ServerFrame {
    if (typeof value !== 'object' || value === null || !('type' in value)) return false;
    return typeof value.type === 'string' && SERVER_FRAME_TYPES.has(value.type);
}

export interface HubClientOptions {
    /** ms to wait for an ack or presence answer */
    requestTimeout?: number;
    /** Reconnect after an unexpected close */
    autoReconnect?: boolean;
    reconnectDelay?: number;
    logger?: Logger;
}

interface PendingRequest<T> {
    resolve: (value: T) => void;
    reject: (error: Error) => void;
    timer: ReturnType<typeof setTimeout>;
}

export type HubClientEvents = {
    ready: [SessionReadyMessage];
    history: [HistorySyncMessage];
    message: [MessageView];
    /** A chat addressed to the agent service */
    question: [MessageView];
    presence: [PresenceState];
    'hub:error': [{ code: string; error: string }];
    disconnected: [number];
};

export class HubClient extends EventEmitter<HubClientEvents> {
    private ws: WebSocket | null = null;
    private hubUrl: string;
    private token: string;
    private session: SessionReadyMessage | null = null;
    private pendingAcks: Map<string, PendingRequest<MessageAckMessage>> = new Map();
    private pendingPresence: PendingRequest<PresenceState[]>[] = [];
    private requestTimeout: number;
    private autoReconnect: boolean;
    private reconnectDelay: number;
    private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
    private closing = false;
    private logger: Logger;

    constructor(hubUrl: string, token: string, options: HubClientOptions = {}) {
        super();
        this.hubUrl = hubUrl;
        this.token = token;
        this.requestTimeout = options.requestTimeout ?? 15000;
        this.autoReconnect = options.autoReconnect ?? false;
        this.reconnectDelay = options.reconnectDelay ?? 3000;
        this.logger = (options.logger ?? createNullLogger()).child({ component: 'client' });
    }

    /**
     * Connect and wait for `session:ready`.
     */
    async connect(): Promise<SessionReadyMessage> {
        this.closing = false;
        return new Promise((resolve, reject) => {
            let settled = false;
            const ws = new WebSocket(this.hubUrl, {
                headers: { Authorization: `Bearer ${this.token}` },
            });
            this.ws = ws;

            ws.on('unexpected-response', (_req, res) => {
                settled = true;
                reject(new HubError(`Hub refused connection: HTTP ${res.statusCode}`, 'UNAUTHORIZED'));
                ws.terminate();
            });

            ws.on('message', (raw) => {
                let data: unknown;
                try {
                    data = JSON.parse(raw.toString());
                } catch {
                    this.logger.warn('Invalid JSON from hub');
                    return;
                }
                if (!isServerFrame(data)) return;

                if (data.type === 'session:ready' && !settled) {
                    settled = true;
                    this.session = data;
                    resolve(data);
                }
                this.handleFrame(data);
            });

            ws.on('close', (code) => {
                this.failPending(new HubError(`Connection closed (${code})`, 'CHANNEL_CLOSED'));
                this.emit('disconnected', code);
                if (!settled) {
                    settled = true;
                    reject(new HubError(`Connection closed before session was ready (${code})`, 'CHANNEL_CLOSED'));
                }
                if (!this.closing && this.autoReconnect) {
                    this.logger.warn({ code }, 'Connection to hub lost, reconnecting');
                    this.scheduleReconnect();
                }
            });

            ws.on('error', (err) => {
                this.logger.warn({ error: err.message }, 'WebSocket error');
                if (!settled) {
                    settled = true;
                    reject(err);
                }
            });
        });
    }

    get userId(): string | undefined {
        return this.session?.userId;
    }

    send(frame: ClientFrame): void {
        if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
            throw new HubError('Not connected to the hub', 'CHANNEL_CLOSED');
        }
        this.ws.send(JSON.stringify(frame));
    }

    sendChat(to: string, content: string): Promise<MessageAckMessage> {
        return this.request(clientMessageId => ({ type: 'chat:send', to, content, clientMessageId }));
    }

    askAgent(content: string): Promise<MessageAckMessage> {
        return this.request(clientMessageId => ({ type: 'agent:ask', content, clientMessageId }));
    }

    reportIncident(content: string): Promise<MessageAckMessage> {
        return this.request(clientMessageId => ({ type: 'incident:report', content, clientMessageId }));
    }

    /**
     * Agent service only: answer a worker.
     */
    respond(workerId: string, teamId: string, content: string, notifyManagers = true): Promise<MessageAckMessage> {
        return this.request(clientMessageId => ({
            type: 'agent:respond', workerId, teamId, content, notifyManagers, clientMessageId,
        }));
    }

    queryPresence(userIds: string[]): Promise<PresenceState[]> {
        return new Promise((resolve, reject) => {
            const pending: PendingRequest<PresenceState[]> = {
                resolve,
                reject,
                timer: setTimeout(() => {
                    this.pendingPresence = this.pendingPresence.filter(p => p !== pending);
                    reject(new HubError('Timeout waiting for presence state'));
                }, this.requestTimeout),
            };
            this.pendingPresence.push(pending);
            try {
                this.send({ type: 'presence:query', userIds });
            } catch (err) {
                clearTimeout(pending.timer);
                this.pendingPresence = this.pendingPresence.filter(p => p !== pending);
                reject(err);
            }
        });
    }

    async close(): Promise<void> {
        this.closing = true;
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
        const ws = this.ws;
        if (!ws || ws.readyState === WebSocket.CLOSED) return;
        await new Promise<void>((resolve) => {
            ws.once('close', () => resolve());
            ws.close();
        });
    }

    // --- Private handlers ---

    private request(build: (clientMessageId: string) => ClientFrame): Promise<MessageAckMessage> {
        const clientMessageId = randomUUID();
        return new Promise((resolve, reject) => {
            const timer = setTimeout(() => {
                this.pendingAcks.delete(clientMessageId);
                reject(new HubError(`Timeout waiting for ack of ${clientMessageId}`));
            }, this.requestTimeout);
            this.pendingAcks.set(clientMessageId, { resolve, reject, timer });

            try {
                this.send(build(clientMessageId));
            } catch (err) {
                clearTimeout(timer);
                this.pendingAcks.delete(clientMessageId);
                reject(err);
            }
        });
    }

    private handleFrame(frame: ServerFrame): void {
        switch (frame.type) {
            case 'session:ready':
                this.emit('ready', frame);
                break;

            case 'history:sync':
                this.emit('history', frame);
                break;

            case 'message:deliver':
                this.emit('message', frame.message);
                if (frame.message.kind === 'chat' && frame.message.recipient.type === 'agent') {
                    this.emit('question', frame.message);
                }
                break;

            case 'message:ack': {
                const pending = frame.clientMessageId ? this.pendingAcks.get(frame.clientMessageId) : undefined;
                if (pending && frame.clientMessageId) {
                    clearTimeout(pending.timer);
                    this.pendingAcks.delete(frame.clientMessageId);
                    pending.resolve(frame);
                }
                break;
            }

            case 'message:error': {
                const pending = frame.clientMessageId ? this.pendingAcks.get(frame.clientMessageId) : undefined;
                if (pending && frame.clientMessageId) {
                    clearTimeout(pending.timer);
                    this.pendingAcks.delete(frame.clientMessageId);
                    pending.reject(new HubError(frame.error, isHubErrorCode(frame.code) ? frame.code : 'INTERNAL_ERROR'));
                } else {
                    this.emit('hub:error', { code: frame.code, error: frame.error });
                }
                break;
            }

            case 'presence:update':
                this.emit('presence', frame.presence);
                break;

            case 'presence:state': {
                const pending = this.pendingPresence.shift();
                if (pending) {
                    clearTimeout(pending.timer);
                    pending.resolve(frame.presence);
                }
                break;
            }

            case 'hub:error':
                this.emit('hub:error', { code: frame.code, error: frame.error });
                break;

            case 'pong':
                break;
        }
    }

    private failPending(error: Error): void {
        for (const pending of this.pendingAcks.values()) {
            clearTimeout(pending.timer);
            pending.reject(error);
        }
        this.pendingAcks.clear();
        for (const pending of this.pendingPresence) {
            clearTimeout(pending.timer);
            pending.reject(error);
        }
        this.pendingPresence = [];
    }

    private scheduleReconnect(): void {
        if (this.reconnectTimer) return;
        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            this.connect().catch((err: unknown) => {
                this.logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Reconnect failed');
                this.scheduleReconnect();
            });
        }, this.reconnectDelay);
    }
}
