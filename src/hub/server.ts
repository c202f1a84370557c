// ============================================================
// Hub Server — Central WebSocket server
// ============================================================

import type { IncomingMessage } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import { toErrorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { CloseCodes, CloseReasons } from '../shared/protocol.js';
import type { UserIdentity } from '../shared/types.js';
import { WsChannel } from './channel.js';
import { Hub } from './hub.js';
import type { Authenticator, MessageStore, UserDirectory } from './types.js';

export interface HubOptions {
    port: number;
    host?: string;
    authenticator: Authenticator;
    store: MessageStore;
    logger: Logger;
    agentUserId?: string;
    systemSenderId?: string;
    historyBufferLimit?: number;
    directory?: UserDirectory;
    /** 0 disables ping/pong liveness checks */
    heartbeatIntervalMs?: number;
}

export interface HubServer {
    wss: WebSocketServer;
    hub: Hub;
    /** Resolves with the bound port once the server listens */
    listening(): Promise<number>;
    close(): Promise<void>;
}

/**
 * Bearer token from the Authorization header, or `?token=` for browsers
 * that cannot set headers on a WebSocket.
 */
export function extractToken(req: IncomingMessage): string | undefined {
    const header = req.headers.authorization;
    if (header?.startsWith('Bearer ')) {
        const token = header.slice('Bearer '.length).trim();
        if (token) return token;
    }

    const url = new URL(req.url ?? '/', 'http://localhost');
    return url.searchParams.get('token') ?? undefined;
}

export function startHub(options: HubOptions): HubServer {
    const { port, host, authenticator, logger, heartbeatIntervalMs = 30000 } = options;
    const log = logger.child({ component: 'server' });
    const hub = new Hub({
        store: options.store,
        logger,
        agentUserId: options.agentUserId,
        systemSenderId: options.systemSenderId,
        historyBufferLimit: options.historyBufferLimit,
        directory: options.directory,
    });

    // Identities resolved during the upgrade, picked up on 'connection'
    const identities = new WeakMap<IncomingMessage, UserIdentity>();
    const alive = new WeakMap<WebSocket, boolean>();

    const wss = new WebSocketServer({
        port,
        host,
        verifyClient: (
            info: { origin: string; secure: boolean; req: IncomingMessage },
            done: (result: boolean, code?: number, message?: string) => void,
        ) => {
            const token = extractToken(info.req);
            if (!token) {
                log.info({ reason: 'missing_token' }, 'Rejected connection');
                done(false, 401, 'Unauthorized');
                return;
            }

            authenticator.authenticate(token).then(
                (identity) => {
                    identities.set(info.req, identity);
                    done(true);
                },
                (err: unknown) => {
                    log.info({ reason: 'invalid_token', error: toErrorMessage(err) }, 'Rejected connection');
                    done(false, 401, 'Unauthorized');
                },
            );
        },
    });

    wss.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'EADDRINUSE') {
            log.error({ port }, `Port ${port} is already in use`);
        } else {
            log.error({ err }, 'Server error');
        }
    });

    wss.on('listening', () => {
        const address = wss.address();
        const boundPort = typeof address === 'object' ? address.port : port;
        log.info({ port: boundPort }, `Hub server running on ws://${host ?? 'localhost'}:${boundPort}`);
    });

    wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
        const identity = identities.get(req);
        if (!identity) {
            ws.close(CloseCodes.UNAUTHORIZED, CloseReasons.NOT_AUTHORIZED);
            return;
        }
        identities.delete(req);

        const channel = new WsChannel(ws, log);
        const connLog = log.child({ userId: identity.userId, channelId: channel.id });
        alive.set(ws, true);

        ws.on('pong', () => {
            alive.set(ws, true);
        });

        ws.on('message', (raw: RawData, isBinary: boolean) => {
            if (isBinary) {
                connLog.debug('Binary frame ignored');
                return;
            }
            hub.handleFrame(identity.userId, channel, rawToString(raw)).catch((err: unknown) => {
                connLog.error({ err }, 'Unhandled frame error');
            });
        });

        ws.on('close', (code: number) => {
            hub.disconnect(identity.userId, channel);
            connLog.debug({ code }, 'Connection closed');
        });

        ws.on('error', (err: Error) => {
            connLog.warn({ error: err.message }, 'WebSocket error');
        });

        try {
            const { history } = hub.connect(identity, channel);
            history.then(
                (outcome) => connLog.debug({ outcome: outcome.status }, 'Initial history settled'),
                (err: unknown) => connLog.error({ err }, 'History reconciliation crashed'),
            );
        } catch (err) {
            connLog.error({ error: toErrorMessage(err) }, 'Could not register connection');
            ws.terminate();
        }
    });

    let heartbeat: ReturnType<typeof setInterval> | null = null;
    if (heartbeatIntervalMs > 0) {
        heartbeat = setInterval(() => {
            for (const client of wss.clients) {
                if (alive.get(client) === false) {
                    log.info({ reason: CloseReasons.HEARTBEAT_TIMEOUT }, 'Terminating unresponsive connection');
                    client.terminate();
                    continue;
                }
                alive.set(client, false);
                client.ping();
            }
        }, heartbeatIntervalMs);
        heartbeat.unref();
    }

    function listening(): Promise<number> {
        return new Promise((resolve, reject) => {
            const address = wss.address();
            if (address && typeof address === 'object') {
                resolve(address.port);
                return;
            }
            wss.once('listening', () => {
                const bound = wss.address();
                resolve(typeof bound === 'object' ? bound.port : port);
            });
            wss.once('error', reject);
        });
    }

    function close(): Promise<void> {
        if (heartbeat) clearInterval(heartbeat);
        hub.shutdown();
        for (const client of wss.clients) {
            client.terminate();
        }
        return new Promise((resolve, reject) => {
            wss.close((err) => (err ? reject(err) : resolve()));
        });
    }

    return { wss, hub, listening, close };
}

function rawToString(raw: RawData): string {
    if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf-8');
    if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString('utf-8');
    return raw.toString('utf-8');
}
