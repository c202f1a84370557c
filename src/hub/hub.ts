// ============================================================
// Hub — registry, presence, reconciliation and routing wired
// together, plus the inbound frame dispatcher
// ============================================================

import { errorCodeOf, toErrorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { CloseCodes, CloseReasons } from '../shared/protocol.js';
import { parseClientFrame } from '../shared/schemas.js';
import type { ClientFrame, RoutedMessage, ServerFrame, UserIdentity } from '../shared/types.js';
import { createRoutedMessage } from './messages.js';
import type { RoutedMessageInit } from './messages.js';
import { TeamDirectory } from './directory.js';
import { PresenceTracker } from './presence.js';
import { HistoryReconciler } from './reconciler.js';
import type { ReconcileOutcome } from './reconciler.js';
import { ConnectionRegistry } from './registry.js';
import { MessageRouter } from './router.js';
import type { RouteResult } from './router.js';
import type { Channel, ConnectionEntry, MessageStore, UserDirectory } from './types.js';

export interface HubCoreOptions {
    store: MessageStore;
    logger: Logger;
    agentUserId?: string;
    /** Sender id stamped on hub-originated system notices */
    systemSenderId?: string;
    historyBufferLimit?: number;
    /** Consulted for offline recipients the hub has not seen connect */
    directory?: UserDirectory;
}

export interface ConnectResult {
    entry: ConnectionEntry;
    superseded: boolean;
    /** Settles once the initial history was sent or discarded; never rejects */
    history: Promise<ReconcileOutcome>;
}

export interface IncidentEvent {
    reporterId: string;
    teamId: string;
    content: string;
}

export interface TaskAssignedEvent {
    creatorId: string;
    teamId: string;
    assigneeIds: string[];
    content: string;
    taskId?: string;
}

export interface PermissionUpdateEvent {
    approverId: string;
    teamId: string;
    workerId: string;
    content: string;
    requestId?: string;
}

export interface SystemNoticeEvent {
    teamId: string;
    userIds: string[];
    content: string;
}

export class Hub {
    readonly registry: ConnectionRegistry;
    readonly presence: PresenceTracker;
    readonly reconciler: HistoryReconciler;
    readonly router: MessageRouter;
    readonly directory: TeamDirectory;
    readonly agentUserId: string;
    private systemSenderId: string;
    private logger: Logger;

    constructor(options: HubCoreOptions) {
        this.logger = options.logger.child({ component: 'hub' });
        this.agentUserId = options.agentUserId ?? 'workhub-agent';
        this.systemSenderId = options.systemSenderId ?? 'system';

        this.registry = new ConnectionRegistry(options.logger);
        this.directory = new TeamDirectory([], options.directory);
        this.directory.follow(this.registry);
        this.presence = new PresenceTracker(this.registry, options.logger);
        this.reconciler = new HistoryReconciler(options.store, this.registry, options.logger, {
            bufferLimit: options.historyBufferLimit,
        });
        this.router = new MessageRouter(this.registry, options.store, this.reconciler, options.logger, {
            agentUserId: this.agentUserId,
            directory: this.directory,
        });

        this.registry.onMutation((mutation) => {
            if (mutation.type === 'unregistered') {
                this.reconciler.cancel(mutation.entry.userId, mutation.entry.channel);
            }
        });

        // Dashboards: managers of the team see workers come and go
        this.presence.onPresenceChange((presence, entry) => {
            for (const manager of this.registry.allInRoleAndTeam('manager', entry.teamId)) {
                if (manager.userId === entry.userId) continue;
                this.sendTo(manager, { type: 'presence:update', presence });
            }
        });
    }

    /**
     * Register an authenticated connection and start loading its history.
     * Returns without waiting for the history fetch.
     */
    connect(identity: UserIdentity, channel: Channel): ConnectResult {
        const { entry, superseded } = this.registry.register(identity, channel);

        this.sendTo(entry, {
            type: 'session:ready',
            userId: entry.userId,
            role: entry.role,
            teamId: entry.teamId,
            superseded,
        });

        const history = this.reconciler.start(identity, channel);
        return { entry, superseded, history };
    }

    disconnect(userId: string, channel: Channel): boolean {
        return this.registry.unregister(userId, channel);
    }

    /**
     * Handle one raw text frame from `channel`. Never rejects; failures
     * become `message:error` / `hub:error` frames for the sender.
     */
    async handleFrame(userId: string, channel: Channel, raw: string): Promise<void> {
        const entry = this.registry.get(userId);
        if (!entry || entry.channel !== channel) {
            this.logger.debug({ userId, channelId: channel.id }, 'Frame from an unregistered channel ignored');
            return;
        }

        const parsed = parseClientFrame(raw);
        if (!parsed.ok) {
            this.sendTo(entry, { type: 'hub:error', code: 'INVALID_FRAME', error: parsed.error });
            return;
        }

        try {
            await this.dispatch(entry, parsed.frame);
        } catch (err) {
            this.logger.error({ err, userId, frame: parsed.frame.type }, 'Frame handler failed');
            this.sendTo(entry, { type: 'hub:error', code: errorCodeOf(err), error: toErrorMessage(err) });
        }
    }

    /**
     * Route a message built elsewhere (HTTP handlers, jobs). Rejections reach the caller.
     */
    route(message: RoutedMessage): Promise<RouteResult> {
        return this.router.route(message);
    }

    notifyIncident(event: IncidentEvent): Promise<RouteResult> {
        return this.route(createRoutedMessage({
            kind: 'incident_alert',
            senderId: event.reporterId,
            teamId: event.teamId,
            recipient: { type: 'role', role: 'manager', teamId: event.teamId },
            content: event.content,
        }));
    }

    notifyTaskAssigned(event: TaskAssignedEvent): Promise<RouteResult> {
        return this.route(createRoutedMessage({
            kind: 'task_notice',
            senderId: event.creatorId,
            teamId: event.teamId,
            recipient: { type: 'users', userIds: event.assigneeIds },
            content: event.content,
            metadata: event.taskId ? { taskId: event.taskId } : undefined,
        }));
    }

    notifyPermissionUpdate(event: PermissionUpdateEvent): Promise<RouteResult> {
        return this.route(createRoutedMessage({
            kind: 'system',
            senderId: event.approverId,
            teamId: event.teamId,
            recipient: { type: 'user', userId: event.workerId },
            content: event.content,
            metadata: event.requestId ? { permissionRequestId: event.requestId } : undefined,
        }));
    }

    notifySystem(event: SystemNoticeEvent): Promise<RouteResult> {
        return this.route(createRoutedMessage({
            kind: 'system',
            senderId: this.systemSenderId,
            teamId: event.teamId,
            recipient: { type: 'users', userIds: event.userIds },
            content: event.content,
        }));
    }

    /**
     * Close every connection (server shutdown).
     */
    shutdown(): void {
        this.presence.dispose();
        this.registry.closeAll(CloseCodes.SERVER_SHUTDOWN, CloseReasons.SERVER_SHUTDOWN);
    }

    private async dispatch(entry: ConnectionEntry, frame: ClientFrame): Promise<void> {
        switch (frame.type) {
            case 'chat:send':
                await this.routeFor(entry, frame.clientMessageId, {
                    kind: 'chat',
                    senderId: entry.userId,
                    teamId: entry.teamId,
                    recipient: frame.to === this.agentUserId
                        ? { type: 'agent' }
                        : { type: 'user', userId: frame.to },
                    content: frame.content,
                });
                break;

            case 'agent:ask':
                if (entry.role === 'agent') {
                    this.reject(entry, frame.clientMessageId, 'The agent cannot ask itself');
                    break;
                }
                await this.routeFor(entry, frame.clientMessageId, {
                    kind: 'chat',
                    senderId: entry.userId,
                    teamId: entry.teamId,
                    recipient: { type: 'agent' },
                    content: frame.content,
                });
                break;

            case 'incident:report':
                if (entry.role === 'agent') {
                    this.reject(entry, frame.clientMessageId, 'Only team members can report incidents');
                    break;
                }
                await this.routeFor(entry, frame.clientMessageId, {
                    kind: 'incident_alert',
                    senderId: entry.userId,
                    teamId: entry.teamId,
                    recipient: { type: 'role', role: 'manager', teamId: entry.teamId },
                    content: frame.content,
                });
                break;

            case 'agent:respond':
                if (entry.role !== 'agent') {
                    this.reject(entry, frame.clientMessageId, 'Only the agent service can send agent responses');
                    break;
                }
                await this.routeFor(entry, frame.clientMessageId, {
                    kind: 'agent_response',
                    senderId: entry.userId,
                    teamId: frame.teamId,
                    recipient: { type: 'user', userId: frame.workerId },
                    content: frame.content,
                    notifyManagers: frame.notifyManagers ?? true,
                });
                break;

            case 'presence:query':
                this.sendTo(entry, {
                    type: 'presence:state',
                    presence: frame.userIds.map(id => this.presence.getPresence(id)),
                });
                break;

            case 'ping':
                this.sendTo(entry, { type: 'pong' });
                break;
        }
    }

    private async routeFor(
        entry: ConnectionEntry,
        clientMessageId: string | undefined,
        init: RoutedMessageInit,
    ): Promise<void> {
        const message = createRoutedMessage(init);
        try {
            const result = await this.router.route(message);
            this.sendTo(entry, {
                type: 'message:ack',
                clientMessageId,
                messageId: result.messageId,
                recordIds: result.records.map(r => r.id),
                delivered: result.delivered,
            });
        } catch (err) {
            this.logger.warn({ userId: entry.userId, messageId: message.messageId, error: toErrorMessage(err) }, 'Message not routed');
            this.sendTo(entry, {
                type: 'message:error',
                clientMessageId,
                messageId: message.messageId,
                code: errorCodeOf(err),
                error: toErrorMessage(err),
            });
        }
    }

    private reject(entry: ConnectionEntry, clientMessageId: string | undefined, error: string): void {
        this.sendTo(entry, { type: 'message:error', clientMessageId, code: 'FORBIDDEN', error });
    }

    /**
     * Push a control frame. A failing channel is unregistered.
     */
    private sendTo(entry: ConnectionEntry, frame: ServerFrame): void {
        try {
            entry.channel.send(frame);
        } catch (err) {
            this.logger.warn({ userId: entry.userId, frame: frame.type, error: toErrorMessage(err) }, 'Send failed, dropping connection');
            this.registry.unregister(entry.userId, entry.channel);
        }
    }
}
