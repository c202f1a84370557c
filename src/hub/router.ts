// ============================================================
// Message Router — routes messages to live channels and the store
// ============================================================

import { PersistenceError, RoutingError, toErrorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import type { MessageView, PersistedRecord, RecipientSelector, RoutedMessage } from '../shared/types.js';
import { viewOfMessage } from './messages.js';
import type { ConnectionRegistry } from './registry.js';
import type { Channel, ConnectionEntry, MessageStore, NewRecord, UserDirectory } from './types.js';

/**
 * Gets first look at every live push. Returning true means the message was
 * taken (buffered) and must not be sent to the channel now.
 */
export interface DeliveryGate {
    intercept(userId: string, channel: Channel, message: MessageView): boolean;
}

export interface RouterOptions {
    /** User id of the external agent service pseudo-user */
    agentUserId: string;
    /** Teams of recipients who are not connected */
    directory: UserDirectory;
}

export interface RouteResult {
    messageId: string;
    /** Users the message was pushed (or handed to a history buffer) for */
    delivered: string[];
    records: PersistedRecord[];
}

interface RoutePlan {
    live: ConnectionEntry[];
    records: NewRecord[];
}

export class MessageRouter {
    private registry: ConnectionRegistry;
    private store: MessageStore;
    private gate: DeliveryGate;
    private agentUserId: string;
    private directory: UserDirectory;
    private logger: Logger;

    constructor(registry: ConnectionRegistry, store: MessageStore, gate: DeliveryGate, logger: Logger, options: RouterOptions) {
        this.registry = registry;
        this.store = store;
        this.gate = gate;
        this.agentUserId = options.agentUserId;
        this.directory = options.directory;
        this.logger = logger.child({ component: 'router' });
    }

    /**
     * Push to every connected recipient, then persist.
     *
     * Pushes happen before the first await, so per recipient the delivery
     * order is the order of `route` calls. A storage failure rejects with
     * PersistenceError; pushes already made stand.
     */
    async route(message: RoutedMessage): Promise<RouteResult> {
        const plan = this.plan(message);
        const delivered = this.pushAll(plan.live, viewOfMessage(message));

        let records: PersistedRecord[];
        try {
            records = await Promise.all(plan.records.map(r => this.store.persist(r)));
        } catch (err) {
            this.logger.error({ messageId: message.messageId, kind: message.kind, delivered, error: toErrorMessage(err) }, 'Message persistence failed');
            throw new PersistenceError(message.messageId, delivered, err);
        }

        this.logger.debug({
            messageId: message.messageId,
            kind: message.kind,
            from: message.senderId,
            delivered,
            stored: records.length,
        }, 'Message routed');
        return { messageId: message.messageId, delivered, records };
    }

    private plan(message: RoutedMessage): RoutePlan {
        switch (message.kind) {
            case 'chat':
                return this.planChat(message);
            case 'incident_alert':
                return this.planIncidentAlert(message);
            case 'task_notice':
            case 'system':
                return this.planPerRecipient(message);
            case 'agent_response':
                return this.planAgentResponse(message);
            default:
                return assertNever(message.kind);
        }
    }

    private planChat(message: RoutedMessage): RoutePlan {
        const { recipient } = message;

        if (recipient.type === 'agent' || (recipient.type === 'user' && recipient.userId === this.agentUserId)) {
            const agent = this.registry.get(this.agentUserId);
            return {
                live: agent ? [agent] : [],
                records: [this.recordFor(message, { type: 'agent' })],
            };
        }

        if (recipient.type !== 'user') {
            throw new RoutingError(`chat must target a single user or the agent, got "${recipient.type}"`);
        }
        if (recipient.userId === message.senderId) {
            throw new RoutingError('Cannot send a chat message to yourself');
        }

        const target = this.directTarget(message, recipient.userId);
        return {
            live: target ? [target] : [],
            records: [this.recordFor(message, recipient)],
        };
    }

    private planIncidentAlert(message: RoutedMessage): RoutePlan {
        const { recipient } = message;
        if (recipient.type !== 'role' || recipient.role !== 'manager' || recipient.teamId !== message.teamId) {
            throw new RoutingError('incident_alert must target the managers of the sender\'s team');
        }

        const managers = this.registry
            .allInRoleAndTeam('manager', message.teamId)
            .filter(m => m.userId !== message.senderId);

        // One team-scoped record; every manager of the team sees it in history
        return {
            live: managers,
            records: [this.recordFor(message, recipient)],
        };
    }

    private planPerRecipient(message: RoutedMessage): RoutePlan {
        const userIds = this.explicitRecipients(message);
        const live: ConnectionEntry[] = [];
        for (const userId of userIds) {
            const target = this.directTarget(message, userId);
            if (target) live.push(target);
        }
        return {
            live,
            records: userIds.map(userId => this.recordFor(message, { type: 'user', userId })),
        };
    }

    private planAgentResponse(message: RoutedMessage): RoutePlan {
        const { recipient } = message;
        if (recipient.type !== 'user') {
            throw new RoutingError('agent_response must target the worker who asked');
        }

        if (recipient.userId === this.agentUserId) {
            throw new RoutingError('agent_response cannot target the agent');
        }

        // directTarget pins message.teamId to the worker's own team
        const live: ConnectionEntry[] = [];
        const worker = this.directTarget(message, recipient.userId);
        if (worker) live.push(worker);

        if (message.notifyManagers) {
            live.push(...this.registry.allInRoleAndTeam('manager', message.teamId));
        }

        // Stored as chat; only the live push carries agent_response
        return {
            live,
            records: [{ ...this.recordFor(message, recipient), kind: 'chat' }],
        };
    }

    private explicitRecipients(message: RoutedMessage): string[] {
        const { recipient } = message;
        let userIds: readonly string[];
        if (recipient.type === 'user') {
            userIds = [recipient.userId];
        } else if (recipient.type === 'users') {
            userIds = recipient.userIds;
        } else {
            throw new RoutingError(`${message.kind} must target explicit users, got "${recipient.type}"`);
        }

        const unique = Array.from(new Set(userIds));
        if (unique.length === 0) {
            throw new RoutingError(`${message.kind} has no recipients`);
        }
        return unique;
    }

    /**
     * Connected entry for a direct recipient, if any. The recipient must be
     * in `message.teamId` whether online or not; the agent pseudo-user
     * serves every team.
     */
    private directTarget(message: RoutedMessage, userId: string): ConnectionEntry | undefined {
        const target = this.registry.get(userId);
        if (target?.role === 'agent' || userId === this.agentUserId) return target;

        const teamId = target?.teamId ?? this.directory.teamOf(userId);
        if (teamId === undefined) {
            throw new RoutingError(`Unknown recipient "${userId}"`);
        }
        if (teamId !== message.teamId) {
            throw new RoutingError(`User "${userId}" is not in team "${message.teamId}"`, 'CROSS_TEAM');
        }
        return target;
    }

    private recordFor(message: RoutedMessage, recipient: RecipientSelector): NewRecord {
        return {
            messageId: message.messageId,
            kind: message.kind,
            senderId: message.senderId,
            teamId: message.teamId,
            recipient,
            content: message.content,
            timestamp: message.timestamp,
        };
    }

    private pushAll(entries: ConnectionEntry[], view: MessageView): string[] {
        const delivered: string[] = [];
        const seen = new Set<string>();

        for (const entry of entries) {
            if (seen.has(entry.userId)) continue;
            seen.add(entry.userId);

            if (this.gate.intercept(entry.userId, entry.channel, view)) {
                delivered.push(entry.userId);
                continue;
            }

            try {
                entry.channel.send({ type: 'message:deliver', message: view });
                delivered.push(entry.userId);
            } catch (err) {
                // Transport failure is a disconnect, not a routing error
                this.logger.warn({ userId: entry.userId, channelId: entry.channel.id, error: toErrorMessage(err) }, 'Live push failed, dropping connection');
                this.registry.unregister(entry.userId, entry.channel);
            }
        }

        return delivered;
    }
}

function assertNever(kind: never): never {
    throw new RoutingError(`Unknown message kind: ${String(kind)}`);
}
