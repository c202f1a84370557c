// ============================================================
// RoutedMessage construction and views
// ============================================================

import { randomUUID } from 'crypto';
import type { MessageView, PersistedRecord, RoutedMessage } from '../shared/types.js';

export type RoutedMessageInit = Omit<RoutedMessage, 'messageId' | 'timestamp'> & {
    messageId?: string;
    timestamp?: string;
};

/**
 * Assign identity and origin time, then freeze. Nothing downstream mutates it.
 */
export function createRoutedMessage(init: RoutedMessageInit): RoutedMessage {
    const recipient = init.recipient.type === 'users'
        ? Object.freeze({ type: 'users' as const, userIds: Object.freeze([...init.recipient.userIds]) })
        : Object.freeze({ ...init.recipient });

    return Object.freeze({
        ...init,
        messageId: init.messageId ?? randomUUID(),
        timestamp: init.timestamp ?? new Date().toISOString(),
        recipient,
        metadata: init.metadata ? Object.freeze({ ...init.metadata }) : undefined,
    });
}

export function viewOfMessage(message: RoutedMessage): MessageView {
    return {
        messageId: message.messageId,
        kind: message.kind,
        senderId: message.senderId,
        teamId: message.teamId,
        recipient: message.recipient,
        content: message.content,
        timestamp: message.timestamp,
    };
}

export function viewOfRecord(record: PersistedRecord): MessageView {
    return {
        messageId: record.messageId,
        recordId: record.id,
        kind: record.kind,
        senderId: record.senderId,
        teamId: record.teamId,
        recipient: record.recipient,
        content: record.content,
        timestamp: record.timestamp,
    };
}

/**
 * Dedup key: the hub-assigned messageId, or the sender/time/content tuple
 * for records that were written without one.
 */
export function identityOf(message: MessageView): string {
    if (message.messageId) return `id:${message.messageId}`;
    return `tuple:${message.senderId}|${message.timestamp}|${message.content}`;
}
