// ============================================================
// Inbound frame validation
// ============================================================

import { z } from 'zod';
import type { ClientFrame } from './types.js';

export const MAX_CONTENT_LENGTH = 8000;

const content = z.string().trim().min(1, 'content must not be empty').max(MAX_CONTENT_LENGTH);
const clientMessageId = z.string().min(1).max(128).optional();
const id = z.string().min(1).max(128);

const chatSend = z.object({
    type: z.literal('chat:send'),
    to: id,
    content,
    clientMessageId,
});

const agentAsk = z.object({
    type: z.literal('agent:ask'),
    content,
    clientMessageId,
});

const incidentReport = z.object({
    type: z.literal('incident:report'),
    content,
    clientMessageId,
});

const agentRespond = z.object({
    type: z.literal('agent:respond'),
    workerId: id,
    teamId: id,
    content,
    notifyManagers: z.boolean().optional(),
    clientMessageId,
});

const presenceQuery = z.object({
    type: z.literal('presence:query'),
    userIds: z.array(id).max(500),
});

const ping = z.object({
    type: z.literal('ping'),
});

export const clientFrameSchema: z.ZodType<ClientFrame> = z.discriminatedUnion('type', [
    chatSend,
    agentAsk,
    incidentReport,
    agentRespond,
    presenceQuery,
    ping,
]);

export type FrameParseResult =
    | { ok: true; frame: ClientFrame }
    | { ok: false; error: string };

/**
 * Decode and validate one text frame from a client.
 */
export function parseClientFrame(raw: string): FrameParseResult {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch {
        return { ok: false, error: 'Invalid JSON' };
    }

    const result = clientFrameSchema.safeParse(data);
    if (!result.success) {
        const issue = result.error.issues[0];
        const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        return { ok: false, error: `${path}${issue?.message ?? 'Invalid frame'}` };
    }
    return { ok: true, frame: result.data };
}
