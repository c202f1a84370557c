// ============================================================
// Pending Questions — worker questions awaiting an agent reply
// ============================================================

import type { MessageView } from '../shared/types.js';

export interface PendingQuestion {
    messageId?: string;
    workerId: string;
    teamId: string;
    content: string;
    receivedAt: string;
}

/**
 * Oldest first. A worker may have several open questions; a reply
 * resolves the oldest one.
 */
export class PendingQuestions {
    private questions: PendingQuestion[] = [];
    private limit: number;

    constructor(limit = 100) {
        this.limit = limit;
    }

    add(message: MessageView, receivedAt: string = new Date().toISOString()): PendingQuestion {
        const question: PendingQuestion = {
            messageId: message.messageId,
            workerId: message.senderId,
            teamId: message.teamId,
            content: message.content,
            receivedAt,
        };
        this.questions.push(question);
        if (this.questions.length > this.limit) {
            this.questions.shift();
        }
        return question;
    }

    list(): PendingQuestion[] {
        return [...this.questions];
    }

    forWorker(workerId: string): PendingQuestion | undefined {
        return this.questions.find(q => q.workerId === workerId);
    }

    /** Remove the oldest question of `workerId` */
    resolve(workerId: string): PendingQuestion | undefined {
        const index = this.questions.findIndex(q => q.workerId === workerId);
        if (index === -1) return undefined;
        const [question] = this.questions.splice(index, 1);
        return question;
    }

    get size(): number {
        return this.questions.length;
    }
}
