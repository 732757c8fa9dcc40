import { logger } from '../config/logger.js';
import type { IntentCategory } from '../triage/types.js';

export interface ConversationTurn {
    requestId: string;
    text: string;
    intent: IntentCategory;
    responseText: string;
    timestamp: string;
}

interface PatientHistory {
    patientId: string;
    turns: ConversationTurn[];
    lastUpdated: number;
}

/**
 * Recent requests per patient, used for repeated-request detection.
 * Histories idle for longer than the TTL are evicted.
 */
export class ConversationMemory {
    private histories = new Map<string, PatientHistory>();
    private timer: NodeJS.Timeout | null = null;

    constructor(
        private maxTurns: number,
        private ttlMs: number,
        private clock: () => number = Date.now,
    ) { }

    /**
     * Periodically clean up idle histories
     */
    startCleanupInterval(): void {
        if (this.timer) return;
        this.timer = setInterval(() => {
            this.cleanupStaleHistories();
        }, this.ttlMs);
        this.timer.unref();
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    /**
     * Remove histories that haven't been updated within TTL
     */
    cleanupStaleHistories(): number {
        const now = this.clock();
        const stale: string[] = [];

        for (const [patientId, history] of this.histories.entries()) {
            if (now - history.lastUpdated > this.ttlMs) {
                stale.push(patientId);
            }
        }

        stale.forEach((patientId) => {
            this.histories.delete(patientId);
            logger.debug({ patientId }, 'Evicted idle conversation history');
        });

        if (stale.length > 0) {
            logger.info({ count: stale.length }, 'Cleaned up idle conversation histories');
        }

        return stale.length;
    }

    store(patientId: string, turn: ConversationTurn): void {
        let history = this.histories.get(patientId);

        if (!history) {
            history = { patientId, turns: [], lastUpdated: this.clock() };
            this.histories.set(patientId, history);
        }

        history.turns.push(turn);
        if (history.turns.length > this.maxTurns) {
            history.turns.splice(0, history.turns.length - this.maxTurns);
        }
        history.lastUpdated = this.clock();
    }

    /** Oldest first, at most `limit` turns. */
    recent(patientId: string, limit = this.maxTurns): ConversationTurn[] {
        const history = this.histories.get(patientId);
        if (!history || this.clock() - history.lastUpdated > this.ttlMs) {
            return [];
        }
        return history.turns.slice(-limit);
    }

    recentTexts(patientId: string, limit?: number): string[] {
        return this.recent(patientId, limit).map((turn) => turn.text);
    }

    /**
     * Get current number of tracked patients (for metrics)
     */
    getTrackedPatientsCount(): number {
        return this.histories.size;
    }
}
