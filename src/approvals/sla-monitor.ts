import { logger } from '../config/logger.js';
import type { Metrics } from '../metrics/counter.js';
import { errorMessage } from '../triage/errors.js';
import type { ApprovalQueueEntry, ApprovalStore } from './types.js';

export interface SlaBreachHandler {
    handleBreach(entry: ApprovalQueueEntry, overdueMs: number): Promise<void>;
}

/**
 * Periodically scans pending approvals and raises an escalation for each
 * entry past its SLA deadline. Each entry is escalated at most once; an
 * escalation that fails is unflagged and raised again on the next sweep.
 */
export class SlaMonitor {
    private timer: NodeJS.Timeout | null = null;
    private sweeping: Promise<number> | null = null;

    constructor(
        private store: ApprovalStore,
        private handler: SlaBreachHandler,
        private metrics: Metrics,
        private now: () => Date = () => new Date(),
    ) { }

    start(intervalMs: number): void {
        if (this.timer) return;

        this.timer = setInterval(() => {
            this.sweep().catch((err) => {
                logger.error({ error: err }, 'SLA sweep failed');
            });
        }, intervalMs);
        this.timer.unref();

        logger.info({ interval_ms: intervalMs }, 'SLA monitor started');
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
            logger.info('SLA monitor stopped');
        }
    }

    /**
     * Run one sweep and return how many breaches were raised. Overlapping
     * calls share the sweep already in progress.
     */
    sweep(): Promise<number> {
        if (!this.sweeping) {
            this.sweeping = this.runSweep().finally(() => {
                this.sweeping = null;
            });
        }
        return this.sweeping;
    }

    private async runSweep(): Promise<number> {
        const now = this.now();
        const pending = await this.store.listPending();
        let raised = 0;

        for (const entry of pending) {
            const overdueMs = now.getTime() - Date.parse(entry.slaDeadline);
            if (overdueMs <= 0 || entry.slaBreachedAt !== null) {
                continue;
            }

            const breachedAt = now.toISOString();
            const marked = await this.store.markSlaBreached(entry.id, breachedAt);
            if (!marked) {
                continue;
            }

            logger.warn(
                {
                    approval_id: entry.id,
                    assigned_to: entry.assignedStaffId,
                    priority: entry.priority,
                    overdue_ms: overdueMs,
                },
                'Approval SLA breached',
            );

            try {
                await this.handler.handleBreach({ ...entry, slaBreachedAt: breachedAt }, overdueMs);
            } catch (err) {
                await this.store.clearSlaBreached(entry.id, breachedAt);
                logger.error(
                    { approval_id: entry.id, error: errorMessage(err) },
                    'SLA breach escalation failed, will retry on next sweep',
                );
                continue;
            }

            raised++;
            this.metrics.incrementSlaBreaches();
        }

        if (raised > 0) {
            logger.info({ count: raised }, 'SLA sweep raised escalations');
        }

        return raised;
    }
}
