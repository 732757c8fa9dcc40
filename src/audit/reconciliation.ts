import type { AuditSnapshot } from './types.js';

export type ReconciliationReason = 'AUDIT_WRITE_FAILED' | 'APPROVAL_ENQUEUE_FAILED';

export interface ReconciliationItem {
    reason: ReconciliationReason;
    requestId: string;
    error: string;
    parkedAt: string;
    snapshot: AuditSnapshot;
}

/** Requests that need a human to reconcile the audit or approval trail. */
export class ReconciliationQueue {
    private items: ReconciliationItem[] = [];

    park(item: ReconciliationItem): void {
        this.items.push(item);
    }

    list(): readonly ReconciliationItem[] {
        return [...this.items];
    }

    size(): number {
        return this.items.length;
    }
}

/** Out-of-band alerting for faults that must reach operations staff. */
export interface OperationalAlerter {
    auditWriteFailed(requestId: string, error: string, snapshot: AuditSnapshot): Promise<void>;
}
