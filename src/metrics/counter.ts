const emptyCounters = () => ({
    received: 0,
    processed: 0,
    dropped_invalid: 0,
    dropped_publish_fail: 0,
    emergencies: 0,
    approvals_enqueued: 0,
    approvals_resolved: 0,
    sla_breaches: 0,
    notifications_sent: 0,
    notifications_failed: 0,
    audit_recorded: 0,
    audit_write_failures: 0,
    deadline_exceeded: 0,
});

export type Counters = ReturnType<typeof emptyCounters>;

export class Metrics {
    private counters: Counters = emptyCounters();

    incrementReceived(): void {
        this.counters.received++;
    }

    incrementProcessed(): void {
        this.counters.processed++;
    }

    incrementDroppedInvalid(): void {
        this.counters.dropped_invalid++;
    }

    incrementDroppedPublishFail(): void {
        this.counters.dropped_publish_fail++;
    }

    incrementEmergencies(): void {
        this.counters.emergencies++;
    }

    incrementApprovalsEnqueued(): void {
        this.counters.approvals_enqueued++;
    }

    incrementApprovalsResolved(): void {
        this.counters.approvals_resolved++;
    }

    incrementSlaBreaches(): void {
        this.counters.sla_breaches++;
    }

    incrementNotificationsSent(): void {
        this.counters.notifications_sent++;
    }

    incrementNotificationsFailed(): void {
        this.counters.notifications_failed++;
    }

    incrementAuditRecorded(): void {
        this.counters.audit_recorded++;
    }

    incrementAuditWriteFailures(): void {
        this.counters.audit_write_failures++;
    }

    incrementDeadlineExceeded(): void {
        this.counters.deadline_exceeded++;
    }

    getCounters(): Counters {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = emptyCounters();
    }
}
