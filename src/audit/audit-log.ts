import { logger } from '../config/logger.js';
import { SchemaIds, type SchemaValidator } from '../contracts/schema-validator.js';
import type { Metrics } from '../metrics/counter.js';
import { AuditWriteFailure, errorMessage } from '../triage/errors.js';
import { newId } from '../util/ids.js';
import { retryWithBackoff, sleep, RetryExhaustedError } from '../util/retry.js';
import type { AuditRecord, AuditSnapshot, AuditStore } from './types.js';

export interface AuditLogOptions {
    maxAttempts: number;
    baseDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        Object.values(value).forEach(deepFreeze);
    }
    return value;
}

export function toAuditRecord(logId: string, timestamp: string, snapshot: AuditSnapshot): AuditRecord {
    return deepFreeze({
        logId,
        timestamp,
        patientId: snapshot.request.patientId,
        queryText: snapshot.request.text,
        intentCategory: snapshot.classification.intentCategory,
        urgencyLevel: snapshot.classification.urgencyLevel,
        policyDecision: JSON.stringify(snapshot.decision),
        responseText: snapshot.responseText,
        staffNotified: snapshot.notifications
            .filter((n) => n.deliveryStatus !== 'FAILED')
            .map((n) => n.recipientId),
        approvalRequired: snapshot.decision.requiresApproval,
        resolutionStatus: snapshot.resolutionStatus,
        snapshot: structuredClone(snapshot),
    });
}

/**
 * Append-only audit trail. A record that cannot be written after every
 * retry raises AuditWriteFailure, which callers must escalate out of band.
 */
export class AuditLog {
    private readonly now: () => Date;

    constructor(
        private store: AuditStore,
        private validator: SchemaValidator,
        private metrics: Metrics,
        private options: AuditLogOptions,
    ) {
        this.now = options.now ?? (() => new Date());
    }

    async record(snapshot: AuditSnapshot): Promise<string> {
        const record = toAuditRecord(newId('LOG'), this.now().toISOString(), snapshot);
        const requestId = snapshot.request.id;

        const validation = this.validator.validate(SchemaIds.auditRecord, record);
        if (!validation.valid) {
            this.metrics.incrementAuditWriteFailures();
            throw new AuditWriteFailure(requestId, 0, new Error(validation.errors));
        }

        try {
            await retryWithBackoff(() => this.store.insert(record), {
                maxAttempts: this.options.maxAttempts,
                baseDelayMs: this.options.baseDelayMs,
                sleep: this.options.sleep ?? sleep,
                onRetry: (attempt, err, delayMs) => {
                    logger.warn(
                        { log_id: record.logId, request_id: requestId, attempt, delay_ms: delayMs, error: errorMessage(err) },
                        'Audit write failed, retrying',
                    );
                },
            });
        } catch (err) {
            this.metrics.incrementAuditWriteFailures();
            if (err instanceof RetryExhaustedError) {
                throw new AuditWriteFailure(requestId, err.attempts, err.lastError);
            }
            throw new AuditWriteFailure(requestId, this.options.maxAttempts, err);
        }

        this.metrics.incrementAuditRecorded();
        logger.info(
            {
                log_id: record.logId,
                request_id: requestId,
                patient_id: record.patientId,
                intent: record.intentCategory,
                resolution_status: record.resolutionStatus,
            },
            'Audit entry recorded',
        );

        return record.logId;
    }

    get(logId: string): Promise<AuditRecord | null> {
        return this.store.get(logId);
    }

    listByPatient(patientId: string, limit?: number): Promise<AuditRecord[]> {
        return this.store.listByPatient(patientId, limit);
    }
}
