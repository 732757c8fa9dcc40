import { setTimeout as delay } from 'timers/promises';
import { logger } from '../config/logger.js';
import type { ApprovalQueue } from '../approvals/queue.js';
import type { AuditLog } from '../audit/audit-log.js';
import type { OperationalAlerter, ReconciliationQueue, ReconciliationReason } from '../audit/reconciliation.js';
import type { AuditSnapshot } from '../audit/types.js';
import type { ConversationMemory } from '../history/conversation-memory.js';
import type { Metrics } from '../metrics/counter.js';
import type { DispatchHandle, NotificationDispatcher } from '../notifications/dispatcher.js';
import { recipientsFor, resolveCareTeam, type StaffingDefaults } from '../patients/care-team.js';
import { summarizeContext } from '../patients/summary.js';
import type { PatientContext, PatientContextProvider } from '../patients/types.js';
import { newId } from '../util/ids.js';
import type { Classifier } from './classifier.js';
import { errorMessage, PolicyInvariantViolation } from './errors.js';
import type { PolicyEngine } from './policy-engine.js';
import type { ResponseComposer } from './response-composer.js';
import {
    maxPriority,
    type Classification,
    type EscalationLevel,
    type NotificationRecord,
    type PatientRequest,
    type PolicyDecision,
    type Priority,
    type ResolutionStatus,
} from './types.js';

export interface BedContext {
    bedId: string;
    /** Recent request texts; read from conversation memory when omitted. */
    history?: readonly string[];
    /**
     * Overrides the priority derived from the decision. Notifications still go
     * out at no less than the escalation's floor.
     */
    priority?: Priority;
}

export interface ProcessResult {
    requestId: string;
    classification: Classification;
    decision: PolicyDecision;
    responseText: string;
    auditId: string | null;
    approvalEntryId: string | null;
    notifications: NotificationRecord[];
    priority: Priority;
    resolutionStatus: ResolutionStatus;
    /** Set when the audit or approval trail needs manual repair. */
    reconciliationRequired: boolean;
}

export interface PipelineOptions {
    /** Budget for classify + evaluate + compose. */
    deadlineMs: number;
    /** How long to wait for notification outcomes before auditing. */
    notifyWaitMs: number;
}

export interface TriageDependencies {
    classifier: Classifier;
    policyEngine: PolicyEngine;
    composer: ResponseComposer;
    dispatcher: NotificationDispatcher;
    approvals: ApprovalQueue;
    auditLog: AuditLog;
    patients: PatientContextProvider;
    memory: ConversationMemory;
    alerter: OperationalAlerter;
    reconciliation: ReconciliationQueue;
    metrics: Metrics;
    staffing: StaffingDefaults;
    options: PipelineOptions;
    now?: () => Date;
}

const ESCALATION_PRIORITY_FLOOR: Readonly<Record<EscalationLevel, Priority>> = {
    NONE: 'LOW',
    NURSE: 'MEDIUM',
    DOCTOR: 'HIGH',
    EMERGENCY: 'CRITICAL',
};

export function priorityFor(classification: Classification, decision: PolicyDecision): Priority {
    return maxPriority(classification.urgencyLevel, ESCALATION_PRIORITY_FLOOR[decision.escalationLevel]);
}

export function resolutionStatusFor(decision: PolicyDecision): ResolutionStatus {
    if (decision.escalationLevel === 'EMERGENCY') return 'ESCALATED';
    if (decision.requiresApproval) return 'PENDING';
    return 'COMPLETED';
}

/**
 * The single entry point for a patient request: classify, decide, respond,
 * route to staff and audit. The audit write is attempted for every request
 * that reaches a decision, whatever happens to notifications or approvals.
 */
export class TriagePipeline {
    private readonly now: () => Date;

    constructor(private deps: TriageDependencies) {
        this.now = deps.now ?? (() => new Date());
    }

    async process(text: string, patientId: string, bed: BedContext): Promise<ProcessResult> {
        const { metrics } = this.deps;
        const receivedAt = this.now();
        const request: PatientRequest = Object.freeze({
            id: newId('REQ'),
            patientId,
            bedId: bed.bedId,
            text,
            receivedAt: receivedAt.toISOString(),
        });
        metrics.incrementReceived();

        const patient = await this.lookupPatient(request);
        const careTeam = resolveCareTeam(patient, this.deps.staffing);
        const history = bed.history ?? this.deps.memory.recentTexts(patientId);

        const { classification, decision, responseText } = this.decide(request, history, receivedAt);

        const priority = bed.priority ?? priorityFor(classification, decision);
        const notifyPriority = maxPriority(priority, ESCALATION_PRIORITY_FLOOR[decision.escalationLevel]);
        if (decision.escalationLevel === 'EMERGENCY') {
            metrics.incrementEmergencies();
        }

        // Notifications and the approval entry proceed side by side
        const dispatch = this.deps.dispatcher.start(
            decision,
            recipientsFor(decision.escalationLevel, careTeam),
            notifyPriority,
            patientId,
        );

        let approvalEntryId: string | null = null;
        let approvalError: string | null = null;
        if (decision.requiresApproval) {
            try {
                const entry = await this.deps.approvals.enqueue(
                    decision,
                    { request, careTeam, contextSummary: summarizeContext(patient, request.bedId, text) },
                    priority,
                );
                approvalEntryId = entry.id;
            } catch (err) {
                approvalError = errorMessage(err);
                logger.error({ request_id: request.id, error: approvalError }, 'Failed to enqueue approval');
            }
        }

        const notifications = await this.settleNotifications(dispatch, request.id);
        const resolutionStatus = resolutionStatusFor(decision);

        const snapshot: AuditSnapshot = {
            request,
            classification,
            decision,
            responseText,
            notifications,
            approvalEntryId,
            resolutionStatus,
        };

        let reconciliationRequired = false;
        if (approvalError !== null) {
            this.park('APPROVAL_ENQUEUE_FAILED', snapshot, approvalError);
            reconciliationRequired = true;
        }

        let auditId: string | null = null;
        try {
            auditId = await this.deps.auditLog.record(snapshot);
        } catch (err) {
            await this.handleAuditFailure(snapshot, err);
            reconciliationRequired = true;
        }

        this.deps.memory.store(patientId, {
            requestId: request.id,
            text,
            intent: classification.intentCategory,
            responseText,
            timestamp: request.receivedAt,
        });
        metrics.incrementProcessed();

        logger.info(
            {
                request_id: request.id,
                patient_id: patientId,
                intent: classification.intentCategory,
                urgency: classification.urgencyLevel,
                distress: classification.distressLevel,
                escalation: decision.escalationLevel,
                requires_approval: decision.requiresApproval,
                policies: decision.applicablePolicies,
                audit_id: auditId,
            },
            'Request triaged',
        );

        return {
            requestId: request.id,
            classification,
            decision,
            responseText,
            auditId,
            approvalEntryId,
            notifications,
            priority,
            resolutionStatus,
            reconciliationRequired,
        };
    }

    private decide(
        request: PatientRequest,
        history: readonly string[],
        receivedAt: Date,
    ): { classification: Classification; decision: PolicyDecision; responseText: string } {
        const { classifier, policyEngine, composer, metrics, options } = this.deps;

        try {
            const classification = classifier.classify(request.text, history);
            const decision = policyEngine.evaluate(classification, { originalText: request.text });
            const responseText = composer.compose(decision, classification, request.text, { now: receivedAt });

            const elapsedMs = this.now().getTime() - receivedAt.getTime();
            if (elapsedMs > options.deadlineMs) {
                // The decision exists; it still has to be routed and audited.
                metrics.incrementDeadlineExceeded();
                logger.warn(
                    { request_id: request.id, elapsed_ms: elapsedMs, deadline_ms: options.deadlineMs },
                    'Triage decision exceeded deadline',
                );
            }

            return { classification, decision, responseText };
        } catch (err) {
            if (err instanceof PolicyInvariantViolation) {
                logger.error(
                    {
                        request,
                        classification: err.classification,
                        decision: err.decision,
                        error: err.message,
                    },
                    'Policy invariant violated, request rejected',
                );
            }
            throw err;
        }
    }

    private async lookupPatient(request: PatientRequest): Promise<PatientContext | null> {
        try {
            const patient = await this.deps.patients.lookup(request.patientId);
            if (!patient) {
                logger.warn(
                    { request_id: request.id, patient_id: request.patientId },
                    'Patient record not found, routing to default staff',
                );
            }
            return patient;
        } catch (err) {
            logger.error(
                { request_id: request.id, patient_id: request.patientId, error: errorMessage(err) },
                'Patient lookup failed, routing to default staff',
            );
            return null;
        }
    }

    /**
     * Wait for the fan-out up to `notifyWaitMs`. Recipients still in flight
     * are audited as RETRYING and their final outcome is logged later.
     */
    private async settleNotifications(dispatch: DispatchHandle, requestId: string): Promise<NotificationRecord[]> {
        const controller = new AbortController();
        const expired = delay(this.deps.options.notifyWaitMs, 'expired' as const, {
            signal: controller.signal,
            ref: false,
        }).catch(() => 'cancelled' as const);

        const winner = await Promise.race([dispatch.done, expired]);
        controller.abort();

        if (typeof winner !== 'string') {
            return winner;
        }

        dispatch.done
            .then((records) => {
                logger.info(
                    {
                        request_id: requestId,
                        outcomes: records.map((r) => ({ recipient_id: r.recipientId, status: r.deliveryStatus })),
                    },
                    'Late notification outcomes',
                );
            })
            .catch((err) => {
                logger.error({ request_id: requestId, error: err }, 'Notification fan-out failed');
            });

        return dispatch.snapshot();
    }

    private async handleAuditFailure(snapshot: AuditSnapshot, err: unknown): Promise<void> {
        const requestId = snapshot.request.id;
        const error = errorMessage(err);

        logger.fatal(
            { request_id: requestId, patient_id: snapshot.request.patientId, error },
            'AUDIT WRITE FAILED - request flagged for manual reconciliation',
        );
        this.park('AUDIT_WRITE_FAILED', snapshot, error);

        try {
            await this.deps.alerter.auditWriteFailed(requestId, error, snapshot);
        } catch (alertErr) {
            logger.fatal(
                { request_id: requestId, error: errorMessage(alertErr) },
                'Operational alert for audit failure could not be raised',
            );
        }
    }

    private park(reason: ReconciliationReason, snapshot: AuditSnapshot, error: string): void {
        this.deps.reconciliation.park({
            reason,
            requestId: snapshot.request.id,
            error,
            parkedAt: this.now().toISOString(),
            snapshot,
        });
    }
}
