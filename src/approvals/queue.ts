import { logger } from '../config/logger.js';
import type { Metrics } from '../metrics/counter.js';
import {
    ApprovalNotFoundError,
    ApprovalNotRequiredError,
    InvalidStateError,
} from '../triage/errors.js';
import type { CareTeam, PatientRequest, PolicyDecision, Priority } from '../triage/types.js';
import { newId } from '../util/ids.js';
import type {
    ApprovalOutcome,
    ApprovalQueueEntry,
    ApprovalStore,
    RequestType,
} from './types.js';

export const SLA_MINUTES: Readonly<Record<Priority, number>> = {
    CRITICAL: 5,
    HIGH: 15,
    MEDIUM: 30,
    LOW: 60,
};

export interface ApprovalRequestContext {
    request: PatientRequest;
    careTeam: CareTeam;
    contextSummary: string;
}

export function requestTypeOf(decision: PolicyDecision): RequestType {
    const policies = decision.applicablePolicies;
    if (policies.includes('MEDICATION_REQUEST_NURSE_REQUIRED')) return 'MEDICATION';
    if (policies.includes('MEDICAL_REQUEST_APPROVAL_REQUIRED')) return 'MEDICAL';
    if (policies.includes('DISTRESS_ESCALATION')) return 'DISTRESS';
    return 'GENERAL';
}

export function assignReviewer(requestType: RequestType, priority: Priority, careTeam: CareTeam): string {
    if (requestType === 'MEDICATION') {
        return careTeam.nurseId;
    }
    if (priority === 'CRITICAL') {
        return careTeam.physicianId;
    }
    return careTeam.nurseId;
}

export class ApprovalQueue {
    constructor(
        private store: ApprovalStore,
        private metrics: Metrics,
        private now: () => Date = () => new Date(),
    ) { }

    async enqueue(
        decision: PolicyDecision,
        context: ApprovalRequestContext,
        priority: Priority,
    ): Promise<ApprovalQueueEntry> {
        const { request } = context;
        if (!decision.requiresApproval) {
            throw new ApprovalNotRequiredError(request.id);
        }

        const createdAt = this.now();
        const slaMinutes = SLA_MINUTES[priority];
        const requestType = requestTypeOf(decision);

        const entry: ApprovalQueueEntry = {
            id: newId('APR'),
            requestId: request.id,
            patientId: request.patientId,
            bedId: request.bedId,
            requestType,
            queryText: request.text,
            contextSummary: context.contextSummary,
            status: 'PENDING',
            assignedStaffId: assignReviewer(requestType, priority, context.careTeam),
            priority,
            slaMinutes,
            createdAt: createdAt.toISOString(),
            slaDeadline: new Date(createdAt.getTime() + slaMinutes * 60_000).toISOString(),
            resolvedAt: null,
            resolvedBy: null,
            resolutionNotes: null,
            slaBreachedAt: null,
        };

        await this.store.insert(entry);
        this.metrics.incrementApprovalsEnqueued();

        logger.info(
            {
                approval_id: entry.id,
                request_id: request.id,
                assigned_to: entry.assignedStaffId,
                priority,
                sla_minutes: slaMinutes,
            },
            'Request queued for approval',
        );

        return entry;
    }

    async resolve(
        entryId: string,
        outcome: ApprovalOutcome,
        staffId: string,
        notes?: string,
    ): Promise<ApprovalQueueEntry> {
        const updated = await this.store.updateStatus(entryId, {
            status: outcome,
            resolvedAt: this.now().toISOString(),
            resolvedBy: staffId,
            resolutionNotes: notes ?? null,
        });

        if (updated) {
            this.metrics.incrementApprovalsResolved();
            logger.info({ approval_id: entryId, outcome, staff_id: staffId }, 'Approval resolved');
            return updated;
        }

        const existing = await this.store.get(entryId);
        if (!existing) {
            throw new ApprovalNotFoundError(entryId);
        }

        logger.warn(
            { approval_id: entryId, status: existing.status, outcome, staff_id: staffId },
            'Rejected resolution of non-pending approval',
        );
        throw new InvalidStateError(entryId, existing.status);
    }

    get(entryId: string): Promise<ApprovalQueueEntry | null> {
        return this.store.get(entryId);
    }

    listPending(assignedTo?: string): Promise<ApprovalQueueEntry[]> {
        return this.store.listPending(assignedTo);
    }

    listByPatient(patientId: string): Promise<ApprovalQueueEntry[]> {
        return this.store.listByPatient(patientId);
    }
}
