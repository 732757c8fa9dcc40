import { logger } from '../config/logger.js';
import type { ApprovalQueueEntry } from '../approvals/types.js';
import type { SlaBreachHandler } from '../approvals/sla-monitor.js';
import type { OperationalAlerter } from '../audit/reconciliation.js';
import type { AuditSnapshot } from '../audit/types.js';
import type { NotificationDispatcher } from '../notifications/dispatcher.js';
import { nextTier, resolveCareTeam, type StaffingDefaults } from '../patients/care-team.js';
import type { PatientContextProvider } from '../patients/types.js';
import type { PolicyDecision } from '../triage/types.js';
import type { EventPublisher } from './publisher.js';

/** Raises `ops.alert.raised` for faults operations must act on. */
export class NatsOperationalAlerter implements OperationalAlerter {
    constructor(private publisher: Pick<EventPublisher, 'publishOpsAlert'>) { }

    async auditWriteFailed(requestId: string, error: string, snapshot: AuditSnapshot): Promise<void> {
        const published = await this.publisher.publishOpsAlert(requestId, snapshot.request.patientId, error);
        if (!published) {
            throw new Error(`Ops alert for ${requestId} not published`);
        }
    }
}

/**
 * Escalates an approval that missed its SLA: announces the breach and pages
 * the next tier of the patient's care team.
 */
export class SlaEscalationHandler implements SlaBreachHandler {
    constructor(
        private publisher: Pick<EventPublisher, 'publishSlaBreach'>,
        private dispatcher: NotificationDispatcher,
        private patients: PatientContextProvider,
        private staffing: StaffingDefaults,
    ) { }

    async handleBreach(entry: ApprovalQueueEntry, overdueMs: number): Promise<void> {
        const patient = await this.patients.lookup(entry.patientId);
        const escalatedTo = nextTier(entry.assignedStaffId, resolveCareTeam(patient, this.staffing));

        const published = await this.publisher.publishSlaBreach(entry, escalatedTo, overdueMs);
        if (!published) {
            logger.warn({ approval_id: entry.id }, 'SLA breach event not published');
        }

        const overdueMinutes = Math.ceil(overdueMs / 60_000);
        const decision: PolicyDecision = {
            requiresApproval: true,
            escalationLevel: escalatedTo === this.staffing.emergencyTeamId ? 'EMERGENCY' : 'DOCTOR',
            applicablePolicies: [],
            reasoning: `Approval ${entry.id} overdue by ${overdueMinutes} min (${entry.requestType}, was ${entry.assignedStaffId})`,
            estimatedResponseSeconds: 0,
        };

        const records = await this.dispatcher.dispatch(decision, [escalatedTo], entry.priority, entry.patientId);
        const failed = records.filter((r) => r.deliveryStatus === 'FAILED');
        if (failed.length > 0) {
            throw new Error(`Escalation page to ${escalatedTo} failed: ${failed[0]?.error ?? 'unknown error'}`);
        }
    }
}
