import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import { SchemaIds, type SchemaId, type SchemaValidator } from '../contracts/schema-validator.js';
import type { ApprovalQueueEntry } from '../approvals/types.js';
import type { NotificationMessage } from '../notifications/types.js';
import type { ProcessResult } from '../triage/pipeline.js';
import type { NotificationChannelName } from '../triage/types.js';
import type { NatsClient } from './connection.js';
import {
    Subjects,
    type DecisionRecordedEvent,
    type OpsAlertEvent,
    type SlaBreachedEvent,
    type StaffNotificationEvent,
} from './events.js';

export type EventTransport = Pick<NatsClient, 'publish'>;

/**
 * Publishes outbound events. Every event is validated against its contract
 * before it leaves the service; publish methods report success as a boolean
 * and never throw.
 */
export class EventPublisher {
    constructor(
        private transport: EventTransport,
        private validator: SchemaValidator,
        private streamName: string,
        private now: () => Date = () => new Date(),
    ) { }

    publishDecision(patientId: string, result: ProcessResult): Promise<boolean> {
        const event: DecisionRecordedEvent = {
            event_name: 'triage.decision.recorded',
            event_id: uuidv4(),
            timestamp: this.now().toISOString(),
            payload: {
                request_id: result.requestId,
                patient_id: patientId,
                intent: result.classification.intentCategory,
                urgency: result.classification.urgencyLevel,
                distress: result.classification.distressLevel,
                escalation_level: result.decision.escalationLevel,
                requires_approval: result.decision.requiresApproval,
                applicable_policies: [...result.decision.applicablePolicies],
                priority: result.priority,
                response_text: result.responseText,
                resolution_status: result.resolutionStatus,
                audit_id: result.auditId,
                approval_entry_id: result.approvalEntryId,
                reconciliation_required: result.reconciliationRequired,
            },
        };

        return this.publishEvent(SchemaIds.decisionRecorded, Subjects.decisionRecorded, event, {
            request_id: result.requestId,
            patient_id: patientId,
        });
    }

    publishSlaBreach(entry: ApprovalQueueEntry, escalatedTo: string, overdueMs: number): Promise<boolean> {
        const event: SlaBreachedEvent = {
            event_name: 'approval.sla.breached',
            event_id: uuidv4(),
            timestamp: this.now().toISOString(),
            payload: {
                approval_id: entry.id,
                request_id: entry.requestId,
                patient_id: entry.patientId,
                assigned_to: entry.assignedStaffId,
                escalated_to: escalatedTo,
                priority: entry.priority,
                sla_deadline: entry.slaDeadline,
                overdue_ms: overdueMs,
            },
        };

        return this.publishEvent(SchemaIds.slaBreached, Subjects.slaBreached, event, {
            approval_id: entry.id,
            escalated_to: escalatedTo,
        });
    }

    publishStaffNotification(
        recipientId: string,
        channel: NotificationChannelName,
        message: NotificationMessage,
    ): Promise<boolean> {
        const event: StaffNotificationEvent = {
            event_name: 'staff.notification',
            event_id: uuidv4(),
            timestamp: this.now().toISOString(),
            payload: {
                notification_id: message.notificationId,
                recipient_id: recipientId,
                channel,
                patient_id: message.patientId,
                priority: message.priority,
                text: message.text,
            },
        };

        return this.publishEvent(SchemaIds.staffNotification, Subjects.staffNotification(channel), event, {
            notification_id: message.notificationId,
            recipient_id: recipientId,
            channel,
        });
    }

    publishOpsAlert(requestId: string, patientId: string, error: string): Promise<boolean> {
        const event: OpsAlertEvent = {
            event_name: 'ops.alert.raised',
            event_id: uuidv4(),
            timestamp: this.now().toISOString(),
            payload: {
                alert_type: 'AUDIT_WRITE_FAILED',
                request_id: requestId,
                patient_id: patientId,
                error,
            },
        };

        return this.publishEvent(SchemaIds.opsAlert, Subjects.opsAlert, event, {
            request_id: requestId,
            alert_type: event.payload.alert_type,
        });
    }

    private async publishEvent(
        schemaId: SchemaId,
        subject: string,
        event: { event_id: string },
        context: Record<string, unknown>,
    ): Promise<boolean> {
        // Validate before publishing
        const validationResult = this.validator.validate(schemaId, event);
        if (!validationResult.valid) {
            logger.error(
                { ...context, subject, errors: validationResult.errors, event },
                'Event validation failed',
            );
            return false;
        }

        try {
            await this.transport.publish(subject, event, this.streamName);

            logger.debug({ ...context, subject, event_id: event.event_id }, 'Event published');
            return true;
        } catch (err) {
            logger.error(
                { ...context, subject, event_id: event.event_id, error: err },
                'Failed to publish event to NATS',
            );
            return false;
        }
    }
}
