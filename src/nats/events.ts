import type {
    DistressLevel,
    EscalationLevel,
    IntentCategory,
    NotificationChannelName,
    PolicyCode,
    Priority,
    ResolutionStatus,
    UrgencyLevel,
} from '../triage/types.js';

export const Subjects = {
    requestReceived: 'patient.request.received',
    decisionRecorded: 'triage.decision.recorded',
    slaBreached: 'approval.sla.breached',
    opsAlert: 'ops.alert.raised',
    staffNotification: (channel: NotificationChannelName) => `staff.notification.${channel}`,
} as const;

interface EventEnvelope<Name extends string, Payload> {
    event_name: Name;
    event_id: string;
    timestamp: string;
    payload: Payload;
}

export type RequestReceivedEvent = EventEnvelope<'patient.request.received', {
    patient_id: string;
    bed_id: string;
    text: string;
    history?: string[];
    priority?: Priority;
}>;

export type DecisionRecordedEvent = EventEnvelope<'triage.decision.recorded', {
    request_id: string;
    patient_id: string;
    intent: IntentCategory;
    urgency: UrgencyLevel;
    distress: DistressLevel;
    escalation_level: EscalationLevel;
    requires_approval: boolean;
    applicable_policies: PolicyCode[];
    priority: Priority;
    response_text: string;
    resolution_status: ResolutionStatus;
    audit_id: string | null;
    approval_entry_id: string | null;
    reconciliation_required: boolean;
}>;

export type SlaBreachedEvent = EventEnvelope<'approval.sla.breached', {
    approval_id: string;
    request_id: string;
    patient_id: string;
    assigned_to: string;
    escalated_to: string;
    priority: Priority;
    sla_deadline: string;
    overdue_ms: number;
}>;

export type StaffNotificationEvent = EventEnvelope<'staff.notification', {
    notification_id: string;
    recipient_id: string;
    channel: NotificationChannelName;
    patient_id: string;
    priority: Priority;
    text: string;
}>;

export type OpsAlertEvent = EventEnvelope<'ops.alert.raised', {
    alert_type: 'AUDIT_WRITE_FAILED';
    request_id: string;
    patient_id: string;
    error: string;
}>;
