export type IntentCategory = 'EMERGENCY' | 'MEDICAL' | 'NON_MEDICAL';

export type UrgencyLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export type DistressLevel = 'NONE' | 'LOW' | 'MEDIUM' | 'HIGH';

export type EscalationLevel = 'NONE' | 'NURSE' | 'DOCTOR' | 'EMERGENCY';

/** Priority shares the urgency scale. */
export type Priority = UrgencyLevel;

export const ESCALATION_RANK: Readonly<Record<EscalationLevel, number>> = {
    NONE: 0,
    NURSE: 1,
    DOCTOR: 2,
    EMERGENCY: 3,
};

export const PRIORITY_RANK: Readonly<Record<Priority, number>> = {
    LOW: 0,
    MEDIUM: 1,
    HIGH: 2,
    CRITICAL: 3,
};

export function escalationAtLeast(level: EscalationLevel, floor: EscalationLevel): boolean {
    return ESCALATION_RANK[level] >= ESCALATION_RANK[floor];
}

export function maxPriority(a: Priority, b: Priority): Priority {
    return PRIORITY_RANK[a] >= PRIORITY_RANK[b] ? a : b;
}

export interface PatientRequest {
    readonly id: string;
    readonly patientId: string;
    readonly bedId: string;
    readonly text: string;
    readonly receivedAt: string;
}

export interface Classification {
    readonly intentCategory: IntentCategory;
    readonly urgencyLevel: UrgencyLevel;
    readonly distressLevel: DistressLevel;
    readonly matchedKeywords: readonly string[];
    readonly distressIndicators: readonly string[];
    readonly confidence: number;
    readonly reasoning: string;
}

export type PolicyCode =
    | 'EMERGENCY_PROTOCOL'
    | 'MEDICAL_REQUEST_APPROVAL_REQUIRED'
    | 'HIGH_URGENCY_DOCTOR_NOTIFICATION'
    | 'MEDICATION_REQUEST_NURSE_REQUIRED'
    | 'DISTRESS_ESCALATION'
    | 'NON_MEDICAL_AUTO_RESPONSE';

export interface PolicyDecision {
    readonly requiresApproval: boolean;
    readonly escalationLevel: EscalationLevel;
    readonly applicablePolicies: readonly PolicyCode[];
    readonly reasoning: string;
    readonly estimatedResponseSeconds: number;
}

/** What the policy engine needs beyond the classification. */
export interface PolicyContext {
    readonly originalText: string;
}

export type ResolutionStatus = 'COMPLETED' | 'PENDING' | 'ESCALATED';

export type NotificationChannelName = 'dashboard' | 'push' | 'sms';

export type DeliveryStatus = 'SENT' | 'FAILED' | 'RETRYING';

export interface NotificationRecord {
    readonly id: string;
    readonly recipientId: string;
    readonly channels: readonly NotificationChannelName[];
    readonly priority: Priority;
    readonly sentAt: string | null;
    readonly deliveryStatus: DeliveryStatus;
    readonly attempts: number;
    readonly error?: string;
}

/** Staff who can be routed a request for one patient. */
export interface CareTeam {
    readonly nurseId: string;
    readonly physicianId: string;
    readonly emergencyTeamId: string;
}
