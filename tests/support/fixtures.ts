import { SchemaValidator } from '../../src/contracts/schema-validator.js';
import { loadRules } from '../../src/rules/loader.js';
import type { TriageRules } from '../../src/rules/types.js';
import type { NotificationChannel, NotificationMessage } from '../../src/notifications/types.js';
import type { NotificationChannelName } from '../../src/triage/types.js';
import type { PatientContext } from '../../src/patients/types.js';
import type { AuditSnapshot } from '../../src/audit/types.js';
import type { ProcessResult } from '../../src/triage/pipeline.js';

export function createValidator(): SchemaValidator {
    const validator = new SchemaValidator('./contracts');
    validator.loadSchemas();
    return validator;
}

export function defaultRules(validator: SchemaValidator = createValidator()): TriageRules {
    return loadRules('./rules/default.json', validator);
}

export const noSleep = async (): Promise<void> => { };

export const STAFFING = {
    defaultNurseId: 'CHARGE_NURSE',
    defaultPhysicianId: 'ON_CALL_PHYSICIAN',
    emergencyTeamId: 'RAPID_RESPONSE_TEAM',
};

export const TEST_PATIENT: PatientContext = {
    hospitalId: 'PAT-1',
    bedNumber: '3C-07',
    name: 'Test Patient',
    age: 70,
    medications: ['Paracetamol 1g'],
    allergies: ['Penicillin'],
    restrictions: ['Fall risk'],
    assignedNurseId: 'RN-1',
    assignedPhysicianId: 'MD-1',
};

export interface Delivery {
    recipientId: string;
    channel: NotificationChannelName;
    message: NotificationMessage;
}

/**
 * In-process channel that records every delivery. Recipients listed in
 * `failing` always reject.
 */
export class RecordingChannel implements NotificationChannel {
    readonly deliveries: Delivery[] = [];
    readonly failing = new Set<string>();

    async deliver(recipientId: string, channel: NotificationChannelName, message: NotificationMessage): Promise<void> {
        if (this.failing.has(recipientId)) {
            throw new Error(`pager offline for ${recipientId}`);
        }
        this.deliveries.push({ recipientId, channel, message });
    }

    recipients(): string[] {
        return [...new Set(this.deliveries.map((d) => d.recipientId))];
    }
}

/** A clock the test moves by hand. */
export class ManualClock {
    constructor(private current: Date) { }

    now = (): Date => new Date(this.current.getTime());

    advance(ms: number): void {
        this.current = new Date(this.current.getTime() + ms);
    }
}

/** A decided medication request with one delivered and one failed page. */
export const SAMPLE_SNAPSHOT: AuditSnapshot = {
    request: {
        id: 'REQ-0001',
        patientId: 'PAT-1',
        bedId: '3C-07',
        text: 'Can I have my pain medication?',
        receivedAt: '2026-05-01T08:00:00.000Z',
    },
    classification: {
        intentCategory: 'MEDICAL',
        urgencyLevel: 'MEDIUM',
        distressLevel: 'NONE',
        matchedKeywords: ['pain', 'medication'],
        distressIndicators: [],
        confidence: 0.85,
        reasoning: 'Medical keywords require staff attention',
    },
    decision: {
        requiresApproval: true,
        escalationLevel: 'NURSE',
        applicablePolicies: ['MEDICAL_REQUEST_APPROVAL_REQUIRED', 'MEDICATION_REQUEST_NURSE_REQUIRED'],
        reasoning: 'Medical request requires nurse approval before response',
        estimatedResponseSeconds: 300,
    },
    responseText: "I've notified your nurse.",
    notifications: [
        {
            id: 'NTF-1',
            recipientId: 'RN-1',
            channels: ['dashboard'],
            priority: 'MEDIUM',
            sentAt: '2026-05-01T08:00:01.000Z',
            deliveryStatus: 'SENT',
            attempts: 1,
        },
        {
            id: 'NTF-2',
            recipientId: 'RN-2',
            channels: ['dashboard'],
            priority: 'MEDIUM',
            sentAt: null,
            deliveryStatus: 'FAILED',
            attempts: 3,
            error: 'pager offline',
        },
    ],
    approvalEntryId: 'APR-1',
    resolutionStatus: 'PENDING',
};

/** The pipeline outcome for SAMPLE_SNAPSHOT once audited. */
export const SAMPLE_RESULT: ProcessResult = {
    requestId: SAMPLE_SNAPSHOT.request.id,
    classification: SAMPLE_SNAPSHOT.classification,
    decision: SAMPLE_SNAPSHOT.decision,
    responseText: SAMPLE_SNAPSHOT.responseText,
    auditId: 'LOG-0001',
    approvalEntryId: 'APR-1',
    notifications: [...SAMPLE_SNAPSHOT.notifications],
    priority: 'MEDIUM',
    resolutionStatus: 'PENDING',
    reconciliationRequired: false,
};
