import type {
    Classification,
    NotificationRecord,
    PatientRequest,
    PolicyDecision,
    ResolutionStatus,
} from '../triage/types.js';

/** Everything known about one processed request at decision time. */
export interface AuditSnapshot {
    readonly request: PatientRequest;
    readonly classification: Classification;
    readonly decision: PolicyDecision;
    readonly responseText: string;
    readonly notifications: readonly NotificationRecord[];
    readonly approvalEntryId: string | null;
    readonly resolutionStatus: ResolutionStatus;
}

/**
 * Persisted audit row. The top-level fields are the stable compliance
 * columns; `snapshot` keeps the full decision context.
 */
export interface AuditRecord {
    readonly logId: string;
    readonly timestamp: string;
    readonly patientId: string;
    readonly queryText: string;
    readonly intentCategory: Classification['intentCategory'];
    readonly urgencyLevel: Classification['urgencyLevel'];
    /** JSON-serialized PolicyDecision. */
    readonly policyDecision: string;
    readonly responseText: string;
    readonly staffNotified: readonly string[];
    readonly approvalRequired: boolean;
    readonly resolutionStatus: ResolutionStatus;
    readonly snapshot: AuditSnapshot;
}

export interface AuditStore {
    /** Append a record. Must reject if a record with the same logId exists. */
    insert(record: AuditRecord): Promise<void>;
    get(logId: string): Promise<AuditRecord | null>;
    listByPatient(patientId: string, limit?: number): Promise<AuditRecord[]>;
    count(): Promise<number>;
}
