import type { Priority } from '../triage/types.js';

export type ApprovalStatus = 'PENDING' | 'APPROVED' | 'REJECTED';

export type ApprovalOutcome = Exclude<ApprovalStatus, 'PENDING'>;

export type RequestType = 'MEDICATION' | 'MEDICAL' | 'DISTRESS' | 'GENERAL';

export interface ApprovalQueueEntry {
    readonly id: string;
    readonly requestId: string;
    readonly patientId: string;
    readonly bedId: string;
    readonly requestType: RequestType;
    readonly queryText: string;
    readonly contextSummary: string;
    readonly status: ApprovalStatus;
    readonly assignedStaffId: string;
    readonly priority: Priority;
    readonly slaMinutes: number;
    readonly createdAt: string;
    readonly slaDeadline: string;
    readonly resolvedAt: string | null;
    readonly resolvedBy: string | null;
    readonly resolutionNotes: string | null;
    readonly slaBreachedAt: string | null;
}

export interface ApprovalResolution {
    status: ApprovalOutcome;
    resolvedAt: string;
    resolvedBy: string;
    resolutionNotes: string | null;
}

export interface ApprovalStore {
    insert(entry: ApprovalQueueEntry): Promise<void>;
    get(id: string): Promise<ApprovalQueueEntry | null>;
    listPending(assignedTo?: string): Promise<ApprovalQueueEntry[]>;
    listByPatient(patientId: string): Promise<ApprovalQueueEntry[]>;
    /**
     * Apply the resolution only if the entry is still PENDING. Returns the
     * updated entry, or null when the entry was missing or already resolved.
     */
    updateStatus(id: string, resolution: ApprovalResolution): Promise<ApprovalQueueEntry | null>;
    /** Flag a breach once; returns false if it was already flagged or resolved. */
    markSlaBreached(id: string, at: string): Promise<boolean>;
    /** Undo the breach flag set at `at`, so a failed escalation is raised again. */
    clearSlaBreached(id: string, at: string): Promise<boolean>;
}
