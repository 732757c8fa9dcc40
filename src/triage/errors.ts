import type { Classification, PolicyDecision } from './types.js';

export type TriageErrorCode =
    | 'POLICY_INVARIANT_VIOLATION'
    | 'INVALID_STATE'
    | 'APPROVAL_NOT_FOUND'
    | 'APPROVAL_NOT_REQUIRED'
    | 'AUDIT_WRITE_FAILURE';

export class TriageError extends Error {
    constructor(
        readonly code: TriageErrorCode,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** A decision that breaks a safety invariant. Indicates a pipeline bug. */
export class PolicyInvariantViolation extends TriageError {
    constructor(
        message: string,
        readonly classification: Classification,
        readonly decision: PolicyDecision,
    ) {
        super('POLICY_INVARIANT_VIOLATION', message);
    }
}

export class InvalidStateError extends TriageError {
    constructor(
        readonly entryId: string,
        readonly currentStatus: string,
    ) {
        super('INVALID_STATE', `Approval ${entryId} is already ${currentStatus}`);
    }
}

export class ApprovalNotFoundError extends TriageError {
    constructor(readonly entryId: string) {
        super('APPROVAL_NOT_FOUND', `Approval ${entryId} not found`);
    }
}

export class ApprovalNotRequiredError extends TriageError {
    constructor(readonly requestId: string) {
        super('APPROVAL_NOT_REQUIRED', `Request ${requestId} does not require approval`);
    }
}

export class AuditWriteFailure extends TriageError {
    constructor(
        readonly requestId: string,
        readonly attempts: number,
        cause: unknown,
    ) {
        super(
            'AUDIT_WRITE_FAILURE',
            `Audit write for request ${requestId} failed after ${attempts} attempts`,
            { cause },
        );
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
