import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryApprovalStore } from '../../../src/approvals/memory-store.js';
import { ApprovalQueue, assignReviewer, requestTypeOf, type ApprovalRequestContext } from '../../../src/approvals/queue.js';
import { Metrics } from '../../../src/metrics/counter.js';
import {
    ApprovalNotFoundError,
    ApprovalNotRequiredError,
    InvalidStateError,
} from '../../../src/triage/errors.js';
import type { CareTeam, PolicyDecision } from '../../../src/triage/types.js';
import { ManualClock } from '../../support/fixtures.js';

const careTeam: CareTeam = { nurseId: 'RN-1', physicianId: 'MD-1', emergencyTeamId: 'RRT' };

const medicationDecision: PolicyDecision = {
    requiresApproval: true,
    escalationLevel: 'NURSE',
    applicablePolicies: ['MEDICAL_REQUEST_APPROVAL_REQUIRED', 'MEDICATION_REQUEST_NURSE_REQUIRED'],
    reasoning: 'Medication-related request requires mandatory nurse approval',
    estimatedResponseSeconds: 300,
};

const medicalDecision: PolicyDecision = {
    requiresApproval: true,
    escalationLevel: 'DOCTOR',
    applicablePolicies: ['MEDICAL_REQUEST_APPROVAL_REQUIRED', 'HIGH_URGENCY_DOCTOR_NOTIFICATION'],
    reasoning: 'High urgency medical request escalated to doctor',
    estimatedResponseSeconds: 180,
};

function contextFor(requestId: string, patientId = 'PAT-1'): ApprovalRequestContext {
    return {
        request: {
            id: requestId,
            patientId,
            bedId: '3C-07',
            text: 'Can I have my pain medication?',
            receivedAt: '2026-05-01T08:00:00.000Z',
        },
        careTeam,
        contextSummary: 'Test Patient, age 70, is currently in bed 3C-07.',
    };
}

describe('ApprovalQueue', () => {
    let clock: ManualClock;
    let store: InMemoryApprovalStore;
    let metrics: Metrics;
    let queue: ApprovalQueue;

    beforeEach(() => {
        clock = new ManualClock(new Date('2026-05-01T08:00:00Z'));
        store = new InMemoryApprovalStore();
        metrics = new Metrics();
        queue = new ApprovalQueue(store, metrics, clock.now);
    });

    it('enqueues a pending entry with the SLA for its priority', async () => {
        const entry = await queue.enqueue(medicationDecision, contextFor('REQ-1'), 'MEDIUM');

        expect(entry.id).toMatch(/^APR-/);
        expect(entry).toMatchObject({
            requestId: 'REQ-1',
            patientId: 'PAT-1',
            bedId: '3C-07',
            requestType: 'MEDICATION',
            status: 'PENDING',
            assignedStaffId: 'RN-1',
            priority: 'MEDIUM',
            slaMinutes: 30,
            createdAt: '2026-05-01T08:00:00.000Z',
            slaDeadline: '2026-05-01T08:30:00.000Z',
            resolvedAt: null,
            slaBreachedAt: null,
        });
        expect(await store.get(entry.id)).toEqual(entry);
        expect(metrics.getCounters().approvals_enqueued).toBe(1);
    });

    it('refuses a decision that does not need approval', async () => {
        const decision: PolicyDecision = { ...medicationDecision, requiresApproval: false };

        await expect(queue.enqueue(decision, contextFor('REQ-2'), 'LOW')).rejects.toBeInstanceOf(ApprovalNotRequiredError);
        expect(await store.listPending()).toEqual([]);
    });

    it('resolves a pending entry once', async () => {
        const entry = await queue.enqueue(medicationDecision, contextFor('REQ-3'), 'MEDIUM');
        clock.advance(5 * 60_000);

        const resolved = await queue.resolve(entry.id, 'APPROVED', 'RN-1', 'Given at 08:05');

        expect(resolved).toMatchObject({
            status: 'APPROVED',
            resolvedBy: 'RN-1',
            resolvedAt: '2026-05-01T08:05:00.000Z',
            resolutionNotes: 'Given at 08:05',
        });
        expect(metrics.getCounters().approvals_resolved).toBe(1);
    });

    it('rejects a second resolution and leaves the entry unchanged', async () => {
        const entry = await queue.enqueue(medicationDecision, contextFor('REQ-4'), 'MEDIUM');
        const first = await queue.resolve(entry.id, 'APPROVED', 'RN-1');

        await expect(queue.resolve(entry.id, 'REJECTED', 'RN-2')).rejects.toBeInstanceOf(InvalidStateError);
        expect(await queue.get(entry.id)).toEqual(first);
        expect(metrics.getCounters().approvals_resolved).toBe(1);
    });

    it('reports an unknown entry as not found', async () => {
        await expect(queue.resolve('APR-missing', 'APPROVED', 'RN-1')).rejects.toBeInstanceOf(ApprovalNotFoundError);
    });

    it('lists pending entries by assignee and entries by patient', async () => {
        const forNurse = await queue.enqueue(medicationDecision, contextFor('REQ-5'), 'MEDIUM');
        clock.advance(1000);
        const forDoctor = await queue.enqueue(medicalDecision, contextFor('REQ-6', 'PAT-2'), 'CRITICAL');
        clock.advance(1000);
        const done = await queue.enqueue(medicationDecision, contextFor('REQ-7'), 'LOW');
        await queue.resolve(done.id, 'REJECTED', 'RN-1');

        expect((await queue.listPending()).map((e) => e.id)).toEqual([forNurse.id, forDoctor.id]);
        expect((await queue.listPending('MD-1')).map((e) => e.id)).toEqual([forDoctor.id]);
        expect((await queue.listByPatient('PAT-1')).map((e) => e.id)).toEqual([forNurse.id, done.id]);
        expect(forDoctor.slaMinutes).toBe(5);
    });
});

describe('reviewer assignment', () => {
    it('always sends medication requests to the nurse', () => {
        expect(assignReviewer('MEDICATION', 'CRITICAL', careTeam)).toBe('RN-1');
    });

    it('sends other critical requests to the physician', () => {
        expect(assignReviewer('MEDICAL', 'CRITICAL', careTeam)).toBe('MD-1');
        expect(assignReviewer('MEDICAL', 'HIGH', careTeam)).toBe('RN-1');
    });

    it('derives the request type from the applied policies', () => {
        expect(requestTypeOf(medicationDecision)).toBe('MEDICATION');
        expect(requestTypeOf(medicalDecision)).toBe('MEDICAL');
        expect(requestTypeOf({ ...medicalDecision, applicablePolicies: ['DISTRESS_ESCALATION'] })).toBe('DISTRESS');
        expect(requestTypeOf({ ...medicalDecision, applicablePolicies: [] })).toBe('GENERAL');
    });
});
