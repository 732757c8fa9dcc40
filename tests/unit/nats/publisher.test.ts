import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import type { ApprovalQueueEntry } from '../../../src/approvals/types.js';
import type { NatsClient } from '../../../src/nats/connection.js';
import { EventPublisher } from '../../../src/nats/publisher.js';
import { SAMPLE_RESULT, createValidator } from '../../support/fixtures.js';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const overdueEntry: ApprovalQueueEntry = {
    id: 'APR-1',
    requestId: 'REQ-0001',
    patientId: 'PAT-1',
    bedId: '3C-07',
    requestType: 'MEDICATION',
    queryText: 'Can I have my pain medication?',
    contextSummary: 'Test Patient, age 70, is currently in bed 3C-07.',
    status: 'PENDING',
    assignedStaffId: 'RN-1',
    priority: 'MEDIUM',
    slaMinutes: 30,
    createdAt: '2026-05-01T08:00:00.000Z',
    slaDeadline: '2026-05-01T08:30:00.000Z',
    resolvedAt: null,
    resolvedBy: null,
    resolutionNotes: null,
    slaBreachedAt: '2026-05-01T08:31:00.000Z',
};

describe('EventPublisher', () => {
    const validator = createValidator();
    const now = () => new Date('2026-05-01T08:00:03Z');
    let transport: { publish: Mock<NatsClient['publish']> };
    let publisher: EventPublisher;

    beforeEach(() => {
        transport = { publish: vi.fn<NatsClient['publish']>(async () => { }) };
        publisher = new EventPublisher(transport, validator, 'TRIAGE', now);
    });

    it('publishes a decision on the decision subject', async () => {
        expect(await publisher.publishDecision('PAT-1', SAMPLE_RESULT)).toBe(true);

        expect(transport.publish).toHaveBeenCalledTimes(1);
        const call = transport.publish.mock.calls[0];
        expect(call?.[0]).toBe('triage.decision.recorded');
        expect(call?.[2]).toBe('TRIAGE');
        expect(call?.[1]).toMatchObject({
            event_name: 'triage.decision.recorded',
            event_id: expect.stringMatching(UUID),
            timestamp: '2026-05-01T08:00:03.000Z',
            payload: {
                request_id: 'REQ-0001',
                patient_id: 'PAT-1',
                intent: 'MEDICAL',
                urgency: 'MEDIUM',
                distress: 'NONE',
                escalation_level: 'NURSE',
                requires_approval: true,
                applicable_policies: ['MEDICAL_REQUEST_APPROVAL_REQUIRED', 'MEDICATION_REQUEST_NURSE_REQUIRED'],
                priority: 'MEDIUM',
                response_text: "I've notified your nurse.",
                resolution_status: 'PENDING',
                audit_id: 'LOG-0001',
                approval_entry_id: 'APR-1',
                reconciliation_required: false,
            },
        });
    });

    it('refuses to publish an event that breaks its contract', async () => {
        expect(await publisher.publishDecision('', SAMPLE_RESULT)).toBe(false);
        expect(transport.publish).not.toHaveBeenCalled();
    });

    it('reports a transport failure as false', async () => {
        transport.publish.mockRejectedValueOnce(new Error('no responders'));

        expect(await publisher.publishDecision('PAT-1', SAMPLE_RESULT)).toBe(false);
    });

    it('routes staff notifications by channel', async () => {
        const sent = await publisher.publishStaffNotification('RN-1', 'sms', {
            notificationId: 'NTF-1',
            patientId: 'PAT-1',
            priority: 'CRITICAL',
            text: '[EMERGENCY] Patient PAT-1: Emergency detected',
        });

        expect(sent).toBe(true);
        expect(transport.publish.mock.calls[0]?.[0]).toBe('staff.notification.sms');
        expect(transport.publish.mock.calls[0]?.[1]).toMatchObject({
            event_name: 'staff.notification',
            payload: { notification_id: 'NTF-1', recipient_id: 'RN-1', channel: 'sms', priority: 'CRITICAL' },
        });
    });

    it('announces an SLA breach with the next tier', async () => {
        expect(await publisher.publishSlaBreach(overdueEntry, 'MD-1', 60_000)).toBe(true);

        expect(transport.publish.mock.calls[0]?.[0]).toBe('approval.sla.breached');
        expect(transport.publish.mock.calls[0]?.[1]).toMatchObject({
            payload: {
                approval_id: 'APR-1',
                request_id: 'REQ-0001',
                assigned_to: 'RN-1',
                escalated_to: 'MD-1',
                sla_deadline: '2026-05-01T08:30:00.000Z',
                overdue_ms: 60_000,
            },
        });
    });

    it('raises an ops alert for a failed audit write', async () => {
        expect(await publisher.publishOpsAlert('REQ-0001', 'PAT-1', 'disk unavailable')).toBe(true);

        expect(transport.publish.mock.calls[0]?.[0]).toBe('ops.alert.raised');
        expect(transport.publish.mock.calls[0]?.[1]).toMatchObject({
            payload: {
                alert_type: 'AUDIT_WRITE_FAILED',
                request_id: 'REQ-0001',
                patient_id: 'PAT-1',
                error: 'disk unavailable',
            },
        });
    });
});
