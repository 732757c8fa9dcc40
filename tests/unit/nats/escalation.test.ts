import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import type { ApprovalQueueEntry } from '../../../src/approvals/types.js';
import { Metrics } from '../../../src/metrics/counter.js';
import { NatsOperationalAlerter, SlaEscalationHandler } from '../../../src/nats/escalation.js';
import type { EventPublisher } from '../../../src/nats/publisher.js';
import { NatsNotificationChannel } from '../../../src/nats/staff-channel.js';
import { NotificationDispatcher } from '../../../src/notifications/dispatcher.js';
import { PatientDirectory } from '../../../src/patients/directory.js';
import {
    RecordingChannel,
    SAMPLE_SNAPSHOT,
    STAFFING,
    TEST_PATIENT,
    noSleep,
} from '../../support/fixtures.js';

function pendingEntry(overrides: Partial<ApprovalQueueEntry> = {}): ApprovalQueueEntry {
    return {
        id: 'APR-1',
        requestId: 'REQ-0001',
        patientId: 'PAT-1',
        bedId: '3C-07',
        requestType: 'MEDICATION',
        queryText: 'Can I have my pain medication?',
        contextSummary: 'Test Patient, age 70, is currently in bed 3C-07.',
        status: 'PENDING',
        assignedStaffId: 'RN-1',
        priority: 'HIGH',
        slaMinutes: 15,
        createdAt: '2026-05-01T08:00:00.000Z',
        slaDeadline: '2026-05-01T08:15:00.000Z',
        resolvedAt: null,
        resolvedBy: null,
        resolutionNotes: null,
        slaBreachedAt: '2026-05-01T08:16:30.000Z',
        ...overrides,
    };
}

describe('SlaEscalationHandler', () => {
    let channel: RecordingChannel;
    let publisher: { publishSlaBreach: Mock<EventPublisher['publishSlaBreach']> };
    let handler: SlaEscalationHandler;

    beforeEach(() => {
        channel = new RecordingChannel();
        publisher = { publishSlaBreach: vi.fn<EventPublisher['publishSlaBreach']>(async () => true) };
        const dispatcher = new NotificationDispatcher(channel, new Metrics(), {
            maxAttempts: 2,
            baseDelayMs: 1,
            sleep: noSleep,
        });
        handler = new SlaEscalationHandler(publisher, dispatcher, new PatientDirectory([TEST_PATIENT]), STAFFING);
    });

    it('escalates an overdue nurse approval to the physician', async () => {
        const entry = pendingEntry();

        await handler.handleBreach(entry, 90_000);

        expect(publisher.publishSlaBreach).toHaveBeenCalledWith(entry, 'MD-1', 90_000);
        expect(channel.recipients()).toEqual(['MD-1']);
        expect(channel.deliveries.map((d) => d.channel)).toEqual(['dashboard', 'push']);
        expect(channel.deliveries[0]?.message.text).toBe(
            '[DOCTOR] Patient PAT-1: Approval APR-1 overdue by 2 min (MEDICATION, was RN-1)',
        );
    });

    it('escalates an overdue physician approval to the emergency team', async () => {
        await handler.handleBreach(pendingEntry({ assignedStaffId: 'MD-1', requestType: 'MEDICAL' }), 60_000);

        expect(channel.recipients()).toEqual(['RAPID_RESPONSE_TEAM']);
        expect(channel.deliveries[0]?.message.text).toBe(
            '[EMERGENCY] Patient PAT-1: Approval APR-1 overdue by 1 min (MEDICAL, was MD-1)',
        );
    });

    it('uses the on-call physician for a patient without a record', async () => {
        await handler.handleBreach(pendingEntry({ patientId: 'PAT-404', assignedStaffId: 'CHARGE_NURSE' }), 60_000);

        expect(channel.recipients()).toEqual(['ON_CALL_PHYSICIAN']);
    });

    it('still pages when the breach event cannot be published', async () => {
        publisher.publishSlaBreach.mockResolvedValueOnce(false);

        await handler.handleBreach(pendingEntry(), 60_000);

        expect(channel.recipients()).toEqual(['MD-1']);
    });

    it('fails when the escalation page cannot be delivered', async () => {
        channel.failing.add('MD-1');

        await expect(handler.handleBreach(pendingEntry(), 60_000)).rejects.toThrow(
            'Escalation page to MD-1 failed: pager offline for MD-1',
        );
    });
});

describe('NatsOperationalAlerter', () => {
    it('publishes an audit failure alert', async () => {
        const publisher = { publishOpsAlert: vi.fn<EventPublisher['publishOpsAlert']>(async () => true) };
        const alerter = new NatsOperationalAlerter(publisher);

        await alerter.auditWriteFailed('REQ-0001', 'disk unavailable', SAMPLE_SNAPSHOT);

        expect(publisher.publishOpsAlert).toHaveBeenCalledWith('REQ-0001', 'PAT-1', 'disk unavailable');
    });

    it('throws when the alert is not published', async () => {
        const publisher = { publishOpsAlert: vi.fn<EventPublisher['publishOpsAlert']>(async () => false) };
        const alerter = new NatsOperationalAlerter(publisher);

        await expect(alerter.auditWriteFailed('REQ-0001', 'disk unavailable', SAMPLE_SNAPSHOT)).rejects.toThrow(
            'Ops alert for REQ-0001 not published',
        );
    });
});

describe('NatsNotificationChannel', () => {
    const message = { notificationId: 'NTF-1', patientId: 'PAT-1', priority: 'LOW' as const, text: 'water' };

    it('delivers through the staff notification event', async () => {
        const publisher = {
            publishStaffNotification: vi.fn<EventPublisher['publishStaffNotification']>(async () => true),
        };

        await new NatsNotificationChannel(publisher).deliver('RN-1', 'dashboard', message);

        expect(publisher.publishStaffNotification).toHaveBeenCalledWith('RN-1', 'dashboard', message);
    });

    it('rejects when the event is not published', async () => {
        const publisher = {
            publishStaffNotification: vi.fn<EventPublisher['publishStaffNotification']>(async () => false),
        };

        await expect(new NatsNotificationChannel(publisher).deliver('RN-1', 'dashboard', message)).rejects.toThrow(
            'Notification NTF-1 not delivered on dashboard',
        );
    });
});
