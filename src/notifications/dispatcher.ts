import { logger } from '../config/logger.js';
import type { Metrics } from '../metrics/counter.js';
import { errorMessage } from '../triage/errors.js';
import type {
    NotificationChannelName,
    NotificationRecord,
    PolicyDecision,
    Priority,
} from '../triage/types.js';
import { newId } from '../util/ids.js';
import { retryWithBackoff, sleep, RetryExhaustedError } from '../util/retry.js';
import type { NotificationChannel, NotificationMessage } from './types.js';

export interface DispatcherOptions {
    maxAttempts: number;
    baseDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
}

export function channelsFor(priority: Priority): NotificationChannelName[] {
    const channels: NotificationChannelName[] = ['dashboard'];
    if (priority === 'HIGH' || priority === 'CRITICAL') {
        channels.push('push');
    }
    if (priority === 'CRITICAL') {
        channels.push('sms');
    }
    return channels;
}

export function notificationText(decision: PolicyDecision, patientId: string): string {
    return `[${decision.escalationLevel}] Patient ${patientId}: ${decision.reasoning}`;
}

interface RecipientState {
    id: string;
    recipientId: string;
    channels: NotificationChannelName[];
    priority: Priority;
    sentAt: string | null;
    deliveryStatus: NotificationRecord['deliveryStatus'];
    attempts: number;
    error?: string;
}

/** A running fan-out. `snapshot()` reads current per-recipient state. */
export interface DispatchHandle {
    readonly done: Promise<NotificationRecord[]>;
    snapshot(): NotificationRecord[];
}

function freezeRecord(state: RecipientState): NotificationRecord {
    return Object.freeze({ ...state, channels: Object.freeze([...state.channels]) });
}

export class NotificationDispatcher {
    private readonly now: () => Date;

    constructor(
        private channel: NotificationChannel,
        private metrics: Metrics,
        private options: DispatcherOptions,
    ) {
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Deliver to every recipient concurrently and wait for all of them.
     * Never rejects: each recipient's outcome is in its record.
     */
    dispatch(
        decision: PolicyDecision,
        recipients: readonly string[],
        priority: Priority,
        patientId: string,
    ): Promise<NotificationRecord[]> {
        return this.start(decision, recipients, priority, patientId).done;
    }

    start(
        decision: PolicyDecision,
        recipients: readonly string[],
        priority: Priority,
        patientId: string,
    ): DispatchHandle {
        const channels = channelsFor(priority);
        const text = notificationText(decision, patientId);

        // RETRYING until the first attempt settles
        const states: RecipientState[] = [...new Set(recipients)].map((recipientId) => ({
            id: newId('NTF'),
            recipientId,
            channels,
            priority,
            sentAt: null,
            deliveryStatus: 'RETRYING',
            attempts: 0,
        }));

        const done = Promise.all(
            states.map(async (state) => {
                await this.deliverToRecipient(state, { notificationId: state.id, patientId, priority, text });
                return freezeRecord(state);
            }),
        );

        return {
            done,
            snapshot: () => states.map(freezeRecord),
        };
    }

    private async deliverToRecipient(state: RecipientState, message: NotificationMessage): Promise<void> {
        const pending = new Set(state.channels);

        try {
            await retryWithBackoff(
                async (attempt) => {
                    state.attempts = attempt;
                    await this.deliverPending(state.recipientId, pending, message);
                },
                {
                    maxAttempts: this.options.maxAttempts,
                    baseDelayMs: this.options.baseDelayMs,
                    sleep: this.options.sleep ?? sleep,
                    onRetry: (attempt, err, delayMs) => {
                        state.deliveryStatus = 'RETRYING';
                        state.error = errorMessage(err);
                        logger.warn(
                            {
                                notification_id: state.id,
                                recipient_id: state.recipientId,
                                attempt,
                                delay_ms: delayMs,
                                pending_channels: [...pending],
                                error: state.error,
                            },
                            'Notification delivery failed, retrying',
                        );
                    },
                },
            );
        } catch (err) {
            const cause = err instanceof RetryExhaustedError ? err.lastError : err;
            state.deliveryStatus = 'FAILED';
            state.error = errorMessage(cause);
            this.metrics.incrementNotificationsFailed();
            logger.error(
                {
                    notification_id: state.id,
                    recipient_id: state.recipientId,
                    attempts: state.attempts,
                    failed_channels: [...pending],
                    error: state.error,
                },
                'Notification permanently failed',
            );
            return;
        }

        state.deliveryStatus = 'SENT';
        state.sentAt = this.now().toISOString();
        delete state.error;
        this.metrics.incrementNotificationsSent();
    }

    /** Try every channel not yet delivered; throw if any still fails. */
    private async deliverPending(
        recipientId: string,
        pending: Set<NotificationChannelName>,
        message: NotificationMessage,
    ): Promise<void> {
        const results = await Promise.allSettled(
            [...pending].map(async (channel) => {
                await this.channel.deliver(recipientId, channel, message);
                pending.delete(channel);
            }),
        );

        const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
        if (failure) {
            throw failure.reason;
        }
    }
}
