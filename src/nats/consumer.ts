import {
    AckPolicy,
    DeliverPolicy,
    NatsError,
    nanos,
    type Consumer,
    type JsMsg,
    type NatsConnection,
} from 'nats';
import { logger } from '../config/logger.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import type { Metrics } from '../metrics/counter.js';
import type { ProcessResult, TriagePipeline } from '../triage/pipeline.js';
import { errorMessage, PolicyInvariantViolation } from '../triage/errors.js';
import { sleep } from '../util/retry.js';
import type { NatsClient } from './connection.js';
import type { RequestReceivedEvent } from './events.js';
import type { EventPublisher } from './publisher.js';

export interface ConsumerConfig {
    streamName: string;
    durableName: string;
    subject: string;
}

export type RequestMessage = Pick<JsMsg, 'string' | 'ack' | 'nak'>;

const NAK_DELAY_MS = 2000;
const HANDLED_EVENT_LIMIT = 1000;

interface HandledEvent {
    result: ProcessResult;
    published: boolean;
}

function isRetryableStartupError(err: unknown): boolean {
    const code = err instanceof NatsError ? err.code : '';
    const message = errorMessage(err);
    return (
        code === '503' ||
        message.includes('stream not found') ||
        message.includes('unavailable') ||
        message.includes('consumer not found')
    );
}

function isConsumerNotFound(err: unknown): boolean {
    const code = err instanceof NatsError ? err.code : '';
    return code === '404' || errorMessage(err).includes('consumer not found');
}

export class PatientRequestConsumer {
    /** Recent results by event id; a redelivered event reuses its result instead of being triaged again. */
    private handled = new Map<string, HandledEvent>();

    constructor(
        private natsClient: NatsClient,
        private validator: SchemaValidator,
        private pipeline: Pick<TriagePipeline, 'process'>,
        private publisher: Pick<EventPublisher, 'publishDecision'>,
        private metrics: Metrics,
        private config: ConsumerConfig,
    ) { }

    async start(): Promise<void> {
        const nc = this.natsClient.getConnection();

        logger.info(
            {
                stream: this.config.streamName,
                durable: this.config.durableName,
                subject: this.config.subject,
            },
            'Starting JetStream consumer',
        );

        const maxRetries = 30;
        const baseDelayMs = 2000;
        let lastError: unknown;

        for (let attempt = 1; attempt <= maxRetries; attempt++) {
            try {
                return await this.connectAndConsume(nc);
            } catch (err) {
                lastError = err;

                if (isRetryableStartupError(err) && attempt < maxRetries) {
                    logger.warn(
                        { attempt, maxRetries, error: errorMessage(err) },
                        'JetStream not ready, retrying...',
                    );
                    await sleep(baseDelayMs);
                    continue;
                }

                throw err;
            }
        }

        throw lastError;
    }

    private async connectAndConsume(nc: NatsConnection): Promise<void> {
        const consumer = await this.getOrCreateConsumer(nc);

        const messages = await consumer.consume({
            max_messages: 100,
        });

        for await (const msg of messages) {
            await this.handleMessage(msg);
        }
    }

    private async getOrCreateConsumer(nc: NatsConnection): Promise<Consumer> {
        const js = nc.jetstream();

        try {
            const consumer = await js.consumers.get(this.config.streamName, this.config.durableName);
            logger.info({ durable: this.config.durableName }, 'Using existing consumer');
            return consumer;
        } catch (err) {
            if (!isConsumerNotFound(err)) {
                throw err;
            }
        }

        logger.info('Consumer not found, creating new consumer');

        const jsm = await nc.jetstreamManager();
        await jsm.consumers.add(this.config.streamName, {
            durable_name: this.config.durableName,
            filter_subject: this.config.subject,
            ack_policy: AckPolicy.Explicit,
            deliver_policy: DeliverPolicy.All,
            max_deliver: 5,
            ack_wait: nanos(30_000),
        });

        const consumer = await js.consumers.get(this.config.streamName, this.config.durableName);
        logger.info({ durable: this.config.durableName }, 'Consumer created');
        return consumer;
    }

    async handleMessage(msg: RequestMessage): Promise<void> {
        // Step 1: Parse JSON
        let data: unknown;
        try {
            data = JSON.parse(msg.string());
        } catch (err) {
            logger.error({ error: errorMessage(err) }, 'JSON parse error');
            this.metrics.incrementDroppedInvalid();
            msg.ack(); // ACK to avoid reprocessing
            return;
        }

        // Step 2: Validate schema
        const validation = this.validator.validateRequestReceived<RequestReceivedEvent>(data);
        if (!validation.valid) {
            logger.warn({ errors: validation.errors }, 'Schema validation failed');
            this.metrics.incrementDroppedInvalid();
            msg.ack(); // ACK to avoid poison message loop
            return;
        }

        const { event_id: eventId, payload } = validation.value;
        const previous = this.handled.get(eventId);
        if (previous?.published) {
            logger.info({ event_id: eventId, request_id: previous.result.requestId }, 'Duplicate event already handled');
            msg.ack();
            return;
        }

        // Step 3: Triage, unless an earlier delivery already did
        const result = previous?.result ?? (await this.triage(payload, msg));
        if (!result) {
            return;
        }
        if (previous) {
            logger.info({ event_id: eventId, request_id: result.requestId }, 'Republishing decision for redelivered event');
        }

        // Step 4: Publish decision
        const published = await this.publisher.publishDecision(payload.patient_id, result);
        this.remember(eventId, { result, published });

        if (published) {
            msg.ack();
            return;
        }

        this.metrics.incrementDroppedPublishFail();
        msg.nak(NAK_DELAY_MS);

        logger.warn(
            { request_id: result.requestId, patient_id: payload.patient_id },
            'Decision publish failed, message NAKed for retry',
        );
    }

    private remember(eventId: string, event: HandledEvent): void {
        this.handled.delete(eventId);
        this.handled.set(eventId, event);

        if (this.handled.size > HANDLED_EVENT_LIMIT) {
            const oldest = this.handled.keys().next();
            if (!oldest.done) {
                this.handled.delete(oldest.value);
            }
        }
    }

    /** Run the pipeline; on failure the message is settled here and null returned. */
    private async triage(
        payload: RequestReceivedEvent['payload'],
        msg: RequestMessage,
    ): Promise<ProcessResult | null> {
        try {
            return await this.pipeline.process(payload.text, payload.patient_id, {
                bedId: payload.bed_id,
                history: payload.history,
                priority: payload.priority,
            });
        } catch (err) {
            if (err instanceof PolicyInvariantViolation) {
                this.metrics.incrementDroppedInvalid();
                msg.ack();
                return null;
            }

            logger.error(
                { patient_id: payload.patient_id, error: errorMessage(err) },
                'Request processing failed, message NAKed for retry',
            );
            msg.nak(NAK_DELAY_MS);
            return null;
        }
    }
}
