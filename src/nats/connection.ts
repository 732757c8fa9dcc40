import { connect, type ConnectionOptions, type NatsConnection } from 'nats';
import { logger } from '../config/logger.js';

export class NatsClient {
    private nc: NatsConnection | null = null;
    private connecting = false;

    constructor(private options: ConnectionOptions) { }

    async connect(): Promise<void> {
        if (this.nc || this.connecting) {
            return;
        }

        this.connecting = true;

        try {
            logger.info({ servers: this.options.servers }, 'Connecting to NATS');

            const nc = await connect(this.options);
            this.nc = nc;

            logger.info('Connected to NATS successfully');

            this.watchStatus(nc).catch((err) => {
                logger.warn({ error: err }, 'NATS status stream ended');
            });
        } catch (err) {
            logger.error({ error: err }, 'Failed to connect to NATS');
            throw err;
        } finally {
            this.connecting = false;
        }
    }

    private async watchStatus(nc: NatsConnection): Promise<void> {
        for await (const status of nc.status()) {
            logger.info({ type: status.type, data: status.data }, 'NATS status update');
        }
    }

    getConnection(): NatsConnection {
        if (!this.nc) {
            throw new Error('NATS connection not established');
        }
        return this.nc;
    }

    isConnected(): boolean {
        return this.nc !== null && !this.nc.isClosed();
    }

    /** Publish a JSON payload to a JetStream subject. */
    async publish(subject: string, payload: unknown, stream: string): Promise<void> {
        const js = this.getConnection().jetstream();
        await js.publish(subject, JSON.stringify(payload), { expect: { streamName: stream } });
    }

    async close(): Promise<void> {
        if (this.nc) {
            logger.info('Closing NATS connection');
            await this.nc.drain();
            this.nc = null;
        }
    }
}
