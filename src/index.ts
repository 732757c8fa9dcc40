import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { loadRules } from './rules/loader.js';
import { Classifier } from './triage/classifier.js';
import { PolicyEngine } from './triage/policy-engine.js';
import { ResponseComposer } from './triage/response-composer.js';
import { TriagePipeline } from './triage/pipeline.js';
import { NotificationDispatcher } from './notifications/dispatcher.js';
import { ApprovalQueue } from './approvals/queue.js';
import { InMemoryApprovalStore } from './approvals/memory-store.js';
import { SlaMonitor } from './approvals/sla-monitor.js';
import { AuditLog } from './audit/audit-log.js';
import { FileAuditStore } from './audit/file-store.js';
import { InMemoryAuditStore } from './audit/memory-store.js';
import { ReconciliationQueue } from './audit/reconciliation.js';
import type { AuditStore } from './audit/types.js';
import { PatientDirectory } from './patients/directory.js';
import { ConversationMemory } from './history/conversation-memory.js';
import { NatsClient } from './nats/connection.js';
import { PatientRequestConsumer } from './nats/consumer.js';
import { EventPublisher } from './nats/publisher.js';
import { NatsNotificationChannel } from './nats/staff-channel.js';
import { NatsOperationalAlerter, SlaEscalationHandler } from './nats/escalation.js';
import { Subjects } from './nats/events.js';
import { Metrics } from './metrics/counter.js';
import { ApiServer } from './api/server.js';

async function main() {
    logger.info('Starting Bedside Request Triage Service');

    // Load configuration
    const config = loadConfig();
    logger.info({ config }, 'Configuration loaded');

    // Initialize schema validator
    const validator = new SchemaValidator(config.contracts.path);
    validator.loadSchemas();

    // Load rules and patient records
    const rules = loadRules(config.rules.path, validator);
    const patients = PatientDirectory.fromFile(config.patients.path, validator);

    const metrics = new Metrics();

    // Initialize NATS client
    const natsClient = new NatsClient({
        servers: config.nats.url,
        name: 'request-triage',
    });

    await natsClient.connect();

    const publisher = new EventPublisher(natsClient, validator, config.nats.stream);

    const dispatcher = new NotificationDispatcher(new NatsNotificationChannel(publisher), metrics, {
        maxAttempts: config.notifications.maxAttempts,
        baseDelayMs: config.notifications.baseDelayMs,
    });

    const approvalStore = new InMemoryApprovalStore();
    const approvals = new ApprovalQueue(approvalStore, metrics);

    let auditStore: AuditStore;
    if (config.audit.logPath) {
        auditStore = new FileAuditStore(config.audit.logPath, validator);
        logger.info({ path: config.audit.logPath }, 'Audit log persisted to file');
    } else {
        auditStore = new InMemoryAuditStore();
        logger.warn('AUDIT_LOG_PATH not set, audit log is in memory only');
    }
    const auditLog = new AuditLog(auditStore, validator, metrics, {
        maxAttempts: config.audit.maxAttempts,
        baseDelayMs: config.audit.baseDelayMs,
    });

    const memory = new ConversationMemory(config.history.maxTurns, config.history.ttlMs);
    const reconciliation = new ReconciliationQueue();

    const pipeline = new TriagePipeline({
        classifier: new Classifier(rules),
        policyEngine: new PolicyEngine(rules),
        composer: new ResponseComposer(rules),
        dispatcher,
        approvals,
        auditLog,
        patients,
        memory,
        alerter: new NatsOperationalAlerter(publisher),
        reconciliation,
        metrics,
        staffing: config.staffing,
        options: {
            deadlineMs: config.pipeline.deadlineMs,
            notifyWaitMs: config.notifications.waitMs,
        },
    });

    const slaMonitor = new SlaMonitor(
        approvalStore,
        new SlaEscalationHandler(publisher, dispatcher, patients, config.staffing),
        metrics,
    );

    const requestConsumer = new PatientRequestConsumer(
        natsClient,
        validator,
        pipeline,
        publisher,
        metrics,
        {
            streamName: config.nats.stream,
            durableName: config.nats.durable,
            subject: Subjects.requestReceived,
        },
    );

    // Initialize HTTP API server
    const apiServer = new ApiServer(config.http.port, {
        pipeline,
        approvals,
        auditLog,
        validator,
        metrics,
        memory,
        reconciliation,
        messaging: natsClient,
    });

    await apiServer.start();

    memory.startCleanupInterval();
    slaMonitor.start(config.approvals.slaSweepIntervalMs);

    // Start consuming messages
    requestConsumer.start().catch((err) => {
        logger.error({ error: err }, 'Consumer failed');
    });

    logger.info('Request Triage Service running');

    // Graceful shutdown
    const shutdown = async () => {
        logger.info('Shutting down gracefully');

        slaMonitor.stop();
        memory.stop();

        let exitCode = 0;
        try {
            await apiServer.stop();
            await natsClient.close();
        } catch (err) {
            logger.error({ error: err }, 'Shutdown failed');
            exitCode = 1;
        } finally {
            if (reconciliation.size() > 0) {
                logger.fatal({ pending: reconciliation.list() }, 'Shutting down with unreconciled requests');
            }
        }

        process.exit(exitCode);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
}

main().catch((err) => {
    logger.error({ error: err }, 'Fatal error during startup');
    process.exit(1);
});
