import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { AddressInfo } from 'net';
import { logger } from '../config/logger.js';
import { SchemaIds, type SchemaValidator } from '../contracts/schema-validator.js';
import type { ApprovalQueue } from '../approvals/queue.js';
import type { ApprovalOutcome } from '../approvals/types.js';
import type { AuditLog } from '../audit/audit-log.js';
import type { ReconciliationQueue } from '../audit/reconciliation.js';
import type { ConversationMemory } from '../history/conversation-memory.js';
import type { Metrics } from '../metrics/counter.js';
import type { TriagePipeline } from '../triage/pipeline.js';
import {
    ApprovalNotFoundError,
    InvalidStateError,
    PolicyInvariantViolation,
    TriageError,
    errorMessage,
} from '../triage/errors.js';
import type { Priority } from '../triage/types.js';

export interface ProcessRequestBody {
    text: string;
    patient_id: string;
    bed_id: string;
    history?: string[];
    priority?: Priority;
}

export interface ResolveApprovalBody {
    outcome: ApprovalOutcome;
    staff_id: string;
    notes?: string;
}

export interface ApiDependencies {
    pipeline: Pick<TriagePipeline, 'process'>;
    approvals: ApprovalQueue;
    auditLog: AuditLog;
    validator: SchemaValidator;
    metrics: Metrics;
    memory: ConversationMemory;
    reconciliation: ReconciliationQueue;
    messaging: { isConnected(): boolean };
}

const MAX_BODY_BYTES = 64 * 1024;

class HttpError extends Error {
    constructor(
        readonly status: number,
        message: string,
        readonly details?: string,
    ) {
        super(message);
    }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
    const chunks: Buffer[] = [];
    let size = 0;

    for await (const chunk of req) {
        const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        size += buf.length;
        if (size > MAX_BODY_BYTES) {
            throw new HttpError(413, 'Request body too large');
        }
        chunks.push(buf);
    }

    try {
        return JSON.parse(Buffer.concat(chunks).toString('utf-8'));
    } catch {
        throw new HttpError(400, 'Invalid JSON body');
    }
}

const APPROVAL_RESOLVE = /^\/approvals\/([^/]+)\/resolve$/;
const AUDIT_ENTRY = /^\/audit\/([^/]+)$/;
const PATIENT_AUDIT = /^\/patients\/([^/]+)\/audit$/;

export class ApiServer {
    private server: Server;

    constructor(
        private port: number,
        private deps: ApiDependencies,
    ) {
        this.server = createServer((req, res) => {
            this.handleRequest(req, res).catch((err) => {
                logger.error({ error: errorMessage(err) }, 'Unhandled API error');
                if (!res.headersSent) {
                    sendJson(res, 500, { error: 'Internal error' });
                } else {
                    res.end();
                }
            });
        });
    }

    private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const method = req.method ?? 'GET';
        const url = new URL(req.url ?? '/', 'http://localhost');
        const path = url.pathname;

        // CORS headers
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

        if (method === 'OPTIONS') {
            res.writeHead(204);
            res.end();
            return;
        }

        try {
            if (method === 'GET' && path === '/health') {
                this.handleHealth(res);
            } else if (method === 'GET' && path === '/metrics') {
                this.handleMetrics(res);
            } else if (method === 'POST' && path === '/requests') {
                await this.handleProcessRequest(req, res);
            } else if (method === 'GET' && path === '/approvals') {
                await this.handleListApprovals(url, res);
            } else if (method === 'POST' && APPROVAL_RESOLVE.test(path)) {
                await this.handleResolveApproval(decodeURIComponent(path.replace(APPROVAL_RESOLVE, '$1')), req, res);
            } else if (method === 'GET' && AUDIT_ENTRY.test(path)) {
                await this.handleGetAudit(decodeURIComponent(path.replace(AUDIT_ENTRY, '$1')), res);
            } else if (method === 'GET' && PATIENT_AUDIT.test(path)) {
                await this.handlePatientAudit(decodeURIComponent(path.replace(PATIENT_AUDIT, '$1')), url, res);
            } else {
                sendJson(res, 404, { error: 'Not found' });
            }
        } catch (err) {
            this.handleError(err, method, path, res);
        }
    }

    private handleError(err: unknown, method: string, path: string, res: ServerResponse): void {
        if (err instanceof HttpError) {
            sendJson(res, err.status, { error: err.message, details: err.details });
            return;
        }
        if (err instanceof InvalidStateError) {
            sendJson(res, 409, { error: err.message, code: err.code, status: err.currentStatus });
            return;
        }
        if (err instanceof ApprovalNotFoundError) {
            sendJson(res, 404, { error: err.message, code: err.code });
            return;
        }
        if (err instanceof PolicyInvariantViolation) {
            sendJson(res, 500, { error: 'Request rejected by safety check', code: err.code });
            return;
        }

        logger.error({ method, path, error: errorMessage(err) }, 'Request handler failed');
        const code = err instanceof TriageError ? err.code : undefined;
        sendJson(res, 500, { error: 'Internal error', code });
    }

    private handleHealth(res: ServerResponse): void {
        const isNatsConnected = this.deps.messaging.isConnected();
        const status = isNatsConnected ? 'ok' : 'degraded';
        const statusCode = isNatsConnected ? 200 : 503;

        sendJson(res, statusCode, {
            status,
            nats: {
                connected: isNatsConnected,
            },
            timestamp: new Date().toISOString(),
        });
    }

    private handleMetrics(res: ServerResponse): void {
        sendJson(res, 200, {
            ...this.deps.metrics.getCounters(),
            tracked_patients: this.deps.memory.getTrackedPatientsCount(),
            reconciliation_pending: this.deps.reconciliation.size(),
            timestamp: new Date().toISOString(),
        });
    }

    private async handleProcessRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const body = this.validateBody<ProcessRequestBody>(SchemaIds.processRequest, await readJsonBody(req));

        const result = await this.deps.pipeline.process(body.text, body.patient_id, {
            bedId: body.bed_id,
            history: body.history,
            priority: body.priority,
        });

        sendJson(res, 201, result);
    }

    private async handleListApprovals(url: URL, res: ServerResponse): Promise<void> {
        const patientId = url.searchParams.get('patient_id');
        if (patientId) {
            sendJson(res, 200, { approvals: await this.deps.approvals.listByPatient(patientId) });
            return;
        }

        const status = url.searchParams.get('status') ?? 'PENDING';
        if (status !== 'PENDING') {
            throw new HttpError(400, 'Only status=PENDING can be listed without patient_id');
        }

        const assignedTo = url.searchParams.get('assigned_to') ?? undefined;
        sendJson(res, 200, { approvals: await this.deps.approvals.listPending(assignedTo) });
    }

    private async handleResolveApproval(entryId: string, req: IncomingMessage, res: ServerResponse): Promise<void> {
        const body = this.validateBody<ResolveApprovalBody>(SchemaIds.resolveApproval, await readJsonBody(req));
        const entry = await this.deps.approvals.resolve(entryId, body.outcome, body.staff_id, body.notes);
        sendJson(res, 200, { approval: entry });
    }

    private async handleGetAudit(logId: string, res: ServerResponse): Promise<void> {
        const record = await this.deps.auditLog.get(logId);
        if (!record) {
            throw new HttpError(404, `Audit entry ${logId} not found`);
        }
        sendJson(res, 200, { record });
    }

    private async handlePatientAudit(patientId: string, url: URL, res: ServerResponse): Promise<void> {
        const limitParam = url.searchParams.get('limit');
        const limit = limitParam === null ? undefined : parseInt(limitParam, 10);
        if (limit !== undefined && (isNaN(limit) || limit < 1)) {
            throw new HttpError(400, 'limit must be a positive integer');
        }
        sendJson(res, 200, { records: await this.deps.auditLog.listByPatient(patientId, limit) });
    }

    private validateBody<T>(schemaId: typeof SchemaIds.processRequest | typeof SchemaIds.resolveApproval, data: unknown): T {
        const result = this.deps.validator.validate<T>(schemaId, data);
        if (!result.valid) {
            throw new HttpError(400, 'Invalid request body', result.errors);
        }
        return result.value;
    }

    /** Bound port; differs from the configured one when that was 0. */
    getPort(): number {
        const address: AddressInfo | string | null = this.server.address();
        return address !== null && typeof address === 'object' ? address.port : this.port;
    }

    async start(): Promise<void> {
        return new Promise((resolve) => {
            this.server.listen(this.port, () => {
                logger.info({ port: this.getPort() }, 'HTTP API server started');
                resolve();
            });
        });
    }

    async stop(): Promise<void> {
        return new Promise((resolve) => {
            this.server.close(() => {
                logger.info('HTTP API server stopped');
                resolve();
            });
        });
    }
}
