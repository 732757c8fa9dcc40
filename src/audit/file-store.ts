import { appendFile, mkdir, readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../config/logger.js';
import { SchemaIds, type SchemaValidator } from '../contracts/schema-validator.js';
import type { AuditRecord, AuditStore } from './types.js';

/**
 * Append-only JSON-lines audit store. Records are never rewritten; reads
 * re-parse the file so the log on disk stays the single source of truth.
 */
export class FileAuditStore implements AuditStore {
    private writeChain: Promise<void> = Promise.resolve();
    private knownIds: Set<string> | null = null;

    constructor(
        private path: string,
        private validator: SchemaValidator,
    ) { }

    insert(record: AuditRecord): Promise<void> {
        const write = this.writeChain.then(() => this.append(record));
        // Keep the chain alive for later writers; this caller still sees the error.
        this.writeChain = write.catch(() => undefined);
        return write;
    }

    async get(logId: string): Promise<AuditRecord | null> {
        const records = await this.readAll();
        return records.find((r) => r.logId === logId) ?? null;
    }

    async listByPatient(patientId: string, limit = 50): Promise<AuditRecord[]> {
        const records = await this.readAll();
        return records
            .filter((r) => r.patientId === patientId)
            .slice(-limit)
            .reverse();
    }

    async count(): Promise<number> {
        return (await this.readAll()).length;
    }

    private async append(record: AuditRecord): Promise<void> {
        const ids = await this.loadIds();
        if (ids.has(record.logId)) {
            throw new Error(`Audit record ${record.logId} already exists`);
        }

        await mkdir(dirname(this.path), { recursive: true });
        await appendFile(this.path, `${JSON.stringify(record)}\n`, 'utf-8');
        ids.add(record.logId);
    }

    private async loadIds(): Promise<Set<string>> {
        if (!this.knownIds) {
            const records = await this.readAll();
            this.knownIds = new Set(records.map((r) => r.logId));
        }
        return this.knownIds;
    }

    private async readAll(): Promise<AuditRecord[]> {
        if (!existsSync(this.path)) {
            return [];
        }

        const content = await readFile(this.path, 'utf-8');
        const records: AuditRecord[] = [];

        content.split('\n').forEach((line, index) => {
            if (line.trim().length === 0) return;

            let parsed: unknown;
            try {
                parsed = JSON.parse(line);
            } catch (err) {
                logger.error({ path: this.path, line: index + 1, error: err }, 'Unreadable audit line');
                return;
            }

            const result = this.validator.validate<AuditRecord>(SchemaIds.auditRecord, parsed);
            if (result.valid) {
                records.push(result.value);
            } else {
                logger.error(
                    { path: this.path, line: index + 1, errors: result.errors },
                    'Audit line failed validation',
                );
            }
        });

        return records;
    }
}
