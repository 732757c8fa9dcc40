import type { AuditRecord, AuditStore } from './types.js';

export class InMemoryAuditStore implements AuditStore {
    private records: AuditRecord[] = [];
    private byId = new Map<string, AuditRecord>();

    async insert(record: AuditRecord): Promise<void> {
        if (this.byId.has(record.logId)) {
            throw new Error(`Audit record ${record.logId} already exists`);
        }
        this.records.push(record);
        this.byId.set(record.logId, record);
    }

    async get(logId: string): Promise<AuditRecord | null> {
        return this.byId.get(logId) ?? null;
    }

    async listByPatient(patientId: string, limit = 50): Promise<AuditRecord[]> {
        return this.records
            .filter((r) => r.patientId === patientId)
            .slice(-limit)
            .reverse();
    }

    async count(): Promise<number> {
        return this.records.length;
    }
}
