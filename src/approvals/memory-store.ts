import type { ApprovalQueueEntry, ApprovalResolution, ApprovalStore } from './types.js';

function byCreatedAt(a: ApprovalQueueEntry, b: ApprovalQueueEntry): number {
    return a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id);
}

export class InMemoryApprovalStore implements ApprovalStore {
    private entries = new Map<string, ApprovalQueueEntry>();

    async insert(entry: ApprovalQueueEntry): Promise<void> {
        if (this.entries.has(entry.id)) {
            throw new Error(`Approval ${entry.id} already exists`);
        }
        this.entries.set(entry.id, Object.freeze({ ...entry }));
    }

    async get(id: string): Promise<ApprovalQueueEntry | null> {
        return this.entries.get(id) ?? null;
    }

    async listPending(assignedTo?: string): Promise<ApprovalQueueEntry[]> {
        return [...this.entries.values()]
            .filter((e) => e.status === 'PENDING')
            .filter((e) => assignedTo === undefined || e.assignedStaffId === assignedTo)
            .sort(byCreatedAt);
    }

    async listByPatient(patientId: string): Promise<ApprovalQueueEntry[]> {
        return [...this.entries.values()]
            .filter((e) => e.patientId === patientId)
            .sort(byCreatedAt);
    }

    async updateStatus(id: string, resolution: ApprovalResolution): Promise<ApprovalQueueEntry | null> {
        const current = this.entries.get(id);
        if (!current || current.status !== 'PENDING') {
            return null;
        }

        const updated = Object.freeze({ ...current, ...resolution });
        this.entries.set(id, updated);
        return updated;
    }

    async markSlaBreached(id: string, at: string): Promise<boolean> {
        const current = this.entries.get(id);
        if (!current || current.status !== 'PENDING' || current.slaBreachedAt !== null) {
            return false;
        }

        this.entries.set(id, Object.freeze({ ...current, slaBreachedAt: at }));
        return true;
    }

    async clearSlaBreached(id: string, at: string): Promise<boolean> {
        const current = this.entries.get(id);
        if (!current || current.slaBreachedAt !== at) {
            return false;
        }

        this.entries.set(id, Object.freeze({ ...current, slaBreachedAt: null }));
        return true;
    }
}
