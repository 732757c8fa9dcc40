import { describe, it, expect, beforeEach } from 'vitest';
import { ConversationMemory, type ConversationTurn } from '../../../src/history/conversation-memory.js';

const turn = (n: number): ConversationTurn => ({
    requestId: `REQ-${n}`,
    text: `request ${n}`,
    intent: 'NON_MEDICAL',
    responseText: 'ok',
    timestamp: '2026-05-01T08:00:00.000Z',
});

describe('ConversationMemory', () => {
    let time: number;
    let memory: ConversationMemory;

    beforeEach(() => {
        time = 1_000_000;
        memory = new ConversationMemory(10, 60_000, () => time);
    });

    it('keeps only the most recent turns', () => {
        for (let n = 1; n <= 12; n++) {
            memory.store('PAT-1', turn(n));
        }

        const recent = memory.recent('PAT-1');
        expect(recent).toHaveLength(10);
        expect(recent[0]?.requestId).toBe('REQ-3');
        expect(memory.recentTexts('PAT-1', 2)).toEqual(['request 11', 'request 12']);
    });

    it('keeps patients apart', () => {
        memory.store('PAT-1', turn(1));
        memory.store('PAT-2', turn(2));

        expect(memory.recentTexts('PAT-1')).toEqual(['request 1']);
        expect(memory.getTrackedPatientsCount()).toBe(2);
    });

    it('forgets idle histories after the TTL', () => {
        memory.store('PAT-1', turn(1));
        time += 30_000;
        memory.store('PAT-2', turn(2));
        time += 45_000;

        expect(memory.recent('PAT-1')).toEqual([]);
        expect(memory.recentTexts('PAT-2')).toEqual(['request 2']);

        expect(memory.cleanupStaleHistories()).toBe(1);
        expect(memory.getTrackedPatientsCount()).toBe(1);
    });
});
