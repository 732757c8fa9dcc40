import { describe, it, expect, beforeAll } from 'vitest';
import { Classifier, CONFIDENCE } from '../../../src/triage/classifier.js';
import { defaultRules } from '../../support/fixtures.js';

describe('Classifier', () => {
    let classifier: Classifier;

    beforeAll(() => {
        classifier = new Classifier(defaultRules());
    });

    describe('intent', () => {
        it('classifies breathing trouble and chest pain as an emergency', () => {
            const result = classifier.classify("I'm having severe chest pain and I can't breathe");

            expect(result.intentCategory).toBe('EMERGENCY');
            expect(result.urgencyLevel).toBe('CRITICAL');
            expect(result.matchedKeywords).toEqual(['chest pain', "can't breathe"]);
            expect(result.confidence).toBe(CONFIDENCE.emergency);
            expect(result.distressLevel).toBe('HIGH');
            expect(result.distressIndicators).toEqual(['severe']);
        });

        it('classifies a medication request as medical', () => {
            const result = classifier.classify('Can I have my pain medication?');

            expect(result.intentCategory).toBe('MEDICAL');
            expect(result.urgencyLevel).toBe('MEDIUM');
            expect(result.matchedKeywords).toEqual(['pain', 'medication']);
            expect(result.distressLevel).toBe('NONE');
            expect(result.confidence).toBe(CONFIDENCE.medical);
        });

        it('classifies a request for water as non-medical', () => {
            const result = classifier.classify('Can I have some water?');

            expect(result.intentCategory).toBe('NON_MEDICAL');
            expect(result.urgencyLevel).toBe('LOW');
            expect(result.matchedKeywords).toEqual(['water']);
            expect(result.distressLevel).toBe('NONE');
            expect(result.confidence).toBe(CONFIDENCE.nonMedical);
        });

        it('defaults unmatched text to medical with low confidence', () => {
            const result = classifier.classify("I really need help, I've been asking for assistance");

            expect(result.intentCategory).toBe('MEDICAL');
            expect(result.urgencyLevel).toBe('MEDIUM');
            expect(result.matchedKeywords).toEqual([]);
            expect(result.confidence).toBe(CONFIDENCE.fallback);
            expect(result.distressLevel).toBe('HIGH');
            expect(result.distressIndicators).toEqual(['help']);
        });

        it('treats empty text as the medical default', () => {
            const result = classifier.classify('');

            expect(result.intentCategory).toBe('MEDICAL');
            expect(result.distressLevel).toBe('NONE');
            expect(result.confidence).toBe(CONFIDENCE.fallback);
        });
    });

    describe('urgency', () => {
        it('raises medical urgency to HIGH under high distress', () => {
            const result = classifier.classify('The pain is unbearable');

            expect(result.intentCategory).toBe('MEDICAL');
            expect(result.distressLevel).toBe('HIGH');
            expect(result.urgencyLevel).toBe('HIGH');
        });

        it('recognises inflected symptom and distress words', () => {
            const result = classifier.classify('My leg is painful and the fever is worsening');

            expect(result.intentCategory).toBe('MEDICAL');
            expect(result.matchedKeywords).toEqual(['pain', 'fever']);
            expect(result.distressLevel).toBe('HIGH');
            expect(result.urgencyLevel).toBe('HIGH');
        });

        it('reads "urgently" and "hurting" as medical distress', () => {
            const result = classifier.classify('I need a nurse urgently, my back is hurting');

            expect(result.intentCategory).toBe('MEDICAL');
            expect(result.distressLevel).toBe('HIGH');
        });

        it('does not read "pillow" as a pill', () => {
            const result = classifier.classify('Another pillow');

            expect(result.intentCategory).toBe('NON_MEDICAL');
            expect(result.matchedKeywords).toEqual(['pillow']);
        });

        it('raises non-medical urgency to MEDIUM under high distress', () => {
            const result = classifier.classify('Urgent, the room is too cold');

            expect(result.intentCategory).toBe('NON_MEDICAL');
            expect(result.matchedKeywords).toEqual(['room']);
            expect(result.urgencyLevel).toBe('MEDIUM');
        });
    });

    describe('distress from history', () => {
        it('flags a repeated request as MEDIUM distress', () => {
            const result = classifier.classify('water please', ['I want water please', 'water please']);

            expect(result.distressLevel).toBe('MEDIUM');
            expect(result.distressIndicators).toEqual(['repeated_request']);
            expect(result.urgencyLevel).toBe('LOW');
        });

        it('needs at least two earlier requests before counting repetition', () => {
            const result = classifier.classify('water please', ['water please']);

            expect(result.distressLevel).toBe('LOW');
            expect(result.distressIndicators).toEqual(['please']);
        });

        it('ignores blank history entries', () => {
            const result = classifier.classify('water please', ['', '   ', 'water please']);

            expect(result.distressLevel).toBe('LOW');
        });
    });

    it('is pure: identical inputs give identical, frozen results', () => {
        const first = classifier.classify('Can I have my pain medication?', ['hello']);
        const second = classifier.classify('Can I have my pain medication?', ['hello']);

        expect(second).toEqual(first);
        expect(Object.isFrozen(first)).toBe(true);
        expect(Object.isFrozen(first.matchedKeywords)).toBe(true);
    });
});
