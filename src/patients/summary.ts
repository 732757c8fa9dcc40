import { KeywordMatcher, normalizeText } from '../triage/keywords.js';
import type { PatientContext } from './types.js';

const MEDICATION_TOPICS = new KeywordMatcher(['medication', 'medicine', 'pill', 'pain', 'hurt']);
const RESTRICTION_TOPICS = new KeywordMatcher(['food', 'eat', 'meal', 'walk', 'move', 'exercise']);
const STAFF_TOPICS = new KeywordMatcher(['nurse', 'doctor', 'staff']);

/**
 * Short summary of the parts of a patient record relevant to one request,
 * shown to the reviewing staff member beside the approval.
 */
export function summarizeContext(patient: PatientContext | null, bedId: string, text: string): string {
    if (!patient) {
        return `No patient record found; request received from bed ${bedId}.`;
    }

    const normalized = normalizeText(text);
    const age = patient.age !== undefined ? `age ${patient.age}` : 'unknown age';
    const parts = [`${patient.name ?? 'Patient'}, ${age}, is currently in bed ${patient.bedNumber}.`];

    if (MEDICATION_TOPICS.test(normalized)) {
        if (patient.medications.length > 0) {
            parts.push(`Currently taking: ${patient.medications.join(', ')}.`);
        }
        if (patient.allergies.length > 0) {
            parts.push(`Allergies: ${patient.allergies.join(', ')}.`);
        }
    }

    if (RESTRICTION_TOPICS.test(normalized) && patient.restrictions.length > 0) {
        parts.push(`Restrictions: ${patient.restrictions.join(', ')}.`);
    }

    if (STAFF_TOPICS.test(normalized)) {
        parts.push(`Primary nurse: ${patient.assignedNurseId ?? 'unassigned'}.`);
    }

    return parts.join(' ');
}
