import type { TriageRules } from '../rules/types.js';
import { PolicyInvariantViolation } from './errors.js';
import { KeywordMatcher, normalizeText } from './keywords.js';
import {
    ESCALATION_RANK,
    type Classification,
    type EscalationLevel,
    type PolicyCode,
    type PolicyContext,
    type PolicyDecision,
} from './types.js';

export const RESPONSE_SECONDS = {
    emergency: 60,
    medical: 300,
    doctor: 180,
    medication: 300,
    distress: 180,
    autoResponse: 5,
} as const;

/**
 * Accumulates triggered rules. Escalation only moves up; once the emergency
 * protocol locks the decision, later rules are recorded for explainability
 * but cannot change approval, escalation or timing.
 */
class DecisionBuilder {
    private requiresApproval = false;
    private escalationLevel: EscalationLevel = 'NONE';
    private estimatedResponseSeconds: number = RESPONSE_SECONDS.emergency;
    private locked = false;
    private readonly policies: PolicyCode[] = [];
    private readonly reasons: string[] = [];

    get escalation(): EscalationLevel {
        return this.escalationLevel;
    }

    get isLocked(): boolean {
        return this.locked;
    }

    note(policy: PolicyCode, reason: string): this {
        this.policies.push(policy);
        this.reasons.push(reason);
        return this;
    }

    escalate(level: EscalationLevel, estimatedSeconds: number): this {
        if (this.locked) return this;

        const current = ESCALATION_RANK[this.escalationLevel];
        const next = ESCALATION_RANK[level];
        if (next > current) {
            this.escalationLevel = level;
            this.estimatedResponseSeconds = estimatedSeconds;
        } else if (next === current) {
            this.estimatedResponseSeconds = estimatedSeconds;
        }
        return this;
    }

    approval(required: boolean): this {
        if (!this.locked) {
            this.requiresApproval = required;
        }
        return this;
    }

    respondWithin(seconds: number): this {
        if (!this.locked) {
            this.estimatedResponseSeconds = seconds;
        }
        return this;
    }

    lock(): this {
        this.locked = true;
        return this;
    }

    build(): PolicyDecision {
        return Object.freeze({
            requiresApproval: this.requiresApproval,
            escalationLevel: this.escalationLevel,
            applicablePolicies: Object.freeze([...this.policies]),
            reasoning: this.reasons.length > 0 ? this.reasons.join('. ') : 'Standard processing',
            estimatedResponseSeconds: this.estimatedResponseSeconds,
        });
    }
}

export class PolicyEngine {
    private readonly medication: KeywordMatcher;

    constructor(rules: TriageRules) {
        this.medication = new KeywordMatcher(rules.keywords.medication);
    }

    evaluate(classification: Classification, context: PolicyContext): PolicyDecision {
        const { intentCategory: intent, urgencyLevel: urgency, distressLevel: distress } = classification;
        const decision = new DecisionBuilder();

        // Emergency protocol
        if (intent === 'EMERGENCY' || urgency === 'CRITICAL') {
            decision
                .note('EMERGENCY_PROTOCOL', 'Emergency detected - immediate escalation to emergency staff')
                .approval(false)
                .escalate('EMERGENCY', RESPONSE_SECONDS.emergency)
                .lock();
        } else if (intent === 'MEDICAL') {
            decision
                .note('MEDICAL_REQUEST_APPROVAL_REQUIRED', 'Medical request requires nurse approval before response')
                .approval(true)
                .escalate('NURSE', RESPONSE_SECONDS.medical);

            if (urgency === 'HIGH') {
                decision
                    .note('HIGH_URGENCY_DOCTOR_NOTIFICATION', 'High urgency medical request escalated to doctor')
                    .escalate('DOCTOR', RESPONSE_SECONDS.doctor);
            }
        }

        // Medication requests always need a nurse, whichever branch ran
        if (this.medication.test(normalizeText(context.originalText))) {
            if (decision.isLocked) {
                decision.note(
                    'MEDICATION_REQUEST_NURSE_REQUIRED',
                    'Medication mentioned during emergency - handled under emergency protocol',
                );
            } else {
                decision
                    .note('MEDICATION_REQUEST_NURSE_REQUIRED', 'Medication-related request requires mandatory nurse approval')
                    .approval(true)
                    .escalate('NURSE', RESPONSE_SECONDS.medication);
            }
        }

        if ((distress === 'MEDIUM' || distress === 'HIGH') && decision.escalation === 'NONE') {
            decision
                .note('DISTRESS_ESCALATION', `Patient showing ${distress} distress - notifying nurse`)
                .escalate('NURSE', RESPONSE_SECONDS.distress);
        }

        if (intent === 'NON_MEDICAL' && decision.escalation === 'NONE') {
            decision
                .note('NON_MEDICAL_AUTO_RESPONSE', 'Non-medical request approved for automatic response')
                .approval(false)
                .respondWithin(RESPONSE_SECONDS.autoResponse);
        }

        const result = decision.build();
        assertDecisionInvariants(classification, result);
        return result;
    }
}

/**
 * Emergencies bypass the approval gate and always reach the emergency team.
 * Anything else reaching the composer is a pipeline bug.
 */
export function assertDecisionInvariants(classification: Classification, decision: PolicyDecision): void {
    if (classification.intentCategory !== 'EMERGENCY') {
        return;
    }

    if (decision.requiresApproval) {
        throw new PolicyInvariantViolation(
            'EMERGENCY classification must not require approval',
            classification,
            decision,
        );
    }

    if (decision.escalationLevel !== 'EMERGENCY') {
        throw new PolicyInvariantViolation(
            `EMERGENCY classification escalated only to ${decision.escalationLevel}`,
            classification,
            decision,
        );
    }
}
