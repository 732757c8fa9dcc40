import type { ResponseTemplates, TriageRules } from '../rules/types.js';
import { KeywordMatcher, normalizeText } from './keywords.js';
import { assertDecisionInvariants } from './policy-engine.js';
import type { Classification, PolicyDecision } from './types.js';

interface CompiledReply {
    topic: string;
    matcher: KeywordMatcher;
    reply: string;
}

export interface ComposeOptions {
    /** Clock used for the time-of-day reply. */
    now?: Date;
    timeZone?: string;
}

/**
 * Fills fixed templates only. Nothing here generates clinical content, so
 * the patient never receives medical advice from this service.
 */
export class ResponseComposer {
    private readonly templates: ResponseTemplates;
    private readonly replies: CompiledReply[];

    constructor(rules: TriageRules) {
        this.templates = rules.responses;
        this.replies = rules.responses.nonMedicalReplies.map((entry) => ({
            topic: entry.topic,
            matcher: new KeywordMatcher(entry.keywords),
            reply: entry.reply,
        }));
    }

    compose(
        decision: PolicyDecision,
        classification: Classification,
        originalText: string,
        options: ComposeOptions = {},
    ): string {
        assertDecisionInvariants(classification, decision);

        const { escalationLevel: escalation } = decision;

        if (escalation === 'EMERGENCY') {
            return this.templates.emergency;
        }

        if (decision.requiresApproval && (escalation === 'NURSE' || escalation === 'DOCTOR')) {
            return this.templates.staffNotified.replace(
                '{staff}',
                escalation === 'NURSE' ? 'nurse' : 'doctor',
            );
        }

        if (classification.intentCategory === 'NON_MEDICAL') {
            const normalized = normalizeText(originalText);
            const match = this.replies.find(({ matcher }) => matcher.test(normalized));
            if (!match) {
                return this.templates.nonMedicalDefault;
            }
            return match.reply.replace('{time}', formatClockTime(options.now ?? new Date(), options.timeZone));
        }

        return this.templates.fallback;
    }
}

function formatClockTime(now: Date, timeZone?: string): string {
    return now.toLocaleTimeString('en-US', {
        hour: '2-digit',
        minute: '2-digit',
        hour12: true,
        timeZone,
    });
}
