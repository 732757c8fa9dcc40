import type { TriageRules } from '../rules/types.js';
import { KeywordMatcher, normalizeText } from './keywords.js';
import type {
    Classification,
    DistressLevel,
    IntentCategory,
    UrgencyLevel,
} from './types.js';

export const CONFIDENCE = {
    emergency: 0.99,
    medical: 0.85,
    nonMedical: 0.9,
    fallback: 0.6,
} as const;

interface IntentMatch {
    intentCategory: IntentCategory;
    confidence: number;
    matchedKeywords: string[];
    reasoning: string;
    /** True when no keyword list matched and the fail-safe default applied. */
    fallback: boolean;
}

interface DistressMatch {
    level: DistressLevel;
    indicators: string[];
}

/**
 * Keyword classifier for patient requests. Holds no mutable state: the same
 * text and history always produce an identical classification.
 */
export class Classifier {
    private readonly emergency: KeywordMatcher;
    private readonly medical: KeywordMatcher;
    private readonly nonMedical: KeywordMatcher;
    private readonly highDistress: KeywordMatcher;
    private readonly mediumDistress: KeywordMatcher;
    private readonly historyWindow: number;
    private readonly minHistory: number;

    constructor(rules: TriageRules) {
        this.emergency = new KeywordMatcher(rules.keywords.emergency);
        this.medical = new KeywordMatcher(rules.keywords.medical);
        this.nonMedical = new KeywordMatcher(rules.keywords.nonMedical);
        this.highDistress = new KeywordMatcher(rules.distress.high);
        this.mediumDistress = new KeywordMatcher(rules.distress.medium);
        this.historyWindow = rules.distress.historyWindow;
        this.minHistory = rules.distress.minHistory;
    }

    classify(text: string, recentHistory: readonly string[] = []): Classification {
        const normalized = normalizeText(text);
        const intent = this.detectIntent(normalized);
        const distress = this.detectDistress(normalized, recentHistory);
        const urgencyLevel = deriveUrgency(intent, distress.level);

        return Object.freeze({
            intentCategory: intent.intentCategory,
            urgencyLevel,
            distressLevel: distress.level,
            matchedKeywords: Object.freeze(intent.matchedKeywords),
            distressIndicators: Object.freeze(distress.indicators),
            confidence: intent.confidence,
            reasoning: intent.reasoning,
        });
    }

    private detectIntent(normalized: string): IntentMatch {
        const emergency = this.emergency.matches(normalized);
        if (emergency.length > 0) {
            return {
                intentCategory: 'EMERGENCY',
                confidence: CONFIDENCE.emergency,
                matchedKeywords: emergency,
                reasoning: 'Emergency keywords indicate immediate medical attention is needed',
                fallback: false,
            };
        }

        const medical = this.medical.matches(normalized);
        if (medical.length > 0) {
            return {
                intentCategory: 'MEDICAL',
                confidence: CONFIDENCE.medical,
                matchedKeywords: medical,
                reasoning: 'Medical keywords require staff attention',
                fallback: false,
            };
        }

        const nonMedical = this.nonMedical.matches(normalized);
        if (nonMedical.length > 0) {
            return {
                intentCategory: 'NON_MEDICAL',
                confidence: CONFIDENCE.nonMedical,
                matchedKeywords: nonMedical,
                reasoning: 'Request concerns comfort or room environment',
                fallback: false,
            };
        }

        return {
            intentCategory: 'MEDICAL',
            confidence: CONFIDENCE.fallback,
            matchedKeywords: [],
            reasoning: 'No keywords matched; defaulting to MEDICAL',
            fallback: true,
        };
    }

    private detectDistress(normalized: string, recentHistory: readonly string[]): DistressMatch {
        const high = this.highDistress.matches(normalized);
        if (high.length > 0) {
            return { level: 'HIGH', indicators: high };
        }

        if (this.isRepeatedRequest(normalized, recentHistory)) {
            return { level: 'MEDIUM', indicators: ['repeated_request'] };
        }

        const medium = this.mediumDistress.matches(normalized);
        if (medium.length > 0) {
            return { level: 'LOW', indicators: medium };
        }

        return { level: 'NONE', indicators: [] };
    }

    private isRepeatedRequest(normalized: string, recentHistory: readonly string[]): boolean {
        if (normalized.length === 0) {
            return false;
        }

        const history = recentHistory.map(normalizeText).filter((entry) => entry.length > 0);
        if (history.length < this.minHistory) {
            return false;
        }

        return history
            .slice(-this.historyWindow)
            .some((entry) => entry.includes(normalized) || normalized.includes(entry));
    }
}

function deriveUrgency(intent: IntentMatch, distress: DistressLevel): UrgencyLevel {
    switch (intent.intentCategory) {
        case 'EMERGENCY':
            return 'CRITICAL';
        case 'MEDICAL':
            if (intent.fallback) return 'MEDIUM';
            return distress === 'HIGH' ? 'HIGH' : 'MEDIUM';
        case 'NON_MEDICAL':
            return distress === 'HIGH' ? 'MEDIUM' : 'LOW';
    }
}
