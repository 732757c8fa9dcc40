export interface KeywordSets {
    emergency: string[];
    medical: string[];
    nonMedical: string[];
    medication: string[];
}

export interface DistressRules {
    high: string[];
    medium: string[];
    /** How many trailing history entries are compared for repetition. */
    historyWindow: number;
    /** Minimum history length before repetition is considered. */
    minHistory: number;
}

export interface CannedReply {
    topic: string;
    keywords: string[];
    reply: string;
}

export interface ResponseTemplates {
    emergency: string;
    /** `{staff}` is replaced with "nurse" or "doctor". */
    staffNotified: string;
    nonMedicalDefault: string;
    fallback: string;
    /** Ordered; first matching entry wins. `{time}` renders the clock time. */
    nonMedicalReplies: CannedReply[];
}

export interface TriageRules {
    version: string;
    keywords: KeywordSets;
    distress: DistressRules;
    responses: ResponseTemplates;
}
