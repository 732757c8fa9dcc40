/**
 * Lower-case, fold typographic apostrophes and collapse whitespace so that
 * speech-to-text output and typed input match the same keyword lists.
 */
export function normalizeText(text: string): string {
    return text
        .toLowerCase()
        .replace(/[‘’ʼ]/g, "'")
        .replace(/\s+/g, ' ')
        .trim();
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Endings a keyword may carry: "painful", "hurting", "worsening", "urgently". */
const INFLECTION = '(?:s|es|d|ed|ing|ning|ful|ish|ly|ness)?';

/**
 * Matches a fixed keyword list against normalized text. A keyword starts
 * on a word boundary and may carry an inflectional ending, so "pill"
 * matches "pills" but not "pillow", and "iv" does not match "give".
 */
export class KeywordMatcher {
    private readonly patterns: ReadonlyArray<{ keyword: string; pattern: RegExp }>;

    constructor(keywords: readonly string[]) {
        this.patterns = keywords.map((raw) => {
            const keyword = normalizeText(raw);
            return {
                keyword,
                pattern: new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword)}${INFLECTION}(?![a-z0-9])`),
            };
        });
    }

    /** Keywords found in `text`, in list order. */
    matches(normalized: string): string[] {
        return this.patterns
            .filter(({ pattern }) => pattern.test(normalized))
            .map(({ keyword }) => keyword);
    }

    test(normalized: string): boolean {
        return this.patterns.some(({ pattern }) => pattern.test(normalized));
    }
}
