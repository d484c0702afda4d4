export enum RoutingLabel {
    COMPLIANCE = 'compliance',
    HISTORY = 'history',
    STRATEGY = 'strategy',
    ANALYTICS = 'analytics',
}

export const FALLBACK_LABEL = RoutingLabel.STRATEGY;

export interface LabelMatcher {
    label: RoutingLabel;
    matches: (normalized: string) => boolean;
}

const containsWord = (word: string) => (normalized: string) => normalized.includes(word);

/**
 * Evaluated top to bottom; the first hit wins, so a reply naming several
 * labels resolves to the earliest entry. A reply matching none of them falls
 * back to FALLBACK_LABEL.
 */
export const LABEL_MATCHERS: readonly LabelMatcher[] = [
    { label: RoutingLabel.COMPLIANCE, matches: containsWord(RoutingLabel.COMPLIANCE) },
    { label: RoutingLabel.HISTORY, matches: containsWord(RoutingLabel.HISTORY) },
    { label: RoutingLabel.ANALYTICS, matches: containsWord(RoutingLabel.ANALYTICS) },
    { label: RoutingLabel.STRATEGY, matches: containsWord(RoutingLabel.STRATEGY) },
];

export function matchLabel(reply: string): RoutingLabel | null {
    const normalized = reply.trim().toLowerCase();
    const hit = LABEL_MATCHERS.find(matcher => matcher.matches(normalized));
    return hit ? hit.label : null;
}
