import type { Fact } from './types';

/**
 * Render facts as a compact bullet list for prompt injection.
 */
export function summarizeFacts(facts: readonly Fact[], maxFacts = 10): string {
    if (facts.length === 0) return '(no relevant memory)';
    const lines = facts.slice(0, maxFacts).map(fact => {
        const flag = fact.flagged ? ' [disputed]' : '';
        return `- ${fact.text} (confidence ${fact.confidence.toFixed(2)})${flag}`;
    });
    if (facts.length > maxFacts) {
        lines.push(`- ... ${facts.length - maxFacts} more`);
    }
    return lines.join('\n');
}
