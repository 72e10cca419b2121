import type { SkillDefinition } from './types.js';

/**
 * Skill Matcher — ranks skills by how well their name and description cover
 * a query. Used to check that a description is discoverable for the tasks
 * it is meant to trigger on; the host's own selection may differ.
 */

const STOP_WORDS = new Set([
    'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'do', 'for', 'from',
    'how', 'i', 'in', 'into', 'is', 'it', 'me', 'my', 'of', 'on', 'or',
    'our', 'should', 'that', 'the', 'this', 'to', 'use', 'used', 'using',
    'we', 'what', 'when', 'with', 'you', 'your',
]);

export interface SkillMatch {
    skill: SkillDefinition;
    /** 0..3: description hits plus double-weighted name hits, per query term */
    score: number;
    /** Query terms found in the skill */
    terms: string[];
}

function stem(token: string): string {
    if (token.length > 3 && token.endsWith('ies')) return `${token.slice(0, -3)}y`;
    if (token.length > 3 && token.endsWith('s') && !token.endsWith('ss')) return token.slice(0, -1);
    return token;
}

export function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[^a-z0-9]+/)
        .filter((token) => token.length > 1 && !STOP_WORDS.has(token))
        .map(stem);
}

export class SkillMatcher {
    constructor(private skills: SkillDefinition[]) {}

    match(query: string, limit = 5): SkillMatch[] {
        const queryTerms = Array.from(new Set(tokenize(query)));
        if (queryTerms.length === 0) return [];

        const matches: SkillMatch[] = [];
        for (const skill of this.skills) {
            const nameTerms = new Set(tokenize(skill.name));
            const descriptionTerms = new Set(tokenize(skill.description));

            let raw = 0;
            const hits: string[] = [];
            for (const term of queryTerms) {
                const inName = nameTerms.has(term);
                const inDescription = descriptionTerms.has(term);
                if (inDescription) raw += 1;
                if (inName) raw += 2;
                if (inName || inDescription) hits.push(term);
            }

            if (raw > 0) {
                matches.push({ skill, score: raw / queryTerms.length, terms: hits });
            }
        }

        return matches
            .sort((a, b) => b.score - a.score || a.skill.id.localeCompare(b.skill.id))
            .slice(0, limit);
    }
}
