import type { LintRule } from '../types.js';
import { frontmatterRules } from './frontmatter.js';
import { namingRules } from './naming.js';
import { contentRules } from './content.js';
import { toolRules } from './tools.js';
import { referenceRules } from './references.js';
import { pluginRules } from './plugins.js';

export const ALL_RULES: LintRule[] = [
    ...frontmatterRules,
    ...namingRules,
    ...contentRules,
    ...toolRules,
    ...referenceRules,
    ...pluginRules,
];
