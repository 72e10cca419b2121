import type { AssetBase } from '../corpus/types.js';
import type { ToolPermission } from '../tools/permissions.js';

/**
 * A skill is a directory with a SKILL.md whose description the host uses to
 * decide when to pull it into context, plus supporting files it points to.
 */
export interface SkillDefinition extends AssetBase {
    kind: 'skill';
    version?: string;
    allowedTools: ToolPermission[];
    /** Absolute path to the skill directory */
    directory: string;
    /** Files under references/, relative to the skill directory */
    references: string[];
    /** Files under examples/, relative to the skill directory */
    examples: string[];
}

export const SKILL_FILE = 'SKILL.md';

export const SKILL_RESOURCE_DIRS = ['references', 'examples'] as const;

export const SKILL_KEYS = [
    'name',
    'description',
    'version',
    'license',
    'allowed-tools',
    'model',
    'metadata',
] as const;
