/**
 * Command System — Types
 *
 * Commands are prompt templates defined as markdown files and invoked by
 * slash syntax. The body is sent to the model after placeholder
 * substitution; frontmatter carries the description shown in the command
 * menu and the tool restrictions for the invocation.
 */

import type { AssetBase } from '../corpus/types.js';
import type { ToolPermission } from '../tools/permissions.js';

/**
 * Parsed command definition from a .md file
 */
export interface CommandDefinition extends AssetBase {
    kind: 'command';
    /** Subdirectory path below the commands directory, e.g. `frontend/forms` */
    namespace?: string;
    /** Usage hint shown after the command name, e.g. `[pr-number] [priority]` */
    argumentHint?: string;
    /** Tools the invocation may use (empty = inherit) */
    allowedTools: ToolPermission[];
    /** Model override for this command */
    model?: string;
    /** The markdown body used as the prompt template */
    prompt: string;
}

export const COMMAND_KEYS = [
    'description',
    'argument-hint',
    'allowed-tools',
    'model',
    'disable-model-invocation',
] as const;
