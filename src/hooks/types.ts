/**
 * Hook System — Types
 *
 * Plugins may ship `hooks/hooks.json` binding shell commands to host
 * lifecycle events. They are validated here, never run.
 */

// ─── Hook Events ───

export const ALL_HOOK_EVENTS = [
    // Tool-level
    'PreToolUse',
    'PostToolUse',
    // Prompt-level
    'UserPromptSubmit',
    'Notification',
    // Turn-level
    'Stop',
    'SubagentStop',
    'PreCompact',
    // Session-level
    'SessionStart',
    'SessionEnd',
] as const;

export type HookEvent = typeof ALL_HOOK_EVENTS[number];

export function isHookEvent(value: string): value is HookEvent {
    return (ALL_HOOK_EVENTS as readonly string[]).includes(value);
}

// ─── Hook Definition ───

export interface HookCommand {
    type: 'command';
    /** Shell command the host would run */
    command: string;
    /** Timeout in seconds */
    timeout?: number;
}

export interface HookDefinition {
    /** Tool-name pattern the host matches against (tool events only) */
    matcher?: string;
    hooks: HookCommand[];
    /** Plugin name (set during loading) */
    source: string;
}
