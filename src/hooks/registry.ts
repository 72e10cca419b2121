import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { HookEvent, HookDefinition } from './types.js';
import { ALL_HOOK_EVENTS, isHookEvent } from './types.js';
import type { LoadIssue } from '../corpus/types.js';
import { exists } from '../utils/fs.js';
import { errorMessage } from '../utils/errors.js';

const HookCommandSchema = z.object({
    type: z.literal('command'),
    command: z.string().min(1),
    timeout: z.number().positive().optional(),
});

const HookEntrySchema = z.object({
    matcher: z.string().optional(),
    hooks: z.array(HookCommandSchema).min(1),
});

const HooksFileSchema = z.record(z.string(), z.unknown());

export interface HookLoadResult {
    count: number;
    issues: LoadIssue[];
}

/**
 * Hook Registry — collects hook definitions from plugin hooks.json files
 *
 * ```json
 * {
 *   "hooks": {
 *     "PostToolUse": [
 *       { "matcher": "Write|Edit", "hooks": [{ "type": "command", "command": "npm run lint" }] }
 *     ]
 *   }
 * }
 * ```
 */
export class HookRegistry {
    private hooks: Map<HookEvent, HookDefinition[]> = new Map();

    constructor() {
        // Initialize all event buckets
        for (const event of ALL_HOOK_EVENTS) {
            this.hooks.set(event, []);
        }
    }

    /**
     * Register a hook for a specific event
     */
    register(event: HookEvent, hook: HookDefinition): void {
        const list = this.hooks.get(event) ?? [];
        list.push(hook);
        this.hooks.set(event, list);
    }

    /**
     * Load hooks from a hooks.json file. A missing file is not an error.
     */
    async loadFromFile(filePath: string, source: string): Promise<HookLoadResult> {
        if (!(await exists(filePath))) {
            return { count: 0, issues: [] };
        }

        const issues: LoadIssue[] = [];
        const issue = (rule: LoadIssue['rule'], message: string) => issues.push({ rule, message, path: filePath });

        let parsed: unknown;
        try {
            parsed = JSON.parse(await readFile(filePath, 'utf-8'));
        } catch (err) {
            issue('hook-entry', `Cannot parse hooks file: ${errorMessage(err)}`);
            return { count: 0, issues };
        }

        const file = HooksFileSchema.safeParse(parsed);
        if (!file.success) {
            issue('hook-entry', 'Hooks file must be a JSON object');
            return { count: 0, issues };
        }

        const wrapped = HooksFileSchema.safeParse(file.data['hooks']);
        const hooksObj = wrapped.success ? wrapped.data : file.data;
        let count = 0;

        for (const [eventName, definitions] of Object.entries(hooksObj)) {
            if (eventName === 'description') continue;
            if (!isHookEvent(eventName)) {
                issue('hook-event', `Unknown hook event "${eventName}". Valid events: ${ALL_HOOK_EVENTS.join(', ')}`);
                continue;
            }

            if (!Array.isArray(definitions)) {
                issue('hook-entry', `Hooks for ${eventName} must be a list`);
                continue;
            }

            definitions.forEach((def: unknown, idx: number) => {
                const entry = HookEntrySchema.safeParse(def);
                if (!entry.success) {
                    const detail = entry.error.issues
                        .map((i) => `${i.path.join('.') || '(entry)'}: ${i.message}`)
                        .join('; ');
                    issue('hook-entry', `Invalid ${eventName} hook #${idx + 1}: ${detail}`);
                    return;
                }
                this.register(eventName, { ...entry.data, source });
                count++;
            });
        }

        return { count, issues };
    }

    forEvent(event: HookEvent): HookDefinition[] {
        return [...(this.hooks.get(event) ?? [])];
    }

    /**
     * List all registered hooks
     */
    list(): { event: HookEvent; hooks: HookDefinition[] }[] {
        const result: { event: HookEvent; hooks: HookDefinition[] }[] = [];
        for (const [event, hooks] of Array.from(this.hooks)) {
            if (hooks.length > 0) {
                result.push({ event, hooks });
            }
        }
        return result;
    }

    /**
     * Get count of registered hooks
     */
    get size(): number {
        let total = 0;
        for (const hooks of Array.from(this.hooks.values())) {
            total += hooks.length;
        }
        return total;
    }
}
