import { z } from 'zod';
import { LINT_RULE_IDS } from '../lint/types.js';

/**
 * Tools the host exposes by default. `mcp__*` tools are always accepted.
 */
export const DEFAULT_KNOWN_TOOLS = [
    'Read',
    'Write',
    'Edit',
    'MultiEdit',
    'Glob',
    'Grep',
    'LS',
    'Bash',
    'BashOutput',
    'KillShell',
    'WebFetch',
    'WebSearch',
    'Task',
    'TodoWrite',
    'NotebookEdit',
    'NotebookRead',
    'SlashCommand',
    'Skill',
    'AskUserQuestion',
    'ExitPlanMode',
] as const;

export const DEFAULT_MODELS = ['sonnet', 'opus', 'haiku', 'inherit'] as const;

const SeveritySettingSchema = z.enum(['error', 'warning', 'info', 'off']);

const knownRules: readonly string[] = LINT_RULE_IDS;

export const PathsConfigSchema = z.object({
    commands: z.string().min(1).default('commands'),
    skills: z.string().min(1).default('skills'),
    agents: z.string().min(1).default('agents'),
    plugins: z.string().min(1).default('plugins'),
}).strict();

export const LintConfigSchema = z.object({
    rules: z.record(z.string(), SeveritySettingSchema)
        .default({})
        .superRefine((rules, ctx) => {
            for (const id of Object.keys(rules)) {
                if (!knownRules.includes(id)) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        path: [id],
                        message: `Unknown rule "${id}"`,
                    });
                }
            }
        }),
    ignore: z.array(z.string()).default([]),
    maxDescriptionLength: z.number().int().positive().default(1024),
    maxNameLength: z.number().int().positive().default(64),
}).strict();

export const ToolsConfigSchema = z.object({
    known: z.array(z.string().min(1)).default([...DEFAULT_KNOWN_TOOLS]),
}).strict();

export const ShellConfigSchema = z.object({
    timeoutMs: z.number().int().positive().default(10_000),
}).strict();

export const PromptDeckConfigSchema = z.object({
    paths: PathsConfigSchema.default({}),
    lint: LintConfigSchema.default({}),
    tools: ToolsConfigSchema.default({}),
    models: z.array(z.string().min(1)).default([...DEFAULT_MODELS]),
    shell: ShellConfigSchema.default({}),
}).strict();

export type SeveritySetting = z.infer<typeof SeveritySettingSchema>;
export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type LintConfig = z.infer<typeof LintConfigSchema>;
export type PromptDeckConfig = z.infer<typeof PromptDeckConfigSchema>;
export type PromptDeckConfigInput = z.input<typeof PromptDeckConfigSchema>;
