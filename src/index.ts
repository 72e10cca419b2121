// PromptDeck — Public API Surface
export { createCLI, VERSION } from './cli/index.js';
export { ConfigLoader, resolveConfig } from './config/loader.js';
export { DEFAULT_CONFIG, CONFIG_FILE_NAME } from './config/defaults.js';
export { parseFrontmatter, stringField, firstBodyLine } from './frontmatter/parser.js';
export { parseToolList, parseToolEntry, permitsShell, hasShellControl, shellQuote, isKnownTool } from './tools/permissions.js';
export { CommandLoader } from './commands/loader.js';
export { splitArguments, joinArguments } from './commands/arguments.js';
export { renderCommand, scanPlaceholders, defaultShellExecutor } from './commands/template.js';
export { SkillLoader } from './skills/loader.js';
export { SkillMatcher, tokenize } from './skills/matcher.js';
export { AgentLoader } from './agents/loader.js';
export { PluginLoader } from './plugins/loader.js';
export { HookRegistry } from './hooks/registry.js';
export { loadCorpus, allAssets, findCommand, findSkill, findAgent } from './corpus/loader.js';
export { Linter } from './lint/linter.js';
export { ALL_RULES } from './lint/rules/index.js';
export { formatText, formatJson, formatReport } from './lint/reporter.js';
export { scaffold } from './scaffold/scaffold.js';
export {
    PromptDeckError,
    ConfigError,
    NotFoundError,
    RenderError,
    ScaffoldError,
} from './utils/errors.js';

// Types
export type { PromptDeckConfig, PromptDeckConfigInput, SeveritySetting } from './config/schema.js';
export type { ParsedDocument, FrontmatterIssue } from './frontmatter/parser.js';
export type { ToolPermission, ToolListResult } from './tools/permissions.js';
export type { CommandDefinition } from './commands/types.js';
export type { RenderOptions, RenderResult, ShellExecutor, PlaceholderScan } from './commands/template.js';
export type { SkillDefinition } from './skills/types.js';
export type { SkillMatch } from './skills/matcher.js';
export type { AgentDefinition } from './agents/types.js';
export type { PluginManifest, LoadedPlugin } from './plugins/types.js';
export type { HookEvent, HookDefinition, HookCommand } from './hooks/types.js';
export type { Asset, AssetKind, Corpus, LoadIssue } from './corpus/types.js';
export type { Diagnostic, LintReport, LintRule, LintRuleId, Severity } from './lint/types.js';
export type { ScaffoldRequest } from './scaffold/scaffold.js';
