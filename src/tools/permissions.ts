/**
 * Tool permission lists (`allowed-tools` on commands and skills, `tools` on
 * agents).
 *
 * Accepted forms:
 *   allowed-tools: Read, Grep, Bash(git status:*)
 *   allowed-tools: [Read, "Bash(git diff:*)"]
 */

export interface ToolPermission {
    /** Entry as written */
    raw: string;
    /** Tool name, e.g. `Bash` */
    tool: string;
    /** Text inside the parentheses, e.g. `git status:*` */
    specifier?: string;
}

export interface ToolListResult {
    permissions: ToolPermission[];
    errors: string[];
}

const ENTRY_PATTERN = /^([A-Za-z_][\w-]*)(?:\(([\s\S]*)\))?$/;

/**
 * Split on commas that are not inside parentheses
 */
function splitTopLevel(value: string): { parts: string[]; balanced: boolean } {
    const parts: string[] = [];
    let depth = 0;
    let current = '';
    let balanced = true;

    for (const ch of value) {
        if (ch === '(') depth++;
        if (ch === ')') {
            depth--;
            if (depth < 0) {
                balanced = false;
                depth = 0;
            }
        }
        if (ch === ',' && depth === 0) {
            parts.push(current);
            current = '';
            continue;
        }
        current += ch;
    }
    parts.push(current);

    return { parts, balanced: balanced && depth === 0 };
}

export function parseToolEntry(entry: string): ToolPermission | string {
    const raw = entry.trim();
    if (raw === '') return 'empty tool entry';

    const match = raw.match(ENTRY_PATTERN);
    if (!match) return `malformed tool entry "${raw}"`;

    const { balanced } = splitTopLevel(raw);
    if (!balanced) return `unbalanced parentheses in "${raw}"`;

    const specifier = match[2];
    if (specifier !== undefined && specifier.trim() === '') {
        return `empty specifier in "${raw}"`;
    }

    return specifier === undefined
        ? { raw, tool: match[1] }
        : { raw, tool: match[1], specifier: specifier.trim() };
}

/**
 * Parse a frontmatter tool list value
 */
export function parseToolList(value: unknown): ToolListResult {
    const permissions: ToolPermission[] = [];
    const errors: string[] = [];

    if (value === undefined || value === null) {
        return { permissions, errors };
    }

    let entries: string[];
    if (typeof value === 'string') {
        const { parts, balanced } = splitTopLevel(value);
        if (!balanced) {
            return { permissions, errors: [`unbalanced parentheses in "${value.trim()}"`] };
        }
        // A trailing comma leaves one empty part; ignore it
        entries = parts.filter((part, idx) => !(idx === parts.length - 1 && part.trim() === '' && idx > 0));
    } else if (Array.isArray(value)) {
        entries = [];
        value.forEach((item, idx) => {
            if (typeof item === 'string') {
                entries.push(item);
            } else {
                errors.push(`entry ${idx + 1} is not a string`);
            }
        });
    } else {
        return { permissions, errors: ['expected a comma-separated string or a list'] };
    }

    for (const entry of entries) {
        const parsed = parseToolEntry(entry);
        if (typeof parsed === 'string') {
            errors.push(parsed);
        } else {
            permissions.push(parsed);
        }
    }

    return { permissions, errors };
}

/**
 * Whether a shell command is allowed by the Bash entries of a permission list
 *
 *   Bash                 → any command
 *   Bash(git status:*)   → `git status` and `git status <anything>`
 *   Bash(npm run*)       → any command starting with `npm run`
 *   Bash(ls -la)         → exactly `ls -la`
 *
 * Prefix entries never cover a command that chains, pipes, redirects or
 * substitutes outside single quotes; only a bare `Bash` does.
 */
export function permitsShell(permissions: ToolPermission[], command: string): boolean {
    const cmd = command.trim();
    const chained = hasShellControl(cmd);

    return permissions.some((perm) => {
        if (perm.tool !== 'Bash') return false;
        if (perm.specifier === undefined) return true;

        const spec = perm.specifier;
        if (cmd === spec) return true;
        if (chained) return false;
        if (spec.endsWith(':*')) {
            const prefix = spec.slice(0, -2).trim();
            return cmd === prefix || cmd.startsWith(`${prefix} `);
        }
        if (spec.endsWith('*')) {
            return cmd.startsWith(spec.slice(0, -1));
        }
        return false;
    });
}

/**
 * Whether a command line holds control syntax the shell would act on.
 * Single quotes hide everything; double quotes still expand `$(` and backticks.
 */
export function hasShellControl(command: string): boolean {
    let quote: '"' | "'" | null = null;

    for (let i = 0; i < command.length; i++) {
        const ch = command[i];
        if (quote === "'") {
            if (ch === "'") quote = null;
            continue;
        }
        if (ch === '\\') {
            if (command[i + 1] === '\n') return true;
            i++;
            continue;
        }
        if (ch === '`' || (ch === '$' && command[i + 1] === '(')) return true;
        if (quote === '"') {
            if (ch === '"') quote = null;
            continue;
        }
        if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (';&|<>\n'.includes(ch)) {
            return true;
        }
    }
    return false;
}

/**
 * Quote a value as one POSIX shell word
 */
export function shellQuote(value: string): string {
    if (value === '') return "''";
    if (/^[\w@%+=:,./-]+$/.test(value)) return value;
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function isKnownTool(tool: string, known: readonly string[]): boolean {
    return tool.startsWith('mcp__') || known.includes(tool);
}
