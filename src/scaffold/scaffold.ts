import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'yaml';
import type { AssetKind } from '../corpus/types.js';
import type { PromptDeckConfig } from '../config/schema.js';
import { SKILL_FILE, SKILL_RESOURCE_DIRS } from '../skills/types.js';
import { KEBAB_CASE, toCorpusPath } from '../utils/paths.js';
import { exists } from '../utils/fs.js';
import { ScaffoldError } from '../utils/errors.js';

export interface ScaffoldRequest {
    kind: AssetKind;
    name: string;
    description: string;
    /** Create inside plugins/<plugin>/ instead of the project directories */
    plugin?: string;
    /** Commands only; adds `$ARGUMENTS` to the body */
    argumentHint?: string;
    /** `allowed-tools` for commands and skills, `tools` for agents */
    tools?: string;
}

function titleCase(name: string): string {
    return name
        .split('-')
        .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
        .join(' ');
}

function withFrontmatter(fields: Record<string, string | undefined>, body: string): string {
    const defined = Object.fromEntries(
        Object.entries(fields).filter((entry): entry is [string, string] => entry[1] !== undefined)
    );
    return `---\n${stringify(defined).trimEnd()}\n---\n\n${body}`;
}

function commandTemplate(req: ScaffoldRequest): string {
    const lines = [`# ${titleCase(req.name)}`, '', req.description, ''];
    if (req.argumentHint) lines.push('$ARGUMENTS', '');
    return withFrontmatter(
        {
            'description': req.description,
            'argument-hint': req.argumentHint,
            'allowed-tools': req.tools,
        },
        lines.join('\n')
    );
}

function skillTemplate(req: ScaffoldRequest): string {
    const body = [
        `# ${titleCase(req.name)}`,
        '',
        '## When to use',
        '',
        req.description,
        '',
        '## Guidance',
        '',
        'Put detailed notes in `references/` and worked outputs in `examples/`, and link each file from here.',
        '',
    ].join('\n');
    return withFrontmatter(
        { 'name': req.name, 'description': req.description, 'allowed-tools': req.tools },
        body
    );
}

function agentTemplate(req: ScaffoldRequest): string {
    const body = [`You are the ${titleCase(req.name)} agent.`, '', req.description, ''].join('\n');
    return withFrontmatter({ name: req.name, description: req.description, tools: req.tools }, body);
}

/**
 * Create a new command, skill or agent with valid frontmatter.
 * Returns the files written, as absolute paths.
 */
export async function scaffold(root: string, config: PromptDeckConfig, req: ScaffoldRequest): Promise<string[]> {
    if (!KEBAB_CASE.test(req.name)) {
        throw new ScaffoldError(`Invalid name "${req.name}": use lowercase letters, digits and single hyphens`);
    }
    if (req.plugin !== undefined && !KEBAB_CASE.test(req.plugin)) {
        throw new ScaffoldError(`Invalid plugin name "${req.plugin}"`);
    }
    if (req.description.trim() === '') {
        throw new ScaffoldError('A description is required');
    }

    const absRoot = path.resolve(root);
    const base = req.plugin ? path.join(absRoot, config.paths.plugins, req.plugin) : absRoot;
    const dirFor = (kind: 'commands' | 'skills' | 'agents') =>
        req.plugin ? path.join(base, kind) : path.resolve(absRoot, config.paths[kind]);

    let target: string;
    let content: string;
    switch (req.kind) {
        case 'command':
            target = path.join(dirFor('commands'), `${req.name}.md`);
            content = commandTemplate(req);
            break;
        case 'skill':
            target = path.join(dirFor('skills'), req.name, SKILL_FILE);
            content = skillTemplate(req);
            break;
        case 'agent':
            target = path.join(dirFor('agents'), `${req.name}.md`);
            content = agentTemplate(req);
            break;
        default:
            throw new ScaffoldError(`Unknown asset kind "${String(req.kind)}"`);
    }

    if (await exists(target)) {
        throw new ScaffoldError(`${toCorpusPath(absRoot, target)} already exists`);
    }

    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');

    if (req.kind === 'skill') {
        for (const sub of SKILL_RESOURCE_DIRS) {
            await mkdir(path.join(path.dirname(target), sub), { recursive: true });
        }
    }

    return [target];
}
