import type { LintRule, RuleFinding } from '../types.js';
import { allAssets } from '../../corpus/loader.js';
import { scanPlaceholders } from '../../commands/template.js';
import { permitsShell } from '../../tools/permissions.js';
import { bodyLineOf, keyLine } from './helpers.js';

const FENCE_LINE = /^\s*(```|~~~)/;

/**
 * Line (within the body) of a fence that is never closed, if any
 */
export function unclosedFence(body: string): number | undefined {
    const lines = body.split('\n');
    let openMarker: string | null = null;
    let openIndex = -1;

    for (let index = 0; index < lines.length; index++) {
        const match = lines[index].match(FENCE_LINE);
        if (!match) continue;
        if (openMarker === null) {
            openMarker = match[1];
            openIndex = index;
        } else if (match[1] === openMarker) {
            openMarker = null;
        }
    }

    return openMarker === null ? undefined : openIndex;
}

export const emptyBody: LintRule = {
    id: 'empty-body',
    defaultSeverity: 'error',
    description: 'An asset needs prompt text after its frontmatter',
    check(corpus) {
        return allAssets(corpus)
            .filter((asset) => asset.document.body.trim() === '')
            .map((asset): RuleFinding => ({
                message: `${asset.kind} "${asset.id}" has no content`,
                path: asset.path,
                line: asset.document.bodyLine,
            }));
    },
};

export const unclosedCodeFence: LintRule = {
    id: 'unclosed-code-fence',
    defaultSeverity: 'warning',
    description: 'Every code fence is closed',
    check(corpus) {
        const findings: RuleFinding[] = [];
        for (const asset of allAssets(corpus)) {
            const index = unclosedFence(asset.document.body);
            if (index !== undefined) {
                findings.push({
                    message: 'Code fence is never closed',
                    path: asset.path,
                    line: asset.document.bodyLine + index,
                });
            }
        }
        return findings;
    },
};

export const argumentHintUnused: LintRule = {
    id: 'argument-hint-unused',
    defaultSeverity: 'warning',
    description: 'An argument-hint promises arguments the body never uses',
    check(corpus) {
        return corpus.commands
            .filter((cmd) => {
                if (cmd.argumentHint === undefined) return false;
                const scan = scanPlaceholders(cmd.prompt);
                return !scan.usesArguments && scan.positional.length === 0;
            })
            .map((cmd): RuleFinding => ({
                message: `argument-hint "${cmd.argumentHint}" is set but the body has no $ARGUMENTS or $1..$9`,
                path: cmd.path,
                line: keyLine(cmd, 'argument-hint'),
            }));
    },
};

export const argumentHintMissing: LintRule = {
    id: 'argument-hint-missing',
    defaultSeverity: 'info',
    description: 'Commands that take arguments should say so in argument-hint',
    check(corpus) {
        return corpus.commands
            .filter((cmd) => {
                if (cmd.argumentHint !== undefined) return false;
                const scan = scanPlaceholders(cmd.prompt);
                return scan.usesArguments || scan.positional.length > 0;
            })
            .map((cmd): RuleFinding => ({
                message: 'Body uses argument placeholders but there is no argument-hint',
                path: cmd.path,
                line: bodyLineOf(cmd, /\$(ARGUMENTS|[1-9])/),
            }));
    },
};

export const shellPermission: LintRule = {
    id: 'shell-permission',
    defaultSeverity: 'warning',
    description: 'Shell markers need a matching Bash entry in allowed-tools',
    check(corpus) {
        const findings: RuleFinding[] = [];
        for (const cmd of corpus.commands) {
            for (const shellCommand of scanPlaceholders(cmd.prompt).shellCommands) {
                if (permitsShell(cmd.allowedTools, shellCommand)) continue;
                findings.push({
                    message: `Shell command "${shellCommand}" is not permitted by allowed-tools`,
                    path: cmd.path,
                    line: bodyLineOf(cmd, shellCommand),
                });
            }
        }
        return findings;
    },
};

export const contentRules: LintRule[] = [
    emptyBody,
    unclosedCodeFence,
    argumentHintUnused,
    argumentHintMissing,
    shellPermission,
];
