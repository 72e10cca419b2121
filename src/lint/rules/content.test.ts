import { describe, it, expect } from 'vitest';
import {
    argumentHintMissing,
    argumentHintUnused,
    emptyBody,
    shellPermission,
    unclosedCodeFence,
    unclosedFence,
} from './content.js';
import { lintTree } from '../../../test/helpers.js';

describe('unclosedFence', () => {
    it('returns the index of a fence left open', () => {
        expect(unclosedFence('Intro\n```bash\nls\n')).toBe(1);
        expect(unclosedFence('```\ncode\n```\n~~~\n')).toBe(3);
    });

    it('ignores a different marker inside an open fence', () => {
        expect(unclosedFence('```md\n~~~\n```\n')).toBeUndefined();
    });
});

describe('content rules', () => {
    it('empty-body reports assets without prompt text', async () => {
        const report = await lintTree({
            'commands/blank.md': '---\ndescription: Blank\n---\n\n',
        }, [emptyBody]);

        expect(report.diagnostics).toEqual([{
            rule: 'empty-body',
            severity: 'error',
            message: 'command "blank" has no content',
            file: 'commands/blank.md',
            line: 4,
        }]);
    });

    it('unclosed-code-fence points at the opening fence', async () => {
        const report = await lintTree({
            'commands/fence.md': '---\ndescription: F\n---\nIntro\n```bash\nls\n',
        }, [unclosedCodeFence]);

        expect(report.diagnostics.map((d) => [d.line, d.message])).toEqual([[5, 'Code fence is never closed']]);
    });

    it('argument-hint-unused flags a hint the body ignores', async () => {
        const report = await lintTree({
            'commands/hint.md': '---\ndescription: H\nargument-hint: [file]\n---\nNo placeholders here\n',
            'commands/used.md': '---\ndescription: U\nargument-hint: [file]\n---\nOpen $1\n',
        }, [argumentHintUnused]);

        expect(report.diagnostics).toEqual([{
            rule: 'argument-hint-unused',
            severity: 'warning',
            message: 'argument-hint "[file]" is set but the body has no $ARGUMENTS or $1..$9',
            file: 'commands/hint.md',
            line: 3,
        }]);
    });

    it('argument-hint-missing is informational', async () => {
        const report = await lintTree({
            'commands/args.md': '---\ndescription: A\n---\nIntro\nHandle $1 now\n',
        }, [argumentHintMissing]);

        expect(report.diagnostics).toEqual([{
            rule: 'argument-hint-missing',
            severity: 'info',
            message: 'Body uses argument placeholders but there is no argument-hint',
            file: 'commands/args.md',
            line: 5,
        }]);
        expect(report.infoCount).toBe(1);
    });

    it('shell-permission checks each marker against allowed-tools', async () => {
        const report = await lintTree({
            'commands/shell.md': [
                '---',
                'description: S',
                'allowed-tools: Bash(git status:*)',
                '---',
                'Status: !`git status`',
                'Log: !`git log -1`',
                '',
            ].join('\n'),
        }, [shellPermission]);

        expect(report.diagnostics).toEqual([{
            rule: 'shell-permission',
            severity: 'warning',
            message: 'Shell command "git log -1" is not permitted by allowed-tools',
            file: 'commands/shell.md',
            line: 6,
        }]);
    });
});
