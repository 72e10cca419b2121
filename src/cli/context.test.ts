import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runAction } from './context.js';
import { createCLI } from './index.js';
import { PromptDeckError } from '../utils/errors.js';
import { makeTempDir, removeDir } from '../../test/helpers.js';

describe('runAction', () => {
    let errors: string[];

    beforeEach(() => {
        errors = [];
        vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
            errors.push(String(message));
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        process.exitCode = undefined;
    });

    it('prints toolkit errors and sets exit code 2', async () => {
        await runAction(async () => {
            throw new PromptDeckError('bad input', 'E_USAGE');
        })();

        expect(process.exitCode).toBe(2);
        expect(errors).toHaveLength(1);
        expect(errors[0]).toContain('✗ bad input');
    });

    it('reports unexpected errors with exit code 2 too', async () => {
        await runAction(async () => {
            throw new TypeError('boom');
        })();

        expect(process.exitCode).toBe(2);
        expect(errors[0]).toContain('✗ Unexpected error: boom');
    });

    it('exits 2 when a subcommand names an unknown asset', async () => {
        const root = await makeTempDir();
        try {
            await createCLI().parseAsync(['node', 'promptdeck', '--root', root, 'commands', 'show', 'missing']);
        } finally {
            await removeDir(root);
        }

        expect(process.exitCode).toBe(2);
        expect(errors).toHaveLength(1);
        expect(errors[0]).toContain('✗ Unknown command "missing"');
    });
});
