import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger } from './logger.js';

describe('Logger', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
    });

    function captured(logger: Logger): string[] {
        const lines: string[] = [];
        vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
            lines.push(String(message));
        });
        logger.debug('d');
        logger.info('i');
        logger.warn('w');
        logger.error('e');
        return lines;
    }

    it('takes its level from PROMPTDECK_LOG_LEVEL', () => {
        vi.stubEnv('PROMPTDECK_LOG_LEVEL', 'error');
        expect(captured(new Logger())).toHaveLength(1);
    });

    it('falls back to warn for unknown or inherited level names', () => {
        vi.stubEnv('PROMPTDECK_LOG_LEVEL', 'constructor');
        expect(captured(new Logger())).toHaveLength(2);

        vi.stubEnv('PROMPTDECK_LOG_LEVEL', 'loud');
        expect(captured(new Logger())).toHaveLength(2);
    });

    it('lets an explicit level win', () => {
        vi.stubEnv('PROMPTDECK_LOG_LEVEL', 'silent');
        const logger = new Logger('debug');
        expect(captured(logger)).toHaveLength(4);
    });
});
