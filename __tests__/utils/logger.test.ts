import logger, { parseLogLevel } from '../../src/utils/logger';

describe('logger', () => {
    const initialLevel = logger.getLevel();

    afterEach(() => {
        logger.setLevel(initialLevel);
        jest.restoreAllMocks();
    });

    it('should be silent under test by default', () => {
        expect(initialLevel).toBe(process.env.LOG_LEVEL ?? 'silent');
    });

    it('should drop messages below the current level', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => {});
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
        logger.setLevel('warn');

        logger.info('[Test] hidden');
        logger.warn('[Test] shown');

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0][0]).toContain('[Test] shown');
        expect(warn.mock.calls[0][0]).toContain('[WARN]');
    });

    it('should parse known level names only', () => {
        expect(parseLogLevel('debug')).toBe('debug');
        expect(parseLogLevel('verbose')).toBeUndefined();
        expect(parseLogLevel(undefined)).toBeUndefined();
    });
});
