import { withDefaults } from '../../../src/shared/utils/options';
import { withRetry } from '../../../src/shared/utils/retry';
import { Logger, LogLevel, parseLogLevel } from '../../../src/shared/logger/Logger';

const FAST_POLICY = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2 };

describe('withDefaults', () => {
    it('overlays defined values only', () => {
        expect(withDefaults({ a: 1, b: 2 }, { a: 5, b: undefined })).toEqual({ a: 5, b: 2 });
    });

    it('returns the defaults without overrides', () => {
        expect(withDefaults({ a: 1 })).toEqual({ a: 1 });
    });
});

describe('withRetry', () => {
    beforeAll(() => {
        Logger.getInstance().setLogLevel(LogLevel.ERROR);
    });

    it('retries retryable errors until success', async () => {
        const fn = jest.fn<Promise<string>, []>()
            .mockRejectedValueOnce(new Error('busy'))
            .mockResolvedValueOnce('ok');

        await expect(withRetry(fn, 'test', FAST_POLICY, () => true)).resolves.toBe('ok');
        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('gives up after the last attempt', async () => {
        const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('busy'));

        await expect(withRetry(fn, 'test', FAST_POLICY, () => true)).rejects.toThrow('busy');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('rethrows other errors at once', async () => {
        const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('fatal'));

        await expect(withRetry(fn, 'test', FAST_POLICY, () => false)).rejects.toThrow('fatal');
        expect(fn).toHaveBeenCalledTimes(1);
    });
});

describe('parseLogLevel', () => {
    it('accepts level names in any case', () => {
        expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
        expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    });

    it('ignores unknown or missing values', () => {
        expect(parseLogLevel('loud')).toBeNull();
        expect(parseLogLevel(undefined)).toBeNull();
    });
});
