import { batchArray, TimeoutError, withRetryAndTimeout, withTimeout } from './async.util';

describe('async utils', () => {
    describe('withTimeout', () => {
        it('resolves with the wrapped value', async () => {
            await expect(withTimeout(async () => 42, 100)).resolves.toBe(42);
        });

        it('rejects with a TimeoutError when the call hangs', async () => {
            const hang = () => new Promise<never>(() => undefined);

            await expect(withTimeout(hang, 10, 'Query embedding')).rejects.toThrow(
                new TimeoutError('Query embedding', 10),
            );
            await expect(withTimeout(hang, 10, 'Query embedding')).rejects.toThrow(
                'Query embedding timed out after 10ms',
            );
        });

        it('aborts the signal handed to the call when the timeout fires', async () => {
            const received: AbortSignal[] = [];

            await expect(
                withTimeout((signal) => {
                    received.push(signal);
                    return new Promise<never>(() => undefined);
                }, 10),
            ).rejects.toBeInstanceOf(TimeoutError);

            expect(received).toHaveLength(1);
            expect(received[0].aborted).toBe(true);
            expect(received[0].reason).toBeInstanceOf(TimeoutError);
        });

        it('leaves the signal alone when the call settles in time', async () => {
            const received: AbortSignal[] = [];

            await withTimeout(async (signal) => {
                received.push(signal);
                return 'done';
            }, 100);

            expect(received.map((signal) => signal.aborted)).toEqual([false]);
        });
    });

    describe('withRetryAndTimeout', () => {
        it('retries with doubling delays until a call succeeds', async () => {
            let calls = 0;
            const retries: Array<[string, number, number]> = [];

            const result = await withRetryAndTimeout(
                async () => {
                    calls++;
                    if (calls < 3) {
                        throw new Error(`failure ${calls}`);
                    }
                    return 'ok';
                },
                {
                    maxRetries: 3,
                    initialDelayMs: 1,
                    onRetry: (error, attempt, delayMs) => retries.push([error.message, attempt, delayMs]),
                },
            );

            expect(result).toBe('ok');
            expect(calls).toBe(3);
            expect(retries).toEqual([
                ['failure 1', 1, 1],
                ['failure 2', 2, 2],
            ]);
        });

        it('gives every attempt its own signal and aborts each one that times out', async () => {
            const signals: AbortSignal[] = [];

            await expect(
                withRetryAndTimeout(
                    (signal) => {
                        signals.push(signal);
                        return new Promise<never>(() => undefined);
                    },
                    { maxRetries: 3, timeoutMs: 10, initialDelayMs: 1 },
                ),
            ).rejects.toThrow('Operation timed out after 10ms');

            expect(signals).toHaveLength(3);
            expect(new Set(signals).size).toBe(3);
            expect(signals.every((signal) => signal.aborted)).toBe(true);
        });

        it('throws the last error once attempts are exhausted', async () => {
            let calls = 0;

            await expect(
                withRetryAndTimeout(
                    async () => {
                        calls++;
                        throw new Error(`failure ${calls}`);
                    },
                    { maxRetries: 2, initialDelayMs: 1 },
                ),
            ).rejects.toThrow('failure 2');
            expect(calls).toBe(2);
        });
    });

    it('batchArray splits into fixed-size batches', () => {
        expect(batchArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
        expect(batchArray([], 3)).toEqual([]);
    });
});
