import { describe, it, expect, vi } from 'vitest';
import { CancelledAnalysisError, ServiceError, TimeoutError } from '../src/errors';
import { throwIfCancelled, withTimeout } from '../src/utils/timeout';
import { sleep } from './helpers/fakes';

describe('withTimeout', () => {
    it('resolves with the call result when it finishes in time', async () => {
        await expect(withTimeout('completion', 100, undefined, async () => 'done')).resolves.toBe('done');
    });

    it('rejects with TimeoutError and aborts the call on expiry', async () => {
        let callSignal: AbortSignal | undefined;
        const pending = withTimeout('completion', 20, undefined, signal => {
            callSignal = signal;
            return new Promise<string>(() => undefined);
        });

        await expect(pending).rejects.toThrow(new TimeoutError('completion', 20));
        await expect(pending).rejects.toThrow('completion timed out after 20ms');
        expect(callSignal?.aborted).toBe(true);
    });

    it('reports the timeout even when the call rejects on abort', async () => {
        const pending = withTimeout('embedding', 20, undefined, signal => sleep(500, signal));
        await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    });

    it('does not start the call when the caller already cancelled', async () => {
        const controller = new AbortController();
        controller.abort();
        let started = false;

        await expect(
            withTimeout('completion', 100, controller.signal, async () => {
                started = true;
                return 'never';
            }),
        ).rejects.toBeInstanceOf(CancelledAnalysisError);
        expect(started).toBe(false);
    });

    it('rejects with CancelledAnalysisError when the caller aborts mid-call', async () => {
        const controller = new AbortController();
        const pending = withTimeout('completion', 1_000, controller.signal, signal => sleep(500, signal));
        setTimeout(() => controller.abort(), 10);

        await expect(pending).rejects.toBeInstanceOf(CancelledAnalysisError);
    });
});

describe('sleep', () => {
    it('rejects when aborted', async () => {
        const controller = new AbortController();
        const pending = sleep(500, controller.signal);
        controller.abort();
        await expect(pending).rejects.toBeInstanceOf(CancelledAnalysisError);
    });

    it('detaches its abort listener after resolving', async () => {
        const controller = new AbortController();
        const removed = vi.spyOn(controller.signal, 'removeEventListener');

        await sleep(5, controller.signal);

        expect(removed).toHaveBeenCalledWith('abort', expect.any(Function));
    });
});

describe('throwIfCancelled', () => {
    it('lets ordinary failures through', () => {
        expect(() => throwIfCancelled(new ServiceError('down', 'completion'))).not.toThrow();
    });

    it('rethrows cancellation', () => {
        const cancelled = new CancelledAnalysisError();
        expect(() => throwIfCancelled(cancelled)).toThrow(cancelled);
    });

    it('converts any failure into cancellation once the signal fired', () => {
        const controller = new AbortController();
        controller.abort();
        expect(() => throwIfCancelled(new ServiceError('down', 'completion'), controller.signal))
            .toThrow(CancelledAnalysisError);
    });
});
