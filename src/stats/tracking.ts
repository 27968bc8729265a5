import type { PrimitiveKind, RecordMetrics } from '../schema/usage.js';
import { errorMessage } from '../storage/errors.js';

/** Anything that can take a usage record; satisfied by UsageStats. */
export interface UsageRecorder {
    record(name: string, kind?: PrimitiveKind, metrics?: RecordMetrics): Promise<void>;
}

export interface TrackOptions<T> {
    /** Size the result for token estimation, e.g. `r => JSON.stringify(r).length`. */
    measureResponse?: (result: T) => number;
}

/**
 * Run `work`, timing it, and record the outcome once it settles.
 * The work's result or error is passed through unchanged; a failure to measure
 * or record is logged and never replaces it.
 */
export async function trackInvocation<T>(
    recorder: UsageRecorder,
    name: string,
    kind: PrimitiveKind,
    work: () => Promise<T> | T,
    options: TrackOptions<T> = {}
): Promise<T> {
    const startTime = performance.now();
    let success = true;
    let errorMsg: string | null = null;
    let responseChars: number | null = null;

    try {
        const result = await work();
        if (options.measureResponse) {
            try {
                responseChars = options.measureResponse(result);
            } catch (measureError) {
                console.error(`[UsageStats] Failed to measure ${kind}:${name}: ${errorMessage(measureError)}`);
            }
        }
        return result;
    } catch (e) {
        success = false;
        errorMsg = errorMessage(e);
        throw e;
    } finally {
        const durationMs = Math.max(0, Math.round(performance.now() - startTime));
        try {
            await recorder.record(name, kind, { success, errorMsg, durationMs, responseChars });
        } catch (recordError) {
            console.error(`[UsageStats] Failed to record ${kind}:${name}: ${errorMessage(recordError)}`);
        }
    }
}

/**
 * Wrap a handler so every call is measured and recorded under `name`.
 */
export function wrapHandler<A extends unknown[], T>(
    recorder: UsageRecorder,
    name: string,
    handler: (...args: A) => Promise<T> | T,
    kind: PrimitiveKind = 'tool',
    options: TrackOptions<T> = {}
): (...args: A) => Promise<T> {
    return (...args: A) => trackInvocation(recorder, name, kind, () => handler(...args), options);
}
