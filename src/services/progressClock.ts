/**
 * Elapsed-playing-time accounting over a pause ledger.
 *
 * Pure functions: every call returns a new ledger and never reads the wall
 * clock itself, so callers pass `now` (epoch ms).
 */

import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import type { PauseLedger } from "./playbackTypes";

export function startLedger(now: number): PauseLedger {
    return { startedAt: now, pausedAt: null, accumulatedPauseSeconds: 0 };
}

export function isPaused(ledger: PauseLedger): boolean {
    return ledger.pausedAt !== null;
}

/**
 * Seconds of actual playback. Frozen while paused; clamped at 0 when the
 * clock runs backwards.
 */
export function elapsedPlayingSeconds(ledger: PauseLedger, now: number): number {
    const end = ledger.pausedAt ?? now;
    const elapsed = (end - ledger.startedAt) / 1000 - ledger.accumulatedPauseSeconds;
    return elapsed > 0 ? elapsed : 0;
}

export function onPause(ledger: PauseLedger, now: number): PauseLedger {
    if (ledger.pausedAt !== null) {
        throw new AppError(
            ErrorCode.CLOCK_STATE,
            ErrorCategory.RECOVERABLE,
            "Cannot pause: already paused",
            { pausedAt: ledger.pausedAt }
        );
    }
    return { ...ledger, pausedAt: now };
}

export function onResume(ledger: PauseLedger, now: number): PauseLedger {
    if (ledger.pausedAt === null) {
        throw new AppError(
            ErrorCode.CLOCK_STATE,
            ErrorCategory.RECOVERABLE,
            "Cannot resume: not paused"
        );
    }
    const pausedFor = Math.max(0, (now - ledger.pausedAt) / 1000);
    return {
        startedAt: ledger.startedAt,
        pausedAt: null,
        accumulatedPauseSeconds: ledger.accumulatedPauseSeconds + pausedFor,
    };
}
