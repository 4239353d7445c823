/**
 * Display-ready status for one tenant, derived from a session view and a
 * timestamp. Pure; the ticker and the status route both call it.
 */

import { elapsedPlayingSeconds } from "./progressClock";
import type { PlaybackState, SessionView } from "./playbackTypes";

export const PROGRESS_BAR_LENGTH = 20;
export const DEFAULT_QUEUE_PREVIEW_SIZE = 5;

const BAR_FILLED = "━";
const BAR_PLAYHEAD = "⚪";
const BAR_EMPTY = "┈";
const UNKNOWN_TIME = "--:--";

export interface StatusSnapshot {
    tenantId: string;
    state: PlaybackState;
    isPlaying: boolean;
    title: string | null;
    /** Label of the item being resolved, while resolving. */
    pendingTitle: string | null;
    thumbnailUrl: string | null;
    pageUrl: string | null;
    elapsedSeconds: number;
    durationSeconds: number;
    /** 0..1, or null when nothing plays or the length is unknown. */
    progressFraction: number | null;
    progressBar: string;
    elapsedLabel: string;
    totalLabel: string;
    queuePreview: string[];
    queueRemainingCount: number;
    queueLength: number;
    version: number;
    capturedAt: number;
}

export interface StatusSnapshotOptions {
    previewSize?: number;
    barLength?: number;
}

/** `MM:SS`; minutes keep counting past an hour. */
export function formatClock(seconds: number): string {
    const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
    const minutes = Math.floor(total / 60);
    const secs = total % 60;
    return `${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}`;
}

/**
 * Fixed-width bar with a playhead. Unknown or zero length renders as an
 * empty track.
 */
export function renderProgressBar(
    elapsedSeconds: number,
    totalSeconds: number,
    length: number = PROGRESS_BAR_LENGTH
): string {
    if (totalSeconds <= 0) {
        return BAR_EMPTY.repeat(length);
    }
    const clamped = Math.min(Math.max(elapsedSeconds, 0), totalSeconds);
    const position = Math.min(Math.floor((clamped / totalSeconds) * length), length - 1);
    return (
        BAR_FILLED.repeat(position) +
        BAR_PLAYHEAD +
        BAR_EMPTY.repeat(length - position - 1)
    );
}

export function buildStatusSnapshot(
    view: SessionView,
    now: number,
    options: StatusSnapshotOptions = {}
): StatusSnapshot {
    const previewSize = options.previewSize ?? DEFAULT_QUEUE_PREVIEW_SIZE;
    const barLength = options.barLength ?? PROGRESS_BAR_LENGTH;
    const { current, resolving, queue } = view;

    const durationSeconds = current?.track.durationSeconds ?? 0;
    const elapsedRaw = current ? elapsedPlayingSeconds(current.ledger, now) : 0;
    const elapsedSeconds = durationSeconds > 0 ? Math.min(elapsedRaw, durationSeconds) : elapsedRaw;

    return {
        tenantId: view.tenantId,
        state: view.state,
        isPlaying: view.state === "playing",
        title: current?.track.title ?? null,
        pendingTitle: resolving ? resolving.title ?? resolving.reference : null,
        thumbnailUrl: current?.track.thumbnailUrl ?? null,
        pageUrl: current?.track.pageUrl ?? null,
        elapsedSeconds,
        durationSeconds,
        progressFraction:
            current && durationSeconds > 0 ? elapsedSeconds / durationSeconds : null,
        progressBar: renderProgressBar(elapsedSeconds, current ? durationSeconds : 0, barLength),
        elapsedLabel: formatClock(elapsedSeconds),
        totalLabel: durationSeconds > 0 ? formatClock(durationSeconds) : UNKNOWN_TIME,
        queuePreview: queue.slice(0, previewSize).map((entry) => entry.title ?? entry.reference),
        queueRemainingCount: Math.max(queue.length - previewSize, 0),
        queueLength: queue.length,
        version: view.version,
        capturedAt: now,
    };
}
