/**
 * Per-tenant playback session.
 *
 * Owns one tenant's queue, the item being resolved, the item playing and its
 * pause ledger. Every mutation runs on a single-concurrency task queue, so
 * commands, resolution outcomes and driver completions for one tenant are
 * applied one at a time and in arrival order. Resolution itself runs off that
 * path: a slow extraction never blocks skip/pause/status for the tenant, and
 * its outcome is posted back as a task tagged with the attempt id. Outcomes
 * for an attempt that was cancelled in the meantime are dropped.
 */

import PQueue from "p-queue";
import { randomUUID } from "crypto";
import { logger, type Logger } from "../utils/logger";
import {
    AppError,
    DriverError,
    ErrorCategory,
    ErrorCode,
    isCancellation,
} from "../utils/errors";
import { shuffleArray } from "../utils/shuffle";
import { onPause, onResume, startLedger } from "./progressClock";
import type {
    NowPlaying,
    PlaybackDriver,
    QueueEntry,
    ResolvedTrack,
    SessionView,
    TrackReference,
    TrackResolving,
} from "./playbackTypes";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SessionCallbacks {
    onTrackStarted?: (tenantId: string, track: ResolvedTrack, entry: QueueEntry) => void;
    onResolutionFailed?: (tenantId: string, entry: QueueEntry, error: unknown) => void;
    onDriverError?: (tenantId: string, error: DriverError) => void;
    onQueueDrained?: (tenantId: string) => void;
}

export interface PlaybackSessionOptions {
    resolver: TrackResolving;
    driver: PlaybackDriver;
    callbacks?: SessionCallbacks;
    /** Epoch ms. */
    now?: () => number;
    random?: () => number;
    logger?: Logger;
}

export interface EnqueueOptions {
    title?: string;
}

export interface EnqueueManyOptions {
    /** Skip the append when this has fired by the time the task runs. */
    signal?: AbortSignal;
}

type ResolutionOutcome =
    | { ok: true; track: ResolvedTrack }
    | { ok: false; error: unknown };

interface InFlightResolution {
    id: string;
    entry: QueueEntry;
    controller: AbortController;
    /** Settles once the outcome task has run (or been dropped). */
    done: Promise<void>;
}

type ViewPatch = Partial<Omit<SessionView, "tenantId" | "version">>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function idleView(tenantId: string): SessionView {
    const view: SessionView = {
        tenantId,
        state: "idle",
        queue: [],
        resolving: null,
        current: null,
        version: 0,
    };
    return Object.freeze(view);
}

function toEntry(reference: TrackReference, title?: string): QueueEntry {
    const trimmedTitle = title?.trim();
    const entry: QueueEntry = trimmedTitle ? { reference, title: trimmedTitle } : { reference };
    return Object.freeze(entry);
}

function freezeTrack(track: ResolvedTrack): ResolvedTrack {
    const source = Object.freeze({
        ...track.source,
        httpHeaders: Object.freeze({ ...track.source.httpHeaders }),
    });
    return Object.freeze({ ...track, source });
}

/** Views share `current` between versions, so it is frozen all the way down. */
function freezeNowPlaying(current: NowPlaying): NowPlaying {
    if (Object.isFrozen(current)) return current;
    return Object.freeze({
        ...current,
        entry: Object.isFrozen(current.entry) ? current.entry : Object.freeze({ ...current.entry }),
        track: Object.isFrozen(current.track) ? current.track : freezeTrack(current.track),
        ledger: Object.freeze({ ...current.ledger }),
    });
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export class PlaybackSession {
    private view: SessionView;
    private readonly tasks = new PQueue({ concurrency: 1 });
    private inFlight: InFlightResolution | null = null;
    private clearing = new AbortController();
    private disposed = false;
    private readonly now: () => number;
    private readonly random: () => number;
    private readonly log: Logger;

    constructor(
        readonly tenantId: string,
        private readonly options: PlaybackSessionOptions
    ) {
        this.view = idleView(tenantId);
        this.now = options.now ?? Date.now;
        this.random = options.random ?? Math.random;
        this.log = (options.logger ?? logger.child("session")).withContext({ tenantId });
    }

    /** Latest committed view. Never torn: views are replaced, not mutated. */
    snapshot(): SessionView {
        return this.view;
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    /**
     * Fires on the next clear (stop or dispose). Work done for this session
     * off its task queue, such as playlist expansion, listens to it so a
     * result arriving after the user stopped is dropped.
     */
    get clearSignal(): AbortSignal {
        return this.clearing.signal;
    }

    // -----------------------------------------------------------------------
    // Queue operations
    // -----------------------------------------------------------------------

    /**
     * Append a reference. Starts resolution right away when the session was
     * idle. Resolves to the queue length after the append.
     */
    enqueue(reference: TrackReference, options: EnqueueOptions = {}): Promise<number> {
        return this.run(async () => {
            const queue = [...this.view.queue, toEntry(reference, options.title)];
            this.commit({ queue });
            if (this.view.state === "idle") this.startNext();
            return queue.length;
        });
    }

    /** Append several references as one transition. Resolves to how many were added. */
    enqueueMany(
        references: readonly TrackReference[],
        options: EnqueueManyOptions = {}
    ): Promise<number> {
        return this.run(async () => {
            if (references.length === 0 || options.signal?.aborted) return 0;
            this.commit({
                queue: [...this.view.queue, ...references.map((ref) => toEntry(ref))],
            });
            if (this.view.state === "idle") this.startNext();
            return references.length;
        });
    }

    /** Reorder pending items. False (and no change) with fewer than two. */
    shuffle(): Promise<boolean> {
        return this.run(async () => {
            if (this.view.queue.length < 2) return false;
            this.commit({ queue: shuffleArray(this.view.queue, this.random) });
            return true;
        });
    }

    // -----------------------------------------------------------------------
    // Playback control
    // -----------------------------------------------------------------------

    /**
     * Playing/Paused: stop the driver; its completion advances the queue.
     * Resolving: abandon the attempt and move on to the next item.
     * Idle: nothing to skip.
     */
    skip(): Promise<boolean> {
        return this.run(async () => {
            const { state, current } = this.view;

            if (state === "resolving") {
                this.cancelResolution();
                this.startNext();
                return true;
            }

            if (!current) return false;

            try {
                await this.options.driver.stop();
            } catch (err) {
                this.reportDriverError("stop", err);
                // A failed stop counts as the end of this playback.
                if (this.view.current?.playbackId === current.playbackId) {
                    this.startNext();
                }
            }
            return true;
        });
    }

    pause(): Promise<boolean> {
        return this.run(async () => {
            const current = this.view.current;
            if (this.view.state !== "playing" || !current) return false;

            try {
                await this.options.driver.pause();
            } catch (err) {
                this.reportDriverError("pause", err);
                return false;
            }
            this.commit({
                state: "paused",
                current: { ...current, ledger: onPause(current.ledger, this.now()) },
            });
            return true;
        });
    }

    resume(): Promise<boolean> {
        return this.run(async () => {
            const current = this.view.current;
            if (this.view.state !== "paused" || !current) return false;

            try {
                await this.options.driver.resume();
            } catch (err) {
                this.reportDriverError("resume", err);
                return false;
            }
            this.commit({
                state: "playing",
                current: { ...current, ledger: onResume(current.ledger, this.now()) },
            });
            return true;
        });
    }

    /** Empty the queue, abandon any resolution, stop output, go idle. */
    clearAndStop(): Promise<void> {
        return this.run(async () => {
            this.cancelResolution();
            this.clearing.abort();
            this.clearing = new AbortController();
            const hadCurrent = this.view.current !== null;
            this.commit({ state: "idle", queue: [], resolving: null, current: null });

            if (hadCurrent || this.options.driver.isActive()) {
                try {
                    await this.options.driver.stop();
                } catch (err) {
                    this.reportDriverError("stop", err);
                }
            }
        });
    }

    /**
     * Completion of playback `playbackId`, reported by the driver through the
     * completion bridge. Ids other than the current one are stale and ignored.
     * Resolves to whether the queue advanced.
     */
    advance(playbackId: string, error?: unknown): Promise<boolean> {
        return this.run(async () => {
            this.options.driver.onFinished?.(playbackId);

            const current = this.view.current;
            if (!current || current.playbackId !== playbackId) {
                this.log.debug("Ignoring stale completion", { playbackId });
                return false;
            }
            if (error) {
                this.log.warn(`Playback of "${current.track.title}" ended with an error`, {
                    playbackId,
                    error,
                });
            }
            this.startNext();
            return true;
        });
    }

    // -----------------------------------------------------------------------
    // Lifecycle
    // -----------------------------------------------------------------------

    /**
     * Resolves once no task is queued or running and no resolution is in
     * flight. Used by shutdown and by tests.
     */
    async settled(): Promise<void> {
        for (;;) {
            await this.tasks.onIdle();
            const pending = this.inFlight?.done;
            if (pending) {
                await pending;
                continue;
            }
            if (this.tasks.size === 0 && this.tasks.pending === 0) return;
        }
    }

    /** Stop everything and refuse further commands. Idempotent. */
    async dispose(): Promise<void> {
        if (this.disposed) return;
        const cleared = this.clearAndStop();
        this.disposed = true;
        await cleared;

        const { driver } = this.options;
        if (driver.dispose) {
            try {
                await driver.dispose();
            } catch (err) {
                this.reportDriverError("dispose", err);
            }
        }
        this.log.debug("Session disposed");
    }

    // -----------------------------------------------------------------------
    // Internals
    // -----------------------------------------------------------------------

    private run<T>(task: () => Promise<T>): Promise<T> {
        if (this.disposed) {
            return Promise.reject(
                new AppError(
                    ErrorCode.SESSION_DISPOSED,
                    ErrorCategory.RECOVERABLE,
                    `Session for tenant ${this.tenantId} has ended`,
                    { tenantId: this.tenantId }
                )
            );
        }
        return this.tasks.add<T>(task);
    }

    private commit(patch: ViewPatch): void {
        const next: SessionView = {
            ...this.view,
            ...patch,
            version: this.view.version + 1,
        };
        next.queue = Object.freeze([...next.queue]);
        if (next.current) next.current = freezeNowPlaying(next.current);
        if (next.resolving && !Object.isFrozen(next.resolving)) {
            next.resolving = Object.freeze({ ...next.resolving });
        }
        this.view = Object.freeze(next);
    }

    /** Pop the queue front into Resolving, or go Idle when empty. Must run as a task. */
    private startNext(): void {
        const [next, ...rest] = this.view.queue;
        if (!next) {
            this.commit({ state: "idle", resolving: null, current: null });
            this.options.callbacks?.onQueueDrained?.(this.tenantId);
            return;
        }

        const id = randomUUID();
        const controller = new AbortController();
        this.commit({ state: "resolving", queue: rest, resolving: next, current: null });

        const done = this.options.resolver
            .resolve(next.reference, { signal: controller.signal })
            .then(
                (track): ResolutionOutcome => ({ ok: true, track }),
                (error: unknown): ResolutionOutcome => ({ ok: false, error })
            )
            .then((outcome) =>
                this.tasks.add<void>(() => this.finishResolution(id, next, outcome))
            )
            .catch((err: unknown) => {
                this.log.error("Resolution outcome could not be applied", {
                    reference: next.reference,
                    error: err,
                });
            });

        this.inFlight = { id, entry: next, controller, done };
    }

    private cancelResolution(): void {
        if (!this.inFlight) return;
        this.log.debug(`Cancelling resolution of "${this.inFlight.entry.reference}"`);
        this.inFlight.controller.abort();
        this.inFlight = null;
    }

    private async finishResolution(
        id: string,
        entry: QueueEntry,
        outcome: ResolutionOutcome
    ): Promise<void> {
        if (this.inFlight?.id !== id) {
            this.log.debug(`Dropping outcome of abandoned resolution "${entry.reference}"`);
            return;
        }
        this.inFlight = null;

        if (!outcome.ok) {
            if (!isCancellation(outcome.error)) {
                this.log.warn(`Skipping "${entry.reference}": resolution failed`, {
                    error: outcome.error,
                });
                this.options.callbacks?.onResolutionFailed?.(
                    this.tenantId,
                    entry,
                    outcome.error
                );
            }
            this.startNext();
            return;
        }

        await this.beginPlayback(entry, outcome.track);
    }

    private async beginPlayback(entry: QueueEntry, track: ResolvedTrack): Promise<void> {
        const playbackId = randomUUID();
        this.commit({
            state: "playing",
            resolving: null,
            current: {
                entry,
                track: freezeTrack(track),
                ledger: startLedger(this.now()),
                playbackId,
            },
        });

        try {
            await this.options.driver.start(track.source, playbackId);
        } catch (err) {
            // A start that failed will never report completion.
            this.reportDriverError("start", err);
            this.startNext();
            return;
        }

        this.log.info(`Now playing "${track.title}"`, { playbackId });
        this.options.callbacks?.onTrackStarted?.(this.tenantId, track, entry);
    }

    private reportDriverError(operation: string, err: unknown): void {
        const error =
            err instanceof DriverError ? err : new DriverError(this.tenantId, operation, err);
        this.log.warn(error.message);
        this.options.callbacks?.onDriverError?.(this.tenantId, error);
    }
}
