/**
 * Playback orchestrator service layer.
 *
 * The entry point for every tenant-facing command. Owns the tenant registry,
 * builds each tenant's session with its own driver, and turns session
 * callbacks into notices for the status publisher. Commands for a tenant that
 * has no session yet create one only where that makes sense (enqueue);
 * control commands on an unknown tenant are no-ops.
 */

import { logger, type Logger } from "../utils/logger";
import { isCancellation, type DriverError } from "../utils/errors";
import { linkAbortSignals } from "../utils/async";
import { CompletionBridge } from "./completionBridge";
import { PlaybackSession, idleView, type EnqueueOptions } from "./playbackSession";
import { TenantRegistry } from "./tenantRegistry";
import { buildStatusSnapshot, type StatusSnapshot } from "./statusSnapshot";
import type { PlaybackNotice, StatusPublisher } from "./statusTicker";
import type { TrackResolver } from "./trackResolver";
import type {
    PlaybackDriverFactory,
    QueueEntry,
    ResolveOptions,
    ResolvedTrack,
    TrackReference,
} from "./playbackTypes";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_SEARCH_RESULT_LIMIT = 5;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TrackCatalog = Pick<TrackResolver, "resolve" | "resolveCandidates" | "resolvePlaylist">;

export interface PlaybackOrchestratorOptions {
    resolver: TrackCatalog;
    driverFactory: PlaybackDriverFactory;
    publisher?: StatusPublisher;
    searchResultLimit?: number;
    queuePreviewSize?: number;
    now?: () => number;
    random?: () => number;
    /** Completion deferral, `setImmediate` by default. */
    defer?: (callback: () => void) => void;
    logger?: Logger;
}

export interface PlaylistEnqueueResult {
    added: number;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class PlaybackOrchestrator {
    readonly registry: TenantRegistry;
    readonly completions: CompletionBridge;
    private readonly now: () => number;
    private readonly log: Logger;

    constructor(private readonly options: PlaybackOrchestratorOptions) {
        this.now = options.now ?? Date.now;
        this.log = options.logger ?? logger.child("orchestrator");
        this.completions = new CompletionBridge({
            lookup: (tenantId) => this.registry.get(tenantId),
            defer: options.defer,
            logger: this.log.child("completion"),
        });
        this.registry = new TenantRegistry((tenantId) => this.createSession(tenantId));
    }

    // -----------------------------------------------------------------------
    // Queue commands
    // -----------------------------------------------------------------------

    /** Resolves to the queue length after the append. */
    enqueue(tenantId: string, query: TrackReference, options: EnqueueOptions = {}): Promise<number> {
        return this.registry.getOrCreate(tenantId).enqueue(query, options);
    }

    /**
     * List a playlist (URL or alias) off the session's task queue, then append
     * every usable entry in one step. The expansion belongs to the session it
     * started on: a stop or an ended tenant in the meantime discards it.
     */
    async enqueuePlaylist(
        tenantId: string,
        source: string,
        options: ResolveOptions = {}
    ): Promise<PlaylistEnqueueResult> {
        const session = this.registry.getOrCreate(tenantId);
        const cleared = session.clearSignal;
        const link = linkAbortSignals(options.signal, cleared);

        const references: TrackReference[] = [];
        try {
            for await (const reference of this.options.resolver.resolvePlaylist(source, {
                signal: link.signal,
            })) {
                references.push(reference);
            }
        } catch (err) {
            if (!(isCancellation(err) && cleared.aborted)) throw err;
        } finally {
            link.release();
        }

        if (cleared.aborted || session.isDisposed) {
            this.log.info(`Dropping playlist "${source}": session was stopped while listing`, {
                tenantId,
            });
            return { added: 0 };
        }
        if (references.length === 0) {
            this.log.info(`Playlist "${source}" had no playable entries`, { tenantId });
            return { added: 0 };
        }

        const added = await session.enqueueMany(references, { signal: cleared });
        this.log.info(`Queued ${added} tracks from playlist "${source}"`, { tenantId });
        return { added };
    }

    /** Ordered candidates for a pick-one search; nothing is queued. */
    search(query: string, count?: number, options: ResolveOptions = {}): Promise<ResolvedTrack[]> {
        const limit = count ?? this.options.searchResultLimit ?? DEFAULT_SEARCH_RESULT_LIMIT;
        return this.options.resolver.resolveCandidates(query, limit, options);
    }

    async shuffle(tenantId: string): Promise<boolean> {
        const session = this.registry.get(tenantId);
        return session ? session.shuffle() : false;
    }

    // -----------------------------------------------------------------------
    // Playback control
    // -----------------------------------------------------------------------

    async skip(tenantId: string): Promise<boolean> {
        const session = this.registry.get(tenantId);
        return session ? session.skip() : false;
    }

    async pause(tenantId: string): Promise<boolean> {
        const session = this.registry.get(tenantId);
        return session ? session.pause() : false;
    }

    async resume(tenantId: string): Promise<boolean> {
        const session = this.registry.get(tenantId);
        return session ? session.resume() : false;
    }

    async clearAndStop(tenantId: string): Promise<void> {
        const session = this.registry.get(tenantId);
        if (session) await session.clearAndStop();
    }

    /** Tenant left (e.g. disconnected): dispose its session entirely. */
    endTenant(tenantId: string): Promise<boolean> {
        return this.registry.remove(tenantId);
    }

    notifyFinished(tenantId: string, playbackId: string, error?: unknown): Promise<boolean> {
        return this.completions.notifyFinished(tenantId, playbackId, error);
    }

    // -----------------------------------------------------------------------
    // Status
    // -----------------------------------------------------------------------

    /** Unknown tenants get an idle snapshot. */
    status(tenantId: string, now: number = this.now()): StatusSnapshot {
        const view = this.registry.get(tenantId)?.snapshot() ?? idleView(tenantId);
        return buildStatusSnapshot(view, now, { previewSize: this.options.queuePreviewSize });
    }

    async shutdown(): Promise<void> {
        this.log.info(`Shutting down ${this.registry.size} sessions`);
        await this.registry.clear();
    }

    // -----------------------------------------------------------------------
    // Internals
    // -----------------------------------------------------------------------

    private createSession(tenantId: string): PlaybackSession {
        return new PlaybackSession(tenantId, {
            resolver: this.options.resolver,
            driver: this.options.driverFactory(tenantId, this.completions),
            now: this.options.now,
            random: this.options.random,
            logger: this.log.child("session"),
            callbacks: {
                onTrackStarted: (id, track, entry) =>
                    this.notice(id, "track-started", `Now playing: ${track.title}`, entry),
                onResolutionFailed: (id, entry, error) =>
                    this.notice(
                        id,
                        "resolution-failed",
                        error instanceof Error ? error.message : `Could not play ${entry.reference}`,
                        entry
                    ),
                onDriverError: (id, error: DriverError) =>
                    this.notice(id, "driver-error", error.message, null),
                onQueueDrained: (id) => {
                    this.notice(id, "queue-drained", "Queue finished", null);
                    this.publishStatus(id);
                },
            },
        });
    }

    private notice(
        tenantId: string,
        kind: PlaybackNotice["kind"],
        message: string,
        entry: QueueEntry | null
    ): void {
        const publisher = this.options.publisher;
        if (!publisher) return;
        try {
            publisher.publishNotice({
                tenantId,
                kind,
                message,
                reference: entry?.reference ?? null,
                at: this.now(),
            });
        } catch (err) {
            this.log.error(`Notice publish failed for tenant ${tenantId}`, { error: err });
        }
    }

    private publishStatus(tenantId: string): void {
        const publisher = this.options.publisher;
        if (!publisher) return;
        try {
            publisher.publishStatus(this.status(tenantId));
        } catch (err) {
            this.log.error(`Status publish failed for tenant ${tenantId}`, { error: err });
        }
    }
}
