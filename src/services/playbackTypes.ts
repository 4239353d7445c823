/**
 * Shared playback types: what the resolver produces, what a session holds,
 * and the contract every audio output driver implements.
 */

// ---------------------------------------------------------------------------
// Tracks
// ---------------------------------------------------------------------------

/** What a tenant asked for: a URL or free search text. Never rewritten. */
export type TrackReference = string;

/** Opaque to the orchestrator; only the playback driver looks inside. */
export interface SourceHandle {
    streamUrl: string;
    httpHeaders: Record<string, string>;
    mimeType?: string;
}

export interface ResolvedTrack {
    title: string;
    /** 0 means unknown length (live streams). */
    durationSeconds: number;
    source: SourceHandle;
    thumbnailUrl: string | null;
    pageUrl: string | null;
    uploader: string | null;
}

// ---------------------------------------------------------------------------
// Session state
// ---------------------------------------------------------------------------

export type PlaybackState = "idle" | "resolving" | "playing" | "paused";

export interface QueueEntry {
    reference: TrackReference;
    /** Display hint only, e.g. a search result title. */
    title?: string;
}

export interface PauseLedger {
    /** Epoch ms. */
    startedAt: number;
    /** Epoch ms; set only while paused. */
    pausedAt: number | null;
    accumulatedPauseSeconds: number;
}

export interface NowPlaying {
    entry: QueueEntry;
    track: ResolvedTrack;
    ledger: PauseLedger;
    /** Issued per driver start; completion notices must echo it. */
    playbackId: string;
}

/** Immutable point-in-time view of one tenant's session. */
export interface SessionView {
    tenantId: string;
    state: PlaybackState;
    queue: readonly QueueEntry[];
    resolving: QueueEntry | null;
    current: NowPlaying | null;
    /** Bumped on every committed transition. */
    version: number;
}

// ---------------------------------------------------------------------------
// Playback driver
// ---------------------------------------------------------------------------

/**
 * One audio output per tenant. After every `start` the driver reports the end
 * of that playback exactly once through the completion bridge, whether the
 * stream ended, was stopped, or failed.
 */
export interface PlaybackDriver {
    start(source: SourceHandle, playbackId: string): Promise<void>;
    stop(): Promise<void>;
    pause(): Promise<void>;
    resume(): Promise<void>;
    isActive(): boolean;
    /** Called from the session's task loop when a completion for `playbackId` is processed. */
    onFinished?(playbackId: string): void;
    dispose?(): Promise<void>;
}

/** Where drivers report that a playback ended. Resolves once the session has handled it. */
export interface CompletionSink {
    notifyFinished(tenantId: string, playbackId: string, error?: unknown): Promise<boolean>;
}

export type PlaybackDriverFactory = (
    tenantId: string,
    completions: CompletionSink
) => PlaybackDriver;

// ---------------------------------------------------------------------------
// Resolver contract seen by sessions
// ---------------------------------------------------------------------------

export interface ResolveOptions {
    signal?: AbortSignal;
}

export interface TrackResolving {
    resolve(query: TrackReference, options?: ResolveOptions): Promise<ResolvedTrack>;
}
