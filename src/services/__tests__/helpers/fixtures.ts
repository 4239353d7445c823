import {
    AppError,
    ErrorCategory,
    ErrorCode,
    ResolutionCancelledError,
} from "../../../utils/errors";
import type { ExtractionContext, MediaExtractor } from "../../mediaExtractor";
import type { PlaybackSession } from "../../playbackSession";
import type {
    PlaybackDriver,
    ResolveOptions,
    ResolvedTrack,
    SourceHandle,
} from "../../playbackTypes";

export function makeTrack(title: string, overrides: Partial<ResolvedTrack> = {}): ResolvedTrack {
    const slug = title.toLowerCase().replace(/\s+/g, "-");
    return {
        title,
        durationSeconds: 180,
        source: { streamUrl: `https://cdn.media.example/${slug}.webm`, httpHeaders: {} },
        thumbnailUrl: null,
        pageUrl: `https://media.example/watch?v=${slug}`,
        uploader: null,
        ...overrides,
    };
}

export interface FakeContextHandlers {
    extract?: ExtractionContext["extract"];
    search?: ExtractionContext["search"];
    listPlaylist?: ExtractionContext["listPlaylist"];
}

export interface FakeExtractor {
    extractor: MediaExtractor;
    /** Every context handed out, in order. */
    opened: Array<{ close: jest.Mock }>;
}

function notStubbed(name: string): Promise<never> {
    return Promise.reject(new Error(`${name} not stubbed`));
}

export function createFakeExtractor(handlers: FakeContextHandlers): FakeExtractor {
    const opened: Array<{ close: jest.Mock }> = [];
    const extractor: MediaExtractor = {
        openContext: () => {
            const context = {
                extract: (url: string, signal?: AbortSignal) =>
                    handlers.extract ? handlers.extract(url, signal) : notStubbed("extract"),
                search: (query: string, limit: number, signal?: AbortSignal) =>
                    handlers.search
                        ? handlers.search(query, limit, signal)
                        : notStubbed("search"),
                listPlaylist: (url: string, limit: number, signal?: AbortSignal) =>
                    handlers.listPlaylist
                        ? handlers.listPlaylist(url, limit, signal)
                        : notStubbed("listPlaylist"),
                close: jest.fn(),
            };
            opened.push(context);
            return context;
        },
        isAvailable: async () => true,
    };
    return { extractor, opened };
}

// ── Sessions ───────────────────────────────────────────────────────

export class FakeDriver implements PlaybackDriver {
    private active: string | null = null;
    readonly start = jest.fn(async (_source: SourceHandle, playbackId: string) => {
        this.active = playbackId;
    });
    readonly stop = jest.fn(async () => {
        this.active = null;
    });
    readonly pause = jest.fn(async () => undefined);
    readonly resume = jest.fn(async () => undefined);
    readonly onFinished = jest.fn((_playbackId: string) => undefined);
    readonly dispose = jest.fn(async () => undefined);

    isActive(): boolean {
        return this.active !== null;
    }
}

/** Resolves every reference to a track titled after it, except the listed failures. */
export function createInstantResolver(failures: Record<string, Error> = {}) {
    return {
        resolve: jest.fn(async (query: string, _options?: ResolveOptions) => {
            const failure = failures[query];
            if (failure) throw failure;
            return makeTrack(query);
        }),
    };
}

export interface FakeCatalogOptions {
    playlists?: Record<string, string[]>;
    failures?: Record<string, Error>;
}

/**
 * Stand-in for the full resolver: instant resolution, numbered search
 * candidates, and playlists from a fixed table.
 */
export function createFakeCatalog(options: FakeCatalogOptions = {}) {
    const { resolve } = createInstantResolver(options.failures);
    return {
        resolve,
        resolveCandidates: jest.fn(
            async (query: string, count: number, _options?: ResolveOptions) =>
                Array.from({ length: count }, (_, index) => makeTrack(`${query} ${index + 1}`))
        ),
        resolvePlaylist: jest.fn(async function* (source: string, _options?: ResolveOptions) {
            const references = options.playlists?.[source];
            if (!references) {
                throw new AppError(
                    ErrorCode.PLAYLIST_NOT_FOUND,
                    ErrorCategory.RECOVERABLE,
                    `Unknown playlist "${source}"`
                );
            }
            yield* references;
        }),
    };
}

export interface PendingResolution {
    query: string;
    signal: AbortSignal | undefined;
    succeed(track: ResolvedTrack): void;
    fail(error: unknown): void;
}

/**
 * Every resolve call stays pending until the test settles it. With
 * `honorAbort`, aborting the signal rejects the call the way the real
 * resolver does.
 */
export function createScriptedResolver(options: { honorAbort?: boolean } = {}) {
    const pending: PendingResolution[] = [];
    const resolver = {
        resolve: jest.fn((query: string, resolveOptions: ResolveOptions = {}) => {
            return new Promise<ResolvedTrack>((resolve, reject) => {
                const signal = resolveOptions.signal;
                if (options.honorAbort ?? true) {
                    signal?.addEventListener("abort", () =>
                        reject(new ResolutionCancelledError(query))
                    );
                }
                pending.push({ query, signal, succeed: resolve, fail: reject });
            });
        }),
    };
    return { resolver, pending };
}

export function currentPlaybackId(session: PlaybackSession): string {
    const playbackId = session.snapshot().current?.playbackId;
    if (!playbackId) {
        throw new Error(`Nothing is playing for ${session.tenantId}`);
    }
    return playbackId;
}

export function pendingReferences(session: PlaybackSession): string[] {
    return session.snapshot().queue.map((entry) => entry.reference);
}

/** Lets posted outcome tasks run. */
export function flushTasks(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}
