/**
 * Carries "playback finished" notices from a driver's own context (an HTTP
 * webhook, a media library callback) onto the owning session's task queue.
 * The notice is deferred to a later turn of the event loop and then posted
 * as an `advance` task; the driver's callback never touches session state.
 */

import { logger, type Logger } from "../utils/logger";
import type { CompletionSink } from "./playbackTypes";
import type { PlaybackSession } from "./playbackSession";

export type SessionLookup = (tenantId: string) => PlaybackSession | undefined;

export interface CompletionBridgeOptions {
    lookup: SessionLookup;
    /** Defaults to `setImmediate`. */
    defer?: (callback: () => void) => void;
    logger?: Logger;
}

export class CompletionBridge implements CompletionSink {
    private readonly lookup: SessionLookup;
    private readonly defer: (callback: () => void) => void;
    private readonly log: Logger;

    constructor(options: CompletionBridgeOptions) {
        this.lookup = options.lookup;
        this.defer = options.defer ?? ((callback) => setImmediate(callback));
        this.log = options.logger ?? logger.child("completion");
    }

    /**
     * Safe to call from any context. Resolves to true when the session
     * advanced, false for unknown tenants and stale playback ids. Never rejects.
     */
    notifyFinished(tenantId: string, playbackId: string, error?: unknown): Promise<boolean> {
        return new Promise((resolve) => {
            this.defer(() => {
                this.deliver(tenantId, playbackId, error).then(resolve, (err: unknown) => {
                    this.log.error(`Failed to apply completion for tenant ${tenantId}`, {
                        playbackId,
                        error: err,
                    });
                    resolve(false);
                });
            });
        });
    }

    private async deliver(
        tenantId: string,
        playbackId: string,
        error: unknown
    ): Promise<boolean> {
        const session = this.lookup(tenantId);
        if (!session || session.isDisposed) {
            this.log.debug(`Completion for unknown tenant ${tenantId} dropped`, { playbackId });
            return false;
        }
        return session.advance(playbackId, error);
    }
}
