import { logger, type Logger } from "../utils/logger";
import { buildStatusSnapshot, type StatusSnapshot } from "./statusSnapshot";
import type { PlaybackSession } from "./playbackSession";

export interface PlaybackNotice {
    tenantId: string;
    kind: "track-started" | "resolution-failed" | "driver-error" | "queue-drained";
    message: string;
    reference: string | null;
    at: number;
}

/** Where status snapshots and notices go: sockets in production, arrays in tests. */
export interface StatusPublisher {
    publishStatus(snapshot: StatusSnapshot): void;
    publishNotice(notice: PlaybackNotice): void;
}

export interface StatusTickerOptions {
    intervalMs: number;
    previewSize?: number;
    now?: () => number;
    logger?: Logger;
}

type ActiveSessionSource = { activeSessions(): PlaybackSession[] };

/**
 * Publishes a fresh snapshot of every non-idle session on a fixed interval.
 * Reads committed views only, so it never waits on a session's task queue.
 */
export class StatusTicker {
    private timer: ReturnType<typeof setInterval> | null = null;
    private readonly now: () => number;
    private readonly log: Logger;

    constructor(
        private readonly sessions: ActiveSessionSource,
        private readonly publisher: StatusPublisher,
        private readonly options: StatusTickerOptions
    ) {
        this.now = options.now ?? Date.now;
        this.log = options.logger ?? logger.child("ticker");
    }

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => {
            this.tick();
        }, this.options.intervalMs);
        this.timer.unref();
        this.log.debug(`Status ticker started (${this.options.intervalMs}ms)`);
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = null;
        this.log.debug("Status ticker stopped");
    }

    /** One publish pass. Returns how many snapshots went out. */
    tick(now: number = this.now()): number {
        let published = 0;
        for (const session of this.sessions.activeSessions()) {
            try {
                this.publisher.publishStatus(
                    buildStatusSnapshot(session.snapshot(), now, {
                        previewSize: this.options.previewSize,
                    })
                );
                published++;
            } catch (err) {
                this.log.error(`Status publish failed for tenant ${session.tenantId}`, {
                    error: err,
                });
            }
        }
        return published;
    }
}
