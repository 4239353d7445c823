import { logger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import type { PlaybackSession } from "./playbackSession";

const log = logger.child("registry");

export type SessionFactory = (tenantId: string) => PlaybackSession;

function assertTenantId(tenantId: string): void {
    if (tenantId.trim().length === 0) {
        throw new AppError(
            ErrorCode.INVALID_REQUEST,
            ErrorCategory.RECOVERABLE,
            "Tenant id must not be empty"
        );
    }
}

/**
 * Tenant id → session. Sessions are created lazily on first use and live
 * until `remove`. Lookups from different tenants never touch each other's
 * session, so one tenant's slow resolution cannot hold up another.
 */
export class TenantRegistry {
    private readonly sessions = new Map<string, PlaybackSession>();

    constructor(private readonly factory: SessionFactory) {}

    getOrCreate(tenantId: string): PlaybackSession {
        assertTenantId(tenantId);
        const existing = this.sessions.get(tenantId);
        if (existing) return existing;

        const session = this.factory(tenantId);
        this.sessions.set(tenantId, session);
        log.debug(`Created session for tenant ${tenantId} (${this.sessions.size} active)`);
        return session;
    }

    get(tenantId: string): PlaybackSession | undefined {
        return this.sessions.get(tenantId);
    }

    /**
     * Dispose and forget a tenant's session. The entry is dropped before the
     * dispose runs, so a concurrent `getOrCreate` gets a fresh session.
     */
    async remove(tenantId: string): Promise<boolean> {
        const session = this.sessions.get(tenantId);
        if (!session) return false;

        this.sessions.delete(tenantId);
        await session.dispose();
        log.debug(`Removed session for tenant ${tenantId}`);
        return true;
    }

    tenantIds(): string[] {
        return Array.from(this.sessions.keys());
    }

    /** Sessions not currently idle. */
    activeSessions(): PlaybackSession[] {
        return Array.from(this.sessions.values()).filter(
            (session) => session.snapshot().state !== "idle"
        );
    }

    get size(): number {
        return this.sessions.size;
    }

    async clear(): Promise<void> {
        const ids = this.tenantIds();
        const results = await Promise.allSettled(ids.map((id) => this.remove(id)));
        results.forEach((result, index) => {
            if (result.status === "rejected") {
                log.error(`Failed to dispose session for tenant ${ids[index]}`, {
                    error: result.reason,
                });
            }
        });
    }
}
