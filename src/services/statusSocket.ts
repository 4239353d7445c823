/**
 * Socket.IO surface for live status.
 *
 * Displays join the room of the tenant they show (`status:subscribe`) and
 * receive `status` snapshots from the ticker plus `notice` events for
 * track changes and failures.
 */

import type { Server as HttpServer } from "http";
import { Server } from "socket.io";
import { logger } from "../utils/logger";
import type { PlaybackOrchestrator } from "./playbackOrchestrator";
import type { StatusSnapshot } from "./statusSnapshot";
import type { PlaybackNotice, StatusPublisher } from "./statusTicker";

const log = logger.child("status-ws");

export const STATUS_SOCKET_PATH = "/socket.io/status";
const STATUS_PING_INTERVAL_MS = 25_000;
const STATUS_PING_TIMEOUT_MS = 60_000;

export type RoomEmitter = (room: string, event: string, payload: unknown) => void;

export interface RoomMember {
    join(room: string): unknown;
    leave(room: string): unknown;
}

export type SubscribeAck =
    | { ok: true; status: StatusSnapshot }
    | { ok: false; error: string };

export function statusRoom(tenantId: string): string {
    return `tenant:${tenantId}`;
}

function sendAck(ack: unknown, res: unknown): void {
    if (typeof ack === "function") {
        ack(res);
    }
}

function parseTenantId(value: unknown): string | null {
    if (typeof value !== "string") return null;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

// ---------------------------------------------------------------------------
// Publisher
// ---------------------------------------------------------------------------

export function createSocketStatusPublisher(emitToRoom: RoomEmitter): StatusPublisher {
    return {
        publishStatus(snapshot: StatusSnapshot) {
            emitToRoom(statusRoom(snapshot.tenantId), "status", snapshot);
        },
        publishNotice(notice: PlaybackNotice) {
            emitToRoom(statusRoom(notice.tenantId), "notice", notice);
        },
    };
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

/** Joins the tenant's room and answers with its current status. */
export function subscribeToStatus(
    socket: RoomMember,
    orchestrator: Pick<PlaybackOrchestrator, "status">,
    rawTenantId: unknown
): SubscribeAck {
    const tenantId = parseTenantId(rawTenantId);
    if (!tenantId) {
        return { ok: false, error: "tenantId must be a non-empty string" };
    }
    socket.join(statusRoom(tenantId));
    return { ok: true, status: orchestrator.status(tenantId) };
}

export function unsubscribeFromStatus(socket: RoomMember, rawTenantId: unknown): boolean {
    const tenantId = parseTenantId(rawTenantId);
    if (!tenantId) return false;
    socket.leave(statusRoom(tenantId));
    return true;
}

// ---------------------------------------------------------------------------
// Socket.IO setup
// ---------------------------------------------------------------------------

let io: Server | null = null;

export function setupStatusSocket(
    httpServer: HttpServer,
    orchestrator: Pick<PlaybackOrchestrator, "status">,
    allowedOrigins: string[] | true
): Server {
    io = new Server(httpServer, {
        path: STATUS_SOCKET_PATH,
        cors: { origin: allowedOrigins, credentials: true },
        pingInterval: STATUS_PING_INTERVAL_MS,
        pingTimeout: STATUS_PING_TIMEOUT_MS,
        maxHttpBufferSize: 1e5,
    });

    io.on("connection", (socket) => {
        log.debug(`Display connected: ${socket.id}`);

        socket.on("status:subscribe", (tenantId: unknown, ack: unknown) => {
            sendAck(ack, subscribeToStatus(socket, orchestrator, tenantId));
        });

        socket.on("status:unsubscribe", (tenantId: unknown, ack: unknown) => {
            sendAck(ack, { ok: unsubscribeFromStatus(socket, tenantId) });
        });

        socket.on("disconnect", (reason: string) => {
            log.debug(`Display disconnected: ${socket.id} (${reason})`);
        });
    });

    return io;
}

/** Publisher bound to the live server; emits nothing before setup or after shutdown. */
export function createStatusSocketPublisher(): StatusPublisher {
    return createSocketStatusPublisher((room, event, payload) => {
        io?.to(room).emit(event, payload);
    });
}

export function shutdownStatusSocket(): void {
    if (io) {
        io.close();
        io = null;
    }
}
