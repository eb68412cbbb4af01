import { EventType, type MatrixEvent } from "matrix-js-sdk";

import type { JoinEvent } from "./types.js";

export const DEFAULT_STARTUP_GRACE_MS = 5000;

type MemberEventContent = {
  membership?: string;
};

/**
 * Maps a timeline event to a join, or `null` when it is not a transition into `join`
 * (profile updates re-send `join` over `join`).
 */
export function resolveJoinEvent(params: {
  event: MatrixEvent;
  roomId?: string;
  toStartOfTimeline?: boolean;
  /** The SDK marks events added outside the live timeline with `liveEvent: false`. */
  liveEvent?: boolean;
  initialSyncComplete: boolean;
  startupMs: number;
  startupGraceMs?: number;
}): JoinEvent | null {
  const { event } = params;
  if (event.getType() !== EventType.RoomMember) return null;
  const userId = event.getStateKey();
  const roomId = params.roomId ?? event.getRoomId();
  if (!userId || !roomId) return null;
  if (event.getContent<MemberEventContent>().membership !== "join") return null;
  const previous: unknown = event.getPrevContent().membership;
  if (previous === "join") return null;

  const graceMs = params.startupGraceMs ?? DEFAULT_STARTUP_GRACE_MS;
  const ts = event.getTs();
  const replayed =
    params.toStartOfTimeline === true ||
    params.liveEvent === false ||
    !params.initialSyncComplete ||
    (ts > 0 && ts < params.startupMs - graceMs);
  return {
    userId,
    roomId,
    origin: replayed ? "state" : "live",
    eventId: event.getId() ?? undefined,
  };
}

export function isMonitoredRoom(rooms: readonly string[], roomId: string): boolean {
  return rooms.includes(roomId);
}

export function shouldGreet(
  join: JoinEvent,
  params: { rooms: readonly string[]; selfUserId?: string | null },
): boolean {
  if (join.origin !== "live") return false;
  if (params.selfUserId && join.userId === params.selfUserId) return false;
  return isMonitoredRoom(params.rooms, join.roomId);
}
