import type { IRoomTimelineData, MatrixEvent, Room } from "matrix-js-sdk";

import { danger, logVerbose } from "../globals.js";
import type { RuntimeEnv } from "../runtime.js";
import type { JoinHandler } from "./handler.js";
import { resolveJoinEvent, shouldGreet } from "./join-filter.js";

export type JoinTimelineListener = (
  event: MatrixEvent,
  room: Pick<Room, "roomId"> | undefined,
  toStartOfTimeline: boolean | undefined,
  removed: boolean,
  data: Pick<IRoomTimelineData, "liveEvent">,
) => void;

/** `RoomEvent.Timeline` listener that hands live joins in monitored rooms to the handler. */
export function createJoinTimelineListener(params: {
  rooms: readonly string[];
  handler: JoinHandler;
  runtime: RuntimeEnv;
  getUserId: () => string | null;
  isInitialSyncDone: () => boolean;
  startupMs: number;
}): JoinTimelineListener {
  const { handler, runtime } = params;
  return (event, room, toStartOfTimeline, _removed, data) => {
    const join = resolveJoinEvent({
      event,
      roomId: room?.roomId,
      toStartOfTimeline,
      liveEvent: data.liveEvent,
      initialSyncComplete: params.isInitialSyncDone(),
      startupMs: params.startupMs,
    });
    if (!join) return;
    if (!shouldGreet(join, { rooms: params.rooms, selfUserId: params.getUserId() })) {
      logVerbose(`greeter: ignoring ${join.origin} join user=${join.userId} room=${join.roomId}`);
      return;
    }
    handler.handleJoin(join).catch((err: unknown) => {
      runtime.error(danger(`greeter: join handler failed for ${join.userId}: ${String(err)}`));
    });
  };
}
