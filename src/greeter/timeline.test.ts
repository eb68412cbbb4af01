import { EventEmitter } from "node:events";

import { ClientEvent, type MatrixClient, MatrixEvent, RoomEvent, SyncState } from "matrix-js-sdk";
import { describe, expect, it, vi } from "vitest";

import { trackInitialSync } from "../matrix/client.js";
import type { JoinHandler } from "./handler.js";
import { createJoinTimelineListener } from "./timeline.js";

const LOBBY = "!lobby:example.org";
const STARTUP_MS = 1_700_000_000_000;

function joinEvent(userId: string, roomId = LOBBY): MatrixEvent {
  return new MatrixEvent({
    type: "m.room.member",
    state_key: userId,
    sender: userId,
    room_id: roomId,
    event_id: `$join-${userId.slice(1, userId.indexOf(":"))}`,
    origin_server_ts: STARTUP_MS + 60_000,
    content: { membership: "join" },
  });
}

function createTimelineHarness() {
  const emitter = new EventEmitter();
  const client = Object.assign(emitter, { getSyncState: () => null }) as unknown as MatrixClient;
  const initialSync = trackInitialSync(client);
  const handleJoin = vi.fn<JoinHandler["handleJoin"]>(async () => ({
    welcomed: true,
    notified: false,
    directMessaged: false,
  }));
  const runtime = {
    log: vi.fn(),
    error: vi.fn(),
    exit: vi.fn((code: number): never => {
      throw new Error(`exit ${code}`);
    }),
  };
  emitter.on(
    RoomEvent.Timeline,
    createJoinTimelineListener({
      rooms: [LOBBY],
      handler: { handleJoin },
      runtime,
      getUserId: () => "@greeter:example.org",
      isInitialSyncDone: initialSync.isDone,
      startupMs: STARTUP_MS,
    }),
  );
  const emitJoin = (
    event: MatrixEvent,
    opts: { toStartOfTimeline?: boolean; liveEvent?: boolean } = {},
  ) => {
    emitter.emit(
      RoomEvent.Timeline,
      event,
      { roomId: event.getRoomId() },
      opts.toStartOfTimeline ?? false,
      false,
      { liveEvent: opts.liveEvent ?? true },
    );
  };
  const emitSync = (state: SyncState) => {
    emitter.emit(ClientEvent.Sync, state);
  };
  return { handleJoin, runtime, emitJoin, emitSync };
}

describe("createJoinTimelineListener", () => {
  it("ignores joins replayed by the initial sync and greets later ones", () => {
    const harness = createTimelineHarness();

    harness.emitJoin(joinEvent("@early:example.org"));
    expect(harness.handleJoin).not.toHaveBeenCalled();

    harness.emitSync(SyncState.Prepared);
    harness.emitJoin(joinEvent("@alice:example.org"));
    expect(harness.handleJoin).toHaveBeenCalledTimes(1);
    expect(harness.handleJoin).toHaveBeenCalledWith({
      userId: "@alice:example.org",
      roomId: LOBBY,
      origin: "live",
      eventId: "$join-alice",
    });
  });

  it("ignores history added to the start of the timeline or marked non-live", () => {
    const harness = createTimelineHarness();
    harness.emitSync(SyncState.Prepared);

    harness.emitJoin(joinEvent("@alice:example.org"), { toStartOfTimeline: true });
    harness.emitJoin(joinEvent("@alice:example.org"), { liveEvent: false });

    expect(harness.handleJoin).not.toHaveBeenCalled();
  });

  it("ignores unmonitored rooms and the bot's own joins", () => {
    const harness = createTimelineHarness();
    harness.emitSync(SyncState.Prepared);

    harness.emitJoin(joinEvent("@alice:example.org", "!elsewhere:example.org"));
    harness.emitJoin(joinEvent("@greeter:example.org"));

    expect(harness.handleJoin).not.toHaveBeenCalled();
  });

  it("greets joins that arrive while the client reconnects", () => {
    const harness = createTimelineHarness();
    harness.emitSync(SyncState.Prepared);
    harness.emitSync(SyncState.Syncing);
    harness.emitSync(SyncState.Reconnecting);

    harness.emitJoin(joinEvent("@alice:example.org"));
    harness.emitSync(SyncState.Catchup);
    harness.emitJoin(joinEvent("@bob:example.org"));

    expect(harness.handleJoin.mock.calls.map(([join]) => [join.userId, join.origin])).toEqual([
      ["@alice:example.org", "live"],
      ["@bob:example.org", "live"],
    ]);
  });

  it("reports a failed join handler on the runtime", async () => {
    const harness = createTimelineHarness();
    harness.handleJoin.mockRejectedValueOnce(new Error("boom"));
    harness.emitSync(SyncState.Prepared);

    harness.emitJoin(joinEvent("@alice:example.org"));

    await vi.waitFor(() => expect(harness.runtime.error).toHaveBeenCalledTimes(1));
    expect(harness.runtime.error).toHaveBeenCalledWith(
      expect.stringContaining("greeter: join handler failed for @alice:example.org: Error: boom"),
    );
  });
});
