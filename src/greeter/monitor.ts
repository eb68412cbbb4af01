import { RoomEvent } from "matrix-js-sdk";

import type { GreeterConfig } from "../config/types.js";
import { getChildLogger } from "../logging.js";
import { createMatrixClient, resolveMatrixAuth, trackInitialSync } from "../matrix/client.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { createJoinHandler } from "./handler.js";
import { createMatrixGreeterClient } from "./matrix-adapter.js";
import { createJoinTimelineListener } from "./timeline.js";

export type MonitorGreeterOpts = {
  config: GreeterConfig;
  runtime?: RuntimeEnv;
  abortSignal?: AbortSignal;
};

export async function monitorGreeter(opts: MonitorGreeterOpts): Promise<void> {
  const { config } = opts;
  const runtime = opts.runtime ?? defaultRuntime;
  const logger = getChildLogger({ module: "greeter" });

  const auth = await resolveMatrixAuth(config.matrix);
  const client = createMatrixClient({
    homeserver: auth.homeserver,
    userId: auth.userId,
    accessToken: auth.accessToken,
    localTimeoutMs: config.matrix.requestTimeoutMs,
  });
  const handler = createJoinHandler({
    client: createMatrixGreeterClient(client, logger),
    config,
    logger,
  });
  const initialSync = trackInitialSync(client);
  const handleTimeline = createJoinTimelineListener({
    rooms: config.rooms,
    handler,
    runtime,
    getUserId: () => client.getUserId(),
    isInitialSyncDone: initialSync.isDone,
    startupMs: Date.now(),
  });

  client.on(RoomEvent.Timeline, handleTimeline);

  const startOpts: Parameters<typeof client.startClient>[0] = { lazyLoadMembers: true };
  if (typeof auth.initialSyncLimit === "number") {
    startOpts.initialSyncLimit = auth.initialSyncLimit;
  }
  await client.startClient(startOpts);
  try {
    await initialSync.wait({
      timeoutMs: config.matrix.requestTimeoutMs,
      abortSignal: opts.abortSignal,
    });
  } catch (err) {
    initialSync.stop();
    client.removeListener(RoomEvent.Timeline, handleTimeline);
    client.stopClient();
    throw err;
  }
  runtime.log(`greeter: logged in as ${auth.userId}, watching ${config.rooms.length} room(s)`);

  await new Promise<void>((resolve) => {
    const onAbort = () => {
      client.removeListener(RoomEvent.Timeline, handleTimeline);
      client.stopClient();
      resolve();
    };
    if (opts.abortSignal?.aborted) {
      onAbort();
      return;
    }
    opts.abortSignal?.addEventListener("abort", onAbort, { once: true });
  });
}
