import type { MatrixClient } from "matrix-js-sdk";

import type { SubsystemLogger } from "../logging.js";
import { resolveDirectRoomId } from "../matrix/direct.js";
import { getJoinedRoomIdsMatrix, getRoomNameMatrix } from "../matrix/rooms.js";
import { sendNoticeMatrix, sendTextMatrix } from "../matrix/send.js";
import type { GreeterClient } from "./types.js";

export function createMatrixGreeterClient(
  client: MatrixClient,
  logger?: SubsystemLogger,
): GreeterClient {
  return {
    getJoinedRoomIds: () => getJoinedRoomIdsMatrix(client),
    sendNotice: async (roomId, html) => {
      await sendNoticeMatrix(client, roomId, html);
    },
    sendText: async (roomId, html) => {
      await sendTextMatrix(client, roomId, html);
    },
    resolveDirectRoom: (userId) => resolveDirectRoomId(client, userId, logger),
    getRoomName: (roomId) => getRoomNameMatrix(client, roomId),
  };
}
