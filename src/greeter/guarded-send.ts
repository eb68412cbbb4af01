import type { SubsystemLogger } from "../logging.js";
import { NotRoomMemberError } from "./errors.js";
import { AbortError, type RetryPolicy, withRetry } from "./retry.js";
import type { GreeterClient } from "./types.js";

export type GuardedSender = {
  /** Resolves `false` when the bot is not in the room; nothing is sent then. */
  sendToRoom: (roomId: string, html: string) => Promise<boolean>;
  sendDirect: (userId: string, html: string) => Promise<void>;
};

export function createGuardedSender(params: {
  client: GreeterClient;
  retry: RetryPolicy;
  logger: SubsystemLogger;
}): GuardedSender {
  const { client, retry, logger } = params;

  const sendToRoom = async (roomId: string, html: string): Promise<boolean> => {
    try {
      await withRetry({
        label: "room notice",
        policy: retry,
        logger,
        context: { roomId },
        run: async () => {
          const joined = await client.getJoinedRoomIds();
          if (!joined.includes(roomId)) {
            throw new AbortError(new NotRoomMemberError(roomId));
          }
          await client.sendNotice(roomId, html);
        },
      });
      return true;
    } catch (err) {
      if (err instanceof NotRoomMemberError) {
        logger.error({ roomId }, "bot is not a member of the room; notice not sent");
        return false;
      }
      throw err;
    }
  };

  // Only the send is retried once the room is known; a repeated lookup may create another room.
  const sendDirect = async (userId: string, html: string): Promise<void> => {
    const roomId = await withRetry({
      label: "direct room lookup",
      policy: retry,
      logger,
      context: { userId },
      run: () => client.resolveDirectRoom(userId),
    });
    await withRetry({
      label: "direct message",
      policy: retry,
      logger,
      context: { userId, roomId },
      run: () => client.sendText(roomId, html),
    });
  };

  return { sendToRoom, sendDirect };
}
