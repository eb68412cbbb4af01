import { EventType, type MatrixClient, Preset, Visibility } from "matrix-js-sdk";

import type { SubsystemLogger } from "../logging.js";

type MatrixDirectAccountData = Record<string, string[]>;

export function listDirectRoomIds(
  content: MatrixDirectAccountData | null | undefined,
  userId: string,
): string[] {
  const rooms = content?.[userId];
  if (!Array.isArray(rooms)) return [];
  return rooms.map((roomId) => String(roomId).trim()).filter(Boolean);
}

async function loadDirectAccountData(client: MatrixClient): Promise<MatrixDirectAccountData> {
  const local = client.getAccountData(EventType.Direct);
  if (local) return local.getContent<MatrixDirectAccountData>() ?? {};
  const remote: MatrixDirectAccountData | null = await client.getAccountDataFromServer(EventType.Direct);
  return remote ?? {};
}

/**
 * Reuses a joined room listed for the user in `m.direct`; otherwise creates a private
 * direct room inviting the user and records it in `m.direct`. A failed `m.direct` write is
 * logged and the new room is still returned.
 */
export async function resolveDirectRoomId(
  client: MatrixClient,
  userId: string,
  logger?: SubsystemLogger,
): Promise<string> {
  const trimmed = userId.trim();
  if (!trimmed.startsWith("@")) {
    throw new Error(`Matrix user IDs must be fully qualified (got "${trimmed}")`);
  }
  const direct = await loadDirectAccountData(client);
  const known = listDirectRoomIds(direct, trimmed);
  const existing = known.find((roomId) => client.getRoom(roomId)?.getMyMembership() === "join");
  if (existing) return existing;

  const created = await client.createRoom({
    is_direct: true,
    invite: [trimmed],
    preset: Preset.TrustedPrivateChat,
    visibility: Visibility.Private,
  });
  try {
    await client.setAccountData(EventType.Direct, {
      ...direct,
      [trimmed]: [...known, created.room_id],
    });
  } catch (err) {
    logger?.warn(
      { userId: trimmed, roomId: created.room_id, err },
      "created direct room but could not record it in m.direct",
    );
  }
  return created.room_id;
}
