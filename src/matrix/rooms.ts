import { EventType, type MatrixClient, MatrixError } from "matrix-js-sdk";

export async function getJoinedRoomIdsMatrix(client: MatrixClient): Promise<string[]> {
  const response = await client.getJoinedRooms();
  return response.joined_rooms;
}

export async function getRoomNameMatrix(client: MatrixClient, roomId: string): Promise<string | null> {
  try {
    const content = await client.getStateEvent(roomId, EventType.RoomName, "");
    const name: unknown = content.name;
    return typeof name === "string" && name.trim() ? name.trim() : null;
  } catch (err) {
    if (err instanceof MatrixError && err.errcode === "M_NOT_FOUND") return null;
    throw err;
  }
}
