export class NotRoomMemberError extends Error {
  readonly roomId: string;

  constructor(roomId: string) {
    super(`Bot is not a member of room ${roomId}`);
    this.name = "NotRoomMemberError";
    this.roomId = roomId;
  }
}

export class InviteApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "InviteApiError";
    this.status = status;
  }
}
