/** Outbound capabilities the greeter needs from the Matrix account it acts as. */
export type GreeterClient = {
  getJoinedRoomIds: () => Promise<string[]>;
  /** `html` becomes the formatted body; the plain body is derived from it. */
  sendNotice: (roomId: string, html: string) => Promise<void>;
  sendText: (roomId: string, html: string) => Promise<void>;
  resolveDirectRoom: (userId: string) => Promise<string>;
  getRoomName: (roomId: string) => Promise<string | null>;
};

/** `state` joins were replayed from room history rather than observed as they happened. */
export type JoinOrigin = "live" | "state";

export type JoinEvent = {
  userId: string;
  roomId: string;
  origin: JoinOrigin;
  eventId?: string;
};
