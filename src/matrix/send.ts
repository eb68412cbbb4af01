import type { MatrixClient } from "matrix-js-sdk";

import { htmlToPlainText } from "./format.js";

export type MatrixSendResult = {
  messageId: string;
  roomId: string;
};

function requireMessage(html: string): string {
  const trimmed = html.trim();
  if (!trimmed) {
    throw new Error("Matrix send requires a non-empty message");
  }
  return trimmed;
}

export async function sendNoticeMatrix(
  client: MatrixClient,
  roomId: string,
  html: string,
): Promise<MatrixSendResult> {
  const formatted = requireMessage(html);
  const response = await client.sendHtmlNotice(roomId, htmlToPlainText(formatted), formatted);
  return { messageId: response.event_id ?? "unknown", roomId };
}

export async function sendTextMatrix(
  client: MatrixClient,
  roomId: string,
  html: string,
): Promise<MatrixSendResult> {
  const formatted = requireMessage(html);
  const response = await client.sendHtmlMessage(roomId, htmlToPlainText(formatted), formatted);
  return { messageId: response.event_id ?? "unknown", roomId };
}
