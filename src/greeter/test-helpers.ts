import { vi } from "vitest";

import { parseConfig } from "../config/config.js";
import type { GreeterConfig } from "../config/types.js";
import type { SubsystemLogger } from "../logging.js";
import type { GreeterClient } from "./types.js";

export type SentMessage = {
  roomId: string;
  html: string;
};

export function createFakeGreeterClient(
  params: { joinedRooms?: string[]; roomNames?: Record<string, string> } = {},
) {
  const joinedRooms = new Set(params.joinedRooms ?? []);
  const notices: SentMessage[] = [];
  const texts: SentMessage[] = [];
  const client = {
    getJoinedRoomIds: vi.fn(async () => [...joinedRooms]),
    sendNotice: vi.fn(async (roomId: string, html: string) => {
      notices.push({ roomId, html });
    }),
    sendText: vi.fn(async (roomId: string, html: string) => {
      texts.push({ roomId, html });
    }),
    resolveDirectRoom: vi.fn(async (userId: string) => `!dm-${userId.slice(1).split(":")[0]}:example.org`),
    getRoomName: vi.fn(async (roomId: string): Promise<string | null> => params.roomNames?.[roomId] ?? null),
  } satisfies GreeterClient;
  return { client, joinedRooms, notices, texts };
}

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies SubsystemLogger;
}

export function createTestConfig(overrides: Record<string, unknown> = {}): GreeterConfig {
  return parseConfig(
    {
      matrix: {
        homeserver: "https://matrix.example.org",
        userId: "@greeter:example.org",
        accessToken: "test-access-token",
      },
      rooms: ["!lobby:example.org"],
      messages: { welcome: "Welcome {user}!" },
      greeting: { settleDelayMinMs: 0, settleDelayMaxMs: 0 },
      retry: { attempts: 3, baseDelayMs: 0 },
      ...overrides,
    },
    {},
  );
}
