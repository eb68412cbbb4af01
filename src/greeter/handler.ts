import { setTimeout as sleepMs } from "node:timers/promises";

import type { GreeterConfig } from "../config/types.js";
import type { SubsystemLogger } from "../logging.js";
import { createGuardedSender } from "./guarded-send.js";
import { formatHomeserverStatus, resolveHomeserverApproval } from "./homeservers.js";
import { buildInviteUrl, createInvite, isRetryableInviteError } from "./invite-api.js";
import { AbortError, withRetry } from "./retry.js";
import {
  buildUserMention,
  renderTemplate,
  resolveDisplayName,
  type TemplateValues,
} from "./templates.js";
import type { GreeterClient, JoinEvent } from "./types.js";

export const DEFAULT_NOTIFICATION_TEMPLATE = "{user} joined {room}";
export const DEFAULT_GATED_NOTIFICATION_TEMPLATE =
  "{user} joined {room} (homeserver {homeserver_status})";

export const DEFAULT_INVITE_TEMPLATE =
  "Welcome {user}! Create your account with this single-use link: {invite_link}";

export type JoinOutcome = {
  welcomed: boolean;
  notified: boolean;
  directMessaged: boolean;
  inviteLink?: string;
};

export type JoinHandlerDeps = {
  client: GreeterClient;
  config: GreeterConfig;
  logger: SubsystemLogger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => Date;
  fetchImpl?: typeof fetch;
};

export type JoinHandler = {
  /** Never rejects: every step logs its own failure and the remaining steps still run. */
  handleJoin: (join: JoinEvent) => Promise<JoinOutcome>;
};

type InviteResult = { ok: true; link: string } | { ok: false };

export function resolveSettleDelayMs(
  greeting: GreeterConfig["greeting"],
  random: () => number = Math.random,
): number {
  const { settleDelayMinMs: min, settleDelayMaxMs: max } = greeting;
  return Math.min(max, min + Math.floor(random() * (max - min + 1)));
}

export function createJoinHandler(deps: JoinHandlerDeps): JoinHandler {
  const { client, config, logger } = deps;
  const sleep = deps.sleep ?? ((ms: number) => sleepMs(ms));
  const sender = createGuardedSender({ client, retry: config.retry, logger });

  const runStep = async <T>(
    step: string,
    context: Record<string, unknown>,
    fallback: T,
    run: () => Promise<T>,
  ): Promise<T> => {
    try {
      return await run();
    } catch (err) {
      logger.error({ ...context, step, err }, `${step} failed`);
      return fallback;
    }
  };

  const provisionInvite = async (userId: string): Promise<InviteResult> => {
    const invites = config.invites;
    if (!invites) return { ok: false };
    try {
      const token = await withRetry({
        label: "invite provisioning",
        policy: config.retry,
        logger,
        context: { userId },
        run: async () => {
          try {
            return await createInvite({
              config: invites,
              name: resolveDisplayName(userId),
              now: deps.now,
              fetchImpl: deps.fetchImpl,
              logger,
            });
          } catch (err) {
            if (isRetryableInviteError(err)) throw err;
            throw new AbortError(err instanceof Error ? err : String(err));
          }
        },
      });
      const link = buildInviteUrl({
        apiUrl: invites.apiUrl,
        token,
        flowSlug: invites.flowSlug,
        enrollmentUrl: invites.enrollmentUrl,
      });
      return { ok: true, link };
    } catch (err) {
      logger.error({ userId, err }, "invite provisioning failed; direct message skipped");
      return { ok: false };
    }
  };

  const resolveRoomName = async (roomId: string): Promise<string> => {
    try {
      return (await client.getRoomName(roomId)) ?? roomId;
    } catch (err) {
      logger.warn({ roomId, err }, "room name lookup failed; using room ID");
      return roomId;
    }
  };

  const handleJoin = async (join: JoinEvent): Promise<JoinOutcome> => {
    const { userId, roomId } = join;
    const outcome: JoinOutcome = { welcomed: false, notified: false, directMessaged: false };
    const approval = resolveHomeserverApproval({
      userId,
      allowList: config.homeservers?.allowList,
    });
    const sendsDirect =
      approval !== "not-allowed" || config.homeservers?.directMessageUnapproved === true;
    const directTemplate =
      config.messages.invite ?? (config.invites ? DEFAULT_INVITE_TEMPLATE : undefined);

    // Runs alongside the settle delay and room messages; joined before the direct message.
    const pendingInvite = sendsDirect && config.invites ? provisionInvite(userId) : null;

    logger.info({ userId, roomId, eventId: join.eventId, approval }, "greeting new member");
    await sleep(resolveSettleDelayMs(config.greeting, deps.random));

    const templates = [config.messages.welcome, config.messages.welcomeUnapproved, directTemplate];
    const needsRoomName =
      Boolean(config.notificationRoom) || templates.some((template) => template?.includes("{room}"));
    const roomName = needsRoomName ? await resolveRoomName(roomId) : roomId;
    const values: TemplateValues = {
      user: buildUserMention(userId),
      room: roomName,
      homeserver_status: formatHomeserverStatus(approval),
    };

    const welcomeTemplate =
      approval === "not-allowed"
        ? (config.messages.welcomeUnapproved ?? config.messages.welcome)
        : config.messages.welcome;
    outcome.welcomed = await runStep("welcome message", { userId, roomId }, false, () =>
      sender.sendToRoom(roomId, renderTemplate(welcomeTemplate, values)),
    );

    const notificationRoom = config.notificationRoom;
    if (notificationRoom) {
      const template =
        config.messages.notification ??
        (config.homeservers ? DEFAULT_GATED_NOTIFICATION_TEMPLATE : DEFAULT_NOTIFICATION_TEMPLATE);
      const notification = renderTemplate(template, {
        ...values,
        user: userId,
      });
      outcome.notified = await runStep(
        "admin notification",
        { userId, roomId: notificationRoom },
        false,
        () => sender.sendToRoom(notificationRoom, notification),
      );
    }

    const invite = pendingInvite ? await pendingInvite : null;
    if (!sendsDirect) {
      logger.info({ userId }, "homeserver not allow-listed; direct message skipped");
      return outcome;
    }
    if (!directTemplate) return outcome;
    if (invite && !invite.ok) return outcome;
    if (invite?.ok) outcome.inviteLink = invite.link;

    const message = renderTemplate(directTemplate, { ...values, invite_link: outcome.inviteLink });
    outcome.directMessaged = await runStep("direct message", { userId }, false, async () => {
      await sender.sendDirect(userId, message);
      return true;
    });
    return outcome;
  };

  return { handleJoin };
}
