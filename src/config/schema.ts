import { z } from "zod";

const MatrixRoomIdSchema = z
  .string()
  .trim()
  .regex(/^![^:]+:.+$/, "expected a room ID like !abc:example.org");

export const LogLevelSchema = z.union([
  z.literal("fatal"),
  z.literal("error"),
  z.literal("warn"),
  z.literal("info"),
  z.literal("debug"),
  z.literal("trace"),
]);

export const MatrixAccountSchema = z
  .object({
    homeserver: z.string().trim().url(),
    userId: z
      .string()
      .trim()
      .regex(/^@[^:]+:.+$/, "expected a fully qualified user ID like @bot:example.org"),
    accessToken: z.string().trim().min(1).optional(),
    password: z.string().min(1).optional(),
    deviceName: z.string().trim().min(1).optional(),
    initialSyncLimit: z.number().int().nonnegative().optional(),
    requestTimeoutMs: z.number().int().positive().default(120_000),
  })
  .refine((value) => Boolean(value.accessToken || value.password), {
    message: "matrix.accessToken or matrix.password is required",
  });

export const MessagesSchema = z.object({
  welcome: z.string().min(1),
  /** Used instead of `welcome` when the sender's homeserver is not allow-listed. */
  welcomeUnapproved: z.string().min(1).optional(),
  /** Defaults to "{user} joined {room}", plus the homeserver status when an allow-list is set. */
  notification: z.string().min(1).optional(),
  invite: z.string().min(1).optional(),
});

export const HomeserverPolicySchema = z.object({
  allowList: z.array(z.string().trim().toLowerCase().min(1)).min(1),
  directMessageUnapproved: z.boolean().default(false),
});

export const InviteApiSchema = z.object({
  apiUrl: z.string().trim().url(),
  apiToken: z.string().trim().min(1),
  flowId: z.string().uuid(),
  enrollmentUrl: z.string().trim().url().optional(),
  flowSlug: z.string().trim().min(1).default("simple-enrollment-flow"),
  expiryHours: z.number().positive().default(2),
  timeoutMs: z.number().int().positive().default(30_000),
});

export const GreetingSchema = z
  .object({
    settleDelayMinMs: z.number().int().nonnegative().default(5_000),
    settleDelayMaxMs: z.number().int().nonnegative().default(7_000),
  })
  .refine((value) => value.settleDelayMinMs <= value.settleDelayMaxMs, {
    message: "greeting.settleDelayMinMs must not exceed greeting.settleDelayMaxMs",
  });

export const RetrySchema = z.object({
  attempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().int().nonnegative().default(1_000),
});

export const LoggingSchema = z.object({
  level: LogLevelSchema.default("info"),
  verbose: z.boolean().default(false),
});

export const GreeterConfigSchema = z.object({
  matrix: MatrixAccountSchema,
  rooms: z.array(MatrixRoomIdSchema).min(1),
  messages: MessagesSchema,
  notificationRoom: MatrixRoomIdSchema.optional(),
  homeservers: HomeserverPolicySchema.optional(),
  invites: InviteApiSchema.optional(),
  greeting: GreetingSchema.default({}),
  retry: RetrySchema.default({}),
  logging: LoggingSchema.default({}),
});
