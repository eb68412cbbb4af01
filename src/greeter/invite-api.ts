import { z } from "zod";

import type { InviteApiConfig } from "../config/types.js";
import type { SubsystemLogger } from "../logging.js";
import { InviteApiError } from "./errors.js";

export type InviteRequestBody = {
  name: string;
  expires: string;
  fixed_data: Record<string, never>;
  single_use: true;
  flow: string;
};

const InviteResponseSchema = z.object({ pk: z.string().min(1) });

const HOUR_MS = 60 * 60 * 1000;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** UTC `yyyyMMddHHmmss`. */
export function formatInviteTimestamp(date: Date): string {
  return [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
  ].join("");
}

export function buildInviteName(name: string, now: Date): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return `${slug || "invite"}-${formatInviteTimestamp(now)}`;
}

export function resolveInviteEndpoint(apiUrl: string): string {
  return `${apiUrl.replace(/\/+$/, "")}/stages/invitation/invitations/`;
}

/** Enrollment page for the flow, served from the API host with its first label swapped for `sso`. */
export function resolveEnrollmentUrl(apiUrl: string, flowSlug: string): string {
  const api = new URL(apiUrl);
  const labels = api.hostname.split(".");
  const host = labels.length > 2 ? ["sso", ...labels.slice(1)].join(".") : `sso.${api.hostname}`;
  const port = api.port ? `:${api.port}` : "";
  return `${api.protocol}//${host}${port}/if/flow/${encodeURIComponent(flowSlug)}/`;
}

export function buildInviteUrl(params: {
  apiUrl: string;
  token: string;
  flowSlug: string;
  enrollmentUrl?: string;
}): string {
  const base = params.enrollmentUrl?.trim() || resolveEnrollmentUrl(params.apiUrl, params.flowSlug);
  const url = new URL(base);
  url.searchParams.set("itoken", params.token);
  return url.toString();
}

/** Client errors mean the request itself is wrong; repeating it cannot help. */
export function isRetryableInviteError(err: unknown): boolean {
  if (err instanceof InviteApiError) return err.status === 0 || err.status >= 500;
  return true;
}

/** Mints a single-use invitation and resolves its token (`pk`). */
export async function createInvite(params: {
  config: InviteApiConfig;
  name: string;
  expiresAt?: Date;
  now?: () => Date;
  fetchImpl?: typeof fetch;
  logger?: SubsystemLogger;
}): Promise<string> {
  const { config, logger } = params;
  const now = params.now?.() ?? new Date();
  const expiresAt = params.expiresAt ?? new Date(now.getTime() + config.expiryHours * HOUR_MS);
  const endpoint = resolveInviteEndpoint(config.apiUrl);
  const body: InviteRequestBody = {
    name: buildInviteName(params.name, now),
    expires: expiresAt.toISOString(),
    fixed_data: {},
    single_use: true,
    flow: config.flowId,
  };

  const fetchImpl = params.fetchImpl ?? fetch;
  const ctrl = new AbortController();
  const timer = setTimeout(() => ctrl.abort(), config.timeoutMs);
  let res: Response;
  try {
    res = await fetchImpl(endpoint, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${config.apiToken}`,
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: JSON.stringify(body),
      signal: ctrl.signal,
    });
  } catch (err) {
    throw new InviteApiError(0, `Invite API request failed: ${String(err)}`);
  } finally {
    clearTimeout(timer);
  }

  if (res.status === 403) {
    logger?.error(
      { endpoint, status: res.status },
      "invite API refused the request; the API token needs permission to create invitations",
    );
  }
  if (!res.ok) {
    throw new InviteApiError(res.status, `Invite API responded with HTTP ${res.status}`);
  }
  const parsed = InviteResponseSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new InviteApiError(res.status, "Invite API response is missing the invitation token (pk)");
  }
  return parsed.data.pk;
}
