import { escapeHtml } from "../matrix/format.js";
import { buildMatrixToUrl, parseMatrixUserId } from "../matrix/user-id.js";

export type TemplatePlaceholder = "user" | "room" | "homeserver_status" | "invite_link";

export type TemplateValues = Partial<Record<TemplatePlaceholder, string>>;

/** Fills `{name}` placeholders; placeholders without a value are left as written. */
export function renderTemplate(template: string, values: TemplateValues): string {
  const lookup = new Map(Object.entries(values));
  return template.replace(/\{([a-z_]+)\}/g, (match, key: string) => lookup.get(key) ?? match);
}

export function resolveDisplayName(userId: string): string {
  return parseMatrixUserId(userId)?.localpart ?? userId;
}

export function buildUserMention(userId: string): string {
  const href = escapeHtml(buildMatrixToUrl(userId));
  return `<a href="${href}">${escapeHtml(resolveDisplayName(userId))}</a>`;
}
