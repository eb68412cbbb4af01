import { parseMatrixUserId } from "../matrix/user-id.js";

export type HomeserverApproval = "allowed" | "not-allowed" | "unchecked";

function normalizeAllowList(list?: readonly string[]): string[] {
  return (list ?? []).map((entry) => entry.trim().toLowerCase()).filter(Boolean);
}

export function resolveHomeserverApproval(params: {
  userId: string;
  allowList?: readonly string[];
}): HomeserverApproval {
  const allowList = normalizeAllowList(params.allowList);
  if (allowList.length === 0) return "unchecked";
  if (allowList.includes("*")) return "allowed";
  const server = parseMatrixUserId(params.userId)?.server;
  if (!server) return "not-allowed";
  return allowList.includes(server) ? "allowed" : "not-allowed";
}

export function formatHomeserverStatus(approval: HomeserverApproval): string {
  switch (approval) {
    case "allowed":
      return "allowed";
    case "not-allowed":
      return "not allowed";
    case "unchecked":
      return "unchecked";
  }
}
