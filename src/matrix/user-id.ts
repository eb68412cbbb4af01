export type MatrixUserIdParts = {
  localpart: string;
  server: string;
};

export function parseMatrixUserId(raw: string): MatrixUserIdParts | null {
  const userId = raw.trim();
  if (!userId.startsWith("@")) return null;
  const separator = userId.indexOf(":");
  if (separator <= 1 || separator === userId.length - 1) return null;
  return {
    localpart: userId.slice(1, separator),
    server: userId.slice(separator + 1).toLowerCase(),
  };
}

export function buildMatrixToUrl(userId: string): string {
  return `https://matrix.to/#/${userId}`;
}
