import { theme } from "./terminal/theme.js";

let globalVerbose = false;

export function setVerbose(value: boolean): void {
  globalVerbose = value;
}

export function logVerbose(message: string): void {
  if (!globalVerbose) return;
  console.log(theme.muted(message));
}

export const info = theme.accent;
export const success = theme.success;
export const danger = theme.error;
