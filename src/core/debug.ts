/**
 * Debug logging, activated by setting SYMGRAPH_DEBUG=1.
 * When disabled, debugLog is a no-op.
 */

let debugEnabled =
  typeof process !== "undefined" && process.env?.SYMGRAPH_DEBUG === "1";

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function debugLog(tag: string, message: string): void {
  if (!debugEnabled) return;
  console.log(`[${tag}] ${message}`);
}
