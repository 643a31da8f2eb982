let debugMode = false;

const PREFIX = "[npd-scan]";

export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

export function debugLog(...args: unknown[]): void {
  if (debugMode) {
    console.log(PREFIX, ...args);
  }
}

export function debugError(...args: unknown[]): void {
  if (debugMode) {
    console.error(PREFIX, ...args);
  }
}

export function debugWarn(...args: unknown[]): void {
  if (debugMode) {
    console.warn(PREFIX, ...args);
  }
}

export function isDebugEnabled(): boolean {
  return debugMode;
}
