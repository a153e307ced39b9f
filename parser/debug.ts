let debugMode = typeof process !== 'undefined' && !!process.env.DOC_DEBUG;

export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

export function isDebugMode(): boolean {
  return debugMode;
}

export function logDebug(scope: string, ...args: unknown[]): void {
  if (debugMode) console.log(`[${scope}]`, ...args);
}
