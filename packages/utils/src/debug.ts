// packages/utils/src/debug.ts

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const v = String(env.DEBUG ?? '').trim();
  return v !== '' && v !== '0';
}

/** Scoped diagnostic output on stderr, silent unless DEBUG is set. */
export function debugLog(scope: string, ...args: unknown[]): void {
  if (isDebugEnabled()) console.error(`[${scope}:debug]`, ...args);
}
