// ─── Logging ────────────────────────────────────────────────────────────────────
// Console logging in "[LEVEL] [Component] message" form. Components take a
// Logger so tests can pass a silent one.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(component?: string): Logger {
  const prefix = component ? ` [${component}]` : "";
  return {
    info: (msg, ...args) => console.log(`[INFO]${prefix} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN]${prefix} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR]${prefix} ${msg}`, ...args),
  };
}

