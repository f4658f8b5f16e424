/**
 * packages/core/src/warnings.ts — Development warnings.
 *
 * Why: Non-fatal conditions (a dependent constant that stopped resolving, a
 * constant-only constraint that was skipped) must reach the developer without
 * failing the call that caused them. Each distinct key is reported once.
 */

export type WarningArea = "constants" | "constraints";
export type WarnSink = (message: string) => void;

export type DevLogger = Readonly<{
  warn(area: WarningArea, key: string, detail: string): void;
  /** Drops a reported key; the next `warn` with it is emitted again. */
  forget(area: WarningArea, key: string): void;
}>;

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEFAULT_DEV_MODE = NODE_ENV !== "production";

export function consoleWarn(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

export function createDevLogger(devMode: boolean, sink: WarnSink): DevLogger {
  const warned = new Set<string>();
  return Object.freeze({
    warn(area: WarningArea, key: string, detail: string): void {
      if (!devMode) return;
      const dedupeKey = `${area}:${key}`;
      if (warned.has(dedupeKey)) return;
      warned.add(dedupeKey);
      sink(`[anchorline][${area}] ${detail}`);
    },
    forget(area: WarningArea, key: string): void {
      warned.delete(`${area}:${key}`);
    },
  });
}
