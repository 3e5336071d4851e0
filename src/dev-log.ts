/**
 * DEV-only diagnostics for the simulation core.
 * All exports are no-ops when `import.meta.env.DEV` is false,
 * so the whole module tree-shakes away in production builds.
 */

const PREFIX = '[orb-sim]';

/** Trace a gameplay transition (DEV only). */
export function devLog(...args: unknown[]) {
  if (!import.meta.env.DEV) return;
  console.log(PREFIX, ...args);
}

/** Report suspicious input that the core ignored (DEV only). */
export function devWarn(...args: unknown[]) {
  if (!import.meta.env.DEV) return;
  console.warn(PREFIX, ...args);
}

/** Report a broken internal invariant that the core recovered from (DEV only). */
export function devError(...args: unknown[]) {
  if (!import.meta.env.DEV) return;
  console.error(PREFIX, ...args);
}
