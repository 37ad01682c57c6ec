/**
 * Sentinel labels returned instead of failing.
 *
 * `inferred` means no static information was available, `inferred from context`
 * means the context scan matched nothing, `unknown` marks an unresolvable
 * basic type or context line. None of them is ever an empty string.
 */

export const INFERRED = 'inferred';
export const INFERRED_FROM_CONTEXT = 'inferred from context';
export const UNKNOWN = 'unknown';

export type SentinelLabel = typeof INFERRED | typeof INFERRED_FROM_CONTEXT | typeof UNKNOWN;

const SENTINELS: ReadonlySet<string> = new Set([INFERRED, INFERRED_FROM_CONTEXT, UNKNOWN]);

/**
 * True when a label carries no type information
 */
export function isSentinelLabel(label: string): label is SentinelLabel {
  return SENTINELS.has(label);
}
