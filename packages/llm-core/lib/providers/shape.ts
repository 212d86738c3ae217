/**
 * lib/providers/shape.ts - Narrowing helpers for provider JSON bodies
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Token counts are optional on some providers; absent or non-numeric means 0. */
export function countOrZero(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}
