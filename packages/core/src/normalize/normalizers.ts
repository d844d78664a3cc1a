export type Normalizer<T> = (value: T) => T;

export const identity = <T>(value: T): T => value;

/**
 * Trims the ends and collapses every internal whitespace run to one space.
 * "\tACME\t \tBank " -> "ACME Bank"
 */
export function normalizeSpace(value: string): string {
  return value.trim().split(/\s+/).join(' ');
}
