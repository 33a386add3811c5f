/**
 * Ranges of exit codes that already carry a documented meaning.
 * Custom application codes should stay outside of them.
 */

export interface ReservedRange {
  readonly min: number;
  readonly max: number;
  readonly convention: 'generic' | 'sysexits' | 'shell' | 'signal';
}

export const RESERVED_RANGES: readonly ReservedRange[] = [
  { min: 0, max: 2, convention: 'generic' },
  { min: 64, max: 78, convention: 'sysexits' },
  { min: 126, max: 128, convention: 'shell' },
  { min: 129, max: 143, convention: 'signal' },
  { min: 255, max: 255, convention: 'shell' },
];

/**
 * Find the documented range a raw code falls in
 */
export function findReservedRange(raw: number): ReservedRange | undefined {
  return RESERVED_RANGES.find((range) => range.min <= raw && raw <= range.max);
}

export function isReservedRaw(raw: number): boolean {
  return findReservedRange(raw) !== undefined;
}
