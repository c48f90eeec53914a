import { InvalidScenarioError } from '../../lib/errors.js';

/** Lower and upper traffic factor of a congestion level */
export type FactorBounds = readonly [lower: number, upper: number];

const level = (lower: number, upper: number = lower): FactorBounds => Object.freeze([lower, upper] as const);

/**
 * Congestion level codes in their documented order. `a`..`g` are ranges of
 * the saturation level used in traffic planning; the remaining codes pin a
 * single demand factor.
 */
const LEVEL_ENTRIES: ReadonlyArray<readonly [code: string, bounds: FactorBounds]> = [
  ['a', level(0.0, 0.3)],
  ['b', level(0.3, 0.55)],
  ['c', level(0.55, 0.75)],
  ['d', level(0.75, 0.9)],
  ['e', level(0.9, 1.0)],
  ['f', level(1.0, 1.15)],
  ['g', level(1.0)],
  ['h', level(0.1)],
  ['i', level(0.2)],
  ['j', level(0.3)],
  ['k', level(0.4)],
  ['l', level(0.5)],
  ['m', level(0.6)],
  ['n', level(0.7)],
  ['o', level(0.8)],
  ['p', level(0.85)],
  ['q', level(0.9)],
  ['r', level(0.95)],
  ['s', level(1.0)],
  ['t', level(1.05)],
  ['u', level(1.1)],
  ['v', level(1.2)],
  ['w', level(1.3)],
  ['x', level(1.4)],
  ['y', level(1.5)],
  ['z', level(1.6)],
  ['1', level(1.7)],
  ['2', level(1.8)],
  ['3', level(1.9)],
];

export const CONGESTION_LEVELS: ReadonlyMap<string, FactorBounds> = new Map(LEVEL_ENTRIES);

export const CONGESTION_CODES: readonly string[] = Object.freeze(LEVEL_ENTRIES.map(([code]) => code));

export function isCongestionCode(code: string): boolean {
  return CONGESTION_LEVELS.has(code);
}

export function boundsFor(code: string): FactorBounds {
  const bounds = CONGESTION_LEVELS.get(code);
  if (!bounds) {
    throw new InvalidScenarioError(
      'congestion_sequence',
      `Unexpected congestion level '${code}'`,
      CONGESTION_CODES.join(', '),
      code
    );
  }
  return bounds;
}

/** Demand factor of a level: the mean of its bounds. */
export function factorFor(code: string): number {
  const [lower, upper] = boundsFor(code);
  return (lower + upper) / 2;
}
