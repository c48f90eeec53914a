import { InvalidScenarioError } from '../../lib/errors.js';
import type { ScenarioSpec, TimeSegment, TimeWindow } from '../../types/index.js';
import { boundsFor, factorFor } from './congestion-levels.js';

/** Simulated time starts at 00:00:00. */
export const BASE_START_SECONDS = 0;

const SECONDS_PER_DAY = 24 * 3600;

/**
 * Throw on the first unknown code. Runs before anything is generated so an
 * invalid sequence never leaves partial output behind.
 */
export function validateCongestionSequence(sequence: readonly string[]): void {
  if (sequence.length === 0) {
    throw new InvalidScenarioError('congestion_sequence', 'Congestion sequence is empty');
  }
  for (const code of sequence) {
    boundsFor(code);
  }
}

/**
 * Split the scenario duration into one equal, contiguous segment per
 * congestion code.
 */
export function generateSegments(spec: Pick<ScenarioSpec, 'durationSeconds' | 'congestionSequence'>): TimeSegment[] {
  validateCongestionSequence(spec.congestionSequence);

  const segmentDuration = spec.durationSeconds / spec.congestionSequence.length;
  return spec.congestionSequence.map((code, index) => ({
    index,
    code,
    factor: factorFor(code),
    startSeconds: BASE_START_SECONDS + segmentDuration * index,
    durationSeconds: segmentDuration,
  }));
}

/** Wall clock `HH.MM` of a second offset from midnight; wraps at 24 h. */
export function formatClock(seconds: number): string {
  const wrapped = ((Math.floor(seconds) % SECONDS_PER_DAY) + SECONDS_PER_DAY) % SECONDS_PER_DAY;
  const hours = Math.floor(wrapped / 3600);
  const minutes = Math.floor((wrapped % 3600) / 60);
  return `${String(hours).padStart(2, '0')}.${String(minutes).padStart(2, '0')}`;
}

export function segmentWindow(segment: TimeSegment): TimeWindow {
  return {
    from: formatClock(segment.startSeconds),
    to: formatClock(segment.startSeconds + segment.durationSeconds),
  };
}
