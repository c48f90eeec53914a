import { z } from 'zod';
import type { ScenarioSpec } from '../types/index.js';
import { InvalidScenarioError } from '../lib/errors.js';
import { parseDecimal } from '../lib/delimited.js';

/**
 * Header of the batch file, names and order fixed.
 */
export const BATCH_COLUMNS = [
  'scenario_id',
  'network',
  'traffic',
  'obstruction',
  'duration',
  'congestion_sequence',
  'v2x_rate',
  'tau',
  'repeats',
  'traffic_lights',
] as const;

export type BatchColumn = (typeof BATCH_COLUMNS)[number];

// Booleans are written as 0/1 by the spreadsheet export, sometimes as words
const flagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ['0', '1', 'true', 'false'].includes(value), {
    message: 'Must be one of 0, 1, true, false',
  })
  .transform((value) => value === '1' || value === 'true');

// Decimal comma is accepted
const decimalSchema = z
  .string()
  .transform((value) => parseDecimal(value))
  .pipe(z.number({ invalid_type_error: 'Must be a number' }).finite('Must be a number'));

const integerSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Must be a whole number')
  .transform((value) => Number.parseInt(value, 10));

const identifierSchema = z
  .string()
  .trim()
  .min(1, 'Is required')
  .regex(/^[A-Za-z0-9_.-]+$/, 'Only letters, digits, "_", "-" and "." are allowed');

/**
 * Schema for one row of the batch file
 */
export const BatchRowSchema = z.object({
  scenario_id: identifierSchema,
  network: z.string().trim().min(1, 'Is required'),
  traffic: identifierSchema,
  obstruction: flagSchema,
  duration: integerSchema.pipe(z.number().int().positive('Must be greater than 0')),
  congestion_sequence: z
    .string()
    .trim()
    .min(1, 'At least one congestion level is required'),
  v2x_rate: decimalSchema.pipe(z.number().min(0, 'Must be between 0 and 1').max(1, 'Must be between 0 and 1')),
  tau: decimalSchema.pipe(z.number().positive('Must be greater than 0')),
  repeats: integerSchema.pipe(z.number().int().min(1, 'Must be at least 1').max(9998, 'At most 9998 repeats')),
  traffic_lights: flagSchema,
});

/**
 * Validate and coerce one batch row into an immutable ScenarioSpec.
 * `rowNumber` is the 1-based line number in the batch file.
 */
export function toScenarioSpec(row: Readonly<Record<string, string>>, rowNumber: number): ScenarioSpec {
  const result = BatchRowSchema.safeParse(row);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : 'row';
    throw new InvalidScenarioError(
      field,
      `Row ${rowNumber}: value for '${field}' is invalid: ${issue?.message ?? 'unknown error'}`,
      issue?.message,
      row[field]
    );
  }

  const data = result.data;
  return Object.freeze({
    id: data.scenario_id,
    network: data.network,
    trafficProfile: data.traffic,
    obstruction: data.obstruction,
    durationSeconds: data.duration,
    congestionSequence: Object.freeze([...data.congestion_sequence]),
    v2xRate: data.v2x_rate,
    reactionTime: data.tau,
    repeats: data.repeats,
    useTrafficLights: data.traffic_lights,
  });
}

/** Serialize a scenario back into a batch row (used for the archived copy). */
export function toBatchRow(spec: ScenarioSpec): Record<BatchColumn, string> {
  return {
    scenario_id: spec.id,
    network: spec.network,
    traffic: spec.trafficProfile,
    obstruction: spec.obstruction ? '1' : '0',
    duration: String(spec.durationSeconds),
    congestion_sequence: spec.congestionSequence.join(''),
    v2x_rate: String(spec.v2xRate),
    tau: String(spec.reactionTime),
    repeats: String(spec.repeats),
    traffic_lights: spec.useTrafficLights ? '1' : '0',
  };
}
