import { z } from 'zod';
import type { BatchColumn } from '../schemas/scenario.schema.js';

// Scenarios travel between processes as batch rows and are re-validated on
// arrival with the same schema the batch loader uses.
export const BatchRowMessageSchema = z.object({
  scenario_id: z.string(),
  network: z.string(),
  traffic: z.string(),
  obstruction: z.string(),
  duration: z.string(),
  congestion_sequence: z.string(),
  v2x_rate: z.string(),
  tau: z.string(),
  repeats: z.string(),
  traffic_lights: z.string(),
}) satisfies z.ZodType<Record<BatchColumn, string>>;

export const PipelineOptionsSchema = z.object({
  launch: z.enum(['none', 'traffic', 'network']),
  keepScratch: z.boolean(),
  strictVehicleTypes: z.boolean(),
});

export const RunSettingsSchema = z.object({
  simulationRoot: z.string().min(1),
  resultsDir: z.string().min(1),
  options: PipelineOptionsSchema,
});

/** Payload of a `scenario-run` job and of a pool task */
export const ScenarioRunRequestSchema = z.object({
  row: BatchRowMessageSchema,
  /** Line in the batch file, for error messages */
  rowNumber: z.number().int().positive(),
  settings: RunSettingsSchema,
});

export type ScenarioRunRequest = z.infer<typeof ScenarioRunRequestSchema>;

export const ScenarioOutcomeSchema = z.object({
  scenarioId: z.string(),
  ok: z.boolean(),
  durationMs: z.number(),
  error: z.object({ name: z.string(), message: z.string() }).optional(),
});

export const ChildMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready') }),
  z.object({ type: z.literal('outcome'), outcome: ScenarioOutcomeSchema }),
]);

export type ChildMessage = z.infer<typeof ChildMessageSchema>;
