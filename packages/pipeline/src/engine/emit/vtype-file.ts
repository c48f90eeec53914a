import { readFile } from 'node:fs/promises';
import { ArtifactNotFoundError, ConfigSchemaError } from '../../lib/errors.js';
import { isMissingFile, writeText } from '../../lib/files.js';
import type { Logger } from '../../lib/logger.js';

/** Reaction time placeholder every template carries */
export const TAU_MARKER = 'tau="1.0"';

export interface VehicleTypeOptions {
  /** Fail instead of copying when the template has no marker. */
  strict: boolean;
  logger: Logger;
}

export function applyReactionTime(template: string, reactionTime: number): { content: string; replaced: number } {
  const parts = template.split(TAU_MARKER);
  return {
    content: parts.join(`tau="${String(reactionTime)}"`),
    replaced: parts.length - 1,
  };
}

/**
 * Copy the vehicle type template with the scenario's reaction time.
 * The template itself is never modified.
 */
export async function emitVehicleTypeFile(
  templatePath: string,
  outputPath: string,
  reactionTime: number,
  options: VehicleTypeOptions
): Promise<number> {
  let template: string;
  try {
    template = await readFile(templatePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new ArtifactNotFoundError('Vehicle type template', templatePath);
    }
    throw error;
  }

  const { content, replaced } = applyReactionTime(template, reactionTime);
  if (replaced === 0) {
    if (options.strict) {
      throw new ConfigSchemaError(templatePath, `Vehicle type template has no ${TAU_MARKER} marker`);
    }
    options.logger.warn({ template: templatePath }, `No ${TAU_MARKER} marker, reaction time left unchanged`);
  }

  await writeText(outputPath, content);
  return replaced;
}
