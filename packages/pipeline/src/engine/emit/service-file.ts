import { InvalidScenarioError } from '../../lib/errors.js';
import { writeText } from '../../lib/files.js';
import { element, serializeXml } from '../../lib/xml.js';
import type { XmlElement } from '../../lib/xml.js';

export const CA_SERVICE_TYPE = 'artery.application.CaService';
export const CA_SERVICE_PORT = 2001;

export function buildServiceFile(rate: number): XmlElement {
  if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
    throw new InvalidScenarioError('v2x_rate', 'V2X rate must be between 0 and 1', '0..1', String(rate));
  }
  return element('services', {}, [
    element('service', { type: CA_SERVICE_TYPE }, [
      element('listener', { port: CA_SERVICE_PORT }),
      element('filters', {}, [element('penetration', { rate: rate.toFixed(4) })]),
    ]),
  ]);
}

/** Share of vehicles equipped with the cooperative awareness service. */
export async function emitServiceFile(rate: number, outputPath: string): Promise<void> {
  await writeText(outputPath, serializeXml(buildServiceFile(rate), { declaration: true }));
}
