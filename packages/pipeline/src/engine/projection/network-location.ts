import { readFile } from 'node:fs/promises';
import { ProjectionError } from '../../lib/errors.js';
import { isMissingFile } from '../../lib/files.js';
import { isRecord, parseXml } from '../../lib/xml.js';
import type { NetworkLocation } from './types.js';

const LOCATION_ELEMENT = /<location\b[^>]*\/?>/;

function parseNumberList(value: unknown, expected: number, attribute: string, source: string): number[] {
  if (typeof value !== 'string') {
    throw new ProjectionError(`Network ${source}: <location> has no '${attribute}' attribute`);
  }
  const numbers = value.split(',').map((part) => Number(part.trim()));
  if (numbers.length !== expected || numbers.some((n) => !Number.isFinite(n))) {
    throw new ProjectionError(`Network ${source}: malformed '${attribute}' value '${value}'`);
  }
  return numbers;
}

/**
 * Extract the `<location>` element of a SUMO network. Only that element is
 * parsed; net files are often tens of megabytes.
 */
export function parseNetworkLocation(netXml: string, source: string): NetworkLocation {
  const match = LOCATION_ELEMENT.exec(netXml);
  if (!match) {
    throw new ProjectionError(`Network ${source} has no <location> element`);
  }

  const elementText = match[0].endsWith('/>') ? match[0] : match[0].replace(/>$/, '/>');
  const parsed = parseXml(elementText);
  const location = parsed.location;
  if (!isRecord(location)) {
    throw new ProjectionError(`Network ${source}: unreadable <location> element`);
  }

  const [offsetX = 0, offsetY = 0] = parseNumberList(location.netOffset, 2, 'netOffset', source);
  const [xMin = 0, yMin = 0, xMax = 0, yMax = 0] = parseNumberList(
    location.convBoundary,
    4,
    'convBoundary',
    source
  );
  const projParameter = typeof location.projParameter === 'string' ? location.projParameter : '!';

  return Object.freeze({
    offset: Object.freeze({ x: offsetX, y: offsetY }),
    boundary: Object.freeze({ xMin, yMin, xMax, yMax }),
    projParameter,
  });
}

/**
 * Reads network locations from disk, once per path.
 */
export class NetworkLocationCache {
  private readonly entries = new Map<string, Promise<NetworkLocation>>();

  load(netFile: string): Promise<NetworkLocation> {
    let entry = this.entries.get(netFile);
    if (!entry) {
      entry = readNetworkLocation(netFile);
      this.entries.set(netFile, entry);
      // A failed read is not cached
      entry.catch(() => this.entries.delete(netFile));
    }
    return entry;
  }

  clear(): void {
    this.entries.clear();
  }
}

export async function readNetworkLocation(netFile: string): Promise<NetworkLocation> {
  let text: string;
  try {
    text = await readFile(netFile, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new ProjectionError(`Network file cannot be loaded: ${netFile}`);
    }
    throw error;
  }
  return parseNetworkLocation(text, netFile);
}
