import fs from 'fs';
import path from 'path';
import { parseWaveEvent } from '@wavefront/engine';
import type { WaveEvent } from '@wavefront/shared';

/**
 * Reads and validates an event definition file (JSON, GeoJSON area).
 */
export function loadEvent(file: string): WaveEvent {
  const fullPath = path.resolve(file);

  if (!fs.existsSync(fullPath)) {
    throw new Error(`Event file does not exist: ${fullPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(fullPath, 'utf8'));
  } catch (error) {
    throw new Error(`Event file is not valid JSON: ${fullPath}`, { cause: error });
  }

  return parseWaveEvent(raw);
}
