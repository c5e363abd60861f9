import { z } from 'zod';
import { createLogger, type Area, type WaveEvent, type WaveKind } from '@wavefront/shared';
import { CONFIG } from './constants';
import { closeRing, isDegenerate } from './polygon-engine';

const log = createLogger('Config');

// --- GeoJSON Sub-Schemas ---

// [lng, lat] with an optional altitude. Longitudes may exceed 180 for areas crossing the antimeridian.
export const LngLatSchema = z
  .tuple([z.number().min(-360).max(360), z.number().min(-90).max(90)])
  .rest(z.number());

const RingSchema = z.array(LngLatSchema).min(3, 'A ring needs at least 3 positions');

export const PolygonGeometrySchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(RingSchema).min(1),
});

export const MultiPolygonGeometrySchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(RingSchema).min(1)),
});

const GeometrySchema = z.discriminatedUnion('type', [PolygonGeometrySchema, MultiPolygonGeometrySchema]);

export const FeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: GeometrySchema,
  properties: z.record(z.unknown()).nullable().optional(),
});

export const FeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(FeatureSchema),
});

export const AreaGeoJsonSchema = z.discriminatedUnion('type', [
  PolygonGeometrySchema,
  MultiPolygonGeometrySchema,
  FeatureSchema,
  FeatureCollectionSchema,
]);

export type AreaGeoJson = z.infer<typeof AreaGeoJsonSchema>;

// --- Wave Definition ---

const SpeedSchema = z
  .number({ invalid_type_error: 'Speed must be a number' })
  .refine(
    speed => speed > CONFIG.MIN_SPEED && speed < CONFIG.MAX_SPEED,
    `Speed must be greater than ${CONFIG.MIN_SPEED} and less than ${CONFIG.MAX_SPEED}`
  );

const DirectionSchema = z.enum(['EAST', 'WEST']);

export const LinearWaveSchema = z.object({ speed: SpeedSchema, direction: DirectionSchema });
export const DeepWaveSchema = z.object({ speed: SpeedSchema, direction: DirectionSchema });
export const SplitWaveSchema = z.object({ speed: SpeedSchema });

const WAVE_KINDS = ['linear', 'deep', 'split'] as const;

// Exactly one kind may be declared
export const WaveDefinitionSchema = z
  .object({
    linear: LinearWaveSchema.optional(),
    deep: DeepWaveSchema.optional(),
    split: SplitWaveSchema.optional(),
  })
  .superRefine((definition, ctx) => {
    const declared = WAVE_KINDS.filter(kind => definition[kind] !== undefined);
    if (declared.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Exactly one of linear, deep or split must be defined (found ${declared.length === 0 ? 'none' : declared.join(', ')})`,
      });
    }
  });

export type WaveDefinition = z.infer<typeof WaveDefinitionSchema>;

const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone });
    return true;
  } catch {
    return false;
  }
};

// --- Main Event Schema ---

export const EventDefinitionSchema = z.object({
  id: z.string().min(1),
  startsAt: z.string().datetime({ offset: true, message: 'Start time must be an ISO 8601 date-time' }),
  timeZone: z.string().refine(isValidTimeZone, 'Unknown time zone').default('UTC'),
  area: AreaGeoJsonSchema,
  wavedef: WaveDefinitionSchema,
});

// --- Conversion ---

/**
 * Outer rings of every polygon, closed. Holes are not part of the wave area.
 */
export function areaFromGeoJson(geojson: AreaGeoJson): Area {
  const ringsToPolygon = (rings: number[][][]) =>
    closeRing(rings[0].map(([lng, lat]) => ({ lat, lng })));

  switch (geojson.type) {
    case 'Polygon':
      return [ringsToPolygon(geojson.coordinates)];
    case 'MultiPolygon':
      return geojson.coordinates.map(ringsToPolygon);
    case 'Feature':
      return areaFromGeoJson(geojson.geometry);
    case 'FeatureCollection':
      return geojson.features.flatMap(feature => areaFromGeoJson(feature.geometry));
  }
}

export function toWaveKind(definition: WaveDefinition): WaveKind | null {
  if (definition.linear) return { kind: 'linear', ...definition.linear };
  if (definition.deep) return { kind: 'deep', ...definition.deep };
  if (definition.split) return { kind: 'split', ...definition.split };
  return null;
}

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

export type EventValidationResult =
  | { success: true; event: WaveEvent }
  | { success: false; errors: string[] };

/**
 * Validates a raw event definition. Every problem is reported as a readable message.
 */
export function validateEventDefinition(input: unknown): EventValidationResult {
  const parsed = EventDefinitionSchema.safeParse(input);
  if (!parsed.success) return { success: false, errors: formatIssues(parsed.error) };

  const { id, startsAt, timeZone, area: geojson, wavedef } = parsed.data;
  const errors: string[] = [];

  const area = areaFromGeoJson(geojson).filter(polygon => !isDegenerate(polygon));
  if (area.length === 0) errors.push('area: No usable polygon in area');

  const wave = toWaveKind(wavedef);
  if (!wave) errors.push('wavedef: Exactly one of linear, deep or split must be defined (found none)');

  if (!wave || errors.length > 0) return { success: false, errors };

  return {
    success: true,
    event: { id, startsAt: Date.parse(startsAt), timeZone, area, wave },
  };
}

export class WaveConfigError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid wave configuration:\n- ${errors.join('\n- ')}`);
    this.name = 'WaveConfigError';
    this.errors = errors;
  }
}

/**
 * Same as validateEventDefinition, but refuses to continue on an invalid configuration.
 */
export function parseWaveEvent(input: unknown): WaveEvent {
  const result = validateEventDefinition(input);
  if (!result.success) {
    log.warn(`Rejected event definition (${result.errors.length} problem(s))`);
    throw new WaveConfigError(result.errors);
  }
  return result.event;
}
