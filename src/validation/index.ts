/**
 * Validation Module
 *
 * zod schemas for every create input. Repositories validate before any
 * statement runs, so a missing required field or a value outside a closed
 * enumeration surfaces as ValidationError rather than a store error.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import {
  Aggregate,
  Lane,
  MetricFlag,
  NucleicAcidType,
  ReadsetState,
  SequencingType,
  Status,
} from '../types';

// =============================================================================
// Building blocks
// =============================================================================

export const LaneSchema = z.nativeEnum(Lane);
export const SequencingTypeSchema = z.nativeEnum(SequencingType);
export const NucleicAcidTypeSchema = z.nativeEnum(NucleicAcidType);
export const ReadsetStateSchema = z.nativeEnum(ReadsetState);
export const StatusSchema = z.nativeEnum(Status);
export const MetricFlagSchema = z.nativeEnum(MetricFlag);
export const AggregateSchema = z.nativeEnum(Aggregate);

const id = z.number().int().positive();

/** A parent given as an entity or as its id */
export const EntityRefSchema = z.union([id, z.object({ id }).passthrough()]);

export const MetadataSchema = z.record(z.unknown());

/** Accepts a Date or any string Date can parse */
export const TimestampSchema = z.union([
  z.date(),
  z.string().refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid date' }),
]);

const text = z.string().nullish();

const EnvelopeSchema = z.object({
  deprecated: z.boolean().optional(),
  deleted: z.boolean().optional(),
  extraMetadata: MetadataSchema.nullish(),
  extId: z.number().int().nullish(),
  extSrc: text,
});

// =============================================================================
// Create inputs
// =============================================================================

export const CreateProjectSchema = EnvelopeSchema.extend({
  name: z.string().min(1),
  alias: MetadataSchema.nullish(),
});

export const CreateSpecimenSchema = EnvelopeSchema.extend({
  project: EntityRefSchema,
  name: z.string().min(1),
  alias: MetadataSchema.nullish(),
  cohort: text,
  institution: text,
});

export const CreateSampleSchema = EnvelopeSchema.extend({
  specimen: EntityRefSchema,
  name: z.string().min(1),
  alias: MetadataSchema.nullish(),
  tumour: z.boolean().nullish(),
});

export const CreateExperimentSchema = EnvelopeSchema.extend({
  nucleicAcidType: NucleicAcidTypeSchema,
  sequencingTechnology: text,
  type: text,
  libraryKit: text,
  kitExpirationDate: TimestampSchema.nullish(),
});

export const CreateRunSchema = EnvelopeSchema.extend({
  name: text,
  instrument: text,
  date: TimestampSchema.nullish(),
});

export const CreateReadsetSchema = EnvelopeSchema.extend({
  sample: EntityRefSchema,
  experiment: EntityRefSchema,
  run: EntityRefSchema,
  name: z.string().min(1),
  alias: MetadataSchema.nullish(),
  lane: LaneSchema.nullish(),
  adapter1: text,
  adapter2: text,
  sequencingType: SequencingTypeSchema.nullish(),
  state: ReadsetStateSchema.optional(),
});

export const CreateReferenceSchema = EnvelopeSchema.extend({
  name: text,
  alias: text,
  assembly: text,
  version: text,
  taxonId: text,
  source: text,
});

export const CreateOperationConfigSchema = EnvelopeSchema.extend({
  name: text,
  version: text,
  md5sum: text,
  data: z.instanceof(Buffer).nullish(),
});

export const CreateOperationSchema = EnvelopeSchema.extend({
  project: EntityRefSchema,
  operationConfig: EntityRefSchema.nullish(),
  reference: EntityRefSchema.nullish(),
  platform: text,
  cmdLine: text,
  name: text,
  status: StatusSchema.optional(),
});

export const CreateJobSchema = EnvelopeSchema.extend({
  operation: EntityRefSchema,
  name: text,
  start: TimestampSchema.nullish(),
  stop: TimestampSchema.nullish(),
  status: StatusSchema.nullish(),
  type: text,
});

export const CreateMetricSchema = EnvelopeSchema.extend({
  job: EntityRefSchema,
  name: z.string().min(1),
  value: text,
  flag: MetricFlagSchema.nullish(),
  deliverable: z.boolean().optional(),
  aggregate: AggregateSchema.nullish(),
});

export const CreateFileSchema = EnvelopeSchema.extend({
  name: z.string().min(1),
  type: text,
  md5sum: text,
  deliverable: z.boolean().optional(),
});

export const CreateLocationSchema = EnvelopeSchema.extend({
  file: EntityRefSchema,
  uri: z.string().min(1),
  endpoint: text,
  deliverable: z.boolean().optional(),
});

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse untrusted input
 *
 * @throws ValidationError listing every issue
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, raw: unknown, entity: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw ValidationError.fromZod(entity, result.error);
  }
  return result.data;
}

/**
 * Check typed input at runtime without reshaping it
 *
 * @throws ValidationError listing every issue
 */
export function assertValid(schema: z.ZodTypeAny, input: unknown, entity: string): void {
  parseInput(schema, input, entity);
}

/**
 * Validate a metric record, e.g. one read from a pipeline report
 */
export function validateMetric(raw: unknown): z.output<typeof CreateMetricSchema> {
  return parseInput(CreateMetricSchema, raw, 'metric');
}

/**
 * Normalise a timestamp to ISO-8601 so equal instants compare equal
 *
 * @throws ValidationError on an unparseable value
 */
export function toIsoTimestamp(value: string | Date | null | undefined, field = 'timestamp'): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(field, [`Invalid date: ${String(value)}`]);
  }
  return date.toISOString();
}
