/**
 * Ingestion
 *
 * Loads pipeline reports (untrusted JSON) into the tracking database.
 * Every entity is resolved through the get-or-create calls, so loading
 * the same report twice reuses the project, specimens, samples,
 * readsets, experiments, runs, files and locations.
 *
 * Without an explicit session a report is loaded in its own session and
 * committed on success, or joins the session already open on the
 * connection in a savepoint; with one, committing is left to the caller.
 */

import { z } from 'zod';
import { withSession } from '../db';
import type { Session } from '../db';
import { ValidationError } from '../errors';
import type { OwnershipConflict } from '../errors';
import { createLogger } from '../logging';
import { createRepositories } from '../repositories';
import type { Repositories } from '../repositories';
import { LinkTable, Status } from '../types';
import type { Job, Project, Readset, TrackedFile } from '../types';
import {
  AggregateSchema,
  LaneSchema,
  MetadataSchema,
  MetricFlagSchema,
  NucleicAcidTypeSchema,
  SequencingTypeSchema,
  StatusSchema,
  TimestampSchema,
  parseInput,
} from '../validation';

const log = createLogger('ingest');

/** Operation name under which run-processing metrics are recorded */
export const RUN_PROCESSING_OPERATION = 'run_processing';

// =============================================================================
// Payload schemas
// =============================================================================

const text = z.string().nullish();

const FilePayloadSchema = z.object({
  name: z.string().min(1),
  type: text,
  md5sum: text,
  uri: z.string().min(1),
  endpoint: text,
  deliverable: z.boolean().optional(),
});

const MetricPayloadSchema = z.object({
  name: z.string().min(1),
  value: z.union([z.string(), z.number()]).nullish(),
  flag: MetricFlagSchema.nullish(),
  deliverable: z.boolean().optional(),
  aggregate: AggregateSchema.nullish(),
});

const ExperimentPayloadSchema = z.object({
  nucleicAcidType: NucleicAcidTypeSchema,
  sequencingTechnology: text,
  type: text,
  libraryKit: text,
  kitExpirationDate: TimestampSchema.nullish(),
});

const RunPayloadSchema = z.object({
  name: text,
  instrument: text,
  date: TimestampSchema.nullish(),
  extId: z.number().int().nullish(),
  extSrc: text,
});

const RunReadsetPayloadSchema = z.object({
  specimen: z.string().min(1),
  cohort: text,
  institution: text,
  sample: z.string().min(1),
  tumour: z.boolean().optional(),
  name: z.string().min(1),
  alias: MetadataSchema.nullish(),
  lane: LaneSchema.nullish(),
  adapter1: text,
  adapter2: text,
  sequencingType: SequencingTypeSchema.nullish(),
  experiment: ExperimentPayloadSchema,
  files: z.array(FilePayloadSchema).default([]),
  metrics: z.array(MetricPayloadSchema).default([]),
});

export const RunProcessingPayloadSchema = z.object({
  project: z.string().min(1),
  run: RunPayloadSchema,
  readsets: z.array(RunReadsetPayloadSchema).min(1),
});

const OperationDetailsSchema = z.object({
  name: z.string().min(1),
  platform: text,
  cmdLine: text,
  status: StatusSchema.optional(),
  config: z
    .object({
      name: text,
      version: text,
      md5sum: text,
      data: z.string().base64().nullish(),
    })
    .nullish(),
  reference: z
    .object({
      name: text,
      alias: text,
      assembly: text,
      version: text,
      taxonId: text,
      source: text,
    })
    .nullish(),
});

const JobPayloadSchema = z.object({
  name: z.string().min(1),
  type: text,
  status: StatusSchema.nullish(),
  start: TimestampSchema.nullish(),
  stop: TimestampSchema.nullish(),
  readsets: z.array(z.string().min(1)).optional(),
  files: z.array(FilePayloadSchema).default([]),
  metrics: z.array(MetricPayloadSchema).default([]),
});

export const OperationPayloadSchema = z.object({
  project: z.string().min(1),
  operation: OperationDetailsSchema,
  readsets: z.array(z.string().min(1)).min(1),
  jobs: z.array(JobPayloadSchema).default([]),
});

export type RunProcessingPayload = z.input<typeof RunProcessingPayloadSchema>;
export type OperationPayload = z.input<typeof OperationPayloadSchema>;

type FilePayload = z.output<typeof FilePayloadSchema>;
type MetricPayload = z.output<typeof MetricPayloadSchema>;

/**
 * What an ingestion touched
 */
export interface IngestReport {
  operationId: number;
  /** Readsets resolved, in payload order */
  readsetIds: number[];
  jobIds: number[];
  /** Files resolved, in payload order, without repeats */
  fileIds: number[];
  /** Ownership conflicts met while resolving */
  conflicts: OwnershipConflict[];
}

// =============================================================================
// Shared steps
// =============================================================================

/**
 * Resolve a file by the uri of its location; a known uri reuses its file
 */
function resolveFile(repos: Repositories, payload: FilePayload): TrackedFile {
  const known = repos.locations.findByUri(payload.uri);
  if (known) {
    return repos.files.getById(known.fileId, { includeDeleted: true });
  }

  const file = repos.files.create({
    name: payload.name,
    type: payload.type,
    md5sum: payload.md5sum,
    deliverable: payload.deliverable,
  });
  repos.locations.fromUri({
    file,
    uri: payload.uri,
    endpoint: payload.endpoint,
    deliverable: payload.deliverable,
  });
  return file;
}

function recordMetrics(repos: Repositories, job: Job, metrics: MetricPayload[], readsets: Readset[]): void {
  for (const payload of metrics) {
    const metric = repos.metrics.create({
      job,
      name: payload.name,
      value: payload.value === null || payload.value === undefined ? null : String(payload.value),
      flag: payload.flag,
      deliverable: payload.deliverable,
      aggregate: payload.aggregate,
    });
    for (const readset of readsets) {
      repos.links.link(LinkTable.READSET_METRIC, readset, metric);
    }
  }
}

function pushUnique(ids: number[], id: number): void {
  if (!ids.includes(id)) {
    ids.push(id);
  }
}

/**
 * Run `fn` against repositories bound to `session`, or to a fresh
 * committed session when none is given
 */
function inSession(session: Session | undefined, fn: (repos: Repositories, session: Session) => IngestReport): IngestReport {
  if (session) {
    return fn(createRepositories(session), session);
  }
  return withSession((fresh) => fn(createRepositories(fresh), fresh));
}

function conflictsSince(session: Session, start: number): OwnershipConflict[] {
  return session.conflicts.slice(start);
}

// =============================================================================
// Run processing
// =============================================================================

/**
 * Load a sequencing run report: project, run, and per readset its
 * specimen, sample, experiment, files and QC metrics
 *
 * @throws ValidationError if the payload is malformed
 */
export function ingestRunProcessing(payload: unknown, session?: Session): IngestReport {
  const data = parseInput(RunProcessingPayloadSchema, payload, 'run processing payload');

  return inSession(session, (repos, active) => {
    const start = active.conflicts.length;
    const project = repos.projects.fromName({ name: data.project });
    const run = repos.runs.fromAttributes(data.run);

    const operation = repos.operations.create({
      project,
      name: RUN_PROCESSING_OPERATION,
      status: Status.COMPLETED,
    });
    const job = repos.jobs.create({
      operation,
      name: RUN_PROCESSING_OPERATION,
      status: Status.COMPLETED,
    });

    const readsetIds: number[] = [];
    const fileIds: number[] = [];

    for (const entry of data.readsets) {
      const specimen = repos.specimens.fromName({
        name: entry.specimen,
        project,
        cohort: entry.cohort,
        institution: entry.institution,
      });
      const sample = repos.samples.fromName({ name: entry.sample, specimen, tumour: entry.tumour });
      const experiment = repos.experiments.fromAttributes(entry.experiment);
      const readset = repos.readsets.fromName({
        name: entry.name,
        sample,
        experiment,
        run,
        alias: entry.alias,
        lane: entry.lane,
        adapter1: entry.adapter1,
        adapter2: entry.adapter2,
        sequencingType: entry.sequencingType,
      });
      readsetIds.push(readset.id);

      repos.links.link(LinkTable.READSET_OPERATION, readset, operation);
      repos.links.link(LinkTable.READSET_JOB, readset, job);

      for (const filePayload of entry.files) {
        const file = resolveFile(repos, filePayload);
        repos.links.link(LinkTable.READSET_FILE, readset, file);
        repos.links.link(LinkTable.JOB_FILE, job, file);
        pushUnique(fileIds, file.id);
      }

      recordMetrics(repos, job, entry.metrics, [readset]);
    }

    const conflicts = conflictsSince(active, start);
    log.info('Ingested run processing', {
      project: project.name,
      readsets: readsetIds.length,
      files: fileIds.length,
      conflicts: conflicts.length,
    });

    return { operationId: operation.id, readsetIds, jobIds: [job.id], fileIds, conflicts };
  });
}

// =============================================================================
// Operations
// =============================================================================

function requireReadsets(repos: Repositories, names: string[]): Readset[] {
  const missing: string[] = [];
  const found: Readset[] = [];
  for (const name of names) {
    const readset = repos.readsets.findByName(name);
    if (readset) {
      found.push(readset);
    } else {
      missing.push(name);
    }
  }
  if (missing.length > 0) {
    throw new ValidationError('operation payload', missing.map((name) => `readsets: unknown readset ${name}`));
  }
  return found;
}

function requireProject(repos: Repositories, name: string): Project {
  const project = repos.projects.findByName(name);
  if (!project) {
    throw new ValidationError('operation payload', [`project: unknown project ${name}`]);
  }
  return project;
}

/**
 * Load a pipeline operation report: the operation with its config and
 * reference, its jobs, and the files and metrics each job produced for
 * already-known readsets
 *
 * @throws ValidationError if the payload is malformed or names an unknown
 * project or readset
 */
export function ingestOperation(payload: unknown, session?: Session): IngestReport {
  const data = parseInput(OperationPayloadSchema, payload, 'operation payload');

  return inSession(session, (repos, active) => {
    const start = active.conflicts.length;
    const project = requireProject(repos, data.project);
    const readsets = requireReadsets(repos, data.readsets);
    const byName = new Map(readsets.map((readset) => [readset.name, readset]));

    const { config, reference } = data.operation;
    const operationConfig = config
      ? repos.operationConfigs.fromAttributes({
          name: config.name,
          version: config.version,
          md5sum: config.md5sum,
          data: config.data ? Buffer.from(config.data, 'base64') : null,
        })
      : null;
    const operationReference = reference ? repos.references.fromAttributes(reference) : null;

    const operation = repos.operations.create({
      project,
      operationConfig,
      reference: operationReference,
      name: data.operation.name,
      platform: data.operation.platform,
      cmdLine: data.operation.cmdLine,
      status: data.operation.status,
    });
    for (const readset of readsets) {
      repos.links.link(LinkTable.READSET_OPERATION, readset, operation);
    }

    const jobIds: number[] = [];
    const fileIds: number[] = [];

    for (const entry of data.jobs) {
      const jobReadsets = entry.readsets ? requireReadsets(repos, entry.readsets) : readsets;
      for (const readset of jobReadsets) {
        if (!byName.has(readset.name)) {
          throw new ValidationError('operation payload', [
            `jobs: readset ${readset.name} of job ${entry.name} is not part of the operation`,
          ]);
        }
      }

      const job = repos.jobs.create({
        operation,
        name: entry.name,
        type: entry.type,
        status: entry.status,
        start: entry.start,
        stop: entry.stop,
      });
      jobIds.push(job.id);

      for (const readset of jobReadsets) {
        repos.links.link(LinkTable.READSET_JOB, readset, job);
      }
      for (const filePayload of entry.files) {
        const file = resolveFile(repos, filePayload);
        repos.links.link(LinkTable.JOB_FILE, job, file);
        for (const readset of jobReadsets) {
          repos.links.link(LinkTable.READSET_FILE, readset, file);
        }
        pushUnique(fileIds, file.id);
      }
      recordMetrics(repos, job, entry.metrics, jobReadsets);
    }

    const conflicts = conflictsSince(active, start);
    log.info('Ingested operation', {
      project: project.name,
      operation: operation.name,
      jobs: jobIds.length,
      conflicts: conflicts.length,
    });

    return {
      operationId: operation.id,
      readsetIds: readsets.map((readset) => readset.id),
      jobIds,
      fileIds,
      conflicts,
    };
  });
}
