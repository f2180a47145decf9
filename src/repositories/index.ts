/**
 * Repositories Module - tracking database data access layer
 *
 * Exports every repository class, its singleton instance (bound to the
 * process-default session) and createRepositories() for binding a full
 * set to an explicit session.
 *
 * @example
 * ```typescript
 * import { repositories, createRepositories } from './repositories';
 * import { withSession } from './db';
 *
 * // Default session
 * const project = repositories.projects.fromName({ name: 'PRJ-1' });
 *
 * // Explicit session, committed when the callback returns
 * withSession((session) => {
 *   const repos = createRepositories(session);
 *   const specimen = repos.specimens.fromName({ name: 'SP-1', project });
 *   console.log(session.conflicts);
 * });
 * ```
 */

import type { Session } from '../db';
import { TableName } from '../types';
import type { BaseRepository } from './base-repository';
import type { EnvelopeRow } from './rows';

// =============================================================================
// Base Repository
// =============================================================================

export { BaseRepository, refId, getCurrentTimestamp } from './base-repository';
export type { FindOptions } from './base-repository';

// =============================================================================
// Entity Repositories
// =============================================================================

export { ProjectRepository, projectRepository } from './project-repository';
export { SpecimenRepository, specimenRepository } from './specimen-repository';
export { SampleRepository, sampleRepository } from './sample-repository';
export { ExperimentRepository, experimentRepository } from './experiment-repository';
export { RunRepository, runRepository } from './run-repository';
export { ReadsetRepository, readsetRepository } from './readset-repository';
export { ReferenceRepository, referenceRepository } from './reference-repository';
export { OperationConfigRepository, operationConfigRepository } from './operation-config-repository';
export { OperationRepository, operationRepository } from './operation-repository';
export { JobRepository, jobRepository } from './job-repository';
export { MetricRepository, metricRepository } from './metric-repository';
export { FileRepository, fileRepository } from './file-repository';
export { LocationRepository, locationRepository, endpointFromUri } from './location-repository';

// =============================================================================
// Link Repository
// =============================================================================

export { LinkRepository, linkRepository } from './link-repository';
export type { LinkSide } from './link-repository';

// =============================================================================
// Unified Repositories Object
// =============================================================================

import { ProjectRepository, projectRepository } from './project-repository';
import { SpecimenRepository, specimenRepository } from './specimen-repository';
import { SampleRepository, sampleRepository } from './sample-repository';
import { ExperimentRepository, experimentRepository } from './experiment-repository';
import { RunRepository, runRepository } from './run-repository';
import { ReadsetRepository, readsetRepository } from './readset-repository';
import { ReferenceRepository, referenceRepository } from './reference-repository';
import { OperationConfigRepository, operationConfigRepository } from './operation-config-repository';
import { OperationRepository, operationRepository } from './operation-repository';
import { JobRepository, jobRepository } from './job-repository';
import { MetricRepository, metricRepository } from './metric-repository';
import { FileRepository, fileRepository } from './file-repository';
import { LocationRepository, locationRepository } from './location-repository';
import { LinkRepository, linkRepository } from './link-repository';

export interface Repositories {
  projects: ProjectRepository;
  specimens: SpecimenRepository;
  samples: SampleRepository;
  experiments: ExperimentRepository;
  runs: RunRepository;
  readsets: ReadsetRepository;
  references: ReferenceRepository;
  operationConfigs: OperationConfigRepository;
  operations: OperationRepository;
  jobs: JobRepository;
  metrics: MetricRepository;
  files: FileRepository;
  locations: LocationRepository;
  links: LinkRepository;
}

/**
 * A full set of repositories writing through `session`
 */
export function createRepositories(session: Session): Repositories {
  return {
    projects: new ProjectRepository(session),
    specimens: new SpecimenRepository(session),
    samples: new SampleRepository(session),
    experiments: new ExperimentRepository(session),
    runs: new RunRepository(session),
    readsets: new ReadsetRepository(session),
    references: new ReferenceRepository(session),
    operationConfigs: new OperationConfigRepository(session),
    operations: new OperationRepository(session),
    jobs: new JobRepository(session),
    metrics: new MetricRepository(session),
    files: new FileRepository(session),
    locations: new LocationRepository(session),
    links: new LinkRepository(session),
  };
}

/**
 * Singleton instances bound to the process-default session
 */
export const repositories: Repositories = {
  projects: projectRepository,
  specimens: specimenRepository,
  samples: sampleRepository,
  experiments: experimentRepository,
  runs: runRepository,
  readsets: readsetRepository,
  references: referenceRepository,
  operationConfigs: operationConfigRepository,
  operations: operationRepository,
  jobs: jobRepository,
  metrics: metricRepository,
  files: fileRepository,
  locations: locationRepository,
  links: linkRepository,
};

/**
 * Envelope operations available on every entity table
 */
export type TableRepository = Pick<
  BaseRepository<TableName, EnvelopeRow>,
  'findById' | 'getById' | 'findAll' | 'count' | 'markDeleted' | 'markDeprecated' | 'mergeMetadata' | 'delete' | 'flat'
>;

const REPOSITORY_KEYS: Record<TableName, Exclude<keyof Repositories, 'links'>> = {
  [TableName.PROJECT]: 'projects',
  [TableName.SPECIMEN]: 'specimens',
  [TableName.SAMPLE]: 'samples',
  [TableName.EXPERIMENT]: 'experiments',
  [TableName.RUN]: 'runs',
  [TableName.READSET]: 'readsets',
  [TableName.REFERENCE]: 'references',
  [TableName.OPERATION_CONFIG]: 'operationConfigs',
  [TableName.OPERATION]: 'operations',
  [TableName.JOB]: 'jobs',
  [TableName.METRIC]: 'metrics',
  [TableName.FILE]: 'files',
  [TableName.LOCATION]: 'locations',
};

/**
 * Repository serving `table`
 */
export function repositoryFor(repos: Repositories, table: TableName): TableRepository {
  return repos[REPOSITORY_KEYS[table]];
}
