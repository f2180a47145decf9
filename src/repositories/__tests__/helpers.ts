/**
 * Shared fixtures for repository tests
 */

import type { Repositories } from '../index';
import { NucleicAcidType } from '../../types';
import type { Experiment, Project, Readset, Run, Sample, Specimen } from '../../types';

export interface Hierarchy {
  project: Project;
  specimen: Specimen;
  sample: Sample;
  experiment: Experiment;
  run: Run;
  readset: Readset;
}

/**
 * Resolve a project down to one readset, all names suffixed with `suffix`
 */
export function seedHierarchy(repos: Repositories, suffix = '1'): Hierarchy {
  const project = repos.projects.fromName({ name: `PRJ-${suffix}` });
  const specimen = repos.specimens.fromName({ name: `SP-${suffix}`, project });
  const sample = repos.samples.fromName({ name: `SA-${suffix}`, specimen });
  const experiment = repos.experiments.fromAttributes({
    nucleicAcidType: NucleicAcidType.DNA,
    sequencingTechnology: 'ILLUMINA',
    libraryKit: `KIT-${suffix}`,
  });
  const run = repos.runs.fromAttributes({ name: `RUN-${suffix}`, instrument: 'NovaSeq' });
  const readset = repos.readsets.fromName({ name: `RS-${suffix}`, sample, experiment, run });
  return { project, specimen, sample, experiment, run, readset };
}
