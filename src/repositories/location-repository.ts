/**
 * Location Repository
 *
 * Each location is one copy of a file at a uri. The endpoint names the
 * storage system and, when not given, is taken from the uri scheme.
 */

import { TableName } from '../types';
import type { CreateLocationInput, Location } from '../types';
import { CreateLocationSchema, assertValid } from '../validation';
import { BaseRepository, refId } from './base-repository';
import { toBoolColumn, toLocation } from './rows';
import type { LocationRow } from './rows';

const ENDPOINT_SEPARATOR = ':///';

/**
 * Endpoint of a uri: the text before the first ":///", or the whole uri
 *
 * @example endpointFromUri('s3:///bucket/key') // 's3'
 */
export function endpointFromUri(uri: string): string {
  const index = uri.indexOf(ENDPOINT_SEPARATOR);
  return index === -1 ? uri : uri.slice(0, index);
}

export class LocationRepository extends BaseRepository<TableName.LOCATION, LocationRow> {
  protected readonly table = TableName.LOCATION;

  protected toEntity(row: LocationRow): Location {
    return toLocation(row);
  }

  /**
   * Create a new location
   *
   * @throws ConstraintViolation if the uri is taken or the file is missing
   */
  create(input: CreateLocationInput): Location {
    assertValid(CreateLocationSchema, input, 'location');
    return this.insert(
      {
        file_id: refId(input.file),
        uri: input.uri,
        endpoint: input.endpoint ?? endpointFromUri(input.uri),
        deliverable: toBoolColumn(input.deliverable),
      },
      input
    );
  }

  findByUri(uri: string): Location | null {
    return this.findOneWhere('uri = ?', [uri]);
  }

  findByFile(file: number): Location[] {
    return this.findAll().filter((location) => location.fileId === file);
  }

  /**
   * Get the location at this uri, creating it for `file` if needed
   *
   * A known uri attached to another file is reported and left as is.
   */
  fromUri(input: CreateLocationInput): Location {
    const existing = this.findByUri(input.uri);
    if (!existing) {
      return this.create(input);
    }
    this.checkOwnership(existing, existing.uri, 'file', existing.fileId, input.file);
    return existing;
  }
}

export const locationRepository = new LocationRepository();
