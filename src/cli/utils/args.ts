/**
 * Argument parsing shared by the record commands
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ValidationError } from '../../errors';
import { TableName } from '../../types';

const TableArgSchema = z.nativeEnum(TableName);

/**
 * Parse a table name argument
 *
 * @throws ValidationError listing the known tables
 */
export function parseTable(value: string): TableName {
  const result = TableArgSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError('table', [`unknown table ${value} (expected one of ${Object.values(TableName).join(', ')})`]);
  }
  return result.data;
}

/**
 * Parse a positive integer id argument
 */
export function parseId(value: string): number {
  const id = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError('id', [`not a valid id: ${value}`]);
  }
  return id;
}

/**
 * Read a JSON document from disk
 *
 * @throws ValidationError if the file cannot be read or parsed
 */
export function readJsonFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(path, [`cannot read file: ${message}`]);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(path, [`invalid JSON: ${message}`]);
  }
}
