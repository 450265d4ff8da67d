/**
 * Store location helpers
 * @module session/store-path
 */

import { mkdirSync } from 'fs';
import { join } from 'path';
import { StoreIOError, getErrorMessage } from '../errors/index.js';

/**
 * Replace every character outside [a-zA-Z0-9_.-] so a dataset name is a
 * single safe path component
 */
export function sanitizeName(input: string): string {
  const sanitized = input.replace(/[^a-zA-Z0-9_.-]/g, '_');
  return sanitized === '' || sanitized === '.' || sanitized === '..' ? '_' : sanitized;
}

/**
 * Directory holding one dataset's persistent entries, created if missing
 */
export function resolveStorePath(root: string, datasetName: string): string {
  const path = join(root, sanitizeName(datasetName));
  try {
    mkdirSync(path, { recursive: true });
  } catch (error) {
    throw new StoreIOError(`Cannot create store directory ${path}: ${getErrorMessage(error)}`, path, {
      operation: 'mkdir',
      ...(error instanceof Error ? { cause: error } : {}),
    });
  }
  return path;
}
