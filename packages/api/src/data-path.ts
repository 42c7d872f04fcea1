// Paths for file imports and exports, confined to the data directory

import * as path from 'node:path';
import { ValidationError } from '@policyminer/runtime';

/**
 * Resolve a request path against the data directory.
 *
 * @throws ValidationError when the path leaves the data directory
 */
export function resolveDataPath(dataDir: string, requested: string): string {
  const root = path.resolve(dataDir);
  const resolved = path.resolve(root, requested);
  const relative = path.relative(root, resolved);

  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new ValidationError(`Path must name a file inside the data directory: ${requested}`, {
      field: 'path',
    });
  }
  return resolved;
}
