import { accessSync, constants, statSync } from 'node:fs';
import path from 'node:path';

/**
 * Find an executable on PATH, like `which`.
 * Names containing a path separator are checked as given.
 */
export function findExecutable(
  name: string,
  searchPath: string = process.env.PATH ?? ''
): string | null {
  if (name.includes(path.sep)) {
    return isExecutableFile(name) ? name : null;
  }

  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

function isExecutableFile(candidate: string): boolean {
  try {
    if (!statSync(candidate).isFile()) return false;
    accessSync(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
