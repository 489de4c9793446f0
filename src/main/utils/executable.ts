import fs from 'node:fs';
import path from 'node:path';

function isExecutable(candidate: string): boolean {
  try {
    const stat = fs.statSync(candidate);
    if (!stat.isFile()) return false;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate an executable the way a shell would. A name containing a path
 * separator is checked as given (relative to `cwd`); a bare name is searched
 * for on `searchPath`. Returns the absolute path, or null when nothing runnable
 * is found.
 */
export function findExecutable(
  name: string,
  searchPath: string = process.env.PATH ?? '',
  cwd: string = process.cwd()
): string | null {
  if (name.includes('/') || name.includes(path.sep)) {
    const candidate = path.resolve(cwd, name);
    return isExecutable(candidate) ? candidate : null;
  }
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    if (isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}
