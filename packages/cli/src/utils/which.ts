import { access, constants } from 'node:fs/promises';
import { delimiter, join } from 'node:path';

function isExecutable(path: string): Promise<boolean> {
  return access(path, constants.X_OK).then(
    () => true,
    () => false,
  );
}

/**
 * Resolve a command the way a shell would. Paths containing a slash are
 * checked as given; bare names are looked up on PATH.
 */
export async function findExecutable(
  command: string,
  pathEnv: string = process.env.PATH ?? '',
): Promise<string | null> {
  const candidates = command.includes('/')
    ? [command]
    : pathEnv
        .split(delimiter)
        .filter((dir) => dir !== '')
        .map((dir) => join(dir, command));

  for (const candidate of candidates) {
    if (await isExecutable(candidate)) return candidate;
  }
  return null;
}
