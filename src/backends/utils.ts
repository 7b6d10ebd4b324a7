/**
 * Prefix of in-flight files written by `LocalBackend`
 * Names with this prefix are reserved
 */
const tmpPrefix = '.uow-tmp-';

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Checks that the name maps to exactly one file inside the backend directory
 */
function isValidName(name: string): boolean {
  if (name === '' || name === '.' || name === '..') {
    return false;
  }
  if (/[/\\\0]/.test(name)) {
    return false;
  }
  return !name.startsWith(tmpPrefix);
}

export { tmpPrefix, isErrnoException, isValidName };
