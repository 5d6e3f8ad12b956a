/**
 * Platform detection utilities.
 */

/** Check if running on Windows, where POSIX permission bits are not enforced. */
export function isWindows(): boolean {
  return process.platform === 'win32'
}
