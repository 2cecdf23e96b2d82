/**
 * Process inspection helpers.
 */

/**
 * Check if a PID is alive (exists as a process).
 */
export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 = check existence
    return true;
  } catch (e) {
    // EPERM: exists, owned by someone else
    return isErrno(e, "EPERM");
  }
}

export function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
