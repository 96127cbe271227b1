/**
 * I/O helpers for CLI
 */

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdout is a TTY (interactive terminal)
 */
export function isStdoutTTY(): boolean {
  return process.stdout.isTTY ?? false;
}
