import { spawn } from 'node:child_process';

import { StoreLockedError, ToolExecutionError, ToolNotFoundError } from './errors.js';

export interface ToolOutput {
  stdout: Buffer;
  stderr: string;
  exitCode: number;
}

export interface RunToolOptions {
  /** Case-insensitive stderr substrings that mean the store is locked. */
  lockedMarkers: readonly string[];
}

export const DEFAULT_LOCKED_MARKERS: readonly string[] = ['locked'];

function isLockedMessage(stderr: string, markers: readonly string[]): boolean {
  const haystack = stderr.toLowerCase();
  return markers.some((marker) => marker !== '' && haystack.includes(marker.toLowerCase()));
}

/**
 * Run the credential tool with `[subcommand, ...args]` and wait for it to exit.
 *
 * Arguments are passed as a vector; no shell sees them. stdin is closed so the
 * tool cannot block on an answer from us, though it may still wait on its own
 * agent. There is no timeout.
 *
 * @throws ToolNotFoundError if `cliPath` cannot be executed because it does not exist.
 * @throws StoreLockedError on a non-zero exit whose stderr matches a locked marker.
 * @throws ToolExecutionError on any other failure.
 */
export function runTool(
  cliPath: string,
  subcommand: string,
  args: readonly string[],
  options: RunToolOptions = { lockedMarkers: DEFAULT_LOCKED_MARKERS },
): Promise<ToolOutput> {
  return new Promise<ToolOutput>((resolve, reject) => {
    const child = spawn(cliPath, [subcommand, ...args], {
      stdio: ['ignore', 'pipe', 'pipe'],
      shell: false,
    });

    const stdoutChunks: Buffer[] = [];
    let stderr = '';
    child.stdout.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') {
        reject(new ToolNotFoundError(cliPath));
        return;
      }
      reject(new ToolExecutionError(`failed to run ${cliPath}: ${err.message}`, null, stderr));
    });

    child.on('close', (code, signal) => {
      const trimmed = stderr.trim();
      if (code === 0) {
        resolve({ stdout: Buffer.concat(stdoutChunks), stderr, exitCode: 0 });
        return;
      }
      if (code === null) {
        reject(
          new ToolExecutionError(
            `${cliPath} ${subcommand} was terminated by signal ${signal ?? 'unknown'}`,
            null,
            stderr,
          ),
        );
        return;
      }
      if (isLockedMessage(stderr, options.lockedMarkers)) {
        reject(
          new StoreLockedError(
            `rbw vault locked (${cliPath} ${subcommand} exited with code ${code}): ${trimmed}. Run 'rbw unlock'.`,
            stderr,
          ),
        );
        return;
      }
      reject(
        new ToolExecutionError(
          `${cliPath} ${subcommand} failed (code ${code}): ${trimmed}`,
          code,
          stderr,
        ),
      );
    });
  });
}
