/**
 * msgate — Command Output
 *
 * Commands report results and failures through here so that --json and
 * --quiet hold for both. Results go to stdout, everything else to stderr.
 */

export type OutputMode = 'human' | 'json' | 'quiet';

let mode: OutputMode = 'human';

export function setOutputMode(next: OutputMode): void {
  mode = next;
}

export function isJsonOutput(): boolean {
  return mode === 'json';
}

/** Process exit codes. An undelivered message exits with GENERAL_ERROR. */
export const ExitCode = {
  GENERAL_ERROR: 1,
  USAGE_ERROR: 2,
  CHANNEL_NOT_FOUND: 3,
  MISSING_TOKEN: 4,
  SIGINT: 130,
} as const;

/** `code` is for scripts reading --json output, `hint` for people. */
export interface CommandFailure {
  code: string;
  message: string;
  hint?: string;
}

/**
 * JSON mode writes `data`; quiet mode writes only `id` (an external id
 * or a path) when there is one; human mode calls `render`.
 */
export function printResult(data: unknown, render: () => void, id?: string): void {
  switch (mode) {
    case 'json':
      writeJson(process.stdout, data);
      return;
    case 'quiet':
      if (id !== undefined) process.stdout.write(`${id}\n`);
      return;
    case 'human':
      render();
  }
}

export function printFailure(failure: CommandFailure): void {
  if (mode === 'json') {
    writeJson(process.stderr, { error: failure });
    return;
  }

  process.stderr.write(`\n  Error: ${failure.message}\n`);
  if (failure.hint) process.stderr.write(`  ${failure.hint}\n`);
  process.stderr.write('\n');
}

/** Human mode only. */
export function printNote(message: string): void {
  if (mode === 'human') process.stderr.write(`  ${message}\n`);
}

function writeJson(stream: NodeJS.WritableStream, value: unknown): void {
  stream.write(JSON.stringify(value, null, 2) + '\n');
}
