import { logger } from '@bbsync/core/logger.js';
import { MissingFieldsError } from '@bbsync/core/store/stateRepository.js';

export function writeJson(payload: unknown): void {
  process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);
}

export function formatRows<H extends string>(headers: readonly H[], rows: Array<Record<H, string>>): string {
  const widths = headers.map((header) => header.length);

  for (const row of rows) {
    headers.forEach((header, index) => {
      widths[index] = Math.max(widths[index] ?? 0, row[header].length);
    });
  }

  const headerLine = headers
    .map((header, index) => header.padEnd(widths[index] ?? header.length))
    .join('  ');
  const divider = headers
    .map((header, index) => ''.padEnd(widths[index] ?? header.length, '-'))
    .join('  ');
  const lines = rows.map((row) =>
    headers
      .map((header, index) => row[header].padEnd(widths[index] ?? header.length))
      .join('  ')
      .trimEnd(),
  );

  return [headerLine.trimEnd(), divider, ...lines].join('\n');
}

/** Prints a command failure to stderr and returns the exit code for it. */
export function reportCommandError(err: unknown, envFile: string): number {
  if (err instanceof MissingFieldsError) {
    process.stderr.write(`Missing required values in ${envFile}:\n`);
    for (const key of err.missing) {
      process.stderr.write(`  ${key}=\n`);
    }
    return 1;
  }
  logger.debug({ err }, 'Command failed');
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${message}\n`);
  return 1;
}
