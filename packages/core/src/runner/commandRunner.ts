import { spawn } from 'node:child_process';
import { logger } from '../logger.js';

export type RunOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  redact?: Array<string | RegExp>;
  allowFailure?: boolean;
};

export type RunResult = {
  cmd: string;
  args: string[];
  cwd?: string;
  durationMs: number;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  aborted: boolean;
};

export class CommandError extends Error {
  readonly result: RunResult;

  constructor(message: string, result: RunResult) {
    super(message);
    this.name = 'CommandError';
    this.result = result;
  }
}

const KILL_GRACE_MS = 2_000;

// Bitbucket app passwords, access tokens, and credentials embedded in clone URLs.
const CREDENTIAL_PATTERNS: RegExp[] = [
  /ATBB[A-Za-z0-9_=-]{10,}/g,
  /ATCTT3x[A-Za-z0-9_=-]{10,}/g,
  /(?<=https?:\/\/[^/\s:@]+:)[^@\s/]+(?=@)/g,
];

export function redactText(text: string, patterns: Array<string | RegExp>): string {
  return patterns.reduce<string>((out, pattern) => {
    if (typeof pattern !== 'string') return out.replace(pattern, '[REDACTED]');
    return pattern ? out.replaceAll(pattern, '[REDACTED]') : out;
  }, text);
}

/** Last non-empty stderr line; git puts the `fatal:` reason there. */
function lastLine(text: string): string | undefined {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .at(-1);
}

function describeFailure(result: RunResult, patterns: Array<string | RegExp>): string {
  const command = redactText([result.cmd, ...result.args].join(' '), patterns);
  const status = result.aborted
    ? 'was aborted'
    : result.signal
      ? `was killed by ${result.signal}`
      : `exited with ${result.exitCode ?? 'no code'}`;
  const reason = lastLine(result.stderr);
  return `Command failed: ${command} ${status}${reason ? `: ${reason}` : ''}`;
}

/**
 * Runs a command without a shell and collects its output with credentials
 * masked. Rejects with CommandError on a non-zero exit unless `allowFailure`.
 */
export function runCommand(cmd: string, args: string[], opts: RunOptions = {}): Promise<RunResult> {
  const { cwd, env, signal, redact = [], allowFailure = false } = opts;
  const patterns = [...CREDENTIAL_PATTERNS, ...redact];
  const startedAt = Date.now();

  return new Promise<RunResult>((resolve, reject) => {
    const child = spawn(cmd, args, { cwd, env, stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });
    const stdout: string[] = [];
    const stderr: string[] = [];
    let aborted = false;

    const abort = () => {
      aborted = true;
      child.kill('SIGTERM');
      setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS).unref();
    };
    const detach = () => signal?.removeEventListener('abort', abort);

    if (signal?.aborted) abort();
    else signal?.addEventListener('abort', abort, { once: true });

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk.toString('utf8')));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk.toString('utf8')));

    child.once('error', (err) => {
      detach();
      reject(err);
    });

    child.once('close', (exitCode, exitSignal) => {
      detach();
      const result: RunResult = {
        cmd,
        args,
        ...(cwd ? { cwd } : {}),
        durationMs: Date.now() - startedAt,
        exitCode,
        signal: exitSignal,
        // Redact the joined text so a secret split across chunks is still masked.
        stdout: redactText(stdout.join(''), patterns),
        stderr: redactText(stderr.join(''), patterns),
        aborted,
      };
      logger.debug(
        { cmd, args: redactText(args.join(' '), patterns), cwd, exitCode, durationMs: result.durationMs },
        'Command finished',
      );
      if (!allowFailure && exitCode !== 0) {
        reject(new CommandError(describeFailure(result, patterns), result));
        return;
      }
      resolve(result);
    });
  });
}
