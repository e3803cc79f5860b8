import { execFile } from 'child_process';
import { promisify } from 'util';
import { ExternalToolError } from './errors';

const execFileAsync = promisify(execFile);

const DEFAULT_TIMEOUT_MS = 10_000;
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface ExecOptions {
  timeoutMs?: number;
}

export interface Executor {
  exec(file: string, args: readonly string[], options?: ExecOptions): Promise<{ stdout: string; stderr: string }>;
}

export function describeFailure(command: string, error: unknown, timeoutMs: number): ExternalToolError {
  if (!(error instanceof Error)) {
    return new ExternalToolError(command, `${command} failed: ${String(error)}`);
  }

  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
  const code = 'code' in error ? error.code : undefined;

  if ('killed' in error && error.killed === true) {
    return new ExternalToolError(command, `${command} timed out after ${timeoutMs}ms`, { stderr });
  }
  if (code === 'ENOENT') {
    return new ExternalToolError(command, `${command}: command not found`);
  }
  if (typeof code === 'number') {
    const detail = stderr ? `: ${stderr}` : '';
    return new ExternalToolError(command, `${command} exited with code ${code}${detail}`, { exitCode: code, stderr });
  }
  return new ExternalToolError(command, `${command} failed: ${error.message}`, { stderr });
}

/**
 * Runs host commands directly (no shell), so unit names never pass through
 * shell parsing. Every call is bounded by a timeout.
 */
export class LocalExecutor implements Executor {
  constructor(private readonly defaultTimeoutMs = DEFAULT_TIMEOUT_MS) {}

  async exec(file: string, args: readonly string[], options: ExecOptions = {}) {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const command = [file, ...args].join(' ');
    try {
      const { stdout, stderr } = await execFileAsync(file, args, {
        encoding: 'utf8',
        timeout: timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        env: { ...process.env, LC_ALL: 'C' }
      });
      return { stdout, stderr };
    } catch (error: unknown) {
      throw describeFailure(command, error, timeoutMs);
    }
  }
}
