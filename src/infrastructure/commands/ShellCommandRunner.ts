import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import type { CommandResult, CommandRunner, CommandRunOptions } from '../../domain/ports/CommandRunner.js';
import { ExecutionError } from '../../domain/errors/CsvSedErrors.js';
import logger from '../logging/logger.js';

export interface ShellCommandRunnerOptions {
  /** Shell used to interpret commands. Default: `true` (`/bin/sh`, or `cmd.exe` on Windows). */
  readonly shell?: string | boolean;
  /** Delay between SIGTERM and SIGKILL once a command times out. Default: `1000`. */
  readonly killGraceMs?: number;
  /** Environment for spawned commands. Default: the current process environment. */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Runs each command in a fresh shell process, one process per call.
 *
 * On POSIX systems the shell leads its own process group, so a timeout signals
 * every process of a pipeline, not only the shell.
 */
export class ShellCommandRunner implements CommandRunner {
  private readonly shell: string | boolean;
  private readonly killGraceMs: number;
  private readonly env: NodeJS.ProcessEnv | undefined;
  private readonly groupKill = process.platform !== 'win32';

  constructor(options?: ShellCommandRunnerOptions) {
    this.shell = options?.shell ?? true;
    this.killGraceMs = options?.killGraceMs ?? 1000;
    this.env = options?.env;
  }

  run(command: string, input: string, options: CommandRunOptions): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve, reject) => {
      let proc: ChildProcessWithoutNullStreams;
      try {
        proc = spawn(command, { shell: this.shell, env: this.env ?? process.env, detached: this.groupKill });
      } catch (error) {
        reject(new ExecutionError(command, 'spawn', {}, { cause: error }));
        return;
      }
      logger.debug(`Spawned PID ${String(proc.pid)}: ${command}`);

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const settle = (done: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        done();
      };

      const rejectTimeout = (): void => {
        reject(new ExecutionError(command, 'timeout', { timeoutMs: options.timeoutMs, stderr }));
      };

      const timer = setTimeout(() => {
        timedOut = true;
        logger.debug(`Command timed out after ${String(options.timeoutMs)}ms, terminating PID ${String(proc.pid)}`);
        this.signal(proc, 'SIGTERM');
        killTimer = setTimeout(() => {
          logger.debug(`Force killing PID ${String(proc.pid)}`);
          this.signal(proc, 'SIGKILL');
          // A background process may still hold the pipes open; stop waiting for them.
          settle(() => {
            proc.stdin.destroy();
            proc.stdout.destroy();
            proc.stderr.destroy();
            proc.unref();
            rejectTimeout();
          });
        }, this.killGraceMs);
      }, options.timeoutMs);

      proc.stdout.setEncoding('utf-8');
      proc.stderr.setEncoding('utf-8');
      proc.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      proc.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });
      // A command that exits without reading its input closes the pipe under us (EPIPE);
      // its exit status decides the outcome.
      proc.stdin.on('error', (error: Error) => {
        logger.debug(`stdin of PID ${String(proc.pid)} closed early: ${error.message}`);
      });

      proc.on('error', (error: Error) => {
        settle(() => reject(new ExecutionError(command, 'spawn', { stderr }, { cause: error })));
      });
      proc.on('close', (code: number | null) => {
        settle(() => {
          if (timedOut) {
            rejectTimeout();
          } else {
            resolve({ exitCode: code, stdout, stderr });
          }
        });
      });

      proc.stdin.end(input);
    });
  }

  private signal(proc: ChildProcessWithoutNullStreams, signal: NodeJS.Signals): void {
    if (this.groupKill && proc.pid !== undefined) {
      try {
        process.kill(-proc.pid, signal);
        return;
      } catch (error) {
        // ESRCH once the whole group is gone
        logger.debug(`Could not signal process group ${String(proc.pid)}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    proc.kill(signal);
  }
}
