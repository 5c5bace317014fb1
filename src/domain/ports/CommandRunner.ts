/** Outcome of one external command invocation. */
export interface CommandResult {
  /** Exit status, or `null` when the process was terminated by a signal. */
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
}

export interface CommandRunOptions {
  /** Upper bound on the wait for the process, in milliseconds. */
  readonly timeoutMs: number;
}

/**
 * Port for running shell commands on behalf of `e/COMMAND/` modifiers.
 *
 * Implementations feed `input` to the command's stdin, wait for it to exit and release every
 * handle before settling. They reject with `ExecutionError` when the command cannot be started
 * or exceeds `timeoutMs`; a non-zero exit is reported through `exitCode`, not by rejecting.
 */
export interface CommandRunner {
  run(command: string, input: string, options: CommandRunOptions): Promise<CommandResult>;
}
