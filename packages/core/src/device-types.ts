/**
 * Device transport contract.
 *
 * `execute` never throws: spawn failures, timeouts and aborts all
 * resolve as a result with `ok: false`.
 */

export interface ExecuteOptions {
  readonly timeoutMs: number;
  readonly signal?: AbortSignal | undefined;
}

export interface CommandResult {
  readonly ok: boolean;
  /** Process exit code, null when the process never ran or was killed. */
  readonly exitCode: number | null;
  readonly stdout: Buffer;
  readonly stderr: string;
  readonly timedOut: boolean;
  /** Human-readable failure reason when `ok` is false. */
  readonly error?: string | undefined;
}

export interface DeviceTransport {
  execute(args: readonly string[], options: ExecuteOptions): Promise<CommandResult>;
}

export interface AppInfo {
  readonly packageName: string;
  readonly mainActivity: string;
  /** Declared activities, when known. Used for coverage reporting. */
  readonly activities: readonly string[];
}
