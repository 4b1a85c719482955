/**
 * FakeTransport: in-process stand-in for a device.
 *
 * Responses are matched against the space-joined argument list by prefix
 * (or predicate); the first matching rule wins. Unmatched commands
 * succeed with empty output. Every call is recorded for assertions.
 */

import type { CommandResult, DeviceTransport, ExecuteOptions } from "@droidprobe/core";

export interface FakeResponse {
  readonly ok?: boolean;
  readonly exitCode?: number | null;
  readonly stdout?: Buffer | string;
  readonly stderr?: string;
  readonly timedOut?: boolean;
  readonly error?: string;
}

export type FakeHandler = (
  args: readonly string[],
  options: ExecuteOptions,
) => FakeResponse | Promise<FakeResponse>;

export type FakeMatcher = string | ((args: readonly string[]) => boolean);

export interface FakeCall {
  readonly args: readonly string[];
  readonly command: string;
  readonly timeoutMs: number;
}

interface Rule {
  readonly matches: (args: readonly string[]) => boolean;
  readonly handler: FakeHandler;
  remaining: number;
}

function toResult(response: FakeResponse): CommandResult {
  const exitCode = response.exitCode === undefined ? 0 : response.exitCode;
  const stdout =
    response.stdout === undefined
      ? Buffer.alloc(0)
      : typeof response.stdout === "string"
        ? Buffer.from(response.stdout)
        : response.stdout;
  return {
    ok: response.ok ?? exitCode === 0,
    exitCode,
    stdout,
    stderr: response.stderr ?? "",
    timedOut: response.timedOut ?? false,
    ...(response.error !== undefined ? { error: response.error } : {}),
  };
}

export class FakeTransport implements DeviceTransport {
  readonly calls: FakeCall[] = [];
  private readonly rules: Rule[] = [];

  /**
   * Register a response. `times` limits how often the rule applies;
   * afterwards later rules (or the default) take over.
   */
  on(matcher: FakeMatcher, response: FakeResponse | FakeHandler, times = Number.POSITIVE_INFINITY): this {
    const matches =
      typeof matcher === "string"
        ? (args: readonly string[]) => args.join(" ").startsWith(matcher)
        : matcher;
    const handler: FakeHandler = typeof response === "function" ? response : () => response;
    this.rules.push({ matches, handler, remaining: times });
    return this;
  }

  async execute(args: readonly string[], options: ExecuteOptions): Promise<CommandResult> {
    this.calls.push({ args: [...args], command: args.join(" "), timeoutMs: options.timeoutMs });

    const rule = this.rules.find((r) => r.remaining > 0 && r.matches(args));
    if (rule === undefined) return toResult({});
    rule.remaining--;
    return toResult(await rule.handler(args, options));
  }

  /** Recorded commands, space-joined. */
  commands(): string[] {
    return this.calls.map((call) => call.command);
  }

  /** Recorded commands that start with `prefix`. */
  commandsMatching(prefix: string): string[] {
    return this.commands().filter((command) => command.startsWith(prefix));
  }

  reset(): void {
    this.calls.length = 0;
    this.rules.length = 0;
  }
}

/**
 * Handler that never settles on its own: it resolves as an aborted command
 * once the caller's signal fires.
 */
export function hangUntilAborted(): FakeHandler {
  return (_args, options) =>
    new Promise<FakeResponse>((resolve) => {
      const finish = (): void => resolve({ ok: false, exitCode: null, error: "aborted" });
      if (options.signal?.aborted) {
        finish();
        return;
      }
      options.signal?.addEventListener("abort", finish, { once: true });
    });
}
