import { CommandTimeoutError, TransportError, toError } from '../errors.js';
import { createInvocation, type CommandHookArgs, type ExecutionHookManager } from '../hooks/index.js';
import type { TelemetryLogger } from '../logging/index.js';
import type { OutputLine, RemoteChannel, TransportSession } from '../transport/types.js';
import { withTimeout, withTimeoutReleasing } from './timers.js';
import type { Command, CommandEvent, CommandExitEvent, CommandStream, SessionMonitor } from './types.js';

export interface CommandExecutorOptions {
  hostAlias: string;
  monitor: SessionMonitor;
  hooks: ExecutionHookManager;
  telemetry: TelemetryLogger;
  workingDirectory?: string;
}

export interface CollectedCommand {
  lines: OutputLine[];
  exit: CommandExitEvent;
}

function applyCwd(command: string, cwd: string | undefined): string {
  if (!cwd) {
    return command;
  }

  const escapedCwd = cwd.replace(/'/g, "'\\''");
  return `cd '${escapedCwd}' && ${command}`;
}

/** Drains a command stream, optionally observing each line as it arrives. */
export async function collectCommand(
  stream: AsyncIterable<CommandEvent>,
  onLine?: (line: OutputLine) => void | Promise<void>,
): Promise<CollectedCommand> {
  const lines: OutputLine[] = [];
  for await (const event of stream) {
    if (event.type === 'exit') {
      return { lines, exit: event };
    }
    lines.push(event);
    await onLine?.(event);
  }
  throw new TransportError('Command stream ended without an exit status');
}

/**
 * Runs one command per call on a given session and yields its output lines
 * as soon as they arrive, finishing with an `exit` event. The timeout is an
 * inactivity bound: it restarts after every line.
 */
export class CommandExecutor {
  constructor(private readonly options: CommandExecutorOptions) {}

  async *run(session: TransportSession, command: Command): CommandStream {
    const { hooks, monitor, telemetry } = this.options;
    const invocation = createInvocation();
    const hookArgs: CommandHookArgs = {
      context: { hostAlias: this.options.hostAlias, command: command.text, timeoutMs: command.timeoutMs },
      invocation,
    };
    const { context } = hookArgs;
    const timedOut = () => new CommandTimeoutError(command.text, command.timeoutMs);
    let channel: RemoteChannel | null = null;

    await hooks.runBefore(hookArgs);
    telemetry.logCommandStart(context, invocation.invocationId);

    try {
      channel = await withTimeoutReleasing(
        session.exec(applyCwd(command.text, this.options.workingDirectory)),
        command.timeoutMs,
        timedOut,
        (late) => late.close(),
      );

      if (command.input !== undefined) {
        await channel.write(command.input);
        channel.endInput();
      }

      const lines = channel.lines();
      let lineCount = 0;
      while (true) {
        const next = await withTimeout(lines.next(), command.timeoutMs, timedOut);
        if (next.done) {
          break;
        }
        lineCount += 1;
        monitor.recordActivity(session);
        telemetry.logCommandLine(context, invocation.invocationId, next.value);
        await hooks.runLine(hookArgs, next.value);
        yield next.value;
      }

      const status = await channel.exitStatus();
      monitor.recordActivity(session);
      const result: CommandExitEvent = {
        type: 'exit',
        exitCode: status.exitCode,
        signal: status.signal,
        durationMs: Date.now() - invocation.startedAt.getTime(),
        lineCount,
      };
      await hooks.runAfter(hookArgs, result);
      telemetry.logCommandResult(context, invocation.invocationId, result);
      yield result;
    } catch (err) {
      const error = toError(err);
      if (error instanceof CommandTimeoutError) {
        monitor.reportSuspect(session);
      } else if (error instanceof TransportError) {
        monitor.reportFailure(session, error);
      }
      telemetry.logCommandError(context, invocation.invocationId, error, invocation.startedAt);
      for (const failure of await hooks.runError(hookArgs, error)) {
        telemetry.logHookFailure(context, invocation.invocationId, 'onCommandError', toError(failure));
      }
      throw error;
    } finally {
      channel?.close();
    }
  }
}
