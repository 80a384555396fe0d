import pino from 'pino';

import type { CommandHookContext, ExecutionHooks } from '../hooks/index.js';
import type { BootSignature, CommandExitEvent, ConnectionStatus, StatusTransition } from '../connection/types.js';
import type { OutputLine } from '../transport/types.js';

export const LOG_PATH_ENV_VAR = 'VM_SHELL_SESSION_LOG_PATH';

export interface TelemetryLoggerOptions {
  /** File path or file descriptor; defaults to VM_SHELL_SESSION_LOG_PATH, then stderr. */
  destination?: string | number;
  level?: pino.LevelWithSilent;
}

function describeError(error: Error): { errorName: string; errorMessage: string; stack?: string } {
  return { errorName: error.name, errorMessage: error.message, stack: error.stack };
}

function formatAttempts(maxAttempts: number | 'unbounded'): string {
  return maxAttempts === 'unbounded' ? 'unbounded' : String(maxAttempts + 1);
}

export class TelemetryLogger {
  private readonly logger: pino.Logger;

  constructor(options: TelemetryLoggerOptions = {}) {
    // stdout belongs to the MCP stdio transport
    const destination = options.destination ?? process.env[LOG_PATH_ENV_VAR] ?? 2;

    this.logger = pino(
      {
        name: 'vm-shell-session',
        level: options.level ?? 'info',
      },
      pino.destination(destination),
    );
  }

  logStatusChange(hostAlias: string, transition: StatusTransition): void {
    this.logger.info(
      {
        event: 'connection:status',
        hostAlias,
        from: transition.from,
        to: transition.to,
        reason: transition.reason,
      },
      `Connection ${transition.from} -> ${transition.to}`,
    );
  }

  logConnectAttempt(hostAlias: string, attempt: number, maxAttempts: number | 'unbounded'): void {
    this.logger.info(
      { event: 'connection:attempt', hostAlias, attempt, maxAttempts: formatAttempts(maxAttempts) },
      'Opening transport session',
    );
  }

  logAttemptFailed(hostAlias: string, attempt: number, error: Error, retryInMs: number): void {
    this.logger.warn(
      { event: 'connection:attempt-failed', hostAlias, attempt, retryInMs, ...describeError(error) },
      `Connection attempt ${attempt} failed; retrying in ${retryInMs}ms`,
    );
  }

  logConnectionFailed(hostAlias: string, error: Error): void {
    this.logger.error(
      { event: 'connection:failed', hostAlias, ...describeError(error) },
      'Connection failed permanently',
    );
  }

  logRecoveryEnded(hostAlias: string, error: Error): void {
    this.logger.info(
      { event: 'connection:recovery-ended', hostAlias, ...describeError(error) },
      'Background recovery ended without a session',
    );
  }

  logTransportFailure(hostAlias: string, status: ConnectionStatus, error: Error): void {
    this.logger.warn(
      { event: 'connection:transport-failure', hostAlias, status, ...describeError(error) },
      'Transport failure detected',
    );
  }

  logProbe(hostAlias: string, reason: string, healthy: boolean): void {
    this.logger.debug({ event: 'connection:probe', hostAlias, reason, healthy }, 'Session probe finished');
  }

  logBootSignature(hostAlias: string, signature: BootSignature, verdict: string): void {
    this.logger.info(
      {
        event: 'connection:boot-signature',
        hostAlias,
        token: signature.token,
        uptimeSeconds: signature.uptimeSeconds,
        verdict,
      },
      'Captured boot signature',
    );
  }

  logReboot(hostAlias: string, previous: BootSignature, current: BootSignature): void {
    this.logger.info(
      {
        event: 'connection:reboot',
        hostAlias,
        previousToken: previous.token,
        currentToken: current.token,
        previousUptimeSeconds: previous.uptimeSeconds,
        currentUptimeSeconds: current.uptimeSeconds,
      },
      'Host reboot detected',
    );
  }

  logRebootUnclassified(hostAlias: string, error: Error): void {
    this.logger.warn(
      { event: 'connection:reboot', hostAlias, ...describeError(error) },
      'Could not tell whether the host rebooted',
    );
  }

  logCommandStart(context: CommandHookContext, invocationId: string): void {
    this.logger.info(
      {
        event: 'command:start',
        invocationId,
        hostAlias: context.hostAlias,
        command: context.command,
        timeoutMs: context.timeoutMs,
      },
      'Command execution started',
    );
  }

  logCommandLine(context: CommandHookContext, invocationId: string, line: OutputLine): void {
    this.logger.debug(
      { event: 'command:line', invocationId, hostAlias: context.hostAlias, stream: line.type, text: line.text },
      'Command output line',
    );
  }

  logCommandResult(context: CommandHookContext, invocationId: string, result: CommandExitEvent): void {
    this.logger.info(
      {
        event: 'command:result',
        invocationId,
        hostAlias: context.hostAlias,
        command: context.command,
        exitCode: result.exitCode,
        signal: result.signal,
        durationMs: result.durationMs,
        lineCount: result.lineCount,
      },
      'Command execution finished',
    );
  }

  logCommandError(context: CommandHookContext, invocationId: string, error: Error, startedAt: Date): void {
    this.logger.error(
      {
        event: 'command:error',
        invocationId,
        hostAlias: context.hostAlias,
        command: context.command,
        durationMs: Date.now() - startedAt.getTime(),
        ...describeError(error),
      },
      'Command execution failed',
    );
  }

  logHookFailure(
    context: CommandHookContext,
    invocationId: string,
    hook: keyof ExecutionHooks,
    error: Error,
  ): void {
    this.logger.warn(
      {
        event: 'command:hook-failed',
        invocationId,
        hostAlias: context.hostAlias,
        command: context.command,
        hook,
        ...describeError(error),
      },
      'Execution hook failed',
    );
  }
}
