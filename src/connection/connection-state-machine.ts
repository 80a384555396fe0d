import { isDeepStrictEqual } from 'node:util';

import type { HostConfig } from '../config/types.js';
import { MaxRetriesExceededError, NotConnectedError, RebootTimeoutError } from '../errors.js';
import { ExecutionHookManager } from '../hooks/index.js';
import type { TelemetryLogger } from '../logging/index.js';
import type { TransportFactory } from '../transport/types.js';
import { CommandExecutor } from './command-executor.js';
import { ReconnectSupervisor } from './reconnect-supervisor.js';
import type { MonotonicClock, Sleep } from './timers.js';
import type {
  BootSignature,
  CommandStream,
  ConnectionStatus,
  RebootEvent,
  StatusTransition,
} from './types.js';

export interface ConnectionStateMachineOptions {
  transport: TransportFactory;
  telemetry: TelemetryLogger;
  hooks?: ExecutionHookManager;
  sleep?: Sleep;
  random?: () => number;
  clock?: MonotonicClock;
}

export interface RunCommandOptions {
  /** Inactivity timeout; defaults to the host's `connection.commandTimeoutMs`. */
  timeoutMs?: number;
  input?: string;
}

export interface ConnectionSnapshot {
  status: ConnectionStatus;
  hostAlias: string | null;
  bootSignature: BootSignature | null;
  lastError: string | null;
  history: StatusTransition[];
}

interface Connection {
  host: HostConfig;
  supervisor: ReconnectSupervisor;
  executor: CommandExecutor;
}

function sameTarget(a: HostConfig, b: HostConfig): boolean {
  return a.alias === b.alias && a.host === b.host && a.port === b.port && a.username === b.username;
}

function isIdle(status: ConnectionStatus): boolean {
  return status === 'failed' || status === 'disconnected';
}

/**
 * Caller-facing handle on one logical connection to one host. Commands run
 * only while Connected; recovery from transport loss happens underneath.
 */
export class ConnectionStateMachine {
  private connection: Connection | null = null;
  private readonly rebootWaiters = new Set<(error: Error) => void>();
  private readonly hooks: ExecutionHookManager;

  constructor(private readonly options: ConnectionStateMachineOptions) {
    this.hooks = options.hooks ?? new ExecutionHookManager();
  }

  /**
   * Resolves once Connected. Rejects with AuthenticationError or
   * MaxRetriesExceededError, leaving the status at `failed`.
   *
   * A changed credential or policy for the same target replaces the
   * connection only while nothing is running on it; a connected or
   * recovering connection keeps the configuration it started with.
   */
  async connect(host: HostConfig): Promise<void> {
    const current = this.connection;
    if (current && !sameTarget(current.host, host)) {
      this.disconnect();
    } else if (current && !isDeepStrictEqual(current.host, host) && isIdle(this.status())) {
      this.disconnect();
    }
    const connection = this.connection ?? this.createConnection(host);
    await connection.supervisor.start();
  }

  /**
   * Streams the command's output from the current session.
   *
   * @throws NotConnectedError immediately unless the status is `connected`.
   */
  runCommand(text: string, options: RunCommandOptions = {}): CommandStream {
    const connection = this.connection;
    const status = this.status();
    const session = connection?.supervisor.session;
    if (!connection || status !== 'connected' || !session || !session.isOpen()) {
      throw new NotConnectedError(status);
    }

    return connection.executor.run(session, {
      text,
      timeoutMs: options.timeoutMs ?? connection.host.connection.commandTimeoutMs,
      input: options.input,
    });
  }

  /**
   * Resolves on the next Rebooting -> Connected transition. The deadline only
   * abandons this wait; reconnect attempts carry on.
   */
  waitForReboot(deadlineMs: number): Promise<RebootEvent> {
    const connection = this.connection;
    if (!connection) {
      return Promise.reject(new NotConnectedError('disconnected', 'No connection to wait on'));
    }
    const { supervisor, host } = connection;

    return new Promise<RebootEvent>((resolve, reject) => {
      const cleanups: Array<() => void> = [];
      const settle = (outcome: () => void) => {
        for (const cleanup of cleanups) {
          cleanup();
        }
        outcome();
      };

      const timer = setTimeout(() => settle(() => reject(new RebootTimeoutError(host.alias, deadlineMs))), deadlineMs);
      cleanups.push(() => clearTimeout(timer));

      cleanups.push(
        supervisor.onReboot((notice) => {
          if (notice.type === 'rebooted') {
            settle(() => resolve(notice));
          } else {
            settle(() => reject(notice.error));
          }
        }),
      );

      cleanups.push(
        supervisor.onStatusChange((transition) => {
          if (transition.to === 'failed') {
            const error = supervisor.lastFailure ?? new MaxRetriesExceededError(host.alias, 0);
            settle(() => reject(error));
          }
        }),
      );

      const onDisconnect = (error: Error) => settle(() => reject(error));
      this.rebootWaiters.add(onDisconnect);
      cleanups.push(() => this.rebootWaiters.delete(onDisconnect));
    });
  }

  /** Closes the session and forgets the connection. Always succeeds. */
  disconnect(): void {
    const connection = this.connection;
    this.connection = null;
    connection?.supervisor.shutdown();

    for (const reject of [...this.rebootWaiters]) {
      reject(new NotConnectedError('disconnected', 'Connection was closed while waiting for a reboot'));
    }
  }

  status(): ConnectionStatus {
    return this.connection?.supervisor.status ?? 'disconnected';
  }

  snapshot(): ConnectionSnapshot {
    const supervisor = this.connection?.supervisor;
    return {
      status: this.status(),
      hostAlias: this.connection?.host.alias ?? null,
      bootSignature: supervisor?.bootSignature ?? null,
      lastError: supervisor?.lastFailure?.message ?? null,
      history: supervisor ? [...supervisor.history] : [],
    };
  }

  private createConnection(host: HostConfig): Connection {
    const supervisor = new ReconnectSupervisor({
      host,
      transport: this.options.transport,
      telemetry: this.options.telemetry,
      sleep: this.options.sleep,
      random: this.options.random,
      clock: this.options.clock,
    });
    const executor = new CommandExecutor({
      hostAlias: host.alias,
      monitor: supervisor,
      hooks: this.hooks,
      telemetry: this.options.telemetry,
      workingDirectory: host.workingDirectory,
    });
    this.connection = { host, supervisor, executor };
    return this.connection;
  }
}
