import type { HostConfig } from '../config/types.js';
import {
  AuthenticationError,
  BootSignatureUnavailableError,
  MaxRetriesExceededError,
  NotConnectedError,
  TransportError,
  toError,
  toTransportError,
} from '../errors.js';
import type { TelemetryLogger } from '../logging/index.js';
import type { TransportFactory, TransportSession } from '../transport/types.js';
import { BackoffSchedule } from './backoff.js';
import { captureBootSignature, hasRebooted } from './boot-signature.js';
import { READINESS_PROBE_COMMAND, runProbe } from './probe.js';
import { monotonicNow, sleep as defaultSleep, type MonotonicClock, type Sleep } from './timers.js';
import type {
  BootSignature,
  ConnectionStatus,
  RebootListener,
  RebootNotice,
  SessionMonitor,
  StatusListener,
  StatusTransition,
} from './types.js';

const ALLOWED_TRANSITIONS: Record<ConnectionStatus, readonly ConnectionStatus[]> = {
  disconnected: ['connecting'],
  connecting: ['connected', 'rebooting', 'failed', 'disconnected'],
  rebooting: ['connected', 'connecting', 'disconnected'],
  connected: ['disconnected'],
  failed: ['disconnected'],
};

const HISTORY_LIMIT = 200;

type Verdict = 'first-contact' | 'same-boot' | 'rebooted' | 'unclassified';

export interface ReconnectSupervisorOptions {
  host: HostConfig;
  transport: TransportFactory;
  telemetry: TelemetryLogger;
  sleep?: Sleep;
  random?: () => number;
  clock?: MonotonicClock;
}

/**
 * Owns the status and the current session of one Connection. It is the only
 * writer of either: it opens sessions, watches them, and drives the retry
 * loop when they fail. At most one connect/recover run is active at a time.
 */
export class ReconnectSupervisor implements SessionMonitor {
  private readonly host: HostConfig;
  private readonly transport: TransportFactory;
  private readonly telemetry: TelemetryLogger;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly clock: MonotonicClock;

  private currentStatus: ConnectionStatus = 'disconnected';
  private currentSession: TransportSession | null = null;
  private signature: BootSignature | null = null;
  private lastError: Error | null = null;
  private lastActivityMs = 0;
  private readonly transitions: StatusTransition[] = [];

  private task: Promise<void> | null = null;
  private abortController: AbortController | null = null;
  private monitorTimer: NodeJS.Timeout | null = null;
  private probing = false;

  private readonly statusListeners = new Set<StatusListener>();
  private readonly rebootListeners = new Set<RebootListener>();

  constructor(options: ReconnectSupervisorOptions) {
    this.host = options.host;
    this.transport = options.transport;
    this.telemetry = options.telemetry;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? monotonicNow;
  }

  get status(): ConnectionStatus {
    return this.currentStatus;
  }

  get session(): TransportSession | null {
    return this.currentSession;
  }

  get bootSignature(): BootSignature | null {
    return this.signature;
  }

  get lastFailure(): Error | null {
    return this.lastError;
  }

  get history(): readonly StatusTransition[] {
    return this.transitions;
  }

  onStatusChange(listener: StatusListener): () => void {
    this.statusListeners.add(listener);
    return () => this.statusListeners.delete(listener);
  }

  onReboot(listener: RebootListener): () => void {
    this.rebootListeners.add(listener);
    return () => this.rebootListeners.delete(listener);
  }

  /**
   * Resolves once Connected. Joins a run already in progress; a Failed
   * connection is reset to Disconnected first.
   */
  start(): Promise<void> {
    if (this.task) {
      return this.task;
    }
    if (this.currentStatus === 'connected') {
      return Promise.resolve();
    }
    if (this.currentStatus === 'failed') {
      this.transition('disconnected', 'reset by connect');
    }
    return this.launch('connect requested');
  }

  /** Closes the session and cancels any run in progress. Idempotent. */
  shutdown(reason = 'disconnect requested'): void {
    this.abortController?.abort();
    this.abortController = null;
    this.task = null;
    this.stopMonitor();
    this.dropSession();
    if (this.currentStatus !== 'disconnected') {
      this.transition('disconnected', reason);
    }
  }

  recordActivity(session: TransportSession): void {
    if (session === this.currentSession) {
      this.lastActivityMs = this.clock();
    }
  }

  reportFailure(session: TransportSession, error: Error): void {
    if (session !== this.currentSession || this.currentStatus !== 'connected') {
      return;
    }

    this.telemetry.logTransportFailure(this.host.alias, this.currentStatus, error);
    this.lastError = error;
    this.stopMonitor();
    this.dropSession();
    this.transition('disconnected', error.message);

    void this.launch('recovering from transport failure').catch((err: unknown) => {
      this.telemetry.logRecoveryEnded(this.host.alias, toError(err));
    });
  }

  reportSuspect(session: TransportSession): void {
    if (session === this.currentSession && this.currentStatus === 'connected') {
      void this.probe(session, 'suspect session');
    }
  }

  private launch(reason: string): Promise<void> {
    const controller = new AbortController();
    this.abortController = controller;
    this.transition('connecting', reason);

    const task: Promise<void> = this.establish(controller.signal).finally(() => {
      if (this.task === task) {
        this.task = null;
      }
      if (this.abortController === controller) {
        this.abortController = null;
      }
    });
    this.task = task;
    return task;
  }

  private async establish(signal: AbortSignal): Promise<void> {
    const { alias } = this.host;
    const policy = this.host.reconnect;
    const backoff = new BackoffSchedule(policy, this.random);
    const startedAt = this.clock();

    for (let attempt = 1; ; attempt += 1) {
      this.telemetry.logConnectAttempt(alias, attempt, policy.maxAttempts);

      const failure = await this.attempt(signal).then(
        () => null,
        (err: unknown) => toError(err),
      );
      if (!failure) {
        return;
      }
      if (signal.aborted) {
        throw new NotConnectedError('disconnected', `Connection to ${alias} was closed while connecting`);
      }

      if (this.currentStatus === 'rebooting') {
        this.transition('connecting', 'host not ready after reboot');
      }
      if (failure instanceof AuthenticationError) {
        throw this.fail(failure);
      }

      const waitMs = backoff.next();
      const retriesExhausted = policy.maxAttempts !== 'unbounded' && attempt > policy.maxAttempts;
      const pastDeadline =
        policy.deadlineMs !== undefined && this.clock() - startedAt + waitMs > policy.deadlineMs;
      if (retriesExhausted || pastDeadline) {
        throw this.fail(new MaxRetriesExceededError(alias, attempt, { cause: failure }));
      }

      this.lastError = failure;
      this.telemetry.logAttemptFailed(alias, attempt, failure, waitMs);
      await this.sleep(waitMs, signal);
      if (signal.aborted) {
        throw new NotConnectedError('disconnected', `Connection to ${alias} was closed while connecting`);
      }
    }
  }

  private async attempt(signal: AbortSignal): Promise<void> {
    const session = await this.transport.open(this.host);
    const throwIfCancelled = () => {
      if (signal.aborted) {
        throw new TransportError('connection attempt cancelled');
      }
    };
    try {
      throwIfCancelled();
      const current = await captureBootSignature(session, this.host.reboot, this.clock);
      throwIfCancelled();
      const previous = this.signature;
      const verdict = this.classify(previous, current);
      this.telemetry.logBootSignature(this.host.alias, current, verdict);

      if (verdict === 'rebooted') {
        this.transition('rebooting', 'boot signature changed');
        await runProbe(session, READINESS_PROBE_COMMAND, this.host.reboot.probeTimeoutMs);
        throwIfCancelled();
      }

      this.install(session, current, verdict);

      if (verdict === 'rebooted' && previous) {
        this.telemetry.logReboot(this.host.alias, previous, current);
        this.notifyReboot({ type: 'rebooted', previous, current, at: new Date() });
      } else if (verdict === 'unclassified') {
        const error = new BootSignatureUnavailableError(
          `Reconnected to ${this.host.alias} but could not tell whether it rebooted`,
        );
        this.telemetry.logRebootUnclassified(this.host.alias, error);
        this.notifyReboot({ type: 'unclassified', error, at: new Date() });
      }
    } catch (err) {
      session.close();
      throw err;
    }
  }

  private classify(previous: BootSignature | null, current: BootSignature): Verdict {
    if (!previous) {
      return 'first-contact';
    }
    try {
      return hasRebooted(previous, current, this.host.reboot) ? 'rebooted' : 'same-boot';
    } catch (err) {
      if (!(err instanceof BootSignatureUnavailableError)) {
        throw err;
      }
      return this.host.reboot.assumeRebootWhenUnavailable ? 'rebooted' : 'unclassified';
    }
  }

  private install(session: TransportSession, signature: BootSignature, verdict: Verdict): void {
    this.currentSession = session;
    this.signature = signature;
    this.lastError = null;
    this.lastActivityMs = this.clock();
    this.transition('connected', verdict === 'rebooted' ? 'host ready after reboot' : 'session established');
    this.startMonitor();
  }

  private fail(error: Error): Error {
    this.lastError = error;
    this.dropSession();
    this.transition('failed', error.message);
    this.telemetry.logConnectionFailed(this.host.alias, error);
    return error;
  }

  private startMonitor(): void {
    this.stopMonitor();
    this.monitorTimer = setInterval(() => this.checkHealth(), this.host.connection.healthCheckIntervalMs);
    this.monitorTimer.unref();
  }

  private stopMonitor(): void {
    if (this.monitorTimer) {
      clearInterval(this.monitorTimer);
      this.monitorTimer = null;
    }
  }

  private checkHealth(): void {
    const session = this.currentSession;
    if (!session || this.currentStatus !== 'connected') {
      return;
    }
    if (!session.isAlive()) {
      this.reportFailure(session, new TransportError(`Keepalive lost on ${this.host.alias}`));
      return;
    }
    if (this.clock() - this.lastActivityMs >= this.host.connection.idleProbeAfterMs) {
      void this.probe(session, 'idle session');
    }
  }

  private async probe(session: TransportSession, reason: string): Promise<void> {
    if (this.probing) {
      return;
    }
    this.probing = true;
    try {
      await runProbe(session, READINESS_PROBE_COMMAND, this.host.reboot.probeTimeoutMs);
      this.telemetry.logProbe(this.host.alias, reason, true);
      this.recordActivity(session);
    } catch (err) {
      this.telemetry.logProbe(this.host.alias, reason, false);
      this.reportFailure(session, toTransportError(err, `${reason} probe on ${this.host.alias}`));
    } finally {
      this.probing = false;
    }
  }

  private dropSession(): void {
    const session = this.currentSession;
    this.currentSession = null;
    session?.close();
  }

  private transition(to: ConnectionStatus, reason: string): void {
    const from = this.currentStatus;
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid connection status transition ${from} -> ${to}`);
    }

    const transition: StatusTransition = { from, to, reason, at: new Date() };
    this.currentStatus = to;
    this.transitions.push(transition);
    if (this.transitions.length > HISTORY_LIMIT) {
      this.transitions.shift();
    }

    this.telemetry.logStatusChange(this.host.alias, transition);
    for (const listener of [...this.statusListeners]) {
      listener(transition);
    }
  }

  private notifyReboot(notice: RebootNotice): void {
    for (const listener of [...this.rebootListeners]) {
      listener(notice);
    }
  }
}
