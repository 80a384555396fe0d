import type { OutputLine, TransportSession } from '../transport/types.js';

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected' | 'rebooting' | 'failed';

export interface StatusTransition {
  from: ConnectionStatus;
  to: ConnectionStatus;
  reason: string;
  at: Date;
}

export interface BootSignature {
  /** Kernel boot id, when the host exposes one. */
  token: string | null;
  /** Remote uptime in seconds at the moment of capture. */
  uptimeSeconds: number | null;
  observedAt: Date;
  /** Local monotonic clock reading taken with the sample; only differences are meaningful. */
  monotonicMs: number;
}

export interface Command {
  text: string;
  timeoutMs: number;
  /** Written to the remote process' stdin, which is then closed. */
  input?: string;
}

export interface CommandExitEvent {
  type: 'exit';
  exitCode: number | null;
  signal: string | null;
  durationMs: number;
  lineCount: number;
}

export type CommandEvent = OutputLine | CommandExitEvent;

export type CommandStream = AsyncGenerator<CommandEvent, void, undefined>;

/**
 * What the command executor tells the supervisor about the session it ran on.
 * Reports about a session that is no longer current are ignored.
 */
export interface SessionMonitor {
  recordActivity(session: TransportSession): void;
  reportFailure(session: TransportSession, error: Error): void;
  reportSuspect(session: TransportSession): void;
}

export type RebootNotice =
  | { type: 'rebooted'; previous: BootSignature; current: BootSignature; at: Date }
  | { type: 'unclassified'; error: Error; at: Date };

export type RebootEvent = Extract<RebootNotice, { type: 'rebooted' }>;

export type StatusListener = (transition: StatusTransition) => void;
export type RebootListener = (notice: RebootNotice) => void;
