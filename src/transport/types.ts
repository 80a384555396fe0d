import type { HostConfig } from '../config/types.js';

export type OutputStream = 'stdout' | 'stderr';

export interface OutputLine {
  type: OutputStream;
  text: string;
  receivedAt: Date;
}

export interface ExitStatus {
  exitCode: number | null;
  signal: string | null;
}

/** One remote process running over a TransportSession. */
export interface RemoteChannel {
  /** Output lines in arrival order; ends on channel EOF or close. Single consumer. */
  lines(): AsyncIterableIterator<OutputLine>;
  write(data: string | Buffer): Promise<void>;
  /** Signals EOF on the remote process' stdin. */
  endInput(): void;
  /** Settles once the channel has closed. */
  exitStatus(): Promise<ExitStatus>;
  /** Idempotent. */
  close(): void;
  readonly isClosed: boolean;
}

export interface TransportSession {
  exec(command: string): Promise<RemoteChannel>;
  /** Non-blocking liveness check backed by channel keepalives. */
  isAlive(): boolean;
  isOpen(): boolean;
  /** Idempotent; fails every channel still open on this session. */
  close(): void;
}

export interface TransportFactory {
  /** Rejects with AuthenticationError or TransportError. */
  open(host: HostConfig): Promise<TransportSession>;
}
