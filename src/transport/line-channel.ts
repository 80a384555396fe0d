import { StringDecoder } from 'node:string_decoder';

import { TransportError } from '../errors.js';
import { ChunkQueue } from './chunk-queue.js';
import type { ExitStatus, OutputLine, OutputStream, RemoteChannel } from './types.js';

export interface LineChannelHandlers {
  write?: (data: string | Buffer) => Promise<void>;
  endInput?: () => void;
  /** Called once when the consumer closes the channel locally. */
  close?: () => void;
}

type ExitState =
  | { state: 'pending' }
  | { state: 'exited'; status: ExitStatus }
  | { state: 'failed'; error: Error };

class LineSplitter {
  private readonly decoder = new StringDecoder('utf8');
  private pending = '';

  feed(chunk: string | Buffer): string[] {
    this.pending += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    const parts = this.pending.split('\n');
    this.pending = parts.pop() ?? '';
    return parts.map(stripCarriageReturn);
  }

  flush(): string[] {
    const rest = this.pending + this.decoder.end();
    this.pending = '';
    return rest ? [stripCarriageReturn(rest)] : [];
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * RemoteChannel over raw byte chunks. Transport implementations feed it
 * stdout/stderr data as it arrives and settle it once the remote side closes.
 */
export class LineChannel implements RemoteChannel {
  private readonly queue = new ChunkQueue<OutputLine>();
  private readonly splitters: Record<OutputStream, LineSplitter> = {
    stdout: new LineSplitter(),
    stderr: new LineSplitter(),
  };
  private exit: ExitState = { state: 'pending' };
  private readonly exitWaiters: Array<{ resolve: (status: ExitStatus) => void; reject: (error: Error) => void }> =
    [];
  private closed = false;

  constructor(private readonly handlers: LineChannelHandlers = {}) {}

  get isClosed(): boolean {
    return this.closed || this.exit.state !== 'pending';
  }

  push(stream: OutputStream, chunk: string | Buffer): void {
    if (this.isClosed) {
      return;
    }
    for (const text of this.splitters[stream].feed(chunk)) {
      this.queue.push({ type: stream, text, receivedAt: new Date() });
    }
  }

  /** Remote side closed normally. Partial trailing lines are delivered first. */
  finish(status: ExitStatus): void {
    if (this.exit.state !== 'pending') {
      return;
    }
    this.flushPartialLines();
    this.settle({ state: 'exited', status });
    this.queue.close();
  }

  /** Channel broke. Lines already queued are still delivered before the error. */
  fail(error: Error): void {
    if (this.exit.state !== 'pending') {
      return;
    }
    this.flushPartialLines();
    this.settle({ state: 'failed', error });
    this.queue.fail(error);
  }

  lines(): AsyncIterableIterator<OutputLine> {
    return this.queue;
  }

  write(data: string | Buffer): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new TransportError('Cannot write to a closed channel'));
    }
    if (!this.handlers.write) {
      return Promise.reject(new TransportError('Channel does not accept input'));
    }
    return this.handlers.write(data);
  }

  endInput(): void {
    if (!this.isClosed) {
      this.handlers.endInput?.();
    }
  }

  exitStatus(): Promise<ExitStatus> {
    switch (this.exit.state) {
      case 'exited':
        return Promise.resolve(this.exit.status);
      case 'failed':
        return Promise.reject(this.exit.error);
      default:
        return new Promise((resolve, reject) => {
          this.exitWaiters.push({ resolve, reject });
        });
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    const wasPending = this.exit.state === 'pending';
    this.closed = true;
    if (wasPending) {
      this.handlers.close?.();
      this.settle({ state: 'exited', status: { exitCode: null, signal: null } });
      this.queue.close();
    }
  }

  private flushPartialLines(): void {
    for (const stream of ['stdout', 'stderr'] as const) {
      for (const text of this.splitters[stream].flush()) {
        this.queue.push({ type: stream, text, receivedAt: new Date() });
      }
    }
  }

  private settle(exit: Exclude<ExitState, { state: 'pending' }>): void {
    this.exit = exit;
    for (const waiter of this.exitWaiters.splice(0)) {
      if (exit.state === 'exited') {
        waiter.resolve(exit.status);
      } else {
        waiter.reject(exit.error);
      }
    }
  }
}
