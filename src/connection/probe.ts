import { TransportError, toTransportError } from '../errors.js';
import type { RemoteChannel, TransportSession } from '../transport/types.js';
import { withTimeout, withTimeoutReleasing } from './timers.js';

/** Trivial command a healthy host always accepts. */
export const READINESS_PROBE_COMMAND = 'true';

async function drainStdout(channel: RemoteChannel, command: string): Promise<string[]> {
  const output: string[] = [];
  for await (const line of channel.lines()) {
    if (line.type === 'stdout') {
      output.push(line.text);
    }
  }

  const exit = await channel.exitStatus();
  if (exit.exitCode !== 0) {
    throw new TransportError(`Probe '${command}' exited with ${exit.exitCode ?? exit.signal ?? 'no status'}`);
  }
  return output;
}

/**
 * Runs a short read-only command and returns its stdout lines. Any failure,
 * including not finishing within `timeoutMs`, is a TransportError.
 */
export async function runProbe(
  session: TransportSession,
  command: string,
  timeoutMs: number,
): Promise<string[]> {
  const deadline = Date.now() + timeoutMs;
  const timedOut = () => new TransportError(`Probe '${command}' did not complete within ${timeoutMs}ms`);

  try {
    const channel = await withTimeoutReleasing(session.exec(command), timeoutMs, timedOut, (late) =>
      late.close(),
    );
    try {
      return await withTimeout(drainStdout(channel, command), Math.max(deadline - Date.now(), 0), timedOut);
    } finally {
      channel.close();
    }
  } catch (err) {
    throw toTransportError(err, `probe '${command}'`);
  }
}
