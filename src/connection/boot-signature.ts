import type { RebootDetectionOptions } from '../config/types.js';
import { BootSignatureUnavailableError } from '../errors.js';
import type { TransportSession } from '../transport/types.js';
import { runProbe } from './probe.js';
import { monotonicNow, type MonotonicClock } from './timers.js';
import type { BootSignature } from './types.js';

/** Prints `boot_id=<id>` and `uptime=<seconds>`; either value is empty when unavailable. */
export const BOOT_PROBE_COMMAND = [
  `printf 'boot_id=%s\\n' "$(cat /proc/sys/kernel/random/boot_id 2>/dev/null)"`,
  `printf 'uptime=%s\\n' "$(cut -d' ' -f1 /proc/uptime 2>/dev/null)"`,
].join('; ');

export function parseBootProbeOutput(lines: readonly string[]): { bootId: string | null; uptimeSeconds: number | null } {
  let bootId: string | null = null;
  let uptimeSeconds: number | null = null;

  for (const line of lines) {
    const separator = line.indexOf('=');
    if (separator < 0) {
      continue;
    }
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    if (!value) {
      continue;
    }
    if (key === 'boot_id') {
      bootId = value;
    } else if (key === 'uptime') {
      const parsed = Number.parseFloat(value);
      uptimeSeconds = Number.isFinite(parsed) ? parsed : null;
    }
  }

  return { bootId, uptimeSeconds };
}

/**
 * Reads the host's boot identity over `session`. Bounded by
 * `options.probeTimeoutMs`; a slow or broken probe is a TransportError.
 */
export async function captureBootSignature(
  session: TransportSession,
  options: Pick<RebootDetectionOptions, 'strategy' | 'probeTimeoutMs'>,
  clock: MonotonicClock = monotonicNow,
): Promise<BootSignature> {
  const lines = await runProbe(session, BOOT_PROBE_COMMAND, options.probeTimeoutMs);
  const { bootId, uptimeSeconds } = parseBootProbeOutput(lines);

  return {
    token: options.strategy === 'uptime' ? null : bootId,
    uptimeSeconds: options.strategy === 'boot-id' ? null : uptimeSeconds,
    observedAt: new Date(),
    monotonicMs: clock(),
  };
}

/**
 * Boot ids decide when both samples carry one. Otherwise the host rebooted if
 * its uptime is below what the previous sample plus the locally elapsed time
 * predicts. Only the local monotonic clock is used, so remote clock skew
 * does not matter.
 *
 * @throws BootSignatureUnavailableError when the samples share no comparable value.
 */
export function hasRebooted(
  previous: BootSignature,
  current: BootSignature,
  options: Pick<RebootDetectionOptions, 'uptimeToleranceMs'> = { uptimeToleranceMs: 2_000 },
): boolean {
  if (previous.token !== null && current.token !== null) {
    return previous.token !== current.token;
  }

  if (previous.uptimeSeconds !== null && current.uptimeSeconds !== null) {
    const elapsedSeconds = Math.max(current.monotonicMs - previous.monotonicMs, 0) / 1000;
    const expectedUptime = previous.uptimeSeconds + elapsedSeconds;
    return current.uptimeSeconds + options.uptimeToleranceMs / 1000 < expectedUptime;
  }

  throw new BootSignatureUnavailableError(
    'Cannot classify reconnect: the host reported neither a comparable boot id nor uptime',
  );
}
