import { describe, expect, it, vi } from 'vitest';

import {
  captureBootSignature,
  hasRebooted,
  parseBootProbeOutput,
} from '../src/connection/boot-signature.js';
import { runProbe } from '../src/connection/probe.js';
import type { BootSignature } from '../src/connection/types.js';
import { BootSignatureUnavailableError, TransportError } from '../src/errors.js';
import { FakeHost } from './support/fake-host.js';

function signature(overrides: Partial<BootSignature>): BootSignature {
  return {
    token: null,
    uptimeSeconds: null,
    observedAt: new Date(0),
    monotonicMs: 0,
    ...overrides,
  };
}

describe('parseBootProbeOutput', () => {
  it('reads boot id and uptime', () => {
    expect(parseBootProbeOutput(['boot_id=3f1c-aa', 'uptime=5321.07'])).toEqual({
      bootId: '3f1c-aa',
      uptimeSeconds: 5321.07,
    });
  });

  it('treats empty values as unavailable', () => {
    expect(parseBootProbeOutput(['boot_id=', 'uptime='])).toEqual({ bootId: null, uptimeSeconds: null });
  });

  it('ignores unrelated lines and unparseable uptime', () => {
    expect(parseBootProbeOutput(['motd: welcome', 'uptime=soon', 'boot_id=b-1'])).toEqual({
      bootId: 'b-1',
      uptimeSeconds: null,
    });
  });
});

describe('hasRebooted', () => {
  it('compares boot ids when both are known', () => {
    expect(hasRebooted(signature({ token: 'boot-123' }), signature({ token: 'boot-456' }))).toBe(true);
    expect(
      hasRebooted(signature({ token: 'boot-123', uptimeSeconds: 100 }), signature({ token: 'boot-123', uptimeSeconds: 5 })),
    ).toBe(false);
  });

  it('falls back to uptime against local elapsed time', () => {
    const previous = signature({ uptimeSeconds: 100, monotonicMs: 0 });

    expect(hasRebooted(previous, signature({ uptimeSeconds: 160, monotonicMs: 60_000 }))).toBe(false);
    expect(hasRebooted(previous, signature({ uptimeSeconds: 12, monotonicMs: 60_000 }))).toBe(true);
  });

  it('tolerates small uptime drift', () => {
    const previous = signature({ uptimeSeconds: 100, monotonicMs: 0 });
    const current = signature({ uptimeSeconds: 158.5, monotonicMs: 60_000 });

    expect(hasRebooted(previous, current, { uptimeToleranceMs: 2_000 })).toBe(false);
    expect(hasRebooted(previous, current, { uptimeToleranceMs: 1_000 })).toBe(true);
  });

  it('cannot classify samples with nothing in common', () => {
    expect(() => hasRebooted(signature({ token: 'boot-123' }), signature({ uptimeSeconds: 40 }))).toThrow(
      BootSignatureUnavailableError,
    );
  });
});

describe('captureBootSignature', () => {
  it('samples the host over an open session', async () => {
    const host = new FakeHost();
    const session = await host.open();

    const captured = await captureBootSignature(session, { strategy: 'auto', probeTimeoutMs: 200 }, () => 42);

    expect(captured).toMatchObject({ token: 'boot-123', uptimeSeconds: 1_000, monotonicMs: 42 });
  });

  it('keeps only what the strategy compares', async () => {
    const host = new FakeHost();
    const session = await host.open();

    const byUptime = await captureBootSignature(session, { strategy: 'uptime', probeTimeoutMs: 200 });
    const byBootId = await captureBootSignature(session, { strategy: 'boot-id', probeTimeoutMs: 200 });

    expect(byUptime).toMatchObject({ token: null, uptimeSeconds: 1_000 });
    expect(byBootId).toMatchObject({ token: 'boot-123', uptimeSeconds: null });
  });

  it('fails as a transport error when the probe stalls', async () => {
    const host = new FakeHost();
    host.bootProbeHangs = true;
    const session = await host.open();

    await expect(captureBootSignature(session, { strategy: 'auto', probeTimeoutMs: 30 })).rejects.toBeInstanceOf(
      TransportError,
    );
  });
});

describe('runProbe', () => {
  it('treats a non-zero exit as a transport error', async () => {
    const host = new FakeHost();
    host.script('test -d /data', { exitCode: 1 });
    const session = await host.open();

    await expect(runProbe(session, 'test -d /data', 200)).rejects.toThrow("Probe 'test -d /data' exited with 1");
  });

  it('closes a channel that opens after the deadline', async () => {
    const host = new FakeHost();
    host.script('cat /proc/loadavg', { execDelayMs: 60, hang: true });
    const session = await host.open();

    await expect(runProbe(session, 'cat /proc/loadavg', 20)).rejects.toThrow(
      "Probe 'cat /proc/loadavg' did not complete within 20ms",
    );

    await vi.waitFor(() => expect(host.current.opened[0]?.isClosed).toBe(true));
  });
});
