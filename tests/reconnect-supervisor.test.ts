import { beforeEach, describe, expect, it, vi } from 'vitest';

import { ReconnectSupervisor } from '../src/connection/reconnect-supervisor.js';
import type { RebootNotice } from '../src/connection/types.js';
import {
  AuthenticationError,
  MaxRetriesExceededError,
  NotConnectedError,
  TransportError,
} from '../src/errors.js';
import { TelemetryLogger } from '../src/logging/index.js';
import { FakeHost, createHost } from './support/fake-host.js';

const telemetry = new TelemetryLogger({ level: 'silent' });

describe('ReconnectSupervisor', () => {
  let host: FakeHost;
  let waits: number[];

  const createSupervisor = (overrides: Record<string, unknown> = {}) =>
    new ReconnectSupervisor({
      host: createHost(overrides),
      transport: host,
      telemetry,
      sleep: async (ms) => {
        waits.push(ms);
      },
      random: () => 0,
    });

  const statusPath = (supervisor: ReconnectSupervisor) =>
    supervisor.history.map((transition) => `${transition.from}->${transition.to}`);

  beforeEach(() => {
    host = new FakeHost();
    waits = [];
  });

  it('connects on the first attempt and records the boot signature', async () => {
    const supervisor = createSupervisor();

    await supervisor.start();

    expect(supervisor.status).toBe('connected');
    expect(supervisor.bootSignature).toMatchObject({ token: 'boot-123', uptimeSeconds: 1_000 });
    expect(statusPath(supervisor)).toEqual(['disconnected->connecting', 'connecting->connected']);
    supervisor.shutdown();
  });

  it('retries through the backoff schedule until the host answers', async () => {
    host.failNextOpens(3);
    const supervisor = createSupervisor();

    await supervisor.start();

    expect(waits).toEqual([1, 2, 4]);
    expect(host.openCount).toBe(4);
    expect(supervisor.status).toBe('connected');
    expect(supervisor.lastFailure).toBeNull();
    supervisor.shutdown();
  });

  it('gives up after the retry budget and stays failed', async () => {
    host.failNextOpens(4);
    const supervisor = createSupervisor();

    const error = await supervisor.start().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MaxRetriesExceededError);
    expect(error).toMatchObject({ attempts: 4, cause: expect.any(TransportError) });
    expect(waits).toEqual([1, 2, 4]);
    expect(host.openCount).toBe(4);
    expect(supervisor.status).toBe('failed');
    expect(supervisor.lastFailure).toBe(error);
    expect(statusPath(supervisor)).toEqual(['disconnected->connecting', 'connecting->failed']);
  });

  it('does not retry rejected credentials', async () => {
    host.failNextOpens(1, () => new AuthenticationError('key rejected'));
    const supervisor = createSupervisor();

    await expect(supervisor.start()).rejects.toBeInstanceOf(AuthenticationError);

    expect(host.openCount).toBe(1);
    expect(waits).toEqual([]);
    expect(supervisor.status).toBe('failed');
  });

  it('stops retrying once the next wait would pass the deadline', async () => {
    let now = 0;
    host.failNextOpens(10);
    const supervisor = new ReconnectSupervisor({
      host: createHost({ reconnect: { maxAttempts: 'unbounded', backoffScheduleMs: [1, 2, 4], deadlineMs: 5, jitterRatio: 0 } }),
      transport: host,
      telemetry,
      clock: () => now,
      sleep: async (ms) => {
        waits.push(ms);
        now += ms;
      },
    });

    await expect(supervisor.start()).rejects.toMatchObject({ attempts: 3 });
    expect(waits).toEqual([1, 2]);
    expect(host.openCount).toBe(3);
  });

  it('resets a failed connection when started again', async () => {
    host.failNextOpens(1, () => new AuthenticationError('key rejected'));
    const supervisor = createSupervisor();
    await supervisor.start().catch(() => undefined);

    await supervisor.start();

    expect(statusPath(supervisor)).toEqual([
      'disconnected->connecting',
      'connecting->failed',
      'failed->disconnected',
      'disconnected->connecting',
      'connecting->connected',
    ]);
    supervisor.shutdown();
  });

  it('joins a connect already in progress', async () => {
    const supervisor = createSupervisor();

    const first = supervisor.start();
    const second = supervisor.start();
    await Promise.all([first, second]);

    expect(host.openCount).toBe(1);
    supervisor.shutdown();
  });

  it('recovers from a dropped session on the same boot without a reboot notice', async () => {
    const supervisor = createSupervisor();
    const notices: RebootNotice[] = [];
    supervisor.onReboot((notice) => notices.push(notice));
    await supervisor.start();
    const firstSession = supervisor.session;

    host.current.drop();

    await vi.waitFor(() => {
      expect(host.openCount).toBe(2);
      expect(supervisor.status).toBe('connected');
    });
    expect(supervisor.session).not.toBe(firstSession);
    expect(notices).toEqual([]);
    expect(statusPath(supervisor).slice(-3)).toEqual([
      'connected->disconnected',
      'disconnected->connecting',
      'connecting->connected',
    ]);
    supervisor.shutdown();
  });

  it('passes through rebooting when the boot id changes and notifies once', async () => {
    const supervisor = createSupervisor();
    const notices: RebootNotice[] = [];
    supervisor.onReboot((notice) => notices.push(notice));
    await supervisor.start();
    host.readinessFailures = 1;

    host.reboot('boot-456');

    await vi.waitFor(() => expect(notices).toHaveLength(1));
    expect(notices[0]).toMatchObject({
      type: 'rebooted',
      previous: { token: 'boot-123' },
      current: { token: 'boot-456' },
    });
    expect(supervisor.status).toBe('connected');
    expect(statusPath(supervisor).slice(2)).toEqual([
      'connected->disconnected',
      'disconnected->connecting',
      'connecting->rebooting',
      'rebooting->connecting',
      'connecting->rebooting',
      'rebooting->connected',
    ]);
    supervisor.shutdown();
  });

  it('announces an unclassifiable reconnect and still reconnects', async () => {
    const supervisor = createSupervisor();
    const notices: RebootNotice[] = [];
    supervisor.onReboot((notice) => notices.push(notice));
    await supervisor.start();

    host.bootId = null;
    host.uptimeSeconds = null;
    host.current.drop();

    await vi.waitFor(() => expect(notices).toHaveLength(1));
    expect(notices[0].type).toBe('unclassified');
    expect(supervisor.status).toBe('connected');
    supervisor.shutdown();
  });

  it('treats an unclassifiable reconnect as a reboot when configured to', async () => {
    const supervisor = createSupervisor({ reboot: { probeTimeoutMs: 200, assumeRebootWhenUnavailable: true } });
    const notices: RebootNotice[] = [];
    supervisor.onReboot((notice) => notices.push(notice));
    await supervisor.start();

    host.bootId = null;
    host.uptimeSeconds = null;
    host.current.drop();

    await vi.waitFor(() => expect(notices).toHaveLength(1));
    expect(notices[0]).toMatchObject({ type: 'rebooted', current: { token: null } });
    supervisor.shutdown();
  });

  it('probes an idle session and recovers when the probe fails', async () => {
    let now = 0;
    const supervisor = new ReconnectSupervisor({
      host: createHost({ connection: { healthCheckIntervalMs: 10, idleProbeAfterMs: 1_000 } }),
      transport: host,
      telemetry,
      clock: () => now,
    });
    await supervisor.start();
    host.readinessFailures = 1;

    now = 1_000;

    await vi.waitFor(() => expect(host.openCount).toBe(2));
    expect(host.sessions[0].commands).toContain('true');
    await vi.waitFor(() => expect(supervisor.status).toBe('connected'));
    supervisor.shutdown();
  });

  it('ignores failures reported for a session that is no longer current', async () => {
    const supervisor = createSupervisor();
    await supervisor.start();
    const stale = host.current;
    host.current.drop();
    await vi.waitFor(() => expect(host.openCount).toBe(2));
    await vi.waitFor(() => expect(supervisor.status).toBe('connected'));

    supervisor.reportFailure(stale, new TransportError('late report'));

    expect(supervisor.status).toBe('connected');
    expect(host.openCount).toBe(2);
    supervisor.shutdown();
  });

  it('cancels a run in progress on shutdown', async () => {
    host.failNextOpens(10);
    const supervisor = new ReconnectSupervisor({
      host: createHost(),
      transport: host,
      telemetry,
      sleep: (ms, signal) =>
        new Promise<void>((resolve) => {
          waits.push(ms);
          signal.addEventListener('abort', () => resolve(), { once: true });
        }),
    });

    const run = supervisor.start();
    await vi.waitFor(() => expect(waits).toEqual([1]));
    supervisor.shutdown();

    await expect(run).rejects.toBeInstanceOf(NotConnectedError);
    expect(supervisor.status).toBe('disconnected');
    expect(host.openCount).toBe(1);
  });

  it('closes the session on shutdown and is idempotent', async () => {
    const supervisor = createSupervisor();
    await supervisor.start();
    const session = host.current;

    supervisor.shutdown();
    supervisor.shutdown();

    expect(session.isOpen()).toBe(false);
    expect(supervisor.session).toBeNull();
    expect(statusPath(supervisor)).toEqual([
      'disconnected->connecting',
      'connecting->connected',
      'connected->disconnected',
    ]);
  });
});
