import { z } from 'zod';

import { exponentialSchedule } from '../connection/backoff.js';
import type { HostConfig, VmSessionConfig } from './types.js';

export const DEFAULT_CONNECTION_OPTIONS = {
  keepAliveIntervalMs: 5_000,
  keepAliveCountMax: 3,
  readyTimeoutMs: 20_000,
  healthCheckIntervalMs: 5_000,
  idleProbeAfterMs: 30_000,
  commandTimeoutMs: 60_000,
} as const;

export const DEFAULT_BACKOFF_SCHEDULE_MS = exponentialSchedule(1_000, 30_000);

export const DEFAULT_REBOOT_OPTIONS = {
  strategy: 'auto',
  probeTimeoutMs: 5_000,
  uptimeToleranceMs: 2_000,
  assumeRebootWhenUnavailable: false,
} as const;

const positiveInt = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be positive`);

const sshKeyAuthSchema = z.object({
  type: z.literal('ssh-key'),
  privateKeyPath: z
    .string()
    .min(1, 'ssh-key auth requires privateKeyPath'),
  passphrasePrompt: z.boolean().optional(),
});

const sshAgentAuthSchema = z.object({
  type: z.literal('ssh-agent'),
  agentSocketPath: z.string().min(1).optional(),
});

const credentialCommandAuthSchema = z.object({
  type: z.literal('credential-command'),
  credentialCommand: z
    .string()
    .min(1, 'credential-command auth requires credentialCommand'),
});

const authSchema = z.discriminatedUnion('type', [
  sshKeyAuthSchema,
  sshAgentAuthSchema,
  credentialCommandAuthSchema,
]);

const connectionOptionsSchema = z
  .object({
    keepAliveIntervalMs: positiveInt('keepAliveIntervalMs').optional(),
    keepAliveCountMax: positiveInt('keepAliveCountMax').optional(),
    readyTimeoutMs: positiveInt('readyTimeoutMs').optional(),
    healthCheckIntervalMs: positiveInt('healthCheckIntervalMs').optional(),
    idleProbeAfterMs: positiveInt('idleProbeAfterMs').optional(),
    commandTimeoutMs: positiveInt('commandTimeoutMs').optional(),
  })
  .strict();

const reconnectPolicySchema = z
  .object({
    maxAttempts: z
      .union([
        z.number().int('maxAttempts must be an integer').nonnegative('maxAttempts must be >= 0'),
        z.literal('unbounded'),
      ])
      .optional(),
    backoffScheduleMs: z
      .array(z.number().int().nonnegative('backoff waits must be >= 0'))
      .nonempty('backoffScheduleMs needs at least one wait')
      .refine(
        (schedule) => schedule.every((wait, index) => index === 0 || wait >= schedule[index - 1]),
        'backoffScheduleMs must be non-decreasing',
      )
      .optional(),
    deadlineMs: positiveInt('deadlineMs').optional(),
    jitterRatio: z
      .number()
      .min(0, 'jitterRatio must be >= 0')
      .max(1, 'jitterRatio must be <= 1')
      .optional(),
  })
  .strict();

const rebootOptionsSchema = z
  .object({
    strategy: z.enum(['auto', 'boot-id', 'uptime']).optional(),
    probeTimeoutMs: positiveInt('probeTimeoutMs').optional(),
    uptimeToleranceMs: z.number().int().nonnegative().optional(),
    assumeRebootWhenUnavailable: z.boolean().optional(),
  })
  .strict();

export const hostConfigSchema = z
  .object({
    alias: z.string().min(1, 'alias is required'),
    host: z.string().min(1, 'host is required'),
    port: z
      .number({ invalid_type_error: 'port must be a number' })
      .int('port must be an integer')
      .min(1, 'port must be >= 1')
      .max(65535, 'port must be <= 65535')
      .optional(),
    username: z.string().min(1, 'username is required'),
    auth: authSchema,
    workingDirectory: z.string().min(1).optional(),
    knownHostsPath: z.string().min(1).optional(),
    strictHostKeyChecking: z.boolean().optional(),
    connection: connectionOptionsSchema.optional(),
    reconnect: reconnectPolicySchema.optional(),
    reboot: rebootOptionsSchema.optional(),
  })
  .strict();

export const vmSessionConfigSchema = z
  .object({
    hosts: z
      .array(hostConfigSchema)
      .nonempty('At least one host entry is required in config'),
  })
  .strict();

type HostConfigInput = z.infer<typeof hostConfigSchema>;

function formatIssues(error: z.ZodError, root: string): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || root}: ${issue.message}`)
    .join('\n');
}

function normalizeHost(host: HostConfigInput): HostConfig {
  const { connection, reconnect, reboot, ...rest } = host;
  return {
    ...rest,
    port: host.port ?? 22,
    strictHostKeyChecking: host.strictHostKeyChecking ?? false,
    connection: {
      keepAliveIntervalMs: connection?.keepAliveIntervalMs ?? DEFAULT_CONNECTION_OPTIONS.keepAliveIntervalMs,
      keepAliveCountMax: connection?.keepAliveCountMax ?? DEFAULT_CONNECTION_OPTIONS.keepAliveCountMax,
      readyTimeoutMs: connection?.readyTimeoutMs ?? DEFAULT_CONNECTION_OPTIONS.readyTimeoutMs,
      healthCheckIntervalMs: connection?.healthCheckIntervalMs ?? DEFAULT_CONNECTION_OPTIONS.healthCheckIntervalMs,
      idleProbeAfterMs: connection?.idleProbeAfterMs ?? DEFAULT_CONNECTION_OPTIONS.idleProbeAfterMs,
      commandTimeoutMs: connection?.commandTimeoutMs ?? DEFAULT_CONNECTION_OPTIONS.commandTimeoutMs,
    },
    reconnect: {
      maxAttempts: reconnect?.maxAttempts ?? 10,
      backoffScheduleMs: reconnect?.backoffScheduleMs ?? DEFAULT_BACKOFF_SCHEDULE_MS,
      deadlineMs: reconnect?.deadlineMs,
      jitterRatio: reconnect?.jitterRatio ?? 0.2,
    },
    reboot: {
      strategy: reboot?.strategy ?? DEFAULT_REBOOT_OPTIONS.strategy,
      probeTimeoutMs: reboot?.probeTimeoutMs ?? DEFAULT_REBOOT_OPTIONS.probeTimeoutMs,
      uptimeToleranceMs: reboot?.uptimeToleranceMs ?? DEFAULT_REBOOT_OPTIONS.uptimeToleranceMs,
      assumeRebootWhenUnavailable:
        reboot?.assumeRebootWhenUnavailable ?? DEFAULT_REBOOT_OPTIONS.assumeRebootWhenUnavailable,
    },
  } satisfies HostConfig;
}

export function coerceConfig(input: unknown): VmSessionConfig {
  const parseResult = vmSessionConfigSchema.safeParse(input);

  if (!parseResult.success) {
    throw new Error(`Invalid vm-shell-session configuration:\n${formatIssues(parseResult.error, 'config')}`);
  }

  return {
    hosts: parseResult.data.hosts.map(normalizeHost),
  } satisfies VmSessionConfig;
}

/** Validates and fills defaults for a single host entry supplied in code. */
export function parseHostConfig(input: unknown): HostConfig {
  const parseResult = hostConfigSchema.safeParse(input);

  if (!parseResult.success) {
    throw new Error(`Invalid host configuration:\n${formatIssues(parseResult.error, 'host')}`);
  }

  return normalizeHost(parseResult.data);
}
