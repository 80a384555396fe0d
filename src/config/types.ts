export type AuthType = 'ssh-key' | 'ssh-agent' | 'credential-command';

export interface SshKeyAuthConfig {
  type: 'ssh-key';
  /** Absolute path to the private key used for authentication. */
  privateKeyPath: string;
  /** Read the passphrase from VM_SHELL_SESSION_PASSPHRASE_<ALIAS>. */
  passphrasePrompt?: boolean;
}

export interface SshAgentAuthConfig {
  type: 'ssh-agent';
  /** Optional explicit path to the SSH agent socket. Defaults to SSH_AUTH_SOCK. */
  agentSocketPath?: string;
}

export interface CredentialCommandAuthConfig {
  type: 'credential-command';
  /** Command whose trimmed stdout is the login password. */
  credentialCommand: string;
}

export type AuthConfig =
  | SshKeyAuthConfig
  | SshAgentAuthConfig
  | CredentialCommandAuthConfig;

export interface ConnectionOptions {
  keepAliveIntervalMs: number;
  /** Unanswered keepalives before the transport is considered dead. */
  keepAliveCountMax: number;
  readyTimeoutMs: number;
  healthCheckIntervalMs: number;
  /** Run an active probe when no command has touched the session for this long. */
  idleProbeAfterMs: number;
  commandTimeoutMs: number;
}

export interface ReconnectPolicy {
  /** Retries after the first attempt. */
  maxAttempts: number | 'unbounded';
  /** Non-decreasing waits; the last entry repeats once the schedule is exhausted. */
  backoffScheduleMs: readonly number[];
  /** Total time budget for one recovery run. */
  deadlineMs?: number;
  /** Extra random delay, as a fraction of each scheduled wait. */
  jitterRatio: number;
}

export type RebootDetectionStrategy = 'auto' | 'boot-id' | 'uptime';

export interface RebootDetectionOptions {
  strategy: RebootDetectionStrategy;
  probeTimeoutMs: number;
  uptimeToleranceMs: number;
  /** Treat an unclassifiable reconnect as a reboot instead of reporting it. */
  assumeRebootWhenUnavailable: boolean;
}

export interface HostConfig {
  alias: string;
  host: string;
  port: number;
  username: string;
  auth: AuthConfig;
  workingDirectory?: string;
  knownHostsPath?: string;
  strictHostKeyChecking: boolean;
  connection: ConnectionOptions;
  reconnect: ReconnectPolicy;
  reboot: RebootDetectionOptions;
}

export interface VmSessionConfig {
  hosts: HostConfig[];
}

export interface LoadConfigOptions {
  /** Override config path; defaults to env or standard location. */
  configPath?: string;
  /** If true, missing config file resolves to empty config instead of throwing. */
  allowMissing?: boolean;
}

export interface WatchConfigOptions extends LoadConfigOptions {
  /** Optional debounce interval in ms before emitting reloads. */
  debounceMs?: number;
  /** Optional handler invoked when loader cannot parse new config. */
  onError?: (error: Error) => void;
}

export type ConfigChangeHandler = (config: VmSessionConfig) => void | Promise<void>;

export interface ConfigWatcher {
  close(): Promise<void>;
}
