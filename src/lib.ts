export {
  ConnectionStateMachine,
  type ConnectionSnapshot,
  type ConnectionStateMachineOptions,
  type RunCommandOptions,
} from './connection/connection-state-machine.js';
export { ReconnectSupervisor, type ReconnectSupervisorOptions } from './connection/reconnect-supervisor.js';
export { CommandExecutor, collectCommand, type CollectedCommand } from './connection/command-executor.js';
export { BOOT_PROBE_COMMAND, captureBootSignature, hasRebooted } from './connection/boot-signature.js';
export { BackoffSchedule, exponentialSchedule } from './connection/backoff.js';
export type * from './connection/types.js';
export { SshTransport } from './transport/ssh-transport.js';
export { LineChannel } from './transport/line-channel.js';
export type * from './transport/types.js';
export { loadConfig, watchConfig, ConfigLoadError } from './config/loader.js';
export { parseHostConfig } from './config/schema.js';
export type * from './config/types.js';
export { ExecutionHookManager, type CommandHookArgs, type ExecutionHooks } from './hooks/index.js';
export { TelemetryLogger, type TelemetryLoggerOptions } from './logging/index.js';
export * from './errors.js';
