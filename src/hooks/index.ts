export {
  ExecutionHookManager,
  createInvocation,
  type CommandHookArgs,
  type CommandHookContext,
  type CommandInvocation,
  type ExecutionHooks,
} from './execution-hooks.js';
