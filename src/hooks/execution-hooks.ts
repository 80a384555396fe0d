import { nanoid } from 'nanoid/non-secure';

import type { CommandExitEvent } from '../connection/types.js';
import type { OutputLine } from '../transport/types.js';

export interface CommandHookContext {
  hostAlias: string;
  command: string;
  timeoutMs: number;
}

export interface CommandInvocation {
  /** Correlates hook calls and log lines of one command run. */
  invocationId: string;
  startedAt: Date;
}

export interface CommandHookArgs {
  context: CommandHookContext;
  invocation: CommandInvocation;
}

/**
 * Observers of command runs. Every method is optional; a hook that throws
 * fails the command it was called for, except `onCommandError`, whose
 * failures never replace the command's own error.
 */
export interface ExecutionHooks {
  beforeCommand?(args: CommandHookArgs): void | Promise<void>;
  onOutputLine?(args: CommandHookArgs & { line: OutputLine }): void | Promise<void>;
  afterCommand?(args: CommandHookArgs & { result: CommandExitEvent }): void | Promise<void>;
  onCommandError?(args: CommandHookArgs & { error: Error }): void | Promise<void>;
}

export function createInvocation(): CommandInvocation {
  return {
    invocationId: nanoid(12),
    startedAt: new Date(),
  };
}

/** Runs registered hook sets in registration order. */
export class ExecutionHookManager {
  private readonly registered: ExecutionHooks[] = [];

  constructor(hooks: readonly ExecutionHooks[] = []) {
    this.registered.push(...hooks);
  }

  register(hooks: ExecutionHooks): () => void {
    this.registered.push(hooks);
    return () => {
      const index = this.registered.indexOf(hooks);
      if (index >= 0) {
        this.registered.splice(index, 1);
      }
    };
  }

  async runBefore(args: CommandHookArgs): Promise<void> {
    for (const hooks of [...this.registered]) {
      await hooks.beforeCommand?.(args);
    }
  }

  async runLine(args: CommandHookArgs, line: OutputLine): Promise<void> {
    for (const hooks of [...this.registered]) {
      await hooks.onOutputLine?.({ ...args, line });
    }
  }

  async runAfter(args: CommandHookArgs, result: CommandExitEvent): Promise<void> {
    for (const hooks of [...this.registered]) {
      await hooks.afterCommand?.({ ...args, result });
    }
  }

  /** Error hooks all run. Resolves with whatever they threw. */
  async runError(args: CommandHookArgs, error: Error): Promise<unknown[]> {
    const failures: unknown[] = [];
    for (const hooks of [...this.registered]) {
      try {
        await hooks.onCommandError?.({ ...args, error });
      } catch (err) {
        failures.push(err);
      }
    }
    return failures;
  }
}
