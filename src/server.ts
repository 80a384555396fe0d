import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';

import { loadConfig, watchConfig, ConfigLoadError } from './config/loader.js';
import type { HostConfig, VmSessionConfig } from './config/types.js';
import { collectCommand } from './connection/command-executor.js';
import { ConnectionStateMachine } from './connection/connection-state-machine.js';
import type { CommandExitEvent } from './connection/types.js';
import { ExecutionHookManager } from './hooks/index.js';
import { TelemetryLogger } from './logging/index.js';
import { SshTransport } from './transport/ssh-transport.js';

export const connectArgsShape = {
  hostAlias: z.string().min(1, 'hostAlias is required'),
} as const;

export const runCommandArgsShape = {
  command: z.string().min(1, 'command is required'),
  timeoutMs: z.number().int().positive().optional(),
  input: z.string().optional(),
} as const;

export const waitForRebootArgsShape = {
  timeoutMs: z.number().int().positive(),
} as const;

const runCommandSchema = z.object(runCommandArgsShape);

export function formatExit(exit: CommandExitEvent): string {
  const outcome =
    exit.exitCode === 0
      ? 'succeeded'
      : exit.exitCode === null
        ? `terminated by ${exit.signal ?? 'unknown signal'}`
        : `exited with code ${exit.exitCode}`;
  return `Command ${outcome} in ${exit.durationMs}ms`;
}

export function findHost(config: VmSessionConfig, alias: string): HostConfig {
  const host = config.hosts.find((entry) => entry.alias === alias);
  if (!host) {
    throw new Error(`Host alias '${alias}' not found in configuration`);
  }
  return host;
}

function text(message: string) {
  return { content: [{ type: 'text' as const, text: message }] };
}

export async function bootstrap(): Promise<void> {
  let config: VmSessionConfig;
  try {
    config = await loadConfig();
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      console.error(error.message);
    }
    throw error;
  }

  const telemetry = new TelemetryLogger();
  const machine = new ConnectionStateMachine({
    transport: new SshTransport(),
    telemetry,
    hooks: new ExecutionHookManager(),
  });

  const server = new McpServer(
    {
      name: 'vm-shell-session',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: { listChanged: true },
        logging: {},
      },
    },
  );

  server.tool('connect', 'Open the session to a configured VM host and keep it alive', connectArgsShape, async (args) => {
    await machine.connect(findHost(config, args.hostAlias));
    return text(`Connected to ${args.hostAlias}`);
  });

  server.tool(
    'runCommand',
    'Run a shell command on the connected VM, streaming output as logging messages',
    runCommandArgsShape,
    async (args: z.input<typeof runCommandSchema>, extra: { sessionId?: string }) => {
      const request = runCommandSchema.parse(args);
      const stream = machine.runCommand(request.command, { timeoutMs: request.timeoutMs, input: request.input });

      const { lines, exit } = await collectCommand(stream, async (line) => {
        await server.server.sendLoggingMessage(
          {
            level: line.type === 'stderr' ? 'warning' : 'info',
            data: `[${line.type}] ${line.text}`,
          },
          extra.sessionId,
        );
      });

      const stdout = lines.filter((line) => line.type === 'stdout').map((line) => line.text).join('\n');
      const stderr = lines.filter((line) => line.type === 'stderr').map((line) => line.text).join('\n');

      return {
        content: [
          {
            type: 'text',
            text: [
              formatExit(exit),
              stdout ? `\nstdout:\n${stdout}` : '\nstdout: <empty>',
              stderr ? `\nstderr:\n${stderr}` : '\nstderr: <empty>',
            ].join(''),
          },
        ],
        structuredContent: {
          exitCode: exit.exitCode,
          signal: exit.signal,
          stdout,
          stderr,
          durationMs: exit.durationMs,
        },
        isError: exit.exitCode !== 0,
      };
    },
  );

  server.tool(
    'waitForReboot',
    'Block until the connected VM has rebooted and accepts commands again',
    waitForRebootArgsShape,
    async (args) => {
      const event = await machine.waitForReboot(args.timeoutMs);
      return text(`Host rebooted: boot ${event.previous.token ?? 'unknown'} -> ${event.current.token ?? 'unknown'}`);
    },
  );

  server.tool('disconnect', 'Close the VM session', async () => {
    machine.disconnect();
    return text('Disconnected');
  });

  server.tool('status', 'Report the VM connection status and recent transitions', async () => {
    return text(JSON.stringify(machine.snapshot(), null, 2));
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const watcher = watchConfig(
    (nextConfig) => {
      config = nextConfig;
    },
    {
      onError: (err) => {
        console.error('Failed to reload configuration:', err.message);
      },
    },
  );

  const shutdown = async () => {
    machine.disconnect();
    await watcher.close();
    await server.close();
  };

  process.on('SIGINT', () => {
    void shutdown().finally(() => process.exit(0));
  });

  process.on('SIGTERM', () => {
    void shutdown().finally(() => process.exit(0));
  });
}
