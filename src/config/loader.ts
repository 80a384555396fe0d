import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import chokidar from 'chokidar';
import { parse as parseToml } from 'toml';

import { coerceConfig } from './schema.js';
import type {
  ConfigChangeHandler,
  ConfigWatcher,
  LoadConfigOptions,
  VmSessionConfig,
  WatchConfigOptions,
} from './types.js';

export const CONFIG_ENV_VAR = 'VM_SHELL_SESSION_CONFIG';
export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.config', 'vm-shell-session', 'config.toml');

export class ConfigLoadError extends Error {
  constructor(
    readonly configPath: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConfigLoadError';
  }
}

export function resolveConfigPath(options: LoadConfigOptions = {}): string {
  const candidate = options.configPath?.trim() || process.env[CONFIG_ENV_VAR]?.trim();
  return candidate ? path.resolve(candidate) : DEFAULT_CONFIG_PATH;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Parses and validates TOML text; `configPath` only labels errors. */
export function parseConfigText(raw: string, configPath: string): VmSessionConfig {
  let parsed: unknown;
  try {
    parsed = parseToml(raw);
  } catch (err) {
    throw new ConfigLoadError(configPath, `Failed to parse TOML in ${configPath}`, { cause: err });
  }

  try {
    return coerceConfig(parsed);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigLoadError(configPath, `Configuration validation error for ${configPath}\n${detail}`, {
      cause: err,
    });
  }
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<VmSessionConfig> {
  const configPath = resolveConfigPath(options);

  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (!isMissingFile(err)) {
      throw new ConfigLoadError(configPath, `Failed to read configuration file at ${configPath}`, { cause: err });
    }
    if (options.allowMissing) {
      return { hosts: [] } satisfies VmSessionConfig;
    }
    throw new ConfigLoadError(
      configPath,
      `Configuration file not found at ${configPath}. Set ${CONFIG_ENV_VAR} to override the path.`,
    );
  }

  return parseConfigText(raw, configPath);
}

/** Loads the file once immediately, then again after every debounced change. */
export function watchConfig(
  handler: ConfigChangeHandler,
  options: WatchConfigOptions = {},
): ConfigWatcher {
  const configPath = resolveConfigPath(options);
  const debounceMs = options.debounceMs ?? 200;
  let timer: NodeJS.Timeout | null = null;

  const reportError = (err: unknown) => {
    options.onError?.(err instanceof Error ? err : new Error(String(err)));
  };

  const reload = async () => {
    try {
      await handler(await loadConfig({ ...options, configPath }));
    } catch (err) {
      reportError(err);
    }
  };

  const scheduleReload = () => {
    if (timer) {
      clearTimeout(timer);
    }
    timer = setTimeout(() => {
      timer = null;
      void reload();
    }, debounceMs);
  };

  const watcher = chokidar.watch(configPath, {
    ignoreInitial: true,
    awaitWriteFinish: {
      stabilityThreshold: 250,
      pollInterval: 100,
    },
  });

  watcher.on('add', scheduleReload);
  watcher.on('change', scheduleReload);
  watcher.on('error', reportError);

  void reload();

  return {
    async close() {
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      await watcher.close();
    },
  };
}
