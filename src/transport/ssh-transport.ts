import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { exec as execCallback } from 'node:child_process';
import { promisify } from 'node:util';

import { Client, type ClientChannel, type ConnectConfig } from 'ssh2';

import type { HostConfig } from '../config/types.js';
import {
  AuthenticationError,
  SessionInvalidatedError,
  TransportError,
  toAuthenticationError,
  toTransportError,
} from '../errors.js';
import { LineChannel } from './line-channel.js';
import type { ExitStatus, RemoteChannel, TransportFactory, TransportSession } from './types.js';

const execPromise = promisify(execCallback);

export const PASSPHRASE_ENV_PREFIX = 'VM_SHELL_SESSION_PASSPHRASE_';

interface KnownHostEntry {
  hostnames: string[];
  key: string; // base64 encoded
}

export function parseKnownHosts(raw: string): KnownHostEntry[] {
  const entries: KnownHostEntry[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    // Markers (@cert-authority, @revoked) and hashed hostnames are not matched.
    if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith('@') || trimmed.startsWith('|')) {
      continue;
    }

    const [hostList, , key] = trimmed.split(/\s+/);
    if (hostList && key) {
      entries.push({ hostnames: hostList.split(','), key });
    }
  }
  return entries;
}

function hostCandidates(host: HostConfig): string[] {
  return [host.host, `${host.host}:${host.port}`, `[${host.host}]:${host.port}`, host.alias];
}

async function createHostVerifier(host: HostConfig): Promise<((key: Buffer) => boolean) | undefined> {
  if (!host.strictHostKeyChecking) {
    return undefined;
  }

  const knownHostsPath = host.knownHostsPath
    ? path.resolve(host.knownHostsPath)
    : path.join(os.homedir(), '.ssh', 'known_hosts');

  let raw: string;
  try {
    raw = await fs.readFile(knownHostsPath, 'utf-8');
  } catch (err) {
    throw new AuthenticationError(
      `Known hosts file not readable at ${knownHostsPath}. Provide a valid path or disable strictHostKeyChecking.`,
      { cause: err },
    );
  }

  const candidates = hostCandidates(host);
  const entries = parseKnownHosts(raw).filter((entry) =>
    entry.hostnames.some((name) => candidates.includes(name)),
  );
  if (entries.length === 0) {
    throw new AuthenticationError(`No known_hosts entry in ${knownHostsPath} matches ${host.alias}`);
  }

  return (key: Buffer) => entries.some((entry) => entry.key === key.toString('base64'));
}

async function resolveAuthConfig(host: HostConfig): Promise<Partial<ConnectConfig>> {
  const auth = host.auth;

  switch (auth.type) {
    case 'ssh-key': {
      const privateKey = await fs.readFile(auth.privateKeyPath);
      const passphrase = auth.passphrasePrompt
        ? process.env[`${PASSPHRASE_ENV_PREFIX}${host.alias.toUpperCase()}`]
        : undefined;
      return { privateKey, passphrase };
    }
    case 'ssh-agent': {
      const agent = auth.agentSocketPath ?? process.env.SSH_AUTH_SOCK;
      if (!agent) {
        throw new AuthenticationError(`SSH agent authentication requested for ${host.alias} but no agent socket is available`);
      }
      return { agent };
    }
    case 'credential-command': {
      const { stdout } = await execPromise(auth.credentialCommand, { maxBuffer: 8 * 1024 });
      const password = stdout.trim();
      if (!password) {
        throw new AuthenticationError(`Credential command for ${host.alias} returned empty output`);
      }
      return { password };
    }
    default: {
      const exhaustive: never = auth;
      throw new Error(`Unsupported auth type: ${JSON.stringify(exhaustive)}`);
    }
  }
}

function buildConnectConfig(host: HostConfig): ConnectConfig {
  return {
    host: host.host,
    port: host.port,
    username: host.username,
    keepaliveInterval: host.connection.keepAliveIntervalMs,
    keepaliveCountMax: host.connection.keepAliveCountMax,
    readyTimeout: host.connection.readyTimeoutMs,
  };
}

function classifyConnectError(error: Error, hostAlias: string): Error {
  if ('level' in error && error.level === 'client-authentication') {
    return new AuthenticationError(`Authentication rejected by ${hostAlias}: ${error.message}`, { cause: error });
  }
  return toTransportError(error, `connecting to ${hostAlias}`);
}

class SshSession implements TransportSession {
  private alive = true;
  private closed = false;
  private readonly channels = new Set<LineChannel>();

  constructor(
    private readonly client: Client,
    private readonly hostAlias: string,
  ) {
    client.on('error', (error: Error) => {
      this.invalidate(toTransportError(error, `session to ${hostAlias}`));
    });
    client.on('close', () => {
      this.invalidate(new SessionInvalidatedError(`SSH connection to ${hostAlias} closed`));
    });
  }

  exec(command: string): Promise<RemoteChannel> {
    if (!this.isAlive()) {
      return Promise.reject(new SessionInvalidatedError(`Session to ${this.hostAlias} is no longer open`));
    }

    return new Promise((resolve, reject) => {
      this.client.exec(command, (execErr, stream) => {
        if (execErr) {
          reject(toTransportError(execErr, `exec on ${this.hostAlias}`));
          return;
        }
        resolve(this.track(stream));
      });
    });
  }

  isAlive(): boolean {
    return this.alive && !this.closed;
  }

  isOpen(): boolean {
    return !this.closed;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.invalidate(new SessionInvalidatedError(`Session to ${this.hostAlias} was closed`));
    this.client.end();
  }

  private track(stream: ClientChannel): LineChannel {
    let exit: ExitStatus = { exitCode: null, signal: null };
    const channel = new LineChannel({
      write: (data) =>
        new Promise<void>((resolve, reject) => {
          stream.write(data, (error) => (error ? reject(toTransportError(error, `stdin on ${this.hostAlias}`)) : resolve()));
        }),
      endInput: () => stream.end(),
      close: () => stream.close(),
    });
    this.channels.add(channel);

    stream.on('data', (chunk: Buffer) => channel.push('stdout', chunk));
    stream.stderr.on('data', (chunk: Buffer) => channel.push('stderr', chunk));
    stream.on('exit', (code: number | null, signal: string | null) => {
      exit = {
        exitCode: typeof code === 'number' ? code : null,
        signal: typeof signal === 'string' ? signal : null,
      };
    });
    stream.on('close', () => {
      this.channels.delete(channel);
      channel.finish(exit);
    });
    stream.on('error', (error: Error) => {
      this.channels.delete(channel);
      channel.fail(toTransportError(error, `channel on ${this.hostAlias}`));
    });

    return channel;
  }

  private invalidate(error: Error): void {
    this.alive = false;
    for (const channel of this.channels) {
      channel.fail(error);
    }
    this.channels.clear();
  }
}

/** Opens ssh2 sessions; keepalives drive `isAlive()`. */
export class SshTransport implements TransportFactory {
  async open(host: HostConfig): Promise<TransportSession> {
    let resolvedAuth: Partial<ConnectConfig>;
    let hostVerifier: ((key: Buffer) => boolean) | undefined;
    try {
      resolvedAuth = await resolveAuthConfig(host);
      hostVerifier = await createHostVerifier(host);
    } catch (err) {
      throw toAuthenticationError(err, host.alias);
    }

    const client = new Client();
    const connectConfig: ConnectConfig = {
      ...buildConnectConfig(host),
      ...resolvedAuth,
      hostVerifier,
    };

    try {
      await new Promise<void>((resolve, reject) => {
        let settled = false;
        client
          .on('ready', () => {
            settled = true;
            resolve();
          })
          .on('error', (error: Error) => {
            if (!settled) {
              settled = true;
              reject(classifyConnectError(error, host.alias));
            }
          });
        client.connect(connectConfig);
      });
    } catch (err) {
      client.end();
      throw err instanceof Error ? err : new TransportError(String(err));
    }

    return new SshSession(client, host.alias);
  }
}
