import { describe, expect, it } from 'vitest';

import { parseHostConfig } from '../src/config/schema.js';
import { findHost, formatExit } from '../src/server.js';
import { parseKnownHosts } from '../src/transport/ssh-transport.js';

describe('formatExit', () => {
  it('describes success, failure and signals', () => {
    const base = { type: 'exit' as const, durationMs: 12, lineCount: 0 };

    expect(formatExit({ ...base, exitCode: 0, signal: null })).toBe('Command succeeded in 12ms');
    expect(formatExit({ ...base, exitCode: 2, signal: null })).toBe('Command exited with code 2 in 12ms');
    expect(formatExit({ ...base, exitCode: null, signal: 'KILL' })).toBe('Command terminated by KILL in 12ms');
  });
});

describe('findHost', () => {
  const config = {
    hosts: [
      parseHostConfig({ alias: 'build-vm', host: '192.0.2.30', username: 'ci', auth: { type: 'ssh-agent' } }),
    ],
  };

  it('looks up a host by alias', () => {
    expect(findHost(config, 'build-vm').host).toBe('192.0.2.30');
  });

  it('rejects an unknown alias', () => {
    expect(() => findHost(config, 'missing')).toThrow("Host alias 'missing' not found in configuration");
  });
});

describe('parseKnownHosts', () => {
  it('reads plain entries and skips comments, markers and hashed names', () => {
    const raw = [
      '# managed by provisioning',
      'build-vm,192.0.2.30 ssh-ed25519 AAAAC3test-key-one',
      '[192.0.2.31]:2222 ssh-rsa AAAAB3test-key-two',
      '@cert-authority *.internal ssh-ed25519 AAAAC3test-ca',
      '|1|c2FsdA==|aGFzaA== ssh-ed25519 AAAAC3test-hashed',
      '',
    ].join('\n');

    expect(parseKnownHosts(raw)).toEqual([
      { hostnames: ['build-vm', '192.0.2.30'], key: 'AAAAC3test-key-one' },
      { hostnames: ['[192.0.2.31]:2222'], key: 'AAAAB3test-key-two' },
    ]);
  });
});
