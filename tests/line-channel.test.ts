import { describe, expect, it, vi } from 'vitest';

import { TransportError } from '../src/errors.js';
import { ChunkQueue } from '../src/transport/chunk-queue.js';
import { LineChannel } from '../src/transport/line-channel.js';
import type { OutputLine } from '../src/transport/types.js';

async function readAll(channel: LineChannel): Promise<Array<Pick<OutputLine, 'type' | 'text'>>> {
  const seen: Array<Pick<OutputLine, 'type' | 'text'>> = [];
  for await (const line of channel.lines()) {
    seen.push({ type: line.type, text: line.text });
  }
  return seen;
}

describe('ChunkQueue', () => {
  it('hands pushed values to a waiting reader', async () => {
    const queue = new ChunkQueue<number>();
    const pending = queue.next();

    queue.push(7);

    await expect(pending).resolves.toEqual({ value: 7, done: false });
  });

  it('drains buffered values before reporting a failure', async () => {
    const queue = new ChunkQueue<string>();
    queue.push('a');
    queue.fail(new Error('boom'));

    await expect(queue.next()).resolves.toEqual({ value: 'a', done: false });
    await expect(queue.next()).rejects.toThrow('boom');
    expect(queue.isSettled).toBe(true);
  });
});

describe('LineChannel', () => {
  it('reassembles lines split across chunks', async () => {
    const channel = new LineChannel();
    channel.push('stdout', 'hel');
    channel.push('stdout', Buffer.from('lo\r\nwor'));
    channel.finish({ exitCode: 0, signal: null });

    await expect(readAll(channel)).resolves.toEqual([
      { type: 'stdout', text: 'hello' },
      { type: 'stdout', text: 'wor' },
    ]);
    await expect(channel.exitStatus()).resolves.toEqual({ exitCode: 0, signal: null });
  });

  it('decodes multi-byte characters split between chunks', async () => {
    const bytes = Buffer.from('café\n');
    const channel = new LineChannel();
    channel.push('stderr', bytes.subarray(0, 4));
    channel.push('stderr', bytes.subarray(4));
    channel.finish({ exitCode: 1, signal: null });

    await expect(readAll(channel)).resolves.toEqual([{ type: 'stderr', text: 'café' }]);
  });

  it('keeps stdout and stderr in arrival order', async () => {
    const channel = new LineChannel();
    channel.push('stdout', 'out-1\n');
    channel.push('stderr', 'err-1\n');
    channel.push('stdout', 'out-2\n');
    channel.finish({ exitCode: 0, signal: null });

    const lines = await readAll(channel);

    expect(lines.map((line) => line.text)).toEqual(['out-1', 'err-1', 'out-2']);
  });

  it('delivers received lines before the failure', async () => {
    const channel = new LineChannel();
    channel.push('stdout', 'first\npartial');
    channel.fail(new TransportError('connection reset'));

    const iterator = channel.lines();
    await expect(iterator.next()).resolves.toMatchObject({ value: { text: 'first' } });
    await expect(iterator.next()).resolves.toMatchObject({ value: { text: 'partial' } });
    await expect(iterator.next()).rejects.toThrow('connection reset');
    await expect(channel.exitStatus()).rejects.toBeInstanceOf(TransportError);
  });

  it('closes locally without an exit code', async () => {
    const onClose = vi.fn();
    const channel = new LineChannel({ close: onClose });
    const exit = channel.exitStatus();

    channel.close();
    channel.close();

    expect(onClose).toHaveBeenCalledTimes(1);
    await expect(exit).resolves.toEqual({ exitCode: null, signal: null });
    await expect(channel.write('late')).rejects.toThrow('Cannot write to a closed channel');
  });
});
