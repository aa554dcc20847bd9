/**
 * Byte Source Tests
 */

import { describe, test, expect } from 'vitest';
import { PassThrough } from 'stream';
import { QueuedByteSource, createStreamByteSource } from '../../../src/terminal/byte-source.ts';

describe('QueuedByteSource', () => {
  test('delivers queued bytes in order', async () => {
    const source = new QueuedByteSource();
    source.push('ab');
    expect(await source.read()).toBe(0x61);
    expect(await source.readWithin(5)).toBe(0x62);
  });

  test('a pending read resolves when bytes arrive', async () => {
    const source = new QueuedByteSource();
    const pending = source.read();
    source.push(Uint8Array.from([7]));
    expect(await pending).toBe(7);
  });

  test('readWithin times out when nothing arrives', async () => {
    const source = new QueuedByteSource();
    expect(await source.readWithin(5)).toBe('timeout');
  });

  test('queued bytes are delivered before end of input', async () => {
    const source = new QueuedByteSource();
    source.push('x');
    source.close();
    expect(await source.read()).toBe(0x78);
    expect(await source.read()).toBe('eof');
  });

  test('interrupt wakes a blocking read only', async () => {
    const source = new QueuedByteSource();
    const deadline = source.readWithin(5);
    source.interrupt();
    expect(await deadline).toBe('timeout');

    const blocking = source.read();
    source.interrupt();
    expect(await blocking).toBe('interrupted');
  });

  test('a second concurrent read is refused', async () => {
    const source = new QueuedByteSource();
    const first = source.read();
    await expect(source.read()).rejects.toThrow('concurrent reads');
    source.push('z');
    expect(await first).toBe(0x7a);
  });
});

describe('createStreamByteSource', () => {
  test('feeds stream data and end into the source', async () => {
    const stream = new PassThrough();
    const { source, detach } = createStreamByteSource(stream);

    stream.write('hi');
    expect(await source.read()).toBe(0x68);
    expect(await source.read()).toBe(0x69);

    stream.end();
    expect(await source.read()).toBe('eof');
    detach();
  });
});
