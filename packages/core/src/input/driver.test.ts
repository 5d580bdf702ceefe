/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { EndOfInputError, ReadCanceledError } from '../utils/errors.js';
import { type ByteSource, StreamByteSource } from './byteSource.js';
import { InputDriver } from './driver.js';
import { type InputEvent, keyEvent } from './events.js';
import { KeyMod } from './keys.js';

/**
 * Hands out scripted chunks, splitting them to honour `maxBytes`.
 */
class ScriptedSource implements ByteSource {
  readonly requests: number[] = [];
  closed = false;
  private readonly chunks: Uint8Array[];
  private canceled = false;

  constructor(chunks: string[]) {
    this.chunks = chunks.map((chunk) => Buffer.from(chunk, 'utf8'));
  }

  async read(maxBytes: number): Promise<Uint8Array | null> {
    this.requests.push(maxBytes);
    if (this.canceled) {
      throw new ReadCanceledError();
    }
    const chunk = this.chunks.shift();
    if (!chunk) {
      return null;
    }
    if (chunk.length > maxBytes) {
      this.chunks.unshift(chunk.subarray(maxBytes));
      return chunk.subarray(0, maxBytes);
    }
    return chunk;
  }

  cancel(): boolean {
    const wasCanceled = this.canceled;
    this.canceled = true;
    return !wasCanceled;
  }

  close(): void {
    this.closed = true;
  }
}

describe('InputDriver', () => {
  it('should return every event decoded from one read', async () => {
    const driver = new InputDriver(new ScriptedSource(['a\x1b[A']));
    expect(await driver.readInput()).toEqual([
      keyEvent({ runes: 'a' }),
      keyEvent({ sym: 'up' }),
    ]);
  });

  it('should reassemble a sequence split across reads', async () => {
    const driver = new InputDriver(new ScriptedSource(['\x1b[1;', '5A']));
    expect(await driver.readInput()).toEqual([
      keyEvent({ sym: 'up', modifiers: KeyMod.Ctrl }),
    ]);
  });

  it('should emit a lone ESC without waiting for more input', async () => {
    const source = new ScriptedSource(['\x1b', 'a']);
    const driver = new InputDriver(source);
    expect(await driver.readInput()).toEqual([keyEvent({ sym: 'escape' })]);
    expect(source.requests).toHaveLength(1);
  });

  it('should reject with EndOfInputError once everything is consumed', async () => {
    const driver = new InputDriver(new ScriptedSource(['x']));
    await driver.readInput();
    await expect(driver.readInput()).rejects.toBeInstanceOf(EndOfInputError);
  });

  it('should flush an incomplete sequence at end of input', async () => {
    const driver = new InputDriver(new ScriptedSource(['\x1b[1;5']));
    expect(await driver.readInput()).toEqual([
      { type: 'unknown', raw: '\x1b[1;5' },
    ]);
  });

  it('should flush when the buffer is full', async () => {
    const source = new ScriptedSource([`\x1b[${'1'.repeat(20)}`]);
    const driver = new InputDriver(source, { bufferSize: 16 });
    expect(await driver.readInput()).toEqual([
      { type: 'unknown', raw: `\x1b[${'1'.repeat(14)}` },
    ]);
    expect(source.requests).toEqual([16]);
  });

  it('should keep a sequence cut off by a full buffer for the next read', async () => {
    const driver = new InputDriver(
      new ScriptedSource([`${'a'.repeat(251)}\x1b[1;5`, 'A']),
    );
    expect(await driver.readInput()).toEqual([
      keyEvent({ runes: 'a'.repeat(251) }),
    ]);
    expect(await driver.readInput()).toEqual([
      keyEvent({ sym: 'up', modifiers: KeyMod.Ctrl }),
    ]);
  });

  it('should raise a small buffer size to the minimum', async () => {
    const source = new ScriptedSource(['a']);
    const driver = new InputDriver(source, { bufferSize: 1 });
    await driver.readInput();
    expect(source.requests).toEqual([16]);
  });

  describe('peekInput', () => {
    it('should leave the events in place for the next read', async () => {
      const source = new ScriptedSource(['ab']);
      const driver = new InputDriver(source);
      const expected = [keyEvent({ runes: 'ab' })];
      expect(await driver.peekInput()).toEqual(expected);
      expect(await driver.peekInput()).toEqual(expected);
      expect(await driver.readInput()).toEqual(expected);
      expect(source.requests).toHaveLength(1);
    });

    it('should not start a paste', async () => {
      const driver = new InputDriver(new ScriptedSource(['\x1b[200~abc']));
      expect(await driver.peekInput()).toEqual([{ type: 'paste-start' }]);
      expect(driver.pasting).toBe(false);
      expect(await driver.readInput()).toEqual([{ type: 'paste-start' }]);
      expect(driver.pasting).toBe(true);
    });
  });

  describe('bracketed paste', () => {
    it('should collect a paste across reads', async () => {
      const driver = new InputDriver(
        new ScriptedSource(['\x1b[200~he', 'llo\x1b[20', '1~']),
      );
      expect(await driver.readInput()).toEqual([{ type: 'paste-start' }]);
      expect(await driver.readInput()).toEqual([
        { type: 'paste-end' },
        { type: 'paste', text: 'hello' },
      ]);
      expect(driver.pasting).toBe(false);
    });

    it('should find a paste-end marker split by a full buffer', async () => {
      const source = new ScriptedSource([
        `\x1b[200~${'x'.repeat(246)}\x1b[20`,
        '1~after',
      ]);
      const driver = new InputDriver(source);
      expect(await driver.readInput()).toEqual([{ type: 'paste-start' }]);
      expect(await driver.readInput()).toEqual([
        { type: 'paste-end' },
        { type: 'paste', text: 'x'.repeat(246) },
        keyEvent({ runes: 'after' }),
      ]);
      expect(driver.pasting).toBe(false);
    });

    it('should collect a paste longer than the buffer', async () => {
      const source = new ScriptedSource([
        `\x1b[200~${'y'.repeat(40)}\x1b[201~`,
      ]);
      const driver = new InputDriver(source, { bufferSize: 16 });
      expect(await driver.readInput()).toEqual([{ type: 'paste-start' }]);
      expect(await driver.readInput()).toEqual([
        { type: 'paste-end' },
        { type: 'paste', text: 'y'.repeat(40) },
      ]);
      expect(source.requests).toEqual([16, 16, 16, 14]);
    });

    it('should emit the collected text when input ends mid-paste', async () => {
      const driver = new InputDriver(new ScriptedSource(['\x1b[200~abc']));
      expect(await driver.readInput()).toEqual([{ type: 'paste-start' }]);
      expect(await driver.readInput()).toEqual([
        { type: 'paste', text: 'abc' },
      ]);
      await expect(driver.readInput()).rejects.toBeInstanceOf(
        EndOfInputError,
      );
    });
  });

  it('should iterate over events until the end of input', async () => {
    const driver = new InputDriver(new ScriptedSource(['ab', '\x1b[B']));
    const events: InputEvent[] = [];
    for await (const event of driver) {
      events.push(event);
    }
    expect(events).toEqual([
      keyEvent({ runes: 'ab' }),
      keyEvent({ sym: 'down' }),
    ]);
  });

  it('should fail a pending read on cancel', async () => {
    const stream = new PassThrough();
    const driver = new InputDriver(new StreamByteSource(stream));
    const read = driver.readInput();
    expect(driver.cancel()).toBe(true);
    await expect(read).rejects.toBeInstanceOf(ReadCanceledError);
  });

  it('should close its source', () => {
    const source = new ScriptedSource([]);
    new InputDriver(source).close();
    expect(source.closed).toBe(true);
  });
});
