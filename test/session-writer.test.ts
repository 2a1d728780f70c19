/**
 * @fileoverview Tests for SessionWriter and the GHCi newline protocol
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SessionWriter, normalizeNewlines } from '../src/session-writer.js';
import { WriteError } from '../src/errors.js';
import { RecordingStdin, settleStreams } from './mocks/index.js';

describe('normalizeNewlines', () => {
  it('should turn single line breaks into carriage returns', () => {
    expect(normalizeNewlines('a\nb')).toBe('a\rb');
  });

  it('should turn a blank line into a command terminator', () => {
    expect(normalizeNewlines('a\n\nb')).toBe('a\nb');
  });

  it('should leave single-line commands untouched', () => {
    expect(normalizeNewlines('d1 $ sound "bd"')).toBe('d1 $ sound "bd"');
  });

  it('should pair up runs of line breaks left to right', () => {
    expect(normalizeNewlines('a\n\n\nb')).toBe('a\n\rb');
  });

  it('should keep indentation of continuation lines', () => {
    expect(normalizeNewlines('d1 $ sound "bd*2"\n  # speed 2')).toBe('d1 $ sound "bd*2"\r  # speed 2');
  });
});

describe('SessionWriter', () => {
  let stdin: RecordingStdin;
  let onFault: ReturnType<typeof vi.fn>;
  let writer: SessionWriter;

  beforeEach(() => {
    stdin = new RecordingStdin();
    onFault = vi.fn();
    writer = new SessionWriter(stdin, onFault);
  });

  it('should write one terminated command per send', () => {
    expect(writer.send('d1 $ sound "bd"')).toBe(true);
    expect(writer.send('hush')).toBe(true);

    expect(stdin.writes).toEqual(['d1 $ sound "bd"\n', 'hush\n']);
  });

  it('should normalize multi-line fragments before writing', () => {
    writer.send('a\nb');
    writer.send('a\n\nb');

    expect(stdin.writes).toEqual(['a\rb\n', 'a\nb\n']);
  });

  it('should end a one-paragraph fragment with exactly one line feed', () => {
    writer.send('d1 $ stack [\n  sound "bd",\n  sound "hh*4"\n]');

    const [payload] = stdin.writes;
    expect(payload).toBe('d1 $ stack [\r  sound "bd",\r  sound "hh*4"\r]\n');
    expect(payload.split('\n')).toHaveLength(2);
  });

  it('should report a failed write once without throwing', async () => {
    stdin.failWith = new Error('write EPIPE');

    expect(() => writer.send('d1 $ silence')).not.toThrow();
    await settleStreams();

    expect(onFault).toHaveBeenCalledTimes(1);
    const fault = onFault.mock.calls[0][0];
    expect(fault).toBeInstanceOf(WriteError);
    expect(fault.message).toBe('Write to ghci failed: write EPIPE');
  });

  it('should report sends after the stream broke', async () => {
    stdin.failWith = new Error('write EPIPE');
    writer.send('first');
    await settleStreams();
    onFault.mockClear();

    expect(writer.isClosed).toBe(true);
    expect(writer.send('second')).toBe(false);
    expect(onFault).toHaveBeenCalledTimes(1);
    expect(onFault.mock.calls[0][0].message).toBe('Write to ghci failed: stdin is closed');
  });

  it('should report a synchronous write exception', () => {
    vi.spyOn(stdin, 'write').mockImplementation(() => {
      throw new Error('boom');
    });

    expect(writer.send('hush')).toBe(false);
    expect(onFault).toHaveBeenCalledTimes(1);
    expect(onFault.mock.calls[0][0].message).toBe('Write to ghci failed: boom');
  });

  it('should refuse to write after close', () => {
    writer.close();

    expect(writer.isClosed).toBe(true);
    expect(writer.send('hush')).toBe(false);
    expect(stdin.writes).toEqual([]);
    expect(onFault.mock.calls[0][0].message).toBe('Write to ghci failed: stdin is closed');
  });

  it('should log rather than report a pending write that fails after close', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    stdin.failWith = new Error('write EPIPE');

    expect(writer.send('hush')).toBe(true);
    writer.close();
    await settleStreams();

    expect(onFault).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[SessionWriter] Ignoring stdin error after close:', 'write EPIPE');
  });

  it('should end the stream only once', () => {
    const end = vi.spyOn(stdin, 'end');

    writer.close();
    writer.close();

    expect(end).toHaveBeenCalledTimes(1);
  });

  it('should close an already destroyed stream without throwing', () => {
    stdin.destroy();

    expect(() => writer.close()).not.toThrow();
  });

  it('should contain a throwing fault handler', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    onFault.mockImplementation(() => {
      throw new Error('handler broken');
    });
    writer.close();

    expect(() => writer.send('hush')).not.toThrow();
    expect(error).toHaveBeenCalledWith('[SessionWriter] Fault handler threw:', expect.any(Error));
  });
});
