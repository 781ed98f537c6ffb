import { describe, it, expect } from 'vitest';
import { FrameError, FrameReader, decode, encode, padTag, serviceOf } from '../protocol/frame.js';

function reasonOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof FrameError) return err.reason;
    throw err;
  }
  return undefined;
}

describe('Frame codec', () => {
  it('encodes length, padded tag and JSON payload', () => {
    expect(encode('book', { a: 1 }).toString('utf8')).toBe('00012book {"a":1}');
  });

  it('decodes what it encodes', () => {
    const frame = decode(encode('incid', { space: 3, tipo: 'averia' }));
    expect(frame.tag).toBe('incid');
    expect(frame.payload).toEqual({ space: 3, tipo: 'averia' });
  });

  it('counts UTF-8 bytes in the length header', () => {
    const bytes = encode('book', { m: 'ñ' });
    expect(bytes.subarray(0, 5).toString('latin1')).toBe('00015');
    expect(decode(bytes).payload).toEqual({ m: 'ñ' });
  });

  it('truncates long tags to five characters', () => {
    expect(padTag('reservas')).toBe('reser');
    expect(encode('reservas', {}).toString('utf8')).toBe('00007reser{}');
  });

  it('keeps tag padding on decode and strips it with serviceOf', () => {
    const frame = decode('00007book {}');
    expect(frame.tag).toBe('book ');
    expect(serviceOf(frame.tag)).toBe('book');
  });

  it('rejects anything shorter than the header', () => {
    expect(reasonOf(() => decode('00005book'))).toBe('too_short');
    expect(reasonOf(() => decode(''))).toBe('too_short');
  });

  it('rejects a body shorter than announced', () => {
    expect(reasonOf(() => decode('00020book {}'))).toBe('too_short');
  });

  it('rejects a non-numeric or undersized length', () => {
    expect(reasonOf(() => decode('abcdebook {}'))).toBe('bad_length');
    expect(reasonOf(() => decode('00003book {}'))).toBe('bad_length');
  });

  it('treats an empty or blank payload as an empty object', () => {
    expect(decode('00005book ').payload).toEqual({});
    expect(decode('00007book   ').payload).toEqual({});
  });

  it('rejects malformed JSON', () => {
    expect(reasonOf(() => decode('00008book {x}'))).toBe('bad_payload');
  });

  it('ignores bytes past the announced length', () => {
    expect(decode('00007book {}trailing').payload).toEqual({});
  });

  it('refuses non-ASCII tags and oversized bodies', () => {
    expect(reasonOf(() => encode('bóok', {}))).toBe('bad_tag');
    expect(reasonOf(() => encode('book', 'x'.repeat(99_999)))).toBe('too_long');
  });
});

describe('FrameReader', () => {
  it('reassembles frames split at arbitrary points', () => {
    const stream = Buffer.concat([encode('avail', { fecha: '2030-03-04' }), encode('avail', {})]);
    const reader = new FrameReader();

    const frames: Buffer[] = [];
    frames.push(...reader.push(stream.subarray(0, 3)));
    frames.push(...reader.push(stream.subarray(3, 14)));
    expect(frames).toHaveLength(0);
    frames.push(...reader.push(stream.subarray(14)));

    expect(frames.map((f) => decode(f).payload)).toEqual([{ fecha: '2030-03-04' }, {}]);
    expect(reader.pending).toBe(0);
  });

  it('holds back a partial frame', () => {
    const reader = new FrameReader();
    const frames = reader.push(Buffer.from('00007book {}00007bo'));
    expect(frames).toHaveLength(1);
    expect(reader.pending).toBe(7);
  });

  it('throws bad_length once a header is readable and invalid', () => {
    const reader = new FrameReader();
    expect(reader.push(Buffer.from('12'))).toEqual([]);
    expect(reasonOf(() => reader.push(Buffer.from('x4book {}')))).toBe('bad_length');
  });
});
