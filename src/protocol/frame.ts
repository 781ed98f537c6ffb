/**
 * Wire framing shared by every service:
 *
 *   LEN(5 ASCII digits) TAG(5 ASCII chars, space padded) PAYLOAD(JSON)
 *
 * LEN is the UTF-8 byte length of TAG + PAYLOAD, zero padded to five digits.
 */

export const LEN_WIDTH = 5;
export const TAG_WIDTH = 5;
export const HEADER_BYTES = LEN_WIDTH + TAG_WIDTH;
export const MAX_BODY_BYTES = 99_999;

export type FrameErrorReason = 'too_short' | 'bad_length' | 'bad_tag' | 'bad_payload' | 'too_long';

export class FrameError extends Error {
  readonly reason: FrameErrorReason;

  constructor(reason: FrameErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FrameError';
    this.reason = reason;
  }
}

export interface Frame {
  /** Exactly TAG_WIDTH characters, padding included. */
  tag: string;
  payload: unknown;
}

const DIGITS_RE = /^\d{5}$/;
const ASCII_RE = /^[\x20-\x7e]*$/;

export function padTag(tag: string): string {
  return tag.padEnd(TAG_WIDTH, ' ').slice(0, TAG_WIDTH);
}

/** Service name carried by a tag, without padding. */
export function serviceOf(tag: string): string {
  return tag.trimEnd();
}

/**
 * Reads the LEN header. Throws `bad_length` when it is not five digits or
 * announces a body shorter than the tag.
 */
export function readLength(bytes: Buffer): number {
  const text = bytes.subarray(0, LEN_WIDTH).toString('latin1');
  if (!DIGITS_RE.test(text)) {
    throw new FrameError('bad_length', `Invalid length header: ${JSON.stringify(text)}`);
  }
  const length = Number(text);
  if (length < TAG_WIDTH) {
    throw new FrameError('bad_length', `Length ${length} is shorter than the tag`);
  }
  return length;
}

export function encode(tag: string, payload: unknown): Buffer {
  const padded = padTag(tag);
  if (!ASCII_RE.test(padded)) {
    throw new FrameError('bad_tag', `Tag must be printable ASCII: ${JSON.stringify(tag)}`);
  }

  const json = payload === undefined ? '' : JSON.stringify(payload);
  const body = Buffer.from(padded + json, 'utf8');
  if (body.length > MAX_BODY_BYTES) {
    throw new FrameError('too_long', `Frame body of ${body.length} bytes exceeds ${MAX_BODY_BYTES}`);
  }

  return Buffer.concat([Buffer.from(String(body.length).padStart(LEN_WIDTH, '0'), 'latin1'), body]);
}

/**
 * Decodes one frame from the start of `input`. Bytes past the announced
 * length are ignored. An empty payload decodes to `{}`.
 */
export function decode(input: Buffer | string): Frame {
  const bytes = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
  if (bytes.length < HEADER_BYTES) {
    throw new FrameError('too_short', `Frame needs at least ${HEADER_BYTES} bytes, got ${bytes.length}`);
  }

  const length = readLength(bytes);
  const total = LEN_WIDTH + length;
  if (bytes.length < total) {
    throw new FrameError('too_short', `Frame announces ${total} bytes, got ${bytes.length}`);
  }

  const tag = bytes.subarray(LEN_WIDTH, HEADER_BYTES).toString('latin1');
  const text = bytes.subarray(HEADER_BYTES, total).toString('utf8');
  if (text.trim().length === 0) {
    return { tag, payload: {} };
  }

  try {
    const payload: unknown = JSON.parse(text);
    return { tag, payload };
  } catch (err) {
    throw new FrameError('bad_payload', 'Payload is not valid JSON', { cause: err });
  }
}

/**
 * Splits a byte stream into complete frames. Chunks may end anywhere,
 * including inside the length header.
 */
export class FrameReader {
  private buffered: Buffer = Buffer.alloc(0);

  /** Bytes held back waiting for the rest of a frame. */
  get pending(): number {
    return this.buffered.length;
  }

  push(chunk: Buffer): Buffer[] {
    this.buffered = this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk]);

    const frames: Buffer[] = [];
    while (this.buffered.length >= LEN_WIDTH) {
      const total = LEN_WIDTH + readLength(this.buffered);
      if (this.buffered.length < total) break;
      frames.push(this.buffered.subarray(0, total));
      this.buffered = this.buffered.subarray(total);
    }
    return frames;
  }
}
