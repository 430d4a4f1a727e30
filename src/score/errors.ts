export const FAULT_CONTEXT_BYTES = 16;

export interface ByteWindow {
  start: number; // buffer offset of bytes[0]
  bytes: Uint8Array;
}

// Up to 16 bytes either side of the fault, clipped to the buffer.
export function faultWindow(buf: Uint8Array, offset: number): ByteWindow {
  const start = Math.max(0, offset - FAULT_CONTEXT_BYTES);
  const end = Math.min(buf.length, offset + FAULT_CONTEXT_BYTES + 1);
  return { start, bytes: buf.slice(start, Math.max(start, end)) };
}

export class StreamFormatError extends Error {
  readonly window: ByteWindow;

  constructor(message: string, public readonly offset: number, buf: Uint8Array) {
    super(message);
    this.name = new.target.name;
    this.window = faultWindow(buf, offset);
  }
}

export class TruncatedStreamError extends StreamFormatError {
  constructor(offset: number, public readonly needed: number, buf: Uint8Array) {
    super(`command needs ${needed} byte${needed === 1 ? '' : 's'} past end of stream`, offset, buf);
  }
}

export class UnknownCommandError extends StreamFormatError {
  constructor(offset: number, public readonly byte: number, buf: Uint8Array) {
    super(`unknown command 0x${byte.toString(16).padStart(2, '0')}`, offset, buf);
  }
}

export class NoteOffWithoutNoteOnError extends StreamFormatError {
  constructor(offset: number, public readonly generator: number, buf: Uint8Array) {
    super('tone generator not on', offset, buf);
  }
}
