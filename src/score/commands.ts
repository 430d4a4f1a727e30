import { TruncatedStreamError, UnknownCommandError } from './errors';
import type { Command } from './types';

export const Op = {
  NOTE_OFF: 0x80,
  NOTE_ON: 0x90,
  INSTRUMENT: 0xc0,
  REPEAT: 0xe0, // reserved, never decoded
  END_OF_SCORE: 0xf0,
} as const;

// Reads one command at a time from an immutable buffer. The only state is the
// cursor; nothing is ever read at or past buf.length.
export class CommandDecoder {
  private pos: number;

  constructor(private readonly buf: Uint8Array, start = 0, private readonly expectVolume = false) {
    this.pos = Math.max(0, Math.min(buf.length, start | 0));
  }

  get offset(): number { return this.pos; }

  atEnd(): boolean { return this.pos >= this.buf.length; }

  // Returns null once the buffer is exhausted. End-of-score is returned as a
  // command but the cursor stays on it, so subsequent calls return it again.
  next(): Command | null {
    if (this.atEnd()) return null;
    const cmd = decodeCommand(this.buf, this.pos, this.expectVolume);
    if (cmd.kind !== 'endOfScore') this.pos += cmd.width;
    return cmd;
  }
}

function operand(buf: Uint8Array, offset: number, index: number, width: number): number {
  const at = offset + index;
  if (at >= buf.length) throw new TruncatedStreamError(offset, offset + width - buf.length, buf);
  return buf[at];
}

export function decodeCommand(buf: Uint8Array, offset: number, expectVolume: boolean): Command {
  if (offset < 0 || offset >= buf.length) throw new TruncatedStreamError(offset, 1, buf);
  const b = buf[offset];
  if (b < 0x80) {
    const lo = operand(buf, offset, 1, 2);
    return { kind: 'delay', offset, width: 2, ms: (b << 8) | lo };
  }
  if (b === Op.END_OF_SCORE) return { kind: 'endOfScore', offset, width: 1 };

  const generator = b & 0x0f;
  switch (b & 0xf0) {
    case Op.NOTE_ON: {
      const width = expectVolume ? 3 : 2;
      const note = operand(buf, offset, 1, width);
      if (!expectVolume) return { kind: 'noteOn', offset, width, generator, note };
      const volume = operand(buf, offset, 2, width);
      return { kind: 'noteOn', offset, width, generator, note, volume };
    }
    case Op.NOTE_OFF:
      return { kind: 'noteOff', offset, width: 1, generator };
    case Op.INSTRUMENT: {
      const instrument = operand(buf, offset, 1, 2) & 0x7f;
      return { kind: 'instrument', offset, width: 2, generator, instrument };
    }
    default:
      // 0xE0 (repeat) lands here along with every other unassigned opcode
      throw new UnknownCommandError(offset, b, buf);
  }
}

export function describeCommand(cmd: Command): string {
  switch (cmd.kind) {
    case 'delay': return `delay ${cmd.ms}ms`;
    case 'noteOn': return `noteOn gen${cmd.generator} note=${cmd.note}${cmd.volume !== undefined ? ` vol=${cmd.volume}` : ''}`;
    case 'noteOff': return `noteOff gen${cmd.generator}`;
    case 'instrument': return `instrument gen${cmd.generator} ${cmd.instrument}`;
    case 'endOfScore': return 'endOfScore';
  }
}
