import {
  DEFAULT_DISPLAY_GENERATORS,
  type DecodeFlags,
  MAX_GENERATORS,
  PERCUSSION_OFFSET,
} from './types';

export const HEADER_MAGIC = [0x50, 0x74] as const; // 'P','t'
export const MIN_HEADER_LENGTH = 6;

export const HeaderFlag = {
  VOLUME: 0x80,
  INSTRUMENTS: 0x40,
  PERCUSSION: 0x20,
} as const;

export interface ScoreHeader {
  length: number; // bytes to skip before the command stream
  flags1: number;
  flags2: number; // reserved
  numGenerators: number;
  hasVolume: boolean;
  hasInstruments: boolean;
  hasPercussion: boolean;
}

export interface ParsedScoreHeader {
  header: ScoreHeader | null;
  streamStart: number;
}

// An unrecognised prefix is not an error: it just means there is no header
// and the command stream starts at offset 0.
export function parseScoreHeader(buf: Uint8Array): ParsedScoreHeader {
  if (buf.length < MIN_HEADER_LENGTH) return { header: null, streamStart: 0 };
  if (buf[0] !== HEADER_MAGIC[0] || buf[1] !== HEADER_MAGIC[1]) return { header: null, streamStart: 0 };
  const length = buf[2];
  if (length < MIN_HEADER_LENGTH || length > buf.length) return { header: null, streamStart: 0 };
  const flags1 = buf[3];
  const header: ScoreHeader = {
    length,
    flags1,
    flags2: buf[4],
    numGenerators: buf[5],
    hasVolume: (flags1 & HeaderFlag.VOLUME) !== 0,
    hasInstruments: (flags1 & HeaderFlag.INSTRUMENTS) !== 0,
    hasPercussion: (flags1 & HeaderFlag.PERCUSSION) !== 0,
  };
  return { header, streamStart: length };
}

export interface CallerFlags {
  expectVolume?: boolean;
  expectInstruments?: boolean;
  percussionOffset?: number;
  displayGeneratorCount?: number;
}

function clampGenerators(n: number): number {
  return Math.max(1, Math.min(MAX_GENERATORS, n | 0));
}

// Header flags win over whatever the caller asked for; the display count is
// the caller's to choose and only defaults to what the encoder declared.
export function resolveDecodeFlags(header: ScoreHeader | null, caller: CallerFlags = {}): DecodeFlags {
  const display = caller.displayGeneratorCount ?? (header && header.numGenerators > 0 ? header.numGenerators : DEFAULT_DISPLAY_GENERATORS);
  if (header) {
    return {
      expectVolume: header.hasVolume,
      expectInstruments: header.hasInstruments,
      percussionOffset: header.hasPercussion ? PERCUSSION_OFFSET : 0,
      displayGeneratorCount: clampGenerators(display),
    };
  }
  return {
    expectVolume: caller.expectVolume ?? false,
    expectInstruments: caller.expectInstruments ?? false,
    percussionOffset: caller.percussionOffset ?? 0,
    displayGeneratorCount: clampGenerators(display),
  };
}
