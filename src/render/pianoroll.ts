import { PNG } from 'pngjs';
import type { DecodeResult } from '../score/decoder';

export interface PianoRollOptions {
  msPerPixel?: number; // default 10
  noteHeight?: number; // pixels per note row, default 2
  generators?: number; // how many generators to draw, default all 16
}

export const NOTE_ROWS = 256;
export const BACKGROUND: readonly [number, number, number] = [0, 0, 0];

// One colour per generator.
export const GENERATOR_COLORS: readonly (readonly [number, number, number])[] = [
  [0xff, 0x40, 0x40], [0x40, 0xc0, 0xff], [0x60, 0xff, 0x60], [0xff, 0xd0, 0x40],
  [0xd0, 0x60, 0xff], [0xff, 0x90, 0x30], [0x40, 0xff, 0xd0], [0xff, 0x70, 0xb0],
  [0xa0, 0xa0, 0xff], [0xc0, 0xff, 0x40], [0xff, 0xff, 0xa0], [0x30, 0x90, 0x90],
  [0x90, 0x50, 0x30], [0xa0, 0xa0, 0xa0], [0x60, 0x60, 0xd0], [0xff, 0xff, 0xff],
];

// x is time, y is note number with note 255 in the top row. Every snapshot
// paints the notes that sound for the delay that follows it; a later
// generator draws over an earlier one on the same row.
export function renderPianoRoll(result: DecodeResult, opts: PianoRollOptions = {}): PNG {
  const msPerPixel = Math.max(1, opts.msPerPixel ?? 10);
  const noteHeight = Math.max(1, (opts.noteHeight ?? 2) | 0);
  const generators = Math.max(1, Math.min(GENERATOR_COLORS.length, opts.generators ?? GENERATOR_COLORS.length));
  const total = result.statistics.totalTime;
  const width = Math.max(1, Math.ceil(total / msPerPixel));
  const height = NOTE_ROWS * noteHeight;
  const png = new PNG({ width, height });

  for (let i = 0; i < png.data.length; i += 4) {
    png.data[i] = BACKGROUND[0];
    png.data[i + 1] = BACKGROUND[1];
    png.data[i + 2] = BACKGROUND[2];
    png.data[i + 3] = 0xff;
  }

  for (const snap of result.snapshots) {
    if (snap.delay === 0) continue;
    const x0 = Math.floor(snap.time / msPerPixel);
    const x1 = Math.min(width, Math.floor((snap.time + snap.delay) / msPerPixel));
    for (let g = 0; g < generators; g++) {
      const note = snap.generators[g].note;
      if (note === undefined) continue;
      const [r, gr, b] = GENERATOR_COLORS[g];
      const y0 = (NOTE_ROWS - 1 - (note & 0xff)) * noteHeight;
      for (let y = y0; y < y0 + noteHeight; y++) {
        for (let x = x0; x < x1; x++) {
          const idx = (y * width + x) * 4;
          png.data[idx] = r;
          png.data[idx + 1] = gr;
          png.data[idx + 2] = b;
        }
      }
    }
  }
  return png;
}

export function encodePianoRoll(png: PNG): Buffer {
  return PNG.sync.write(png);
}
