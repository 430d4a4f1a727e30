import { describe, it, expect } from 'vitest';
import { PNG } from 'pngjs';
import { decodeScore } from '../../src/score/decoder';
import { NOTE_ROWS, encodePianoRoll, renderPianoRoll } from '../../src/render/pianoroll';

const BASIC = new Uint8Array([0x00, 0x64, 0x90, 0x40, 0x01, 0x2c, 0x80, 0xf0]);

function pixel(png: PNG, x: number, y: number): number[] {
  const idx = (y * png.width + x) * 4;
  return Array.from(png.data.subarray(idx, idx + 4));
}

describe('Piano roll', () => {
  it('sizes the image from total time and note rows', () => {
    const png = renderPianoRoll(decodeScore(BASIC), { msPerPixel: 100, noteHeight: 1 });
    expect(png.width).toBe(4);
    expect(png.height).toBe(NOTE_ROWS);
  });

  it('paints a note for the time it sounds', () => {
    const png = renderPianoRoll(decodeScore(BASIC), { msPerPixel: 100, noteHeight: 1 });
    // note 0x40 sounds from 100 to 400ms on generator 0
    expect(pixel(png, 1, 191)).toEqual([0xff, 0x40, 0x40, 0xff]);
    expect(pixel(png, 3, 191)).toEqual([0xff, 0x40, 0x40, 0xff]);
    expect(pixel(png, 0, 191)).toEqual([0, 0, 0, 0xff]);
    expect(pixel(png, 1, 190)).toEqual([0, 0, 0, 0xff]);
  });

  it('skips generators beyond the requested count', () => {
    const buf = new Uint8Array([0x91, 0x40, 0x00, 0x64, 0xf0]);
    const png = renderPianoRoll(decodeScore(buf), { msPerPixel: 100, noteHeight: 1, generators: 1 });
    expect(pixel(png, 0, 191)).toEqual([0, 0, 0, 0xff]);
  });

  it('encodes a readable PNG', () => {
    const png = renderPianoRoll(decodeScore(BASIC), { msPerPixel: 100, noteHeight: 2 });
    const out = encodePianoRoll(png);
    expect(Array.from(out.subarray(0, 4))).toEqual([0x89, 0x50, 0x4e, 0x47]);
    const back = PNG.sync.read(out);
    expect(back.width).toBe(4);
    expect(back.height).toBe(NOTE_ROWS * 2);
  });
});
