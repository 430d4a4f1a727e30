import type { DecodeResult } from '../score/decoder';
import type { StreamFormatError } from '../score/errors';
import { countGeneratorsUsed } from '../score/statistics';
import { MAX_GENERATORS, type Snapshot } from '../score/types';
import { instrumentName, noteName } from './names';

export interface ScrollOptions {
  generators: number; // columns to show
  showVolume: boolean;
  showInstruments: boolean; // mark instrument changes next to each note
  hex: boolean; // notes as hex instead of names
  code: boolean; // wrap the text in C comments, bytes as 0xNN,
  percussionOffset: number;
}

export function scrollOptionsFor(result: DecodeResult, overrides: Partial<ScrollOptions> = {}): ScrollOptions {
  return {
    generators: Math.max(1, Math.min(MAX_GENERATORS, overrides.generators ?? result.flags.displayGeneratorCount)),
    showVolume: overrides.showVolume ?? result.flags.expectVolume,
    showInstruments: overrides.showInstruments ?? result.flags.expectInstruments,
    hex: overrides.hex ?? false,
    code: overrides.code ?? false,
    percussionOffset: overrides.percussionOffset ?? result.flags.percussionOffset,
  };
}

export function hex2(n: number): string { return (n & 0xff).toString(16).toUpperCase().padStart(2, '0'); }
export function hex4(n: number): string { return (n >>> 0).toString(16).toUpperCase().padStart(4, '0'); }

export function formatBytes(buf: Uint8Array, start: number, end: number, code: boolean): string {
  let out = '';
  for (let i = start; i < end && i < buf.length; i++) out += code ? `0x${hex2(buf[i])},` : `${hex2(buf[i])} `;
  return out;
}

export function titleLine(opts: ScrollOptions): string {
  let line = opts.code ? '//' : '';
  line += 'duration    time   ';
  for (let g = 0; g < opts.generators; g++) {
    line += opts.showVolume ? `   gen${String(g).padEnd(5)}` : ` gen${String(g).padEnd(2)}`;
    if (opts.showInstruments) line += '     ';
  }
  return line + '        bytestream code';
}

function formatTime(ms: number): string {
  return `${String(Math.floor(ms / 1000)).padStart(7)}.${String(ms % 1000).padStart(3, '0')}`;
}

// `end` overrides the snapshot's range end, so source output can leave off
// the end-of-score byte.
export function snapshotLine(buf: Uint8Array, snap: Snapshot, opts: ScrollOptions, end = snap.end): string {
  let line = opts.code ? '/*' : '';
  line += `${String(snap.delay).padStart(5)} ${formatTime(snap.time)}${snap.warning ? '*' : ' '}`;
  for (let g = 0; g < opts.generators; g++) {
    const gen = snap.generators[g];
    const note = gen.note;
    line += (note === undefined ? '' : noteName(note, opts.percussionOffset, opts.hex)).padStart(6);
    if (opts.showVolume) {
      line += note === undefined ? '     ' : ` v${String(gen.volume ?? 0).padEnd(3)}`;
    }
    if (opts.showInstruments) {
      line += gen.instrumentChanged && gen.instrument !== undefined ? ` i${String(gen.instrument).padEnd(3)}` : '     ';
    }
  }
  line += `   ${hex4(snap.start)}: `;
  if (opts.code) line += '*/ ';
  return line + formatBytes(buf, snap.start, end, opts.code);
}

export function formatFault(err: StreamFormatError): string[] {
  const head = `---> file format error at position ${hex4(err.offset)} (${err.offset}): ${err.message}`;
  let bytes = '';
  err.window.bytes.forEach((b, i) => {
    bytes += err.window.start + i === err.offset ? ` [${hex2(b)}]  ` : `${hex2(b)} `;
  });
  return [head, bytes];
}

export function summaryLines(result: DecodeResult, opts: ScrollOptions): string[] {
  const s = result.statistics;
  const lines = [`At most ${s.maxGeneratorIndex + 1} tone generators were used.`];
  if (countGeneratorsUsed(s) !== s.maxGeneratorIndex + 1) {
    lines.push(`${countGeneratorsUsed(s)} distinct tone generators played notes.`);
  }
  if (s.notesSkipped) {
    lines.push(`${s.notesSkipped} notes were not displayed because we were told to show only ${opts.generators} generators.`);
  }
  if (s.stopnotesBeforeStartnote) {
    lines.push(`${s.stopnotesBeforeStartnote} stopnote commands were immediately followed by a startnote on the same generator.`);
  }
  if (s.consecutiveDelays) {
    lines.push(`${s.consecutiveDelays} delay commands directly followed another delay and could have been merged.`);
  }
  if (result.flags.expectVolume && s.minVolume !== undefined && s.maxVolume !== undefined) {
    lines.push(`Volumes ranged from ${s.minVolume} to ${s.maxVolume}.`);
  }
  if (s.anyInstrumentSeen) {
    lines.push('Instruments used:');
    s.instrumentUseCount.forEach((count, i) => {
      if (count > 0) lines.push(`  ${String(i).padStart(3)} ${instrumentName(i)}: ${count} note${count === 1 ? '' : 's'}`);
    });
  }
  if (result.trailingBytes > 0) {
    lines.push(`${result.trailingBytes} bytes after the end of the score were ignored.`);
  }
  return lines;
}

export function renderScroll(buf: Uint8Array, result: DecodeResult, opts: ScrollOptions = scrollOptionsFor(result)): string[] {
  const lines = ['', titleLine(opts), ''];
  for (const snap of result.snapshots) lines.push(snapshotLine(buf, snap, opts));
  // a failed pass has no meaningful summary; the fault is reported separately
  if (!result.error) lines.push('', ...summaryLines(result, opts));
  return lines;
}
