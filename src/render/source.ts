import type { DecodeResult } from '../score/decoder';
import { countGeneratorsUsed } from '../score/statistics';
import { formatBytes, scrollOptionsFor, snapshotLine, titleLine, type ScrollOptions } from './scroll';

export const VERSION = '2.0';

export interface SourceOptions {
  name: string; // base file name, without .bin
  date?: Date;
  scroll?: Partial<ScrollOptions>;
}

// Annotated C array holding the same bytes as the input, one snapshot per
// line with the scroll columns in a leading comment.
export function renderSource(buf: Uint8Array, result: DecodeResult, opts: SourceOptions): string[] {
  const scroll = scrollOptionsFor(result, { ...opts.scroll, code: true });
  const date = (opts.date ?? new Date()).toUTCString();
  const lines = [
    `// Playtune bytestream for file "${opts.name}.bin" created by PLAYTUNE_SCROLL V${VERSION} on ${date}`,
    'const unsigned char PROGMEM score [] = {',
    '',
    titleLine(scroll),
    '',
  ];
  if (result.header) {
    lines.push(`/* header */ ${formatBytes(buf, 0, result.streamStart, true)}`);
  }
  const terminated = result.statistics.terminated;
  const last = result.snapshots.length - 1;
  result.snapshots.forEach((snap, i) => {
    // the closing 0xf0 is written below, without a trailing comma
    const end = i === last && terminated ? snap.end - 1 : snap.end;
    lines.push(snapshotLine(buf, snap, scroll, end));
  });
  if (terminated) {
    lines.push(' 0xf0};');
  } else {
    const at = lines.map((l) => l.endsWith(',')).lastIndexOf(true);
    if (at >= 0) lines[at] = lines[at].slice(0, -1);
    lines.push('};');
  }
  const emitted = buf.length - result.trailingBytes;
  const used = countGeneratorsUsed(result.statistics);
  lines.push(`// This score contains ${emitted} bytes, and ${used} tone generator${used === 1 ? ' is' : 's are'} used.`);
  if (result.trailingBytes > 0) {
    lines.push(`// ${result.trailingBytes} bytes after the end of the score were left out.`);
  }
  return lines;
}
