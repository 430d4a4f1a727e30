import fs from 'fs';
import path from 'path';
import { ConfigError, resolveScrollConfig, type ScrollConfig } from './config';
import { decodeScore } from './score/decoder';
import { encodePianoRoll, renderPianoRoll } from './render/pianoroll';
import { formatFault, renderScroll, scrollOptionsFor } from './render/scroll';
import { renderSource, VERSION } from './render/source';

export const EXIT_OK = 0;
export const EXIT_IO = 1;
export const EXIT_USAGE = 2;
export const EXIT_FORMAT = 8;

export const USAGE =
  'Usage: tsx scripts/playtune_scroll.ts <basename> [--gens=N] [--volume] [--ignoreVolume] [--instruments] [--percussion] [--hex] [--code] [--png[=file]] [--msPerPixel=N]';

// File access and output for one run; tests swap in an in-memory version.
export interface ScrollIO {
  readFile(file: string): Uint8Array;
  writeFile(file: string, data: string | Uint8Array): void;
  out(line: string): void;
  err(line: string): void;
}

export const nodeIO: ScrollIO = {
  readFile: (file) => new Uint8Array(fs.readFileSync(file)),
  writeFile: (file, data) => fs.writeFileSync(file, data),
  // eslint-disable-next-line no-console
  out: (line) => console.log(line),
  // eslint-disable-next-line no-console
  err: (line) => console.error(line),
};

function message(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// Runs the scroll tool once and returns its exit code.
export function runScroll(
  argv: string[],
  io: ScrollIO = nodeIO,
  env: Record<string, string | undefined> = process.env,
): number {
  io.out(`PLAYTUNE_SCROLL V${VERSION}`);
  let config: ScrollConfig;
  try {
    config = resolveScrollConfig(argv, env);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    io.err(e.message);
    io.err(USAGE);
    return EXIT_USAGE;
  }

  const inPath = path.resolve(`${config.base}.bin`);
  let buf: Uint8Array;
  try {
    buf = io.readFile(inPath);
  } catch (e) {
    io.err(`Unable to open input file ${inPath}: ${message(e)}`);
    return EXIT_IO;
  }
  io.out(`Processing ${config.base}.bin, ${buf.length} bytes`);

  const result = decodeScore(buf, config.decode);
  if (result.header) {
    io.out(`Header: ${result.header.length} bytes, ${result.header.numGenerators} generators declared`);
  }
  const scroll = scrollOptionsFor(result, config.scroll);

  try {
    if (config.code) {
      if (!result.error) {
        const outPath = path.resolve(`${config.base}.c`);
        io.writeFile(outPath, renderSource(buf, result, { name: config.base, scroll }).join('\n') + '\n');
        io.out(`Wrote ${outPath}`);
      }
    } else {
      for (const line of renderScroll(buf, result, scroll)) io.out(line);
    }

    if (result.error) {
      for (const line of formatFault(result.error)) io.err(line);
      return EXIT_FORMAT;
    }

    if (config.png) {
      const png = renderPianoRoll(result, { msPerPixel: config.msPerPixel });
      io.writeFile(path.resolve(config.png), encodePianoRoll(png));
      io.out(`Wrote ${config.png} (${png.width}x${png.height})`);
    }
  } catch (e) {
    io.err(`Unable to write output: ${message(e)}`);
    return EXIT_IO;
  }
  io.out('Done.');
  return EXIT_OK;
}
