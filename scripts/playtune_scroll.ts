#!/usr/bin/env tsx
/*
Decode a Playtune bytestream into a time-ordered scroll: one line per delay
showing what every tone generator is playing, and the bytes that got it there.

Usage:
  tsx scripts/playtune_scroll.ts <basename> [--gens=N] [--volume] [--ignoreVolume]
      [--instruments] [--percussion] [--hex] [--code] [--png[=file.png]] [--msPerPixel=N] [--trace]

Reads <basename>.bin. The scroll goes to stdout; --code writes an annotated C
array to <basename>.c instead, and --png also draws a piano roll.
Header flags in the file override --volume, --instruments and --percussion.
Environment: PLAYTUNE_GENS, PLAYTUNE_VOLUME, PLAYTUNE_INSTRUMENTS,
PLAYTUNE_PERCUSSION, PLAYTUNE_TRACE (flags win).
Exit codes: 0 ok, 1 I/O error, 2 usage error, 8 stream format error.
*/
import { EXIT_IO, runScroll } from '../src/cli.js';

try {
  process.exit(runScroll(process.argv.slice(2)));
} catch (e) {
  console.error(e);
  process.exit(EXIT_IO);
}
