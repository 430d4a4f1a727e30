import type { DecodeOptions } from './score/decoder';
import type { ScrollOptions } from './render/scroll';
import { MAX_GENERATORS, PERCUSSION_OFFSET } from './score/types';

export type ArgValue = string | number | boolean;

export interface ParsedArgs {
  flags: Record<string, ArgValue>;
  positional: string[];
}

export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, ArgValue> = {};
  const positional: string[] = [];
  for (const a of argv) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) {
      const k = m[1];
      let v: ArgValue = m[2];
      if (/^\d+$/.test(v)) v = Number(v);
      flags[k] = v;
    } else if (a.startsWith('--')) flags[a.slice(2)] = true;
    else positional.push(a);
  }
  return { flags, positional };
}

export class ConfigError extends Error {}

export interface ScrollConfig {
  base: string; // input is <base>.bin
  decode: DecodeOptions;
  scroll: Partial<ScrollOptions>;
  code: boolean;
  png?: string; // output path
  msPerPixel?: number;
}

type Env = Record<string, string | undefined>;

function truthy(v: ArgValue | string | undefined): boolean | undefined {
  if (v === undefined) return undefined;
  if (typeof v === 'boolean') return v;
  const s = String(v).toLowerCase();
  return s === '1' || s === 'true' || s === 'yes';
}

function generatorCount(v: ArgValue | string | undefined): number | undefined {
  if (v === undefined) return undefined;
  if (typeof v === 'boolean') throw new ConfigError('--gens needs a value, e.g. --gens=4');
  const n = Number(v);
  if (!Number.isInteger(n) || n < 1 || n > MAX_GENERATORS) {
    throw new ConfigError(`generator count must be 1..${MAX_GENERATORS}, got ${String(v)}`);
  }
  return n;
}

// Command-line flags win over PLAYTUNE_* environment variables.
export function resolveScrollConfig(argv: string[], env: Env = process.env): ScrollConfig {
  const { flags, positional } = parseArgs(argv);
  const base = positional[0];
  if (!base) throw new ConfigError('missing input base file name');

  const ignoreVolume = truthy(flags.ignoreVolume) ?? false;
  const expectVolume = ignoreVolume || (truthy(flags.volume) ?? truthy(env.PLAYTUNE_VOLUME));
  const expectInstruments = truthy(flags.instruments) ?? truthy(env.PLAYTUNE_INSTRUMENTS);
  const percussion = truthy(flags.percussion) ?? truthy(env.PLAYTUNE_PERCUSSION);
  const gens = generatorCount(flags.gens ?? env.PLAYTUNE_GENS);
  const trace = truthy(flags.trace) ?? truthy(env.PLAYTUNE_TRACE);

  const decode: DecodeOptions = {};
  if (expectVolume !== undefined) decode.expectVolume = expectVolume;
  if (expectInstruments !== undefined) decode.expectInstruments = expectInstruments;
  if (percussion !== undefined) decode.percussionOffset = percussion ? PERCUSSION_OFFSET : 0;
  if (gens !== undefined) decode.displayGeneratorCount = gens;
  if (trace !== undefined) decode.trace = trace;

  const scroll: Partial<ScrollOptions> = {};
  if (ignoreVolume) scroll.showVolume = false;
  if (truthy(flags.hex)) scroll.hex = true;

  const config: ScrollConfig = { base, decode, scroll, code: truthy(flags.code) ?? false };
  const png = flags.png;
  if (png !== undefined && png !== false) config.png = png === true ? `${base}.png` : String(png);
  if (flags.msPerPixel !== undefined) {
    const ms = Number(flags.msPerPixel);
    if (!Number.isFinite(ms) || ms <= 0) throw new ConfigError(`--msPerPixel must be positive, got ${String(flags.msPerPixel)}`);
    config.msPerPixel = ms;
  }
  return config;
}
