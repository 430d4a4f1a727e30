import { CommandDecoder, describeCommand } from './commands';
import { StreamFormatError } from './errors';
import { AnomalyDetector, GeneratorStateTable } from './generators';
import { parseScoreHeader, resolveDecodeFlags, type CallerFlags, type ScoreHeader } from './header';
import { StatisticsCollector, type ScoreStatistics } from './statistics';
import { TimelineAccumulator } from './timeline';
import type { DecodeFlags, Snapshot } from './types';

export type DecodeErrorMode = 'record' | 'throw';

export interface DecodeOptions extends CallerFlags {
  onError?: DecodeErrorMode;
  trace?: boolean; // log every decoded command
}

export interface DecodeResult {
  header: ScoreHeader | null;
  streamStart: number;
  flags: DecodeFlags;
  snapshots: Snapshot[];
  statistics: ScoreStatistics;
  trailingBytes: number; // undecoded bytes after end-of-score
  error?: StreamFormatError;
}

function hex4(n: number): string { return (n >>> 0).toString(16).toUpperCase().padStart(4, '0'); }

function envFlag(name: string): boolean {
  const v = (process.env[name] ?? '').toLowerCase();
  return v === '1' || v === 'true';
}

// One forward pass over a fully-buffered score. Every call owns its own
// generator table, statistics and cursor.
export class ScoreDecoder {
  readonly header: ScoreHeader | null;
  readonly streamStart: number;
  readonly flags: DecodeFlags;
  private readonly onError: DecodeErrorMode;
  private readonly trace: boolean;
  private readonly stats: StatisticsCollector;
  private readonly anomalies = new AnomalyDetector();
  private readonly table: GeneratorStateTable;
  private readonly timeline: TimelineAccumulator;
  private readonly cursor: CommandDecoder;
  private trailingBytes = 0;
  private done = false;
  public lastError: StreamFormatError | undefined;

  constructor(private readonly buf: Uint8Array, opts: DecodeOptions = {}) {
    const { header, streamStart } = parseScoreHeader(buf);
    this.header = header;
    this.streamStart = streamStart;
    this.flags = resolveDecodeFlags(header, opts);
    this.onError = opts.onError ?? 'record';
    this.trace = opts.trace ?? envFlag('PLAYTUNE_TRACE');
    if (header && envFlag('PLAYTUNE_DEBUG')) {
      // eslint-disable-next-line no-console
      console.log(`[HEADER] len=${header.length} flags1=${header.flags1.toString(16).padStart(2, '0')} gens=${header.numGenerators}`);
    }
    this.stats = new StatisticsCollector(this.flags.displayGeneratorCount);
    this.table = new GeneratorStateTable(buf, this.stats, this.anomalies);
    this.timeline = new TimelineAccumulator(streamStart, this.table, this.anomalies, this.stats);
    this.cursor = new CommandDecoder(buf, streamStart, this.flags.expectVolume);
  }

  get finished(): boolean { return this.done; }

  get time(): number { return this.timeline.time; }

  get statistics(): ScoreStatistics { return this.stats.result(); }

  // Decodes and applies one command. Returns the snapshot it produced, if any.
  // A fatal stream error ends the pass and propagates.
  step(): Snapshot | null {
    if (this.done) return null;
    try {
      return this.apply();
    } catch (e) {
      this.done = true;
      if (e instanceof StreamFormatError) this.lastError = e;
      throw e;
    }
  }

  run(): DecodeResult {
    try {
      while (!this.done) this.step();
    } catch (e) {
      if (!(e instanceof StreamFormatError) || this.onError === 'throw') throw e;
    }
    return this.result();
  }

  private apply(): Snapshot | null {
    const cmd = this.cursor.next();
    if (cmd === null) {
      this.done = true;
      return this.timeline.finish(this.buf.length);
    }
    if (this.trace) {
      // eslint-disable-next-line no-console
      console.log(`[TRACE] ${hex4(cmd.offset)} t=${this.timeline.time} ${describeCommand(cmd)}`);
    }
    this.stats.command(cmd.width);
    switch (cmd.kind) {
      case 'delay':
        return this.timeline.delay(cmd.offset, cmd.ms, cmd.offset + cmd.width);
      case 'noteOn':
        this.timeline.event();
        this.table.noteOn(cmd.offset, cmd.generator, cmd.note, cmd.volume);
        return null;
      case 'noteOff':
        this.timeline.event();
        this.table.noteOff(cmd.offset, cmd.generator);
        return null;
      case 'instrument':
        this.timeline.event();
        this.table.instrument(cmd.generator, cmd.instrument);
        return null;
      case 'endOfScore': {
        const end = cmd.offset + cmd.width;
        this.done = true;
        this.stats.terminated();
        this.trailingBytes = this.buf.length - end;
        return this.timeline.finish(end);
      }
    }
  }

  result(): DecodeResult {
    const out: DecodeResult = {
      header: this.header,
      streamStart: this.streamStart,
      flags: this.flags,
      snapshots: this.timeline.snapshots.slice(),
      statistics: this.stats.result(),
      trailingBytes: this.trailingBytes,
    };
    if (this.lastError) out.error = this.lastError;
    return out;
  }
}

export function decodeScore(buf: Uint8Array, opts: DecodeOptions = {}): DecodeResult {
  return new ScoreDecoder(buf, opts).run();
}
