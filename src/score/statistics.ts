export const INSTRUMENT_COUNT = 128;

export interface ScoreStatistics {
  maxGeneratorIndex: number; // -1 until a note is started
  notesSkipped: number; // notes on generators beyond the display count
  stopnotesBeforeStartnote: number;
  consecutiveDelays: number;
  instrumentUseCount: number[];
  minVolume?: number;
  maxVolume?: number;
  anyInstrumentSeen: boolean;
  toneGeneratorsUsed: number; // bitmap, bit g set once generator g plays a note
  noteOnCount: number;
  commandCount: number;
  totalTime: number; // ms
  bytesConsumed: number;
  terminated: boolean; // reached an end-of-score byte
}

export function countBits(bitmap: number): number {
  let count = 0;
  for (let b = bitmap >>> 0; b; b >>>= 1) count += b & 1;
  return count;
}

export function countGeneratorsUsed(stats: ScoreStatistics): number {
  return countBits(stats.toneGeneratorsUsed);
}

// Additive only: every method folds one observation into the running totals.
export class StatisticsCollector {
  private readonly s: ScoreStatistics = {
    maxGeneratorIndex: -1,
    notesSkipped: 0,
    stopnotesBeforeStartnote: 0,
    consecutiveDelays: 0,
    instrumentUseCount: new Array<number>(INSTRUMENT_COUNT).fill(0),
    anyInstrumentSeen: false,
    toneGeneratorsUsed: 0,
    noteOnCount: 0,
    commandCount: 0,
    totalTime: 0,
    bytesConsumed: 0,
    terminated: false,
  };

  constructor(private readonly displayGeneratorCount: number) {}

  command(width: number): void {
    this.s.commandCount++;
    this.s.bytesConsumed += width;
  }

  noteOn(generator: number, volume: number | undefined, instrument: number | undefined): void {
    this.s.noteOnCount++;
    if (generator > this.s.maxGeneratorIndex) this.s.maxGeneratorIndex = generator;
    this.s.toneGeneratorsUsed |= 1 << generator;
    if (generator >= this.displayGeneratorCount) this.s.notesSkipped++;
    if (instrument !== undefined) this.s.instrumentUseCount[instrument & 0x7f]++;
    if (volume !== undefined) {
      if (this.s.minVolume === undefined || volume < this.s.minVolume) this.s.minVolume = volume;
      if (this.s.maxVolume === undefined || volume > this.s.maxVolume) this.s.maxVolume = volume;
    }
  }

  instrumentSeen(): void { this.s.anyInstrumentSeen = true; }

  redundantStopNote(): void { this.s.stopnotesBeforeStartnote++; }

  consecutiveDelay(): void { this.s.consecutiveDelays++; }

  elapsed(ms: number): void { this.s.totalTime += ms; }

  terminated(): void { this.s.terminated = true; }

  result(): ScoreStatistics {
    return { ...this.s, instrumentUseCount: this.s.instrumentUseCount.slice() };
  }
}
