import { NoteOffWithoutNoteOnError } from './errors';
import type { StatisticsCollector } from './statistics';
import { MAX_GENERATORS, type Anomaly, type Byte, type GeneratorState } from './types';

// Collects the non-fatal anomalies seen since the last snapshot. They never
// stop the pass; the snapshot that takes them is flagged as a warning.
export class AnomalyDetector {
  private pending: Anomaly[] = [];

  record(anomaly: Anomaly): void { this.pending.push(anomaly); }

  get hasPending(): boolean { return this.pending.length > 0; }

  take(): Anomaly[] {
    const out = this.pending;
    this.pending = [];
    return out;
  }
}

function silentGenerator(): GeneratorState {
  return { instrumentChanged: false, justStopped: false };
}

export class GeneratorStateTable {
  private readonly gens: GeneratorState[] = Array.from({ length: MAX_GENERATORS }, silentGenerator);

  constructor(
    private readonly buf: Uint8Array,
    private readonly stats: StatisticsCollector,
    private readonly anomalies: AnomalyDetector,
  ) {}

  get(generator: number): Readonly<GeneratorState> {
    return this.gens[generator & 0x0f];
  }

  noteOn(offset: number, generator: number, note: Byte, volume?: Byte): void {
    const g = this.gens[generator & 0x0f];
    if (g.justStopped) {
      // stopped and restarted with no time in between: the stop was redundant
      this.stats.redundantStopNote();
      this.anomalies.record({ kind: 'redundantStopNote', offset, generator });
    }
    g.note = note & 0xff;
    g.justStopped = false;
    if (volume !== undefined) g.volume = volume & 0xff;
    this.stats.noteOn(generator & 0x0f, volume, g.instrument);
  }

  noteOff(offset: number, generator: number): void {
    const g = this.gens[generator & 0x0f];
    if (g.note === undefined) throw new NoteOffWithoutNoteOnError(offset, generator & 0x0f, this.buf);
    g.note = undefined;
    g.justStopped = true;
  }

  instrument(generator: number, instrument: number): void {
    const g = this.gens[generator & 0x0f];
    g.instrument = instrument & 0x7f;
    g.instrumentChanged = true;
    this.stats.instrumentSeen();
  }

  // Copy of all generators as they stand; instrument-change marks restart.
  capture(): GeneratorState[] {
    const copy = this.gens.map((g) => ({ ...g }));
    for (const g of this.gens) g.instrumentChanged = false;
    return copy;
  }

  // A delay boundary: stops before this point are no longer redundant.
  endInterval(): void {
    for (const g of this.gens) g.justStopped = false;
  }
}
