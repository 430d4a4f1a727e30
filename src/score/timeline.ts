import type { AnomalyDetector, GeneratorStateTable } from './generators';
import type { StatisticsCollector } from './statistics';
import type { Snapshot } from './types';

export class TimelineAccumulator {
  private now = 0;
  private lastEnd: number;
  private sawDelay = false;
  private eventsSinceDelay = 0;
  readonly snapshots: Snapshot[] = [];

  constructor(
    start: number,
    private readonly table: GeneratorStateTable,
    private readonly anomalies: AnomalyDetector,
    private readonly stats: StatisticsCollector,
  ) {
    this.lastEnd = start;
  }

  get time(): number { return this.now; }

  // Any note or instrument command breaks a run of delays.
  event(): void { this.eventsSinceDelay++; }

  // `end` is the cursor just past the delay command.
  delay(offset: number, ms: number, end: number): Snapshot {
    if (this.sawDelay && this.eventsSinceDelay === 0) {
      this.stats.consecutiveDelay();
      this.anomalies.record({ kind: 'mergeableConsecutiveDelays', offset });
    }
    const snap = this.emit(ms, end);
    this.now += ms;
    this.stats.elapsed(ms);
    this.table.endInterval();
    this.sawDelay = true;
    this.eventsSinceDelay = 0;
    return snap;
  }

  finish(end: number): Snapshot {
    return this.emit(0, end);
  }

  private emit(delay: number, end: number): Snapshot {
    const anomalies = this.anomalies.take();
    const snap: Snapshot = {
      time: this.now,
      delay,
      generators: this.table.capture(),
      start: this.lastEnd,
      end: Math.max(this.lastEnd, end),
      warning: anomalies.length > 0,
      anomalies,
    };
    this.lastEnd = snap.end;
    this.snapshots.push(snap);
    return snap;
  }
}
