import { describe, it, expect } from 'vitest';
import { AnomalyDetector, GeneratorStateTable } from '../../src/score/generators';
import { StatisticsCollector } from '../../src/score/statistics';
import { TimelineAccumulator } from '../../src/score/timeline';

function mkTimeline(start = 0) {
  const stats = new StatisticsCollector(6);
  const anomalies = new AnomalyDetector();
  const table = new GeneratorStateTable(new Uint8Array(64), stats, anomalies);
  const timeline = new TimelineAccumulator(start, table, anomalies, stats);
  return { stats, table, timeline };
}

describe('Timeline accumulator', () => {
  it('snapshots the time before the delay, then advances', () => {
    const { timeline, stats } = mkTimeline();
    const a = timeline.delay(0, 100, 2);
    expect(a.time).toBe(0);
    expect(a.delay).toBe(100);
    expect(timeline.time).toBe(100);
    const b = timeline.delay(2, 250, 4);
    expect(b.time).toBe(100);
    expect(timeline.time).toBe(350);
    expect(stats.result().totalTime).toBe(350);
  });

  it('tracks byte ranges between snapshots', () => {
    const { timeline } = mkTimeline(6);
    const a = timeline.delay(6, 10, 8);
    timeline.event();
    const b = timeline.delay(10, 10, 12);
    const c = timeline.finish(13);
    expect([a.start, a.end]).toEqual([6, 8]);
    expect([b.start, b.end]).toEqual([8, 12]);
    expect([c.start, c.end]).toEqual([12, 13]);
    expect(c.delay).toBe(0);
    expect(c.time).toBe(20);
  });

  it('flags adjacent delays on the second snapshot', () => {
    const { timeline, stats } = mkTimeline();
    const a = timeline.delay(0, 10, 2);
    const b = timeline.delay(2, 20, 4);
    expect(a.warning).toBe(false);
    expect(b.warning).toBe(true);
    expect(b.anomalies).toEqual([{ kind: 'mergeableConsecutiveDelays', offset: 2 }]);
    expect(stats.result().consecutiveDelays).toBe(1);
  });

  it('a note between delays means they are not mergeable', () => {
    const { timeline, stats } = mkTimeline();
    timeline.delay(0, 10, 2);
    timeline.event();
    const b = timeline.delay(4, 20, 6);
    expect(b.warning).toBe(false);
    expect(stats.result().consecutiveDelays).toBe(0);
  });

  it('the first delay of a stream is never mergeable', () => {
    const { timeline } = mkTimeline();
    expect(timeline.delay(0, 10, 2).warning).toBe(false);
  });

  it('snapshots hold the generator state in effect during the delay', () => {
    const { timeline, table } = mkTimeline();
    table.noteOn(0, 3, 72);
    timeline.event();
    const a = timeline.delay(2, 40, 4);
    table.noteOff(4, 3);
    timeline.event();
    const b = timeline.finish(5);
    expect(a.generators[3].note).toBe(72);
    expect(b.generators[3].note).toBeUndefined();
  });

  it('resets just-stopped at each delay', () => {
    const { timeline, table } = mkTimeline();
    table.noteOn(0, 0, 60);
    table.noteOff(2, 0);
    timeline.event();
    timeline.delay(3, 10, 5);
    expect(table.get(0).justStopped).toBe(false);
  });
});
