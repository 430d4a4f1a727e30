import { describe, it, expect } from 'vitest';
import { NoteOffWithoutNoteOnError } from '../../src/score/errors';
import { AnomalyDetector, GeneratorStateTable } from '../../src/score/generators';
import { StatisticsCollector, countBits, countGeneratorsUsed } from '../../src/score/statistics';

function mkTable(display = 6) {
  const stats = new StatisticsCollector(display);
  const anomalies = new AnomalyDetector();
  const table = new GeneratorStateTable(new Uint8Array(32), stats, anomalies);
  return { stats, anomalies, table };
}

describe('Generator state table', () => {
  it('note on records note, volume and usage', () => {
    const { stats, table } = mkTable();
    table.noteOn(0, 2, 0x40, 0x50);
    expect(table.get(2)).toEqual({ note: 0x40, volume: 0x50, instrumentChanged: false, justStopped: false });
    const s = stats.result();
    expect(s.maxGeneratorIndex).toBe(2);
    expect(s.toneGeneratorsUsed).toBe(0b100);
    expect(s.noteOnCount).toBe(1);
    expect(s.minVolume).toBe(0x50);
    expect(s.maxVolume).toBe(0x50);
  });

  it('note off on a silent generator is fatal', () => {
    const { table } = mkTable();
    expect(() => table.noteOff(5, 3)).toThrow(NoteOffWithoutNoteOnError);
    try {
      table.noteOff(5, 3);
    } catch (e) {
      expect(e).toBeInstanceOf(NoteOffWithoutNoteOnError);
      if (e instanceof NoteOffWithoutNoteOnError) {
        expect(e.offset).toBe(5);
        expect(e.generator).toBe(3);
      }
    }
  });

  it('note off silences and marks the generator as just stopped', () => {
    const { table } = mkTable();
    table.noteOn(0, 1, 60);
    table.noteOff(2, 1);
    expect(table.get(1).note).toBeUndefined();
    expect(table.get(1).justStopped).toBe(true);
  });

  it('flags a stop immediately followed by a start as redundant', () => {
    const { stats, anomalies, table } = mkTable();
    table.noteOn(0, 0, 60);
    table.noteOff(2, 0);
    table.noteOn(3, 0, 62);
    expect(stats.result().stopnotesBeforeStartnote).toBe(1);
    expect(anomalies.take()).toEqual([{ kind: 'redundantStopNote', offset: 3, generator: 0 }]);
    expect(anomalies.hasPending).toBe(false);
    expect(table.get(0).justStopped).toBe(false);
  });

  it('a delay boundary clears just-stopped', () => {
    const { stats, anomalies, table } = mkTable();
    table.noteOn(0, 0, 60);
    table.noteOff(2, 0);
    table.endInterval();
    table.noteOn(5, 0, 62);
    expect(stats.result().stopnotesBeforeStartnote).toBe(0);
    expect(anomalies.hasPending).toBe(false);
  });

  it('a stop on another generator is not redundant', () => {
    const { stats, table } = mkTable();
    table.noteOn(0, 0, 60);
    table.noteOff(2, 0);
    table.noteOn(3, 1, 62);
    expect(stats.result().stopnotesBeforeStartnote).toBe(0);
  });

  it('instrument changes are marked until the next capture', () => {
    const { stats, table } = mkTable();
    table.instrument(4, 0x98);
    const first = table.capture();
    expect(first[4]).toEqual({ instrument: 0x18, instrumentChanged: true, justStopped: false });
    expect(table.capture()[4].instrumentChanged).toBe(false);
    expect(stats.result().anyInstrumentSeen).toBe(true);
  });

  it('captures are copies', () => {
    const { table } = mkTable();
    table.noteOn(0, 0, 60);
    const snap = table.capture();
    table.noteOff(2, 0);
    expect(snap[0].note).toBe(60);
    expect(snap.length).toBe(16);
  });

  it('counts instrument use per note on', () => {
    const { stats, table } = mkTable();
    table.noteOn(0, 0, 60); // no instrument yet
    table.instrument(0, 5);
    table.noteOn(4, 0, 61);
    table.noteOn(6, 0, 62);
    expect(stats.result().instrumentUseCount[5]).toBe(2);
    expect(stats.result().instrumentUseCount.reduce((a, b) => a + b, 0)).toBe(2);
  });

  it('counts notes beyond the display count as skipped', () => {
    const { stats, table } = mkTable(2);
    table.noteOn(0, 1, 60);
    table.noteOn(2, 2, 60);
    table.noteOn(4, 15, 60);
    const s = stats.result();
    expect(s.notesSkipped).toBe(2);
    expect(s.maxGeneratorIndex).toBe(15);
    expect(countGeneratorsUsed(s)).toBe(3);
  });

  it('tracks the volume range', () => {
    const { stats, table } = mkTable();
    table.noteOn(0, 0, 60, 80);
    table.noteOn(3, 1, 60, 20);
    table.noteOn(6, 2, 60, 127);
    expect(stats.result().minVolume).toBe(20);
    expect(stats.result().maxVolume).toBe(127);
  });
});

describe('countBits', () => {
  it('counts set bits', () => {
    expect(countBits(0)).toBe(0);
    expect(countBits(0b1011)).toBe(3);
    expect(countBits(0xffff)).toBe(16);
  });
});
