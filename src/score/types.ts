export type Byte = number; // 0..255

export const MAX_GENERATORS = 16;
export const DEFAULT_DISPLAY_GENERATORS = 6;
export const PERCUSSION_OFFSET = 128;

export type Command =
  | { kind: 'delay'; offset: number; width: number; ms: number }
  | { kind: 'noteOn'; offset: number; width: number; generator: number; note: Byte; volume?: Byte }
  | { kind: 'noteOff'; offset: number; width: number; generator: number }
  | { kind: 'instrument'; offset: number; width: number; generator: number; instrument: number }
  | { kind: 'endOfScore'; offset: number; width: number };

export type CommandKind = Command['kind'];

export interface DecodeFlags {
  expectVolume: boolean;
  expectInstruments: boolean;
  // notes at or above this value are percussion codes; 0 means no percussion
  percussionOffset: number;
  displayGeneratorCount: number;
}

export interface GeneratorState {
  note?: Byte;
  volume?: Byte;
  instrument?: number;
  instrumentChanged: boolean;
  justStopped: boolean;
}

export type AnomalyKind = 'redundantStopNote' | 'mergeableConsecutiveDelays';

export interface Anomaly {
  kind: AnomalyKind;
  offset: number;
  generator?: number;
}

export interface Snapshot {
  readonly time: number; // ms, before the delay elapses
  readonly delay: number; // ms about to elapse; 0 on the final snapshot
  readonly generators: readonly Readonly<GeneratorState>[];
  readonly start: number; // byte range [start, end) since the previous snapshot
  readonly end: number;
  readonly warning: boolean;
  readonly anomalies: readonly Anomaly[];
}
