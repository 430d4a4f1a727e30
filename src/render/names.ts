import percussionNames from '../../data/percussion_names.json';
import instrumentNames from '../../data/gm_instruments.json';

const PITCH_NAMES = ['C ', 'C#', 'D ', 'D#', 'E ', 'F ', 'F#', 'G ', 'G#', 'A ', 'A#', 'B '];

// MIDI note 60 is " 4C ": octave, letter, and sharp or a trailing space.
export function pitchName(note: number): string {
  const n = note & 0x7f;
  const octave = Math.floor(n / 12) - 1;
  return `${octave < 0 ? '-1' : ' ' + octave}${PITCH_NAMES[n % 12]}`;
}

export function percussionName(code: number): string {
  return percussionNames[code & 0x7f] ?? `P${String(code & 0x7f).padStart(3, '0')}`;
}

export function isPercussion(note: number, percussionOffset: number): boolean {
  return percussionOffset > 0 && note >= percussionOffset;
}

export function noteName(note: number, percussionOffset: number, hex = false): string {
  if (hex) return (note & 0xff).toString(16).toUpperCase().padStart(2, '0');
  if (isPercussion(note, percussionOffset)) return percussionName(note - percussionOffset);
  if (note < 0x80) return pitchName(note);
  // above 127 without the percussion flag there is no pitch to name
  return `#${(note & 0xff).toString(16).toUpperCase()}`;
}

export function instrumentName(instrument: number): string {
  return instrumentNames[instrument & 0x7f] ?? `Program ${instrument & 0x7f}`;
}
