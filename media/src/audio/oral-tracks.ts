import type { OralTrack, PlacedClip, TimelineClip } from '@tierline/core';
import { ORAL_TRACKS } from '@tierline/core';
import {
  concatAudio,
  createSilence,
  encodeWav,
  frameCount,
  interleaveChannels,
  type PcmAudio,
} from './wav.js';

export type OralTracks = Record<OralTrack, PcmAudio>;

/** Wrap audio for the merger with its exact, unrounded length */
export function toTimelineClip(audio: PcmAudio): TimelineClip<PcmAudio> {
  return { durationMs: (frameCount(audio) * 1000) / audio.sampleRate, audio };
}

/**
 * Render placed clips onto three mono tracks of identical length. At every
 * placement one track carries the clip (or silence when the clip was
 * silenced) and the other two carry silence of the same length.
 */
export function renderOralTracks(
  placements: readonly PlacedClip<PcmAudio>[],
  sampleRate: number,
): OralTracks {
  const parts: Record<OralTrack, PcmAudio[]> = { original: [], repetition: [], translation: [] };

  for (const placed of placements) {
    const audio = placed.clip.audio;
    const frames = frameCount(audio);
    for (const track of ORAL_TRACKS) {
      const carriesClip = track === placed.track && !placed.silenced;
      parts[track].push(carriesClip ? audio : createSilence(frames, sampleRate));
    }
  }

  return {
    original: concatAudio(parts.original, sampleRate),
    repetition: concatAudio(parts.repetition, sampleRate),
    translation: concatAudio(parts.translation, sampleRate),
  };
}

/**
 * One three-channel WAV: original, repetition and translation on the front
 * left, front right and front center channels.
 */
export function encodeOralAudio(tracks: OralTracks): Buffer {
  return encodeWav(interleaveChannels(ORAL_TRACKS.map((track) => tracks[track])));
}
