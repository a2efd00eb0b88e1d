import { describe, expect, it } from 'vitest';
import { mergeOralTimeline } from '@tierline/core';
import { decodeWav, type PcmAudio } from './wav.js';
import { encodeOralAudio, renderOralTracks, toTimelineClip } from './oral-tracks.js';

const SAMPLE_RATE = 1000;

function tone(value: number, frames: number): PcmAudio {
  return { sampleRate: SAMPLE_RATE, channels: 1, samples: new Int16Array(frames).fill(value) };
}

function mergeTwoUtterances(redact = false) {
  return mergeOralTimeline(
    [
      {
        originalText: '[name]Alder[/name] here',
        repetitionText: 'here',
        translationText: 'aquí',
        sourceText: '',
        original: toTimelineClip(tone(1, 3)),
        repetition: toTimelineClip(tone(2, 2)),
        translation: toTimelineClip(tone(3, 4)),
      },
      {
        originalText: 'there',
        repetitionText: '',
        translationText: 'allí',
        sourceText: '',
        original: toTimelineClip(tone(4, 1)),
        translation: toTimelineClip(tone(5, 2)),
      },
    ],
    { redact },
  );
}

describe('renderOralTracks', () => {
  it('pads each track with silence wherever the others have content', () => {
    const { placements } = mergeTwoUtterances();

    const tracks = renderOralTracks(placements, SAMPLE_RATE);

    expect(Array.from(tracks.original.samples)).toEqual([1, 1, 1, 0, 0, 0, 0, 0, 0, 4, 0, 0]);
    expect(Array.from(tracks.repetition.samples)).toEqual([0, 0, 0, 2, 2, 0, 0, 0, 0, 0, 0, 0]);
    expect(Array.from(tracks.translation.samples)).toEqual([0, 0, 0, 0, 0, 3, 3, 3, 3, 0, 5, 5]);
  });

  it('keeps all three tracks the same length as the timeline', () => {
    const { placements, durationMs } = mergeTwoUtterances();

    const tracks = renderOralTracks(placements, SAMPLE_RATE);

    expect(durationMs).toBe(12);
    expect(tracks.original.samples.length).toBe(12);
    expect(tracks.repetition.samples.length).toBe(12);
    expect(tracks.translation.samples.length).toBe(12);
  });

  it('writes silence for clips whose text was redacted', () => {
    const { placements } = mergeTwoUtterances(true);

    const tracks = renderOralTracks(placements, SAMPLE_RATE);

    expect(Array.from(tracks.original.samples.slice(0, 3))).toEqual([0, 0, 0]);
    expect(Array.from(tracks.repetition.samples.slice(3, 5))).toEqual([2, 2]);
  });
});

describe('toTimelineClip', () => {
  it('keeps time slots in step with the rendered frames', () => {
    const rate = 3000;
    const twoFrames = toTimelineClip({ sampleRate: rate, channels: 1, samples: new Int16Array(2).fill(7) });
    const utterance = { originalText: 'x', repetitionText: '', translationText: '', sourceText: '' };

    const { placements, durationMs } = mergeOralTimeline([
      { ...utterance, original: twoFrames },
      { ...utterance, original: twoFrames },
      { ...utterance, original: twoFrames },
    ]);
    const tracks = renderOralTracks(placements, rate);

    expect(twoFrames.durationMs).toBeCloseTo(2 / 3, 10);
    expect(placements.map((placed) => [placed.start, placed.end])).toEqual([
      [0, 1],
      [1, 1],
      [1, 2],
    ]);
    expect(tracks.original.samples.length).toBe(6);
    expect(durationMs).toBe(Math.round((6 * 1000) / rate));
  });
});

describe('encodeOralAudio', () => {
  it('interleaves original, repetition and translation in that channel order', () => {
    const { placements } = mergeTwoUtterances();

    const decoded = decodeWav(encodeOralAudio(renderOralTracks(placements, SAMPLE_RATE)));

    expect(decoded.channels).toBe(3);
    expect(Array.from(decoded.samples.slice(0, 3))).toEqual([1, 0, 0]);
    expect(Array.from(decoded.samples.slice(9, 12))).toEqual([0, 2, 0]);
    expect(Array.from(decoded.samples.slice(15, 18))).toEqual([0, 0, 3]);
  });
});

