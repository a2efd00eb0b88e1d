import type { AlignedAnnotation, AnnotationDocument, ReferenceAnnotation, TimeSlot } from '../document/types.js';
import { createInputError, InputErrorCode } from '../errors/index.js';
import { redactMarkup } from '../markup/redactor.js';
import {
  buildOralDocument,
  ORAL_TRACKS,
  type OralDocumentOptions,
  type OralTimelineContent,
  type OralTrack,
} from './oral-document.js';

/** An audio clip of known length; `audio` is whatever the renderer consumes */
export interface TimelineClip<A> {
  /** Exact length, possibly fractional; time slots are rounded from the running total */
  durationMs: number;
  audio: A;
}

export interface OralUtterance<A> {
  originalText: string;
  repetitionText: string;
  translationText: string;
  sourceText: string;
  original?: TimelineClip<A>;
  repetition?: TimelineClip<A>;
  translation?: TimelineClip<A>;
  /** Where the utterance came from, for error messages */
  label?: string;
}

export interface PlacedClip<A> {
  track: OralTrack;
  /** 0-based ordinal of the utterance this clip belongs to */
  utterance: number;
  start: number;
  end: number;
  startSlot: string;
  endSlot: string;
  annotationId: string;
  text: string;
  /** The text was redacted, so the renderer writes silence in place of the audio */
  silenced: boolean;
  clip: TimelineClip<A>;
}

/** Counters threaded through one merge */
export interface MergeContext {
  nextTimeSlot: number;
  nextAnnotation: number;
  /** Unrounded end of the last placed clip */
  offsetMs: number;
}

export interface MergeOralTimelineOptions {
  /** Run every text through the markup redactor and silence changed clips */
  redact?: boolean;
  document?: OralDocumentOptions;
}

export interface MergeOralTimelineResult<A> {
  document: AnnotationDocument;
  /** Clips in timeline order; together they tile [0, durationMs) */
  placements: PlacedClip<A>[];
  durationMs: number;
  allocated: { timeSlots: number; annotations: number };
}

export function createMergeContext(): MergeContext {
  return { nextTimeSlot: 1, nextAnnotation: 1, offsetMs: 0 };
}

function allocateTimeSlot(context: MergeContext): string {
  return `ts${context.nextTimeSlot++}`;
}

function allocateAnnotationId(context: MergeContext): string {
  return `a${context.nextAnnotation++}`;
}

function emptyTracks<T>(): Record<OralTrack, T[]> {
  return { original: [], repetition: [], translation: [] };
}

/**
 * Lay utterance clips end to end on one timeline: for each utterance the
 * original, then the repetition and translation when present. Every placed
 * clip gets two new time slots and one annotation; each then gets a reference
 * annotation on its track's `-ID` tier holding the utterance ordinal, and the
 * original also one on `Original-Source`.
 */
export function mergeOralTimeline<A>(
  utterances: readonly OralUtterance<A>[],
  options: MergeOralTimelineOptions = {},
): MergeOralTimelineResult<A> {
  const context = createMergeContext();
  const timeSlots: TimeSlot[] = [];
  const aligned = emptyTracks<AlignedAnnotation>();
  const ids = emptyTracks<ReferenceAnnotation>();
  const sources: ReferenceAnnotation[] = [];
  const placements: PlacedClip<A>[] = [];

  const prepareText = (text: string): { text: string; silenced: boolean } => {
    if (!options.redact) {
      return { text, silenced: false };
    }
    const result = redactMarkup(text);
    return { text: result.text, silenced: result.changed };
  };

  utterances.forEach((utterance, ordinal) => {
    if (!utterance.original) {
      throw createInputError(
        InputErrorCode.MISSING_ORIGINAL_CLIP,
        `Utterance ${ordinal}${utterance.label ? ` (${utterance.label})` : ''} has no original clip.`,
        { suggestion: 'Check that the segment lies within the session audio.' },
      );
    }

    const texts: Record<OralTrack, string> = {
      original: utterance.originalText,
      repetition: utterance.repetitionText,
      translation: utterance.translationText,
    };

    const placedHere: PlacedClip<A>[] = [];
    for (const track of ORAL_TRACKS) {
      const clip = utterance[track];
      if (!clip) {
        continue;
      }
      const start = Math.round(context.offsetMs);
      context.offsetMs += clip.durationMs;
      const end = Math.round(context.offsetMs);
      const startSlot = allocateTimeSlot(context);
      const endSlot = allocateTimeSlot(context);
      const annotationId = allocateAnnotationId(context);

      const { text, silenced } = prepareText(texts[track]);
      timeSlots.push({ id: startSlot, time: start }, { id: endSlot, time: end });
      aligned[track].push({ kind: 'aligned', id: annotationId, value: text, startSlot, endSlot });
      placedHere.push({
        track,
        utterance: ordinal,
        start,
        end,
        startSlot,
        endSlot,
        annotationId,
        text,
        silenced,
        clip,
      });
    }

    for (const placed of placedHere) {
      ids[placed.track].push({
        kind: 'reference',
        id: allocateAnnotationId(context),
        value: String(ordinal),
        parentId: placed.annotationId,
      });
      if (placed.track === 'original') {
        sources.push({
          kind: 'reference',
          id: allocateAnnotationId(context),
          value: utterance.sourceText,
          parentId: placed.annotationId,
        });
      }
    }

    placements.push(...placedHere);
  });

  const lastUsedAnnotationId = context.nextAnnotation - 1;
  const content: OralTimelineContent = { timeSlots, aligned, ids, sources, lastUsedAnnotationId };

  return {
    document: buildOralDocument(content, options.document),
    placements,
    durationMs: Math.round(context.offsetMs),
    allocated: { timeSlots: context.nextTimeSlot - 1, annotations: lastUsedAnnotationId },
  };
}
