import type { AnnotationStore } from '../document/annotation-store.js';
import { createInputError, InputErrorCode } from '../errors/index.js';
import { formatCompactSeconds } from '../time.js';

export const TRANSCRIPTION_TYPE = 'Transcription';
export const TRANSLATION_TYPE = 'Translation';
export const METADATA_TYPE = 'SayMoreify-Metadata';

/** Segments with this exact transcription are left out of oral annotation exports */
export const IGNORED_SEGMENT = '%ignore%';
export const REPETITION_SEPARATOR = ' || ';

export type OralClipKind = 'Careful' | 'Translation';

export interface OralSegment {
  /** 0-based position among the exported (non-ignored) segments */
  ordinal: number;
  start: number;
  end: number;
  originalText: string;
  repetitionText: string;
  translationText: string;
  sourceText: string;
  /** Clip file names expected in the session's oral annotation directory */
  carefulClip: string;
  translationClip: string;
}

export interface OralSession {
  transcriptionTier: string;
  translationTier?: string;
  metadataTier?: string;
  segments: OralSegment[];
}

export interface ReadOralSessionOptions {
  /** Split `original || repetition` transcriptions (default true) */
  splitRepetition?: boolean;
  filePath?: string;
}

/**
 * Name of the clip a session recorder stores for one segment, such as
 * `1.5_to_3.25_Careful.wav`.
 */
export function oralClipFileName(startMs: number, endMs: number, kind: OralClipKind): string {
  return `${formatCompactSeconds(startMs)}_to_${formatCompactSeconds(endMs)}_${kind}.wav`;
}

/**
 * Read the exportable segments of a session transcript: the transcription
 * tier's spans sorted by time, each with its translation and source notes
 * looked up at the segment's midpoint.
 */
export function readOralSession(
  store: AnnotationStore,
  options: ReadOralSessionOptions = {},
): OralSession {
  const [transcriptionTier] = store.tierIdsForLinguisticType(TRANSCRIPTION_TYPE);
  if (transcriptionTier === undefined) {
    throw createInputError(
      InputErrorCode.MISSING_TIER,
      `No tier of linguistic type "${TRANSCRIPTION_TYPE}" in the session transcript.`,
      { filePath: options.filePath },
    );
  }
  const [translationTier] = store.tierIdsForLinguisticType(TRANSLATION_TYPE);
  const [metadataTier] = store.tierIdsForLinguisticType(METADATA_TYPE);
  const splitRepetition = options.splitRepetition ?? true;

  const spans = store
    .annotationsOf(transcriptionTier)
    .map(({ start, end, value }) => ({ start, end, value }))
    .sort((a, b) => a.start - b.start || a.end - b.end || compareText(a.value, b.value));

  const valueAt = (tier: string | undefined, timeMs: number): string =>
    tier === undefined ? '' : store.annotationsAt(tier, timeMs)[0]?.value ?? '';

  const segments: OralSegment[] = [];
  for (const { start, end, value } of spans) {
    if (value === IGNORED_SEGMENT) {
      continue;
    }

    let originalText = value;
    let repetitionText = '';
    if (splitRepetition) {
      const separator = value.indexOf(REPETITION_SEPARATOR);
      if (separator >= 0) {
        originalText = value.slice(0, separator);
        repetitionText = value.slice(separator + REPETITION_SEPARATOR.length);
      }
    }

    const midpoint = (start + end) / 2;
    segments.push({
      ordinal: segments.length,
      start,
      end,
      originalText,
      repetitionText,
      translationText: valueAt(translationTier, midpoint),
      sourceText: valueAt(metadataTier, midpoint),
      carefulClip: oralClipFileName(start, end, 'Careful'),
      translationClip: oralClipFileName(start, end, 'Translation'),
    });
  }

  return { transcriptionTier, translationTier, metadataTier, segments };
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
