import { randomUUID } from 'node:crypto';
import {
  STANDARD_CONSTRAINTS,
  type AlignedAnnotation,
  type AnnotationDocument,
  type Language,
  type LinguisticType,
  type ReferenceAnnotation,
  type Tier,
  type TimeSlot,
} from '../document/types.js';

export type OralTrack = 'original' | 'repetition' | 'translation';

export const ORAL_TRACKS: readonly OralTrack[] = ['original', 'repetition', 'translation'];

/** Top-level tier holding each track's aligned annotations */
export const TRACK_TIERS: Record<OralTrack, string> = {
  original: 'Original',
  repetition: 'Repetition',
  translation: 'Translation',
};

export const SOURCE_TIER = 'Original-Source';
export const POSTPROCESS_TIER = 'Postprocess';

export const ORAL_LINGUISTIC_TYPES = {
  text: 'oral-annotation-text',
  id: 'oral-annotation-id',
  source: 'oral-annotation-source',
  event: 'event',
} as const;

export const DEFAULT_TRANSLATION_LANGUAGE: Language = {
  id: 'eng',
  label: 'English (eng)',
  definition: 'http://cdb.iso.org/lg/CDB-00138502-001',
};

export interface OralContributors {
  originalAnnotator?: string;
  repeater?: string;
  repetitionAnnotator?: string;
  translator?: string;
  translationAnnotator?: string;
}

export interface OralDocumentOptions {
  /** Path of the rendered three-channel audio, written as the media descriptor */
  audioPath?: string;
  contributors?: OralContributors;
  /** Language of the original and repetition tiers */
  sourceLanguage?: Language;
  /** Language of the translation tier */
  translationLanguage?: Language;
  date?: Date;
  urn?: string;
}

/** Allocated content of a merged timeline, ready to be laid out as a document */
export interface OralTimelineContent {
  timeSlots: TimeSlot[];
  aligned: Record<OralTrack, AlignedAnnotation[]>;
  ids: Record<OralTrack, ReferenceAnnotation[]>;
  sources: ReferenceAnnotation[];
  lastUsedAnnotationId: number;
}

export function idTierName(track: OralTrack): string {
  return `${TRACK_TIERS[track]}-ID`;
}

export function createElanUrn(): string {
  return `urn:nl-mpi-tools-elan-eaf:${randomUUID()}`;
}

/** ISO 8601 local time with a `+hh:mm` offset, as ELAN writes DATE */
export function formatDocumentDate(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const absolute = Math.abs(offsetMinutes);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`
  );
}

/**
 * Lay out merged timeline content as an oral annotation document: one text
 * tier per track with an `-ID` child, a `-Source` child of `Original`, and an
 * empty `Postprocess` tier for later redaction work.
 */
export function buildOralDocument(
  content: OralTimelineContent,
  options: OralDocumentOptions = {},
): AnnotationDocument {
  const contributors = options.contributors ?? {};
  const sourceLanguage = options.sourceLanguage;
  const translationLanguage = options.translationLanguage ?? DEFAULT_TRANSLATION_LANGUAGE;

  const textTier = (
    track: OralTrack,
    language: Language | undefined,
    participant: string | undefined,
    annotator: string | undefined,
  ): Tier => ({
    kind: 'aligned',
    id: TRACK_TIERS[track],
    linguisticType: ORAL_LINGUISTIC_TYPES.text,
    language: language?.id,
    participant,
    annotator,
    annotations: content.aligned[track],
  });

  const idTier = (track: OralTrack): Tier => ({
    kind: 'reference',
    id: idTierName(track),
    linguisticType: ORAL_LINGUISTIC_TYPES.id,
    parentId: TRACK_TIERS[track],
    annotations: content.ids[track],
  });

  const tiers: Tier[] = [
    textTier('original', sourceLanguage, undefined, contributors.originalAnnotator),
    idTier('original'),
    {
      kind: 'reference',
      id: SOURCE_TIER,
      linguisticType: ORAL_LINGUISTIC_TYPES.source,
      parentId: TRACK_TIERS.original,
      annotations: content.sources,
    },
    textTier('repetition', sourceLanguage, contributors.repeater, contributors.repetitionAnnotator),
    idTier('repetition'),
    textTier(
      'translation',
      translationLanguage,
      contributors.translator,
      contributors.translationAnnotator,
    ),
    idTier('translation'),
    { kind: 'aligned', id: POSTPROCESS_TIER, linguisticType: ORAL_LINGUISTIC_TYPES.event, annotations: [] },
  ];

  const linguisticTypes: LinguisticType[] = [
    { id: ORAL_LINGUISTIC_TYPES.text, timeAlignable: true, graphicReferences: false },
    {
      id: ORAL_LINGUISTIC_TYPES.id,
      timeAlignable: false,
      graphicReferences: false,
      constraints: 'Symbolic_Association',
    },
    {
      id: ORAL_LINGUISTIC_TYPES.source,
      timeAlignable: false,
      graphicReferences: false,
      constraints: 'Symbolic_Association',
    },
    { id: ORAL_LINGUISTIC_TYPES.event, timeAlignable: true, graphicReferences: false },
  ];

  const languages = [translationLanguage];
  if (sourceLanguage && sourceLanguage.id !== translationLanguage.id) {
    languages.push(sourceLanguage);
  }

  const mediaDescriptors = options.audioPath
    ? [
        {
          mediaUrl: `file://${options.audioPath}`,
          mimeType: 'audio/x-wav',
          relativeMediaUrl: `./${lastSegment(options.audioPath)}`,
        },
      ]
    : [];

  return {
    header: {
      author: '',
      date: formatDocumentDate(options.date ?? new Date()),
      format: '3.0',
      version: '3.0',
      timeUnits: 'milliseconds',
      properties: [
        { name: 'URN', value: options.urn ?? createElanUrn() },
        { name: 'lastUsedAnnotationId', value: String(content.lastUsedAnnotationId) },
      ],
    },
    mediaDescriptors,
    timeSlots: content.timeSlots,
    tiers,
    linguisticTypes,
    languages,
    constraints: [...STANDARD_CONSTRAINTS],
  };
}

function lastSegment(path: string): string {
  const segments = path.split(/[\\/]/);
  return segments[segments.length - 1] ?? path;
}
