/**
 * In-memory model of an ELAN annotation document.
 *
 * Tier and annotation kinds are tagged unions: a tier is decided to be aligned
 * or reference once, when the document is loaded or built, and carries that
 * decision in its `kind` field.
 */

export interface TimeSlot {
  id: string;
  /** Milliseconds; absent for unaligned slots */
  time?: number;
}

interface AnnotationBase {
  id: string;
  value: string;
  /** EXT_REF attribute, kept for round trips */
  externalRef?: string;
}

/** Owns its own time span through two time slot references. */
export interface AlignedAnnotation extends AnnotationBase {
  kind: 'aligned';
  startSlot: string;
  endSlot: string;
}

/** Borrows the span of the parent annotation it refers to. */
export interface ReferenceAnnotation extends AnnotationBase {
  kind: 'reference';
  parentId: string;
  /** PREVIOUS_ANNOTATION, for ordered symbolic subdivisions */
  previousId?: string;
}

export type Annotation = AlignedAnnotation | ReferenceAnnotation;

interface TierBase {
  id: string;
  linguisticType: string;
  participant?: string;
  annotator?: string;
  language?: string;
}

export interface AlignedTier extends TierBase {
  kind: 'aligned';
  /** Aligned tiers may still sit under a parent (Included_In, Time_Subdivision) */
  parentId?: string;
  annotations: AlignedAnnotation[];
}

export interface ReferenceTier extends TierBase {
  kind: 'reference';
  parentId: string;
  annotations: ReferenceAnnotation[];
}

export type Tier = AlignedTier | ReferenceTier;

export interface MediaDescriptor {
  mediaUrl: string;
  relativeMediaUrl?: string;
  mimeType?: string;
  extractedFrom?: string;
}

export interface DocumentProperty {
  name: string;
  value: string;
}

export interface DocumentHeader {
  author: string;
  date: string;
  format: string;
  version: string;
  timeUnits: string;
  properties: DocumentProperty[];
}

export interface LinguisticType {
  id: string;
  timeAlignable: boolean;
  graphicReferences: boolean;
  constraints?: string;
}

export interface Language {
  id: string;
  label?: string;
  definition?: string;
}

export interface Constraint {
  stereotype: string;
  description: string;
}

export interface AnnotationDocument {
  header: DocumentHeader;
  mediaDescriptors: MediaDescriptor[];
  timeSlots: TimeSlot[];
  tiers: Tier[];
  linguisticTypes: LinguisticType[];
  languages: Language[];
  constraints: Constraint[];
  /** Original XML of a loaded document; saving patches it instead of regenerating */
  source?: string;
}

export interface Span {
  start: number;
  end: number;
}

export interface AlignedAnnotationSpan extends Span {
  kind: 'aligned';
  id: string;
  value: string;
}

export interface ReferenceAnnotationSpan extends Span {
  kind: 'reference';
  id: string;
  value: string;
  parentValue: string;
}

/** An annotation resolved against the time slot table. */
export type AnnotationSpan = AlignedAnnotationSpan | ReferenceAnnotationSpan;

/** The four constraint stereotypes ELAN writes into every document. */
export const STANDARD_CONSTRAINTS: readonly Constraint[] = [
  {
    stereotype: 'Time_Subdivision',
    description:
      "Time subdivision of parent annotation's time interval, no time gaps allowed within this interval",
  },
  {
    stereotype: 'Symbolic_Subdivision',
    description:
      'Symbolic subdivision of a parent annotation. Annotations refering to the same parent are ordered',
  },
  {
    stereotype: 'Symbolic_Association',
    description: '1-1 association with a parent annotation',
  },
  {
    stereotype: 'Included_In',
    description:
      "Time alignable annotations within the parent annotation's time interval, gaps are allowed",
  },
];
