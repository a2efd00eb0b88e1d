import type {
  Annotation,
  AnnotationDocument,
  AnnotationSpan,
  MediaDescriptor,
  Span,
  Tier,
} from './types.js';

/** Replacement URLs for a relinked media descriptor */
export interface MediaLink {
  mediaUrl: string;
  relativeMediaUrl: string;
}

interface IndexedAnnotation {
  tier: Tier;
  annotation: Annotation;
}

/**
 * Lookup and value mutation over one annotation document.
 *
 * The store owns the document's time slots and annotations. Mutation only ever
 * replaces annotation values (and media descriptor URLs); it never creates or
 * removes time slots or annotations.
 */
export class AnnotationStore {
  private readonly slotTimes = new Map<string, number | undefined>();
  private readonly tiersById = new Map<string, Tier>();
  private readonly annotationsById = new Map<string, IndexedAnnotation>();

  constructor(readonly document: AnnotationDocument) {
    for (const slot of document.timeSlots) {
      this.slotTimes.set(slot.id, slot.time);
    }
    for (const tier of document.tiers) {
      this.tiersById.set(tier.id, tier);
      for (const annotation of tier.annotations) {
        this.annotationsById.set(annotation.id, { tier, annotation });
      }
    }
  }

  tierNames(): string[] {
    return this.document.tiers.map((tier) => tier.id);
  }

  getTier(name: string): Tier | undefined {
    return this.tiersById.get(name);
  }

  tierIdsForLinguisticType(linguisticType: string): string[] {
    return this.document.tiers
      .filter((tier) => tier.linguisticType === linguisticType)
      .map((tier) => tier.id);
  }

  getAnnotation(annotationId: string): Annotation | undefined {
    return this.annotationsById.get(annotationId)?.annotation;
  }

  /**
   * Effective span of an annotation: its own slots when aligned, otherwise the
   * span of the nearest aligned ancestor. Undefined when a slot is unaligned.
   */
  spanOf(annotationId: string): Span | undefined {
    const visited = new Set<string>();
    let current = this.annotationsById.get(annotationId)?.annotation;

    while (current && current.kind === 'reference') {
      if (visited.has(current.id)) {
        return undefined;
      }
      visited.add(current.id);
      current = this.annotationsById.get(current.parentId)?.annotation;
    }

    if (!current) {
      return undefined;
    }
    const start = this.slotTimes.get(current.startSlot);
    const end = this.slotTimes.get(current.endSlot);
    if (start === undefined || end === undefined) {
      return undefined;
    }
    return { start, end };
  }

  /**
   * Resolved spans of a tier's annotations in document order. Reference
   * annotations also carry their parent's value. Unknown tiers yield an empty list.
   */
  annotationsOf(tierName: string): AnnotationSpan[] {
    const tier = this.tiersById.get(tierName);
    if (!tier) {
      return [];
    }

    const spans: AnnotationSpan[] = [];
    for (const annotation of tier.annotations) {
      const span = this.spanOf(annotation.id);
      if (!span) {
        continue;
      }
      if (annotation.kind === 'aligned') {
        spans.push({ kind: 'aligned', id: annotation.id, value: annotation.value, ...span });
      } else {
        const parentValue = this.annotationsById.get(annotation.parentId)?.annotation.value ?? '';
        spans.push({
          kind: 'reference',
          id: annotation.id,
          value: annotation.value,
          parentValue,
          ...span,
        });
      }
    }
    return spans;
  }

  /**
   * Replace the value of the first annotation in `tierName` whose effective span
   * is exactly (start, end). Returns false, changing nothing, when none matches.
   */
  setValue(tierName: string, start: number, end: number, value: string): boolean {
    const tier = this.tiersById.get(tierName);
    if (!tier) {
      return false;
    }
    for (const annotation of tier.annotations) {
      const span = this.spanOf(annotation.id);
      if (span && span.start === start && span.end === end) {
        annotation.value = value;
        return true;
      }
    }
    return false;
  }

  setValueById(annotationId: string, value: string): boolean {
    const entry = this.annotationsById.get(annotationId);
    if (!entry) {
      return false;
    }
    entry.annotation.value = value;
    return true;
  }

  /**
   * Annotations of a tier whose span contains `timeMs` (closed-open).
   */
  annotationsAt(tierName: string, timeMs: number): AnnotationSpan[] {
    return this.annotationsOf(tierName).filter(
      (span) => timeMs >= span.start && timeMs < span.end,
    );
  }

  mediaDescriptors(): readonly MediaDescriptor[] {
    return this.document.mediaDescriptors;
  }

  /**
   * Point every media descriptor whose MEDIA_URL ends in `originalName` at
   * `link` instead. Returns the number of descriptors changed.
   */
  relinkMedia(originalName: string, link: MediaLink): number {
    let changed = 0;
    for (const descriptor of this.document.mediaDescriptors) {
      if (lastPathSegment(descriptor.mediaUrl) !== originalName) {
        continue;
      }
      descriptor.mediaUrl = link.mediaUrl;
      descriptor.relativeMediaUrl = link.relativeMediaUrl;
      changed += 1;
    }
    return changed;
  }
}

function lastPathSegment(url: string): string {
  const segments = url.split(/[\\/]/);
  return segments[segments.length - 1] ?? '';
}
