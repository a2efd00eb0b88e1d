import { createDocumentError, DocumentErrorCode } from '../errors/index.js';
import type { Annotation, AnnotationDocument } from './types.js';

/**
 * Check the referential invariants of a document, throwing the first violation.
 *
 * - tier ids, time slot ids and annotation ids are unique
 * - every aligned annotation's slots exist
 * - every reference annotation's parent annotation exists, in the declared parent tier
 * - every declared parent tier exists
 * - reference chains end in an aligned annotation
 */
export function validateDocument(doc: AnnotationDocument, filePath?: string): void {
  const slotIds = new Set<string>();
  for (const slot of doc.timeSlots) {
    if (slotIds.has(slot.id)) {
      throw createDocumentError(
        DocumentErrorCode.DUPLICATE_TIME_SLOT,
        `Time slot "${slot.id}" is declared more than once.`,
        { filePath },
      );
    }
    slotIds.add(slot.id);
  }

  const tierIds = new Set<string>();
  const annotations = new Map<string, { annotation: Annotation; tierId: string }>();
  for (const tier of doc.tiers) {
    if (tierIds.has(tier.id)) {
      throw createDocumentError(
        DocumentErrorCode.DUPLICATE_TIER,
        `Tier "${tier.id}" is declared more than once.`,
        { filePath },
      );
    }
    tierIds.add(tier.id);
    for (const annotation of tier.annotations) {
      const existing = annotations.get(annotation.id);
      if (existing) {
        throw createDocumentError(
          DocumentErrorCode.DUPLICATE_ANNOTATION,
          `Annotation "${annotation.id}" is declared more than once (tiers "${existing.tierId}" and "${tier.id}").`,
          { filePath, context: `tier '${tier.id}'` },
        );
      }
      annotations.set(annotation.id, { annotation, tierId: tier.id });
    }
  }

  for (const tier of doc.tiers) {
    if (tier.parentId !== undefined && !tierIds.has(tier.parentId)) {
      throw createDocumentError(
        DocumentErrorCode.UNKNOWN_PARENT_TIER,
        `Tier "${tier.id}" declares unknown parent tier "${tier.parentId}".`,
        { filePath, context: `tier '${tier.id}'` },
      );
    }

    for (const annotation of tier.annotations) {
      if (annotation.kind === 'aligned') {
        for (const slot of [annotation.startSlot, annotation.endSlot]) {
          if (!slotIds.has(slot)) {
            throw createDocumentError(
              DocumentErrorCode.UNKNOWN_TIME_SLOT,
              `Annotation "${annotation.id}" refers to unknown time slot "${slot}".`,
              { filePath, context: `tier '${tier.id}'` },
            );
          }
        }
        continue;
      }

      const parent = annotations.get(annotation.parentId);
      if (!parent || parent.tierId !== tier.parentId) {
        throw createDocumentError(
          DocumentErrorCode.UNKNOWN_PARENT_ANNOTATION,
          `Annotation "${annotation.id}" refers to "${annotation.parentId}", which is not an annotation of parent tier "${tier.parentId}".`,
          { filePath, context: `tier '${tier.id}'` },
        );
      }
    }
  }

  for (const { annotation, tierId } of annotations.values()) {
    const visited = new Set<string>();
    let current: Annotation | undefined = annotation;
    while (current && current.kind === 'reference') {
      if (visited.has(current.id)) {
        throw createDocumentError(
          DocumentErrorCode.REFERENCE_CYCLE,
          `Annotation "${annotation.id}" is part of a reference cycle.`,
          { filePath, context: `tier '${tierId}'` },
        );
      }
      visited.add(current.id);
      current = annotations.get(current.parentId)?.annotation;
    }
  }
}
