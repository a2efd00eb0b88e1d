import { createDocumentError, DocumentErrorCode } from '../errors/index.js';
import type {
  AlignedAnnotation,
  AnnotationDocument,
  Constraint,
  DocumentHeader,
  Language,
  LinguisticType,
  MediaDescriptor,
  ReferenceAnnotation,
  Tier,
  TimeSlot,
} from './types.js';
import { validateDocument } from './validate.js';
import { attr, elementsByTag, firstElementByTag, parseXml, type XmlElement } from './xml.js';

const ROOT_TAG = 'ANNOTATION_DOCUMENT';

/**
 * Parse an ELAN .eaf document.
 *
 * The original text is kept on the result as `source`, so that saving an
 * edited document only patches annotation values and media descriptors.
 */
export function parseEaf(xmlString: string, filePath?: string): AnnotationDocument {
  const root = parseXml(xmlString, filePath);
  if (root.tagName !== ROOT_TAG) {
    throw createDocumentError(
      DocumentErrorCode.NOT_AN_ANNOTATION_DOCUMENT,
      `Expected an ${ROOT_TAG} root element, found ${root.tagName}.`,
      { filePath, suggestion: 'Check that the file is an ELAN .eaf document.' },
    );
  }

  const headerEl = firstElementByTag(root, 'HEADER');
  const header: DocumentHeader = {
    author: attr(root, 'AUTHOR') ?? '',
    date: attr(root, 'DATE') ?? '',
    format: attr(root, 'FORMAT') ?? '3.0',
    version: attr(root, 'VERSION') ?? '3.0',
    timeUnits: (headerEl && attr(headerEl, 'TIME_UNITS')) ?? 'milliseconds',
    properties: headerEl
      ? elementsByTag(headerEl, 'PROPERTY').map((el) => ({
          name: attr(el, 'NAME') ?? '',
          value: el.textContent ?? '',
        }))
      : [],
  };

  const mediaDescriptors: MediaDescriptor[] = headerEl
    ? elementsByTag(headerEl, 'MEDIA_DESCRIPTOR').map(parseMediaDescriptor)
    : [];

  const timeSlots: TimeSlot[] = elementsByTag(root, 'TIME_SLOT').map((el) => {
    const id = requireAttr(el, 'TIME_SLOT_ID', filePath);
    const rawTime = attr(el, 'TIME_VALUE');
    return rawTime === undefined ? { id } : { id, time: Number.parseInt(rawTime, 10) };
  });

  const linguisticTypes: LinguisticType[] = elementsByTag(root, 'LINGUISTIC_TYPE').map((el) => {
    const type: LinguisticType = {
      id: attr(el, 'LINGUISTIC_TYPE_ID') ?? '',
      timeAlignable: attr(el, 'TIME_ALIGNABLE') !== 'false',
      graphicReferences: attr(el, 'GRAPHIC_REFERENCES') === 'true',
    };
    const constraints = attr(el, 'CONSTRAINTS');
    if (constraints !== undefined) {
      type.constraints = constraints;
    }
    return type;
  });

  const languages: Language[] = elementsByTag(root, 'LANGUAGE').map((el) => ({
    id: attr(el, 'LANG_ID') ?? '',
    label: attr(el, 'LANG_LABEL'),
    definition: attr(el, 'LANG_DEF'),
  }));

  const constraints: Constraint[] = elementsByTag(root, 'CONSTRAINT').map((el) => ({
    stereotype: attr(el, 'STEREOTYPE') ?? '',
    description: attr(el, 'DESCRIPTION') ?? '',
  }));

  const timeAlignableTypes = new Set(
    linguisticTypes.filter((type) => type.timeAlignable).map((type) => type.id),
  );
  const tiers = elementsByTag(root, 'TIER').map((el) =>
    parseTier(el, timeAlignableTypes, filePath),
  );

  const document: AnnotationDocument = {
    header,
    mediaDescriptors,
    timeSlots,
    tiers,
    linguisticTypes,
    languages,
    constraints,
    source: xmlString,
  };
  validateDocument(document, filePath);
  return document;
}

function parseMediaDescriptor(el: XmlElement): MediaDescriptor {
  const descriptor: MediaDescriptor = { mediaUrl: attr(el, 'MEDIA_URL') ?? '' };
  const relative = attr(el, 'RELATIVE_MEDIA_URL');
  if (relative !== undefined) {
    descriptor.relativeMediaUrl = relative;
  }
  const mimeType = attr(el, 'MIME_TYPE');
  if (mimeType !== undefined) {
    descriptor.mimeType = mimeType;
  }
  const extractedFrom = attr(el, 'EXTRACTED_FROM');
  if (extractedFrom !== undefined) {
    descriptor.extractedFrom = extractedFrom;
  }
  return descriptor;
}

function parseTier(el: XmlElement, timeAlignableTypes: Set<string>, filePath?: string): Tier {
  const id = requireAttr(el, 'TIER_ID', filePath);
  const linguisticType = attr(el, 'LINGUISTIC_TYPE_REF') ?? '';
  const parentId = attr(el, 'PARENT_REF');
  const base = {
    id,
    linguisticType,
    participant: attr(el, 'PARTICIPANT'),
    annotator: attr(el, 'ANNOTATOR'),
    language: attr(el, 'LANG_REF'),
  };

  const aligned: AlignedAnnotation[] = [];
  const references: ReferenceAnnotation[] = [];
  for (const wrapper of elementsByTag(el, 'ANNOTATION')) {
    const alignedEl = firstElementByTag(wrapper, 'ALIGNABLE_ANNOTATION');
    if (alignedEl) {
      aligned.push(parseAlignedAnnotation(alignedEl, filePath));
      continue;
    }
    const refEl = firstElementByTag(wrapper, 'REF_ANNOTATION');
    if (refEl) {
      references.push(parseReferenceAnnotation(refEl, filePath));
    }
  }

  if (aligned.length > 0 && references.length > 0) {
    throw createDocumentError(
      DocumentErrorCode.MIXED_ANNOTATION_KINDS,
      `Tier "${id}" mixes time-aligned and reference annotations.`,
      { filePath, context: `tier '${id}'` },
    );
  }

  const isReference =
    references.length > 0 ||
    (aligned.length === 0 && parentId !== undefined && !timeAlignableTypes.has(linguisticType));

  if (isReference) {
    if (parentId === undefined) {
      throw createDocumentError(
        DocumentErrorCode.UNKNOWN_PARENT_TIER,
        `Tier "${id}" holds reference annotations but declares no parent tier.`,
        { filePath, context: `tier '${id}'` },
      );
    }
    return { ...base, kind: 'reference', parentId, annotations: references };
  }

  const tier: Tier = { ...base, kind: 'aligned', annotations: aligned };
  if (parentId !== undefined) {
    tier.parentId = parentId;
  }
  return tier;
}

function parseAlignedAnnotation(el: XmlElement, filePath?: string): AlignedAnnotation {
  const annotation: AlignedAnnotation = {
    kind: 'aligned',
    id: requireAttr(el, 'ANNOTATION_ID', filePath),
    value: annotationValue(el),
    startSlot: attr(el, 'TIME_SLOT_REF1') ?? '',
    endSlot: attr(el, 'TIME_SLOT_REF2') ?? '',
  };
  const externalRef = attr(el, 'EXT_REF');
  if (externalRef !== undefined) {
    annotation.externalRef = externalRef;
  }
  return annotation;
}

function parseReferenceAnnotation(el: XmlElement, filePath?: string): ReferenceAnnotation {
  const annotation: ReferenceAnnotation = {
    kind: 'reference',
    id: requireAttr(el, 'ANNOTATION_ID', filePath),
    value: annotationValue(el),
    parentId: attr(el, 'ANNOTATION_REF') ?? '',
  };
  const previousId = attr(el, 'PREVIOUS_ANNOTATION');
  if (previousId !== undefined) {
    annotation.previousId = previousId;
  }
  const externalRef = attr(el, 'EXT_REF');
  if (externalRef !== undefined) {
    annotation.externalRef = externalRef;
  }
  return annotation;
}

function annotationValue(el: XmlElement): string {
  return firstElementByTag(el, 'ANNOTATION_VALUE')?.textContent ?? '';
}

function requireAttr(el: XmlElement, name: string, filePath?: string): string {
  const value = attr(el, name);
  if (value === undefined || value === '') {
    throw createDocumentError(
      DocumentErrorCode.MISSING_ANNOTATION_ID,
      `${el.tagName} element is missing its ${name} attribute.`,
      { filePath },
    );
  }
  return value;
}
