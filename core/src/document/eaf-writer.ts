import type {
  Annotation,
  AnnotationDocument,
  MediaDescriptor,
  Tier,
  TimeSlot,
} from './types.js';
import {
  attr,
  elementsByTag,
  escapeXml,
  firstElementByTag,
  parseXml,
  serializeXml,
  XML_DECLARATION,
  type XmlElement,
} from './xml.js';

const SCHEMA_LOCATION = 'http://www.mpi.nl/tools/elan/EAFv3.0.xsd';
const XSI_NAMESPACE = 'http://www.w3.org/2001/XMLSchema-instance';

/**
 * Serialize a document to EAF text.
 *
 * A loaded document is written by patching its original XML: annotation
 * values are replaced by ANNOTATION_ID and media descriptor URLs by position,
 * so everything the model does not cover (controlled vocabularies, lexicon
 * references, comments) survives unchanged. Documents built in memory are
 * written from the model in schema order.
 */
export function serializeEaf(doc: AnnotationDocument): string {
  return doc.source === undefined ? generateEaf(doc) : patchEaf(doc, doc.source);
}

function patchEaf(doc: AnnotationDocument, source: string): string {
  const root = parseXml(source);

  const values = new Map<string, string>();
  for (const tier of doc.tiers) {
    for (const annotation of tier.annotations) {
      values.set(annotation.id, annotation.value);
    }
  }

  for (const tag of ['ALIGNABLE_ANNOTATION', 'REF_ANNOTATION']) {
    for (const el of elementsByTag(root, tag)) {
      const id = attr(el, 'ANNOTATION_ID');
      const value = id === undefined ? undefined : values.get(id);
      if (value === undefined) continue;
      const valueEl = firstElementByTag(el, 'ANNOTATION_VALUE');
      if (valueEl && valueEl.textContent !== value) {
        valueEl.textContent = value;
      }
    }
  }

  const descriptorEls = elementsByTag(root, 'MEDIA_DESCRIPTOR');
  doc.mediaDescriptors.forEach((descriptor, index) => {
    const el = descriptorEls[index];
    if (el) {
      patchMediaDescriptor(el, descriptor);
    }
  });

  return serializeXml(root);
}

function patchMediaDescriptor(el: XmlElement, descriptor: MediaDescriptor): void {
  el.setAttribute('MEDIA_URL', descriptor.mediaUrl);
  if (descriptor.relativeMediaUrl !== undefined) {
    el.setAttribute('RELATIVE_MEDIA_URL', descriptor.relativeMediaUrl);
  }
  if (descriptor.mimeType !== undefined) {
    el.setAttribute('MIME_TYPE', descriptor.mimeType);
  }
}

function attribute(name: string, value: string | undefined): string {
  return value === undefined ? '' : ` ${name}="${escapeXml(value)}"`;
}

function generateEaf(doc: AnnotationDocument): string {
  const { header } = doc;

  const mediaXml = doc.mediaDescriptors.map(
    (media) =>
      `        <MEDIA_DESCRIPTOR${attribute('MEDIA_URL', media.mediaUrl)}${attribute('MIME_TYPE', media.mimeType)}${attribute('RELATIVE_MEDIA_URL', media.relativeMediaUrl)}${attribute('EXTRACTED_FROM', media.extractedFrom)}/>`,
  );
  const propertyXml = header.properties.map(
    (property) =>
      `        <PROPERTY NAME="${escapeXml(property.name)}">${escapeXml(property.value)}</PROPERTY>`,
  );
  const headerXml = [...mediaXml, ...propertyXml];

  const linguisticTypeXml = doc.linguisticTypes.map(
    (type) =>
      `    <LINGUISTIC_TYPE${attribute('CONSTRAINTS', type.constraints)} GRAPHIC_REFERENCES="${type.graphicReferences}" LINGUISTIC_TYPE_ID="${escapeXml(type.id)}" TIME_ALIGNABLE="${type.timeAlignable}"/>`,
  );
  const languageXml = doc.languages.map(
    (language) =>
      `    <LANGUAGE${attribute('LANG_DEF', language.definition)} LANG_ID="${escapeXml(language.id)}"${attribute('LANG_LABEL', language.label)}/>`,
  );
  const constraintXml = doc.constraints.map(
    (constraint) =>
      `    <CONSTRAINT DESCRIPTION="${escapeXml(constraint.description)}" STEREOTYPE="${escapeXml(constraint.stereotype)}"/>`,
  );

  return [
    XML_DECLARATION,
    `<ANNOTATION_DOCUMENT AUTHOR="${escapeXml(header.author)}" DATE="${escapeXml(header.date)}" FORMAT="${escapeXml(header.format)}" VERSION="${escapeXml(header.version)}" xmlns:xsi="${XSI_NAMESPACE}" xsi:noNamespaceSchemaLocation="${SCHEMA_LOCATION}">`,
    headerXml.length === 0
      ? `    <HEADER MEDIA_FILE="" TIME_UNITS="${escapeXml(header.timeUnits)}"/>`
      : [
          `    <HEADER MEDIA_FILE="" TIME_UNITS="${escapeXml(header.timeUnits)}">`,
          ...headerXml,
          '    </HEADER>',
        ].join('\n'),
    timeOrderXml(doc.timeSlots),
    ...doc.tiers.map(tierXml),
    ...linguisticTypeXml,
    ...languageXml,
    ...constraintXml,
    '</ANNOTATION_DOCUMENT>',
    '',
  ].join('\n');
}

function timeOrderXml(slots: TimeSlot[]): string {
  if (slots.length === 0) {
    return '    <TIME_ORDER/>';
  }
  const slotXml = slots.map(
    (slot) =>
      `        <TIME_SLOT TIME_SLOT_ID="${escapeXml(slot.id)}"${attribute('TIME_VALUE', slot.time === undefined ? undefined : String(slot.time))}/>`,
  );
  return ['    <TIME_ORDER>', ...slotXml, '    </TIME_ORDER>'].join('\n');
}

function tierXml(tier: Tier): string {
  const open = `    <TIER${attribute('ANNOTATOR', tier.annotator)}${attribute('LANG_REF', tier.language)} LINGUISTIC_TYPE_REF="${escapeXml(tier.linguisticType)}"${attribute('PARENT_REF', tier.parentId)}${attribute('PARTICIPANT', tier.participant)} TIER_ID="${escapeXml(tier.id)}"`;
  if (tier.annotations.length === 0) {
    return `${open}/>`;
  }
  const annotations: Annotation[] = tier.annotations;
  return [`${open}>`, ...annotations.map(annotationXml), '    </TIER>'].join('\n');
}

function annotationXml(annotation: Annotation): string {
  const opening =
    annotation.kind === 'aligned'
      ? `            <ALIGNABLE_ANNOTATION ANNOTATION_ID="${escapeXml(annotation.id)}"${attribute('EXT_REF', annotation.externalRef)} TIME_SLOT_REF1="${escapeXml(annotation.startSlot)}" TIME_SLOT_REF2="${escapeXml(annotation.endSlot)}">`
      : `            <REF_ANNOTATION ANNOTATION_ID="${escapeXml(annotation.id)}" ANNOTATION_REF="${escapeXml(annotation.parentId)}"${attribute('EXT_REF', annotation.externalRef)}${attribute('PREVIOUS_ANNOTATION', annotation.previousId)}>`;
  const closing =
    annotation.kind === 'aligned'
      ? '            </ALIGNABLE_ANNOTATION>'
      : '            </REF_ANNOTATION>';
  return [
    '        <ANNOTATION>',
    opening,
    `                <ANNOTATION_VALUE>${escapeXml(annotation.value)}</ANNOTATION_VALUE>`,
    closing,
    '        </ANNOTATION>',
  ].join('\n');
}
