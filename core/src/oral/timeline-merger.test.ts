import { describe, expect, it } from 'vitest';
import { AnnotationStore } from '../document/annotation-store.js';
import { parseEaf } from '../document/eaf-parser.js';
import { serializeEaf } from '../document/eaf-writer.js';
import { mergeOralTimeline, type OralUtterance, type TimelineClip } from './timeline-merger.js';

function clip(durationMs: number, audio: string): TimelineClip<string> {
  return { durationMs, audio };
}

const first: OralUtterance<string> = {
  originalText: 'one',
  repetitionText: 'one slowly',
  translationText: 'uno',
  sourceText: 'tape 1',
  original: clip(1000, 'o0'),
  repetition: clip(800, 'r0'),
  translation: clip(1200, 't0'),
};

const second: OralUtterance<string> = {
  originalText: 'two',
  repetitionText: '',
  translationText: 'dos',
  sourceText: 'tape 2',
  original: clip(500, 'o1'),
  translation: clip(700, 't1'),
};

const utterances = [first, second];

const fixedDocument = { date: new Date(Date.UTC(2024, 2, 1)), urn: 'urn:nl-mpi-tools-elan-eaf:test' };

describe('mergeOralTimeline', () => {
  it('places clips end to end in utterance order', () => {
    const result = mergeOralTimeline(utterances, { document: fixedDocument });

    expect(
      result.placements.map((placed) => [placed.track, placed.utterance, placed.start, placed.end]),
    ).toEqual([
      ['original', 0, 0, 1000],
      ['repetition', 0, 1000, 1800],
      ['translation', 0, 1800, 3000],
      ['original', 1, 3000, 3500],
      ['translation', 1, 3500, 4200],
    ]);
    expect(result.durationMs).toBe(4200);
  });

  it('leaves the repetition tiers short when an utterance has no repetition', () => {
    const third: OralUtterance<string> = {
      originalText: 'three',
      repetitionText: 'three slowly',
      translationText: 'tres',
      sourceText: 'tape 3',
      original: clip(400, 'o2'),
      repetition: clip(300, 'r2'),
      translation: clip(600, 't2'),
    };
    const { document } = mergeOralTimeline([first, second, third], { document: fixedDocument });
    const store = new AnnotationStore(document);
    const count = (tier: string) => store.annotationsOf(tier).length;

    expect(count('Original')).toBe(3);
    expect(count('Original-ID')).toBe(3);
    expect(count('Translation')).toBe(3);
    expect(count('Translation-ID')).toBe(3);
    expect(count('Repetition')).toBe(2);
    expect(count('Repetition-ID')).toBe(2);
    expect(store.annotationsOf('Repetition-ID').map((span) => span.value)).toEqual(['0', '2']);
  });

  it('allocates two time slots per placed clip', () => {
    const result = mergeOralTimeline(utterances, { document: fixedDocument });

    expect(result.allocated.timeSlots).toBe(2 * 5);
    expect(result.document.timeSlots).toHaveLength(10);
    expect(result.document.timeSlots.slice(0, 4)).toEqual([
      { id: 'ts1', time: 0 },
      { id: 'ts2', time: 1000 },
      { id: 'ts3', time: 1000 },
      { id: 'ts4', time: 1800 },
    ]);
  });

  it('allocates reference annotations after each utterance', () => {
    const { document, allocated } = mergeOralTimeline(utterances, { document: fixedDocument });
    const tier = (id: string) => document.tiers.find((candidate) => candidate.id === id);

    expect(tier('Original')?.annotations.map((a) => a.id)).toEqual(['a1', 'a8']);
    expect(tier('Original-ID')?.annotations).toEqual([
      { kind: 'reference', id: 'a4', value: '0', parentId: 'a1' },
      { kind: 'reference', id: 'a10', value: '1', parentId: 'a8' },
    ]);
    expect(tier('Original-Source')?.annotations.map((a) => [a.id, a.value])).toEqual([
      ['a5', 'tape 1'],
      ['a11', 'tape 2'],
    ]);
    expect(tier('Repetition-ID')?.annotations.map((a) => a.id)).toEqual(['a6']);
    expect(tier('Translation-ID')?.annotations.map((a) => [a.id, a.value])).toEqual([
      ['a7', '0'],
      ['a12', '1'],
    ]);
    expect(allocated.annotations).toBe(12);
    expect(document.header.properties).toEqual([
      { name: 'URN', value: 'urn:nl-mpi-tools-elan-eaf:test' },
      { name: 'lastUsedAnnotationId', value: '12' },
    ]);
  });

  it('lays out the oral annotation tiers', () => {
    const { document } = mergeOralTimeline(utterances, { document: fixedDocument });

    expect(document.tiers.map((tier) => [tier.id, tier.annotations.length])).toEqual([
      ['Original', 2],
      ['Original-ID', 2],
      ['Original-Source', 2],
      ['Repetition', 1],
      ['Repetition-ID', 1],
      ['Translation', 2],
      ['Translation-ID', 2],
      ['Postprocess', 0],
    ]);
    expect(document.linguisticTypes.map((type) => type.id)).toEqual([
      'oral-annotation-text',
      'oral-annotation-id',
      'oral-annotation-source',
      'event',
    ]);
    expect(document.constraints).toHaveLength(4);
  });

  it('produces a document that parses back with its references intact', () => {
    const { document } = mergeOralTimeline(utterances, { document: fixedDocument });

    const store = new AnnotationStore(parseEaf(serializeEaf(document)));

    expect(store.annotationsOf('Translation-ID')).toEqual([
      { kind: 'reference', id: 'a7', start: 1800, end: 3000, value: '0', parentValue: 'uno' },
      { kind: 'reference', id: 'a12', start: 3500, end: 4200, value: '1', parentValue: 'dos' },
    ]);
    expect(store.getTier('Postprocess')?.kind).toBe('aligned');
  });

  it('writes contributors and languages onto the text tiers', () => {
    const { document } = mergeOralTimeline(utterances, {
      document: {
        ...fixedDocument,
        contributors: { repeater: 'Speaker B', translationAnnotator: 'Annotator C' },
        sourceLanguage: { id: 'xyz', label: 'Test language (xyz)' },
      },
    });
    const repetition = document.tiers.find((tier) => tier.id === 'Repetition');
    const translation = document.tiers.find((tier) => tier.id === 'Translation');

    expect(repetition).toMatchObject({ participant: 'Speaker B', language: 'xyz' });
    expect(translation).toMatchObject({ annotator: 'Annotator C', language: 'eng' });
    expect(document.languages.map((language) => language.id)).toEqual(['eng', 'xyz']);
  });

  it('silences clips whose text needed redaction', () => {
    const result = mergeOralTimeline(
      [
        {
          ...second,
          originalText: '[name]Alder[/name] said',
          translationText: 'dos',
          original: clip(500, 'o1'),
        },
      ],
      { redact: true, document: fixedDocument },
    );

    expect(result.placements.map((placed) => [placed.track, placed.text, placed.silenced])).toEqual([
      ['original', '(NAME) said', true],
      ['translation', 'dos', false],
    ]);
  });

  it('keeps text as written when redaction is off', () => {
    const result = mergeOralTimeline(
      [{ ...second, originalText: '[name]Alder[/name]', original: clip(500, 'o1') }],
      { document: fixedDocument },
    );

    expect(result.placements[0]?.text).toBe('[name]Alder[/name]');
    expect(result.placements[0]?.silenced).toBe(false);
  });

  it('fails when an utterance has no original clip', () => {
    expect(() =>
      mergeOralTimeline([{ ...second, original: undefined, label: '3_to_4.5' }]),
    ).toThrow(expect.objectContaining({ code: 'I003' }));
  });

  it('returns an empty timeline for no utterances', () => {
    const result = mergeOralTimeline<string>([], { document: fixedDocument });

    expect(result.placements).toEqual([]);
    expect(result.durationMs).toBe(0);
    expect(result.allocated).toEqual({ timeSlots: 0, annotations: 0 });
  });
});
