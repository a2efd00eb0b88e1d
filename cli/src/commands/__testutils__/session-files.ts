import { writeFile } from 'node:fs/promises';
import { encodeWav } from '@tierline/media';

/**
 * Mono 16-bit WAV whose samples run `first`, `first + 1`, ... so that slices
 * can be recognized after mixing.
 */
export async function writeRampWav(
  path: string,
  frames: number,
  sampleRate: number,
  first = 1,
): Promise<Int16Array> {
  const samples = new Int16Array(frames);
  for (let i = 0; i < frames; i += 1) {
    samples[i] = first + (i % 1000);
  }
  await writeFile(path, encodeWav({ sampleRate, channels: 1, samples }));
  return samples;
}

export interface AnnotationSpec {
  id: string;
  value: string;
}

function alignedTier(
  tierId: string,
  type: string,
  slots: [string, string][],
  annotations: AnnotationSpec[],
): string {
  const body = annotations
    .map((annotation, index) => {
      const [start, end] = slots[index] ?? ['', ''];
      return `        <ANNOTATION>
            <ALIGNABLE_ANNOTATION ANNOTATION_ID="${annotation.id}" TIME_SLOT_REF1="${start}" TIME_SLOT_REF2="${end}">
                <ANNOTATION_VALUE>${annotation.value}</ANNOTATION_VALUE>
            </ALIGNABLE_ANNOTATION>
        </ANNOTATION>`;
    })
    .join('\n');
  return `    <TIER LINGUISTIC_TYPE_REF="${type}" TIER_ID="${tierId}">\n${body}\n    </TIER>`;
}

function referenceTier(
  tierId: string,
  type: string,
  parent: string,
  annotations: (AnnotationSpec & { parentId: string })[],
): string {
  const body = annotations
    .map(
      (annotation) => `        <ANNOTATION>
            <REF_ANNOTATION ANNOTATION_ID="${annotation.id}" ANNOTATION_REF="${annotation.parentId}">
                <ANNOTATION_VALUE>${annotation.value}</ANNOTATION_VALUE>
            </REF_ANNOTATION>
        </ANNOTATION>`,
    )
    .join('\n');
  return `    <TIER LINGUISTIC_TYPE_REF="${type}" PARENT_REF="${parent}" TIER_ID="${tierId}">\n${body}\n    </TIER>`;
}

function document(mediaXml: string, slots: [string, number][], tiersXml: string[]): string {
  const slotXml = slots
    .map(([id, time]) => `        <TIME_SLOT TIME_SLOT_ID="${id}" TIME_VALUE="${time}"/>`)
    .join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>
<ANNOTATION_DOCUMENT AUTHOR="" DATE="2024-05-01T09:00:00+00:00" FORMAT="3.0" VERSION="3.0">
    <HEADER MEDIA_FILE="" TIME_UNITS="milliseconds">
${mediaXml}
    </HEADER>
    <TIME_ORDER>
${slotXml}
    </TIME_ORDER>
${tiersXml.join('\n')}
    <LINGUISTIC_TYPE GRAPHIC_REFERENCES="false" LINGUISTIC_TYPE_ID="Transcription" TIME_ALIGNABLE="true"/>
    <LINGUISTIC_TYPE CONSTRAINTS="Symbolic_Association" GRAPHIC_REFERENCES="false" LINGUISTIC_TYPE_ID="Translation" TIME_ALIGNABLE="false"/>
    <LINGUISTIC_TYPE CONSTRAINTS="Symbolic_Association" GRAPHIC_REFERENCES="false" LINGUISTIC_TYPE_ID="SayMoreify-Metadata" TIME_ALIGNABLE="false"/>
    <LINGUISTIC_TYPE GRAPHIC_REFERENCES="false" LINGUISTIC_TYPE_ID="event" TIME_ALIGNABLE="true"/>
    <CONSTRAINT DESCRIPTION="1-1 association with a parent annotation" STEREOTYPE="Symbolic_Association"/>
</ANNOTATION_DOCUMENT>
`;
}

/**
 * An interview transcript referencing `interview.wav` and `interview.mp4`
 * with one marked-up annotation and one Postprocess span at 1000-2000 ms.
 */
export function interviewTranscript(): string {
  return document(
    [
      '        <MEDIA_DESCRIPTOR MEDIA_URL="file:///recordings/interview.wav" MIME_TYPE="audio/x-wav" RELATIVE_MEDIA_URL="./interview.wav"/>',
      '        <MEDIA_DESCRIPTOR MEDIA_URL="file:///recordings/interview.mp4" MIME_TYPE="video/mp4" RELATIVE_MEDIA_URL="./interview.mp4"/>',
    ].join('\n'),
    [
      ['ts1', 1000],
      ['ts2', 2000],
      ['ts3', 2500],
      ['ts4', 3500],
    ],
    [
      alignedTier(
        'Transcription',
        'Transcription',
        [
          ['ts1', 'ts2'],
          ['ts3', 'ts4'],
        ],
        [
          { id: 'a1', value: 'my name is [name]Placeholder[/name]' },
          { id: 'a2', value: 'nothing to hide' },
        ],
      ),
      alignedTier('Postprocess', 'event', [['ts1', 'ts2']], [{ id: 'a3', value: 'anonymize' }]),
    ],
  );
}

/**
 * A recorded session over `session.wav`: segments at 0-500 ms (original and
 * careful repetition), 500-1000 ms (ignored) and 1000-1500 ms (a name).
 */
export function oralSessionTranscript(mediaUrl = 'file:///elsewhere/session.wav'): string {
  return document(
    `        <MEDIA_DESCRIPTOR MEDIA_URL="${mediaUrl}" MIME_TYPE="audio/x-wav" RELATIVE_MEDIA_URL="./session.wav"/>`,
    [
      ['ts1', 0],
      ['ts2', 500],
      ['ts3', 1000],
      ['ts4', 1500],
    ],
    [
      alignedTier(
        'Transcription',
        'Transcription',
        [
          ['ts1', 'ts2'],
          ['ts2', 'ts3'],
          ['ts3', 'ts4'],
        ],
        [
          { id: 'a1', value: 'one || one again' },
          { id: 'a2', value: '%ignore%' },
          { id: 'a3', value: '[name]Placeholder[/name] two' },
        ],
      ),
      referenceTier('Translation', 'Translation', 'Transcription', [
        { id: 'a4', value: 'first', parentId: 'a1' },
        { id: 'a5', value: 'second', parentId: 'a3' },
      ]),
      referenceTier('Source', 'SayMoreify-Metadata', 'Transcription', [
        { id: 'a6', value: 'src-1', parentId: 'a1' },
      ]),
    ],
  );
}
