import { mkdir, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import {
  AnnotationStore,
  createDocumentError,
  createInputError,
  describeError,
  DocumentErrorCode,
  InputErrorCode,
  isTierlineError,
  loadEaf,
  mergeOralTimeline,
  readOralSession,
  serializeEaf,
  WarningCode,
  type Logger,
  type OralSegment,
  type OralUtterance,
  type TimelineClip,
} from '@tierline/core';
import {
  createFfmpegRunner,
  encodeOralAudio,
  frameCount,
  loadMonoClip,
  renderOralTracks,
  sliceAudio,
  toTimelineClip,
  type FfmpegRunner,
  type PcmAudio,
} from '@tierline/media';
import type { FfmpegSettings, OralExportSettings } from '../lib/cli-config.js';
import { findLocalMedia } from '../lib/media-discovery.js';

/** Suffix of the directory holding a session's recorded oral annotation clips */
export const ORAL_ANNOTATION_DIR_SUFFIX = '_Annotations';

export interface ExportOralOptions {
  transcriptPath: string;
  settings: OralExportSettings;
  ffmpeg: FfmpegSettings;
  logger: Logger;
  generateAudio?: boolean;
  anonymize?: boolean;
  outputDir?: string;
  outputPrefix?: string;
  runner?: FfmpegRunner;
  tempRoot?: string;
  /** Document date (default: now) */
  date?: Date;
}

export interface ExportOralResult {
  sessionAudioPath: string;
  transcriptOutputPath: string;
  /** Present when audio was generated */
  audioOutputPath?: string;
  utterances: number;
  durationMs: number;
}

export interface OralOutputPaths {
  audio: string;
  transcript: string;
}

/**
 * `<audio>.oralAnnotations.wav` and `<audio>.oralAnnotations.wav.annotations.eaf`
 * beside the session audio, or `<prefix>.wav` and `<prefix>.eaf`; moved into
 * `outputDir` when one is given.
 */
export function oralOutputPaths(
  sessionAudioPath: string,
  options: { outputDir?: string; outputPrefix?: string } = {},
): OralOutputPaths {
  const directory = options.outputDir ? resolve(options.outputDir) : dirname(sessionAudioPath);
  if (options.outputPrefix) {
    return {
      audio: join(directory, `${options.outputPrefix}.wav`),
      transcript: join(directory, `${options.outputPrefix}.eaf`),
    };
  }
  const audioName = `${basename(sessionAudioPath)}.oralAnnotations.wav`;
  return {
    audio: join(directory, audioName),
    transcript: join(directory, `${audioName}.annotations.eaf`),
  };
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function locateSessionAudio(transcriptPath: string, store: AnnotationStore): Promise<string> {
  for (const descriptor of store.mediaDescriptors()) {
    const local = await findLocalMedia(transcriptPath, descriptor);
    if (local && local.toLowerCase().endsWith('.wav')) {
      return local;
    }
  }
  throw createInputError(
    InputErrorCode.MISSING_MEDIA,
    'Cannot locate the session audio (.wav) referenced by the transcript.',
    {
      filePath: transcriptPath,
      suggestion: 'Keep the session WAV next to the transcript or fix its media descriptor.',
    },
  );
}

/**
 * Export a session's oral annotations as a merged transcript and, optionally,
 * the three-channel audio it describes. Nothing is written unless the whole
 * export succeeds.
 */
export async function runExportOral(options: ExportOralOptions): Promise<ExportOralResult> {
  const { settings, logger, transcriptPath } = options;
  const runner = options.runner ?? createFfmpegRunner({ binary: options.ffmpeg.ffmpegPath, logger });
  const clipOptions = {
    sampleRate: settings.sampleRate,
    runner,
    logger,
    tempRoot: options.tempRoot,
  };

  const store = new AnnotationStore(await loadEaf(transcriptPath));
  const session = readOralSession(store, {
    splitRepetition: settings.splitRepetition,
    filePath: transcriptPath,
  });

  const sessionAudioPath = await locateSessionAudio(transcriptPath, store);
  const annotationDir = `${sessionAudioPath}${ORAL_ANNOTATION_DIR_SUFFIX}`;
  if (!(await isDirectory(annotationDir))) {
    throw createInputError(
      InputErrorCode.MISSING_ORAL_ANNOTATION_DIR,
      `No oral annotation directory at ${annotationDir}.`,
      { filePath: transcriptPath },
    );
  }
  const outputs = oralOutputPaths(sessionAudioPath, options);

  logger.info(`Reading session audio ${sessionAudioPath}`);
  const sessionAudio = await loadMonoClip(sessionAudioPath, clipOptions);

  const loadOptionalClip = async (fileName: string): Promise<TimelineClip<PcmAudio> | undefined> => {
    const path = join(annotationDir, fileName);
    if (!(await isFile(path))) {
      return undefined;
    }
    return toTimelineClip(await loadMonoClip(path, clipOptions));
  };

  const utterances: OralUtterance<PcmAudio>[] = [];
  for (const segment of session.segments) {
    const utterance = await buildUtterance(segment, sessionAudio, loadOptionalClip);
    if (!utterance.repetition && !utterance.translation) {
      logger.warn(
        `[${WarningCode.MISSING_ORAL_CLIP}] No oral annotation clips for segment ${segment.ordinal} (${segment.carefulClip}, ${segment.translationClip}).`,
      );
    }
    utterances.push(utterance);
  }

  const merged = mergeOralTimeline(utterances, {
    redact: options.anonymize ?? false,
    document: {
      audioPath: outputs.audio,
      contributors: settings.contributors,
      sourceLanguage: settings.sourceLanguage,
      translationLanguage: settings.translationLanguage,
      date: options.date,
    },
  });

  let xml: string;
  try {
    xml = serializeEaf(merged.document);
  } catch (error) {
    if (isTierlineError(error)) {
      throw error;
    }
    throw createDocumentError(
      DocumentErrorCode.RENDER_FAILED,
      `Failed to render oral annotation transcript: ${describeError(error)}`,
      { filePath: outputs.transcript, cause: error },
    );
  }
  const audio = options.generateAudio
    ? encodeOralAudio(renderOralTracks(merged.placements, settings.sampleRate))
    : undefined;

  await writeOutputs(outputs, xml, audio);
  logger.info(`Wrote ${outputs.transcript}`);
  if (audio) {
    logger.info(`Wrote ${outputs.audio}`);
  }

  const result: ExportOralResult = {
    sessionAudioPath,
    transcriptOutputPath: outputs.transcript,
    utterances: utterances.length,
    durationMs: merged.durationMs,
  };
  if (audio) {
    result.audioOutputPath = outputs.audio;
  }
  return result;
}

async function buildUtterance(
  segment: OralSegment,
  sessionAudio: PcmAudio,
  loadOptionalClip: (fileName: string) => Promise<TimelineClip<PcmAudio> | undefined>,
): Promise<OralUtterance<PcmAudio>> {
  const original = sliceAudio(sessionAudio, segment.start, segment.end);
  const utterance: OralUtterance<PcmAudio> = {
    originalText: segment.originalText,
    repetitionText: segment.repetitionText,
    translationText: segment.translationText,
    sourceText: segment.sourceText,
    label: `${segment.start}-${segment.end} ms`,
  };
  if (frameCount(original) > 0) {
    utterance.original = toTimelineClip(original);
  }
  const repetition = await loadOptionalClip(segment.carefulClip);
  if (repetition) {
    utterance.repetition = repetition;
  }
  const translation = await loadOptionalClip(segment.translationClip);
  if (translation) {
    utterance.translation = translation;
  }
  return utterance;
}

async function writeOutputs(outputs: OralOutputPaths, xml: string, audio: Buffer | undefined): Promise<void> {
  const written: string[] = [];
  try {
    await mkdir(dirname(outputs.transcript), { recursive: true });
    if (audio) {
      await writeFile(outputs.audio, audio);
      written.push(outputs.audio);
    }
    await writeFile(outputs.transcript, xml, 'utf8');
  } catch (error) {
    await Promise.all(written.map((path) => rm(path, { force: true })));
    throw createDocumentError(
      DocumentErrorCode.FILE_WRITE_FAILED,
      `Failed to write oral annotation export: ${describeError(error)}`,
      { filePath: outputs.transcript, cause: error },
    );
  }
}
