/* eslint-env node */
import process from 'node:process';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import AjvModule, { type ErrorObject, type SchemaObject } from 'ajv';
import { parse as parseYaml } from 'yaml';
import {
  createInputError,
  DEFAULT_INTERVAL_TIER,
  DEFAULT_TRANSLATION_LANGUAGE,
  describeError,
  InputErrorCode,
  isLogLevel,
  type Language,
  type LogLevel,
  type OralContributors,
} from '@tierline/core';

export const CONFIG_FILE_NAME = 'tierline.yaml';

export interface AnonymizeSettings {
  outputDir: string;
  outputSuffix: string;
  /** Regular expression applied to the rest of a media file's name after the transcript basename */
  audioPattern: string;
  videoPattern: string;
  audio: boolean;
  video: boolean;
  text: boolean;
  review: boolean;
  reviewContextMs: number;
  intervalTier: string;
}

export interface OralExportSettings {
  /** Sample rate of the combined audio; every clip is converted to it */
  sampleRate: number;
  splitRepetition: boolean;
  contributors: OralContributors;
  sourceLanguage?: Language;
  translationLanguage: Language;
}

export interface FfmpegSettings {
  ffmpegPath: string;
  ffprobePath: string;
}

export interface CliConfig {
  anonymize: AnonymizeSettings;
  oralExport: OralExportSettings;
  ffmpeg: FfmpegSettings;
  /** File the settings were read from, if any */
  configPath?: string;
}

/** Shape of `tierline.yaml`: every section and field is optional. */
export interface CliConfigFile {
  anonymize?: Partial<AnonymizeSettings>;
  oralExport?: Partial<Omit<OralExportSettings, 'contributors'>> & {
    contributors?: OralContributors;
  };
  ffmpeg?: Partial<FfmpegSettings>;
}

export const DEFAULT_ANONYMIZE_SETTINGS: AnonymizeSettings = {
  outputDir: 'anonymized',
  outputSuffix: '-ANONYMIZED',
  audioPattern: '\\.wav$',
  videoPattern: '\\.mp4$',
  audio: true,
  video: true,
  text: true,
  review: false,
  reviewContextMs: 1000,
  intervalTier: DEFAULT_INTERVAL_TIER,
};

export const DEFAULT_SAMPLE_RATE = 44100;

const languageSchema: SchemaObject = {
  type: 'object',
  additionalProperties: false,
  required: ['id'],
  properties: {
    id: { type: 'string', minLength: 1 },
    label: { type: 'string' },
    definition: { type: 'string' },
  },
};

const CONFIG_SCHEMA: SchemaObject = {
  type: 'object',
  additionalProperties: false,
  properties: {
    anonymize: {
      type: 'object',
      additionalProperties: false,
      properties: {
        outputDir: { type: 'string', minLength: 1 },
        outputSuffix: { type: 'string' },
        audioPattern: { type: 'string' },
        videoPattern: { type: 'string' },
        audio: { type: 'boolean' },
        video: { type: 'boolean' },
        text: { type: 'boolean' },
        review: { type: 'boolean' },
        reviewContextMs: { type: 'integer', minimum: 0 },
        intervalTier: { type: 'string', minLength: 1 },
      },
    },
    oralExport: {
      type: 'object',
      additionalProperties: false,
      properties: {
        sampleRate: { type: 'integer', minimum: 1 },
        splitRepetition: { type: 'boolean' },
        contributors: {
          type: 'object',
          additionalProperties: false,
          properties: {
            originalAnnotator: { type: 'string' },
            repeater: { type: 'string' },
            repetitionAnnotator: { type: 'string' },
            translator: { type: 'string' },
            translationAnnotator: { type: 'string' },
          },
        },
        sourceLanguage: languageSchema,
        translationLanguage: languageSchema,
      },
    },
    ffmpeg: {
      type: 'object',
      additionalProperties: false,
      properties: {
        ffmpegPath: { type: 'string', minLength: 1 },
        ffprobePath: { type: 'string', minLength: 1 },
      },
    },
  },
};

// ajv is published as CommonJS; under NodeNext its class sits on `default`.
const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<CliConfigFile>(CONFIG_SCHEMA);

function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return [];
  }
  return errors.map((err) => {
    const path = err.instancePath || '/';
    const message = err.message ?? 'unknown error';
    return `${path} ${message}`.trim();
  });
}

/**
 * The config file to read: `--config`, then `TIERLINE_CONFIG`, then a
 * `tierline.yaml` in the working directory when there is one.
 */
export function resolveConfigPath(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string | undefined {
  const requested = explicitPath ?? env.TIERLINE_CONFIG;
  if (requested) {
    return resolve(cwd, requested);
  }
  const local = resolve(cwd, CONFIG_FILE_NAME);
  return existsSync(local) ? local : undefined;
}

/**
 * Check that a media pattern compiles as a regular expression.
 */
export function assertValidPattern(pattern: string, name: string): void {
  try {
    new RegExp(pattern);
  } catch (error) {
    throw createInputError(
      InputErrorCode.INVALID_ARGUMENT,
      `${name} is not a valid regular expression: ${describeError(error)}`,
      { cause: error },
    );
  }
}

export function parseCliConfig(
  contents: string,
  env: NodeJS.ProcessEnv = process.env,
  configPath?: string,
): CliConfig {
  let data: unknown;
  try {
    data = parseYaml(contents);
  } catch (error) {
    throw createInputError(InputErrorCode.CONFIG_LOAD_FAILED, `Invalid YAML: ${describeError(error)}`, {
      filePath: configPath,
      cause: error,
    });
  }

  // An empty file parses to null.
  const file = data ?? {};
  if (!validateConfigFile(file)) {
    throw createInputError(
      InputErrorCode.INVALID_CONFIG,
      `Invalid configuration: ${formatSchemaErrors(validateConfigFile.errors).join('; ')}`,
      { filePath: configPath },
    );
  }

  const config = buildCliConfig(file, env);
  if (configPath !== undefined) {
    config.configPath = configPath;
  }
  try {
    assertValidPattern(config.anonymize.audioPattern, 'anonymize.audioPattern');
    assertValidPattern(config.anonymize.videoPattern, 'anonymize.videoPattern');
  } catch (error) {
    throw createInputError(InputErrorCode.INVALID_CONFIG, describeError(error), {
      filePath: configPath,
      cause: error,
    });
  }
  return config;
}

/**
 * Merge a validated config file over the defaults. `FFMPEG_PATH` and
 * `FFPROBE_PATH` take precedence over the file.
 */
export function buildCliConfig(
  file: CliConfigFile = {},
  env: NodeJS.ProcessEnv = process.env,
): CliConfig {
  const oralExport = file.oralExport ?? {};
  const settings: OralExportSettings = {
    sampleRate: oralExport.sampleRate ?? DEFAULT_SAMPLE_RATE,
    splitRepetition: oralExport.splitRepetition ?? true,
    contributors: { ...oralExport.contributors },
    translationLanguage: oralExport.translationLanguage ?? DEFAULT_TRANSLATION_LANGUAGE,
  };
  if (oralExport.sourceLanguage) {
    settings.sourceLanguage = oralExport.sourceLanguage;
  }

  return {
    anonymize: { ...DEFAULT_ANONYMIZE_SETTINGS, ...file.anonymize },
    oralExport: settings,
    ffmpeg: {
      ffmpegPath: env.FFMPEG_PATH || file.ffmpeg?.ffmpegPath || 'ffmpeg',
      ffprobePath: env.FFPROBE_PATH || file.ffmpeg?.ffprobePath || 'ffprobe',
    },
  };
}

/**
 * Load settings from `configPath`, or the defaults when there is no file.
 */
export async function loadCliConfig(
  configPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): Promise<CliConfig> {
  if (configPath === undefined) {
    return buildCliConfig({}, env);
  }

  let contents: string;
  try {
    contents = await readFile(configPath, 'utf8');
  } catch (error) {
    throw createInputError(
      InputErrorCode.CONFIG_LOAD_FAILED,
      `Cannot read configuration: ${describeError(error)}`,
      { filePath: configPath, cause: error },
    );
  }
  return parseCliConfig(contents, env, configPath);
}

/**
 * `--log-level`, then `TIERLINE_LOG_LEVEL`, then `info`.
 */
export function resolveLogLevel(
  levelFlag: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const requested = levelFlag ?? env.TIERLINE_LOG_LEVEL;
  if (requested === undefined || requested === '') {
    return 'info';
  }
  if (!isLogLevel(requested)) {
    throw createInputError(
      InputErrorCode.INVALID_ARGUMENT,
      `Invalid log level "${requested}". Use debug, info, warn, error or silent.`,
    );
  }
  return requested;
}
