#!/usr/bin/env node
/* eslint-env node */
import { dirname } from 'node:path';
import process from 'node:process';
import meow from 'meow';
import chalk from 'chalk';
import {
  createLogger,
  formatError,
  isTierlineError,
  loadEnv,
  type Logger,
  type LogSink,
  type OralContributors,
} from '@tierline/core';
import { runAnonymize } from './commands/anonymize.js';
import { runExportOral } from './commands/export-oral.js';
import {
  assertValidPattern,
  loadCliConfig,
  resolveConfigPath,
  resolveLogLevel,
  type CliConfig,
} from './lib/cli-config.js';

const cli = meow(
  `\nUsage\n  $ tierline <command> [options]\n\nCommands\n  anonymize <transcripts...>   Redact transcripts and silence/blur their media\n  export-oral <transcript>     Export a session's oral annotations as one transcript (and audio)\n\nGlobal options\n  --config <file>              Settings file (default: $TIERLINE_CONFIG or ./tierline.yaml)\n  --log-level <level>          debug, info, warn, error or silent (default: info)\n\nanonymize options\n  --output-dir <dir>           Where anonymized files go (default: anonymized)\n  --output-suffix <text>       Added to output basenames (default: -ANONYMIZED)\n  --review                     Cut a short clip around each redacted span for review\n  --audio-pattern <regex>      Audio files: transcript basename + pattern (default: \\.wav$)\n  --video-pattern <regex>      Video files: transcript basename + pattern (default: \\.mp4$)\n  --no-audio, --no-video, --no-text\n                               Skip that kind of output\n\nexport-oral options\n  --generate-audio             Also write the combined three-channel WAV\n  --anonymize                  Redact marked-up text and silence the matching clips\n  --output-dir <dir>           Output directory (default: beside the session audio)\n  --output-prefix <name>       Output file name without extension\n  --original-annotator, --repeater, --repetition-annotator,\n  --translator, --translation-annotator <name>\n                               Contributors recorded on the tiers\n  --no-split-repetition        Keep ' || ' transcriptions on the original tier\n\nExamples\n  $ tierline anonymize recordings/*.eaf --review\n  $ tierline anonymize interview.eaf --output-dir=public --no-video\n  $ tierline export-oral session.eaf --generate-audio --anonymize\n  $ tierline export-oral session.eaf --output-prefix=session-oral --translator="Speaker Two"\n`,
  {
    importMeta: import.meta,
    // Unset booleans fall back to the config file.
    booleanDefault: undefined,
    flags: {
      config: { type: 'string' },
      logLevel: { type: 'string' },
      outputDir: { type: 'string' },
      outputSuffix: { type: 'string' },
      review: { type: 'boolean' },
      audioPattern: { type: 'string' },
      videoPattern: { type: 'string' },
      audio: { type: 'boolean' },
      video: { type: 'boolean' },
      text: { type: 'boolean' },
      generateAudio: { type: 'boolean' },
      anonymize: { type: 'boolean' },
      outputPrefix: { type: 'string' },
      originalAnnotator: { type: 'string' },
      repeater: { type: 'string' },
      repetitionAnnotator: { type: 'string' },
      translator: { type: 'string' },
      translationAnnotator: { type: 'string' },
      splitRepetition: { type: 'boolean' },
    },
  },
);

function createCliSink(): LogSink {
  const console = globalThis.console;
  return {
    debug: (message?: unknown, ...rest: unknown[]) => console.debug(chalk.dim(String(message)), ...rest),
    info: (message?: unknown, ...rest: unknown[]) => console.info(String(message), ...rest),
    warn: (message?: unknown, ...rest: unknown[]) => console.warn(chalk.yellow(String(message)), ...rest),
    error: (message?: unknown, ...rest: unknown[]) => console.error(chalk.red(String(message)), ...rest),
  };
}

function reportError(logger: Logger, error: unknown): void {
  if (isTierlineError(error)) {
    logger.error(formatError(error));
    return;
  }
  logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
}

async function main(): Promise<void> {
  const [command, ...rest] = cli.input;
  const flags = cli.flags;
  const console = globalThis.console;

  if (!command) {
    cli.showHelp(0);
    return;
  }

  let logger: Logger;
  let config: CliConfig;
  try {
    const initialConfigPath = resolveConfigPath(flags.config);
    loadEnv({ projectDir: initialConfigPath ? dirname(initialConfigPath) : undefined });
    logger = createLogger({ level: resolveLogLevel(flags.logLevel), sink: createCliSink() });
    const configPath = resolveConfigPath(flags.config);
    config = await loadCliConfig(configPath);
    if (configPath) {
      logger.debug('cli.config', { path: configPath });
    }
  } catch (error) {
    console.error(chalk.red(isTierlineError(error) ? formatError(error) : String(error)));
    process.exitCode = 1;
    return;
  }

  switch (command) {
    case 'anonymize': {
      if (rest.length === 0) {
        logger.error('Error: anonymize needs at least one transcript.');
        logger.error('Example: tierline anonymize interview.eaf');
        process.exitCode = 1;
        return;
      }
      const settings = {
        ...config.anonymize,
        outputDir: flags.outputDir ?? config.anonymize.outputDir,
        outputSuffix: flags.outputSuffix ?? config.anonymize.outputSuffix,
        review: flags.review ?? config.anonymize.review,
        audioPattern: flags.audioPattern ?? config.anonymize.audioPattern,
        videoPattern: flags.videoPattern ?? config.anonymize.videoPattern,
        audio: flags.audio ?? config.anonymize.audio,
        video: flags.video ?? config.anonymize.video,
        text: flags.text ?? config.anonymize.text,
      };
      try {
        assertValidPattern(settings.audioPattern, '--audio-pattern');
        assertValidPattern(settings.videoPattern, '--video-pattern');
        const result = await runAnonymize({
          transcripts: rest,
          settings,
          ffmpeg: config.ffmpeg,
          logger,
        });
        const written = result.transcripts.reduce((count, outcome) => count + outcome.media.length, 0);
        logger.info(
          `Anonymized ${result.transcripts.length} transcript(s) and ${written} media file(s) into ${result.outputDir}.`,
        );
        if (result.failures.length > 0) {
          logger.error(`${result.failures.length} item(s) failed:`);
          for (const failure of result.failures) {
            logger.error(`  ${failure.target}`);
          }
          process.exitCode = 1;
        }
      } catch (error) {
        reportError(logger, error);
        process.exitCode = 1;
      }
      return;
    }
    case 'export-oral': {
      if (rest.length !== 1) {
        logger.error('Error: export-oral takes exactly one transcript.');
        logger.error('Example: tierline export-oral session.eaf --generate-audio');
        process.exitCode = 1;
        return;
      }
      const [transcriptPath = ''] = rest;
      const oral = config.oralExport;
      try {
        const result = await runExportOral({
          transcriptPath,
          settings: {
            ...oral,
            splitRepetition: flags.splitRepetition ?? oral.splitRepetition,
            contributors: { ...oral.contributors, ...contributorFlags(flags) },
          },
          ffmpeg: config.ffmpeg,
          logger,
          generateAudio: flags.generateAudio ?? false,
          anonymize: flags.anonymize ?? false,
          outputDir: flags.outputDir,
          outputPrefix: flags.outputPrefix,
        });
        logger.info(
          `Exported ${result.utterances} utterance(s), ${(result.durationMs / 1000).toFixed(1)}s of oral annotation audio.`,
        );
      } catch (error) {
        reportError(logger, error);
        process.exitCode = 1;
      }
      return;
    }
    default:
      logger.error(`Unknown command "${command}".`);
      cli.showHelp(1);
  }
}

const CONTRIBUTOR_FLAGS = [
  'originalAnnotator',
  'repeater',
  'repetitionAnnotator',
  'translator',
  'translationAnnotator',
] as const satisfies readonly (keyof OralContributors)[];

function contributorFlags(flags: Record<(typeof CONTRIBUTOR_FLAGS)[number], string | undefined>): OralContributors {
  const contributors: OralContributors = {};
  for (const name of CONTRIBUTOR_FLAGS) {
    const value = flags[name];
    if (value !== undefined) {
      contributors[name] = value;
    }
  }
  return contributors;
}

void main().catch((error: unknown) => {
  globalThis.console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
});
