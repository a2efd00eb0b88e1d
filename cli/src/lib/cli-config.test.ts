import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { stringify as stringifyYaml } from 'yaml';
import {
  buildCliConfig,
  CONFIG_FILE_NAME,
  loadCliConfig,
  parseCliConfig,
  resolveConfigPath,
  resolveLogLevel,
} from './cli-config.js';

const tmpDirs: string[] = [];

afterEach(async () => {
  while (tmpDirs.length) {
    const dir = tmpDirs.pop();
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  }
});

async function createTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'tierline-config-test-'));
  tmpDirs.push(dir);
  return dir;
}

async function writeConfigFile(dir: string, config: Record<string, unknown>): Promise<string> {
  const filePath = join(dir, CONFIG_FILE_NAME);
  await writeFile(filePath, stringifyYaml(config), 'utf8');
  return filePath;
}

describe('loadCliConfig', () => {
  it('merges every section over the defaults', async () => {
    const dir = await createTempDir();
    const filePath = await writeConfigFile(dir, {
      anonymize: { outputSuffix: '-PUBLIC', review: true },
      oralExport: {
        sampleRate: 48000,
        contributors: { translator: 'Speaker Two' },
        sourceLanguage: { id: 'xyz', label: 'Example (xyz)' },
      },
      ffmpeg: { ffmpegPath: '/opt/ffmpeg/bin/ffmpeg' },
    });

    const config = await loadCliConfig(filePath, {});

    expect(config.configPath).toBe(filePath);
    expect(config.anonymize).toMatchObject({
      outputDir: 'anonymized',
      outputSuffix: '-PUBLIC',
      review: true,
      audio: true,
      intervalTier: 'Postprocess',
    });
    expect(config.oralExport).toEqual({
      sampleRate: 48000,
      splitRepetition: true,
      contributors: { translator: 'Speaker Two' },
      sourceLanguage: { id: 'xyz', label: 'Example (xyz)' },
      translationLanguage: {
        id: 'eng',
        label: 'English (eng)',
        definition: 'http://cdb.iso.org/lg/CDB-00138502-001',
      },
    });
    expect(config.ffmpeg).toEqual({ ffmpegPath: '/opt/ffmpeg/bin/ffmpeg', ffprobePath: 'ffprobe' });
  });

  it('returns the defaults without a file', async () => {
    const config = await loadCliConfig(undefined, {});

    expect(config.configPath).toBeUndefined();
    expect(config.oralExport.sampleRate).toBe(44100);
    expect(config.oralExport.sourceLanguage).toBeUndefined();
  });

  it('reports an unreadable file', async () => {
    const dir = await createTempDir();

    await expect(loadCliConfig(join(dir, 'absent.yaml'), {})).rejects.toMatchObject({ code: 'I011' });
  });
});

describe('parseCliConfig', () => {
  it('treats an empty file as all defaults', () => {
    expect(parseCliConfig('', {}).anonymize.outputSuffix).toBe('-ANONYMIZED');
  });

  it('rejects unknown keys and wrong types', () => {
    expect(() => parseCliConfig('anonymize:\n  outputSufix: x\n', {})).toThrow(
      expect.objectContaining({ code: 'I010' }),
    );
    expect(() => parseCliConfig('oralExport:\n  sampleRate: fast\n', {})).toThrow(
      expect.objectContaining({ code: 'I010' }),
    );
  });

  it('rejects a media pattern that is not a regular expression', () => {
    expect(() => parseCliConfig('anonymize:\n  audioPattern: "(unclosed"\n', {})).toThrow(
      expect.objectContaining({ code: 'I010' }),
    );
  });

  it('reports malformed YAML', () => {
    expect(() => parseCliConfig('anonymize: [unterminated', {})).toThrow(
      expect.objectContaining({ code: 'I011' }),
    );
  });
});

describe('buildCliConfig', () => {
  it('lets FFMPEG_PATH and FFPROBE_PATH override the file', () => {
    const config = buildCliConfig(
      { ffmpeg: { ffmpegPath: '/from/file/ffmpeg', ffprobePath: '/from/file/ffprobe' } },
      { FFMPEG_PATH: '/from/env/ffmpeg' },
    );

    expect(config.ffmpeg).toEqual({
      ffmpegPath: '/from/env/ffmpeg',
      ffprobePath: '/from/file/ffprobe',
    });
  });
});

describe('resolveConfigPath', () => {
  it('prefers the explicit path, then TIERLINE_CONFIG', () => {
    expect(resolveConfigPath('custom.yaml', { TIERLINE_CONFIG: '/etc/t.yaml' }, '/work')).toBe(
      '/work/custom.yaml',
    );
    expect(resolveConfigPath(undefined, { TIERLINE_CONFIG: '/etc/t.yaml' }, '/work')).toBe('/etc/t.yaml');
  });

  it('finds tierline.yaml in the working directory', async () => {
    const dir = await createTempDir();
    expect(resolveConfigPath(undefined, {}, dir)).toBeUndefined();

    const filePath = await writeConfigFile(dir, {});
    expect(resolveConfigPath(undefined, {}, dir)).toBe(filePath);
  });
});

describe('resolveLogLevel', () => {
  it('uses the flag, then TIERLINE_LOG_LEVEL, then info', () => {
    expect(resolveLogLevel('debug', { TIERLINE_LOG_LEVEL: 'warn' })).toBe('debug');
    expect(resolveLogLevel(undefined, { TIERLINE_LOG_LEVEL: 'warn' })).toBe('warn');
    expect(resolveLogLevel(undefined, {})).toBe('info');
  });

  it('rejects unknown levels', () => {
    expect(() => resolveLogLevel('verbose', {})).toThrow(expect.objectContaining({ code: 'I012' }));
  });
});
