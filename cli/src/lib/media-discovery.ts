import { readdir, stat } from 'node:fs/promises';
import { basename, dirname, extname, isAbsolute, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { MediaDescriptor } from '@tierline/core';

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * The transcript's file name without its extension.
 */
export function transcriptBaseName(transcriptPath: string): string {
  return basename(transcriptPath, extname(transcriptPath));
}

/**
 * Files beside the transcript whose names start with its basename and continue
 * with `pattern`: `\.wav$` finds `session.wav` for `session.eaf`, `.*\.mp4$`
 * also finds `session-cam2.mp4`. Sorted by name.
 */
export async function findAssociatedMedia(transcriptPath: string, pattern: string): Promise<string[]> {
  const directory = dirname(resolve(transcriptPath));
  const matcher = new RegExp(`^${escapeRegExp(transcriptBaseName(transcriptPath))}${pattern}`);
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && matcher.test(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(directory, name));
}

function localPathFromUrl(url: string): string | undefined {
  if (!url.startsWith('file:')) {
    return undefined;
  }
  try {
    return fileURLToPath(url);
  } catch {
    return undefined;
  }
}

function lastSegment(value: string): string {
  return value.split(/[\\/]/).pop() ?? '';
}

/**
 * Resolve a media descriptor to a file on disk. Tried in order: MEDIA_URL as a
 * path, MEDIA_URL relative to the transcript, MEDIA_URL as a `file:` URL,
 * RELATIVE_MEDIA_URL relative to the transcript, and finally the bare file
 * name next to the transcript. Remote URLs are never fetched.
 */
export async function findLocalMedia(
  transcriptPath: string,
  descriptor: MediaDescriptor,
): Promise<string | undefined> {
  const transcriptDir = dirname(resolve(transcriptPath));
  const mediaUrl = descriptor.mediaUrl;
  const candidates: string[] = [];

  if (mediaUrl && !/^[a-z][a-z0-9+.-]*:\/\//i.test(mediaUrl) && !mediaUrl.startsWith('file:')) {
    candidates.push(resolve(mediaUrl));
    if (!isAbsolute(mediaUrl)) {
      candidates.push(join(transcriptDir, mediaUrl));
    }
  }

  const fromUrl = localPathFromUrl(mediaUrl);
  if (fromUrl) {
    candidates.push(fromUrl);
  }

  const relative = descriptor.relativeMediaUrl;
  if (relative) {
    const relativePath = localPathFromUrl(relative) ?? join(transcriptDir, relative);
    candidates.push(relativePath);
  }

  const fileName = lastSegment(relative || mediaUrl);
  if (fileName) {
    candidates.push(join(transcriptDir, fileName));
  }

  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}
