import { Buffer } from 'node:buffer';
import { createMediaError, MediaErrorCode } from '@tierline/core';

/**
 * 16-bit PCM audio held in memory. Samples are interleaved by channel.
 */
export interface PcmAudio {
  sampleRate: number;
  channels: number;
  samples: Int16Array;
}

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;
const BITS_PER_SAMPLE = 16;
const BYTES_PER_SAMPLE = BITS_PER_SAMPLE / 8;

/** KSDATAFORMAT_SUBTYPE_PCM */
const PCM_SUBFORMAT_GUID = Buffer.from([
  0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x10, 0x00, 0x80, 0x00, 0x00, 0xaa, 0x00, 0x38, 0x9b, 0x71,
]);

/** Speaker positions for the first channels: front left, front right, front center */
const SPEAKER_MASK_BY_CHANNELS: Record<number, number> = { 1: 0x4, 2: 0x3, 3: 0x7 };

function invalidWav(message: string): Error {
  return createMediaError(MediaErrorCode.INVALID_WAV, message);
}

export function frameCount(audio: PcmAudio): number {
  return Math.floor(audio.samples.length / audio.channels);
}

export function msToFrames(ms: number, sampleRate: number): number {
  return Math.round((ms * sampleRate) / 1000);
}

/**
 * Decode a RIFF/WAVE file holding 16-bit PCM, plain or WAVE_FORMAT_EXTENSIBLE.
 */
export function decodeWav(buffer: Buffer): PcmAudio {
  if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
    throw invalidWav('Not a RIFF/WAVE file.');
  }

  let format: { tag: number; channels: number; sampleRate: number; bits: number } | undefined;
  let offset = 12;
  while (offset + 8 <= buffer.length) {
    const id = buffer.toString('ascii', offset, offset + 4);
    const size = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ') {
      if (size < 16 || body + size > buffer.length) {
        throw invalidWav('Truncated fmt chunk.');
      }
      let tag = buffer.readUInt16LE(body);
      if (tag === WAVE_FORMAT_EXTENSIBLE && size >= 40) {
        tag = buffer.readUInt16LE(body + 24);
      }
      format = {
        tag,
        channels: buffer.readUInt16LE(body + 2),
        sampleRate: buffer.readUInt32LE(body + 4),
        bits: buffer.readUInt16LE(body + 14),
      };
    } else if (id === 'data') {
      if (!format) {
        throw invalidWav('data chunk appears before fmt chunk.');
      }
      if (format.tag !== WAVE_FORMAT_PCM || format.bits !== BITS_PER_SAMPLE) {
        throw createMediaError(
          MediaErrorCode.UNSUPPORTED_AUDIO_FORMAT,
          `Only 16-bit PCM is supported (format ${format.tag}, ${format.bits} bits).`,
        );
      }
      if (format.channels === 0 || format.sampleRate === 0) {
        throw invalidWav('fmt chunk declares no channels or no sample rate.');
      }
      const available = Math.min(size, buffer.length - body);
      const count = Math.floor(available / BYTES_PER_SAMPLE);
      const samples = new Int16Array(count);
      for (let i = 0; i < count; i++) {
        samples[i] = buffer.readInt16LE(body + i * BYTES_PER_SAMPLE);
      }
      return { sampleRate: format.sampleRate, channels: format.channels, samples };
    }

    // Chunks are word aligned
    offset = body + size + (size % 2);
  }

  throw invalidWav(format ? 'No data chunk.' : 'No fmt chunk.');
}

/**
 * Encode 16-bit PCM. More than two channels get a WAVE_FORMAT_EXTENSIBLE
 * header with a speaker mask, which players need to place the channels.
 */
export function encodeWav(audio: PcmAudio): Buffer {
  const extensible = audio.channels > 2;
  const fmtSize = extensible ? 40 : 16;
  const dataSize = audio.samples.length * BYTES_PER_SAMPLE;
  const blockAlign = audio.channels * BYTES_PER_SAMPLE;
  const fileSize = 12 + 8 + fmtSize + 8 + dataSize;

  const buffer = Buffer.alloc(fileSize);
  let offset = 0;

  // RIFF header
  buffer.write('RIFF', offset);
  offset += 4;
  buffer.writeUInt32LE(fileSize - 8, offset);
  offset += 4;
  buffer.write('WAVE', offset);
  offset += 4;

  // fmt subchunk
  buffer.write('fmt ', offset);
  offset += 4;
  buffer.writeUInt32LE(fmtSize, offset);
  offset += 4;
  buffer.writeUInt16LE(extensible ? WAVE_FORMAT_EXTENSIBLE : WAVE_FORMAT_PCM, offset);
  offset += 2;
  buffer.writeUInt16LE(audio.channels, offset);
  offset += 2;
  buffer.writeUInt32LE(audio.sampleRate, offset);
  offset += 4;
  buffer.writeUInt32LE(audio.sampleRate * blockAlign, offset);
  offset += 4; // ByteRate
  buffer.writeUInt16LE(blockAlign, offset);
  offset += 2;
  buffer.writeUInt16LE(BITS_PER_SAMPLE, offset);
  offset += 2;

  if (extensible) {
    buffer.writeUInt16LE(22, offset);
    offset += 2; // cbSize
    buffer.writeUInt16LE(BITS_PER_SAMPLE, offset);
    offset += 2; // ValidBitsPerSample
    buffer.writeUInt32LE(SPEAKER_MASK_BY_CHANNELS[audio.channels] ?? 0, offset);
    offset += 4;
    PCM_SUBFORMAT_GUID.copy(buffer, offset);
    offset += PCM_SUBFORMAT_GUID.length;
  }

  // data subchunk
  buffer.write('data', offset);
  offset += 4;
  buffer.writeUInt32LE(dataSize, offset);
  offset += 4;

  for (const sample of audio.samples) {
    buffer.writeInt16LE(sample, offset);
    offset += BYTES_PER_SAMPLE;
  }

  return buffer;
}

export function createSilence(frames: number, sampleRate: number, channels = 1): PcmAudio {
  return { sampleRate, channels, samples: new Int16Array(Math.max(0, frames) * channels) };
}

/**
 * Frames between two millisecond offsets, clamped to the audio's length.
 */
export function sliceAudio(audio: PcmAudio, startMs: number, endMs: number): PcmAudio {
  const total = frameCount(audio);
  const startFrame = Math.min(total, Math.max(0, msToFrames(startMs, audio.sampleRate)));
  const endFrame = Math.min(total, Math.max(startFrame, msToFrames(endMs, audio.sampleRate)));
  return {
    sampleRate: audio.sampleRate,
    channels: audio.channels,
    samples: audio.samples.slice(startFrame * audio.channels, endFrame * audio.channels),
  };
}

function assertCompatible(parts: readonly PcmAudio[], sampleRate: number, channels: number): void {
  for (const part of parts) {
    if (part.sampleRate !== sampleRate) {
      throw createMediaError(
        MediaErrorCode.SAMPLE_RATE_MISMATCH,
        `Cannot combine audio at ${part.sampleRate} Hz with audio at ${sampleRate} Hz.`,
      );
    }
    if (part.channels !== channels) {
      throw createMediaError(
        MediaErrorCode.UNSUPPORTED_AUDIO_FORMAT,
        `Cannot combine ${part.channels}-channel audio with ${channels}-channel audio.`,
      );
    }
  }
}

export function concatAudio(parts: readonly PcmAudio[], sampleRate: number, channels = 1): PcmAudio {
  assertCompatible(parts, sampleRate, channels);
  const samples = new Int16Array(parts.reduce((sum, part) => sum + part.samples.length, 0));
  let offset = 0;
  for (const part of parts) {
    samples.set(part.samples, offset);
    offset += part.samples.length;
  }
  return { sampleRate, channels, samples };
}

/**
 * Combine mono tracks of equal length into one interleaved multi-channel
 * stream; track i becomes channel i.
 */
export function interleaveChannels(tracks: readonly PcmAudio[]): PcmAudio {
  const [first] = tracks;
  if (!first) {
    throw createMediaError(MediaErrorCode.UNSUPPORTED_AUDIO_FORMAT, 'No tracks to interleave.');
  }
  assertCompatible(tracks, first.sampleRate, 1);
  const frames = first.samples.length;
  if (tracks.some((track) => track.samples.length !== frames)) {
    throw createMediaError(
      MediaErrorCode.UNSUPPORTED_AUDIO_FORMAT,
      'Tracks to interleave must have the same length.',
    );
  }

  const channels = tracks.length;
  const samples = new Int16Array(frames * channels);
  tracks.forEach((track, channel) => {
    for (let frame = 0; frame < frames; frame++) {
      samples[frame * channels + channel] = track.samples[frame] ?? 0;
    }
  });
  return { sampleRate: first.sampleRate, channels, samples };
}
