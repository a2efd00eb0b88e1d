import { describe, expect, it, vi } from 'vitest';
import { createInterval, silentLogger } from '@tierline/core';
import { buildReviewClipArgs, createReviewClips, planReviewClips } from './review-clips.js';

describe('planReviewClips', () => {
  it('names clips after the interval and widens the cut window', () => {
    const plans = planReviewClips('/data/session.mp4', [createInterval(5000, 6250, 'a')], 60000);

    expect(plans).toEqual([
      {
        mediaPath: '/data/session.mp4',
        outputPath: '/data/session-00h00m05s000_00h00m06s250.mp4',
        start: 4000,
        end: 7250,
      },
    ]);
  });

  it('clamps the window to the start and to a known duration', () => {
    const [plan] = planReviewClips('/data/a.wav', [createInterval(300, 9800, 'a')], 10000, {
      outputDir: '/clips',
    });

    expect(plan).toMatchObject({ outputPath: '/clips/a-00h00m00s300_00h00m09s800.wav', start: 0, end: 10000 });
  });

  it('leaves the end unclamped when the duration is unknown', () => {
    const [plan] = planReviewClips('/data/a.wav', [createInterval(1000, 2000, 'a')], undefined, {
      contextMs: 250,
    });

    expect(plan).toMatchObject({ start: 750, end: 2250 });
  });
});

describe('buildReviewClipArgs', () => {
  it('seeks to the window start and cuts its length', () => {
    expect(
      buildReviewClipArgs({ mediaPath: 'in.mp4', outputPath: 'out.mp4', start: 61500, end: 64000 }),
    ).toEqual([
      '-y', '-v', '0', '-fflags', '+genpts',
      '-i', 'in.mp4',
      '-ss', '00:01:01.500',
      '-t', '2.500',
      '-acodec', 'copy',
      '-vcodec', 'libx264',
      '-preset', 'veryfast',
      '-avoid_negative_ts', '1',
      'out.mp4',
    ]);
  });
});

describe('createReviewClips', () => {
  it('runs ffmpeg once per plan in order', async () => {
    const runner = vi.fn(async () => {});
    const plans = planReviewClips(
      '/data/s.mp4',
      [createInterval(1000, 2000, 'a'), createInterval(3000, 4000, 'b')],
      undefined,
    );

    const written = await createReviewClips(plans, { runner, logger: silentLogger });

    expect(written).toEqual([
      '/data/s-00h00m01s000_00h00m02s000.mp4',
      '/data/s-00h00m03s000_00h00m04s000.mp4',
    ]);
    expect(runner).toHaveBeenCalledTimes(2);
  });
});
