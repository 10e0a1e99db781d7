import { describe, expect, it } from 'vitest';
import {
  RESOLUTIONS,
  buildAdjustFilter,
  buildLetterboxFilter,
  buildMixFilter,
  buildOverlayFilter,
} from './video-utils.js';

describe('buildOverlayFilter', () => {
  it('anchors portraits bottom-left and bottom-right side by side', () => {
    expect(buildOverlayFilter('side-by-side', 12.5, { width: 1280, height: 720 })).toBe(
      '[0:v]loop=loop=-1:size=1:start=0,trim=duration=12.5,scale=1280:720,setsar=1[bg];' +
        '[1:v]scale=300:-1[a];' +
        '[2:v]scale=300:-1[b];' +
        '[bg][a]overlay=100:H-h-50[tmp];' +
        '[tmp][b]overlay=W-w-100:H-h-50[v]',
    );
  });

  it('centres larger portraits in conversation layout', () => {
    const filter = buildOverlayFilter('conversation', 8, { width: 1280, height: 720 });
    expect(filter.split(';').slice(1)).toEqual([
      '[1:v]scale=350:-1[a]',
      '[2:v]scale=350:-1[b]',
      '[bg][a]overlay=W/2-w-30:H-h-50[tmp]',
      '[tmp][b]overlay=W/2+30:H-h-50[v]',
    ]);
  });
});

describe('buildMixFilter', () => {
  it('delays each input and sums without normalization', () => {
    expect(
      buildMixFilter([
        { filePath: 'a.mp3', delayMs: 0 },
        { filePath: 'b.mp3', delayMs: 1500 },
        { filePath: 'c.mp3', delayMs: 2800 },
      ]),
    ).toBe(
      '[0:a]adelay=0|0[a0];' +
        '[1:a]adelay=1500|1500[a1];' +
        '[2:a]adelay=2800|2800[a2];' +
        '[a0][a1][a2]amix=inputs=3:duration=longest:normalize=0[out]',
    );
  });
});

describe('buildLetterboxFilter', () => {
  it('fits and pads to the target frame', () => {
    expect(buildLetterboxFilter(RESOLUTIONS['480p'])).toBe(
      'scale=854:480:force_original_aspect_ratio=decrease,pad=854:480:(ow-iw)/2:(oh-ih)/2',
    );
  });
});

describe('buildAdjustFilter', () => {
  it('emits only the adjustments that change something', () => {
    expect(buildAdjustFilter({ tempo: 1, gain: 1 })).toBe('');
    expect(buildAdjustFilter({ tempo: 1.1, gain: 1 })).toBe('atempo=1.1');
    expect(buildAdjustFilter({ tempo: 1, gain: 0.95 })).toBe('volume=0.95');
    expect(buildAdjustFilter({ tempo: 0.9, gain: 1.2 })).toBe('atempo=0.9,volume=1.2');
  });
});
