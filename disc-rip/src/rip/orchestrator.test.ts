import { describe, it, expect, vi } from 'vitest';
import { ripDisc } from './orchestrator.js';
import type { ClassificationResult, TitleInfo } from './types.js';

const episode = (label: string): TitleInfo => ({ label, durationSeconds: 22 * 60, chapters: [] });
const resolveTool = (name: string) => (name === 'ffmpeg' ? '/usr/bin/ffmpeg' : null);

describe('ripDisc', () => {
  const series: ClassificationResult = {
    discType: 'series',
    episodes: [episode('Pilot'), episode('Second'), episode('Third')],
    episodeCodes: ['s01e01', 's01e02', 's01e03'],
  };

  it('should build one plan per title in order', () => {
    const factory = vi.fn((title: TitleInfo, code: string | null, index: number) =>
      `/videos/Show/${index}-${code}-${title.label}.mp4`
    );

    const plans = ripDisc('/dev/sr0', series, factory, { resolveTool });

    expect(plans.map(plan => plan.destination)).toEqual([
      '/videos/Show/1-s01e01-Pilot.mp4',
      '/videos/Show/2-s01e02-Second.mp4',
      '/videos/Show/3-s01e03-Third.mp4',
    ]);
    expect(factory).toHaveBeenNthCalledWith(2, series.episodes[1], 's01e02', 2);
    expect(plans.every(plan => plan.device === '/dev/sr0' && plan.willExecute)).toBe(true);
  });

  it('should pass null episode codes when the classification has none', () => {
    const movie: ClassificationResult = {
      discType: 'movie',
      episodes: [episode('Feature')],
      episodeCodes: [],
    };
    const factory = vi.fn(() => '/videos/Feature.mp4');

    ripDisc('/dev/sr0', movie, factory, { resolveTool });

    expect(factory).toHaveBeenCalledWith(movie.episodes[0], null, 1);
  });

  it('should propagate the dry-run flag', () => {
    const plans = ripDisc('/dev/sr0', series, () => '/videos/x.mp4', { dryRun: true, resolveTool });

    expect(plans.map(plan => plan.willExecute)).toEqual([false, false, false]);
  });

  it('should stop at the first destination failure', () => {
    const factory = vi.fn((_title: TitleInfo, code: string | null) => {
      if (code === 's01e02') throw new Error('no room for s01e02');
      return `/videos/${code}.mp4`;
    });

    expect(() => ripDisc('/dev/sr0', series, factory, { resolveTool })).toThrow('no room for s01e02');
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('should reject misaligned episode codes', () => {
    const broken: ClassificationResult = { ...series, episodeCodes: ['s01e01'] };

    expect(() => ripDisc('/dev/sr0', broken, () => '/videos/x.mp4', { resolveTool })).toThrow(
      'Episode codes must align with episodes'
    );
  });

  it('should fail when no ripping tool is installed', () => {
    expect(() => ripDisc('/dev/sr0', series, () => '/videos/x.mp4', { resolveTool: () => null })).toThrow(
      'No supported ripping tools found on PATH'
    );
  });

  it('should return no plans for an empty classification', () => {
    const empty: ClassificationResult = { discType: 'movie', episodes: [], episodeCodes: [] };

    expect(ripDisc('/dev/sr0', empty, () => '/videos/x.mp4', { resolveTool })).toEqual([]);
  });
});
