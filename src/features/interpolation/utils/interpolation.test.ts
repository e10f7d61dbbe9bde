import { describe, expect, it } from 'vitest';
import type { Animation, CompiledTrack, EasingType } from '@/types/timeline';
import type { Value } from '@/types/value';
import { RenderInvariantError } from '@/lib/diagnostics';
import { colorValue, numberValue, pointValue, textValue } from '@/features/values/utils/value-model';
import { interpolateValue, resolveTrack } from './interpolation';

function createSegment(startMs: number, endMs: number, to: Value, easing: EasingType = 'linear'): Animation {
  return {
    sceneName: 'intro',
    objectId: 'obj',
    property: 'prop',
    startMs,
    endMs,
    to,
    easing,
    declarationIndex: 0,
  };
}

function createTrack(baseValue: Value, segments: Animation[]): CompiledTrack {
  return { objectIndex: 0, objectId: 'obj', property: 'prop', baseValue, segments };
}

describe('interpolateValue', () => {
  it('blends numbers linearly', () => {
    expect(interpolateValue(numberValue(10), numberValue(20), 0.25)).toEqual(numberValue(12.5));
  });

  it('blends points per axis', () => {
    expect(interpolateValue(pointValue(0, 100), pointValue(100, 0), 0.25)).toEqual(pointValue(25, 75));
  });

  it('rounds color channels to integers', () => {
    expect(interpolateValue(colorValue(0, 0, 0), colorValue(255, 100, 1), 0.5)).toEqual(colorValue(128, 50, 1));
  });

  it('clamps color channels when eased progress overshoots the channel range', () => {
    const from = { type: 'color' as const, r: 250, g: 0, b: 0 };
    const to = { type: 'color' as const, r: 300, g: 0, b: 0 };
    expect(interpolateValue(from, to, 0.5)).toEqual({ type: 'color', r: 255, g: 0, b: 0 });
  });

  it('keeps text until progress reaches 1', () => {
    expect(interpolateValue(textValue('Hello'), textValue('World'), 0.99)).toEqual(textValue('Hello'));
    expect(interpolateValue(textValue('Hello'), textValue('World'), 1)).toEqual(textValue('World'));
  });

  it('returns the endpoints unchanged at the boundaries', () => {
    const from = numberValue(0.1);
    const to = numberValue(0.3);
    expect(interpolateValue(from, to, 0)).toBe(from);
    expect(interpolateValue(from, to, 1)).toBe(to);
  });

  it('rejects mismatched tags', () => {
    expect(() => interpolateValue(numberValue(1), pointValue(1, 1), 0.5)).toThrow(RenderInvariantError);
  });
});

describe('resolveTrack', () => {
  it('moves a box across the screen with ease_in_out', () => {
    const track = createTrack(pointValue(75, 360), [createSegment(0, 2000, pointValue(1205, 360), 'ease_in_out')]);

    expect(resolveTrack(track, 0)).toEqual(pointValue(75, 360));
    expect(resolveTrack(track, 1000)).toEqual(pointValue(640, 360));
    expect(resolveTrack(track, 2000)).toEqual(pointValue(1205, 360));
    expect(resolveTrack(track, 2500)).toEqual(pointValue(1205, 360));
  });

  it('is continuous at a shared segment boundary', () => {
    const track = createTrack(numberValue(10), [
      createSegment(0, 1000, numberValue(100)),
      createSegment(1000, 2000, numberValue(10)),
    ]);

    expect(resolveTrack(track, 500)).toEqual(numberValue(55));
    expect(resolveTrack(track, 1000)).toEqual(numberValue(100));
    expect(resolveTrack(track, 1500)).toEqual(numberValue(55));
    expect(resolveTrack(track, 2000)).toEqual(numberValue(10));
  });

  it('holds the base value before the first segment', () => {
    const track = createTrack(numberValue(1), [createSegment(1000, 2000, numberValue(0))]);
    expect(resolveTrack(track, 999)).toEqual(numberValue(1));
  });

  it('starts a later segment from the previous target', () => {
    const track = createTrack(numberValue(0), [
      createSegment(0, 1000, numberValue(100)),
      createSegment(2000, 3000, numberValue(200)),
    ]);

    expect(resolveTrack(track, 1500)).toEqual(numberValue(100));
    expect(resolveTrack(track, 2500)).toEqual(numberValue(150));
  });

  it('applies an instant change at its time', () => {
    const track = createTrack(colorValue(255, 0, 0), [createSegment(1000, 1000, colorValue(0, 0, 255))]);

    expect(resolveTrack(track, 999)).toEqual(colorValue(255, 0, 0));
    expect(resolveTrack(track, 1000)).toEqual(colorValue(0, 0, 255));
    expect(resolveTrack(track, 4000)).toEqual(colorValue(0, 0, 255));
  });

  it('switches text atomically at the segment end', () => {
    const track = createTrack(textValue('Hello'), [createSegment(0, 1000, textValue('World'))]);

    expect(resolveTrack(track, 500)).toEqual(textValue('Hello'));
    expect(resolveTrack(track, 1000)).toEqual(textValue('World'));
  });

  it('returns the base value for a track without segments', () => {
    expect(resolveTrack(createTrack(numberValue(3), []), 100)).toEqual(numberValue(3));
  });
});
