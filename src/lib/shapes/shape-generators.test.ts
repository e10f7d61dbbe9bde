import { describe, expect, it } from 'vitest';
import {
  curveSegmentCount,
  makeArrowhead,
  makeCircle,
  makeOutlineStroke,
  makeRect,
  makeSegmentStroke,
  makeTriangle,
} from './shape-generators';

describe('makeRect', () => {
  it('centres the rectangle on the pivot', () => {
    expect(makeRect({ width: 100, height: 50 })).toEqual([
      { x: -50, y: -25 },
      { x: 50, y: -25 },
      { x: 50, y: 25 },
      { x: -50, y: 25 },
    ]);
  });

  it('returns no vertices for empty sizes', () => {
    expect(makeRect({ width: 0, height: 10 })).toEqual([]);
  });
});

describe('makeCircle', () => {
  it('places every vertex on the radius', () => {
    const circle = makeCircle({ radius: 40 });
    expect(circle).toHaveLength(curveSegmentCount(40));
    for (const { x, y } of circle) {
      expect(Math.hypot(x, y)).toBeCloseTo(40, 9);
    }
  });

  it('starts at angle zero', () => {
    expect(makeCircle({ radius: 10 })[0]).toEqual({ x: 10, y: 0 });
  });
});

describe('curveSegmentCount', () => {
  it('grows with the radius within bounds', () => {
    expect(curveSegmentCount(1)).toBe(16);
    expect(curveSegmentCount(50)).toBe(158);
    expect(curveSegmentCount(10_000)).toBe(720);
  });
});

describe('makeTriangle', () => {
  it('copies the vertices', () => {
    const points = [
      { x: 0, y: 0 },
      { x: 50, y: 50 },
      { x: 0, y: 50 },
    ] as const;
    expect(makeTriangle({ points: [points[0], points[1], points[2]] })).toEqual(points);
  });
});

describe('makeSegmentStroke', () => {
  it('builds a butt-capped quad around a horizontal segment', () => {
    expect(makeSegmentStroke({ x: 0, y: 0 }, { x: 10, y: 0 }, 4)).toEqual([
      { x: 0, y: 2 },
      { x: 10, y: 2 },
      { x: 10, y: -2 },
      { x: 0, y: -2 },
    ]);
  });

  it('extends square caps past both ends', () => {
    expect(makeSegmentStroke({ x: 0, y: 0 }, { x: 0, y: 10 }, 2, 1)).toEqual([
      { x: -1, y: -1 },
      { x: -1, y: 11 },
      { x: 1, y: 11 },
      { x: 1, y: -1 },
    ]);
  });

  it('returns null for a zero-length segment', () => {
    expect(makeSegmentStroke({ x: 3, y: 3 }, { x: 3, y: 3 }, 2)).toBeNull();
  });
});

describe('makeOutlineStroke', () => {
  it('emits one quad per edge', () => {
    expect(makeOutlineStroke(makeRect({ width: 10, height: 10 }), 2)).toHaveLength(4);
  });
});

describe('makeArrowhead', () => {
  it('points away from the tail', () => {
    const head = makeArrowhead({ tail: { x: 0, y: 0 }, tip: { x: 100, y: 0 }, length: 10, angle: 45 });
    expect(head?.[0]).toEqual({ x: 100, y: 0 });
    expect(head?.[1]?.x).toBe(90);
    expect(head?.[1]?.y).toBeCloseTo(10, 9);
    expect(head?.[2]?.x).toBe(90);
    expect(head?.[2]?.y).toBeCloseTo(-10, 9);
  });

  it('returns null without a direction', () => {
    expect(makeArrowhead({ tail: { x: 1, y: 1 }, tip: { x: 1, y: 1 }, length: 10, angle: 30 })).toBeNull();
  });
});
