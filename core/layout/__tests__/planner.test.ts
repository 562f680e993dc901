import { describe, expect, it } from 'vitest';
import { DisplayRect, planScaling } from '../index';

const FULL_HD: DisplayRect = { height: 1080, width: 1920, yOffset: 0, xOffset: 0 };

const SOURCE_SIZES = [
  { height: 600, width: 800 },
  { height: 1200, width: 800 },
  { height: 500, width: 2000 },
  { height: 1080, width: 1920 },
  { height: 333, width: 777 },
  { height: 4000, width: 3000 },
  { height: 17, width: 1001 },
  { height: 2857, width: 31 },
  { height: 31, width: 2857 },
];

const TARGETS: DisplayRect[] = [
  FULL_HD,
  { height: 768, width: 1024, yOffset: 0, xOffset: 1920 },
  { height: 1920, width: 1080, yOffset: 0, xOffset: 0 },
  { height: 1440, width: 3440, yOffset: 10, xOffset: 5 },
];

describe('planScaling (fill)', () => {
  const options = { fitPolicy: 'fill' as const, oneImage: false };

  it('keeps an exactly matching image', () => {
    const rect: DisplayRect = { height: 768, width: 1024, yOffset: 0, xOffset: 0 };
    const plan = planScaling({ height: 768, width: 1024 }, rect, [rect], options);
    expect(plan.targetSize).toEqual({ height: 768, width: 1024 });
    expect(plan.fitOffsets).toEqual({ y: 0, x: 0 });
    expect(plan.errorFraction).toBe(0);
  });

  it('switches to matching the width when matching the height leaves gaps', () => {
    // by height: 1080x720, too narrow; by width: zoom 2.4 gives 2880x1920
    const plan = planScaling({ height: 1200, width: 800 }, FULL_HD, [FULL_HD], options);
    expect(plan.currentSize).toEqual({ height: 1200, width: 800 });
    expect(plan.targetSize).toEqual({ height: 2880, width: 1920 });
    expect(plan.fitOffsets).toEqual({ y: 0, x: 0 });
    expect(plan.errorFraction).toBeCloseTo(1800 / 2880, 10);
  });

  it('matches the height of a wide image and crops the sides', () => {
    // zoom 2.16 gives 1080x4320
    const plan = planScaling({ height: 500, width: 2000 }, FULL_HD, [FULL_HD], options);
    expect(plan.targetSize).toEqual({ height: 1080, width: 4320 });
    expect(plan.errorFraction).toBeCloseTo((4320 - 1920) / 4320, 10);
  });

  it('always covers the display', () => {
    for (const size of SOURCE_SIZES) {
      for (const rect of TARGETS) {
        const plan = planScaling(size, rect, [rect], options);
        expect(plan.targetSize.height).toBeGreaterThanOrEqual(rect.height);
        expect(plan.targetSize.width).toBeGreaterThanOrEqual(rect.width);
        expect(plan.errorFraction).toBeGreaterThanOrEqual(0);
        expect(plan.errorFraction).toBeLessThan(1);
      }
    }
  });
});

describe('planScaling (fit)', () => {
  const options = { fitPolicy: 'fit' as const, oneImage: false };

  it('pillarboxes a 4:3 image on a 16:9 display', () => {
    // zoom 1.8 gives 1080x1440, centred 240px from the left
    const plan = planScaling({ height: 600, width: 800 }, FULL_HD, [FULL_HD], options);
    expect(plan.targetSize).toEqual({ height: 1080, width: 1440 });
    expect(plan.fitOffsets).toEqual({ y: 0, x: 240 });
    expect(plan.errorFraction).toBeCloseTo(0.25, 10);
  });

  it('letterboxes a panorama', () => {
    // by height would be 4320 wide; by width: zoom 0.96 gives 480x1920
    const plan = planScaling({ height: 500, width: 2000 }, FULL_HD, [FULL_HD], options);
    expect(plan.targetSize).toEqual({ height: 480, width: 1920 });
    expect(plan.fitOffsets).toEqual({ y: 300, x: 0 });
    expect(plan.errorFraction).toBeCloseTo(600 / 1080, 10);
  });

  it('keeps at least one pixel of a sliver image', () => {
    const rect: DisplayRect = { height: 29, width: 1863, yOffset: 0, xOffset: 0 };
    const plan = planScaling({ height: 2857, width: 31 }, rect, [rect], options);
    expect(plan.targetSize).toEqual({ height: 29, width: 1 });
    expect(plan.fitOffsets).toEqual({ y: 0, x: 931 });
    expect(plan.errorFraction).toBeCloseTo(1862 / 1863, 10);
  });

  it('never overflows the display', () => {
    for (const size of SOURCE_SIZES) {
      for (const rect of TARGETS) {
        const plan = planScaling(size, rect, [rect], options);
        expect(plan.targetSize.height).toBeLessThanOrEqual(rect.height);
        expect(plan.targetSize.width).toBeLessThanOrEqual(rect.width);
        expect(plan.targetSize.height).toBeGreaterThanOrEqual(1);
        expect(plan.targetSize.width).toBeGreaterThanOrEqual(1);
        expect(plan.fitOffsets.y * 2).toBeLessThanOrEqual(rect.height - plan.targetSize.height + 1);
        expect(plan.fitOffsets.x * 2).toBeLessThanOrEqual(rect.width - plan.targetSize.width + 1);
      }
    }
  });
});

describe('planScaling (one image)', () => {
  it('measures the mismatch against the summed display area', () => {
    const displays: DisplayRect[] = [
      { height: 768, width: 1024, yOffset: 0, xOffset: 0 },
      { height: 768, width: 1024, yOffset: 0, xOffset: 1024 },
    ];
    const union: DisplayRect = { height: 768, width: 2048, yOffset: 0, xOffset: 0 };
    // by height 768x1024 is too narrow; by width: 1536x2048
    const plan = planScaling({ height: 768, width: 1024 }, union, displays, { fitPolicy: 'fill', oneImage: true });
    expect(plan.targetSize).toEqual({ height: 1536, width: 2048 });
    expect(plan.errorFraction).toBeCloseTo((1536 * 2048 - 2 * 768 * 1024) / (2 * 768 * 1024), 10);
  });

  it('reports zero for an image that exactly spans the displays', () => {
    const union: DisplayRect = { height: 100, width: 400, yOffset: 0, xOffset: 0 };
    const displays: DisplayRect[] = [
      { height: 100, width: 200, yOffset: 0, xOffset: 0 },
      { height: 100, width: 200, yOffset: 0, xOffset: 200 },
    ];
    const plan = planScaling({ height: 50, width: 200 }, union, displays, { fitPolicy: 'fit', oneImage: true });
    expect(plan.targetSize).toEqual({ height: 100, width: 400 });
    expect(plan.errorFraction).toBe(0);
  });
});
