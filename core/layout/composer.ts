import { emit } from './events';
import { correctOrigin } from './originCorrector';
import { planScaling } from './planner';
import { copyRegion, createRaster, fillRaster, resizeRaster } from './rasterizer';
import { boundingBox, unionRect } from './rect';
import { CompositeConfig, CompositeResult, DisplayRect, ImageRaster, Point, Rgb, ScalingPlan } from './types';

function nowMs(): number {
  return typeof performance !== 'undefined' ? performance.now() : Date.now();
}

function resolveFillColor(config: CompositeConfig): Rgb | null {
  if (config.fitPolicy === 'fit' && config.padColor) return config.padColor;
  return config.backgroundColor ?? null;
}

function cropStart(scaled: ImageRaster, rect: DisplayRect): Point {
  return {
    y: Math.round(Math.max(0, (scaled.height - rect.height) / 2)),
    x: Math.round(Math.max(0, (scaled.width - rect.width) / 2)),
  };
}

/**
 * Build the combined wallpaper: one canvas the size of the displays' bounding
 * box, with `images[i]` scaled into `displayRects[i]`. In one-image mode the
 * rects collapse to a single rect covering the bounding box and only
 * `images[0]` is used. Pairs beyond the shorter of the two lists are ignored.
 */
export function composite(
  displayRects: readonly DisplayRect[],
  images: readonly ImageRaster[],
  config: CompositeConfig,
): CompositeResult {
  const { onEvent } = config;
  const t0 = nowMs();

  // init
  const box = boundingBox(displayRects);
  emit(onEvent, {
    phase: 'composite',
    level: 'info',
    code: 'CANVAS_CREATED',
    message: 'Creating a large image which is a bounding box on all the displays.',
    metrics: { height: box.height, width: box.width },
  });
  let canvas = createRaster(box);
  const targetRects: DisplayRect[] = config.oneImage ? [unionRect(displayRects)] : [...displayRects];
  const pairCount = Math.min(images.length, targetRects.length);

  // scaling
  const plans: ScalingPlan[] = [];
  const scaledImages: ImageRaster[] = [];
  for (let i = 0; i < pairCount; i++) {
    const image = images[i];
    const plan = planScaling(
      { height: image.height, width: image.width },
      targetRects[i],
      targetRects,
      { fitPolicy: config.fitPolicy, oneImage: config.oneImage },
    );
    emit(onEvent, {
      phase: 'plan',
      level: 'info',
      code: 'PLAN',
      message: `Image ${i} has initial shape ${image.height}x${image.width}.`,
      metrics: {
        display: i,
        targetHeight: plan.targetSize.height,
        targetWidth: plan.targetSize.width,
        errorPercent: (plan.errorFraction * 100).toFixed(1),
      },
    });
    plans.push(plan);
    scaledImages.push(resizeRaster(image, plan.targetSize, config.splineOrder, { onEvent }));
  }

  // filling
  const fill = resolveFillColor(config);
  if (fill) {
    fillRaster(canvas, fill);
    emit(onEvent, {
      phase: 'fill',
      level: 'info',
      code: 'FILL',
      message: 'Filled the canvas with a solid colour.',
      metrics: { r: fill[0], g: fill[1], b: fill[2] },
    });
  }

  // compositing
  for (let i = 0; i < pairCount; i++) {
    const rect = targetRects[i];
    const scaled = scaledImages[i];
    const { fitOffsets } = plans[i];
    const from = config.fitPolicy === 'fit' ? { y: 0, x: 0 } : cropStart(scaled, rect);
    const to = { y: rect.yOffset + fitOffsets.y, x: rect.xOffset + fitOffsets.x };
    emit(onEvent, {
      phase: 'composite',
      level: 'info',
      code: 'COPY',
      message: `Copying image ${i} into the large final image.`,
      metrics: { fromY: from.y, fromX: from.x, height: rect.height, width: rect.width, toY: to.y, toX: to.x },
    });
    copyRegion({ y: rect.height, x: rect.width }, scaled, from, canvas, to);
  }

  // origin correction
  if (config.primaryOrigin) {
    emit(onEvent, {
      phase: 'origin',
      level: 'info',
      code: 'ORIGIN_CORRECTED',
      message: 'Correcting the origin of the image relative to the primary display.',
      metrics: { y: config.primaryOrigin.y, x: config.primaryOrigin.x },
    });
    canvas = correctOrigin(canvas, config.primaryOrigin);
  }

  emit(onEvent, {
    phase: 'composite',
    level: 'info',
    code: 'COMPOSITE_DONE',
    message: 'Combined image complete.',
    metrics: { ms: (nowMs() - t0).toFixed(1) },
  });

  return { canvas, plans, targetRects };
}
