import { WallspanError } from './errors';
import { emit, EventCapableOptions } from './events';
import { resampleRaster } from './resample';
import { ImageRaster, Point, Rgb, Size, SplineOrder } from './types';

// Nudges the zoom factor up so truncation never lands one pixel short.
const ZOOM_EPSILON = 1e-5;

export function createRaster(size: Size): ImageRaster {
  return {
    width: size.width,
    height: size.height,
    data: new Uint8Array(size.width * size.height * 3),
  };
}

export function fillRaster(raster: ImageRaster, rgb: Rgb) {
  const { data } = raster;
  const [r, g, b] = rgb;
  for (let i = 0; i < data.length; i += 3) {
    data[i] = r;
    data[i + 1] = g;
    data[i + 2] = b;
  }
}

export function isSplineOrder(value: number): value is SplineOrder {
  return Number.isInteger(value) && value >= 0 && value <= 5;
}

/**
 * Resize to exactly `targetSize`. Returns the input itself when it already
 * has that size.
 */
export function resizeRaster(
  raster: ImageRaster,
  targetSize: Size,
  splineOrder: number,
  options: EventCapableOptions = {},
): ImageRaster {
  if (!isSplineOrder(splineOrder)) {
    throw new WallspanError('INVALID_OPTION', `Spline order ${splineOrder} is not in the range 0-5.`, {
      splineOrder,
    });
  }

  if (raster.height === targetSize.height && raster.width === targetSize.width) {
    emit(options.onEvent, {
      phase: 'scale',
      level: 'info',
      code: 'SCALE_SKIPPED',
      message: 'Image is at the correct scale already, skipping the rescale.',
    });
    return raster;
  }

  const zoomY = (targetSize.height + ZOOM_EPSILON) / raster.height;
  const zoomX = (targetSize.width + ZOOM_EPSILON) / raster.width;
  const outSize: Size = {
    height: Math.floor(raster.height * zoomY),
    width: Math.floor(raster.width * zoomX),
  };

  emit(options.onEvent, {
    phase: 'scale',
    level: 'info',
    code: 'SCALE',
    message: `Scaling image with spline order ${splineOrder}.`,
    metrics: { zoomY: zoomY.toFixed(4), zoomX: zoomX.toFixed(4) },
  });

  const scaled = resampleRaster(raster, outSize, { y: zoomY, x: zoomX }, splineOrder);

  if (scaled.height !== targetSize.height || scaled.width !== targetSize.width) {
    emit(options.onEvent, {
      phase: 'scale',
      level: 'warn',
      code: 'SCALE_IMPERFECT',
      message: 'Imperfect scaling in zoom operation.',
      metrics: { height: scaled.height, width: scaled.width },
    });
  }

  return scaled;
}

function clampAxis(
  extent: number,
  srcStart: number,
  srcLength: number,
  dstStart: number,
  dstLength: number,
): { extent: number; srcStart: number; dstStart: number } {
  let n = Math.max(0, extent);
  let s = srcStart;
  let d = dstStart;

  // A negative start skips the part of the block that lies before index 0.
  const lead = Math.max(0, -s, -d);
  s += lead;
  d += lead;
  n -= lead;

  if (s >= srcLength || d >= dstLength) return { extent: 0, srcStart: s, dstStart: d };
  n = Math.min(n, srcLength - s, dstLength - d);
  return { extent: Math.max(0, n), srcStart: s, dstStart: d };
}

/**
 * Copy an `extents`-sized block from `src` at `srcStart` into `dst` at
 * `dstStart`, in place. The block is clipped against both rasters; anything
 * out of range is silently dropped.
 */
export function copyRegion(
  extents: Point,
  src: ImageRaster,
  srcStart: Point,
  dst: ImageRaster,
  dstStart: Point,
) {
  const ay = clampAxis(extents.y, srcStart.y, src.height, dstStart.y, dst.height);
  const ax = clampAxis(extents.x, srcStart.x, src.width, dstStart.x, dst.width);
  if (ay.extent === 0 || ax.extent === 0) return;

  const rowBytes = ax.extent * 3;
  for (let row = 0; row < ay.extent; row++) {
    const from = ((ay.srcStart + row) * src.width + ax.srcStart) * 3;
    const to = ((ay.dstStart + row) * dst.width + ax.dstStart) * 3;
    dst.data.set(src.data.subarray(from, from + rowBytes), to);
  }
}
