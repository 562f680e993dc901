import { createRaster } from './rasterizer';
import { ImageRaster, Point } from './types';

function modulo(value: number, base: number): number {
  const result = value % base;
  return result < 0 ? result + base : result;
}

/**
 * Re-tile a canvas laid out with (0, 0) at the top left of the bounding box
 * so that (0, 0) is the primary display's origin instead, wrapping the parts
 * above and left of `origin` around to the bottom and right. This is a 2D
 * circular shift by `(-origin.y, -origin.x)`; the result has the same size.
 */
export function correctOrigin(canvas: ImageRaster, origin: Point): ImageRaster {
  const { width, height } = canvas;
  const out = createRaster({ height, width });
  if (width === 0 || height === 0) return out;

  const y0 = modulo(origin.y, height);
  const x0 = modulo(origin.x, width);
  const src = canvas.data;
  const dst = out.data;

  // Each source row splits into [x0, width) -> [0, width - x0) and [0, x0) -> [width - x0, width).
  const tailBytes = (width - x0) * 3;
  for (let y = 0; y < height; y++) {
    const srcRow = y * width * 3;
    const dstRow = modulo(y - y0, height) * width * 3;
    dst.set(src.subarray(srcRow + x0 * 3, srcRow + width * 3), dstRow);
    dst.set(src.subarray(srcRow, srcRow + x0 * 3), dstRow + tailBytes);
  }

  return out;
}
