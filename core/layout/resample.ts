import { ImageRaster, Size, SplineOrder } from './types';

interface Kernel {
  support: number;
  weight: (t: number) => number;
}

interface AxisContributions {
  /** Source index offsets, `taps` per output sample. */
  indices: Int32Array;
  weights: Float32Array;
  taps: number;
}

function sinc(t: number): number {
  if (t === 0) return 1;
  const v = Math.PI * t;
  return Math.sin(v) / v;
}

function lanczos(lobes: number): Kernel {
  return {
    support: lobes,
    weight: (t) => (Math.abs(t) < lobes ? sinc(t) * sinc(t / lobes) : 0),
  };
}

const KERNELS: Record<Exclude<SplineOrder, 0>, Kernel> = {
  1: {
    support: 1,
    weight: (t) => {
      const a = Math.abs(t);
      return a < 1 ? 1 - a : 0;
    },
  },
  2: {
    support: 1.5,
    weight: (t) => {
      const a = Math.abs(t);
      if (a < 0.5) return 0.75 - a * a;
      if (a < 1.5) return 0.5 * (1.5 - a) * (1.5 - a);
      return 0;
    },
  },
  // Catmull-Rom
  3: {
    support: 2,
    weight: (t) => {
      const a = Math.abs(t);
      if (a < 1) return 1.5 * a * a * a - 2.5 * a * a + 1;
      if (a < 2) return -0.5 * a * a * a + 2.5 * a * a - 4 * a + 2;
      return 0;
    },
  },
  4: lanczos(2),
  5: lanczos(3),
};

function clampIndex(value: number, length: number): number {
  if (value < 0) return 0;
  if (value >= length) return length - 1;
  return value;
}

function nearestContributions(srcLength: number, dstLength: number, zoom: number): AxisContributions {
  const indices = new Int32Array(dstLength);
  const weights = new Float32Array(dstLength).fill(1);
  for (let i = 0; i < dstLength; i++) {
    indices[i] = clampIndex(Math.floor((i + 0.5) / zoom), srcLength);
  }
  return { indices, weights, taps: 1 };
}

function kernelContributions(
  srcLength: number,
  dstLength: number,
  zoom: number,
  kernel: Kernel,
): AxisContributions {
  // Minification widens the kernel so every source sample contributes.
  const scale = zoom < 1 ? 1 / zoom : 1;
  const support = kernel.support * scale;
  const taps = Math.ceil(support) * 2 + 1;
  const indices = new Int32Array(dstLength * taps);
  const weights = new Float32Array(dstLength * taps);

  for (let i = 0; i < dstLength; i++) {
    const center = (i + 0.5) / zoom - 0.5;
    const first = Math.ceil(center - support);
    let total = 0;

    for (let k = 0; k < taps; k++) {
      const j = first + k;
      const w = j > center + support ? 0 : kernel.weight((j - center) / scale);
      indices[i * taps + k] = clampIndex(j, srcLength);
      weights[i * taps + k] = w;
      total += w;
    }

    if (total !== 0) {
      for (let k = 0; k < taps; k++) {
        weights[i * taps + k] /= total;
      }
    }
  }

  return { indices, weights, taps };
}

function contributions(srcLength: number, dstLength: number, zoom: number, order: SplineOrder) {
  if (order === 0) return nearestContributions(srcLength, dstLength, zoom);
  return kernelContributions(srcLength, dstLength, zoom, KERNELS[order]);
}

/**
 * Separable resample of `raster` to `outSize`, with `zoom` giving the
 * output/input ratio per axis.
 */
export function resampleRaster(
  raster: ImageRaster,
  outSize: Size,
  zoom: { y: number; x: number },
  order: SplineOrder,
): ImageRaster {
  const srcW = raster.width;
  const srcH = raster.height;
  const dstW = outSize.width;
  const dstH = outSize.height;
  const src = raster.data;

  const cols = contributions(srcW, dstW, zoom.x, order);
  const rows = contributions(srcH, dstH, zoom.y, order);

  // Horizontal pass: srcH x dstW.
  const mid = new Float32Array(srcH * dstW * 3);
  for (let y = 0; y < srcH; y++) {
    const srcRow = y * srcW;
    const midRow = y * dstW;
    for (let x = 0; x < dstW; x++) {
      let r = 0;
      let g = 0;
      let b = 0;
      const base = x * cols.taps;
      for (let k = 0; k < cols.taps; k++) {
        const w = cols.weights[base + k];
        if (w === 0) continue;
        const s = (srcRow + cols.indices[base + k]) * 3;
        r += src[s] * w;
        g += src[s + 1] * w;
        b += src[s + 2] * w;
      }
      const m = (midRow + x) * 3;
      mid[m] = r;
      mid[m + 1] = g;
      mid[m + 2] = b;
    }
  }

  // Vertical pass into the clamped 8-bit output.
  const out = new Uint8Array(dstH * dstW * 3);
  for (let y = 0; y < dstH; y++) {
    const base = y * rows.taps;
    for (let x = 0; x < dstW; x++) {
      let r = 0;
      let g = 0;
      let b = 0;
      for (let k = 0; k < rows.taps; k++) {
        const w = rows.weights[base + k];
        if (w === 0) continue;
        const m = (rows.indices[base + k] * dstW + x) * 3;
        r += mid[m] * w;
        g += mid[m + 1] * w;
        b += mid[m + 2] * w;
      }
      const o = (y * dstW + x) * 3;
      out[o] = r <= 0 ? 0 : r >= 255 ? 255 : Math.round(r);
      out[o + 1] = g <= 0 ? 0 : g >= 255 ? 255 : Math.round(g);
      out[o + 2] = b <= 0 ? 0 : b >= 255 ? 255 : Math.round(b);
    }
  }

  return { width: dstW, height: dstH, data: out };
}
