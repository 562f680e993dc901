import { EventCapableOptions } from './events';

/** One monitor's pixel size and its offset inside the virtual desktop. */
export interface DisplayRect {
  readonly height: number;
  readonly width: number;
  readonly yOffset: number;
  readonly xOffset: number;
}

export interface Size {
  height: number;
  width: number;
}

export interface Point {
  y: number;
  x: number;
}

export type Rgb = readonly [number, number, number];

/**
 * Row-major 8-bit RGB pixels; sample (y, x, c) lives at `(y * width + x) * 3 + c`.
 */
export interface ImageRaster {
  width: number;
  height: number;
  data: Uint8Array;
}

export type FitPolicy = 'fill' | 'fit';

export type SplineOrder = 0 | 1 | 2 | 3 | 4 | 5;

export interface ScalingPlan {
  currentSize: Size;
  targetSize: Size;
  fitOffsets: Point;
  errorFraction: number;
}

export interface PlanOptions {
  fitPolicy: FitPolicy;
  oneImage: boolean;
}

export interface CompositeConfig extends EventCapableOptions {
  fitPolicy: FitPolicy;
  /** Pad colour for the fit policy; takes precedence over `backgroundColor`. */
  padColor?: Rgb | null;
  backgroundColor?: Rgb | null;
  oneImage: boolean;
  splineOrder: SplineOrder;
  /** Where the primary display's origin landed after offsets were normalised. */
  primaryOrigin?: Point | null;
}

export interface CompositeResult {
  canvas: ImageRaster;
  plans: ScalingPlan[];
  targetRects: DisplayRect[];
}
