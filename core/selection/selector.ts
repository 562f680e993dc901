import { emit, EventCapableOptions } from '../layout/events';
import { planScaling } from '../layout/planner';
import { unionRect } from '../layout/rect';
import { DisplayRect, FitPolicy, ImageRaster } from '../layout/types';
import { CandidatePool } from './pool';

export type SelectionOrder = 'sequential' | 'random';

export type ImageDecoder = (path: string) => Promise<ImageRaster>;

export interface SelectedImage {
  path: string;
  raster: ImageRaster;
}

export interface SelectorOptions extends EventCapableOptions {
  order: SelectionOrder;
  decode: ImageDecoder;
  fitPolicy: FitPolicy;
  oneImage: boolean;
  /** Largest acceptable scaling error in percent; `null` accepts everything. */
  maxErrorPercent: number | null;
  /** Uniform in [0, 1); defaults to Math.random. */
  random?: () => number;
}

export class ImageSelector {
  private readonly random: () => number;

  constructor(private readonly options: SelectorOptions) {
    this.random = options.random ?? Math.random;
  }

  /**
   * Draw the next acceptable image for `targetRect` from `pool`, removing the
   * consumed entry. The pool is reloaded at most once per call when every
   * remaining entry has been tried; `null` means nothing acceptable was found.
   */
  public async selectNext(
    targetRect: DisplayRect,
    allTargetRects: readonly DisplayRect[],
    pool: CandidatePool,
  ): Promise<SelectedImage | null> {
    const { onEvent } = this.options;
    let indices = this.indexRange(pool.size);
    let reloaded = false;

    for (;;) {
      if (indices.length === 0) {
        if (reloaded) return null;
        reloaded = true;
        const found = await pool.reload();
        emit(onEvent, {
          phase: 'select',
          level: 'info',
          code: 'POOL_RELOADED',
          message: 'Loading or reloading the list of image files.',
          metrics: { found },
        });
        indices = this.indexRange(found);
        continue;
      }

      const index = this.drawIndex(indices);
      const path = pool.at(index);
      if (path === undefined) continue;

      let raster: ImageRaster;
      try {
        raster = await this.options.decode(path);
      } catch (error) {
        emit(onEvent, {
          phase: 'select',
          level: 'warn',
          code: 'UNREADABLE_IMAGE',
          message: `The file ${path} cannot be read as an image. Ignoring it.`,
          metrics: { reason: error instanceof Error ? error.message : String(error) },
        });
        continue;
      }

      if (this.options.maxErrorPercent !== null && !this.accepts(path, raster, targetRect, allTargetRects)) {
        continue;
      }

      pool.removeAt(index);
      return { path, raster };
    }
  }

  private indexRange(length: number): number[] {
    return Array.from({ length }, (_, i) => i);
  }

  private drawIndex(indices: number[]): number {
    if (this.options.order === 'sequential') {
      return indices.splice(0, 1)[0];
    }
    const pick = Math.min(indices.length - 1, Math.floor(this.random() * indices.length));
    return indices.splice(pick, 1)[0];
  }

  private accepts(
    path: string,
    raster: ImageRaster,
    targetRect: DisplayRect,
    allTargetRects: readonly DisplayRect[],
  ): boolean {
    const { fitPolicy, oneImage, maxErrorPercent, onEvent } = this.options;
    const rect = oneImage ? unionRect(allTargetRects) : targetRect;
    const plan = planScaling({ height: raster.height, width: raster.width }, rect, allTargetRects, {
      fitPolicy,
      oneImage,
    });
    const percent = plan.errorFraction * 100;
    const accepted = maxErrorPercent === null || percent <= maxErrorPercent;

    emit(onEvent, {
      phase: 'select',
      level: 'info',
      code: accepted ? 'IMAGE_ACCEPTED' : 'IMAGE_REJECTED',
      message: `Error percentage is ${percent.toFixed(1)}; ${accepted ? 'accepting' : 'rejecting'} image ${path}`,
      metrics: { errorPercent: percent.toFixed(1) },
    });
    return accepted;
  }
}
