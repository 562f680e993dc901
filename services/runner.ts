import { promises as fs } from 'node:fs';
import path from 'node:path';
import { setTimeout as sleepMs } from 'node:timers/promises';
import { OUTPUT_FILE_SUFFIXES } from '../constants';
import { LogSink } from '../types';
import {
  composite,
  DisplayRect,
  emit,
  ImageRaster,
  isWallspanError,
  Point,
  Size,
  WallspanError,
  WallspanEventCallback,
} from '../core/layout';
import { CandidatePool, ImageSelector } from '../core/selection';
import { WallspanConfig } from './config';
import { collectImagePaths, DiscoveryOptions } from './discovery';
import { ImageCodec } from './imageCodec';
import { mapWallspanErrorToLogEntry, mapWallspanEventToLogEntry } from './logAdapter';
import { DisplayLayout, Platform } from './platform';

const OUTPUT_SUFFIXES = new Set([...OUTPUT_FILE_SUFFIXES, ...OUTPUT_FILE_SUFFIXES.map((s) => s.toUpperCase())]);

export interface RunnerDeps {
  platform: Platform;
  codec: ImageCodec;
  onLog: LogSink;
  collect?: (sources: readonly string[], options: DiscoveryOptions) => Promise<string[]>;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface IterationReport {
  imagePaths: string[];
  canvasSize: Size;
  written: boolean;
  applied: boolean;
}

async function pathStats(target: string) {
  try {
    return await fs.stat(target);
  } catch {
    return null;
  }
}

/**
 * Check the output filename before any work is done. Resolves to `true` when
 * the file already exists.
 */
export async function validateOutputPath(outfile: string): Promise<boolean> {
  if (!OUTPUT_SUFFIXES.has(path.extname(outfile))) {
    throw new WallspanError(
      'OUTPUT_PATH_INVALID',
      `No recognized image file suffix on the output filename ${outfile}.`,
      { path: outfile },
    );
  }

  const dirStats = await pathStats(path.dirname(outfile));
  if (!dirStats?.isDirectory()) {
    throw new WallspanError('OUTPUT_PATH_INVALID', `The directory for the output file ${outfile} does not exist.`, {
      path: outfile,
    });
  }

  const stats = await pathStats(outfile);
  if (stats && !stats.isFile()) {
    throw new WallspanError('OUTPUT_PATH_INVALID', `The output pathname ${outfile} exists but is not a file.`, {
      path: outfile,
    });
  }
  return stats !== null;
}

export function resolvePrimaryOrigin(config: WallspanConfig, platform: Platform, layout: DisplayLayout): Point | null {
  if (config.skipOriginCorrection) return null;
  if (config.primaryOrigin) return config.primaryOrigin;
  if (platform.tiledAroundPrimary) return layout.primaryOrigin;
  return null;
}

export function formatCurrentImages(paths: readonly string[]): string {
  return paths.map((imagePath, i) => `Image on display ${i} is\n    ${imagePath}\n\n`).join('');
}

export class WallpaperRunner {
  private readonly pool: CandidatePool;
  private readonly selector: ImageSelector;
  private readonly onEvent: WallspanEventCallback;

  constructor(
    private readonly config: WallspanConfig,
    private readonly deps: RunnerDeps,
  ) {
    this.onEvent = (event) => deps.onLog(mapWallspanEventToLogEntry(event));
    const collect = deps.collect ?? collectImagePaths;
    this.pool = new CandidatePool(() => collect(config.sources, { recursive: config.recursive }));
    this.selector = new ImageSelector({
      order: config.order,
      decode: deps.codec.decode,
      fitPolicy: config.fitPolicy,
      oneImage: config.oneImage,
      maxErrorPercent: config.maxErrorPercent,
      random: deps.random,
      onEvent: this.onEvent,
    });
  }

  private async listDisplays(): Promise<DisplayLayout> {
    if (this.config.resList) {
      return { rects: [...this.config.resList], primaryOrigin: null };
    }
    return this.deps.platform.listDisplays();
  }

  private async selectImages(rects: readonly DisplayRect[]) {
    const paths: string[] = [];
    const rasters: ImageRaster[] = [];

    for (let i = 0; i < rects.length; i++) {
      const selected = await this.selector.selectNext(rects[i], rects, this.pool);
      if (!selected) {
        throw new WallspanError('POOL_EXHAUSTED', `No suitable image files found for display ${i}.`, { display: i });
      }
      emit(this.onEvent, {
        phase: 'select',
        level: 'info',
        code: 'IMAGE_SELECTED',
        message: `Image selected for display ${i} is ${selected.path}`,
      });
      paths.push(selected.path);
      rasters.push(selected.raster);
      if (this.config.oneImage) break;
    }

    return { paths, rasters };
  }

  /** One full cycle: query displays, pick images, composite, write and apply. */
  public async runOnce(): Promise<IterationReport> {
    const { config, deps } = this;
    const layout = await this.listDisplays();
    if (layout.rects.length === 0) {
      throw new WallspanError(
        'EMPTY_LAYOUT',
        "No displays detected. Maybe try explicitly setting the resolutions with the '--reslist' option.",
      );
    }
    emit(this.onEvent, {
      phase: 'run',
      level: 'info',
      code: 'DISPLAYS_DETECTED',
      message: `Detected ${layout.rects.length} displays.`,
      metrics: Object.fromEntries(
        layout.rects.map((r, i) => [`display${i}`, `${r.width}x${r.height}+${r.xOffset}+${r.yOffset}`]),
      ),
    });

    const { paths, rasters } = await this.selectImages(layout.rects);

    if (config.logCurrent) {
      await fs.writeFile(config.logCurrent, formatCurrentImages(paths), 'utf-8');
    }

    const { canvas } = composite(layout.rects, rasters, {
      fitPolicy: config.fitPolicy,
      padColor: config.padColor,
      backgroundColor: config.backgroundColor,
      oneImage: config.oneImage,
      splineOrder: config.splineOrder,
      primaryOrigin: resolvePrimaryOrigin(config, deps.platform, layout),
      onEvent: this.onEvent,
    });

    let written = false;
    try {
      emit(this.onEvent, {
        phase: 'run',
        level: 'info',
        code: 'WRITE',
        message: `Writing the combined image to the file ${config.outfile}`,
      });
      await deps.codec.encode(canvas, config.outfile);
      written = true;
    } catch (error) {
      if (!isWallspanError(error) || error.code !== 'WRITE_FAILED') throw error;
      emit(this.onEvent, {
        phase: 'run',
        level: 'warn',
        code: error.code,
        message: error.message,
        metrics: error.details,
      });
    }

    let applied = false;
    if (written && !config.dontApply) {
      try {
        emit(this.onEvent, {
          phase: 'run',
          level: 'info',
          code: 'APPLY',
          message: `Setting the new image as the current background wallpaper (${deps.platform.name}).`,
        });
        await deps.platform.applyWallpaper(config.outfile);
        applied = true;
      } catch (error) {
        deps.onLog(mapWallspanErrorToLogEntry(error, 'run.apply'));
      }
    }

    return {
      imagePaths: paths,
      canvasSize: { height: canvas.height, width: canvas.width },
      written,
      applied,
    };
  }

  /**
   * Run until done: once, or forever with `timeDelayMinutes` between cycles.
   * Resolves to the process exit code.
   */
  public async run(): Promise<number> {
    const { config, deps } = this;
    const exists = await validateOutputPath(config.outfile);
    if (config.noClobber && exists) {
      emit(this.onEvent, {
        phase: 'run',
        level: 'warn',
        code: 'NOCLOBBER',
        message: `The output file ${config.outfile} already exists. No file was written due to the noclobber option.`,
      });
      return 0;
    }

    const sleep = deps.sleep ?? ((ms: number) => sleepMs(ms).then(() => undefined));
    for (;;) {
      await this.runOnce();
      if (config.timeDelayMinutes === null) break;
      emit(this.onEvent, {
        phase: 'run',
        level: 'info',
        code: 'SLEEP',
        message: `Sleeping for ${config.timeDelayMinutes} minutes.`,
      });
      await sleep(config.timeDelayMinutes * 60_000);
    }

    emit(this.onEvent, { phase: 'run', level: 'info', code: 'FINISHED', message: 'Finished.' });
    return 0;
  }
}
