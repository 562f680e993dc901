import { WallspanError } from './errors';
import { DisplayRect, Size } from './types';

const RESOLUTION_PATTERN = /^(\d+)x(\d+)(?:\+(\d+)\+(\d+))?$/;

export function boundingBox(rects: readonly DisplayRect[]): Size {
  if (rects.length === 0) {
    throw new WallspanError('EMPTY_LAYOUT', 'No displays in the layout.');
  }

  let height = 0;
  let width = 0;
  for (const rect of rects) {
    height = Math.max(height, rect.yOffset + rect.height);
    width = Math.max(width, rect.xOffset + rect.width);
  }
  return { height, width };
}

/** A single rect at the origin covering the whole layout. */
export function unionRect(rects: readonly DisplayRect[]): DisplayRect {
  const box = boundingBox(rects);
  return { height: box.height, width: box.width, yOffset: 0, xOffset: 0 };
}

export function totalArea(rects: readonly DisplayRect[]): number {
  return rects.reduce((sum, rect) => sum + rect.height * rect.width, 0);
}

/**
 * Parse an xrandr-style geometry such as `1920x1080+1024+0` (width, height,
 * x offset, y offset). Offsets default to zero.
 */
export function parseResolution(text: string): DisplayRect {
  const match = RESOLUTION_PATTERN.exec(text.trim());
  if (!match) {
    throw new WallspanError(
      'INVALID_RESOLUTION',
      `Resolution "${text}" is not of the form WIDTHxHEIGHT+XOFFSET+YOFFSET.`,
      { resolution: text },
    );
  }

  const width = Number(match[1]);
  const height = Number(match[2]);
  const xOffset = match[3] === undefined ? 0 : Number(match[3]);
  const yOffset = match[4] === undefined ? 0 : Number(match[4]);

  if (width <= 0 || height <= 0) {
    throw new WallspanError('INVALID_RESOLUTION', `Resolution "${text}" has a zero dimension.`, {
      resolution: text,
    });
  }

  return { height, width, yOffset, xOffset };
}
