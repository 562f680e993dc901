import { totalArea } from './rect';
import { DisplayRect, PlanOptions, ScalingPlan, Size } from './types';

/**
 * Work out the scaled size of a `currentSize` image for `targetRect`.
 *
 * Both candidate sizes keep the aspect ratio and match the display exactly in
 * one dimension. The fill policy picks the one that covers the display and
 * reports the cropped fraction of the scaled image; the fit policy picks the
 * one that fits inside it, centres it, and reports the uncovered fraction of
 * the display. In one-image mode the error is the mismatch between the scaled
 * area and the summed area of every display instead.
 */
export function planScaling(
  currentSize: Size,
  targetRect: DisplayRect,
  allTargetRects: readonly DisplayRect[],
  options: PlanOptions,
): ScalingPlan {
  const targetH = targetRect.height;
  const targetW = targetRect.width;

  const zoomY = targetH / currentSize.height;
  const zoomX = targetW / currentSize.width;
  // Extreme aspect ratios would otherwise round a side down to nothing.
  const sizeByHeight: Size = { height: targetH, width: Math.max(1, Math.round(currentSize.width * zoomY)) };
  const sizeByWidth: Size = { height: Math.max(1, Math.round(currentSize.height * zoomX)), width: targetW };

  let targetSize = sizeByHeight;
  let fitOffsets = { y: 0, x: 0 };
  let errorFraction: number;

  if (options.fitPolicy === 'fit') {
    if (sizeByHeight.width > targetW) {
      targetSize = sizeByWidth;
      fitOffsets = { y: Math.round(Math.abs(targetSize.height - targetH) / 2), x: 0 };
      errorFraction = ((targetH - targetSize.height) * targetW) / (targetH * targetW);
    } else {
      fitOffsets = { y: 0, x: Math.round(Math.abs(targetSize.width - targetW) / 2) };
      errorFraction = ((targetW - targetSize.width) * targetH) / (targetH * targetW);
    }
  } else {
    if (sizeByHeight.width < targetW) {
      targetSize = sizeByWidth;
    }
    const scaledArea = targetSize.height * targetSize.width;
    errorFraction = (scaledArea - targetH * targetW) / scaledArea;
  }

  if (options.oneImage) {
    const screenArea = totalArea(allTargetRects);
    errorFraction = Math.abs(targetSize.height * targetSize.width - screenArea) / screenArea;
  }

  return { currentSize: { ...currentSize }, targetSize, fitOffsets, errorFraction };
}
