export * from './errors';
export * from './events';
export * from './types';
export { boundingBox, parseResolution, totalArea, unionRect } from './rect';
export { planScaling } from './planner';
export { copyRegion, createRaster, fillRaster, isSplineOrder, resizeRaster } from './rasterizer';
export { correctOrigin } from './originCorrector';
export { composite } from './composer';
