import { emit } from '../../core/layout';
import { PlatformOptions, Platform } from './types';
import { createWindowsPlatform } from './windows';
import { createX11Platform } from './x11';

export type { CommandRunner, DisplayLayout, Platform, PlatformOptions } from './types';
export { createWindowsPlatform, normalizeMonitorBounds, parseScreenBounds } from './windows';
export { createX11Platform, parseXrandrOutput } from './x11';

export function detectPlatform(osName: NodeJS.Platform, options: PlatformOptions = {}): Platform {
  if (osName === 'win32') return createWindowsPlatform(options);
  if (osName !== 'linux') {
    emit(options.onEvent, {
      phase: 'run',
      level: 'warn',
      code: 'UNKNOWN_OS',
      message:
        "System OS not recognized. Assuming an 'xrandr' system; try '--reslist' to set the resolutions explicitly.",
      metrics: { os: osName },
    });
  }
  return createX11Platform(options);
}
