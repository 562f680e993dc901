import type { DisplayRect, EventCapableOptions, Point } from '../../core/layout';

export interface DisplayLayout {
  rects: DisplayRect[];
  /** Primary display's top left after all offsets were shifted to be non-negative. */
  primaryOrigin: Point | null;
}

export type CommandRunner = (command: string, args: string[], env?: NodeJS.ProcessEnv) => Promise<string>;

export interface PlatformOptions extends EventCapableOptions {
  run?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

export interface Platform {
  name: string;
  /** Whether the desktop tiles the wallpaper from the primary display's origin. */
  tiledAroundPrimary: boolean;
  listDisplays: () => Promise<DisplayLayout>;
  applyWallpaper: (imagePath: string) => Promise<void>;
}
