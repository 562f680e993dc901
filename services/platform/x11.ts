import { GNOME_BACKGROUND_PLUGIN_SCHEMA, GNOME_BACKGROUND_SCHEMA } from '../../constants';
import { DisplayRect, emit, isWallspanError, parseResolution, WallspanError } from '../../core/layout';
import { runCommand } from './exec';
import { DisplayLayout, Platform, PlatformOptions } from './types';

const GNOME_LIKE = new Set(['GNOME', 'X-Cinnamon', 'Unity']);

function geometryOrNull(token: string): DisplayRect | null {
  try {
    return parseResolution(token);
  } catch (error) {
    if (isWallspanError(error) && error.code === 'INVALID_RESOLUTION') return null;
    throw error;
  }
}

/**
 * Active displays from `xrandr` output, in the order xrandr lists them.
 * A display counts as active when its header carries a geometry such as
 * `1920x1080+0+0` and one of its mode lines is marked current with `*`.
 */
export function parseXrandrOutput(output: string): DisplayRect[] {
  const rects: DisplayRect[] = [];
  let current: DisplayRect | null = null;

  for (const line of output.split(/\r?\n/)) {
    const words = line.trim().split(/\s+/);
    if (words.length < 2) continue;

    if (words[1] === 'connected' || words[1] === 'disconnected') {
      // Skip words like "primary" between "connected" and the geometry.
      const geometry = words.slice(2).find((word) => /^\d/.test(word));
      current = words[1] === 'connected' && geometry ? geometryOrNull(geometry) : null;
      continue;
    }

    if (current && words.some((word) => word.includes('*'))) {
      rects.push(current);
      current = null;
    }
  }

  return rects;
}

function desktopNames(env: NodeJS.ProcessEnv): string[] {
  return (env.XDG_CURRENT_DESKTOP ?? '').split(':').filter(Boolean);
}

export function createX11Platform(options: PlatformOptions = {}): Platform {
  const run = options.run ?? runCommand;
  const baseEnv = options.env ?? process.env;
  const { onEvent } = options;

  async function listDisplays(): Promise<DisplayLayout> {
    let output: string;
    try {
      output = await run('xrandr', []);
    } catch (error) {
      throw new WallspanError(
        'DISPLAY_QUERY_FAILED',
        "Error running the 'xrandr' program. Be sure it is installed, or set the resolutions with '--reslist'.",
        { reason: error instanceof Error ? error.message : String(error) },
      );
    }
    return { rects: parseXrandrOutput(output), primaryOrigin: null };
  }

  async function applyWallpaper(imagePath: string) {
    // The wallpaper tools need an X display even when started from cron or a service.
    const env: NodeJS.ProcessEnv = { ...baseEnv, DISPLAY: baseEnv.DISPLAY ?? ':0' };
    const desktops = desktopNames(env);

    if (desktops.includes('LXDE')) {
      try {
        await run('pcmanfm', ['--set-wallpaper', imagePath, '--wallpaper-mode=fit'], env);
      } catch (error) {
        throw new WallspanError(
          'WALLPAPER_APPLY_FAILED',
          "Error attempting to run 'pcmanfm'. The image was created but could not be set as the background.",
          { reason: error instanceof Error ? error.message : String(error) },
        );
      }
      return;
    }

    const detected = desktops.find((name) => GNOME_LIKE.has(name));
    emit(onEvent, {
      phase: 'run',
      level: 'info',
      code: 'DESKTOP_DETECTED',
      message: detected
        ? `Detected ${detected} desktop, using GNOME settings.`
        : 'Assuming a GNOME desktop and hoping for the best.',
      metrics: { XDG_CURRENT_DESKTOP: env.XDG_CURRENT_DESKTOP ?? '' },
    });

    const gsettingsEnv = { ...env, GSETTINGS_BACKEND: 'dconf' };
    try {
      await run('gsettings', ['set', GNOME_BACKGROUND_PLUGIN_SCHEMA, 'active', 'true'], gsettingsEnv);
    } catch (error) {
      // Newer GNOME releases dropped this schema.
      emit(onEvent, {
        phase: 'run',
        level: 'warn',
        code: 'GNOME_PLUGIN_UNAVAILABLE',
        message: 'Could not enable the GNOME background plugin.',
        metrics: { reason: error instanceof Error ? error.message : String(error) },
      });
    }

    try {
      await run('gsettings', ['set', GNOME_BACKGROUND_SCHEMA, 'picture-options', 'spanned'], gsettingsEnv);
      await run('gsettings', ['set', GNOME_BACKGROUND_SCHEMA, 'picture-uri', `file://${imagePath}`], gsettingsEnv);
    } catch (error) {
      throw new WallspanError(
        'WALLPAPER_APPLY_FAILED',
        "Error attempting to run 'gsettings'. The image was created but could not be set as the background.",
        { reason: error instanceof Error ? error.message : String(error) },
      );
    }
  }

  return { name: 'x11', tiledAroundPrimary: false, listDisplays, applyWallpaper };
}
