import { DisplayRect, emit, WallspanError } from '../../core/layout';
import { runCommand } from './exec';
import { DisplayLayout, Platform, PlatformOptions } from './types';

export interface MonitorBounds {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

const SCREEN_QUERY =
  'Add-Type -AssemblyName System.Windows.Forms; ' +
  '[System.Windows.Forms.Screen]::AllScreens | ForEach-Object { ' +
  "'{0} {1} {2} {3}' -f $_.Bounds.Left, $_.Bounds.Top, $_.Bounds.Right, $_.Bounds.Bottom }";

const SPI_SETDESKWALLPAPER = 0x14;
const SPIF_UPDATEINIFILE = 0x01;
const SPIF_SENDWININICHANGE = 0x02;

const DESKTOP_KEY = 'HKCU\\Control Panel\\Desktop';

function powershellArgs(script: string): string[] {
  return ['-NoProfile', '-NonInteractive', '-Command', script];
}

function quotePowershell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** One `left top right bottom` line per monitor. */
export function parseScreenBounds(output: string): MonitorBounds[] {
  const bounds: MonitorBounds[] = [];
  for (const line of output.split(/\r?\n/)) {
    const values = line.trim().split(/\s+/).map(Number);
    if (values.length !== 4 || values.some((v) => !Number.isInteger(v))) continue;
    const [left, top, right, bottom] = values;
    bounds.push({ left, top, right, bottom });
  }
  return bounds;
}

/**
 * Windows puts (0, 0) at the primary display's top left, so other displays
 * may sit at negative positions. Shift every display so the smallest offset
 * is zero and remember where the primary origin ended up.
 */
export function normalizeMonitorBounds(monitors: readonly MonitorBounds[]): DisplayLayout {
  if (monitors.length === 0) return { rects: [], primaryOrigin: null };

  const minX = Math.min(...monitors.map((m) => Math.min(m.left, m.right)));
  const minY = Math.min(...monitors.map((m) => Math.min(m.top, m.bottom)));

  const rects: DisplayRect[] = monitors.map((m) => ({
    height: m.bottom - m.top,
    width: m.right - m.left,
    yOffset: m.top - minY,
    xOffset: m.left - minX,
  }));

  return { rects, primaryOrigin: { y: 0 - minY, x: 0 - minX } };
}

export function createWindowsPlatform(options: PlatformOptions = {}): Platform {
  const run = options.run ?? runCommand;
  const { onEvent } = options;

  async function listDisplays(): Promise<DisplayLayout> {
    let output: string;
    try {
      output = await run('powershell.exe', powershellArgs(SCREEN_QUERY));
    } catch (error) {
      throw new WallspanError('DISPLAY_QUERY_FAILED', 'Could not query the display layout from Windows.', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return normalizeMonitorBounds(parseScreenBounds(output));
  }

  async function setTiledMode() {
    try {
      await run('reg', ['add', DESKTOP_KEY, '/v', 'WallpaperStyle', '/t', 'REG_SZ', '/d', '0', '/f']);
      await run('reg', ['add', DESKTOP_KEY, '/v', 'TileWallpaper', '/t', 'REG_SZ', '/d', '1', '/f']);
    } catch (error) {
      emit(onEvent, {
        phase: 'run',
        level: 'warn',
        code: 'TILED_MODE_FAILED',
        message: "Could not set the wallpaper mode to 'tiled'; set it from the desktop settings.",
        metrics: { reason: error instanceof Error ? error.message : String(error) },
      });
    }
  }

  async function applyWallpaper(imagePath: string) {
    await setTiledMode();

    const script =
      'Add-Type -TypeDefinition \'using System.Runtime.InteropServices; public static class WallspanNative { ' +
      '[DllImport("user32.dll", CharSet = CharSet.Unicode)] ' +
      'public static extern int SystemParametersInfo(int uAction, int uParam, string lpvParam, int fuWinIni); }\'; ' +
      `[void][WallspanNative]::SystemParametersInfo(${SPI_SETDESKWALLPAPER}, 0, ${quotePowershell(imagePath)}, ` +
      `${SPIF_UPDATEINIFILE | SPIF_SENDWININICHANGE})`;

    try {
      await run('powershell.exe', powershellArgs(script));
    } catch (error) {
      throw new WallspanError('WALLPAPER_APPLY_FAILED', 'Setting the background wallpaper failed.', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { name: 'windows', tiledAroundPrimary: true, listDisplays, applyWallpaper };
}
