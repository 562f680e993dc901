import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createRaster, ImageRaster, WallspanError } from '../../core/layout';
import { LogEntry, LogStatus } from '../../types';
import { main } from '../cli';
import { USAGE } from '../config';
import { ImageCodec } from '../imageCodec';
import { Platform } from '../platform';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wallspan-cli-'));
  await fs.writeFile(path.join(dir, 'one.png'), 'placeholder');
  await fs.writeFile(path.join(dir, 'two.png'), 'placeholder');
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

function fakes() {
  const platform = {
    name: 'fake',
    tiledAroundPrimary: false,
    listDisplays: vi.fn(async () => ({
      rects: [
        { height: 2, width: 2, yOffset: 0, xOffset: 0 },
        { height: 2, width: 2, yOffset: 0, xOffset: 2 },
      ],
      primaryOrigin: null,
    })),
    applyWallpaper: vi.fn(async (_imagePath: string) => undefined),
  } satisfies Platform;
  const codec = {
    decode: vi.fn(async (_imagePath: string) => createRaster({ height: 2, width: 2 })),
    encode: vi.fn(async (_raster: ImageRaster, _outfile: string) => undefined),
  } satisfies ImageCodec;
  return { platform, codec };
}

function io(overrides: { platform?: Platform; codec?: ImageCodec; onLog?: (entry: LogEntry) => void } = {}) {
  return {
    out: vi.fn((_line: string) => undefined),
    err: vi.fn((_line: string) => undefined),
    env: {},
    osName: 'linux' as const,
    ...overrides,
  };
}

describe('main', () => {
  it('prints the usage text', async () => {
    const cli = io();
    expect(await main(['--help'], cli)).toBe(0);
    expect(cli.out).toHaveBeenCalledWith(USAGE);
  });

  it('explains bad options and exits with 1', async () => {
    const cli = io();
    expect(await main(['-z', '9', '-o', '/tmp/wall.png', 'pics'], cli)).toBe(1);
    expect(cli.err.mock.calls).toEqual([
      ['Error in wallspan: The specified spline order 9 is not in the range 0-5. [INVALID_OPTION]'],
      ["Run 'wallspan --help' for usage."],
    ]);
  });

  it('builds and applies a wallpaper from a directory', async () => {
    const { platform, codec } = fakes();
    const outfile = path.join(dir, 'wall.png');
    const cli = io({ platform, codec });

    expect(await main(['-s', '-o', outfile, dir], cli)).toBe(0);

    expect(codec.decode.mock.calls.map((call) => call[0])).toEqual([
      path.join(dir, 'one.png'),
      path.join(dir, 'two.png'),
    ]);
    expect(codec.encode).toHaveBeenCalledTimes(1);
    expect(codec.encode.mock.calls[0][0]).toMatchObject({ height: 2, width: 4 });
    expect(platform.applyWallpaper).toHaveBeenCalledWith(outfile);
    expect(cli.err).not.toHaveBeenCalled();
  });

  it('prints progress with --verbose', async () => {
    const { platform, codec } = fakes();
    const cli = io({ platform, codec });
    expect(await main(['-v', '-d', '-o', path.join(dir, 'wall.png'), dir], cli)).toBe(0);
    expect(cli.out).toHaveBeenCalledWith('Finished.');
    expect(platform.applyWallpaper).not.toHaveBeenCalled();
  });

  it('logs a failed run and exits with 1', async () => {
    const { platform, codec } = fakes();
    platform.listDisplays.mockRejectedValueOnce(
      new WallspanError('DISPLAY_QUERY_FAILED', 'Could not query the display layout.'),
    );
    const logs: LogEntry[] = [];
    const cli = io({ platform, codec, onLog: (entry) => logs.push(entry) });

    expect(await main(['-o', path.join(dir, 'wall.png'), dir], cli)).toBe(1);
    expect(logs.at(-1)).toMatchObject({
      stepId: 'run.error',
      status: LogStatus.Error,
      title: 'Could not query the display layout.',
      description: 'DISPLAY_QUERY_FAILED',
    });
  });

  it('fails on a missing image directory', async () => {
    const { platform, codec } = fakes();
    const cli = io({ platform, codec });
    const missing = path.join(dir, 'nowhere');
    expect(await main(['-o', path.join(dir, 'wall.png'), missing], cli)).toBe(1);
    expect(cli.err).toHaveBeenCalledWith(`Error in wallspan: Path does not exist: ${missing} [PATH_NOT_FOUND]`);
  });
});
