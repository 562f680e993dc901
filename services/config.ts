import { parseArgs } from 'node:util';
import { DEFAULT_SPLINE_ORDER, IMAGE_FILE_SUFFIXES, PROGRAM_NAME } from '../constants';
import {
  DisplayRect,
  FitPolicy,
  isSplineOrder,
  parseResolution,
  Point,
  Rgb,
  SplineOrder,
  WallspanError,
} from '../core/layout';
import { SelectionOrder } from '../core/selection';
import { processPath } from './paths';

export interface WallspanConfig {
  sources: string[];
  outfile: string;
  verbose: boolean;
  oneImage: boolean;
  fitPolicy: FitPolicy;
  padColor: Rgb | null;
  backgroundColor: Rgb | null;
  timeDelayMinutes: number | null;
  maxErrorPercent: number | null;
  splineOrder: SplineOrder;
  order: SelectionOrder;
  recursive: boolean;
  dontApply: boolean;
  noClobber: boolean;
  resList: DisplayRect[] | null;
  /** From `--windows X,Y`; forces origin correction around this point. */
  primaryOrigin: Point | null;
  skipOriginCorrection: boolean;
  logCurrent: string | null;
}

export type ParsedCommand = { kind: 'help' } | { kind: 'run'; config: WallspanConfig };

export const USAGE = `Usage: ${PROGRAM_NAME} [options] -o OUTFILE IMAGE_FILE_OR_DIR [IMAGE_FILE_OR_DIR ...]

Make a single, combined background image from separate images, one for each
display, and set it as the desktop background. Images are drawn at random
without replacement from the files and directories given; the list is
reloaded from disk when it runs out.

On Linux the combined image is shown in 'spanned' mode, on Windows in
'tiled' mode; both are set automatically where the desktop allows it.

Options:
  -o, --outfile FILE         Output image file, silently overwritten (required).
  -v, --verbose              Print progress information.
  -1, --oneimage             Stretch a single image over all the displays.
  -f, --fitimage R,G,B       Fit each image inside its display, padding with this colour.
  -c, --colorfill R,G,B      Colour for bounding-box areas not covered by a display.
  -t, --timedelay MINUTES    Repeat forever, sleeping this long between iterations.
  -p, --percenterror PCT     Largest percentage of an image that may be cropped
                             (or of a display left uncovered with --fitimage).
  -z, --zoomspline N         Interpolation order 0-5 for scaling (default ${DEFAULT_SPLINE_ORDER}).
  -s, --sequential           Use images in the order given instead of at random.
  -R, --recursive            Search image directories recursively.
  -d, --dontapply            Only write the image file.
      --noclobber            Do nothing if the output file already exists.
  -r, --reslist WxH+X+Y      Explicit display geometry; repeat once per display.
  -w, --windows X,Y          Top left of the primary display, for '--reslist' on Windows.
  -x, --x11                  Never wrap the image around the primary display origin.
  -L, --logcurrent FILE      Write the names of the chosen images to FILE.
  -h, --help                 Show this help message.

Image suffixes: ${IMAGE_FILE_SUFFIXES.join(' ')} (or upper case).
`;

const OPTIONS = {
  outfile: { type: 'string', short: 'o' },
  verbose: { type: 'boolean', short: 'v' },
  oneimage: { type: 'boolean', short: '1' },
  fitimage: { type: 'string', short: 'f' },
  colorfill: { type: 'string', short: 'c' },
  timedelay: { type: 'string', short: 't' },
  percenterror: { type: 'string', short: 'p' },
  zoomspline: { type: 'string', short: 'z' },
  sequential: { type: 'boolean', short: 's' },
  recursive: { type: 'boolean', short: 'R' },
  dontapply: { type: 'boolean', short: 'd' },
  noclobber: { type: 'boolean' },
  reslist: { type: 'string', short: 'r', multiple: true },
  windows: { type: 'string', short: 'w' },
  x11: { type: 'boolean', short: 'x' },
  logcurrent: { type: 'string', short: 'L' },
  help: { type: 'boolean', short: 'h' },
} as const;

function invalid(option: string, message: string): WallspanError {
  return new WallspanError('INVALID_OPTION', message, { option });
}

function integerList(option: string, text: string, count: number): number[] {
  const parts = text.split(/[,\s]+/).filter(Boolean);
  const values = parts.map(Number);
  if (values.length !== count || values.some((v) => !Number.isInteger(v))) {
    throw invalid(option, `--${option} takes ${count} comma-separated integers, got "${text}".`);
  }
  return values;
}

export function parseRgb(option: string, text: string): Rgb {
  const [r, g, b] = integerList(option, text, 3);
  if ([r, g, b].some((v) => v < 0 || v > 255)) {
    throw invalid(option, `--${option} colour components must be in the range 0-255, got "${text}".`);
  }
  return [r, g, b];
}

function parseNonNegative(option: string, text: string): number {
  const value = Number(text);
  if (text.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw invalid(option, `--${option} takes a non-negative number, got "${text}".`);
  }
  return value;
}

function parseSplineOrder(text: string | undefined): SplineOrder {
  if (text === undefined) return DEFAULT_SPLINE_ORDER;
  const value = Number(text);
  if (!isSplineOrder(value)) {
    throw invalid('zoomspline', `The specified spline order ${text} is not in the range 0-5.`);
  }
  return value;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new WallspanError('INVALID_OPTION', error instanceof Error ? error.message : String(error));
  }
}

export function parseConfig(argv: string[], env: NodeJS.ProcessEnv = {}): ParsedCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { kind: 'help' };

  if (!values.outfile) {
    throw invalid('outfile', 'The output file argument -o/--outfile is required.');
  }
  if (positionals.length === 0) {
    throw new WallspanError('INVALID_OPTION', 'At least one image file or directory is required.');
  }

  const padColor = values.fitimage === undefined ? null : parseRgb('fitimage', values.fitimage);
  const windows = values.windows === undefined ? null : integerList('windows', values.windows, 2);

  return {
    kind: 'run',
    config: {
      sources: positionals,
      outfile: processPath(values.outfile),
      verbose: Boolean(values.verbose) || env.LOG_LEVEL?.toLowerCase() === 'debug',
      oneImage: Boolean(values.oneimage),
      fitPolicy: padColor ? 'fit' : 'fill',
      padColor,
      backgroundColor: values.colorfill === undefined ? null : parseRgb('colorfill', values.colorfill),
      timeDelayMinutes: values.timedelay === undefined ? null : parseNonNegative('timedelay', values.timedelay),
      maxErrorPercent:
        values.percenterror === undefined ? null : parseNonNegative('percenterror', values.percenterror),
      splineOrder: parseSplineOrder(values.zoomspline),
      order: values.sequential ? 'sequential' : 'random',
      recursive: Boolean(values.recursive),
      dontApply: Boolean(values.dontapply),
      noClobber: Boolean(values.noclobber),
      resList: values.reslist ? values.reslist.map((text) => parseResolution(text)) : null,
      primaryOrigin: windows ? { y: windows[1], x: windows[0] } : null,
      skipOriginCorrection: Boolean(values.x11),
      logCurrent: values.logcurrent === undefined ? null : processPath(values.logcurrent),
    },
  };
}
