import { PROGRAM_NAME } from '../constants';
import { LogSink } from '../types';
import { parseConfig, ParsedCommand, USAGE } from './config';
import { createConsoleReporter } from './consoleReporter';
import { createSharpCodec, ImageCodec } from './imageCodec';
import { mapWallspanErrorToLogEntry, mapWallspanEventToLogEntry } from './logAdapter';
import { detectPlatform, Platform } from './platform';
import { WallpaperRunner } from './runner';

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
  osName: NodeJS.Platform;
  /** Overrides for tests; default to the real platform and sharp codec. */
  platform?: Platform;
  codec?: ImageCodec;
  onLog?: LogSink;
}

export async function main(argv: string[], io: CliIo): Promise<number> {
  let command: ParsedCommand;
  try {
    command = parseConfig(argv, io.env);
  } catch (error) {
    const reporter = createConsoleReporter({ verbose: false, out: io.out, err: io.err });
    reporter(mapWallspanErrorToLogEntry(error, 'config.error'));
    io.err(`Run '${PROGRAM_NAME} --help' for usage.`);
    return 1;
  }

  if (command.kind === 'help') {
    io.out(USAGE);
    return 0;
  }

  const { config } = command;
  const onLog = io.onLog ?? createConsoleReporter({ verbose: config.verbose, out: io.out, err: io.err });
  const platform =
    io.platform ??
    detectPlatform(io.osName, { env: io.env, onEvent: (event) => onLog(mapWallspanEventToLogEntry(event)) });

  try {
    return await new WallpaperRunner(config, { platform, codec: io.codec ?? createSharpCodec(), onLog }).run();
  } catch (error) {
    onLog(mapWallspanErrorToLogEntry(error, 'run.error'));
    return 1;
  }
}
