import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { CommandRunner } from './types';

const execFileAsync = promisify(execFile);

export const runCommand: CommandRunner = async (command, args, env) => {
  const { stdout } = await execFileAsync(command, args, { env, windowsHide: true });
  return stdout;
};
