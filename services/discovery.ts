import { promises as fs, Stats } from 'node:fs';
import path from 'node:path';
import { WallspanError } from '../core/layout';
import { hasImageSuffix, processPath } from './paths';

export interface DiscoveryOptions {
  recursive: boolean;
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch {
    return null;
  }
}

async function walkDirectory(root: string, recursive: boolean, ancestors: Set<string>, found: string[]) {
  // Only a directory already on the current path is a loop; other links to it are walked again.
  const real = await fs.realpath(root);
  if (ancestors.has(real)) return;

  const names = (await fs.readdir(root)).sort();
  const subdirectories: string[] = [];
  for (const name of names) {
    const full = path.join(root, name);
    const stats = await statOrNull(full);
    if (stats?.isDirectory()) {
      subdirectories.push(full);
    } else {
      found.push(full);
    }
  }

  if (!recursive) return;
  ancestors.add(real);
  for (const dir of subdirectories) {
    await walkDirectory(dir, recursive, ancestors, found);
  }
  ancestors.delete(real);
}

/**
 * Expand image files and directories into the ordered list of image paths
 * they currently contain. Directory entries are sorted; symlinks are followed,
 * except back into a directory that is being walked. A source that does not exist is an error.
 */
export async function collectImagePaths(sources: readonly string[], options: DiscoveryOptions): Promise<string[]> {
  const found: string[] = [];

  for (const source of sources) {
    const imagePath = processPath(source);
    const stats = await statOrNull(imagePath);
    if (!stats) {
      throw new WallspanError('PATH_NOT_FOUND', `Path does not exist: ${imagePath}`, { path: imagePath });
    }

    if (stats.isDirectory()) {
      await walkDirectory(imagePath, options.recursive, new Set(), found);
    } else if (stats.isFile()) {
      found.push(imagePath);
    } else if (hasImageSuffix(imagePath)) {
      throw new WallspanError('PATH_NOT_FOUND', `Not a file or a directory: ${imagePath}`, { path: imagePath });
    }
  }

  return found.filter((file) => hasImageSuffix(file)).map((file) => processPath(file));
}
