/**
 * Mount point handling: where template-relative structure begins on disk.
 */
import * as os from 'node:os';
import * as path from 'node:path';
import { PathNotUnderMountError } from '../../utils/errors.js';

/**
 * Mount point used when none is configured: `/tmp`, whatever TMPDIR says.
 * Windows has no `/tmp` and uses the system temporary directory.
 */
export function defaultMountPoint(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? os.tmpdir() : '/tmp';
}

export function resolveMountPoint(mountPoint?: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, mountPoint ?? defaultMountPoint());
}

/**
 * Segments of `target` below `mountPoint`. Relative paths are resolved
 * against `cwd`. The target itself being the mount point gives `[]`.
 */
export function relativeSegments(target: string, mountPoint: string, cwd: string = process.cwd()): string[] {
  const mount = path.resolve(cwd, mountPoint);
  const absolute = path.resolve(cwd, target);
  const relative = path.relative(mount, absolute);

  if (relative === '') return [];

  const segments = relative.split(path.sep);
  if (path.isAbsolute(relative) || segments[0] === '..') {
    throw new PathNotUnderMountError(absolute, mount);
  }
  return segments;
}

export function isUnderMount(target: string, mountPoint: string, cwd: string = process.cwd()): boolean {
  try {
    relativeSegments(target, mountPoint, cwd);
    return true;
  } catch (error) {
    if (error instanceof PathNotUnderMountError) return false;
    throw error;
  }
}
