import path from 'path';

import type { FileIdentity, InodeLookup, MetalogIndex } from '../../types/index.js';
import { DEFAULT_ROOT } from '../../constants/index.js';
import { statFileIdentity } from '../../utils/fs.js';

/**
 * Filesystem path for a manifest filename: `./usr/bin/x` becomes `<root>/usr/bin/x`.
 */
export function resolveManifestPath(filename: string, root: string = DEFAULT_ROOT): string {
  const relative = filename.startsWith('./') ? filename.slice(2) : filename;
  return path.resolve(root, relative);
}

export function createFsInodeLookup(root: string = DEFAULT_ROOT): InodeLookup {
  return (filename) => statFileIdentity(resolveManifestPath(filename, root));
}

/**
 * Group manifest filenames by file identity (device and inode).
 *
 * Lookups run one at a time in filename-index order, so group order and member
 * order are stable between runs. Filenames whose lookup fails are left out.
 */
export async function buildInodeIndex(
  index: Pick<MetalogIndex, 'files'>,
  lookup: InodeLookup
): Promise<Map<FileIdentity, string[]>> {
  const inodes = new Map<FileIdentity, string[]>();
  for (const filename of index.files.keys()) {
    const inode = await lookup(filename);
    if (inode === null) continue;

    const group = inodes.get(inode);
    if (group) {
      group.push(filename);
    } else {
      inodes.set(inode, [filename]);
    }
  }
  return inodes;
}
