import * as walk from "@nodelib/fs.walk";

export interface DirListing {
  files: string[];
  subdirectories: string[];
}

export interface Enumerator {
  enumerate(dir: string): Promise<DirListing>;
}

// Code-unit order, independent of locale and of whatever order readdir
// happens to return. Checksums depend on it.
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// Immediate children only: never descend.
const settings = new walk.Settings({
  deepFilter: () => false,
  followSymbolicLinks: true,
  throwErrorOnBrokenSymbolicLink: false,
});

function readEntries(dir: string): Promise<walk.Entry[]> {
  return new Promise((resolve, reject) => {
    walk.walk(dir, settings, (err, entries) => {
      if (err) reject(err);
      else resolve(entries);
    });
  });
}

/**
 * Symlinks are followed, so a link to a directory is listed as a
 * subdirectory. Broken links and special files are left out.
 */
export async function enumerateDir(dir: string): Promise<DirListing> {
  const files: string[] = [];
  const subdirectories: string[] = [];
  for (const entry of await readEntries(dir)) {
    if (entry.dirent.isDirectory()) {
      subdirectories.push(entry.name);
    } else if (entry.dirent.isFile()) {
      files.push(entry.name);
    }
  }
  files.sort(compareNames);
  subdirectories.sort(compareNames);
  return { files, subdirectories };
}

export const fsEnumerator: Enumerator = { enumerate: enumerateDir };
