/**
 * Directory traversal for the word counter.
 */

import { readdirSync, statSync, type Dirent, type Stats } from "node:fs";
import { join } from "node:path";
import { EntryError, NotADirectoryError } from "../errors.js";
import { createDebugLogger } from "../debug.js";

const debug = createDebugLogger("walk");

export type WarningHandler = (warning: Error) => void;

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Yield every regular file reachable from `root`, breadth first.
 *
 * - Entries of a directory are visited in name order.
 * - Symlinks are followed: to a directory → traversed, to a file → yielded.
 * - Unreadable directories, broken symlinks and special files (sockets, FIFOs,
 *   devices) are reported to `onWarning` and skipped.
 *
 * A symlink cycle makes the walk endless; callers must not point it at one.
 *
 * @throws NotADirectoryError if `root` is not a directory
 */
export function* walkFiles(root: string, onWarning: WarningHandler): Generator<string, void, undefined> {
  let rootStats: Stats;
  try {
    rootStats = statSync(root);
  } catch (err) {
    throw new NotADirectoryError(root, err);
  }
  if (!rootStats.isDirectory()) {
    throw new NotADirectoryError(root);
  }

  const queue: string[] = [root];
  let dir: string | undefined;

  while ((dir = queue.shift()) !== undefined) {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      onWarning(new EntryError(dir, `Can't read directory ${dir}`, err));
      continue;
    }
    entries.sort(byName);
    debug("directory", dir, entries.length, "entries");

    for (const entry of entries) {
      const path = join(dir, entry.name);

      if (entry.isDirectory()) {
        queue.push(path);
      } else if (entry.isFile()) {
        yield path;
      } else if (entry.isSymbolicLink()) {
        let target: Stats;
        try {
          target = statSync(path);
        } catch (err) {
          onWarning(new EntryError(path, `Can't get metadata for symlink ${path}`, err));
          continue;
        }
        if (target.isDirectory()) {
          queue.push(path);
        } else if (target.isFile()) {
          yield path;
        } else {
          onWarning(new EntryError(path, `Found symlink ${path} but it's not a file or a directory`));
        }
      } else {
        onWarning(new EntryError(path, `Found ${path} but it's not a file, directory, or symlink`));
      }
    }
  }
}
