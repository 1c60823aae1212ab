import { type Dirent, readdirSync, statSync } from "node:fs";
import { extname, resolve, sep } from "node:path";
import {
  EXCLUDED_DIRECTORY_NAMES,
  EXCLUDED_FILE_NAMES,
  FILE_NAME_PATTERN,
  TEST_FILE_PREFIX,
} from "./constants.js";
import type { WalkEntry } from "./types.js";

/**
 * Canonical form of a path: absolute, normalized, forward slashes and no
 * trailing separator (a filesystem root keeps its slash).
 */
export function cleanPath(path: string): string {
  const absolute = resolve(path).split(sep).join("/");
  return absolute.length > 1 && absolute.endsWith("/") ? absolute.slice(0, -1) : absolute;
}

/** Removes the last extension, if any. */
export function stripExtension(path: string): string {
  const extension = extname(path);
  return extension ? path.slice(0, -extension.length) : path;
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** False when any segment of the path is an excluded directory name. */
export function isTraversableDirectory(directory: string): boolean {
  return !cleanPath(directory)
    .split("/")
    .some((segment) => EXCLUDED_DIRECTORY_NAMES.has(segment));
}

/** Whether a file name is eligible for plugin scanning. */
export function isCandidateFile(fileName: string): boolean {
  return (
    FILE_NAME_PATTERN.test(fileName) &&
    !fileName.startsWith(TEST_FILE_PREFIX) &&
    !EXCLUDED_FILE_NAMES.has(fileName)
  );
}

/**
 * Top-down recursive walk. Yields each directory with the plain files
 * directly inside it, sorted by name. Symbolic links to files count as
 * files; symbolic links to directories are not followed. Directories
 * matching `isExcluded` are neither yielded nor descended into.
 * Unreadable directories are reported to `onSkip` and skipped.
 */
export function* walkDirectory(
  root: string,
  isExcluded: (directory: string) => boolean,
  onSkip?: (directory: string, error: unknown) => void,
): Generator<WalkEntry> {
  if (isExcluded(root)) return;

  let entries: Dirent[];
  try {
    entries = readdirSync(root, { withFileTypes: true });
  } catch (error) {
    onSkip?.(root, error);
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  const subdirectories: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory()) {
      subdirectories.push(`${root}/${entry.name}`);
    } else if (entry.isFile() || (entry.isSymbolicLink() && isFile(`${root}/${entry.name}`))) {
      files.push(entry.name);
    }
  }

  yield { directory: root, files };

  for (const subdirectory of subdirectories) {
    yield* walkDirectory(subdirectory, isExcluded, onSkip);
  }
}
