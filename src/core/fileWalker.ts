/**
 * Expands directory arguments into the Go source files below them.
 */
import { readdir, stat } from "node:fs/promises";
import { join, dirname, relative, sep } from "node:path";
import fs from "node:fs";
import { log } from "../constants/log";
import { errorMessage } from "../types/errors";

const GO_EXTENSION = ".go";

// Directories the go tool itself never builds from.
const SKIPPED_DIRS = new Set(["vendor", "testdata", "node_modules"]);

export interface WalkOptions {
  ignoreGit?: boolean;
  /** Called for a directory that cannot be listed; the walk goes on. */
  onError?: (dir: string, error: unknown) => void;
}

export function reportUnreadableDir(dir: string, error: unknown): void {
  log.fail(`${dir}: failed to read directory (${errorMessage(error)})`);
}

/**
 * Find the git repository root for a given directory (traverse upwards looking for .git)
 * Limits traversal to a maximum depth to avoid long climbs.
 */
function findGitRoot(startDir: string, maxDepth = 8): string | null {
  let cur = startDir;
  for (let depth = 0; depth < maxDepth; depth++) {
    if (fs.existsSync(join(cur, ".git"))) return cur;
    const parent = dirname(cur);
    if (!parent || parent === cur) return null;
    cur = parent;
  }
  return null;
}

/**
 * Load .gitignore patterns from the repo root (if present).
 * Returns null if no .gitignore exists.
 */
function loadGitignorePatterns(root: string): string[] | null {
  const gi = join(root, ".gitignore");
  if (!fs.existsSync(gi)) return null;
  return fs
    .readFileSync(gi, "utf8")
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && !l.startsWith("#"));
}

export function globToRegex(pat: string): RegExp {
  // '**' -> '.*' , '*' -> '[^/]*' , '?' -> '[^/]'
  let s = pat.replace(/[.+^${}()|[\]\\]/g, "\\$&");
  s = s.replace(/\*\*/g, "\u0000");
  s = s.replace(/\*/g, "[^/]*");
  s = s.replace(/\?/g, "[^/]");
  s = s.replace(/\u0000/g, ".*");
  return new RegExp(`^${s}$`);
}

/**
 * Basic .gitignore semantics: later patterns win, `!` negates, a leading
 * `/` anchors at the root, unanchored patterns match at any depth.
 */
export function matchesPatterns(relPath: string, patterns: string[]): boolean {
  const relPosix = relPath.split(sep).join("/");
  let matched = false;

  for (const raw of patterns) {
    let pattern = raw;
    const negate = pattern.startsWith("!");
    if (negate) pattern = pattern.slice(1);

    const anchored = pattern.startsWith("/");
    if (anchored) pattern = pattern.slice(1);
    if (pattern.endsWith("/")) pattern = pattern.slice(0, -1);

    const regex = globToRegex(pattern);
    const candidates = anchored ? [relPosix] : suffixes(relPosix);
    const prefixes = candidates.flatMap(parentsAndSelf);

    if (prefixes.some((p) => regex.test(p))) {
      matched = !negate;
    }
  }

  return matched;
}

// "a/b/c" => ["a/b/c", "b/c", "c"]
function suffixes(path: string): string[] {
  const parts = path.split("/");
  return parts.map((_, i) => parts.slice(i).join("/"));
}

// "a/b/c" => ["a", "a/b", "a/b/c"]
function parentsAndSelf(path: string): string[] {
  const parts = path.split("/");
  return parts.map((_, i) => parts.slice(0, i + 1).join("/"));
}

/**
 * Check whether a path is ignored by the .gitignore at the root of its git
 * repository, matched with the rules above. Outside a repository nothing is
 * ignored.
 */
function isPathIgnoredByGit(fullPath: string): boolean {
  const root = findGitRoot(dirname(fullPath));
  if (!root) return false;

  const patterns = loadGitignorePatterns(root);
  if (!patterns || patterns.length === 0) return false;
  return matchesPatterns(relative(root, fullPath), patterns);
}

/**
 * Yields `.go` files below `dir` in sorted order. An entry that cannot be
 * stat'ed is yielded as it is when it looks like a Go file, so reading it
 * reports the failure for that file alone.
 */
export async function* walkGoFiles(
  dir: string,
  options: WalkOptions = {}
): AsyncGenerator<string> {
  const ignoreGit = options.ignoreGit ?? true;
  const onError = options.onError ?? reportUnreadableDir;

  let entries: string[];
  try {
    entries = (await readdir(dir)).sort();
  } catch (error) {
    onError(dir, error);
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry);
    let fileStat: fs.Stats;
    try {
      fileStat = await stat(fullPath);
    } catch {
      if (entry.endsWith(GO_EXTENSION)) yield fullPath;
      continue;
    }

    if (fileStat.isDirectory()) {
      if (SKIPPED_DIRS.has(entry) || entry.startsWith(".") || entry.startsWith("_")) {
        continue;
      }
      if (ignoreGit && isPathIgnoredByGit(fullPath)) continue;
      yield* walkGoFiles(fullPath, options);
    } else if (fileStat.isFile() && entry.endsWith(GO_EXTENSION)) {
      if (ignoreGit && isPathIgnoredByGit(fullPath)) continue;
      yield fullPath;
    }
  }
}

/**
 * Resolve CLI path arguments: files are kept as given, directories are
 * expanded. Missing paths are passed through so the per-file step reports
 * them like any other unreadable file.
 */
export async function expandPaths(paths: string[], options: WalkOptions = {}): Promise<string[]> {
  const files: string[] = [];
  for (const p of paths) {
    let isDir = false;
    try {
      isDir = (await stat(p)).isDirectory();
    } catch {
      isDir = false;
    }
    if (!isDir) {
      files.push(p);
      continue;
    }
    for await (const file of walkGoFiles(p, options)) files.push(file);
  }
  return files;
}
