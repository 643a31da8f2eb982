import { existsSync, readdirSync, readFileSync, statSync, type Stats } from "fs";
import ignore from "ignore";
import { extname, join, relative, sep } from "path";
import { DEFAULT_IGNORE_PATTERNS, IGNORE_FILE, SOURCE_EXTENSIONS } from "./constants";
import { debugLog } from "./debug";
import { ConfigurationError } from "./errors";

type IgnoreFilter = ReturnType<typeof ignore>;

/**
 * Creates an ignore filter from DEFAULT_IGNORE_PATTERNS plus the
 * directory's own .npdignore, if it has one.
 */
function createIgnoreFilter(rootDir: string): IgnoreFilter {
  const ig = ignore().add(DEFAULT_IGNORE_PATTERNS);

  const ignoreFile = join(rootDir, IGNORE_FILE);
  if (existsSync(ignoreFile)) {
    const userPatterns = readFileSync(ignoreFile, "utf8")
      .split("\n")
      .filter((line) => line.trim() && !line.startsWith("#"));
    ig.add(userPatterns);
    debugLog(`Loaded ${userPatterns.length} pattern(s) from ${ignoreFile}`);
  }

  return ig;
}

function isSourceFile(path: string): boolean {
  return SOURCE_EXTENSIONS.includes(extname(path));
}

/**
 * Expands a scan target into the source files to analyse.
 * A file is returned as is; a directory is walked recursively for .py
 * files not matched by the ignore patterns, sorted by path.
 *
 * @throws ConfigurationError when the target cannot be read.
 */
export function collectSourceFiles(target: string): string[] {
  const stats = statTarget(target);
  if (stats.isFile()) {
    return [target];
  }
  if (!stats.isDirectory()) {
    throw new ConfigurationError(`Scan target is neither a file nor a directory: ${target}`);
  }

  const ig = createIgnoreFilter(target);
  const files: string[] = [];
  walk(target, target, ig, files);
  return files.sort();
}

function statTarget(target: string): Stats {
  try {
    return statSync(target);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read scan target ${target}: ${message}`);
  }
}

function walk(rootDir: string, dir: string, ig: IgnoreFilter, files: string[]): void {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const fullPath = join(dir, entry.name);
    // ignore expects POSIX-style relative paths, directories with a trailing slash
    const relPath = relative(rootDir, fullPath).split(sep).join("/");

    if (entry.isDirectory()) {
      if (!ig.ignores(`${relPath}/`)) {
        walk(rootDir, fullPath, ig, files);
      }
    } else if (entry.isFile() && isSourceFile(entry.name) && !ig.ignores(relPath)) {
      files.push(fullPath);
    }
  }
}
