import { readdir, readFile, lstat } from "fs/promises";
import type { Stats } from "fs";
import { join, extname, basename } from "path";
import type { SourceFile } from "./types.js";
import { validateCodebaseRoot } from "../security/path-validator.js";
import { getConfigValue, logger } from "../utils.js";
import { toError } from "../errors/index.js";

/** Known source extensions and the language they are indexed as */
const EXTENSION_LANGUAGES: Readonly<Record<string, string>> = {
  ".ts": "typescript",
  ".tsx": "typescript",
  ".mts": "typescript",
  ".cts": "typescript",
  ".js": "javascript",
  ".jsx": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",
  ".py": "python",
  ".pyi": "python",
  ".md": "markdown",
  ".markdown": "markdown",
  ".go": "go",
  ".rs": "rust",
  ".java": "java",
  ".kt": "kotlin",
  ".c": "c",
  ".h": "c",
  ".cpp": "cpp",
  ".hpp": "cpp",
  ".cs": "csharp",
  ".rb": "ruby",
  ".php": "php",
  ".swift": "swift",
  ".scala": "scala",
  ".sh": "shell",
  ".sql": "sql",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".toml": "toml",
  ".txt": "text",
};

const SKIP_DIRECTORIES = new Set([
  "node_modules",
  "dist",
  "coverage",
  "build",
  "out",
  "target",
  "vendor",
  "__pycache__",
]);

export interface ScanOptions {
  /** Restrict to these extensions (with or without the leading dot) */
  readonly extensions?: readonly string[];
  readonly maxDepth?: number;
  readonly maxFileBytes?: number;
}

/** Scanner output: a file to chunk, or a file that was refused */
export type ScanEvent =
  | { readonly type: "file"; readonly file: SourceFile }
  | { readonly type: "skipped"; readonly path: string; readonly reason: string };

/**
 * Detect the language of a path from its extension
 * @returns Language name, or null when the extension is unknown
 */
export function detectLanguage(filePath: string): string | null {
  const ext = extname(filePath).toLowerCase();
  return EXTENSION_LANGUAGES[ext] ?? null;
}

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

/**
 * Check if a directory should be skipped during traversal
 */
function shouldSkipDirectory(dirName: string): boolean {
  return SKIP_DIRECTORIES.has(dirName) || dirName.startsWith(".");
}

/** Entries that vanish or deny access mid-scan are reported, not fatal */
function unreadable(path: string, error: unknown): ScanEvent {
  const reason = `unreadable: ${toError(error).message}`;
  logger.warn(`[Scanner] Skipping ${path}: ${reason}`);
  return { type: "skipped", path, reason };
}

/**
 * Walk a codebase and yield its source files
 *
 * @remarks
 * Entries are visited in sorted order so repeated scans produce the same
 * sequence. Symbolic links are not followed. Paths are relative to the root
 * and `/`-separated.
 *
 * @param rootPath - Codebase root directory
 * @param options - Extension allow-list and size/depth limits
 * @throws Error if the root does not exist or is not a directory
 */
export async function* scanCodebase(
  rootPath: string,
  options: ScanOptions = {}
): AsyncGenerator<ScanEvent> {
  const root = await validateCodebaseRoot(rootPath);
  const maxDepth = options.maxDepth ?? getConfigValue("RAG_MAX_DIRECTORY_DEPTH");
  const maxFileBytes =
    options.maxFileBytes ?? getConfigValue("RAG_MAX_FILE_BYTES");
  const allowed = options.extensions
    ? new Set(options.extensions.map(normalizeExtension))
    : null;

  async function* traverse(
    absolutePath: string,
    relativePath: string,
    depth: number
  ): AsyncGenerator<ScanEvent> {
    if (depth > maxDepth) {
      logger.warn(
        `[Scanner] Max directory depth (${maxDepth}) reached at ${relativePath}`
      );
      return;
    }

    let entries: string[];
    if (depth === 0) {
      entries = await readdir(absolutePath);
    } else {
      try {
        entries = await readdir(absolutePath);
      } catch (error) {
        yield unreadable(relativePath, error);
        return;
      }
    }
    entries.sort();

    for (const entry of entries) {
      const fullPath = join(absolutePath, entry);
      const relPath = relativePath ? `${relativePath}/${entry}` : entry;

      let stats: Stats;
      try {
        stats = await lstat(fullPath);
      } catch (error) {
        yield unreadable(relPath, error);
        continue;
      }

      if (stats.isSymbolicLink()) continue;

      if (stats.isDirectory()) {
        if (!shouldSkipDirectory(entry)) {
          yield* traverse(fullPath, relPath, depth + 1);
        }
        continue;
      }

      if (!stats.isFile()) continue;

      const ext = extname(entry).toLowerCase();
      if (allowed && !allowed.has(ext)) continue;

      const language =
        detectLanguage(entry) ?? (allowed ? "text" : null);
      if (language === null) continue;

      // Lock files and minified bundles carry no answerable content
      const name = basename(entry).toLowerCase();
      if (name.endsWith(".min.js") || name.endsWith(".lock")) continue;

      if (stats.size > maxFileBytes) {
        yield {
          type: "skipped",
          path: relPath,
          reason: `file too large (${stats.size} bytes)`,
        };
        continue;
      }

      try {
        const bytes = await readFile(fullPath);
        yield { type: "file", file: { path: relPath, bytes, language } };
      } catch (error) {
        yield unreadable(relPath, error);
      }
    }
  }

  yield* traverse(root, "", 0);
}
