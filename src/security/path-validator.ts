/**
 * Containment checks for paths read out of an indexed codebase
 *
 * Every check runs on real paths, so a symlink that points out of the root
 * is rejected the same way as a `../` segment.
 */
import { isAbsolute, relative, resolve, sep } from "path";
import { realpath, stat } from "fs/promises";
import { SourceAccessError, toError } from "../errors/index.js";

/** True when `target` is `root` itself or lies below it */
export function isWithinRoot(target: string, root: string): boolean {
  const offset = relative(root, target);
  if (offset === "") return true;
  return (
    !isAbsolute(offset) && offset !== ".." && !offset.startsWith(`..${sep}`)
  );
}

/**
 * Resolve a codebase-relative path to an existing regular file inside `root`
 *
 * @returns The real path of the file
 * @throws SourceAccessError when the path escapes the root, does not exist,
 * or is not a regular file
 */
export async function resolveSourceFile(
  sourcePath: string,
  root: string
): Promise<string> {
  const realRoot = await realpath(resolve(root));
  const outside = (): SourceAccessError =>
    new SourceAccessError(
      `Path "${sourcePath}" resolves outside the codebase root`,
      sourcePath,
      "outside-root"
    );

  const candidate = resolve(realRoot, sourcePath);
  if (!isWithinRoot(candidate, realRoot)) throw outside();

  let realTarget: string;
  try {
    realTarget = await realpath(candidate);
  } catch (error) {
    throw new SourceAccessError(
      `Source file not found: ${sourcePath}`,
      sourcePath,
      "not-found",
      toError(error)
    );
  }
  if (!isWithinRoot(realTarget, realRoot)) throw outside();

  if (!(await stat(realTarget)).isFile()) {
    throw new SourceAccessError(
      `Not a regular file: ${sourcePath}`,
      sourcePath,
      "not-a-file"
    );
  }

  return realTarget;
}

/**
 * Validate that a codebase root exists and is a directory
 *
 * @returns The real path of the root
 */
export async function validateCodebaseRoot(rootPath: string): Promise<string> {
  const realRoot = await realpath(resolve(rootPath));

  if (!(await stat(realRoot)).isDirectory()) {
    throw new Error(`Codebase root is not a directory: ${rootPath}`);
  }

  return realRoot;
}
