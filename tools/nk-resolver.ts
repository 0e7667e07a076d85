import fs from "node:fs";
import path from "node:path";
import fg from "fast-glob";
import { DirectoryNotFoundError } from "./optool-errors";
import { logDebug, logWarn } from "./optool-log";

export type NkMatchKind = "temperature" | "exact" | "partial";

export type NkMatch = {
  path: string;
  match: NkMatchKind;
};

export type ResolvedInputFile =
  | { kind: "file"; path: string; match: NkMatchKind }
  | { kind: "builtin"; token: string };

const isFile = (candidate: string): boolean =>
  fs.statSync(candidate, { throwIfNoEntry: false })?.isFile() ?? false;

export const isDirectory = (candidate: string): boolean =>
  fs.statSync(candidate, { throwIfNoEntry: false })?.isDirectory() ?? false;

/**
 * Locate the refractive-index file for a material.
 *
 * Tries `<material>_<T>K.lnk`, then `<material>.lnk`, then any `.lnk` whose
 * name contains the material id (case-insensitive, first in sorted order).
 * Returns null when nothing matches; throws DirectoryNotFoundError when
 * `nkDir` is missing. Only reads the directory listing.
 */
export function findNkFile(material: string, temperature: number | undefined, nkDir: string): NkMatch | null {
  if (!isDirectory(nkDir)) {
    throw new DirectoryNotFoundError(nkDir);
  }

  if (temperature !== undefined) {
    const temperatureFile = path.join(nkDir, `${material}_${temperature}K.lnk`);
    if (isFile(temperatureFile)) {
      logDebug(`Found temperature-specific file: ${temperatureFile}`, "nk-resolver");
      return { path: temperatureFile, match: "temperature" };
    }
  }

  const exactFile = path.join(nkDir, `${material}.lnk`);
  if (isFile(exactFile)) {
    return { path: exactFile, match: "exact" };
  }

  const needle = material.toLowerCase();
  const candidates = fg
    .sync("*.lnk", { cwd: nkDir, onlyFiles: true, dot: true, caseSensitiveMatch: false })
    .filter((name) => name.toLowerCase().includes(needle))
    .sort();
  const [first] = candidates;
  if (first === undefined) {
    return null;
  }
  if (temperature !== undefined) {
    logWarn(`Using ${first} which may not match ${temperature}K exactly.`, "nk-resolver");
  }
  return { path: path.join(nkDir, first), match: "partial" };
}

// "Not found" is advisory: the id is passed to Optool as a built-in material.
export function resolveInputFile(
  material: string,
  temperature: number | undefined,
  nkDir: string,
): ResolvedInputFile {
  const found = findNkFile(material, temperature, nkDir);
  if (found) {
    return { kind: "file", path: found.path, match: found.match };
  }
  return { kind: "builtin", token: material };
}

export const inputArgument = (input: ResolvedInputFile): string =>
  input.kind === "file" ? input.path : input.token;
