import type { Dirent } from "fs";
import path from "path";
import { OrganizerError, describeError } from "./errors";
import type { FileOperations } from "./fileOps";
import type { DirectoryEntry } from "./types";

type EligibilityConfig = {
  includeHidden: boolean;
};

type ReadEntriesConfig = {
  outDir: string;
  selfPath?: string;
};

/**
 * Check if a file is a dotfile (starts with a dot)
 * @param fileName - The name of the file to check
 * @returns True if the file is a dotfile, false otherwise
 */
export function isDotFile(fileName: string): boolean {
  return fileName.startsWith(".");
}

/**
 * Decide whether an entry takes part in the run. Directories, the running
 * script and the output root never do; hidden entries only when asked for.
 */
export function isEligible(
  entry: DirectoryEntry,
  config: EligibilityConfig
): boolean {
  if (entry.isDirectory) return false;
  if (entry.isSelf) return false;
  if (entry.isOutputRoot) return false;
  if (entry.isHidden && !config.includeHidden) return false;
  return true;
}

/**
 * List the working directory once and snapshot each entry. Entries come back
 * sorted by name so repeated runs process files in the same order.
 *
 * @throws OrganizerError with code `ENUMERATION_FAILED` if the directory
 * cannot be read
 */
export async function readEntries(
  baseDir: string,
  config: ReadEntriesConfig,
  fileOps: FileOperations
): Promise<DirectoryEntry[]> {
  let dirents: Dirent[];
  try {
    dirents = await fileOps.readdir(baseDir);
  } catch (error: unknown) {
    throw new OrganizerError(
      "ENUMERATION_FAILED",
      `Cannot list directory ${baseDir}: ${describeError(error)}`,
      error
    );
  }

  const outDir = path.resolve(config.outDir);
  const selfPath = config.selfPath ? path.resolve(config.selfPath) : undefined;
  const entries: DirectoryEntry[] = [];

  for (const dirent of dirents) {
    const entryPath = path.resolve(baseDir, dirent.name);
    const isDirectory =
      dirent.isDirectory() ||
      (dirent.isSymbolicLink() && (await fileOps.isDirectory(entryPath)));

    entries.push({
      name: dirent.name,
      path: entryPath,
      isDirectory,
      isHidden: isDotFile(dirent.name),
      isSelf: entryPath === selfPath,
      isOutputRoot: entryPath === outDir,
    });
  }

  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
