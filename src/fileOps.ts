import fs from "fs";

/**
 * The filesystem calls the organizer makes. Swapped out in tests to inject
 * failures or to assert that a dry run mutates nothing.
 */
export interface FileOperations {
  readdir(dirPath: string): Promise<fs.Dirent[]>;
  isDirectory(targetPath: string): Promise<boolean>;
  exists(targetPath: string): Promise<boolean>;
  mkdir(dirPath: string): Promise<void>;
  rename(fromPath: string, toPath: string): Promise<void>;
  copyFile(fromPath: string, toPath: string): Promise<void>;
  copyTimestamps(fromPath: string, toPath: string): Promise<void>;
  /** Creates a new file; rejects with EEXIST rather than replace one. */
  writeFile(filePath: string, contents: string | Uint8Array): Promise<void>;
}

export const nodeFileOperations: FileOperations = {
  async readdir(dirPath) {
    return fs.promises.readdir(dirPath, { withFileTypes: true });
  },

  async isDirectory(targetPath) {
    try {
      const stat = await fs.promises.stat(targetPath);
      return stat.isDirectory();
    } catch {
      // Dangling symlink; treat it as a plain file and let the copy report it.
      return false;
    }
  },

  async exists(targetPath) {
    try {
      await fs.promises.access(targetPath);
      return true;
    } catch {
      return false;
    }
  },

  async mkdir(dirPath) {
    await fs.promises.mkdir(dirPath, { recursive: true });
  },

  async rename(fromPath, toPath) {
    await fs.promises.rename(fromPath, toPath);
  },

  /** Copy without ever replacing an existing target. */
  async copyFile(fromPath, toPath) {
    await fs.promises.copyFile(fromPath, toPath, fs.constants.COPYFILE_EXCL);
  },

  async copyTimestamps(fromPath, toPath) {
    const { atime, mtime } = await fs.promises.stat(fromPath);
    await fs.promises.utimes(toPath, atime, mtime);
  },

  async writeFile(filePath, contents) {
    await fs.promises.writeFile(filePath, contents, { flag: "wx" });
  },
};
