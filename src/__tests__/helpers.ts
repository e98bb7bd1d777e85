import fs from "fs/promises";
import os from "os";
import path from "path";
import type { Logger } from "../logger";

/** 1x1 transparent PNG. */
export const TINY_PNG = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==",
  "base64"
);

export const makeTempDir = async (prefix = "sortdir-") =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeDir = async (dirPath: string | null) => {
  if (dirPath) {
    await fs.rm(dirPath, { recursive: true, force: true });
  }
};

export const writeFiles = async (dirPath: string, files: Record<string, string | Buffer>) => {
  for (const [relative, contents] of Object.entries(files)) {
    const target = path.join(dirPath, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, contents);
  }
};

/** Sorted names of a directory's direct children. */
export const listNames = async (dirPath: string) => (await fs.readdir(dirPath)).sort();

/** Every file below `dirPath`, keyed by its relative path, with its contents. */
export const readTree = async (dirPath: string): Promise<Record<string, string>> => {
  const tree: Record<string, string> = {};
  const walk = async (current: string) => {
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const entryPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        tree[`${path.relative(dirPath, entryPath)}/`] = "";
        await walk(entryPath);
      } else {
        tree[path.relative(dirPath, entryPath)] = await fs.readFile(entryPath, "utf8");
      }
    }
  };
  await walk(dirPath);
  return tree;
};

export const pathExists = async (targetPath: string) =>
  fs.access(targetPath).then(
    () => true,
    () => false
  );

/** Paragraph texts of a generated index page, in document order. */
export const indexParagraphs = (html: string) =>
  Array.from(html.matchAll(/<p>(.*?)<\/p>/g), (match) => match[1]);

export const createTestLogger = () => {
  const lines: string[] = [];
  const logger: Logger = {
    info: (message) => lines.push(message),
    action: (message, dryRun) => lines.push(dryRun ? `[dry-run] ${message}` : message),
    warn: (message) => lines.push(message),
    error: (message, details = []) => lines.push([message, ...details].join(" ")),
    summary: (title, summaryLines) => lines.push(title, ...summaryLines),
  };
  return { logger, lines };
};
