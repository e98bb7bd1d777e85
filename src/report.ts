import path from "path";
import type { FileOperations } from "./fileOps";
import { nextAvailableName } from "./naming";

export const INDEX_FILE_NAME = "index.html";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Render the index page: one paragraph per name, in the order given.
 */
export function renderIndex(names: readonly string[]): string {
  const lines = [
    "<!doctype html>",
    '<html lang="en">',
    "<head>",
    '  <meta charset="utf-8">',
    '  <meta name="viewport" content="width=device-width, initial-scale=1">',
    "  <title>File list</title>",
    "  <style>body{font-family:system-ui,sans-serif;margin:2rem;} p{margin:.25rem 0}</style>",
    "</head>",
    "<body>",
    "  <h1>File list</h1>",
    ...names.map((name) => `  <p>${escapeHtml(name)}</p>`),
    "</body>",
    "</html>",
  ];
  return lines.join("\n") + "\n";
}

/**
 * Pick where the index goes: `index.html` under the output root, or
 * `index-1.html`, `index-2.html`, ... when a file by that name is already
 * there (a page from an earlier run, or a source file when the output root is
 * the working directory itself).
 */
export async function resolveIndexPath(
  outDir: string,
  fileOps: FileOperations
): Promise<string> {
  const name = await nextAvailableName(INDEX_FILE_NAME, new Set<string>(), (candidate) =>
    fileOps.exists(path.join(outDir, candidate))
  );
  return path.join(outDir, name);
}

export async function writeIndex(
  indexPath: string,
  names: readonly string[],
  fileOps: FileOperations
): Promise<void> {
  await fileOps.writeFile(indexPath, renderIndex(names));
}
