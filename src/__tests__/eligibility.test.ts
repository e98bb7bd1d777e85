import fs from "fs/promises";
import path from "path";
import { isEligible, readEntries } from "../eligibility";
import { OrganizerError } from "../errors";
import { nodeFileOperations } from "../fileOps";
import type { DirectoryEntry } from "../types";
import { makeTempDir, removeDir, writeFiles } from "./helpers";

const entry = (overrides: Partial<DirectoryEntry> = {}): DirectoryEntry => ({
  name: "b.txt",
  path: "/work/b.txt",
  isDirectory: false,
  isHidden: false,
  isSelf: false,
  isOutputRoot: false,
  ...overrides,
});

describe("isEligible", () => {
  it("accepts plain files, with or without extensions", () => {
    expect(isEligible(entry(), { includeHidden: false })).toBe(true);
    expect(isEligible(entry({ name: "NOTES" }), { includeHidden: false })).toBe(true);
    expect(isEligible(entry({ name: "a.b.c.d" }), { includeHidden: false })).toBe(true);
  });

  it("rejects directories, the running script and the output root under any setting", () => {
    for (const includeHidden of [false, true]) {
      expect(isEligible(entry({ isDirectory: true }), { includeHidden })).toBe(false);
      expect(isEligible(entry({ isSelf: true }), { includeHidden })).toBe(false);
      expect(isEligible(entry({ isOutputRoot: true }), { includeHidden })).toBe(false);
    }
  });

  it("only accepts hidden files when asked to", () => {
    const hidden = entry({ name: ".hidden.txt", isHidden: true });

    expect(isEligible(hidden, { includeHidden: false })).toBe(false);
    expect(isEligible(hidden, { includeHidden: true })).toBe(true);
    expect(isEligible({ ...hidden, isSelf: true }, { includeHidden: true })).toBe(false);
  });
});

describe("readEntries", () => {
  let workspace: string | null = null;

  afterEach(async () => {
    await removeDir(workspace);
    workspace = null;
  });

  it("snapshots every entry in name order with its flags", async () => {
    workspace = await makeTempDir("sortdir-entries-");
    await writeFiles(workspace, {
      "b.txt": "b",
      "a.JPG": "a",
      NOTES: "n",
      ".hidden.txt": "h",
      "organize.js": "script",
      "sub/inner.txt": "inner",
    });
    await fs.mkdir(path.join(workspace, "out"));
    await fs.symlink(path.join(workspace, "sub"), path.join(workspace, "sub-link"));

    const entries = await readEntries(
      workspace,
      {
        outDir: path.join(workspace, "out"),
        selfPath: path.join(workspace, "organize.js"),
      },
      nodeFileOperations
    );

    expect(entries.map((e) => e.name)).toEqual([
      ".hidden.txt",
      "NOTES",
      "a.JPG",
      "b.txt",
      "organize.js",
      "out",
      "sub",
      "sub-link",
    ]);
    const byName = new Map(entries.map((e) => [e.name, e]));
    expect(byName.get(".hidden.txt")?.isHidden).toBe(true);
    expect(byName.get("organize.js")?.isSelf).toBe(true);
    expect(byName.get("out")).toMatchObject({ isOutputRoot: true, isDirectory: true });
    expect(byName.get("sub-link")?.isDirectory).toBe(true);
    expect(byName.get("a.JPG")).toEqual({
      name: "a.JPG",
      path: path.join(workspace, "a.JPG"),
      isDirectory: false,
      isHidden: false,
      isSelf: false,
      isOutputRoot: false,
    });
  });

  it("flags a plain file that sits where the output root should be", async () => {
    workspace = await makeTempDir("sortdir-entries-");
    await writeFiles(workspace, { out: "not a directory" });

    const [only] = await readEntries(
      workspace,
      { outDir: path.join(workspace, "out") },
      nodeFileOperations
    );

    expect(only).toMatchObject({ name: "out", isOutputRoot: true, isDirectory: false });
  });

  it("fails with ENUMERATION_FAILED when the directory cannot be listed", async () => {
    workspace = await makeTempDir("sortdir-entries-");
    const missing = path.join(workspace, "missing");

    const read = readEntries(missing, { outDir: path.join(missing, "out") }, nodeFileOperations);

    await expect(read).rejects.toBeInstanceOf(OrganizerError);
    await expect(read).rejects.toMatchObject({ code: "ENUMERATION_FAILED" });
  });
});
