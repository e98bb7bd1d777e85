import path from "path";

/** Anything that can answer whether a name is already spoken for. */
export type NameLookup = {
  has(name: string): boolean;
};

export type ExistsCheck = (name: string) => boolean | Promise<boolean>;

/**
 * Normalize a bare file name (no directory part).
 *
 * The stem is lower-cased, whitespace and anything outside `[a-z0-9_-]`
 * becomes `_`, runs of `_` collapse, and `.`, `_` and `-` are trimmed from
 * both ends. The extension is kept, lower-cased. A leading dot survives so a
 * hidden file stays hidden.
 *
 * @param name - The file name to normalize
 * @returns The normalized name, e.g. `My Photo.JPG` becomes `my_photo.jpg`
 */
export function slugifyFileName(name: string): string {
  const hidden = name.startsWith(".");
  const { name: rawStem, ext } = path.parse(hidden ? name.slice(1) : name);

  const stem =
    rawStem
      .toLowerCase()
      .replace(/\s/g, "_")
      .replace(/[^a-z0-9_-]/g, "_")
      .replace(/_+/g, "_")
      .replace(/^[._-]+|[._-]+$/g, "") || "file";

  return `${hidden ? "." : ""}${stem}${ext.toLowerCase()}`;
}

/**
 * Split a name into the part that gets a numeric suffix and its extension.
 * Dotfiles without a further extension keep the whole name as the stem.
 */
function splitForSuffix(name: string): { stem: string; ext: string } {
  const ext = path.extname(name);
  return { stem: name.slice(0, name.length - ext.length), ext };
}

/**
 * Find the first name that is neither taken in this run nor present on disk.
 * Tries the candidate itself, then `<stem>-1<ext>`, `<stem>-2<ext>`, ...
 *
 * @param candidate - Preferred name
 * @param taken - Names already claimed earlier in the run
 * @param existsOnDisk - Checks whether a name is already present on disk
 * @returns The first free name
 */
export async function nextAvailableName(
  candidate: string,
  taken: NameLookup,
  existsOnDisk: ExistsCheck
): Promise<string> {
  if (!taken.has(candidate) && !(await existsOnDisk(candidate))) {
    return candidate;
  }

  const { stem, ext } = splitForSuffix(candidate);
  let counter = 1;
  for (;;) {
    const next = `${stem}-${counter}${ext}`;
    if (!taken.has(next) && !(await existsOnDisk(next))) {
      return next;
    }
    counter++;
  }
}

/**
 * Tracks the names handed out within one directory during a run. Comparison
 * ignores case so two names differing only by case never share a folder on a
 * case-insensitive filesystem.
 */
export class NameRegistry implements NameLookup {
  private claimed = new Set<string>();

  has(name: string): boolean {
    return this.claimed.has(name.toLowerCase());
  }

  claim(name: string): void {
    this.claimed.add(name.toLowerCase());
  }

  /**
   * Resolve a collision-free name for `candidate` and claim it.
   */
  async claimAvailable(
    candidate: string,
    existsOnDisk: ExistsCheck
  ): Promise<string> {
    const name = await nextAvailableName(candidate, this, existsOnDisk);
    this.claim(name);
    return name;
  }
}
