/** Snapshot of one working-directory entry, taken once at enumeration. */
export type DirectoryEntry = {
  name: string;
  path: string;
  isDirectory: boolean;
  isHidden: boolean;
  isSelf: boolean;
  isOutputRoot: boolean;
};

export type OrganizeOptions = Readonly<{
  /** Directory whose files are organized. */
  baseDir: string;
  /** Output root; buckets and index.html are created here. */
  outDir: string;
  dryRun: boolean;
  rename: boolean;
  includeHidden: boolean;
  /** Absolute path of the running script, excluded from processing. */
  selfPath?: string;
  /** File name of an image slideshow to build under the output root; none when unset. */
  presentation?: string;
}>;

export type ProcessedFile = {
  originalName: string;
  finalName: string;
  extension: string;
  bucket: string;
  destinationName: string;
  destinationPath: string;
  renamed: boolean;
  copied: boolean;
};

export type FailureStage = "rename" | "copy" | "presentation";

export type FileFailure = {
  file: string;
  stage: FailureStage;
  message: string;
};

export type OrganizeResult = {
  baseDir: string;
  outDir: string;
  dryRun: boolean;
  files: ProcessedFile[];
  failures: FileFailure[];
  /** Written (or, in a dry run, planned) index path; null when nothing was processed. */
  indexPath: string | null;
  /** Written (or planned) slideshow path; null when not requested or no image was found. */
  presentationPath: string | null;
};
