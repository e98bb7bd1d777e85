import path from "path";
import { classify } from "./classify";
import { isEligible, readEntries } from "./eligibility";
import { OrganizerError, describeError } from "./errors";
import { nodeFileOperations, type FileOperations } from "./fileOps";
import { createConsoleLogger, type Logger } from "./logger";
import { NameRegistry, nextAvailableName, slugifyFileName } from "./naming";
import { isImageExtension, renderPresentation } from "./presentation";
import { resolveIndexPath, writeIndex } from "./report";
import type {
  DirectoryEntry,
  FileFailure,
  OrganizeOptions,
  OrganizeResult,
  ProcessedFile,
} from "./types";

export type OrganizerDeps = {
  logger: Logger;
  fileOps: FileOperations;
};

type RunContext = OrganizerDeps & {
  options: OrganizeOptions;
  baseDir: string;
  outDir: string;
  failures: FileFailure[];
};

type NamedFile = {
  finalName: string;
  renamed: boolean;
};

const STAGE_VERBS: Record<FileFailure["stage"], string> = {
  rename: "rename",
  copy: "copy",
  presentation: "build presentation",
};

function recordFailure(
  ctx: RunContext,
  file: string,
  stage: FileFailure["stage"],
  error: unknown
): void {
  const message = describeError(error);
  ctx.failures.push({ file, stage, message });
  ctx.logger.error(`Failed to ${STAGE_VERBS[stage]} '${file}'`, [message]);
}

/**
 * Create the output root up front. Nothing can be materialized without it,
 * so failing here ends the run.
 */
async function ensureOutputRoot(ctx: RunContext): Promise<void> {
  try {
    await ctx.fileOps.mkdir(ctx.outDir);
  } catch (error: unknown) {
    throw new OrganizerError(
      "OUTPUT_ROOT_FAILED",
      `Cannot create output directory ${ctx.outDir}: ${describeError(error)}`,
      error
    );
  }
}

/**
 * Rename a file in place to its normalized form. On failure the file keeps
 * its original name for the remaining stages.
 */
async function renameStage(
  ctx: RunContext,
  entry: DirectoryEntry,
  registry: NameRegistry
): Promise<NamedFile> {
  const slug = slugifyFileName(entry.name);
  if (slug === entry.name) {
    registry.claim(entry.name);
    return { finalName: entry.name, renamed: false };
  }

  // The output root counts as taken before it exists so a dry run plans the
  // same names a live run, which creates it first, ends up with.
  const target = await registry.claimAvailable(slug, (name) => {
    const candidate = path.join(ctx.baseDir, name);
    return candidate === ctx.outDir || ctx.fileOps.exists(candidate);
  });
  ctx.logger.action(`Rename '${entry.name}' -> '${target}'`, ctx.options.dryRun);
  if (ctx.options.dryRun) {
    return { finalName: target, renamed: true };
  }

  try {
    await ctx.fileOps.rename(entry.path, path.join(ctx.baseDir, target));
    return { finalName: target, renamed: true };
  } catch (error: unknown) {
    recordFailure(ctx, entry.name, "rename", error);
    registry.claim(entry.name);
    return { finalName: entry.name, renamed: false };
  }
}

/**
 * Copy a file into its bucket under the output root, suffixing the name when
 * the bucket already holds one by that name.
 */
async function copyStage(
  ctx: RunContext,
  entry: DirectoryEntry,
  named: NamedFile,
  bucketRegistries: Map<string, NameRegistry>
): Promise<ProcessedFile> {
  const { extension, bucket } = classify(named.finalName);
  const bucketDir = path.join(ctx.outDir, bucket);

  let registry = bucketRegistries.get(bucket);
  if (!registry) {
    registry = new NameRegistry();
    bucketRegistries.set(bucket, registry);
  }

  const destinationName = await registry.claimAvailable(named.finalName, (name) =>
    ctx.fileOps.exists(path.join(bucketDir, name))
  );
  const destinationPath = path.join(bucketDir, destinationName);
  const processed: ProcessedFile = {
    originalName: entry.name,
    finalName: named.finalName,
    extension,
    bucket,
    destinationName,
    destinationPath,
    renamed: named.renamed,
    copied: false,
  };

  ctx.logger.action(
    `Copy '${named.finalName}' -> '${path.relative(ctx.baseDir, destinationPath)}'`,
    ctx.options.dryRun
  );
  if (ctx.options.dryRun) {
    return processed;
  }

  const sourcePath = path.join(ctx.baseDir, named.finalName);
  try {
    await ctx.fileOps.mkdir(bucketDir);
    await ctx.fileOps.copyFile(sourcePath, destinationPath);
    processed.copied = true;
  } catch (error: unknown) {
    recordFailure(ctx, named.finalName, "copy", error);
    return processed;
  }

  try {
    await ctx.fileOps.copyTimestamps(sourcePath, destinationPath);
  } catch (error: unknown) {
    ctx.logger.warn(
      `Copied '${named.finalName}' but could not keep its timestamps: ${describeError(error)}`
    );
  }
  return processed;
}

async function reportStage(
  ctx: RunContext,
  files: ProcessedFile[]
): Promise<string> {
  const names = files.map((file) => file.finalName);
  const indexPath = await resolveIndexPath(ctx.outDir, ctx.fileOps);
  if (ctx.options.dryRun) {
    ctx.logger.action(`Write index of ${names.length} files to '${indexPath}'`, true);
    return indexPath;
  }

  try {
    await writeIndex(indexPath, names, ctx.fileOps);
    ctx.logger.info(`HTML index written to ${indexPath}`);
    return indexPath;
  } catch (error: unknown) {
    throw new OrganizerError(
      "REPORT_WRITE_FAILED",
      `Cannot write index: ${describeError(error)}`,
      error
    );
  }
}

/**
 * Build the optional image slideshow from the copies in the output tree. A
 * failure here is recorded like any per-file failure and does not end the run.
 */
async function presentationStage(
  ctx: RunContext,
  files: ProcessedFile[]
): Promise<string | null> {
  const requested = ctx.options.presentation;
  if (!requested) return null;

  const images = files.filter(
    (file) => isImageExtension(file.extension) && (ctx.options.dryRun || file.copied)
  );
  if (images.length === 0) {
    ctx.logger.info("No images found for the presentation.");
    return null;
  }

  const name = await nextAvailableName(path.basename(requested), new Set<string>(), (candidate) =>
    ctx.fileOps.exists(path.join(ctx.outDir, candidate))
  );
  const presentationPath = path.join(ctx.outDir, name);
  ctx.logger.action(
    `Build presentation of ${images.length} images at '${presentationPath}'`,
    ctx.options.dryRun
  );
  if (ctx.options.dryRun) {
    return presentationPath;
  }

  try {
    const contents = await renderPresentation(images.map((file) => file.destinationPath));
    await ctx.fileOps.writeFile(presentationPath, contents);
    ctx.logger.info(`Presentation written to ${presentationPath}`);
    return presentationPath;
  } catch (error: unknown) {
    recordFailure(ctx, name, "presentation", error);
    return null;
  }
}

function summarize(ctx: RunContext, result: OrganizeResult, elapsedMs: number) {
  const perBucket = new Map<string, number>();
  for (const file of result.files) {
    perBucket.set(file.bucket, (perBucket.get(file.bucket) ?? 0) + 1);
  }

  const lines = [
    `Files processed: ${result.files.length}`,
    `Renamed: ${result.files.filter((file) => file.renamed).length}`,
    `Copied: ${result.files.filter((file) => file.copied).length}`,
    ...[...perBucket].map(([bucket, count]) => `- Folder: ${bucket} (${count})`),
    `Failures: ${result.failures.length}`,
    ...result.failures.map(
      (failure) => `  ${failure.stage} ${failure.file}: ${failure.message}`
    ),
    `Completed in ${elapsedMs} ms`,
  ];
  ctx.logger.summary(
    `Organization summary for '${path.basename(ctx.baseDir)}':`,
    lines
  );
}

/**
 * Organize the files of `options.baseDir`: optionally rename each eligible
 * file, copy it into `<outDir>/<extension>/` and write an HTML index of the
 * final names. With `presentation` set, the copied images also go into a
 * slideshow under the output root.
 *
 * Files are handled one at a time in name order. Per-file rename and copy
 * failures are collected in the result; only a directory that cannot be
 * listed, an output root that cannot be created or an index that cannot be
 * written throw an {@link OrganizerError}.
 *
 * With `dryRun` set, every action is computed and logged but nothing on disk
 * changes.
 */
export async function organizeFiles(
  options: OrganizeOptions,
  deps: Partial<OrganizerDeps> = {}
): Promise<OrganizeResult> {
  const startedAt = Date.now();
  const baseDir = path.resolve(options.baseDir);
  const ctx: RunContext = {
    options,
    baseDir,
    outDir: path.resolve(baseDir, options.outDir),
    logger: deps.logger ?? createConsoleLogger(),
    fileOps: deps.fileOps ?? nodeFileOperations,
    failures: [],
  };

  ctx.logger.info(`Base: ${ctx.baseDir}`);
  ctx.logger.info(`Output: ${ctx.outDir}`);
  if (options.dryRun) {
    ctx.logger.warn("Dry run: no changes will be made.");
  }

  const entries = await readEntries(
    ctx.baseDir,
    { outDir: ctx.outDir, selfPath: options.selfPath },
    ctx.fileOps
  );
  const eligible = entries.filter((entry) => isEligible(entry, options));

  const result: OrganizeResult = {
    baseDir: ctx.baseDir,
    outDir: ctx.outDir,
    dryRun: options.dryRun,
    files: [],
    failures: ctx.failures,
    indexPath: null,
    presentationPath: null,
  };

  if (eligible.length === 0) {
    ctx.logger.info("No files to process.");
    return result;
  }

  if (!options.dryRun) {
    await ensureOutputRoot(ctx);
  }

  const sourceNames = new NameRegistry();
  const bucketRegistries = new Map<string, NameRegistry>();

  for (const entry of eligible) {
    const named: NamedFile = options.rename
      ? await renameStage(ctx, entry, sourceNames)
      : { finalName: entry.name, renamed: false };
    result.files.push(await copyStage(ctx, entry, named, bucketRegistries));
  }

  result.indexPath = await reportStage(ctx, result.files);
  result.presentationPath = await presentationStage(ctx, result.files);
  summarize(ctx, result, Date.now() - startedAt);
  return result;
}
