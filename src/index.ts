#!/usr/bin/env node
import { Command } from "commander";
import fs from "fs";
import path from "path";
import { version } from "../package.json";
import { OrganizerError, describeError } from "./errors";
import { createConsoleLogger, type Logger } from "./logger";
import { organizeFiles } from "./organizer";
import { DEFAULT_PRESENTATION_NAME } from "./presentation";

type Options = {
  dryRun: boolean;
  rename: boolean;
  out: string;
  includeHidden: boolean;
  ppt: boolean;
  pptName: string;
};

type ProgramDeps = {
  logger?: Logger;
  /** Path of the running script; excluded from the files being organized. */
  selfPath?: string;
  exit?: (code: number) => void;
};

export function createProgram(deps: ProgramDeps = {}): Command {
  const logger = deps.logger ?? createConsoleLogger();
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  const selfPath =
    deps.selfPath ?? (process.argv[1] ? path.resolve(process.argv[1]) : undefined);

  const program = new Command();

  program
    .name("sortdir")
    .version(version)
    .argument("[directory]", "Directory to organize", ".")
    .description(
      "Rename files, copy them into folders by extension and write an HTML index"
    )
    .option("--dry-run", "Show what would be done without changing anything", false)
    .option("--no-rename", "Keep the source file names as they are")
    .option("--out <dir>", "Output directory for the folders and index.html", "out")
    .option("--include-hidden", "Also process hidden files (starting with .)", false)
    .option("--ppt", "Build a PPTX slideshow of the copied images", false)
    .option(
      "--ppt-name <name>",
      "File name of the slideshow, created in the output directory",
      DEFAULT_PRESENTATION_NAME
    )
    .action(async (inputDir: string, options: Options) => {
      const dirPath = path.resolve(inputDir);
      try {
        const dirStat = await fs.promises.stat(dirPath);
        if (!dirStat.isDirectory()) {
          logger.error(`The provided path is not a directory: ${dirPath}`);
          exit(1);
          return;
        }

        await organizeFiles(
          {
            baseDir: dirPath,
            outDir: options.out,
            dryRun: options.dryRun,
            rename: options.rename,
            includeHidden: options.includeHidden,
            selfPath,
            presentation: options.ppt ? options.pptName : undefined,
          },
          { logger }
        );
      } catch (error: unknown) {
        if (error instanceof OrganizerError) {
          logger.error(`Aborted (${error.code}): ${error.message}`);
        } else {
          logger.error("An error occurred:", [describeError(error)]);
        }
        exit(1);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(describeError(error));
      process.exit(1);
    });
}
