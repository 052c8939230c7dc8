#!/usr/bin/env node

import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import chalk from "chalk";
import { run, auth, pull, archive, clean, fail } from "./cli/commands";

/**
 * Wrapper for command actions with consistent error handling
 */
function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      fail(error);
    }
  };
}

function readVersion(): string {
  const parsed: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8")
  );
  return typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string"
    ? parsed.version
    : "0.0.0";
}

interface RunFlags {
  repos?: string;
  env?: string;
  keepGoing?: boolean;
  debug?: boolean;
}

interface EnvFlags {
  env?: string;
  debug?: boolean;
}

interface ArchiveFlags {
  branch: string;
  debug?: boolean;
}

const program = new Command();

program
  .name("drive-backup")
  .description(
    "Back up git repositories to Google Drive and a Drive documentation folder to S3"
  )
  .version(readVersion(), "-V, --version", "output the version number");

program.configureHelp({
  styleTitle: (str) => chalk.bold(str),
  styleCommandText: (str) => chalk.white(str),
  styleCommandDescription: (str) => chalk.dim(str),
  styleDescriptionText: (str) => str,
  styleOptionText: (str) => chalk.green(str),
  styleArgumentText: (str) => chalk.cyan(str),
  styleSubcommandText: (str) => str,
});

// Run command
program
  .command("run")
  .summary("Archive repositories, back up documentation, clean up")
  .option("--repos <file>", "Repository list (default: REPOS_FILE or repos.json)")
  .option("--env <file>", "Environment file to load (default: .env)")
  .option(
    "--keep-going",
    "Continue with the next repository when one fails (exits non-zero)"
  )
  .option("--debug", "Show per-step timing information")
  .action(
    withErrorHandling(async (cmdOptions: RunFlags) => {
      await run({
        repos: cmdOptions.repos,
        envFile: cmdOptions.env,
        keepGoing: cmdOptions.keepGoing || false,
        debug: cmdOptions.debug || false,
      });
    })
  );

// Auth command
program
  .command("auth")
  .summary("Authorize Google Drive access and save the token")
  .option("--env <file>", "Environment file to load (default: .env)")
  .action(
    withErrorHandling(async (cmdOptions: EnvFlags) => {
      await auth({ envFile: cmdOptions.env });
    })
  );

// Pull command
program
  .command("pull")
  .summary("Download a Drive folder tree into the current directory")
  .argument("[folderId]", "Drive folder id (default: GOOGLE_DRIVE_DOC_FOLDER_ID)")
  .argument("[name]", "Local directory name (default: PROJECT_NAME)")
  .option("--env <file>", "Environment file to load (default: .env)")
  .option("--debug", "Show per-step timing information")
  .action(
    withErrorHandling(
      async (
        folderId: string | undefined,
        name: string | undefined,
        cmdOptions: EnvFlags
      ) => {
        await pull(folderId, name, {
          envFile: cmdOptions.env,
          debug: cmdOptions.debug || false,
        });
      }
    )
  );

// Archive command
program
  .command("archive")
  .summary("Clone a repository and zip it into the current directory")
  .argument("<url>", "Clone URL")
  .argument("<name>", "Archive base name (<name>.zip)")
  .option("-b, --branch <branch>", "Branch to archive", "master")
  .option("--debug", "Show per-step timing information")
  .action(
    withErrorHandling(async (url: string, name: string, cmdOptions: ArchiveFlags) => {
      await archive(url, name, {
        branch: cmdOptions.branch,
        debug: cmdOptions.debug || false,
      });
    })
  );

// Clean command
program
  .command("clean")
  .summary("Remove local zip files and the project directory")
  .option("--env <file>", "Environment file to load (default: .env)")
  .action(
    withErrorHandling(async (cmdOptions: EnvFlags) => {
      await clean({ envFile: cmdOptions.env });
    })
  );

// Global error handler
process.on("unhandledRejection", (reason) => {
  console.error(chalk.red("Unhandled Rejection:"), reason);
  process.exit(1);
});

process.on("uncaughtException", (error) => {
  console.error(chalk.red("Uncaught Exception:"), error);
  process.exit(1);
});

// Show help if no arguments provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch(fail);
}
