import { Command } from "commander";

import { cloneCommand } from "./clone.js";
import {
  defaultCliEnvironment,
  parseRemapArg,
  parseRevisionArg,
  type CliEnvironment,
  type GlobalCliOptions,
} from "./environment.js";
import { generateIgnoreCommand } from "./generate-ignore.js";
import { initCommand } from "./init.js";
import { pushCommand } from "./push.js";
import { statusCommand } from "./status.js";
import { switchCommand, updateCommand } from "./switch.js";
import { configureCommand, syncCommand } from "./sync.js";

export function buildCli(env: CliEnvironment = defaultCliEnvironment()): Command {
  const program = new Command();
  const globals = (): GlobalCliOptions => program.opts<GlobalCliOptions>();

  program
    .name("svnlink")
    .description("Keep a git worktree and its Subversion working copy on the same branch")
    .version("0.1.0")
    .option("--config-branch <name>", "Branch holding the bridge configuration (default: svnlink-config)")
    .option("--debug", "Show stack traces and error causes");

  program
    .command("init")
    .description("Create a bridged repository from a Subversion URL")
    .argument("<url>", "Subversion repository root URL")
    .argument("<mappings...>", "<svn-path>:<branch> pairs, e.g. branches/ap/trunk/rtos:aptrunk")
    .option("-C, --directory <dir>", "Directory to initialize (default: current directory)")
    .option("-r, --revision <rev>", "First Subversion revision to fetch", parseRevisionArg)
    .action(async (url: string, mappings: string[], opts: { directory?: string; revision?: number }) => {
      await initCommand(env, globals(), {
        url,
        mappings,
        directory: opts.directory,
        revision: opts.revision,
      });
    });

  program
    .command("clone")
    .description("Clone a bridged repository and link its Subversion metadata")
    .argument("<repository>", "Git repository to clone")
    .argument("[directory]", "Destination (default: repository basename)")
    .option("--remap <from:to>", "Rewrite tracking ref names when fetching published branches", parseRemapArg)
    .option("--no-fetch-svn", "Do not restore git-svn tracking refs from origin")
    .action(
      async (
        repository: string,
        directory: string | undefined,
        opts: { remap?: string; fetchSvn: boolean },
      ) => {
        await cloneCommand(env, globals(), {
          repository,
          directory,
          remap: opts.remap,
          fetchSvn: opts.fetchSvn,
        });
      },
    );

  program
    .command("switch")
    .description("Check out a branch and point .svn at its Subversion path and revision")
    .argument("<ref>", "Git reference or mapped branch name")
    .option("-f, --force", "Discard local changes to tracked files", false)
    .action(async (reference: string, opts: { force: boolean }) => {
      await switchCommand(env, globals(), { reference, force: opts.force });
    });

  program
    .command("update")
    .description("Relink and update .svn for the current HEAD")
    .action(async () => {
      await updateCommand(env, globals());
    });

  program
    .command("push")
    .description("Publish the config branch and git-svn branches to a remote")
    .argument("<remote>", "Git remote to push to")
    .option("-f, --force", "Force-update the remote branches", false)
    .action(async (remote: string, opts: { force: boolean }) => {
      await pushCommand(env, globals(), { remote, force: opts.force });
    });

  program
    .command("sync")
    .description("Configure and fetch mapped branches that have no tracking ref yet")
    .action(async () => {
      await syncCommand(env, globals());
    });

  program
    .command("configure")
    .description("Write the bridge configuration into .git/config")
    .action(async () => {
      await configureCommand(env, globals());
    });

  program
    .command("status")
    .description("Show which Subversion path and revision HEAD maps to")
    .action(async () => {
      await statusCommand(env, globals());
    });

  program
    .command("generate-ignore")
    .description("Print .gitignore patterns for svn:ignore and svn:externals")
    .action(async () => {
      await generateIgnoreCommand(env, globals());
    });

  return program;
}
