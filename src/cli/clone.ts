import { runClone } from "../app/orchestrator/clone-orchestrator.js";

import {
  printWarnings,
  settingsOverridesFromGlobals,
  type CliEnvironment,
  type GlobalCliOptions,
} from "./environment.js";

type CloneCommandOptions = {
  repository: string;
  directory?: string;
  remap?: string;
  fetchSvn: boolean;
};

export async function cloneCommand(
  env: CliEnvironment,
  globals: GlobalCliOptions,
  opts: CloneCommandOptions,
): Promise<void> {
  const result = await runClone({
    repository: opts.repository,
    destination: opts.directory,
    cwd: env.cwd,
    factory: env.factory,
    fetchPublished: opts.fetchSvn,
    overrides: { ...settingsOverridesFromGlobals(globals), remap: opts.remap },
  });

  console.log(`Cloned ${opts.repository} into ${result.destination}.`);
  printWarnings(
    result.missing.map(
      (branch) =>
        `${branch.published} is not published on ${opts.repository}; ${branch.tracking} was not restored.`,
    ),
  );

  const { marker } = result.switch;
  console.log(`Linked .svn to ${marker.url}@${marker.revision}.`);
  printWarnings(result.switch.warnings);
}
