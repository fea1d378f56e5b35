import { initRepoConfig } from "../core/config-discovery.js";

type InitOptions = {
  force?: boolean;
  cwd?: string;
};

export async function initCommand(opts: InitOptions = {}): Promise<void> {
  const result = initRepoConfig({ cwd: opts.cwd, force: opts.force });

  if (result.status === "exists") {
    console.log(`Config already exists at ${result.configPath}. Use --force to overwrite.`);
    return;
  }

  const verb = result.status === "overwritten" ? "Overwrote" : "Created";
  console.log(`${verb} buildwarden config at ${result.configPath}`);
  console.log("Run `buildwarden show-config` to see the projects it finds.");
}
