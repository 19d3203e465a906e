import { DeploySettings } from "../backend/deploySettings";
import { err, ok, Result } from "../utils/errorHandling";

// As commander hands them over.
export interface CommandLineOptions {
  fullStack?: boolean;
  template?: string;
  app?: string;
  input?: string;
  destination?: string;
  config?: string;
  log?: string;
}

export interface DeployOptions {
  templateRoot: string;
  destinationRoot: string;
  inputPath: string;
  apps: readonly string[];
}

function requireOption(value: string | undefined, flag: string): Result<string> {
  if (!value) {
    return err(`Missing required option ${flag}`);
  }
  return ok(value);
}

// Full-stack mode wins over --app when both are given. Names are used exactly as typed.
export function resolveTargetApps(cmd: CommandLineOptions, settings: Pick<DeploySettings, "components">): Result<readonly string[]> {
  if (cmd.fullStack) {
    return ok(settings.components);
  }
  const app = cmd.app;
  if (!app) {
    return err("--app <name> is required unless --fullStack is set");
  }
  return ok([app]);
}

export function parseDeployOptions(cmd: CommandLineOptions, settings: Pick<DeploySettings, "components">): Result<DeployOptions> {
  const templateRoot = requireOption(cmd.template, "-t, --template <dir>");
  if (!templateRoot.ok) {
    return templateRoot;
  }
  const destinationRoot = requireOption(cmd.destination, "-d, --destination <dir>");
  if (!destinationRoot.ok) {
    return destinationRoot;
  }
  const inputPath = requireOption(cmd.input, "-i, --input <path>");
  if (!inputPath.ok) {
    return inputPath;
  }
  const apps = resolveTargetApps(cmd, settings);
  if (!apps.ok) {
    return apps;
  }

  return ok({
    templateRoot: templateRoot.value,
    destinationRoot: destinationRoot.value,
    inputPath: inputPath.value,
    apps: apps.value,
  });
}
