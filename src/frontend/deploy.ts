import * as path from "node:path";
import { loadDeploySettings } from "../backend/deploySettings";
import { DeploymentResult, deployApp, makeDeploymentRequest, SourceDirectoryMissingError } from "../backend/deployment";
import { loadInputData } from "../backend/inputLoader";
import * as cons from "../utils/console";
import { describeError } from "../utils/errorHandling";
import { CommandLineOptions, parseDeployOptions } from "./parseOptions";

export interface DeployCommandResult {
  exitCode: number;
  deployments: DeploymentResult[];
}

// Returns exit code 1 for usage errors and missing sources; stops at the first failing app.
// Input, settings and render failures are thrown.
export function deployCommand(cmd: CommandLineOptions, cwd: string = process.cwd()): DeployCommandResult {
  if (cmd.log) {
    cons.setLogFile(path.resolve(cwd, cmd.log));
  }
  cons.dim(`Options: ${JSON.stringify(cmd)}`);

  const settings = loadDeploySettings(cmd.config ? path.resolve(cwd, cmd.config) : undefined);
  if (settings.sourcePath) {
    cons.dim(`Settings loaded from ${settings.sourcePath}`);
  }

  const parsed = parseDeployOptions(cmd, settings);
  if (!parsed.ok) {
    cons.error(parsed.error);
    return { exitCode: 1, deployments: [] };
  }
  const options = parsed.value;

  // loaded once; every app renders against the same mapping
  const inputData = loadInputData(path.resolve(cwd, options.inputPath));

  const deployments: DeploymentResult[] = [];
  for (const app of options.apps) {
    cons.h1(`Deploying ${app}`);
    const request = makeDeploymentRequest(app, options.templateRoot, options.destinationRoot, inputData, cwd);
    try {
      deployments.push(deployApp(request, settings));
    } catch (error) {
      if (error instanceof SourceDirectoryMissingError) {
        cons.error(error.message);
        return { exitCode: 1, deployments };
      }
      throw error;
    }
  }

  return { exitCode: 0, deployments };
}

// CLI wrapper: prints thrown errors with their cause chain and exits non-zero on any failure.
export function runDeploy(cmd: CommandLineOptions, cwd: string = process.cwd()): void {
  let exitCode: number;
  try {
    exitCode = deployCommand(cmd, cwd).exitCode;
  } catch (error) {
    cons.error(error instanceof Error ? error.message : String(error));
    console.error(describeError(error));
    exitCode = 1;
  }
  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}
