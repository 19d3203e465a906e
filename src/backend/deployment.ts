import * as path from "node:path";
import * as cons from "../utils/console";
import { isDirectory } from "../utils/fileSystem";
import { DeploySettings } from "./deploySettings";
import { DataMapping } from "./inputLoader";
import { materializeTemplate } from "./materializer";
import { RenderedTemplate, renderTemplates } from "./renderer";

export interface DeploymentRequest {
  app: string;
  sourceDir: string; // absolute
  destinationDir: string; // absolute
  inputData: DataMapping;
}

export interface DeploymentResult {
  app: string;
  filesCopied: number;
  rendered: RenderedTemplate[];
}

export class SourceDirectoryMissingError extends Error {
  constructor(public sourceDir: string) {
    super(`${sourceDir} does not exist.`);
    this.name = "SourceDirectoryMissingError";
  }
}

// <templateRoot>/<app> -> <destinationRoot>/<app>, both resolved against cwd.
export function makeDeploymentRequest(
  app: string,
  templateRoot: string,
  destinationRoot: string,
  inputData: DataMapping,
  cwd: string = process.cwd(),
): DeploymentRequest {
  return {
    app,
    sourceDir: path.resolve(cwd, templateRoot, app),
    destinationDir: path.resolve(cwd, destinationRoot, app),
    inputData,
  };
}

// Copy, then render. Throws before touching the destination if the source is missing.
export function deployApp(
  request: DeploymentRequest,
  settings: Pick<DeploySettings, "markerSuffix" | "strictUndefined">,
): DeploymentResult {
  if (!isDirectory(request.sourceDir)) {
    throw new SourceDirectoryMissingError(request.sourceDir);
  }

  cons.info(`Copying the template from ${request.sourceDir} to ${request.destinationDir}`);
  const filesCopied = materializeTemplate(request.sourceDir, request.destinationDir);

  const rendered = renderTemplates(request.destinationDir, request.inputData, {
    markerSuffix: settings.markerSuffix,
    strictUndefined: settings.strictUndefined,
  });

  cons.success(`Deployment for ${request.app} created.`);
  return { app: request.app, filesCopied, rendered };
}
