#!/usr/bin/env node

import { Command } from "commander";
import { runDeploy } from "./frontend/deploy";
import { CommandLineOptions } from "./frontend/parseOptions";
import { getAppVersionString } from "./utils/versionString";

function main(): void {
  const program = new Command();

  program
    .name("deploystamp")
    .description("Copy deployment templates for an application and render their template files against JSON input")
    .version(getAppVersionString(), "-V, --version", "Output version information")
    .option("--fullStack", "Create deployments for every registered component", false)
    .requiredOption("-t, --template <dir>", "The template directory")
    .option("-a, --app <name>", "The application name of the template")
    .requiredOption("-i, --input <path>", "The data in JSON format")
    .requiredOption("-d, --destination <dir>", "The destination to render the template to")
    .option("-c, --config <path>", "Settings file (components, marker suffix, strict mode)")
    .option("-l, --log <path>", "Also write log output to this file")
    .action((options: CommandLineOptions) => {
      runDeploy(options);
    });

  program.parse(process.argv);
}

main();
