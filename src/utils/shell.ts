import { spawnSync } from "node:child_process";
import * as cons from "./console";

export type ShellCommandOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

// Runs a command line through the system shell and blocks until it exits.
// Output is logged, never inspected; a non-zero exit code is returned, not thrown.
// Callers that need failure to be fatal must check the code themselves.
export function runShellCommand(command: string, options: ShellCommandOptions = {}): number {
  cons.info(`Running CMD: ${command}`);
  const result = spawnSync(command, {
    shell: true,
    cwd: options.cwd,
    env: options.env,
    encoding: "utf-8",
    stdio: ["ignore", "pipe", "pipe"],
  });

  if (result.error) {
    throw result.error;
  }

  // killed by a signal
  const returnCode = result.status ?? 1;

  cons.info(`STDOUT: ${result.stdout ?? ""}`);
  cons.info(`STDERR: ${result.stderr ?? ""}`);
  cons.info(`ReturnCode: ${returnCode}`);
  return returnCode;
}
