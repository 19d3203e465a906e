import Ajv from "ajv";
import * as fs from "fs";
import { parse as parseJsonc, ParseError, printParseErrorCode } from "jsonc-parser";
import * as path from "path";

import settingsSchema from "./deploySettings.schema.json";

export const kDefaultComponents: readonly string[] = Object.freeze(["lambda"]);
export const kDefaultMarkerSuffix = ".j2";

// Shape of the settings file on disk; everything is optional.
export interface DeploySettingsFile {
  $schema?: string;
  components?: string[];
  markerSuffix?: string;
  strictUndefined?: boolean;
}

// Resolved settings. Read once at startup, frozen afterwards.
export interface DeploySettings {
  readonly components: readonly string[];
  readonly markerSuffix: string;
  readonly strictUndefined: boolean;
  readonly sourcePath?: string;
}

export class SettingsValidationError extends Error {
  constructor(
    message: string,
    public errors: unknown[],
  ) {
    super(message);
    this.name = "SettingsValidationError";
  }
}

export class SettingsLoadError extends Error {
  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = "SettingsLoadError";
  }
}

function freezeSettings(file: DeploySettingsFile, sourcePath?: string): DeploySettings {
  const components = file.components ? Object.freeze([...file.components]) : kDefaultComponents;
  return Object.freeze({
    components,
    markerSuffix: file.markerSuffix ?? kDefaultMarkerSuffix,
    strictUndefined: file.strictUndefined ?? false,
    sourcePath,
  });
}

export function defaultDeploySettings(): DeploySettings {
  return freezeSettings({});
}

function validateSettings(data: unknown): DeploySettingsFile {
  const ajv = new Ajv({ allErrors: true });
  const validate = ajv.compile<DeploySettingsFile>(settingsSchema);

  if (!validate(data)) {
    const errorMessages = validate.errors?.map((e) => `${e.instancePath || "/"} ${e.message}`) || [];
    throw new SettingsValidationError(`Settings validation failed:\n${errorMessages.join("\n")}`, validate.errors || []);
  }
  return data;
}

// Loads and validates a JSONC settings file. Without a path, the defaults are returned.
export function loadDeploySettings(filePath?: string): DeploySettings {
  if (!filePath) {
    return defaultDeploySettings();
  }

  const resolvedPath = path.resolve(filePath);
  let content: string;
  try {
    content = fs.readFileSync(resolvedPath, "utf-8");
  } catch (error) {
    throw new SettingsLoadError(`Failed to read settings file: ${resolvedPath}`, error instanceof Error ? error : undefined);
  }

  const parseErrors: ParseError[] = [];
  const parsed: unknown = parseJsonc(content, parseErrors, { allowTrailingComma: true });
  if (parseErrors.length > 0) {
    const details = parseErrors.map((e) => `${printParseErrorCode(e.error)} at offset ${e.offset}`).join(", ");
    throw new SettingsLoadError(`Failed to parse settings file: ${resolvedPath} (${details})`);
  }

  return freezeSettings(validateSettings(parsed), resolvedPath);
}
