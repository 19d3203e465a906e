import * as fs from "fs";
import * as path from "path";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

// Render context shared by every deployed application.
export type DataMapping = { [key: string]: JsonValue };

export class InputLoadError extends Error {
  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = "InputLoadError";
  }
}

function isDataMapping(value: unknown): value is DataMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Plain JSON, no comments; the top level must be an object.
export function loadInputData(filePath: string): DataMapping {
  const resolvedPath = path.resolve(filePath);

  let content: string;
  try {
    content = fs.readFileSync(resolvedPath, "utf-8");
  } catch (error) {
    throw new InputLoadError(`Failed to read input file: ${resolvedPath}`, error instanceof Error ? error : undefined);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new InputLoadError(`Input file is not valid JSON: ${resolvedPath}`, error instanceof Error ? error : undefined);
  }

  if (!isDataMapping(parsed)) {
    throw new InputLoadError(`Input file must contain a JSON object: ${resolvedPath}`);
  }
  return parsed;
}
