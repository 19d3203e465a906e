import * as fs from "node:fs";
import * as path from "node:path";
import * as nunjucks from "nunjucks";
import * as cons from "../utils/console";
import { fileExists, isFile, writeTextFile } from "../utils/fileSystem";
import { kDefaultMarkerSuffix } from "./deploySettings";
import { DataMapping } from "./inputLoader";

// dict methods (items/get/keys...) and True/False/None, as .j2 templates expect
nunjucks.installJinjaCompat();

export type RenderOptions = {
  markerSuffix?: string;
  strictUndefined?: boolean;
};

export interface RenderedTemplate {
  template: string; // file name with the marker suffix; deleted after rendering
  output: string;
}

export class TemplateRenderError extends Error {
  constructor(
    public templatePath: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "TemplateRenderError";
  }
}

function isInsideDir(dir: string, candidate: string): boolean {
  const rel = path.relative(dir, candidate);
  return rel !== "" && rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

// Template sources lose exactly one trailing newline, the same as a default jinja environment.
export function stripTrailingNewline(src: string): string {
  return src.replace(/(\r\n|\r|\n)$/, "");
}

// trim_blocks/lstrip_blocks for comments: nunjucks only applies them to {% %} tags.
// Indentation before a comment that opens a line is dropped, and so is the newline after any comment.
export function trimCommentWhitespace(src: string): string {
  return src.replace(/^[ \t]+(?=\{#)/gm, "").replace(/(\{#[\s\S]*?#\})(?:\r\n|\n|\r)?/g, "$1");
}

// Loads templates (including anything they include/import/extend) relative to searchRoot.
function createTemplateLoader(searchRoot: string): nunjucks.ILoader {
  return {
    getSource(name: string): nunjucks.LoaderSource {
      const fullPath = path.resolve(searchRoot, name);
      if (!isInsideDir(searchRoot, fullPath)) {
        throw new Error(`Template path escapes the template directory: ${name}`);
      }
      if (!isFile(fullPath)) {
        throw new Error(`template not found: ${name}`);
      }
      const src = fs.readFileSync(fullPath, "utf-8");
      return { src: trimCommentWhitespace(stripTrailingNewline(src)), path: fullPath, noCache: true };
    },
  };
}

export function createTemplateEnvironment(searchRoot: string, strictUndefined: boolean = false): nunjucks.Environment {
  return new nunjucks.Environment(createTemplateLoader(path.resolve(searchRoot)), {
    autoescape: false,
    trimBlocks: true,
    lstripBlocks: true,
    throwOnUndefined: strictUndefined,
  });
}

/////////////////////////////////////////////////////////////////////////////////
function renderTemplateFile(
  env: nunjucks.Environment,
  directory: string,
  templateName: string,
  outputName: string,
  data: DataMapping,
): boolean {
  const templatePath = path.join(directory, templateName);
  if (!fileExists(templatePath)) {
    // stale listing; nothing to do
    cons.warning(`Template vanished before rendering, skipping: ${templatePath}`);
    return false;
  }
  if (!isFile(templatePath)) {
    cons.dim(`  Not a file, leaving as-is: ${templatePath}`);
    return false;
  }
  if (outputName.length === 0) {
    throw new TemplateRenderError(templatePath, `Template has no name besides its marker suffix: ${templatePath}`);
  }

  let rendered: string;
  try {
    rendered = env.render(templateName, data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TemplateRenderError(templatePath, `Failed to render template ${templatePath}: ${reason}`, error);
  }

  writeTextFile(path.join(directory, outputName), rendered);
  fs.unlinkSync(templatePath);
  return true;
}

/////////////////////////////////////////////////////////////////////////////////
// Renders every marked file directly inside directory (subdirectories are not visited).
// Each output lands beside its template with the marker suffix stripped; the template is removed.
export function renderTemplates(directory: string, data: DataMapping, options: RenderOptions = {}): RenderedTemplate[] {
  const markerSuffix = options.markerSuffix ?? kDefaultMarkerSuffix;
  const env = createTemplateEnvironment(directory, options.strictUndefined === true);

  const names = fs
    .readdirSync(directory)
    .filter((name) => name.endsWith(markerSuffix))
    .sort();

  const rendered: RenderedTemplate[] = [];
  for (const name of names) {
    const outputName = name.slice(0, name.length - markerSuffix.length);
    if (renderTemplateFile(env, directory, name, outputName, data)) {
      cons.dim(`  Rendered ${name} -> ${outputName}`);
      rendered.push({ template: name, output: outputName });
    }
  }
  return rendered;
}
