import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { CliUsageError } from "../../shared/cli-errors";

export interface LoadedTemplate {
  path: string;
  /** Directory relative iso_url paths resolve against. */
  baseDir: string;
  raw: unknown;
}

export function loadTemplate(templatePath: string): LoadedTemplate {
  const absolutePath = path.resolve(templatePath);

  if (!fs.existsSync(absolutePath) || !fs.statSync(absolutePath).isFile()) {
    throw new CliUsageError(`Template not found: ${absolutePath}`, [
      "Verify that the template exists and is a regular file.",
    ]);
  }

  const text = fs.readFileSync(absolutePath, "utf8");
  const extension = path.extname(absolutePath).toLowerCase();

  let raw: unknown;
  try {
    raw = extension === ".yaml" || extension === ".yml" ? parseYaml(text) : JSON.parse(text);
  } catch (error) {
    throw new CliUsageError(`Failed to parse template ${absolutePath}.`, [
      error instanceof Error ? error.message : String(error),
      "Templates are JSON, or YAML when the file ends in .yaml or .yml.",
    ]);
  }

  return {
    path: absolutePath,
    baseDir: path.dirname(absolutePath),
    raw,
  };
}
