/**
 * Moves a run's byproducts from the run directory into its results
 * directory. Files that do not carry the run's base name and a known
 * byproduct extension stay where they are.
 */

import { readdirSync, renameSync, statSync } from "node:fs";
import { join } from "node:path";
import { artifactBaseName, isRunByproduct } from "./artifacts.js";
import type { RunConfig } from "../config/run/index.js";

export interface MovedFile {
  readonly from: string;
  readonly to: string;
}

export function organizeResults(config: RunConfig): MovedFile[] {
  const baseName = artifactBaseName(config.simulationInput);
  const moved: MovedFile[] = [];

  for (const fileName of readdirSync(config.runDir)) {
    const from = join(config.runDir, fileName);
    if (!isRunByproduct(fileName, baseName) || !statSync(from).isFile()) {
      continue;
    }
    const to = join(config.resultsDir, fileName);
    renameSync(from, to);
    moved.push({ from, to });
  }

  return moved;
}
