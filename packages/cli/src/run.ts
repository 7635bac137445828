// ============================================================================
// @enctab/cli — Commands
// ============================================================================
//
// `build` compiles every selected encoding from `<index-dir>/index-<name>.txt`
// and reports one line per encoding on stderr. `list` prints the selection.
// Both return the process exit code instead of exiting.
// ============================================================================

import { readFileSync } from 'node:fs';
import path from 'node:path';
import {
  type EncodingSpec,
  type IndexData,
  compileAll,
  filterRegistry,
  parseIndexText,
  parseRegistry,
  verifyIndex,
  warn,
} from '@enctab/core';
import type { CliConfig } from './config.js';
import { writeIndex } from './emit.js';

/** Where command output goes. */
export interface Output {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: Output = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

/** Violations printed per encoding before the rest are summarized. */
const MAX_REPORTED_VIOLATIONS = 5;

export function loadRegistry(file: string): EncodingSpec[] {
  const json: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  return parseRegistry(json);
}

export function indexFile(indexDir: string, name: string): string {
  return path.join(indexDir, `index-${name}.txt`);
}

export function loadIndexData(indexDir: string, name: string): IndexData {
  return parseIndexText(readFileSync(indexFile(indexDir, name), 'utf-8'));
}

export function selectEncodings(config: CliConfig): EncodingSpec[] {
  return filterRegistry(loadRegistry(config.registryPath), config.filter);
}

export function runBuild(config: CliConfig, output: Output = consoleOutput): number {
  const specs = selectEncodings(config);
  if (specs.length === 0) {
    warn(`no encoding matches "${config.filter}"`);
    return 0;
  }

  const outcomes = compileAll(specs, (spec) => loadIndexData(config.indexDir, spec.name));
  let failed = 0;

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      output.err(`generating index ${outcome.name}... failed: ${outcome.error.message}`);
      failed++;
      continue;
    }

    const { index } = outcome;
    if (config.check) {
      const violations = verifyIndex(index.tables);
      if (violations.length > 0) {
        output.err(
          `generating index ${index.name}... ${violations.length} conformance violation(s):`,
        );
        for (const violation of violations.slice(0, MAX_REPORTED_VIOLATIONS)) {
          output.err(`  [${violation.check}] ${violation.message}`);
        }
        if (violations.length > MAX_REPORTED_VIOLATIONS) {
          output.err(`  ... and ${violations.length - MAX_REPORTED_VIOLATIONS} more`);
        }
        failed++;
        continue;
      }
    }

    if (config.outDir !== undefined) {
      writeIndex(config.outDir, index);
    }
    output.err(`generating index ${index.name}... ${index.byteSize} bytes.`);
  }

  return failed > 0 ? 1 : 0;
}

export function runList(config: CliConfig, output: Output = consoleOutput): number {
  for (const spec of selectEncodings(config)) {
    output.out(`${spec.group}/${spec.name}\t${spec.kind}`);
  }
  return 0;
}
