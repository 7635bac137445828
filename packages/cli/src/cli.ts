#!/usr/bin/env tsx
// ============================================================================
// @enctab/cli — Encoding index table compiler
// ============================================================================
// Commands:
//   enctab build [filter] [--index-dir DIR] [--registry FILE] [--out DIR] [--check]
//   enctab list  [filter] [--registry FILE]
// ============================================================================

import { ConfigError, resolveConfig } from './config.js';
import { runBuild, runList } from './run.js';

const args = process.argv.slice(2);

function supportsColor(): boolean {
  if (process.env.NO_COLOR === '1') return false;
  if (process.env.FORCE_COLOR === '1') return true;
  return process.stderr.isTTY === true;
}

const useColor = supportsColor();

const _c = {
  reset: useColor ? '\x1b[0m' : '',
  bold: useColor ? '\x1b[1m' : '',
  red: useColor ? '\x1b[31m' : '',
};

function clr(color: string, text: string): string {
  if (!useColor) return text;
  return `${color}${text}${_c.reset}`;
}
function fail(text: string): string { return clr(_c.red, text); }
function heading(text: string): string { return clr(_c.bold, text); }

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function printUsage(): void {
  console.log(`
  ${heading('enctab')} - encoding index table compiler

  Usage:
    enctab build [filter] [options]    Compile every encoding whose name contains <filter>
    enctab list  [filter] [options]    List the selected encodings

  Options:
    --index-dir DIR      Directory holding index-<name>.txt files (default ./index)
    --registry FILE      Encoding registry manifest (default: bundled)
    --out DIR            Write <DIR>/<group>/<name>.json for each compiled index
    --check              Run round-trip conformance checks on the compiled tables

  Environment Variables:
    ENCTAB_INDEX_DIR     Same as --index-dir
    ENCTAB_REGISTRY      Same as --registry
    ENCTAB_OUT_DIR       Same as --out
    ENCTAB_DEBUG=1       Debug logging (also: warn, error)

  Examples:
    enctab build                       Compile all encodings
    enctab build iso-8859 --check      Compile and verify the ISO 8859 family
    enctab build gb18030 --out tables
  `);
}

function runCommand(): number {
  const config = resolveConfig(args);
  switch (config.command) {
    case 'build':
      return runBuild(config);
    case 'list':
      return runList(config);
    case 'help':
      printUsage();
      return 0;
  }
}

try {
  process.exitCode = runCommand();
} catch (error: unknown) {
  console.error(fail(`Error: ${errorMessage(error)}`));
  if (error instanceof ConfigError) printUsage();
  process.exitCode = 1;
}
