// ============================================================================
// @enctab/cli — Configuration
// ============================================================================
//
// Options come from argv flags first, then ENCTAB_* environment variables,
// then defaults. The merged result is validated before anything runs.
// ============================================================================

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { EnctabError } from '@enctab/core';
import { z } from 'zod';

/** Manifest shipped with the CLI. */
export const BUNDLED_REGISTRY = fileURLToPath(new URL('../data/encodings.json', import.meta.url));

export const DEFAULT_INDEX_DIR = './index';

const VALUE_FLAGS = ['index-dir', 'registry', 'out'] as const;
const SWITCH_FLAGS = ['check', 'help'] as const;

const cliConfigSchema = z.object({
  command: z.enum(['build', 'list', 'help']),
  filter: z.string(),
  indexDir: z.string().min(1, 'index directory must not be empty'),
  registryPath: z.string().min(1, 'registry path must not be empty'),
  outDir: z.string().min(1, 'output directory must not be empty').optional(),
  check: z.boolean(),
});

export type CliConfig = z.infer<typeof cliConfigSchema>;

/**
 * Thrown when the command line or environment is invalid.
 */
export class ConfigError extends EnctabError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Resolve the CLI configuration from `argv` (without the node and script
 * paths) and the environment.
 *
 * @throws {ConfigError} On unknown flags, missing flag values or invalid settings
 */
export function resolveConfig(
  argv: readonly string[],
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  const [command = 'help', ...rest] = argv;
  const flags = new Map<string, string | true>();
  const positional: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const name = arg.slice(2);
    if (isValueFlag(name)) {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigError(`--${name} needs a value`);
      }
      flags.set(name, value);
      i++;
    } else if (isSwitchFlag(name)) {
      flags.set(name, true);
    } else {
      throw new ConfigError(`Unknown option --${name}`);
    }
  }

  if (positional.length > 1) {
    throw new ConfigError(`Expected at most one filter, got: ${positional.join(' ')}`);
  }

  const result = cliConfigSchema.safeParse({
    command: flags.has('help') ? 'help' : command,
    filter: positional[0] ?? '',
    indexDir: stringFlag(flags, 'index-dir') ?? env.ENCTAB_INDEX_DIR ?? DEFAULT_INDEX_DIR,
    registryPath: stringFlag(flags, 'registry') ?? env.ENCTAB_REGISTRY ?? BUNDLED_REGISTRY,
    outDir: stringFlag(flags, 'out') ?? env.ENCTAB_OUT_DIR,
    check: flags.has('check'),
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const config = result.data;
  return {
    ...config,
    indexDir: path.resolve(config.indexDir),
    registryPath: path.resolve(config.registryPath),
    outDir: config.outDir === undefined ? undefined : path.resolve(config.outDir),
  };
}

function isValueFlag(name: string): name is (typeof VALUE_FLAGS)[number] {
  return VALUE_FLAGS.some((flag) => flag === name);
}

function isSwitchFlag(name: string): name is (typeof SWITCH_FLAGS)[number] {
  return SWITCH_FLAGS.some((flag) => flag === name);
}

function stringFlag(flags: ReadonlyMap<string, string | true>, name: string): string | undefined {
  const value = flags.get(name);
  return typeof value === 'string' ? value : undefined;
}
