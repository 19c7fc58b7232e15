import { promises as fs } from 'node:fs';

import * as TOML from '@iarna/toml';

import { fail, ok, type Result } from './error-collection.js';
import { DotlinkError, ErrorCode, isErrno, locate } from './errors.js';
import { VariableValueSchema, type BindingValue, type DotlinkConfig } from '../types/config.js';
import { nodeHostProbe, type HostProbe } from '../utils/host.js';

import type { Logger } from '../utils/logger.js';

/**
 * The binding set handed to every template. Built once per run and never
 * mutated afterwards.
 */
export type Env = ReadonlyMap<string, BindingValue>;

export interface EnvironmentOptions {
  logger: Logger;
  probe?: HostProbe;
}

async function getHostname(probe: HostProbe): Promise<string> {
  try {
    return (await probe.readHostnameFile()).trim();
  } catch {
    // fall through to the command
  }
  try {
    return (await probe.queryHostname()).trim();
  } catch {
    return '';
  }
}

function getUsername(probe: HostProbe): string {
  for (const name of ['USER', 'USERNAME']) {
    const value = probe.env(name);
    if (value) return value;
  }
  return '';
}

async function getOperatingSystem(probe: HostProbe): Promise<string> {
  try {
    return (await probe.queryPlatform()).trim().toLowerCase();
  } catch {
    return 'unknown';
  }
}

/**
 * Read the variables file into a list of bindings. A missing file yields none.
 */
export async function readVariablesFile(
  variablesPath: string,
  logger: Logger,
): Promise<Result<Array<[string, BindingValue]>>> {
  logger.debug(`trying to read ${variablesPath}`);
  let raw: string;
  try {
    raw = await fs.readFile(variablesPath, 'utf8');
  } catch (error) {
    if (isErrno(error, 'ENOENT')) {
      logger.debug(`no variables file at ${variablesPath}`);
    } else {
      logger.warn(`failed to read ${variablesPath}: ${String(error)}`);
    }
    return ok([]);
  }

  logger.debug(`parsing ${variablesPath}`);
  let table: TOML.JsonMap;
  try {
    table = TOML.parse(raw);
  } catch (error) {
    return fail(locate(error, variablesPath, ErrorCode.CONFIG_INVALID));
  }

  const bindings: Array<[string, BindingValue]> = [];
  for (const [key, value] of Object.entries(table)) {
    const parsed = VariableValueSchema.safeParse(value);
    if (!parsed.success) {
      const error = new DotlinkError(
        ErrorCode.UNSUPPORTED_VARIABLE_TYPE,
        `'${key}' must be a string or a boolean`,
        { key },
      );
      return fail(locate(error, variablesPath));
    }
    bindings.push([key, parsed.data]);
  }
  return ok(bindings);
}

/**
 * Assemble the binding set. Later sources win on key collision:
 * computed host values < variables file < command flags.
 */
export async function buildEnvironment(
  config: DotlinkConfig,
  opts: EnvironmentOptions,
): Promise<Result<Env>> {
  const probe = opts.probe ?? nodeHostProbe;
  const { logger } = opts;

  const [hostname, os] = await Promise.all([getHostname(probe), getOperatingSystem(probe)]);
  const env = new Map<string, BindingValue>([
    ['hostname', hostname],
    ['username', getUsername(probe)],
    ['os', os],
  ]);

  const variables = await readVariablesFile(config.variablesPath, logger);
  if (!variables.ok) return variables;
  for (const [key, value] of variables.value) env.set(key, value);

  for (const flag of config.flags) env.set(flag, true);

  logger.info('env:');
  for (const [key, value] of env) {
    logger.info(`  ${key}: ${JSON.stringify(value)}`);
  }

  return ok(env);
}
