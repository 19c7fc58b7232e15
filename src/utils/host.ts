import { promises as fs } from 'node:fs';

import { runCommand } from './proc.js';

/**
 * Where host identity comes from. Every method may reject; callers degrade to
 * a placeholder value.
 */
export interface HostProbe {
  readHostnameFile(): Promise<string>;
  /** stdout of `hostname` */
  queryHostname(): Promise<string>;
  /** stdout of `uname` */
  queryPlatform(): Promise<string>;
  env(name: string): string | undefined;
}

export const HOSTNAME_FILE = '/etc/hostname';

async function stdoutOf(command: string): Promise<string> {
  const result = await runCommand(command);
  return result.stdout;
}

export const nodeHostProbe: HostProbe = {
  readHostnameFile: () => fs.readFile(HOSTNAME_FILE, 'utf8'),
  queryHostname: () => stdoutOf('hostname'),
  queryPlatform: () => stdoutOf('uname'),
  env: (name) => process.env[name],
};
