import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { buildEnvironment, readVariablesFile } from '../../../src/core/environment.js';
import { ErrorCode } from '../../../src/core/errors.js';
import {
  createCapturingLogger,
  createTempTree,
  fakeProbe,
  type TreeBuilder,
} from '../../helpers/tree.js';

import type { DotlinkConfig } from '../../../src/types/config.js';

describe('core/environment', () => {
  let tree: TreeBuilder;
  let config: DotlinkConfig;

  beforeEach(async () => {
    tree = await createTempTree('dotlink-env');
    config = {
      templateDir: tree.path('tree'),
      buildDir: tree.path('build'),
      linkDir: tree.path('home'),
      variablesPath: tree.path('variables.toml'),
      flags: [],
    };
  });

  afterEach(async () => {
    await tree.remove();
  });

  async function envFor(cfg: DotlinkConfig, probe = fakeProbe()) {
    const result = await buildEnvironment(cfg, { logger: createCapturingLogger(), probe });
    if (!result.ok) throw new Error(result.errors.format());
    return result.value;
  }

  describe('computed bindings', () => {
    it('reads hostname, username and os from the host', async () => {
      const env = await envFor(config);
      expect(Object.fromEntries(env)).toEqual({
        hostname: 'test-host',
        username: 'tester',
        os: 'linux',
      });
    });

    it('falls back to the hostname command when the file cannot be read', async () => {
      const env = await envFor(
        config,
        fakeProbe({ readHostnameFile: () => Promise.reject(new Error('ENOENT')) }),
      );
      expect(env.get('hostname')).toBe('fallback-host');
    });

    it('uses an empty hostname when both sources fail', async () => {
      const env = await envFor(
        config,
        fakeProbe({
          readHostnameFile: () => Promise.reject(new Error('ENOENT')),
          queryHostname: () => Promise.reject(new Error('spawn hostname ENOENT')),
        }),
      );
      expect(env.get('hostname')).toBe('');
    });

    it('reports an unknown os when uname cannot run', async () => {
      const env = await envFor(
        config,
        fakeProbe({ queryPlatform: () => Promise.reject(new Error('spawn uname ENOENT')) }),
      );
      expect(env.get('os')).toBe('unknown');
    });

    it('lower-cases and trims the platform name', async () => {
      const env = await envFor(
        config,
        fakeProbe({ queryPlatform: () => Promise.resolve(' Darwin \n') }),
      );
      expect(env.get('os')).toBe('darwin');
    });

    it('takes the first non-empty account variable', async () => {
      const vars: Record<string, string> = { USER: '', USERNAME: 'win-user' };
      const env = await envFor(config, fakeProbe({ env: (name) => vars[name] }));
      expect(env.get('username')).toBe('win-user');

      const none = await envFor(config, fakeProbe({ env: () => undefined }));
      expect(none.get('username')).toBe('');
    });
  });

  describe('variables file', () => {
    it('adds string and boolean values', async () => {
      await tree.file('variables.toml', 'email = "ada@example.com"\nwork = false\n');
      const env = await envFor(config);
      expect(env.get('email')).toBe('ada@example.com');
      expect(env.get('work')).toBe(false);
    });

    it('overrides computed values', async () => {
      await tree.file('variables.toml', 'os = "custom"\n');
      const env = await envFor(config);
      expect(env.get('os')).toBe('custom');
    });

    it('is optional', async () => {
      const env = await envFor(config);
      expect([...env.keys()].sort()).toEqual(['hostname', 'os', 'username']);
    });

    it('rejects unsupported value types at the file location', async () => {
      await tree.file('variables.toml', 'name = "ok"\nport = 8080\n');
      const result = await buildEnvironment(config, {
        logger: createCapturingLogger(),
        probe: fakeProbe(),
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        const [error] = result.errors.toArray();
        expect(result.errors.size).toBe(1);
        expect(error.location).toBe(config.variablesPath);
        expect(error.error.code).toBe(ErrorCode.UNSUPPORTED_VARIABLE_TYPE);
        expect(error.error.message).toBe("'port' must be a string or a boolean");
      }
    });

    it('rejects tables as values', async () => {
      await tree.file('variables.toml', '[git]\nemail = "x"\n');
      const result = await readVariablesFile(config.variablesPath, createCapturingLogger());
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.errors.toArray()[0].error.code).toBe(ErrorCode.UNSUPPORTED_VARIABLE_TYPE);
      }
    });

    it('reports malformed TOML as invalid configuration', async () => {
      await tree.file('variables.toml', 'this is = = not toml\n');
      const result = await readVariablesFile(config.variablesPath, createCapturingLogger());
      expect(result.ok).toBe(false);
      if (!result.ok) {
        const [error] = result.errors.toArray();
        expect(error.location).toBe(config.variablesPath);
        expect(error.error.code).toBe(ErrorCode.CONFIG_INVALID);
      }
    });
  });

  describe('flags', () => {
    it('bind to true', async () => {
      const env = await envFor({ ...config, flags: ['laptop', 'gui'] });
      expect(env.get('laptop')).toBe(true);
      expect(env.get('gui')).toBe(true);
    });

    it('win over the variables file', async () => {
      await tree.file('variables.toml', 'k = false\n');
      const env = await envFor({ ...config, flags: ['k'] });
      expect(env.get('k')).toBe(true);
    });

    it('win over computed values', async () => {
      const env = await envFor({ ...config, flags: ['os'] });
      expect(env.get('os')).toBe(true);
    });
  });

  it('logs the final binding set at info level', async () => {
    const logger = createCapturingLogger('info');
    await buildEnvironment({ ...config, flags: ['gui'] }, { logger, probe: fakeProbe() });
    expect(logger.lines).toEqual([
      'env:',
      '  hostname: "test-host"',
      '  username: "tester"',
      '  os: "linux"',
      '  gui: true',
    ]);
  });
});
