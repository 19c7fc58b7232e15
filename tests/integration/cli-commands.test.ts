import { promises as fs } from 'node:fs';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { buildProgram } from '../../src/cli.js';
import {
  createCapturingLogger,
  createTempTree,
  fakeProbe,
  listFiles,
  type CapturingLogger,
  type TreeBuilder,
} from '../helpers/tree.js';

describe('dotlink commands', () => {
  let tree: TreeBuilder;
  let logger: CapturingLogger;
  let printed: string[];

  async function run(...args: string[]): Promise<void> {
    const program = buildProgram(() => ({ logger }), {
      probe: fakeProbe(),
      write: (line) => printed.push(line),
    });
    await program.parseAsync([
      'node',
      'dotlink',
      '-t',
      tree.path('tree'),
      '-b',
      tree.path('build'),
      '-l',
      tree.path('home'),
      '--variables',
      tree.path('variables.toml'),
      ...args,
    ]);
  }

  beforeEach(async () => {
    tree = await createTempTree('dotlink-cli');
    logger = createCapturingLogger('info');
    printed = [];
    await tree.dir('home');
    await tree.file('variables.toml', 'editor = "vim"\nwork = false\n');
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await tree.remove();
  });

  describe('sync', () => {
    it('renders, copies and links the whole tree', async () => {
      await tree.file(
        'tree/.bashrc.hbs',
        'host={{hostname}} user={{username}} editor={{editor}}{{#if work}} work{{/if}}\n',
      );
      await tree.file('tree/.config/app/settings', 'plain');

      await run('sync', 'work');

      expect(process.exitCode).toBeUndefined();
      expect(await tree.read('build/.bashrc')).toBe(
        'host=test-host user=tester editor=vim work\n',
      );
      expect(await tree.read('build/.config/app/settings')).toBe('plain');

      expect(await listFiles(tree.path('home'))).toEqual(['.bashrc', '.config/app/settings']);
      expect(await fs.readlink(tree.path('home', '.bashrc'))).toBe(tree.path('build', '.bashrc'));
      expect(await tree.read('home/.config/app/settings')).toBe('plain');

      expect(logger.lines).toContain('built 1 rendered and 1 copied file(s)');
      expect(logger.lines).toContain(`linked 2 file(s) into ${tree.path('home')}`);
    });

    it('lets the variables file override computed bindings but not flags', async () => {
      await tree.file('variables.toml', 'hostname = "from-file"\nwork = false\n');
      await tree.file('tree/out.hbs', '{{hostname}} {{work}}');

      await run('sync', 'work');

      expect(await tree.read('build/out')).toBe('from-file true');
    });

    it('replaces a file already sitting at a link path', async () => {
      await tree.file('tree/.profile', 'new');
      await tree.file('home/.profile', 'old');

      await run('sync');

      expect((await fs.lstat(tree.path('home', '.profile'))).isSymbolicLink()).toBe(true);
      expect(await tree.read('home/.profile')).toBe('new');
    });

    it('reports failures and skips linking when the build fails', async () => {
      await tree.file('tree/good', 'fine');
      await tree.file('tree/bad.hbs', '{{unbound}}');

      await run('sync');

      expect(process.exitCode).toBe(1);
      expect(logger.lines).toContain('error: 1 errors occurred:');
      expect(logger.lines).toContain(`error:   err 00 at ${tree.path('tree', 'bad.hbs')}:`);
      expect(await tree.read('build/good')).toBe('fine');
      expect(await listFiles(tree.path('home'))).toEqual([]);
    });

    it('stops before building when a variable has an unsupported type', async () => {
      await tree.file('variables.toml', 'count = 3\n');
      await tree.file('tree/a', 'a');

      await run('sync');

      expect(process.exitCode).toBe(1);
      expect(logger.lines).toContain(
        `error:       Unsupported variable type: 'count' must be a string or a boolean`,
      );
      await expect(fs.stat(tree.path('build'))).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  describe('diff', () => {
    it('builds the tree and then reports that comparing is not implemented', async () => {
      await tree.file('tree/a.hbs', '{{os}}');

      await run('diff');

      expect(process.exitCode).toBe(1);
      expect(await tree.read('build/a')).toBe('linux');
      expect(await listFiles(tree.path('home'))).toEqual([]);
      expect(logger.lines).toContain('checking differences between current state and dotfiles');
      expect(logger.lines).toContain(
        'error: Not implemented: comparing the build tree with the link tree is not supported yet',
      );
    });
  });

  describe('print', () => {
    it('prints each variable once, sorted', async () => {
      await tree.file('tree/a.hbs', '{{hostname}} {{#if work}}{{editor}}{{/if}}');
      await tree.file('tree/sub/b.hbs', '{{#if (eq os "linux")}}{{editor}}{{/if}}');
      await tree.file('tree/static', '{{ignored}}');

      await run('print');

      expect(process.exitCode).toBeUndefined();
      expect(printed).toEqual(['editor', 'hostname', 'os', 'work']);
      await expect(fs.stat(tree.path('build'))).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('prints nothing when a template cannot be parsed', async () => {
      await tree.file('tree/a.hbs', '{{a}}');
      await tree.file('tree/broken.hbs', '{{#if}}');

      await run('print');

      expect(process.exitCode).toBe(1);
      expect(printed).toEqual([]);
      expect(logger.lines).toContain(`error:   err 00 at ${tree.path('tree', 'broken.hbs')}:`);
    });
  });
});
