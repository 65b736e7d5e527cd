import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it } from 'node:test';

import {
  DependencyGraph,
  loadCatalog,
  loadComponentsFromDirectory,
  parseComponentDefinition
} from '../../../src/core/setup/index.js';
import { ConfigError, InvalidComponentMetadataError } from '../../../src/utils/errors.js';
import { withTempDir } from '../../test-helpers.js';

const GH_TOML = `
name = "GitHub CLI"
description = "GitHub from the terminal"
dependencies = ["git"]
install = ["apt-get install -y gh", "gh --version"]

[vars.GH_HOST]
description = "GitHub host"
default = "github.com"

[secrets.GH_TOKEN]
description = "Token for gh"
`;

describe('parseComponentDefinition', () => {
  it('maps TOML fields onto a component', () => {
    const component = parseComponentDefinition(GH_TOML, 'gh');

    assert.equal(component.id, 'gh');
    assert.equal(component.displayName, 'GitHub CLI');
    assert.equal(component.description, 'GitHub from the terminal');
    assert.deepEqual([...component.dependencies], ['git']);
    assert.deepEqual(component.installSteps, ['apt-get install -y gh', 'gh --version']);
    assert.deepEqual(component.envSpecs, [
      { name: 'GH_HOST', secret: false, description: 'GitHub host', default: 'github.com' },
      { name: 'GH_TOKEN', secret: true, description: 'Token for gh' }
    ]);
  });

  it('defaults the id and display name to the file stem', () => {
    const component = parseComponentDefinition('install = ["echo hi"]\n', 'hello');
    assert.equal(component.id, 'hello');
    assert.equal(component.displayName, 'hello');
    assert.equal(component.description, '');
    assert.equal(component.dependencies.size, 0);
    assert.deepEqual(component.envSpecs, []);
  });

  it('honours an explicit id', () => {
    assert.equal(parseComponentDefinition('id = "node-v1.2"\n', 'node').id, 'node-v1.2');
  });

  it('reports unparseable TOML against the file stem', () => {
    assert.throws(
      () => parseComponentDefinition('name = ', 'broken'),
      (error: unknown) => error instanceof InvalidComponentMetadataError && error.component === 'broken'
    );
  });

  it('rejects wrongly typed fields', () => {
    assert.throws(
      () => parseComponentDefinition('install = "echo hi"\n', 'bad'),
      (error: unknown) =>
        error instanceof InvalidComponentMetadataError && error.reason === "'install' must be an array of strings"
    );
  });

  it('rejects invalid ids and dependency ids', () => {
    assert.throws(
      () => parseComponentDefinition('id = "../escape"\n', 'bad'),
      (error: unknown) => error instanceof InvalidComponentMetadataError && error.reason === "invalid setup component id '../escape'"
    );
    assert.throws(
      () => parseComponentDefinition('dependencies = ["a/b"]\n', 'bad'),
      (error: unknown) => error instanceof InvalidComponentMetadataError && error.reason === "invalid dependency id 'a/b'"
    );
  });

  it('rejects a key declared as both var and secret', () => {
    const content = '[vars.TOKEN]\ndescription = "a"\n\n[secrets.TOKEN]\ndescription = "b"\n';
    assert.throws(
      () => parseComponentDefinition(content, 'dup'),
      (error: unknown) =>
        error instanceof InvalidComponentMetadataError &&
        error.reason === "environment key 'TOKEN' is declared in both [vars] and [secrets]"
    );
  });
});

describe('loading catalog directories', () => {
  it('reads only .toml files, in file-name order', async () => {
    await withTempDir('setupkit-catalog-', async (dir) => {
      await fs.writeFile(path.join(dir, 'gh.toml'), GH_TOML);
      await fs.writeFile(path.join(dir, 'git.toml'), 'install = ["apt-get install -y git"]\n');
      await fs.writeFile(path.join(dir, 'README.md'), '# not a component\n');

      const components = await loadComponentsFromDirectory(dir);
      assert.deepEqual(components.map(c => c.id), ['gh', 'git']);
    });
  });

  it('layers extra directories over the base one', async () => {
    await withTempDir('setupkit-catalog-', async (dir) => {
      const base = path.join(dir, 'base');
      const extra = path.join(dir, 'extra');
      await fs.mkdir(base);
      await fs.mkdir(extra);
      await fs.writeFile(path.join(base, 'git.toml'), 'description = "base git"\n');
      await fs.writeFile(path.join(base, 'just.toml'), 'description = "base just"\n');
      await fs.writeFile(path.join(extra, 'git.toml'), 'description = "local git"\n');
      await fs.writeFile(path.join(extra, 'act.toml'), 'description = "local act"\n');

      const catalog = await loadCatalog({ builtinDir: base, extraDirs: [extra] });

      assert.deepEqual([...catalog.keys()], ['act', 'git', 'just']);
      assert.equal(catalog.get('git')?.description, 'local git');
      assert.equal(catalog.get('just')?.description, 'base just');
    });
  });

  it('fails when an extra directory is missing', async () => {
    await withTempDir('setupkit-catalog-', async (dir) => {
      await assert.rejects(
        loadCatalog({ builtinDir: dir, extraDirs: [path.join(dir, 'missing')] }),
        ConfigError
      );
    });
  });

  it('ships a built-in catalog that validates', async () => {
    const catalog = await loadCatalog();
    for (const id of ['gh', 'git', 'just', 'uv']) {
      assert.ok(catalog.has(id), `expected built-in component '${id}'`);
    }
    const graph = DependencyGraph.build(catalog);
    assert.deepEqual(graph.resolve(['gh']), ['git', 'gh']);
  });
});
