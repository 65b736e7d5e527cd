import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it } from 'node:test';

import { createCatalog, generateInstallScript, parseComponentDefinition, renderEnvHeader } from '../../../src/core/setup/index.js';
import { getSetupPaths, runSetupGenerate, runSetupInit, runSetupList } from '../../../src/core/setup/setup-pipeline.js';
import { ConfigError, MalformedEnvTomlError, ValidationError } from '../../../src/utils/errors.js';
import { withTempDir } from '../../test-helpers.js';

const GIT_TOML = 'install = ["apt-get install -y git"]\n';
const GH_TOML = `dependencies = ["git"]
install = ["apt-get install -y gh"]

[vars.GH_HOST]
description = "GitHub host"
default = "github.com"

[secrets.GH_TOKEN]
description = "Token for gh"
`;

async function prepareWorkspace(root: string): Promise<{ workspace: string; catalogDir: string }> {
  const workspace = path.join(root, 'workspace');
  const catalogDir = path.join(root, 'catalog');
  await fs.mkdir(workspace);
  await fs.mkdir(catalogDir);
  await fs.writeFile(path.join(catalogDir, 'git.toml'), GIT_TOML);
  await fs.writeFile(path.join(catalogDir, 'gh.toml'), GH_TOML);
  return { workspace, catalogDir };
}

describe('setup init', () => {
  it('creates tools.yml and a .gitignore for secrets', async () => {
    await withTempDir('setupkit-init-', async (dir) => {
      const paths = await runSetupInit(dir);

      const toolsYml = await fs.readFile(paths.toolsYml, 'utf8');
      assert.ok(toolsYml.includes('tools:'));
      assert.ok(toolsYml.includes('# - just'));
      assert.equal(await fs.readFile(paths.gitignore, 'utf8'), '# Secret values never belong in version control\nsecrets.toml\n');
    });
  });

  it('refuses to initialize twice', async () => {
    await withTempDir('setupkit-init-', async (dir) => {
      await runSetupInit(dir);
      await assert.rejects(runSetupInit(dir), ConfigError);
    });
  });
});

describe('setup gen', () => {
  it('fails before init', async () => {
    await withTempDir('setupkit-gen-', async (dir) => {
      await assert.rejects(
        runSetupGenerate(dir),
        (error: unknown) => error instanceof ConfigError && error.message.startsWith('Setup not initialized')
      );
    });
  });

  it('fails when tools.yml is missing', async () => {
    await withTempDir('setupkit-gen-', async (dir) => {
      await fs.mkdir(getSetupPaths(dir).dir);
      await assert.rejects(
        runSetupGenerate(dir),
        (error: unknown) => error instanceof ConfigError && error.message === 'Setup config file (tools.yml) not found'
      );
    });
  });

  it('fails when no tools are selected', async () => {
    await withTempDir('setupkit-gen-', async (dir) => {
      await runSetupInit(dir);
      await assert.rejects(runSetupGenerate(dir), ValidationError);
    });
  });

  it('writes install.sh, vars.toml and secrets.toml in install order', async () => {
    await withTempDir('setupkit-gen-', async (root) => {
      const { workspace, catalogDir } = await prepareWorkspace(root);
      const paths = await runSetupInit(workspace);
      await fs.writeFile(paths.toolsYml, 'tools:\n  - gh\n');

      const result = await runSetupGenerate(workspace, { builtinCatalogDir: catalogDir });

      assert.deepEqual(result.order, ['git', 'gh']);
      assert.deepEqual(result.written, [paths.installSh, paths.varsToml, paths.secretsToml]);
      assert.deepEqual(result.unchanged, []);

      const catalog = createCatalog([
        parseComponentDefinition(GIT_TOML, 'git'),
        parseComponentDefinition(GH_TOML, 'gh')
      ]);
      assert.equal(await fs.readFile(paths.installSh, 'utf8'), generateInstallScript(['git', 'gh'], catalog));
      assert.equal(
        await fs.readFile(paths.varsToml, 'utf8'),
        renderEnvHeader('plain') + '\n# GitHub host\nGH_HOST = "github.com"\n'
      );
      assert.equal(
        await fs.readFile(paths.secretsToml, 'utf8'),
        renderEnvHeader('secret') + '\n# Token for gh\nGH_TOKEN = ""\n'
      );

      const installStats = await fs.stat(paths.installSh);
      assert.equal(installStats.mode & 0o777, 0o755);
      const secretStats = await fs.stat(paths.secretsToml);
      assert.equal(secretStats.mode & 0o777, 0o600);
    });
  });

  it('leaves files untouched on a rerun and keeps edited secrets', async () => {
    await withTempDir('setupkit-gen-', async (root) => {
      const { workspace, catalogDir } = await prepareWorkspace(root);
      const paths = await runSetupInit(workspace);
      await fs.writeFile(paths.toolsYml, 'tools:\n  - gh\n');
      await runSetupGenerate(workspace, { builtinCatalogDir: catalogDir });

      const rerun = await runSetupGenerate(workspace, { builtinCatalogDir: catalogDir });
      assert.deepEqual(rerun.written, []);
      assert.deepEqual(rerun.unchanged, [paths.installSh, paths.varsToml, paths.secretsToml]);

      const edited = 'GH_TOKEN = "test-secret"\n';
      await fs.writeFile(paths.secretsToml, edited);
      await runSetupGenerate(workspace, { builtinCatalogDir: catalogDir });
      assert.equal(await fs.readFile(paths.secretsToml, 'utf8'), edited);
    });
  });

  it('writes nothing when an existing env document is malformed', async () => {
    await withTempDir('setupkit-gen-', async (root) => {
      const { workspace, catalogDir } = await prepareWorkspace(root);
      const paths = await runSetupInit(workspace);
      await fs.writeFile(paths.toolsYml, 'tools:\n  - gh\n');
      await fs.writeFile(paths.varsToml, 'not = [valid');

      await assert.rejects(runSetupGenerate(workspace, { builtinCatalogDir: catalogDir }), MalformedEnvTomlError);

      assert.equal(await fs.readFile(paths.varsToml, 'utf8'), 'not = [valid');
      await assert.rejects(fs.stat(paths.installSh));
      await assert.rejects(fs.stat(paths.secretsToml));
    });
  });

  it('picks up extra components from the catalog named in tools.yml', async () => {
    await withTempDir('setupkit-gen-', async (root) => {
      const { workspace, catalogDir } = await prepareWorkspace(root);
      const paths = await runSetupInit(workspace);
      await fs.mkdir(path.join(workspace, 'components'));
      await fs.writeFile(
        path.join(workspace, 'components', 'act.toml'),
        'dependencies = ["gh"]\ninstall = ["gh extension install nektos/gh-act"]\n'
      );
      await fs.writeFile(paths.toolsYml, 'tools:\n  - act\ncatalog: components\n');

      const result = await runSetupGenerate(workspace, { builtinCatalogDir: catalogDir });

      assert.deepEqual(result.order, ['git', 'gh', 'act']);
    });
  });
});

describe('setup list', () => {
  it('summarizes the catalog or describes one component', async () => {
    await withTempDir('setupkit-list-', async (root) => {
      const { workspace, catalogDir } = await prepareWorkspace(root);

      const summary = await runSetupList(workspace, { builtinCatalogDir: catalogDir });
      assert.equal(summary.kind, 'summary');
      if (summary.kind === 'summary') {
        assert.deepEqual(summary.components.map(c => c.id), ['gh', 'git']);
      }

      const detail = await runSetupList(workspace, { detail: 'gh', builtinCatalogDir: catalogDir });
      assert.equal(detail.kind, 'detail');
      if (detail.kind === 'detail') {
        assert.deepEqual(detail.component.dependencies, ['git']);
        assert.deepEqual(detail.component.envSpecs.map(spec => spec.name), ['GH_HOST', 'GH_TOKEN']);
      }
    });
  });

  it('includes components from the workspace catalog that gen would install', async () => {
    await withTempDir('setupkit-list-', async (root) => {
      const { workspace, catalogDir } = await prepareWorkspace(root);
      const paths = await runSetupInit(workspace);
      await fs.mkdir(path.join(workspace, 'components'));
      await fs.writeFile(
        path.join(workspace, 'components', 'act.toml'),
        'name = "act"\ndescription = "Run workflows locally"\ndependencies = ["gh"]\n'
      );
      await fs.writeFile(paths.toolsYml, 'tools: []\ncatalog: components\n');

      const summary = await runSetupList(workspace, { builtinCatalogDir: catalogDir });
      assert.equal(summary.kind, 'summary');
      if (summary.kind === 'summary') {
        assert.deepEqual(summary.components.map(c => c.id), ['act', 'gh', 'git']);
      }

      const detail = await runSetupList(workspace, { detail: 'act', builtinCatalogDir: catalogDir });
      assert.equal(detail.kind, 'detail');
      if (detail.kind === 'detail') {
        assert.equal(detail.component.description, 'Run workflows locally');
        assert.deepEqual(detail.component.dependencies, ['gh']);
      }
    });
  });
});
