/**
 * @fileoverview Command setup for 'setupkit setup'
 *
 * init: scaffold .setup/, list: show the component catalog,
 * gen: write install.sh, vars.toml and secrets.toml.
 */

import { Command } from 'commander';
import { relative, resolve } from 'path';
import type { ComponentDetail, ComponentSummary } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runSetupGenerate, runSetupInit, runSetupList } from '../core/setup/setup-pipeline.js';

interface ListOptions {
  detail?: string;
}

const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

function dim(text: string): string {
  return `${DIM}${text}${RESET}`;
}

function printSummaries(components: ComponentSummary[]): void {
  if (components.length === 0) {
    console.log('No setup components available.');
    return;
  }
  const width = Math.max(...components.map(component => component.id.length));
  for (const component of components) {
    console.log(`${component.id.padEnd(width)}  ${dim(component.description || component.displayName)}`);
  }
}

function printDetail(component: ComponentDetail): void {
  console.log(`${component.displayName} (${component.id})`);
  if (component.description) {
    console.log(component.description);
  }
  console.log('');
  console.log(`Dependencies: ${component.dependencies.length > 0 ? component.dependencies.join(', ') : 'none'}`);

  if (component.envSpecs.length > 0) {
    console.log('Environment:');
    for (const spec of component.envSpecs) {
      const suffix = spec.default !== undefined ? ` (default: ${spec.default})` : '';
      const kind = spec.secret ? ' [secret]' : '';
      console.log(`  ${spec.name}${kind}${suffix}${spec.description ? ` ${dim(spec.description)}` : ''}`);
    }
  }

  console.log('Install steps:');
  for (const step of component.installSteps) {
    console.log(`  ${step}`);
  }
}

function resolveCwd(command: Command): string {
  const cwd: unknown = command.optsWithGlobals().cwd;
  return typeof cwd === 'string' ? resolve(cwd) : process.cwd();
}

/**
 * Setup the 'setupkit setup' command group
 */
export function setupSetupCommand(program: Command): void {
  const setup = program
    .command('setup')
    .description('Resolve setup components and generate install artifacts');

  setup
    .command('init')
    .description('Create .setup/ with a tools.yml template')
    .action(
      withErrorHandling(async (_options: object, command: Command) => {
        const cwd = resolveCwd(command);
        const paths = await runSetupInit(cwd);
        console.log(`✓ Created ${relative(cwd, paths.toolsYml)}`);
        console.log(`✓ Created ${relative(cwd, paths.gitignore)}`);
      })
    );

  setup
    .command('list')
    .description('List available setup components')
    .option('--detail <component>', 'show details for one component')
    .action(
      withErrorHandling(async (options: ListOptions, command: Command) => {
        const result = await runSetupList(resolveCwd(command), { detail: options.detail });
        if (result.kind === 'detail') {
          printDetail(result.component);
        } else {
          printSummaries(result.components);
        }
      })
    );

  setup
    .command('gen')
    .description('Generate install.sh, vars.toml and secrets.toml from tools.yml')
    .action(
      withErrorHandling(async (_options: object, command: Command) => {
        const cwd = resolveCwd(command);
        const result = await runSetupGenerate(cwd);

        console.log(`✓ Install order: ${result.order.join(' -> ')}`);
        for (const path of result.written) {
          console.log(`✓ Wrote ${relative(cwd, path)}`);
        }
        for (const path of result.unchanged) {
          console.log(dim(`  ${relative(cwd, path)} unchanged`));
        }
        for (const name of result.misplaced) {
          console.log(`⚠️  ${name} is stored in the other env document; move it by hand if needed`);
        }
      })
    );
}
