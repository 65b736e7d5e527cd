/**
 * install.sh rendering.
 *
 * Output is a pure function of (order, catalog): callers hash it to detect
 * drift against the file on disk, so nothing time- or environment-dependent
 * may be emitted here.
 */

import type { Catalog, ResolvedOrder, SetupComponent } from '../../types/index.js';
import { ComponentNotFoundError } from '../../utils/errors.js';

export const INSTALL_SCRIPT_PREAMBLE = [
  '#!/usr/bin/env bash',
  '# Generated by setupkit. Regenerate with `setupkit setup gen` instead of editing.',
  'set -euo pipefail',
  ''
].join('\n');

export function componentBannerStart(id: string): string {
  return `# >>> component: ${id}`;
}

export function componentBannerEnd(id: string): string {
  return `# <<< component: ${id}`;
}

function renderComponentBlock(component: SetupComponent): string {
  const lines = [componentBannerStart(component.id)];
  if (component.installSteps.length === 0) {
    lines.push(`# ${component.id} declares no install steps`);
  }
  lines.push(...component.installSteps);
  lines.push(componentBannerEnd(component.id));
  return lines.join('\n');
}

/**
 * Render the install script for an already-resolved order
 */
export function generateInstallScript(order: ResolvedOrder, catalog: Catalog): string {
  const blocks = order.map(id => {
    const component = catalog.get(id);
    if (!component) {
      throw new ComponentNotFoundError(id, [...catalog.keys()].sort());
    }
    return renderComponentBlock(component);
  });

  if (blocks.length === 0) {
    return INSTALL_SCRIPT_PREAMBLE;
  }
  return `${INSTALL_SCRIPT_PREAMBLE}\n${blocks.join('\n\n')}\n`;
}
