/**
 * Install / Uninstall Overlay tools - Administrative; registered only when
 * ENABLE_ADMIN_TOOLS is set
 */

import { getCatalogSettings } from '../config.js';
import { getCatalogDatabase } from '../database/pg-catalog.js';
import { install } from '../orchestrator/install.js';
import { provision } from '../orchestrator/provision.js';
import { TEARDOWN_ORDER, uninstall } from '../orchestrator/uninstall.js';
import type { ToolResponse } from '../types/index.js';
import { errorResult, textResult } from './shared.js';

interface InstallOverlayToolInput {
  provision: boolean;
}

export async function executeInstallOverlayTool(input: InstallOverlayToolInput): Promise<ToolResponse> {
  try {
    const settings = getCatalogSettings();
    const db = getCatalogDatabase();
    const lines: string[] = ['# Overlay Installed', ''];

    if (input.provision) {
      const provisioned = await provision(db, settings);
      lines.push(`- **Extended tables created**: ${provisioned.created.join(', ') || 'none'}`);
    }

    const report = await install(db, settings);
    lines.push(`- **Merge views**: ${report.merged.join(', ') || 'none'}`);
    lines.push(`- **Aliases**: ${report.aliased.length}`);

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('installing overlay', error);
  }
}

export async function executeUninstallOverlayTool(_input: Record<string, never>): Promise<ToolResponse> {
  try {
    const report = await uninstall(getCatalogDatabase(), getCatalogSettings());

    const lines: string[] = ['# Overlay Removed', ''];
    for (const group of TEARDOWN_ORDER) {
      lines.push(`- **${group}**: ${report.dropped[group].length}`);
    }

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('uninstalling overlay', error);
  }
}
