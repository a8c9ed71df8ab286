/**
 * run command - one refresh, printed to stdout
 */
import type { Command } from 'commander';
import { renderLayoutText } from '../lib/layout.js';
import { setConfigOverrides } from '../managers/config-manager.js';
import { jsonOut, startDashboard } from './helpers.js';

export function registerRunCommand(program: Command) {
  program.command('run')
    .description('Refresh every module once and print the dashboard')
    .option('--json', 'JSON output (full layout)')
    .option('--concurrent', 'Fetch all modules at once')
    .action(async (options: { json?: boolean; concurrent?: boolean }) => {
      if (options.concurrent) {
        setConfigOverrides({ 'dashboard.concurrent': true });
      }
      const { dashboard } = startDashboard();
      try {
        const layout = await dashboard.refresh();
        if (options.json) {
          jsonOut(layout);
        } else {
          console.log(renderLayoutText(layout));
        }
      } finally {
        dashboard.cleanup();
      }
    });
}
