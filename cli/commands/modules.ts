/**
 * modules command - list registered modules and their state
 */
import type { Command } from 'commander';
import { ConfigError } from '../lib/errors.js';
import { getModuleStatuses } from '../managers/dashboard-manager.js';
import type { ModuleStatus } from '../managers/dashboard-manager.js';
import { createRegistry, fail, jsonOut, loadConfigWithLogging } from './helpers.js';

export function registerModulesCommand(program: Command) {
  program.command('modules')
    .description('List registered modules and whether the config enables them')
    .option('--json', 'JSON output')
    .action((options: { json?: boolean }) => {
      let statuses: ModuleStatus[];
      try {
        statuses = getModuleStatuses(loadConfigWithLogging(), createRegistry());
      } catch (e) {
        if (e instanceof ConfigError) fail(e.message);
        throw e;
      }

      if (options.json) {
        jsonOut(statuses);
        return;
      }
      for (const s of statuses) {
        const state = !s.registered ? 'unknown' : s.enabled ? 'enabled' : 'disabled';
        console.log(`${s.name.padEnd(16)} ${state}`);
      }
    });
}
