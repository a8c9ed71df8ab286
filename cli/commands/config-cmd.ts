/**
 * Config commands - show effective configuration
 */
import type { Command } from 'commander';
import { ConfigError } from '../lib/errors.js';
import { configExists, getConfigDisplay, getConfigPath } from '../managers/config-manager.js';
import type { ConfigDisplayItem, GlanceConfig } from '../lib/types/config.js';
import { fail, jsonOut, loadConfigWithLogging } from './helpers.js';

export function registerConfigCommands(program: Command) {
  program.command('config')
    .description('Show effective configuration (file merged over defaults)')
    .option('--json', 'JSON output')
    .action((options: { json?: boolean }) => {
      let config: GlanceConfig;
      try {
        config = loadConfigWithLogging();
      } catch (e) {
        if (e instanceof ConfigError) fail(e.message);
        throw e;
      }
      const display = getConfigDisplay(config);

      if (options.json) {
        jsonOut({
          configFile: getConfigPath(),
          configExists: configExists(),
          settings: display,
          modules: Object.keys(config.modules)
        });
        return;
      }

      // YAML-style output
      console.log('# Glance Configuration\n');
      console.log(`# config_file: ${getConfigPath()} ${configExists() ? '✓' : '(using defaults)'}`);

      // Group settings by section
      const sections: Record<string, ConfigDisplayItem[]> = {};
      for (const item of display) {
        const [section] = item.key.split('.');
        if (!sections[section]) sections[section] = [];
        sections[section].push(item);
      }

      for (const [section, items] of Object.entries(sections)) {
        console.log(`\n${section}:`);
        for (const item of items) {
          const keyName = item.key.split('.').slice(1).join('.');
          const marker = item.isDefault ? '' : '  # (custom)';
          const valuesHint = item.values ? ` [${item.values.join('|')}]` : '';
          console.log(`  ${keyName}: ${JSON.stringify(item.value)}${marker}`);
          console.log(`    # ${item.description}${valuesHint}`);
        }
      }

      console.log('\nmodules:');
      const names = Object.keys(config.modules);
      if (names.length === 0) console.log('  # (none)');
      for (const name of names) console.log(`  ${name}`);
    });
}
