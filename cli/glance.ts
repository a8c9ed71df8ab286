#!/usr/bin/env node
/**
 * Glance CLI - a small dashboard over third-party data APIs
 *
 *   glance run [--json] [--concurrent]     One refresh, printed
 *   glance serve [--port n] [--interval s] Local web page, timed refresh
 *   glance modules                         Registered modules
 *   glance config                          Effective configuration
 *
 * Global options (before or after the command):
 *   --config <path>              Config file (default: GLANCE_CONFIG or ./glance.yaml)
 *   --with-config <key=value>    Override a config value (repeatable)
 *   --debug                      Debug logging
 */
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { program } from 'commander';
import { ConfigError } from './lib/errors.js';
import { parseConfigOverride, setConfigOverrides, setConfigPath } from './managers/config-manager.js';
import type { ConfigOverrides } from './lib/types/config.js';
import { fail, setDebug } from './commands/helpers.js';
import { registerRunCommand } from './commands/run.js';
import { registerServeCommand } from './commands/serve.js';
import { registerModulesCommand } from './commands/modules.js';
import { registerConfigCommands } from './commands/config-cmd.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function getCliVersion(): string {
  // cli/ in source, dist/cli/ when built
  for (const candidate of ['../package.json', '../../package.json']) {
    const pkgPath = path.resolve(__dirname, candidate);
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    }
  }
  return '0.0.0';
}

const args = process.argv.slice(2);

// Extract --config flag manually (before commander parses)
const configIdx = args.indexOf('--config');
if (configIdx !== -1) {
  if (!args[configIdx + 1]) fail('--config requires a path');
  setConfigPath(args[configIdx + 1]);
  args.splice(configIdx, 2);
}

// Extract --debug
const debugIdx = args.indexOf('--debug');
if (debugIdx !== -1) {
  setDebug(true);
  args.splice(debugIdx, 1);
}

// Extract --with-config flags (repeatable)
const configOverrides: ConfigOverrides = {};
let overrideIdx = args.indexOf('--with-config');
while (overrideIdx !== -1) {
  const raw = args[overrideIdx + 1];
  if (!raw) fail('--with-config requires a value (e.g., --with-config dashboard.theme=dark)');
  try {
    const parsed = parseConfigOverride(raw);
    configOverrides[parsed.key] = parsed.value;
  } catch (e) {
    if (e instanceof ConfigError) fail(e.message);
    throw e;
  }
  args.splice(overrideIdx, 2);
  overrideIdx = args.indexOf('--with-config');
}
if (Object.keys(configOverrides).length > 0) {
  setConfigOverrides(configOverrides);
}

program
  .name('glance')
  .description('Minimal dashboard over third-party data APIs')
  .version(getCliVersion())
  .addHelpText('after', `
Global Options:
  --config <path>            Config file (default: GLANCE_CONFIG or ./glance.yaml)
  --with-config <key=value>  Override config value (repeatable)
  --debug                    Debug logging
`);

registerRunCommand(program);
registerServeCommand(program);
registerModulesCommand(program);
registerConfigCommands(program);

if (args.length === 0) {
  program.help();
}

program.parseAsync(['node', 'glance', ...args]).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
