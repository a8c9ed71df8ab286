/**
 * serve command - local web dashboard with timed refresh
 */
import type { Command } from 'commander';
import { createServer } from '../dashboard/server.js';
import { createRoutes } from '../dashboard/routes.js';
import { RefreshScheduler } from '../dashboard/scheduler.js';
import { logInfo } from '../lib/logger.js';
import { CONFIG_SCHEMA } from '../managers/config-manager.js';
import { fail, startDashboard } from './helpers.js';

/**
 * Flag value bounded like the config key it overrides
 */
function parseBounded(value: string, flag: string, configKey: string): number {
  const max = CONFIG_SCHEMA[configKey].max ?? Number.MAX_SAFE_INTEGER;
  const n = parseInt(value, 10);
  if (isNaN(n) || n < 0 || n > max) fail(`${flag} expects an integer from 0 to ${max}, got ${value}`);
  return n;
}

export function registerServeCommand(program: Command) {
  program.command('serve')
    .description('Serve the dashboard on http://127.0.0.1 and refresh it on a timer')
    .option('-p, --port <port>', 'Port (default: dashboard.port)')
    .option('-i, --interval <seconds>', 'Refresh interval, 0 = manual (default: dashboard.refresh_interval)')
    .action(async (options: { port?: string; interval?: string }) => {
      const { config, dashboard } = startDashboard();
      const port = options.port !== undefined ? parseBounded(options.port, '--port', 'dashboard.port') : config.dashboard.port;
      const interval = options.interval !== undefined
        ? parseBounded(options.interval, '--interval', 'dashboard.refresh_interval')
        : config.dashboard.refresh_interval;

      const scheduler = new RefreshScheduler(dashboard);
      await scheduler.start(interval);

      const server = createServer(port, createRoutes({ scheduler, config, modules: dashboard.getModules() }));
      server.start(actualPort => {
        console.log(`Dashboard: http://127.0.0.1:${actualPort}`);
        console.log(interval > 0 ? `  Refresh: every ${interval}s` : '  Refresh: manual');
      });

      const shutdown = () => {
        logInfo('Shutting down');
        scheduler.stop();
        dashboard.cleanup();
        server.stop(() => process.exit(0));
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
}
