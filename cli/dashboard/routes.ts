/**
 * Dashboard routes
 *
 *   GET  /              HTML page (?theme=light|dark)
 *   GET  /api/layout    latest layout as JSON (refreshes first if none yet)
 *   POST /api/refresh   refresh now, return layout (?redirect=1 goes back to /)
 *   GET  /api/modules   module list with metadata
 */
import { html, json, redirect } from './server.js';
import type { RouteHandler } from './server.js';
import { renderPage } from './lib/render.js';
import type { RefreshScheduler } from './scheduler.js';
import { toTheme } from '../managers/config-manager.js';
import type { GlanceConfig } from '../lib/types/config.js';
import type { DashboardModule } from '../lib/types/module.js';

export interface RouteContext {
  scheduler: RefreshScheduler;
  config: GlanceConfig;
  modules: readonly DashboardModule[];
  /** Page template override (tests) */
  template?: string;
}

export function createRoutes(ctx: RouteContext): Record<string, RouteHandler> {
  const currentLayout = async () => ctx.scheduler.layout ?? ctx.scheduler.refreshNow();

  return {
    'GET /': async (_req, res, url) => {
      const layout = await currentLayout();
      const page = renderPage(layout, {
        title: ctx.config.dashboard.title,
        theme: toTheme(url.searchParams.get('theme') ?? undefined, ctx.config.dashboard.theme),
        refreshInterval: ctx.scheduler.interval
      }, ctx.template);
      html(res, page);
    },

    'GET /api/layout': async (_req, res) => {
      json(res, await currentLayout());
    },

    'POST /api/refresh': async (_req, res, url) => {
      const layout = await ctx.scheduler.refreshNow();
      if (url.searchParams.get('redirect') === '1') {
        redirect(res, '/');
        return;
      }
      json(res, layout);
    },

    'GET /api/modules': (_req, res) => {
      json(res, ctx.modules.map(m => ({ name: m.name, title: m.title, ...m.info })));
    }
  };
}
