/**
 * Dashboard render helpers
 */
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { ThemeName } from '../../lib/types/config.js';
import type { DashboardLayout, Fragment } from '../../lib/types/module.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Find views directory (works in both dev and dist)
 */
export function getViewsDir(): string {
  // dashboard/views from dashboard/lib (source tree, or dist when views were copied)
  const views = path.join(__dirname, '..', 'views');
  if (fs.existsSync(views)) return views;

  // Source location from dist/cli/dashboard/lib
  const srcViews = path.resolve(__dirname, '../../../../cli/dashboard/views');
  if (fs.existsSync(srcViews)) return srcViews;

  return views;
}

/**
 * Load HTML template
 */
export function loadView(name: string): string {
  const viewPath = path.join(getViewsDir(), `${name}.html`);
  return fs.readFileSync(viewPath, 'utf8');
}

/**
 * Simple {{var}} replacement
 */
export function render(template: string, data: Record<string, unknown>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (_, key: string) => {
    const value = data[key];
    return value !== undefined ? String(value) : '';
  });
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Get fragment CSS class
 */
export function getFragmentClass(fragment: Fragment): string {
  return fragment.ok ? 'fragment' : 'fragment unavailable';
}

export function renderFragment(fragment: Fragment): string {
  const title = fragment.error ? ` title="${escapeHtml(fragment.error)}"` : '';
  return `<section class="${getFragmentClass(fragment)}" data-module="${escapeHtml(fragment.module)}"${title}>${escapeHtml(fragment.content)}</section>`;
}

export interface PageOptions {
  title: string;
  theme: ThemeName;
  /** Seconds; 0 = no auto reload */
  refreshInterval: number;
}

/**
 * Render the full dashboard page
 */
export function renderPage(layout: DashboardLayout, options: PageOptions, template = loadView('index')): string {
  const refreshMeta = options.refreshInterval > 0
    ? `<meta http-equiv="refresh" content="${options.refreshInterval}">`
    : '';
  return render(template, {
    title: escapeHtml(options.title),
    theme: options.theme,
    refreshMeta,
    cols: Math.max(layout.grid.cols, 1),
    fragments: layout.fragments.map(renderFragment).join('\n    '),
    generatedAt: escapeHtml(layout.generatedAt)
  });
}
