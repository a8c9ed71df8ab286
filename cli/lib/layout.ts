/**
 * Layout helpers
 *
 * PURE LIB: grid math and text output, no I/O.
 */
import type { DashboardLayout, Fragment, LayoutGrid } from './types/module.js';

/**
 * Grid for n slots: floor(n/2) columns, at least one.
 *   3 → 3 rows x 1 col, 4 → 2x2, 5 → 3x2, 6 → 2x3
 */
export function computeGrid(count: number): LayoutGrid {
  if (count <= 0) return { rows: 0, cols: 0 };
  const cols = Math.min(count, Math.max(Math.floor(count / 2), 1));
  const rows = Math.ceil(count / cols);
  return { rows, cols };
}

export function buildLayout(fragments: Fragment[], now = new Date()): DashboardLayout {
  return {
    generatedAt: now.toISOString(),
    fragments,
    grid: computeGrid(fragments.length)
  };
}

export function placeholderFor(title: string): string {
  return `${title}: unavailable`;
}

/**
 * "stock_quotes" → "Stock Quotes"
 */
export function titleFromName(name: string): string {
  return name
    .split(/[_\s]+/)
    .filter(Boolean)
    .map(w => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(' ');
}

/**
 * One fragment per line, in layout order
 */
export function renderLayoutText(layout: DashboardLayout): string {
  return layout.fragments.map(f => f.content).join('\n');
}
