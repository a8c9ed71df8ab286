/**
 * Fragment templates (LiquidJS)
 */
import { Liquid } from 'liquidjs';
import type { DataRecord } from './types/module.js';

// Singleton Liquid engine
let liquidEngine: Liquid | null = null;

function getLiquid(): Liquid {
  if (!liquidEngine) {
    liquidEngine = new Liquid({
      strictVariables: false,  // Missing fields render as empty
      strictFilters: true,
      trimTagLeft: true,
      trimTagRight: true
    });
  }
  return liquidEngine;
}

/**
 * Render a fragment template against a record. Synchronous and side-effect free.
 */
export function renderTemplate(template: string, record: DataRecord): string {
  const output: unknown = getLiquid().parseAndRenderSync(template, record);
  return String(output).trim();
}
