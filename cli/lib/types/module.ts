/**
 * Module, record and layout types
 */
import type { ModuleSettings } from './config.js';
import type { FetchFn } from '../http.js';

export type DataValue = string | number | boolean | null | DataValue[] | { [key: string]: DataValue };

/** Parsed result of a single external fetch */
export type DataRecord = Record<string, DataValue>;

export interface ModuleInfo {
  version: string;
  description: string;
  author: string;
}

/**
 * A dashboard widget: one data fetch paired with one render step.
 */
export interface DashboardModule {
  /** Registry key */
  readonly name: string;
  /** Display name used in fragments and placeholders */
  readonly title: string;
  readonly info: ModuleInfo;
  /** Rejects with ModuleError */
  fetch(): Promise<DataRecord>;
  /** Pure: same record, same output */
  render(record: DataRecord): string;
  init(): void;
  cleanup(): void;
}

/** Everything a module factory gets from the dashboard */
export interface ModuleContext {
  name: string;
  settings: ModuleSettings;
  /** Per-request timeout in milliseconds (0 = none) */
  timeoutMs: number;
  fetchFn?: FetchFn;
}

export type ModuleFactory = (context: ModuleContext) => DashboardModule;

export interface Fragment {
  module: string;
  title: string;
  content: string;
  ok: boolean;
  error?: string;
}

export interface LayoutGrid {
  rows: number;
  cols: number;
}

export interface DashboardLayout {
  generatedAt: string;
  fragments: Fragment[];
  grid: LayoutGrid;
}
