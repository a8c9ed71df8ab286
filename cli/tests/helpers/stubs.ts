/**
 * Stub modules for dashboard tests
 */
import { setTimeout as sleep } from 'node:timers/promises';
import { ModuleError } from '../../lib/errors.js';
import type { DashboardModule, DataRecord } from '../../lib/types/module.js';

export interface StubOptions {
  /** Record to return, or the error to fail with */
  result: DataRecord | Error;
  delayMs?: number;
  /** Receives "start <name>" / "end <name>" / "init <name>" / "cleanup <name>" */
  events?: string[];
  render?: (record: DataRecord) => string;
}

export function stubModule(name: string, title: string, options: StubOptions): DashboardModule {
  const events = options.events ?? [];
  const result = options.result;
  return {
    name,
    title,
    info: { version: '0.1', description: `${title} stub`, author: 'tests' },
    async fetch() {
      events.push(`start ${name}`);
      if (options.delayMs) await sleep(options.delayMs);
      events.push(`end ${name}`);
      if (result instanceof Error) throw new ModuleError(name, result);
      return result;
    },
    render(record) {
      return options.render ? options.render(record) : `${title}: ${JSON.stringify(record)}`;
    },
    init() {
      events.push(`init ${name}`);
    },
    cleanup() {
      events.push(`cleanup ${name}`);
    }
  };
}
