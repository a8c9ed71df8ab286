/**
 * Refresh scheduler for serve mode
 *
 * Keeps the latest layout and refreshes it on a timer. Never runs two
 * refreshes at once: a call during a refresh gets the in-flight result.
 */
import type { DashboardLayout } from '../lib/types/module.js';
import { logDebug, logError } from '../lib/logger.js';

/** Longest delay a Node timer takes (2^31 - 1 ms) */
export const MAX_INTERVAL_SECONDS = Math.floor(0x7fffffff / 1000);

/** The part of Dashboard the scheduler needs */
export interface Refreshable {
  refresh(): Promise<DashboardLayout>;
}

export class RefreshScheduler {
  private latest: DashboardLayout | null = null;
  private inFlight: Promise<DashboardLayout> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private intervalSeconds = 0;

  constructor(private dashboard: Refreshable) {}

  get layout(): DashboardLayout | null {
    return this.latest;
  }

  get interval(): number {
    return this.intervalSeconds;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Refresh now, or join the refresh already running
   */
  refreshNow(): Promise<DashboardLayout> {
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.dashboard.refresh()
      .then(layout => {
        this.latest = layout;
        return layout;
      })
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }

  /**
   * Refresh once, then every `intervalSeconds` (0 = manual only)
   * @throws RangeError when the interval does not fit a timer
   */
  start(intervalSeconds: number): Promise<DashboardLayout> {
    if (!Number.isFinite(intervalSeconds) || intervalSeconds < 0 || intervalSeconds > MAX_INTERVAL_SECONDS) {
      throw new RangeError(`Refresh interval must be between 0 and ${MAX_INTERVAL_SECONDS} seconds, got ${intervalSeconds}`);
    }
    this.stop();
    this.intervalSeconds = intervalSeconds;
    if (intervalSeconds > 0) {
      this.timer = setInterval(() => {
        logDebug('Scheduled refresh');
        this.refreshNow().catch(err => logError('Scheduled refresh failed', { error: String(err) }));
      }, intervalSeconds * 1000);
      this.timer.unref();
    }
    return this.refreshNow();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
