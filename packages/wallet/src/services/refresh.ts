/**
 * Offer refresh job and its schedule
 */

import type { OfferProvider, OfferSink, RefreshSummary } from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export function daysToMs(days: number): number {
  return days * DAY_MS;
}

/**
 * Pull every provider in turn and replace its offers. A failing provider is
 * logged and recorded; the remaining providers still run.
 */
export async function refreshOffers(
  sink: OfferSink,
  providers: readonly OfferProvider[]
): Promise<readonly RefreshSummary[]> {
  const summaries: RefreshSummary[] = [];

  for (const provider of providers) {
    try {
      const offers = await provider.fetchOffers();
      await sink.replaceOffers(provider.source, offers);

      const detail = `offers=${offers.length}`;
      await sink.logRefresh(provider.source, 'ok', detail);
      console.log(`[Refresh] ${provider.source}: ${detail}`);
      summaries.push({ source: provider.source, status: 'ok', offerCount: offers.length, detail });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Refresh] Error (${provider.source}):`, message);
      await sink.logRefresh(provider.source, 'failed', message);
      summaries.push({ source: provider.source, status: 'failed', offerCount: 0, detail: message });
    }
  }

  return summaries;
}

export interface RefreshSchedule {
  stop(): void;
}

/**
 * Refresh now, then every `intervalMs`. A tick that fires while the previous
 * refresh is still running is skipped.
 */
export function startRefreshSchedule(
  sink: OfferSink,
  providers: readonly OfferProvider[],
  options: { readonly intervalMs: number }
): RefreshSchedule {
  let running = false;

  const tick = (): void => {
    if (running) return;
    running = true;
    refreshOffers(sink, providers)
      .catch((error: unknown) => {
        console.error('[Refresh] Error:', error instanceof Error ? error.message : error);
      })
      .finally(() => {
        running = false;
      });
  };

  tick();
  const timer = setInterval(tick, options.intervalMs);

  return {
    stop: () => clearInterval(timer),
  };
}
