/**
 * History collector.
 *
 * Fetches per-entity history from the platform client concurrently and waits
 * for all of it before mining starts. The client itself lives outside this
 * package; anything implementing HistorySource will do.
 */

import { createEntityExclusion, type EntityExclusion } from './ha-domains.ts';
import type { RawHistoryEvent } from './history-normalizer.ts';
import type { Logger } from './logger.ts';

// ---------- public types ----------

/** Anything able to return one entity's history for a time range. */
export interface HistorySource {
  getHistory(entityId: string, start: Date, end: Date): Promise<RawHistoryEvent[]>;
}

export interface HistoryRequest {
  entity_ids: readonly string[];
  start: Date;
  end: Date;
}

export interface CollectedHistory {
  /** Grouped rows, ready for normalizeHistory. */
  history: Record<string, RawHistoryEvent[]>;
  /** Entities whose retrieval failed, with the error message. */
  failed: Array<{ entity_id: string; error: string }>;
  /** Entities not fetched because they are excluded. */
  skipped: string[];
}

export interface CollectOptions {
  exclude?: EntityExclusion;
  logger?: Logger;
}

// ---------- collectHistory ----------

/**
 * Fetch history for every requested entity. A failing entity is logged and
 * reported in `failed`; the others are still returned.
 */
export async function collectHistory(
  source: HistorySource,
  request: HistoryRequest,
  options?: CollectOptions,
): Promise<CollectedHistory> {
  const isExcluded = createEntityExclusion(options?.exclude ?? {});
  const wanted = [...new Set(request.entity_ids)];
  const skipped = wanted.filter(isExcluded);
  const targets = wanted.filter((id) => !isExcluded(id));

  const results = await Promise.allSettled(
    targets.map((entityId) => source.getHistory(entityId, request.start, request.end)),
  );

  const history: Record<string, RawHistoryEvent[]> = {};
  const failed: CollectedHistory['failed'] = [];

  results.forEach((result, index) => {
    const entityId = targets[index];
    if (result.status === 'fulfilled') {
      if (result.value.length > 0) {
        history[entityId] = result.value;
      }
      return;
    }

    const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
    options?.logger?.warn('Error getting history', { entity_id: entityId, error: message });
    failed.push({ entity_id: entityId, error: message });
  });

  return { history, failed, skipped };
}
