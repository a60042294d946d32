/**
 * Collector Service
 *
 * Accepts the external collector's per-provider payloads and records them as
 * snapshots. Fetching is the collector's job; this side validates, normalizes
 * and stores.
 */

import { createSnapshot } from '../core/records.js';
import type { JsonValue, Snapshot } from '../core/types.js';
import { normalizeGameFields } from '../comparison/normalizers.js';
import type { LedgerStorage } from '../storage/LedgerStorage.js';
import { CollectorPayloadSchema, parsePayload } from '../validation/schemas.js';
import { runBatch, type BatchOptions, type BatchReport } from './BatchRunner.js';

export interface CollectResult {
  snapshot: Snapshot;
  created: boolean;
}

export class CollectorService {
  private storage: LedgerStorage;
  private schemaVersion: string;

  constructor(storage: LedgerStorage, schemaVersion: string) {
    this.storage = storage;
    this.schemaVersion = schemaVersion;
  }

  collect(payload: unknown, now: Date = new Date()): CollectResult {
    const input = parsePayload(CollectorPayloadSchema, payload, 'snapshot');
    const { sportsbook, predictionMarket } = input.sources;

    const rawPayloads: Record<string, JsonValue> = {};
    const sourceVersions: Record<string, string> = {};
    if (sportsbook) {
      rawPayloads.sportsbook = sportsbook.payload;
      sourceVersions.sportsbook = sportsbook.version;
    }
    if (predictionMarket) {
      rawPayloads.predictionMarket = predictionMarket.payload;
      sourceVersions.predictionMarket = predictionMarket.version;
    }

    const normalizedFields = normalizeGameFields({
      sportsbook: sportsbook?.payload,
      predictionMarket: predictionMarket?.payload,
      homeTeam: input.homeTeam,
      awayTeam: input.awayTeam
    });

    const snapshot = createSnapshot({
      gameId: input.gameId,
      collectedAt: input.collectedAt ?? now,
      schemaVersion: this.schemaVersion,
      sourceVersions,
      rawPayloads,
      normalizedFields
    });

    const result = this.storage.insertSnapshot(snapshot);
    if (!result.created) {
      console.log(`[CollectorService] Snapshot for ${input.gameId} already recorded as ${result.record.snapshotId}`);
    }
    return { snapshot: result.record, created: result.created };
  }

  /**
   * Record several payloads; one bad payload does not stop the rest
   */
  collectMany(payloads: readonly unknown[], options: BatchOptions = {}): Promise<BatchReport<Snapshot>> {
    const units = payloads.map((_, index) => `payload[${index}]`);
    return runBatch(units, (unit) => {
      const index = units.indexOf(unit);
      const { snapshot, created } = this.collect(payloads[index]);
      return created
        ? { status: 'succeeded', value: snapshot, detail: `${snapshot.gameId} ${snapshot.snapshotId}` }
        : { status: 'skipped', value: snapshot, detail: `${snapshot.gameId} already recorded` };
    }, options);
  }
}
