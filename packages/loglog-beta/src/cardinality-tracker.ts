import type {LogContext} from '@rocicorp/logger';
import {InvalidSketchDataError, PrecisionMismatchError} from './errors.ts';
import type {Hashable, Hasher} from './hash.ts';
import {LogLogBeta} from './loglog-beta.ts';
import {precisionForErrorRate} from './precision.ts';
import {sketchJSONSchema} from './serialization.ts';
import * as v from '../../shared/src/valita.ts';

/**
 * Confidence level for cardinality estimates.
 */
export type Confidence = 'high' | 'med' | 'none';

/**
 * Result of a cardinality query.
 */
export interface CardinalityResult {
  /** Estimated number of distinct items */
  cardinality: number;
  /** Number of inserts, including duplicates */
  observations: number;
  /** Relative standard error of the sketch */
  standardError: number;
  /** Confidence level based on the estimated cardinality */
  confidence: Confidence;
}

const SNAPSHOT_VERSION = 1;

export const trackerSnapshotSchema = v.object({
  version: v.literal(SNAPSHOT_VERSION),
  precision: v.number(),
  /** Map of key -> serialized sketch */
  sketches: v.record(sketchJSONSchema),
  /** Map of key -> number of inserts */
  observations: v.record(v.number()),
});

/**
 * Snapshot of all sketches of a tracker, for persistence or for shipping a
 * shard's counts to the process that merges them.
 */
export type TrackerSnapshot = v.Infer<typeof trackerSnapshotSchema>;

// Confidence thresholds
const HIGH_CONFIDENCE_THRESHOLD = 1000;
const MED_CONFIDENCE_THRESHOLD = 100;

export type CardinalityTrackerOptions = {
  errorRate: number;
  hasher?: Hasher | undefined;
};

/**
 * Maintains one LogLog-Beta sketch per key, e.g. distinct visitors per page.
 * All sketches share one precision, derived from the configured error rate,
 * so trackers built with the same options can be merged.
 *
 * Features:
 * - Streaming updates
 * - Per-key cardinality estimates
 * - Merging of trackers (sharded accumulation)
 * - Snapshot/restore for persistence
 */
export class CardinalityTracker {
  readonly #lc: LogContext;
  readonly #precision: number;
  readonly #hasher: Hasher | undefined;

  /**
   * Map of key -> sketch
   */
  readonly #sketches = new Map<string, LogLogBeta>();

  /**
   * Map of key -> number of inserts
   */
  readonly #observations = new Map<string, number>();

  /**
   * @throws InvalidErrorRateError if `errorRate` is not usable.
   */
  constructor(lc: LogContext, {errorRate, hasher}: CardinalityTrackerOptions) {
    this.#precision = precisionForErrorRate(errorRate);
    this.#hasher = hasher;
    this.#lc = lc.withContext('component', 'cardinality-tracker');
    this.#lc.debug?.(
      `tracking with precision ${this.#precision} for error rate ${errorRate}`,
    );
  }

  get precision(): number {
    return this.#precision;
  }

  /**
   * Record an occurrence of `item` under `key`.
   */
  observe(key: string, item: Hashable): void {
    this.#getOrCreateSketch(key).insert(item);
    this.#observations.set(key, (this.#observations.get(key) ?? 0) + 1);
  }

  observeAll(key: string, items: Iterable<Hashable>): void {
    const sketch = this.#getOrCreateSketch(key);
    let n = 0;
    for (const item of items) {
      sketch.insert(item);
      n++;
    }
    this.#observations.set(key, (this.#observations.get(key) ?? 0) + n);
  }

  /**
   * Get the cardinality estimate for a key. Unknown keys have a cardinality
   * of 0.
   */
  estimate(key: string): CardinalityResult {
    const sketch = this.#sketches.get(key);
    const observations = this.#observations.get(key) ?? 0;
    const cardinality = sketch ? sketch.estimate() : 0;
    return {
      cardinality,
      observations,
      standardError: sketch?.standardError ?? 0,
      confidence: sketch ? this.#getConfidence(cardinality) : 'none',
    };
  }

  /**
   * Estimate of the number of distinct items across all keys.
   */
  estimateTotal(): number {
    const sketches = [...this.#sketches.values()];
    return sketches.length === 0 ? 0 : LogLogBeta.union(sketches).estimate();
  }

  /**
   * Get all keys currently tracked.
   */
  keys(): string[] {
    return [...this.#sketches.keys()];
  }

  /**
   * Stop tracking a key.
   */
  delete(key: string): boolean {
    this.#observations.delete(key);
    return this.#sketches.delete(key);
  }

  /**
   * Clear all sketches.
   */
  clear(): void {
    this.#sketches.clear();
    this.#observations.clear();
  }

  /**
   * Fold the sketches of another tracker (or of a snapshot of one) into this
   * tracker. Keys present on both sides are merged, and keys only present in
   * `other` are copied.
   *
   * @throws PrecisionMismatchError if the precisions differ. Nothing is
   *   merged in that case.
   */
  merge(other: CardinalityTracker | TrackerSnapshot): void {
    const incoming =
      other instanceof CardinalityTracker
        ? other.#entries()
        : this.#decode(other);
    if (incoming.precision !== this.#precision) {
      this.#lc.warn?.(
        `rejecting merge of precision ${incoming.precision} into ${this.#precision}`,
      );
      throw new PrecisionMismatchError(this.#precision, incoming.precision);
    }

    for (const [key, {sketch, observations}] of incoming.entries) {
      const existing = this.#sketches.get(key);
      if (existing) {
        existing.merge(sketch);
      } else {
        // Incoming sketches take this tracker's hasher.
        const copy = new LogLogBeta(this.#precision, {hasher: this.#hasher});
        copy.merge(sketch);
        this.#sketches.set(key, copy);
      }
      this.#observations.set(
        key,
        (this.#observations.get(key) ?? 0) + observations,
      );
    }
    this.#lc.debug?.(`merged ${incoming.entries.size} sketches`);
  }

  /**
   * Export snapshot of all sketches for persistence.
   */
  snapshot(): TrackerSnapshot {
    const sketches: TrackerSnapshot['sketches'] = {};
    const observations: Record<string, number> = {};
    for (const [key, sketch] of this.#sketches) {
      sketches[key] = sketch.toJSON();
      observations[key] = this.#observations.get(key) ?? 0;
    }
    return {
      version: SNAPSHOT_VERSION,
      precision: this.#precision,
      sketches,
      observations,
    };
  }

  /**
   * Replace all sketches with those of `snapshot`.
   *
   * @throws PrecisionMismatchError if the snapshot was taken with a
   *   different precision, in which case the tracker is left unchanged.
   */
  restore(snapshot: TrackerSnapshot): void {
    const {precision, entries} = this.#decode(snapshot);
    if (precision !== this.#precision) {
      throw new PrecisionMismatchError(this.#precision, precision);
    }
    this.clear();
    for (const [key, {sketch, observations}] of entries) {
      this.#sketches.set(key, sketch);
      this.#observations.set(key, observations);
    }
    this.#lc.debug?.(`restored ${entries.size} sketches`);
  }

  #entries(): TrackerEntries {
    const entries: TrackerEntries['entries'] = new Map();
    for (const [key, sketch] of this.#sketches) {
      entries.set(key, {
        sketch,
        observations: this.#observations.get(key) ?? 0,
      });
    }
    return {precision: this.#precision, entries};
  }

  #decode(snapshot: TrackerSnapshot): TrackerEntries {
    const {precision, sketches, observations} = v.parse(
      snapshot,
      trackerSnapshotSchema,
    );
    const entries: TrackerEntries['entries'] = new Map();
    for (const [key, json] of Object.entries(sketches)) {
      if (json.precision !== precision) {
        throw new InvalidSketchDataError(
          `Sketch ${key} has precision ${json.precision}, snapshot has ${precision}`,
        );
      }
      entries.set(key, {
        sketch: LogLogBeta.fromJSON(json, {hasher: this.#hasher}),
        observations: observations[key] ?? 0,
      });
    }
    return {precision, entries};
  }

  /**
   * Get or create the sketch for a key.
   */
  #getOrCreateSketch(key: string): LogLogBeta {
    let sketch = this.#sketches.get(key);
    if (!sketch) {
      sketch = new LogLogBeta(this.#precision, {hasher: this.#hasher});
      this.#sketches.set(key, sketch);
      this.#lc.debug?.(`created sketch for ${key}`);
    }
    return sketch;
  }

  /**
   * Determine confidence level based on cardinality.
   */
  #getConfidence(cardinality: number): Confidence {
    if (cardinality >= HIGH_CONFIDENCE_THRESHOLD) {
      return 'high';
    } else if (cardinality >= MED_CONFIDENCE_THRESHOLD) {
      return 'med';
    }
    return 'none';
  }
}

type TrackerEntries = {
  precision: number;
  entries: Map<string, {sketch: LogLogBeta; observations: number}>;
};
