import type { RecordStore, StoredRecord } from "./store.js";
import { KeyedMutex, runWithRetry } from "./locks.js";
import { silentLogger, type Logger } from "./logger.js";
import { ageInDays, dayIndex } from "./time.js";
import { toError } from "./errors.js";

// --- Constants ---

/** Weight gained on every access */
const REINFORCE_INCREMENT = 0.05;

/** Extra weight when access_count reaches a multiple of LEVEL_UP_EVERY */
const LEVEL_UP_BONUS = 0.15;

/** Accesses per reinforcement level */
const LEVEL_UP_EVERY = 3;

/** Records younger than this (in days) never decay */
export const DECAY_THRESHOLD_DAYS = 365;

/** Days past the threshold that take the factor from 1.0 down to 0.0 (before MIN_DECAY) */
export const DECAY_SCALE = 1000;

/** A single pass never keeps less than 30% of the weight */
export const MIN_DECAY = 0.3;

/** Records accessed at least this often are protected */
export const PROTECTION_ACCESS_THRESHOLD = 5;

/** Protected records keep at least 70% of their weight per pass */
export const PROTECTED_FLOOR = 0.7;

/** Absolute weight floor; keeps memory_weight > 0 through any number of passes */
const MIN_WEIGHT = 1e-6;

/** CAS attempts per record before the update is given up */
const CAS_ATTEMPTS = 3;

// --- Types ---

export interface WeightState {
  access_count: number;
  memory_weight: number;
  reinforcement_level: number;
}

export interface Reinforcement extends WeightState {
  increment: number;
  leveled_up: boolean;
}

export interface DecayFactor {
  factor: number;
  /** The protection floor raised the factor */
  protected: boolean;
}

export interface ReinforceOutcome extends WeightState {
  id: string;
  previous_weight: number;
  leveled_up: boolean;
}

export interface ReinforceBatchResult {
  applied: ReinforceOutcome[];
  failed: string[];
}

export interface DecayResult {
  owner_id: string;
  as_of: string;
  decayed_count: number;
  protected_count: number;
  /** as_of fell on or before the day of the last applied pass; nothing changed */
  skipped: boolean;
}

export interface ReinforcementEngineOptions {
  locks?: KeyedMutex;
  lockTimeoutMs?: number;
  lockRetries?: number;
  logger?: Logger;
}

// --- Arithmetic ---

export function computeReinforcement(state: WeightState): Reinforcement {
  const access_count = state.access_count + 1;
  let increment = REINFORCE_INCREMENT;
  let reinforcement_level = state.reinforcement_level;
  const leveled_up = access_count % LEVEL_UP_EVERY === 0;
  if (leveled_up) {
    increment += LEVEL_UP_BONUS;
    reinforcement_level += 1;
  }
  return {
    access_count,
    memory_weight: state.memory_weight + increment,
    reinforcement_level,
    increment,
    leveled_up,
  };
}

/**
 * Decay factor for one maintenance pass, or null when the record is too
 * young to decay.
 */
export function computeDecayFactor(ageDays: number, accessCount: number): DecayFactor | null {
  if (ageDays <= DECAY_THRESHOLD_DAYS) return null;
  const raw = Math.max(MIN_DECAY, 1 - (ageDays - DECAY_THRESHOLD_DAYS) / DECAY_SCALE);
  if (accessCount >= PROTECTION_ACCESS_THRESHOLD && raw < PROTECTED_FLOOR) {
    return { factor: PROTECTED_FLOOR, protected: true };
  }
  return { factor: raw, protected: false };
}

// --- Engine ---

/**
 * Mutates memory weights. Reinforce and decay for the same owner are
 * mutually exclusive through the owner lock; owners never wait on each other.
 */
export class ReinforcementEngine {
  private store: RecordStore;
  private locks: KeyedMutex;
  private lockTimeoutMs: number;
  private lockRetries: number;
  private log: Logger;

  constructor(store: RecordStore, opts: ReinforcementEngineOptions = {}) {
    this.store = store;
    this.locks = opts.locks ?? new KeyedMutex();
    this.lockTimeoutMs = opts.lockTimeoutMs ?? 5000;
    this.lockRetries = opts.lockRetries ?? 3;
    this.log = (opts.logger ?? silentLogger).child("reinforcement");
  }

  /** Reinforce one record. Null when it does not exist for this owner. */
  async reinforce(ownerId: string, recordId: string, now: Date = new Date()): Promise<ReinforceOutcome | null> {
    return this.exclusive(ownerId, () => this.reinforceOne(ownerId, recordId, now));
  }

  /**
   * Reinforce every id once under a single owner-lock hold. A failing record
   * is logged and skipped; the rest still apply.
   */
  async reinforceMany(ownerId: string, recordIds: string[], now: Date = new Date()): Promise<ReinforceBatchResult> {
    return this.exclusive(ownerId, () => {
      const result: ReinforceBatchResult = { applied: [], failed: [] };
      for (const id of recordIds) {
        try {
          const outcome = this.reinforceOne(ownerId, id, now);
          if (outcome) result.applied.push(outcome);
          else result.failed.push(id);
        } catch (err) {
          this.log.warn(`weight update failed, skipping record`, {
            owner_id: ownerId,
            record_id: id,
            error: toError(err).message,
          });
          result.failed.push(id);
        }
      }
      return result;
    });
  }

  /**
   * One maintenance pass as of `asOf`. Ages are whole days, so at most one
   * pass applies per UTC day: re-running on the same or an earlier day
   * changes nothing.
   */
  async applyDecay(ownerId: string, asOf: Date = new Date()): Promise<DecayResult> {
    return this.exclusive(ownerId, () => {
      const asOfIso = asOf.toISOString();
      const last = this.store.getLastDecayAt(ownerId);
      if (last !== null && dayIndex(asOf) <= dayIndex(last)) {
        this.log.info(`decay already applied as of ${last}, skipping`, { owner_id: ownerId, as_of: asOfIso });
        return { owner_id: ownerId, as_of: asOfIso, decayed_count: 0, protected_count: 0, skipped: true };
      }

      return this.store.transaction(() => {
        let decayed_count = 0;
        let protected_count = 0;
        for (const record of this.store.listByOwner(ownerId)) {
          const decay = computeDecayFactor(ageInDays(record.created_at, asOf), record.access_count);
          if (!decay) continue;
          try {
            this.store.setWeight(record.id, ownerId, decayedWeight(record, decay.factor));
            decayed_count++;
            if (decay.protected) protected_count++;
          } catch (err) {
            this.log.warn(`decay failed, skipping record`, {
              owner_id: ownerId,
              record_id: record.id,
              error: toError(err).message,
            });
          }
        }
        this.store.setLastDecayAt(ownerId, asOf);
        this.log.debug(`decay pass complete`, { owner_id: ownerId, as_of: asOfIso, decayed_count, protected_count });
        return { owner_id: ownerId, as_of: asOfIso, decayed_count, protected_count, skipped: false };
      });
    });
  }

  private exclusive<T>(ownerId: string, fn: () => T): Promise<T> {
    return runWithRetry(this.locks, ownerId, fn, {
      timeoutMs: this.lockTimeoutMs,
      retries: this.lockRetries,
    });
  }

  private reinforceOne(ownerId: string, recordId: string, now: Date): ReinforceOutcome | null {
    for (let attempt = 0; attempt < CAS_ATTEMPTS; attempt++) {
      const current = this.store.get(recordId, ownerId);
      if (!current) {
        this.log.warn(`record not found for reinforcement`, { owner_id: ownerId, record_id: recordId });
        return null;
      }
      const next = computeReinforcement(current);
      const written = this.store.compareAndSetWeights({
        id: recordId,
        owner_id: ownerId,
        expected_access_count: current.access_count,
        access_count: next.access_count,
        memory_weight: next.memory_weight,
        reinforcement_level: next.reinforcement_level,
        last_accessed: now.toISOString(),
      });
      if (written) {
        return {
          id: recordId,
          access_count: next.access_count,
          memory_weight: next.memory_weight,
          reinforcement_level: next.reinforcement_level,
          previous_weight: current.memory_weight,
          leveled_up: next.leveled_up,
        };
      }
    }
    throw new Error(`access_count of ${recordId} kept changing during reinforcement`);
  }
}

function decayedWeight(record: StoredRecord, factor: number): number {
  return Math.max(record.memory_weight * factor, MIN_WEIGHT);
}
