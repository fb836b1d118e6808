/**
 * TriggerPool - Bookkeeping for the internal trigger lines of one instrument
 *
 * Pure software state; allocating or releasing never talks to the hardware.
 * The lowest free trigger number is handed out first.
 */

import type { Result } from '../../shared/types.js';
import { Ok, Err, ResourceExhaustedError } from '../../shared/types.js';
import type { InternalTrigger } from '../devices/types.js';

export interface TriggerLease extends InternalTrigger {
  /** Give the trigger back. Safe to call more than once. */
  release(): void;
}

export interface TriggerPool {
  readonly size: number;
  freeCount(): number;
  allocate(): Result<TriggerLease, ResourceExhaustedError>;
  /** Idempotent; stale leases (issued before reset) are ignored */
  release(lease: TriggerLease): void;
  /** True while the lease holds its trigger */
  isLive(lease: TriggerLease): boolean;
  /** Free every trigger; all leases issued so far become stale */
  reset(): void;
}

export function createTriggerPool(size: number, owner = 'instrument'): TriggerPool {
  // value -> lease currently holding it
  const live = new Map<number, TriggerLease>();

  function lowestFree(): number | null {
    for (let value = 1; value <= size; value++) {
      if (!live.has(value)) return value;
    }
    return null;
  }

  const pool: TriggerPool = {
    size,

    freeCount(): number {
      return size - live.size;
    },

    allocate(): Result<TriggerLease, ResourceExhaustedError> {
      const value = lowestFree();
      if (value === null) {
        return Err(new ResourceExhaustedError(`No free internal triggers on ${owner} (all ${size} in use)`));
      }
      const lease: TriggerLease = {
        value,
        release: () => pool.release(lease),
      };
      live.set(value, lease);
      return Ok(lease);
    },

    release(lease: TriggerLease): void {
      if (live.get(lease.value) === lease) {
        live.delete(lease.value);
      }
    },

    isLive(lease: TriggerLease): boolean {
      return live.get(lease.value) === lease;
    },

    reset(): void {
      live.clear();
    },
  };

  return pool;
}

/**
 * Run `fn` with a freshly allocated trigger and give it back afterwards,
 * whether `fn` returns Ok, Err or throws.
 */
export async function withTrigger<T, E>(
  pool: TriggerPool,
  fn: (lease: TriggerLease) => Promise<Result<T, E>>
): Promise<Result<T, E | ResourceExhaustedError>> {
  const allocated = pool.allocate();
  if (!allocated.ok) return allocated;

  const lease = allocated.value;
  try {
    return await fn(lease);
  } finally {
    lease.release();
  }
}
