/**
 * Releases reservations whose settlement never arrived
 */

import { nanoid } from 'nanoid';

import type { PendingUsageTracker } from '@/services/pending-usage.service.js';
import { SYSTEM_ACTOR } from '@/types/index.js';

import type { Worker } from './periodic.js';

export interface ReservationSweeperDeps {
  tracker: PendingUsageTracker;
  maxAgeMs: number;
  intervalMs: number;
}

export function createReservationSweeper(deps: ReservationSweeperDeps): Worker {
  return {
    name: 'reservation-sweeper',
    intervalMs: deps.intervalMs,
    async tick() {
      const actor = { ...SYSTEM_ACTOR, requestId: `sweep_${nanoid(10)}` };
      const result = await deps.tracker.sweep(actor, deps.maxAgeMs);
      if (!result.success) {
        console.error(`Reservation sweep failed: ${result.error.message}`);
        return;
      }
      if (result.data.released > 0) {
        console.info(`Released ${result.data.released} stale reservations`);
      }
    },
  };
}
