import type { Datastore } from '../repositories/datastore';
import { type Clock, systemClock } from '../utils/clock';
import type { AppLogger } from '../utils/logger';
import {
  ActivitySyncService,
  type TrackerConnectionSource,
  type TrackerProvider,
} from './activitySync';
import { AntiGamingGuard, DatastoreTierStatsSource, type TierStatsSource } from './antiGamingGuard';
import { DrawingExecutor } from './drawingExecutor';
import { DrawingService } from './drawingService';
import { FulfillmentService } from './fulfillmentService';
import { LedgerService } from './ledgerService';
import { type NotificationDispatcher, OutboxNotificationDispatcher } from './notificationService';
import { PointsEngine } from './pointsEngine';
import { TicketService } from './ticketService';
import { generateSeed, type SeedSource } from './winnerSelection';

export interface Services {
  store: Datastore;
  logger: AppLogger;
  ledger: LedgerService;
  guard: AntiGamingGuard;
  points: PointsEngine;
  tickets: TicketService;
  drawings: DrawingService;
  executor: DrawingExecutor;
  fulfillment: FulfillmentService;
  // present only when tracker providers are registered
  sync: ActivitySyncService | null;
}

export interface ServiceOptions {
  store: Datastore;
  logger: AppLogger;
  clock?: Clock;
  seedSource?: SeedSource;
  tierStats?: TierStatsSource;
  dispatcher?: NotificationDispatcher;
  trackers?: { providers: TrackerProvider[]; connections: TrackerConnectionSource };
}

export const buildServices = (options: ServiceOptions): Services => {
  const { store, logger } = options;
  const clock = options.clock ?? systemClock;

  const ledger = new LedgerService(store, clock);
  const guard = new AntiGamingGuard(
    store,
    options.tierStats ?? new DatastoreTierStatsSource(store),
    logger,
    clock
  );
  const points = new PointsEngine(store, ledger, guard, logger, clock);
  const dispatcher = options.dispatcher ?? new OutboxNotificationDispatcher(store, clock);
  const trackers = options.trackers;

  return {
    store,
    logger,
    ledger,
    guard,
    points,
    tickets: new TicketService(store, ledger, logger, clock),
    drawings: new DrawingService(store, logger, clock),
    executor: new DrawingExecutor(store, logger, options.seedSource ?? generateSeed, clock),
    fulfillment: new FulfillmentService(store, dispatcher, logger, clock),
    sync:
      trackers && trackers.providers.length > 0
        ? new ActivitySyncService(trackers.providers, trackers.connections, points, logger, clock)
        : null,
  };
};

let services: Services | null = null;

export const initServices = (options: ServiceOptions): Services => {
  services = buildServices(options);
  return services;
};

export const getServices = (): Services => {
  if (!services) {
    throw new Error('Services have not been initialised; call initServices() during startup');
  }
  return services;
};
