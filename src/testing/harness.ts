import type { Drawing, DrawingType, PrizeFulfillment, PrizeRequest } from '../models/types';
import { MemoryDatastore } from '../repositories/memoryDatastore';
import { buildServices, type ServiceOptions, type Services } from '../services';
import { addDays, addMinutes, type Clock } from '../utils/clock';
import { createSilentLogger, type LogEntry } from '../utils/logger';

export interface TestClock {
  clock: Clock;
  now(): Date;
  set(iso: string): void;
  advanceMinutes(minutes: number): void;
  advanceDays(days: number): void;
}

export function mkClock(startIso: string): TestClock {
  let current = new Date(startIso);
  return {
    clock: () => new Date(current.getTime()),
    now: () => new Date(current.getTime()),
    set: (iso) => {
      current = new Date(iso);
    },
    advanceMinutes: (minutes) => {
      current = addMinutes(current, minutes);
    },
    advanceDays: (days) => {
      current = addDays(current, days);
    },
  };
}

export interface Harness {
  store: MemoryDatastore;
  services: Services;
  time: TestClock;
  logs: LogEntry[];
}

export const DEFAULT_NOW = '2026-03-14T12:00:00.000Z';

export function mkHarness(
  startIso: string = DEFAULT_NOW,
  options: Omit<ServiceOptions, 'store' | 'logger' | 'clock'> = {}
): Harness {
  const store = new MemoryDatastore();
  const logs: LogEntry[] = [];
  const logger = createSilentLogger((entry) => logs.push(entry));
  const time = mkClock(startIso);
  const services = buildServices({ ...options, store, logger, clock: time.clock });
  return { store, services, time, logs };
}

export async function seedBalance(services: Services, userId: number, amount: number): Promise<void> {
  await services.ledger.applyEntry({
    user_id: userId,
    kind: 'earn',
    amount,
    reason_code: 'manual_award',
    reason: 'Opening balance',
  });
}

/** A drawing that opened an hour ago and draws a day from now. */
export async function mkOpenDrawing(
  harness: Harness,
  overrides: {
    drawing_type?: DrawingType;
    name?: string;
    winner_count?: number;
    ticket_cost?: number;
    prizes?: PrizeRequest[];
  } = {}
): Promise<Drawing> {
  const now = harness.time.now();
  const { drawings } = harness.services;
  const created = await drawings.createDrawing({
    drawing_type: overrides.drawing_type ?? 'daily',
    name: overrides.name ?? 'Daily Draw',
    open_time: addMinutes(now, -60),
    draw_time: addDays(now, 1),
    ticket_cost: overrides.ticket_cost,
    winner_count: overrides.winner_count,
    prizes: overrides.prizes,
  });
  await drawings.scheduleDrawing(created.id);
  return drawings.openDrawing(created.id);
}

/** Inserts tickets straight into the store, round-robin over `userIds`. */
export async function insertTickets(
  harness: Harness,
  drawingId: number,
  count: number,
  userIds: number[]
): Promise<void> {
  const createdAt = harness.time.now();
  await harness.store.transaction(async (tx) => {
    for (let index = 0; index < count; index += 1) {
      await tx.insertTicket({
        drawing_id: drawingId,
        user_id: userIds[index % userIds.length],
        purchase_txn_ref: 0,
        created_at: createdAt,
      });
    }
  });
}

export async function mkClosedDrawing(
  harness: Harness,
  ticketCount: number,
  userIds: number[],
  overrides: { winner_count?: number; name?: string; prizes?: PrizeRequest[] } = {}
): Promise<Drawing> {
  const drawing = await mkOpenDrawing(harness, overrides);
  await insertTickets(harness, drawing.id, ticketCount, userIds);
  return harness.services.drawings.closeDrawing(drawing.id, { force: true });
}

export async function insertPendingFulfillment(
  harness: Harness,
  fields: { drawing_id: number; user_id: number; ticket_id?: number }
): Promise<PrizeFulfillment> {
  const now = harness.time.now();
  return harness.store.transaction((tx) =>
    tx.insertFulfillment({
      ticket_id: fields.ticket_id ?? 1,
      drawing_id: fields.drawing_id,
      user_id: fields.user_id,
      prize_id: null,
      prize_rank: 1,
      status: 'pending',
      notified_at: null,
      address_confirm_deadline: null,
      warning_sent_at: null,
      shipping_address: null,
      address_confirmed_at: null,
      shipping_carrier: null,
      tracking_number: null,
      shipped_at: null,
      delivered_at: null,
      forfeited_at: null,
      forfeit_reason: null,
      created_at: now,
      updated_at: now,
    })
  );
}
