import {
  DRAWING_TICKET_COSTS,
  DRAWING_TRANSITIONS,
  DRAWING_TYPES,
  TICKET_SALES_CLOSE_MINUTES_BEFORE,
} from '../constants/drawingRules';
import type {
  CreateDrawingRequest,
  Drawing,
  DrawingExecutionRecord,
  DrawingFilter,
  DrawingStatus,
  NewPrize,
  Prize,
  PrizeRequest,
  Ticket,
} from '../models/types';
import type { Datastore, Page, Transaction } from '../repositories/datastore';
import { addMinutes, type Clock, systemClock } from '../utils/clock';
import {
  describeError,
  DuplicateRecordError,
  ImmutableResultError,
  InvalidDrawingStateError,
  NotFoundError,
  ValidationError,
} from '../utils/errors';
import type { AppLogger } from '../utils/logger';

export interface DrawingResults {
  drawing: Drawing;
  record: DrawingExecutionRecord;
  prizes: Prize[];
  // winning tickets in draw order
  winners: Ticket[];
}

export interface LifecycleSummary {
  processed: number;
  drawing_ids: number[];
  errors: { drawing_id: number; error: string }[];
}

const isValidDate = (value: Date): boolean => value instanceof Date && !Number.isNaN(value.getTime());

// prizes can be added until ticket sales close
const PRIZE_EDITABLE_STATUSES: DrawingStatus[] = ['draft', 'scheduled', 'open'];

const totalQuantity = (prizes: { quantity: number }[]): number =>
  prizes.reduce((sum, prize) => sum + prize.quantity, 0);

function buildPrize(drawingId: number, request: PrizeRequest, now: Date): NewPrize {
  const name = request.name.trim();
  if (!name) {
    throw new ValidationError('Prize name is required');
  }
  if (!Number.isSafeInteger(request.rank) || request.rank < 1) {
    throw new ValidationError('Prize rank must be at least 1', { rank: request.rank });
  }
  const quantity = request.quantity ?? 1;
  if (!Number.isSafeInteger(quantity) || quantity < 1) {
    throw new ValidationError('Prize quantity must be at least 1', { quantity });
  }
  const valueUsd = request.value_usd ?? null;
  if (valueUsd !== null && (!Number.isFinite(valueUsd) || valueUsd < 0)) {
    throw new ValidationError('Prize value_usd cannot be negative', { value_usd: valueUsd });
  }
  return {
    drawing_id: drawingId,
    rank: request.rank,
    name,
    description: request.description?.trim() || null,
    value_usd: valueUsd,
    quantity,
    fulfillment_type: request.fulfillment_type ?? 'physical',
    created_at: now,
  };
}

async function insertPrizeOnce(tx: Transaction, prize: NewPrize): Promise<Prize> {
  try {
    return await tx.insertPrize(prize);
  } catch (error) {
    if (error instanceof DuplicateRecordError) {
      throw new ValidationError(`Drawing ${prize.drawing_id} already has a rank ${prize.rank} prize`, {
        rank: prize.rank,
      });
    }
    throw error;
  }
}

/** Drawing lifecycle: creation, admin transitions and the time-driven open/close steps. */
export class DrawingService {
  constructor(
    private readonly store: Datastore,
    private readonly logger: AppLogger,
    private readonly clock: Clock = systemClock
  ) {}

  async createDrawing(request: CreateDrawingRequest): Promise<Drawing> {
    if (!DRAWING_TYPES.includes(request.drawing_type)) {
      throw new ValidationError(`Unknown drawing type ${request.drawing_type}`);
    }
    const name = request.name.trim();
    if (!name) {
      throw new ValidationError('Drawing name is required');
    }
    if (!isValidDate(request.open_time) || !isValidDate(request.draw_time)) {
      throw new ValidationError('open_time and draw_time must be valid dates');
    }
    const ticketCost = request.ticket_cost ?? DRAWING_TICKET_COSTS[request.drawing_type];
    if (!Number.isSafeInteger(ticketCost) || ticketCost < 1) {
      throw new ValidationError('ticket_cost must be a positive whole number', { ticket_cost: ticketCost });
    }
    const prizeRequests = request.prizes ?? [];
    // with prizes, every unit of every prize is one winner
    const winnerCount =
      prizeRequests.length > 0
        ? totalQuantity(prizeRequests.map((prize) => ({ quantity: prize.quantity ?? 1 })))
        : request.winner_count ?? 1;
    if (!Number.isSafeInteger(winnerCount) || winnerCount < 1) {
      throw new ValidationError('winner_count must be at least 1', { winner_count: winnerCount });
    }

    const closeTime = addMinutes(request.draw_time, -TICKET_SALES_CLOSE_MINUTES_BEFORE);
    if (request.open_time.getTime() >= closeTime.getTime()) {
      throw new ValidationError(
        `open_time must be before ticket sales close (${TICKET_SALES_CLOSE_MINUTES_BEFORE} minutes before draw_time)`
      );
    }

    const now = this.clock();
    const { drawing, prizes } = await this.store.transaction(async (tx) => {
      const inserted = await tx.insertDrawing({
        drawing_type: request.drawing_type,
        name,
        open_time: request.open_time,
        close_time: closeTime,
        draw_time: request.draw_time,
        ticket_cost: ticketCost,
        winner_count: winnerCount,
        status: 'draft',
        execution_seed_ref: null,
        executed_at: null,
        created_by: request.created_by ?? null,
        created_at: now,
        updated_at: now,
      });
      const created: Prize[] = [];
      for (const prize of prizeRequests) {
        created.push(await insertPrizeOnce(tx, buildPrize(inserted.id, prize, now)));
      }
      return { drawing: inserted, prizes: created };
    });

    this.logger.info('drawing.created', {
      drawing_id: drawing.id,
      drawing_type: drawing.drawing_type,
      ticket_cost: drawing.ticket_cost,
      draw_time: drawing.draw_time.toISOString(),
      prize_ids: prizes.map((prize) => prize.id),
    });
    return drawing;
  }

  /**
   * Adds a prize tier while the drawing still sells tickets. The drawing's
   * winner_count follows the total prize quantity.
   */
  async addPrize(drawingId: number, request: PrizeRequest): Promise<Prize> {
    const now = this.clock();
    const prize = await this.store.transaction(async (tx) => {
      const drawing = await tx.lockDrawing(drawingId, 'exclusive');
      if (!drawing) {
        throw new NotFoundError('Drawing', drawingId);
      }
      if (drawing.status === 'completed') {
        throw new ImmutableResultError(drawingId);
      }
      if (!PRIZE_EDITABLE_STATUSES.includes(drawing.status)) {
        throw new InvalidDrawingStateError(drawingId, `Cannot add prizes to a ${drawing.status} drawing`);
      }
      const inserted = await insertPrizeOnce(tx, buildPrize(drawingId, request, now));
      const winnerCount = totalQuantity(await tx.listPrizes(drawingId));
      await tx.updateDrawing({ ...drawing, winner_count: winnerCount, updated_at: now });
      return inserted;
    });

    this.logger.info('drawing.prize_added', {
      drawing_id: drawingId,
      prize_id: prize.id,
      rank: prize.rank,
      quantity: prize.quantity,
    });
    return prize;
  }

  async listPrizes(drawingId: number): Promise<Prize[]> {
    await this.getDrawing(drawingId);
    return this.store.listPrizes(drawingId);
  }

  listDrawings(filter: DrawingFilter, page: Page): Promise<Drawing[]> {
    return this.store.listDrawings(filter, page);
  }

  scheduleDrawing(drawingId: number): Promise<Drawing> {
    return this.transition(drawingId, 'scheduled');
  }

  openDrawing(drawingId: number): Promise<Drawing> {
    return this.transition(drawingId, 'open');
  }

  /** Allowed from any state before `completed`; cancelling twice is a no-op. */
  async cancelDrawing(drawingId: number): Promise<Drawing> {
    return this.transition(drawingId, 'cancelled');
  }

  /**
   * Stops ticket sales. Before `close_time` only a forced close is accepted;
   * closing an already closed drawing returns it unchanged.
   */
  async closeDrawing(drawingId: number, options: { force?: boolean } = {}): Promise<Drawing> {
    const result = await this.store.transaction(async (tx) => {
      const drawing = await tx.lockDrawing(drawingId, 'exclusive');
      if (!drawing) {
        throw new NotFoundError('Drawing', drawingId);
      }
      if (drawing.status === 'closed') {
        return { drawing, changed: false };
      }
      if (drawing.status === 'completed') {
        throw new ImmutableResultError(drawingId);
      }
      if (drawing.status !== 'open') {
        throw new InvalidDrawingStateError(drawingId, `Cannot close a ${drawing.status} drawing`);
      }
      const now = this.clock();
      if (!options.force && now.getTime() < drawing.close_time.getTime()) {
        throw new InvalidDrawingStateError(
          drawingId,
          `Ticket sales for drawing ${drawingId} run until ${drawing.close_time.toISOString()}`
        );
      }
      const next: Drawing = { ...drawing, status: 'closed', updated_at: now };
      await tx.updateDrawing(next);
      return { drawing: next, changed: true };
    });

    if (result.changed) {
      this.logger.info('drawing.closed', { drawing_id: drawingId, forced: options.force ?? false });
    }
    return result.drawing;
  }

  async openDueDrawings(now: Date = this.clock()): Promise<LifecycleSummary> {
    const due = (await this.store.listDrawingsByStatus('scheduled')).filter(
      (drawing) => drawing.open_time.getTime() <= now.getTime()
    );
    return this.runEach(due, 'drawing.open_failed', (drawing) => this.openDrawing(drawing.id));
  }

  async closeDueDrawings(now: Date = this.clock()): Promise<LifecycleSummary> {
    const due = (await this.store.listDrawingsByStatus('open')).filter(
      (drawing) => drawing.close_time.getTime() <= now.getTime()
    );
    return this.runEach(due, 'drawing.close_failed', (drawing) => this.closeDrawing(drawing.id));
  }

  async getDrawing(drawingId: number): Promise<Drawing> {
    const drawing = await this.store.findDrawing(drawingId);
    if (!drawing) {
      throw new NotFoundError('Drawing', drawingId);
    }
    return drawing;
  }

  async getResults(drawingId: number): Promise<DrawingResults> {
    const drawing = await this.getDrawing(drawingId);
    const record = await this.store.findExecutionRecord(drawingId);
    if (drawing.status !== 'completed' || !record) {
      throw new InvalidDrawingStateError(drawingId, `Drawing ${drawingId} has no results yet`);
    }
    const bySequence = new Map<number, Ticket>();
    for (const ticket of await this.store.listSnapshotTickets(drawingId)) {
      if (ticket.sequence_number !== null) {
        bySequence.set(ticket.sequence_number, ticket);
      }
    }
    const winners: Ticket[] = [];
    for (const sequence of record.winning_sequence_numbers) {
      const ticket = bySequence.get(sequence);
      if (ticket) {
        winners.push(ticket);
      }
    }
    return { drawing, record, prizes: await this.store.listPrizes(drawingId), winners };
  }

  private async transition(drawingId: number, target: DrawingStatus): Promise<Drawing> {
    const result = await this.store.transaction(async (tx) => {
      const drawing = await tx.lockDrawing(drawingId, 'exclusive');
      if (!drawing) {
        throw new NotFoundError('Drawing', drawingId);
      }
      if (drawing.status === target) {
        return { drawing, from: drawing.status, changed: false };
      }
      if (drawing.status === 'completed') {
        throw new ImmutableResultError(drawingId);
      }
      if (!DRAWING_TRANSITIONS[drawing.status].includes(target)) {
        throw new InvalidDrawingStateError(
          drawingId,
          `Cannot move drawing ${drawingId} from ${drawing.status} to ${target}`
        );
      }
      const next: Drawing = { ...drawing, status: target, updated_at: this.clock() };
      await tx.updateDrawing(next);
      return { drawing: next, from: drawing.status, changed: true };
    });

    if (result.changed) {
      this.logger.info('drawing.transitioned', {
        drawing_id: drawingId,
        from: result.from,
        to: target,
      });
    }
    return result.drawing;
  }

  private async runEach(
    drawings: Drawing[],
    failureEvent: string,
    step: (drawing: Drawing) => Promise<Drawing>
  ): Promise<LifecycleSummary> {
    const summary: LifecycleSummary = { processed: 0, drawing_ids: [], errors: [] };
    for (const drawing of drawings) {
      try {
        await step(drawing);
        summary.processed += 1;
        summary.drawing_ids.push(drawing.id);
      } catch (error) {
        const message = describeError(error);
        this.logger.error(failureEvent, { drawing_id: drawing.id, error: message });
        summary.errors.push({ drawing_id: drawing.id, error: message });
      }
    }
    return summary;
  }
}
