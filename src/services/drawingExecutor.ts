import type {
  Drawing,
  DrawingExecutionRecord,
  DrawingSnapshot,
  Prize,
  PrizeFulfillment,
} from '../models/types';
import type { Datastore, Reader } from '../repositories/datastore';
import { type Clock, systemClock } from '../utils/clock';
import {
  describeError,
  DuplicateRecordError,
  InvalidDrawingStateError,
  NotFoundError,
} from '../utils/errors';
import type { AppLogger } from '../utils/logger';
import {
  ALGORITHM_VERSION,
  assignSequenceNumbers,
  generateSeed,
  type SeedSource,
  seedReference,
  selectWinners,
  snapshotDigest,
  toEntrants,
} from './winnerSelection';

export interface ExecutionVerification {
  drawing_id: number;
  algorithm_version: string;
  supported_algorithm: boolean;
  snapshot_matches: boolean;
  reproduced: boolean;
  stored_winners: number[];
  recomputed_winners: number[];
}

export interface ExecutionSummary {
  processed: number;
  drawing_ids: number[];
  errors: { drawing_id: number; error: string }[];
}

type SnapshotPhase =
  | { kind: 'done'; record: DrawingExecutionRecord }
  | { kind: 'ready'; snapshot: DrawingSnapshot; created: boolean };

interface PrizeSlot {
  prize_id: number | null;
  prize_rank: number;
}

/**
 * One slot per winner: each prize repeated by its quantity, top rank first.
 * A drawing without prizes falls back to `winner_count` numbered slots.
 */
export function prizeSlots(drawing: Drawing, prizes: Prize[]): PrizeSlot[] {
  if (prizes.length === 0) {
    return Array.from({ length: drawing.winner_count }, (_, index) => ({
      prize_id: null,
      prize_rank: index + 1,
    }));
  }
  return [...prizes]
    .sort((a, b) => a.rank - b.rank)
    .flatMap((prize) =>
      Array.from({ length: prize.quantity }, () => ({ prize_id: prize.id, prize_rank: prize.rank }))
    );
}

const loadSlots = async (reader: Reader, drawing: Drawing): Promise<PrizeSlot[]> =>
  prizeSlots(drawing, await reader.listPrizes(drawing.id));

type DrawPhase =
  | { kind: 'done'; record: DrawingExecutionRecord }
  | { kind: 'executed'; record: DrawingExecutionRecord; fulfillments: PrizeFulfillment[] };

/**
 * Runs a closed drawing exactly once. Phase one freezes the ticket
 * population (sequence numbers plus a digest) in its own transaction;
 * phase two draws from that frozen population and commits the record,
 * the winner flags, the pending fulfillments and the `completed` status
 * together. A retry after a crash between the phases reuses the snapshot.
 */
export class DrawingExecutor {
  constructor(
    private readonly store: Datastore,
    private readonly logger: AppLogger,
    private readonly seedSource: SeedSource = generateSeed,
    private readonly clock: Clock = systemClock
  ) {}

  async executeDrawing(drawingId: number): Promise<DrawingExecutionRecord> {
    const existing = await this.store.findExecutionRecord(drawingId);
    if (existing) {
      return existing;
    }

    const snapshotPhase = await this.persistSnapshot(drawingId);
    if (snapshotPhase.kind === 'done') {
      return snapshotPhase.record;
    }
    if (snapshotPhase.created) {
      this.logger.info('drawing.snapshot_persisted', {
        drawing_id: drawingId,
        ticket_count: snapshotPhase.snapshot.ticket_count,
        snapshot_digest: snapshotPhase.snapshot.snapshot_digest,
      });
    }

    let drawPhase: DrawPhase;
    try {
      drawPhase = await this.drawFromSnapshot(drawingId);
    } catch (error) {
      // another executor committed first; read behind its commit
      if (error instanceof DuplicateRecordError) {
        const record = await this.store.transaction((tx) => tx.findExecutionRecord(drawingId));
        if (record) {
          return record;
        }
      }
      throw error;
    }

    if (drawPhase.kind === 'executed') {
      this.logger.info('drawing.executed', {
        drawing_id: drawingId,
        ticket_count: drawPhase.record.ticket_count_at_snapshot,
        winning_sequence_numbers: drawPhase.record.winning_sequence_numbers,
        fulfillment_ids: drawPhase.fulfillments.map((fulfillment) => fulfillment.id),
        algorithm_version: drawPhase.record.algorithm_version,
      });
    }
    return drawPhase.record;
  }

  /** Executes every closed drawing whose draw time has passed. */
  async executeDueDrawings(now: Date = this.clock()): Promise<ExecutionSummary> {
    const due = (await this.store.listDrawingsByStatus('closed')).filter(
      (drawing) => drawing.draw_time.getTime() <= now.getTime()
    );
    const summary: ExecutionSummary = { processed: 0, drawing_ids: [], errors: [] };
    for (const drawing of due) {
      try {
        await this.executeDrawing(drawing.id);
        summary.processed += 1;
        summary.drawing_ids.push(drawing.id);
      } catch (error) {
        const message = describeError(error);
        this.logger.error('drawing.execute_failed', { drawing_id: drawing.id, error: message });
        summary.errors.push({ drawing_id: drawing.id, error: message });
      }
    }
    return summary;
  }

  async getExecutionRecord(drawingId: number): Promise<DrawingExecutionRecord> {
    const record = await this.store.findExecutionRecord(drawingId);
    if (!record) {
      throw new NotFoundError('Execution record for drawing', drawingId);
    }
    return record;
  }

  /** Replays the stored seed against the stored snapshot. */
  async verifyExecution(drawingId: number): Promise<ExecutionVerification> {
    const record = await this.getExecutionRecord(drawingId);
    const [drawing, snapshot, tickets] = await Promise.all([
      this.store.findDrawing(drawingId),
      this.store.findSnapshot(drawingId),
      this.store.listSnapshotTickets(drawingId),
    ]);
    if (!drawing) {
      throw new NotFoundError('Drawing', drawingId);
    }

    const assignments = tickets.flatMap((ticket) =>
      ticket.sequence_number === null
        ? []
        : [{ ticket_id: ticket.id, sequence_number: ticket.sequence_number }]
    );
    const snapshotMatches =
      snapshot !== null &&
      snapshot.ticket_count === record.ticket_count_at_snapshot &&
      snapshot.snapshot_digest === snapshotDigest(assignments);
    const supported = record.algorithm_version === ALGORITHM_VERSION;
    const slots = await loadSlots(this.store, drawing);
    const recomputed = supported
      ? selectWinners(record.random_seed, toEntrants(tickets), slots.length)
      : [];
    const reproduced =
      supported &&
      recomputed.length === record.winning_sequence_numbers.length &&
      recomputed.every((sequence, index) => sequence === record.winning_sequence_numbers[index]);

    return {
      drawing_id: drawingId,
      algorithm_version: record.algorithm_version,
      supported_algorithm: supported,
      snapshot_matches: snapshotMatches,
      reproduced,
      stored_winners: record.winning_sequence_numbers,
      recomputed_winners: recomputed,
    };
  }

  private persistSnapshot(drawingId: number): Promise<SnapshotPhase> {
    return this.store.transaction<SnapshotPhase>(async (tx) => {
      const drawing = requireDrawing(await tx.lockDrawing(drawingId, 'exclusive'), drawingId);
      const record = await tx.findExecutionRecord(drawingId);
      if (record) {
        return { kind: 'done', record };
      }
      assertClosed(drawing);

      const existing = await tx.findSnapshot(drawingId);
      if (existing) {
        return { kind: 'ready', snapshot: existing, created: false };
      }

      const assignments = assignSequenceNumbers(await tx.listTicketsForDrawing(drawingId));
      await tx.assignSequenceNumbers(drawingId, assignments);
      const snapshot: DrawingSnapshot = {
        drawing_id: drawingId,
        ticket_count: assignments.length,
        snapshot_digest: snapshotDigest(assignments),
        created_at: this.clock(),
      };
      await tx.insertSnapshot(snapshot);
      return { kind: 'ready', snapshot, created: true };
    });
  }

  private drawFromSnapshot(drawingId: number): Promise<DrawPhase> {
    return this.store.transaction<DrawPhase>(async (tx) => {
      const drawing = requireDrawing(await tx.lockDrawing(drawingId, 'exclusive'), drawingId);
      const existing = await tx.findExecutionRecord(drawingId);
      if (existing) {
        return { kind: 'done', record: existing };
      }
      assertClosed(drawing);

      const snapshot = await tx.findSnapshot(drawingId);
      if (!snapshot) {
        throw new InvalidDrawingStateError(drawingId, `Drawing ${drawingId} has no ticket snapshot`);
      }
      const tickets = await tx.listSnapshotTickets(drawingId);
      if (tickets.length !== snapshot.ticket_count) {
        throw new InvalidDrawingStateError(
          drawingId,
          `Snapshot for drawing ${drawingId} lists ${snapshot.ticket_count} tickets but ${tickets.length} carry sequence numbers`
        );
      }

      const slots = await loadSlots(tx, drawing);
      const seed = this.seedSource();
      const winners = selectWinners(seed, toEntrants(tickets), slots.length);
      const now = this.clock();
      const record: DrawingExecutionRecord = {
        drawing_id: drawingId,
        ticket_count_at_snapshot: snapshot.ticket_count,
        random_seed: seed,
        algorithm_version: ALGORITHM_VERSION,
        winning_sequence_numbers: winners,
        executed_at: now,
      };
      await tx.insertExecutionRecord(record);
      await tx.markWinningTickets(drawingId, winners);

      const bySequence = new Map(tickets.map((ticket) => [ticket.sequence_number, ticket]));
      const fulfillments: PrizeFulfillment[] = [];
      for (const [index, sequence] of winners.entries()) {
        const ticket = bySequence.get(sequence);
        const slot = slots[index];
        if (!ticket || !slot) {
          continue;
        }
        fulfillments.push(
          await tx.insertFulfillment({
            ticket_id: ticket.id,
            drawing_id: drawingId,
            user_id: ticket.user_id,
            prize_id: slot.prize_id,
            prize_rank: slot.prize_rank,
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

      await tx.updateDrawing({
        ...drawing,
        status: 'completed',
        execution_seed_ref: seedReference(seed),
        executed_at: now,
        updated_at: now,
      });

      return { kind: 'executed', record, fulfillments };
    });
  }
}

function requireDrawing(drawing: Drawing | null, drawingId: number): Drawing {
  if (!drawing) {
    throw new NotFoundError('Drawing', drawingId);
  }
  return drawing;
}

function assertClosed(drawing: Drawing): void {
  if (drawing.status !== 'closed') {
    throw new InvalidDrawingStateError(
      drawing.id,
      `Drawing ${drawing.id} is ${drawing.status}; only closed drawings can be executed`
    );
  }
}
