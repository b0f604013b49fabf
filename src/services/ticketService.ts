import { MAX_TICKETS_PER_PURCHASE } from '../constants/drawingRules';
import type { Ticket, TicketPurchase } from '../models/types';
import type { Datastore } from '../repositories/datastore';
import { type Clock, systemClock } from '../utils/clock';
import { DrawingNotOpenError, NotFoundError, ValidationError } from '../utils/errors';
import type { AppLogger } from '../utils/logger';
import type { LedgerService } from './ledgerService';

export class TicketService {
  constructor(
    private readonly store: Datastore,
    private readonly ledger: LedgerService,
    private readonly logger: AppLogger,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * One spend entry for the total cost and `quantity` tickets, committed
   * together. The drawing row is share-locked before the account row so a
   * concurrent close waits for in-flight purchases.
   */
  async purchaseTickets(userId: number, drawingId: number, quantity: number): Promise<TicketPurchase> {
    if (!Number.isInteger(quantity) || quantity < 1 || quantity > MAX_TICKETS_PER_PURCHASE) {
      throw new ValidationError(`Quantity must be a whole number from 1 to ${MAX_TICKETS_PER_PURCHASE}`, {
        quantity,
      });
    }

    const purchase = await this.store.transaction(async (tx) => {
      const drawing = await tx.lockDrawing(drawingId, 'shared');
      if (!drawing) {
        throw new NotFoundError('Drawing', drawingId);
      }
      if (drawing.status !== 'open') {
        throw new DrawingNotOpenError(drawingId, `Drawing ${drawingId} is ${drawing.status}`);
      }
      const now = this.clock();
      if (now.getTime() >= drawing.close_time.getTime()) {
        throw new DrawingNotOpenError(
          drawingId,
          `Ticket sales for drawing ${drawingId} closed at ${drawing.close_time.toISOString()}`
        );
      }

      const totalCost = quantity * drawing.ticket_cost;
      const entry = await this.ledger.applyEntryInTx(tx, {
        user_id: userId,
        kind: 'spend',
        amount: -totalCost,
        reason_code: 'ticket_purchase',
        reason: `${quantity} ticket(s) for ${drawing.name}`,
        source_ref: `drawing:${drawingId}`,
      });

      const tickets: Ticket[] = [];
      for (let index = 0; index < quantity; index += 1) {
        tickets.push(
          await tx.insertTicket({
            drawing_id: drawingId,
            user_id: userId,
            purchase_txn_ref: entry.id,
            created_at: now,
          })
        );
      }

      return {
        purchase_txn_ref: entry.id,
        drawing_id: drawingId,
        quantity,
        total_cost: totalCost,
        balance_after: entry.balance_after,
        tickets,
      };
    });

    this.logger.info('tickets.purchased', {
      user_id: userId,
      drawing_id: drawingId,
      quantity,
      total_cost: purchase.total_cost,
      purchase_txn_ref: purchase.purchase_txn_ref,
      balance_after: purchase.balance_after,
    });
    return purchase;
  }

  async listUserTickets(userId: number, drawingId: number): Promise<Ticket[]> {
    const drawing = await this.store.findDrawing(drawingId);
    if (!drawing) {
      throw new NotFoundError('Drawing', drawingId);
    }
    return this.store.listUserTickets(userId, drawingId);
  }
}
