import { describe, it } from 'node:test';
import assert from 'node:assert';

import { mkHarness, mkOpenDrawing, seedBalance } from '../testing/harness';
import {
  DrawingNotOpenError,
  InsufficientBalanceError,
  NotFoundError,
  ValidationError,
} from '../utils/errors';

describe('TicketService.purchaseTickets', () => {
  it('writes one spend entry and one ticket per unit', async () => {
    const harness = mkHarness();
    const { services, store } = harness;
    await seedBalance(services, 1, 1000);
    const drawing = await mkOpenDrawing(harness);

    const purchase = await services.tickets.purchaseTickets(1, drawing.id, 5);

    assert.strictEqual(purchase.total_cost, 500);
    assert.strictEqual(purchase.balance_after, 500);
    assert.strictEqual(purchase.purchase_txn_ref, 2);
    assert.strictEqual(purchase.tickets.length, 5);
    assert.ok(purchase.tickets.every((ticket) => ticket.purchase_txn_ref === 2 && ticket.sequence_number === null));

    const entries = await store.listLedgerEntries(1);
    assert.strictEqual(entries.length, 2);
    assert.strictEqual(entries[1].kind, 'spend');
    assert.strictEqual(entries[1].amount, -500);
    assert.strictEqual(entries[1].reason_code, 'ticket_purchase');
    assert.strictEqual(entries[1].reason, '5 ticket(s) for Daily Draw');
    assert.strictEqual(entries[1].source_ref, `drawing:${drawing.id}`);
    assert.strictEqual((await services.tickets.listUserTickets(1, drawing.id)).length, 5);
  });

  it('leaves balance and tickets untouched when points are short', async () => {
    const harness = mkHarness();
    const { services } = harness;
    await seedBalance(services, 1, 300);
    const drawing = await mkOpenDrawing(harness);

    await assert.rejects(services.tickets.purchaseTickets(1, drawing.id, 5), InsufficientBalanceError);
    assert.deepStrictEqual(await services.ledger.getBalance(1), { points_earned: 300, points_balance: 300 });
    assert.deepStrictEqual(await services.tickets.listUserTickets(1, drawing.id), []);
  });

  it('validates the quantity', async () => {
    const harness = mkHarness();
    const drawing = await mkOpenDrawing(harness);
    for (const quantity of [0, 101, 1.5]) {
      await assert.rejects(harness.services.tickets.purchaseTickets(1, drawing.id, quantity), ValidationError);
    }
  });

  it('refuses drawings that are not selling', async () => {
    const harness = mkHarness();
    const { services, time } = harness;
    await seedBalance(services, 1, 1000);

    await assert.rejects(services.tickets.purchaseTickets(1, 77, 1), NotFoundError);

    const draft = await services.drawings.createDrawing({
      drawing_type: 'daily',
      name: 'Draft Draw',
      open_time: time.now(),
      draw_time: new Date('2026-03-16T12:00:00.000Z'),
    });
    await assert.rejects(
      services.tickets.purchaseTickets(1, draft.id, 1),
      (error: unknown) => error instanceof DrawingNotOpenError && error.message === `Drawing ${draft.id} is draft`
    );

    const open = await mkOpenDrawing(harness);
    time.set(open.close_time.toISOString());
    await assert.rejects(services.tickets.purchaseTickets(1, open.id, 1), DrawingNotOpenError);
    assert.deepStrictEqual(await services.ledger.getBalance(1), { points_earned: 1000, points_balance: 1000 });
  });

  it('never overdraws under concurrent purchases', async () => {
    const harness = mkHarness();
    const { services } = harness;
    await seedBalance(services, 1, 1000);
    const drawing = await mkOpenDrawing(harness);

    const results = await Promise.allSettled(
      Array.from({ length: 15 }, () => services.tickets.purchaseTickets(1, drawing.id, 1))
    );

    const fulfilled = results.filter((result) => result.status === 'fulfilled');
    const rejected = results.filter(
      (result) => result.status === 'rejected' && result.reason instanceof InsufficientBalanceError
    );
    assert.strictEqual(fulfilled.length, 10);
    assert.strictEqual(rejected.length, 5);
    assert.deepStrictEqual(await services.ledger.getBalance(1), { points_earned: 1000, points_balance: 0 });
    assert.strictEqual((await services.tickets.listUserTickets(1, drawing.id)).length, 10);
    assert.strictEqual((await services.ledger.verifyAccount(1)).consistent, true);
  });

  it('rolls back the spend when a ticket write fails', async () => {
    const harness = mkHarness();
    const { services, store } = harness;
    await seedBalance(services, 1, 1000);
    const drawing = await mkOpenDrawing(harness);
    store.injectFault('insertTicket', new Error('disk full'));

    await assert.rejects(services.tickets.purchaseTickets(1, drawing.id, 3), /disk full/);
    assert.deepStrictEqual(await services.ledger.getBalance(1), { points_earned: 1000, points_balance: 1000 });
    assert.strictEqual((await store.listLedgerEntries(1)).length, 1);
    assert.deepStrictEqual(await store.listTicketsForDrawing(drawing.id), []);
  });

  it('lists tickets only for known drawings', async () => {
    const { services } = mkHarness();
    await assert.rejects(services.tickets.listUserTickets(1, 9), NotFoundError);
  });
});
