import { describe, it } from 'node:test';
import assert from 'node:assert';

import { mkClosedDrawing, mkHarness, mkOpenDrawing } from '../testing/harness';
import {
  ImmutableResultError,
  InvalidDrawingStateError,
  NotFoundError,
  ValidationError,
} from '../utils/errors';

const OPEN = new Date('2026-03-15T00:00:00.000Z');
const DRAW = new Date('2026-03-21T20:00:00.000Z');

describe('DrawingService.createDrawing', () => {
  it('creates a draft that stops selling five minutes before the draw', async () => {
    const { services } = mkHarness();
    const drawing = await services.drawings.createDrawing({
      drawing_type: 'weekly',
      name: '  Weekly Sneakers  ',
      open_time: OPEN,
      draw_time: DRAW,
      created_by: 9,
    });

    assert.strictEqual(drawing.status, 'draft');
    assert.strictEqual(drawing.name, 'Weekly Sneakers');
    assert.strictEqual(drawing.ticket_cost, 500);
    assert.strictEqual(drawing.winner_count, 1);
    assert.strictEqual(drawing.created_by, 9);
    assert.strictEqual(drawing.close_time.toISOString(), '2026-03-21T19:55:00.000Z');
    assert.strictEqual(drawing.execution_seed_ref, null);
  });

  it('rejects bad input', async () => {
    const { services } = mkHarness();
    const base = { drawing_type: 'daily' as const, name: 'Daily', open_time: OPEN, draw_time: DRAW };

    await assert.rejects(services.drawings.createDrawing({ ...base, name: '   ' }), ValidationError);
    await assert.rejects(services.drawings.createDrawing({ ...base, ticket_cost: 0 }), ValidationError);
    await assert.rejects(services.drawings.createDrawing({ ...base, winner_count: 0 }), ValidationError);
    await assert.rejects(
      services.drawings.createDrawing({ ...base, draw_time: new Date('2026-03-15T00:04:00.000Z') }),
      ValidationError
    );
    await assert.rejects(
      services.drawings.createDrawing({ ...base, open_time: new Date('not a date') }),
      ValidationError
    );
  });
});

describe('DrawingService transitions', () => {
  it('walks draft to open and refuses skipped steps', async () => {
    const { services } = mkHarness();
    const drawing = await services.drawings.createDrawing({
      drawing_type: 'daily',
      name: 'Daily',
      open_time: OPEN,
      draw_time: DRAW,
    });

    await assert.rejects(services.drawings.openDrawing(drawing.id), InvalidDrawingStateError);
    assert.strictEqual((await services.drawings.scheduleDrawing(drawing.id)).status, 'scheduled');
    assert.strictEqual((await services.drawings.scheduleDrawing(drawing.id)).status, 'scheduled');
    assert.strictEqual((await services.drawings.openDrawing(drawing.id)).status, 'open');
    await assert.rejects(services.drawings.scheduleDrawing(drawing.id), InvalidDrawingStateError);
  });

  it('closes early only when forced, and repeats as a no-op', async () => {
    const harness = mkHarness();
    const { services, logs } = harness;
    const drawing = await mkOpenDrawing(harness);

    await assert.rejects(services.drawings.closeDrawing(drawing.id), InvalidDrawingStateError);
    assert.strictEqual((await services.drawings.closeDrawing(drawing.id, { force: true })).status, 'closed');
    assert.strictEqual((await services.drawings.closeDrawing(drawing.id)).status, 'closed');
    assert.strictEqual(logs.filter((entry) => entry.event === 'drawing.closed').length, 1);
  });

  it('cancels idempotently and keeps purchased tickets', async () => {
    const harness = mkHarness();
    const drawing = await mkClosedDrawing(harness, 3, [1, 2]);

    const cancelled = await harness.services.drawings.cancelDrawing(drawing.id);
    const again = await harness.services.drawings.cancelDrawing(drawing.id);

    assert.strictEqual(cancelled.status, 'cancelled');
    assert.strictEqual(again.status, 'cancelled');
    assert.strictEqual((await harness.store.listTicketsForDrawing(drawing.id)).length, 3);
    await assert.rejects(harness.services.drawings.openDrawing(drawing.id), InvalidDrawingStateError);
  });

  it('treats completed drawings as final', async () => {
    const harness = mkHarness();
    const drawing = await mkClosedDrawing(harness, 2, [1]);
    await harness.services.executor.executeDrawing(drawing.id);

    await assert.rejects(harness.services.drawings.cancelDrawing(drawing.id), ImmutableResultError);
    await assert.rejects(harness.services.drawings.closeDrawing(drawing.id), ImmutableResultError);
    await assert.rejects(harness.services.drawings.closeDrawing(drawing.id, { force: true }), ImmutableResultError);
    await assert.rejects(
      harness.services.drawings.addPrize(drawing.id, { rank: 2, name: 'Late prize' }),
      ImmutableResultError
    );
    assert.strictEqual((await harness.services.drawings.getDrawing(drawing.id)).status, 'completed');
  });

  it('reports unknown drawings', async () => {
    const { services } = mkHarness();
    await assert.rejects(services.drawings.getDrawing(5), NotFoundError);
    await assert.rejects(services.drawings.cancelDrawing(5), NotFoundError);
  });
});

describe('DrawingService prizes', () => {
  it('derives winner_count from the prizes a drawing is created with', async () => {
    const { services } = mkHarness();
    const drawing = await services.drawings.createDrawing({
      drawing_type: 'monthly',
      name: 'Monthly Gear',
      open_time: OPEN,
      draw_time: DRAW,
      winner_count: 1,
      prizes: [
        { rank: 1, name: 'Rowing machine', value_usd: 899.5 },
        { rank: 2, name: ' Gift card ', quantity: 4, fulfillment_type: 'digital', description: '  ' },
      ],
    });

    assert.strictEqual(drawing.winner_count, 5);
    const prizes = await services.drawings.listPrizes(drawing.id);
    assert.deepStrictEqual(
      prizes.map((prize) => [prize.rank, prize.name, prize.quantity, prize.value_usd, prize.fulfillment_type, prize.description]),
      [
        [1, 'Rowing machine', 1, 899.5, 'physical', null],
        [2, 'Gift card', 4, null, 'digital', null],
      ]
    );
  });

  it('creates nothing when a prize is invalid', async () => {
    const { services } = mkHarness();
    const base = { drawing_type: 'daily' as const, name: 'Daily', open_time: OPEN, draw_time: DRAW };

    await assert.rejects(
      services.drawings.createDrawing({
        ...base,
        prizes: [
          { rank: 1, name: 'Watch' },
          { rank: 1, name: 'Another watch' },
        ],
      }),
      ValidationError
    );
    await assert.rejects(
      services.drawings.createDrawing({ ...base, prizes: [{ rank: 0, name: 'Watch' }] }),
      ValidationError
    );
    await assert.rejects(
      services.drawings.createDrawing({ ...base, prizes: [{ rank: 1, name: 'Watch', value_usd: -1 }] }),
      ValidationError
    );
    assert.deepStrictEqual(await services.drawings.listDrawings({}, { limit: 10, offset: 0 }), []);
  });

  it('adds prize tiers until ticket sales close', async () => {
    const harness = mkHarness();
    const { drawings } = harness.services;
    const drawing = await mkOpenDrawing(harness, { winner_count: 2 });

    const watch = await drawings.addPrize(drawing.id, { rank: 1, name: 'Smart watch' });
    assert.strictEqual((await drawings.getDrawing(drawing.id)).winner_count, 1);
    await drawings.addPrize(drawing.id, { rank: 2, name: 'Water bottle', quantity: 3 });
    assert.strictEqual((await drawings.getDrawing(drawing.id)).winner_count, 4);

    await assert.rejects(drawings.addPrize(drawing.id, { rank: 1, name: 'Headphones' }), ValidationError);
    await assert.rejects(drawings.addPrize(drawing.id, { rank: 3, name: 'Socks', quantity: 0 }), ValidationError);
    await assert.rejects(drawings.addPrize(drawing.id, { rank: 3, name: ' ' }), ValidationError);
    await assert.rejects(drawings.addPrize(404, { rank: 1, name: 'Watch' }), NotFoundError);
    await assert.rejects(drawings.listPrizes(404), NotFoundError);

    await drawings.closeDrawing(drawing.id, { force: true });
    await assert.rejects(
      drawings.addPrize(drawing.id, { rank: 3, name: 'Socks' }),
      InvalidDrawingStateError
    );
    assert.deepStrictEqual(
      (await drawings.listPrizes(drawing.id)).map((prize) => prize.id === watch.id),
      [true, false]
    );
    assert.strictEqual((await drawings.getDrawing(drawing.id)).winner_count, 4);
  });
});

describe('DrawingService.listDrawings', () => {
  it('lists the soonest draws first with filters and paging', async () => {
    const { services } = mkHarness();
    const { drawings } = services;
    await drawings.createDrawing({ drawing_type: 'weekly', name: 'Weekly', open_time: OPEN, draw_time: DRAW });
    await drawings.createDrawing({
      drawing_type: 'daily',
      name: 'Daily',
      open_time: OPEN,
      draw_time: new Date('2026-03-16T20:00:00.000Z'),
    });
    const later = await drawings.createDrawing({
      drawing_type: 'daily',
      name: 'Later daily',
      open_time: OPEN,
      draw_time: new Date('2026-03-17T20:00:00.000Z'),
    });
    await drawings.scheduleDrawing(later.id);

    const names = async (...args: Parameters<typeof drawings.listDrawings>): Promise<string[]> =>
      (await drawings.listDrawings(...args)).map((drawing) => drawing.name);

    assert.deepStrictEqual(await names({}, { limit: 10, offset: 0 }), ['Daily', 'Later daily', 'Weekly']);
    assert.deepStrictEqual(await names({ drawing_type: 'daily' }, { limit: 1, offset: 1 }), ['Later daily']);
    assert.deepStrictEqual(await names({ status: 'scheduled' }, { limit: 10, offset: 0 }), ['Later daily']);
    assert.deepStrictEqual(await names({ status: 'open' }, { limit: 10, offset: 0 }), []);
  });
});

describe('DrawingService time-driven steps', () => {
  it('opens scheduled drawings whose open time has come', async () => {
    const { services, time } = mkHarness();
    const due = await services.drawings.createDrawing({
      drawing_type: 'daily',
      name: 'Due',
      open_time: new Date('2026-03-14T11:00:00.000Z'),
      draw_time: DRAW,
    });
    const later = await services.drawings.createDrawing({
      drawing_type: 'daily',
      name: 'Later',
      open_time: OPEN,
      draw_time: DRAW,
    });
    await services.drawings.scheduleDrawing(due.id);
    await services.drawings.scheduleDrawing(later.id);

    const summary = await services.drawings.openDueDrawings(time.now());

    assert.deepStrictEqual(summary, { processed: 1, drawing_ids: [due.id], errors: [] });
    assert.strictEqual((await services.drawings.getDrawing(later.id)).status, 'scheduled');
  });

  it('closes open drawings at their close time', async () => {
    const harness = mkHarness();
    const drawing = await mkOpenDrawing(harness);

    assert.strictEqual((await harness.services.drawings.closeDueDrawings(harness.time.now())).processed, 0);
    const summary = await harness.services.drawings.closeDueDrawings(drawing.close_time);
    assert.deepStrictEqual(summary.drawing_ids, [drawing.id]);
  });
});

describe('DrawingService.getResults', () => {
  it('is unavailable until the drawing completes', async () => {
    const harness = mkHarness();
    const drawing = await mkOpenDrawing(harness);
    await assert.rejects(harness.services.drawings.getResults(drawing.id), InvalidDrawingStateError);
  });

  it('returns winning tickets in draw order', async () => {
    const harness = mkHarness();
    const drawing = await mkClosedDrawing(harness, 6, [1, 2, 3], { winner_count: 2 });
    const record = await harness.services.executor.executeDrawing(drawing.id);

    const results = await harness.services.drawings.getResults(drawing.id);
    assert.strictEqual(results.drawing.status, 'completed');
    assert.deepStrictEqual(
      results.winners.map((ticket) => ticket.sequence_number),
      record.winning_sequence_numbers
    );
    assert.ok(results.winners.every((ticket) => ticket.is_winner));
  });
});
