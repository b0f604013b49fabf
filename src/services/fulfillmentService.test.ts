import { describe, it } from 'node:test';
import assert from 'node:assert';

import type { PrizeFulfillment, ShippingAddress } from '../models/types';
import { insertPendingFulfillment, mkHarness, mkOpenDrawing } from '../testing/harness';
import { addDays } from '../utils/clock';
import { InvalidFulfillmentStateError, NotFoundError, ValidationError } from '../utils/errors';
import { applyFulfillmentEvent } from './fulfillmentService';
import type { NotificationDispatcher } from './notificationService';

const T0 = new Date('2026-03-14T12:00:00.000Z');

const ADDRESS: ShippingAddress = {
  street: '1 Test Street',
  city: 'Springfield',
  state: 'IL',
  zip_code: '62701',
};

function mkFulfillment(overrides: Partial<PrizeFulfillment> = {}): PrizeFulfillment {
  return {
    id: 1,
    ticket_id: 11,
    drawing_id: 3,
    user_id: 7,
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
    created_at: T0,
    updated_at: T0,
    ...overrides,
  };
}

function mkNotified(overrides: Partial<PrizeFulfillment> = {}): PrizeFulfillment {
  return mkFulfillment({
    status: 'winner_notified',
    notified_at: T0,
    address_confirm_deadline: addDays(T0, 14),
    ...overrides,
  });
}

describe('applyFulfillmentEvent', () => {
  it('notifies a pending winner and starts the 14-day window', () => {
    const result = applyFulfillmentEvent(mkFulfillment(), { type: 'notify' }, T0);
    assert.strictEqual(result.changed, true);
    assert.strictEqual(result.notice, 'winner_selected');
    assert.strictEqual(result.fulfillment.status, 'winner_notified');
    assert.strictEqual(result.fulfillment.address_confirm_deadline?.toISOString(), '2026-03-28T12:00:00.000Z');
    assert.throws(() => applyFulfillmentEvent(result.fulfillment, { type: 'notify' }, T0), InvalidFulfillmentStateError);
  });

  it('warns once at seven days and forfeits at fourteen', () => {
    const notified = mkNotified();

    assert.strictEqual(applyFulfillmentEvent(notified, { type: 'sweep_timeout' }, addDays(T0, 6)).changed, false);

    const warned = applyFulfillmentEvent(notified, { type: 'sweep_timeout' }, addDays(T0, 7));
    assert.strictEqual(warned.notice, 'confirmation_reminder');
    assert.strictEqual(warned.fulfillment.warning_sent_at?.toISOString(), '2026-03-21T12:00:00.000Z');
    assert.strictEqual(warned.fulfillment.status, 'winner_notified');

    assert.strictEqual(
      applyFulfillmentEvent(warned.fulfillment, { type: 'sweep_timeout' }, addDays(T0, 8)).changed,
      false
    );

    const forfeited = applyFulfillmentEvent(warned.fulfillment, { type: 'sweep_timeout' }, addDays(T0, 14));
    assert.strictEqual(forfeited.notice, 'prize_forfeited');
    assert.strictEqual(forfeited.fulfillment.status, 'forfeited');
    assert.strictEqual(forfeited.fulfillment.forfeit_reason, 'address_not_confirmed');
  });

  it('never leaves the forfeited state', () => {
    const forfeited = mkNotified({ status: 'forfeited', forfeited_at: addDays(T0, 14) });
    assert.throws(
      () => applyFulfillmentEvent(forfeited, { type: 'confirm_address', address: ADDRESS }, addDays(T0, 15)),
      (error: unknown) => error instanceof InvalidFulfillmentStateError && error.message === 'Fulfillment 1 was forfeited'
    );
    assert.strictEqual(applyFulfillmentEvent(forfeited, { type: 'sweep_timeout' }, addDays(T0, 30)).changed, false);
  });

  it('confirms a trimmed address before the deadline only', () => {
    const confirmed = applyFulfillmentEvent(
      mkNotified(),
      { type: 'confirm_address', address: { ...ADDRESS, city: '  Springfield ' } },
      addDays(T0, 3)
    );
    assert.strictEqual(confirmed.fulfillment.status, 'address_confirmed');
    assert.deepStrictEqual(confirmed.fulfillment.shipping_address, ADDRESS);
    assert.strictEqual(confirmed.notice, 'address_confirmed');

    assert.throws(
      () => applyFulfillmentEvent(mkNotified(), { type: 'confirm_address', address: ADDRESS }, addDays(T0, 14)),
      InvalidFulfillmentStateError
    );
    assert.throws(
      () => applyFulfillmentEvent(mkNotified(), { type: 'confirm_address', address: { ...ADDRESS, city: ' ' } }, T0),
      (error: unknown) => error instanceof ValidationError && error.message === 'Missing address fields: city'
    );
  });

  it('sends an invalid address back for correction within the same window', () => {
    const invalid = applyFulfillmentEvent(
      mkNotified({ status: 'address_confirmed', shipping_address: ADDRESS }),
      { type: 'mark_invalid_address', reason: 'undeliverable' },
      addDays(T0, 2)
    );
    assert.strictEqual(invalid.fulfillment.status, 'address_invalid');
    assert.strictEqual(invalid.notice, 'address_invalid');

    const corrected = applyFulfillmentEvent(invalid.fulfillment, { type: 'confirm_address', address: ADDRESS }, addDays(T0, 4));
    assert.strictEqual(corrected.fulfillment.status, 'address_confirmed');

    const lapsed = applyFulfillmentEvent(invalid.fulfillment, { type: 'sweep_timeout' }, addDays(T0, 14));
    assert.strictEqual(lapsed.fulfillment.status, 'forfeited');
  });

  it('forfeits a confirmed but unshipped prize at fourteen days without a reminder', () => {
    const confirmed = mkNotified({
      status: 'address_confirmed',
      shipping_address: ADDRESS,
      address_confirmed_at: addDays(T0, 1),
    });

    assert.strictEqual(applyFulfillmentEvent(confirmed, { type: 'sweep_timeout' }, addDays(T0, 7)).changed, false);

    const lapsed = applyFulfillmentEvent(confirmed, { type: 'sweep_timeout' }, addDays(T0, 30));
    assert.strictEqual(lapsed.changed, true);
    assert.strictEqual(lapsed.notice, 'prize_forfeited');
    assert.strictEqual(lapsed.fulfillment.status, 'forfeited');
    assert.strictEqual(lapsed.fulfillment.forfeit_reason, 'not_shipped_before_deadline');
    assert.strictEqual(lapsed.fulfillment.forfeited_at?.toISOString(), '2026-04-13T12:00:00.000Z');
  });

  it('ships and delivers in order', () => {
    const confirmed = mkNotified({ status: 'address_confirmed', shipping_address: ADDRESS });

    assert.throws(() => applyFulfillmentEvent(confirmed, { type: 'deliver' }, T0), InvalidFulfillmentStateError);
    assert.throws(
      () => applyFulfillmentEvent(confirmed, { type: 'ship', carrier: ' ', tracking_number: '1Z999' }, T0),
      ValidationError
    );

    const shipped = applyFulfillmentEvent(confirmed, { type: 'ship', carrier: 'UPS', tracking_number: '1Z999' }, T0);
    assert.strictEqual(shipped.fulfillment.status, 'shipped');
    assert.strictEqual(shipped.fulfillment.shipping_carrier, 'UPS');
    assert.strictEqual(applyFulfillmentEvent(shipped.fulfillment, { type: 'sweep_timeout' }, addDays(T0, 20)).changed, false);

    const delivered = applyFulfillmentEvent(shipped.fulfillment, { type: 'deliver' }, addDays(T0, 2));
    assert.strictEqual(delivered.fulfillment.status, 'delivered');
    assert.strictEqual(delivered.notice, 'prize_delivered');
  });
});

describe('FulfillmentService', () => {
  it('notifies pending winners through the outbox', async () => {
    const harness = mkHarness();
    const drawing = await mkOpenDrawing(harness);
    const pending = await insertPendingFulfillment(harness, { drawing_id: drawing.id, user_id: 7 });

    const summary = await harness.services.fulfillment.notifyPendingWinners(harness.time.now());

    assert.deepStrictEqual(summary, { processed: 1, fulfillment_ids: [pending.id], errors: [] });
    const [notice] = await harness.store.listNotifications(7);
    assert.strictEqual(notice.notification_type, 'winner_selected');
    assert.strictEqual(notice.title, 'You won a prize!');
    assert.strictEqual(
      notice.message,
      'Your ticket won in "Daily Draw". Confirm your shipping address by 2026-03-28T12:00:00.000Z to claim it.'
    );
    assert.deepStrictEqual(notice.metadata, { fulfillment_id: pending.id, drawing_id: drawing.id });
  });

  it('forfeits after fourteen days and then refuses the address', async () => {
    const harness = mkHarness();
    const { services, time } = harness;
    const pending = await insertPendingFulfillment(harness, { drawing_id: 1, user_id: 7 });
    await services.fulfillment.notifyPendingWinners(time.now());

    const week = await services.fulfillment.sweepTimeouts(addDays(time.now(), 7));
    assert.deepStrictEqual(week, { processed: 1, warned: [pending.id], forfeited: [], errors: [] });

    const fortnight = await services.fulfillment.sweepTimeouts(addDays(time.now(), 14));
    assert.deepStrictEqual(fortnight.forfeited, [pending.id]);

    await assert.rejects(services.fulfillment.confirmAddress(7, pending.id, ADDRESS), InvalidFulfillmentStateError);
    assert.strictEqual((await services.fulfillment.getFulfillment(pending.id)).status, 'forfeited');
    const types = (await harness.store.listNotifications(7)).map((notice) => notice.notification_type);
    assert.deepStrictEqual(types, ['winner_selected', 'confirmation_reminder', 'prize_forfeited']);
  });

  it("hides other users' fulfillments from the address route", async () => {
    const harness = mkHarness();
    const pending = await insertPendingFulfillment(harness, { drawing_id: 1, user_id: 7 });
    await harness.services.fulfillment.notifyPendingWinners(harness.time.now());

    await assert.rejects(harness.services.fulfillment.confirmAddress(8, pending.id, ADDRESS), NotFoundError);
    const confirmed = await harness.services.fulfillment.confirmAddress(7, pending.id, ADDRESS);
    assert.strictEqual(confirmed.status, 'address_confirmed');
  });

  it('keeps the transition when the notice hand-off fails', async () => {
    const failing: NotificationDispatcher = {
      dispatch: async () => {
        throw new Error('smtp down');
      },
    };
    const harness = mkHarness(undefined, { dispatcher: failing });
    const pending = await insertPendingFulfillment(harness, { drawing_id: 1, user_id: 7 });

    const notified = await harness.services.fulfillment.advanceFulfillment(pending.id, { type: 'notify' });

    assert.strictEqual(notified.status, 'winner_notified');
    const failures = harness.logs.filter((entry) => entry.event === 'fulfillment.notice_failed');
    assert.strictEqual(failures.length, 1);
    assert.strictEqual(failures[0].level, 'warn');
    assert.deepStrictEqual(failures[0].payload, {
      fulfillment_id: pending.id,
      notice: 'winner_selected',
      error: 'smtp down',
    });
  });

  it('filters the fulfillment list', async () => {
    const harness = mkHarness();
    await insertPendingFulfillment(harness, { drawing_id: 1, user_id: 7 });
    await insertPendingFulfillment(harness, { drawing_id: 2, user_id: 8 });

    assert.strictEqual((await harness.services.fulfillment.listFulfillments({ userId: 8 })).length, 1);
    assert.strictEqual((await harness.services.fulfillment.listFulfillments({ status: ['pending'] })).length, 2);
    assert.strictEqual((await harness.services.fulfillment.listFulfillments({ drawingId: 3 })).length, 0);
    await assert.rejects(harness.services.fulfillment.getFulfillment(99), NotFoundError);
  });
});
