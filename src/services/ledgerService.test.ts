import { describe, it } from 'node:test';
import assert from 'node:assert';

import { mkHarness, seedBalance } from '../testing/harness';
import { ContentionError, InsufficientBalanceError, ValidationError } from '../utils/errors';

describe('LedgerService', () => {
  it('records an earn entry and moves both totals', async () => {
    const { services } = mkHarness();
    const entry = await services.ledger.applyEntry({
      user_id: 1,
      kind: 'earn',
      amount: 100,
      reason_code: 'activity_award',
      reason: 'Points for steps',
      source_ref: 'activity:a1',
    });

    assert.strictEqual(entry.id, 1);
    assert.strictEqual(entry.amount, 100);
    assert.strictEqual(entry.balance_after, 100);
    assert.strictEqual(entry.created_at.toISOString(), '2026-03-14T12:00:00.000Z');
    assert.deepStrictEqual(await services.ledger.getBalance(1), { points_earned: 100, points_balance: 100 });
  });

  it('returns zeros for a user without an account', async () => {
    const { services } = mkHarness();
    assert.deepStrictEqual(await services.ledger.getBalance(42), { points_earned: 0, points_balance: 0 });
  });

  it('rejects a spend larger than the balance and writes nothing', async () => {
    const { services, store } = mkHarness();
    await seedBalance(services, 1, 300);

    await assert.rejects(
      services.ledger.applyEntry({
        user_id: 1,
        kind: 'spend',
        amount: -500,
        reason_code: 'ticket_purchase',
        reason: '5 ticket(s)',
      }),
      (error: unknown) =>
        error instanceof InsufficientBalanceError && error.message === 'Insufficient points: need 500, have 300'
    );
    assert.strictEqual((await store.listLedgerEntries(1)).length, 1);
    assert.deepStrictEqual(await services.ledger.getBalance(1), { points_earned: 300, points_balance: 300 });
  });

  it('enforces the sign for each entry kind', async () => {
    const { services } = mkHarness();
    await assert.rejects(
      services.ledger.applyEntry({ user_id: 1, kind: 'spend', amount: 10, reason_code: 'ticket_purchase', reason: 'x' }),
      ValidationError
    );
    await assert.rejects(
      services.ledger.applyEntry({ user_id: 1, kind: 'earn', amount: -10, reason_code: 'manual_award', reason: 'x' }),
      ValidationError
    );
    await assert.rejects(
      services.ledger.applyEntry({ user_id: 1, kind: 'adjust', amount: 0, reason_code: 'admin_adjustment', reason: 'x' }),
      ValidationError
    );
    await assert.rejects(
      services.ledger.applyEntry({ user_id: 1, kind: 'earn', amount: 2.5, reason_code: 'manual_award', reason: 'x' }),
      ValidationError
    );
  });

  it('clamps a deduction at zero and says so in the reason', async () => {
    const { services } = mkHarness();
    await seedBalance(services, 1, 100);

    const entry = await services.ledger.adjustPoints(1, -250, 'Chargeback', 9);

    assert.strictEqual(entry.kind, 'adjust');
    assert.strictEqual(entry.amount, -100);
    assert.strictEqual(entry.balance_after, 0);
    assert.strictEqual(entry.reason_code, 'admin_adjustment');
    assert.strictEqual(entry.source_ref, 'admin:9');
    assert.strictEqual(entry.reason, 'Chargeback (clamped from -250 to -100: balance cannot go below zero)');
    assert.deepStrictEqual(await services.ledger.getBalance(1), { points_earned: 100, points_balance: 0 });
  });

  it('applies positive adjustments without touching lifetime earnings', async () => {
    const { services } = mkHarness();
    await seedBalance(services, 1, 100);
    const entry = await services.ledger.adjustPoints(1, 40, 'Goodwill credit', 9);
    assert.strictEqual(entry.balance_after, 140);
    assert.deepStrictEqual(await services.ledger.getBalance(1), { points_earned: 100, points_balance: 140 });
  });

  it('pages history newest first', async () => {
    const { services } = mkHarness();
    await seedBalance(services, 1, 100);
    await seedBalance(services, 1, 200);
    await seedBalance(services, 1, 300);

    const firstPage = await services.ledger.getLedgerHistory(1, { limit: 2 });
    assert.deepStrictEqual(
      firstPage.map((entry) => entry.id),
      [3, 2]
    );
    const secondPage = await services.ledger.getLedgerHistory(1, { limit: 2, offset: 2 });
    assert.deepStrictEqual(
      secondPage.map((entry) => entry.balance_after),
      [100]
    );
  });

  it('verifies that the entries fold to the stored balance', async () => {
    const { services } = mkHarness();
    await seedBalance(services, 1, 500);
    await services.ledger.applyEntry({
      user_id: 1,
      kind: 'spend',
      amount: -200,
      reason_code: 'ticket_purchase',
      reason: '2 ticket(s) for Daily Draw',
    });
    await services.ledger.adjustPoints(1, -25, 'Correction', 2);

    assert.deepStrictEqual(await services.ledger.verifyAccount(1), {
      user_id: 1,
      consistent: true,
      computed_balance: 275,
      computed_earned: 500,
      stored_balance: 275,
      stored_earned: 500,
      last_balance_after: 275,
      entry_count: 3,
    });
  });

  it('reports drift when the balance row moved without an entry', async () => {
    const { services, store } = mkHarness();
    await seedBalance(services, 1, 100);
    await store.transaction(async (tx) => {
      const account = await tx.lockAccount(1);
      await tx.updateAccount(
        { ...account, points_balance: account.points_balance + 5, version: account.version + 1 },
        account.version
      );
    });

    const verification = await services.ledger.verifyAccount(1);
    assert.strictEqual(verification.consistent, false);
    assert.strictEqual(verification.computed_balance, 100);
    assert.strictEqual(verification.stored_balance, 105);
  });

  it('refuses a balance write against a stale version', async () => {
    const { services, store } = mkHarness();
    await seedBalance(services, 1, 100);
    await assert.rejects(
      store.transaction(async (tx) => {
        const account = await tx.lockAccount(1);
        await tx.updateAccount({ ...account, points_balance: 0 }, account.version - 1);
      }),
      ContentionError
    );
    assert.deepStrictEqual(await services.ledger.getBalance(1), { points_earned: 100, points_balance: 100 });
  });
});
