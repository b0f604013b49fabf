import type {
  AccountBalance,
  Balance,
  LedgerEntry,
  LedgerEntryKind,
  LedgerReasonCode,
} from '../models/types';
import type { Datastore, Page, Transaction } from '../repositories/datastore';
import { type Clock, systemClock } from '../utils/clock';
import { InsufficientBalanceError, ValidationError } from '../utils/errors';

export interface EntryRequest {
  user_id: number;
  kind: LedgerEntryKind;
  // signed: earn > 0, spend < 0, adjust either way
  amount: number;
  reason_code: LedgerReasonCode;
  reason: string;
  source_ref?: string | null;
}

export interface AccountVerification {
  user_id: number;
  consistent: boolean;
  computed_balance: number;
  computed_earned: number;
  stored_balance: number;
  stored_earned: number;
  last_balance_after: number | null;
  entry_count: number;
}

const MAX_PAGE_SIZE = 100;

const checkAmount = (request: EntryRequest): void => {
  if (!Number.isSafeInteger(request.amount)) {
    throw new ValidationError('Ledger amount must be a whole number of points', {
      amount: request.amount,
    });
  }
  if (request.kind === 'earn' && request.amount <= 0) {
    throw new ValidationError('Earn entries must carry a positive amount', { amount: request.amount });
  }
  if (request.kind === 'spend' && request.amount >= 0) {
    throw new ValidationError('Spend entries must carry a negative amount', { amount: request.amount });
  }
  if (request.kind === 'adjust' && request.amount === 0) {
    throw new ValidationError('Adjustments must change the balance', { amount: request.amount });
  }
};

/**
 * Sole writer of balances. Each entry locks the account row, checks the
 * rule for its kind, appends the immutable entry and moves the balance in
 * the caller's transaction.
 */
export class LedgerService {
  constructor(
    private readonly store: Datastore,
    private readonly clock: Clock = systemClock
  ) {}

  async applyEntryInTx(tx: Transaction, request: EntryRequest): Promise<LedgerEntry> {
    checkAmount(request);

    const account = await tx.lockAccount(request.user_id);
    let amount = request.amount;
    let reason = request.reason;

    if (request.kind === 'spend' && -amount > account.points_balance) {
      throw new InsufficientBalanceError(request.user_id, -amount, account.points_balance);
    }
    if (request.kind === 'adjust' && account.points_balance + amount < 0) {
      amount = 0 - account.points_balance;
      reason = `${request.reason} (clamped from ${request.amount} to ${amount}: balance cannot go below zero)`;
    }

    const now = this.clock();
    const next: AccountBalance = {
      user_id: account.user_id,
      points_earned: request.kind === 'earn' ? account.points_earned + amount : account.points_earned,
      points_balance: account.points_balance + amount,
      version: account.version + 1,
      updated_at: now,
    };
    await tx.updateAccount(next, account.version);

    return tx.insertLedgerEntry({
      user_id: request.user_id,
      kind: request.kind,
      amount,
      reason_code: request.reason_code,
      reason,
      balance_after: next.points_balance,
      source_ref: request.source_ref ?? null,
      created_at: now,
    });
  }

  async applyEntry(request: EntryRequest): Promise<LedgerEntry> {
    return this.store.transaction((tx) => this.applyEntryInTx(tx, request));
  }

  async getBalance(userId: number): Promise<Balance> {
    const account = await this.store.findAccount(userId);
    return {
      points_earned: account?.points_earned ?? 0,
      points_balance: account?.points_balance ?? 0,
    };
  }

  async getLedgerHistory(userId: number, page: Partial<Page> = {}): Promise<LedgerEntry[]> {
    const limit = Math.min(Math.max(page.limit ?? 20, 1), MAX_PAGE_SIZE);
    const offset = Math.max(page.offset ?? 0, 0);
    return this.store.pageLedgerEntries(userId, { limit, offset });
  }

  /** Admin adjustment; a deduction past zero is clamped and the memo says so. */
  async adjustPoints(
    userId: number,
    amount: number,
    reason: string,
    adminId: number
  ): Promise<LedgerEntry> {
    return this.applyEntry({
      user_id: userId,
      kind: 'adjust',
      amount,
      reason_code: 'admin_adjustment',
      reason,
      source_ref: `admin:${adminId}`,
    });
  }

  async verifyAccount(userId: number): Promise<AccountVerification> {
    const [entries, account] = await Promise.all([
      this.store.listLedgerEntries(userId),
      this.store.findAccount(userId),
    ]);

    let balance = 0;
    let earned = 0;
    let everNegative = false;
    let runningMatches = true;
    for (const entry of entries) {
      balance += entry.amount;
      if (entry.kind === 'earn') {
        earned += entry.amount;
      }
      if (balance < 0) {
        everNegative = true;
      }
      if (entry.balance_after !== balance) {
        runningMatches = false;
      }
    }

    const storedBalance = account?.points_balance ?? 0;
    const storedEarned = account?.points_earned ?? 0;
    const last = entries.length > 0 ? entries[entries.length - 1].balance_after : null;

    return {
      user_id: userId,
      consistent:
        !everNegative &&
        runningMatches &&
        balance === storedBalance &&
        earned === storedEarned &&
        (last === null ? storedBalance === 0 : last === storedBalance),
      computed_balance: balance,
      computed_earned: earned,
      stored_balance: storedBalance,
      stored_earned: storedEarned,
      last_balance_after: last,
      entry_count: entries.length,
    };
  }
}
