import type { FulfillmentStatus } from '../models/types';

export const ADDRESS_CONFIRM_WARNING_DAYS = 7;
export const ADDRESS_CONFIRM_FORFEIT_DAYS = 14;

// The winner has not (validly) confirmed an address; these get the 7-day reminder.
export const UNCONFIRMED_STATUSES: FulfillmentStatus[] = ['winner_notified', 'address_invalid'];

// Anything not yet shipped is forfeited once notified_at + 14 days has passed.
export const TIMEOUT_STATUSES: FulfillmentStatus[] = [...UNCONFIRMED_STATUSES, 'address_confirmed'];

export const FORFEIT_REASONS = {
  unconfirmed: 'address_not_confirmed',
  unshipped: 'not_shipped_before_deadline',
} as const;
