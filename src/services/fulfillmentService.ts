import {
  ADDRESS_CONFIRM_FORFEIT_DAYS,
  ADDRESS_CONFIRM_WARNING_DAYS,
  FORFEIT_REASONS,
  TIMEOUT_STATUSES,
  UNCONFIRMED_STATUSES,
} from '../constants/fulfillmentRules';
import type {
  FulfillmentStatus,
  NotificationType,
  PrizeFulfillment,
  ShippingAddress,
} from '../models/types';
import type { Datastore } from '../repositories/datastore';
import { addDays, type Clock, systemClock } from '../utils/clock';
import {
  describeError,
  InvalidFulfillmentStateError,
  NotFoundError,
  ValidationError,
} from '../utils/errors';
import type { AppLogger } from '../utils/logger';
import type { NotificationDispatcher } from './notificationService';

export type FulfillmentEvent =
  | { type: 'notify' }
  | { type: 'confirm_address'; address: ShippingAddress }
  | { type: 'mark_invalid_address'; reason?: string }
  | { type: 'ship'; carrier: string; tracking_number: string }
  | { type: 'deliver' }
  | { type: 'sweep_timeout' };

export type FulfillmentEventType = FulfillmentEvent['type'];

export interface TransitionResult {
  fulfillment: PrizeFulfillment;
  changed: boolean;
  notice: NotificationType | null;
}

export interface SweepSummary {
  processed: number;
  warned: number[];
  forfeited: number[];
  errors: { fulfillment_id: number; error: string }[];
}

export interface NotifySummary {
  processed: number;
  fulfillment_ids: number[];
  errors: { fulfillment_id: number; error: string }[];
}

const ADDRESS_FIELDS = ['street', 'city', 'state', 'zip_code'] as const;

const normalizeAddress = (address: ShippingAddress): ShippingAddress => {
  const missing = ADDRESS_FIELDS.filter((field) => !address[field]?.trim());
  if (missing.length > 0) {
    throw new ValidationError(`Missing address fields: ${missing.join(', ')}`, { missing });
  }
  return {
    street: address.street.trim(),
    city: address.city.trim(),
    state: address.state.trim(),
    zip_code: address.zip_code.trim(),
  };
};

const isUnconfirmed = (status: FulfillmentStatus): boolean => UNCONFIRMED_STATUSES.includes(status);

const canTimeOut = (status: FulfillmentStatus): boolean => TIMEOUT_STATUSES.includes(status);

const reject = (fulfillment: PrizeFulfillment, event: FulfillmentEventType): never => {
  if (fulfillment.status === 'forfeited') {
    throw new InvalidFulfillmentStateError(fulfillment.id, `Fulfillment ${fulfillment.id} was forfeited`);
  }
  throw new InvalidFulfillmentStateError(
    fulfillment.id,
    `Cannot apply ${event} to a fulfillment in ${fulfillment.status}`
  );
};

/**
 * Pure transition function of the fulfillment state machine.
 *
 * pending -> winner_notified -> address_confirmed -> shipped -> delivered.
 * address_confirmed -> address_invalid -> address_confirmed once corrected.
 * The timeout sweep warns at notified_at + 7 days while no valid address
 * is on file, and forfeits anything still unshipped at notified_at + 14
 * days. Forfeiture is terminal.
 */
export const applyFulfillmentEvent = (
  fulfillment: PrizeFulfillment,
  event: FulfillmentEvent,
  now: Date
): TransitionResult => {
  const unchanged: TransitionResult = { fulfillment, changed: false, notice: null };

  switch (event.type) {
    case 'notify': {
      if (fulfillment.status !== 'pending') {
        return reject(fulfillment, event.type);
      }
      return {
        fulfillment: {
          ...fulfillment,
          status: 'winner_notified',
          notified_at: now,
          address_confirm_deadline: addDays(now, ADDRESS_CONFIRM_FORFEIT_DAYS),
          updated_at: now,
        },
        changed: true,
        notice: 'winner_selected',
      };
    }

    case 'confirm_address': {
      if (!isUnconfirmed(fulfillment.status)) {
        return reject(fulfillment, event.type);
      }
      const deadline = fulfillment.address_confirm_deadline;
      if (deadline && now.getTime() >= deadline.getTime()) {
        throw new InvalidFulfillmentStateError(
          fulfillment.id,
          `The address confirmation window closed at ${deadline.toISOString()}`
        );
      }
      return {
        fulfillment: {
          ...fulfillment,
          status: 'address_confirmed',
          shipping_address: normalizeAddress(event.address),
          address_confirmed_at: now,
          updated_at: now,
        },
        changed: true,
        notice: 'address_confirmed',
      };
    }

    case 'mark_invalid_address': {
      if (fulfillment.status !== 'address_confirmed') {
        return reject(fulfillment, event.type);
      }
      return {
        fulfillment: { ...fulfillment, status: 'address_invalid', updated_at: now },
        changed: true,
        notice: 'address_invalid',
      };
    }

    case 'ship': {
      if (fulfillment.status !== 'address_confirmed') {
        return reject(fulfillment, event.type);
      }
      const carrier = event.carrier.trim();
      const trackingNumber = event.tracking_number.trim();
      if (!carrier || !trackingNumber) {
        throw new ValidationError('Shipping requires a carrier and a tracking number');
      }
      return {
        fulfillment: {
          ...fulfillment,
          status: 'shipped',
          shipping_carrier: carrier,
          tracking_number: trackingNumber,
          shipped_at: now,
          updated_at: now,
        },
        changed: true,
        notice: 'prize_shipped',
      };
    }

    case 'deliver': {
      if (fulfillment.status !== 'shipped') {
        return reject(fulfillment, event.type);
      }
      return {
        fulfillment: { ...fulfillment, status: 'delivered', delivered_at: now, updated_at: now },
        changed: true,
        notice: 'prize_delivered',
      };
    }

    case 'sweep_timeout': {
      if (!canTimeOut(fulfillment.status) || !fulfillment.notified_at) {
        return unchanged;
      }
      const nowMs = now.getTime();
      if (nowMs >= addDays(fulfillment.notified_at, ADDRESS_CONFIRM_FORFEIT_DAYS).getTime()) {
        return {
          fulfillment: {
            ...fulfillment,
            status: 'forfeited',
            forfeited_at: now,
            forfeit_reason: isUnconfirmed(fulfillment.status)
              ? FORFEIT_REASONS.unconfirmed
              : FORFEIT_REASONS.unshipped,
            updated_at: now,
          },
          changed: true,
          notice: 'prize_forfeited',
        };
      }
      if (
        isUnconfirmed(fulfillment.status) &&
        !fulfillment.warning_sent_at &&
        nowMs >= addDays(fulfillment.notified_at, ADDRESS_CONFIRM_WARNING_DAYS).getTime()
      ) {
        return {
          fulfillment: { ...fulfillment, warning_sent_at: now, updated_at: now },
          changed: true,
          notice: 'confirmation_reminder',
        };
      }
      return unchanged;
    }
  }
};

export class FulfillmentService {
  constructor(
    private readonly store: Datastore,
    private readonly dispatcher: NotificationDispatcher,
    private readonly logger: AppLogger,
    private readonly clock: Clock = systemClock
  ) {}

  advanceFulfillment(fulfillmentId: number, event: FulfillmentEvent): Promise<PrizeFulfillment> {
    return this.advanceAt(fulfillmentId, event, this.clock());
  }

  /** Winner-facing address submission; other users' fulfillments read as missing. */
  confirmAddress(
    userId: number,
    fulfillmentId: number,
    address: ShippingAddress
  ): Promise<PrizeFulfillment> {
    return this.advanceAt(fulfillmentId, { type: 'confirm_address', address }, this.clock(), userId);
  }

  async getFulfillment(fulfillmentId: number): Promise<PrizeFulfillment> {
    const fulfillment = await this.store.findFulfillment(fulfillmentId);
    if (!fulfillment) {
      throw new NotFoundError('Fulfillment', fulfillmentId);
    }
    return fulfillment;
  }

  listFulfillments(filter: {
    userId?: number;
    status?: FulfillmentStatus[];
    drawingId?: number;
  }): Promise<PrizeFulfillment[]> {
    return this.store.listFulfillments(filter);
  }

  async notifyPendingWinners(now: Date = this.clock()): Promise<NotifySummary> {
    const pending = await this.store.listFulfillments({ status: ['pending'] });
    const summary: NotifySummary = { processed: 0, fulfillment_ids: [], errors: [] };
    for (const fulfillment of pending) {
      try {
        await this.advanceAt(fulfillment.id, { type: 'notify' }, now);
        summary.processed += 1;
        summary.fulfillment_ids.push(fulfillment.id);
      } catch (error) {
        const message = describeError(error);
        this.logger.error('fulfillment.notify_failed', { fulfillment_id: fulfillment.id, error: message });
        summary.errors.push({ fulfillment_id: fulfillment.id, error: message });
      }
    }
    return summary;
  }

  async sweepTimeouts(now: Date = this.clock()): Promise<SweepSummary> {
    const candidates = await this.store.listFulfillments({ status: TIMEOUT_STATUSES });
    const summary: SweepSummary = { processed: 0, warned: [], forfeited: [], errors: [] };
    for (const candidate of candidates) {
      try {
        const before = candidate.warning_sent_at;
        const after = await this.advanceAt(candidate.id, { type: 'sweep_timeout' }, now);
        summary.processed += 1;
        if (after.status === 'forfeited') {
          summary.forfeited.push(after.id);
        } else if (!before && after.warning_sent_at) {
          summary.warned.push(after.id);
        }
      } catch (error) {
        const message = describeError(error);
        this.logger.error('fulfillment.sweep_failed', { fulfillment_id: candidate.id, error: message });
        summary.errors.push({ fulfillment_id: candidate.id, error: message });
      }
    }
    return summary;
  }

  private async advanceAt(
    fulfillmentId: number,
    event: FulfillmentEvent,
    now: Date,
    ownerId?: number
  ): Promise<PrizeFulfillment> {
    const result = await this.store.transaction(async (tx) => {
      const current = await tx.lockFulfillment(fulfillmentId);
      if (!current || (ownerId !== undefined && current.user_id !== ownerId)) {
        throw new NotFoundError('Fulfillment', fulfillmentId);
      }
      const transition = applyFulfillmentEvent(current, event, now);
      if (transition.changed) {
        await tx.updateFulfillment(transition.fulfillment);
      }
      return { ...transition, from: current.status };
    });

    if (result.changed) {
      this.logger.info('fulfillment.advanced', {
        fulfillment_id: fulfillmentId,
        event: event.type,
        from: result.from,
        to: result.fulfillment.status,
      });
    }
    if (result.notice) {
      await this.sendNotice(result.fulfillment, result.notice);
    }
    return result.fulfillment;
  }

  // Runs after commit; a failed hand-off never undoes the transition.
  private async sendNotice(fulfillment: PrizeFulfillment, type: NotificationType): Promise<void> {
    try {
      const vars: Record<string, string | number> = {
        fulfillment_id: fulfillment.id,
        prize_rank: fulfillment.prize_rank,
      };
      if (fulfillment.address_confirm_deadline) {
        vars.deadline = fulfillment.address_confirm_deadline.toISOString();
      }
      if (fulfillment.shipping_carrier) {
        vars.carrier = fulfillment.shipping_carrier;
      }
      if (fulfillment.tracking_number) {
        vars.tracking_number = fulfillment.tracking_number;
      }
      if (type === 'winner_selected') {
        const drawing = await this.store.findDrawing(fulfillment.drawing_id);
        vars.drawing_name = drawing?.name ?? `drawing ${fulfillment.drawing_id}`;
      }
      await this.dispatcher.dispatch({
        userId: fulfillment.user_id,
        type,
        vars,
        metadata: { fulfillment_id: fulfillment.id, drawing_id: fulfillment.drawing_id },
      });
    } catch (error) {
      this.logger.warn('fulfillment.notice_failed', {
        fulfillment_id: fulfillment.id,
        notice: type,
        error: describeError(error),
      });
    }
  }
}
