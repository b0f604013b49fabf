import { NOTIFICATION_TEMPLATES } from '../constants/notificationTemplates';
import type { NotificationType } from '../models/types';
import type { Datastore } from '../repositories/datastore';
import { type Clock, systemClock } from '../utils/clock';

export interface WinnerNotice {
  userId: number;
  type: NotificationType;
  vars?: Record<string, string | number>;
  metadata?: Record<string, unknown>;
}

/**
 * Hand-off to the notification collaborator. Delivery (email, push) and
 * its retries are the collaborator's concern.
 */
export interface NotificationDispatcher {
  dispatch(notice: WinnerNotice): Promise<void>;
}

/** Renders the template and appends it to the USER_NOTIFICATIONS outbox. */
export class OutboxNotificationDispatcher implements NotificationDispatcher {
  constructor(
    private readonly store: Datastore,
    private readonly clock: Clock = systemClock
  ) {}

  async dispatch({ userId, type, vars = {}, metadata }: WinnerNotice): Promise<void> {
    const template = NOTIFICATION_TEMPLATES[type];
    await this.store.transaction((tx) =>
      tx.insertNotification({
        user_id: userId,
        notification_type: type,
        title: template.title,
        message: template.message(vars),
        metadata: metadata ?? null,
        created_at: this.clock(),
      })
    );
  }
}

