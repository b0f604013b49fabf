import type { NotificationType } from '../models/types';

export interface NotificationTemplate {
  title: string;
  message: (vars: Record<string, string | number>) => string;
}

export const NOTIFICATION_TEMPLATES: Record<NotificationType, NotificationTemplate> = {
  winner_selected: {
    title: 'You won a prize!',
    message: (vars) =>
      `Your ticket won in "${vars.drawing_name}". Confirm your shipping address by ${vars.deadline} to claim it.`,
  },
  confirmation_reminder: {
    title: 'Reminder: confirm your shipping address',
    message: (vars) =>
      `Your prize is waiting. Confirm your shipping address by ${vars.deadline} or the prize will be forfeited.`,
  },
  address_confirmed: {
    title: 'Shipping address confirmed',
    message: () => 'Thanks! We will let you know as soon as your prize ships.',
  },
  address_invalid: {
    title: 'We could not use your shipping address',
    message: (vars) =>
      `Please submit a corrected shipping address by ${vars.deadline}.`,
  },
  prize_shipped: {
    title: 'Your prize has shipped',
    message: (vars) => `Carrier: ${vars.carrier}. Tracking number: ${vars.tracking_number}.`,
  },
  prize_delivered: {
    title: 'Your prize was delivered',
    message: () => 'Enjoy your prize!',
  },
  prize_forfeited: {
    title: 'Prize forfeited',
    message: () =>
      'The shipping address was not confirmed within 14 days, so the prize has been forfeited.',
  },
};
