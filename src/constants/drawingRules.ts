import type { DrawingStatus, DrawingType } from '../models/types';

export const DRAWING_TYPES: DrawingType[] = ['daily', 'weekly', 'monthly', 'annual'];

export const DRAWING_TICKET_COSTS: Record<DrawingType, number> = {
  daily: 100,
  weekly: 500,
  monthly: 2_000,
  annual: 10_000,
};

export const TICKET_SALES_CLOSE_MINUTES_BEFORE = 5;

export const MAX_TICKETS_PER_PURCHASE = 100;

export const DRAWING_TRANSITIONS: Record<DrawingStatus, DrawingStatus[]> = {
  draft: ['scheduled', 'cancelled'],
  scheduled: ['open', 'cancelled'],
  open: ['closed', 'cancelled'],
  closed: ['completed', 'cancelled'],
  completed: [],
  cancelled: [],
};
