// Database model types

export interface AccountBalance {
  user_id: number;
  points_earned: number;
  points_balance: number;
  version: number;
  updated_at: Date;
}

export type LedgerEntryKind = 'earn' | 'spend' | 'adjust';

export type LedgerReasonCode =
  | 'activity_award'
  | 'step_goal_bonus'
  | 'streak_bonus'
  | 'manual_award'
  | 'ticket_purchase'
  | 'admin_adjustment';

export interface LedgerEntry {
  id: number;
  user_id: number;
  kind: LedgerEntryKind;
  // signed: earn > 0, spend < 0, adjust either way
  amount: number;
  reason_code: LedgerReasonCode;
  reason: string;
  balance_after: number;
  source_ref: string | null;
  created_at: Date;
}

export type NewLedgerEntry = Omit<LedgerEntry, 'id'>;

export interface DailyPointsLog {
  user_id: number;
  log_date: string;
  total_points: number;
  step_count: number;
  active_minutes: number;
  workout_bonus_count: number;
  step_goal_awarded: boolean;
  streak_awarded: boolean;
  updated_at: Date;
}

///// activities

export type ActivityType = 'steps' | 'active_minutes' | 'workout';
export type Intensity = 'light' | 'moderate' | 'vigorous';

export interface Activity {
  activity_id: string;
  user_id: number;
  activity_type: ActivityType;
  recorded_at: Date;
  step_count?: number;
  duration_minutes?: number;
  intensity?: Intensity;
  device_id?: string;
}

///// drawings

export type DrawingType = 'daily' | 'weekly' | 'monthly' | 'annual';

export type DrawingStatus =
  | 'draft'
  | 'scheduled'
  | 'open'
  | 'closed'
  | 'completed'
  | 'cancelled';

export interface Drawing {
  id: number;
  drawing_type: DrawingType;
  name: string;
  open_time: Date;
  close_time: Date;
  draw_time: Date;
  ticket_cost: number;
  winner_count: number;
  status: DrawingStatus;
  execution_seed_ref: string | null;
  executed_at: Date | null;
  created_by: number | null;
  created_at: Date;
  updated_at: Date;
}

export type NewDrawing = Omit<Drawing, 'id'>;

export interface Ticket {
  id: number;
  drawing_id: number;
  user_id: number;
  sequence_number: number | null;
  is_winner: boolean;
  purchase_txn_ref: number;
  created_at: Date;
}

export type NewTicket = Omit<Ticket, 'id' | 'sequence_number' | 'is_winner'>;

export type PrizeFulfillmentType = 'digital' | 'physical';

export interface Prize {
  id: number;
  drawing_id: number;
  // 1 is the top prize; winners are drawn for lower ranks first
  rank: number;
  name: string;
  description: string | null;
  value_usd: number | null;
  quantity: number;
  fulfillment_type: PrizeFulfillmentType;
  created_at: Date;
}

export type NewPrize = Omit<Prize, 'id'>;

export interface DrawingFilter {
  status?: DrawingStatus;
  drawing_type?: DrawingType;
}

export interface DrawingSnapshot {
  drawing_id: number;
  ticket_count: number;
  snapshot_digest: string;
  created_at: Date;
}

export interface SequenceAssignment {
  ticket_id: number;
  sequence_number: number;
}

export interface DrawingExecutionRecord {
  drawing_id: number;
  ticket_count_at_snapshot: number;
  random_seed: string;
  algorithm_version: string;
  winning_sequence_numbers: number[];
  executed_at: Date;
}

///// fulfillment

export type FulfillmentStatus =
  | 'pending'
  | 'winner_notified'
  | 'address_confirmed'
  | 'address_invalid'
  | 'shipped'
  | 'delivered'
  | 'forfeited';

export interface ShippingAddress {
  street: string;
  city: string;
  state: string;
  zip_code: string;
}

export interface PrizeFulfillment {
  id: number;
  ticket_id: number;
  drawing_id: number;
  user_id: number;
  prize_id: number | null;
  prize_rank: number;
  status: FulfillmentStatus;
  notified_at: Date | null;
  address_confirm_deadline: Date | null;
  warning_sent_at: Date | null;
  shipping_address: ShippingAddress | null;
  address_confirmed_at: Date | null;
  shipping_carrier: string | null;
  tracking_number: string | null;
  shipped_at: Date | null;
  delivered_at: Date | null;
  forfeited_at: Date | null;
  forfeit_reason: string | null;
  created_at: Date;
  updated_at: Date;
}

export type NewPrizeFulfillment = Omit<PrizeFulfillment, 'id'>;

///// anti-gaming review queue

export type ReviewKind = 'anomaly' | 'shared_device';
export type ReviewStatus = 'open' | 'dismissed' | 'actioned';

export interface ReviewItem {
  id: number;
  user_id: number;
  kind: ReviewKind;
  subject: string;
  details: Record<string, unknown>;
  status: ReviewStatus;
  created_at: Date;
  resolved_at: Date | null;
  resolved_by: number | null;
}

export type NewReviewItem = Omit<ReviewItem, 'id' | 'resolved_at' | 'resolved_by'>;

export interface TierBaseline {
  tier_code: string;
  activity_type: ActivityType;
  mean_value: number;
  stddev_value: number;
  sample_size: number;
}

///// notifications outbox

export type NotificationType =
  | 'winner_selected'
  | 'confirmation_reminder'
  | 'address_confirmed'
  | 'address_invalid'
  | 'prize_shipped'
  | 'prize_delivered'
  | 'prize_forfeited';

export interface UserNotification {
  id: number;
  user_id: number;
  notification_type: NotificationType;
  title: string;
  message: string;
  metadata: Record<string, unknown> | null;
  created_at: Date;
}

export type NewUserNotification = Omit<UserNotification, 'id'>;

// Request/Response types
export interface Balance {
  points_earned: number;
  points_balance: number;
}

export interface TicketPurchase {
  purchase_txn_ref: number;
  drawing_id: number;
  quantity: number;
  total_cost: number;
  balance_after: number;
  tickets: Ticket[];
}

export interface CreateDrawingRequest {
  drawing_type: DrawingType;
  name: string;
  open_time: Date;
  draw_time: Date;
  ticket_cost?: number;
  winner_count?: number;
  prizes?: PrizeRequest[];
  created_by?: number;
}

export interface PrizeRequest {
  rank: number;
  name: string;
  description?: string;
  value_usd?: number;
  quantity?: number;
  fulfillment_type?: PrizeFulfillmentType;
}
