import type {
  Connection,
  Pool,
  PoolConnection,
  ResultSetHeader,
  RowDataPacket,
} from 'mysql2/promise';
import type {
  AccountBalance,
  ActivityType,
  DailyPointsLog,
  Drawing,
  DrawingExecutionRecord,
  DrawingFilter,
  DrawingSnapshot,
  DrawingStatus,
  DrawingType,
  FulfillmentStatus,
  LedgerEntry,
  LedgerEntryKind,
  LedgerReasonCode,
  NewDrawing,
  NewLedgerEntry,
  NewPrize,
  NewPrizeFulfillment,
  NewReviewItem,
  NewTicket,
  NewUserNotification,
  NotificationType,
  Prize,
  PrizeFulfillment,
  PrizeFulfillmentType,
  ReviewItem,
  ReviewKind,
  ReviewStatus,
  SequenceAssignment,
  ShippingAddress,
  Ticket,
  TierBaseline,
  UserNotification,
} from '../models/types';
import { ContentionError, describeError } from '../utils/errors';
import type { AppLogger } from '../utils/logger';
import type { Datastore, LockMode, Page, Reader, Transaction } from './datastore';
import { translateMysqlError } from './mysqlErrors';

type Queryable = Pick<Connection, 'query'>;

interface AccountRow extends RowDataPacket {
  user_id: number;
  points_earned: number;
  points_balance: number;
  version: number;
  updated_at: Date;
}

interface LedgerRow extends RowDataPacket {
  id: number;
  user_id: number;
  kind: LedgerEntryKind;
  amount: number;
  reason_code: LedgerReasonCode;
  reason: string;
  balance_after: number;
  source_ref: string | null;
  created_at: Date;
}

interface DailyLogRow extends RowDataPacket {
  user_id: number;
  log_date: string;
  total_points: number;
  step_count: number;
  active_minutes: number;
  workout_bonus_count: number;
  step_goal_awarded: number;
  streak_awarded: number;
  updated_at: Date;
}

interface DrawingRow extends RowDataPacket {
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

interface PrizeRow extends RowDataPacket {
  id: number;
  drawing_id: number;
  rank: number;
  name: string;
  description: string | null;
  value_usd: string | number | null;
  quantity: number;
  fulfillment_type: PrizeFulfillmentType;
  created_at: Date;
}

interface TicketRow extends RowDataPacket {
  id: number;
  drawing_id: number;
  user_id: number;
  sequence_number: number | null;
  is_winner: number;
  purchase_txn_ref: number;
  created_at: Date;
}

interface SnapshotRow extends RowDataPacket {
  drawing_id: number;
  ticket_count: number;
  snapshot_digest: string;
  created_at: Date;
}

interface ExecutionRow extends RowDataPacket {
  drawing_id: number;
  ticket_count_at_snapshot: number;
  random_seed: string;
  algorithm_version: string;
  winning_sequence_numbers: unknown;
  executed_at: Date;
}

interface FulfillmentRow extends RowDataPacket {
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
  shipping_address: unknown;
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

interface BaselineRow extends RowDataPacket {
  tier_code: string;
  activity_type: ActivityType;
  mean_value: number;
  stddev_value: number;
  sample_size: number;
}

interface DeviceUserRow extends RowDataPacket {
  user_id: number;
}

interface ReviewRow extends RowDataPacket {
  id: number;
  user_id: number;
  kind: ReviewKind;
  subject: string;
  details: unknown;
  status: ReviewStatus;
  created_at: Date;
  resolved_at: Date | null;
  resolved_by: number | null;
}

interface NotificationRow extends RowDataPacket {
  id: number;
  user_id: number;
  notification_type: NotificationType;
  title: string;
  message: string;
  metadata: unknown;
  created_at: Date;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// JSON columns arrive parsed, but older servers hand back strings.
const parseJson = (value: unknown): unknown => {
  if (typeof value === 'string') {
    return JSON.parse(value);
  }
  return value;
};

const toSequenceList = (value: unknown): number[] => {
  const parsed = parseJson(value);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter((item): item is number => typeof item === 'number');
};

const toShippingAddress = (value: unknown): ShippingAddress | null => {
  const parsed = parseJson(value);
  if (!isRecord(parsed)) {
    return null;
  }
  const { street, city, state, zip_code } = parsed;
  if (
    typeof street !== 'string' ||
    typeof city !== 'string' ||
    typeof state !== 'string' ||
    typeof zip_code !== 'string'
  ) {
    return null;
  }
  return { street, city, state, zip_code };
};

const toRecord = (value: unknown): Record<string, unknown> => {
  const parsed = parseJson(value);
  return isRecord(parsed) ? parsed : {};
};

const mapAccount = (row: AccountRow): AccountBalance => ({
  user_id: row.user_id,
  points_earned: Number(row.points_earned),
  points_balance: Number(row.points_balance),
  version: row.version,
  updated_at: row.updated_at,
});

const mapLedger = (row: LedgerRow): LedgerEntry => ({
  id: row.id,
  user_id: row.user_id,
  kind: row.kind,
  amount: Number(row.amount),
  reason_code: row.reason_code,
  reason: row.reason,
  balance_after: Number(row.balance_after),
  source_ref: row.source_ref,
  created_at: row.created_at,
});

const mapDailyLog = (row: DailyLogRow): DailyPointsLog => ({
  user_id: row.user_id,
  log_date: row.log_date,
  total_points: row.total_points,
  step_count: row.step_count,
  active_minutes: row.active_minutes,
  workout_bonus_count: row.workout_bonus_count,
  step_goal_awarded: row.step_goal_awarded === 1,
  streak_awarded: row.streak_awarded === 1,
  updated_at: row.updated_at,
});

const mapDrawing = (row: DrawingRow): Drawing => ({
  id: row.id,
  drawing_type: row.drawing_type,
  name: row.name,
  open_time: row.open_time,
  close_time: row.close_time,
  draw_time: row.draw_time,
  ticket_cost: row.ticket_cost,
  winner_count: row.winner_count,
  status: row.status,
  execution_seed_ref: row.execution_seed_ref,
  executed_at: row.executed_at,
  created_by: row.created_by,
  created_at: row.created_at,
  updated_at: row.updated_at,
});

// DECIMAL columns come back as strings
const mapPrize = (row: PrizeRow): Prize => ({
  id: row.id,
  drawing_id: row.drawing_id,
  rank: row.rank,
  name: row.name,
  description: row.description,
  value_usd: row.value_usd === null ? null : Number(row.value_usd),
  quantity: row.quantity,
  fulfillment_type: row.fulfillment_type,
  created_at: row.created_at,
});

const mapTicket = (row: TicketRow): Ticket => ({
  id: row.id,
  drawing_id: row.drawing_id,
  user_id: row.user_id,
  sequence_number: row.sequence_number,
  is_winner: row.is_winner === 1,
  purchase_txn_ref: row.purchase_txn_ref,
  created_at: row.created_at,
});

const mapExecution = (row: ExecutionRow): DrawingExecutionRecord => ({
  drawing_id: row.drawing_id,
  ticket_count_at_snapshot: row.ticket_count_at_snapshot,
  random_seed: row.random_seed,
  algorithm_version: row.algorithm_version,
  winning_sequence_numbers: toSequenceList(row.winning_sequence_numbers),
  executed_at: row.executed_at,
});

const mapFulfillment = (row: FulfillmentRow): PrizeFulfillment => ({
  id: row.id,
  ticket_id: row.ticket_id,
  drawing_id: row.drawing_id,
  user_id: row.user_id,
  prize_id: row.prize_id,
  prize_rank: row.prize_rank,
  status: row.status,
  notified_at: row.notified_at,
  address_confirm_deadline: row.address_confirm_deadline,
  warning_sent_at: row.warning_sent_at,
  shipping_address: toShippingAddress(row.shipping_address),
  address_confirmed_at: row.address_confirmed_at,
  shipping_carrier: row.shipping_carrier,
  tracking_number: row.tracking_number,
  shipped_at: row.shipped_at,
  delivered_at: row.delivered_at,
  forfeited_at: row.forfeited_at,
  forfeit_reason: row.forfeit_reason,
  created_at: row.created_at,
  updated_at: row.updated_at,
});

const mapReview = (row: ReviewRow): ReviewItem => ({
  id: row.id,
  user_id: row.user_id,
  kind: row.kind,
  subject: row.subject,
  details: toRecord(row.details),
  status: row.status,
  created_at: row.created_at,
  resolved_at: row.resolved_at,
  resolved_by: row.resolved_by,
});

const mapNotification = (row: NotificationRow): UserNotification => {
  const metadata = parseJson(row.metadata);
  return {
    id: row.id,
    user_id: row.user_id,
    notification_type: row.notification_type,
    title: row.title,
    message: row.message,
    metadata: isRecord(metadata) ? metadata : null,
    created_at: row.created_at,
  };
};

const SEQUENCE_BATCH_SIZE = 500;

class MysqlReader implements Reader {
  constructor(protected readonly db: Queryable) {}

  protected async select<T extends RowDataPacket>(sql: string, values: unknown[] = []): Promise<T[]> {
    try {
      const [rows] = await this.db.query<T[]>(sql, values);
      return rows;
    } catch (error) {
      throw translateMysqlError(error);
    }
  }

  protected async write(table: string, sql: string, values: unknown[]): Promise<ResultSetHeader> {
    try {
      const [result] = await this.db.query<ResultSetHeader>(sql, values);
      return result;
    } catch (error) {
      throw translateMysqlError(error, table);
    }
  }

  async findAccount(userId: number): Promise<AccountBalance | null> {
    const rows = await this.select<AccountRow>(
      'SELECT * FROM ACCOUNT_BALANCES WHERE user_id = ?',
      [userId]
    );
    return rows.length > 0 ? mapAccount(rows[0]) : null;
  }

  async listLedgerEntries(userId: number): Promise<LedgerEntry[]> {
    const rows = await this.select<LedgerRow>(
      'SELECT * FROM LEDGER_ENTRIES WHERE user_id = ? ORDER BY id ASC',
      [userId]
    );
    return rows.map(mapLedger);
  }

  async pageLedgerEntries(userId: number, page: Page): Promise<LedgerEntry[]> {
    const rows = await this.select<LedgerRow>(
      'SELECT * FROM LEDGER_ENTRIES WHERE user_id = ? ORDER BY id DESC LIMIT ? OFFSET ?',
      [userId, page.limit, page.offset]
    );
    return rows.map(mapLedger);
  }

  async listDailyLogs(userId: number, fromDay: string, toDay: string): Promise<DailyPointsLog[]> {
    const rows = await this.select<DailyLogRow>(
      `SELECT * FROM DAILY_POINTS_LOG
       WHERE user_id = ? AND log_date BETWEEN ? AND ?
       ORDER BY log_date ASC`,
      [userId, fromDay, toDay]
    );
    return rows.map(mapDailyLog);
  }

  async findDrawing(drawingId: number): Promise<Drawing | null> {
    const rows = await this.select<DrawingRow>('SELECT * FROM DRAWINGS WHERE id = ?', [drawingId]);
    return rows.length > 0 ? mapDrawing(rows[0]) : null;
  }

  async listDrawingsByStatus(status: DrawingStatus): Promise<Drawing[]> {
    const rows = await this.select<DrawingRow>(
      'SELECT * FROM DRAWINGS WHERE status = ? ORDER BY id ASC',
      [status]
    );
    return rows.map(mapDrawing);
  }

  async listDrawings(filter: DrawingFilter, page: Page): Promise<Drawing[]> {
    const clauses: string[] = [];
    const values: unknown[] = [];
    if (filter.status) {
      clauses.push('status = ?');
      values.push(filter.status);
    }
    if (filter.drawing_type) {
      clauses.push('drawing_type = ?');
      values.push(filter.drawing_type);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = await this.select<DrawingRow>(
      `SELECT * FROM DRAWINGS ${where} ORDER BY draw_time ASC, id ASC LIMIT ? OFFSET ?`,
      [...values, page.limit, page.offset]
    );
    return rows.map(mapDrawing);
  }

  async listPrizes(drawingId: number): Promise<Prize[]> {
    const rows = await this.select<PrizeRow>(
      'SELECT * FROM PRIZES WHERE drawing_id = ? ORDER BY `rank` ASC',
      [drawingId]
    );
    return rows.map(mapPrize);
  }

  async listTicketsForDrawing(drawingId: number): Promise<Ticket[]> {
    const rows = await this.select<TicketRow>(
      'SELECT * FROM TICKETS WHERE drawing_id = ? ORDER BY created_at ASC, id ASC',
      [drawingId]
    );
    return rows.map(mapTicket);
  }

  async listSnapshotTickets(drawingId: number): Promise<Ticket[]> {
    const rows = await this.select<TicketRow>(
      `SELECT * FROM TICKETS
       WHERE drawing_id = ? AND sequence_number IS NOT NULL
       ORDER BY sequence_number ASC`,
      [drawingId]
    );
    return rows.map(mapTicket);
  }

  async listUserTickets(userId: number, drawingId: number): Promise<Ticket[]> {
    const rows = await this.select<TicketRow>(
      `SELECT * FROM TICKETS
       WHERE user_id = ? AND drawing_id = ?
       ORDER BY created_at ASC, id ASC`,
      [userId, drawingId]
    );
    return rows.map(mapTicket);
  }

  async findSnapshot(drawingId: number): Promise<DrawingSnapshot | null> {
    const rows = await this.select<SnapshotRow>(
      'SELECT * FROM DRAWING_SNAPSHOTS WHERE drawing_id = ?',
      [drawingId]
    );
    if (rows.length === 0) {
      return null;
    }
    const row = rows[0];
    return {
      drawing_id: row.drawing_id,
      ticket_count: row.ticket_count,
      snapshot_digest: row.snapshot_digest,
      created_at: row.created_at,
    };
  }

  async findExecutionRecord(drawingId: number): Promise<DrawingExecutionRecord | null> {
    const rows = await this.select<ExecutionRow>(
      'SELECT * FROM DRAWING_EXECUTIONS WHERE drawing_id = ?',
      [drawingId]
    );
    return rows.length > 0 ? mapExecution(rows[0]) : null;
  }

  async findFulfillment(fulfillmentId: number): Promise<PrizeFulfillment | null> {
    const rows = await this.select<FulfillmentRow>(
      'SELECT * FROM PRIZE_FULFILLMENTS WHERE id = ?',
      [fulfillmentId]
    );
    return rows.length > 0 ? mapFulfillment(rows[0]) : null;
  }

  async listFulfillments(filter: {
    status?: FulfillmentStatus[];
    userId?: number;
    drawingId?: number;
  }): Promise<PrizeFulfillment[]> {
    const clauses: string[] = [];
    const values: unknown[] = [];
    if (filter.status) {
      if (filter.status.length === 0) {
        return [];
      }
      clauses.push('status IN (?)');
      values.push(filter.status);
    }
    if (filter.userId !== undefined) {
      clauses.push('user_id = ?');
      values.push(filter.userId);
    }
    if (filter.drawingId !== undefined) {
      clauses.push('drawing_id = ?');
      values.push(filter.drawingId);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = await this.select<FulfillmentRow>(
      `SELECT * FROM PRIZE_FULFILLMENTS ${where} ORDER BY id ASC`,
      values
    );
    return rows.map(mapFulfillment);
  }

  async findTierBaseline(userId: number, activityType: ActivityType): Promise<TierBaseline | null> {
    const rows = await this.select<BaselineRow>(
      `SELECT b.*
       FROM TIER_ACTIVITY_BASELINES b
       JOIN USER_TIERS t ON t.tier_code = b.tier_code
       WHERE t.user_id = ? AND b.activity_type = ?`,
      [userId, activityType]
    );
    if (rows.length === 0) {
      return null;
    }
    const row = rows[0];
    return {
      tier_code: row.tier_code,
      activity_type: row.activity_type,
      mean_value: Number(row.mean_value),
      stddev_value: Number(row.stddev_value),
      sample_size: row.sample_size,
    };
  }

  async listDeviceUsers(deviceId: string): Promise<number[]> {
    const rows = await this.select<DeviceUserRow>(
      'SELECT user_id FROM USER_DEVICES WHERE device_id = ? ORDER BY user_id ASC',
      [deviceId]
    );
    return rows.map((row) => row.user_id);
  }

  async findOpenReviewItem(
    userId: number,
    kind: ReviewKind,
    subject: string
  ): Promise<ReviewItem | null> {
    const rows = await this.select<ReviewRow>(
      `SELECT * FROM REVIEW_ITEMS
       WHERE user_id = ? AND kind = ? AND subject = ? AND status = 'open'
       ORDER BY id ASC LIMIT 1`,
      [userId, kind, subject]
    );
    return rows.length > 0 ? mapReview(rows[0]) : null;
  }

  async listReviewItems(status: ReviewStatus): Promise<ReviewItem[]> {
    const rows = await this.select<ReviewRow>(
      'SELECT * FROM REVIEW_ITEMS WHERE status = ? ORDER BY id ASC',
      [status]
    );
    return rows.map(mapReview);
  }

  async findReviewItem(reviewId: number): Promise<ReviewItem | null> {
    const rows = await this.select<ReviewRow>('SELECT * FROM REVIEW_ITEMS WHERE id = ?', [reviewId]);
    return rows.length > 0 ? mapReview(rows[0]) : null;
  }

  async listNotifications(userId: number): Promise<UserNotification[]> {
    const rows = await this.select<NotificationRow>(
      'SELECT * FROM USER_NOTIFICATIONS WHERE user_id = ? ORDER BY id ASC',
      [userId]
    );
    return rows.map(mapNotification);
  }
}

class MysqlTransaction extends MysqlReader implements Transaction {
  async lockAccount(userId: number): Promise<AccountBalance> {
    await this.write(
      'ACCOUNT_BALANCES',
      `INSERT INTO ACCOUNT_BALANCES (user_id, points_earned, points_balance, version, updated_at)
       VALUES (?, 0, 0, 0, CURRENT_TIMESTAMP(3))
       ON DUPLICATE KEY UPDATE user_id = user_id`,
      [userId]
    );
    const rows = await this.select<AccountRow>(
      'SELECT * FROM ACCOUNT_BALANCES WHERE user_id = ? FOR UPDATE',
      [userId]
    );
    return mapAccount(rows[0]);
  }

  async updateAccount(account: AccountBalance, expectedVersion: number): Promise<void> {
    const result = await this.write(
      'ACCOUNT_BALANCES',
      `UPDATE ACCOUNT_BALANCES
       SET points_earned = ?, points_balance = ?, version = ?, updated_at = ?
       WHERE user_id = ? AND version = ?`,
      [
        account.points_earned,
        account.points_balance,
        account.version,
        account.updated_at,
        account.user_id,
        expectedVersion,
      ]
    );
    if (result.affectedRows === 0) {
      throw new ContentionError(`Balance for user ${account.user_id} changed concurrently`);
    }
  }

  async insertLedgerEntry(entry: NewLedgerEntry): Promise<LedgerEntry> {
    const result = await this.write(
      'LEDGER_ENTRIES',
      `INSERT INTO LEDGER_ENTRIES
        (user_id, kind, amount, reason_code, reason, balance_after, source_ref, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        entry.user_id,
        entry.kind,
        entry.amount,
        entry.reason_code,
        entry.reason,
        entry.balance_after,
        entry.source_ref,
        entry.created_at,
      ]
    );
    return { id: result.insertId, ...entry };
  }

  async lockDailyLog(userId: number, day: string): Promise<DailyPointsLog> {
    const rows = await this.select<DailyLogRow>(
      'SELECT * FROM DAILY_POINTS_LOG WHERE user_id = ? AND log_date = ? FOR UPDATE',
      [userId, day]
    );
    if (rows.length > 0) {
      return mapDailyLog(rows[0]);
    }
    return {
      user_id: userId,
      log_date: day,
      total_points: 0,
      step_count: 0,
      active_minutes: 0,
      workout_bonus_count: 0,
      step_goal_awarded: false,
      streak_awarded: false,
      updated_at: new Date(0),
    };
  }

  async saveDailyLog(log: DailyPointsLog): Promise<void> {
    await this.write(
      'DAILY_POINTS_LOG',
      `INSERT INTO DAILY_POINTS_LOG
        (user_id, log_date, total_points, step_count, active_minutes, workout_bonus_count,
         step_goal_awarded, streak_awarded, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON DUPLICATE KEY UPDATE
         total_points = VALUES(total_points),
         step_count = VALUES(step_count),
         active_minutes = VALUES(active_minutes),
         workout_bonus_count = VALUES(workout_bonus_count),
         step_goal_awarded = VALUES(step_goal_awarded),
         streak_awarded = VALUES(streak_awarded),
         updated_at = VALUES(updated_at)`,
      [
        log.user_id,
        log.log_date,
        log.total_points,
        log.step_count,
        log.active_minutes,
        log.workout_bonus_count,
        log.step_goal_awarded ? 1 : 0,
        log.streak_awarded ? 1 : 0,
        log.updated_at,
      ]
    );
  }

  async claimActivity(userId: number, activityId: string, claimedAt: Date): Promise<boolean> {
    // a concurrent claim for the same key waits on the row lock, then sees it as taken
    const result = await this.write(
      'PROCESSED_ACTIVITIES',
      `INSERT IGNORE INTO PROCESSED_ACTIVITIES (user_id, activity_id, processed_at)
       VALUES (?, ?, ?)`,
      [userId, activityId, claimedAt]
    );
    return result.affectedRows === 1;
  }

  async lockDrawing(drawingId: number, mode: LockMode): Promise<Drawing | null> {
    const lock = mode === 'shared' ? 'FOR SHARE' : 'FOR UPDATE';
    const rows = await this.select<DrawingRow>(`SELECT * FROM DRAWINGS WHERE id = ? ${lock}`, [
      drawingId,
    ]);
    return rows.length > 0 ? mapDrawing(rows[0]) : null;
  }

  async insertDrawing(drawing: NewDrawing): Promise<Drawing> {
    const result = await this.write(
      'DRAWINGS',
      `INSERT INTO DRAWINGS
        (drawing_type, name, open_time, close_time, draw_time, ticket_cost, winner_count, status,
         execution_seed_ref, executed_at, created_by, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        drawing.drawing_type,
        drawing.name,
        drawing.open_time,
        drawing.close_time,
        drawing.draw_time,
        drawing.ticket_cost,
        drawing.winner_count,
        drawing.status,
        drawing.execution_seed_ref,
        drawing.executed_at,
        drawing.created_by,
        drawing.created_at,
        drawing.updated_at,
      ]
    );
    return { id: result.insertId, ...drawing };
  }

  async updateDrawing(drawing: Drawing): Promise<void> {
    await this.write(
      'DRAWINGS',
      `UPDATE DRAWINGS
       SET status = ?, winner_count = ?, execution_seed_ref = ?, executed_at = ?, updated_at = ?
       WHERE id = ?`,
      [
        drawing.status,
        drawing.winner_count,
        drawing.execution_seed_ref,
        drawing.executed_at,
        drawing.updated_at,
        drawing.id,
      ]
    );
  }

  async insertPrize(prize: NewPrize): Promise<Prize> {
    const result = await this.write(
      'PRIZES',
      `INSERT INTO PRIZES
        (drawing_id, \`rank\`, name, description, value_usd, quantity, fulfillment_type, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        prize.drawing_id,
        prize.rank,
        prize.name,
        prize.description,
        prize.value_usd,
        prize.quantity,
        prize.fulfillment_type,
        prize.created_at,
      ]
    );
    return { id: result.insertId, ...prize };
  }

  async insertTicket(ticket: NewTicket): Promise<Ticket> {
    const result = await this.write(
      'TICKETS',
      `INSERT INTO TICKETS (drawing_id, user_id, purchase_txn_ref, created_at)
       VALUES (?, ?, ?, ?)`,
      [ticket.drawing_id, ticket.user_id, ticket.purchase_txn_ref, ticket.created_at]
    );
    return { id: result.insertId, ...ticket, sequence_number: null, is_winner: false };
  }

  async assignSequenceNumbers(drawingId: number, assignments: SequenceAssignment[]): Promise<void> {
    for (let start = 0; start < assignments.length; start += SEQUENCE_BATCH_SIZE) {
      const batch = assignments.slice(start, start + SEQUENCE_BATCH_SIZE);
      const cases = batch.map(() => 'WHEN ? THEN ?').join(' ');
      const values: unknown[] = [];
      for (const assignment of batch) {
        values.push(assignment.ticket_id, assignment.sequence_number);
      }
      values.push(drawingId, batch.map((assignment) => assignment.ticket_id));
      await this.write(
        'TICKETS',
        `UPDATE TICKETS
         SET sequence_number = CASE id ${cases} END
         WHERE drawing_id = ? AND id IN (?)`,
        values
      );
    }
  }

  async insertSnapshot(snapshot: DrawingSnapshot): Promise<void> {
    await this.write(
      'DRAWING_SNAPSHOTS',
      `INSERT INTO DRAWING_SNAPSHOTS (drawing_id, ticket_count, snapshot_digest, created_at)
       VALUES (?, ?, ?, ?)`,
      [snapshot.drawing_id, snapshot.ticket_count, snapshot.snapshot_digest, snapshot.created_at]
    );
  }

  async insertExecutionRecord(record: DrawingExecutionRecord): Promise<void> {
    await this.write(
      'DRAWING_EXECUTIONS',
      `INSERT INTO DRAWING_EXECUTIONS
        (drawing_id, ticket_count_at_snapshot, random_seed, algorithm_version,
         winning_sequence_numbers, executed_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        record.drawing_id,
        record.ticket_count_at_snapshot,
        record.random_seed,
        record.algorithm_version,
        JSON.stringify(record.winning_sequence_numbers),
        record.executed_at,
      ]
    );
  }

  async markWinningTickets(drawingId: number, sequenceNumbers: number[]): Promise<void> {
    if (sequenceNumbers.length === 0) {
      return;
    }
    await this.write(
      'TICKETS',
      'UPDATE TICKETS SET is_winner = 1 WHERE drawing_id = ? AND sequence_number IN (?)',
      [drawingId, sequenceNumbers]
    );
  }

  async lockFulfillment(fulfillmentId: number): Promise<PrizeFulfillment | null> {
    const rows = await this.select<FulfillmentRow>(
      'SELECT * FROM PRIZE_FULFILLMENTS WHERE id = ? FOR UPDATE',
      [fulfillmentId]
    );
    return rows.length > 0 ? mapFulfillment(rows[0]) : null;
  }

  async insertFulfillment(fulfillment: NewPrizeFulfillment): Promise<PrizeFulfillment> {
    const result = await this.write(
      'PRIZE_FULFILLMENTS',
      `INSERT INTO PRIZE_FULFILLMENTS
        (ticket_id, drawing_id, user_id, prize_id, prize_rank, status, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        fulfillment.ticket_id,
        fulfillment.drawing_id,
        fulfillment.user_id,
        fulfillment.prize_id,
        fulfillment.prize_rank,
        fulfillment.status,
        fulfillment.created_at,
        fulfillment.updated_at,
      ]
    );
    return { id: result.insertId, ...fulfillment };
  }

  async updateFulfillment(fulfillment: PrizeFulfillment): Promise<void> {
    await this.write(
      'PRIZE_FULFILLMENTS',
      `UPDATE PRIZE_FULFILLMENTS
       SET status = ?, notified_at = ?, address_confirm_deadline = ?, warning_sent_at = ?,
           shipping_address = ?, address_confirmed_at = ?, shipping_carrier = ?,
           tracking_number = ?, shipped_at = ?, delivered_at = ?, forfeited_at = ?,
           forfeit_reason = ?, updated_at = ?
       WHERE id = ?`,
      [
        fulfillment.status,
        fulfillment.notified_at,
        fulfillment.address_confirm_deadline,
        fulfillment.warning_sent_at,
        fulfillment.shipping_address ? JSON.stringify(fulfillment.shipping_address) : null,
        fulfillment.address_confirmed_at,
        fulfillment.shipping_carrier,
        fulfillment.tracking_number,
        fulfillment.shipped_at,
        fulfillment.delivered_at,
        fulfillment.forfeited_at,
        fulfillment.forfeit_reason,
        fulfillment.updated_at,
        fulfillment.id,
      ]
    );
  }

  async registerDevice(userId: number, deviceId: string, seenAt: Date): Promise<void> {
    await this.write(
      'USER_DEVICES',
      `INSERT INTO USER_DEVICES (device_id, user_id, first_seen_at, last_seen_at)
       VALUES (?, ?, ?, ?)
       ON DUPLICATE KEY UPDATE last_seen_at = VALUES(last_seen_at)`,
      [deviceId, userId, seenAt, seenAt]
    );
  }

  async insertReviewItem(item: NewReviewItem): Promise<ReviewItem> {
    const result = await this.write(
      'REVIEW_ITEMS',
      `INSERT INTO REVIEW_ITEMS (user_id, kind, subject, details, status, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [item.user_id, item.kind, item.subject, JSON.stringify(item.details), item.status, item.created_at]
    );
    return { id: result.insertId, ...item, resolved_at: null, resolved_by: null };
  }

  async updateReviewItem(item: ReviewItem): Promise<void> {
    await this.write(
      'REVIEW_ITEMS',
      'UPDATE REVIEW_ITEMS SET status = ?, resolved_at = ?, resolved_by = ? WHERE id = ?',
      [item.status, item.resolved_at, item.resolved_by, item.id]
    );
  }

  async insertNotification(notification: NewUserNotification): Promise<UserNotification> {
    const result = await this.write(
      'USER_NOTIFICATIONS',
      `INSERT INTO USER_NOTIFICATIONS (user_id, notification_type, title, message, metadata, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        notification.user_id,
        notification.notification_type,
        notification.title,
        notification.message,
        notification.metadata ? JSON.stringify(notification.metadata) : null,
        notification.created_at,
      ]
    );
    return { id: result.insertId, ...notification };
  }
}

export class MysqlDatastore extends MysqlReader implements Datastore {
  constructor(
    private readonly pool: Pool,
    private readonly logger: AppLogger
  ) {
    super(pool);
  }

  async transaction<T>(work: (tx: Transaction) => Promise<T>): Promise<T> {
    let connection: PoolConnection | null = null;

    try {
      connection = await this.pool.getConnection();
      await connection.beginTransaction();
      const result = await work(new MysqlTransaction(connection));
      await connection.commit();
      return result;
    } catch (error) {
      if (connection) {
        await this.rollback(connection);
      }
      throw translateMysqlError(error);
    } finally {
      if (connection) {
        connection.release();
      }
    }
  }

  async ping(): Promise<void> {
    await this.select<RowDataPacket>('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async rollback(connection: PoolConnection): Promise<void> {
    try {
      await connection.rollback();
    } catch (rollbackError) {
      // the server discards the transaction when the connection drops
      this.logger.error('datastore.rollback_failed', { error: describeError(rollbackError) });
    }
  }
}
