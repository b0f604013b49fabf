import type {
  AccountBalance,
  ActivityType,
  DailyPointsLog,
  Drawing,
  DrawingExecutionRecord,
  DrawingFilter,
  DrawingSnapshot,
  DrawingStatus,
  FulfillmentStatus,
  LedgerEntry,
  NewDrawing,
  NewLedgerEntry,
  NewPrize,
  NewPrizeFulfillment,
  NewReviewItem,
  NewTicket,
  NewUserNotification,
  Prize,
  PrizeFulfillment,
  ReviewItem,
  ReviewKind,
  ReviewStatus,
  SequenceAssignment,
  Ticket,
  TierBaseline,
  UserNotification,
} from '../models/types';

export interface Page {
  limit: number;
  offset: number;
}

export type LockMode = 'shared' | 'exclusive';

/**
 * Plain reads. Outside a transaction they see the last committed state;
 * inside one they also see that transaction's own writes.
 */
export interface Reader {
  findAccount(userId: number): Promise<AccountBalance | null>;
  /** Entries for one user in creation order (oldest first). */
  listLedgerEntries(userId: number): Promise<LedgerEntry[]>;
  /** Newest first. */
  pageLedgerEntries(userId: number, page: Page): Promise<LedgerEntry[]>;
  listDailyLogs(userId: number, fromDay: string, toDay: string): Promise<DailyPointsLog[]>;

  findDrawing(drawingId: number): Promise<Drawing | null>;
  listDrawingsByStatus(status: DrawingStatus): Promise<Drawing[]>;
  /** Soonest draw first. */
  listDrawings(filter: DrawingFilter, page: Page): Promise<Drawing[]>;
  /** Ordered by rank. */
  listPrizes(drawingId: number): Promise<Prize[]>;
  /** Live tickets in creation order, ticket id as tie-break. */
  listTicketsForDrawing(drawingId: number): Promise<Ticket[]>;
  /** Tickets that carry a sequence number, ordered by it. */
  listSnapshotTickets(drawingId: number): Promise<Ticket[]>;
  listUserTickets(userId: number, drawingId: number): Promise<Ticket[]>;
  findSnapshot(drawingId: number): Promise<DrawingSnapshot | null>;
  findExecutionRecord(drawingId: number): Promise<DrawingExecutionRecord | null>;

  findFulfillment(fulfillmentId: number): Promise<PrizeFulfillment | null>;
  listFulfillments(filter: { status?: FulfillmentStatus[]; userId?: number; drawingId?: number }): Promise<PrizeFulfillment[]>;

  findTierBaseline(userId: number, activityType: ActivityType): Promise<TierBaseline | null>;
  listDeviceUsers(deviceId: string): Promise<number[]>;
  findOpenReviewItem(userId: number, kind: ReviewKind, subject: string): Promise<ReviewItem | null>;
  listReviewItems(status: ReviewStatus): Promise<ReviewItem[]>;
  findReviewItem(reviewId: number): Promise<ReviewItem | null>;

  listNotifications(userId: number): Promise<UserNotification[]>;
}

export interface Transaction extends Reader {
  /** Exclusive lock on the user's balance row, creating a zero row on first use. */
  lockAccount(userId: number): Promise<AccountBalance>;
  /** Writes the row only if its stored version still equals `expectedVersion`. */
  updateAccount(account: AccountBalance, expectedVersion: number): Promise<void>;
  insertLedgerEntry(entry: NewLedgerEntry): Promise<LedgerEntry>;
  lockDailyLog(userId: number, day: string): Promise<DailyPointsLog>;
  saveDailyLog(log: DailyPointsLog): Promise<void>;
  /**
   * Records that an activity has been paid out. Returns false when it was
   * already claimed; the claim commits or rolls back with the award.
   */
  claimActivity(userId: number, activityId: string, claimedAt: Date): Promise<boolean>;

  lockDrawing(drawingId: number, mode: LockMode): Promise<Drawing | null>;
  insertDrawing(drawing: NewDrawing): Promise<Drawing>;
  updateDrawing(drawing: Drawing): Promise<void>;
  /** Throws DuplicateRecordError when the drawing already has a prize at that rank. */
  insertPrize(prize: NewPrize): Promise<Prize>;
  insertTicket(ticket: NewTicket): Promise<Ticket>;
  assignSequenceNumbers(drawingId: number, assignments: SequenceAssignment[]): Promise<void>;
  insertSnapshot(snapshot: DrawingSnapshot): Promise<void>;
  /** Throws DuplicateRecordError when the drawing already has a record. */
  insertExecutionRecord(record: DrawingExecutionRecord): Promise<void>;
  markWinningTickets(drawingId: number, sequenceNumbers: number[]): Promise<void>;

  lockFulfillment(fulfillmentId: number): Promise<PrizeFulfillment | null>;
  insertFulfillment(fulfillment: NewPrizeFulfillment): Promise<PrizeFulfillment>;
  updateFulfillment(fulfillment: PrizeFulfillment): Promise<void>;

  registerDevice(userId: number, deviceId: string, seenAt: Date): Promise<void>;
  insertReviewItem(item: NewReviewItem): Promise<ReviewItem>;
  updateReviewItem(item: ReviewItem): Promise<void>;

  insertNotification(notification: NewUserNotification): Promise<UserNotification>;
}

export interface Datastore extends Reader {
  /**
   * Runs `work` as one atomic unit: every write commits together or none does.
   */
  transaction<T>(work: (tx: Transaction) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
