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
import { ContentionError, DuplicateRecordError } from '../utils/errors';
import type { Datastore, LockMode, Page, Reader, Transaction } from './datastore';

type Counters = {
  ledger: number;
  drawing: number;
  prize: number;
  ticket: number;
  fulfillment: number;
  review: number;
  notification: number;
};

type MemoryState = {
  accounts: Map<number, AccountBalance>;
  ledger: LedgerEntry[];
  dailyLogs: Map<string, DailyPointsLog>;
  processedActivities: Map<string, Date>;
  drawings: Map<number, Drawing>;
  prizes: Map<number, Prize>;
  tickets: Map<number, Ticket>;
  snapshots: Map<number, DrawingSnapshot>;
  executions: Map<number, DrawingExecutionRecord>;
  fulfillments: Map<number, PrizeFulfillment>;
  devices: Map<string, Set<number>>;
  reviewItems: Map<number, ReviewItem>;
  notifications: UserNotification[];
  userTiers: Map<number, string>;
  tierBaselines: Map<string, TierBaseline>;
  counters: Counters;
};

type TransactionMethod = Exclude<keyof Transaction, keyof Reader>;

const emptyState = (): MemoryState => ({
  accounts: new Map(),
  ledger: [],
  dailyLogs: new Map(),
  processedActivities: new Map(),
  drawings: new Map(),
  prizes: new Map(),
  tickets: new Map(),
  snapshots: new Map(),
  executions: new Map(),
  fulfillments: new Map(),
  devices: new Map(),
  reviewItems: new Map(),
  notifications: [],
  userTiers: new Map(),
  tierBaselines: new Map(),
  counters: { ledger: 0, drawing: 0, prize: 0, ticket: 0, fulfillment: 0, review: 0, notification: 0 },
});

const dailyLogKey = (userId: number, day: string): string => `${userId}:${day}`;
const activityKey = (userId: number, activityId: string): string => `${userId}:${activityId}`;
const baselineKey = (tierCode: string, activityType: ActivityType): string =>
  `${tierCode}:${activityType}`;

const byCreation = (a: Ticket, b: Ticket): number =>
  a.created_at.getTime() - b.created_at.getTime() || a.id - b.id;

class MemoryReader implements Reader {
  constructor(protected readonly state: () => MemoryState) {}

  async findAccount(userId: number): Promise<AccountBalance | null> {
    return copy(this.state().accounts.get(userId) ?? null);
  }

  async listLedgerEntries(userId: number): Promise<LedgerEntry[]> {
    return copy(this.state().ledger.filter((entry) => entry.user_id === userId));
  }

  async pageLedgerEntries(userId: number, page: Page): Promise<LedgerEntry[]> {
    const entries = this.state()
      .ledger.filter((entry) => entry.user_id === userId)
      .reverse();
    return copy(entries.slice(page.offset, page.offset + page.limit));
  }

  async listDailyLogs(userId: number, fromDay: string, toDay: string): Promise<DailyPointsLog[]> {
    const logs = [...this.state().dailyLogs.values()]
      .filter((log) => log.user_id === userId && log.log_date >= fromDay && log.log_date <= toDay)
      .sort((a, b) => a.log_date.localeCompare(b.log_date));
    return copy(logs);
  }

  async findDrawing(drawingId: number): Promise<Drawing | null> {
    return copy(this.state().drawings.get(drawingId) ?? null);
  }

  async listDrawingsByStatus(status: DrawingStatus): Promise<Drawing[]> {
    const drawings = [...this.state().drawings.values()]
      .filter((drawing) => drawing.status === status)
      .sort((a, b) => a.id - b.id);
    return copy(drawings);
  }

  async listDrawings(filter: DrawingFilter, page: Page): Promise<Drawing[]> {
    const drawings = [...this.state().drawings.values()]
      .filter((drawing) => !filter.status || drawing.status === filter.status)
      .filter((drawing) => !filter.drawing_type || drawing.drawing_type === filter.drawing_type)
      .sort((a, b) => a.draw_time.getTime() - b.draw_time.getTime() || a.id - b.id);
    return copy(drawings.slice(page.offset, page.offset + page.limit));
  }

  async listPrizes(drawingId: number): Promise<Prize[]> {
    const prizes = [...this.state().prizes.values()]
      .filter((prize) => prize.drawing_id === drawingId)
      .sort((a, b) => a.rank - b.rank);
    return copy(prizes);
  }

  async listTicketsForDrawing(drawingId: number): Promise<Ticket[]> {
    const tickets = [...this.state().tickets.values()]
      .filter((ticket) => ticket.drawing_id === drawingId)
      .sort(byCreation);
    return copy(tickets);
  }

  async listSnapshotTickets(drawingId: number): Promise<Ticket[]> {
    const tickets: Ticket[] = [];
    for (const ticket of this.state().tickets.values()) {
      if (ticket.drawing_id === drawingId && ticket.sequence_number !== null) {
        tickets.push(ticket);
      }
    }
    tickets.sort((a, b) => (a.sequence_number ?? 0) - (b.sequence_number ?? 0));
    return copy(tickets);
  }

  async listUserTickets(userId: number, drawingId: number): Promise<Ticket[]> {
    const tickets = [...this.state().tickets.values()]
      .filter((ticket) => ticket.drawing_id === drawingId && ticket.user_id === userId)
      .sort(byCreation);
    return copy(tickets);
  }

  async findSnapshot(drawingId: number): Promise<DrawingSnapshot | null> {
    return copy(this.state().snapshots.get(drawingId) ?? null);
  }

  async findExecutionRecord(drawingId: number): Promise<DrawingExecutionRecord | null> {
    return copy(this.state().executions.get(drawingId) ?? null);
  }

  async findFulfillment(fulfillmentId: number): Promise<PrizeFulfillment | null> {
    return copy(this.state().fulfillments.get(fulfillmentId) ?? null);
  }

  async listFulfillments(filter: {
    status?: FulfillmentStatus[];
    userId?: number;
    drawingId?: number;
  }): Promise<PrizeFulfillment[]> {
    const fulfillments = [...this.state().fulfillments.values()]
      .filter((item) => !filter.status || filter.status.includes(item.status))
      .filter((item) => filter.userId === undefined || item.user_id === filter.userId)
      .filter((item) => filter.drawingId === undefined || item.drawing_id === filter.drawingId)
      .sort((a, b) => a.id - b.id);
    return copy(fulfillments);
  }

  async findTierBaseline(userId: number, activityType: ActivityType): Promise<TierBaseline | null> {
    const tierCode = this.state().userTiers.get(userId);
    if (!tierCode) {
      return null;
    }
    return copy(this.state().tierBaselines.get(baselineKey(tierCode, activityType)) ?? null);
  }

  async listDeviceUsers(deviceId: string): Promise<number[]> {
    return [...(this.state().devices.get(deviceId) ?? [])].sort((a, b) => a - b);
  }

  async findOpenReviewItem(
    userId: number,
    kind: ReviewKind,
    subject: string
  ): Promise<ReviewItem | null> {
    for (const item of this.state().reviewItems.values()) {
      if (
        item.user_id === userId &&
        item.kind === kind &&
        item.subject === subject &&
        item.status === 'open'
      ) {
        return copy(item);
      }
    }
    return null;
  }

  async listReviewItems(status: ReviewStatus): Promise<ReviewItem[]> {
    const items = [...this.state().reviewItems.values()]
      .filter((item) => item.status === status)
      .sort((a, b) => a.id - b.id);
    return copy(items);
  }

  async findReviewItem(reviewId: number): Promise<ReviewItem | null> {
    return copy(this.state().reviewItems.get(reviewId) ?? null);
  }

  async listNotifications(userId: number): Promise<UserNotification[]> {
    return copy(this.state().notifications.filter((item) => item.user_id === userId));
  }
}

class MemoryTransaction extends MemoryReader implements Transaction {
  constructor(
    state: () => MemoryState,
    private readonly consumeFault: (method: TransactionMethod) => Error | undefined
  ) {
    super(state);
  }

  async lockAccount(userId: number): Promise<AccountBalance> {
    this.fault('lockAccount');
    const accounts = this.state().accounts;
    let account = accounts.get(userId);
    if (!account) {
      account = {
        user_id: userId,
        points_earned: 0,
        points_balance: 0,
        version: 0,
        updated_at: new Date(0),
      };
      accounts.set(userId, account);
    }
    return copy(account);
  }

  async updateAccount(account: AccountBalance, expectedVersion: number): Promise<void> {
    this.fault('updateAccount');
    const current = this.state().accounts.get(account.user_id);
    if (!current || current.version !== expectedVersion) {
      throw new ContentionError(`Balance for user ${account.user_id} changed concurrently`);
    }
    this.state().accounts.set(account.user_id, copy(account));
  }

  async insertLedgerEntry(entry: NewLedgerEntry): Promise<LedgerEntry> {
    this.fault('insertLedgerEntry');
    const stored: LedgerEntry = { id: this.nextId('ledger'), ...copy(entry) };
    this.state().ledger.push(stored);
    return copy(stored);
  }

  async lockDailyLog(userId: number, day: string): Promise<DailyPointsLog> {
    this.fault('lockDailyLog');
    const existing = this.state().dailyLogs.get(dailyLogKey(userId, day));
    if (existing) {
      return copy(existing);
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
    this.fault('saveDailyLog');
    this.state().dailyLogs.set(dailyLogKey(log.user_id, log.log_date), copy(log));
  }

  async claimActivity(userId: number, activityId: string, claimedAt: Date): Promise<boolean> {
    this.fault('claimActivity');
    const processed = this.state().processedActivities;
    const key = activityKey(userId, activityId);
    if (processed.has(key)) {
      return false;
    }
    processed.set(key, claimedAt);
    return true;
  }

  async lockDrawing(drawingId: number, _mode: LockMode): Promise<Drawing | null> {
    this.fault('lockDrawing');
    return this.findDrawing(drawingId);
  }

  async insertDrawing(drawing: NewDrawing): Promise<Drawing> {
    this.fault('insertDrawing');
    const stored: Drawing = { id: this.nextId('drawing'), ...copy(drawing) };
    this.state().drawings.set(stored.id, stored);
    return copy(stored);
  }

  async updateDrawing(drawing: Drawing): Promise<void> {
    this.fault('updateDrawing');
    this.state().drawings.set(drawing.id, copy(drawing));
  }

  async insertPrize(prize: NewPrize): Promise<Prize> {
    this.fault('insertPrize');
    for (const existing of this.state().prizes.values()) {
      if (existing.drawing_id === prize.drawing_id && existing.rank === prize.rank) {
        throw new DuplicateRecordError('PRIZES');
      }
    }
    const stored: Prize = { id: this.nextId('prize'), ...copy(prize) };
    this.state().prizes.set(stored.id, stored);
    return copy(stored);
  }

  async insertTicket(ticket: NewTicket): Promise<Ticket> {
    this.fault('insertTicket');
    const stored: Ticket = {
      id: this.nextId('ticket'),
      ...copy(ticket),
      sequence_number: null,
      is_winner: false,
    };
    this.state().tickets.set(stored.id, stored);
    return copy(stored);
  }

  async assignSequenceNumbers(drawingId: number, assignments: SequenceAssignment[]): Promise<void> {
    this.fault('assignSequenceNumbers');
    const tickets = this.state().tickets;
    for (const assignment of assignments) {
      const ticket = tickets.get(assignment.ticket_id);
      if (ticket && ticket.drawing_id === drawingId) {
        ticket.sequence_number = assignment.sequence_number;
      }
    }
  }

  async insertSnapshot(snapshot: DrawingSnapshot): Promise<void> {
    this.fault('insertSnapshot');
    if (this.state().snapshots.has(snapshot.drawing_id)) {
      throw new DuplicateRecordError('DRAWING_SNAPSHOTS');
    }
    this.state().snapshots.set(snapshot.drawing_id, copy(snapshot));
  }

  async insertExecutionRecord(record: DrawingExecutionRecord): Promise<void> {
    this.fault('insertExecutionRecord');
    if (this.state().executions.has(record.drawing_id)) {
      throw new DuplicateRecordError('DRAWING_EXECUTIONS');
    }
    this.state().executions.set(record.drawing_id, copy(record));
  }

  async markWinningTickets(drawingId: number, sequenceNumbers: number[]): Promise<void> {
    this.fault('markWinningTickets');
    const winning = new Set(sequenceNumbers);
    for (const ticket of this.state().tickets.values()) {
      if (
        ticket.drawing_id === drawingId &&
        ticket.sequence_number !== null &&
        winning.has(ticket.sequence_number)
      ) {
        ticket.is_winner = true;
      }
    }
  }

  async lockFulfillment(fulfillmentId: number): Promise<PrizeFulfillment | null> {
    this.fault('lockFulfillment');
    return this.findFulfillment(fulfillmentId);
  }

  async insertFulfillment(fulfillment: NewPrizeFulfillment): Promise<PrizeFulfillment> {
    this.fault('insertFulfillment');
    const stored: PrizeFulfillment = { id: this.nextId('fulfillment'), ...copy(fulfillment) };
    this.state().fulfillments.set(stored.id, stored);
    return copy(stored);
  }

  async updateFulfillment(fulfillment: PrizeFulfillment): Promise<void> {
    this.fault('updateFulfillment');
    this.state().fulfillments.set(fulfillment.id, copy(fulfillment));
  }

  async registerDevice(userId: number, deviceId: string, _seenAt: Date): Promise<void> {
    this.fault('registerDevice');
    const devices = this.state().devices;
    const users = devices.get(deviceId) ?? new Set<number>();
    users.add(userId);
    devices.set(deviceId, users);
  }

  async insertReviewItem(item: NewReviewItem): Promise<ReviewItem> {
    this.fault('insertReviewItem');
    const stored: ReviewItem = {
      id: this.nextId('review'),
      ...copy(item),
      resolved_at: null,
      resolved_by: null,
    };
    this.state().reviewItems.set(stored.id, stored);
    return copy(stored);
  }

  async updateReviewItem(item: ReviewItem): Promise<void> {
    this.fault('updateReviewItem');
    this.state().reviewItems.set(item.id, copy(item));
  }

  async insertNotification(notification: NewUserNotification): Promise<UserNotification> {
    this.fault('insertNotification');
    const stored: UserNotification = { id: this.nextId('notification'), ...copy(notification) };
    this.state().notifications.push(stored);
    return copy(stored);
  }

  private nextId(counter: keyof Counters): number {
    const counters = this.state().counters;
    counters[counter] += 1;
    return counters[counter];
  }

  private fault(method: TransactionMethod): void {
    const error = this.consumeFault(method);
    if (error) {
      throw error;
    }
  }
}

/**
 * In-process store. Transactions run one at a time against a staged copy
 * of the state, which replaces the committed state only when the unit of
 * work resolves.
 */
export class MemoryDatastore extends MemoryReader implements Datastore {
  private readonly holder: { state: MemoryState };
  private tail: Promise<void> = Promise.resolve();
  private readonly faults = new Map<TransactionMethod, (Error | (() => Error))[]>();

  constructor() {
    const holder = { state: emptyState() };
    super(() => holder.state);
    this.holder = holder;
  }

  transaction<T>(work: (tx: Transaction) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.runIsolated(work));
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    await this.tail;
  }

  /**
   * Makes the next call to `method` inside a transaction throw. A function
   * runs at that moment and supplies the error.
   */
  injectFault(method: TransactionMethod, error: Error | (() => Error)): void {
    const queue = this.faults.get(method) ?? [];
    queue.push(error);
    this.faults.set(method, queue);
  }

  assignTier(userId: number, tierCode: string): void {
    this.holder.state.userTiers.set(userId, tierCode);
  }

  putTierBaseline(baseline: TierBaseline): void {
    this.holder.state.tierBaselines.set(
      baselineKey(baseline.tier_code, baseline.activity_type),
      copy(baseline)
    );
  }

  private async runIsolated<T>(work: (tx: Transaction) => Promise<T>): Promise<T> {
    const draft = copy(this.holder.state);
    const tx = new MemoryTransaction(
      () => draft,
      (method) => {
        const fault = this.faults.get(method)?.shift();
        return typeof fault === 'function' ? fault() : fault;
      }
    );
    const result = await work(tx);
    this.holder.state = draft;
    return result;
  }
}

function copy<T>(value: T): T {
  return structuredClone(value);
}
