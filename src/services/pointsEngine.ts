import type {
  Activity,
  DailyPointsLog,
  LedgerEntry,
  LedgerReasonCode,
  ReviewItem,
} from '../models/types';
import type { Datastore, Transaction } from '../repositories/datastore';
import { type Clock, shiftDayKey, systemClock, toDayKey } from '../utils/clock';
import { ValidationError } from '../utils/errors';
import type { AppLogger } from '../utils/logger';
import type { AntiGamingGuard } from './antiGamingGuard';
import type { LedgerService } from './ledgerService';
import {
  applyDailyCap,
  calculateActivityPoints,
  isActiveDay,
  qualifiesForStreak,
  validateActivity,
} from './pointRules';
import { POINTS_WEEKLY_STREAK_BONUS, WEEKLY_STREAK_DAYS } from '../constants/pointRules';

export type AwardSource = Extract<
  LedgerReasonCode,
  'activity_award' | 'step_goal_bonus' | 'streak_bonus' | 'manual_award'
>;

export type AwardOutcome =
  | {
      status: 'awarded';
      entry: LedgerEntry;
      requested: number;
      awarded: number;
      capped: boolean;
    }
  | { status: 'cap_exceeded'; requested: number; awarded: 0; daily_total: number }
  | { status: 'no_points'; requested: 0; awarded: 0 }
  | { status: 'already_processed'; requested: 0; awarded: 0 };

export interface ActivityAward {
  activity_id: string;
  award: AwardOutcome;
  step_goal?: AwardOutcome;
  streak?: AwardOutcome;
  flags: ReviewItem[];
}

interface AwardRequest {
  user_id: number;
  source: AwardSource;
  amount: number;
  reason: string;
  source_ref: string | null;
}

// Manual grants are admin decisions; only automatic sources count toward the daily ceiling.
const isCappedSource = (source: AwardSource): boolean => source !== 'manual_award';

export class PointsEngine {
  constructor(
    private readonly store: Datastore,
    private readonly ledger: LedgerService,
    private readonly guard: AntiGamingGuard,
    private readonly logger: AppLogger,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Generic earn path. Automatic sources are truncated to what is left of
   * the user's daily ceiling; a fully capped award writes nothing and comes
   * back as `cap_exceeded`.
   */
  async awardPoints(
    userId: number,
    source: AwardSource,
    amount: number,
    reason: string,
    sourceRef: string | null = null
  ): Promise<AwardOutcome> {
    if (!Number.isSafeInteger(amount) || amount < 0) {
      throw new ValidationError('Award amount must be a non-negative whole number', { amount });
    }

    const outcome = await this.store.transaction(async (tx) => {
      const log = await tx.lockDailyLog(userId, toDayKey(this.clock()));
      const result = await this.awardInTx(tx, log, {
        user_id: userId,
        source,
        amount,
        reason,
        source_ref: sourceRef,
      });
      if (result.log !== log) {
        await tx.saveDailyLog(result.log);
      }
      return result.outcome;
    });

    this.report(userId, source, outcome);
    return outcome;
  }

  /**
   * Pays out one normalized activity. An activity id that was already paid
   * for this user comes back as `already_processed` and writes nothing.
   */
  async awardActivity(activity: Activity): Promise<ActivityAward> {
    validateActivity(activity);

    const result = await this.store.transaction<ActivityAward>(async (tx) => {
      const now = this.clock();
      if (!(await tx.claimActivity(activity.user_id, activity.activity_id, now))) {
        return {
          activity_id: activity.activity_id,
          award: { status: 'already_processed', requested: 0, awarded: 0 },
          flags: [],
        };
      }
      const day = toDayKey(now);
      const before = await tx.lockDailyLog(activity.user_id, day);
      const flags = await this.guard.inspect(tx, activity, now);
      const breakdown = calculateActivityPoints(activity, before);

      let log: DailyPointsLog = {
        ...before,
        step_count: breakdown.steps_today,
        active_minutes: breakdown.active_minutes_today,
        workout_bonus_count: before.workout_bonus_count + (breakdown.workout_bonus > 0 ? 1 : 0),
        updated_at: now,
      };

      const base = await this.awardInTx(tx, log, {
        user_id: activity.user_id,
        source: 'activity_award',
        amount: breakdown.step_points + breakdown.active_minute_points + breakdown.workout_bonus,
        reason: `Points for ${activity.activity_type}`,
        source_ref: `activity:${activity.activity_id}`,
      });
      log = base.log;

      const award: ActivityAward = { activity_id: activity.activity_id, award: base.outcome, flags };

      if (breakdown.step_goal_bonus > 0) {
        const goal = await this.awardInTx(tx, log, {
          user_id: activity.user_id,
          source: 'step_goal_bonus',
          amount: breakdown.step_goal_bonus,
          reason: 'Daily step goal reached',
          source_ref: `activity:${activity.activity_id}`,
        });
        log = { ...goal.log, step_goal_awarded: true };
        award.step_goal = goal.outcome;
      }

      if (!isActiveDay(before) && isActiveDay(log)) {
        const priorDays = Array.from({ length: WEEKLY_STREAK_DAYS - 1 }, (_, index) =>
          shiftDayKey(day, index - (WEEKLY_STREAK_DAYS - 1))
        );
        const priorLogs = await tx.listDailyLogs(
          activity.user_id,
          priorDays[0],
          priorDays[priorDays.length - 1]
        );
        if (qualifiesForStreak(log, priorLogs, priorDays)) {
          const streak = await this.awardInTx(tx, log, {
            user_id: activity.user_id,
            source: 'streak_bonus',
            amount: POINTS_WEEKLY_STREAK_BONUS,
            reason: `${WEEKLY_STREAK_DAYS}-day activity streak`,
            source_ref: `streak:${day}`,
          });
          log = { ...streak.log, streak_awarded: true };
          award.streak = streak.outcome;
        }
      }

      await tx.saveDailyLog(log);
      return award;
    });

    this.report(activity.user_id, 'activity_award', result.award);
    if (result.step_goal) {
      this.report(activity.user_id, 'step_goal_bonus', result.step_goal);
    }
    if (result.streak) {
      this.report(activity.user_id, 'streak_bonus', result.streak);
    }
    for (const flag of result.flags) {
      this.logger.warn('review.flagged', {
        review_id: flag.id,
        user_id: flag.user_id,
        kind: flag.kind,
        subject: flag.subject,
      });
    }
    return result;
  }

  private async awardInTx(
    tx: Transaction,
    log: DailyPointsLog,
    request: AwardRequest
  ): Promise<{ outcome: AwardOutcome; log: DailyPointsLog }> {
    if (request.amount === 0) {
      return { outcome: { status: 'no_points', requested: 0, awarded: 0 }, log };
    }

    const capped = isCappedSource(request.source);
    const granted = capped ? applyDailyCap(request.amount, log.total_points) : request.amount;
    if (granted === 0) {
      return {
        outcome: {
          status: 'cap_exceeded',
          requested: request.amount,
          awarded: 0,
          daily_total: log.total_points,
        },
        log,
      };
    }

    const entry = await this.ledger.applyEntryInTx(tx, {
      user_id: request.user_id,
      kind: 'earn',
      amount: granted,
      reason_code: request.source,
      reason:
        granted < request.amount
          ? `${request.reason} (capped from ${request.amount} by the daily limit)`
          : request.reason,
      source_ref: request.source_ref,
    });

    return {
      outcome: {
        status: 'awarded',
        entry,
        requested: request.amount,
        awarded: granted,
        capped: granted < request.amount,
      },
      log: capped ? { ...log, total_points: log.total_points + granted } : log,
    };
  }

  private report(userId: number, source: AwardSource, outcome: AwardOutcome): void {
    if (outcome.status === 'awarded') {
      this.logger.info('points.awarded', {
        user_id: userId,
        source,
        requested: outcome.requested,
        awarded: outcome.awarded,
        capped: outcome.capped,
        ledger_entry_id: outcome.entry.id,
        balance_after: outcome.entry.balance_after,
      });
    } else if (outcome.status === 'already_processed') {
      this.logger.debug('points.already_processed', { user_id: userId, source });
    } else if (outcome.status === 'cap_exceeded') {
      this.logger.info('points.cap_exceeded', {
        user_id: userId,
        source,
        requested: outcome.requested,
        daily_total: outcome.daily_total,
      });
    }
  }
}
