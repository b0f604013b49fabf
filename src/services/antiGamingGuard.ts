import { ANOMALY_Z_SCORE_THRESHOLD } from '../constants/pointRules';
import type {
  Activity,
  ActivityType,
  ReviewItem,
  ReviewStatus,
  TierBaseline,
} from '../models/types';
import type { Datastore, Transaction } from '../repositories/datastore';
import { type Clock, systemClock } from '../utils/clock';
import { NotFoundError, ValidationError } from '../utils/errors';
import type { AppLogger } from '../utils/logger';
import { zScore } from './pointRules';

/** Tier averages per activity type, kept up to date by the leaderboard side. */
export interface TierStatsSource {
  getBaseline(userId: number, activityType: ActivityType): Promise<TierBaseline | null>;
}

export class DatastoreTierStatsSource implements TierStatsSource {
  constructor(private readonly store: Pick<Datastore, 'findTierBaseline'>) {}

  getBaseline(userId: number, activityType: ActivityType): Promise<TierBaseline | null> {
    return this.store.findTierBaseline(userId, activityType);
  }
}

export type ReviewResolution = Exclude<ReviewStatus, 'open'>;

const primaryValue = (activity: Activity): number =>
  activity.activity_type === 'steps' ? activity.step_count ?? 0 : activity.duration_minutes ?? 0;

const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/**
 * Flags suspicious activity for manual review. It never blocks or shrinks
 * an award; flags are review rows written in the award's transaction.
 */
export class AntiGamingGuard {
  constructor(
    private readonly store: Datastore,
    private readonly tierStats: TierStatsSource,
    private readonly logger: AppLogger,
    private readonly clock: Clock = systemClock
  ) {}

  async inspect(tx: Transaction, activity: Activity, now: Date): Promise<ReviewItem[]> {
    const flags: ReviewItem[] = [];

    const anomaly = await this.checkAnomaly(tx, activity, now);
    if (anomaly) {
      flags.push(anomaly);
    }

    if (activity.device_id) {
      const shared = await this.checkSharedDevice(tx, activity.user_id, activity.device_id, now);
      if (shared) {
        flags.push(shared);
      }
    }

    return flags;
  }

  listReviewItems(status: ReviewStatus = 'open'): Promise<ReviewItem[]> {
    return this.store.listReviewItems(status);
  }

  async resolveReviewItem(
    reviewId: number,
    resolution: ReviewResolution,
    adminId: number
  ): Promise<ReviewItem> {
    const resolved = await this.store.transaction(async (tx) => {
      const item = await tx.findReviewItem(reviewId);
      if (!item) {
        throw new NotFoundError('Review item', reviewId);
      }
      if (item.status !== 'open') {
        throw new ValidationError(`Review item ${reviewId} is already ${item.status}`);
      }
      const next: ReviewItem = {
        ...item,
        status: resolution,
        resolved_at: this.clock(),
        resolved_by: adminId,
      };
      await tx.updateReviewItem(next);
      return next;
    });

    this.logger.info('review.resolved', {
      review_id: reviewId,
      resolution,
      admin_id: adminId,
    });
    return resolved;
  }

  private async checkAnomaly(
    tx: Transaction,
    activity: Activity,
    now: Date
  ): Promise<ReviewItem | null> {
    const baseline = await this.tierStats.getBaseline(activity.user_id, activity.activity_type);
    if (!baseline) {
      return null;
    }
    const value = primaryValue(activity);
    const score = zScore(value, { mean: baseline.mean_value, stddev: baseline.stddev_value });
    if (score === null || score <= ANOMALY_Z_SCORE_THRESHOLD) {
      return null;
    }

    return tx.insertReviewItem({
      user_id: activity.user_id,
      kind: 'anomaly',
      subject: `activity:${activity.activity_id}`,
      details: {
        activity_type: activity.activity_type,
        value,
        tier_code: baseline.tier_code,
        tier_mean: baseline.mean_value,
        tier_stddev: baseline.stddev_value,
        z_score: roundTo(score, 2),
      },
      status: 'open',
      created_at: now,
    });
  }

  private async checkSharedDevice(
    tx: Transaction,
    userId: number,
    deviceId: string,
    now: Date
  ): Promise<ReviewItem | null> {
    await tx.registerDevice(userId, deviceId, now);
    const otherUsers = (await tx.listDeviceUsers(deviceId)).filter((id) => id !== userId);
    if (otherUsers.length === 0) {
      return null;
    }

    const subject = `device:${deviceId}`;
    const existing = await tx.findOpenReviewItem(userId, 'shared_device', subject);
    if (existing) {
      return null;
    }

    return tx.insertReviewItem({
      user_id: userId,
      kind: 'shared_device',
      subject,
      details: { device_id: deviceId, other_user_ids: otherUsers },
      status: 'open',
      created_at: now,
    });
  }
}
