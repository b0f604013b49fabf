import type { Activity } from '../models/types';
import { addDays, type Clock, systemClock } from '../utils/clock';
import { describeError } from '../utils/errors';
import type { AppLogger } from '../utils/logger';
import type { ActivityAward, AwardOutcome, PointsEngine } from './pointsEngine';

export interface TrackerConnection {
  connection_id: string;
  user_id: number;
  provider: string;
  last_synced_at: Date | null;
}

export interface SyncWindow {
  from: Date;
  to: Date;
}

/** One fitness tracker integration. Activities come back normalized and deduplicated. */
export interface TrackerProvider {
  readonly name: string;
  fetchNormalizedActivities(connection: TrackerConnection, window: SyncWindow): Promise<Activity[]>;
}

export interface TrackerConnectionSource {
  listActiveConnections(): Promise<TrackerConnection[]>;
  markSynced(connectionId: string, syncedAt: Date): Promise<void>;
}

export interface SyncSummary {
  connections: number;
  activities: number;
  // activities already paid by an earlier sync
  skipped: number;
  points_awarded: number;
  errors: { connection_id: string; error: string }[];
}

// First sync for a connection looks back one day.
const INITIAL_LOOKBACK_DAYS = 1;

const awarded = (outcome: AwardOutcome | undefined): number => outcome?.awarded ?? 0;

const totalAwarded = (award: ActivityAward): number =>
  awarded(award.award) + awarded(award.step_goal) + awarded(award.streak);

export class ActivitySyncService {
  private readonly providers: Map<string, TrackerProvider>;

  constructor(
    providers: TrackerProvider[],
    private readonly connections: TrackerConnectionSource,
    private readonly engine: Pick<PointsEngine, 'awardActivity'>,
    private readonly logger: AppLogger,
    private readonly clock: Clock = systemClock
  ) {
    this.providers = new Map(providers.map((provider) => [provider.name, provider]));
  }

  async syncAll(now: Date = this.clock()): Promise<SyncSummary> {
    const summary: SyncSummary = {
      connections: 0,
      activities: 0,
      skipped: 0,
      points_awarded: 0,
      errors: [],
    };

    for (const connection of await this.connections.listActiveConnections()) {
      try {
        const provider = this.providers.get(connection.provider);
        if (!provider) {
          throw new Error(`No tracker provider registered for ${connection.provider}`);
        }
        const window: SyncWindow = {
          from: connection.last_synced_at ?? addDays(now, -INITIAL_LOOKBACK_DAYS),
          to: now,
        };
        const activities = await provider.fetchNormalizedActivities(connection, window);
        for (const activity of activities) {
          const award = await this.engine.awardActivity({ ...activity, user_id: connection.user_id });
          summary.activities += 1;
          if (award.award.status === 'already_processed') {
            summary.skipped += 1;
          }
          summary.points_awarded += totalAwarded(award);
        }
        await this.connections.markSynced(connection.connection_id, now);
        summary.connections += 1;
      } catch (error) {
        const message = describeError(error);
        this.logger.error('sync.connection_failed', {
          connection_id: connection.connection_id,
          provider: connection.provider,
          error: message,
        });
        summary.errors.push({ connection_id: connection.connection_id, error: message });
      }
    }

    this.logger.info('sync.completed', {
      connections: summary.connections,
      activities: summary.activities,
      skipped: summary.skipped,
      points_awarded: summary.points_awarded,
      errors: summary.errors.length,
    });
    return summary;
  }
}
