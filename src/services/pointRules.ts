import {
  ACTIVE_DAY_MIN_MINUTES,
  ACTIVE_MINUTE_RATES,
  DAILY_POINT_CAP,
  DAILY_STEP_GOAL,
  DEFAULT_INTENSITY,
  POINTS_DAILY_STEP_GOAL_BONUS,
  POINTS_PER_1K_STEPS,
  POINTS_WORKOUT_BONUS,
  STEPS_DAILY_CAP,
  WEEKLY_STREAK_DAYS,
  WORKOUT_BONUS_DAILY_CAP,
  WORKOUT_MIN_DURATION_MINUTES,
} from '../constants/pointRules';
import type { Activity, DailyPointsLog, Intensity } from '../models/types';
import { ValidationError } from '../utils/errors';

export interface ActivityBreakdown {
  step_points: number;
  active_minute_points: number;
  workout_bonus: number;
  step_goal_bonus: number;
  steps_today: number;
  active_minutes_today: number;
}

export interface Baseline {
  mean: number;
  stddev: number;
  sample_size: number;
}

const isWholeNumber = (value: number | undefined): value is number =>
  value !== undefined && Number.isSafeInteger(value) && value >= 0;

export const validateActivity = (activity: Activity): void => {
  if (!activity.activity_id) {
    throw new ValidationError('Activity id is required');
  }
  if (activity.activity_type === 'steps') {
    if (!isWholeNumber(activity.step_count)) {
      throw new ValidationError('Step activities need a non-negative whole step_count', {
        activity_id: activity.activity_id,
      });
    }
    return;
  }
  if (!isWholeNumber(activity.duration_minutes)) {
    throw new ValidationError(`${activity.activity_type} activities need a non-negative duration_minutes`, {
      activity_id: activity.activity_id,
    });
  }
};

/** Points the day's steps are worth in total: 10 per full 1,000, counting at most 20,000. */
export const stepPointsForDay = (stepsToday: number): number => {
  if (stepsToday <= 0) {
    return 0;
  }
  return Math.floor(Math.min(stepsToday, STEPS_DAILY_CAP) / 1000) * POINTS_PER_1K_STEPS;
};

export const activeMinutePoints = (minutes: number, intensity: Intensity = DEFAULT_INTENSITY): number =>
  minutes <= 0 ? 0 : minutes * ACTIVE_MINUTE_RATES[intensity];

export const workoutBonus = (durationMinutes: number, bonusesToday: number): number => {
  if (durationMinutes < WORKOUT_MIN_DURATION_MINUTES || bonusesToday >= WORKOUT_BONUS_DAILY_CAP) {
    return 0;
  }
  return POINTS_WORKOUT_BONUS;
};

/**
 * Raw points for one activity given what the user has already logged
 * today. Steps earn only the increment they add to the day's step points.
 */
export const calculateActivityPoints = (
  activity: Activity,
  log: DailyPointsLog
): ActivityBreakdown => {
  const breakdown: ActivityBreakdown = {
    step_points: 0,
    active_minute_points: 0,
    workout_bonus: 0,
    step_goal_bonus: 0,
    steps_today: log.step_count,
    active_minutes_today: log.active_minutes,
  };

  switch (activity.activity_type) {
    case 'steps': {
      const stepsToday = log.step_count + (activity.step_count ?? 0);
      breakdown.steps_today = stepsToday;
      breakdown.step_points = stepPointsForDay(stepsToday) - stepPointsForDay(log.step_count);
      if (!log.step_goal_awarded && stepsToday >= DAILY_STEP_GOAL) {
        breakdown.step_goal_bonus = POINTS_DAILY_STEP_GOAL_BONUS;
      }
      break;
    }
    case 'active_minutes': {
      const minutes = activity.duration_minutes ?? 0;
      breakdown.active_minute_points = activeMinutePoints(minutes, activity.intensity);
      breakdown.active_minutes_today += minutes;
      break;
    }
    case 'workout': {
      const minutes = activity.duration_minutes ?? 0;
      breakdown.workout_bonus = workoutBonus(minutes, log.workout_bonus_count);
      breakdown.active_minute_points = activeMinutePoints(minutes, activity.intensity);
      breakdown.active_minutes_today += minutes;
      break;
    }
  }

  return breakdown;
};

export const applyDailyCap = (points: number, alreadyEarnedToday: number): number => {
  const remaining = Math.max(0, DAILY_POINT_CAP - alreadyEarnedToday);
  return Math.max(0, Math.min(points, remaining));
};

export const isActiveDay = (log: Pick<DailyPointsLog, 'active_minutes'>): boolean =>
  log.active_minutes >= ACTIVE_DAY_MIN_MINUTES;

/**
 * True when `today` and the six days before it are all active and none of
 * them already carried a streak bonus. `priorLogs` may be sparse; a missing
 * day is an inactive day.
 */
export const qualifiesForStreak = (
  today: DailyPointsLog,
  priorLogs: DailyPointsLog[],
  priorDays: string[]
): boolean => {
  if (today.streak_awarded || !isActiveDay(today)) {
    return false;
  }
  if (priorDays.length !== WEEKLY_STREAK_DAYS - 1) {
    return false;
  }
  const byDay = new Map(priorLogs.map((log) => [log.log_date, log]));
  return priorDays.every((day) => {
    const log = byDay.get(day);
    return log !== undefined && isActiveDay(log) && !log.streak_awarded;
  });
};

/** Population mean and standard deviation. */
export const computeBaseline = (values: number[]): Baseline => {
  if (values.length === 0) {
    return { mean: 0, stddev: 0, sample_size: 0 };
  }
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  return { mean, stddev: Math.sqrt(variance), sample_size: values.length };
};

export const zScore = (value: number, baseline: Pick<Baseline, 'mean' | 'stddev'>): number | null => {
  if (baseline.stddev <= 0) {
    return null;
  }
  return Math.abs(value - baseline.mean) / baseline.stddev;
};
