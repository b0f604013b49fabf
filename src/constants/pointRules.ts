import type { Intensity } from '../models/types';

export const POINTS_PER_1K_STEPS = 10;
export const STEPS_DAILY_CAP = 20_000;

export const DAILY_STEP_GOAL = 10_000;
export const POINTS_DAILY_STEP_GOAL_BONUS = 100;

export const ACTIVE_MINUTE_RATES: Record<Intensity, number> = {
  light: 1,
  moderate: 2,
  vigorous: 3,
};

export const DEFAULT_INTENSITY: Intensity = 'moderate';

export const POINTS_WORKOUT_BONUS = 50;
export const WORKOUT_BONUS_DAILY_CAP = 3;
export const WORKOUT_MIN_DURATION_MINUTES = 20;

export const POINTS_WEEKLY_STREAK_BONUS = 250;
export const WEEKLY_STREAK_DAYS = 7;
export const ACTIVE_DAY_MIN_MINUTES = 30;

// Ceiling on automatic awards per user per UTC calendar day
export const DAILY_POINT_CAP = 1_000;

export const ANOMALY_Z_SCORE_THRESHOLD = 3;
