/**
 * Daily Schedule Derivation
 *
 * Turns a profile's "HH:MM" → busyness map into breakfast / lunch / dinner
 * slots plus an optional workout time.
 */

import { getHours, getMinutes, isValid, parse } from 'date-fns';
import { TIME_OF_DAY_PATTERN, type DailySchedule, type Schedule } from '../../types';
import { InvalidScheduleError } from '../../utils/errors';
import { MEALS_PER_DAY, WORKOUT_BUSYNESS } from './constants';

// Any fixed day works: only the clock fields are read back
const REFERENCE_DAY = new Date(2000, 0, 1);

export interface TimeOfDay {
  hours: number;
  minutes: number;
}

/**
 * Parse a 24-hour "HH:MM" string. Throws InvalidScheduleError otherwise.
 */
export function parseTimeOfDay(value: string): TimeOfDay {
  const parsed = TIME_OF_DAY_PATTERN.test(value) ? parse(value, 'HH:mm', REFERENCE_DAY) : null;
  if (!parsed || !isValid(parsed)) {
    throw new InvalidScheduleError(`Invalid time of day '${value}', expected HH:MM`, {
      time: value,
    });
  }
  return { hours: getHours(parsed), minutes: getMinutes(parsed) };
}

/**
 * Hour component only. Workout windows and satiety gaps are computed at
 * hour granularity: "07:45" and "07:00" are the same hour.
 */
export function hourOf(value: string): number {
  return parseTimeOfDay(value).hours;
}

function minutesOfDay(value: string): number {
  const { hours, minutes } = parseTimeOfDay(value);
  return hours * 60 + minutes;
}

/**
 * Build the day's schedule.
 *
 * - at most one entry with busyness 0 (the workout); a second one throws
 *   InvalidScheduleError rather than replacing the first
 * - at least three other entries; the earliest three become breakfast,
 *   lunch and dinner, later ones are ignored
 */
export function createDailySchedule(schedule: Schedule): DailySchedule {
  const workoutTimes: string[] = [];
  const mealTimes: string[] = [];

  for (const [time, busyness] of Object.entries(schedule)) {
    parseTimeOfDay(time);
    if (!Number.isInteger(busyness) || busyness < 0 || busyness > 4) {
      throw new InvalidScheduleError(
        `Invalid busyness level ${busyness} at ${time}, expected an integer 0-4`,
        { time, busyness }
      );
    }
    if (busyness === WORKOUT_BUSYNESS) {
      workoutTimes.push(time);
    } else {
      mealTimes.push(time);
    }
  }

  if (workoutTimes.length > 1) {
    throw new InvalidScheduleError(
      `Schedule may contain at most one workout entry, found ${workoutTimes.length}`,
      { workoutTimes }
    );
  }

  mealTimes.sort((a, b) => minutesOfDay(a) - minutesOfDay(b));

  if (mealTimes.length < MEALS_PER_DAY) {
    throw new InvalidScheduleError(
      `Schedule must have at least ${MEALS_PER_DAY} meal times, found ${mealTimes.length}`,
      { mealTimes }
    );
  }

  const [breakfastTime, lunchTime, dinnerTime] = mealTimes;
  const daily: DailySchedule = {
    breakfastTime,
    breakfastBusyness: schedule[breakfastTime],
    lunchTime,
    lunchBusyness: schedule[lunchTime],
    dinnerTime,
    dinnerBusyness: schedule[dinnerTime],
  };
  if (workoutTimes.length === 1) {
    daily.workoutTime = workoutTimes[0];
  }
  return daily;
}
