const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 3600;
const HOURS_PER_DAY = 24;

/**
 * Six-field node-cron expression firing exactly every `seconds` seconds, or
 * `null` when cron cannot express that interval. A cron step restarts at the
 * top of its field, so the step has to divide the field evenly (45 s would
 * fire at :00 and :45 of every minute).
 */
export const intervalToCronExpression = (seconds: number): string | null => {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new RangeError(`Interval must be a positive number of seconds, got ${seconds}`);
  }
  if (!Number.isInteger(seconds)) return null;

  if (seconds < SECONDS_PER_MINUTE) {
    return SECONDS_PER_MINUTE % seconds === 0 ? `*/${seconds} * * * * *` : null;
  }

  if (seconds < SECONDS_PER_HOUR) {
    const minutes = seconds / SECONDS_PER_MINUTE;
    return Number.isInteger(minutes) && 60 % minutes === 0 ? `0 */${minutes} * * * *` : null;
  }

  const hours = seconds / SECONDS_PER_HOUR;
  if (hours === HOURS_PER_DAY) return '0 0 0 * * *';
  return Number.isInteger(hours) && hours < HOURS_PER_DAY && HOURS_PER_DAY % hours === 0
    ? `0 0 */${hours} * * *`
    : null;
};
