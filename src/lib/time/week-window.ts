import { endOfDay, isValid, isWithinInterval, parseISO, startOfDay } from "date-fns";

/** Kick-off bounds of one NFL scoring period. */
export interface WeekWindow {
  week: number;
  start: Date;
  end: Date;
}

/**
 * Builds a week window spanning the first and last kick-off of a scoring period:
 * - start: local start-of-day of the earliest game
 * - end: local end-of-day of the latest game
 *
 * Returns null when no kick-off is known for the week.
 */
export const getWeekWindowFromKickoffs = (
  week: number,
  kickoffs: Array<number | string | Date>
): WeekWindow | null => {
  const times = kickoffs
    .map((kickoff) => (typeof kickoff === "string" ? parseISO(kickoff) : new Date(kickoff)))
    .filter(isValid)
    .map((date) => date.getTime());

  if (times.length === 0) return null;

  return {
    week,
    start: startOfDay(Math.min(...times)),
    end: endOfDay(Math.max(...times)),
  };
};

/**
 * Whether a game's commence time falls inside the window (bounds inclusive).
 *
 * Returns null for an unparsable timestamp; callers treat that as
 * "no filter applied".
 */
export const isWithinWeekWindow = (commenceTime: string, window: WeekWindow): boolean | null => {
  const date = parseISO(commenceTime);
  if (!isValid(date)) return null;
  return isWithinInterval(date, { start: window.start, end: window.end });
};
