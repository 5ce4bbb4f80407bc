/**
 * Collection-date normalisation: turns raw spreadsheet cells into calendar dates and
 * decides whether a date falls inside the accepted collection window.
 *
 * Unparsable input becomes null instead of failing; callers report it as missing.
 */
import { format, isAfter, isBefore, isValid, parse, startOfDay } from "date-fns";
import { CellValue } from "./domain";

export interface DateWindow {
  earliest: Date;
  latest: Date;
}

export interface IDateNormalizer {
  normalise(raw: CellValue): Date | null;
  window(): DateWindow;
  inWindow(date: Date): boolean;
}

export type Clock = () => Date;

export const COLLECTION_START = new Date(2020, 1, 14); // 2020-02-14, local midnight
const MONTH_DAY_YEAR = "MM/dd/yyyy"; // MM and dd also accept a single digit
const monthDayYearShape = /^\d{1,2}\/\d{1,2}\/\d{4}$/;

export class CollectionDateNormalizer implements IDateNormalizer {
  constructor(
    private readonly clock: Clock = () => new Date(),
    private readonly earliest: Date = COLLECTION_START
  ) {}

  normalise(raw: CellValue): Date | null {
    if (raw instanceof Date) return isValid(raw) ? raw : null; // already a date
    if (typeof raw !== "string") return null;
    if (!monthDayYearShape.test(raw)) return null;
    const parsed = parse(raw, MONTH_DAY_YEAR, this.earliest);
    return isValid(parsed) ? parsed : null;
  }

  window(): DateWindow {
    return { earliest: this.earliest, latest: startOfDay(this.clock()) };
  }

  inWindow(date: Date): boolean {
    const { earliest, latest } = this.window();
    return !isBefore(date, earliest) && !isAfter(date, latest);
  }
}

export function createDefaultDateNormalizer(clock?: Clock): IDateNormalizer {
  return new CollectionDateNormalizer(clock);
}

export function formatTimestamp(date: Date): string {
  return format(date, "yyyy-MM-dd HH:mm:ss");
}

export function formatCalendarDate(date: Date): string {
  return format(date, "yyyy-MM-dd");
}
