const DAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];
const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

const RFC1123 =
  /^(Sun|Mon|Tue|Wed|Thu|Fri|Sat), (\d{2}) (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) (\d{4}) (\d{2}):(\d{2}):(\d{2}) ([A-Z]{1,5}|[+-]\d{4})$/;

/** A date that remembers the zone it was written in, so it prints back the same way. */
export class ZonedDate extends Date {
  declare zone: string;
  /** minutes east of UTC */
  declare offset: number;
  constructor(time: number, zone: string, offset = 0) {
    super(time);
    this.zone = zone;
    this.offset = offset;
  }
}

/** 0001-01-01T00:00:00Z, the date of a post that has no `date:` line. */
export const ZERO_DATE = /* @__PURE__ */ new ZonedDate(-62135596800000, "UTC");

export function zeroDate(): ZonedDate {
  return new ZonedDate(ZERO_DATE.getTime(), ZERO_DATE.zone);
}

const pad = (n: number, width = 2, fill = "0") => String(n).padStart(width, fill);

// abbreviations carry no offset: the clock time is kept as written
function zoneOffsetMinutes(zone: string): number {
  if (zone[0] === "+" || zone[0] === "-") {
    const sign = zone[0] === "-" ? -1 : 1;
    return sign * (parseInt(zone.slice(1, 3), 10) * 60 + parseInt(zone.slice(3, 5), 10));
  }
  return 0;
}

/** The wall clock of `date` in its own zone, as a UTC date. */
function wallClock(date: Date): [Date, string] {
  if (date instanceof ZonedDate) {
    return [new Date(date.getTime() + date.offset * 60_000), date.zone];
  }
  return [date, "GMT"];
}

function utc(year: number, month: number, day: number, h = 0, m = 0, s = 0): Date | undefined {
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(h, m, s, 0);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

/**
 * Parses `Mon, 02 Jan 2006 15:04:05 MST`. A numeric zone such as `+0100` shifts the
 * time; an abbreviation is kept as a name with a zero offset.
 */
export function parseRFC1123(text: string): ZonedDate {
  const match = RFC1123.exec(text);
  if (!match) {
    throw new Error(`cannot parse "${text}" as "Mon, 02 Jan 2006 15:04:05 MST"`);
  }
  const [, , dd, mon, yyyy, hh, mm, ss, zone] = match;
  const hours = parseInt(hh, 10);
  const minutes = parseInt(mm, 10);
  const seconds = parseInt(ss, 10);
  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new Error(`time out of range in "${text}"`);
  }
  const date = utc(parseInt(yyyy, 10), MONTHS.indexOf(mon), parseInt(dd, 10), hours, minutes, seconds);
  if (!date) {
    throw new Error(`day out of range in "${text}"`);
  }
  const offset = zoneOffsetMinutes(zone);
  return new ZonedDate(date.getTime() - offset * 60_000, zone, offset);
}

/** Writes a {@link ZonedDate} in its own zone, any other date in GMT. */
export function formatRFC1123(date: Date): string {
  const [d, zone] = wallClock(date);
  return (
    `${DAYS[d.getUTCDay()]}, ${pad(d.getUTCDate())} ${MONTHS[d.getUTCMonth()]} ` +
    `${pad(d.getUTCFullYear(), 4)} ${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:` +
    `${pad(d.getUTCSeconds())} ${zone}`
  );
}

/** `January  2, 2006`: the day is padded with a space to two columns. */
export function formatShortDate(date: Date): string {
  const [d] = wallClock(date);
  return `${MONTH_NAMES[d.getUTCMonth()]} ${pad(d.getUTCDate(), 2, " ")}, ${d.getUTCFullYear()}`;
}

export function isoDateToRFC1123(iso: string): string {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(iso);
  const date = match && utc(parseInt(match[1], 10), parseInt(match[2], 10) - 1, parseInt(match[3], 10));
  if (!date) {
    throw new Error(`cannot parse "${iso}" as "2006-01-02"`);
  }
  return formatRFC1123(date);
}
