interface ZonedParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

const zonedParts = (date: Date, timeZone: string): ZonedParts => {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  }).formatToParts(date);

  const pick = (type: Intl.DateTimeFormatPartTypes): string => parts.find((part) => part.type === type)?.value ?? "00";

  return {
    year: pick("year"),
    month: pick("month"),
    day: pick("day"),
    hour: pick("hour"),
    minute: pick("minute"),
    second: pick("second")
  };
};

/** dd/mm/yyyy as printed on issued documents and stored in the ledger. */
export const formatIssueDate = (date: Date, timeZone: string): string => {
  const { day, month, year } = zonedParts(date, timeZone);
  return `${day}/${month}/${year}`;
};

export const formatFileTimestamp = (date: Date, timeZone: string): string => {
  const { year, month, day, hour, minute, second } = zonedParts(date, timeZone);
  return `${year}${month}${day}_${hour}${minute}${second}`;
};

const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2}))?/;

export interface DisplayDate {
  day: string;
  time?: string;
}

// Values come from datetime-local inputs ("2025-11-01T10:00"); anything else is shown as typed.
export const splitDisplayDate = (raw: string): DisplayDate => {
  const match = DATE_TIME_PATTERN.exec(raw.trim());
  if (!match) {
    return { day: raw.trim() };
  }

  const [, year, month, day, hour, minute] = match;
  return {
    day: `${day}/${month}/${year}`,
    time: hour && minute ? `${hour}:${minute}` : undefined
  };
};
