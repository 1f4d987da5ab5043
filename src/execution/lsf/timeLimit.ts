export interface LsfTimeLimit {
  hours: number;
  minutes: number;
  totalMinutes: number;
}

/**
 * Parses an LSF run limit in `[hour:]minute` form. `80` and `1:20` are the
 * same limit; minutes after a colon must be below 60.
 */
export function parseTimeLimit(text: string): LsfTimeLimit {
  const trimmed = text.trim();
  const m = /^(?:(\d+):)?(\d+)$/.exec(trimmed);
  if (!m) throw new Error(`invalid time limit (expected [hour:]minute): ${text}`);

  const hourPart = m[1];
  const minutePart = Number.parseInt(m[2] ?? "", 10);

  if (hourPart === undefined) {
    if (minutePart < 1) throw new Error(`time limit must be positive: ${text}`);
    return {
      hours: Math.floor(minutePart / 60),
      minutes: minutePart % 60,
      totalMinutes: minutePart
    };
  }

  const hours = Number.parseInt(hourPart, 10);
  if (minutePart > 59) throw new Error(`invalid minutes in time limit: ${text}`);
  const totalMinutes = hours * 60 + minutePart;
  if (totalMinutes < 1) throw new Error(`time limit must be positive: ${text}`);
  return { hours, minutes: minutePart, totalMinutes };
}

export function formatTimeLimit(totalMinutes: number): string {
  if (!Number.isInteger(totalMinutes) || totalMinutes < 1) {
    throw new Error(`invalid time limit minutes: ${totalMinutes}`);
  }
  if (totalMinutes < 60) return String(totalMinutes);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours}:${String(minutes).padStart(2, "0")}`;
}
