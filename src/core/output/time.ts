// successive divisors: seconds -> minutes -> hours -> days -> weeks -> months -> years
const UNIT_STEPS = [60, 60, 24, 7, 365 / 7 / 12, 12];
const UNIT_NAMES = ["second", "minute", "hour", "day", "week", "month", "year"];

export function formatTimeAgo(date: Date, now: Date = new Date()): string {
  const deltaSeconds = (now.getTime() - date.getTime()) / 1000;
  const future = deltaSeconds < 0;
  let value = Math.abs(deltaSeconds);
  let unit = 0;
  while (unit < UNIT_STEPS.length && value >= UNIT_STEPS[unit]) {
    value /= UNIT_STEPS[unit];
    unit += 1;
  }
  const count = Math.floor(value);

  if (unit === 0 && count < 10) {
    return future ? "right now" : "just now";
  }
  const name = UNIT_NAMES[unit];
  const phrase = count === 1 && unit > 0 ? `1 ${name}` : `${count} ${name}s`;
  return future ? `in ${phrase}` : `${phrase} ago`;
}

/** `2024-03-01 09:05:00`, in UTC. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}
