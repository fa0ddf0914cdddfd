import { assertYYYYMMDD, getTodayShanghaiDateString } from "../../src/lib/date";
import { parseIsoDateYmd } from "../../src/market/date";

export function getArg(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];

    if (a === `--${name}`) {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.startsWith("--")) {
        throw new Error(`Expected value after --${name}`);
      }

      return next;
    }

    if (a.startsWith(prefix)) {
      return a.slice(prefix.length);
    }
  }
  return undefined;
}

export function getPositiveIntArg(argv: string[], name: string, max: number): number | undefined {
  const raw = getArg(argv, name);
  if (raw === undefined) {
    return undefined;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > max) {
    throw new Error(`--${name} must be a positive integer ≤ ${max}, got '${raw}'`);
  }
  return parsed;
}

/**
* `--date=YYYY-MM-DD` pins the end of the report window; defaults to today in Shanghai.
* Returns midday Shanghai time on that day so the window lands on the intended calendar day.
*/
export function getAsOfArg(argv: string[], now = new Date()): Date {
  const today = getTodayShanghaiDateString(now);
  const date = getArg(argv, "date");
  if (date === undefined) {
    return now;
  }

  assertYYYYMMDD(date);
  if (date > today) {
    throw new Error(`Date cannot be in the future (Shanghai). Got ${date}, today is ${today}`);
  }

  const { year, month, day } = parseIsoDateYmd(date);
  return new Date(Date.UTC(year, month - 1, day, 4));
}
