import type { Instant } from '../callTree';

export type InstantParser = (text: string) => Instant | undefined;

type Field = 'year' | 'year2' | 'month' | 'day' | 'hour' | 'minute' | 'second' | 'fraction';

const DIRECTIVES: Record<string, { field: Field; pattern: string }> = {
  Y: { field: 'year', pattern: '(\\d{4})' },
  y: { field: 'year2', pattern: '(\\d{2})' },
  m: { field: 'month', pattern: '(\\d{1,2})' },
  d: { field: 'day', pattern: '(\\d{1,2})' },
  H: { field: 'hour', pattern: '(\\d{1,2})' },
  M: { field: 'minute', pattern: '(\\d{1,2})' },
  S: { field: 'second', pattern: '(\\d{1,2})' },
  f: { field: 'fraction', pattern: '(\\d{1,9})' }
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// "123" -> 123, "5" -> 500, "123456" -> 123.456
function fractionToMs(digits: string): number {
  const padded = digits.padEnd(9, '0');
  return Number(padded.slice(0, 3)) + Number(padded.slice(3)) / 1_000_000;
}

// POSIX pivot: 69-99 -> 1969-1999, 00-68 -> 2000-2068
function expandTwoDigitYear(yy: number): number {
  return yy >= 69 ? 1900 + yy : 2000 + yy;
}

/**
 * Compile a strptime-style format (`%m-%d %H:%M:%S.%f`) into a parser that
 * returns UTC epoch milliseconds, or undefined when the text does not fit.
 * Throws when the format uses a directive that is not supported.
 */
export function compileTimestampFormat(format: string, defaultYear: number): InstantParser {
  const fields: Field[] = [];
  let source = '^';
  for (let i = 0; i < format.length; i++) {
    const ch = format[i]!;
    if (ch !== '%') {
      source += escapeRegExp(ch);
      continue;
    }
    const next = format[i + 1];
    i++;
    if (next === '%') {
      source += '%';
      continue;
    }
    const directive = next !== undefined ? DIRECTIVES[next] : undefined;
    if (!directive) {
      throw new Error(`Unsupported time_format directive: %${next ?? ''}`);
    }
    if (fields.includes(directive.field)) {
      throw new Error(`Directive %${next} appears more than once in time_format`);
    }
    fields.push(directive.field);
    source += directive.pattern;
  }
  const re = new RegExp(source + '$');

  return (text: string) => {
    const m = re.exec(text.trim());
    if (!m) return undefined;
    const values: Partial<Record<Field, string>> = {};
    fields.forEach((f, idx) => {
      values[f] = m[idx + 1];
    });
    const num = (f: Field, def: number) => (values[f] !== undefined ? Number(values[f]) : def);

    const year = values.year !== undefined ? num('year', defaultYear) : values.year2 !== undefined ? expandTwoDigitYear(num('year2', 0)) : defaultYear;
    const month = num('month', 1);
    const day = num('day', 1);
    const hour = num('hour', 0);
    const minute = num('minute', 0);
    const second = num('second', 0);
    if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) {
      return undefined;
    }
    const base = Date.UTC(year, month - 1, day, hour, minute, second);
    // Date.UTC rolls Feb 30 into March; reject instead
    if (new Date(base).getUTCDate() !== day) return undefined;
    return base + (values.fraction !== undefined ? fractionToMs(values.fraction) : 0);
  };
}
