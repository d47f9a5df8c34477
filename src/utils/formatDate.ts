/**
 * Pattern-based date formatting for x-axis labels and cursor tooltips.
 *
 * Supported tokens (local time):
 * - `yyyy` / `yy`: year
 * - `MMMM` / `MMM` / `MM` / `M`: month name, short name, padded, plain
 * - `dd` / `d`: day of month
 * - `HH` / `H`: 24-hour clock; `hh` / `h`: 12-hour clock
 * - `mm` / `m`: minutes; `ss` / `s`: seconds
 * - `a`: AM/PM marker
 * - `'text'`: literal text (`''` is a single quote)
 *
 * Any other character is copied through unchanged.
 *
 * @module formatDate
 */

export const MONTH_SHORT_EN: readonly string[] = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
];

export const MONTH_LONG_EN: readonly string[] = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

export const pad2 = (n: number): string => String(Math.trunc(n)).padStart(2, '0');

const TOKEN_LETTERS = 'yMdHhmsa';

const formatToken = (token: string, d: Date): string | null => {
  const hours = d.getHours();
  const hours12 = hours % 12 === 0 ? 12 : hours % 12;
  switch (token) {
    case 'yyyy':
      return String(d.getFullYear()).padStart(4, '0');
    case 'yy':
      return pad2(d.getFullYear() % 100);
    case 'MMMM':
      return MONTH_LONG_EN[d.getMonth()] ?? pad2(d.getMonth() + 1);
    case 'MMM':
      return MONTH_SHORT_EN[d.getMonth()] ?? pad2(d.getMonth() + 1);
    case 'MM':
      return pad2(d.getMonth() + 1);
    case 'M':
      return String(d.getMonth() + 1);
    case 'dd':
      return pad2(d.getDate());
    case 'd':
      return String(d.getDate());
    case 'HH':
      return pad2(hours);
    case 'H':
      return String(hours);
    case 'hh':
      return pad2(hours12);
    case 'h':
      return String(hours12);
    case 'mm':
      return pad2(d.getMinutes());
    case 'm':
      return String(d.getMinutes());
    case 'ss':
      return pad2(d.getSeconds());
    case 's':
      return String(d.getSeconds());
    case 'a':
      return hours < 12 ? 'AM' : 'PM';
    default:
      return null;
  }
};

/**
 * Formats `date` with `pattern`. Returns an empty string for an invalid date.
 */
export function formatDate(date: Date, pattern: string): string {
  if (!Number.isFinite(date.getTime())) return '';

  let out = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === "'") {
      // Quoted literal; '' inside or outside quotes is an escaped quote.
      if (pattern[i + 1] === "'") {
        out += "'";
        i += 2;
        continue;
      }
      let j = i + 1;
      while (j < pattern.length) {
        if (pattern[j] === "'" && pattern[j + 1] === "'") {
          out += "'";
          j += 2;
          continue;
        }
        if (pattern[j] === "'") break;
        out += pattern[j];
        j++;
      }
      i = j + 1;
      continue;
    }

    if (TOKEN_LETTERS.includes(ch)) {
      let j = i;
      while (j < pattern.length && pattern[j] === ch) j++;
      const run = pattern.slice(i, j);
      const formatted = formatToken(run, date);
      out += formatted ?? run;
      i = j;
      continue;
    }

    out += ch;
    i++;
  }
  return out;
}
