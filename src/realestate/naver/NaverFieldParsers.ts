/**
 * Pure parsers for the loosely formatted text on listing cards.
 * None of them throws: unreadable input maps to 0 / '' defaults.
 */

/** Square meters per pyeong */
export const SQM_PER_PYEONG = 3.305785;

const WON_PER_EOK = 100_000_000;
const WON_PER_MAN = 10_000;

export interface ParsedSpec {
  areaPyeong: number;
  floorInfo: string;
  direction: string;
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Reads an amount written in 만원 units: "5000", "5,000", "5천", "5천500", "5000만원".
 * Returns NaN when the text is not such an amount.
 */
function parseManUnits(text: string): number {
  const cleaned = text.replace(/원$/, '').replace(/만$/, '');
  if (cleaned === '') {
    return 0;
  }

  const thousandMatch = cleaned.match(/^(\d+)천(\d*)$/);
  if (thousandMatch) {
    const rest = thousandMatch[2] === '' ? 0 : Number(thousandMatch[2]);
    return Number(thousandMatch[1]) * 1000 + rest;
  }

  return /^\d+$/.test(cleaned) ? Number(cleaned) : NaN;
}

/**
 * Converts a Korean price string to won.
 *
 * "5억" → 500,000,000; "3억5천" → 350,000,000; "3억 5,000" → 350,000,000;
 * "5000만원" → 50,000,000. For a range such as "5억 ~ 6억" only the part before
 * "~" is read, so the upper bound is dropped.
 */
export function parsePrice(raw: string): number {
  let text = raw.trim();
  if (!text) {
    return 0;
  }

  if (text.includes('~')) {
    text = text.split('~')[0];
  }

  text = text.replace(/,/g, '').replace(/\s+/g, '');
  if (!text) {
    return 0;
  }

  const parts = text.split('억');
  if (parts.length > 2) {
    return 0;
  }

  let eok = 0;
  let man: number;

  if (parts.length === 2) {
    const [eokText, remainder] = parts;
    if (eokText !== '') {
      if (!/^\d+(\.\d+)?$/.test(eokText)) {
        return 0;
      }
      eok = Number(eokText);
    }
    man = parseManUnits(remainder);
  } else {
    man = parseManUnits(parts[0]);
  }

  if (Number.isNaN(man)) {
    return 0;
  }

  return Math.round(eok * WON_PER_EOK + man * WON_PER_MAN);
}

/**
 * Converts a confirmation badge such as "확인매물 24.03.15." (or unpadded "24.3.15.") to "2024-03-15".
 * Returns '' for anything that is not a real calendar date.
 */
export function parseDate(raw: string): string {
  const cleaned = raw.trim().replace('확인매물', '').trim().replace(/\.$/, '');
  const segments = cleaned.split('.');
  let digits: string;
  if (segments.length === 3 && segments.every((segment) => /^\d{1,2}$/.test(segment))) {
    digits = segments.map((segment) => segment.padStart(2, '0')).join('');
  } else if (/^\d{6}$/.test(cleaned)) {
    digits = cleaned;
  } else {
    return '';
  }

  const year = 2000 + Number(digits.slice(0, 2));
  const month = Number(digits.slice(2, 4));
  const day = Number(digits.slice(4, 6));

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return '';
  }

  return date.toISOString().slice(0, 10);
}

/**
 * Splits a spec line like "109/84.77㎡, 5/15층, 남향" into area (pyeong), floor and direction.
 * The area is the exclusive area after the "/" converted from ㎡, rounded to 2 decimals.
 */
export function parseSpec(raw: string): ParsedSpec {
  const result: ParsedSpec = { areaPyeong: 0, floorInfo: '', direction: '' };
  if (!raw || !raw.trim()) {
    return result;
  }

  const parts = raw.split(',').map((part) => part.trim());

  const areaPart = parts[0];
  if (areaPart.includes('/') && areaPart.includes('㎡')) {
    const sqmText = areaPart.split('/')[1].replace('㎡', '').trim();
    const sqm = sqmText === '' ? NaN : Number(sqmText);
    if (Number.isFinite(sqm)) {
      result.areaPyeong = roundTo2(sqm / SQM_PER_PYEONG);
    }
  }

  if (parts.length > 1) {
    result.floorInfo = parts[1];
  }
  if (parts.length > 2) {
    result.direction = parts[2];
  }

  return result;
}
