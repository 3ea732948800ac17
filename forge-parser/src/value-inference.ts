/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2025 trebco, llc. 
 * info@treb.app
 * 
 */

import type { CellValue } from 'forge-base-types';

/** hints is a bitfield */
export enum Hints {
  None =        0x00,
  Exponential = 0x02,
  Percent =     0x04,
  Currency =    0x08,
  Grouping =    0x10,
  Parens =      0x20,
  Date =        0x40,
  Time =        0x80,
}

export interface InferredValue {
  value: CellValue;
  hints: Hints;

  /** number format implied by the text, if any */
  number_format?: string;
}

export const DATE_FORMAT = 'mm/dd/yyyy';
export const DATE_TIME_FORMAT = 'mm/dd/yyyy h:mm';
export const PERCENT_FORMAT = '0.00%';

const currency_symbols = '$€£¥';

const iso_date = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const us_date = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?: (\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * build a UTC date, or return undefined if the components don't make
 * a real date (e.g. Feb 30).
 */
const MakeDate = (year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0): Date | undefined => {
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
};

/**
 * dates we accept: ISO (yyyy-mm-dd) and slashed. slashed dates are read
 * month-first; if that fails and day-first works, we use that.
 */
const TestDate = (text: string): { date: Date, time: boolean } | undefined => {

  let match = text.match(iso_date);
  if (match) {
    const date = MakeDate(Number(match[1]), Number(match[2]), Number(match[3]),
      Number(match[4] || 0), Number(match[5] || 0), Number(match[6] || 0));
    return date ? { date, time: match[4] !== undefined } : undefined;
  }

  match = text.match(us_date);
  if (match) {
    const year = Number(match[3]);
    const hours = Number(match[4] || 0);
    const minutes = Number(match[5] || 0);
    const seconds = Number(match[6] || 0);
    const date = MakeDate(year, Number(match[1]), Number(match[2]), hours, minutes, seconds)
      || MakeDate(year, Number(match[2]), Number(match[1]), hours, minutes, seconds);
    return date ? { date, time: match[4] !== undefined } : undefined;
  }

  return undefined;

};

/**
 * divide by 100 without picking up fp noise (0.07 rather than
 * 0.07000000000000001).
 */
const FromPercent = (value: number): number => {
  return Number((value / 100).toPrecision(15));
};

/**
 * infer a typed value from text. non-string values pass through.
 * the returned format, if any, is the number format a cell should
 * get so the value displays the way it was typed.
 */
export const InferValue = (input: CellValue | null): InferredValue => {

  if (input === null || input === undefined) {
    return { value: undefined, hints: Hints.None };
  }

  if (typeof input !== 'string') {
    return { value: input, hints: Hints.None };
  }

  const text = input.trim();

  if (!text) {
    return { value: undefined, hints: Hints.None };
  }

  // leading apostrophe forces text
  if (text[0] === '\'') {
    return { value: text.substring(1), hints: Hints.None };
  }

  let hints: Hints = Hints.None;
  let x = text;
  let negative = false;
  let symbol = '';

  const parens = x.match(/^\((.+)\)$/);
  if (parens) {
    x = parens[1].trim();
    hints |= Hints.Parens;
    negative = true;
  }

  if (x[0] === '-' && currency_symbols.includes(x[1] || '')) {
    negative = !negative;
    x = x.substring(1);
  }

  if (currency_symbols.includes(x[0])) {
    symbol = x[0];
    x = x.substring(1).trim();
    hints |= Hints.Currency;
  }

  const pct = x.match(/^(.+?)\s*%$/);
  if (pct) {
    x = pct[1];
    hints |= Hints.Percent;
  }

  if (/^-?\d{1,3}(,\d{3})+(\.\d+)?$/.test(x)) {
    x = x.replace(/,/g, '');
    hints |= Hints.Grouping;
  }

  if (/^-?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(x)) {

    let value = Number(x);
    if (negative) value = -value;
    if (/e/i.test(x)) hints |= Hints.Exponential;

    const decimals = x.includes('.');

    if (hints & Hints.Percent) {
      return { value: FromPercent(value), hints, number_format: PERCENT_FORMAT };
    }

    if (hints & Hints.Currency) {
      const base = decimals ? '#,##0.00' : '#,##0';
      return { value, hints, number_format: `"${symbol}"${base}` };
    }

    if (hints & Hints.Grouping) {
      return { value, hints, number_format: decimals ? '#,##0.00' : '#,##0' };
    }

    // plain numbers keep the general format
    return { value, hints };

  }

  const lc = text.toLowerCase();
  if (lc === 'true') return { value: true, hints: Hints.None };
  if (lc === 'false') return { value: false, hints: Hints.None };

  const date = TestDate(text);
  if (date) {
    return {
      value: date.date,
      hints: date.time ? (Hints.Date | Hints.Time) : Hints.Date,
      number_format: date.time ? DATE_TIME_FORMAT : DATE_FORMAT,
    };
  }

  return { value: text, hints: Hints.None };

};
