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

/**
 * literal cell values. blank is represented by `undefined`; dates are
 * stored in the container as serial numbers and surface here as Date
 * objects (UTC).
 */
export type CellValue = number | string | boolean | Date | undefined;

/**
 * list of value types, used for reporting and for validation rules
 */
export const ValueTypeList = [
  'blank',
  'number',
  'text',
  'boolean',
  'date',
] as const;

export type ValueType = typeof ValueTypeList[number];

export const GetValueType = (value: CellValue): ValueType => {
  if (value === undefined || value === '') {
    return 'blank';
  }
  if (value instanceof Date) {
    return 'date';
  }
  switch (typeof value) {
    case 'number': return 'number';
    case 'boolean': return 'boolean';
    default: return 'text';
  }
};

/** day zero of the 1900 date system, accounting for the leap-year bug */
const epoch = Date.UTC(1899, 11, 30);
const ms_per_day = 86400000;

/**
 * convert a JS date to a serial number. time of day becomes the
 * fractional part.
 */
export const DateToSerial = (date: Date): number => {
  return (date.getTime() - epoch) / ms_per_day;
};

/**
 * convert serial number to a JS date (UTC). we round to the nearest
 * millisecond to avoid fp noise on the time component.
 */
export const SerialToDate = (serial: number): Date => {
  return new Date(Math.round(epoch + serial * ms_per_day));
};

/**
 * value rendered for reporting. dates are ISO strings, and date-only
 * values (midnight UTC) drop the time component.
 */
export const RenderValue = (value: CellValue): string | number | boolean | null => {
  if (value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    const iso = value.toISOString();
    return iso.endsWith('T00:00:00.000Z') ? iso.substring(0, 10) : iso;
  }
  return value;
};
