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

import { Area, AddressError, MAX_COLUMNS, MAX_ROWS, type ICellAddress } from 'forge-base-types';

/**
 * parsed reference. sheet is present only if the text carried a
 * sheet prefix; the caller decides whether the sheet exists.
 */
export interface ParsedReference {
  sheet?: string;
  area: Area;
}

const cell_pattern = /^(\$?)([A-Za-z]{1,3})(\$?)(\d+)$/;

/**
 * sheet names that can be written without quotes. anything that also
 * looks like a cell address (e.g. "AB12") must be quoted.
 */
const plain_sheet_name = /^[A-Za-z_][A-Za-z0-9_.]*$/;

/**
 * quote a sheet name if necessary. embedded apostrophes are doubled.
 */
export const QuoteSheetName = (name: string): string => {
  if (plain_sheet_name.test(name) && !/^[A-Za-z]{1,3}\d+$/.test(name)) {
    return name;
  }
  return `'${name.replace(/'/g, `''`)}'`;
};

/**
 * render a reference, with the sheet name if there is one.
 */
export const FormatReference = (area: Area, sheet?: string, absolute = false): string => {
  const label = absolute ? area.absolute_label : area.spreadsheet_label;
  return sheet === undefined ? label : `${QuoteSheetName(sheet)}!${label}`;
};

/**
 * parse a single cell address like `B7` or `$B$7`. returns undefined if
 * the text is not an address at all; throws if it looks like one but is
 * out of bounds.
 */
export const ParseCellAddress = (text: string): ICellAddress | undefined => {

  const match = text.match(cell_pattern);
  if (!match) {
    return undefined;
  }

  const column = Area.LabelToColumn(match[2]);
  const row = Number(match[4]);

  if (column < 1 || column > MAX_COLUMNS || row < 1 || row > MAX_ROWS) {
    throw new AddressError(`address out of bounds: ${text}`);
  }

  return {
    row,
    column,
    ...(match[1] ? { absolute_column: true } : {}),
    ...(match[3] ? { absolute_row: true } : {}),
  };

};

/**
 * split off a leading sheet prefix. quoted names may contain anything,
 * with doubled apostrophes for a literal apostrophe.
 */
const SplitSheet = (text: string): { sheet?: string, rest: string } => {

  if (text[0] === '\'') {
    let name = '';
    for (let i = 1; i < text.length; i++) {
      const char = text[i];
      if (char === '\'') {
        if (text[i + 1] === '\'') {
          name += char;
          i++;
          continue;
        }
        if (text[i + 1] !== '!' || !name) {
          throw new AddressError(`malformed address: ${text}`);
        }
        return { sheet: name, rest: text.substring(i + 2) };
      }
      name += char;
    }
    throw new AddressError(`malformed address: ${text}`);
  }

  const index = text.lastIndexOf('!');
  if (index < 0) {
    return { rest: text };
  }

  const sheet = text.substring(0, index);
  if (!sheet || /['![\]*?/\\:]/.test(sheet)) {
    throw new AddressError(`malformed address: ${text}`);
  }

  return { sheet, rest: text.substring(index + 1) };

};

/**
 * parse `[Sheet!]A1[:B2]`. absolute markers are accepted and dropped
 * from the result; reversed corners are normalized.
 */
export const ParseReference = (input: string): ParsedReference => {

  const text = input.trim();
  const { sheet, rest } = SplitSheet(text);

  const parts = rest.split(':');
  if (parts.length > 2) {
    throw new AddressError(`malformed address: ${input}`);
  }

  const start = ParseCellAddress(parts[0]);
  const end = parts.length === 2 ? ParseCellAddress(parts[1]) : start;

  if (!start || !end) {
    throw new AddressError(`malformed address: ${input}`);
  }

  const area = new Area(
    { row: start.row, column: start.column },
    { row: end.row, column: end.column }, true);

  return sheet === undefined ? { area } : { sheet, area };

};

/**
 * parse a reference from a start cell and an optional end cell, the
 * way most tool calls pass ranges.
 */
export const ParseRange = (start_cell: string, end_cell?: string): ParsedReference => {
  if (!end_cell) {
    return ParseReference(start_cell);
  }
  const start = ParseReference(start_cell);
  const end = ParseReference(end_cell);
  if (end.sheet !== undefined && end.sheet.toLowerCase() !== start.sheet?.toLowerCase()) {
    throw new AddressError(`range spans sheets: ${start_cell}, ${end_cell}`);
  }
  const area = Area.Join(start.area, end.area);
  return start.sheet === undefined ? { area } : { sheet: start.sheet, area };
};
