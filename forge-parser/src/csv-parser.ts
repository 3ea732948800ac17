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

import { ValidationError } from 'forge-base-types';

enum ParseState {
  default = 0,
  quoted = 1,
}

/**
 * csv parser, following (largely) RFC4180 rules:
 *
 * - lines end with CRLF, LF or a bare CR
 * - records may have different lengths
 * - any field may be quoted; quoted fields can hold newlines and delimiters
 * - two double-quotes inside a quoted field are one double-quote
 *
 * a leading byte-order mark is dropped. a trailing newline does not
 * produce an empty record.
 */
export const ParseCSV = (source: string, delimiter = ','): string[][] => {

  if (delimiter.length !== 1 || /[\r\n"]/.test(delimiter)) {
    throw new ValidationError(`invalid delimiter: ${JSON.stringify(delimiter)}`);
  }

  const text = source.charCodeAt(0) === 0xfeff ? source.substring(1) : source;

  let state: ParseState = ParseState.default;
  let record: string[] = [];
  let field = '';

  const records: string[][] = [];
  const length = text.length;

  const EndRecord = () => {
    record.push(field);
    field = '';
    records.push(record);
    record = [];
  };

  for (let i = 0; i < length; i++) {
    const char = text[i];
    if (state === ParseState.default) {
      switch (char) {
        case delimiter:
          record.push(field);
          field = '';
          break;

        case '\r':
          if (text[i + 1] === '\n') i++;
          EndRecord();
          break;

        case '\n':
          EndRecord();
          break;

        case '"':
          // unescaped quotes in the middle of a bare field are kept
          if (field.length === 0) {
            state = ParseState.quoted;
          }
          else {
            field += char;
          }
          break;

        default:
          field += char;
          break;
      }
    }
    else {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        }
        else {
          state = ParseState.default;
        }
      }
      else field += char;
    }
  }

  if (state === ParseState.quoted) {
    throw new ValidationError('unterminated quoted field in csv');
  }

  if (record.length || field.length) {
    EndRecord();
  }

  return records;

};
