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

import { AddressError } from 'forge-base-types';
import { ParseReference, ParseRange, QuoteSheetName, FormatReference } from '../src/reference';

describe('references', () => {

  test('single cell', () => {
    const result = ParseReference('B7');
    expect(result.sheet).toBeUndefined();
    expect(result.area.start).toEqual({ row: 7, column: 2 });
    expect(result.area.end).toEqual({ row: 7, column: 2 });
  });

  test('range with absolute markers', () => {
    const result = ParseReference('$A$1:c$4');
    expect(result.area.spreadsheet_label).toEqual('A1:C4');
  });

  test('reversed corners normalize', () => {
    const result = ParseReference('D10:B2');
    expect(result.area.spreadsheet_label).toEqual('B2:D10');

    // idempotent
    const again = ParseReference(result.area.spreadsheet_label);
    expect(again.area.spreadsheet_label).toEqual('B2:D10');
  });

  test('sheet prefixes', () => {
    expect(ParseReference('Data!A1:B2').sheet).toEqual('Data');
    expect(ParseReference(`'My Sheet'!A1`).sheet).toEqual('My Sheet');
    expect(ParseReference(`'Bob''s'!C3`).sheet).toEqual(`Bob's`);
  });

  test('bounds', () => {
    expect(ParseReference('XFD1048576').area.start).toEqual({ row: 1048576, column: 16384 });
    expect(() => ParseReference('XFE1')).toThrow(AddressError);
    expect(() => ParseReference('A1048577')).toThrow(AddressError);
    expect(() => ParseReference('A0')).toThrow(AddressError);
  });

  test('malformed', () => {
    for (const text of ['', 'A', '1', 'A1:', 'A1:B2:C3', 'ABCD1', `'open!A1`, '!A1', 'A1B2']) {
      expect(() => ParseReference(text)).toThrow(AddressError);
    }
    expect(() => ParseReference('nope')).toThrow('malformed address: nope');
  });

  test('start and end cells', () => {
    expect(ParseRange('C3', 'A1').area.spreadsheet_label).toEqual('A1:C3');
    expect(ParseRange('B2').area.spreadsheet_label).toEqual('B2');
  });

  test('start and end cells on a sheet', () => {
    const result = ParseRange('Sheet1!A1', 'sheet1!B2');
    expect(result.sheet).toEqual('Sheet1');
    expect(result.area.spreadsheet_label).toEqual('A1:B2');
    expect(ParseRange('Sheet1!A1', 'B2').sheet).toEqual('Sheet1');
    expect(() => ParseRange('Sheet1!A1', 'Sheet2!B2')).toThrow(AddressError);
    expect(() => ParseRange('A1', 'Sheet2!B2')).toThrow('range spans sheets: A1, Sheet2!B2');
  });

  test('rendering', () => {
    expect(QuoteSheetName('Sheet1')).toEqual('Sheet1');
    expect(QuoteSheetName('My Sheet')).toEqual(`'My Sheet'`);
    expect(QuoteSheetName(`Bob's`)).toEqual(`'Bob''s'`);
    expect(QuoteSheetName('AB12')).toEqual(`'AB12'`);

    const { area } = ParseReference('B2:B5');
    expect(FormatReference(area, 'Sales Data', true)).toEqual(`'Sales Data'!$B$2:$B$5`);
    expect(FormatReference(area)).toEqual('B2:B5');
  });

});
