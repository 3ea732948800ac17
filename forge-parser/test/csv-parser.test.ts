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

import { ParseCSV } from '../src/csv-parser';

describe('csv', () => {

  test('basic records', () => {
    expect(ParseCSV('a,b,c\r\n1,2,3\r\n')).toEqual([['a', 'b', 'c'], ['1', '2', '3']]);
    expect(ParseCSV('a\nb')).toEqual([['a'], ['b']]);
    expect(ParseCSV('x;y', ';')).toEqual([['x', 'y']]);
  });

  test('quoting', () => {
    expect(ParseCSV('"a, b","say ""hi""","line\nbreak"')).toEqual([['a, b', 'say "hi"', 'line\nbreak']]);
    expect(ParseCSV('\uFEFFname,value\n,')).toEqual([['name', 'value'], ['', '']]);
    expect(() => ParseCSV('"open')).toThrow('unterminated quoted field in csv');
    expect(() => ParseCSV('a', '"')).toThrow();
  });

});
