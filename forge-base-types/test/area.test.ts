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

import { Area, IsCellAddress, MAX_COLUMNS } from '../src/area';

test('IsCellAddress', () => {

  expect(IsCellAddress({ row: 1 })).toBeFalsy();
  expect(IsCellAddress({ row: 1, column: 1 })).toBeTruthy();
  expect(IsCellAddress({ row: 1, column: 1, absolute_row: true, sheet: 'Sheet1' })).toBeTruthy();
  expect(IsCellAddress(undefined)).toBeFalsy();

});

test('construction', () => {

  // start only
  let area = new Area({ row: 1, column: 3 });
  expect(area.end.row).toEqual(1);
  expect(area.end.column).toEqual(3);

  // start, end
  area = new Area({ row: 1, column: 3 }, { row: 2, column: 5 });
  expect(area.end.row).toEqual(2);
  expect(area.end.column).toEqual(5);

  // normalize
  area = new Area({ row: 10, column: 7 }, { row: 2, column: 3 }, true);
  expect(area.start).toEqual({ row: 2, column: 3 });
  expect(area.end).toEqual({ row: 10, column: 7 });

  // normalizing twice changes nothing
  const again = area.Clone().Normalize();
  expect(again.Equals(area)).toBeTruthy();

});

test('accessors', () => {

  const area = new Area({ row: 1, column: 3 }, { row: 4, column: 11 });

  expect(area.rows).toEqual(4);
  expect(area.columns).toEqual(9);
  expect(area.count).toEqual(36);
  expect(area.spreadsheet_label).toEqual('C1:K4');
  expect(area.absolute_label).toEqual('$C$1:$K$4');
  expect(new Area({ row: 5, column: 2 }).spreadsheet_label).toEqual('B5');

});

test('column labels', () => {

  expect(Area.ColumnToLabel(1)).toEqual('A');
  expect(Area.ColumnToLabel(26)).toEqual('Z');
  expect(Area.ColumnToLabel(27)).toEqual('AA');
  expect(Area.ColumnToLabel(52)).toEqual('AZ');
  expect(Area.ColumnToLabel(703)).toEqual('AAA');
  expect(Area.ColumnToLabel(MAX_COLUMNS)).toEqual('XFD');

  expect(Area.LabelToColumn('xfd')).toEqual(16384);
  expect(Area.LabelToColumn('A1')).toEqual(0);

  for (let column = 1; column <= MAX_COLUMNS; column++) {
    expect(Area.LabelToColumn(Area.ColumnToLabel(column))).toEqual(column);
  }

});

test('methods', () => {

  const area = new Area({ row: 2, column: 7 }, { row: 5, column: 9 });
  expect(area.Contains({ row: 3, column: 8 })).toBeTruthy();
  expect(area.Contains({ row: 6, column: 8 })).toBeFalsy();

  expect(area.Intersects(new Area({ row: 5, column: 9 }, { row: 8, column: 12 }))).toBeTruthy();
  expect(area.Intersects(new Area({ row: 6, column: 1 }, { row: 8, column: 12 }))).toBeFalsy();

  const joined = Area.Join(area, new Area({ row: 4, column: 7 }, { row: 12, column: 11 }));
  expect(joined.end).toEqual({ row: 12, column: 11 });
  expect(joined.start).toEqual({ row: 2, column: 7 });

  expect(new Area({ row: 1, column: 1 }, { row: 2, column: 2 }).Array()).toEqual([
    { row: 1, column: 1 }, { row: 1, column: 2 },
    { row: 2, column: 1 }, { row: 2, column: 2 },
  ]);

});
