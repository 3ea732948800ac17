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

import { ParseReference } from 'forge-parser';
import {
  AddressError, ConflictError, FormatError, NotFoundError, ValidationError,
} from 'forge-base-types';
import { Workbook, ChartBuilder } from '../src';

const A = (text: string) => ParseReference(text).area;

describe('workbook', () => {

  test('empty workbook has one sheet', () => {
    const workbook = Workbook.Empty();
    expect(workbook.sheets.map(sheet => sheet.name)).toEqual(['Sheet1']);
    expect(workbook.styles.count).toEqual(1);
  });

  test('sheet names', () => {

    const workbook = Workbook.Empty();

    expect(() => workbook.AddSheet('sheet1')).toThrow(ConflictError);
    expect(() => workbook.AddSheet('a/b')).toThrow(ValidationError);
    expect(() => workbook.AddSheet('\'quoted')).toThrow(ValidationError);
    expect(() => workbook.AddSheet('x'.repeat(32))).toThrow(ValidationError);
    expect(() => workbook.GetSheet('nope')).toThrow('sheet not found: nope');

    workbook.AddSheet('Data');
    expect(workbook.GetSheet('DATA').name).toEqual('Data');

  });

  test('rename keeps chart series pointed at the sheet', () => {

    const workbook = Workbook.Empty();
    const sheet = workbook.AddSheet('Data');

    sheet.EnsureCell({ row: 1, column: 1 }).SetValue('x');
    sheet.EnsureCell({ row: 3, column: 2 }).SetValue(2);

    const chart = new ChartBuilder(workbook).Create(sheet, {
      type: 'line',
      series: [{ values: { sheet: 'Data', area: A('B2:B3') } }],
      anchor: { row: 1, column: 4 },
    });

    workbook.RenameSheet('data', 'Numbers');

    expect(sheet.name).toEqual('Numbers');
    expect(chart.series[0].values.sheet).toEqual('Numbers');
    expect(() => workbook.RenameSheet('Numbers', 'sheet1')).toThrow(ConflictError);

  });

  test('the last sheet cannot be deleted', () => {
    const workbook = Workbook.Empty();
    expect(() => workbook.DeleteSheet('Sheet1')).toThrow(ValidationError);
    workbook.AddSheet('Other');
    workbook.DeleteSheet('sheet1');
    expect(workbook.sheets.map(sheet => sheet.name)).toEqual(['Other']);
  });

  test('copy sheet', () => {

    const workbook = Workbook.Empty();
    workbook.AddSheet('Last');

    const source = workbook.GetSheet('Sheet1');
    source.EnsureCell({ row: 2, column: 2 }).SetValue(42);
    source.Merge(A('D1:E1'));

    const copy = workbook.CopySheet('Sheet1', 'Copy');

    expect(workbook.sheets.map(sheet => sheet.name)).toEqual(['Sheet1', 'Copy', 'Last']);
    expect(copy.GetCell({ row: 2, column: 2 })?.value).toEqual(42);
    expect(copy.merges.map(area => area.spreadsheet_label)).toEqual(['D1:E1']);

    copy.EnsureCell({ row: 2, column: 2 }).SetValue(1);
    expect(source.GetCell({ row: 2, column: 2 })?.value).toEqual(42);

  });

  test('resolve references', () => {

    const workbook = Workbook.Empty();

    const resolved = workbook.Resolve('\'Sheet1\'!B2:A1');
    expect(resolved.sheet.name).toEqual('Sheet1');
    expect(resolved.area.spreadsheet_label).toEqual('A1:B2');

    expect(workbook.Resolve('C3', 'sheet1').area.spreadsheet_label).toEqual('C3');
    expect(() => workbook.Resolve('A1')).toThrow(NotFoundError);
    expect(() => workbook.Resolve('Nope!A1')).toThrow(NotFoundError);
    expect(() => workbook.Resolve('A1:B2:C3', 'Sheet1')).toThrow(AddressError);

  });

  test('invariants', () => {

    const workbook = Workbook.Empty();
    const cell = workbook.sheets[0].EnsureCell({ row: 1, column: 1 });

    workbook.CheckInvariants();

    cell.value = 1;
    cell.formula = 'A2';
    expect(() => workbook.CheckInvariants()).toThrow('cell Sheet1!A1 has both a value and a formula');

    cell.SetValue(1);
    cell.style = 99;
    expect(() => workbook.CheckInvariants()).toThrow(FormatError);

  });

});

describe('worksheet', () => {

  test('merges', () => {

    const sheet = Workbook.Empty().sheets[0];

    sheet.EnsureCell({ row: 1, column: 1 }).SetValue('keep');
    sheet.EnsureCell({ row: 1, column: 2 }).SetValue('drop');

    sheet.Merge(A('A1:B2'));

    expect(sheet.GetCell({ row: 1, column: 1 })?.value).toEqual('keep');
    expect(sheet.GetCell({ row: 1, column: 2 })?.value).toBeUndefined();
    expect(sheet.extent).toEqual({ rows: 2, columns: 2 });

    expect(() => sheet.Merge(A('B2:C3'))).toThrow(ConflictError);
    expect(() => sheet.Merge(A('E5'))).toThrow(ValidationError);
    expect(() => sheet.Unmerge(A('A1:B1'))).toThrow('range is not merged: A1:B1');

    sheet.Unmerge(A('A1:B2'));
    expect(sheet.merges).toEqual([]);

  });

  test('shared formula dependents without a master become literals', () => {

    const workbook = Workbook.Empty();
    const sheet = workbook.sheets[0];

    const master = sheet.EnsureCell({ row: 1, column: 1 });
    master.formula = 'B1*2';
    master.formula_attributes = { t: 'shared', ref: 'A1:A3', si: '0' };
    master.cached = { text: '2' };

    const number = sheet.EnsureCell({ row: 2, column: 1 });
    number.formula = '';
    number.formula_attributes = { t: 'shared', si: '0' };
    number.cached = { text: '4' };

    const error = sheet.EnsureCell({ row: 3, column: 1 });
    error.formula = '';
    error.formula_attributes = { t: 'shared', si: '0' };
    error.cached = { type: 'e', text: '#DIV/0!' };

    expect(workbook.ReleaseSharedFormulas()).toEqual(0);
    workbook.CheckInvariants();

    master.SetValue(99);
    expect(() => workbook.CheckInvariants()).toThrow(
      'cell Sheet1!A2 refers to shared formula 0, which has no master cell');

    expect(workbook.ReleaseSharedFormulas()).toEqual(2);
    workbook.CheckInvariants();

    expect(number.value).toEqual(4);
    expect(number.formula).toBeUndefined();
    expect(number.formula_attributes).toBeUndefined();

    expect(error.value).toBeUndefined();
    expect(error.formula).toBeUndefined();
    expect(error.cached).toEqual({ type: 'e', text: '#DIV/0!' });

  });

  test('extent checks', () => {

    const sheet = Workbook.Empty().sheets[0];
    sheet.EnsureCell({ row: 3, column: 2 }).SetValue(1);

    expect(sheet.extent_area?.spreadsheet_label).toEqual('A1:B3');
    expect(() => sheet.CheckExtent(A('A1:B3'))).not.toThrow();
    expect(() => sheet.CheckExtent(A('A1:C3'))).toThrow('range A1:C3 is outside the used extent of Sheet1');

  });

});
