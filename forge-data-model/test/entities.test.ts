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
  AddressError, ConflictError, NotFoundError, ValidationError, type CellValue,
} from 'forge-base-types';
import {
  Workbook, Worksheet, TableManager, ChartBuilder, ConditionalFormats,
  FormulaWriter, DEFAULT_TABLE_STYLE,
} from '../src';

const A = (text: string) => ParseReference(text).area;

/** write rows of values starting at A1 */
const Fill = (sheet: Worksheet, rows: CellValue[][]) => {
  rows.forEach((row, r) => row.forEach((value, c) => {
    sheet.EnsureCell({ row: r + 1, column: c + 1 }).SetValue(value);
  }));
};

describe('tables', () => {

  const Setup = () => {
    const workbook = Workbook.Empty();
    const sheet = workbook.sheets[0];
    Fill(sheet, [
      ['Name', 'Qty', 'Price'],
      ['bolt', 10, 0.25],
      ['nut', 20, 0.1],
    ]);
    return { workbook, sheet, tables: new TableManager(workbook) };
  };

  test('create', () => {
    const { sheet, tables } = Setup();
    const table = tables.Create(sheet, A('A1:C3'), 'Parts');
    expect(table.columns).toEqual(['Name', 'Qty', 'Price']);
    expect(table.style).toEqual(DEFAULT_TABLE_STYLE);
    expect(sheet.tables).toHaveLength(1);
  });

  test('header rules', () => {

    const { sheet, tables } = Setup();

    sheet.EnsureCell({ row: 1, column: 2 }).SetValue('name');
    expect(() => tables.Create(sheet, A('A1:C3'), 'Parts')).toThrow('duplicate table header "name" at B1');

    sheet.EnsureCell({ row: 1, column: 2 }).SetValue(undefined);
    expect(() => tables.Create(sheet, A('A1:C3'), 'Parts')).toThrow('table header B1 is blank');

    sheet.EnsureCell({ row: 1, column: 2 }).SetFormula('=A1');
    expect(() => tables.Create(sheet, A('A1:C3'), 'Parts')).toThrow(ValidationError);

    expect(sheet.tables).toEqual([]);

  });

  test('names', () => {

    const { sheet, tables } = Setup();

    for (const name of ['A1', 'my table', '1st', 'R1C1', '']) {
      expect(() => tables.Create(sheet, A('A1:C3'), name)).toThrow(ValidationError);
    }

    tables.Create(sheet, A('A1:A3'), 'Parts');
    expect(() => tables.Create(sheet, A('C1:C3'), 'PARTS')).toThrow(ConflictError);

  });

  test('overlap and extent', () => {

    const { sheet, tables } = Setup();
    tables.Create(sheet, A('A1:B3'), 'Parts');

    expect(() => tables.Create(sheet, A('B1:C3'), 'Other')).toThrow('range B1:C3 overlaps table Parts');
    expect(() => tables.Create(sheet, A('A1:D3'), 'Wide')).toThrow(AddressError);

    tables.Create(sheet, A('C1:C3'), 'Prices');
    expect(sheet.tables.map(table => table.name)).toEqual(['Parts', 'Prices']);

  });

  test('rename, resize and delete', () => {

    const { sheet, tables } = Setup();
    tables.Create(sheet, A('A1:B3'), 'Parts');

    tables.Rename('parts', 'Stock');
    expect(sheet.tables[0].name).toEqual('Stock');

    // resize that fails leaves the table as it was
    expect(() => tables.Resize('Stock', A('A1:D3'))).toThrow(AddressError);
    expect(sheet.tables[0].area.spreadsheet_label).toEqual('A1:B3');

    tables.Resize('Stock', A('A1:C2'));
    expect(sheet.tables[0].columns).toEqual(['Name', 'Qty', 'Price']);
    expect(sheet.GetCell({ row: 3, column: 1 })?.value).toEqual('nut');

    tables.Delete('STOCK');
    expect(sheet.tables).toEqual([]);
    expect(() => tables.Delete('Stock')).toThrow(NotFoundError);
    expect(sheet.GetCell({ row: 1, column: 1 })?.value).toEqual('Name');

  });

});

describe('charts', () => {

  const Setup = () => {
    const workbook = Workbook.Empty();
    const sheet = workbook.sheets[0];
    Fill(sheet, [
      ['Month', 'North', 'South'],
      ['Jan', 1, 2],
      ['Feb', 3, 4],
      ['Mar', 5, 6],
    ]);
    return { workbook, sheet, charts: new ChartBuilder(workbook) };
  };

  test('series from a data range', () => {

    const { sheet, charts } = Setup();
    const series = charts.FromRange(sheet, A('A1:C4'));

    expect(series.map(entry => entry.name)).toEqual(['North', 'South']);
    expect(series[0].values.area.spreadsheet_label).toEqual('B2:B4');
    expect(series[1].categories?.area.spreadsheet_label).toEqual('A2:A4');

    const chart = charts.Create(sheet, { type: 'column', series, anchor: { row: 6, column: 1 }, title: 'Sales' });
    expect(chart.name).toEqual('Chart 1');
    expect(chart.width).toEqual(8);
    expect(chart.height).toEqual(15);

    expect(() => charts.FromRange(sheet, A('A1:A4'))).toThrow(ValidationError);

  });

  test('mismatched series attach nothing', () => {

    const { sheet, charts } = Setup();

    expect(() => charts.Create(sheet, {
      type: 'line',
      series: [
        { values: { sheet: 'Sheet1', area: A('B2:B3') } },
        { values: { sheet: 'Sheet1', area: A('C2:C4') } },
      ],
      anchor: { row: 1, column: 5 },
    })).toThrow('series 2 has 3 values; expected 2 (same as series 1)');

    expect(sheet.charts).toEqual([]);

  });

  test('series checks', () => {

    const { sheet, charts } = Setup();
    const base = { type: 'bar' as const, anchor: { row: 1, column: 5 } };

    expect(() => charts.Create(sheet, { ...base, series: [] })).toThrow(ValidationError);
    expect(() => charts.Create(sheet, {
      ...base, series: [{ values: { sheet: 'Sheet1', area: A('B2:C4') } }],
    })).toThrow('series values B2:C4 must be a single row or column');
    expect(() => charts.Create(sheet, {
      ...base, series: [{ values: { sheet: 'Sheet1', area: A('B2:B9') } }],
    })).toThrow(AddressError);
    expect(() => charts.Create(sheet, {
      ...base, series: [{ values: { sheet: 'Sheet1', area: A('B2:B4') }, categories: { sheet: 'Sheet1', area: A('A2:A3') } }],
    })).toThrow('categories for series 1 have 2 entries; expected 3');

    expect(sheet.charts).toEqual([]);

  });

  test('delete', () => {
    const { sheet, charts } = Setup();
    charts.Create(sheet, { type: 'pie', series: charts.FromRange(sheet, A('A1:B4')), anchor: { row: 1, column: 5 }, name: 'Share' });
    expect(() => charts.Delete(sheet, 'nope')).toThrow(NotFoundError);
    charts.Delete(sheet, 'share');
    expect(sheet.charts).toEqual([]);
  });

});

describe('conditional formats', () => {

  test('priorities', () => {

    const workbook = Workbook.Empty();
    const sheet = workbook.sheets[0];
    const formats = new ConditionalFormats(workbook.styles, new FormulaWriter());

    const first = formats.Add(sheet, A('A1:A10'), { type: 'comparison', operator: 'greaterThan', value1: 5 }, { fill_color: 'ffc7ce' });
    const second = formats.Add(sheet, A('B1:B10'), { type: 'duplicate' }, { bold: true });
    const top = formats.Add(sheet, A('C1:C10'), { type: 'expression', formula: 'C1>0' }, { font_color: '006100' }, 1);

    expect(first.priority).toEqual(1);
    expect(second.priority).toEqual(2);
    expect(top.priority).toEqual(1);
    expect(sheet.conditional_formats.map(rule => rule.areas[0].spreadsheet_label)).toEqual(['A1:A10', 'C1:C10', 'B1:B10']);
    expect(first.style).toEqual(0);
    expect(second.style).toEqual(1);

  });

  test('rejects bad rules', () => {

    const workbook = Workbook.Empty();
    const sheet = workbook.sheets[0];
    const formats = new ConditionalFormats(workbook.styles, new FormulaWriter());

    expect(() => formats.Add(sheet, A('A1'), { type: 'expression', formula: '=SUM(' }, { bold: true })).toThrow(ValidationError);
    expect(() => formats.Add(sheet, A('A1'), { type: 'comparison', operator: 'between', value1: 1 }, { bold: true })).toThrow(ValidationError);
    expect(() => formats.Add(sheet, A('A1'), { type: 'unique' }, {})).toThrow(ValidationError);
    expect(sheet.conditional_formats).toEqual([]);

    formats.Add(sheet, A('A1'), { type: 'unique' }, { italic: true });
    expect(formats.Remove(sheet, A('A1'))).toEqual(1);
    expect(() => formats.Remove(sheet, A('A1'))).toThrow(NotFoundError);

  });

});
