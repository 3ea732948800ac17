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
import { ConflictError, NotFoundError, ValidationError } from 'forge-base-types';
import {
  ComputePivot, PivotBuilder, DataValidation, TableManager, Workbook,
  type PivotDefinition,
} from '../src';

const A = (text: string) => ParseReference(text).area;

const header = ['Region', 'Year', 'Sales'];

const Sum = { field: 'sales', aggregation: 'sum' as const };

describe('compute', () => {

  test('sum by row group', () => {
    const grid = ComputePivot(header, [['A', 1, 10], ['A', 1, 20], ['B', 1, 5]], {
      rows: ['region'], columns: [], values: [Sum], filters: [],
    });
    expect(grid.header).toEqual(['Region', 'Sum of Sales']);
    expect(grid.rows).toEqual([['A', 30], ['B', 5]]);
  });

  test('empty source gives an empty grid', () => {
    const grid = ComputePivot(header, [], { rows: ['Region'], columns: [], values: [Sum], filters: [] });
    expect(grid.header).toEqual(['Region', 'Sum of Sales']);
    expect(grid.rows).toEqual([]);
  });

  test('column groups keep first-seen order', () => {

    const data = [['B', 2024, 1], ['A', 2023, 2], ['B', 2023, 3]];

    const sum = ComputePivot(header, data, { rows: ['Region'], columns: ['Year'], values: [Sum], filters: [] });
    expect(sum.header).toEqual(['Region', '2024', '2023']);
    expect(sum.rows).toEqual([['B', 1, 3], ['A', 0, 2]]);

    const average = ComputePivot(header, data, {
      rows: ['Region'], columns: ['Year'], values: [{ field: 'Sales', aggregation: 'average' }], filters: [],
    });
    expect(average.rows).toEqual([['B', 1, 3], ['A', undefined, 2]]);

  });

  test('several value fields', () => {
    const grid = ComputePivot(header, [['A', 1, 4], ['A', 2, 'n/a'], ['A', 3, undefined]], {
      rows: ['Region'], columns: [], filters: [],
      values: [{ field: 'Sales', aggregation: 'count' }, { field: 'Sales', aggregation: 'max' }],
    });
    expect(grid.header).toEqual(['Region', 'Count of Sales', 'Max of Sales']);
    expect(grid.rows).toEqual([['A', 2, 4]]);
  });

  test('filters and blank groups', () => {
    const grid = ComputePivot(header, [['A', 1, 1], [undefined, 1, 2], ['C', 1, 4]], {
      rows: ['Region'], columns: [], values: [Sum],
      filters: [{ field: 'Region', values: ['A', ''] }],
    });
    expect(grid.rows).toEqual([['A', 1], ['(blank)', 2]]);
  });

  test('errors', () => {

    expect(() => ComputePivot(header, [['A', 1, 'x']], { rows: ['Region'], columns: [], values: [Sum], filters: [] }))
      .toThrow('non-numeric value "x" in field sales (data row 1)');

    expect(() => ComputePivot(header, [], { rows: ['Nope'], columns: [], values: [Sum], filters: [] }))
      .toThrow('pivot field not found: Nope');

    expect(() => ComputePivot(['Region', ' '], [], { rows: ['Region'], columns: [], values: [Sum], filters: [] }))
      .toThrow(ValidationError);

    expect(() => ComputePivot(header, [], { rows: ['Region'], columns: [], values: [], filters: [] }))
      .toThrow(ValidationError);

  });

});

describe('build', () => {

  const Setup = () => {
    const workbook = Workbook.Empty();
    const sheet = workbook.sheets[0];
    [header, ['A', 1, 10], ['A', 1, 20], ['B', 1, 5]].forEach((row, r) => {
      row.forEach((value, c) => sheet.EnsureCell({ row: r + 1, column: c + 1 }).SetValue(value));
    });
    const validation = new DataValidation();
    return { workbook, sheet, validation, pivots: new PivotBuilder(workbook, validation) };
  };

  const Definition = (name: string, column: number): PivotDefinition => ({
    name,
    source: { sheet: 'Sheet1', area: A('A1:C4') },
    rows: ['Region'],
    columns: [],
    values: [Sum],
    filters: [],
    anchor: { sheet: 'Sheet1', address: { row: 1, column } },
  });

  test('writes the grid at the anchor', () => {

    const { sheet, pivots } = Setup();
    const pivot = pivots.Build(Definition('Totals', 6));

    expect(pivot.output.spreadsheet_label).toEqual('F1:G3');
    expect(sheet.GetCell({ row: 1, column: 7 })?.value).toEqual('Sum of Sales');
    expect(sheet.GetCell({ row: 2, column: 6 })?.value).toEqual('A');
    expect(sheet.GetCell({ row: 2, column: 7 })?.value).toEqual(30);
    expect(sheet.GetCell({ row: 3, column: 7 })?.value).toEqual(5);
    expect(sheet.pivots).toHaveLength(1);

  });

  test('conflicts', () => {

    const { workbook, sheet, pivots } = Setup();
    pivots.Build(Definition('Totals', 6));

    expect(() => pivots.Build(Definition('totals', 10))).toThrow(ConflictError);
    expect(() => pivots.Build(Definition('Second', 7))).toThrow('pivot output G1:H3 overlaps pivot table Totals');

    new TableManager(workbook).Create(sheet, A('A1:C4'), 'Source');
    expect(() => pivots.Build(Definition('Third', 2))).toThrow('pivot output B1:C3 overlaps table Source');

    pivots.Delete('TOTALS');
    expect(sheet.pivots).toEqual([]);
    expect(() => pivots.Delete('Totals')).toThrow(NotFoundError);

  });

  test('output cannot cover the source data', () => {

    const { workbook, sheet, pivots } = Setup();

    expect(() => pivots.Build(Definition('Totals', 3))).toThrow('pivot output C1:D3 overlaps its source A1:C4');
    expect(() => pivots.Build({ ...Definition('Totals', 1), anchor: { sheet: 'SHEET1', address: { row: 4, column: 1 } } }))
      .toThrow(ConflictError);
    expect(sheet.GetCell({ row: 1, column: 4 })).toBeUndefined();

    workbook.AddSheet('Report');
    const pivot = pivots.Build({ ...Definition('Totals', 1), anchor: { sheet: 'Report', address: { row: 1, column: 1 } } });
    expect(pivot.output.spreadsheet_label).toEqual('A1:B3');

  });

  test('validation on the target blocks the write', () => {

    const { sheet, validation, pivots } = Setup();
    validation.Attach(sheet, A('G2'), { type: 'whole', operator: 'lessThan', value1: 10 });

    expect(() => pivots.Build(Definition('Totals', 6))).toThrow(ValidationError);
    expect(sheet.GetCell({ row: 1, column: 6 })).toBeUndefined();
    expect(sheet.pivots).toEqual([]);

  });

});
