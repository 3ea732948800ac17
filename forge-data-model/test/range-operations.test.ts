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
import { ValidationError } from 'forge-base-types';
import {
  DataValidation, FormulaWriter, RangeOperations, Workbook,
} from '../src';

const A = (text: string) => ParseReference(text).area;

const Setup = () => {
  const workbook = Workbook.Empty();
  const validation = new DataValidation();
  const formulas = new FormulaWriter();
  return {
    workbook,
    sheet: workbook.sheets[0],
    validation,
    formulas,
    ranges: new RangeOperations(workbook, validation, formulas),
  };
};

describe('validation rules', () => {

  test('whole number bounds', () => {

    const { sheet, validation } = Setup();
    validation.Attach(sheet, A('B1:B5'), { type: 'whole', operator: 'between', value1: 1, value2: 10 });

    expect(() => validation.CheckWrite(sheet, { row: 2, column: 2 }, 5)).not.toThrow();
    expect(() => validation.CheckWrite(sheet, { row: 2, column: 2 }, 11))
      .toThrow('value 11 rejected by data validation at B2: whole must be between 1 and 10');
    expect(() => validation.CheckWrite(sheet, { row: 2, column: 2 }, 2.5))
      .toThrow('value 2.5 rejected by data validation at B2: value must be a whole number');

    // blank passes by default; cells outside the area aren't checked
    expect(() => validation.CheckWrite(sheet, { row: 2, column: 2 }, undefined)).not.toThrow();
    expect(() => validation.CheckWrite(sheet, { row: 6, column: 2 }, 100)).not.toThrow();

  });

  test('lists, custom messages and replacement', () => {

    const { sheet, validation } = Setup();
    const area = A('A1:A3');

    validation.Attach(sheet, area, { type: 'list', values: ['yes', 'no'], error_message: 'pick yes or no' });
    expect(() => validation.CheckWrite(sheet, { row: 1, column: 1 }, 'maybe'))
      .toThrow('value "maybe" rejected by data validation at A1: pick yes or no');

    validation.Attach(sheet, area, { type: 'text-length', operator: 'lessThanOrEqual', value1: 3 });
    expect(sheet.validations).toHaveLength(1);
    expect(() => validation.CheckWrite(sheet, { row: 1, column: 1 }, 'maybe')).toThrow(ValidationError);
    expect(() => validation.CheckWrite(sheet, { row: 1, column: 1 }, 'yes')).not.toThrow();

    validation.Attach(sheet, area, { type: 'custom', formula: '=A1>0' });
    expect(() => validation.CheckWrite(sheet, { row: 1, column: 1 }, -1)).not.toThrow();

    expect(validation.Remove(sheet, area)).toEqual(1);
    expect(validation.ValidationFor(sheet, { row: 1, column: 1 })).toBeUndefined();

  });

  test('rule shape', () => {
    expect(() => DataValidation.CheckRule({ type: 'list' })).toThrow(ValidationError);
    expect(() => DataValidation.CheckRule({ type: 'decimal', operator: 'notBetween', value1: 1 })).toThrow(ValidationError);
    expect(() => DataValidation.CheckRule({ type: 'custom', formula: ' ' })).toThrow(ValidationError);
  });

  test('date bounds', () => {
    const { sheet, validation } = Setup();
    validation.Attach(sheet, A('C1'), { type: 'date', operator: 'greaterThan', value1: '2024-01-01' });
    expect(() => validation.CheckWrite(sheet, { row: 1, column: 3 }, new Date(Date.UTC(2024, 5, 1)))).not.toThrow();
    expect(() => validation.CheckWrite(sheet, { row: 1, column: 3 }, new Date(Date.UTC(2023, 5, 1)))).toThrow(ValidationError);
  });

});

describe('range operations', () => {

  test('write with inference, then read back', () => {

    const { workbook, sheet, ranges } = Setup();

    const result = ranges.WriteData(sheet, { row: 1, column: 1 }, [
      ['Name', 'Amount', 'When'],
      ['a', '$1,234.50', '2024-01-15'],
      ['b', '15%', '=SUM(B2:B3)'],
    ], { infer: true });

    expect(result.area?.spreadsheet_label).toEqual('A1:C3');
    expect(result.cells).toEqual(9);
    expect(result.formulas).toEqual(1);
    expect(result.warnings).toEqual([]);

    expect(workbook.styles.Get(sheet.GetCell({ row: 2, column: 2 })?.style ?? 0).number_format).toEqual('"$"#,##0.00');
    expect(workbook.styles.Get(sheet.GetCell({ row: 3, column: 2 })?.style ?? 0).number_format).toEqual('0.00%');
    expect(workbook.styles.Get(sheet.GetCell({ row: 2, column: 3 })?.style ?? 0).number_format).toEqual('mm/dd/yyyy');

    expect(ranges.ReadData(sheet).rows).toEqual([
      ['Name', 'Amount', 'When'],
      ['a', 1234.5, '2024-01-15'],
      ['b', 0.15, null],
    ]);

    expect(ranges.ReadData(sheet, A('C3'), true).cells).toEqual([
      { address: 'C3', value: null, formula: '=SUM(B2:B3)' },
    ]);

  });

  test('text stays text without inference', () => {
    const { sheet, ranges } = Setup();
    ranges.WriteData(sheet, { row: 1, column: 1 }, [['15%', null, true]]);
    expect(ranges.ReadData(sheet, A('A1:C1')).rows).toEqual([['15%', null, true]]);
  });

  test('unknown functions are warnings', () => {
    const { sheet, ranges } = Setup();
    const result = ranges.WriteData(sheet, { row: 1, column: 1 }, [['=FROBNICATE(1)', '=FROBNICATE(2)']]);
    expect(result.warnings).toEqual(['unknown function: FROBNICATE']);
  });

  test('a failed write changes nothing', () => {

    const { sheet, validation, ranges } = Setup();

    expect(() => ranges.WriteData(sheet, { row: 1, column: 1 }, [[1, '=SUM(']])).toThrow(ValidationError);
    expect(sheet.GetCell({ row: 1, column: 1 })).toBeUndefined();

    validation.Attach(sheet, A('A1:A3'), { type: 'whole', operator: 'between', value1: 1, value2: 10 });
    expect(() => ranges.WriteData(sheet, { row: 1, column: 1 }, [[5], [11]])).toThrow(ValidationError);
    expect(sheet.GetCell({ row: 1, column: 1 })).toBeUndefined();

  });

  test('copy range', () => {

    const { workbook, sheet, ranges } = Setup();
    const bold = workbook.styles.Resolve({ bold: true });

    const a1 = sheet.EnsureCell({ row: 1, column: 1 });
    a1.SetValue(1);
    a1.style = bold;
    sheet.EnsureCell({ row: 2, column: 1 }).SetFormula('=A1*2');

    const other = workbook.AddSheet('Other');
    const target = ranges.CopyRange(sheet, A('A1:A2'), other, { row: 1, column: 3 });

    expect(target.spreadsheet_label).toEqual('C1:C2');
    expect(other.GetCell({ row: 1, column: 3 })?.value).toEqual(1);
    expect(other.GetCell({ row: 1, column: 3 })?.style).toEqual(bold);
    expect(other.GetCell({ row: 2, column: 3 })?.formula_text).toEqual('=A1*2');

  });

  test('copying a shared formula dependent copies its cached value', () => {

    const { sheet, ranges } = Setup();
    const cell = sheet.EnsureCell({ row: 2, column: 1 });
    cell.formula = '';
    cell.formula_attributes = { t: 'shared', si: '0' };
    cell.cached = { text: '6' };

    ranges.CopyRange(sheet, A('A2'), sheet, { row: 5, column: 1 });

    const copy = sheet.GetCell({ row: 5, column: 1 });
    expect(copy?.value).toEqual(6);
    expect(copy?.formula).toBeUndefined();

  });

  test('clear keeps styles', () => {

    const { workbook, sheet, ranges } = Setup();
    const italic = workbook.styles.Resolve({ italic: true });

    ranges.WriteData(sheet, { row: 1, column: 1 }, [[1, 2], [3, '=A1']]);
    sheet.EnsureCell({ row: 1, column: 1 }).style = italic;

    expect(ranges.ClearRange(sheet, A('A1:B2'))).toEqual(4);
    expect(sheet.GetCell({ row: 1, column: 1 })?.style).toEqual(italic);
    expect(ranges.ReadData(sheet).rows).toEqual([]);

  });

  test('auto format re-types text cells', () => {

    const { workbook, sheet, ranges } = Setup();
    ranges.WriteData(sheet, { row: 1, column: 1 }, [['1,000'], ['hello'], ['2024-01-15'], ['\'42']]);

    expect(ranges.AutoFormat(sheet, A('A1:A4'))).toEqual(2);

    expect(sheet.GetCell({ row: 1, column: 1 })?.value).toEqual(1000);
    expect(workbook.styles.Get(sheet.GetCell({ row: 1, column: 1 })?.style ?? 0).number_format).toEqual('#,##0');
    expect(sheet.GetCell({ row: 2, column: 1 })?.value).toEqual('hello');
    expect(sheet.GetCell({ row: 3, column: 1 })?.value).toEqual(new Date(Date.UTC(2024, 0, 15)));
    expect(sheet.GetCell({ row: 4, column: 1 })?.value).toEqual('\'42');

  });

});
