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
import { FormatError } from 'forge-base-types';
import {
  Workbook, TableManager, ChartBuilder, PivotBuilder, DataValidation,
  ConditionalFormats, FormulaWriter,
} from 'forge-data-model';
import { Importer, Exporter, Package } from '../src';
import { Child } from '../src/xml-utils';

const A = (text: string) => ParseReference(text).area;

/** save and load again */
const RoundTrip = async (workbook: Workbook, pkg = Package.Create()) => {
  const data = await Exporter.Export(workbook, pkg);
  return Importer.Load(data);
};

/** small sheet with a header row and three records */
const SampleWorkbook = () => {
  const workbook = Workbook.Empty();
  const sheet = workbook.sheets[0];
  const rows: Array<[string, string | number]> = [['Region', 'Amount'], ['East', 10], ['East', 20], ['West', 5]];
  rows.forEach(([region, amount], index) => {
    sheet.EnsureCell({ row: index + 1, column: 1 }).SetValue(region);
    sheet.EnsureCell({ row: index + 1, column: 2 }).SetValue(amount);
  });
  return workbook;
};

describe('round trip', () => {

  test('values, formulas and styles', async () => {

    const workbook = Workbook.Empty();
    const sheet = workbook.sheets[0];
    const date = new Date(Date.UTC(2024, 0, 15));

    const handle = workbook.styles.Resolve({ bold: true, fill_color: 'FF0000', number_format: 'yyyy-mm-dd' });

    sheet.EnsureCell({ row: 1, column: 1 }).SetValue('Name');
    sheet.EnsureCell({ row: 1, column: 2 }).SetValue(42.5);
    sheet.EnsureCell({ row: 2, column: 1 }).SetValue(true);
    sheet.EnsureCell({ row: 2, column: 2 }).SetFormula('=SUM(B1:B1)');

    const dated = sheet.EnsureCell({ row: 3, column: 1 });
    dated.SetValue(date);
    dated.style = handle;

    const { workbook: loaded } = await RoundTrip(workbook);
    const reloaded = loaded.sheets[0];

    expect(reloaded.name).toEqual('Sheet1');
    expect(reloaded.GetCell({ row: 1, column: 1 })?.value).toEqual('Name');
    expect(reloaded.GetCell({ row: 1, column: 2 })?.value).toEqual(42.5);
    expect(reloaded.GetCell({ row: 2, column: 1 })?.value).toEqual(true);
    expect(reloaded.GetCell({ row: 2, column: 2 })?.formula).toEqual('SUM(B1:B1)');
    expect(reloaded.GetCell({ row: 2, column: 2 })?.cached).toBeUndefined();

    const cell = reloaded.GetCell({ row: 3, column: 1 });
    expect(cell?.value).toEqual(date);
    expect(cell?.style).toEqual(handle);
    expect(loaded.styles.Get(handle)).toEqual({ bold: true, fill_color: 'FFFF0000', number_format: 'yyyy-mm-dd' });

    expect(loaded.dirty).toBe(false);

  });

  test('a formula without a result asks for recalculation', async () => {

    const workbook = Workbook.Empty();
    workbook.sheets[0].EnsureCell({ row: 1, column: 1 }).SetFormula('=1+1');

    const { package: pkg } = await RoundTrip(workbook);
    expect(pkg.zip.Get('xl/workbook.xml')).toContain('<calcPr calcId="191029" fullCalcOnLoad="1"/>');

  });

  test('sheets keep their order and names', async () => {

    const workbook = Workbook.Empty();
    workbook.AddSheet('Data');
    workbook.AddSheet('Summary', 0);

    const { workbook: loaded } = await RoundTrip(workbook);
    expect(loaded.sheets.map(sheet => sheet.name)).toEqual(['Summary', 'Sheet1', 'Data']);

  });

  test('merges, validations and conditional formats', async () => {

    const workbook = SampleWorkbook();
    const sheet = workbook.sheets[0];
    const validation = new DataValidation();

    sheet.Merge(A('D1:E1'));
    validation.Attach(sheet, A('A2:A4'), { type: 'list', values: ['East', 'West'] });
    validation.Attach(sheet, A('B2:B4'), { type: 'whole', operator: 'between', value1: 1, value2: 100 });

    new ConditionalFormats(workbook.styles, new FormulaWriter()).Add(sheet, A('B2:B4'),
      { type: 'comparison', operator: 'greaterThan', value1: 15 }, { fill_color: 'FFFF00' });
    new ConditionalFormats(workbook.styles, new FormulaWriter()).Add(sheet, A('B2:B4'),
      { type: 'comparison', operator: 'between', value1: 15, value2: 30 }, { bold: true });

    const { workbook: loaded, package: pkg } = await RoundTrip(workbook);
    const reloaded = loaded.sheets[0];

    expect(reloaded.merges.map(area => area.spreadsheet_label)).toEqual(['D1:E1']);

    expect(reloaded.validations.map(entry => entry.areas[0].spreadsheet_label)).toEqual(['A2:A4', 'B2:B4']);
    expect(reloaded.validations[0].rule).toEqual({ type: 'list', values: ['East', 'West'], allow_blank: true });
    expect(reloaded.validations[1].rule).toEqual({
      type: 'whole', operator: 'between', value1: 1, value2: 100, allow_blank: true,
    });

    expect(reloaded.conditional_formats).toHaveLength(2);
    const rule = reloaded.conditional_formats[0];
    expect(rule.condition).toEqual({ type: 'comparison', operator: 'greaterThan', value1: 15 });
    expect(rule.priority).toEqual(1);
    expect(loaded.styles.GetDifferential(rule.style)).toEqual({ fill_color: 'FFFFFF00' });

    expect(reloaded.conditional_formats[1].condition).toEqual(
      { type: 'comparison', operator: 'between', value1: 15, value2: 30 });
    expect(pkg.zip.Get('xl/worksheets/sheet1.xml')).toContain('<formula>15</formula><formula>30</formula>');

  });

  test('tables, charts and pivots', async () => {

    const workbook = SampleWorkbook();
    const sheet = workbook.sheets[0];

    new TableManager(workbook).Create(sheet, A('A1:B4'), 'Sales');

    new ChartBuilder(workbook).Create(sheet, {
      type: 'column',
      name: 'Amounts',
      title: 'Amount by row',
      series: [{ name: 'Amount', values: { sheet: 'Sheet1', area: A('B2:B4') }, categories: { sheet: 'Sheet1', area: A('A2:A4') } }],
      anchor: { row: 6, column: 1 },
      width: 6,
      height: 10,
    });

    new PivotBuilder(workbook, new DataValidation()).Build({
      name: 'ByRegion',
      source: { sheet: 'Sheet1', area: A('A1:B4') },
      rows: ['Region'],
      columns: [],
      values: [{ field: 'Amount', aggregation: 'sum' }],
      filters: [],
      anchor: { sheet: 'Sheet1', address: { row: 1, column: 5 } },
    });

    const { workbook: loaded, package: pkg } = await RoundTrip(workbook);
    const reloaded = loaded.sheets[0];

    expect(reloaded.tables).toHaveLength(1);
    expect(reloaded.tables[0].name).toEqual('Sales');
    expect(reloaded.tables[0].area.spreadsheet_label).toEqual('A1:B4');
    expect(reloaded.tables[0].columns).toEqual(['Region', 'Amount']);
    expect(reloaded.tables[0].style).toEqual('TableStyleMedium9');

    expect(reloaded.charts).toHaveLength(1);
    const chart = reloaded.charts[0];
    expect(chart.name).toEqual('Amounts');
    expect(chart.type).toEqual('column');
    expect(chart.title).toEqual('Amount by row');
    expect(chart.anchor).toEqual({ row: 6, column: 1 });
    expect(chart.width).toEqual(6);
    expect(chart.height).toEqual(10);
    expect(chart.preserved).toBe(true);
    expect(chart.series[0].values.area.spreadsheet_label).toEqual('B2:B4');

    expect(reloaded.pivots).toHaveLength(1);
    expect(reloaded.pivots[0].name).toEqual('ByRegion');
    expect(reloaded.pivots[0].output.spreadsheet_label).toEqual('E1:F3');
    expect(reloaded.GetCell({ row: 2, column: 5 })?.value).toEqual('East');
    expect(reloaded.GetCell({ row: 2, column: 6 })?.value).toEqual(30);

    expect(pkg.zip.Has('xl/tables/table1.xml')).toBe(true);
    expect(pkg.zip.Has('xl/charts/chart1.xml')).toBe(true);
    expect(pkg.zip.Has('xl/drawings/drawing1.xml')).toBe(true);
    expect(pkg.zip.Has('docProps/custom.xml')).toBe(true);

  });

  test('deleting a chart removes its parts', async () => {

    const workbook = SampleWorkbook();
    const sheet = workbook.sheets[0];

    new ChartBuilder(workbook).Create(sheet, {
      type: 'line',
      name: 'Trend',
      series: [{ values: { sheet: 'Sheet1', area: A('B2:B4') } }],
      anchor: { row: 6, column: 1 },
    });

    const first = await RoundTrip(workbook);
    first.workbook.sheets[0].charts = [];

    const second = await RoundTrip(first.workbook, first.package);
    expect(second.workbook.sheets[0].charts).toEqual([]);
    expect(second.package.zip.Has('xl/charts/chart1.xml')).toBe(false);
    expect(second.package.zip.Has('xl/drawings/drawing1.xml')).toBe(false);

  });

  test('deleted sheets take their parts with them', async () => {

    const workbook = Workbook.Empty();
    workbook.AddSheet('Extra').EnsureCell({ row: 1, column: 1 }).SetValue(1);

    const first = await RoundTrip(workbook);
    expect(first.package.zip.Has('xl/worksheets/sheet2.xml')).toBe(true);

    first.workbook.DeleteSheet('Extra');

    const second = await RoundTrip(first.workbook, first.package);
    expect(second.workbook.sheets.map(sheet => sheet.name)).toEqual(['Sheet1']);
    expect(second.package.zip.Has('xl/worksheets/sheet2.xml')).toBe(false);

  });

  test('parts and settings we do not model are kept', async () => {

    const workbook = Workbook.Empty();
    const pkg = Package.Create();
    const app = '<?xml version="1.0" encoding="UTF-8"?><Properties><Application>test</Application></Properties>';

    pkg.zip.Set('docProps/app.xml', app);
    pkg.EnsureSheet(workbook.sheets[0].id).rows.set(2, { ht: '30', customHeight: '1' });

    const first = await RoundTrip(workbook, pkg);
    const second = await RoundTrip(first.workbook, first.package);

    const part = second.package.sheets.get(second.workbook.sheets[0].id);
    expect(second.package.zip.Get('docProps/app.xml')).toEqual(app);
    expect(part?.rows.get(2)).toEqual({ ht: '30', customHeight: '1' });
    expect(Child(part?.root, 'pageMargins')).toBeDefined();

  });

  test('overwriting a shared formula master releases its dependents', async () => {

    const workbook = Workbook.Empty();
    const sheet = workbook.sheets[0];

    sheet.EnsureCell({ row: 1, column: 2 }).SetValue(1);
    sheet.EnsureCell({ row: 2, column: 2 }).SetValue(2);

    const master = sheet.EnsureCell({ row: 1, column: 1 });
    master.formula = 'B1*2';
    master.formula_attributes = { t: 'shared', ref: 'A1:A2', si: '0' };
    master.cached = { text: '2' };

    const dependent = sheet.EnsureCell({ row: 2, column: 1 });
    dependent.formula = '';
    dependent.formula_attributes = { t: 'shared', si: '0' };
    dependent.cached = { text: '4' };

    const first = await RoundTrip(workbook);
    const loaded = first.workbook.sheets[0];

    expect(first.package.zip.Get('xl/worksheets/sheet1.xml')).toContain('<c r="A2"><f t="shared" si="0"/><v>4</v></c>');
    expect(loaded.GetCell({ row: 2, column: 1 })?.formula_attributes).toEqual({ t: 'shared', si: '0' });

    loaded.GetCell({ row: 1, column: 1 })?.SetValue(99);

    const second = await RoundTrip(first.workbook, first.package);
    const reloaded = second.workbook.sheets[0];

    expect(second.package.zip.Get('xl/worksheets/sheet1.xml')).toContain('<c r="A1"><v>99</v></c><c r="B1"><v>1</v></c>');
    expect(second.package.zip.Get('xl/worksheets/sheet1.xml')).toContain('<c r="A2"><v>4</v></c>');
    expect(reloaded.GetCell({ row: 2, column: 1 })?.value).toEqual(4);
    expect(reloaded.GetCell({ row: 2, column: 1 })?.formula).toBeUndefined();
    second.workbook.CheckInvariants();

  });

  test('unchanged text keeps its shared string entry', async () => {

    const workbook = Workbook.Empty();
    workbook.sheets[0].EnsureCell({ row: 1, column: 1 }).SetValue('X');

    // same text twice in the strings table, the second entry rich
    const pkg = Package.Create();
    await Exporter.Export(workbook, pkg);
    pkg.zip.Set('xl/sharedStrings.xml', '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n'
      + '<sst xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main" count="2" uniqueCount="2">'
      + '<si><t>X</t></si><si><r><rPr><b/></rPr><t>X</t></r></si></sst>');
    pkg.zip.Set('xl/worksheets/sheet1.xml',
      pkg.zip.Get('xl/worksheets/sheet1.xml').replace('<c r="A1" t="s"><v>0</v></c>', '<c r="A1" t="s"><v>1</v></c>'));

    const first = await Importer.Load(await pkg.zip.Generate());
    const loaded = first.workbook.sheets[0];

    expect(loaded.GetCell({ row: 1, column: 1 })?.value).toEqual('X');
    expect(loaded.GetCell({ row: 1, column: 1 })?.string_index).toEqual(1);

    loaded.EnsureCell({ row: 1, column: 2 }).SetValue('X');

    const second = await RoundTrip(first.workbook, first.package);
    const xml = second.package.zip.Get('xl/worksheets/sheet1.xml');

    expect(xml).toContain('<c r="A1" t="s"><v>1</v></c><c r="B1" t="s"><v>0</v></c>');
    expect(second.package.shared_strings.count).toEqual(2);
    expect(second.package.zip.Get('xl/sharedStrings.xml')).toContain('<si><r><rPr><b/></rPr><t>X</t></r></si>');

  });

  test('garbage is a format error', async () => {
    await expect(Importer.Load(new TextEncoder().encode('not a zip file'))).rejects.toThrow(FormatError);
  });

});
