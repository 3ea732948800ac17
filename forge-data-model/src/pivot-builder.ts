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

import {
  Area, ConflictError, NotFoundError, ValidationError, RenderValue,
  MAX_COLUMNS, MAX_ROWS, AddressError,
  type CellValue, type ICellAddress,
} from 'forge-base-types';
import type { Worksheet } from './worksheet';
import type { Workbook } from './workbook';
import type { SheetRange } from './chart-builder';
import type { DataValidation } from './data-validation';

export const AggregationList = ['sum', 'count', 'average', 'min', 'max'] as const;

export type Aggregation = typeof AggregationList[number];

export interface PivotValueField {
  field: string;
  aggregation: Aggregation;
}

/** keep only rows whose value in `field` is one of `values` */
export interface PivotFilter {
  field: string;
  values: Array<string | number | boolean>;
}

export interface PivotDefinition {
  name: string;
  source: SheetRange;
  rows: string[];
  columns: string[];
  values: PivotValueField[];
  filters: PivotFilter[];

  /** top-left cell of the output */
  anchor: { sheet: string, address: ICellAddress };
}

export interface PivotTable extends PivotDefinition {

  /** area the output was written to, on the anchor sheet */
  output: Area;
}

export interface PivotGrid {
  header: string[];
  rows: CellValue[][];
}

const AGGREGATION_LABEL: Record<Aggregation, string> = {
  sum: 'Sum',
  count: 'Count',
  average: 'Average',
  min: 'Min',
  max: 'Max',
};

const BLANK_LABEL = '(blank)';

/** running state for one (row group, column group, value field) */
interface Accumulator {
  sum: number;
  numeric: number;
  count: number;
  min?: number;
  max?: number;
}

const Key = (values: CellValue[]): string => JSON.stringify(values.map(value => RenderValue(value)));

/**
 * compute a pivot grid from a header row and data rows. this is the
 * whole algorithm; Build wraps it with range handling and writes.
 *
 * groups are kept in first-seen order.
 */
export const ComputePivot = (
    header: CellValue[],
    data: CellValue[][],
    definition: Pick<PivotDefinition, 'rows' | 'columns' | 'values' | 'filters'>): PivotGrid => {

  // field name -> offset. names are matched trimmed, ignoring case

  const offsets: Map<string, number> = new Map();
  const names = header.map((value, index) => {
    const rendered = RenderValue(value);
    const name = rendered === null ? '' : String(rendered).trim();
    if (!name) {
      throw new ValidationError(`pivot source header is blank in column ${index + 1}`);
    }
    if (!offsets.has(name.toLowerCase())) {
      offsets.set(name.toLowerCase(), index);
    }
    return name;
  });

  const Offset = (field: string): number => {
    const offset = offsets.get(field.trim().toLowerCase());
    if (offset === undefined) {
      throw new NotFoundError(`pivot field not found: ${field}`);
    }
    return offset;
  };

  if (!definition.values.length) {
    throw new ValidationError('a pivot table needs at least one value field');
  }

  const row_offsets = definition.rows.map(Offset);
  const column_offsets = definition.columns.map(Offset);
  const value_offsets = definition.values.map(value => Offset(value.field));
  const filters = definition.filters.map(filter => ({
    offset: Offset(filter.field),
    accept: new Set(filter.values.map(value => String(value))),
  }));

  const row_groups: Map<string, CellValue[]> = new Map();
  const column_groups: Map<string, CellValue[]> = new Map();
  const cells: Map<string, Accumulator> = new Map();

  data.forEach((record, index) => {

    for (const filter of filters) {
      const rendered = RenderValue(record[filter.offset]);
      if (!filter.accept.has(rendered === null ? '' : String(rendered))) {
        return;
      }
    }

    const row_values = row_offsets.map(offset => record[offset]);
    const column_values = column_offsets.map(offset => record[offset]);
    const row_key = Key(row_values);
    const column_key = Key(column_values);

    if (!row_groups.has(row_key)) row_groups.set(row_key, row_values);
    if (!column_groups.has(column_key)) column_groups.set(column_key, column_values);

    definition.values.forEach((value_field, value_index) => {

      const value = record[value_offsets[value_index]];
      const key = JSON.stringify([row_key, column_key, value_index]);

      let accumulator = cells.get(key);
      if (!accumulator) {
        accumulator = { sum: 0, numeric: 0, count: 0 };
        cells.set(key, accumulator);
      }

      if (value === undefined) {
        return;
      }

      accumulator.count++;

      if (typeof value === 'number') {
        accumulator.sum += value;
        accumulator.numeric++;
        accumulator.min = accumulator.min === undefined ? value : Math.min(accumulator.min, value);
        accumulator.max = accumulator.max === undefined ? value : Math.max(accumulator.max, value);
      }
      else if (value_field.aggregation === 'sum' || value_field.aggregation === 'average') {
        throw new ValidationError(
          `non-numeric value ${JSON.stringify(RenderValue(value))} in field ${value_field.field} (data row ${index + 1})`);
      }

    });

  });

  const Label = (value: PivotValueField, index: number) =>
    `${AGGREGATION_LABEL[value.aggregation]} of ${names[value_offsets[index]]}`;
  const Display = (value: CellValue): CellValue => value === undefined ? BLANK_LABEL : value;

  // header: row field names, then one column per (column group, value)

  const grid_header: string[] = row_offsets.map(offset => names[offset]);
  const columns: Array<{ column_key: string, value_index: number }> = [];

  for (const [column_key, column_values] of column_groups) {
    definition.values.forEach((value, value_index) => {
      let label = Label(value, value_index);
      if (column_offsets.length) {
        const group = column_values.map(entry => {
          const rendered = RenderValue(Display(entry));
          return rendered === null ? '' : String(rendered);
        }).join(' / ');
        label = definition.values.length > 1 ? `${group} | ${label}` : group;
      }
      grid_header.push(label);
      columns.push({ column_key, value_index });
    });
  }

  // no data rows: keep the value labels so the header is still useful

  if (!column_groups.size && !column_offsets.length) {
    definition.values.forEach((value, index) => grid_header.push(Label(value, index)));
  }

  const rows: CellValue[][] = [];

  for (const [row_key, row_values] of row_groups) {
    const row: CellValue[] = row_values.map(Display);
    for (const { column_key, value_index } of columns) {
      const accumulator = cells.get(JSON.stringify([row_key, column_key, value_index]));
      const aggregation = definition.values[value_index].aggregation;
      row.push(Aggregate(aggregation, accumulator));
    }
    rows.push(row);
  }

  return { header: grid_header, rows };

};

/**
 * final value for one cell. empty combinations are 0 for sum and
 * count, blank otherwise.
 */
const Aggregate = (aggregation: Aggregation, accumulator?: Accumulator): CellValue => {
  switch (aggregation) {
    case 'sum': return accumulator ? accumulator.sum : 0;
    case 'count': return accumulator ? accumulator.count : 0;
    case 'average': return accumulator?.numeric ? accumulator.sum / accumulator.numeric : undefined;
    case 'min': return accumulator?.min;
    case 'max': return accumulator?.max;
  }
};

/**
 * pivot tables. output is a static snapshot written as cells; the
 * definition is kept so it can be reported and persisted.
 */
export class PivotBuilder {

  constructor(protected workbook: Workbook, protected validation: DataValidation) {}

  /**
   * read the source range. the first row is the header; it must exist
   * and the range must be inside the sheet extent.
   */
  public ReadSource(source: SheetRange): { header: CellValue[], data: CellValue[][] } {

    const sheet = this.workbook.GetSheet(source.sheet);
    sheet.CheckExtent(source.area);

    const read = (row: number): CellValue[] => {
      const values: CellValue[] = [];
      for (let column = source.area.start.column; column <= source.area.end.column; column++) {
        values.push(sheet.GetCell({ row, column })?.value);
      }
      return values;
    };

    const header = read(source.area.start.row);
    const data: CellValue[][] = [];
    for (let row = source.area.start.row + 1; row <= source.area.end.row; row++) {
      data.push(read(row));
    }

    return { header, data };

  }

  public Compute(definition: PivotDefinition): PivotGrid {
    const { header, data } = this.ReadSource(definition.source);
    return ComputePivot(header, data, definition);
  }

  /**
   * compute and write a pivot table. all checks (name, fields, values,
   * output placement, validation on the target cells) run before any
   * cell is written.
   */
  public Build(definition: PivotDefinition): PivotTable {

    const existing = this.workbook.FindPivot(definition.name);
    if (existing) {
      throw new ConflictError(`pivot table already exists: ${existing.pivot.name}`);
    }
    if (!definition.name.trim()) {
      throw new ValidationError('pivot table name is blank');
    }

    const grid = this.Compute(definition);
    const target = this.workbook.GetSheet(definition.anchor.sheet);
    const output = this.OutputArea(target, definition, grid);

    const values: Array<{ address: ICellAddress, value: CellValue }> = [];
    const start = output.start;

    grid.header.forEach((value, column) => {
      values.push({ address: { row: start.row, column: start.column + column }, value });
    });
    grid.rows.forEach((row, index) => {
      row.forEach((value, column) => {
        values.push({ address: { row: start.row + 1 + index, column: start.column + column }, value });
      });
    });

    for (const { address, value } of values) {
      this.validation.CheckWrite(target, address, value);
    }

    for (const { address, value } of values) {
      target.EnsureCell(address).SetValue(value);
    }

    const pivot: PivotTable = {
      ...definition,
      source: { sheet: definition.source.sheet, area: definition.source.area.Clone() },
      output,
    };

    target.pivots.push(pivot);
    return pivot;

  }

  public Delete(name: string): void {
    const entry = this.workbook.FindPivot(name);
    if (!entry) {
      throw new NotFoundError(`pivot table not found: ${name}`);
    }
    entry.sheet.pivots = entry.sheet.pivots.filter(test => test !== entry.pivot);
  }

  /**
   * where the grid goes. it must fit in the sheet and must not overlap
   * a table, another pivot or its own source data.
   */
  protected OutputArea(sheet: Worksheet, definition: PivotDefinition, grid: PivotGrid): Area {

    const output = new Area(definition.anchor.address).Resize(grid.rows.length + 1, Math.max(1, grid.header.length));

    if (output.end.row > MAX_ROWS || output.end.column > MAX_COLUMNS) {
      throw new AddressError(`pivot output ${output.spreadsheet_label} does not fit in the sheet`);
    }

    for (const table of sheet.tables) {
      if (table.area.Intersects(output)) {
        throw new ConflictError(`pivot output ${output.spreadsheet_label} overlaps table ${table.name}`);
      }
    }

    for (const pivot of sheet.pivots) {
      if (pivot.output.Intersects(output)) {
        throw new ConflictError(`pivot output ${output.spreadsheet_label} overlaps pivot table ${pivot.name}`);
      }
    }

    const source = definition.source;
    if (this.workbook.FindSheet(source.sheet) === sheet && source.area.Intersects(output)) {
      throw new ConflictError(`pivot output ${output.spreadsheet_label} overlaps its source ${source.area.spreadsheet_label}`);
    }

    return output;

  }

}
