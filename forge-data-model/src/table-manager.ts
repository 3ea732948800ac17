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
} from 'forge-base-types';
import type { Worksheet } from './worksheet';
import type { Workbook } from './workbook';

export const DEFAULT_TABLE_STYLE = 'TableStyleMedium9';

export interface Table {

  /** container id, unique per workbook */
  id: number;

  name: string;
  area: Area;
  style: string;

  /** column names, from the header row */
  columns: string[];

  show_row_stripes: boolean;
  show_column_stripes: boolean;

  /** true for tables created by the engine in this session */
  generated: boolean;
}

const cell_reference = /^(\$?[A-Za-z]{1,3}\$?\d+|[Rr]\d*[Cc]\d*|[RrCc])$/;

/**
 * tables. names are unique across the workbook (ignoring case); tables
 * on one sheet never overlap. none of these operations touch cell data.
 */
export class TableManager {

  constructor(protected workbook: Workbook) {}

  /**
   * name rules: starts with a letter, underscore or backslash; then
   * letters, digits, underscores and periods; no spaces; at most 255
   * characters; not something that reads as a cell reference.
   */
  public static CheckName(name: string): void {
    if (!/^[A-Za-z_\\][A-Za-z0-9_.\\]*$/.test(name) || name.length > 255) {
      throw new ValidationError(`invalid table name: ${JSON.stringify(name)}`);
    }
    if (cell_reference.test(name)) {
      throw new ValidationError(`invalid table name (reads as a cell reference): ${name}`);
    }
  }

  public Find(name: string): { sheet: Worksheet, table: Table } {
    const entry = this.workbook.FindTable(name);
    if (!entry) {
      throw new NotFoundError(`table not found: ${name}`);
    }
    return entry;
  }

  /**
   * read and check the header row. every column needs distinct
   * (ignoring case), non-blank, literal text.
   */
  public HeaderColumns(sheet: Worksheet, area: Area): string[] {

    const columns: string[] = [];
    const seen = new Set<string>();
    const row = area.start.row;

    for (let column = area.start.column; column <= area.end.column; column++) {

      const label = Area.CellAddressToLabel({ row, column });
      const cell = sheet.GetCell({ row, column });

      if (cell?.formula !== undefined) {
        throw new ValidationError(`table header ${label} is a formula; headers must be text`);
      }

      const rendered = RenderValue(cell?.value);
      const text = rendered === null ? '' : String(rendered).trim();

      if (!text) {
        throw new ValidationError(`table header ${label} is blank`);
      }

      const lc = text.toLowerCase();
      if (seen.has(lc)) {
        throw new ValidationError(`duplicate table header "${text}" at ${label}`);
      }

      seen.add(lc);
      columns.push(text);

    }

    return columns;

  }

  /**
   * check everything about a prospective table without creating it.
   * `ignore` is a table that is being replaced (resize).
   */
  protected Check(sheet: Worksheet, area: Area, name: string, ignore?: Table): string[] {

    TableManager.CheckName(name);

    const existing = this.workbook.FindTable(name);
    if (existing && existing.table !== ignore) {
      throw new ConflictError(`table name already in use: ${existing.table.name}`);
    }

    sheet.CheckExtent(area);

    for (const table of sheet.tables) {
      if (table !== ignore && table.area.Intersects(area)) {
        throw new ConflictError(`range ${area.spreadsheet_label} overlaps table ${table.name}`);
      }
    }

    for (const pivot of sheet.pivots) {
      if (pivot.output.Intersects(area)) {
        throw new ConflictError(`range ${area.spreadsheet_label} overlaps pivot table ${pivot.name}`);
      }
    }

    return this.HeaderColumns(sheet, area);

  }

  public Create(sheet: Worksheet, area: Area, name: string, style = DEFAULT_TABLE_STYLE): Table {

    const columns = this.Check(sheet, area, name);

    const table: Table = {
      id: this.workbook.NextTableId(),
      name,
      area: area.Clone(),
      style,
      columns,
      show_row_stripes: true,
      show_column_stripes: false,
      generated: true,
    };

    sheet.tables.push(table);
    return table;

  }

  public Rename(name: string, new_name: string): Table {

    const { table } = this.Find(name);
    TableManager.CheckName(new_name);

    const existing = this.workbook.FindTable(new_name);
    if (existing && existing.table !== table) {
      throw new ConflictError(`table name already in use: ${existing.table.name}`);
    }

    table.name = new_name;
    return table;

  }

  public Delete(name: string): void {
    const { sheet, table } = this.Find(name);
    sheet.tables = sheet.tables.filter(test => test !== table);
  }

  /**
   * resize: same as delete + create with the same name and style, with
   * every check run again. on failure the table is left as it was.
   */
  public Resize(name: string, area: Area): Table {

    const { sheet, table } = this.Find(name);
    const columns = this.Check(sheet, area, table.name, table);

    table.area = area.Clone();
    table.columns = columns;
    return table;

  }

}
