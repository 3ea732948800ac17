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
  Area, ConflictError, FormatError, NotFoundError, ValidationError,
} from 'forge-base-types';
import { ParseReference } from 'forge-parser';
import { Worksheet } from './worksheet';
import type { Cell } from './cell';
import { StyleRegistry } from './style-registry';
import type { Table } from './table-manager';
import type { PivotTable } from './pivot-builder';

export const DEFAULT_SHEET_NAME = 'Sheet1';

/** resolved reference: a sheet and an area on it */
export interface SheetArea {
  sheet: Worksheet;
  area: Area;
}

/**
 * workbook model. owns the sheets and the style registry. sheet names
 * are unique ignoring case.
 */
export class Workbook {

  public sheets: Worksheet[] = [];
  public styles = new StyleRegistry();

  /**
   * set by structural changes here and by the tool host after any
   * mutating call. the store saves a session only if it's set.
   */
  public dirty = false;

  protected next_sheet_id = 1;
  protected next_table_id = 1;
  protected next_chart_id = 1;

  /** new workbook with one empty sheet */
  public static Empty(): Workbook {
    const workbook = new Workbook();
    workbook.AddSheet(DEFAULT_SHEET_NAME);
    return workbook;
  }

  /**
   * sheet name rules: 1-31 characters, none of : \ / ? * [ ], and no
   * apostrophe at either end.
   */
  public static CheckSheetName(name: string): void {
    if (!name || name.length > 31) {
      throw new ValidationError(`invalid sheet name (1-31 characters): ${JSON.stringify(name)}`);
    }
    if (/[:\\/?*[\]]/.test(name)) {
      throw new ValidationError(`invalid sheet name (contains one of : \\ / ? * [ ]): ${name}`);
    }
    if (name[0] === '\'' || name[name.length - 1] === '\'') {
      throw new ValidationError(`invalid sheet name (starts or ends with an apostrophe): ${name}`);
    }
  }

  public FindSheet(name: string): Worksheet | undefined {
    const lc = name.toLowerCase();
    return this.sheets.find(sheet => sheet.name.toLowerCase() === lc);
  }

  public GetSheet(name: string): Worksheet {
    const sheet = this.FindSheet(name);
    if (!sheet) {
      throw new NotFoundError(`sheet not found: ${name}`);
    }
    return sheet;
  }

  /**
   * add a sheet at the end, or before the given index
   */
  public AddSheet(name: string, index = this.sheets.length): Worksheet {
    Workbook.CheckSheetName(name);
    if (this.FindSheet(name)) {
      throw new ConflictError(`sheet already exists: ${name}`);
    }
    const sheet = new Worksheet(this.next_sheet_id++, name);
    this.sheets.splice(index, 0, sheet);
    this.dirty = true;
    return sheet;
  }

  /**
   * used by the container reader, which assigns its own ids
   */
  public AttachSheet(sheet: Worksheet): void {
    this.sheets.push(sheet);
    this.next_sheet_id = Math.max(this.next_sheet_id, sheet.id + 1);
  }

  public NextSheetId(): number {
    return this.next_sheet_id++;
  }

  public RenameSheet(name: string, new_name: string): Worksheet {
    const sheet = this.GetSheet(name);
    Workbook.CheckSheetName(new_name);
    const existing = this.FindSheet(new_name);
    if (existing && existing !== sheet) {
      throw new ConflictError(`sheet already exists: ${new_name}`);
    }

    const old_name = sheet.name;
    sheet.name = new_name;

    // ranges we own that carry sheet names
    for (const test of this.sheets) {
      for (const chart of test.charts) {
        for (const series of chart.series) {
          if (series.values.sheet === old_name) series.values.sheet = new_name;
          if (series.categories?.sheet === old_name) series.categories.sheet = new_name;
          if (series.name_ref?.sheet === old_name) series.name_ref.sheet = new_name;
        }
      }
      for (const pivot of test.pivots) {
        if (pivot.source.sheet === old_name) pivot.source.sheet = new_name;
        if (pivot.anchor.sheet === old_name) pivot.anchor.sheet = new_name;
      }
    }

    this.dirty = true;
    return sheet;
  }

  public DeleteSheet(name: string): void {
    const sheet = this.GetSheet(name);
    if (this.sheets.length === 1) {
      throw new ValidationError('cannot delete the only sheet in a workbook');
    }
    this.sheets = this.sheets.filter(test => test !== sheet);
    this.dirty = true;
  }

  /**
   * copy a sheet: cells, styles, merges, validations and conditional
   * formats. tables, charts and pivots stay with the source (table names
   * are unique per workbook).
   */
  public CopySheet(name: string, target: string): Worksheet {

    const source = this.GetSheet(name);
    const index = this.sheets.indexOf(source) + 1;
    const copy = this.AddSheet(target, index);

    for (const [row, columns] of source.cells) {
      const map = new Map<number, Cell>();
      for (const [column, cell] of columns) {
        map.set(column, cell.Clone());
      }
      copy.cells.set(row, map);
    }

    copy.extent = { ...source.extent };
    copy.merges = source.merges.map(area => area.Clone());
    copy.validations = source.validations.map(entry => ({
      areas: entry.areas.map(area => area.Clone()),
      rule: { ...entry.rule },
    }));
    copy.conditional_formats = source.conditional_formats.map(rule => ({
      ...rule,
      areas: rule.areas.map(area => area.Clone()),
    }));

    return copy;

  }

  /**
   * resolve a reference. a sheet prefix in the text wins over the
   * default sheet; without either we fail.
   */
  public Resolve(reference: string, default_sheet?: string): SheetArea {
    const parsed = ParseReference(reference);
    const name = parsed.sheet ?? default_sheet;
    if (name === undefined) {
      throw new NotFoundError(`no sheet given for ${reference}`);
    }
    return { sheet: this.GetSheet(name), area: parsed.area };
  }

  // --- tables and pivots are unique across the workbook ----------------------

  public AllTables(): Array<{ sheet: Worksheet, table: Table }> {
    return this.sheets.flatMap(sheet => sheet.tables.map(table => ({ sheet, table })));
  }

  public FindTable(name: string): { sheet: Worksheet, table: Table } | undefined {
    const lc = name.toLowerCase();
    return this.AllTables().find(entry => entry.table.name.toLowerCase() === lc);
  }

  public AllPivots(): Array<{ sheet: Worksheet, pivot: PivotTable }> {
    return this.sheets.flatMap(sheet => sheet.pivots.map(pivot => ({ sheet, pivot })));
  }

  public FindPivot(name: string): { sheet: Worksheet, pivot: PivotTable } | undefined {
    const lc = name.toLowerCase();
    return this.AllPivots().find(entry => entry.pivot.name.toLowerCase() === lc);
  }

  public NextTableId(): number {
    return this.next_table_id++;
  }

  public NextChartId(): number {
    return this.next_chart_id++;
  }

  /** release orphaned shared formula dependents on every sheet */
  public ReleaseSharedFormulas(): number {
    return this.sheets.reduce((count, sheet) => count + sheet.ReleaseSharedFormulas(), 0);
  }

  /** the reader calls this so new ids don't collide with loaded ones */
  public ReserveIds(tables: number, charts: number): void {
    this.next_table_id = Math.max(this.next_table_id, tables + 1);
    this.next_chart_id = Math.max(this.next_chart_id, charts + 1);
  }

  /**
   * check structural invariants. throws FormatError naming the first
   * violation found.
   */
  public CheckInvariants(): void {

    if (!this.sheets.length) {
      throw new FormatError('workbook has no sheets');
    }

    const sheet_names = new Set<string>();
    const table_names = new Set<string>();
    const pivot_names = new Set<string>();

    for (const sheet of this.sheets) {

      const lc = sheet.name.toLowerCase();
      if (sheet_names.has(lc)) {
        throw new FormatError(`duplicate sheet name: ${sheet.name}`);
      }
      sheet_names.add(lc);

      // every shared formula dependent needs a master in its group
      const masters = new Set<string>();
      const dependents: Array<{ group: string, label: string }> = [];

      for (const [row, columns] of sheet.cells) {
        for (const [column, cell] of columns) {
          const label = Area.CellAddressToLabel({ row, column });
          if (cell.value !== undefined && cell.formula !== undefined) {
            throw new FormatError(`cell ${sheet.name}!${label} has both a value and a formula`);
          }
          if (!this.styles.Has(cell.style)) {
            throw new FormatError(`cell ${sheet.name}!${label} has an unknown style handle ${cell.style}`);
          }
          const group = cell.shared_group;
          if (group !== undefined) {
            if (cell.formula) {
              masters.add(group);
            }
            else {
              dependents.push({ group, label });
            }
          }
        }
      }

      for (const { group, label } of dependents) {
        if (!masters.has(group)) {
          throw new FormatError(`cell ${sheet.name}!${label} refers to shared formula ${group}, which has no master cell`);
        }
      }

      sheet.tables.forEach((table, index) => {
        const lc = table.name.toLowerCase();
        if (table_names.has(lc)) {
          throw new FormatError(`duplicate table name: ${table.name}`);
        }
        table_names.add(lc);
        for (const other of sheet.tables.slice(index + 1)) {
          if (other.area.Intersects(table.area)) {
            throw new FormatError(`tables ${table.name} and ${other.name} overlap`);
          }
        }
      });

      sheet.merges.forEach((merge, index) => {
        for (const other of sheet.merges.slice(index + 1)) {
          if (other.Intersects(merge)) {
            throw new FormatError(`merged ranges ${merge.spreadsheet_label} and ${other.spreadsheet_label} overlap`);
          }
        }
      });

      for (const pivot of sheet.pivots) {
        const lc = pivot.name.toLowerCase();
        if (pivot_names.has(lc)) {
          throw new FormatError(`duplicate pivot table name: ${pivot.name}`);
        }
        pivot_names.add(lc);
      }

    }

  }

}
