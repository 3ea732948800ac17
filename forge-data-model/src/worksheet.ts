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
  Area, AddressError, ConflictError, NotFoundError, ValidationError,
  MAX_COLUMNS, MAX_ROWS, type Dimensions, type ICellAddress, type IArea,
} from 'forge-base-types';
import { Cell } from './cell';
import type { Table } from './table-manager';
import type { Chart } from './chart-builder';
import type { PivotTable } from './pivot-builder';
import type { ConditionalFormatRule } from './conditional-format';
import type { DataValidationEntry } from './data-validation';

/**
 * worksheet. cells are stored sparsely, row -> column -> cell. the
 * extent is the area the sheet considers "in use"; it grows when
 * cells are created and never shrinks on its own.
 */
export class Worksheet {

  public cells: Map<number, Map<number, Cell>> = new Map();

  public extent: Dimensions = { rows: 0, columns: 0 };

  public merges: Area[] = [];
  public tables: Table[] = [];
  public charts: Chart[] = [];
  public pivots: PivotTable[] = [];
  public conditional_formats: ConditionalFormatRule[] = [];
  public validations: DataValidationEntry[] = [];

  /**
   * @param id - stable id, unique in the workbook. survives renames, so
   * the container layer can map sheets back to the parts they came from.
   */
  constructor(public readonly id: number, public name: string) {}

  /** extent as an area, or undefined if the sheet is empty */
  public get extent_area(): Area | undefined {
    if (!this.extent.rows || !this.extent.columns) {
      return undefined;
    }
    return new Area({ row: 1, column: 1 }, { row: this.extent.rows, column: this.extent.columns });
  }

  public GetCell(address: ICellAddress): Cell | undefined {
    return this.cells.get(address.row)?.get(address.column);
  }

  /**
   * get or create a cell. creating a cell grows the extent.
   */
  public EnsureCell(address: ICellAddress): Cell {

    let row = this.cells.get(address.row);
    if (!row) {
      row = new Map();
      this.cells.set(address.row, row);
    }

    let cell = row.get(address.column);
    if (!cell) {
      cell = new Cell();
      row.set(address.column, cell);
      this.Grow(address);
    }

    return cell;

  }

  /**
   * dependents of a shared formula take their formula text from the
   * group's master cell. once the master is overwritten or cleared the
   * group is gone, and remaining dependents are replaced by their cached
   * results. returns the number of cells changed.
   */
  public ReleaseSharedFormulas(): number {

    const masters = new Set<string>();
    const dependents: Array<{ cell: Cell, group: string }> = [];

    for (const columns of this.cells.values()) {
      for (const cell of columns.values()) {
        const group = cell.shared_group;
        if (group === undefined) {
          continue;
        }
        if (cell.formula) {
          masters.add(group);
        }
        else {
          dependents.push({ cell, group });
        }
      }
    }

    const orphans = dependents.filter(({ group }) => !masters.has(group));
    for (const { cell } of orphans) {
      cell.Detach();
    }

    return orphans.length;

  }

  public DeleteCell(address: ICellAddress): void {
    const row = this.cells.get(address.row);
    if (row) {
      row.delete(address.column);
      if (!row.size) {
        this.cells.delete(address.row);
      }
    }
  }

  /** grow the extent to include this address */
  public Grow(address: ICellAddress): void {
    this.extent.rows = Math.max(this.extent.rows, address.row);
    this.extent.columns = Math.max(this.extent.columns, address.column);
  }

  /**
   * throws if the area does not fit in the grid at all
   */
  public CheckBounds(area: IArea): void {
    if (area.start.row < 1 || area.start.column < 1
        || area.end.row > MAX_ROWS || area.end.column > MAX_COLUMNS) {
      throw new AddressError(`range outside the sheet grid: ${new Area(area.start, area.end).spreadsheet_label}`);
    }
  }

  /**
   * throws if the area is not inside the extent. used for ranges bound
   * to tables, chart series and pivot sources.
   */
  public CheckExtent(area: IArea): void {
    this.CheckBounds(area);
    if (area.end.row > this.extent.rows || area.end.column > this.extent.columns) {
      throw new AddressError(
        `range ${new Area(area.start, area.end).spreadsheet_label} is outside the used extent of ${this.name}`,
        { extent: { ...this.extent } });
    }
  }

  /**
   * iterate existing cells inside an area, row-major.
   */
  public *IterateCells(area: IArea): Generator<{ address: ICellAddress, cell: Cell }> {
    const rows = Array.from(this.cells.keys())
      .filter(row => row >= area.start.row && row <= area.end.row)
      .sort((a, b) => a - b);
    for (const row of rows) {
      const columns = this.cells.get(row);
      if (!columns) continue;
      const keys = Array.from(columns.keys())
        .filter(column => column >= area.start.column && column <= area.end.column)
        .sort((a, b) => a - b);
      for (const column of keys) {
        const cell = columns.get(column);
        if (cell) {
          yield { address: { row, column }, cell };
        }
      }
    }
  }

  /**
   * smallest area holding every cell with content (values, formulas,
   * cached results). styled-but-empty cells don't count.
   */
  public get used_area(): Area | undefined {
    let area: Area | undefined;
    for (const [row, columns] of this.cells) {
      for (const [column, cell] of columns) {
        if (cell.has_content) {
          if (area) {
            area.ConsumeAddress({ row, column });
          }
          else {
            area = new Area({ row, column });
          }
        }
      }
    }
    return area;
  }

  // --- merges ---------------------------------------------------------------

  /**
   * merge an area. the top-left cell keeps its content; content in the
   * other cells is cleared.
   */
  public Merge(area: Area): void {
    this.CheckBounds(area);
    if (area.count < 2) {
      throw new ValidationError(`cannot merge a single cell: ${area.spreadsheet_label}`);
    }
    for (const merge of this.merges) {
      if (merge.Intersects(area)) {
        throw new ConflictError(`range ${area.spreadsheet_label} overlaps merged cells ${merge.spreadsheet_label}`);
      }
    }
    for (const { address, cell } of Array.from(this.IterateCells(area))) {
      if (address.row !== area.start.row || address.column !== area.start.column) {
        cell.Clear();
      }
    }
    this.merges.push(area.Clone());
    this.Grow(area.end);
  }

  public Unmerge(area: Area): void {
    const index = this.merges.findIndex(merge => merge.Equals(area));
    if (index < 0) {
      throw new NotFoundError(`range is not merged: ${area.spreadsheet_label}`);
    }
    this.merges.splice(index, 1);
  }

}
