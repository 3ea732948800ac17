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
  Area, AddressError, ValidationError,
  type ICellAddress,
} from 'forge-base-types';
import { ParseRange } from 'forge-parser';
import {
  FormulaWriter, DataValidation, RangeOperations, TableManager, ChartBuilder,
  PivotBuilder, ConditionalFormats,
  type Workbook, type Worksheet,
} from 'forge-data-model';
import type { Session } from '../workbook-store';
import type { ToolContext } from './tool';

/** a range resolved to a sheet in the open workbook */
export interface ResolvedRange {
  sheet: Worksheet;
  area: Area;
}

/**
 * the components for one session, all working on the session's
 * workbook. created per call; nothing here outlives the session.
 */
export class Workspace {

  public readonly formulas = new FormulaWriter();
  public readonly validation = new DataValidation();
  public readonly ranges: RangeOperations;
  public readonly tables: TableManager;
  public readonly charts: ChartBuilder;
  public readonly pivots: PivotBuilder;
  public readonly conditional_formats: ConditionalFormats;

  constructor(public readonly session: Session, public readonly context: ToolContext) {
    const workbook = session.workbook;
    this.ranges = new RangeOperations(workbook, this.validation, this.formulas);
    this.tables = new TableManager(workbook);
    this.charts = new ChartBuilder(workbook);
    this.pivots = new PivotBuilder(workbook, this.validation);
    this.conditional_formats = new ConditionalFormats(workbook.styles, this.formulas);
  }

  public get workbook(): Workbook {
    return this.session.workbook;
  }

  public Sheet(name: string): Worksheet {
    return this.workbook.GetSheet(name);
  }

  /**
   * resolve a range given as a start cell and optional end cell. a sheet
   * prefix in the text wins over the sheet named in the call.
   */
  public Range(sheet_name: string, start_cell: string, end_cell?: string): ResolvedRange {
    const parsed = ParseRange(start_cell, end_cell);
    return { sheet: this.Sheet(parsed.sheet ?? sheet_name), area: parsed.area };
  }

  /** a single cell */
  public Cell(sheet_name: string, text: string): { sheet: Worksheet, address: ICellAddress } {
    const { sheet, area } = this.Range(sheet_name, text);
    if (area.count !== 1) {
      throw new AddressError(`expected a single cell: ${text}`);
    }
    return { sheet, address: area.start };
  }

  /** reject requests that touch more cells than the configured limit */
  public CheckSize(cells: number): void {
    const limit = this.context.config.max_cells;
    if (cells > limit) {
      throw new ValidationError(`request covers ${cells} cells; the limit is ${limit}`);
    }
  }

}
