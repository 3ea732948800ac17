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
  Area, ValidationError, RenderValue, MAX_COLUMNS, MAX_ROWS, AddressError,
  type CellValue, type ICellAddress,
} from 'forge-base-types';
import { InferValue, DATE_FORMAT } from 'forge-parser';
import { CachedLiteral } from './cell';
import type { Worksheet } from './worksheet';
import type { Workbook } from './workbook';
import type { DataValidation, DataValidationRule } from './data-validation';
import type { FormulaWriter } from './formula-writer';

/** values as they arrive from callers; null is blank */
export type InputValue = CellValue | null;

export interface WriteOptions {

  /** infer types from text (numbers, percentages, currency, dates, booleans) */
  infer?: boolean;
}

export interface WriteResult {
  area?: Area;
  cells: number;
  formulas: number;
  warnings: string[];
}

export interface CellMetadata {
  address: string;
  value: string | number | boolean | null;
  formula?: string;
  number_format?: string;
  validation?: DataValidationRule;
}

export interface ReadResult {
  range?: string;
  rows: Array<Array<string | number | boolean | null>>;
  cells?: CellMetadata[];
}

/** a planned write into one cell */
interface PendingWrite {
  address: ICellAddress;
  value?: CellValue;
  formula?: string;
  number_format?: string;
}

/**
 * bulk range operations: writing arrays, reading, copying, clearing and
 * re-typing text. each one checks every target before it changes
 * anything.
 */
export class RangeOperations {

  constructor(
    protected workbook: Workbook,
    protected validation: DataValidation,
    protected formulas: FormulaWriter) {}

  /**
   * write a 2-D array starting at `start`. strings that start with = are
   * formulas. with inference on, text is typed and the implied number
   * format is merged into the cell's style.
   */
  public WriteData(sheet: Worksheet, start: ICellAddress, data: InputValue[][], options: WriteOptions = {}): WriteResult {

    const pending: PendingWrite[] = [];
    const warnings: string[] = [];
    let columns = 0;

    data.forEach((row, r) => {
      if (!Array.isArray(row)) {
        throw new ValidationError(`data row ${r + 1} is not an array`);
      }
      columns = Math.max(columns, row.length);
      row.forEach((input, c) => {
        pending.push(this.Plan({ row: start.row + r, column: start.column + c }, input, !!options.infer));
      });
    });

    if (!pending.length) {
      return { cells: 0, formulas: 0, warnings };
    }

    const area = new Area(start).Resize(data.length, Math.max(1, columns));
    if (area.end.row > MAX_ROWS || area.end.column > MAX_COLUMNS) {
      throw new AddressError(`data does not fit in the sheet from ${Area.CellAddressToLabel(start)}`);
    }

    // check everything first

    for (const write of pending) {
      if (write.formula !== undefined) {
        warnings.push(...this.formulas.Validate(write.formula).warnings);
      }
      else {
        this.validation.CheckWrite(sheet, write.address, write.value);
      }
    }

    const formulas = this.Commit(sheet, pending);

    return { area, cells: pending.length, formulas, warnings: Array.from(new Set(warnings)) };

  }

  /**
   * values of a range as rows. without an area, the sheet's used area.
   * with metadata, one entry per cell in the range.
   */
  public ReadData(sheet: Worksheet, area?: Area, metadata = false): ReadResult {

    const target = area ?? sheet.used_area;

    if (!target) {
      return { rows: [], ...(metadata ? { cells: [] } : {}) };
    }

    sheet.CheckBounds(target);

    const rows: ReadResult['rows'] = [];
    const cells: CellMetadata[] = [];

    for (let row = target.start.row; row <= target.end.row; row++) {
      const values: ReadResult['rows'][number] = [];
      for (let column = target.start.column; column <= target.end.column; column++) {

        const address = { row, column };
        const cell = sheet.GetCell(address);
        const value = this.Display(sheet, address);
        values.push(value);

        if (metadata) {
          const entry: CellMetadata = { address: Area.CellAddressToLabel(address), value };
          const formula = cell?.formula_text;
          if (formula) entry.formula = formula;
          const number_format = cell ? this.workbook.styles.Get(cell.style).number_format : undefined;
          if (number_format) entry.number_format = number_format;
          const rule = this.validation.ValidationFor(sheet, address);
          if (rule) entry.validation = { ...rule.rule };
          cells.push(entry);
        }

      }
      rows.push(values);
    }

    return { range: target.spreadsheet_label, rows, ...(metadata ? { cells } : {}) };

  }

  /**
   * copy values, formulas and styles to a target anchor. the source is
   * read completely before anything is written, so overlapping copies
   * work. formulas are copied as text; references are not adjusted.
   */
  public CopyRange(source_sheet: Worksheet, source: Area, target_sheet: Worksheet, anchor: ICellAddress): Area {

    source_sheet.CheckBounds(source);

    const target = new Area(anchor).Resize(source.rows, source.columns);
    target_sheet.CheckBounds(target);

    const dr = target.start.row - source.start.row;
    const dc = target.start.column - source.start.column;

    const pending: Array<{ address: ICellAddress, value?: CellValue, formula?: string, style: number }> = [];

    for (const address of source.Array()) {

      const cell = source_sheet.GetCell(address);
      const to = { row: address.row + dr, column: address.column + dc };

      if (!cell) {
        pending.push({ address: to, style: 0 });
      }
      else if (cell.formula) {
        pending.push({ address: to, formula: cell.formula, style: cell.style });
      }
      else if (cell.formula !== undefined) {

        // dependent of a shared formula. there's no text to copy, so use
        // the cached result as a literal.
        pending.push({ address: to, value: CachedLiteral(cell.cached), style: cell.style });

      }
      else {
        pending.push({ address: to, value: cell.value, style: cell.style });
      }

    }

    for (const write of pending) {
      if (write.formula === undefined) {
        this.validation.CheckWrite(target_sheet, write.address, write.value);
      }
    }

    for (const write of pending) {
      if (write.formula === undefined && write.value === undefined && !write.style) {
        const existing = target_sheet.GetCell(write.address);
        if (existing) {
          existing.Clear();
          existing.style = 0;
        }
        continue;
      }
      const cell = target_sheet.EnsureCell(write.address);
      if (write.formula !== undefined) {
        cell.SetFormula(write.formula);
      }
      else {
        cell.SetValue(write.value);
      }
      cell.style = write.style;
    }

    return target;

  }

  /**
   * remove values and formulas. styles stay. returns the number of
   * cells cleared.
   */
  public ClearRange(sheet: Worksheet, area: Area): number {
    sheet.CheckBounds(area);
    let count = 0;
    for (const { cell } of Array.from(sheet.IterateCells(area))) {
      if (cell.has_content) {
        cell.Clear();
        count++;
      }
    }
    return count;
  }

  /**
   * run inference over existing text cells. cells whose text reads as
   * something else are re-typed and get the implied number format.
   * returns the number of cells changed.
   */
  public AutoFormat(sheet: Worksheet, area: Area): number {

    sheet.CheckBounds(area);

    const pending: PendingWrite[] = [];

    for (const { address, cell } of Array.from(sheet.IterateCells(area))) {
      if (typeof cell.value !== 'string' || cell.formula !== undefined) {
        continue;
      }
      if (cell.value.trim().startsWith('\'')) {
        continue;
      }
      const inferred = InferValue(cell.value);
      if (typeof inferred.value === 'string' || inferred.value === undefined) {
        continue;
      }
      pending.push({ address, value: inferred.value, number_format: inferred.number_format });
    }

    for (const write of pending) {
      this.validation.CheckWrite(sheet, write.address, write.value);
    }

    this.Commit(sheet, pending);
    return pending.length;

  }

  /**
   * reported value of a cell. formulas report their cached value when
   * we have one.
   */
  protected Display(sheet: Worksheet, address: ICellAddress): string | number | boolean | null {
    const cell = sheet.GetCell(address);
    if (!cell) {
      return null;
    }
    if (cell.formula !== undefined) {
      return RenderValue(CachedLiteral(cell.cached));
    }
    return RenderValue(cell.value);
  }

  protected Plan(address: ICellAddress, input: InputValue, infer: boolean): PendingWrite {

    if (input === null || input === undefined) {
      return { address, value: undefined };
    }

    if (typeof input === 'string') {
      const text = input.trim();
      if (text.startsWith('=') && text.length > 1) {
        return { address, formula: text };
      }
      if (infer) {
        const inferred = InferValue(input);
        return { address, value: inferred.value, number_format: inferred.number_format };
      }
      return { address, value: input };
    }

    if (typeof input === 'number' && !Number.isFinite(input)) {
      throw new ValidationError(`cannot write a non-finite number at ${Area.CellAddressToLabel(address)}`);
    }

    return { address, value: input };

  }

  /** apply checked writes. returns the number of formulas written */
  protected Commit(sheet: Worksheet, pending: PendingWrite[]): number {

    const styles = this.workbook.styles;
    let formulas = 0;

    for (const write of pending) {
      const cell = sheet.EnsureCell(write.address);
      if (write.formula !== undefined) {
        cell.SetFormula(write.formula);
        formulas++;
      }
      else {
        cell.SetValue(write.value);
      }
      if (write.number_format) {
        cell.style = styles.Merge(cell.style, { number_format: write.number_format });
      }
      else if (write.value instanceof Date && !styles.Get(cell.style).number_format) {

        // dates are serial numbers in the container; without a format
        // they'd display as numbers
        cell.style = styles.Merge(cell.style, { number_format: DATE_FORMAT });
      }
    }

    return formulas;

  }

}
