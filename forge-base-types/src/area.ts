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

/** largest row index in a worksheet (1-based) */
export const MAX_ROWS = 1048576;

/** largest column index in a worksheet (1-based, column XFD) */
export const MAX_COLUMNS = 16384;

/**
 * cell address. rows and columns are 1-based, matching the labels
 * users see (A1 is { row: 1, column: 1 }).
 */
export interface ICellAddress {
  row: number;
  column: number;
  absolute_row?: boolean;
  absolute_column?: boolean;
  sheet?: string;
}

export interface IArea {
  start: ICellAddress;
  end: ICellAddress;
}

/**
 * type guard function
 */
export const IsCellAddress = (obj: unknown): obj is ICellAddress => {
  return (
    !!obj &&
    typeof obj === 'object' &&
    'row' in obj && typeof obj.row === 'number' &&
    'column' in obj && typeof obj.column === 'number');
};

export interface Dimensions {
  rows: number;
  columns: number;
}

/**
 * class represents a rectangular area on a sheet. the sheet name, if
 * any, is carried on the start address.
 */
export class Area implements IArea {

  /**
   * 1 -> A, 26 -> Z, 27 -> AA. columns are 1-based.
   */
  public static ColumnToLabel(c: number): string {
    let s = '';
    while (c > 0) {
      const x = ((c - 1) % 26) + 1;
      s = String.fromCharCode(64 + x) + s;
      c = (c - x) / 26;
    }
    return s;
  }

  /**
   * A -> 1, Z -> 26, AA -> 27. returns 0 for anything that isn't a
   * run of letters.
   */
  public static LabelToColumn(label: string): number {
    if (!/^[A-Za-z]+$/.test(label)) {
      return 0;
    }
    const upper = label.toUpperCase();
    let column = 0;
    for (let i = 0; i < upper.length; i++) {
      column = column * 26 + (upper.charCodeAt(i) - 64);
    }
    return column;
  }

  public static CellAddressToLabel(address: ICellAddress): string {
    return (address.absolute_column ? '$' : '')
      + this.ColumnToLabel(address.column)
      + (address.absolute_row ? '$' : '')
      + address.row;
  }

  /**
   * merge two areas and return a new area.
   */
  public static Join(a: IArea, b?: IArea): Area {
    const area = new Area(a.start, a.end, true);
    if (b) {
      area.ConsumeAddress(b.start);
      area.ConsumeAddress(b.end);
    }
    return area;
  }

  private start_: ICellAddress;
  private end_: ICellAddress;

  /** accessor returns a _copy_ of the start address */
  public get start(): ICellAddress {
    return { ...this.start_ };
  }

  /** accessor returns a _copy_ of the end address */
  public get end(): ICellAddress {
    return { ...this.end_ };
  }

  /** sheet name, if the area was created with one */
  public get sheet(): string | undefined {
    return this.start_.sheet;
  }

  public get rows(): number {
    return this.end_.row - this.start_.row + 1;
  }

  public get columns(): number {
    return this.end_.column - this.start_.column + 1;
  }

  public get count(): number {
    return this.rows * this.columns;
  }

  /**
   * @param normalize: swap corners so start is top-left
   */
  constructor(start: ICellAddress, end: ICellAddress = start, normalize = false) {
    this.start_ = { ...start };
    this.end_ = { ...end };
    if (normalize) this.Normalize();
  }

  /**
   * we need to bind the element and the absolute/relative status
   * so sorting is too simple
   */
  public Normalize(): Area {

    const start = { ...this.start_ };
    const end = { ...this.end_ };

    if (start.row > end.row) {
      start.row = this.end_.row;
      start.absolute_row = this.end_.absolute_row;
      end.row = this.start_.row;
      end.absolute_row = this.start_.absolute_row;
    }

    if (start.column > end.column) {
      start.column = this.end_.column;
      start.absolute_column = this.end_.absolute_column;
      end.column = this.start_.column;
      end.absolute_column = this.start_.absolute_column;
    }

    this.start_ = start;
    this.end_ = end;
    return this;

  }

  public SetSheet(sheet: string | undefined): Area {
    this.start_.sheet = sheet;
    this.end_.sheet = sheet;
    return this;
  }

  public Contains(address: ICellAddress): boolean {
    return address.row >= this.start_.row && address.row <= this.end_.row
      && address.column >= this.start_.column && address.column <= this.end_.column;
  }

  /**
   * returns true if this area completely contains the argument area
   * (also if areas are ===, as a side effect).
   */
  public ContainsArea(area: IArea): boolean {
    return this.start_.column <= area.start.column
      && this.end_.column >= area.end.column
      && this.start_.row <= area.start.row
      && this.end_.row >= area.end.row;
  }

  public Intersects(area: IArea): boolean {
    return !(area.start.column > this.end_.column
      || this.start_.column > area.end.column
      || area.start.row > this.end_.row
      || this.start_.row > area.end.row);
  }

  public Equals(area: IArea): boolean {
    return area.start.row === this.start_.row
      && area.start.column === this.start_.column
      && area.end.row === this.end_.row
      && area.end.column === this.end_.column;
  }

  public Clone(): Area {
    return new Area(this.start_, this.end_);
  }

  /** row-major list of addresses */
  public Array(): ICellAddress[] {
    const array: ICellAddress[] = [];
    for (let row = this.start_.row; row <= this.end_.row; row++) {
      for (let column = this.start_.column; column <= this.end_.column; column++) {
        array.push({ row, column });
      }
    }
    return array;
  }

  get top(): Area {
    const area = this.Clone();
    area.end_.row = area.start_.row;
    return area;
  }

  /** shifts range in place */
  public Shift(rows: number, columns: number): Area {
    this.start_.row += rows;
    this.start_.column += columns;
    this.end_.row += rows;
    this.end_.column += columns;
    return this; // fluent
  }

  /** Resizes range in place so that it includes the given address */
  public ConsumeAddress(addr: ICellAddress): void {
    if (addr.column < this.start_.column) this.start_.column = addr.column;
    if (addr.column > this.end_.column) this.end_.column = addr.column;
    if (addr.row < this.start_.row) this.start_.row = addr.row;
    if (addr.row > this.end_.row) this.end_.row = addr.row;
  }

  /** resizes range in place (updates end) */
  public Resize(rows: number, columns: number): Area {
    this.end_.row = this.start_.row + rows - 1;
    this.end_.column = this.start_.column + columns - 1;
    return this; // fluent
  }

  /**
   * returns the range in A1-style spreadsheet addressing, without the
   * sheet name. single cells render as a single address.
   */
  get spreadsheet_label(): string {
    const s = Area.CellAddressToLabel(this.start_);
    if (this.columns > 1 || this.rows > 1) return s + ':' + Area.CellAddressToLabel(this.end_);
    return s;
  }

  /** label with absolute markers on both corners, e.g. $A$1:$B$4 */
  get absolute_label(): string {
    const start = { ...this.start_, absolute_row: true, absolute_column: true };
    const end = { ...this.end_, absolute_row: true, absolute_column: true };
    const s = Area.CellAddressToLabel(start);
    if (this.columns > 1 || this.rows > 1) return s + ':' + Area.CellAddressToLabel(end);
    return s;
  }

  public toJSON(): IArea {
    return {
      start: { ...this.start_ },
      end: { ...this.end_ },
    };
  }

}
