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
  type ICellAddress,
} from 'forge-base-types';
import type { Worksheet } from './worksheet';
import type { Workbook } from './workbook';

export const ChartTypeList = ['line', 'bar', 'column', 'pie', 'scatter', 'area'] as const;

export type ChartType = typeof ChartTypeList[number];

/** a range on a named sheet */
export interface SheetRange {
  sheet: string;
  area: Area;
}

export interface ChartSeries {

  /** literal name, or the cached text of name_ref */
  name?: string;
  name_ref?: SheetRange;

  values: SheetRange;
  categories?: SheetRange;
}

export interface ChartOptions {
  type: ChartType;
  series: ChartSeries[];
  anchor: ICellAddress;
  name?: string;
  title?: string;
  x_axis_title?: string;
  y_axis_title?: string;

  /** size in cells */
  width?: number;
  height?: number;
}

export interface Chart {

  /** workbook-unique id */
  id: number;

  name: string;
  type: ChartType;
  title?: string;
  x_axis_title?: string;
  y_axis_title?: string;
  series: ChartSeries[];

  /** top-left cell */
  anchor: ICellAddress;

  /** size in cells */
  width: number;
  height: number;

  /**
   * charts read from a container keep their original parts. what we
   * could read of them is here for reporting only.
   */
  preserved: boolean;
}

const DEFAULT_WIDTH = 8;
const DEFAULT_HEIGHT = 15;

/**
 * chart construction. charts are snapshots of their definitions: they
 * reference ranges but nothing here watches those ranges.
 */
export class ChartBuilder {

  constructor(protected workbook: Workbook) {}

  /**
   * build series from a data range: first column holds categories,
   * first row holds series names, every other column is a series.
   */
  public FromRange(sheet: Worksheet, area: Area): ChartSeries[] {

    if (area.columns < 2 || area.rows < 2) {
      throw new ValidationError(`data range ${area.spreadsheet_label} needs at least two rows and two columns`);
    }

    sheet.CheckExtent(area);

    const first_row = area.start.row;
    const first_column = area.start.column;

    const categories: SheetRange = {
      sheet: sheet.name,
      area: new Area({ row: first_row + 1, column: first_column }, { row: area.end.row, column: first_column }),
    };

    const series: ChartSeries[] = [];

    for (let column = first_column + 1; column <= area.end.column; column++) {
      const header = RenderValue(sheet.GetCell({ row: first_row, column })?.value);
      series.push({
        name: header === null ? undefined : String(header),
        name_ref: { sheet: sheet.name, area: new Area({ row: first_row, column }) },
        values: {
          sheet: sheet.name,
          area: new Area({ row: first_row + 1, column }, { row: area.end.row, column }),
        },
        categories,
      });
    }

    return series;

  }

  /**
   * check a series list: at least one series, every range inside the
   * extent of its sheet, single row or column, and the same element
   * count throughout.
   */
  public CheckSeries(series: ChartSeries[]): void {

    if (!series.length) {
      throw new ValidationError('a chart needs at least one series');
    }

    const check = (range: SheetRange, what: string): number => {
      const sheet = this.workbook.GetSheet(range.sheet);
      sheet.CheckExtent(range.area);
      if (range.area.rows > 1 && range.area.columns > 1) {
        throw new ValidationError(`${what} ${range.area.spreadsheet_label} must be a single row or column`);
      }
      return range.area.count;
    };

    const count = check(series[0].values, 'series values');

    series.forEach((entry, index) => {
      const values = check(entry.values, 'series values');
      if (values !== count) {
        throw new ValidationError(
          `series ${index + 1} has ${values} values; expected ${count} (same as series 1)`);
      }
      if (entry.categories) {
        const categories = check(entry.categories, 'categories');
        if (categories !== count) {
          throw new ValidationError(
            `categories for series ${index + 1} have ${categories} entries; expected ${count}`);
        }
      }
    });

  }

  /**
   * create a chart. every check runs before anything is attached.
   */
  public Create(sheet: Worksheet, options: ChartOptions): Chart {

    if (!ChartTypeList.includes(options.type)) {
      throw new ValidationError(`unsupported chart type: ${options.type}`);
    }

    this.CheckSeries(options.series);

    const width = options.width ?? DEFAULT_WIDTH;
    const height = options.height ?? DEFAULT_HEIGHT;

    if (width < 1 || height < 1) {
      throw new ValidationError('chart size must be at least one cell');
    }

    sheet.CheckBounds(new Area(options.anchor).Resize(height, width));

    const name = options.name ?? this.NextName(sheet);
    if (sheet.charts.some(chart => chart.name.toLowerCase() === name.toLowerCase())) {
      throw new ConflictError(`chart already exists: ${name}`);
    }

    const chart: Chart = {
      id: this.workbook.NextChartId(),
      name,
      type: options.type,
      title: options.title,
      x_axis_title: options.x_axis_title,
      y_axis_title: options.y_axis_title,
      series: options.series.map(entry => ({ ...entry })),
      anchor: { row: options.anchor.row, column: options.anchor.column },
      width,
      height,
      preserved: false,
    };

    sheet.charts.push(chart);
    return chart;

  }

  public Delete(sheet: Worksheet, name: string): void {
    const lc = name.toLowerCase();
    const chart = sheet.charts.find(test => test.name.toLowerCase() === lc);
    if (!chart) {
      throw new NotFoundError(`chart not found: ${name}`);
    }
    sheet.charts = sheet.charts.filter(test => test !== chart);
  }

  protected NextName(sheet: Worksheet): string {
    for (let index = sheet.charts.length + 1; ; index++) {
      const name = `Chart ${index}`;
      if (!sheet.charts.some(chart => chart.name === name)) {
        return name;
      }
    }
  }

}
