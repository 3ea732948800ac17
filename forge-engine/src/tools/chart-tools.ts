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

import { z } from 'zod';
import { Area, ValidationError } from 'forge-base-types';
import type { ChartSeries, SheetRange } from 'forge-data-model';
import { DefineTool } from './tool';
import { FilePath, SheetName, Reference, ChartTypeSchema } from './schemas';
import type { Workspace } from './workspace';

const SeriesSchema = z.object({
  name: z.string().optional(),
  values: Reference,
  categories: Reference.optional(),
});

const SheetRangeOf = (workspace: Workspace, sheet_name: string, reference: string): SheetRange => {
  const { sheet, area } = workspace.Range(sheet_name, reference);
  return { sheet: sheet.name, area };
};

export const create_chart = DefineTool({
  name: 'create_chart',
  description: 'Add a chart. Pass data_range (first column categories, first row series names) or an explicit series list.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    chart_type: ChartTypeSchema,
    target_cell: Reference,
    data_range: Reference.optional(),
    series: z.array(SeriesSchema).optional(),
    title: z.string().optional(),
    x_axis: z.string().optional(),
    y_axis: z.string().optional(),
    chart_name: z.string().min(1).optional(),
    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional(),
  }),
  mode: 'write',
  Run: (args, workspace) => {

    const { sheet, address } = workspace.Cell(args.sheet_name, args.target_cell);

    let series: ChartSeries[];

    if (args.data_range && args.series) {
      throw new ValidationError('pass data_range or series, not both');
    }
    else if (args.data_range) {
      const source = workspace.Range(sheet.name, args.data_range);
      series = workspace.charts.FromRange(source.sheet, source.area);
    }
    else if (args.series) {
      series = args.series.map(entry => ({
        name: entry.name,
        values: SheetRangeOf(workspace, sheet.name, entry.values),
        categories: entry.categories ? SheetRangeOf(workspace, sheet.name, entry.categories) : undefined,
      }));
    }
    else {
      throw new ValidationError('a chart needs data_range or series');
    }

    const chart = workspace.charts.Create(sheet, {
      type: args.chart_type,
      series,
      anchor: address,
      name: args.chart_name,
      title: args.title,
      x_axis_title: args.x_axis,
      y_axis_title: args.y_axis,
      width: args.width,
      height: args.height,
    });

    return {
      message: `Created ${chart.type} chart ${chart.name} at ${Area.CellAddressToLabel(chart.anchor)}`,
      chart_name: chart.name,
      series: chart.series.length,
    };

  },
});

export const delete_chart = DefineTool({
  name: 'delete_chart',
  description: 'Delete a chart from a sheet.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    chart_name: z.string().min(1),
  }),
  mode: 'write',
  Run: (args, workspace) => {
    workspace.charts.Delete(workspace.Sheet(args.sheet_name), args.chart_name);
    return { message: `Deleted chart ${args.chart_name}` };
  },
});
