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
import { FormatReference } from 'forge-parser';
import type { Workbook } from 'forge-data-model';
import { DefineTool } from './tool';
import { FilePath, SheetName, Reference, AggregationSchema } from './schemas';

const FieldName = z.string().min(1);

const ValueFieldSchema = z.union([
  FieldName,
  z.object({ field: FieldName, aggregation: AggregationSchema.optional() }),
]);

const FilterSchema = z.object({
  field: FieldName,
  values: z.array(z.union([z.string(), z.number(), z.boolean()])).min(1),
});

const NextName = (workbook: Workbook): string => {
  for (let index = 1; ; index++) {
    const name = `PivotTable${index}`;
    if (!workbook.FindPivot(name)) {
      return name;
    }
  }
};

export const create_pivot_table = DefineTool({
  name: 'create_pivot_table',
  description: 'Summarize a range with a header row into a static pivot table. ' +
    'By default the output goes two columns to the right of the source.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    data_range: Reference,
    rows: z.array(FieldName).min(1),
    values: z.array(ValueFieldSchema).min(1),
    columns: z.array(FieldName).default([]),
    filters: z.array(FilterSchema).default([]),
    agg_func: AggregationSchema.default('sum'),
    pivot_name: z.string().min(1).optional(),
    target_sheet: SheetName.optional(),
    target_cell: Reference.optional(),
  }),
  mode: 'write',
  Run: (args, workspace) => {

    const source = workspace.Range(args.sheet_name, args.data_range);
    workspace.CheckSize(source.area.count);

    let anchor = {
      sheet: source.sheet.name,
      address: { row: source.area.start.row, column: source.area.end.column + 2 },
    };

    if (args.target_cell) {
      const target = workspace.Cell(args.target_sheet ?? source.sheet.name, args.target_cell);
      anchor = { sheet: target.sheet.name, address: target.address };
    }
    else if (args.target_sheet) {
      anchor = { sheet: workspace.Sheet(args.target_sheet).name, address: { row: 1, column: 1 } };
    }

    const pivot = workspace.pivots.Build({
      name: args.pivot_name ?? NextName(workspace.workbook),
      source: { sheet: source.sheet.name, area: source.area },
      rows: args.rows,
      columns: args.columns,
      values: args.values.map(entry => typeof entry === 'string' ?
        { field: entry, aggregation: args.agg_func } :
        { field: entry.field, aggregation: entry.aggregation ?? args.agg_func }),
      filters: args.filters,
      anchor,
    });

    const output = workspace.ranges.ReadData(workspace.Sheet(pivot.anchor.sheet), pivot.output);

    return {
      message: `Created pivot table ${pivot.name} at ${FormatReference(pivot.output, pivot.anchor.sheet)}`,
      pivot_name: pivot.name,
      range: pivot.output.spreadsheet_label,
      rows: output.rows,
    };

  },
});

export const delete_pivot_table = DefineTool({
  name: 'delete_pivot_table',
  description: 'Delete a pivot table. Its output cells are cleared unless keep_values is set.',
  schema: z.object({
    filepath: FilePath,
    pivot_name: z.string().min(1),
    keep_values: z.boolean().default(false),
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const entry = workspace.workbook.FindPivot(args.pivot_name);
    workspace.pivots.Delete(args.pivot_name);
    if (entry && !args.keep_values) {
      workspace.ranges.ClearRange(entry.sheet, entry.pivot.output);
    }
    return { message: `Deleted pivot table ${entry?.pivot.name ?? args.pivot_name}` };
  },
});
