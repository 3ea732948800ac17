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

import { promises as fs } from 'node:fs';
import { z } from 'zod';
import { Area, NotFoundError } from 'forge-base-types';
import { ParseCSV, FormatReference } from 'forge-parser';
import { DefineTool } from './tool';
import { CSV_EXTENSIONS } from '../path-policy';
import { FilePath, SheetName, Reference, InputValueSchema } from './schemas';
import type { Workspace } from './workspace';
import type { InputValue } from 'forge-data-model';

/** write rows and shape the result. shared by write_data and write_csv */
const Write = (workspace: Workspace, sheet_name: string, start_cell: string, data: InputValue[][], infer: boolean) => {

  const { sheet, address } = workspace.Cell(sheet_name, start_cell);
  workspace.CheckSize(data.reduce((sum, row) => sum + (Array.isArray(row) ? row.length : 0), 0));

  const result = workspace.ranges.WriteData(sheet, address, data, { infer });

  return {
    message: result.area ?
      `Wrote ${result.cells} cells to ${FormatReference(result.area, sheet.name)}` : 'No data to write',
    range: result.area?.spreadsheet_label,
    cells: result.cells,
    formulas: result.formulas,
    warnings: result.warnings,
  };

};

export const read_data = DefineTool({
  name: 'read_data',
  description: 'Read values from a range, or the used area of a sheet. Optionally include per-cell metadata.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    start_cell: Reference.optional(),
    end_cell: Reference.optional(),
    include_metadata: z.boolean().default(false),
  }),
  mode: 'read',
  Run: (args, workspace) => {

    let sheet = workspace.Sheet(args.sheet_name);
    let area: Area | undefined;

    if (args.start_cell) {
      ({ sheet, area } = workspace.Range(args.sheet_name, args.start_cell, args.end_cell));
    }

    const target = area ?? sheet.used_area;
    if (target) {
      workspace.CheckSize(target.count);
    }

    return { sheet_name: sheet.name, ...workspace.ranges.ReadData(sheet, area, args.include_metadata) };

  },
});

export const write_data = DefineTool({
  name: 'write_data',
  description: 'Write a 2-D array of values from a start cell. Text starting with = is a formula.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    data: z.array(z.array(InputValueSchema)),
    start_cell: Reference.default('A1'),
    auto_detect_types: z.boolean().default(true),
  }),
  mode: 'write',
  Run: (args, workspace) => Write(workspace, args.sheet_name, args.start_cell, args.data, args.auto_detect_types),
});

export const write_csv = DefineTool({
  name: 'write_csv',
  description: 'Read a CSV file and write it into a sheet, inferring types by default.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    csv_path: z.string().min(1),
    start_cell: Reference.default('A1'),
    delimiter: z.string().length(1).default(','),
    auto_detect_types: z.boolean().default(true),
  }),
  mode: 'write',
  Run: async (args, workspace) => {

    const file = workspace.context.store.Resolve(args.csv_path, CSV_EXTENSIONS);

    let text: string;
    try {
      text = await fs.readFile(file, 'utf8');
    }
    catch (err) {
      throw new NotFoundError(`cannot read csv file: ${file}`, { cause: String(err) });
    }

    const rows: InputValue[][] = ParseCSV(text, args.delimiter);
    return { csv_path: file, ...Write(workspace, args.sheet_name, args.start_cell, rows, args.auto_detect_types) };

  },
});

export const copy_range = DefineTool({
  name: 'copy_range',
  description: 'Copy values, formulas and styles from a range to a target cell, optionally on another sheet.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    source_start: Reference,
    source_end: Reference.optional(),
    target_start: Reference,
    target_sheet: SheetName.optional(),
  }),
  mode: 'write',
  Run: (args, workspace) => {

    const source = workspace.Range(args.sheet_name, args.source_start, args.source_end);
    const target = workspace.Cell(args.target_sheet ?? source.sheet.name, args.target_start);
    workspace.CheckSize(source.area.count);

    const area = workspace.ranges.CopyRange(source.sheet, source.area, target.sheet, target.address);

    return {
      message: `Copied ${FormatReference(source.area, source.sheet.name)} to ${FormatReference(area, target.sheet.name)}`,
      range: area.spreadsheet_label,
    };

  },
});

export const clear_range = DefineTool({
  name: 'clear_range',
  description: 'Remove values and formulas from a range. Styles are kept.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    start_cell: Reference,
    end_cell: Reference.optional(),
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const { sheet, area } = workspace.Range(args.sheet_name, args.start_cell, args.end_cell);
    const cleared = workspace.ranges.ClearRange(sheet, area);
    return { message: `Cleared ${cleared} cells in ${FormatReference(area, sheet.name)}`, cleared };
  },
});

export const auto_format_range = DefineTool({
  name: 'auto_format_range',
  description: 'Convert text cells that read as numbers, percentages, currency, dates or booleans.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    start_cell: Reference,
    end_cell: Reference.optional(),
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const { sheet, area } = workspace.Range(args.sheet_name, args.start_cell, args.end_cell);
    workspace.CheckSize(area.count);
    const converted = workspace.ranges.AutoFormat(sheet, area);
    return { message: `Converted ${converted} cells in ${FormatReference(area, sheet.name)}`, converted };
  },
});

export const validate_range = DefineTool({
  name: 'validate_range',
  description: 'Check that a range is well formed and names an existing sheet, and report whether it lies inside the data.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    start_cell: Reference,
    end_cell: Reference.optional(),
  }),
  mode: 'read',
  Run: (args, workspace) => {

    const { sheet, area } = workspace.Range(args.sheet_name, args.start_cell, args.end_cell);
    sheet.CheckBounds(area);

    const extent = sheet.extent_area;

    return {
      valid: true,
      sheet_name: sheet.name,
      range: area.spreadsheet_label,
      data_range: extent?.spreadsheet_label,
      within_data: !!extent && extent.ContainsArea(area),
    };

  },
});

export const merge_cells = DefineTool({
  name: 'merge_cells',
  description: 'Merge a range. Merged ranges may not overlap.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    start_cell: Reference,
    end_cell: Reference.optional(),
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const { sheet, area } = workspace.Range(args.sheet_name, args.start_cell, args.end_cell);
    sheet.Merge(area);
    return { message: `Merged ${FormatReference(area, sheet.name)}` };
  },
});

export const unmerge_cells = DefineTool({
  name: 'unmerge_cells',
  description: 'Unmerge a merged range. The range must match the merge exactly.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    start_cell: Reference,
    end_cell: Reference.optional(),
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const { sheet, area } = workspace.Range(args.sheet_name, args.start_cell, args.end_cell);
    sheet.Unmerge(area);
    return { message: `Unmerged ${FormatReference(area, sheet.name)}` };
  },
});
