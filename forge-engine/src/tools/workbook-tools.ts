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
import { Area } from 'forge-base-types';
import { FormatReference } from 'forge-parser';
import type { Worksheet } from 'forge-data-model';
import { DefineTool, DefineFileTool } from './tool';
import { FilePath, SheetName } from './schemas';

export const create_workbook = DefineFileTool({
  name: 'create_workbook',
  description: 'Create a new workbook with one empty sheet. Fails if the file exists.',
  schema: z.object({ filepath: FilePath }),
  mutates: true,
  Run: async (args, context) => {
    const file = context.store.Resolve(args.filepath);
    const session = await context.store.Create(file);
    return {
      message: `Created workbook ${file}`,
      filepath: file,
      sheets: session.workbook.sheets.map(sheet => sheet.name),
    };
  },
});

export const create_worksheet = DefineTool({
  name: 'create_worksheet',
  description: 'Add a sheet at the end of the workbook, or at a position.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    index: z.number().int().nonnegative().optional(),
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const count = workspace.workbook.sheets.length;
    const sheet = workspace.workbook.AddSheet(args.sheet_name, Math.min(args.index ?? count, count));
    return { message: `Created sheet ${sheet.name}`, sheet_name: sheet.name };
  },
});

export const copy_worksheet = DefineTool({
  name: 'copy_worksheet',
  description: 'Copy a sheet (cells, styles, merges, validations and conditional formats) to a new sheet placed after it.',
  schema: z.object({
    filepath: FilePath,
    source_sheet: SheetName,
    target_sheet: SheetName,
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const source = workspace.Sheet(args.source_sheet);
    const copy = workspace.workbook.CopySheet(source.name, args.target_sheet);
    workspace.session.package.CopySheet(source.id, copy.id);
    return { message: `Copied ${source.name} to ${copy.name}`, sheet_name: copy.name };
  },
});

export const rename_worksheet = DefineTool({
  name: 'rename_worksheet',
  description: 'Rename a sheet. Formulas that refer to the old name are not rewritten.',
  schema: z.object({
    filepath: FilePath,
    old_name: SheetName,
    new_name: SheetName,
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const sheet = workspace.workbook.RenameSheet(args.old_name, args.new_name);
    return { message: `Renamed ${args.old_name} to ${sheet.name}`, sheet_name: sheet.name };
  },
});

export const delete_worksheet = DefineTool({
  name: 'delete_worksheet',
  description: 'Delete a sheet. The last sheet in a workbook cannot be deleted.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const sheet = workspace.Sheet(args.sheet_name);
    workspace.workbook.DeleteSheet(sheet.name);
    return { message: `Deleted sheet ${sheet.name}` };
  },
});

const SheetSummary = (sheet: Worksheet, include_ranges: boolean) => {
  const used = sheet.used_area;
  return {
    name: sheet.name,
    rows: sheet.extent.rows,
    columns: sheet.extent.columns,
    ...(include_ranges ? {
      range: sheet.extent_area?.spreadsheet_label,
      used_range: used?.spreadsheet_label,
      merges: sheet.merges.map(area => area.spreadsheet_label),
    } : {}),
    tables: sheet.tables.map(table => ({
      name: table.name,
      range: table.area.spreadsheet_label,
      columns: table.columns,
      style: table.style,
    })),
    charts: sheet.charts.map(chart => ({
      name: chart.name,
      type: chart.type,
      anchor: Area.CellAddressToLabel(chart.anchor),
      series: chart.series.length,
    })),
    pivots: sheet.pivots.map(pivot => ({
      name: pivot.name,
      source: FormatReference(pivot.source.area, pivot.source.sheet),
      output: pivot.output.spreadsheet_label,
    })),
  };
};

export const get_workbook_metadata = DefineTool({
  name: 'get_workbook_metadata',
  description: 'Describe a workbook: its sheets with their extents, tables, charts and pivot tables.',
  schema: z.object({
    filepath: FilePath,
    include_ranges: z.boolean().default(false),
  }),
  mode: 'read',
  Run: async (args, workspace) => {
    const size = workspace.session.exists ? (await fs.stat(workspace.session.path)).size : 0;
    return {
      filepath: workspace.session.path,
      exists: workspace.session.exists,
      size,
      sheets: workspace.workbook.sheets.map(sheet => SheetSummary(sheet, args.include_ranges)),
    };
  },
});
