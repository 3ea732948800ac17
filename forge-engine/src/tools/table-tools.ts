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
import { DEFAULT_TABLE_STYLE, type Table } from 'forge-data-model';
import { DefineTool } from './tool';
import { FilePath, SheetName, Reference } from './schemas';

const TableName = z.string().min(1);

const Describe = (table: Table, sheet_name: string) => ({
  name: table.name,
  sheet_name,
  range: table.area.spreadsheet_label,
  columns: table.columns,
  style: table.style,
});

export const create_table = DefineTool({
  name: 'create_table',
  description: 'Create a table over a range. The first row is the header and must hold distinct, non-blank names.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    data_range: Reference,
    table_name: TableName,
    table_style: z.string().min(1).default(DEFAULT_TABLE_STYLE),
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const { sheet, area } = workspace.Range(args.sheet_name, args.data_range);
    const table = workspace.tables.Create(sheet, area, args.table_name, args.table_style);
    return {
      message: `Created table ${table.name} on ${FormatReference(table.area, sheet.name)}`,
      table: Describe(table, sheet.name),
    };
  },
});

export const rename_table = DefineTool({
  name: 'rename_table',
  description: 'Rename a table. Table names are unique in the workbook.',
  schema: z.object({
    filepath: FilePath,
    table_name: TableName,
    new_name: TableName,
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const table = workspace.tables.Rename(args.table_name, args.new_name);
    return { message: `Renamed table ${args.table_name} to ${table.name}` };
  },
});

export const delete_table = DefineTool({
  name: 'delete_table',
  description: 'Delete a table. Cell data is not changed.',
  schema: z.object({
    filepath: FilePath,
    table_name: TableName,
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const { table } = workspace.tables.Find(args.table_name);
    workspace.tables.Delete(table.name);
    return { message: `Deleted table ${table.name}` };
  },
});

export const resize_table = DefineTool({
  name: 'resize_table',
  description: 'Move a table to a new range on its sheet, keeping its name and style.',
  schema: z.object({
    filepath: FilePath,
    table_name: TableName,
    data_range: Reference,
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const { sheet } = workspace.tables.Find(args.table_name);
    const { area } = workspace.Range(sheet.name, args.data_range);
    const table = workspace.tables.Resize(args.table_name, area);
    return {
      message: `Resized table ${table.name} to ${FormatReference(table.area, sheet.name)}`,
      table: Describe(table, sheet.name),
    };
  },
});
