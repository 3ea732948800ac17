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
import { ValidationError } from 'forge-base-types';
import { FormatReference } from 'forge-parser';
import type { StyleOverrides } from 'forge-data-model';
import { DefineTool } from './tool';
import {
  FilePath, SheetName, Reference, StyleSchema, ConditionSchema, DifferentialStyleSchema,
} from './schemas';

const ConditionalFormatSchema = z.object({
  condition: ConditionSchema,
  style: DifferentialStyleSchema,
  priority: z.number().int().positive().optional(),
  stop_if_true: z.boolean().optional(),
});

export const format_range = DefineTool({
  name: 'format_range',
  description: 'Apply font, fill, border, alignment and number format to a range. ' +
    'Fields left out are unchanged; false switches a flag off. Can also merge the range and add a conditional format.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    start_cell: Reference,
    end_cell: Reference.optional(),
    ...StyleSchema,
    merge_cells: z.boolean().default(false),
    conditional_format: ConditionalFormatSchema.optional(),
  }),
  mode: 'write',
  Run: (args, workspace) => {

    const { sheet, area } = workspace.Range(args.sheet_name, args.start_cell, args.end_cell);

    const overrides: StyleOverrides = {
      bold: args.bold,
      italic: args.italic,
      underline: args.underline,
      strike: args.strike,
      font_size: args.font_size,
      font_name: args.font_name,
      font_color: args.font_color,
      fill_color: args.bg_color,
      border_style: args.border_style,
      border_color: args.border_color,
      number_format: args.number_format,
      horizontal: args.alignment,
      vertical: args.vertical_alignment,
      wrap: args.wrap_text,
    };

    const styled = Object.values(overrides).some(value => value !== undefined);

    if (!styled && !args.merge_cells && !args.conditional_format) {
      throw new ValidationError('nothing to format: pass at least one style field, merge_cells or conditional_format');
    }

    const applied: string[] = [];

    if (styled) {
      workspace.CheckSize(area.count);
      workspace.workbook.styles.Format(sheet, area, overrides);
      applied.push('style');
    }

    if (args.merge_cells) {
      sheet.Merge(area);
      applied.push('merge');
    }

    if (args.conditional_format) {
      const { condition, style, priority, stop_if_true } = args.conditional_format;
      workspace.conditional_formats.Add(sheet, area, condition, style, priority, stop_if_true);
      applied.push('conditional format');
    }

    return {
      message: `Formatted ${FormatReference(area, sheet.name)} (${applied.join(', ')})`,
      range: area.spreadsheet_label,
    };

  },
});

export const add_conditional_format = DefineTool({
  name: 'add_conditional_format',
  description: 'Add a conditional format rule to a range: a comparison, a formula expression, or duplicate/unique values.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    start_cell: Reference,
    end_cell: Reference.optional(),
  }).merge(ConditionalFormatSchema),
  mode: 'write',
  Run: (args, workspace) => {
    const { sheet, area } = workspace.Range(args.sheet_name, args.start_cell, args.end_cell);
    const rule = workspace.conditional_formats.Add(sheet, area, args.condition, args.style, args.priority, args.stop_if_true);
    return {
      message: `Added conditional format to ${FormatReference(area, sheet.name)}`,
      range: area.spreadsheet_label,
      priority: rule.priority,
    };
  },
});

export const remove_conditional_format = DefineTool({
  name: 'remove_conditional_format',
  description: 'Remove the conditional format rules whose target is exactly this range.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    start_cell: Reference,
    end_cell: Reference.optional(),
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const { sheet, area } = workspace.Range(args.sheet_name, args.start_cell, args.end_cell);
    const removed = workspace.conditional_formats.Remove(sheet, area);
    return { message: `Removed ${removed} conditional format rules from ${FormatReference(area, sheet.name)}`, removed };
  },
});
