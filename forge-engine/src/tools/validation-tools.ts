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
import { NotFoundError } from 'forge-base-types';
import { FormatReference } from 'forge-parser';
import { DefineTool } from './tool';
import { FilePath, SheetName, Reference, ValidationRuleSchema } from './schemas';

export const add_data_validation = DefineTool({
  name: 'add_data_validation',
  description: 'Attach a validation rule (list, whole, decimal, date, text-length or custom) to a range. ' +
    'A rule already on the same range is replaced.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    start_cell: Reference,
    end_cell: Reference.optional(),
    rule: ValidationRuleSchema,
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const { sheet, area } = workspace.Range(args.sheet_name, args.start_cell, args.end_cell);
    workspace.validation.Attach(sheet, area, args.rule);
    return { message: `Added ${args.rule.type} validation to ${FormatReference(area, sheet.name)}` };
  },
});

export const remove_data_validation = DefineTool({
  name: 'remove_data_validation',
  description: 'Remove the validation rules on a range.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    start_cell: Reference,
    end_cell: Reference.optional(),
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const { sheet, area } = workspace.Range(args.sheet_name, args.start_cell, args.end_cell);
    const removed = workspace.validation.Remove(sheet, area);
    if (!removed) {
      throw new NotFoundError(`no validation on ${FormatReference(area, sheet.name)}`);
    }
    return { message: `Removed ${removed} validation rules from ${FormatReference(area, sheet.name)}`, removed };
  },
});
