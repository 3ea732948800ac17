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
import { Area } from 'forge-base-types';
import { DefineTool } from './tool';
import { FilePath, SheetName, Reference } from './schemas';

export const apply_formula = DefineTool({
  name: 'apply_formula',
  description: 'Check a formula and store it in a cell. Formulas are not evaluated; unknown function names come back as warnings.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    cell: Reference,
    formula: z.string().min(1),
  }),
  mode: 'write',
  Run: (args, workspace) => {
    const { sheet, address } = workspace.Cell(args.sheet_name, args.cell);
    const result = workspace.formulas.SetFormula(sheet, address, args.formula);
    return {
      message: `Applied formula to ${FormatReference(new Area(address), sheet.name)}`,
      cell: Area.CellAddressToLabel(address),
      formula: result.formula,
      warnings: result.warnings,
    };
  },
});

export const validate_formula_syntax = DefineTool({
  name: 'validate_formula_syntax',
  description: 'Check a formula without storing it.',
  schema: z.object({
    filepath: FilePath,
    sheet_name: SheetName,
    cell: Reference,
    formula: z.string().min(1),
  }),
  mode: 'read',
  Run: (args, workspace) => {
    const { address } = workspace.Cell(args.sheet_name, args.cell);
    const result = workspace.formulas.Validate(args.formula);
    return {
      valid: true,
      cell: Area.CellAddressToLabel(address),
      formula: result.formula,
      warnings: result.warnings,
    };
  },
});
