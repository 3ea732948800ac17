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

import { ValidationError, type ICellAddress } from 'forge-base-types';
import { FormulaScanner, UnknownFunctions } from 'forge-parser';
import type { Worksheet } from './worksheet';

export interface FormulaResult {

  /** normalized formula text, with the leading = */
  formula: string;

  /** soft problems (unknown function names) */
  warnings: string[];
}

/**
 * formula placement. formulas are checked for syntax and stored; they
 * are never evaluated.
 */
export class FormulaWriter {

  protected scanner = new FormulaScanner();

  /**
   * check syntax. throws ValidationError on malformed text; unknown
   * function names are returned as warnings.
   */
  public Validate(text: string): FormulaResult {

    const formula = text.trim();
    const result = this.scanner.Scan(formula);

    if (!result.valid) {
      const position = result.error_position ?? 0;
      throw new ValidationError(
        `invalid formula: ${result.error} at position ${position}`,
        { position });
    }

    return {
      formula,
      warnings: UnknownFunctions(result).map(name => `unknown function: ${name}`),
    };

  }

  /**
   * validate and write a formula into a cell, replacing any value or
   * cached result. the cell keeps its style.
   */
  public SetFormula(sheet: Worksheet, address: ICellAddress, text: string): FormulaResult {
    sheet.CheckBounds({ start: address, end: address });
    const result = this.Validate(text);
    sheet.EnsureCell(address).SetFormula(result.formula);
    return result;
  }

}
