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

import { ValidationError, NotFoundError, type Area, type DifferentialStyle } from 'forge-base-types';
import type { Worksheet } from './worksheet';
import type { StyleRegistry } from './style-registry';
import type { FormulaWriter } from './formula-writer';
import { ComparisonOperatorList, type ComparisonOperator, type Operand } from './data-validation';

export interface ComparisonCondition {
  type: 'comparison';
  operator: ComparisonOperator;
  value1: Operand;
  value2?: Operand;
}

export interface ExpressionCondition {
  type: 'expression';

  /** formula text, with or without the leading = */
  formula: string;
}

export interface DuplicateCondition {
  type: 'duplicate' | 'unique';
}

/**
 * rule kinds we read from a container but don't model (color scales,
 * data bars and so on). they are written back as they were.
 */
export interface PreservedCondition {
  type: 'preserved';
  kind: string;
  payload: unknown;
}

export type ConditionalFormatCondition =
  ComparisonCondition |
  ExpressionCondition |
  DuplicateCondition |
  PreservedCondition;

export interface ConditionalFormatRule {
  areas: Area[];
  condition: ConditionalFormatCondition;

  /** differential style index */
  style: number;

  /** lower evaluates first */
  priority: number;

  stop_if_true?: boolean;
}

/**
 * conditional formats. rules are kept sorted by priority.
 */
export class ConditionalFormats {

  constructor(protected styles: StyleRegistry, protected formulas: FormulaWriter) {}

  public static NextPriority(sheet: Worksheet): number {
    return sheet.conditional_formats.reduce((max, rule) => Math.max(max, rule.priority), 0) + 1;
  }

  /**
   * check a condition. comparison operands that look like formulas and
   * expressions go through the formula scanner.
   */
  public CheckCondition(condition: ConditionalFormatCondition): void {
    switch (condition.type) {
      case 'comparison':
        if (!ComparisonOperatorList.includes(condition.operator)) {
          throw new ValidationError(`invalid operator: ${condition.operator}`);
        }
        if ((condition.operator === 'between' || condition.operator === 'notBetween') && condition.value2 === undefined) {
          throw new ValidationError(`operator ${condition.operator} needs two values`);
        }
        for (const operand of [condition.value1, condition.value2]) {
          if (typeof operand === 'string' && operand.trim().startsWith('=')) {
            this.formulas.Validate(operand);
          }
        }
        break;

      case 'expression':
        this.formulas.Validate(condition.formula.trim().startsWith('=') ? condition.formula : '=' + condition.formula);
        break;

      case 'preserved':
        throw new ValidationError('cannot add a rule of this kind');

      default:
        break;
    }
  }

  public Add(
      sheet: Worksheet,
      area: Area,
      condition: ConditionalFormatCondition,
      style: DifferentialStyle,
      priority?: number,
      stop_if_true?: boolean): ConditionalFormatRule {

    sheet.CheckBounds(area);
    this.CheckCondition(condition);

    if (priority !== undefined && (!Number.isInteger(priority) || priority < 1)) {
      throw new ValidationError(`priority must be a positive integer: ${priority}`);
    }

    if (!style.font_color && !style.fill_color && !style.bold && !style.italic) {
      throw new ValidationError('conditional format needs a style (font color, fill color, bold or italic)');
    }

    const rule: ConditionalFormatRule = {
      areas: [area.Clone()],
      condition,
      style: this.styles.ResolveDifferential(style),
      priority: priority ?? ConditionalFormats.NextPriority(sheet),
      ...(stop_if_true ? { stop_if_true } : {}),
    };

    sheet.conditional_formats.push(rule);
    sheet.conditional_formats.sort((a, b) => a.priority - b.priority);
    sheet.Grow(area.end);

    return rule;

  }

  /**
   * remove every rule whose target is exactly this area
   */
  public Remove(sheet: Worksheet, area: Area): number {
    const before = sheet.conditional_formats.length;
    sheet.conditional_formats = sheet.conditional_formats.filter(rule =>
      !(rule.areas.length === 1 && rule.areas[0].Equals(area)));
    const removed = before - sheet.conditional_formats.length;
    if (!removed) {
      throw new NotFoundError(`no conditional format on ${area.spreadsheet_label}`);
    }
    return removed;
  }

}
