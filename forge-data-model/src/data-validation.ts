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

import {
  Area, ValidationError, DateToSerial, GetValueType,
  type CellValue, type ICellAddress,
} from 'forge-base-types';
import { InferValue } from 'forge-parser';
import type { Worksheet } from './worksheet';

export const ComparisonOperatorList = [
  'between', 'notBetween', 'equal', 'notEqual', 'greaterThan', 'lessThan',
  'greaterThanOrEqual', 'lessThanOrEqual',
] as const;

export type ComparisonOperator = typeof ComparisonOperatorList[number];

/** operands are literals, or formula text (stored, not checked) */
export type Operand = number | string;

export interface ValidationOptions {

  /** blank values pass. defaults to true */
  allow_blank?: boolean;

  error_style?: 'stop' | 'warning' | 'information';
  error_title?: string;
  error_message?: string;
  prompt_title?: string;
  prompt_message?: string;
}

export interface ListRule extends ValidationOptions {
  type: 'list';

  /** literal values */
  values?: string[];

  /** or a reference/formula that supplies the list */
  source?: string;
}

export interface ComparisonRule extends ValidationOptions {
  type: 'whole' | 'decimal' | 'date' | 'text-length';
  operator: ComparisonOperator;
  value1: Operand;
  value2?: Operand;
}

export interface CustomRule extends ValidationOptions {
  type: 'custom';
  formula: string;
}

export type DataValidationRule = ListRule | ComparisonRule | CustomRule;

export interface DataValidationEntry {
  areas: Area[];
  rule: DataValidationRule;
}

const two_operand = (operator: ComparisonOperator) => operator === 'between' || operator === 'notBetween';

/**
 * literal value of an operand for a rule type, or undefined if the
 * operand is a formula we can't check locally.
 */
const LiteralOperand = (type: ComparisonRule['type'], operand: Operand): number | undefined => {

  if (typeof operand === 'number') {
    return operand;
  }

  const text = operand.trim().replace(/^=/, '');

  if (type === 'date') {
    const inferred = InferValue(text);
    if (inferred.value instanceof Date) {
      return DateToSerial(inferred.value);
    }
  }

  if (/^-?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(text)) {
    return Number(text);
  }

  return undefined;

};

const Compare = (operator: ComparisonOperator, value: number, a: number, b: number): boolean => {
  switch (operator) {
    case 'between': return value >= Math.min(a, b) && value <= Math.max(a, b);
    case 'notBetween': return value < Math.min(a, b) || value > Math.max(a, b);
    case 'equal': return value === a;
    case 'notEqual': return value !== a;
    case 'greaterThan': return value > a;
    case 'lessThan': return value < a;
    case 'greaterThanOrEqual': return value >= a;
    case 'lessThanOrEqual': return value <= a;
  }
};

/**
 * data validation rules. rules are stored per range; writes into a
 * covered cell are checked when the rule has literal bounds.
 */
export class DataValidation {

  /**
   * check a rule's shape before attaching it
   */
  public static CheckRule(rule: DataValidationRule): void {
    switch (rule.type) {
      case 'list':
        if (!rule.values?.length && !rule.source) {
          throw new ValidationError('list validation needs values or a source');
        }
        if (rule.values && rule.values.join(',').length > 255) {
          throw new ValidationError('list validation values are too long (255 characters max)');
        }
        break;

      case 'custom':
        if (!rule.formula.trim()) {
          throw new ValidationError('custom validation needs a formula');
        }
        break;

      default:
        if (two_operand(rule.operator) && rule.value2 === undefined) {
          throw new ValidationError(`operator ${rule.operator} needs two values`);
        }
    }
  }

  /**
   * attach a rule to an area. an existing rule on the identical area
   * is replaced.
   */
  public Attach(sheet: Worksheet, area: Area, rule: DataValidationRule): void {

    DataValidation.CheckRule(rule);
    sheet.CheckBounds(area);

    const entry: DataValidationEntry = { areas: [area.Clone()], rule: { ...rule } };
    const index = sheet.validations.findIndex(test =>
      test.areas.length === 1 && test.areas[0].Equals(area));

    if (index >= 0) {
      sheet.validations[index] = entry;
    }
    else {
      sheet.validations.push(entry);
    }

    sheet.Grow(area.end);

  }

  /**
   * remove rules covering an area exactly. returns the number removed.
   */
  public Remove(sheet: Worksheet, area: Area): number {
    const before = sheet.validations.length;
    sheet.validations = sheet.validations.filter(test =>
      !(test.areas.length === 1 && test.areas[0].Equals(area)));
    return before - sheet.validations.length;
  }

  /**
   * the rule covering a cell, if any. if more than one covers it, the
   * most recently attached wins.
   */
  public ValidationFor(sheet: Worksheet, address: ICellAddress): DataValidationEntry | undefined {
    for (let i = sheet.validations.length - 1; i >= 0; i--) {
      const entry = sheet.validations[i];
      if (entry.areas.some(area => area.Contains(address))) {
        return entry;
      }
    }
    return undefined;
  }

  /**
   * check a literal write. throws ValidationError if a locally checkable
   * rule rejects the value.
   */
  public CheckWrite(sheet: Worksheet, address: ICellAddress, value: CellValue): void {

    const entry = this.ValidationFor(sheet, address);
    if (!entry) {
      return;
    }

    const rule = entry.rule;
    const type = GetValueType(value);

    if (type === 'blank') {
      if (rule.allow_blank === false && rule.type !== 'custom') {
        this.Reject(address, value, rule, 'blank values are not allowed');
      }
      return;
    }

    switch (rule.type) {
      case 'custom':
        return;

      case 'list':
        if (rule.values) {
          const text = value instanceof Date ? DateToSerial(value).toString() : String(value);
          if (!rule.values.some(entry => entry.trim() === text.trim())) {
            this.Reject(address, value, rule, `value must be one of: ${rule.values.join(', ')}`);
          }
        }
        return;

      default:
        break;
    }

    const a = LiteralOperand(rule.type, rule.value1);
    const b = rule.value2 === undefined ? a : LiteralOperand(rule.type, rule.value2);

    if (a === undefined || b === undefined) {
      return; // formula bounds
    }

    let subject: number | undefined;

    switch (rule.type) {
      case 'whole':
        if (typeof value === 'number' && Number.isInteger(value)) subject = value;
        break;
      case 'decimal':
        if (typeof value === 'number') subject = value;
        break;
      case 'date':
        if (value instanceof Date) subject = DateToSerial(value);
        else if (typeof value === 'number') subject = value;
        break;
      case 'text-length':
        subject = String(value).length;
        break;
    }

    if (subject === undefined) {
      this.Reject(address, value, rule, `value must be ${rule.type === 'whole' ? 'a whole number' : rule.type === 'decimal' ? 'a number' : 'a date'}`);
    }
    else if (!Compare(rule.operator, subject, a, b)) {
      const bounds = two_operand(rule.operator) ? `${rule.value1} and ${rule.value2}` : `${rule.value1}`;
      this.Reject(address, value, rule, `${rule.type} must be ${rule.operator} ${bounds}`);
    }

  }

  protected Reject(address: ICellAddress, value: CellValue, rule: DataValidationRule, reason: string): never {
    const label = Area.CellAddressToLabel(address);
    throw new ValidationError(
      `value ${JSON.stringify(value)} rejected by data validation at ${label}: ${rule.error_message || reason}`,
      { address: label, rule: rule.type });
  }

}
