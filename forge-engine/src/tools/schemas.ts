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
import {
  BorderStyleList, HorizontalAlignList, VerticalAlignList,
} from 'forge-base-types';
import {
  ChartTypeList, AggregationList, ComparisonOperatorList,
  type DataValidationRule, type ConditionalFormatCondition,
} from 'forge-data-model';

// argument schemas shared between tools

export const FilePath = z.string().min(1).describe('workbook path (.xlsx or .xlsm)');

export const SheetName = z.string().min(1);

/** a cell or range reference like `A1`, `B2:D9` or `'My Sheet'!A1` */
export const Reference = z.string().min(1);

export const Color = z.string().min(1).describe('RRGGBB, #RRGGBB or AARRGGBB');

export const InputValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const OperandSchema = z.union([z.number(), z.string()]);

export const DifferentialStyleSchema = z.object({
  font_color: Color.optional(),
  fill_color: Color.optional(),
  bold: z.boolean().optional(),
  italic: z.boolean().optional(),
}).strict();

export const StyleSchema = {
  bold: z.boolean().optional(),
  italic: z.boolean().optional(),
  underline: z.boolean().optional(),
  strike: z.boolean().optional(),
  font_size: z.number().positive().optional(),
  font_name: z.string().min(1).optional(),
  font_color: Color.optional(),
  bg_color: Color.optional(),
  border_style: z.enum(BorderStyleList).optional(),
  border_color: Color.optional(),
  number_format: z.string().min(1).optional(),
  alignment: z.enum(HorizontalAlignList).optional(),
  vertical_alignment: z.enum(VerticalAlignList).optional(),
  wrap_text: z.boolean().optional(),
};

const validation_options = {
  allow_blank: z.boolean().optional(),
  error_style: z.enum(['stop', 'warning', 'information']).optional(),
  error_title: z.string().optional(),
  error_message: z.string().optional(),
  prompt_title: z.string().optional(),
  prompt_message: z.string().optional(),
};

export const ValidationRuleSchema: z.ZodType<DataValidationRule> = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('list'),
    values: z.array(z.string()).optional(),
    source: z.string().min(1).optional(),
    ...validation_options,
  }).strict(),
  z.object({
    type: z.enum(['whole', 'decimal', 'date', 'text-length']),
    operator: z.enum(ComparisonOperatorList),
    value1: OperandSchema,
    value2: OperandSchema.optional(),
    ...validation_options,
  }).strict(),
  z.object({
    type: z.literal('custom'),
    formula: z.string().min(1),
    ...validation_options,
  }).strict(),
]);

export const ConditionSchema: z.ZodType<ConditionalFormatCondition> = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('comparison'),
    operator: z.enum(ComparisonOperatorList),
    value1: OperandSchema,
    value2: OperandSchema.optional(),
  }).strict(),
  z.object({
    type: z.literal('expression'),
    formula: z.string().min(1),
  }).strict(),
  z.object({
    type: z.enum(['duplicate', 'unique']),
  }).strict(),
]);

export const ChartTypeSchema = z.enum(ChartTypeList);

/** `mean` is accepted for average */
export const AggregationSchema = z.preprocess(
  value => value === 'mean' ? 'average' : value,
  z.enum(AggregationList));
