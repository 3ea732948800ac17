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

import { LoadConfig, type EngineConfig } from '../config';
import { ConfigLogger, type Logger } from '../logger';
import type { Tool } from './tool';
import { ToolHost } from './tool-host';
import {
  create_workbook, create_worksheet, copy_worksheet, rename_worksheet,
  delete_worksheet, get_workbook_metadata,
} from './workbook-tools';
import {
  read_data, write_data, write_csv, copy_range, clear_range,
  auto_format_range, validate_range, merge_cells, unmerge_cells,
} from './range-tools';
import { apply_formula, validate_formula_syntax } from './formula-tools';
import { format_range, add_conditional_format, remove_conditional_format } from './format-tools';
import { create_table, rename_table, delete_table, resize_table } from './table-tools';
import { create_chart, delete_chart } from './chart-tools';
import { create_pivot_table, delete_pivot_table } from './pivot-tools';
import { add_data_validation, remove_data_validation } from './validation-tools';

export * from './tool';
export * from './workspace';
export * from './schemas';
export * from './tool-host';

/** every tool the host serves, in listing order */
export const AllTools: Tool[] = [
  create_workbook,
  get_workbook_metadata,
  create_worksheet,
  copy_worksheet,
  rename_worksheet,
  delete_worksheet,
  read_data,
  write_data,
  write_csv,
  apply_formula,
  validate_formula_syntax,
  format_range,
  merge_cells,
  unmerge_cells,
  copy_range,
  clear_range,
  auto_format_range,
  validate_range,
  create_table,
  rename_table,
  delete_table,
  resize_table,
  create_chart,
  delete_chart,
  create_pivot_table,
  delete_pivot_table,
  add_data_validation,
  remove_data_validation,
  add_conditional_format,
  remove_conditional_format,
];

/**
 * a host serving every tool. configuration and logger come from the
 * environment unless given.
 */
export const CreateToolHost = (config: EngineConfig = LoadConfig(), logger: Logger = ConfigLogger(config)): ToolHost => {
  return new ToolHost(config, logger, AllTools);
};
