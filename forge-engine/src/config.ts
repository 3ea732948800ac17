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

import * as path from 'node:path';
import { z } from 'zod';
import { ValidationError } from 'forge-base-types';

export const LogLevelList = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = typeof LogLevelList[number];

const DEFAULT_MAX_CELLS = 1_000_000;

/** empty strings in the environment count as unset */
const Optional = (value: unknown) => value === '' ? undefined : value;

const environment = z.object({
  SHEETFORGE_FILES_PATH: z.preprocess(Optional, z.string().optional()),
  SHEETFORGE_LOG_LEVEL: z.preprocess(Optional, z.enum(LogLevelList).default('info')),
  SHEETFORGE_LOG_FILE: z.preprocess(Optional, z.string().optional()),
  SHEETFORGE_MAX_CELLS: z.preprocess(Optional,
    z.coerce.number().int().positive().default(DEFAULT_MAX_CELLS)),
});

export interface EngineConfig {

  /**
   * permitted root for workbook and csv paths. relative paths resolve
   * against it; without it, only absolute paths are accepted.
   */
  files_path?: string;

  log_level: LogLevel;

  /** log to this file instead of stderr */
  log_file?: string;

  /** upper bound on cells read or written by one request */
  max_cells: number;
}

/**
 * read configuration from the environment. throws ValidationError
 * listing every bad variable.
 */
export const LoadConfig = (env: Record<string, string | undefined> = process.env): EngineConfig => {

  const parsed = environment.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`invalid configuration: ${problems.join('; ')}`);
  }

  const data = parsed.data;

  return {
    files_path: data.SHEETFORGE_FILES_PATH ? path.resolve(data.SHEETFORGE_FILES_PATH) : undefined,
    log_level: data.SHEETFORGE_LOG_LEVEL,
    log_file: data.SHEETFORGE_LOG_FILE,
    max_cells: data.SHEETFORGE_MAX_CELLS,
  };

};
