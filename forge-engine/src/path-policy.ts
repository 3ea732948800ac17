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

import * as fs from 'node:fs';
import * as path from 'node:path';
import { PathError } from 'forge-base-types';

export const WORKBOOK_EXTENSIONS = ['.xlsx', '.xlsm'];
export const CSV_EXTENSIONS = ['.csv', '.txt'];

/**
 * where a path really points, for paths that may not exist yet: the
 * nearest existing ancestor with symbolic links resolved, then the rest.
 */
const RealLocation = (target: string): string => {

  const rest: string[] = [];
  let current = target;

  for (;;) {
    if (fs.existsSync(current)) {
      return path.join(fs.realpathSync(current), ...rest.reverse());
    }
    if (fs.lstatSync(current, { throwIfNoEntry: false })?.isSymbolicLink()) {
      throw new PathError(`path goes through a broken symbolic link: ${current}`);
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return target;
    }
    rest.push(path.basename(current));
    current = parent;
  }

};

/**
 * check a caller-supplied path and return it absolute and normalized.
 *
 * - no NUL bytes, no `..` segments
 * - extension must be one of `extensions` (case-insensitive)
 * - relative paths resolve against the root; without a root only
 *   absolute paths are accepted
 * - with a root, the result must be inside it, also after following
 *   symbolic links
 */
export const ResolvePath = (input: string, root?: string, extensions = WORKBOOK_EXTENSIONS): string => {

  if (!input.trim()) {
    throw new PathError('empty path');
  }

  if (input.includes('\0')) {
    throw new PathError('path contains a NUL byte');
  }

  if (input.split(/[\\/]/).includes('..')) {
    throw new PathError(`path contains a parent directory segment: ${input}`);
  }

  const extension = path.extname(input).toLowerCase();
  if (!extensions.includes(extension)) {
    throw new PathError(`unsupported file type ${extension || '(none)'}; expected ${extensions.join(', ')}`);
  }

  let resolved: string;

  if (path.isAbsolute(input)) {
    resolved = path.resolve(input);
  }
  else if (root) {
    resolved = path.resolve(root, input);
  }
  else {
    throw new PathError(`relative path with no files root configured: ${input}`);
  }

  if (root) {
    const relative = path.relative(RealLocation(path.resolve(root)), RealLocation(resolved));
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new PathError(`path is outside the permitted root: ${input}`);
    }
  }

  return resolved;

};
