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
import { Area } from 'forge-base-types';
import { AggregationList, type PivotTable } from 'forge-data-model';
import { ParseReference, ParseCellAddress } from 'forge-parser';
import { FindAll, Attr, Text, CreateNode, type XMLNode } from './xml-utils';

/** property that holds pivot definitions */
export const PIVOT_PROPERTY = 'sheetforge.pivots';

/** every custom property uses this format id */
const fmtid = '{D5CDD505-2E9C-101B-9397-08002B2CF9AE}';

const stored_pivot = z.object({
  sheet: z.string(),
  name: z.string(),
  source: z.object({ sheet: z.string(), ref: z.string() }),
  rows: z.array(z.string()),
  columns: z.array(z.string()),
  values: z.array(z.object({ field: z.string(), aggregation: z.enum(AggregationList) })),
  filters: z.array(z.object({
    field: z.string(),
    values: z.array(z.union([z.string(), z.number(), z.boolean()])),
  })),
  anchor: z.string(),
  output: z.string(),
});

export type StoredPivot = z.infer<typeof stored_pivot>;

/** pivot plus the name of the sheet it lives on */
export interface SheetPivot {
  sheet: string;
  pivot: PivotTable;
}

export const CreateProperties = (): XMLNode => CreateNode({
  xmlns: 'http://schemas.openxmlformats.org/officeDocument/2006/custom-properties',
  'xmlns:vt': 'http://schemas.openxmlformats.org/officeDocument/2006/docPropsVTypes',
});

/**
 * read pivot definitions from the custom properties root. entries that
 * don't parse are dropped; the output cells are ordinary cells and
 * stay either way.
 */
export const ReadPivots = (root: XMLNode): SheetPivot[] => {

  const property = FindAll(root, 'property').find(test => Attr(test, 'name') === PIVOT_PROPERTY);
  if (!property) {
    return [];
  }

  let data: unknown;
  try {
    data = JSON.parse(Text(FindAll(property, 'vt:lpwstr')[0]));
  }
  catch {
    return [];
  }

  const parsed = z.array(z.unknown()).safeParse(data);
  if (!parsed.success) {
    return [];
  }

  const list: SheetPivot[] = [];

  for (const entry of parsed.data) {
    const result = stored_pivot.safeParse(entry);
    if (!result.success) {
      continue;
    }
    const stored = result.data;
    try {
      const anchor = ParseCellAddress(stored.anchor);
      if (!anchor) {
        continue;
      }
      list.push({
        sheet: stored.sheet,
        pivot: {
          name: stored.name,
          source: { sheet: stored.source.sheet, area: ParseReference(stored.source.ref).area },
          rows: stored.rows,
          columns: stored.columns,
          values: stored.values,
          filters: stored.filters,
          anchor: { sheet: stored.sheet, address: anchor },
          output: ParseReference(stored.output).area,
        },
      });
    }
    catch {
      continue;
    }
  }

  return list;

};

/**
 * store pivot definitions, replacing the property. with no pivots the
 * property is removed. returns true if the root has any properties left.
 */
export const WritePivots = (root: XMLNode, pivots: SheetPivot[]): boolean => {

  const others = FindAll(root, 'property').filter(test => Attr(test, 'name') !== PIVOT_PROPERTY);

  if (pivots.length) {

    const stored: StoredPivot[] = pivots.map(({ sheet, pivot }) => ({
      sheet,
      name: pivot.name,
      source: { sheet: pivot.source.sheet, ref: pivot.source.area.spreadsheet_label },
      rows: pivot.rows,
      columns: pivot.columns,
      values: pivot.values,
      filters: pivot.filters,
      anchor: Area.CellAddressToLabel(pivot.anchor.address),
      output: pivot.output.spreadsheet_label,
    }));

    // property ids start at 2
    const pid = others.reduce((max, test) => Math.max(max, Number(Attr(test, 'pid')) || 0), 1) + 1;

    others.push(CreateNode({ fmtid, pid, name: PIVOT_PROPERTY }, {
      'vt:lpwstr': [CreateNode({}, {}, JSON.stringify(stored))],
    }));

  }

  root.property = others;
  return others.length > 0;

};
