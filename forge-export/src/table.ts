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

import type { Area } from 'forge-base-types';
import { ParseReference } from 'forge-parser';
import type { Table } from 'forge-data-model';
import {
  Attr, Child, Children, CreateNode, SetAttr, Flag,
  type XMLNode,
} from './xml-utils';

/**
 * read a table part. returns undefined if the part doesn't describe a
 * usable table (no name, or a ref we can't parse).
 */
export const ReadTable = (root: XMLNode, id: number): Table | undefined => {

  const name = Attr(root, 'displayName') || Attr(root, 'name');
  const ref = Attr(root, 'ref');

  if (!name || !ref) {
    return undefined;
  }

  let area: Area;
  try {
    area = ParseReference(ref).area;
  }
  catch {
    return undefined;
  }

  const style = Child(root, 'tableStyleInfo');

  return {
    id,
    name,
    area,
    style: Attr(style, 'name') || '',
    columns: Children(Child(root, 'tableColumns'), 'tableColumn').map(column => Attr(column, 'name') || ''),
    show_row_stripes: Flag(style, 'showRowStripes'),
    show_column_stripes: Flag(style, 'showColumnStripes'),
    generated: false,
  };

};

/**
 * table element for a new table
 */
export const CreateTable = (table: Table): XMLNode => {

  const root = CreateNode({
    xmlns: 'http://schemas.openxmlformats.org/spreadsheetml/2006/main',
    id: table.id,
    name: table.name,
    displayName: table.name,
    ref: table.area.spreadsheet_label,
    totalsRowShown: 0,
  }, {
    autoFilter: [CreateNode({ ref: table.area.spreadsheet_label })],
    tableColumns: [CreateNode()],
    tableStyleInfo: [CreateNode()],
  });

  UpdateTable(root, table);
  return root;

};

/**
 * bring a table element in line with the model. we keep whatever else
 * the element carries (filters, sort state, column formulas); columns
 * keep their ids by position.
 */
export const UpdateTable = (root: XMLNode, table: Table): void => {

  const ref = table.area.spreadsheet_label;

  SetAttr(root, 'name', table.name);
  SetAttr(root, 'displayName', table.name);
  SetAttr(root, 'ref', ref);

  const filter = Child(root, 'autoFilter');
  if (filter) {
    SetAttr(filter, 'ref', ref);

    // filter columns past the end of the table would be invalid
    filter.filterColumn = Children(filter, 'filterColumn').filter(column =>
      Number(Attr(column, 'colId')) < table.columns.length);
  }

  let columns = Child(root, 'tableColumns');
  if (!columns) {
    columns = CreateNode();
    root.tableColumns = [columns];
  }

  const existing = Children(columns, 'tableColumn');
  let next_id = existing.reduce((max, column) => Math.max(max, Number(Attr(column, 'id')) || 0), 0) + 1;

  columns.tableColumn = table.columns.map((name, index) => {
    const column = existing[index] || CreateNode({ id: next_id++ });
    SetAttr(column, 'name', name);
    return column;
  });

  SetAttr(columns, 'count', String(table.columns.length));

  let style = Child(root, 'tableStyleInfo');
  if (!style) {
    style = CreateNode();
    root.tableStyleInfo = [style];
  }

  SetAttr(style, 'name', table.style || undefined);
  SetAttr(style, 'showFirstColumn', Attr(style, 'showFirstColumn') || '0');
  SetAttr(style, 'showLastColumn', Attr(style, 'showLastColumn') || '0');
  SetAttr(style, 'showRowStripes', table.show_row_stripes ? '1' : '0');
  SetAttr(style, 'showColumnStripes', table.show_column_stripes ? '1' : '0');

};

/** schema order for the table element */
export const TableOrder = [
  'autoFilter', 'sortState', 'tableColumns', 'tableStyleInfo', 'extLst',
];
