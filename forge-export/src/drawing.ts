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

import type { Chart } from 'forge-data-model';
import {
  Attr, Child, Children, CreateNode, FindAll, Text,
  type XMLNode,
} from './xml-utils';

/** emu per pixel */
const pixel_offset = 9525;

const anchor_types = ['xdr:twoCellAnchor', 'xdr:oneCellAnchor', 'xdr:absoluteAnchor'];

export interface CellAnchor {
  row: number;
  column: number;
}

/** an anchor that holds a chart, and the relationship to its part */
export interface ChartAnchor {
  node: XMLNode;
  relationship: string;
  name?: string;
  from?: CellAnchor;
  to?: CellAnchor;
}

/** empty drawing root (xdr:wsDr) */
export const CreateDrawing = (): XMLNode => CreateNode({
  'xmlns:xdr': 'http://schemas.openxmlformats.org/drawingml/2006/spreadsheetDrawing',
  'xmlns:a': 'http://schemas.openxmlformats.org/drawingml/2006/main',
});

/** every anchor in the drawing, any kind */
export const AllAnchors = (root: XMLNode): XMLNode[] => {
  return anchor_types.flatMap(type => Children(root, type));
};

/** zero-based corner in the file, one-based here */
const Corner = (node: XMLNode | undefined): CellAnchor | undefined => {
  if (!node) {
    return undefined;
  }
  const row = Number(Text(Child(node, 'xdr:row')));
  const column = Number(Text(Child(node, 'xdr:col')));
  if (!Number.isInteger(row) || !Number.isInteger(column)) {
    return undefined;
  }
  return { row: row + 1, column: column + 1 };
};

/**
 * anchors holding charts. pictures, shapes and anything else stay in
 * the drawing but aren't listed.
 */
export const ChartAnchors = (root: XMLNode): ChartAnchor[] => {

  const list: ChartAnchor[] = [];

  for (const node of AllAnchors(root)) {
    const frame = Child(node, 'xdr:graphicFrame');
    const chart = FindAll(frame, 'a:graphic/a:graphicData/c:chart')[0];
    const relationship = Attr(chart, 'r:id');
    if (frame && relationship) {
      list.push({
        node,
        relationship,
        name: Attr(FindAll(frame, 'xdr:nvGraphicFramePr/xdr:cNvPr')[0], 'name'),
        from: Corner(Child(node, 'xdr:from')),
        to: Corner(Child(node, 'xdr:to')),
      });
    }
  }

  return list;

};

/** highest shape id in the drawing, so new shapes don't collide */
export const MaxShapeId = (root: XMLNode): number => {

  let max = 0;

  const Walk = (node: XMLNode) => {
    for (const [key, children] of Object.entries(node)) {
      for (const child of children) {
        if (key === 'xdr:cNvPr') {
          max = Math.max(max, Number(Attr(child, 'id')) || 0);
        }
        Walk(child);
      }
    }
  };

  AllAnchors(root).forEach(Walk);
  return max;

};

const CornerNode = (corner: CellAnchor): XMLNode => CreateNode({}, {
  'xdr:col': [CreateNode({}, {}, String(corner.column - 1))],
  'xdr:colOff': [CreateNode({}, {}, '0')],
  'xdr:row': [CreateNode({}, {}, String(corner.row - 1))],
  'xdr:rowOff': [CreateNode({}, {}, '0')],
});

/**
 * two-cell anchor for a new chart. size comes from the chart's width
 * and height in cells; the frame extent is nominal (applications size
 * the frame from the anchor).
 */
export const CreateChartAnchor = (chart: Chart, relationship: string, shape_id: number): XMLNode => {

  const from = { row: chart.anchor.row, column: chart.anchor.column };
  const to = { row: chart.anchor.row + chart.height, column: chart.anchor.column + chart.width };

  return CreateNode({}, {
    'xdr:from': [CornerNode(from)],
    'xdr:to': [CornerNode(to)],
    'xdr:graphicFrame': [CreateNode({ macro: '' }, {
      'xdr:nvGraphicFramePr': [CreateNode({}, {
        'xdr:cNvPr': [CreateNode({ id: shape_id, name: chart.name })],
        'xdr:cNvGraphicFramePr': [CreateNode()],
      })],
      'xdr:xfrm': [CreateNode({}, {
        'a:off': [CreateNode({ x: 0, y: 0 })],
        'a:ext': [CreateNode({ cx: chart.width * 64 * pixel_offset, cy: chart.height * 20 * pixel_offset })],
      })],
      'a:graphic': [CreateNode({}, {
        'a:graphicData': [CreateNode({ uri: 'http://schemas.openxmlformats.org/drawingml/2006/chart' }, {
          'c:chart': [CreateNode({
            'xmlns:c': 'http://schemas.openxmlformats.org/drawingml/2006/chart',
            'xmlns:r': 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
            'r:id': relationship,
          })],
        })],
      })],
    })],
    'xdr:clientData': [CreateNode()],
  });

};

/** remove an anchor node, whatever kind it is */
export const RemoveAnchor = (root: XMLNode, node: XMLNode): void => {
  for (const type of anchor_types) {
    const list = Children(root, type);
    if (list.includes(node)) {
      root[type] = list.filter(test => test !== node);
    }
  }
};
