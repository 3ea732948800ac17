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

import { ParseXML, BuildXML, FindAll, Attr, type DOMContent } from './xml-utils';
import type { ZipWrapper } from './zip-wrapper';

export interface Relationship {
  id: string,
  type: string,
  target: string,
  mode?: string;
}

export type RelationshipMap = Record<string, Relationship>;

const base = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

export const RelationshipType = {
  worksheet: `${base}/worksheet`,
  styles: `${base}/styles`,
  shared_strings: `${base}/sharedStrings`,
  theme: `${base}/theme`,
  drawing: `${base}/drawing`,
  chart: `${base}/chart`,
  table: `${base}/table`,
  office_document: `${base}/officeDocument`,
  custom_properties: `${base}/custom-properties`,
} as const;

/**
 * add a relationship, returning its id. ids are rIdN with N one past
 * the highest number in use, so loaded ids never collide.
 */
export const AddRel = (map: RelationshipMap, type: string, target: string, mode?: string): string => {
  const index = Object.keys(map).reduce((max, id) => {
    const match = id.match(/^rId(\d+)$/);
    return match ? Math.max(max, Number(match[1])) : max;
  }, 0) + 1;
  const rel = `rId${index}`;
  map[rel] = { id: rel, type, target, mode };
  return rel;
};

/** path of the rels part for a part: xl/worksheets/sheet1.xml -> xl/worksheets/_rels/sheet1.xml.rels */
export const RelsPath = (part: string): string => {
  const index = part.lastIndexOf('/');
  return `${part.substring(0, index + 1)}_rels/${part.substring(index + 1)}.rels`;
};

/**
 * resolve a relationship target against the part that owns it. targets
 * are relative to the owner's directory, or absolute from the package
 * root if they start with /.
 */
export const ResolveTarget = (owner: string, target: string): string => {

  if (target.startsWith('/')) {
    return target.substring(1);
  }

  const parts = owner.split('/').slice(0, -1);
  for (const segment of target.split('/')) {
    if (segment === '..') {
      parts.pop();
    }
    else if (segment !== '.') {
      parts.push(segment);
    }
  }

  return parts.join('/');

};

/**
 * target for a part, relative to the owner's directory. the inverse of
 * ResolveTarget, for the layouts we write (siblings and cousins).
 */
export const RelativeTarget = (owner: string, part: string): string => {
  const from = owner.split('/').slice(0, -1);
  const to = part.split('/');
  let common = 0;
  while (common < from.length && common < to.length - 1 && from[common] === to[common]) {
    common++;
  }
  return [...from.slice(common).map(() => '..'), ...to.slice(common)].join('/');
};

export const ReadRels = (zip: ZipWrapper, path: string): RelationshipMap => {

  const rels: RelationshipMap = {};
  if (!zip.Has(path)) {
    return rels;
  }

  for (const relationship of FindAll(ParseXML(zip.Get(path)), 'Relationships/Relationship')) {
    const id = Attr(relationship, 'Id');
    const type = Attr(relationship, 'Type');
    const target = Attr(relationship, 'Target');
    if (id && type && target !== undefined) {
      rels[id] = { id, type, target, mode: Attr(relationship, 'TargetMode') };
    }
  }

  return rels;

};

/**
 * write a rels part. an empty map removes the part.
 */
export const WriteRels = (zip: ZipWrapper, rels: RelationshipMap, path: string): void => {

  const keys = Object.keys(rels);

  if (!keys.length) {
    zip.Delete(path);
    return;
  }

  const dom: DOMContent = {
    Relationships: {
      a$: { xmlns: 'http://schemas.openxmlformats.org/package/2006/relationships' },
      Relationship: keys.map(key => {
        const rel = rels[key];
        return {
          a$: { Id: rel.id, Type: rel.type, Target: rel.target, TargetMode: rel.mode },
        };
      }),
    },
  };

  zip.Set(path, BuildXML(dom));

};

/** find the first relationship of a type */
export const FindRel = (rels: RelationshipMap, type: string): Relationship | undefined => {
  return Object.values(rels).find(rel => rel.type === type);
};
