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

import * as he from 'he';
import { XMLBuilder, XMLParser, type X2jOptions, type XmlBuilderOptions } from 'fast-xml-parser';

export const XMLDeclaration = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n`;

export const attrs = Symbol('attrs');
export const text = Symbol('text');

/**
 * parsed element. every child element is an array, even when there's
 * only one, so callers never have to check.
 */
export interface XMLNode {
  [attrs]?: Record<string, string>;
  [text]?: string;
  [index: string]: XMLNode[];
}

/**
 * element in the form the builder takes: attributes grouped under `a$`,
 * text under `t$`. undefined attributes are dropped before building.
 */
export interface DOMContent {
  [index: string]: string | number | DOMContent | DOMContent[] | undefined;
}

export const IsXMLNode = (test: unknown): test is XMLNode => {
  return !!test && (typeof test === 'object') && !Array.isArray(test);
};

/**
 * group attributes under `a$`, text under `t$`, and force arrays for
 * every element. entities are decoded with he, in text and attributes,
 * so the parser doesn't need to know about them.
 */
const XMLOptions: Partial<X2jOptions> = {
  ignoreAttributes: false,
  attributesGroupName: 'a$',
  attributeNamePrefix: '',
  textNodeName: 't$',
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  processEntities: false,
  htmlEntities: false,
  isArray: (_name: string, _path: string, _leaf: boolean, attribute: boolean) => !attribute,
  tagValueProcessor: (_name: string, value: string) => he.decode(value),
  attributeValueProcessor: (_name: string, value: string) => he.decode(value),
};

const XMLBuilderOptions: Partial<XmlBuilderOptions> = {
  ignoreAttributes: false,
  attributesGroupName: 'a$',
  attributeNamePrefix: '',
  textNodeName: 't$',
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
  processEntities: true,
};

const parser = new XMLParser(XMLOptions);
const builder = new XMLBuilder(XMLBuilderOptions);

/**
 * convert string names to symbols and retype. whitespace between child
 * elements is dropped; text in leaf elements is kept as-is.
 */
const Translate = (parsed: unknown): XMLNode => {

  const translated: XMLNode = {};

  if (parsed === undefined || parsed === null || parsed === '') {
    return translated;
  }

  if (typeof parsed !== 'object') {
    translated[text] = String(parsed);
    return translated;
  }

  let has_children = false;
  let content: string | undefined;

  for (const [key, value] of Object.entries(parsed)) {
    switch (key) {
      case 'a$':
        if (value && typeof value === 'object') {
          const record: Record<string, string> = {};
          for (const [name, attribute] of Object.entries(value)) {
            record[name] = String(attribute);
          }
          translated[attrs] = record;
        }
        break;

      case 't$':
        content = value === undefined || value === null ? undefined : String(value);
        break;

      default:
        has_children = true;
        translated[key] = Array.isArray(value) ? value.map(entry => Translate(entry)) : [Translate(value)];
    }
  }

  if (content !== undefined && !(has_children && !content.trim())) {
    translated[text] = content;
  }

  return translated;

};

/**
 * parse xml text. the result is a node holding the root element (so
 * `ParseXML(data).worksheet[0]` is the worksheet).
 */
export const ParseXML = (data: string): XMLNode => {
  return Translate(parser.parse(data));
};

/**
 * filter attributes that have value === undefined, recursively
 */
export const ScrubXML = (dom: DOMContent): DOMContent => {
  const scrubbed: DOMContent = {};
  for (const [key, value] of Object.entries(dom)) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      scrubbed[key] = value.map(entry => ScrubXML(entry));
    }
    else if (typeof value === 'object') {
      scrubbed[key] = ScrubXML(value);
    }
    else {
      scrubbed[key] = value;
    }
  }
  return scrubbed;
};

/** parsed node -> builder form */
export const ToDOM = (node: XMLNode): DOMContent => {
  const dom: DOMContent = {};
  const attributes = node[attrs];
  if (attributes) {
    dom.a$ = { ...attributes };
  }
  for (const [key, children] of Object.entries(node)) {
    dom[key] = children.map(child => ToDOM(child));
  }
  const content = node[text];
  if (content !== undefined) {
    dom.t$ = content;
  }
  return dom;
};

/**
 * build xml text from a dom. the dom holds the root element, like the
 * parser's output.
 */
export const BuildXML = (dom: DOMContent, declaration = true): string => {
  const xml: string = builder.build(ScrubXML(dom));
  return declaration ? XMLDeclaration + xml : xml;
};

// --- accessors ---------------------------------------------------------------

export const Children = (node: XMLNode | undefined, name: string): XMLNode[] => {
  return node?.[name] || [];
};

export const Child = (node: XMLNode | undefined, name: string): XMLNode | undefined => {
  return node?.[name]?.[0];
};

/**
 * follow a path of element names (a/b/c), collecting every match at
 * the end. any step can be repeated.
 */
export const FindAll = (node: XMLNode | undefined, path: string): XMLNode[] => {
  let current: XMLNode[] = node ? [node] : [];
  for (const step of path.split('/')) {
    current = current.flatMap(entry => Children(entry, step));
  }
  return current;
};

export const Attr = (node: XMLNode | undefined, name: string): string | undefined => {
  return node?.[attrs]?.[name];
};

export const SetAttr = (node: XMLNode, name: string, value: string | undefined): void => {
  const attributes = node[attrs] || {};
  if (value === undefined) {
    delete attributes[name];
  }
  else {
    attributes[name] = value;
  }
  node[attrs] = attributes;
};

/**
 * text content. for elements that hold text in runs (<r><t>..</t></r>)
 * or in a <t> child, we concatenate those.
 */
export const Text = (node: XMLNode | undefined): string => {
  if (!node) {
    return '';
  }
  const content = node[text];
  if (content !== undefined) {
    return content;
  }
  const t = Child(node, 't');
  if (t) {
    return Text(t);
  }
  return Children(node, 'r').map(run => Text(Child(run, 't'))).join('');
};

/** true if the attribute is set to something truthy in ooxml terms */
export const Flag = (node: XMLNode | undefined, name: string, default_value = false): boolean => {
  const value = Attr(node, name);
  if (value === undefined) {
    return default_value;
  }
  return value === '1' || value === 'true';
};

/**
 * put an element's children in schema order. children not named in the
 * order list (extension markup, mc:AlternateContent) stay behind the
 * child they followed when we read them.
 */
export const Reorder = (node: DOMContent, order: string[]): DOMContent => {

  const known = new Set(order);
  const following: Map<string, string[]> = new Map([['', []]]);

  let previous = '';
  for (const key of Object.keys(node)) {
    if (key === 'a$' || key === 't$') {
      continue;
    }
    if (known.has(key)) {
      previous = key;
      continue;
    }
    const list = following.get(previous) || [];
    list.push(key);
    following.set(previous, list);
  }

  const ordered: DOMContent = {};
  if (node.a$ !== undefined) {
    ordered.a$ = node.a$;
  }

  const Append = (key: string) => {
    for (const extra of following.get(key) || []) {
      ordered[extra] = node[extra];
    }
  };

  Append('');
  for (const key of order) {
    if (node[key] !== undefined) {
      ordered[key] = node[key];
    }
    Append(key);
  }

  if (node.t$ !== undefined) {
    ordered.t$ = node.t$;
  }

  return ordered;

};

/**
 * create an element. attributes with undefined values are skipped.
 */
export const CreateNode = (
    attributes: Record<string, string | number | undefined> = {},
    children: Record<string, XMLNode[]> = {},
    content?: string): XMLNode => {

  const node: XMLNode = {};
  const record: Record<string, string> = {};
  let has_attributes = false;

  for (const [name, value] of Object.entries(attributes)) {
    if (value !== undefined) {
      record[name] = String(value);
      has_attributes = true;
    }
  }

  if (has_attributes) {
    node[attrs] = record;
  }

  for (const [name, list] of Object.entries(children)) {
    node[name] = list;
  }

  if (content !== undefined) {
    node[text] = content;
  }

  return node;

};

/** deep copy, symbols included */
export const CloneNode = (node: XMLNode): XMLNode => {
  const clone: XMLNode = {};
  const attributes = node[attrs];
  if (attributes) {
    clone[attrs] = { ...attributes };
  }
  for (const [key, children] of Object.entries(node)) {
    clone[key] = children.map(child => CloneNode(child));
  }
  const content = node[text];
  if (content !== undefined) {
    clone[text] = content;
  }
  return clone;
};
