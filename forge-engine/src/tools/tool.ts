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
import { ValidationError } from 'forge-base-types';
import type { EngineConfig } from '../config';
import type { Logger } from '../logger';
import type { WorkbookStore } from '../workbook-store';
import { Workspace } from './workspace';

/** what every tool can reach, whatever file it works on */
export interface ToolContext {
  store: WorkbookStore;
  config: EngineConfig;
  logger: Logger;
}

/**
 * a tool as the host sees it. arguments arrive unchecked; the tool
 * validates them against its schema.
 */
export interface Tool {
  name: string;
  description: string;
  schema: z.ZodTypeAny;

  /** true if the tool changes the workbook (and so saves it) */
  mutates: boolean;

  Invoke(args: unknown, context: ToolContext): Promise<unknown>;
}

/**
 * tools that work on one workbook. read tools open a session and never
 * save; write tools save if they return normally.
 */
export interface SessionToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
  mode: 'read' | 'write';
  Run(args: z.infer<S>, workspace: Workspace): unknown;
}

/** tools that manage files themselves (creating a workbook) */
export interface FileToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
  mutates: boolean;
  Run(args: z.infer<S>, context: ToolContext): unknown;
}

const file_arguments = z.object({ filepath: z.string().min(1) }).passthrough();

/**
 * validate arguments. every problem is listed in the message.
 */
export const ParseArguments = <S extends z.ZodTypeAny>(tool: string, schema: S, args: unknown): z.infer<S> => {
  const result = schema.safeParse(args);
  if (!result.success) {
    const problems = result.error.issues.map(issue =>
      `${issue.path.length ? issue.path.join('.') : 'arguments'}: ${issue.message}`);
    throw new ValidationError(`invalid arguments for ${tool}: ${problems.join('; ')}`);
  }
  return result.data;
};

export const DefineTool = <S extends z.ZodTypeAny>(definition: SessionToolDefinition<S>): Tool => ({
  name: definition.name,
  description: definition.description,
  schema: definition.schema,
  mutates: definition.mode === 'write',
  Invoke: async (args, context) => {

    const { filepath } = ParseArguments(definition.name, file_arguments, args);
    const parsed = ParseArguments(definition.name, definition.schema, args);
    const file = context.store.Resolve(filepath);

    return context.store.WithSession(file, async session => {
      const result = await definition.Run(parsed, new Workspace(session, context));
      if (definition.mode === 'write') {
        session.workbook.dirty = true;
      }
      return result;
    });

  },
});

export const DefineFileTool = <S extends z.ZodTypeAny>(definition: FileToolDefinition<S>): Tool => ({
  name: definition.name,
  description: definition.description,
  schema: definition.schema,
  mutates: definition.mutates,
  Invoke: async (args, context) => {
    const parsed = ParseArguments(definition.name, definition.schema, args);
    return definition.Run(parsed, context);
  },
});
