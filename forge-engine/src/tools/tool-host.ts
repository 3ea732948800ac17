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
import { IsEngineError, NotFoundError, type ErrorKind } from 'forge-base-types';
import type { EngineConfig } from '../config';
import type { Logger } from '../logger';
import { WorkbookStore } from '../workbook-store';
import { ParseArguments, type Tool, type ToolContext } from './tool';

export interface ToolRequest {
  tool: string;
  arguments?: unknown;
}

export interface ErrorResponse {
  status: 'error';
  error: {
    kind: ErrorKind;
    message: string;
    details?: Record<string, unknown>;
  };
}

export interface SuccessResponse {
  status: 'ok';
  result: unknown;
}

export type ToolResponse = SuccessResponse | ErrorResponse;

const request_schema = z.object({
  tool: z.string().min(1),
  arguments: z.unknown().optional(),
});

/**
 * the request/response boundary. a transport hands requests to
 * Dispatch and sends back whatever it returns. engine errors become
 * error responses; anything else is logged and thrown, since it is
 * not something the caller can fix.
 */
export class ToolHost {

  protected tools: Map<string, Tool> = new Map();
  protected context: ToolContext;

  constructor(config: EngineConfig, logger: Logger, tools: Tool[]) {
    this.context = { config, logger, store: new WorkbookStore(config, logger) };
    for (const tool of tools) {
      this.tools.set(tool.name, tool);
    }
  }

  /** tool names and descriptions, for listing */
  public List(): Array<{ name: string, description: string, mutates: boolean }> {
    return Array.from(this.tools.values()).map(({ name, description, mutates }) => ({ name, description, mutates }));
  }

  public async Dispatch(request: unknown): Promise<ToolResponse> {

    const start = Date.now();
    let name = 'unknown';
    let path: unknown;

    try {

      const { tool: tool_name, arguments: args } = ParseArguments('request', request_schema, request);
      name = tool_name;

      if (args && typeof args === 'object' && 'filepath' in args) {
        path = args.filepath;
      }

      const tool = this.tools.get(name);
      if (!tool) {
        throw new NotFoundError(`unknown tool: ${name}`);
      }

      const result = await tool.Invoke(args ?? {}, this.context);
      this.context.logger.info({ tool: name, path, duration: Date.now() - start }, 'tool call');

      return { status: 'ok', result };

    }
    catch (err) {

      if (IsEngineError(err)) {
        this.context.logger.info({ tool: name, path, duration: Date.now() - start, kind: err.kind }, err.message);
        return { status: 'error', error: err.toJSON() };
      }

      this.context.logger.error({ tool: name, path, err }, 'tool call failed');
      throw err;

    }

  }

}
