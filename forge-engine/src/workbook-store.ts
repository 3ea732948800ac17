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

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { ConflictError, IsEngineError } from 'forge-base-types';
import { Workbook } from 'forge-data-model';
import { Importer, Exporter, Package } from 'forge-export';
import type { Logger } from './logger';
import type { EngineConfig } from './config';
import { ResolvePath, WORKBOOK_EXTENSIONS } from './path-policy';
import { SessionLock } from './session-lock';

/**
 * an open workbook. the package carries everything from the file we
 * don't model, so it has to go back through the exporter with the
 * workbook.
 */
export interface Session {
  path: string;
  workbook: Workbook;
  package: Package;

  /** false if the file did not exist when the session opened */
  exists: boolean;
}

const IsMissing = (err: unknown): boolean => {
  return !!err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT';
};

/**
 * loads and saves workbooks, one session per file at a time.
 */
export class WorkbookStore {

  protected lock = new SessionLock();

  constructor(protected config: EngineConfig, protected logger: Logger) {}

  /**
   * check a path against the policy. rejections are logged and
   * rethrown.
   */
  public Resolve(input: string, extensions = WORKBOOK_EXTENSIONS): string {
    try {
      return ResolvePath(input, this.config.files_path, extensions);
    }
    catch (err) {
      this.logger.warn({ path: input, err }, 'path rejected');
      throw err;
    }
  }

  /**
   * open a workbook. a missing file gives an empty workbook with one
   * sheet; it isn't written until the session saves.
   */
  public async Open(file: string): Promise<Session> {

    let data: Buffer;

    try {
      data = await fs.readFile(file);
    }
    catch (err) {
      if (IsMissing(err)) {
        const workbook = Workbook.Empty();
        workbook.dirty = false;
        return { path: file, workbook, package: Package.Create(), exists: false };
      }
      throw err;
    }

    const result = await Importer.Load(data);
    this.logger.debug({ path: file, sheets: result.workbook.sheets.length }, 'opened workbook');

    return { path: file, workbook: result.workbook, package: result.package, exists: true };

  }

  /**
   * check invariants, serialize, and replace the file. the new file is
   * written beside the target and renamed over it, so the old file
   * stays intact if anything fails.
   */
  public async Save(session: Session): Promise<void> {

    const released = session.workbook.ReleaseSharedFormulas();
    if (released) {
      this.logger.debug({ path: session.path, cells: released }, 'released shared formula dependents');
    }

    session.workbook.CheckInvariants();

    const data = await Exporter.Export(session.workbook, session.package);
    const temp = path.join(path.dirname(session.path),
      `.${path.basename(session.path)}.${process.pid}.${Date.now()}.tmp`);

    await fs.mkdir(path.dirname(session.path), { recursive: true });

    try {
      await fs.writeFile(temp, data);
      await fs.rename(temp, session.path);
    }
    catch (err) {
      await fs.rm(temp, { force: true });
      throw err;
    }

    session.exists = true;
    session.workbook.dirty = false;

    this.logger.debug({ path: session.path, bytes: data.length }, 'saved workbook');

  }

  /**
   * run a task in an exclusive session on a (resolved) path. if the
   * task succeeds and the workbook is dirty, the session saves. a task
   * that throws leaves the file alone.
   */
  public async WithSession<T>(file: string, task: (session: Session) => T | Promise<T>): Promise<T> {
    return this.lock.Run(file, async () => {
      const session = await this.Open(file);
      const result = await task(session);
      if (session.workbook.dirty) {
        await this.Save(session);
      }
      return result;
    });
  }

  /**
   * create a new workbook file. fails if the file exists.
   */
  public async Create(file: string): Promise<Session> {
    return this.lock.Run(file, async () => {

      try {
        await fs.access(file);
        throw new ConflictError(`file already exists: ${file}`);
      }
      catch (err) {
        if (IsEngineError(err) || !IsMissing(err)) {
          throw err;
        }
      }

      const session: Session = { path: file, workbook: Workbook.Empty(), package: Package.Create(), exists: false };
      await this.Save(session);
      return session;

    });
  }

}
