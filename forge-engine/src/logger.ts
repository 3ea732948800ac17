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

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import type { EngineConfig } from './config';

export type { Logger };

/**
 * create a logger. output goes to stderr unless a destination is given;
 * stdout belongs to the transport.
 */
export const CreateLogger = (level: string, destination?: DestinationStream): Logger => {

  const options: LoggerOptions = {
    level,
    base: {
      service: 'sheetforge',
    },
  };

  return pino(options, destination || pino.destination(2));

};

/** logger for a configuration: the log file if there is one, else stderr */
export const ConfigLogger = (config: EngineConfig): Logger => {
  return CreateLogger(config.log_level,
    config.log_file ? pino.destination({ dest: config.log_file, mkdir: true, sync: true }) : undefined);
};
