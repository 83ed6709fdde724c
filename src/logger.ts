/**
 * Copyright 2025 Google LLC
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import * as clc from 'colorette';
import * as winston from 'winston';

/**
 * Formats a log line. Anything logged at 'info' level shows as just the plain
 * message; other levels get a bold, colored prefix.
 */
export function formatLine(level: string, message: unknown): string {
  const text = typeof message === 'string' ? message : String(message);
  if (level === 'info') return text;

  let levelColor: clc.Color;
  switch (level) {
    case 'error':
      levelColor = clc.red;
      break;
    case 'warn':
      levelColor = clc.yellow;
      break;
    default:
      levelColor = (t) => t.toString();
      break;
  }

  const label = level.charAt(0).toUpperCase() + level.slice(1);
  return `${clc.bold(levelColor(label))}: ${text}`;
}

export const logger = winston.createLogger({
  level: process.env.DEBUG ? 'debug' : 'info',
  format: winston.format.printf((log) => formatLine(log.level, log.message)),
  transports: [new winston.transports.Console()],
});
