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

import { Command } from 'commander';
import { floorGet, floorReset } from './commands/floor.js';
import { quickstart } from './commands/quickstart.js';
import {
  sanitizeBoth,
  sanitizePrompt,
  sanitizeResponse,
} from './commands/sanitize.js';
import {
  templateCreate,
  templateDelete,
  templateGet,
  templateList,
  templateUpdate,
} from './commands/template.js';
import { getErrorDetails } from './errors.js';
import { logger } from './logger.js';

/**
 * All commands need to be directly registered in this list.
 *
 * To add a new command to the CLI, create a file under src/commands that
 * exports a Command constant, then add it to the list below
 */
export const commands: Command[] = [
  templateCreate,
  templateGet,
  templateList,
  templateUpdate,
  templateDelete,
  sanitizePrompt,
  sanitizeResponse,
  sanitizeBoth,
  floorGet,
  floorReset,
  quickstart,
];

/** Builds the program with every command registered. */
export function buildProgram(): Command {
  const program = new Command()
    .name('modelarmor')
    .description('Model Armor templates, sanitization and floor settings')
    .option(
      '--project <id>',
      'Google Cloud project (default GOOGLE_CLOUD_PROJECT)'
    )
    .option(
      '--location <location>',
      'Model Armor location (default GOOGLE_CLOUD_LOCATION or us-central1)'
    );

  for (const command of commands) program.addCommand(command);
  program.addCommand(
    new Command('help').action(() => {
      logger.info(program.helpInformation());
    })
  );
  // Default action to catch unknown commands.
  program.action(() => {
    logger.info(program.helpInformation());
  });
  return program;
}

/** Main entry point for CLI. */
export async function startCLI(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    logger.error(getErrorDetails(error));
    process.exitCode = 1;
  }
}
