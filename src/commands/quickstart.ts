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
import { getErrorDetails } from '../errors.js';
import { logger } from '../logger.js';
import { locationPath, templatePath, uniqueId } from '../names.js';
import { Sanitizer } from '../sanitizer.js';
import { baseTemplateConfig } from '../template-config.js';
import { TemplateManager } from '../templates.js';
import {
  printJson,
  runWithClient,
  type TargetOptions,
} from '../utils/command-utils.js';
import { verdict } from './sanitize.js';

export const QUICKSTART_PROMPT =
  'How do I make cheesecake without an oven at home?';
export const QUICKSTART_RESPONSE =
  'There are several ways to make a no-bake cheesecake at home.';

interface QuickstartOptions {
  keep: boolean;
}

/** Command that walks through creating a template and sanitizing with it. */
export const quickstart = new Command('quickstart')
  .description(
    'create a template with RAI filters, sanitize a prompt and a response'
  )
  .argument('[templateId]', 'id of the template to create')
  .option('--keep', 'keep the template afterwards', false)
  .action(
    async (
      templateId: string | undefined,
      options: QuickstartOptions,
      command: Command
    ) => {
      const target: TargetOptions = command.optsWithGlobals();
      await runWithClient(target, async ({ config, client }) => {
        const templates = new TemplateManager(client);
        const id = templateId ?? `quickstart-${uniqueId()}`;
        const template = await templates.create(
          locationPath(config.projectId, config.location),
          id,
          baseTemplateConfig()
        );
        const name =
          template.name ?? templatePath(config.projectId, config.location, id);
        logger.info(`Created template ${name}`);
        try {
          const sanitizer = new Sanitizer(client);
          const prompt = await sanitizer.sanitizePrompt(
            name,
            QUICKSTART_PROMPT
          );
          logger.info(`Prompt: ${verdict(prompt.sanitizationResult)}`);
          printJson('Prompt result', prompt.sanitizationResult);

          const response = await sanitizer.sanitizeResponse(
            name,
            QUICKSTART_RESPONSE,
            QUICKSTART_PROMPT
          );
          logger.info(`Response: ${verdict(response.sanitizationResult)}`);
          printJson('Response result', response.sanitizationResult);
        } finally {
          if (!options.keep) {
            await deleteTemplate(templates, name);
          }
        }
      });
    }
  );

async function deleteTemplate(
  templates: TemplateManager,
  name: string
): Promise<void> {
  try {
    await templates.delete(name);
    logger.info(`Deleted template ${name}`);
  } catch (e) {
    logger.warn(`Could not delete template ${name}: ${getErrorDetails(e)}`);
  }
}
