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
import { GenkitError } from 'genkit';
import type { ResolvedConfig } from '../config.js';
import { logger } from '../logger.js';
import {
  deidentifyTemplatePath,
  inspectTemplatePath,
  locationPath,
} from '../names.js';
import {
  advancedSdpTemplateConfig,
  baseTemplateConfig,
  basicSdpTemplateConfig,
  fromTemplate,
  loggingTemplateConfig,
  maliciousUriTemplateConfig,
  piAndJailbreakTemplateConfig,
  toFilterConfig,
  toTemplateMetadata,
} from '../template-config.js';
import { TemplateManager, type TemplateField } from '../templates.js';
import type { Template, TemplateConfig } from '../types.js';
import {
  parseLabels,
  parseTemplateConfig,
  printJson,
  resolveTemplateName,
  runWithClient,
  type TargetOptions,
} from '../utils/command-utils.js';

export const TEMPLATE_PRESETS = [
  'base',
  'basic-sdp',
  'advanced-sdp',
  'malicious-uri',
  'pi-and-jailbreak',
  'logging',
] as const;
export type TemplatePreset = (typeof TEMPLATE_PRESETS)[number];

function isPreset(value: string): value is TemplatePreset {
  return TEMPLATE_PRESETS.some((p) => p === value);
}

/**
 * Template configuration for a named preset. The advanced SDP preset points
 * at the configured DLP templates.
 */
export function presetConfig(
  preset: string,
  config: ResolvedConfig
): TemplateConfig {
  if (!isPreset(preset)) {
    throw new GenkitError({
      status: 'INVALID_ARGUMENT',
      message: `Unknown preset "${preset}", expected one of ${TEMPLATE_PRESETS.join(', ')}.`,
    });
  }
  switch (preset) {
    case 'base':
      return baseTemplateConfig();
    case 'basic-sdp':
      return basicSdpTemplateConfig();
    case 'advanced-sdp':
      return advancedSdpTemplateConfig(
        inspectTemplatePath(
          config.projectId,
          config.location,
          config.inspectTemplateId
        ),
        deidentifyTemplatePath(
          config.projectId,
          config.location,
          config.deidentifyTemplateId
        )
      );
    case 'malicious-uri':
      return maliciousUriTemplateConfig();
    case 'pi-and-jailbreak':
      return piAndJailbreakTemplateConfig();
    case 'logging':
      return loggingTemplateConfig();
  }
}

interface UpdateOptions {
  labels?: string;
  config?: string;
}

/**
 * Builds a partial template and its field mask from the update flags. Only
 * the parts named by flags are sent.
 */
export function buildTemplateUpdate(
  name: string,
  options: UpdateOptions
): { template: Template; updateMask: TemplateField[] } {
  const template: Template = { name };
  const updateMask: TemplateField[] = [];
  if (options.labels !== undefined) {
    template.labels = parseLabels(options.labels);
    updateMask.push('labels');
  }
  if (options.config !== undefined) {
    const config = parseTemplateConfig(options.config);
    template.filterConfig = toFilterConfig(config);
    updateMask.push('filter_config');
    if (config.metadata) {
      template.templateMetadata = toTemplateMetadata(config.metadata);
      updateMask.push('template_metadata');
    }
  }
  if (updateMask.length === 0) {
    throw new GenkitError({
      status: 'INVALID_ARGUMENT',
      message: 'Nothing to update, pass --labels and/or --config.',
    });
  }
  return { template, updateMask };
}

function printTemplate(template: Template) {
  printJson(template.name ?? 'Template', fromTemplate(template));
}

interface CreateOptions {
  preset: string;
  config?: string;
  labels?: string;
}

export const templateCreate = new Command('template:create')
  .description('create a Model Armor template')
  .argument('<templateId>', 'id of the new template')
  .option('--preset <name>', `one of ${TEMPLATE_PRESETS.join(', ')}`, 'base')
  .option('--config <JSON>', 'template configuration, overrides --preset')
  .option('--labels <JSON>', 'labels as a JSON object')
  .action(
    async (templateId: string, options: CreateOptions, command: Command) => {
      const target: TargetOptions = command.optsWithGlobals();
      await runWithClient(target, async ({ config, client }) => {
        const templateConfig = options.config
          ? parseTemplateConfig(options.config)
          : presetConfig(options.preset, config);
        if (options.labels !== undefined) {
          templateConfig.labels = parseLabels(options.labels);
        }
        const template = await new TemplateManager(client).create(
          locationPath(config.projectId, config.location),
          templateId,
          templateConfig
        );
        logger.info(`Created template ${template.name}`);
        printTemplate(template);
      });
    }
  );

export const templateGet = new Command('template:get')
  .description('print a Model Armor template')
  .argument('<template>', 'template id or full name')
  .action(async (idOrName: string, _options: object, command: Command) => {
    const target: TargetOptions = command.optsWithGlobals();
    await runWithClient(target, async ({ config, client }) => {
      const template = await new TemplateManager(client).get(
        resolveTemplateName(idOrName, config)
      );
      printTemplate(template);
    });
  });

interface ListOptions {
  filter?: string;
  orderBy?: string;
}

export const templateList = new Command('template:list')
  .description('list the Model Armor templates of a location')
  .option('--filter <expression>', 'server-side filter, e.g. labels.env="prod"')
  .option('--order-by <field>', 'sort order')
  .action(async (options: ListOptions, command: Command) => {
    const target: TargetOptions = command.optsWithGlobals();
    await runWithClient(target, async ({ config, client }) => {
      let count = 0;
      for await (const template of new TemplateManager(client).list(
        locationPath(config.projectId, config.location),
        { filter: options.filter, orderBy: options.orderBy }
      )) {
        logger.info(template.name ?? '');
        count++;
      }
      logger.info(`${count} template(s).`);
    });
  });

export const templateUpdate = new Command('template:update')
  .description('update the labels or filters of a Model Armor template')
  .argument('<template>', 'template id or full name')
  .option('--labels <JSON>', 'replacement labels as a JSON object')
  .option('--config <JSON>', 'replacement template configuration')
  .action(
    async (idOrName: string, options: UpdateOptions, command: Command) => {
      const target: TargetOptions = command.optsWithGlobals();
      await runWithClient(target, async ({ config, client }) => {
        const { template, updateMask } = buildTemplateUpdate(
          resolveTemplateName(idOrName, config),
          options
        );
        const updated = await new TemplateManager(client).update(
          template,
          updateMask
        );
        logger.info(`Updated ${updateMask.join(', ')} of ${updated.name}`);
        printTemplate(updated);
      });
    }
  );

export const templateDelete = new Command('template:delete')
  .description('delete a Model Armor template')
  .argument('<template>', 'template id or full name')
  .action(async (idOrName: string, _options: object, command: Command) => {
    const target: TargetOptions = command.optsWithGlobals();
    await runWithClient(target, async ({ config, client }) => {
      const name = resolveTemplateName(idOrName, config);
      await new TemplateManager(client).delete(name);
      logger.info(`Deleted template ${name}`);
    });
  });
