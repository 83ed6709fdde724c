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

import type { ModelArmorApi } from './client.js';
import { logger } from './logger.js';
import {
  toFilterConfig,
  toTemplate,
  toTemplateMetadata,
} from './template-config.js';
import type {
  FilterSettings,
  Template,
  TemplateConfig,
  TemplateMetadata,
} from './types.js';

/** Field mask paths accepted by template updates. */
export type TemplateField = 'labels' | 'filter_config' | 'template_metadata';

export interface ListTemplatesOptions {
  /** Server-side filter expression, e.g. `labels.env="prod"`. */
  filter?: string;
  orderBy?: string;
  pageSize?: number;
}

/**
 * Create, read, update and delete Model Armor templates.
 *
 * Every method is a single remote call. RPC errors (NOT_FOUND,
 * ALREADY_EXISTS, ...) reach the caller unchanged.
 */
export class TemplateManager {
  constructor(private readonly client: ModelArmorApi) {}

  /**
   * Creates a template under `parent` (`projects/{p}/locations/{l}`).
   */
  async create(
    parent: string,
    templateId: string,
    config: TemplateConfig
  ): Promise<Template> {
    const [template] = await this.client.createTemplate({
      parent,
      templateId,
      template: toTemplate(config),
    });
    logger.debug(`Created template ${template.name}`);
    return template;
  }

  async get(name: string): Promise<Template> {
    const [template] = await this.client.getTemplate({ name });
    return template;
  }

  /**
   * Lazily lists the templates under `parent`. Pages are fetched as the
   * sequence is consumed; each iteration starts over from the first page.
   */
  list(
    parent: string,
    options: ListTemplatesOptions = {}
  ): AsyncIterable<Template> {
    const client = this.client;
    return {
      [Symbol.asyncIterator]() {
        const templates = client.listTemplatesAsync({ parent, ...options });
        return templates[Symbol.asyncIterator]();
      },
    };
  }

  async listAll(
    parent: string,
    options: ListTemplatesOptions = {}
  ): Promise<Template[]> {
    const templates: Template[] = [];
    for await (const template of this.list(parent, options)) {
      templates.push(template);
    }
    return templates;
  }

  /**
   * Updates the fields of `template` named in `updateMask`. Fields outside
   * the mask are left as they are on the server.
   */
  async update(
    template: Template,
    updateMask: TemplateField[]
  ): Promise<Template> {
    const [updated] = await this.client.updateTemplate({
      template,
      updateMask: { paths: updateMask },
    });
    logger.debug(`Updated template ${updated.name} (${updateMask.join(', ')})`);
    return updated;
  }

  updateLabels(name: string, labels: Record<string, string>) {
    return this.update({ name, labels: { ...labels } }, ['labels']);
  }

  updateFilterConfig(name: string, settings: FilterSettings) {
    return this.update({ name, filterConfig: toFilterConfig(settings) }, [
      'filter_config',
    ]);
  }

  updateMetadata(name: string, metadata: TemplateMetadata) {
    return this.update(
      { name, templateMetadata: toTemplateMetadata(metadata) },
      ['template_metadata']
    );
  }

  /** Deletes a template. Deleting it again fails with NOT_FOUND. */
  async delete(name: string): Promise<void> {
    await this.client.deleteTemplate({ name });
    logger.debug(`Deleted template ${name}`);
  }
}
