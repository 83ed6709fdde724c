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

import { beforeEach, describe, expect, it } from '@jest/globals';
import { Status } from 'google-gax';
import { locationPath, templatePath } from '../src/names.js';
import {
  baseTemplateConfig,
  fromTemplate,
  labeledTemplateConfig,
} from '../src/template-config.js';
import { TemplateManager } from '../src/templates.js';
import type { Template } from '../src/types.js';
import { FakeModelArmorService } from './fakes.js';

const PARENT = locationPath('test-project', 'us-central1');
const NAME = templatePath('test-project', 'us-central1', 'test-template');

async function names(iterable: AsyncIterable<Template>): Promise<string[]> {
  const result: string[] = [];
  for await (const template of iterable) result.push(template.name ?? '');
  return result;
}

describe('TemplateManager', () => {
  let service: FakeModelArmorService;
  let templates: TemplateManager;

  beforeEach(() => {
    service = new FakeModelArmorService();
    templates = new TemplateManager(service);
  });

  it('returns the RAI filters it was created with', async () => {
    const created = await templates.create(
      PARENT,
      'test-template',
      baseTemplateConfig()
    );
    expect(created.name).toBe(NAME);

    const fetched = await templates.get(NAME);
    const filters = fromTemplate(fetched).raiFilters;
    expect(filters).toHaveLength(4);
    expect(filters).toEqual(baseTemplateConfig().raiFilters);
  });

  it('fails with ALREADY_EXISTS for a taken id', async () => {
    await templates.create(PARENT, 'test-template', baseTemplateConfig());
    await expect(
      templates.create(PARENT, 'test-template', baseTemplateConfig())
    ).rejects.toMatchObject({ code: Status.ALREADY_EXISTS });
  });

  it('fails with NOT_FOUND for an unknown location', async () => {
    await expect(
      templates.create(
        locationPath('test-project', 'nowhere-1'),
        'test-template',
        baseTemplateConfig()
      )
    ).rejects.toMatchObject({ code: Status.NOT_FOUND });
  });

  it('fails with NOT_FOUND after deletion, and on a second delete', async () => {
    await templates.create(PARENT, 'test-template', baseTemplateConfig());
    await templates.delete(NAME);

    await expect(templates.get(NAME)).rejects.toMatchObject({
      code: Status.NOT_FOUND,
    });
    await expect(templates.delete(NAME)).rejects.toMatchObject({
      code: Status.NOT_FOUND,
    });
  });

  it('lists created templates and not deleted ones', async () => {
    await templates.create(PARENT, 'test-template', baseTemplateConfig());
    await templates.create(PARENT, 'other-template', baseTemplateConfig());
    expect(await names(templates.list(PARENT))).toEqual([
      templatePath('test-project', 'us-central1', 'other-template'),
      NAME,
    ]);

    await templates.delete(NAME);
    expect(await names(templates.list(PARENT))).toEqual([
      templatePath('test-project', 'us-central1', 'other-template'),
    ]);
  });

  it('lists lazily and restarts on each iteration', async () => {
    await templates.create(PARENT, 'test-template', baseTemplateConfig());
    const listing = templates.list(PARENT);
    expect(service.listCalls).toBe(0);

    expect(await names(listing)).toEqual([NAME]);
    expect(await names(listing)).toEqual([NAME]);
    expect(service.listCalls).toBe(2);
  });

  it('passes the filter and order to the service', async () => {
    await templates.create(
      PARENT,
      'prod-template',
      labeledTemplateConfig({ env: 'prod' })
    );
    await templates.create(
      PARENT,
      'dev-template',
      labeledTemplateConfig({ env: 'dev' })
    );

    expect(
      await templates.listAll(PARENT, {
        filter: 'labels.env="prod"',
        orderBy: 'name desc',
      })
    ).toEqual([
      expect.objectContaining({
        name: templatePath('test-project', 'us-central1', 'prod-template'),
      }),
    ]);
    expect(service.requestsTo('listTemplates')).toEqual([
      { parent: PARENT, filter: 'labels.env="prod"', orderBy: 'name desc' },
    ]);
  });

  it('changes only labels with the labels mask', async () => {
    const created = await templates.create(
      PARENT,
      'test-template',
      labeledTemplateConfig({ key1: 'value1', key2: 'value2' })
    );

    const updated = await templates.updateLabels(NAME, {
      key1: 'updatedvalue1',
      key2: 'updatedvalue2',
    });

    expect(updated.labels).toEqual({
      key1: 'updatedvalue1',
      key2: 'updatedvalue2',
    });
    expect(updated.filterConfig).toEqual(created.filterConfig);
    expect(service.requestsTo('updateTemplate')).toEqual([
      {
        template: {
          name: NAME,
          labels: { key1: 'updatedvalue1', key2: 'updatedvalue2' },
        },
        updateMask: { paths: ['labels'] },
      },
    ]);
  });

  it('replaces the filter configuration with the filter_config mask', async () => {
    await templates.create(
      PARENT,
      'test-template',
      labeledTemplateConfig({ env: 'test' })
    );

    const updated = await templates.updateFilterConfig(NAME, {
      maliciousUris: true,
    });

    expect(fromTemplate(updated)).toEqual({
      maliciousUris: true,
      labels: { env: 'test' },
    });
  });

  it('updates metadata with the template_metadata mask', async () => {
    await templates.create(PARENT, 'test-template', baseTemplateConfig());

    const updated = await templates.updateMetadata(NAME, {
      logSanitizeOperations: true,
    });

    expect(fromTemplate(updated).metadata).toEqual({
      logSanitizeOperations: true,
    });
    expect(fromTemplate(updated).raiFilters).toHaveLength(4);
  });

  it('fails with NOT_FOUND when updating a missing template', async () => {
    await expect(
      templates.updateLabels(NAME, { key: 'value' })
    ).rejects.toMatchObject({ code: Status.NOT_FOUND });
  });
});
