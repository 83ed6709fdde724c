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
import type { ResolvedConfig } from '../src/config.js';
import { ModelArmorFixture } from '../src/fixture.js';
import { fromTemplate } from '../src/template-config.js';
import { FakeDlpService, FakeModelArmorService, rpcError } from './fakes.js';

const CONFIG: ResolvedConfig = {
  projectId: 'test-project',
  location: 'us-central1',
  inspectTemplateId: 'dlp-inspect-template-1',
  deidentifyTemplateId: 'dlp-deidentify-template-1',
};

const INSPECT_NAME =
  'projects/test-project/locations/us-central1/inspectTemplates/dlp-inspect-template-1';
const DEIDENTIFY_NAME =
  'projects/test-project/locations/us-central1/deidentifyTemplates/dlp-deidentify-template-1';

describe('ModelArmorFixture', () => {
  let service: FakeModelArmorService;
  let dlpService: FakeDlpService;
  let fixture: ModelArmorFixture;

  beforeEach(() => {
    service = new FakeModelArmorService();
    dlpService = new FakeDlpService();
    fixture = new ModelArmorFixture({
      client: service,
      dlpClient: dlpService,
      config: CONFIG,
    });
  });

  it('names templates with a unique suffix', () => {
    expect(fixture.generateUniqueId()).toMatch(/^[0-9a-f]{8}$/);
    expect(fixture.templateName('test-ma')).toMatch(
      /^projects\/test-project\/locations\/us-central1\/templates\/test-ma-[0-9a-f]{8}$/
    );
  });

  it('creates the sample templates and removes them on dispose', async () => {
    await fixture.createBaseTemplate('base');
    await fixture.createBasicSdpTemplate('basic-sdp');
    await fixture.createMaliciousUriTemplate('uri');
    await fixture.createTemplateWithLabels({ key1: 'value1' }, 'labels');
    expect(service.templates.size).toBe(4);
    expect(fixture.pendingCleanups).toHaveLength(4);

    await fixture.dispose();

    expect(service.templates.size).toBe(0);
    expect(fixture.pendingCleanups).toHaveLength(0);
  });

  it('generates an id when none is given', async () => {
    const template = await fixture.createBaseTemplate();
    expect(template.name).toMatch(
      /^projects\/test-project\/locations\/us-central1\/templates\/test-template-[0-9a-f]{8}$/
    );
  });

  it('provisions DLP templates for advanced SDP', async () => {
    const template = await fixture.createAdvancedSdpTemplate('advanced');

    expect(fromTemplate(template).sdp).toEqual({
      mode: 'advanced',
      inspectTemplate: INSPECT_NAME,
      deidentifyTemplate: DEIDENTIFY_NAME,
    });
    expect(dlpService.inspectTemplates.has(INSPECT_NAME)).toBe(true);
    expect(dlpService.deidentifyTemplates.has(DEIDENTIFY_NAME)).toBe(true);

    await fixture.dispose();

    expect(service.templates.size).toBe(0);
    expect(dlpService.inspectTemplates.size).toBe(0);
    expect(dlpService.deidentifyTemplates.size).toBe(0);
  });

  it('keeps DLP templates it did not create', async () => {
    dlpService.inspectTemplates.set(INSPECT_NAME, { name: INSPECT_NAME });

    await fixture.createAdvancedSdpTemplate('advanced');
    await fixture.dispose();

    expect(dlpService.inspectTemplates.has(INSPECT_NAME)).toBe(true);
    expect(dlpService.deidentifyTemplates.size).toBe(0);
  });

  it('unregisters templates deleted explicitly', async () => {
    const template = await fixture.createBaseTemplate('base');

    await fixture.deleteTemplate(template.name ?? '');

    expect(fixture.pendingCleanups).toHaveLength(0);
    await expect(
      fixture.getTemplate(template.name ?? '')
    ).rejects.toMatchObject({ code: Status.NOT_FOUND });
  });

  it('updates templates through the field mask', async () => {
    const template = await fixture.createTemplateWithLabels(
      { key1: 'value1', key2: 'value2' },
      'labels'
    );

    const updated = await fixture.updateTemplate(
      {
        name: template.name,
        labels: { key1: 'updatedvalue1', key2: 'updatedvalue2' },
      },
      ['labels']
    );

    expect(updated.labels).toEqual({
      key1: 'updatedvalue1',
      key2: 'updatedvalue2',
    });
    expect(updated.filterConfig).toEqual(template.filterConfig);
  });

  it('keeps cleaning up after a failure', async () => {
    await fixture.createBaseTemplate('first');
    const second = await fixture.createBaseTemplate('second');
    service.failNext(
      'deleteTemplate',
      rpcError(Status.UNAVAILABLE, 'try again')
    );

    await fixture.dispose();

    // The most recent template is removed first, and that removal failed.
    expect([...service.templates.keys()]).toEqual([second.name]);
    expect(fixture.pendingCleanups).toHaveLength(0);
  });

  it('resets registered floor settings', async () => {
    const parent = { kind: 'project', id: 'test-project' } as const;
    await fixture.floorSettings.configure(
      parent,
      { maliciousUris: true },
      true
    );
    fixture.registerFloorSettingReset(parent);

    await fixture.dispose();

    expect(await fixture.floorSettings.get(parent)).toEqual({
      name: 'projects/test-project/locations/global/floorSetting',
      filterConfig: {},
      enableFloorSettingEnforcement: false,
    });
  });

  it('waits between creations when throttled', async () => {
    const throttled = new ModelArmorFixture({
      client: service,
      dlpClient: dlpService,
      config: CONFIG,
      throttleMs: 20,
    });
    const started = Date.now();

    await throttled.createBaseTemplate('throttled');

    expect(Date.now() - started).toBeGreaterThanOrEqual(15);
    await throttled.dispose();
  });
});
