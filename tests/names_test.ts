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

import { describe, expect, it } from '@jest/globals';
import {
  deidentifyTemplatePath,
  floorSettingPath,
  inspectTemplatePath,
  locationPath,
  parseTemplateName,
  regionalEndpoint,
  templatePath,
  uniqueId,
} from '../src/names.js';

describe('resource names', () => {
  it('builds the regional endpoint', () => {
    expect(regionalEndpoint('us-central1')).toBe(
      'modelarmor.us-central1.rep.googleapis.com'
    );
  });

  it('builds template and location paths', () => {
    expect(locationPath('test-project', 'us-central1')).toBe(
      'projects/test-project/locations/us-central1'
    );
    expect(templatePath('test-project', 'us-central1', 'my-template')).toBe(
      'projects/test-project/locations/us-central1/templates/my-template'
    );
  });

  it('parses a template name', () => {
    expect(
      parseTemplateName(
        'projects/test-project/locations/europe-west4/templates/t-1'
      )
    ).toEqual({
      project: 'test-project',
      location: 'europe-west4',
      templateId: 't-1',
    });
  });

  it('rejects malformed template names', () => {
    expect(() =>
      parseTemplateName('projects/test-project/templates/t-1')
    ).toThrow(
      expect.objectContaining({
        status: 'INVALID_ARGUMENT',
        message: expect.stringContaining('Malformed template name'),
      })
    );
  });

  it('builds DLP template paths', () => {
    expect(inspectTemplatePath('p', 'us-central1', 'inspect-1')).toBe(
      'projects/p/locations/us-central1/inspectTemplates/inspect-1'
    );
    expect(deidentifyTemplatePath('p', 'us-central1', 'deid-1')).toBe(
      'projects/p/locations/us-central1/deidentifyTemplates/deid-1'
    );
  });

  it('builds floor setting paths in the global location', () => {
    expect(floorSettingPath({ kind: 'project', id: 'p' })).toBe(
      'projects/p/locations/global/floorSetting'
    );
    expect(floorSettingPath({ kind: 'folder', id: '123' })).toBe(
      'folders/123/locations/global/floorSetting'
    );
    expect(floorSettingPath({ kind: 'organization', id: '456' })).toBe(
      'organizations/456/locations/global/floorSetting'
    );
  });

  it('generates 8 hex character ids', () => {
    const id = uniqueId();
    expect(id).toMatch(/^[0-9a-f]{8}$/);
    expect(uniqueId()).not.toBe(id);
  });
});
