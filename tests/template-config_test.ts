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

import { protos } from '@google-cloud/modelarmor';
import { describe, expect, it } from '@jest/globals';
import {
  TemplateConfigSchema,
  advancedSdpTemplateConfig,
  baseTemplateConfig,
  basicSdpTemplateConfig,
  fromTemplate,
  labeledTemplateConfig,
  loggingTemplateConfig,
  maliciousUriTemplateConfig,
  piAndJailbreakTemplateConfig,
  toTemplate,
} from '../src/template-config.js';
import type { TemplateConfig } from '../src/types.js';

const v1 = protos.google.cloud.modelarmor.v1;

const INSPECT =
  'projects/test-project/locations/us-central1/inspectTemplates/inspect-1';
const DEIDENTIFY =
  'projects/test-project/locations/us-central1/deidentifyTemplates/deid-1';

describe('toTemplate', () => {
  it('writes the base RAI filters', () => {
    expect(toTemplate(baseTemplateConfig())).toEqual({
      filterConfig: {
        raiSettings: {
          raiFilters: [
            { filterType: 'DANGEROUS', confidenceLevel: 'HIGH' },
            { filterType: 'HATE_SPEECH', confidenceLevel: 'MEDIUM_AND_ABOVE' },
            {
              filterType: 'SEXUALLY_EXPLICIT',
              confidenceLevel: 'MEDIUM_AND_ABOVE',
            },
            { filterType: 'HARASSMENT', confidenceLevel: 'MEDIUM_AND_ABOVE' },
          ],
        },
      },
    });
  });

  it('writes basic SDP as an enforcement flag', () => {
    const template = toTemplate(basicSdpTemplateConfig());
    expect(template.filterConfig?.sdpSettings).toEqual({
      basicConfig: { filterEnforcement: 'ENABLED' },
    });
  });

  it('writes advanced SDP as template references', () => {
    expect(
      toTemplate(advancedSdpTemplateConfig(INSPECT, DEIDENTIFY)).filterConfig
        ?.sdpSettings
    ).toEqual({
      advancedConfig: {
        inspectTemplate: INSPECT,
        deidentifyTemplate: DEIDENTIFY,
      },
    });
  });

  it('writes the malicious URI and jailbreak filters', () => {
    expect(
      toTemplate(maliciousUriTemplateConfig()).filterConfig
        ?.maliciousUriFilterSettings
    ).toEqual({ filterEnforcement: 'ENABLED' });
    expect(
      toTemplate(piAndJailbreakTemplateConfig()).filterConfig
        ?.piAndJailbreakFilterSettings
    ).toEqual({
      filterEnforcement: 'ENABLED',
      confidenceLevel: 'MEDIUM_AND_ABOVE',
    });
  });

  it('writes name, labels and metadata', () => {
    const template = toTemplate(
      {
        ...labeledTemplateConfig({ key1: 'value1', key2: 'value2' }),
        metadata: loggingTemplateConfig().metadata,
      },
      'projects/p/locations/l/templates/t'
    );
    expect(template.name).toBe('projects/p/locations/l/templates/t');
    expect(template.labels).toEqual({ key1: 'value1', key2: 'value2' });
    expect(template.templateMetadata).toEqual({
      logTemplateOperations: true,
      logSanitizeOperations: true,
    });
  });
});

describe('fromTemplate', () => {
  it('reads back what toTemplate wrote', () => {
    const config: TemplateConfig = {
      ...advancedSdpTemplateConfig(INSPECT, DEIDENTIFY),
      maliciousUris: true,
      piAndJailbreak: { enabled: false, confidenceLevel: 'HIGH' },
      labels: { env: 'test' },
      metadata: { ignorePartialInvocationFailures: true },
    };
    expect(fromTemplate(toTemplate(config))).toEqual(config);
  });

  it('accepts enum numbers', () => {
    expect(
      fromTemplate({
        filterConfig: {
          raiSettings: {
            raiFilters: [
              {
                filterType: v1.RaiFilterType.DANGEROUS,
                confidenceLevel: v1.DetectionConfidenceLevel.HIGH,
              },
            ],
          },
          sdpSettings: {
            basicConfig: {
              filterEnforcement:
                v1.SdpBasicConfig.SdpBasicConfigEnforcement.ENABLED,
            },
          },
        },
      })
    ).toEqual({
      raiFilters: [{ filterType: 'DANGEROUS', confidenceLevel: 'HIGH' }],
      sdp: { mode: 'basic', enabled: true },
    });
  });

  it('rejects templates with both SDP modes set', () => {
    expect(() =>
      fromTemplate({
        filterConfig: {
          sdpSettings: {
            basicConfig: { filterEnforcement: 'ENABLED' },
            advancedConfig: { inspectTemplate: INSPECT },
          },
        },
      })
    ).toThrow(expect.objectContaining({ status: 'INVALID_ARGUMENT' }));
  });

  it('drops empty labels', () => {
    expect(fromTemplate({ labels: {} })).toEqual({});
  });
});

describe('TemplateConfigSchema', () => {
  it('accepts a tagged SDP configuration', () => {
    const parsed = TemplateConfigSchema.parse({
      sdp: { mode: 'advanced', inspectTemplate: INSPECT },
    });
    expect(parsed.sdp).toEqual({ mode: 'advanced', inspectTemplate: INSPECT });
  });

  it('rejects unknown RAI filter types', () => {
    const parsed = TemplateConfigSchema.safeParse({
      raiFilters: [{ filterType: 'RUDE', confidenceLevel: 'HIGH' }],
    });
    expect(parsed.success).toBe(false);
  });

  it('rejects an SDP configuration without a mode', () => {
    const parsed = TemplateConfigSchema.safeParse({
      sdp: { enabled: true, inspectTemplate: INSPECT },
    });
    expect(parsed.success).toBe(false);
  });
});
