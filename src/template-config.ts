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

import { GenkitError } from 'genkit';
import { z } from 'zod';
import {
  confidenceLevelOf,
  maliciousUriEnabled,
  piAndJailbreakEnabled,
  raiFilterTypeOf,
  sdpBasicEnabled,
} from './enums.js';
import {
  CONFIDENCE_LEVELS,
  RAI_FILTER_TYPES,
  type FilterConfig,
  type FilterSettings,
  type RaiFilter,
  type SdpConfig,
  type Template,
  type TemplateConfig,
  type TemplateMetadata,
  type TemplateMetadataMessage,
} from './types.js';

const RaiFilterSchema = z.object({
  filterType: z.enum(RAI_FILTER_TYPES),
  confidenceLevel: z.enum(CONFIDENCE_LEVELS),
});

const SdpConfigSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('basic'), enabled: z.boolean() }),
  z.object({
    mode: z.literal('advanced'),
    inspectTemplate: z.string().min(1),
    deidentifyTemplate: z.string().min(1).optional(),
  }),
]);

const TemplateMetadataSchema = z.object({
  logTemplateOperations: z.boolean().optional(),
  logSanitizeOperations: z.boolean().optional(),
  ignorePartialInvocationFailures: z.boolean().optional(),
  customPromptSafetyErrorCode: z.number().int().optional(),
  customPromptSafetyErrorMessage: z.string().optional(),
  customLlmResponseSafetyErrorCode: z.number().int().optional(),
  customLlmResponseSafetyErrorMessage: z.string().optional(),
});

/** Schema for template configurations read from JSON (e.g. CLI input). */
export const TemplateConfigSchema: z.ZodType<TemplateConfig> = z.object({
  raiFilters: z.array(RaiFilterSchema).optional(),
  piAndJailbreak: z
    .object({
      enabled: z.boolean(),
      confidenceLevel: z.enum(CONFIDENCE_LEVELS).optional(),
    })
    .optional(),
  maliciousUris: z.boolean().optional(),
  sdp: SdpConfigSchema.optional(),
  labels: z.record(z.string()).optional(),
  metadata: TemplateMetadataSchema.optional(),
});

/** RAI filters shared by the sample templates. */
export const BASE_RAI_FILTERS: readonly RaiFilter[] = [
  { filterType: 'DANGEROUS', confidenceLevel: 'HIGH' },
  { filterType: 'HATE_SPEECH', confidenceLevel: 'MEDIUM_AND_ABOVE' },
  { filterType: 'SEXUALLY_EXPLICIT', confidenceLevel: 'MEDIUM_AND_ABOVE' },
  { filterType: 'HARASSMENT', confidenceLevel: 'MEDIUM_AND_ABOVE' },
];

export function baseTemplateConfig(): TemplateConfig {
  return { raiFilters: BASE_RAI_FILTERS.map((f) => ({ ...f })) };
}

export function basicSdpTemplateConfig(): TemplateConfig {
  return { ...baseTemplateConfig(), sdp: { mode: 'basic', enabled: true } };
}

export function advancedSdpTemplateConfig(
  inspectTemplate: string,
  deidentifyTemplate: string
): TemplateConfig {
  return {
    ...baseTemplateConfig(),
    sdp: { mode: 'advanced', inspectTemplate, deidentifyTemplate },
  };
}

export function maliciousUriTemplateConfig(): TemplateConfig {
  return { ...baseTemplateConfig(), maliciousUris: true };
}

export function piAndJailbreakTemplateConfig(): TemplateConfig {
  return {
    ...baseTemplateConfig(),
    piAndJailbreak: { enabled: true, confidenceLevel: 'MEDIUM_AND_ABOVE' },
  };
}

/** Base filters with operation and sanitize logging switched on. */
export function loggingTemplateConfig(): TemplateConfig {
  return {
    ...baseTemplateConfig(),
    metadata: { logTemplateOperations: true, logSanitizeOperations: true },
  };
}

export function labeledTemplateConfig(
  labels: Record<string, string>
): TemplateConfig {
  return { ...baseTemplateConfig(), labels: { ...labels } };
}

function toSdpSettings(sdp: SdpConfig): FilterConfig['sdpSettings'] {
  switch (sdp.mode) {
    case 'basic':
      return {
        basicConfig: {
          filterEnforcement: sdp.enabled ? 'ENABLED' : 'DISABLED',
        },
      };
    case 'advanced':
      return {
        advancedConfig: {
          inspectTemplate: sdp.inspectTemplate,
          deidentifyTemplate: sdp.deidentifyTemplate,
        },
      };
  }
}

export function toFilterConfig(settings: FilterSettings): FilterConfig {
  const filterConfig: FilterConfig = {};
  if (settings.raiFilters) {
    filterConfig.raiSettings = {
      raiFilters: settings.raiFilters.map((f) => ({
        filterType: f.filterType,
        confidenceLevel: f.confidenceLevel,
      })),
    };
  }
  if (settings.piAndJailbreak) {
    filterConfig.piAndJailbreakFilterSettings = {
      filterEnforcement: settings.piAndJailbreak.enabled
        ? 'ENABLED'
        : 'DISABLED',
      confidenceLevel: settings.piAndJailbreak.confidenceLevel,
    };
  }
  if (settings.maliciousUris !== undefined) {
    filterConfig.maliciousUriFilterSettings = {
      filterEnforcement: settings.maliciousUris ? 'ENABLED' : 'DISABLED',
    };
  }
  if (settings.sdp) {
    filterConfig.sdpSettings = toSdpSettings(settings.sdp);
  }
  return filterConfig;
}

export function toTemplateMetadata(
  metadata: TemplateMetadata
): TemplateMetadataMessage {
  return { ...metadata };
}

/**
 * Builds the wire representation of a template. The name is only needed for
 * updates; creation takes the id separately.
 */
export function toTemplate(config: TemplateConfig, name?: string): Template {
  const template: Template = { filterConfig: toFilterConfig(config) };
  if (name) template.name = name;
  if (config.labels) template.labels = { ...config.labels };
  if (config.metadata) {
    template.templateMetadata = toTemplateMetadata(config.metadata);
  }
  return template;
}

function fromSdpSettings(
  sdpSettings: NonNullable<FilterConfig['sdpSettings']>
): SdpConfig | undefined {
  const { basicConfig, advancedConfig } = sdpSettings;
  if (basicConfig && advancedConfig) {
    throw new GenkitError({
      status: 'INVALID_ARGUMENT',
      message:
        'Template has both basic and advanced sensitive data protection configured.',
    });
  }
  if (basicConfig) {
    return {
      mode: 'basic',
      enabled: sdpBasicEnabled(basicConfig.filterEnforcement),
    };
  }
  if (advancedConfig) {
    return {
      mode: 'advanced',
      inspectTemplate: advancedConfig.inspectTemplate ?? '',
      deidentifyTemplate: advancedConfig.deidentifyTemplate || undefined,
    };
  }
  return undefined;
}

export function fromFilterConfig(filterConfig: FilterConfig): FilterSettings {
  const settings: FilterSettings = {};
  const raiFilters = filterConfig.raiSettings?.raiFilters;
  if (raiFilters) {
    settings.raiFilters = [];
    for (const f of raiFilters) {
      const filterType = raiFilterTypeOf(f.filterType);
      const confidenceLevel = confidenceLevelOf(f.confidenceLevel);
      if (filterType && confidenceLevel) {
        settings.raiFilters.push({ filterType, confidenceLevel });
      }
    }
  }
  const pi = filterConfig.piAndJailbreakFilterSettings;
  if (pi) {
    settings.piAndJailbreak = {
      enabled: piAndJailbreakEnabled(pi.filterEnforcement),
      confidenceLevel: confidenceLevelOf(pi.confidenceLevel),
    };
  }
  const uri = filterConfig.maliciousUriFilterSettings;
  if (uri) {
    settings.maliciousUris = maliciousUriEnabled(uri.filterEnforcement);
  }
  if (filterConfig.sdpSettings) {
    const sdp = fromSdpSettings(filterConfig.sdpSettings);
    if (sdp) settings.sdp = sdp;
  }
  return settings;
}

function fromTemplateMetadata(
  message: TemplateMetadataMessage
): TemplateMetadata {
  const metadata: TemplateMetadata = {};
  if (message.logTemplateOperations != null) {
    metadata.logTemplateOperations = message.logTemplateOperations;
  }
  if (message.logSanitizeOperations != null) {
    metadata.logSanitizeOperations = message.logSanitizeOperations;
  }
  if (message.ignorePartialInvocationFailures != null) {
    metadata.ignorePartialInvocationFailures =
      message.ignorePartialInvocationFailures;
  }
  if (message.customPromptSafetyErrorCode != null) {
    metadata.customPromptSafetyErrorCode = message.customPromptSafetyErrorCode;
  }
  if (message.customPromptSafetyErrorMessage) {
    metadata.customPromptSafetyErrorMessage =
      message.customPromptSafetyErrorMessage;
  }
  if (message.customLlmResponseSafetyErrorCode != null) {
    metadata.customLlmResponseSafetyErrorCode =
      message.customLlmResponseSafetyErrorCode;
  }
  if (message.customLlmResponseSafetyErrorMessage) {
    metadata.customLlmResponseSafetyErrorMessage =
      message.customLlmResponseSafetyErrorMessage;
  }
  return metadata;
}

/**
 * Reads a template returned by the service back into its domain form.
 *
 * Throws INVALID_ARGUMENT if the template carries both SDP modes.
 */
export function fromTemplate(template: Template): TemplateConfig {
  const config: TemplateConfig = template.filterConfig
    ? fromFilterConfig(template.filterConfig)
    : {};
  if (template.labels && Object.keys(template.labels).length > 0) {
    config.labels = { ...template.labels };
  }
  if (template.templateMetadata) {
    config.metadata = fromTemplateMetadata(template.templateMetadata);
  }
  return config;
}
