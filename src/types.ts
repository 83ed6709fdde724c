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

import type { protos } from '@google-cloud/modelarmor';

// Wire types, as generated for the v1 API.
export type Template = protos.google.cloud.modelarmor.v1.ITemplate;
export type FilterConfig = protos.google.cloud.modelarmor.v1.IFilterConfig;
export type TemplateMetadataMessage =
  protos.google.cloud.modelarmor.v1.Template.ITemplateMetadata;
export type FloorSetting = protos.google.cloud.modelarmor.v1.IFloorSetting;
export type SanitizationResult =
  protos.google.cloud.modelarmor.v1.ISanitizationResult;
export type FilterResult = protos.google.cloud.modelarmor.v1.IFilterResult;
export type SanitizeUserPromptResponse =
  protos.google.cloud.modelarmor.v1.ISanitizeUserPromptResponse;
export type SanitizeModelResponseResponse =
  protos.google.cloud.modelarmor.v1.ISanitizeModelResponseResponse;

export const RAI_FILTER_TYPES = [
  'SEXUALLY_EXPLICIT',
  'HATE_SPEECH',
  'HARASSMENT',
  'DANGEROUS',
] as const;
export type RaiFilterType = (typeof RAI_FILTER_TYPES)[number];

export const CONFIDENCE_LEVELS = [
  'LOW_AND_ABOVE',
  'MEDIUM_AND_ABOVE',
  'HIGH',
] as const;
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

export const MATCH_STATES = ['NO_MATCH_FOUND', 'MATCH_FOUND'] as const;
export type MatchState = (typeof MATCH_STATES)[number];

export const INVOCATION_RESULTS = ['SUCCESS', 'PARTIAL', 'FAILURE'] as const;
export type InvocationResult = (typeof INVOCATION_RESULTS)[number];

export interface RaiFilter {
  filterType: RaiFilterType;
  confidenceLevel: ConfidenceLevel;
}

/**
 * Sensitive Data Protection settings. A template uses either the basic
 * configuration, which only toggles the built-in detectors, or the advanced
 * configuration, which delegates to DLP inspect and deidentify templates.
 */
export type SdpConfig =
  | { mode: 'basic'; enabled: boolean }
  | {
      mode: 'advanced';
      /** Full resource name of a DLP inspect template. */
      inspectTemplate: string;
      /** Full resource name of a DLP deidentify template. */
      deidentifyTemplate?: string;
    };

export interface PiAndJailbreakConfig {
  enabled: boolean;
  confidenceLevel?: ConfidenceLevel;
}

export interface TemplateMetadata {
  logTemplateOperations?: boolean;
  logSanitizeOperations?: boolean;
  ignorePartialInvocationFailures?: boolean;
  customPromptSafetyErrorCode?: number;
  customPromptSafetyErrorMessage?: string;
  customLlmResponseSafetyErrorCode?: number;
  customLlmResponseSafetyErrorMessage?: string;
}

/** Filters applied by a template or a floor setting. */
export interface FilterSettings {
  raiFilters?: RaiFilter[];
  piAndJailbreak?: PiAndJailbreakConfig;
  maliciousUris?: boolean;
  sdp?: SdpConfig;
}

/** Everything a caller sets when creating or updating a template. */
export interface TemplateConfig extends FilterSettings {
  labels?: Record<string, string>;
  metadata?: TemplateMetadata;
}

export interface TextRange {
  start: number;
  end: number;
}

export interface MaliciousUriMatch {
  uri: string;
  locations: TextRange[];
}

export interface RaiTypeOutcome {
  filterType: string;
  confidenceLevel?: ConfidenceLevel;
  matchState?: MatchState;
}

export interface SdpFinding {
  infoType: string;
  likelihood?: string;
}

/** Normalized result of a single filter category. */
export type FilterOutcome =
  | {
      kind: 'rai';
      key: string;
      matchState?: MatchState;
      types: RaiTypeOutcome[];
    }
  | {
      kind: 'piAndJailbreak';
      key: string;
      matchState?: MatchState;
      confidenceLevel?: ConfidenceLevel;
    }
  | {
      kind: 'maliciousUris';
      key: string;
      matchState?: MatchState;
      matches: MaliciousUriMatch[];
    }
  | { kind: 'csam'; key: string; matchState?: MatchState }
  | {
      kind: 'sdpInspect';
      key: string;
      matchState?: MatchState;
      findings: SdpFinding[];
      findingsTruncated: boolean;
    }
  | {
      kind: 'sdpDeidentify';
      key: string;
      matchState?: MatchState;
      text?: string;
      infoTypes: string[];
    }
  | { kind: 'unknown'; key: string; matchState?: MatchState };

export interface SanitizationSummary {
  matchState?: MatchState;
  invocationResult?: InvocationResult;
  filters: FilterOutcome[];
}

/** Parent of a floor setting resource. */
export type FloorSettingParent =
  | { kind: 'project'; id: string }
  | { kind: 'folder'; id: string }
  | { kind: 'organization'; id: string };
