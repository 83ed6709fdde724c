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
import {
  CONFIDENCE_LEVELS,
  INVOCATION_RESULTS,
  MATCH_STATES,
  RAI_FILTER_TYPES,
  type ConfidenceLevel,
  type InvocationResult,
  type MatchState,
  type RaiFilterType,
} from './types.js';

const v1 = protos.google.cloud.modelarmor.v1;

/**
 * Enum fields arrive as names over gRPC and REST, but the generated types also
 * admit the numeric form.
 */
export type EnumValue = string | number | null | undefined;

function enumName<T extends string>(
  value: EnumValue,
  byNumber: (n: number) => string | undefined,
  names: readonly T[]
): T | undefined {
  const name = typeof value === 'number' ? byNumber(value) : value;
  return names.find((n) => n === name);
}

export function matchStateOf(value: EnumValue): MatchState | undefined {
  return enumName(value, (n) => v1.FilterMatchState[n], MATCH_STATES);
}

export function invocationResultOf(
  value: EnumValue
): InvocationResult | undefined {
  return enumName(value, (n) => v1.InvocationResult[n], INVOCATION_RESULTS);
}

export function raiFilterTypeOf(value: EnumValue): RaiFilterType | undefined {
  return enumName(value, (n) => v1.RaiFilterType[n], RAI_FILTER_TYPES);
}

export function confidenceLevelOf(
  value: EnumValue
): ConfidenceLevel | undefined {
  return enumName(
    value,
    (n) => v1.DetectionConfidenceLevel[n],
    CONFIDENCE_LEVELS
  );
}

const ENFORCEMENT = ['ENABLED', 'DISABLED'] as const;

export function sdpBasicEnabled(value: EnumValue): boolean {
  return (
    enumName(
      value,
      (n) => v1.SdpBasicConfig.SdpBasicConfigEnforcement[n],
      ENFORCEMENT
    ) === 'ENABLED'
  );
}

export function maliciousUriEnabled(value: EnumValue): boolean {
  return (
    enumName(
      value,
      (n) => v1.MaliciousUriFilterSettings.MaliciousUriFilterEnforcement[n],
      ENFORCEMENT
    ) === 'ENABLED'
  );
}

export function piAndJailbreakEnabled(value: EnumValue): boolean {
  return (
    enumName(
      value,
      (n) => v1.PiAndJailbreakFilterSettings.PiAndJailbreakFilterEnforcement[n],
      ENFORCEMENT
    ) === 'ENABLED'
  );
}

export function likelihoodOf(value: EnumValue): string | undefined {
  if (typeof value === 'number') return v1.SdpFindingLikelihood[value];
  return value ?? undefined;
}
