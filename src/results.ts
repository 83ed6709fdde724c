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

import {
  confidenceLevelOf,
  invocationResultOf,
  likelihoodOf,
  matchStateOf,
} from './enums.js';
import type {
  FilterOutcome,
  FilterResult,
  MaliciousUriMatch,
  RaiTypeOutcome,
  SanitizationResult,
  SanitizationSummary,
  SdpFinding,
} from './types.js';

/** Filter category keys used in `filterResults`. */
export const FILTER_KEYS = {
  rai: 'rai',
  piAndJailbreak: 'pi_and_jailbreak',
  maliciousUris: 'malicious_uris',
  csam: 'csam',
  sdp: 'sdp',
} as const;

function toOffset(value: unknown): number {
  return Number(value ?? 0);
}

function toFilterOutcome(key: string, result: FilterResult): FilterOutcome {
  if (result.raiFilterResult) {
    const rai = result.raiFilterResult;
    const types: RaiTypeOutcome[] = Object.entries(
      rai.raiFilterTypeResults ?? {}
    ).map(([filterType, typeResult]) => ({
      filterType,
      confidenceLevel: confidenceLevelOf(typeResult.confidenceLevel),
      matchState: matchStateOf(typeResult.matchState),
    }));
    return {
      kind: 'rai',
      key,
      matchState: matchStateOf(rai.matchState),
      types,
    };
  }
  if (result.piAndJailbreakFilterResult) {
    const pi = result.piAndJailbreakFilterResult;
    return {
      kind: 'piAndJailbreak',
      key,
      matchState: matchStateOf(pi.matchState),
      confidenceLevel: confidenceLevelOf(pi.confidenceLevel),
    };
  }
  if (result.maliciousUriFilterResult) {
    const uris = result.maliciousUriFilterResult;
    const matches: MaliciousUriMatch[] = (
      uris.maliciousUriMatchedItems ?? []
    ).map((item) => ({
      uri: item.uri ?? '',
      locations: (item.locations ?? []).map((range) => ({
        start: toOffset(range.start),
        end: toOffset(range.end),
      })),
    }));
    return {
      kind: 'maliciousUris',
      key,
      matchState: matchStateOf(uris.matchState),
      matches,
    };
  }
  if (result.csamFilterFilterResult) {
    return {
      kind: 'csam',
      key,
      matchState: matchStateOf(result.csamFilterFilterResult.matchState),
    };
  }
  const sdp = result.sdpFilterResult;
  if (sdp?.inspectResult) {
    const findings: SdpFinding[] = (sdp.inspectResult.findings ?? []).map(
      (finding) => ({
        infoType: finding.infoType ?? '',
        likelihood: likelihoodOf(finding.likelihood),
      })
    );
    return {
      kind: 'sdpInspect',
      key,
      matchState: matchStateOf(sdp.inspectResult.matchState),
      findings,
      findingsTruncated: sdp.inspectResult.findingsTruncated === true,
    };
  }
  if (sdp?.deidentifyResult) {
    const deidentify = sdp.deidentifyResult;
    return {
      kind: 'sdpDeidentify',
      key,
      matchState: matchStateOf(deidentify.matchState),
      text: deidentify.data?.text ?? undefined,
      infoTypes: deidentify.infoTypes ?? [],
    };
  }
  return { kind: 'unknown', key };
}

/**
 * Normalizes a raw sanitization result into a summary whose per-filter
 * entries are discriminated by `kind`.
 */
export function summarize(
  result: SanitizationResult | null | undefined
): SanitizationSummary {
  if (!result) return { filters: [] };
  return {
    matchState: matchStateOf(result.filterMatchState),
    invocationResult: invocationResultOf(result.invocationResult),
    filters: Object.entries(result.filterResults ?? {}).map(([key, value]) =>
      toFilterOutcome(key, value)
    ),
  };
}

/** True when the service found no match in any filter. */
export function isSafe(result: SanitizationResult | null | undefined): boolean {
  return matchStateOf(result?.filterMatchState) === 'NO_MATCH_FOUND';
}

export function findFilter<K extends FilterOutcome['kind']>(
  summary: SanitizationSummary,
  kind: K
): Extract<FilterOutcome, { kind: K }> | undefined {
  for (const filter of summary.filters) {
    if (isKind(filter, kind)) return filter;
  }
  return undefined;
}

function isKind<K extends FilterOutcome['kind']>(
  filter: FilterOutcome,
  kind: K
): filter is Extract<FilterOutcome, { kind: K }> {
  return filter.kind === kind;
}

export function findMaliciousUris(
  result: SanitizationResult | null | undefined
): MaliciousUriMatch[] {
  return findFilter(summarize(result), 'maliciousUris')?.matches ?? [];
}

export function sdpFindings(
  result: SanitizationResult | null | undefined
): SdpFinding[] {
  return findFilter(summarize(result), 'sdpInspect')?.findings ?? [];
}

/**
 * Text produced by the SDP deidentify step, when the template's
 * deidentification ran and returned data.
 */
export function deidentifiedText(
  result: SanitizationResult | null | undefined
): string | undefined {
  return (
    result?.filterResults?.[FILTER_KEYS.sdp]?.sdpFilterResult?.deidentifyResult
      ?.data?.text ?? undefined
  );
}
