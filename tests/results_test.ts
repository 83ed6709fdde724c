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
  deidentifiedText,
  findFilter,
  findMaliciousUris,
  isSafe,
  sdpFindings,
  summarize,
} from '../src/results.js';
import type { SanitizationResult } from '../src/types.js';

const MATCHED: SanitizationResult = {
  filterMatchState: 'MATCH_FOUND',
  invocationResult: 'SUCCESS',
  filterResults: {
    rai: {
      raiFilterResult: {
        matchState: 'MATCH_FOUND',
        raiFilterTypeResults: {
          dangerous: { matchState: 'MATCH_FOUND', confidenceLevel: 'HIGH' },
        },
      },
    },
    malicious_uris: {
      maliciousUriFilterResult: {
        matchState: 'MATCH_FOUND',
        maliciousUriMatchedItems: [
          {
            uri: 'https://example.com/bad',
            locations: [{ start: '4', end: '27' }],
          },
        ],
      },
    },
    csam: { csamFilterFilterResult: { matchState: 'NO_MATCH_FOUND' } },
  },
};

describe('summarize', () => {
  it('normalizes every filter', () => {
    expect(summarize(MATCHED)).toEqual({
      matchState: 'MATCH_FOUND',
      invocationResult: 'SUCCESS',
      filters: [
        {
          kind: 'rai',
          key: 'rai',
          matchState: 'MATCH_FOUND',
          types: [
            {
              filterType: 'dangerous',
              confidenceLevel: 'HIGH',
              matchState: 'MATCH_FOUND',
            },
          ],
        },
        {
          kind: 'maliciousUris',
          key: 'malicious_uris',
          matchState: 'MATCH_FOUND',
          matches: [
            {
              uri: 'https://example.com/bad',
              locations: [{ start: 4, end: 27 }],
            },
          ],
        },
        { kind: 'csam', key: 'csam', matchState: 'NO_MATCH_FOUND' },
      ],
    });
  });

  it('reads SDP inspect findings', () => {
    const result: SanitizationResult = {
      filterMatchState: 'MATCH_FOUND',
      filterResults: {
        sdp: {
          sdpFilterResult: {
            inspectResult: {
              matchState: 'MATCH_FOUND',
              findings: [{ infoType: 'PHONE_NUMBER', likelihood: 'LIKELY' }],
              findingsTruncated: false,
            },
          },
        },
      },
    };
    expect(sdpFindings(result)).toEqual([
      { infoType: 'PHONE_NUMBER', likelihood: 'LIKELY' },
    ]);
    expect(findFilter(summarize(result), 'sdpInspect')?.findingsTruncated).toBe(
      false
    );
  });

  it('keeps filters it does not know', () => {
    expect(summarize({ filterResults: { future: {} } }).filters).toEqual([
      { kind: 'unknown', key: 'future' },
    ]);
  });

  it('handles a missing result', () => {
    expect(summarize(undefined)).toEqual({ filters: [] });
  });
});

describe('helpers', () => {
  it('treats only NO_MATCH_FOUND as safe', () => {
    expect(isSafe({ filterMatchState: 'NO_MATCH_FOUND' })).toBe(true);
    expect(isSafe(MATCHED)).toBe(false);
    expect(isSafe({})).toBe(false);
  });

  it('finds malicious URIs', () => {
    expect(findMaliciousUris(MATCHED)).toEqual([
      { uri: 'https://example.com/bad', locations: [{ start: 4, end: 27 }] },
    ]);
    expect(findMaliciousUris({ filterResults: {} })).toEqual([]);
  });

  it('extracts deidentified text', () => {
    expect(
      deidentifiedText({
        filterResults: {
          sdp: {
            sdpFilterResult: {
              deidentifyResult: {
                matchState: 'MATCH_FOUND',
                data: { text: 'Call [REDACTED]' },
                infoTypes: ['PHONE_NUMBER'],
              },
            },
          },
        },
      })
    ).toBe('Call [REDACTED]');
    expect(deidentifiedText(MATCHED)).toBeUndefined();
  });
});
