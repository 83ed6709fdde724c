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
import type {
  GenerateRequest,
  GenerateResponseData,
  MessageData,
  ModelMiddleware,
  Part,
} from 'genkit/model';
import { runInNewSpan } from 'genkit/tracing';
import {
  createModelArmorClient,
  type ClientOptions,
  type SanitizeApi,
} from './client.js';
import { parseTemplateName } from './names.js';
import { FILTER_KEYS, deidentifiedText, summarize } from './results.js';
import { Sanitizer } from './sanitizer.js';
import type { SanitizationResult } from './types.js';

export type FilterKey = (typeof FILTER_KEYS)[keyof typeof FILTER_KEYS];

/**
 * Custom handling of SDP deidentification. Called once per sanitized message
 * (the last user message, or a candidate message) with its deidentified
 * text; the returned message replaces it.
 */
export type ApplyDeidentificationFn = (args: {
  message: MessageData;
  sdpResult: string;
  target: 'userPrompt' | 'modelResponse';
}) => MessageData;

export interface ModelArmorOptions {
  /** Full template name, `projects/{p}/locations/{l}/templates/{t}`. */
  templateName: string;
  client?: SanitizeApi;
  /**
   * Options for the Model Armor client (e.g. apiEndpoint). Ignored when
   * `client` is given.
   */
  clientOptions?: ClientOptions;
  /**
   * What to sanitize. Defaults to 'all'.
   */
  protectionTarget?: 'all' | 'userPrompt' | 'modelResponse';
  /**
   * Whether to block on SDP match even if the content was successfully
   * de-identified. Defaults to false (lenient).
   */
  strictSdpEnforcement?: boolean;
  /**
   * List of filters to enforce. If not specified, all filters are enforced.
   */
  filters?: (FilterKey | (string & {}))[];
  /**
   * Replace text parts with the SDP deidentified text (`true`), or hand it
   * to a function. Defaults to false, in which case an SDP match blocks.
   */
  applyDeidentificationResults?: boolean | ApplyDeidentificationFn;
}

function extractText(parts: Part[]): string {
  return parts.map((p) => p.text || '').join('');
}

function replaceText(content: Part[], text: string): Part[] {
  const nonTextParts = content.filter((p) => !p.text);
  return [...nonTextParts, { text }];
}

function shouldBlock(
  result: SanitizationResult,
  options: ModelArmorOptions,
  sdpApplied: boolean
): boolean {
  const summary = summarize(result);
  if (summary.matchState !== 'MATCH_FOUND') {
    return false;
  }
  if (options.strictSdpEnforcement && sdpApplied) {
    return true;
  }
  return summary.filters.some((filter) => {
    if (options.filters && !options.filters.includes(filter.key)) return false;
    if (filter.key === FILTER_KEYS.sdp && sdpApplied) return false;
    return filter.matchState === 'MATCH_FOUND';
  });
}

/**
 * Applies the deidentified text of `result` to `message`. Returns undefined
 * when there is nothing to apply or applying is turned off.
 */
function applySdp(
  message: MessageData,
  result: SanitizationResult,
  options: ModelArmorOptions,
  target: 'userPrompt' | 'modelResponse'
): MessageData | undefined {
  const apply = options.applyDeidentificationResults;
  const sdpResult = deidentifiedText(result);
  if (!apply || !sdpResult) {
    return undefined;
  }
  if (typeof apply === 'function') {
    return apply({ message, sdpResult, target });
  }
  return { ...message, content: replaceText(message.content, sdpResult) };
}

async function sanitizeUserPrompt(
  req: GenerateRequest,
  sanitizer: Sanitizer,
  options: ModelArmorOptions
) {
  let targetMessageIndex = -1;
  for (let i = req.messages.length - 1; i >= 0; i--) {
    if (req.messages[i].role === 'user') {
      targetMessageIndex = i;
      break;
    }
  }
  if (targetMessageIndex === -1) return;

  const userMessage = req.messages[targetMessageIndex];
  const promptText = extractText(userMessage.content);
  if (!promptText) return;

  await runInNewSpan(
    { metadata: { name: 'sanitizeUserPrompt' } },
    async (meta) => {
      meta.input = {
        name: options.templateName,
        userPromptData: { text: promptText },
      };
      const response = await sanitizer.sanitizePrompt(
        options.templateName,
        promptText
      );
      meta.output = response;

      const result = response.sanitizationResult;
      if (!result) return;

      const message = applySdp(userMessage, result, options, 'userPrompt');
      if (message) {
        req.messages[targetMessageIndex] = message;
      }

      if (shouldBlock(result, options, message !== undefined)) {
        throw new GenkitError({
          status: 'PERMISSION_DENIED',
          message: 'Model Armor blocked user prompt.',
          detail: result,
        });
      }
    }
  );
}

async function sanitizeModelResponse(
  response: GenerateResponseData,
  sanitizer: Sanitizer,
  options: ModelArmorOptions
) {
  const candidates = response.message
    ? [{ message: response.message }]
    : response.candidates || [];

  for (const candidate of candidates) {
    const modelText = extractText(candidate.message.content);
    if (!modelText) continue;

    await runInNewSpan(
      { metadata: { name: 'sanitizeModelResponse' } },
      async (meta) => {
        meta.input = {
          name: options.templateName,
          modelResponseData: { text: modelText },
        };
        const sanitized = await sanitizer.sanitizeResponse(
          options.templateName,
          modelText
        );
        meta.output = sanitized;

        const result = sanitized.sanitizationResult;
        if (!result) return;

        const message = applySdp(
          candidate.message,
          result,
          options,
          'modelResponse'
        );
        if (message) {
          candidate.message.content = message.content;
        }

        if (shouldBlock(result, options, message !== undefined)) {
          throw new GenkitError({
            status: 'PERMISSION_DENIED',
            message: 'Model Armor blocked model response.',
            detail: result,
          });
        }
      }
    );
  }
}

/**
 * Model Middleware that uses Google Cloud Model Armor to sanitize user
 * prompts and model responses.
 */
export function modelArmor(options: ModelArmorOptions): ModelMiddleware {
  const client =
    options.client ||
    createModelArmorClient({
      location: parseTemplateName(options.templateName).location,
      clientOptions: options.clientOptions,
    });
  const sanitizer = new Sanitizer(client);
  const protectionTarget = options.protectionTarget ?? 'all';
  const protectUserPrompt =
    protectionTarget === 'all' || protectionTarget === 'userPrompt';
  const protectModelResponse =
    protectionTarget === 'all' || protectionTarget === 'modelResponse';

  return async (req, next) => {
    if (protectUserPrompt) {
      await sanitizeUserPrompt(req, sanitizer, options);
    }

    const response = await next(req);

    if (protectModelResponse) {
      await sanitizeModelResponse(response, sanitizer, options);
    }

    return response;
  };
}
