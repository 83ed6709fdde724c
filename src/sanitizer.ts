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

import type { SanitizeApi } from './client.js';
import { logger } from './logger.js';
import { deidentifiedText, isSafe } from './results.js';
import type {
  SanitizationResult,
  SanitizeModelResponseResponse,
  SanitizeUserPromptResponse,
} from './types.js';

export interface PromptAndResponseResult {
  promptResponse: SanitizeUserPromptResponse;
  modelResponse: SanitizeModelResponseResponse;
  isPromptSafe: boolean;
  isResponseSafe: boolean;
  /** The SDP deidentified prompt, or the original prompt. */
  deidentifiedPrompt: string;
  /** The SDP deidentified response, or the original response. */
  deidentifiedResponse: string;
}

/**
 * Sanitizes user prompts and model responses against a template.
 *
 * Each call is one blocking request. A NO_MATCH_FOUND result is a normal
 * outcome; only transport and service failures reject.
 */
export class Sanitizer {
  constructor(private readonly client: SanitizeApi) {}

  async sanitizePrompt(
    templateName: string,
    text: string
  ): Promise<SanitizeUserPromptResponse> {
    const [response] = await this.client.sanitizeUserPrompt({
      name: templateName,
      userPromptData: { text },
    });
    logger.debug(
      `sanitizeUserPrompt ${templateName}: ${response.sanitizationResult?.filterMatchState}`
    );
    return response;
  }

  /**
   * Sanitizes a model response. The prompt that produced the response may be
   * passed along for context.
   */
  async sanitizeResponse(
    templateName: string,
    text: string,
    userPrompt?: string
  ): Promise<SanitizeModelResponseResponse> {
    const [response] = await this.client.sanitizeModelResponse({
      name: templateName,
      modelResponseData: { text },
      ...(userPrompt === undefined ? {} : { userPrompt }),
    });
    logger.debug(
      `sanitizeModelResponse ${templateName}: ${response.sanitizationResult?.filterMatchState}`
    );
    return response;
  }

  async sanitizePromptAndResponse(
    templateName: string,
    prompt: string,
    response: string
  ): Promise<PromptAndResponseResult> {
    const promptResponse = await this.sanitizePrompt(templateName, prompt);
    const modelResponse = await this.sanitizeResponse(templateName, response);
    return {
      promptResponse,
      modelResponse,
      isPromptSafe: isSafe(promptResponse.sanitizationResult),
      isResponseSafe: isSafe(modelResponse.sanitizationResult),
      deidentifiedPrompt: textAfterSdp(
        promptResponse.sanitizationResult,
        prompt
      ),
      deidentifiedResponse: textAfterSdp(
        modelResponse.sanitizationResult,
        response
      ),
    };
  }
}

function textAfterSdp(
  result: SanitizationResult | null | undefined,
  original: string
): string {
  return deidentifiedText(result) ?? original;
}
