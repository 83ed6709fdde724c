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

import * as clc from 'colorette';
import { Command } from 'commander';
import { logger } from '../logger.js';
import { summarize } from '../results.js';
import { Sanitizer } from '../sanitizer.js';
import type { SanitizationResult } from '../types.js';
import {
  printJson,
  resolveTemplateName,
  runWithClient,
  type TargetOptions,
} from '../utils/command-utils.js';

/** One line verdict for a sanitization result. */
export function verdict(result: SanitizationResult | null | undefined): string {
  const { matchState, invocationResult } = summarize(result);
  const state =
    matchState === 'MATCH_FOUND'
      ? clc.red(matchState)
      : clc.green(matchState ?? 'UNSPECIFIED');
  return `${state} (invocation ${invocationResult ?? 'UNSPECIFIED'})`;
}

function report(label: string, result: SanitizationResult | null | undefined) {
  logger.info(`${label}: ${verdict(result)}`);
  printJson('Filters', summarize(result).filters);
}

export const sanitizePrompt = new Command('sanitize:prompt')
  .description('sanitize a user prompt against a template')
  .argument('<template>', 'template id or full name')
  .argument('<text>', 'prompt text')
  .action(
    async (idOrName: string, text: string, _o: object, command: Command) => {
      const target: TargetOptions = command.optsWithGlobals();
      await runWithClient(target, async ({ config, client }) => {
        const response = await new Sanitizer(client).sanitizePrompt(
          resolveTemplateName(idOrName, config),
          text
        );
        report('Prompt', response.sanitizationResult);
      });
    }
  );

interface SanitizeResponseOptions {
  userPrompt?: string;
}

export const sanitizeResponse = new Command('sanitize:response')
  .description('sanitize a model response against a template')
  .argument('<template>', 'template id or full name')
  .argument('<text>', 'model response text')
  .option('--user-prompt <text>', 'prompt that produced the response')
  .action(
    async (
      idOrName: string,
      text: string,
      options: SanitizeResponseOptions,
      command: Command
    ) => {
      const target: TargetOptions = command.optsWithGlobals();
      await runWithClient(target, async ({ config, client }) => {
        const response = await new Sanitizer(client).sanitizeResponse(
          resolveTemplateName(idOrName, config),
          text,
          options.userPrompt
        );
        report('Response', response.sanitizationResult);
      });
    }
  );

export const sanitizeBoth = new Command('sanitize:both')
  .description('sanitize a prompt and the model response to it')
  .argument('<template>', 'template id or full name')
  .argument('<prompt>', 'prompt text')
  .argument('<response>', 'model response text')
  .action(
    async (
      idOrName: string,
      prompt: string,
      response: string,
      _options: object,
      command: Command
    ) => {
      const target: TargetOptions = command.optsWithGlobals();
      await runWithClient(target, async ({ config, client }) => {
        const result = await new Sanitizer(client).sanitizePromptAndResponse(
          resolveTemplateName(idOrName, config),
          prompt,
          response
        );
        report('Prompt', result.promptResponse.sanitizationResult);
        report('Response', result.modelResponse.sanitizationResult);
        logger.info(`Prompt safe: ${result.isPromptSafe}`);
        logger.info(`Response safe: ${result.isResponseSafe}`);
        logger.info(`Deidentified prompt: ${result.deidentifiedPrompt}`);
        logger.info(`Deidentified response: ${result.deidentifiedResponse}`);
      });
    }
  );
