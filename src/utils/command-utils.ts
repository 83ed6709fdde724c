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
import { createModelArmorClient, type ModelArmorApi } from '../client.js';
import {
  credentialOptions,
  loadConfig,
  resolveConfig,
  type ResolvedConfig,
} from '../config.js';
import { logger } from '../logger.js';
import { parseTemplateName, templatePath } from '../names.js';
import { TemplateConfigSchema } from '../template-config.js';
import type { FloorSettingParent, TemplateConfig } from '../types.js';

/** Options every command accepts from the program. */
export interface TargetOptions {
  project?: string;
  location?: string;
}

export interface CommandContext {
  config: ResolvedConfig;
  client: ModelArmorApi;
}

/**
 * Resolves configuration, opens a Model Armor client for the configured
 * location and closes it once `fn` settles.
 */
export async function runWithClient<T>(
  options: TargetOptions,
  fn: (context: CommandContext) => Promise<T>
): Promise<T> {
  const config = await resolveConfig(
    loadConfig(process.env, {
      projectId: options.project,
      location: options.location,
    })
  );
  const client = createModelArmorClient({
    location: config.location,
    clientOptions: credentialOptions(config),
  });
  try {
    return await fn({ config, client });
  } finally {
    await client.close();
  }
}

/** Accepts either a bare template id or a full template name. */
export function resolveTemplateName(
  idOrName: string,
  config: ResolvedConfig
): string {
  if (idOrName.includes('/')) {
    parseTemplateName(idOrName);
    return idOrName;
  }
  return templatePath(config.projectId, config.location, idOrName);
}

function parseJson(flag: string, json: string): unknown {
  try {
    return JSON.parse(json);
  } catch (e) {
    throw new GenkitError({
      status: 'INVALID_ARGUMENT',
      message: `${flag} is not valid JSON: ${e instanceof Error ? e.message : e}`,
    });
  }
}

/** Parses and validates a template configuration given as JSON. */
export function parseTemplateConfig(json: string): TemplateConfig {
  const parsed = TemplateConfigSchema.safeParse(parseJson('--config', json));
  if (!parsed.success) {
    throw new GenkitError({
      status: 'INVALID_ARGUMENT',
      message: `Invalid template configuration: ${parsed.error.message}`,
    });
  }
  return parsed.data;
}

/** Parses a JSON object of string labels. */
export function parseLabels(json: string): Record<string, string> {
  const value = parseJson('--labels', json);
  const labels: Record<string, string> = {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new GenkitError({
      status: 'INVALID_ARGUMENT',
      message: '--labels must be a JSON object of strings.',
    });
  }
  for (const [key, label] of Object.entries(value)) {
    if (typeof label !== 'string') {
      throw new GenkitError({
        status: 'INVALID_ARGUMENT',
        message: `Label "${key}" must be a string.`,
      });
    }
    labels[key] = label;
  }
  return labels;
}

export interface FloorParentOptions {
  /** A folder id, or `true` to use MA_FOLDER_ID. */
  folder?: string | boolean;
  /** An organization id, or `true` to use MA_ORGANIZATION_ID. */
  organization?: string | boolean;
}

/**
 * Picks the floor setting parent from the flags. Without flags the
 * configured project is used.
 */
export function resolveFloorParent(
  options: FloorParentOptions,
  config: ResolvedConfig
): FloorSettingParent {
  if (options.folder && options.organization) {
    throw new GenkitError({
      status: 'INVALID_ARGUMENT',
      message: 'Pass at most one of --folder and --organization.',
    });
  }
  if (options.folder) {
    return {
      kind: 'folder',
      id: flagOrConfigured('--folder', options.folder, config.folderId),
    };
  }
  if (options.organization) {
    return {
      kind: 'organization',
      id: flagOrConfigured(
        '--organization',
        options.organization,
        config.organizationId
      ),
    };
  }
  return { kind: 'project', id: config.projectId };
}

function flagOrConfigured(
  flag: string,
  value: string | true,
  configured: string | undefined
): string {
  if (typeof value === 'string') return value;
  if (!configured) {
    throw new GenkitError({
      status: 'FAILED_PRECONDITION',
      message: `${flag} was given without an id and none is configured.`,
    });
  }
  return configured;
}

export function printJson(label: string, value: unknown): void {
  logger.info(`${label}:\n${JSON.stringify(value, undefined, '  ')}`);
}
