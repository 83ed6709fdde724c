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
import { GoogleAuth } from 'google-auth-library';
import { z } from 'zod';
import { getErrorDetails } from './errors.js';
import { logger } from './logger.js';

export const ENV = {
  project: 'GOOGLE_CLOUD_PROJECT',
  location: 'GOOGLE_CLOUD_LOCATION',
  inspectTemplateId: 'MA_INSPECT_TEMPLATE_ID',
  deidentifyTemplateId: 'MA_DEIDENTIFY_TEMPLATE_ID',
  folderId: 'MA_FOLDER_ID',
  organizationId: 'MA_ORGANIZATION_ID',
  serviceAccountCreds: 'GCLOUD_SERVICE_ACCOUNT_CREDS',
} as const;

export const DEFAULT_LOCATION = 'us-central1';
export const DEFAULT_INSPECT_TEMPLATE_ID = 'dlp-inspect-template-1';
export const DEFAULT_DEIDENTIFY_TEMPLATE_ID = 'dlp-deidentify-template-1';

const nonEmpty = z
  .string()
  .trim()
  .min(1)
  .optional()
  .catch(undefined);

const EnvSchema = z.object({
  [ENV.project]: nonEmpty,
  [ENV.location]: nonEmpty,
  [ENV.inspectTemplateId]: nonEmpty,
  [ENV.deidentifyTemplateId]: nonEmpty,
  [ENV.folderId]: nonEmpty,
  [ENV.organizationId]: nonEmpty,
});

export interface ModelArmorConfig {
  projectId?: string;
  location: string;
  inspectTemplateId: string;
  deidentifyTemplateId: string;
  folderId?: string;
  organizationId?: string;
  /** Service account key from GCLOUD_SERVICE_ACCOUNT_CREDS, if set. */
  credentials?: ServiceAccountCredentials;
}

/** A configuration whose project has been resolved. */
export type ResolvedConfig = ModelArmorConfig & { projectId: string };

export interface ConfigOverrides {
  projectId?: string;
  location?: string;
}

/**
 * Reads configuration from environment variables. Empty values count as
 * unset; unset values fall back to the defaults.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): ModelArmorConfig {
  const parsed = EnvSchema.parse(env);
  return {
    projectId: overrides.projectId || parsed[ENV.project],
    location: overrides.location || parsed[ENV.location] || DEFAULT_LOCATION,
    inspectTemplateId:
      parsed[ENV.inspectTemplateId] ?? DEFAULT_INSPECT_TEMPLATE_ID,
    deidentifyTemplateId:
      parsed[ENV.deidentifyTemplateId] ?? DEFAULT_DEIDENTIFY_TEMPLATE_ID,
    folderId: parsed[ENV.folderId],
    organizationId: parsed[ENV.organizationId],
    credentials: credentialsFromEnvironment(env),
  };
}

const ServiceAccountSchema = z.object({
  client_email: z.string(),
  private_key: z.string(),
  project_id: z.string().optional(),
});

export type ServiceAccountCredentials = z.infer<typeof ServiceAccountSchema>;

/** Anything that can report the ambient project, e.g. `GoogleAuth`. */
export interface ProjectIdSource {
  getProjectId(): Promise<string>;
}

/**
 * Allows a service account key to be passed in "raw" in the
 * GCLOUD_SERVICE_ACCOUNT_CREDS environment variable for environments where
 * Application Default Credentials cannot be configured.
 */
export function credentialsFromEnvironment(
  env: NodeJS.ProcessEnv = process.env
): ServiceAccountCredentials | undefined {
  const raw = env[ENV.serviceAccountCreds];
  if (!raw) {
    return undefined;
  }
  logger.debug(`Retrieving credentials from ${ENV.serviceAccountCreds}`);
  try {
    return ServiceAccountSchema.parse(JSON.parse(raw));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new GenkitError({
      status: 'INVALID_ARGUMENT',
      message: `${ENV.serviceAccountCreds} is not a service account key: ${reason}`,
    });
  }
}

/** Builds a GoogleAuth client for the configured key, or for ADC. */
export function authFor(
  config: Pick<ModelArmorConfig, 'credentials'>
): GoogleAuth {
  return config.credentials
    ? new GoogleAuth({ credentials: config.credentials })
    : new GoogleAuth();
}

/** Options that authenticate a generated client as the configured key. */
export function credentialOptions(
  config: Pick<ModelArmorConfig, 'credentials'>
): { credentials?: ServiceAccountCredentials } {
  return config.credentials ? { credentials: config.credentials } : {};
}

/**
 * Completes a configuration with a project id, asking the configured service
 * account key or Application Default Credentials when none was configured.
 */
export async function resolveConfig(
  config: ModelArmorConfig,
  auth?: ProjectIdSource
): Promise<ResolvedConfig> {
  if (config.projectId) {
    return { ...config, projectId: config.projectId };
  }
  const source = auth ?? authFor(config);
  let projectId: string | undefined;
  try {
    projectId = (await source.getProjectId()) || undefined;
  } catch (error) {
    logger.warn(
      `Could not resolve project from credentials: ${getErrorDetails(error)}`
    );
  }
  if (!projectId) {
    throw new GenkitError({
      status: 'FAILED_PRECONDITION',
      message: `Missing ${ENV.project} environment variable`,
    });
  }
  return { ...config, projectId };
}
