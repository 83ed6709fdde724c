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

export {
  createModelArmorClient,
  type ClientOptions,
  type ModelArmorApi,
  type ModelArmorClientOptions,
  type SanitizeApi,
} from './client.js';
export {
  DEFAULT_DEIDENTIFY_TEMPLATE_ID,
  DEFAULT_INSPECT_TEMPLATE_ID,
  DEFAULT_LOCATION,
  ENV,
  authFor,
  credentialOptions,
  credentialsFromEnvironment,
  loadConfig,
  resolveConfig,
  type ModelArmorConfig,
  type ProjectIdSource,
  type ResolvedConfig,
  type ServiceAccountCredentials,
} from './config.js';
export {
  DlpTemplates,
  INSPECT_INFO_TYPES,
  REDACTION_TEXT,
  createDlpClient,
  type DlpApi,
  type DlpClientOptions,
} from './dlp.js';
export {
  getErrorDetails,
  getStatusCode,
  isAlreadyExists,
  isNotFound,
} from './errors.js';
export {
  ModelArmorFixture,
  type ModelArmorFixtureOptions,
} from './fixture.js';
export { FloorSettingManager } from './floor-settings.js';
export { logger } from './logger.js';
export {
  modelArmor,
  type ApplyDeidentificationFn,
  type ModelArmorOptions,
} from './middleware.js';
export * from './names.js';
export {
  FILTER_KEYS,
  deidentifiedText,
  findFilter,
  findMaliciousUris,
  isSafe,
  sdpFindings,
  summarize,
} from './results.js';
export { Sanitizer, type PromptAndResponseResult } from './sanitizer.js';
export * from './template-config.js';
export {
  TemplateManager,
  type ListTemplatesOptions,
  type TemplateField,
} from './templates.js';
export * from './types.js';
