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

import { ModelArmorClient, type protos } from '@google-cloud/modelarmor';
import { regionalEndpoint } from './names.js';
import type {
  FloorSetting,
  SanitizeModelResponseResponse,
  SanitizeUserPromptResponse,
  Template,
} from './types.js';

export type CreateTemplateRequest =
  protos.google.cloud.modelarmor.v1.ICreateTemplateRequest;
export type GetTemplateRequest =
  protos.google.cloud.modelarmor.v1.IGetTemplateRequest;
export type ListTemplatesRequest =
  protos.google.cloud.modelarmor.v1.IListTemplatesRequest;
export type UpdateTemplateRequest =
  protos.google.cloud.modelarmor.v1.IUpdateTemplateRequest;
export type DeleteTemplateRequest =
  protos.google.cloud.modelarmor.v1.IDeleteTemplateRequest;
export type GetFloorSettingRequest =
  protos.google.cloud.modelarmor.v1.IGetFloorSettingRequest;
export type UpdateFloorSettingRequest =
  protos.google.cloud.modelarmor.v1.IUpdateFloorSettingRequest;
export type SanitizeUserPromptRequest =
  protos.google.cloud.modelarmor.v1.ISanitizeUserPromptRequest;
export type SanitizeModelResponseRequest =
  protos.google.cloud.modelarmor.v1.ISanitizeModelResponseRequest;

export type ClientOptions = NonNullable<
  ConstructorParameters<typeof ModelArmorClient>[0]
>;

/**
 * The subset of the generated Model Armor client used by this package.
 *
 * `ModelArmorClient` satisfies it structurally; tests provide an in-process
 * implementation.
 */
export interface ModelArmorApi {
  createTemplate(
    request: CreateTemplateRequest
  ): Promise<[Template, ...unknown[]]>;
  getTemplate(request: GetTemplateRequest): Promise<[Template, ...unknown[]]>;
  listTemplatesAsync(request: ListTemplatesRequest): AsyncIterable<Template>;
  updateTemplate(
    request: UpdateTemplateRequest
  ): Promise<[Template, ...unknown[]]>;
  deleteTemplate(request: DeleteTemplateRequest): Promise<unknown[]>;
  getFloorSetting(
    request: GetFloorSettingRequest
  ): Promise<[FloorSetting, ...unknown[]]>;
  updateFloorSetting(
    request: UpdateFloorSettingRequest
  ): Promise<[FloorSetting, ...unknown[]]>;
  sanitizeUserPrompt(
    request: SanitizeUserPromptRequest
  ): Promise<[SanitizeUserPromptResponse, ...unknown[]]>;
  sanitizeModelResponse(
    request: SanitizeModelResponseRequest
  ): Promise<[SanitizeModelResponseResponse, ...unknown[]]>;
  close(): Promise<void>;
}

/** The calls needed to sanitize text. */
export type SanitizeApi = Pick<
  ModelArmorApi,
  'sanitizeUserPrompt' | 'sanitizeModelResponse'
>;

export interface ModelArmorClientOptions {
  /** Location whose regional endpoint is used, e.g. `us-central1`. */
  location: string;
  /**
   * Options for the Model Armor client. An `apiEndpoint` here wins over the
   * regional endpoint derived from the location.
   */
  clientOptions?: ClientOptions;
}

/** Creates a Model Armor client bound to a regional endpoint. */
export function createModelArmorClient(
  options: ModelArmorClientOptions
): ModelArmorApi {
  return new ModelArmorClient({
    apiEndpoint: regionalEndpoint(options.location),
    ...options.clientOptions,
  });
}
