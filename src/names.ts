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
import * as uuid from 'uuid';
import type { FloorSettingParent } from './types.js';

const TEMPLATE_NAME_PATTERN =
  /^projects\/([^/]+)\/locations\/([^/]+)\/templates\/([^/]+)$/;

export interface TemplateNameParts {
  project: string;
  location: string;
  templateId: string;
}

/**
 * Regional Model Armor endpoint, e.g.
 * `modelarmor.us-central1.rep.googleapis.com`.
 */
export function regionalEndpoint(location: string): string {
  return `modelarmor.${location}.rep.googleapis.com`;
}

export function locationPath(project: string, location: string): string {
  return `projects/${project}/locations/${location}`;
}

export function templatePath(
  project: string,
  location: string,
  templateId: string
): string {
  return `${locationPath(project, location)}/templates/${templateId}`;
}

export function parseTemplateName(name: string): TemplateNameParts {
  const match = TEMPLATE_NAME_PATTERN.exec(name);
  if (!match) {
    throw new GenkitError({
      status: 'INVALID_ARGUMENT',
      message: `Malformed template name "${name}", expected projects/{project}/locations/{location}/templates/{template}.`,
    });
  }
  return { project: match[1], location: match[2], templateId: match[3] };
}

export function inspectTemplatePath(
  project: string,
  location: string,
  templateId: string
): string {
  return `${locationPath(project, location)}/inspectTemplates/${templateId}`;
}

export function deidentifyTemplatePath(
  project: string,
  location: string,
  templateId: string
): string {
  return `${locationPath(project, location)}/deidentifyTemplates/${templateId}`;
}

/** Floor settings always live in the `global` location. */
export function floorSettingPath(parent: FloorSettingParent): string {
  const collection = {
    project: 'projects',
    folder: 'folders',
    organization: 'organizations',
  }[parent.kind];
  return `${collection}/${parent.id}/locations/global/floorSetting`;
}

/** Random id suffix: 8 lowercase hex characters. */
export function uniqueId(): string {
  return uuid.v4().replace(/-/g, '').slice(0, 8);
}
