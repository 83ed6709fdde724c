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

import { DlpServiceClient, type protos } from '@google-cloud/dlp';
import { isNotFound } from './errors.js';
import { logger } from './logger.js';
import {
  deidentifyTemplatePath,
  inspectTemplatePath,
  locationPath,
} from './names.js';

export type InspectTemplate = protos.google.privacy.dlp.v2.IInspectTemplate;
export type DeidentifyTemplate =
  protos.google.privacy.dlp.v2.IDeidentifyTemplate;

/** The subset of the generated DLP client used for template provisioning. */
export interface DlpApi {
  getInspectTemplate(
    request: protos.google.privacy.dlp.v2.IGetInspectTemplateRequest
  ): Promise<[InspectTemplate, ...unknown[]]>;
  createInspectTemplate(
    request: protos.google.privacy.dlp.v2.ICreateInspectTemplateRequest
  ): Promise<[InspectTemplate, ...unknown[]]>;
  deleteInspectTemplate(
    request: protos.google.privacy.dlp.v2.IDeleteInspectTemplateRequest
  ): Promise<unknown[]>;
  getDeidentifyTemplate(
    request: protos.google.privacy.dlp.v2.IGetDeidentifyTemplateRequest
  ): Promise<[DeidentifyTemplate, ...unknown[]]>;
  createDeidentifyTemplate(
    request: protos.google.privacy.dlp.v2.ICreateDeidentifyTemplateRequest
  ): Promise<[DeidentifyTemplate, ...unknown[]]>;
  deleteDeidentifyTemplate(
    request: protos.google.privacy.dlp.v2.IDeleteDeidentifyTemplateRequest
  ): Promise<unknown[]>;
  close(): Promise<void>;
}

/** Info types inspected by the provisioned inspect template. */
export const INSPECT_INFO_TYPES = [
  'EMAIL_ADDRESS',
  'PHONE_NUMBER',
  'US_INDIVIDUAL_TAXPAYER_IDENTIFICATION_NUMBER',
];

export const REDACTION_TEXT = '[REDACTED]';

export type DlpClientOptions = NonNullable<
  ConstructorParameters<typeof DlpServiceClient>[0]
>;

export function createDlpClient(options: DlpClientOptions = {}): DlpApi {
  return new DlpServiceClient(options);
}

export interface EnsuredTemplate {
  name: string;
  /** True when this call created the template. */
  created: boolean;
}

/**
 * Provisions the DLP inspect and deidentify templates that advanced SDP
 * templates point to.
 */
export class DlpTemplates {
  constructor(
    private readonly client: DlpApi,
    private readonly project: string,
    private readonly location: string
  ) {}

  inspectTemplateName(templateId: string): string {
    return inspectTemplatePath(this.project, this.location, templateId);
  }

  deidentifyTemplateName(templateId: string): string {
    return deidentifyTemplatePath(this.project, this.location, templateId);
  }

  /** Returns the inspect template, creating it if it does not exist yet. */
  async ensureInspectTemplate(templateId: string): Promise<EnsuredTemplate> {
    const name = this.inspectTemplateName(templateId);
    try {
      await this.client.getInspectTemplate({ name });
      return { name, created: false };
    } catch (e) {
      if (!isNotFound(e)) throw e;
    }
    const [template] = await this.client.createInspectTemplate({
      parent: locationPath(this.project, this.location),
      templateId,
      inspectTemplate: {
        displayName: 'Model Armor inspect template',
        inspectConfig: {
          infoTypes: INSPECT_INFO_TYPES.map((infoType) => ({ name: infoType })),
        },
      },
    });
    logger.info(`Created DLP inspect template ${template.name ?? name}`);
    return { name: template.name ?? name, created: true };
  }

  /** Returns the deidentify template, creating it if it does not exist yet. */
  async ensureDeidentifyTemplate(
    templateId: string
  ): Promise<EnsuredTemplate> {
    const name = this.deidentifyTemplateName(templateId);
    try {
      await this.client.getDeidentifyTemplate({ name });
      return { name, created: false };
    } catch (e) {
      if (!isNotFound(e)) throw e;
    }
    const [template] = await this.client.createDeidentifyTemplate({
      parent: locationPath(this.project, this.location),
      templateId,
      deidentifyTemplate: {
        displayName: 'Model Armor deidentify template',
        deidentifyConfig: {
          infoTypeTransformations: {
            transformations: [
              {
                primitiveTransformation: {
                  replaceConfig: { newValue: { stringValue: REDACTION_TEXT } },
                },
              },
            ],
          },
        },
      },
    });
    logger.info(`Created DLP deidentify template ${template.name ?? name}`);
    return { name: template.name ?? name, created: true };
  }

  async deleteInspectTemplate(name: string): Promise<void> {
    await this.client.deleteInspectTemplate({ name });
  }

  async deleteDeidentifyTemplate(name: string): Promise<void> {
    await this.client.deleteDeidentifyTemplate({ name });
  }
}
