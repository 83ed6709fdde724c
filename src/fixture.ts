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

import type { ModelArmorApi } from './client.js';
import type { ResolvedConfig } from './config.js';
import { DlpTemplates, type DlpApi } from './dlp.js';
import { getErrorDetails } from './errors.js';
import { FloorSettingManager } from './floor-settings.js';
import { logger } from './logger.js';
import {
  floorSettingPath,
  locationPath,
  templatePath,
  uniqueId,
} from './names.js';
import {
  advancedSdpTemplateConfig,
  baseTemplateConfig,
  basicSdpTemplateConfig,
  labeledTemplateConfig,
  maliciousUriTemplateConfig,
} from './template-config.js';
import { TemplateManager, type TemplateField } from './templates.js';
import type { FloorSettingParent, Template, TemplateConfig } from './types.js';

export interface ModelArmorFixtureOptions {
  client: ModelArmorApi;
  dlpClient: DlpApi;
  config: ResolvedConfig;
  /** Pause before each template creation, to stay under quota. */
  throttleMs?: number;
}

export type FixtureCleanup =
  | { kind: 'template'; name: string }
  | { kind: 'inspectTemplate'; name: string }
  | { kind: 'deidentifyTemplate'; name: string }
  | { kind: 'floorSetting'; parent: FloorSettingParent };

/**
 * Provisions Model Armor and DLP resources for integration runs and removes
 * them again on `dispose()`.
 *
 * Not safe for concurrent use.
 */
export class ModelArmorFixture {
  readonly templates: TemplateManager;
  readonly floorSettings: FloorSettingManager;
  readonly dlpTemplates: DlpTemplates;
  readonly projectId: string;
  readonly location: string;

  private readonly config: ResolvedConfig;
  private readonly throttleMs: number;
  private cleanups: FixtureCleanup[] = [];

  constructor(options: ModelArmorFixtureOptions) {
    this.config = options.config;
    this.projectId = options.config.projectId;
    this.location = options.config.location;
    this.throttleMs = options.throttleMs ?? 0;
    this.templates = new TemplateManager(options.client);
    this.floorSettings = new FloorSettingManager(options.client);
    this.dlpTemplates = new DlpTemplates(
      options.dlpClient,
      this.projectId,
      this.location
    );
  }

  generateUniqueId(): string {
    return uniqueId();
  }

  /** Full name for a new template id built from `prefix`. */
  templateName(prefix: string): string {
    return templatePath(
      this.projectId,
      this.location,
      `${prefix}-${this.generateUniqueId()}`
    );
  }

  get parent(): string {
    return locationPath(this.projectId, this.location);
  }

  /** Currently registered cleanups, most recent last. */
  get pendingCleanups(): readonly FixtureCleanup[] {
    return this.cleanups;
  }

  async createTemplate(
    config: TemplateConfig,
    templateId: string = `test-template-${this.generateUniqueId()}`
  ): Promise<Template> {
    if (this.throttleMs > 0) {
      await new Promise((r) => setTimeout(r, this.throttleMs));
    }
    const template = await this.templates.create(
      this.parent,
      templateId,
      config
    );
    const name =
      template.name ?? templatePath(this.projectId, this.location, templateId);
    this.cleanups.push({ kind: 'template', name });
    return template;
  }

  createBaseTemplate(templateId?: string): Promise<Template> {
    return this.createTemplate(baseTemplateConfig(), templateId);
  }

  createBasicSdpTemplate(templateId?: string): Promise<Template> {
    return this.createTemplate(basicSdpTemplateConfig(), templateId);
  }

  /**
   * Creates a template backed by the configured DLP inspect and deidentify
   * templates, provisioning them first when they do not exist. Only DLP
   * templates created here are deleted on dispose.
   */
  async createAdvancedSdpTemplate(templateId?: string): Promise<Template> {
    const inspect = await this.dlpTemplates.ensureInspectTemplate(
      this.config.inspectTemplateId
    );
    if (inspect.created) {
      this.cleanups.push({ kind: 'inspectTemplate', name: inspect.name });
    }
    const deidentify = await this.dlpTemplates.ensureDeidentifyTemplate(
      this.config.deidentifyTemplateId
    );
    if (deidentify.created) {
      this.cleanups.push({
        kind: 'deidentifyTemplate',
        name: deidentify.name,
      });
    }
    return this.createTemplate(
      advancedSdpTemplateConfig(inspect.name, deidentify.name),
      templateId
    );
  }

  createMaliciousUriTemplate(templateId?: string): Promise<Template> {
    return this.createTemplate(maliciousUriTemplateConfig(), templateId);
  }

  createTemplateWithLabels(
    labels: Record<string, string>,
    templateId?: string
  ): Promise<Template> {
    return this.createTemplate(labeledTemplateConfig(labels), templateId);
  }

  getTemplate(name: string): Promise<Template> {
    return this.templates.get(name);
  }

  updateTemplate(
    template: Template,
    updateMask: TemplateField[]
  ): Promise<Template> {
    return this.templates.update(template, updateMask);
  }

  /** Deletes a template now and drops it from the cleanup list. */
  async deleteTemplate(name: string): Promise<void> {
    await this.templates.delete(name);
    this.cleanups = this.cleanups.filter(
      (c) => !(c.kind === 'template' && c.name === name)
    );
  }

  /** Resets the floor setting of `parent` on dispose. */
  registerFloorSettingReset(parent: FloorSettingParent): void {
    this.cleanups.push({ kind: 'floorSetting', parent });
  }

  /**
   * Removes everything registered, most recent first. Failures are logged
   * and do not stop the remaining cleanups.
   */
  async dispose(): Promise<void> {
    const cleanups = this.cleanups.reverse();
    this.cleanups = [];
    for (const cleanup of cleanups) {
      try {
        await this.runCleanup(cleanup);
      } catch (error) {
        const target = cleanupTarget(cleanup);
        logger.warn(`Cleanup of ${target} failed: ${getErrorDetails(error)}`);
      }
    }
  }

  private async runCleanup(cleanup: FixtureCleanup): Promise<void> {
    switch (cleanup.kind) {
      case 'template':
        await this.templates.delete(cleanup.name);
        return;
      case 'inspectTemplate':
        await this.dlpTemplates.deleteInspectTemplate(cleanup.name);
        return;
      case 'deidentifyTemplate':
        await this.dlpTemplates.deleteDeidentifyTemplate(cleanup.name);
        return;
      case 'floorSetting':
        await this.floorSettings.reset(cleanup.parent);
        return;
    }
  }
}

function cleanupTarget(cleanup: FixtureCleanup): string {
  return cleanup.kind === 'floorSetting'
    ? floorSettingPath(cleanup.parent)
    : cleanup.name;
}
