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
import { logger } from './logger.js';
import { floorSettingPath } from './names.js';
import { toFilterConfig } from './template-config.js';
import type {
  FilterSettings,
  FloorSetting,
  FloorSettingParent,
} from './types.js';

export type FloorSettingField =
  | 'filter_config'
  | 'enable_floor_setting_enforcement';

/**
 * Reads and writes the baseline filter policy of a project, folder or
 * organization.
 */
export class FloorSettingManager {
  constructor(private readonly client: ModelArmorApi) {}

  async get(parent: FloorSettingParent): Promise<FloorSetting> {
    const [floorSetting] = await this.client.getFloorSetting({
      name: floorSettingPath(parent),
    });
    return floorSetting;
  }

  async update(
    floorSetting: FloorSetting,
    updateMask: FloorSettingField[]
  ): Promise<FloorSetting> {
    const [updated] = await this.client.updateFloorSetting({
      floorSetting,
      updateMask: { paths: updateMask },
    });
    return updated;
  }

  /** Replaces the filters and turns enforcement on or off. */
  configure(
    parent: FloorSettingParent,
    settings: FilterSettings,
    enforce: boolean
  ): Promise<FloorSetting> {
    return this.update(
      {
        name: floorSettingPath(parent),
        filterConfig: toFilterConfig(settings),
        enableFloorSettingEnforcement: enforce,
      },
      ['filter_config', 'enable_floor_setting_enforcement']
    );
  }

  /** Clears all filters and disables enforcement. */
  async reset(parent: FloorSettingParent): Promise<FloorSetting> {
    const floorSetting = await this.configure(parent, {}, false);
    logger.debug(`Reset floor setting ${floorSetting.name}`);
    return floorSetting;
  }
}
