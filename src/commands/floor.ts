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

import { Command } from 'commander';
import { FloorSettingManager } from '../floor-settings.js';
import { logger } from '../logger.js';
import { fromFilterConfig } from '../template-config.js';
import {
  printJson,
  resolveFloorParent,
  runWithClient,
  type FloorParentOptions,
  type TargetOptions,
} from '../utils/command-utils.js';

function withParentOptions(command: Command): Command {
  return command
    .option(
      '--folder [id]',
      'use a folder floor setting (default MA_FOLDER_ID)'
    )
    .option(
      '--organization [id]',
      'use an organization floor setting (default MA_ORGANIZATION_ID)'
    );
}

export const floorGet = withParentOptions(
  new Command('floor:get').description('print a floor setting')
).action(async (options: FloorParentOptions, command: Command) => {
  const target: TargetOptions = command.optsWithGlobals();
  await runWithClient(target, async ({ config, client }) => {
    const floorSetting = await new FloorSettingManager(client).get(
      resolveFloorParent(options, config)
    );
    printJson(floorSetting.name ?? 'Floor setting', {
      filters: fromFilterConfig(floorSetting.filterConfig ?? {}),
      enforced: floorSetting.enableFloorSettingEnforcement === true,
    });
  });
});

export const floorReset = withParentOptions(
  new Command('floor:reset').description(
    'clear the filters of a floor setting and disable enforcement'
  )
).action(async (options: FloorParentOptions, command: Command) => {
  const target: TargetOptions = command.optsWithGlobals();
  await runWithClient(target, async ({ config, client }) => {
    const floorSetting = await new FloorSettingManager(client).reset(
      resolveFloorParent(options, config)
    );
    logger.info(`Reset floor setting ${floorSetting.name}`);
  });
});
