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

import { Status } from 'google-gax';

/**
 * Type guard to check if an error has a message property.
 */
function isErrorWithMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Returns the gRPC status code carried by an RPC error, if any.
 *
 * Errors raised by the generated clients are `GoogleError`s with a numeric
 * `code`. Anything else yields undefined.
 */
export function getStatusCode(error: unknown): Status | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  const code = error.code;
  if (typeof code !== 'number') {
    return undefined;
  }
  return isStatus(code) ? code : undefined;
}

function isStatus(code: number): code is Status {
  return code in Status;
}

export function isNotFound(error: unknown): boolean {
  return getStatusCode(error) === Status.NOT_FOUND;
}

export function isAlreadyExists(error: unknown): boolean {
  return getStatusCode(error) === Status.ALREADY_EXISTS;
}

/**
 * Safely extracts error details for logging.
 */
export function getErrorDetails(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error';
  }

  const code = getStatusCode(error);
  const message = isErrorWithMessage(error) ? error.message : undefined;

  if (message) {
    return code !== undefined ? `${message} (${Status[code]})` : message;
  }

  return String(error);
}
