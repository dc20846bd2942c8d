/**
 * Error utilities
 */

import {
  ApiError,
  EdgeGridConfigError,
  findError,
  isNotFoundError,
  isValidationError,
} from "@propctl/core";

export { getErrorMessage } from "@propctl/core";

/**
 * A follow-up suggestion for errors the user can usually fix, printed
 * under the error message.
 */
export function getErrorHint(error: unknown): string | undefined {
  if (findError(error, EdgeGridConfigError)) {
    return "Export EDGEGRID_HOST, EDGEGRID_CLIENT_TOKEN, EDGEGRID_CLIENT_SECRET and EDGEGRID_ACCESS_TOKEN, or pick another section with --section.";
  }
  if (isValidationError(error)) {
    return "Check the arguments against `propctl <command> --help`.";
  }
  if (isNotFoundError(error)) {
    return "Check the id and that the credentials can see it.";
  }
  const status = findError(error, ApiError)?.statusCode;
  if (status === 401 || status === 403) {
    return "The API client credentials were rejected for this resource.";
  }
  return undefined;
}
