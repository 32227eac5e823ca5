/**
 * Stable error codes carried by every DispatchError.
 */

export const ErrorCode = {
  CommandNotFound: "COMMAND_NOT_FOUND",
  CommandNotImplemented: "COMMAND_NOT_IMPLEMENTED",
  ArgumentMissingRequired: "ARGUMENT_MISSING_REQUIRED",
  ArgumentTooMany: "ARGUMENT_TOO_MANY",
  ArgumentInvalidValue: "ARGUMENT_INVALID_VALUE",
  OptionUnknown: "OPTION_UNKNOWN",
  OptionMissingValue: "OPTION_MISSING_VALUE",
  OptionInvalidValue: "OPTION_INVALID_VALUE",
  RegistryInvalid: "REGISTRY_INVALID",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

const USAGE_CODES: ReadonlySet<ErrorCodeValue> = new Set([
  ErrorCode.ArgumentMissingRequired,
  ErrorCode.ArgumentTooMany,
  ErrorCode.ArgumentInvalidValue,
  ErrorCode.OptionUnknown,
  ErrorCode.OptionMissingValue,
  ErrorCode.OptionInvalidValue,
]);

/** Process exit code for an unhandled error of the given code. */
export function exitCodeFor(code: ErrorCodeValue | undefined): number {
  if (code === ErrorCode.CommandNotFound) return 3;
  if (code !== undefined && USAGE_CODES.has(code)) return 2;
  return 1;
}
