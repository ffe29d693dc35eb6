/**
 * Result type for compiler phases that can fail
 */

import type { GalaxyError } from "#errors";

export enum Severity {
  Error = "error",
  Warning = "warning",
}

export type MessagesBySeverity<E extends GalaxyError> = {
  [S in Severity]?: E[];
};

export type Result<T, E extends GalaxyError> =
  | {
      success: true;
      value: T;
      messages: MessagesBySeverity<E>;
    }
  | {
      success: false;
      messages: MessagesBySeverity<E>;
    };

export namespace Result {
  export const ok = <T, E extends GalaxyError>(value: T): Result<T, E> => ({
    success: true,
    value,
    messages: {},
  });

  /**
   * Successful result that still carries warnings (or other messages)
   */
  export const okWith = <T, E extends GalaxyError>(
    value: T,
    messages: readonly E[],
  ): Result<T, E> => ({
    success: true,
    value,
    messages: group(messages),
  });

  export const err = <T, E extends GalaxyError>(
    errors: E | E[],
  ): Result<T, E> => ({
    success: false,
    messages: group(Array.isArray(errors) ? errors : [errors]),
  });

  export const map = <T, U, E extends GalaxyError>(
    result: Result<T, E>,
    f: (value: T) => U,
  ): Result<U, E> =>
    result.success
      ? { success: true, value: f(result.value), messages: result.messages }
      : result;

  export const countErrors = <T, E extends GalaxyError>(
    result: Result<T, E>,
  ): number => result.messages[Severity.Error]?.length ?? 0;

  export const firstError = <T, E extends GalaxyError>(
    result: Result<T, E>,
  ): E | undefined => result.messages[Severity.Error]?.[0];

  export function group<E extends GalaxyError>(
    messages: Iterable<E>,
  ): MessagesBySeverity<E> {
    const grouped: MessagesBySeverity<E> = {};
    for (const message of messages) {
      const bucket = grouped[message.severity] ?? [];
      bucket.push(message);
      grouped[message.severity] = bucket;
    }
    return grouped;
  }
}
