import type { DataResult, TaskResult } from '@todo/core';

export const ExitCode = {
  Ok: 0,
  Failure: 1,
  Validation: 2,
  NotFound: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(result: TaskResult | DataResult<unknown>): ExitCode {
  switch (result.type) {
    case 'success': return ExitCode.Ok;
    case 'validation-error': return ExitCode.Validation;
    case 'not-found': return ExitCode.NotFound;
    case 'storage-error': return ExitCode.Failure;
  }
}
