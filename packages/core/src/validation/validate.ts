import { z } from 'zod';

/** Where in the request an invalid value was found */
export type IssueLocation = 'body' | 'query' | 'path';

export interface FieldIssue {
  readonly loc: ReadonlyArray<string | number>;
  readonly msg: string;
  readonly type: string;
}

export type ValidationResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'invalid'; readonly issues: readonly FieldIssue[] };

/** Flatten a ZodError into one entry per offending field */
export function formatIssues(error: z.ZodError, location: IssueLocation): FieldIssue[] {
  return error.issues.flatMap((issue): FieldIssue[] => {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      return issue.keys.map(key => ({
        loc: [location, key],
        msg: `Unknown field '${key}'`,
        type: issue.code,
      }));
    }
    return [{ loc: [location, ...issue.path], msg: issue.message, type: issue.code }];
  });
}

/** Parse without throwing. Nothing of an invalid value is returned. */
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  location: IssueLocation,
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(value);
  if (result.success) {
    return { type: 'success', data: result.data };
  }
  return { type: 'invalid', issues: formatIssues(result.error, location) };
}
