import { z } from 'zod';
import { ValidationError, type FieldErrors } from '../errors.js';

export const MESSAGES = {
  required: 'This field is required.',
  null: 'This field may not be null.',
  blank: 'This field may not be blank.',
  string: 'Not a valid string.',
  integer: 'A valid integer is required.',
  number: 'A valid number is required.',
} as const;

export const NON_FIELD_ERRORS = 'non_field_errors';

/**
 * Name of a value's type as reported in error messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Error map distinguishing missing, null and wrongly-typed values.
 */
export function fieldErrorMap(invalidMessage: string): z.ZodErrorMap {
  return (issue, ctx) => {
    if (issue.code !== z.ZodIssueCode.invalid_type) {
      return { message: ctx.defaultError };
    }
    if (issue.received === z.ZodParsedType.undefined) return { message: MESSAGES.required };
    if (issue.received === z.ZodParsedType.null) return { message: MESSAGES.null };
    return { message: invalidMessage };
  };
}

// Multipart bodies deliver numbers as strings
function numericInput(value: unknown): unknown {
  return typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
}

function maxLengthMessage(maxLength: number): string {
  return `Ensure this field has no more than ${maxLength} characters.`;
}

/** Trimmed string, blank allowed */
export function textField(maxLength = 255) {
  return z
    .string({ errorMap: fieldErrorMap(MESSAGES.string) })
    .trim()
    .max(maxLength, maxLengthMessage(maxLength));
}

/** Trimmed, non-blank string */
export function nameField(maxLength = 255) {
  return z
    .string({ errorMap: fieldErrorMap(MESSAGES.string) })
    .trim()
    .min(1, MESSAGES.blank)
    .max(maxLength, maxLengthMessage(maxLength));
}

export const MAX_INTEGER = 2147483647;

export function integerField(max = MAX_INTEGER) {
  return z.preprocess(
    numericInput,
    z
      .number({ errorMap: fieldErrorMap(MESSAGES.integer) })
      .int(MESSAGES.integer)
      .max(max, `Ensure this value is less than or equal to ${max}.`),
  );
}

/**
 * Fixed-point number with at most `maxDigits` digits, `decimalPlaces` of them after the point.
 */
export function decimalField(maxDigits: number, decimalPlaces: number) {
  const scale = 10 ** decimalPlaces;
  const wholeDigits = maxDigits - decimalPlaces;
  return z.preprocess(
    numericInput,
    z
      .number({ errorMap: fieldErrorMap(MESSAGES.number) })
      .finite(MESSAGES.number)
      .refine(
        value => Math.abs(value * scale - Math.round(value * scale)) < 1e-6,
        `Ensure that there are no more than ${decimalPlaces} decimal places.`,
      )
      .refine(
        value => Math.abs(value) < 10 ** wholeDigits,
        `Ensure that there are no more than ${maxDigits} digits in total.`,
      ),
  );
}

/**
 * Object schema whose non-object payloads are reported under non_field_errors.
 */
export function payloadSchema<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape, {
    errorMap: (issue, ctx) => {
      if (issue.code === z.ZodIssueCode.invalid_type && issue.path.length === 0) {
        return { message: `Invalid data. Expected a dictionary, but got ${issue.received}.` };
      }
      return { message: ctx.defaultError };
    },
  });
}

/**
 * Group zod issues by top-level field.
 */
export function toFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : NON_FIELD_ERRORS;
    const messages = (fields[field] ??= []);
    if (!messages.includes(issue.message)) {
      messages.push(issue.message);
    }
  }
  return fields;
}

/**
 * A list of primary keys that must all resolve to records of the requesting user.
 *
 * `resolve` receives the distinct well-formed ids and returns the ones that exist.
 * Schemas using it must be parsed with `safeParseAsync`.
 */
export function relatedIdsField(resolve: (ids: number[]) => Promise<Set<number>>) {
  return z.unknown().transform(async (value, ctx) => {
    const items = typeof value === 'string' ? (value === '' ? [] : [value]) : value;
    if (!Array.isArray(items)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a list of items but got type "${describeType(value)}".`,
      });
      return z.NEVER;
    }

    const ids: number[] = [];
    let malformed = false;
    for (const item of items) {
      if (typeof item === 'number' && Number.isInteger(item)) {
        ids.push(item);
      } else if (typeof item === 'string' && /^\d+$/.test(item)) {
        ids.push(Number(item));
      } else {
        malformed = true;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Incorrect type. Expected pk value, received ${describeType(item)}.`,
        });
      }
    }

    const distinct = [...new Set(ids)];
    const existing = distinct.length > 0 ? await resolve(distinct) : new Set<number>();
    const missing = distinct.filter(id => !existing.has(id));
    for (const id of missing) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid pk "${id}" - object does not exist.`,
      });
    }

    if (malformed || missing.length > 0) return z.NEVER;
    return distinct;
  });
}

/**
 * Parse `body`, throwing a ValidationError with every field problem.
 */
export async function parseOrThrow<T extends z.ZodTypeAny>(schema: T, body: unknown): Promise<z.output<T>> {
  const parsed = await schema.safeParseAsync(body);
  if (!parsed.success) {
    throw new ValidationError(toFieldErrors(parsed.error));
  }
  return parsed.data;
}
