import { z } from 'zod';
import type { Schema } from '.';

/**
 * One-field envelope for values a document codec refuses at the root
 * (numbers, strings, booleans, null). Never surfaces to callers.
 */
export interface TypeWrapper<T> {
  object: T;
}

export function wrap<T>(object: T): TypeWrapper<T> {
  return { object };
}

/**
 * Schema for `{ object: T }`. Strict, so an envelope never decodes as a
 * plain object type and vice versa. The `object` key must be present even
 * when `T` admits undefined, so `{}` is never read as an envelope.
 */
export function wrapperSchema<T>(schema: Schema<T>): Schema<TypeWrapper<T>> {
  return z
    .object({ object: z.unknown() })
    .strict()
    .transform((envelope, ctx): TypeWrapper<T> => {
      if (!Object.hasOwn(envelope, 'object')) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Missing "object" field', path: ['object'] });
        return z.NEVER;
      }
      const inner = schema.safeParse(envelope.object);
      if (!inner.success) {
        for (const issue of inner.error.issues) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: issue.message,
            path: ['object', ...issue.path],
          });
        }
        return z.NEVER;
      }
      return { object: inner.data };
    });
}
