import type { Context, Env, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { ApiException, InputValidationException } from './exceptions';
import type { JsonApiErrorDocument } from './exceptions';
import { getLogger } from './logger';

/** Media type of every JSON API document. */
export const JSON_API_CONTENT_TYPE = 'application/vnd.api+json';

/**
 * Error mapper: transforms unknown errors to ApiException.
 * Return undefined to skip this mapper and try the next one.
 */
export type ErrorMapper<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>
) => ApiException | undefined | Promise<ApiException | undefined>;

/**
 * Hook: called after mapping, before response (for logging/Sentry).
 * Hooks are fire-and-forget - errors are caught and optionally reported.
 */
export type ErrorHook<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>,
  apiException: ApiException
) => void | Promise<void>;

/**
 * Configuration options for the error handler factory.
 */
export interface ErrorHandlerConfig<E extends Env = Env> {
  /** Custom error mappers - tried in order, first non-undefined wins */
  mappers?: ErrorMapper<E>[];
  /** Error reporting hooks (logging, Sentry, etc.) */
  hooks?: ErrorHook<E>[];
  /** Add the stack trace to each error object's `meta` (default: false, never enable in production!) */
  includeStackTrace?: boolean;
  /** Default error code for unmapped errors (default: 'INTERNAL_ERROR') */
  defaultErrorCode?: string;
  /** Default error detail for unmapped errors (default: 'An internal error occurred') */
  defaultErrorMessage?: string;
  /** Log unmapped errors through the logger (default: true) */
  logUnmappedErrors?: boolean;
  /** Called when a hook throws an error */
  onHookError?: (hookError: Error, originalError: Error, ctx: Context<E>) => void;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Built-in mapper for ZodError to InputValidationException.
 */
export function zodErrorMapper(error: Error): ApiException | undefined {
  if (error instanceof ZodError) {
    return InputValidationException.fromZodError(error);
  }
  return undefined;
}

/**
 * Creates a Hono error handler that answers with JSON API error documents
 * (`{ errors: [...] }`, served as `application/vnd.api+json`).
 *
 * `MultipleDeserializationExceptions` produce one error object per problem.
 * Anything that is not an `ApiException`, an `HTTPException` or mapped by a
 * mapper becomes a generic 500.
 *
 * @example Basic usage:
 * ```typescript
 * const app = new Hono();
 * app.onError(createJsonApiErrorHandler());
 * ```
 *
 * @example With custom mappers and hooks:
 * ```typescript
 * app.onError(createJsonApiErrorHandler({
 *   mappers: [
 *     (error) => {
 *       if (error.message.includes('UNIQUE constraint failed')) {
 *         return new ApiException('Already exists', 409, 'CONFLICT');
 *       }
 *     },
 *   ],
 *   hooks: [
 *     (error, ctx, apiException) => {
 *       if (apiException.status >= 500) {
 *         Sentry.captureException(error);
 *       }
 *     },
 *   ],
 * }));
 * ```
 */
export function createJsonApiErrorHandler<E extends Env = Env>(
  config: ErrorHandlerConfig<E> = {}
): ErrorHandler<E> {
  const {
    mappers = [],
    hooks = [],
    includeStackTrace = false,
    defaultErrorCode = 'INTERNAL_ERROR',
    defaultErrorMessage = 'An internal error occurred',
    logUnmappedErrors = true,
    onHookError,
  } = config;

  // Combine custom mappers with built-in mappers
  const allMappers: ErrorMapper<E>[] = [...mappers, zodErrorMapper];

  const reportHookError = (hookErr: unknown, err: Error, ctx: Context<E>): void => {
    if (onHookError) {
      onHookError(toError(hookErr), err, ctx);
    } else {
      getLogger().warn('Error hook failed', { error: toError(hookErr).message });
    }
  };

  const mapError = async (err: Error, ctx: Context<E>): Promise<ApiException> => {
    if (err instanceof ApiException) {
      return err;
    }
    // Plain HTTPException from Hono's built-in handlers
    if (err instanceof HTTPException) {
      return new ApiException(err.message, err.status, 'HTTP_ERROR');
    }

    for (const mapper of allMappers) {
      try {
        const mapped = await mapper(err, ctx);
        if (mapped) {
          return mapped;
        }
      } catch (mapperErr) {
        getLogger().warn('Error mapper failed', { error: toError(mapperErr).message });
      }
    }

    if (logUnmappedErrors) {
      getLogger().error('Unmapped error', { error: err.message, stack: err.stack });
    }
    return new ApiException(defaultErrorMessage, 500, defaultErrorCode);
  };

  return async (err: Error, ctx: Context<E>): Promise<Response> => {
    const apiException = await mapError(err, ctx);

    // Hooks are fire-and-forget
    for (const hook of hooks) {
      try {
        const result = hook(err, ctx, apiException);
        if (result instanceof Promise) {
          result.catch((hookErr: unknown) => reportHookError(hookErr, err, ctx));
        }
      } catch (hookErr) {
        reportHookError(hookErr, err, ctx);
      }
    }

    const document: JsonApiErrorDocument = apiException.toJSON();

    // Add stack trace if enabled (development only!)
    if (includeStackTrace && err.stack) {
      for (const error of document.errors) {
        error.meta = { ...error.meta, stack: err.stack };
      }
    }

    return ctx.body(JSON.stringify(document), apiException.status, {
      'Content-Type': JSON_API_CONTENT_TYPE,
    });
  };
}
