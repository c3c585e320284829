/**
 * Error handling utilities
 *
 * @module error-handler
 *
 * @remarks
 * Secondary failures (a rollback that fails while unwinding, a robust after-commit
 * callback, a durable cleanup action) are reported through an `ErrorHandler` built
 * with one of these strategies. A handler may itself throw (`'throw'` strategy); the
 * scope operations then finish their bookkeeping first and raise the handler's error
 * alongside the error already propagating, never in its place.
 *
 * @example
 * ```typescript
 * // Surface secondary failures to the caller
 * const strictHandler = createErrorHandler('throw');
 *
 * // Log and continue
 * const lenientHandler = createErrorHandler('log');
 *
 * // Silent
 * const silentHandler = createErrorHandler('ignore');
 * ```
 */

/**
 * Error handling strategy
 * - `throw`: Re-throw error
 * - `log`: Log error and continue
 * - `ignore`: Silent
 */
export type ErrorStrategy = 'throw' | 'log' | 'ignore';

/**
 * Where a secondary failure happened
 */
export type ScopeErrorPhase =
  | 'rollback'
  | 'savepoint-rollback'
  | 'after-commit-callback'
  | 'durable-cleanup'
  | 'dangling-transaction';

export interface ScopeErrorContext {
  readonly phase: ScopeErrorPhase;
  /** Connection alias, when the failure belongs to one */
  readonly using?: string;
}

export type ErrorHandler = (error: Error, context: ScopeErrorContext) => void;

const describeContext = (context: ScopeErrorContext): string =>
  context.using === undefined ? context.phase : `${context.phase} on '${context.using}'`;

const executeCustomHandler = (customHandler: ErrorHandler, error: Error, context: ScopeErrorContext): void => {
  try {
    customHandler(error, context);
  } catch (handlerError) {
    console.error(
      '[txscope] Error in custom error handler:',
      handlerError instanceof Error ? handlerError.message : String(handlerError),
    );
  }
};

const logErrorToConsole = (error: Error, context: ScopeErrorContext): void => {
  console.error(`[txscope] ${describeContext(context)} failed:`, error.message);
  if (error.stack) {
    console.error(error.stack);
  }
};

/**
 * Creates an error handler with the specified strategy
 *
 * @param strategy - Error handling strategy (default: 'log')
 * @param customHandler - Optional custom handler to execute before applying strategy
 *
 * @example
 * ```typescript
 * const monitoredHandler = createErrorHandler('log', (error, { phase, using }) => {
 *   monitoringService.captureError(error, { tags: { phase, connection: using } });
 * });
 * ```
 */
export const createErrorHandler = (strategy: ErrorStrategy = 'log', customHandler?: ErrorHandler): ErrorHandler => {
  return (error: Error, context: ScopeErrorContext): void => {
    if (customHandler) {
      executeCustomHandler(customHandler, error, context);
    }

    switch (strategy) {
      case 'throw':
        throw error;

      case 'log':
        logErrorToConsole(error, context);
        break;

      case 'ignore':
        break;

      default: {
        const exhaustiveCheck: never = strategy;
        console.error(`[txscope] Unknown error strategy: ${exhaustiveCheck}`);
      }
    }
  };
};

/**
 * Normalizes any thrown value to an Error instance
 */
export const normalizeError = (thrownValue: unknown): Error => {
  if (thrownValue instanceof Error) {
    return thrownValue;
  }
  return new Error(String(thrownValue));
};

/**
 * Pass a failure to `errorHandler`
 *
 * @returns What the handler threw, for the caller to raise once its bookkeeping is
 * done; `undefined` when the handler returned
 */
export const reportFailure = (
  errorHandler: ErrorHandler,
  thrownValue: unknown,
  context: ScopeErrorContext,
): Error | undefined => {
  try {
    errorHandler(normalizeError(thrownValue), context);
    return undefined;
  } catch (handlerError) {
    return normalizeError(handlerError);
  }
};

/**
 * Run `fn`, reporting its failure to `errorHandler`
 *
 * @returns The handler's own error when it threw, `undefined` otherwise
 *
 * @example
 * ```typescript
 * const handlerFailure = await withErrorHandling(
 *   () => connection.rollback(),
 *   errorHandler,
 *   { phase: 'rollback', using: 'default' },
 * );
 * ```
 */
export const withErrorHandling = async (
  fn: () => void | Promise<void>,
  errorHandler: ErrorHandler,
  context: ScopeErrorContext,
): Promise<Error | undefined> => {
  try {
    await fn();
    return undefined;
  } catch (thrownValue: unknown) {
    return reportFailure(errorHandler, thrownValue, context);
  }
};

/**
 * Collapse failures into one value to throw
 *
 * @returns `undefined` for none, the failure itself for one, an `AggregateError`
 * carrying `message` for several
 */
export const combineFailures = (failures: readonly unknown[], message: string): unknown => {
  if (failures.length === 0) {
    return undefined;
  }
  if (failures.length === 1) {
    return failures[0];
  }
  return new AggregateError(failures, message);
};

/**
 * Throw the combined failures, if any
 */
export const raiseFailures = (failures: readonly unknown[], message: string): void => {
  if (failures.length > 0) {
    throw combineFailures(failures, message);
  }
};

/**
 * Run `cleanup` while `primary` is propagating, then rethrow `primary`
 *
 * When `cleanup` fails too, both are thrown together as an `AggregateError` whose
 * `cause` is `primary`.
 */
export const unwind = async (primary: unknown, cleanup: () => Promise<void>): Promise<never> => {
  try {
    await cleanup();
  } catch (secondary) {
    throw new AggregateError(
      [primary, secondary],
      `${normalizeError(primary).message} (unwinding also failed: ${normalizeError(secondary).message})`,
      { cause: primary },
    );
  }
  throw primary;
};
