/**
 * Stack trace capture for pointpack errors.
 *
 * V8 runtimes (Node.js, Chrome) expose Error.captureStackTrace, which trims
 * the error constructor frames from the recorded stack. Elsewhere the stack
 * set by the Error constructor is kept as is.
 */

type ErrorConstructorLike = abstract new (...args: never[]) => Error;

interface V8ErrorStatics {
  captureStackTrace(targetObject: object, constructorOpt?: ErrorConstructorLike): void;
}

function hasV8CaptureStackTrace(
  errorConstructor: ErrorConstructor
): errorConstructor is ErrorConstructor & V8ErrorStatics {
  return 'captureStackTrace' in errorConstructor &&
    typeof errorConstructor.captureStackTrace === 'function';
}

/**
 * Record the stack on `error`, omitting `constructorOpt` and every frame above it.
 *
 * @example
 * ```typescript
 * class MyError extends Error {
 *   constructor(message: string) {
 *     super(message);
 *     this.name = 'MyError';
 *     captureStackTrace(this, MyError);
 *   }
 * }
 * ```
 */
export function captureStackTrace(
  error: Error,
  constructorOpt?: ErrorConstructorLike
): void {
  if (hasV8CaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}
