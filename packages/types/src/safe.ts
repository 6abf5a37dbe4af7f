import * as _ from 'radash'

/**
 * Set of helpers to turn throwing calls into result tuples
 * Also works to wrap around try catch statements
 */

export type Safe<T, E extends Error | string = Error> =
  | SafeError<E>
  | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error | string> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

/**
 * Run a synchronous function, capturing anything it throws as the error slot
 */
export function safeCall<T>(fn: () => T): Safe<T> {
  // boxed so radash resolves the non-promise overload for any T
  const [error, boxed] = _.try(() => ({ value: fn() }))()
  if (boxed === undefined) {
    return safeError(error ?? new Error('safeCall: call threw no error value'))
  }
  return safeResult(boxed.value)
}
