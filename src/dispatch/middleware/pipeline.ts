/**
 * Middleware composition.
 */

import type { DispatchRequest, DispatchResponse, Middleware, DispatchNext } from '../types.js';

/** Guards a continuation so a middleware can run the rest of the chain once. */
function once(next: DispatchNext): DispatchNext {
  let called = false;
  return () => {
    if (called) {
      return Promise.reject(new Error('next() called multiple times in middleware'));
    }
    called = true;
    return next();
  };
}

/**
 * Chain middlewares into one. The first in the list sees the request first
 * and the response last; the terminal handler passed at call time runs
 * after the final middleware calls next().
 */
export function compose(middlewares: readonly Middleware[]): Middleware {
  return (request: DispatchRequest, terminal: DispatchNext): Promise<DispatchResponse> => {
    const chain = middlewares.reduceRight<DispatchNext>(
      (next, middleware) => () => middleware(request, once(next)),
      terminal,
    );
    return chain();
  };
}
