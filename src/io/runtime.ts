/**
 * Running Effect programs behind Promise APIs
 *
 * The Promise wrappers reject with the error that failed the program, not
 * with a fiber failure, so `instanceof` checks against the classes in
 * `errors.ts` keep working for callers that never touch Effect.
 */

import { Cause, Effect, Exit, type Layer, type ManagedRuntime } from "effect";

/**
 * Run a program to completion and unwrap its exit
 */
export async function runToPromise<A, E>(effect: Effect.Effect<A, E>): Promise<A> {
  return unwrap(await Effect.runPromiseExit(effect));
}

/**
 * Provide a layer, run the program, and release the layer's resources
 */
export function runWithLayer<A, E, R, LE>(
  effect: Effect.Effect<A, E, R>,
  layer: Layer.Layer<R, LE>
): Promise<A> {
  return runToPromise(effect.pipe(Effect.provide(layer)));
}

/**
 * Run a program on a long-lived runtime whose services outlive the call
 */
export async function runOnRuntime<A, E, R, RE>(
  runtime: ManagedRuntime.ManagedRuntime<R, RE>,
  effect: Effect.Effect<A, E, R>
): Promise<A> {
  return unwrap(await runtime.runPromiseExit(effect));
}

function unwrap<A, E>(exit: Exit.Exit<A, E>): A {
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
