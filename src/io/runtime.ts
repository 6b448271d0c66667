/**
 * Effect platform layer selection
 *
 * File access goes through `@effect/platform`'s FileSystem service; this
 * module supplies the Node.js implementation of it and runs programs that
 * need it behind plain Promises.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Get the Effect platform layer providing FileSystem and Path
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run an Effect, rejecting with the squashed failure itself rather than a
 * FiberFailure wrapper
 */
export async function runEffect<A, E>(program: Effect.Effect<A, E>): Promise<A> {
  const exit = await Effect.runPromiseExit(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}

/**
 * Run an Effect that needs platform services
 */
export function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  return runEffect(program.pipe(Effect.provide(getPlatform())));
}
