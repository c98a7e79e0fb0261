/**
 * Effect platform layer selection and Promise bridging
 *
 * File I/O is written against `@effect/platform` services; this module
 * supplies the Node.js layer and runs effects behind Promise-based APIs.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Get the Effect platform layer providing FileSystem, Path and friends
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a self-contained effect, rejecting with the original failure
 *
 * `Effect.runPromise` wraps failures in a fiber failure; callers of this
 * library expect the error they would have seen from plain Promise code.
 */
export async function runEffect<A, E>(effect: Effect.Effect<A, E>): Promise<A> {
  const exit = await Effect.runPromiseExit(effect);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}

/**
 * Run an effect that needs the platform services
 */
export function runPlatformEffect<A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  return runEffect(effect.pipe(Effect.provide(getPlatform())));
}
