/**
 * Named failure policies for side calls that must not sink the main flow.
 *
 * failOpen: a gate that errors lets the request through with a fallback value.
 * bestEffort: a side effect that errors is reported, never thrown.
 */

import { errorMessage } from './error-handling';

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

export async function failOpen<T>(name: string, fn: () => Promise<T>, fallback: T): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    console.warn(`[FailOpen] ${name} failed, continuing with fallback: ${errorMessage(error)}`);
    return fallback;
  }
}

export async function bestEffort<T>(name: string, fn: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    console.warn(`[BestEffort] ${name} failed: ${errorMessage(error)}`);
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}
