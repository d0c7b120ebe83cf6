import { deepFreeze } from "./deep_freeze";

/** Detached, frozen copy; later mutation of `data` never reaches the snapshot. */
export function createSnapshot<T>(data: T): T {
  return deepFreeze(structuredClone(data));
}
