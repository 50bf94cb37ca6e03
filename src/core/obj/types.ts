// src/core/obj/types.ts
// Value type descriptors: the capability record behind every cached rep

import type { Outcome } from "../../outcome/outcome";
import type { Obj } from "./obj";

/**
 * ObjType: Describes one kind of internal representation.
 *
 * A descriptor is created once, registered once and shared by every value
 * that carries its kind of rep. All rep lifecycle operations on an `Obj`
 * go through it.
 */
export interface ObjType<P> {
  /** Registry key, e.g. "index" */
  readonly name: string;

  /** Narrow a stored payload back to this descriptor's payload type. */
  owns(payload: unknown): payload is P;

  /** Called whenever a payload of this type is detached from its value. */
  free(payload: P): void;

  /** Copy a payload for a duplicated value. */
  dup(payload: P): P;

  /** Regenerate canonical text from a payload. */
  updateString(payload: P): string;

  /** Build a payload from a value's text alone. */
  setFromAny(obj: Obj): Outcome<P>;

  /**
   * Overwrite an installed payload with a new one of the same type.
   * When present, `Obj.setRep` reuses the installed payload instead of
   * freeing it.
   */
  assign?(target: P, source: P): void;
}

/**
 * InternalRep: The (descriptor, payload) pair held by a value.
 * The payload was always produced for `type`.
 */
export type InternalRep = {
  readonly type: ObjType<unknown>;
  payload: unknown;
};

export function makeRep<P>(type: ObjType<P>, payload: P): InternalRep {
  return { type, payload };
}
