// src/core/obj/obj.ts
// Dual-representation value: canonical text and/or one cached rep

import { makeRep, type InternalRep, type ObjType } from "./types";

/**
 * Obj: A value that holds canonical text, a cached internal rep, or both.
 *
 * Values are created and owned by the surrounding interpreter. Library code
 * only reads their text and swaps their rep. Mutation is single-owner: a
 * value must not be shared between concurrently running callers.
 */
export class Obj {
  private bytes: string | null;
  private rep: InternalRep | null;

  private constructor(bytes: string | null, rep: InternalRep | null) {
    this.bytes = bytes;
    this.rep = rep;
  }

  static fromString(text: string): Obj {
    return new Obj(text, null);
  }

  static fromRep<P>(type: ObjType<P>, payload: P): Obj {
    return new Obj(null, makeRep(type, payload));
  }

  // ─────────────────────────────────────────────────────────────────
  // Text
  // ─────────────────────────────────────────────────────────────────

  /**
   * Return canonical text, regenerating it from the rep when it was dropped.
   */
  getString(): string {
    if (this.bytes !== null) {
      return this.bytes;
    }
    if (this.rep === null) {
      throw new Error("Obj.getString: value has neither text nor internal rep");
    }
    this.bytes = this.rep.type.updateString(this.rep.payload);
    return this.bytes;
  }

  hasStringRep(): boolean {
    return this.bytes !== null;
  }

  /**
   * Drop canonical text so that the next `getString` regenerates it.
   */
  invalidateStringRep(): void {
    if (this.rep === null) {
      throw new Error("Obj.invalidateStringRep: value has no internal rep to regenerate text from");
    }
    this.bytes = null;
  }

  // ─────────────────────────────────────────────────────────────────
  // Internal rep
  // ─────────────────────────────────────────────────────────────────

  typeName(): string | undefined {
    return this.rep?.type.name;
  }

  hasRep(): boolean {
    return this.rep !== null;
  }

  /**
   * Payload of the cached rep, if it is of `type`.
   */
  getRep<P>(type: ObjType<P>): P | undefined {
    const rep = this.rep;
    if (rep === null || rep.type !== type) return undefined;
    return type.owns(rep.payload) ? rep.payload : undefined;
  }

  /**
   * Whether the cached rep is of `type` and accepted by `predicate`.
   * Never touches the rep.
   */
  hasCompatibleRep<P>(type: ObjType<P>, predicate: (payload: P) => boolean): boolean {
    const payload = this.getRep(type);
    return payload !== undefined && predicate(payload);
  }

  /**
   * Install a rep. A rep of the same type whose descriptor can `assign` is
   * updated in place; anything else is freed through its own descriptor
   * first.
   */
  setRep<P>(type: ObjType<P>, payload: P): void {
    const current = this.rep;
    if (current !== null && current.type === type && type.assign && type.owns(current.payload)) {
      type.assign(current.payload, payload);
      return;
    }
    this.releaseRep();
    this.rep = makeRep(type, payload);
  }

  /**
   * Detach the rep, keeping the value's text.
   */
  freeRep(): void {
    if (this.rep === null) return;
    this.getString();
    this.releaseRep();
  }

  // ─────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────

  /**
   * Copy the value. The copy gets its own payload from the descriptor's `dup`.
   */
  duplicate(): Obj {
    const rep = this.rep;
    const repCopy = rep === null ? null : makeRep(rep.type, rep.type.dup(rep.payload));
    return new Obj(this.bytes, repCopy);
  }

  /**
   * Release the value's rep and text. The value must not be used afterwards.
   */
  dispose(): void {
    this.releaseRep();
    this.bytes = null;
  }

  private releaseRep(): void {
    const rep = this.rep;
    if (rep === null) return;
    this.rep = null;
    rep.type.free(rep.payload);
  }
}
