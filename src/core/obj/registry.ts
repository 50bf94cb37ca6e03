// src/core/obj/registry.ts
// Registry of value type descriptors

import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { done, unknownType } from "../../outcome/constructors";
import type { Obj } from "./obj";
import type { ObjType } from "./types";

/**
 * Registry of value types. Each descriptor is registered once and shared.
 */
export class TypeRegistry {
  private types: Map<string, ObjType<unknown>> = new Map();

  /**
   * Register a descriptor. Throws on duplicate names.
   */
  register<P>(type: ObjType<P>): void {
    if (this.types.has(type.name)) {
      throw new Error(`Value type already registered: ${type.name}`);
    }
    this.types.set(type.name, type);
  }

  get(name: string): ObjType<unknown> | undefined {
    return this.types.get(name);
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  getAll(): ObjType<unknown>[] {
    return Array.from(this.types.values());
  }

  names(): string[] {
    return Array.from(this.types.keys()).sort();
  }

  /**
   * Convert a value to the named type through the descriptor's `setFromAny`.
   * On failure the value keeps whatever rep it had.
   */
  convertToType(obj: Obj, name: string): Outcome<void> {
    const type = this.types.get(name);
    if (!type) {
      return unknownType(name);
    }
    if (obj.hasCompatibleRep(type, () => true)) {
      return done(undefined, { cached: true });
    }

    const result = type.setFromAny(obj);
    if (isFail(result)) {
      return result;
    }
    obj.setRep(type, result.value);
    return done(undefined);
  }
}
