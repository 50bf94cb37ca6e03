// src/core/obj/index.ts
// Value cell and type descriptor exports

export { Obj } from "./obj";
export { type ObjType, type InternalRep, makeRep } from "./types";
export { TypeRegistry } from "./registry";

import { TypeRegistry } from "./registry";
import { indexType } from "../lookup/indexType";

/**
 * Shared registry, seeded with every value type this package defines.
 */
export const defaultTypeRegistry = new TypeRegistry();
defaultTypeRegistry.register(indexType);
