/**
 * An explicit mapping from type name to table descriptor.
 *
 * Tables may refer to other tables by name (for instance a tree node that
 * contains a vector of nodes). Such references are resolved through the
 * registry when the field is encoded or decoded, so a type does not need to
 * be fully defined before a type that references it.
 *
 * @module
 */
import { UnresolvedTypeError } from "../core/errors.ts"
import type { TableDescriptor, TypeRef } from "./types.ts"

export class TypeRegistry {
  private readonly types: ReadonlyMap<string, TableDescriptor>

  private constructor(types: ReadonlyMap<string, TableDescriptor>) {
    this.types = types
  }

  static make(descriptors: Iterable<TableDescriptor> = []): TypeRegistry {
    const types = new Map<string, TableDescriptor>()
    for (const descriptor of descriptors) {
      types.set(descriptor.name, descriptor)
    }
    return new TypeRegistry(types)
  }

  /**
   * Returns a registry that additionally contains `descriptor`, replacing any
   * type registered under the same name.
   */
  add(descriptor: TableDescriptor): TypeRegistry {
    return new TypeRegistry(new Map([...this.types, [descriptor.name, descriptor]]))
  }

  get(name: string): TableDescriptor | undefined {
    return this.types.get(name)
  }

  has(name: string): boolean {
    return this.types.has(name)
  }

  get names(): ReadonlyArray<string> {
    return Array.from(this.types.keys())
  }

  /**
   * Resolves a type reference, throwing `UnresolvedTypeError` for names that
   * are not registered.
   */
  resolve(ref: TypeRef): TableDescriptor {
    if (typeof ref !== "string") {
      return ref
    }
    const descriptor = this.types.get(ref)
    if (descriptor === undefined) {
      throw new UnresolvedTypeError({ name: ref })
    }
    return descriptor
  }
}

export const empty: TypeRegistry = TypeRegistry.make()
