/**
 * Per-build cache of generated object types.
 *
 * graphql-js requires every named type to be a single instance, and a cyclic
 * resource graph reaches the same resource more than once. Each type name is
 * owned by the resource key that first claimed it.
 *
 * @module graphql/type-cache
 * @category GraphQL
 */

import type { GraphQLObjectType } from 'graphql';
import type { SchemaError } from '../errors';
import type { ExecutionContext } from '../runtime/context';
import type { ParentLinkage } from '../runtime/resolver';
import type { DataObject } from '../schema/types';

export type ElementType = GraphQLObjectType<DataObject, ExecutionContext>;
export type ConnectionType = GraphQLObjectType<ParentLinkage, ExecutionContext>;

export class TypeCache {
  private elements = new Map<string, ElementType>();
  private connections = new Map<string, ConnectionType>();
  private owners = new Map<string, string>();
  private reported: SchemaError[] = [];

  /**
   * Resource key that already owns `name`, when it is not `owner`.
   */
  conflict(name: string, owner: string): string | undefined {
    const current = this.owners.get(name);
    return current !== undefined && current !== owner ? current : undefined;
  }

  element(name: string, owner: string, create: () => ElementType): ElementType {
    let type = this.elements.get(name);
    if (!type) {
      type = create();
      this.elements.set(name, type);
      this.owners.set(name, owner);
    }
    return type;
  }

  connection(name: string, owner: string, create: () => ConnectionType): ConnectionType {
    let type = this.connections.get(name);
    if (!type) {
      type = create();
      this.connections.set(name, type);
      this.owners.set(name, owner);
    }
    return type;
  }

  /**
   * Record a failure met while a type's fields were being produced.
   */
  report(error: SchemaError): void {
    this.reported.push(error);
  }

  get errors(): readonly SchemaError[] {
    return this.reported;
  }

  get size(): number {
    return this.elements.size + this.connections.size;
  }
}
