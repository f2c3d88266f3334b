import { describe, it, expect } from 'vitest';
import { GraphQLList, GraphQLObjectType, getNamedType, isListType, isObjectType } from 'graphql';
import { buildPaginatedField, getConnectionType, paginatedComplexity } from './paginated-field';
import { TypeCache } from './type-cache';
import { configure } from '../config';
import { SchemaGenerationError } from '../errors';
import { ResourceRegistry } from '../runtime/registry';
import { defineResource, field, forwardRelation, handler, param, reverseRelation } from '../schema';
import { Courses, Drafts, Instructors, Sessions } from '../__tests__/fixtures/resources';

const registry = new ResourceRegistry([Courses, Instructors, Sessions, Drafts]);

function argNames(result: ReturnType<typeof buildPaginatedField>): string[] {
  if (!result.ok) throw new Error(result.error.message);
  return result.value.arguments.map((arg) => arg.name);
}

describe('buildPaginatedField', () => {
  describe('failures', () => {
    it('reports an unknown resource', () => {
      const result = buildPaginatedField(registry, 'missing.v1', 'missing');

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'ResourceNotFound',
          resourceName: 'missing.v1',
          fieldName: 'missing',
          message: "Resource 'missing.v1' is not registered",
        },
      });
    });

    it('reports a resource without an element schema', () => {
      const result = buildPaginatedField(registry, 'drafts.v1', 'drafts');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('SchemaMissing');
      }
    });

    it('reports classification failures', () => {
      const result = buildPaginatedField(registry, 'sessions.v2', 'sessions');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('MissingMultiGetHandler');
      }
    });
  });

  describe('arguments', () => {
    it('offers pagination arguments and hides the identifier list', () => {
      const result = buildPaginatedField(registry, 'instructors.v1', 'instructors', {
        relation: forwardRelation('instructors.v1').relation,
      });

      expect(argNames(result)).toEqual(['start', 'limit']);
    });

    it('hides arguments bound by a reverse relation', () => {
      const result = buildPaginatedField(registry, 'instructors.v1', 'teachingStaff', {
        relation: { kind: 'reverse', relationType: 'FINDER', arguments: { q: 'byCourse', courseId: '$id' } },
      });

      expect(argNames(result)).toEqual(['start', 'limit', 'department']);
    });

    it('never exposes a bound argument or ids even when the handler declares both', () => {
      const Products = defineResource('products', 1, {
        handlers: [handler.multiGet([param.string('category'), param.int('minPrice')])],
        fields: { id: field.id() },
      });
      const products = new ResourceRegistry([Products]);

      const result = buildPaginatedField(products, 'products.v1', 'related', {
        relation: reverseRelation('products.v1', 'MULTI_GET', { category: '$category' }).relation,
      });

      expect(argNames(result)).toEqual(['start', 'limit', 'minPrice']);
    });

    it('defaults limit to the configured page size', () => {
      configure({ defaults: { limit: 35 } });

      const result = buildPaginatedField(registry, 'courses.v1', 'coursesV1');

      expect(result.ok).toBe(true);
      if (result.ok) {
        const limit = result.value.arguments.find((arg) => arg.name === 'limit');
        expect(limit?.defaultValue).toBe(35);
      }
    });

    it('keeps pagination arguments when the handler declares the same names', () => {
      const recent = handler.finder('recent', [param.string('limit'), param.string('topic')]);

      const result = buildPaginatedField(registry, 'courses.v1', 'coursesV1Recent', { handlerOverride: recent });

      expect(argNames(result)).toEqual(['start', 'limit', 'topic']);
      expect(result.ok && String(result.value.arguments[1].type)).toBe('Int');
    });

    it('serves the field with the override handler', () => {
      const byName = Courses.handlers.find((h) => h.name === 'byName');

      const result = buildPaginatedField(registry, 'courses.v1', 'coursesV1ByName', { handlerOverride: byName });

      expect(result.ok && result.value.handler.name).toBe('byName');
      expect(argNames(result)).toEqual(['start', 'limit', 'name']);
    });
  });

  describe('complexity', () => {
    const built = buildPaginatedField(registry, 'courses.v1', 'coursesV1');
    if (!built.ok) throw new Error(built.error.message);
    const descriptor = built.value;

    it('scales with the page size', () => {
      expect(descriptor.complexity(20, 1.0)).toBe(20);
      expect(descriptor.complexity(100, 0.5)).toBe(50);
    });

    it('floors small pages at one block of ten', () => {
      expect(descriptor.complexity(1, 2.0)).toBe(20);
      expect(descriptor.complexity(9, 1.0)).toBe(10);
    });

    it('counts whole blocks of ten', () => {
      expect(descriptor.complexity(25, 1.0)).toBe(20);
    });

    it('uses the default page size when limit is absent', () => {
      expect(descriptor.complexity(undefined, 1.0)).toBe(20);
    });

    it('exposes an estimator through field extensions', () => {
      expect(descriptor.extensions.complexity({ args: { limit: 30 }, childComplexity: 2 })).toBe(60);
      expect(descriptor.extensions.complexity({ args: {}, childComplexity: 1 })).toBe(20);
    });

    it('applies the configured factor', () => {
      configure({ defaults: { complexityFactor: 3 } });

      const result = buildPaginatedField(registry, 'courses.v1', 'coursesV1');

      expect(result.ok && result.value.complexity(20, 1)).toBe(6);
    });
  });

  it('reports a connection name already owned by another resource', () => {
    const lower = defineResource('lessons', 1, { handlers: [handler.multiGet()], fields: {} });
    const upper = defineResource('Lessons', 1, { handlers: [handler.multiGet()], fields: {} });
    const lessons = new ResourceRegistry([lower, upper]);
    const cache = new TypeCache();
    getConnectionType(lessons, 'lessons.v1', cache);

    const result = buildPaginatedField(lessons, 'Lessons.v1', 'twin', {
      relation: forwardRelation('Lessons.v1').relation,
      cache,
    });

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'NameConflict',
        resourceName: 'Lessons.v1',
        fieldName: 'twin',
        message: "GraphQL name 'LessonsV1Connection' of 'Lessons.v1' is already used by 'lessons.v1'",
      },
    });
    expect(() => getConnectionType(lessons, 'Lessons.v1', cache)).toThrow(
      "GraphQL name 'LessonsV1Connection' of 'Lessons.v1' is already used by 'lessons.v1'"
    );
  });

  it('freezes the descriptor', () => {
    const result = buildPaginatedField(registry, 'courses.v1', 'coursesV1');

    expect(result.ok && Object.isFrozen(result.value)).toBe(true);
    expect(result.ok && Object.isFrozen(result.value.arguments)).toBe(true);
    expect(result.ok && result.value.arguments.every((arg) => Object.isFrozen(arg))).toBe(true);
  });
});

describe('paginatedComplexity', () => {
  it('multiplies blocks of ten by the factor and the child cost', () => {
    expect(paginatedComplexity(20, 1.0, 10.0)).toBe(20);
    expect(paginatedComplexity(1, 2.0, 10.0)).toBe(20);
  });
});

describe('getConnectionType', () => {
  it('names the connection after the resource and version', () => {
    const type = getConnectionType(registry, 'courses.v1', new TypeCache());

    expect(type.name).toBe('CoursesV1Connection');
  });

  it('exposes elements and paging', () => {
    const type = getConnectionType(registry, 'courses.v1', new TypeCache());
    const fields = type.getFields();

    expect(Object.keys(fields)).toEqual(['elements', 'paging']);
    expect(isListType(fields.elements.type)).toBe(true);
    expect(getNamedType(fields.elements.type).name).toBe('CoursesV1');
    expect(getNamedType(fields.paging.type).name).toBe('ResponsePagination');
  });

  it('reuses one type per resource within a cache', () => {
    const cache = new TypeCache();

    expect(getConnectionType(registry, 'courses.v1', cache)).toBe(getConnectionType(registry, 'courses.v1', cache));
  });

  it('builds cyclic resource graphs', () => {
    const cache = new TypeCache();
    const courses = getConnectionType(registry, 'courses.v1', cache);

    const courseType = getNamedType(courses.getFields().elements.type);
    expect(isObjectType(courseType)).toBe(true);
    if (!(courseType instanceof GraphQLObjectType)) return;

    const instructorsConnection = getNamedType(courseType.getFields().instructors.type);
    expect(instructorsConnection.name).toBe('InstructorsV1Connection');
    if (!(instructorsConnection instanceof GraphQLObjectType)) return;

    const instructorType = getNamedType(instructorsConnection.getFields().elements.type);
    if (!(instructorType instanceof GraphQLObjectType)) return;

    expect(instructorType.getFields().courses.type).toBe(courses);
    expect(courseType.getFields().teachingStaff.type).toBe(instructorsConnection);
  });

  it('defers element type resolution until fields are requested', () => {
    const Lonely = defineResource('lonely', 1, {
      handlers: [handler.multiGet()],
      fields: { id: field.id() },
    });
    const lookups: string[] = [];
    const metadata = new ResourceRegistry([Lonely]);
    const tracking = {
      getResource: (name: string) => {
        lookups.push(name);
        return metadata.getResource(name);
      },
      getSchema: metadata.getSchema.bind(metadata),
      getResources: metadata.getResources.bind(metadata),
    };

    const cache = new TypeCache();

    const type = getConnectionType(tracking, 'lonely.v1', cache);
    expect(lookups).toEqual(['lonely.v1']);
    expect(cache.size).toBe(1);

    type.getFields();
    expect(lookups).toEqual(['lonely.v1', 'lonely.v1']);
    expect(cache.size).toBe(2);
  });

  it('has no fields when the element type cannot be resolved', () => {
    const Ghost = defineResource('ghost', 1, { handlers: [handler.multiGet()], fields: {} });
    let calls = 0;
    const metadata = {
      getResource: () => (calls++ === 0 ? Ghost : undefined),
      getSchema: (resource: typeof Ghost) => resource.schema,
      getResources: () => [Ghost],
    };
    const cache = new TypeCache();

    const type = getConnectionType(metadata, 'ghost.v1', cache);

    expect(type.getFields()).toEqual({});
    expect(cache.errors.map((e) => e.kind)).toEqual(['ResourceNotFound']);
  });

  it('throws when the resource or its schema is absent', () => {
    expect(() => getConnectionType(registry, 'missing.v1', new TypeCache())).toThrow(SchemaGenerationError);
    expect(() => getConnectionType(registry, 'drafts.v1', new TypeCache())).toThrow('Cannot find schema for drafts.v1');
  });

  it('lists elements of the target type', () => {
    const type = getConnectionType(registry, 'instructors.v1', new TypeCache());
    const elements = type.getFields().elements.type;

    expect(elements).toBeInstanceOf(GraphQLList);
  });
});
