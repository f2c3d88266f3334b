import { describe, it, expect, vi } from 'vitest';
import { GraphQLObjectType, getNamedType, graphql, validateSchema } from 'graphql';
import { buildGraphQLSchema } from './schema-builder';
import { configure } from '../config';
import { emptyExecutionContext } from '../runtime/context';
import { ResourceRegistry } from '../runtime/registry';
import { createLogger } from '../logger';
import { defineResource, field, forwardRelation, handler } from '../schema';
import { Courses, Drafts, Instructors, Sessions } from '../__tests__/fixtures/resources';

function registry(): ResourceRegistry {
  return new ResourceRegistry([Courses, Instructors, Sessions, Drafts]);
}

describe('buildGraphQLSchema', () => {
  it('builds a valid schema', () => {
    const { schema } = buildGraphQLSchema(registry());

    expect(validateSchema(schema)).toEqual([]);
  });

  it('offers a MULTI_GET field and one field per finder', () => {
    const { schema, rootFields } = buildGraphQLSchema(registry());

    expect(rootFields).toEqual(['coursesV1', 'coursesV1ByName', 'instructorsV1', 'instructorsV1ByCourse']);
    expect(Object.keys(schema.getQueryType()?.getFields() ?? {})).toEqual([
      '_resources',
      'coursesV1',
      'coursesV1ByName',
      'instructorsV1',
      'instructorsV1ByCourse',
    ]);
  });

  it('gives finder fields the finder parameters', () => {
    const fields = buildGraphQLSchema(registry()).schema.getQueryType()?.getFields();

    expect(fields?.coursesV1.args.map((arg) => arg.name)).toEqual(['start', 'limit']);
    expect(fields?.coursesV1ByName.args.map((arg) => `${arg.name}: ${String(arg.type)}`)).toEqual([
      'start: String',
      'limit: Int',
      'name: String!',
    ]);
    expect(fields?.instructorsV1ByCourse.args.map((arg) => arg.name)).toEqual([
      'start',
      'limit',
      'courseId',
      'department',
    ]);
  });

  it('reports fields it cannot build and keeps the rest', () => {
    const { errors } = buildGraphQLSchema(registry());

    expect(errors).toEqual([
      {
        kind: 'MissingMultiGetHandler',
        resourceName: 'sessions.v2',
        fieldName: 'sessionsV2',
        message: "Field 'sessionsV2' needs a MULTI_GET handler on 'sessions.v2'",
      },
      {
        kind: 'SchemaMissing',
        resourceName: 'drafts.v1',
        fieldName: 'draftsV1',
        message: "Cannot find schema for 'drafts.v1'",
      },
    ]);
  });

  it('logs a warning per skipped root field', () => {
    const log = vi.fn();
    configure({ logger: createLogger({ log, timestamp: false }) });

    buildGraphQLSchema(registry());

    expect(log).toHaveBeenCalledTimes(2);
    expect(log).toHaveBeenCalledWith(
      'warn',
      "[restgraph] WARN Skipping root field 'sessionsV2': Field 'sessionsV2' needs a MULTI_GET handler on 'sessions.v2'",
      { resource: 'sessions.v2', kind: 'MissingMultiGetHandler' }
    );
  });

  it('collects relation failures found while types are built', () => {
    const Lessons = defineResource('lessons', 1, {
      handlers: [handler.multiGet()],
      fields: { id: field.id(), title: field.string() },
      relations: { ghosts: forwardRelation('ghosts.v1') },
    });

    const { schema, errors } = buildGraphQLSchema(new ResourceRegistry([Lessons]));

    expect(errors.map((e) => [e.kind, e.resourceName, e.fieldName])).toEqual([
      ['ResourceNotFound', 'ghosts.v1', 'ghosts'],
    ]);
    const lessonType = schema.getType('LessonsV1');
    expect(lessonType).toBeInstanceOf(GraphQLObjectType);
    if (lessonType instanceof GraphQLObjectType) {
      expect(Object.keys(lessonType.getFields())).toEqual(['id', 'title']);
    }
  });

  it('keeps the first resource when two resources share a GraphQL name', () => {
    const Lessons = defineResource('lessons', 1, { handlers: [handler.multiGet()], fields: { title: field.string() } });
    const ShoutedLessons = defineResource('Lessons', 1, { handlers: [handler.multiGet()], fields: { title: field.int() } });

    const { schema, errors, rootFields } = buildGraphQLSchema(new ResourceRegistry([Lessons, ShoutedLessons]));

    expect(rootFields).toEqual(['lessonsV1']);
    expect(errors).toEqual([
      {
        kind: 'NameConflict',
        resourceName: 'Lessons.v1',
        fieldName: 'lessonsV1',
        message: "GraphQL name 'lessonsV1' of 'Lessons.v1' is already used by 'lessons.v1'",
      },
    ]);
    expect(Object.keys(schema.getQueryType()?.getFields() ?? {})).toEqual(['_resources', 'lessonsV1']);
    const lessonType = schema.getType('LessonsV1');
    expect(lessonType).toBeInstanceOf(GraphQLObjectType);
    if (lessonType instanceof GraphQLObjectType) {
      expect(String(lessonType.getFields().title.type)).toBe('String!');
    }
  });

  it('shares connection types between root and relation fields', () => {
    const { schema } = buildGraphQLSchema(registry());
    const query = schema.getQueryType()?.getFields();
    const courseType = schema.getType('CoursesV1');

    expect(query?.instructorsV1.type).toBe(query?.instructorsV1ByCourse.type);
    expect(courseType).toBeInstanceOf(GraphQLObjectType);
    if (courseType instanceof GraphQLObjectType) {
      expect(getNamedType(courseType.getFields().instructors.type)).toBe(query?.instructorsV1.type);
    }
  });

  it('honours a custom query type name', () => {
    const { schema } = buildGraphQLSchema(registry(), { queryTypeName: 'RootQuery' });

    expect(schema.getQueryType()?.name).toBe('RootQuery');
  });

  it('lists registered resources', async () => {
    const { schema } = buildGraphQLSchema(registry());

    const result = await graphql({ schema, source: '{ _resources }', contextValue: emptyExecutionContext() });

    expect(result.errors).toBeUndefined();
    expect(result.data).toEqual({ _resources: ['courses.v1', 'instructors.v1', 'sessions.v2', 'drafts.v1'] });
  });
});
