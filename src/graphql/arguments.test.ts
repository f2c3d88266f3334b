import { describe, it, expect } from 'vitest';
import { GraphQLInt, GraphQLString } from 'graphql';
import { generateHandlerArguments, toFieldConfigArguments } from './arguments';
import { handler, param } from '../schema';

describe('generateHandlerArguments', () => {
  it('puts pagination arguments before handler parameters', () => {
    const finder = handler.finder('byName', [param.string('name').required()]);

    const args = generateHandlerArguments(finder, true).map((arg) => `${arg.name}: ${String(arg.type)}`);

    expect(args).toEqual(['start: String', 'limit: Int', 'name: String!']);
  });

  it('omits pagination arguments on request', () => {
    const finder = handler.finder('byName', [param.string('name')]);

    expect(generateHandlerArguments(finder, false).map((arg) => arg.name)).toEqual(['name']);
  });

  it('maps list, required and defaulted parameters', () => {
    const finder = handler.finder('search', [
      param.id('ids').list().required(),
      param.int('minScore').required().default(3),
      param.float('weight'),
      param.boolean('archived').describe('Include archived elements'),
    ]);

    const args = generateHandlerArguments(finder, false);

    expect(args.map((arg) => String(arg.type))).toEqual(['[ID!]!', 'Int', 'Float', 'Boolean']);
    expect(args[1].defaultValue).toBe(3);
    expect(args[3].description).toBe('Include archived elements');
  });

  it('leaves out parameters that reuse pagination argument names', () => {
    const recent = handler.finder('recent', [param.string('limit'), param.int('start'), param.string('topic')]);

    expect(generateHandlerArguments(recent, true).map((arg) => `${arg.name}: ${String(arg.type)}`)).toEqual([
      'start: String',
      'limit: Int',
      'topic: String',
    ]);
    expect(generateHandlerArguments(recent, false).map((arg) => arg.name)).toEqual(['limit', 'start', 'topic']);
  });

  it('declares the identifier list on MULTI_GET handlers', () => {
    expect(generateHandlerArguments(handler.multiGet(), false).map((arg) => arg.name)).toEqual(['ids']);
  });
});

describe('toFieldConfigArguments', () => {
  it('keys arguments by name', () => {
    const map = toFieldConfigArguments([
      { name: 'start', type: GraphQLString },
      { name: 'limit', type: GraphQLInt, defaultValue: 20 },
    ]);

    expect(Object.keys(map)).toEqual(['start', 'limit']);
    expect(map.limit.type).toBe(GraphQLInt);
    expect(map.limit.defaultValue).toBe(20);
  });
});
