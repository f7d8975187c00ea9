import { describe, expect, it } from 'vitest';
import { jot, safeParse } from '../jot.js';

describe('jot', () => {
  const schema = jot.object({
    id: jot.string({ minLength: 1 }),
    count: jot.number({ integer: true }),
    level: jot.nullable(jot.enum(['low', 'high'] as const)),
    tags: jot.optional(jot.array(jot.string())),
  });

  it('parses a matching value and drops unknown keys', () => {
    expect(schema.parse({ id: 'a', count: 2, level: null, extra: true })).toEqual({
      id: 'a',
      count: 2,
      level: null,
      tags: undefined,
    });
  });

  it('reports the path of the first problem', () => {
    expect(safeParse(schema, { id: 'a', count: 1.5, level: 'low' }, 'entry')).toEqual({
      ok: false,
      error: 'entry.count must be an integer',
    });
    expect(safeParse(schema, { id: 'a', count: 1, level: 'low', tags: ['x', 3] })).toEqual({
      ok: false,
      error: 'value.tags[1] must be a string',
    });
    expect(safeParse(schema, { id: 'a', count: 1, level: 'mid' })).toEqual({
      ok: false,
      error: 'value.level must be one of low, high',
    });
  });
});
