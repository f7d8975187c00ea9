export interface JotSchema<T> {
  parse(value: unknown, path?: string): T;
}

class StringNode implements JotSchema<string> {
  constructor(readonly options: { minLength?: number } = {}) {}

  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }
    if (this.options.minLength !== undefined && value.length < this.options.minLength) {
      throw new TypeError(`${path} must be at least ${this.options.minLength} characters`);
    }

    return value;
  }
}

class NumberNode implements JotSchema<number> {
  constructor(readonly options: { integer?: boolean } = {}) {}

  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new TypeError(`${path} must be a finite number`);
    }
    if (this.options.integer && !Number.isInteger(value)) {
      throw new TypeError(`${path} must be an integer`);
    }

    return value;
  }
}

class BooleanNode implements JotSchema<boolean> {
  parse(value: unknown, path: string = 'value'): boolean {
    if (typeof value !== 'boolean') {
      throw new TypeError(`${path} must be a boolean`);
    }

    return value;
  }
}

class UnknownNode implements JotSchema<unknown> {
  parse(value: unknown): unknown {
    return value;
  }
}

class EnumNode<TValue extends readonly string[]> implements JotSchema<TValue[number]> {
  constructor(readonly values: TValue) {}

  parse(value: unknown, path: string = 'value'): TValue[number] {
    const match = this.values.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new TypeError(`${path} must be one of ${this.values.join(', ')}`);
    }

    return match;
  }
}

class NullableNode<T> implements JotSchema<T | null> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | null {
    if (value === null) {
      return null;
    }

    return this.inner.parse(value, path);
  }
}

class OptionalNode<T> implements JotSchema<T | undefined> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | undefined {
    if (value === undefined) {
      return undefined;
    }

    return this.inner.parse(value, path);
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

class RecordNode<T> implements JotSchema<Record<string, T>> {
  constructor(readonly valueNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): Record<string, T> {
    if (!isPlainRecord(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const result: Record<string, T> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = this.valueNode.parse(item, `${path}.${key}`);
    }

    return result;
  }
}

// Keys of the shape are always copied; unknown keys on the input are dropped.
class ObjectNode<Shape extends Record<string, JotSchema<unknown>>> implements JotSchema<{ [K in keyof Shape]: InferJot<Shape[K]> }> {
  constructor(readonly shape: Shape) {}

  parse(value: unknown, path: string = 'value') {
    if (!isPlainRecord(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const result: Record<string, unknown> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      result[key] = node.parse(value[key], `${path}.${key}`);
    }

    return result as { [K in keyof Shape]: InferJot<Shape[K]> };
  }
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const jot = {
  string: (options?: { minLength?: number }): JotSchema<string> => new StringNode(options),
  number: (options?: { integer?: boolean }): JotSchema<number> => new NumberNode(options),
  boolean: (): JotSchema<boolean> => new BooleanNode(),
  unknown: (): JotSchema<unknown> => new UnknownNode(),
  enum: <TValue extends readonly string[]>(values: TValue): JotSchema<TValue[number]> => new EnumNode(values),
  nullable: <T>(schema: JotSchema<T>): JotSchema<T | null> => new NullableNode(schema),
  optional: <T>(schema: JotSchema<T>): JotSchema<T | undefined> => new OptionalNode(schema),
  array: <T>(schema: JotSchema<T>): JotSchema<T[]> => new ArrayNode(schema),
  record: <T>(schema: JotSchema<T>): JotSchema<Record<string, T>> => new RecordNode(schema),
  object: <Shape extends Record<string, JotSchema<unknown>>>(shape: Shape) => new ObjectNode(shape),
};

export function safeParse<T>(schema: JotSchema<T>, value: unknown, path?: string): { ok: true; value: T } | { ok: false; error: string } {
  try {
    return { ok: true, value: schema.parse(value, path) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
