/**
 * A closed token describing the runtime type of a stored value. Values
 * produced on different processes for one distributed object must share a
 * tag.
 *
 * Plain objects (whose prototype is `Object.prototype` or `null`) are
 * `'object'` and arrays are `'array'`. Instances of any other class,
 * built-ins such as `Map` and typed arrays included, are tagged with their
 * constructor's name.
 */
export type TypeTag =
  | 'undefined'
  | 'null'
  | 'boolean'
  | 'number'
  | 'bigint'
  | 'string'
  | 'symbol'
  | 'function'
  | 'array'
  | 'object'
  | `class:${string}`;

/**
 * Computes the {@link TypeTag} of a value.
 *
 * @param value - The value to describe.
 * @returns The value's tag.
 */
export function typeTagOf(value: unknown): TypeTag {
  switch (typeof value) {
    case 'undefined':
      return 'undefined';
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    case 'bigint':
      return 'bigint';
    case 'string':
      return 'string';
    case 'symbol':
      return 'symbol';
    case 'function':
      return 'function';
    default:
      break;
  }
  return typeof value === 'object' && value !== null
    ? objectTagOf(value)
    : 'null';
}

/**
 * Computes the {@link TypeTag} of an object.
 *
 * @param value - The object to describe.
 * @returns The object's tag.
 */
function objectTagOf(value: object): TypeTag {
  if (Array.isArray(value)) {
    return 'array';
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  if (prototype === null || prototype === Object.prototype) {
    return 'object';
  }
  // Prototype chains need not end in Object.prototype.
  const constructor: unknown = value.constructor;
  const name = typeof constructor === 'function' ? constructor.name : '';
  return `class:${name || 'anonymous'}`;
}
