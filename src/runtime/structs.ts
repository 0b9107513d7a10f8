import {
  SprigBuiltin,
  SprigStruct,
  SprigStructType,
  SprigValue,
  sprigBoolean,
  sprigBuiltin,
  typeOf,
} from './values';
import { ErrorCode, SprigError, signatureMismatch } from './errors';

export const DEFAULT_STRUCT_CAPACITY = 1024;

/**
 * Append-only table of struct types. Ids are assigned in registration
 * order, so two definitions with the same name are still distinct types.
 */
export class StructRegistry {
  private types: SprigStructType[] = [];
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_STRUCT_CAPACITY) {
    this.capacity = capacity;
  }

  get size(): number {
    return this.types.length;
  }

  register(name: string, fields: string[]): SprigStructType {
    if (this.types.length >= this.capacity) {
      throw new SprigError(ErrorCode.TooManyStructs, {
        detail: `limit is ${this.capacity}`,
      });
    }
    const type: SprigStructType = {
      kind: 'struct-type',
      id: this.types.length,
      name,
      fields: [...fields],
    };
    this.types.push(type);
    return type;
  }

  /** The most recent type registered under `name`. */
  find(name: string): SprigStructType | undefined {
    for (let i = this.types.length - 1; i >= 0; i--) {
      if (this.types[i].name === name) return this.types[i];
    }
    return undefined;
  }

  /**
   * For an unbound identifier of the form `<struct>-<field>` naming a
   * registered struct, the 029 error to raise instead of 001.
   */
  resolveAccessor(identifier: string): SprigError | undefined {
    for (let i = this.types.length - 1; i >= 0; i--) {
      const type = this.types[i];
      const prefix = `${type.name}-`;
      if (identifier.length > prefix.length && identifier.startsWith(prefix)) {
        const field = identifier.slice(prefix.length);
        if (!type.fields.includes(field)) {
          return noSuchField(type, field);
        }
      }
    }
    return undefined;
  }
}

export function noSuchField(type: SprigStructType, field: string): SprigError {
  return new SprigError(ErrorCode.NoSuchField, { detail: `${type.name} has no field ${field}` });
}

export function getField(instance: SprigStruct, field: string): SprigValue {
  const index = instance.type.fields.indexOf(field);
  if (index < 0) throw noSuchField(instance.type, field);
  return instance.values[index];
}

/** The constructor, predicate and accessors bound by `define-struct`. */
export function structProcedures(type: SprigStructType): SprigBuiltin[] {
  const n = type.fields.length;
  const procs: SprigBuiltin[] = [
    sprigBuiltin(`make-${type.name}`, { min: n, max: n }, (args): SprigStruct => ({
      kind: 'struct',
      type,
      values: [...args],
    })),
    sprigBuiltin(`is-${type.name}?`, { min: 1, max: 1 }, ([value]) =>
      sprigBoolean(value.kind === 'struct' && value.type.id === type.id)),
  ];

  type.fields.forEach((field, index) => {
    procs.push(sprigBuiltin(`${type.name}-${field}`, { min: 1, max: 1 }, ([value]) => {
      if (value.kind !== 'struct') {
        throw signatureMismatch(type.name, typeOf(value));
      }
      if (value.type.id !== type.id) {
        throw noSuchField(value.type, field);
      }
      return value.values[index];
    }));
  });

  return procs;
}
