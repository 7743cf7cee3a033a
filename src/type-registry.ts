/**
 * TypeRegistry — name-indexed table of sum types, aliases and
 * constructors built from grammar text.
 *
 * Types and constructors live in separate namespaces: `Meta` is both a
 * type and its only constructor. Names resolve by table lookup only.
 */

import {
  type AliasType, type Constructor, type Field, type NamedType, type PrimitiveName, type StructuralType,
  type SumType, type TypeDescriptor, formatType,
} from './descriptors.js';
import { GrammarSyntaxError, ShapeMismatchError, UnknownConstructorError, UnknownTypeError, describeValue } from './errors.js';
import { type GrammarDecl, type Production, parseGrammar, parseProduction, sourceLines } from './grammar-parser.js';
import { Node, Tuple, type Value } from './tree.js';

export type NodeFactory = (...args: Value[]) => Node;

export interface DataOptions {
  newtype?: boolean;
  tagged?: boolean;
  /** Source line, for error reports. */
  line?: number;
}

export class TypeRegistry {
  private types = new Map<string, NamedType>();
  private constructors = new Map<string, Constructor>();

  // --- Declaration ---

  /** Declare a sum type with no constructors yet. */
  declareData(name: string, options: DataOptions = {}): SumType {
    this.assertFreeType(name, options.line);
    const type: SumType = {
      kind: 'sum',
      name,
      constructors: [],
      tagged: options.tagged ?? false,
      newtype: options.newtype ?? false,
    };
    this.types.set(name, type);
    return type;
  }

  declareAlias(name: string, target: TypeDescriptor, line?: number): AliasType {
    this.assertFreeType(name, line);
    const alias: AliasType = { kind: 'alias', name, target };
    this.types.set(name, alias);
    return alias;
  }

  /**
   * Declare one constructor per non-blank line of `productions` under the sum
   * type `base`: `Header Int Attr [Inline]`.
   */
  declareTypes(productions: string, base: SumType | string, firstLine = 1): Constructor[] {
    const parent = typeof base === 'string' ? this.resolveSum(base) : base;
    return sourceLines(productions, firstLine).map(src => this.addConstructor(parent, parseProduction(src.text.trim(), src.line)));
  }

  /** Load every declaration of a grammar file. */
  loadGrammar(text: string): this {
    for (const decl of parseGrammar(text)) this.addDecl(decl);
    return this;
  }

  private addDecl(decl: GrammarDecl): void {
    if (decl.kind === 'alias') {
      this.declareAlias(decl.name, decl.target, decl.line);
      return;
    }
    const type = this.declareData(decl.name, { newtype: decl.newtype, tagged: decl.tagged, line: decl.line });
    for (const production of decl.productions) this.addConstructor(type, production);
  }

  private addConstructor(parent: SumType, production: Production): Constructor {
    if (this.constructors.has(production.name)) {
      throw new GrammarSyntaxError(`Constructor '${production.name}' is already declared`, production.line, 1);
    }
    const ctor: Constructor = {
      name: production.name,
      fields: production.fields,
      shape: production.shape,
      listArg: production.fields.length === 1 && production.fields[0].type.kind === 'list',
      parent,
    };
    parent.constructors.push(ctor);
    this.constructors.set(ctor.name, ctor);
    return ctor;
  }

  private assertFreeType(name: string, line = 0): void {
    if (this.types.has(name)) {
      throw new GrammarSyntaxError(`Type '${name}' is already declared`, line, 1);
    }
  }

  // --- Lookup ---

  /** Type namespace first, then constructors. */
  resolve(name: string): NamedType | Constructor {
    const found = this.types.get(name) ?? this.constructors.get(name);
    if (!found) throw new UnknownTypeError(name);
    return found;
  }

  resolveType(name: string): NamedType {
    const type = this.types.get(name);
    if (!type) throw new UnknownTypeError(name);
    return type;
  }

  resolveSum(name: string): SumType {
    const type = this.resolveType(name);
    if (type.kind !== 'sum') throw new UnknownTypeError(name);
    return type;
  }

  resolveConstructor(name: string, path?: string): Constructor {
    const ctor = this.constructors.get(name);
    if (!ctor) throw new UnknownConstructorError(name, path);
    return ctor;
  }

  hasType(name: string): boolean {
    return this.types.has(name);
  }

  hasConstructor(name: string): boolean {
    return this.constructors.has(name);
  }

  typeNames(): string[] {
    return Array.from(this.types.keys());
  }

  constructorNames(): string[] {
    return Array.from(this.constructors.keys());
  }

  /** Follow aliases down to a structural descriptor or a sum type. */
  unalias(type: TypeDescriptor): StructuralType | SumType {
    let current = type;
    const seen = new Set<string>();
    while (current.kind === 'ref') {
      if (seen.has(current.name)) throw new UnknownTypeError(current.name);
      seen.add(current.name);
      const named = this.resolveType(current.name);
      if (named.kind === 'sum') return named;
      current = named.target;
    }
    return current;
  }

  /** Every referenced type name must be declared. */
  checkReferences(): void {
    const visit = (type: TypeDescriptor): void => {
      switch (type.kind) {
        case 'primitive':
          return;
        case 'ref':
          this.resolveType(type.name);
          return;
        case 'list':
        case 'option':
          visit(type.item);
          return;
        case 'tuple':
          type.items.forEach(visit);
          return;
        case 'map':
          visit(type.key);
          visit(type.value);
          return;
      }
    };
    for (const type of this.types.values()) {
      if (type.kind === 'alias') visit(type.target);
      else type.constructors.forEach(c => c.fields.forEach(f => visit(f.type)));
    }
  }

  clear(): void {
    this.types.clear();
    this.constructors.clear();
  }

  // --- Construction ---

  /** Build a node, checking arity and the shape of every argument. */
  construct(name: string, args: readonly Value[]): Node {
    const ctor = this.resolveConstructor(name);
    if (args.length !== ctor.fields.length) {
      throw new ShapeMismatchError(name, `${ctor.fields.length} argument(s)`, `${args.length}`, name);
    }
    ctor.fields.forEach((field: Field, i) => {
      this.check(args[i], field.type, `${name}[${field.name ?? i}]`);
    });
    return new Node(name, args);
  }

  factory(name: string): NodeFactory {
    this.resolveConstructor(name);
    return (...args: Value[]) => this.construct(name, args);
  }

  /** One factory per constructor: `const { Para, Str } = registry.factories()`. */
  factories(): Record<string, NodeFactory> {
    const result: Record<string, NodeFactory> = {};
    for (const name of this.constructors.keys()) result[name] = this.factory(name);
    return result;
  }

  /** Is `value` a node of the sum type `typeName`? */
  isA(value: Value, typeName: string): boolean {
    return value instanceof Node
      && this.hasConstructor(value.tag)
      && this.resolveConstructor(value.tag).parent.name === typeName;
  }

  /**
   * Structural type check. Nested nodes are checked by membership only:
   * they were checked when they were built.
   */
  check(value: Value, type: TypeDescriptor, path: string): void {
    const fail = (): never => {
      throw new ShapeMismatchError(path, formatType(type), describeValue(value));
    };
    const target = this.unalias(type);

    if (target.kind === 'sum') {
      if (!(value instanceof Node) || !this.hasConstructor(value.tag)) fail();
      else if (this.resolveConstructor(value.tag).parent !== target) fail();
      return;
    }

    switch (target.kind) {
      case 'primitive':
        if (!matchesPrimitive(value, target.name)) fail();
        return;
      case 'list':
        if (!Array.isArray(value)) return fail();
        value.forEach((item, i) => this.check(item, target.item, `${path}[${i}]`));
        return;
      case 'tuple':
        if (!(value instanceof Tuple) || value.length !== target.items.length) return fail();
        value.items.forEach((item, i) => this.check(item, target.items[i], `${path}[${i}]`));
        return;
      case 'map':
        if (!(value instanceof Map)) return fail();
        for (const [k, v] of value) {
          this.check(k, target.key, `${path}.key`);
          this.check(v, target.value, `${path}[${JSON.stringify(k)}]`);
        }
        return;
      case 'option':
        if (value !== null) this.check(value, target.item, path);
        return;
    }
  }
}

export function matchesPrimitive(value: Value, name: PrimitiveName): boolean {
  switch (name) {
    case 'String':
    case 'Text':
      return typeof value === 'string';
    case 'Int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'Double':
      return typeof value === 'number' && Number.isFinite(value);
    case 'Bool':
      return typeof value === 'boolean';
  }
}
