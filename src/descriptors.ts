/**
 * Type descriptors — the registry's metadata for grammar productions.
 */

export type PrimitiveName = 'String' | 'Text' | 'Int' | 'Double' | 'Bool';

export const PRIMITIVE_NAMES: readonly PrimitiveName[] = ['String', 'Text', 'Int', 'Double', 'Bool'];

export type TypeDescriptor =
  | { kind: 'primitive'; name: PrimitiveName }
  | { kind: 'ref'; name: string }
  | { kind: 'list'; item: TypeDescriptor }
  | { kind: 'tuple'; items: TypeDescriptor[] }
  | { kind: 'map'; key: TypeDescriptor; value: TypeDescriptor }
  | { kind: 'option'; item: TypeDescriptor };

/** Every descriptor except a by-name reference. */
export type StructuralType = Exclude<TypeDescriptor, { kind: 'ref' }>;

export interface Field {
  /** Record field name, or null for positional fields. */
  name: string | null;
  type: TypeDescriptor;
}

export interface Constructor {
  name: string;
  fields: Field[];
  shape: 'record' | 'positional';
  /** The only field is a list: its wire payload is the bare list. */
  listArg: boolean;
  /** Back-reference to the owning sum type. */
  parent: SumType;
}

export interface SumType {
  kind: 'sum';
  name: string;
  constructors: Constructor[];
  /** Keep the "t" tag in v2 even with a single constructor. */
  tagged: boolean;
  newtype: boolean;
}

export interface AliasType {
  kind: 'alias';
  name: string;
  target: TypeDescriptor;
}

export type NamedType = SumType | AliasType;

// --- Helpers ---

const PRIMITIVES = new Set<string>(PRIMITIVE_NAMES);

export function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVES.has(name);
}

export const ref = (name: string): TypeDescriptor => ({ kind: 'ref', name });
export const listOf = (item: TypeDescriptor): TypeDescriptor => ({ kind: 'list', item });

/** A sum type whose single constructor makes the tag inferable. */
export function isSingleConstructor(type: SumType): boolean {
  return type.constructors.length === 1;
}

/** Render a descriptor back into grammar notation. */
export function formatType(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'primitive':
    case 'ref':
      return type.name;
    case 'list':
      return `[${formatType(type.item)}]`;
    case 'tuple':
      return `(${type.items.map(formatType).join(', ')})`;
    case 'map':
      return `Map ${formatAtom(type.key)} ${formatAtom(type.value)}`;
    case 'option':
      return `Maybe ${formatAtom(type.item)}`;
  }
}

function formatAtom(type: TypeDescriptor): string {
  return type.kind === 'map' || type.kind === 'option' ? `(${formatType(type)})` : formatType(type);
}

/** Render a constructor as a production line. */
export function formatConstructor(ctor: Constructor): string {
  if (ctor.shape === 'record') {
    const fields = ctor.fields.map(f => `${f.name ?? ''} :: ${formatType(f.type)}`);
    return `${ctor.name} { ${fields.join(', ')} }`;
  }
  return [ctor.name, ...ctor.fields.map(f => formatAtom(f.type))].join(' ');
}
