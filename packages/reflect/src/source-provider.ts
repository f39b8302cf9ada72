/**
 * Record metadata read from TypeScript declarations.
 *
 * Interfaces, classes and object type aliases become record types; their
 * properties become fields, typed from the checker:
 *
 * | Declared type                         | Type tag                       |
 * |---------------------------------------|--------------------------------|
 * | `string`, `boolean`, `bigint`         | string, boolean, long scalars  |
 * | `number`                              | double, or `@scalar int`       |
 * | `Date`, `Uint8Array`, `Buffer`        | date, binary                   |
 * | `enum E`, union of string literals    | enum                           |
 * | `T[]`, `Array<T>`                     | array                          |
 * | `Record<string, T>`, `{ [k: string]: T }` | map                        |
 * | declared interface, class or alias    | record                         |
 * | `x?: T`, `T \| null`, `T \| undefined`  | optional                       |
 *
 * ```ts
 * const source = SourceMetadataProvider.fromSources({
 *   "models.ts": `
 *     export interface Address { \/** @rename zip *\/ zipCode: number; city?: string }
 *   `,
 * });
 * const registry = new DescriptorRegistry({ providers: [source] });
 * const Address = source.typeOf<{ zipCode: number; city?: string }>("Address");
 * materialize(Address, { zip: 10001 }, { registry });
 * ```
 */

import * as ts from "typescript";
import {
  createGenericRegistry,
  createLogger,
  SchemaDefinitionError,
  type GenericRegistry,
} from "@fieldmap/core";
import {
  enumFromCases,
  enumOf,
  recordRef,
  SCALAR_KINDS,
  type EnumType,
  type FieldMeta,
  type RecordMeta,
  type RecordType,
  type ScalarKind,
  type TypeMetadataProvider,
  type TypeTag,
} from "@fieldmap/schema";
import { jsDocTagText, literalValue } from "./annotations.js";
import { createInMemoryProgram, createProgramFromFiles, DEFAULT_COMPILER_OPTIONS } from "./program.js";

const log = createLogger("reflect");

type NamedDeclaration =
  | ts.InterfaceDeclaration
  | ts.ClassDeclaration
  | ts.TypeAliasDeclaration
  | ts.EnumDeclaration;

type FieldDeclaration = ts.PropertySignature | ts.PropertyDeclaration | ts.ParameterDeclaration;

export interface SourceProviderOptions {
  /** Merged over {@link DEFAULT_COMPILER_OPTIONS}. */
  readonly compilerOptions?: ts.CompilerOptions;
}

/** Where a type is being converted, for names and error messages. */
interface TagContext {
  readonly recordName: string;
  readonly fieldName: string;
  /** Scalar kind for `number` positions, from `@scalar`. */
  readonly numberAs: ScalarKind;
  /** Declared type node, when the field has one. */
  readonly node: ts.TypeNode | undefined;
}

function isNamedDeclaration(node: ts.Node): node is NamedDeclaration {
  return (
    ts.isInterfaceDeclaration(node) ||
    ts.isClassDeclaration(node) ||
    ts.isTypeAliasDeclaration(node) ||
    ts.isEnumDeclaration(node)
  );
}

function isFieldDeclaration(node: ts.Node): node is FieldDeclaration {
  return ts.isPropertySignature(node) || ts.isPropertyDeclaration(node) || ts.isParameter(node);
}

function isScalarKind(value: string): value is ScalarKind {
  return SCALAR_KINDS.some((kind) => kind === value);
}

function hasFlag(type: ts.Type, flags: ts.TypeFlags): boolean {
  return (type.flags & flags) !== 0;
}

const ABSENT = ts.TypeFlags.Null | ts.TypeFlags.Undefined | ts.TypeFlags.Void;

/**
 * Reflected record types are created untyped; the caller names the shape
 * it expects, as with `recordRef`.
 */
function vouch<T>(type: RecordType): RecordType<T> {
  return type as RecordType<T>;
}

export class SourceMetadataProvider implements TypeMetadataProvider {
  readonly name = "typescript-source";

  private readonly checker: ts.TypeChecker;
  private readonly declarations: GenericRegistry<string, NamedDeclaration>;
  private readonly records = createGenericRegistry<string, RecordType>({ name: "ReflectedRecords" });
  private readonly enums = createGenericRegistry<string, EnumType>({ name: "ReflectedEnums" });

  /** Reflect over source text keyed by file name. */
  static fromSources(
    files: Readonly<Record<string, string>>,
    options: SourceProviderOptions = {}
  ): SourceMetadataProvider {
    return new SourceMetadataProvider(
      createInMemoryProgram(files, { ...DEFAULT_COMPILER_OPTIONS, ...options.compilerOptions })
    );
  }

  /** Reflect over files on disk. */
  static fromFiles(fileNames: readonly string[], options: SourceProviderOptions = {}): SourceMetadataProvider {
    return new SourceMetadataProvider(
      createProgramFromFiles(fileNames, { ...DEFAULT_COMPILER_OPTIONS, ...options.compilerOptions })
    );
  }

  constructor(private readonly program: ts.Program) {
    this.checker = program.getTypeChecker();
    this.declarations = this.indexDeclarations();
  }

  /** Names of every declaration that reflects as a record, in source order. */
  get recordNames(): string[] {
    return [...this.declarations.keys()].filter((name) => this.recordDeclaration(name) !== undefined);
  }

  /**
   * The record type for a declaration. The same object is returned for every
   * call and for every field that refers to the declaration.
   *
   * @throws SchemaDefinitionError when no interface, class or object type alias has this name
   */
  typeOf<T = Record<string, unknown>>(name: string): RecordType<T> {
    if (!this.recordDeclaration(name)) {
      throw new SchemaDefinitionError(`No interface, class or object type named ${name} in the program`, name);
    }
    return vouch<T>(this.recordTypeFor(name));
  }

  /** Enum type for an `enum` declaration or a string literal union alias. */
  enumOf(name: string): EnumType {
    const declaration = this.declarations.get(name);
    if (declaration && ts.isEnumDeclaration(declaration)) return this.enumTypeFor(declaration);
    if (declaration && ts.isTypeAliasDeclaration(declaration)) {
      const literals = this.literalsOf(declaration.type);
      if (literals.length > 0) return this.literalEnum(name, literals);
    }
    throw new SchemaDefinitionError(`No enum or string literal union named ${name} in the program`, name);
  }

  metadataFor(type: RecordType): RecordMeta | undefined {
    const declaration = this.recordDeclaration(type.name);
    if (!declaration?.name) return undefined;
    const symbol = this.checker.getSymbolAtLocation(declaration.name);
    if (!symbol) return undefined;
    const declared = this.checker.getDeclaredTypeOfSymbol(symbol);
    return { name: type.name, fields: this.fieldsOf(type.name, declared) };
  }

  // ==========================================================================
  // Declarations
  // ==========================================================================

  private indexDeclarations(): GenericRegistry<string, NamedDeclaration> {
    const index = createGenericRegistry<string, NamedDeclaration>({ name: "Declarations" });
    for (const sourceFile of this.program.getSourceFiles()) {
      if (sourceFile.isDeclarationFile || this.program.isSourceFileFromExternalLibrary(sourceFile)) continue;
      for (const statement of sourceFile.statements) {
        if (!isNamedDeclaration(statement) || !statement.name) continue;
        const name = statement.name.text;
        if (index.has(name)) {
          throw new SchemaDefinitionError(`Type ${name} is declared more than once (${sourceFile.fileName})`, name);
        }
        index.set(name, statement);
      }
    }
    log.debug(`Indexed ${index.size} declarations`);
    return index;
  }

  private recordDeclaration(
    name: string
  ): ts.InterfaceDeclaration | ts.ClassDeclaration | ts.TypeAliasDeclaration | undefined {
    const declaration = this.declarations.get(name);
    if (!declaration || ts.isEnumDeclaration(declaration)) return undefined;
    if (!ts.isTypeAliasDeclaration(declaration)) return declaration;
    const aliased = this.checker.getTypeAtLocation(declaration.name);
    return this.isObjectShape(aliased) ? declaration : undefined;
  }

  /** An alias target with named properties that is not an array, tuple or function. */
  private isObjectShape(type: ts.Type): boolean {
    if (!hasFlag(type, ts.TypeFlags.Object) && !type.isIntersection()) return false;
    if (this.checker.isArrayType(type) || this.checker.isTupleType(type)) return false;
    if (type.getCallSignatures().length > 0) return false;
    return this.checker.getPropertiesOfType(type).length > 0;
  }

  private recordTypeFor(name: string): RecordType {
    return this.records.getOrCompute(name, () => recordRef(name));
  }

  // ==========================================================================
  // Fields
  // ==========================================================================

  private fieldsOf(recordName: string, type: ts.Type): FieldMeta[] {
    const fields: FieldMeta[] = [];
    for (const property of this.checker.getPropertiesOfType(type)) {
      const declaration = property.valueDeclaration ?? property.declarations?.[0];
      // methods, accessors and #private members are not fields
      if (!declaration || !isFieldDeclaration(declaration)) continue;
      if (ts.isPrivateIdentifier(declaration.name)) continue;

      const fieldName = property.getName();
      const context: TagContext = {
        recordName,
        fieldName,
        numberAs: this.scalarOverride(declaration, recordName, fieldName),
        node: declaration.type,
      };
      let tag = this.tagFor(this.checker.getTypeOfSymbol(property), context);
      if ((property.flags & ts.SymbolFlags.Optional) !== 0 && tag.kind !== "optional") {
        tag = { kind: "optional", inner: tag };
      }

      const rename = jsDocTagText(declaration, "rename");
      if (rename === "") {
        throw new SchemaDefinitionError(`${recordName}.${fieldName}: @rename needs a name`, recordName);
      }
      fields.push({
        name: fieldName,
        type: tag,
        rename,
        defaultValue: this.defaultFor(declaration, recordName, fieldName),
      });
    }
    return fields;
  }

  private scalarOverride(declaration: FieldDeclaration, recordName: string, fieldName: string): ScalarKind {
    const text = jsDocTagText(declaration, "scalar");
    if (text === undefined) return "double";
    if (text === "int" || text === "long" || text === "double") return text;
    const known = isScalarKind(text) ? `${text} does not hold numbers` : `unknown scalar '${text}'`;
    throw new SchemaDefinitionError(`${recordName}.${fieldName}: @scalar ${known}`, recordName);
  }

  private defaultFor(
    declaration: FieldDeclaration,
    recordName: string,
    fieldName: string
  ): (() => unknown) | undefined {
    const text = jsDocTagText(declaration, "default");
    if (text !== undefined) {
      let value: unknown;
      try {
        value = JSON.parse(text);
      } catch {
        throw new SchemaDefinitionError(`${recordName}.${fieldName}: @default is not valid JSON: ${text}`, recordName);
      }
      return () => structuredClone(value);
    }

    const initializer = ts.isPropertySignature(declaration) ? undefined : declaration.initializer;
    if (!initializer) return undefined;
    const literal = literalValue(initializer);
    if (!literal) {
      log.debug(`${recordName}.${fieldName}: initializer is not a literal, no default`);
      return undefined;
    }
    const value = literal.value;
    return () => structuredClone(value);
  }

  // ==========================================================================
  // Type tags
  // ==========================================================================

  private tagFor(type: ts.Type, context: TagContext): TypeTag {
    if (hasFlag(type, ts.TypeFlags.Any | ts.TypeFlags.Unknown | ts.TypeFlags.Never | ABSENT)) {
      return this.unsupported(type, context);
    }

    const enumType = this.enumTypeOf(type);
    if (enumType) return { kind: "enum", enumType };

    if (type.isUnion() && !hasFlag(type, ts.TypeFlags.Boolean)) {
      return this.unionTag(type, context);
    }

    if (hasFlag(type, ts.TypeFlags.StringLike)) return { kind: "scalar", scalar: "string" };
    if (hasFlag(type, ts.TypeFlags.NumberLike)) return { kind: "scalar", scalar: context.numberAs };
    if (hasFlag(type, ts.TypeFlags.BigIntLike)) return { kind: "scalar", scalar: "long" };
    if (hasFlag(type, ts.TypeFlags.BooleanLike)) return { kind: "scalar", scalar: "boolean" };

    const symbolName = type.getSymbol()?.getName();
    if (symbolName === "Date") return { kind: "scalar", scalar: "date" };
    if (symbolName === "Uint8Array" || symbolName === "Buffer") return { kind: "scalar", scalar: "binary" };

    if (this.checker.isTupleType(type)) return this.unsupported(type, context);
    if (this.checker.isArrayType(type)) {
      const element = type.getNumberIndexType();
      if (!element) return this.unsupported(type, context);
      return { kind: "array", element: this.tagFor(element, { ...context, node: typeArgumentNode(context.node) }) };
    }

    const name = type.aliasSymbol?.getName() ?? symbolName;
    if (name !== undefined && this.recordDeclaration(name)) {
      const record = this.recordTypeFor(name);
      return { kind: "record", record: () => record };
    }

    const indexed = type.getStringIndexType();
    if (indexed && this.checker.getPropertiesOfType(type).length === 0) {
      return { kind: "map", value: this.tagFor(indexed, { ...context, node: typeArgumentNode(context.node) }) };
    }

    return this.unsupported(type, context);
  }

  /** `null` and `undefined` members make the field optional; the rest must agree on one tag. */
  private unionTag(type: ts.UnionType, context: TagContext): TypeTag {
    const present = type.types.filter((member) => !hasFlag(member, ABSENT));
    const optional = present.length !== type.types.length;

    if (present.length === 0) return this.unsupported(type, context);

    let inner: TypeTag;
    const [only] = present;
    if (only && present.length === 1) {
      inner = this.tagFor(only, context);
    } else if (present.every((member) => hasFlag(member, ts.TypeFlags.EnumLiteral))) {
      const enumTypes = new Set(present.map((member) => this.enumTypeOf(member)));
      const [enumType] = enumTypes;
      if (enumTypes.size !== 1 || !enumType) return this.unsupported(type, context);
      inner = { kind: "enum", enumType };
    } else if (present.every((member) => hasFlag(member, ts.TypeFlags.BooleanLiteral))) {
      inner = { kind: "scalar", scalar: "boolean" };
    } else if (present.every((member) => member.isStringLiteral())) {
      inner = this.literalUnionTag(type, present, context);
    } else {
      return this.unsupported(type, context);
    }
    return optional ? { kind: "optional", inner } : inner;
  }

  private literalUnionTag(type: ts.UnionType, members: readonly ts.Type[], context: TagContext): TypeTag {
    const values = members.flatMap((member) => (member.isStringLiteral() ? [member.value] : []));
    const aliases: string[] = [];
    const written = this.literalsOf(context.node, aliases);
    // checker order is not source order; prefer the literals as written
    const ordered =
      written.length === values.length && values.every((value) => written.includes(value)) ? written : values;
    const name = type.aliasSymbol?.getName() ?? aliases[0] ?? `${context.recordName}.${context.fieldName}`;
    return { kind: "enum", enumType: this.literalEnum(name, ordered) };
  }

  private literalEnum(name: string, literals: readonly string[]): EnumType {
    return this.enums.getOrCompute(name, () => enumOf(name, literals));
  }

  /** String literals written in a type node, following local aliases. */
  private literalsOf(node: ts.TypeNode | undefined, aliases: string[] = []): string[] {
    const out: string[] = [];
    const visit = (current: ts.TypeNode | undefined): void => {
      if (!current) return;
      if (ts.isParenthesizedTypeNode(current)) {
        visit(current.type);
      } else if (ts.isUnionTypeNode(current)) {
        current.types.forEach(visit);
      } else if (ts.isLiteralTypeNode(current) && ts.isStringLiteral(current.literal)) {
        if (!out.includes(current.literal.text)) out.push(current.literal.text);
      } else if (ts.isTypeReferenceNode(current) && ts.isIdentifier(current.typeName)) {
        const declaration = this.declarations.get(current.typeName.text);
        if (declaration && ts.isTypeAliasDeclaration(declaration)) {
          aliases.push(current.typeName.text);
          visit(declaration.type);
        }
      }
    };
    visit(node);
    return out;
  }

  /** The enum a type or enum member type belongs to, if any. */
  private enumTypeOf(type: ts.Type): EnumType | undefined {
    if (!hasFlag(type, ts.TypeFlags.EnumLike)) return undefined;
    const base = hasFlag(type, ts.TypeFlags.EnumLiteral) && !type.isUnion()
      ? this.checker.getBaseTypeOfLiteralType(type)
      : type;
    const symbol = base.getSymbol();
    if (!symbol || (symbol.flags & ts.SymbolFlags.Enum) === 0) return undefined;
    const declaration = this.declarations.get(symbol.getName());
    if (!declaration || !ts.isEnumDeclaration(declaration)) {
      throw new SchemaDefinitionError(`Enum ${symbol.getName()} is not declared in the reflected sources`, symbol.getName());
    }
    return this.enumTypeFor(declaration);
  }

  private enumTypeFor(declaration: ts.EnumDeclaration): EnumType {
    const name = declaration.name.text;
    return this.enums.getOrCompute(name, () =>
      enumFromCases(
        name,
        declaration.members.map((member) => {
          const memberName = ts.isIdentifier(member.name) || ts.isStringLiteral(member.name)
            ? member.name.text
            : member.name.getText();
          const value = this.checker.getConstantValue(member);
          if (value === undefined) {
            throw new SchemaDefinitionError(`Enum ${name}: member ${memberName} has no constant value`, name);
          }
          return { name: memberName, value };
        })
      )
    );
  }

  private unsupported(type: ts.Type, context: TagContext): never {
    throw new SchemaDefinitionError(
      `${context.recordName}.${context.fieldName}: type ${this.checker.typeToString(type)} has no field mapping`,
      context.recordName
    );
  }
}

/** Element or value type node of `T[]`, `Array<T>` or `Record<string, T>`. */
function typeArgumentNode(node: ts.TypeNode | undefined): ts.TypeNode | undefined {
  if (!node) return undefined;
  if (ts.isArrayTypeNode(node)) return node.elementType;
  if (ts.isTypeReferenceNode(node) && node.typeArguments) {
    return node.typeArguments[node.typeArguments.length - 1];
  }
  return undefined;
}
