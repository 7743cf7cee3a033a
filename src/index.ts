/**
 * pandoc-ast — pandoc documents as typed trees, with JSON codecs for every
 * pandoc-types schema from 1.12 on.
 *
 * Public API surface.
 */

// --- Errors ---
export {
  ErrorCode, type ErrorDetails, AstError,
  GrammarSyntaxError, UnknownTypeError, UnknownConstructorError, ShapeMismatchError,
  UnsupportedVersionError, ConfigurationError, ConversionError,
  describeValue,
} from './errors.js';

// --- Logging ---
export { type Logger, type LogLevel, createLogger, getLogLevel } from './logger.js';

// --- Schema versions ---
export {
  type SchemaVersion, type CodecGeneration,
  OLDEST_SUPPORTED, V2_THRESHOLD, FIRST_UNSUPPORTED,
  parseVersion, formatVersion, compareVersions, codecGeneration,
} from './schema-version.js';

// --- Tree values ---
export {
  type Scalar, type Value, type Mapping, type ValueKind,
  Node, Tuple, tuple, mapping, kindOf,
  childrenOf, children, treeIter, valueEquals, repr,
} from './tree.js';

// --- Grammar registry ---
export {
  type PrimitiveName, type TypeDescriptor, type StructuralType, type Field, type Constructor,
  type SumType, type AliasType, type NamedType,
  PRIMITIVE_NAMES, isPrimitiveName, ref, listOf, isSingleConstructor, formatType, formatConstructor,
} from './descriptors.js';
export {
  TokenType, type Token, type Production, type DataDecl, type AliasDecl, type GrammarDecl,
  tokenize, parseProduction, parseTypeExpr, parseGrammar,
} from './grammar-parser.js';
export { TypeRegistry, type NodeFactory, type DataOptions, matchesPrimitive } from './type-registry.js';
export { BUILTIN_GRAMMAR_VERSIONS, grammarVersionFor, readBuiltinGrammar, createRegistry } from './base-grammars.js';

// --- Schema context ---
export {
  type SchemaContext, type ContextOptions,
  createContext, init, reset, isInitialized, currentContext,
} from './context.js';

// --- JSON codec ---
export {
  type JSONValue, type JSONObject, type JSONMap,
  isJSONObject, jsonEntries, jsonGet, describeJson, childPath, readJson, writeJson,
} from './json-value.js';
export { JsonCodec } from './json-codec.js';
export { V1Codec } from './codec-v1.js';
export { V2Codec, API_VERSION_KEY } from './codec-v2.js';
export { codecFor, decode, encode } from './codec.js';
export { makeDocument, parseJson, stringifyJson } from './document.js';

// --- Traversal & rewriting ---
export { type PathStep, type Path, type WalkHooks, iterate, iterateWithPath, pathIndices, getByPath, ancestorOf } from './walk.js';
export { type Transform, rewrite, rewriter } from './rewrite.js';

// --- Configuration ---
export { type Settings, SETTINGS_FILE_NAME, findSettingsFile, parseSettings, applyEnvironment, loadSettings } from './settings.js';
export {
  type ConfigureOptions, type Configuration,
  configure, readConfiguration, resetConfiguration, ensureConfigured,
  resolveTypesVersions, findExecutable, parseProgramVersion,
} from './config.js';

// --- Conversion ---
export { defaultReaderName, defaultWriterName, isBinaryOutput } from './formats.js';
export { type ConvertOptions, read, write } from './converter.js';
