/**
 * @file Public API
 *
 * @module ramify
 */

export { RamifyError, ComputeError, StructuralError, MigrationWarning, DefinitionLoadError, DefinitionSyntaxError, RegistryError, error_message } from './errors.js';
export type { RamifyErrorCode } from './errors.js';
export { SettingsService } from './config/settings.js';
export type { EngineSettings, ResolvedEngineSettings } from './config/settings.js';
export { ConsoleLogger, silentLogger } from './log/logger.js';
export type { Logger, LogLevel } from './log/logger.js';
export { Signal } from './signals/Signal.js';
export type { SignalHandler } from './signals/Signal.js';

export { HashBuilder, fingerprint_compute, hashable_equals } from './fingerprint/hasher.js';
export type { Fingerprint, Hashable } from './fingerprint/types.js';
export { Context, FRAME_NAME } from './context/Context.js';
export type { ContextValue } from './context/Context.js';
export { ComputeCache } from './cache/ComputeCache.js';
export type { ComputeCacheOptions, ComputeCacheStats } from './cache/ComputeCache.js';

export { GraphComponent, component_isPlug, component_isNode } from './graph/GraphComponent.js';
export type { ChildEvent } from './graph/GraphComponent.js';
export { Plug } from './graph/Plug.js';
export { ValuePlug, FloatPlug, IntPlug, StringPlug, BoolPlug, ObjectPlug } from './graph/ValuePlug.js';
export type { ValuePlugType } from './graph/ValuePlug.js';
export { ArrayPlug } from './graph/ArrayPlug.js';
export type { ArrayPlugOptions } from './graph/ArrayPlug.js';
export { Node, USER_PLUG_NAME } from './graph/Node.js';
export { ComputeNode } from './graph/ComputeNode.js';
export { SubGraph } from './graph/SubGraph.js';
export { Graph } from './graph/Graph.js';
export type { GraphOptions } from './graph/Graph.js';
export type { PlugDirection, PlugType, PlugValue, PlugFlags, PlugOptions, ValuePlugOptions, EvaluationScope, GraphHost } from './graph/types.js';
export { Evaluator } from './compute/Evaluator.js';
export { UndoLog } from './undo/UndoLog.js';
export type { ScopeMode } from './undo/UndoLog.js';
export { MetadataStore } from './metadata/MetadataStore.js';
export type { MetadataEntry } from './metadata/MetadataStore.js';

export { Reference } from './reference/Reference.js';
export type { DefinitionSource } from './reference/types.js';

export { Arithmetic, ARITHMETIC_OPERATIONS } from './nodes/Arithmetic.js';
export { ContextVariables } from './nodes/ContextVariables.js';
export { StringSubstitute } from './nodes/StringSubstitute.js';
export { NodeRegistry } from './nodes/registry.js';
export type { NodeFactory } from './nodes/registry.js';

export { ScenePlug, SCENE_PATH_NAME, IDENTITY_TRANSFORM, scenePath_parse, scenePath_format, scenePath_context } from './scene/ScenePlug.js';
export type { ScenePath } from './scene/ScenePlug.js';
export { SceneNode } from './scene/SceneNode.js';
export { HierarchySource } from './scene/HierarchySource.js';
export { SceneProcessor } from './scene/SceneProcessor.js';
export { SubTree, FORWARD_DECLARATIONS_KEY } from './scene/SubTree.js';

export { DefinitionLibrary } from './definition/DefinitionLibrary.js';
export { YamlDefinitionSource } from './definition/YamlDefinitionSource.js';
export { definition_parse, definition_stringify } from './definition/parser.js';
export { definition_export, EXPORT_VERSION } from './definition/exporter.js';
export type { RawDefinition } from './definition/schemas.js';
