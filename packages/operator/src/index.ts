/**
 * @gatestream/operator
 *
 * Stream operator that batches gates between measurements, runs them
 * through a circuit mapper and re-emits them on physical qubits.
 *
 * @packageDocumentation
 */

// ============================================================================
// Operator
// ============================================================================

export { MapperOperator, LOG_SCOPE } from './operator';
export type { MapperOperatorOptions } from './operator';

export { FlushController, toDownstream, fromDownstream } from './controller';
export type { DownstreamSink, FlushControllerOptions } from './controller';

export { Kernel } from './kernel';
export type { InternalGate } from './kernel';

// ============================================================================
// Circuit Mappers
// ============================================================================

export { IdentityMapper, RandomPlacementMapper, mulberry32, randomPermutation } from './mapper';
export type { CircuitMapper, MapRequest, MapResult, MapperOptions, PlacementMode } from './mapper';

// ============================================================================
// Configuration and Platform
// ============================================================================

export { resolveConfig, MAPPER_INTERFACE, ENV } from './config';
export type { InitCommand, Environment, OperatorConfig } from './config';

export { parsePlatform } from './platform';
export type { Platform } from './platform';

export { suggestGateTable, instructionAliasKey } from './platform-gates';
export type { GateTableSuggestion } from './platform-gates';

// ============================================================================
// Logging
// ============================================================================

export { createConsoleLogger, createSilentLogger, parseLogLevel, LOG_LEVELS } from './logger';
export type { Logger, LogLevel } from './logger';
