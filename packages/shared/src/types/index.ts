/**
 * Shared Types - Main Export
 *
 * Re-exports all shared types for convenient importing
 */

// Configuration types
export {
  LogLevelSchema,
  LoggingConfigSchema,
  DispatchConfigSchema,
  AuditConfigSchema,
  HookwrapConfigSchema,
  type LogLevelName,
  type LoggingConfig,
  type DispatchConfig,
  type AuditConfig,
  type HookwrapConfig,
} from './config.js';

// Interception types
export {
  TypeRefSchema,
  ReturnShapeKindSchema,
  type TypeRef,
  type ReturnShapeKind,
} from './interception.js';
