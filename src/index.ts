export type { PermissionValue, GlobalPermission } from './core/permission-value.js';
export { PERMISSION_VALUES, isPermissionValue, mergePermissionValues, normalizeName } from './core/permission-value.js';
export type { ContentType, TaggedItem } from './core/content-type.js';
export { defineContentType, schemaContentType, taggedContentType, sameContentType } from './core/content-type.js';
export type { MatchFn, GroupPermission } from './core/group.js';
export { Group } from './core/group.js';
export type { ContentTypeRef } from './core/group-registry.js';
export { GroupRegistry } from './core/group-registry.js';
export type { DecisionExpression } from './core/expression.js';
export { constant, match, not, and, or, evaluate, describeExpression } from './core/expression.js';
export type {
  Decision,
  GlobalPermissionResolver,
  ResolutionContext,
  UserKeyExtractor,
} from './core/engine.js';
export { PermissionResolutionEngine } from './core/engine.js';
export type { PredicateFilterOptions, PredicateFilterRuntimeOptions } from './core/predicate-filter.js';
export { PredicateFilter, PredicateFilterBuilder } from './core/predicate-filter.js';
export {
  PermissionConfigError,
  UnknownGroupError,
  DuplicateGroupNameError,
  TypeMismatchError,
  AmbiguousGroupNameError,
  RegistryFrozenError,
} from './core/errors.js';
export type { MatcherRegistry, PolicyContentTypes, PolicyFilterOptions } from './policy/compile.js';
export {
  UnknownMatcherError,
  applyPolicy,
  collectContentTypes,
  compileMatchRule,
  createFilterFromPolicy,
  readPath,
} from './policy/compile.js';
export type { AppConfig, PolicyConfig, GroupConfig, MatchRule } from './config/schema.js';
export { AppConfigSchema, PolicyConfigSchema, MatchRuleSchema } from './config/schema.js';
