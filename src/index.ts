export { Template } from './builder/template';
export { assembleTemplate, attachTags } from './assembler/assemble';
export { encodeTemplate, decodeTemplate } from './encoding/codec';
export { sendTemplate, buildDispatchMessage } from './dispatch/client';
export { SchemaStore } from './schema/store';
export { loadSchemaStore, parseSchemaTable, SchemaLoadError } from './schema/loader';
export { findClosestMatch, similarityRatio } from './schema/similarity';
export { convertArguments, REFERENCE_SIGIL } from './values/convert';
export {
  text,
  num,
  item,
  loc,
  variable,
  sound,
  particle,
  potion,
  gameValue,
  vector,
  parameter,
  renderValue,
  isTypedValue,
} from './values/items';
export { loadScript, applyScript, ScriptValidationError } from './script/runner';
export { validateScriptContent, validateScriptFile } from './script/validation';
export {
  TemplateBuildError,
  UnknownReferenceError,
  UnbalancedBracketError,
  InvalidArgumentError,
  TemplateDecodeError,
} from './errors';
export { createEventLogger, createNullEventLogger } from './logging/event-logger';
export type {
  TemplateOptions,
  TargetOptions,
  ConditionOptions,
  TargetedConditionOptions,
  RepeatOptions,
  DefineOptions,
  NamedArguments,
  SentTemplate,
} from './builder/template';
export type { Block, BlockCategory, BracketFlavor } from './builder/types';
export type { TemplateDocument, DocumentBlock, AssembledTemplate, AssemblyWarning } from './assembler/types';
export type { EncodedTemplate } from './encoding/codec';
export type { DispatchOptions, DispatchResult } from './dispatch/client';
export type { SchemaLookup, SchemaTable, SchemaTag } from './schema/types';
export type { TypedValue, RawArgument, VariableScope, ParameterType, WireItem } from './values/types';
export type { TemplateScript, ScriptStep } from './script/types';
export type { EventLogger, LogEvent, LogMode } from './logging/event-logger';
