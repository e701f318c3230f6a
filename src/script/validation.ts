import fs from 'node:fs/promises';
import { Document, isMap, isScalar } from 'yaml';
import {
  gameValue,
  item,
  loc,
  num,
  parameter,
  particle,
  potion,
  sound,
  text,
  variable,
  VARIABLE_SCOPES,
  vector,
} from '../values/items';
import { ParameterType, ParameterValue, RawArgument, TypedValue, VariableScope } from '../values/types';
import {
  hasErrors,
  isPlainObject,
  parseYamlStrict,
  pushIssue,
  ValidationIssue,
} from '../utils/validation';
import { NamedEntries, ScriptOperation, ScriptStep, TemplateScript } from './types';

export type ScriptValidationResult = {
  script?: TemplateScript;
  issues: ValidationIssue[];
};

type Context = {
  file: string;
  issues: ValidationIssue[];
  document?: Document.Parsed;
};

type NodePath = Array<string | number>;

const ROOT_KEYS = ['description', 'blocks'];

const STEP_OPTIONS: Record<ScriptOperation, readonly string[]> = {
  playerEvent: [],
  entityEvent: [],
  process: [],
  startProcess: [],
  function: ['parameters'],
  callFunction: ['parameters'],
  playerAction: ['args', 'target'],
  entityAction: ['args', 'target'],
  gameAction: ['args'],
  control: ['args'],
  selectObject: ['args'],
  setVariable: ['args'],
  ifPlayer: ['args', 'target', 'not'],
  ifEntity: ['args', 'target', 'not'],
  ifVariable: ['args', 'not'],
  ifGame: ['args', 'not'],
  repeat: ['args', 'subAction', 'not'],
  else: [],
  bracket: [],
  return: [],
  define: ['value', 'scope', 'initialize'],
};

const VALUE_KEYS: Record<string, readonly string[]> = {
  txt: ['value'],
  num: ['value'],
  item: ['id', 'count', 'nbt'],
  loc: ['x', 'y', 'z', 'pitch', 'yaw'],
  var: ['name', 'scope'],
  snd: ['sound', 'pitch', 'volume'],
  part: ['particle', 'amount', 'horizontal', 'vertical'],
  pot: ['effect', 'duration', 'amplifier'],
  g_val: ['name', 'target'],
  vec: ['x', 'y', 'z'],
};

const PARAMETER_KEYS = ['name', 'type', 'plural', 'optional', 'description', 'default'];

const PARAMETER_TYPES: ParameterType[] = [
  'str',
  'txt',
  'num',
  'loc',
  'vec',
  'snd',
  'part',
  'pot',
  'item',
  'any',
  'var',
  'list',
  'dict',
];

const isOperation = (key: string): key is ScriptOperation => Object.hasOwn(STEP_OPTIONS, key);

const isVariableScope = (value: unknown): value is VariableScope =>
  VARIABLE_SCOPES.some((scope) => scope === value);

const isParameterType = (value: unknown): value is ParameterType =>
  PARAMETER_TYPES.some((type) => type === value);

const joinPath = (basePath: string, key: string): string => (basePath ? `${basePath}.${key}` : key);

const fieldReader = (source: Record<string, unknown>, basePath: string, ctx: Context) => {
  const fail = (key: string, message: string) => {
    pushIssue(ctx.issues, ctx.file, joinPath(basePath, key), message);
  };

  return {
    string: (key: string): string => {
      const value = source[key];
      if (typeof value === 'string' && value.length > 0) return value;
      fail(key, `${key} must be a non-empty string`);
      return '';
    },
    optionalString: (key: string): string | undefined => {
      const value = source[key];
      if (value === undefined || typeof value === 'string') return value;
      fail(key, `${key} must be a string`);
      return undefined;
    },
    optionalNumber: (key: string): number | undefined => {
      const value = source[key];
      if (value === undefined) return undefined;
      if (typeof value === 'number' && Number.isFinite(value)) return value;
      fail(key, `${key} must be a number`);
      return undefined;
    },
    optionalBoolean: (key: string): boolean | undefined => {
      const value = source[key];
      if (value === undefined || typeof value === 'boolean') return value;
      fail(key, `${key} must be true or false`);
      return undefined;
    },
    optionalScope: (key: string): VariableScope | undefined => {
      const value = source[key];
      if (value === undefined || isVariableScope(value)) return value;
      fail(key, `${key} must be one of ${VARIABLE_SCOPES.join(', ')}`);
      return undefined;
    },
  };
};

const rejectUnknownKeys = (
  source: Record<string, unknown>,
  allowed: readonly string[],
  basePath: string,
  ctx: Context
): void => {
  for (const key of Object.keys(source)) {
    if (!allowed.includes(key)) {
      pushIssue(ctx.issues, ctx.file, joinPath(basePath, key), `Unknown key "${key}"`);
    }
  }
};

const readTypedValue = (
  source: Record<string, unknown>,
  basePath: string,
  ctx: Context
): TypedValue | undefined => {
  const type = source.type;
  if (typeof type !== 'string' || !Object.hasOwn(VALUE_KEYS, type)) {
    pushIssue(ctx.issues, ctx.file, `${basePath}.type`, `Unknown value type "${String(type)}"`);
    return undefined;
  }

  rejectUnknownKeys(source, ['type', ...VALUE_KEYS[type]], basePath, ctx);

  const before = ctx.issues.length;
  const read = fieldReader(source, basePath, ctx);
  let value: TypedValue | undefined;

  switch (type) {
    case 'txt': {
      const raw = source.value;
      if (typeof raw === 'string') {
        value = text(raw);
      } else {
        pushIssue(ctx.issues, ctx.file, `${basePath}.value`, 'value must be a string');
      }
      break;
    }
    case 'num': {
      const raw = source.value;
      if ((typeof raw === 'number' && Number.isFinite(raw)) || typeof raw === 'string') {
        value = num(raw);
      } else {
        pushIssue(ctx.issues, ctx.file, `${basePath}.value`, 'value must be a number or expression');
      }
      break;
    }
    case 'item':
      value = item(read.string('id'), read.optionalNumber('count'), read.optionalString('nbt'));
      break;
    case 'loc':
      value = loc(
        read.optionalNumber('x'),
        read.optionalNumber('y'),
        read.optionalNumber('z'),
        read.optionalNumber('pitch'),
        read.optionalNumber('yaw')
      );
      break;
    case 'var':
      value = variable(read.string('name'), read.optionalScope('scope'));
      break;
    case 'snd':
      value = sound(read.string('sound'), read.optionalNumber('pitch'), read.optionalNumber('volume'));
      break;
    case 'part':
      value = particle(
        read.string('particle'),
        read.optionalNumber('amount'),
        read.optionalNumber('horizontal'),
        read.optionalNumber('vertical')
      );
      break;
    case 'pot':
      value = potion(read.string('effect'), read.optionalNumber('duration'), read.optionalNumber('amplifier'));
      break;
    case 'g_val':
      value = gameValue(read.string('name'), read.optionalString('target'));
      break;
    case 'vec':
      value = vector(read.optionalNumber('x'), read.optionalNumber('y'), read.optionalNumber('z'));
      break;
    default:
      break;
  }

  return ctx.issues.length === before ? value : undefined;
};

const readArgument = (value: unknown, basePath: string, ctx: Context): RawArgument | undefined => {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') return value;
  if (isPlainObject(value)) return readTypedValue(value, basePath, ctx);
  pushIssue(ctx.issues, ctx.file, basePath, 'Argument must be a number, string or typed value object');
  return undefined;
};

const readArguments = (value: unknown, basePath: string, ctx: Context): RawArgument[] => {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    pushIssue(ctx.issues, ctx.file, basePath, 'args must be an array');
    return [];
  }

  const args: RawArgument[] = [];
  value.forEach((entry: unknown, index) => {
    const arg = readArgument(entry, `${basePath}[${index}]`, ctx);
    if (arg !== undefined) args.push(arg);
  });
  return args;
};

// Plain objects list integer-like keys first; the YAML node keeps the written order.
const sourceKeyOrder = (value: Record<string, unknown>, nodePath: NodePath, ctx: Context): string[] => {
  const node = ctx.document?.getIn(nodePath, true);
  if (!isMap(node)) return Object.keys(value);
  const keys = node.items.map((pair) => String(isScalar(pair.key) ? pair.key.value : pair.key));
  return keys.filter((key) => Object.hasOwn(value, key));
};

const readNamedEntries = (
  value: unknown,
  basePath: string,
  nodePath: NodePath,
  ctx: Context
): NamedEntries => {
  if (value === undefined || value === null) return [];
  if (!isPlainObject(value)) {
    pushIssue(ctx.issues, ctx.file, basePath, 'Expected a mapping of names to values');
    return [];
  }

  const entries: NamedEntries = [];
  for (const key of sourceKeyOrder(value, nodePath, ctx)) {
    const arg = readArgument(value[key], `${basePath}.${key}`, ctx);
    if (arg !== undefined) entries.push([key, arg]);
  }
  return entries;
};

const toDefaultValue = (value: RawArgument): TypedValue => {
  if (typeof value === 'number') return num(value);
  if (typeof value === 'string') return text(value);
  return value;
};

const readParameter = (value: unknown, basePath: string, ctx: Context): ParameterValue | undefined => {
  if (!isPlainObject(value)) {
    pushIssue(ctx.issues, ctx.file, basePath, 'Parameter must be an object');
    return undefined;
  }

  rejectUnknownKeys(value, PARAMETER_KEYS, basePath, ctx);

  const before = ctx.issues.length;
  const read = fieldReader(value, basePath, ctx);
  const name = read.string('name');

  let paramType: ParameterType = 'any';
  if (value.type !== undefined) {
    if (isParameterType(value.type)) {
      paramType = value.type;
    } else {
      pushIssue(ctx.issues, ctx.file, `${basePath}.type`, `type must be one of ${PARAMETER_TYPES.join(', ')}`);
    }
  }

  const defaultArg = value.default === undefined ? undefined : readArgument(value.default, `${basePath}.default`, ctx);
  const result = parameter(name, paramType, {
    plural: read.optionalBoolean('plural'),
    optional: read.optionalBoolean('optional'),
    description: read.optionalString('description'),
    defaultValue: defaultArg === undefined ? undefined : toDefaultValue(defaultArg),
  });

  return ctx.issues.length === before ? result : undefined;
};

const readParameters = (value: unknown, basePath: string, ctx: Context): ParameterValue[] => {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    pushIssue(ctx.issues, ctx.file, basePath, 'parameters must be an array');
    return [];
  }

  const parameters: ParameterValue[] = [];
  value.forEach((entry: unknown, index) => {
    const param = readParameter(entry, `${basePath}[${index}]`, ctx);
    if (param) parameters.push(param);
  });
  return parameters;
};

const readStep = (
  entry: unknown,
  basePath: string,
  nodePath: NodePath,
  ctx: Context
): ScriptStep | undefined => {
  if (entry === 'else' || entry === 'bracket') {
    return { operation: entry };
  }

  if (!isPlainObject(entry)) {
    pushIssue(ctx.issues, ctx.file, basePath, 'Step must be an object, "else" or "bracket"');
    return undefined;
  }

  const operations = Object.keys(entry).filter(isOperation);
  if (operations.length !== 1) {
    pushIssue(
      ctx.issues,
      ctx.file,
      basePath,
      operations.length === 0
        ? 'Step does not name an operation'
        : `Step names more than one operation (${operations.join(', ')})`
    );
    return undefined;
  }

  const operation = operations[0];
  rejectUnknownKeys(entry, [operation, ...STEP_OPTIONS[operation]], basePath, ctx);

  const before = ctx.issues.length;
  const read = fieldReader(entry, basePath, ctx);
  const head = entry[operation];
  let step: ScriptStep;

  switch (operation) {
    case 'else':
    case 'bracket':
      if (head !== true && head !== null) {
        pushIssue(ctx.issues, ctx.file, `${basePath}.${operation}`, `${operation} takes no value`);
      }
      step = { operation };
      break;
    case 'return':
      step = {
        operation,
        values: readNamedEntries(head, `${basePath}.return`, [...nodePath, operation], ctx),
      };
      break;
    case 'playerEvent':
    case 'entityEvent':
    case 'process':
    case 'startProcess':
      step = { operation, name: read.string(operation) };
      break;
    case 'function':
      step = {
        operation,
        name: read.string(operation),
        parameters: readParameters(entry.parameters, `${basePath}.parameters`, ctx),
      };
      break;
    case 'callFunction':
      step = {
        operation,
        name: read.string(operation),
        parameters: readNamedEntries(
          entry.parameters,
          `${basePath}.parameters`,
          [...nodePath, 'parameters'],
          ctx
        ),
      };
      break;
    case 'playerAction':
    case 'entityAction':
      step = {
        operation,
        name: read.string(operation),
        args: readArguments(entry.args, `${basePath}.args`, ctx),
        target: read.optionalString('target'),
      };
      break;
    case 'gameAction':
    case 'control':
    case 'selectObject':
    case 'setVariable':
      step = {
        operation,
        name: read.string(operation),
        args: readArguments(entry.args, `${basePath}.args`, ctx),
      };
      break;
    case 'ifPlayer':
    case 'ifEntity':
      step = {
        operation,
        name: read.string(operation),
        args: readArguments(entry.args, `${basePath}.args`, ctx),
        target: read.optionalString('target'),
        not: read.optionalBoolean('not'),
      };
      break;
    case 'ifVariable':
    case 'ifGame':
      step = {
        operation,
        name: read.string(operation),
        args: readArguments(entry.args, `${basePath}.args`, ctx),
        not: read.optionalBoolean('not'),
      };
      break;
    case 'repeat':
      step = {
        operation,
        name: read.string(operation),
        args: readArguments(entry.args, `${basePath}.args`, ctx),
        subAction: read.optionalString('subAction'),
        not: read.optionalBoolean('not'),
      };
      break;
    case 'define':
      step = {
        operation,
        name: read.string(operation),
        value: entry.value === undefined ? undefined : readArgument(entry.value, `${basePath}.value`, ctx),
        scope: read.optionalScope('scope'),
        initialize: read.optionalBoolean('initialize'),
      };
      break;
    default: {
      const exhaustive: never = operation;
      return exhaustive;
    }
  }

  return ctx.issues.length === before ? step : undefined;
};

export const validateScriptContent = (content: string, file: string): ScriptValidationResult => {
  const parsed = parseYamlStrict(file, content);
  if (parsed.data === undefined) {
    return { issues: parsed.issues };
  }

  const ctx: Context = { file, issues: [...parsed.issues], document: parsed.document };
  const data = parsed.data;

  if (!isPlainObject(data)) {
    pushIssue(ctx.issues, file, '', 'Root document must be an object');
    return { issues: ctx.issues };
  }

  rejectUnknownKeys(data, ROOT_KEYS, '', ctx);

  if (data.description !== undefined && typeof data.description !== 'string') {
    pushIssue(ctx.issues, file, 'description', 'Description must be a string');
  }

  if (!Array.isArray(data.blocks) || data.blocks.length === 0) {
    pushIssue(ctx.issues, file, 'blocks', 'blocks must be a non-empty array');
    return { issues: ctx.issues };
  }

  const steps: ScriptStep[] = [];
  data.blocks.forEach((entry: unknown, index) => {
    const step = readStep(entry, `blocks[${index}]`, ['blocks', index], ctx);
    if (step) steps.push(step);
  });

  if (hasErrors(ctx.issues)) {
    return { issues: ctx.issues };
  }

  return {
    script: {
      file,
      description: typeof data.description === 'string' ? data.description : undefined,
      steps,
    },
    issues: ctx.issues,
  };
};

export const validateScriptFile = async (filePath: string): Promise<ScriptValidationResult> => {
  const content = await fs.readFile(filePath, 'utf-8');
  return validateScriptContent(content, filePath);
};
