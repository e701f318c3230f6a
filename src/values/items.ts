import {
  GameValue,
  ItemValue,
  LocationValue,
  NumberValue,
  ParameterType,
  ParameterValue,
  ParticleValue,
  PotionValue,
  SoundValue,
  TextValue,
  TypedValue,
  TypedValueType,
  VariableScope,
  VariableValue,
  VectorValue,
  WireItem,
} from './types';

export const TYPED_VALUE_TYPES: TypedValueType[] = [
  'txt',
  'num',
  'item',
  'loc',
  'var',
  'snd',
  'part',
  'pot',
  'g_val',
  'vec',
  'pn_el',
];

export const VARIABLE_SCOPES: VariableScope[] = ['unsaved', 'saved', 'local', 'line'];

export const text = (value: string): TextValue => ({ type: 'txt', value });

export const num = (value: number | string): NumberValue => ({ type: 'num', value });

export const item = (id: string, count = 1, nbt?: string): ItemValue => ({
  type: 'item',
  id,
  count,
  nbt,
});

export const loc = (x = 0, y = 0, z = 0, pitch = 0, yaw = 0): LocationValue => ({
  type: 'loc',
  x,
  y,
  z,
  pitch,
  yaw,
});

export const variable = (name: string, scope: VariableScope = 'unsaved'): VariableValue => ({
  type: 'var',
  name,
  scope,
});

export const sound = (name: string, pitch = 1, volume = 2): SoundValue => ({
  type: 'snd',
  sound: name,
  pitch,
  volume,
});

export const particle = (
  name: string,
  amount = 1,
  horizontal = 0,
  vertical = 0
): ParticleValue => ({ type: 'part', particle: name, amount, horizontal, vertical });

/** Duration is in ticks; the default is the client's "infinite" duration. */
export const potion = (effect: string, duration = 1000000, amplifier = 0): PotionValue => ({
  type: 'pot',
  effect,
  duration,
  amplifier,
});

export const gameValue = (name: string, target = 'Default'): GameValue => ({
  type: 'g_val',
  name,
  target,
});

export const vector = (x = 0, y = 0, z = 0): VectorValue => ({ type: 'vec', x, y, z });

export type ParameterOptions = {
  plural?: boolean;
  optional?: boolean;
  description?: string;
  defaultValue?: TypedValue;
};

export const parameter = (
  name: string,
  paramType: ParameterType = 'any',
  options: ParameterOptions = {}
): ParameterValue => ({
  type: 'pn_el',
  name,
  paramType,
  plural: options.plural ?? false,
  optional: options.optional ?? false,
  description: options.description,
  defaultValue: options.defaultValue,
});

export const isTypedValue = (value: unknown): value is TypedValue => {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || !('type' in value)) {
    return false;
  }
  return TYPED_VALUE_TYPES.some((type) => type === value.type);
};

/** Freezes a value, and the default value a parameter carries, in place. */
export const freezeValue = <T extends TypedValue>(value: T): T => {
  const typed: TypedValue = value;
  if (typed.type === 'pn_el' && typed.defaultValue !== undefined) {
    freezeValue(typed.defaultValue);
  }
  Object.freeze(value);
  return value;
};

const renderData = (value: TypedValue): Record<string, unknown> => {
  switch (value.type) {
    case 'txt':
      return { name: value.value };
    case 'num':
      return { name: String(value.value) };
    case 'item':
      return { item: value.nbt ?? `{Count:${value.count}b,id:"minecraft:${value.id}"}` };
    case 'loc':
      return {
        isBlock: false,
        loc: { x: value.x, y: value.y, z: value.z, pitch: value.pitch, yaw: value.yaw },
      };
    case 'var':
      return { name: value.name, scope: value.scope };
    case 'snd':
      return { sound: value.sound, pitch: value.pitch, vol: value.volume };
    case 'part':
      return {
        particle: value.particle,
        cluster: { amount: value.amount, horizontal: value.horizontal, vertical: value.vertical },
        data: {},
      };
    case 'pot':
      return { pot: value.effect, dur: value.duration, amp: value.amplifier };
    case 'g_val':
      return { type: value.name, target: value.target };
    case 'vec':
      return { x: value.x, y: value.y, z: value.z };
    case 'pn_el': {
      const data: Record<string, unknown> = {
        name: value.name,
        type: value.paramType,
        plural: value.plural,
        optional: value.optional,
      };
      if (value.description !== undefined) {
        data.description = value.description;
      }
      if (value.defaultValue !== undefined) {
        data.default_value = renderValue(value.defaultValue, 0).item;
      }
      return data;
    }
    default: {
      const exhaustive: never = value;
      return exhaustive;
    }
  }
};

export const renderValue = (value: TypedValue, slot: number): WireItem => ({
  item: { id: value.type, data: renderData(value) },
  slot,
});
