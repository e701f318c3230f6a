export type VariableScope = 'unsaved' | 'saved' | 'local' | 'line';

export type ParameterType =
  | 'str'
  | 'txt'
  | 'num'
  | 'loc'
  | 'vec'
  | 'snd'
  | 'part'
  | 'pot'
  | 'item'
  | 'any'
  | 'var'
  | 'list'
  | 'dict';

export type TextValue = { type: 'txt'; value: string };

// String values carry %math and %var expressions.
export type NumberValue = { type: 'num'; value: number | string };

export type ItemValue = { type: 'item'; id: string; count: number; nbt?: string };

export type LocationValue = {
  type: 'loc';
  x: number;
  y: number;
  z: number;
  pitch: number;
  yaw: number;
};

export type VariableValue = { type: 'var'; name: string; scope: VariableScope };

export type SoundValue = { type: 'snd'; sound: string; pitch: number; volume: number };

export type ParticleValue = {
  type: 'part';
  particle: string;
  amount: number;
  horizontal: number;
  vertical: number;
};

export type PotionValue = { type: 'pot'; effect: string; duration: number; amplifier: number };

export type GameValue = { type: 'g_val'; name: string; target: string };

export type VectorValue = { type: 'vec'; x: number; y: number; z: number };

export type ParameterValue = {
  type: 'pn_el';
  name: string;
  paramType: ParameterType;
  plural: boolean;
  optional: boolean;
  description?: string;
  defaultValue?: TypedValue;
};

export type TypedValue =
  | TextValue
  | NumberValue
  | ItemValue
  | LocationValue
  | VariableValue
  | SoundValue
  | ParticleValue
  | PotionValue
  | GameValue
  | VectorValue
  | ParameterValue;

export type TypedValueType = TypedValue['type'];

export type RawArgument = number | string | TypedValue;

export type WireItem = {
  item: {
    id: string;
    data: Record<string, unknown>;
  };
  slot: number;
};
