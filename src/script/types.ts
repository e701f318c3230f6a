import type {
  ParameterValue,
  RawArgument,
  VariableScope,
} from '../values/types';

export type NamedEntries = Array<[string, RawArgument]>;

export type ScriptStep =
  | { operation: 'playerEvent' | 'entityEvent' | 'process' | 'startProcess'; name: string }
  | { operation: 'function'; name: string; parameters: ParameterValue[] }
  | { operation: 'callFunction'; name: string; parameters: NamedEntries }
  | { operation: 'playerAction' | 'entityAction'; name: string; args: RawArgument[]; target?: string }
  | {
      operation: 'gameAction' | 'control' | 'selectObject' | 'setVariable';
      name: string;
      args: RawArgument[];
    }
  | {
      operation: 'ifPlayer' | 'ifEntity';
      name: string;
      args: RawArgument[];
      target?: string;
      not?: boolean;
    }
  | { operation: 'ifVariable' | 'ifGame'; name: string; args: RawArgument[]; not?: boolean }
  | { operation: 'repeat'; name: string; args: RawArgument[]; subAction?: string; not?: boolean }
  | { operation: 'else' | 'bracket' }
  | { operation: 'return'; values: NamedEntries }
  | {
      operation: 'define';
      name: string;
      value?: RawArgument;
      scope?: VariableScope;
      initialize?: boolean;
    };

export type ScriptOperation = ScriptStep['operation'];

export type TemplateScript = {
  file: string;
  description?: string;
  steps: ScriptStep[];
};
