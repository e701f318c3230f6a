import { InvalidArgumentError, UnknownReferenceError } from '../errors';
import { isTypedValue, num, text } from './items';
import { RawArgument, TypedValue, VariableValue } from './types';

export const REFERENCE_SIGIL = '^';

export type DefinedVariables = ReadonlyMap<string, VariableValue>;

const convertArgument = (
  value: RawArgument,
  index: number,
  definedVariables: DefinedVariables
): TypedValue => {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentError(index, `number must be finite (got ${value})`);
    }
    return num(value);
  }

  if (typeof value === 'string') {
    if (!value.startsWith(REFERENCE_SIGIL)) {
      return text(value);
    }
    const name = value.slice(REFERENCE_SIGIL.length);
    const defined = definedVariables.get(name);
    if (!defined) {
      throw new UnknownReferenceError(name);
    }
    return defined;
  }

  if (isTypedValue(value)) {
    return value;
  }

  throw new InvalidArgumentError(index, 'expected a number, string or typed value');
};

export const convertArguments = (
  values: readonly RawArgument[],
  definedVariables: DefinedVariables
): TypedValue[] => {
  return values.map((value, index) => convertArgument(value, index, definedVariables));
};
