import { assembleTemplate } from '../assembler/assemble';
import { AssembledTemplate, AssemblyWarning } from '../assembler/types';
import { DispatchOptions, DispatchResult, sendTemplate } from '../dispatch/client';
import { EncodedTemplate, encodeTemplate } from '../encoding/codec';
import { UnbalancedBracketError } from '../errors';
import { createNullEventLogger, EventLogger, LogEvent } from '../logging/event-logger';
import { SchemaStore } from '../schema/store';
import { convertArguments } from '../values/convert';
import { freezeValue, variable } from '../values/items';
import { ParameterValue, RawArgument, TypedValue, VariableScope, VariableValue } from '../values/types';
import { ActionCategory, Block, BracketFlavor, DataCategory, DEFAULT_TARGET } from './types';

export type TemplateOptions = {
  schema?: SchemaStore;
  eventLogger?: EventLogger;
};

export type TargetOptions = { target?: string };

export type ConditionOptions = { not?: boolean };

export type TargetedConditionOptions = TargetOptions & ConditionOptions;

export type RepeatOptions = ConditionOptions & { subAction?: string };

export type DefineOptions = {
  value?: RawArgument;
  scope?: VariableScope;
  initialize?: boolean;
};

/** Name/value pairs; pass an array of entries when keys look like integers and order matters. */
export type NamedArguments =
  | Readonly<Record<string, RawArgument>>
  | ReadonlyArray<readonly [string, RawArgument]>;

export type SentTemplate = EncodedTemplate & { dispatch: DispatchResult };

type ActionExtras = {
  target?: string;
  subAction?: string;
  inverted?: boolean;
};

const isEntryList = (
  values: NamedArguments
): values is ReadonlyArray<readonly [string, RawArgument]> => Array.isArray(values);

const toEntries = (values: NamedArguments): ReadonlyArray<readonly [string, RawArgument]> => {
  return isEntryList(values) ? values : Object.entries(values);
};

const toWarningEvent = (warning: AssemblyWarning): LogEvent => {
  switch (warning.code) {
    case 'unrecognized-action':
      return {
        event: 'unrecognized-action',
        category: warning.category,
        action: warning.action,
        suggestion: warning.suggestion,
      };
    case 'missing-entry-point':
      return {
        event: 'structural-warning',
        code: 'missing-entry-point',
        message: 'Template does not start with an event, function, or process.',
      };
    case 'unclosed-bracket':
      return {
        event: 'structural-warning',
        code: 'unclosed-bracket',
        message: `Template has ${warning.open} unclosed bracket${warning.open === 1 ? '' : 's'}.`,
      };
    default: {
      const exhaustive: never = warning;
      return exhaustive;
    }
  }
};

/**
 * Ordered list of code blocks plus the variables defined while building it.
 * Every block method appends and returns the template, so calls chain.
 */
export class Template {
  private commands: Block[] = [];
  private readonly definedVars = new Map<string, VariableValue>();
  private bracketStack: BracketFlavor[] = [];
  private readonly schema: SchemaStore;
  private readonly eventLogger: EventLogger;

  constructor(options: TemplateOptions = {}) {
    this.schema = options.schema ?? SchemaStore.empty();
    this.eventLogger = options.eventLogger ?? createNullEventLogger();
  }

  public get blocks(): readonly Block[] {
    return this.commands;
  }

  public get definedVariables(): ReadonlyMap<string, VariableValue> {
    return this.definedVars;
  }

  public get openBrackets(): number {
    return this.bracketStack.length;
  }

  public playerEvent(name: string): this {
    return this.appendAction('event', name, []);
  }

  public entityEvent(name: string): this {
    return this.appendAction('entity_event', name, []);
  }

  public function(name: string, parameters: readonly ParameterValue[] = []): this {
    return this.appendData('func', name, parameters);
  }

  public process(name: string): this {
    return this.appendData('process', name, []);
  }

  /** Parameters become local variables assigned just before the call. */
  public callFunction(name: string, parameters: NamedArguments = {}): this {
    const assignments = this.convertAssignments(parameters);
    for (const args of assignments) {
      this.appendAction('set_var', '=', args);
    }
    return this.appendData('call_func', name, []);
  }

  public startProcess(name: string): this {
    return this.appendData('start_process', name, []);
  }

  public playerAction(name: string, args: readonly RawArgument[] = [], options: TargetOptions = {}): this {
    return this.appendAction('player_action', name, this.convert(args), { target: options.target });
  }

  public gameAction(name: string, args: readonly RawArgument[] = []): this {
    return this.appendAction('game_action', name, this.convert(args));
  }

  public entityAction(name: string, args: readonly RawArgument[] = [], options: TargetOptions = {}): this {
    return this.appendAction('entity_action', name, this.convert(args), { target: options.target });
  }

  public ifPlayer(
    name: string,
    args: readonly RawArgument[] = [],
    options: TargetedConditionOptions = {}
  ): this {
    return this.appendCondition('if_player', name, args, options);
  }

  public ifVariable(name: string, args: readonly RawArgument[] = [], options: ConditionOptions = {}): this {
    return this.appendCondition('if_var', name, args, options);
  }

  public ifGame(name: string, args: readonly RawArgument[] = [], options: ConditionOptions = {}): this {
    return this.appendCondition('if_game', name, args, options);
  }

  public ifEntity(
    name: string,
    args: readonly RawArgument[] = [],
    options: TargetedConditionOptions = {}
  ): this {
    return this.appendCondition('if_entity', name, args, options);
  }

  public else(): this {
    this.append({ kind: 'else' });
    return this.openBracket('norm');
  }

  public repeat(name: string, args: readonly RawArgument[] = [], options: RepeatOptions = {}): this {
    this.appendAction('repeat', name, this.convert(args), {
      subAction: options.subAction,
      inverted: options.not,
    });
    return this.openBracket('repeat');
  }

  /** Closes the innermost open conditional, else or repeat. */
  public bracket(): this {
    const flavor = this.bracketStack.pop();
    if (flavor === undefined) {
      throw new UnbalancedBracketError();
    }
    return this.append({ kind: 'bracket', direction: 'close', flavor });
  }

  public control(name: string, args: readonly RawArgument[] = []): this {
    return this.appendAction('control', name, this.convert(args));
  }

  public selectObject(name: string, args: readonly RawArgument[] = []): this {
    return this.appendAction('select_obj', name, this.convert(args));
  }

  public setVariable(name: string, args: readonly RawArgument[] = []): this {
    return this.appendAction('set_var', name, this.convert(args));
  }

  /** Assigns each value to a local variable of the same name, then returns. */
  public return(values: NamedArguments = {}): this {
    const assignments = this.convertAssignments(values);
    for (const args of assignments) {
      this.appendAction('set_var', '=', args);
    }
    return this.control('Return');
  }

  /**
   * Binds `name` so later arguments can refer to it as `^name`, optionally
   * emitting the assignment that initializes it.
   */
  public define(name: string, options: DefineOptions = {}): this {
    const { value = 0, scope = 'unsaved', initialize = true } = options;
    const reference = freezeValue(variable(name, scope));
    if (initialize) {
      this.appendAction('set_var', '=', [reference, ...this.convert([value])]);
    }
    this.definedVars.set(name, reference);
    return this;
  }

  /** Assembles the current blocks without encoding or logging anything. */
  public toDocument(): AssembledTemplate {
    return assembleTemplate(this.commands, this.schema);
  }

  public build(): EncodedTemplate {
    const assembled = this.toDocument();
    for (const warning of assembled.warnings) {
      this.eventLogger.emitEvent(toWarningEvent(warning));
    }

    const encoded = encodeTemplate(assembled.document, assembled.name);
    this.eventLogger.emitEvent({
      event: 'template-built',
      name: encoded.name,
      blocks: assembled.document.blocks.length,
      length: encoded.code.length,
    });
    return encoded;
  }

  public async buildAndSend(options: Omit<DispatchOptions, 'eventLogger'> = {}): Promise<SentTemplate> {
    const encoded = this.build();
    const dispatch = await sendTemplate(encoded, { ...options, eventLogger: this.eventLogger });
    return { ...encoded, dispatch };
  }

  public clear(): this {
    this.commands = [];
    this.definedVars.clear();
    this.bracketStack = [];
    return this;
  }

  private convert(args: readonly RawArgument[]): TypedValue[] {
    return convertArguments(args, this.definedVars);
  }

  private convertAssignments(values: NamedArguments): TypedValue[][] {
    return toEntries(values).map(([key, value]) => [variable(key, 'local'), ...this.convert([value])]);
  }

  private append(block: Block): this {
    this.commands.push(Object.freeze(block));
    return this;
  }

  private openBracket(flavor: BracketFlavor): this {
    this.bracketStack.push(flavor);
    return this.append({ kind: 'bracket', direction: 'open', flavor });
  }

  private appendAction(
    category: ActionCategory,
    action: string,
    args: readonly TypedValue[],
    extras: ActionExtras = {}
  ): this {
    return this.append({
      kind: 'action',
      category,
      action,
      args: Object.freeze(args.map(freezeValue)),
      target: extras.target ?? DEFAULT_TARGET,
      subAction: extras.subAction,
      inverted: extras.inverted ?? false,
    });
  }

  private appendData(category: DataCategory, data: string, args: readonly TypedValue[]): this {
    return this.append({ kind: 'data', category, data, args: Object.freeze(args.map(freezeValue)) });
  }

  private appendCondition(
    category: ActionCategory,
    name: string,
    args: readonly RawArgument[],
    options: TargetedConditionOptions
  ): this {
    this.appendAction(category, name, this.convert(args), {
      target: options.target,
      inverted: options.not,
    });
    return this.openBracket('norm');
  }
}
