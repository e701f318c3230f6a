import type { TypedValue } from '../values/types';

export type ActionCategory =
  | 'event'
  | 'entity_event'
  | 'player_action'
  | 'game_action'
  | 'entity_action'
  | 'if_player'
  | 'if_var'
  | 'if_game'
  | 'if_entity'
  | 'repeat'
  | 'control'
  | 'select_obj'
  | 'set_var';

export type DataCategory = 'func' | 'process' | 'call_func' | 'start_process';

export type BlockCategory = ActionCategory | DataCategory | 'else';

export type BracketFlavor = 'norm' | 'repeat';

export type BracketDirection = 'open' | 'close';

export type ActionBlock = {
  kind: 'action';
  category: ActionCategory;
  action: string;
  args: readonly TypedValue[];
  target: string;
  subAction?: string;
  inverted: boolean;
};

export type DataBlock = {
  kind: 'data';
  category: DataCategory;
  data: string;
  args: readonly TypedValue[];
};

export type ElseBlock = { kind: 'else' };

export type BracketBlock = {
  kind: 'bracket';
  direction: BracketDirection;
  flavor: BracketFlavor;
};

export type Block = ActionBlock | DataBlock | ElseBlock | BracketBlock;

export const DEFAULT_TARGET = 'Default';

export const ENTRY_POINT_CATEGORIES: readonly BlockCategory[] = ['event', 'entity_event', 'func', 'process'];
