import type { BracketDirection, BracketFlavor } from '../builder/types';
import type { WireItem } from '../values/types';

export type DocumentCodeBlock = {
  id: 'block';
  block: string;
  action?: string;
  data?: string;
  subAction?: string;
  attribute?: 'NOT';
  target?: string;
  args: { items: WireItem[] };
};

export type DocumentBracket = {
  id: 'bracket';
  direct: BracketDirection;
  type: BracketFlavor;
  args: { items: WireItem[] };
};

export type DocumentBlock = DocumentCodeBlock | DocumentBracket;

export type TemplateDocument = {
  blocks: DocumentBlock[];
};

export type AssemblyWarning =
  | { code: 'unrecognized-action'; category: string; action: string; suggestion?: string }
  | { code: 'missing-entry-point'; category?: string }
  | { code: 'unclosed-bracket'; open: number };

export type AssembledTemplate = {
  document: TemplateDocument;
  name: string;
  warnings: AssemblyWarning[];
};
