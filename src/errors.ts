export type TemplateBuildErrorCode = 'unknown-reference' | 'unbalanced-bracket' | 'invalid-argument';

export class TemplateBuildError extends Error {
  readonly code: TemplateBuildErrorCode;

  constructor(code: TemplateBuildErrorCode, message: string) {
    super(message);
    this.name = 'TemplateBuildError';
    this.code = code;
  }
}

export class UnknownReferenceError extends TemplateBuildError {
  readonly reference: string;

  constructor(reference: string) {
    super('unknown-reference', `Variable "${reference}" was referenced before being defined`);
    this.name = 'UnknownReferenceError';
    this.reference = reference;
  }
}

export class UnbalancedBracketError extends TemplateBuildError {
  constructor() {
    super('unbalanced-bracket', 'Cannot close a bracket when none is open');
    this.name = 'UnbalancedBracketError';
  }
}

export class InvalidArgumentError extends TemplateBuildError {
  readonly index: number;

  constructor(index: number, message: string) {
    super('invalid-argument', `Argument ${index}: ${message}`);
    this.name = 'InvalidArgumentError';
    this.index = index;
  }
}

export class TemplateDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateDecodeError';
  }
}
