import * as YAML from 'yaml';

export type ValidationSeverity = 'error' | 'warning';

export type ValidationIssue = {
  file: string;
  path: string;
  message: string;
  severity: ValidationSeverity;
  line?: number;
  column?: number;
};

export const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

export const pushIssue = (
  issues: ValidationIssue[],
  file: string,
  pathKey: string,
  message: string,
  severity: ValidationSeverity = 'error',
  line?: number,
  column?: number
): void => {
  issues.push({ file, path: pathKey, message, severity, line, column });
};

export const hasErrors = (issues: ValidationIssue[]): boolean => {
  return issues.some((issue) => issue.severity === 'error');
};

const extractLineInfo = (error: YAML.YAMLError): { line?: number; column?: number } => {
  const linePos = error.linePos;
  if (!linePos) return {};
  return { line: linePos[0].line, column: linePos[0].col };
};

/** Parses JSON or YAML, rejecting duplicate keys and aliases. */
export const parseYamlStrict = (
  file: string,
  content: string
): { data?: unknown; document?: YAML.Document.Parsed; issues: ValidationIssue[] } => {
  const doc = YAML.parseDocument(content, {
    prettyErrors: true,
    uniqueKeys: true,
  });

  const issues: ValidationIssue[] = [];

  for (const err of doc.errors) {
    const { line, column } = extractLineInfo(err);
    pushIssue(issues, file, '', err.message, 'error', line, column);
  }

  for (const warn of doc.warnings) {
    const { line, column } = extractLineInfo(warn);
    pushIssue(issues, file, '', warn.message, 'warning', line, column);
  }

  if (hasErrors(issues)) {
    return { issues };
  }

  const data: unknown = doc.toJS({ maxAliasCount: 0 });
  return { data, document: doc, issues };
};

export const formatValidationIssues = (issues: ValidationIssue[]): string => {
  return issues
    .map((issue) => {
      const location = issue.line !== undefined ? `:${issue.line}:${issue.column ?? 0}` : '';
      return `${issue.severity.toUpperCase()} ${issue.file}${location}\n ○ ${issue.path}\n   → ${issue.message}`;
    })
    .join('\n\n');
};
