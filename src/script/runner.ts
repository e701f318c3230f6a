import { Template } from '../builder/template';
import { formatValidationIssues, hasErrors, ValidationIssue } from '../utils/validation';
import { ScriptStep, TemplateScript } from './types';
import { validateScriptFile } from './validation';

export class ScriptValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(formatValidationIssues(issues));
    this.name = 'ScriptValidationError';
    this.issues = issues;
  }
}

export const loadScript = async (filePath: string): Promise<TemplateScript> => {
  const result = await validateScriptFile(filePath);
  if (!result.script || hasErrors(result.issues)) {
    throw new ScriptValidationError(result.issues.filter((issue) => issue.severity === 'error'));
  }
  return result.script;
};

const applyStep = (template: Template, step: ScriptStep): void => {
  switch (step.operation) {
    case 'playerEvent':
      template.playerEvent(step.name);
      return;
    case 'entityEvent':
      template.entityEvent(step.name);
      return;
    case 'function':
      template.function(step.name, step.parameters);
      return;
    case 'process':
      template.process(step.name);
      return;
    case 'callFunction':
      template.callFunction(step.name, step.parameters);
      return;
    case 'startProcess':
      template.startProcess(step.name);
      return;
    case 'playerAction':
      template.playerAction(step.name, step.args, { target: step.target });
      return;
    case 'entityAction':
      template.entityAction(step.name, step.args, { target: step.target });
      return;
    case 'gameAction':
      template.gameAction(step.name, step.args);
      return;
    case 'control':
      template.control(step.name, step.args);
      return;
    case 'selectObject':
      template.selectObject(step.name, step.args);
      return;
    case 'setVariable':
      template.setVariable(step.name, step.args);
      return;
    case 'ifPlayer':
      template.ifPlayer(step.name, step.args, { target: step.target, not: step.not });
      return;
    case 'ifEntity':
      template.ifEntity(step.name, step.args, { target: step.target, not: step.not });
      return;
    case 'ifVariable':
      template.ifVariable(step.name, step.args, { not: step.not });
      return;
    case 'ifGame':
      template.ifGame(step.name, step.args, { not: step.not });
      return;
    case 'repeat':
      template.repeat(step.name, step.args, { subAction: step.subAction, not: step.not });
      return;
    case 'else':
      template.else();
      return;
    case 'bracket':
      template.bracket();
      return;
    case 'return':
      template.return(step.values);
      return;
    case 'define':
      template.define(step.name, { value: step.value, scope: step.scope, initialize: step.initialize });
      return;
    default: {
      const exhaustive: never = step;
      throw new Error(`Unsupported script step: ${JSON.stringify(exhaustive)}`);
    }
  }
};

/** Replays every step onto the template; the first failing step aborts with its error. */
export const applyScript = (script: TemplateScript, template: Template): Template => {
  for (const step of script.steps) {
    applyStep(template, step);
  }
  return template;
};
