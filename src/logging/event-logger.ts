import { EventEmitter } from 'node:events';
import { stableStringify } from '../utils/json';

export type LogMode = 'ci' | 'cli';

export type StructuralWarningCode = 'missing-entry-point' | 'unclosed-bracket';

export type LogEvent =
  | {
      event: 'schema-loaded';
      file: string;
      categories: string[];
    }
  | {
      event: 'schema-missing';
      file: string;
    }
  | {
      event: 'unrecognized-action';
      category: string;
      action: string;
      suggestion?: string;
    }
  | {
      event: 'structural-warning';
      code: StructuralWarningCode;
      message: string;
    }
  | {
      event: 'template-built';
      name: string;
      blocks: number;
      length: number;
    }
  | {
      event: 'build-failed';
      message: string;
    }
  | {
      event: 'decode-failed';
      message: string;
    }
  | {
      event: 'dispatch-sent';
      name: string;
    }
  | {
      event: 'dispatch-rejected';
      name: string;
      error: string;
    }
  | {
      event: 'dispatch-unavailable';
      host: string;
      port: number;
    };

export type EventLogger = {
  emitEvent: (event: LogEvent) => void;
  onEvent: (handler: (event: LogEvent) => void) => void;
};

export type EventLoggerOptions = {
  mode: LogMode;
  format?: 'jsonl' | 'pretty';
  stream?: NodeJS.WritableStream;
};

export const createEventLogger = ({ mode, stream, format }: EventLoggerOptions): EventLogger => {
  const emitter = new EventEmitter();
  // stdout carries the template code itself.
  const output = stream ?? process.stderr;
  const activeFormat = format ?? (mode === 'ci' ? 'jsonl' : stream ? 'jsonl' : 'pretty');

  const colors = {
    reset: '\u001b[0m',
    green: '\u001b[32m',
    red: '\u001b[31m',
    yellow: '\u001b[33m',
    lightBlue: '\u001b[94m',
  };

  const colorizeLine = (line: string): string => {
    if (activeFormat !== 'pretty' || mode === 'ci') {
      return line;
    }

    if (line.startsWith('✔')) {
      return `${colors.green}${line}${colors.reset}`;
    }

    if (line.startsWith('✖')) {
      return `${colors.red}${line}${colors.reset}`;
    }

    if (line.startsWith('⚠')) {
      return `${colors.yellow}${line}${colors.reset}`;
    }

    if (line.startsWith('▶') || line.startsWith('○')) {
      return `${colors.lightBlue}${line}${colors.reset}`;
    }

    return line;
  };

  const formatPretty = (event: LogEvent): string => {
    switch (event.event) {
      case 'schema-loaded':
        return [
          '▶ Schema loaded',
          ` ○ file=${event.file}`,
          ` ○ categories=${event.categories.length}`,
        ].map(colorizeLine).join('\n');
      case 'schema-missing':
        return [
          '⚠ Schema not found, tags and name checks are disabled',
          ` ○ file=${event.file}`,
        ].map(colorizeLine).join('\n');
      case 'unrecognized-action': {
        const hint = event.suggestion
          ? `Did you mean "${event.suggestion}"?`
          : 'Try spell checking or re-typing without spaces.';
        return [
          `⚠ Code block name "${event.action}" not recognized. ${hint}`,
          ` ○ block=${event.category}`,
        ].map(colorizeLine).join('\n');
      }
      case 'structural-warning':
        return [
          `⚠ ${event.message}`,
          ` ○ code=${event.code}`,
        ].map(colorizeLine).join('\n');
      case 'template-built':
        return [
          '✔ Template built successfully',
          ` ○ name=${event.name}`,
          ` ○ blocks=${event.blocks}`,
          ` ○ length=${event.length}`,
        ].map(colorizeLine).join('\n');
      case 'build-failed':
        return [
          '✖ Build failed',
          ` ○ message=${event.message}`,
        ].map(colorizeLine).join('\n');
      case 'decode-failed':
        return [
          '✖ Decode failed',
          ` ○ message=${event.message}`,
        ].map(colorizeLine).join('\n');
      case 'dispatch-sent':
        return [
          '✔ Template sent to client successfully',
          ` ○ name=${event.name}`,
        ].map(colorizeLine).join('\n');
      case 'dispatch-rejected':
        return [
          '✖ Error sending template',
          ` ○ name=${event.name}`,
          ` ○ error=${event.error}`,
        ].map(colorizeLine).join('\n');
      case 'dispatch-unavailable':
        return [
          '✖ Could not connect to the client item API',
          ` ○ host=${event.host}`,
          ` ○ port=${event.port}`,
        ].map(colorizeLine).join('\n');
      default:
        return stableStringify(event);
    }
  };

  const emitEvent = (event: LogEvent) => {
    emitter.emit('event', event);
    const line = activeFormat === 'jsonl' ? stableStringify(event) : formatPretty(event);
    output.write(`${line}\n`);
  };

  const onEvent = (handler: (event: LogEvent) => void) => {
    emitter.on('event', handler);
  };

  return { emitEvent, onEvent };
};

export const createNullEventLogger = (): EventLogger => {
  return {
    emitEvent: () => undefined,
    onEvent: () => undefined,
  };
};

