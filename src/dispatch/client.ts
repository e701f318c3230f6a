import net from 'node:net';
import { EncodedTemplate } from '../encoding/codec';
import { EventLogger } from '../logging/event-logger';
import { createLogger, Logger } from '../utils/logger';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 31372;
export const SOURCE_LABEL = 'dftemplate';

export type DispatchOptions = {
  host?: string;
  port?: number;
  eventLogger?: EventLogger;
  verbose?: boolean;
};

export type DispatchResult =
  | { status: 'sent' }
  | { status: 'rejected'; error: string }
  | { status: 'unavailable'; message: string };

type ClientReply = {
  status: string;
  error?: string;
};

const isConnectionRefused = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && error.code === 'ECONNREFUSED';
};

const isClientReply = (value: unknown): value is ClientReply => {
  if (typeof value !== 'object' || value === null || !('status' in value)) return false;
  if (typeof value.status !== 'string') return false;
  return !('error' in value) || value.error === undefined || typeof value.error === 'string';
};

export const buildDispatchMessage = ({ code, name }: EncodedTemplate): string => {
  const payload = JSON.stringify({ name: `${SOURCE_LABEL} Template - ${name}`, data: code });
  return `${JSON.stringify({ type: 'template', source: `${SOURCE_LABEL} - ${name}`, data: payload })}\n`;
};

const exchange = (host: string, port: number, message: string, logger: Logger): Promise<string> => {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    let buffer = '';
    let settled = false;

    const finish = (error?: Error) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      if (error) {
        reject(error);
      } else {
        resolve(buffer.split('\n')[0]);
      }
    };

    socket.setEncoding('utf-8');
    socket.on('connect', () => {
      logger.debug('connected to %s:%d', host, port);
      socket.write(message);
    });
    socket.on('data', (chunk: string) => {
      buffer += chunk;
      if (buffer.includes('\n')) {
        finish();
      }
    });
    socket.on('end', () => finish());
    socket.on('error', (error) => finish(error));
  });
};

/**
 * Hands a built template to the client's item API on the loopback interface.
 * An unreachable client is reported, not thrown.
 */
export const sendTemplate = async (
  template: EncodedTemplate,
  { host = DEFAULT_HOST, port = DEFAULT_PORT, eventLogger, verbose = false }: DispatchOptions = {}
): Promise<DispatchResult> => {
  const logger = createLogger('dftemplate:dispatch', verbose);
  let line: string;
  try {
    line = await exchange(host, port, buildDispatchMessage(template), logger);
  } catch (error) {
    if (isConnectionRefused(error)) {
      eventLogger?.emitEvent({ event: 'dispatch-unavailable', host, port });
      return { status: 'unavailable', message: `Could not connect to ${host}:${port}` };
    }
    throw error;
  }

  logger.debug('received reply %s', line);

  let reply: unknown;
  try {
    reply = JSON.parse(line);
  } catch {
    reply = undefined;
  }

  if (!isClientReply(reply)) {
    const error = `Unexpected reply from client: ${line}`;
    eventLogger?.emitEvent({ event: 'dispatch-rejected', name: template.name, error });
    return { status: 'rejected', error };
  }

  if (reply.status !== 'success') {
    const error = reply.error ?? `Client answered with status "${reply.status}"`;
    eventLogger?.emitEvent({ event: 'dispatch-rejected', name: template.name, error });
    return { status: 'rejected', error };
  }

  eventLogger?.emitEvent({ event: 'dispatch-sent', name: template.name });
  return { status: 'sent' };
};
