#!/usr/bin/env node
import { Command } from 'commander';
import { Template } from '../builder/template';
import { DEFAULT_HOST, DEFAULT_PORT, sendTemplate } from '../dispatch/client';
import { decodeTemplate } from '../encoding/codec';
import { createEventLogger, createNullEventLogger, LogMode } from '../logging/event-logger';
import { DEFAULT_SCHEMA_PATH, loadSchemaStore } from '../schema/loader';
import { applyScript, loadScript } from '../script/runner';
import { createLogger } from '../utils/logger';

const program = new Command();

const errorMessage = (error: unknown, fallback: string): string =>
  error instanceof Error ? error.message : fallback;

program
  .name('dftemplate')
  .description('Build DiamondFire code templates and send them to the game client')
  .version('0.1.0');

program
  .command('build')
  .description('Build a template script and print its code')
  .argument('<script>', 'Path to a .yaml template script')
  .option('--schema <path>', 'Path to the code block tag schema', process.env.DFTEMPLATE_SCHEMA ?? DEFAULT_SCHEMA_PATH)
  .option('--send', 'Send the template to the client item API', false)
  .option('--host <host>', 'Item API host', DEFAULT_HOST)
  .option('--port <number>', 'Item API port', String(DEFAULT_PORT))
  .option('--json', 'Print the template name and code as JSON', false)
  .option('--quiet', 'Only print the template code', false)
  .option('--verbose', 'Trace the exchange with the client', false)
  .addHelpText(
    'after',
    `\nExamples:\n  dftemplate build ./join.yaml\n  dftemplate build ./join.yaml --send\n  dftemplate build ./join.yaml --schema ./data/schema.json --json\n`
  )
  .action(
    async (
      script: string,
      options: {
        schema: string;
        send?: boolean;
        host: string;
        port: string;
        json?: boolean;
        quiet?: boolean;
        verbose?: boolean;
      }
    ) => {
      const mode: LogMode = process.env.CI ? 'ci' : 'cli';
      const eventLogger = options.quiet ? createNullEventLogger() : createEventLogger({ mode });

      try {
        const port = Number(options.port);
        if (!Number.isInteger(port) || port <= 0 || port > 65535) {
          throw new Error(`Invalid port "${options.port}"`);
        }

        const schema = await loadSchemaStore(options.schema, eventLogger);
        const parsed = await loadScript(script);
        const template = applyScript(parsed, new Template({ schema, eventLogger }));
        const encoded = template.build();

        process.stdout.write(options.json ? `${JSON.stringify(encoded)}\n` : `${encoded.code}\n`);

        if (options.send) {
          const result = await sendTemplate(encoded, {
            host: options.host,
            port,
            eventLogger,
            verbose: Boolean(options.verbose),
          });
          if (result.status === 'rejected') {
            process.exitCode = 1;
          }
        }
      } catch (error) {
        eventLogger.emitEvent({
          event: 'build-failed',
          message: errorMessage(error, 'Unknown build error'),
        });
        process.exitCode = 1;
      }
    }
  );

program
  .command('decode')
  .description('Print the code blocks inside a template code')
  .argument('<code>', 'Base64 template code')
  .action((code: string) => {
    const mode: LogMode = process.env.CI ? 'ci' : 'cli';
    try {
      const document = decodeTemplate(code);
      process.stdout.write(`${JSON.stringify(document, null, 2)}\n`);
    } catch (error) {
      createEventLogger({ mode }).emitEvent({
        event: 'decode-failed',
        message: errorMessage(error, 'Unknown decode error'),
      });
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  createLogger().error(errorMessage(error, 'Unknown error'));
  process.exitCode = 1;
});
