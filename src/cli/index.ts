/**
 * faultpage CLI
 *
 * Commander-based CLI with render, serve, and config subcommands.
 */

import fs from 'fs';
import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import {
  BadRequestError,
  IllegalStateError,
  ServiceUnavailableError,
} from '../errors/faultpage-error.js';
import { ErrorHandler } from '../handler/error-handler.js';
import { MemoryResponse } from '../handler/memory-response.js';
import { createLogger } from '../logging/logger.js';
import { createDemoApp } from '../server/app.js';

export const FAILURE_KINDS = ['none', 'generic', 'bad-request', 'service-unavailable', 'illegal-state'] as const;
export type FailureKindOption = (typeof FAILURE_KINDS)[number];

interface RenderCommandOptions {
  status: string;
  kind: string;
  message: string;
  htmlMessage?: string;
  accept: string;
  contentType?: string;
  details?: boolean;
  output?: string;
}

function isFailureKind(kind: string): kind is FailureKindOption {
  return FAILURE_KINDS.some((known) => known === kind);
}

/** Build the failure a `render --kind` option stands for. */
export function makeFailure(kind: FailureKindOption, message: string, htmlMessage?: string): unknown {
  switch (kind) {
    case 'none':
      return null;
    case 'generic':
      return new Error(message);
    case 'bad-request':
      return new BadRequestError(message, htmlMessage);
    case 'service-unavailable':
      return new ServiceUnavailableError(message, htmlMessage);
    case 'illegal-state':
      return new IllegalStateError(message);
  }
}

function fail(err: unknown): never {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

// ─── render ──────────────────────────────────────────────────────────────────

export function renderCommand(): Command {
  const cmd = new Command('render');
  cmd
    .description('Preview the error response for a failure and an Accept header')
    .option('--status <code>', 'Status code reported by the framework', '500')
    .option(`--kind <${FAILURE_KINDS.join('|')}>`, 'Failure kind', 'generic')
    .option('--message <text>', 'Failure message', 'Something failed')
    .option('--html-message <html>', 'Dedicated HTML message (bad-request, service-unavailable)')
    .option('--accept <header>', 'Accept header sent by the client', 'text/plain')
    .option('--content-type <mime>', 'Content-Type already set on the response')
    .option('--details', 'Display exception details (messages and stack frames)')
    .option('--output <path>', 'Write the body to a file (default: stdout)')
    .action((options: RenderCommandOptions) => {
      try {
        if (!isFailureKind(options.kind)) {
          throw new Error(`--kind must be ${FAILURE_KINDS.join(' | ')}, got: ${options.kind}`);
        }
        const config = new ConfigManager().loadWithEnvOverrides();
        const handler = ErrorHandler.fromConfig({
          ...config,
          displayExceptionDetails: options.details ?? config.displayExceptionDetails,
        });

        const response = new MemoryResponse();
        if (options.contentType) response.setHeader('Content-Type', options.contentType);

        handler.handle(
          makeFailure(options.kind, options.message, options.htmlMessage),
          parseInt(options.status, 10),
          { method: 'GET', url: '/', headers: { accept: options.accept } },
          response
        );

        const summary = `${response.statusCode} ${response.statusMessage} (${response.getHeader('content-type')})`;
        const body = response.body ?? '';
        if (options.output) {
          fs.writeFileSync(options.output, body);
          console.log(`${summary} → ${options.output}`);
        } else {
          console.error(summary);
          process.stdout.write(body);
        }
      } catch (err) {
        fail(err);
      }
    });
  return cmd;
}

// ─── serve ───────────────────────────────────────────────────────────────────

export function serveCommand(): Command {
  const cmd = new Command('serve');
  cmd
    .description('Run a demo server whose routes fail in every supported way')
    .option('--port <number>', 'Port to listen on (default: config server.port)')
    .action((options: { port?: string }) => {
      try {
        const config = new ConfigManager().loadWithEnvOverrides();
        const log = createLogger(config.logLevel);
        const port = options.port ? parseInt(options.port, 10) : config.server.port;
        const app = createDemoApp(ErrorHandler.fromConfig(config, log));
        app.listen(port, () => {
          log.info({ port, displayExceptionDetails: config.displayExceptionDetails }, 'Demo server listening');
        });
      } catch (err) {
        fail(err);
      }
    });
  return cmd;
}

// ─── config ──────────────────────────────────────────────────────────────────

export function configCommand(): Command {
  const cmd = new Command('config');
  cmd.description('Inspect faultpage configuration');

  cmd
    .command('get')
    .description('Show the effective configuration (file + environment)')
    .action(() => {
      try {
        const config = new ConfigManager().loadWithEnvOverrides();
        console.log(JSON.stringify(config, null, 2));
      } catch (err) {
        fail(err);
      }
    });

  cmd
    .command('validate')
    .description('Validate the effective configuration')
    .action(() => {
      try {
        const manager = new ConfigManager();
        const { valid, errors } = manager.validate(manager.loadWithEnvOverrides());
        if (valid) {
          console.log('✅ Configuration is valid');
        } else {
          console.error('❌ Configuration has errors:');
          for (const err of errors) {
            console.error(`  - ${err}`);
          }
          process.exit(1);
        }
      } catch (err) {
        fail(err);
      }
    });

  return cmd;
}

// ─── program factory ─────────────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command();

  program
    .name('faultpage')
    .description('Content-negotiated HTTP error responses')
    .version('0.1.0');

  program.addCommand(renderCommand());
  program.addCommand(serveCommand());
  program.addCommand(configCommand());

  return program;
}
